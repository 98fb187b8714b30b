import type { Candle } from "../types";
import { InsufficientHistoryError } from "../utils/errors";

export function trueRanges(candles: Candle[]): number[] {
	const ranges: number[] = [];

	for (let i = 1; i < candles.length; i++) {
		const prev = candles[i - 1];
		const curr = candles[i];
		const tr = Math.max(
			curr.high - curr.low,
			Math.abs(curr.high - prev.close),
			Math.abs(curr.low - prev.close),
		);
		ranges.push(tr);
	}

	return ranges;
}

/**
 * Wilder's ATR. The first value is the mean of the first `period` true
 * ranges; each later one is (prev * (period - 1) + tr) / period.
 */
export function calculateAtr(candles: Candle[], period: number): number {
	if (candles.length < period + 1) {
		throw new InsufficientHistoryError(`ATR(${period})`, period + 1, candles.length);
	}

	const ranges = trueRanges(candles);
	let atr = ranges.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	for (let i = period; i < ranges.length; i++) {
		atr = (atr * (period - 1) + ranges[i]) / period;
	}
	return atr;
}
