import { InsufficientHistoryError } from "../utils/errors";
import { emaSeries } from "./movingAverages";

export type MacdResult = {
	macd: number;
	signal: number;
	histogram: number;
};

export function macdRequiredHistory(slow: number, signalPeriod: number): number {
	return slow + signalPeriod - 1;
}

export function calculateMacd(
	closes: number[],
	fast: number,
	slow: number,
	signalPeriod: number,
): MacdResult {
	if (fast >= slow) {
		throw new Error(`MACD fast period (${fast}) must be shorter than slow (${slow})`);
	}
	const required = macdRequiredHistory(slow, signalPeriod);
	if (closes.length < required) {
		throw new InsufficientHistoryError(
			`MACD(${fast},${slow},${signalPeriod})`,
			required,
			closes.length,
		);
	}

	const fastSeries = emaSeries(closes, fast);
	const slowSeries = emaSeries(closes, slow);
	// Both series end on the newest close; drop the fast values before slow starts.
	const offset = slow - fast;
	const macdLine = slowSeries.map((slowValue, i) => fastSeries[i + offset] - slowValue);

	const signalSeries = emaSeries(macdLine, signalPeriod);
	const macd = macdLine[macdLine.length - 1];
	const signal = signalSeries[signalSeries.length - 1];
	return { macd, signal, histogram: macd - signal };
}
