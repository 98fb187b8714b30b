import type { Candle, IndicatorPeriods, IndicatorSnapshot, Timeframe } from "../types";
import { InsufficientHistoryError } from "../utils/errors";
import { calculateAtr } from "./atr";
import { calculateMacd, macdRequiredHistory } from "./macd";
import { calculateSma, calculateEma } from "./movingAverages";
import { calculateRsi } from "./rsi";

export { calculateAtr, trueRanges } from "./atr";
export { calculateMacd } from "./macd";
export { calculateEma, calculateSma, emaSeries } from "./movingAverages";
export { calculateRsi } from "./rsi";

export function requiredHistory(periods: IndicatorPeriods): number {
	return Math.max(
		periods.sma,
		periods.emaFast,
		periods.emaSlow,
		macdRequiredHistory(periods.emaSlow, periods.macdSignal),
		periods.rsi + 1,
		periods.atr + 1,
	);
}

export function computeSnapshot(
	timeframe: Timeframe,
	candles: Candle[],
	periods: IndicatorPeriods,
): IndicatorSnapshot {
	const closed = candles.filter((c) => c.isClosed);
	if (!closed.length) {
		throw new InsufficientHistoryError("candles", 1, 0);
	}
	const closes = closed.map((c) => c.close);
	const latest = closed[closed.length - 1];
	const macd = calculateMacd(closes, periods.emaFast, periods.emaSlow, periods.macdSignal);

	return {
		timeframe,
		candleTime: latest.startTime,
		close: latest.close,
		volume: latest.volume,
		sma: calculateSma(closes, periods.sma),
		emaFast: calculateEma(closes, periods.emaFast),
		emaSlow: calculateEma(closes, periods.emaSlow),
		rsi: calculateRsi(closes, periods.rsi),
		macd: macd.macd,
		macdSignal: macd.signal,
		macdHistogram: macd.histogram,
		atr: calculateAtr(closed, periods.atr),
	};
}
