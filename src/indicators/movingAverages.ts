import { InsufficientHistoryError } from "../utils/errors";

export function calculateSma(values: number[], period: number): number {
	if (values.length < period) {
		throw new InsufficientHistoryError(`SMA(${period})`, period, values.length);
	}
	const recent = values.slice(-period);
	return recent.reduce((acc, val) => acc + val, 0) / period;
}

/**
 * EMA series seeded with the SMA of the first `period` values. Index 0 of the
 * result lines up with values[period - 1].
 */
export function emaSeries(values: number[], period: number): number[] {
	if (values.length < period) {
		throw new InsufficientHistoryError(`EMA(${period})`, period, values.length);
	}

	const alpha = 2 / (period + 1);
	let ema = values.slice(0, period).reduce((acc, val) => acc + val, 0) / period;
	const series = [ema];
	for (let i = period; i < values.length; i++) {
		ema = values[i] * alpha + ema * (1 - alpha);
		series.push(ema);
	}
	return series;
}

export function calculateEma(values: number[], period: number): number {
	const series = emaSeries(values, period);
	return series[series.length - 1];
}
