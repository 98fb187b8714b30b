import { InsufficientHistoryError } from "../utils/errors";

// Wilder RSI: needs period + 1 closes for the first value.
export function calculateRsi(closes: number[], period: number): number {
	if (closes.length < period + 1) {
		throw new InsufficientHistoryError(`RSI(${period})`, period + 1, closes.length);
	}

	let gains = 0;
	let losses = 0;
	for (let i = 1; i <= period; i++) {
		const diff = closes[i] - closes[i - 1];
		if (diff > 0) gains += diff;
		else losses -= diff;
	}
	let avgGain = gains / period;
	let avgLoss = losses / period;

	for (let i = period + 1; i < closes.length; i++) {
		const diff = closes[i] - closes[i - 1];
		avgGain = (avgGain * (period - 1) + (diff > 0 ? diff : 0)) / period;
		avgLoss = (avgLoss * (period - 1) + (diff < 0 ? -diff : 0)) / period;
	}

	if (avgLoss === 0) return 100;
	return 100 - 100 / (1 + avgGain / avgLoss);
}
