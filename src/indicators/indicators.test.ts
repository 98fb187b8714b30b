import assert from "node:assert/strict";
import test from "node:test";

import { makeCandles, linearCloses } from "../testing/fakes";
import { InsufficientHistoryError } from "../utils/errors";
import {
	calculateAtr,
	calculateEma,
	calculateMacd,
	calculateRsi,
	calculateSma,
	computeSnapshot,
	emaSeries,
	requiredHistory,
	trueRanges,
} from "./index";

const approx = (actual: number, expected: number, eps = 1e-9) =>
	assert.ok(Math.abs(actual - expected) < eps, `${actual} != ${expected}`);

test("SMA averages the newest period values", () => {
	assert.equal(calculateSma([1, 2, 3, 4, 5], 3), 4);
	assert.throws(() => calculateSma([1, 2], 3), InsufficientHistoryError);
});

test("EMA is seeded with the SMA of the first period values", () => {
	assert.deepEqual(emaSeries([1, 2, 3, 4, 5], 3), [2, 3, 4]);
	assert.equal(calculateEma([1, 2, 3, 4, 5], 3), 4);
});

test("RSI uses Wilder smoothing", () => {
	approx(calculateRsi([1, 2, 1, 2, 1], 2), 37.5);
});

test("RSI is 100 when there are no losses", () => {
	assert.equal(calculateRsi([1, 2, 3, 4], 3), 100);
});

test("RSI needs period + 1 closes", () => {
	assert.throws(
		() => calculateRsi([1, 2, 3], 3),
		(err: unknown) =>
			err instanceof InsufficientHistoryError && err.required === 4 && err.available === 3,
	);
});

test("true range accounts for gaps from the previous close", () => {
	const candles = makeCandles([
		{ close: 9, high: 10, low: 8 },
		{ close: 10, high: 11, low: 9 },
		{ close: 13, high: 14, low: 12 },
		{ close: 12.5, high: 13, low: 12 },
	]);
	assert.deepEqual(trueRanges(candles), [2, 4, 1]);
});

test("ATR seeds with the mean true range then smooths", () => {
	const candles = makeCandles([
		{ close: 9, high: 10, low: 8 },
		{ close: 10, high: 11, low: 9 },
		{ close: 13, high: 14, low: 12 },
		{ close: 12.5, high: 13, low: 12 },
	]);
	// seed (2 + 4) / 2 = 3, then (3 * 1 + 1) / 2
	assert.equal(calculateAtr(candles, 2), 2);
	assert.throws(() => calculateAtr(candles.slice(0, 2), 2), InsufficientHistoryError);
});

test("MACD is flat for constant closes", () => {
	const result = calculateMacd(new Array<number>(20).fill(50), 3, 5, 3);
	approx(result.macd, 0);
	approx(result.signal, 0);
	approx(result.histogram, 0);
});

test("MACD of a linear trend equals half the period gap", () => {
	const result = calculateMacd(linearCloses(12, 1, 1), 3, 5, 3);
	approx(result.macd, 1);
	approx(result.signal, 1);
	approx(result.histogram, 0);
});

test("MACD rejects a fast period not shorter than slow", () => {
	assert.throws(() => calculateMacd(linearCloses(40, 1, 1), 5, 5, 3), /must be shorter/);
});

test("MACD needs slow + signal - 1 closes", () => {
	assert.throws(
		() => calculateMacd(linearCloses(6, 1, 1), 3, 5, 3),
		(err: unknown) => err instanceof InsufficientHistoryError && err.required === 7,
	);
});

test("required history covers the MACD signal warm-up", () => {
	assert.equal(
		requiredHistory({ sma: 20, emaFast: 12, emaSlow: 26, macdSignal: 9, rsi: 14, atr: 14 }),
		34,
	);
});

const smallPeriods = { sma: 3, emaFast: 3, emaSlow: 5, macdSignal: 3, rsi: 3, atr: 3 };

test("snapshot ignores the candle that has not closed", () => {
	const candles = makeCandles(linearCloses(10, 100, 1), { timeframe: "1h" });
	candles.push({ ...candles[candles.length - 1], close: 500, startTime: 10 * 60_000, isClosed: false });

	const snapshot = computeSnapshot("1h", candles, smallPeriods);
	assert.equal(snapshot.close, 109);
	assert.equal(snapshot.candleTime, 9 * 60_000);
	assert.equal(snapshot.sma, 108);
	assert.equal(snapshot.rsi, 100);
	approx(snapshot.macd, 1);
});

test("snapshot without closed candles is insufficient history", () => {
	const candles = makeCandles([1, 2, 3]).map((c) => ({ ...c, isClosed: false }));
	assert.throws(() => computeSnapshot("5m", candles, smallPeriods), InsufficientHistoryError);
});
