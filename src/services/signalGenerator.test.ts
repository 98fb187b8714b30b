import assert from "node:assert/strict";
import test from "node:test";

import { FakeMarketData, linearCloses, makeCandles, testSettings } from "../testing/fakes";
import type { IndicatorSnapshot } from "../types";
import { InsufficientHistoryError } from "../utils/errors";
import {
	combineTrendVotes,
	directionFromScore,
	type EmissionTracker,
	SignalGenerator,
	type SignalGeneratorOptions,
	shortTermStrength,
	trendVote,
} from "./signalGenerator";
import { SettingsStore } from "./settingsStore";

const MINUTE = 60_000;
const T0 = Date.UTC(2024, 0, 1, 10, 0, 0);

const options: SignalGeneratorOptions = {
	shortTimeframe: "5m",
	trendTimeframes: ["1h", "4h"],
	periods: { sma: 3, emaFast: 3, emaSlow: 5, macdSignal: 3, rsi: 3, atr: 3 },
	volumeWindow: 3,
	momentumWindow: 2,
	candleLimit: 20,
	signalCutoff: 0.5,
	multiplierIncrement: 0.5,
	maxMultiplier: 2,
};

// accelerating moves keep MACD on the same side of its signal line as the EMAs
const rising = Array.from({ length: 30 }, (_, i) => 100 + 0.5 * i * i);
const falling = Array.from({ length: 30 }, (_, i) => 200 - 0.1 * i * i);

class MapTracker implements EmissionTracker {
	readonly emitted = new Map<string, number>();

	lastSignalEmittedAt(symbol: string): number | null {
		return this.emitted.get(symbol) ?? null;
	}

	markSignalEmitted(symbol: string, at: number): void {
		this.emitted.set(symbol, at);
	}
}

function setup(trend: { "1h": number[]; "4h": number[] }, short: Parameters<typeof makeCandles>[0]) {
	const market = new FakeMarketData();
	const trendFrames = ["1h", "4h"] as const;
	for (const tf of trendFrames) {
		market.setCandles("BTCUSDT", tf, makeCandles(trend[tf], { timeframe: tf }));
	}
	market.setCandles("BTCUSDT", "5m", makeCandles(short, { timeframe: "5m" }));
	const tracker = new MapTracker();
	const settings = new SettingsStore({ filePath: null, initial: testSettings });
	const generator = new SignalGenerator(market, settings, tracker, options);
	return { market, tracker, generator };
}

function quietShort(lastVolume = 100) {
	return linearCloses(20, 100, 0.1).map((close, i) => ({
		close,
		volume: i === 19 ? lastVolume : 100,
	}));
}

test("aligned uptrend with a volume spike gives a boosted BUY", async () => {
	const { generator, tracker, market } = setup({ "1h": rising, "4h": rising }, quietShort(300));

	const signal = await generator.generate("BTCUSDT", T0);

	assert.equal(signal.direction, "BUY");
	assert.equal(signal.trendScore, 1);
	assert.equal(signal.multiplier, 1.5);
	assert.equal(signal.aggregateScore, 1.5);
	assert.equal(signal.confidenceScore, 0.75);
	assert.deepEqual(signal.reasons, ["TREND_1", "VOLUME_SPIKE"]);
	assert.deepEqual(signal.contributingTimeframes, ["5m", "1h", "4h"]);
	assert.equal(signal.suppressed, false);
	assert.ok(Math.abs(signal.atr - 2.1) < 1e-9);
	assert.ok(Math.abs(signal.price - 101.9) < 1e-9);
	assert.ok(Object.isFrozen(signal));
	assert.equal(tracker.lastSignalEmittedAt("BTCUSDT"), T0);
	assert.deepEqual(
		market.candleRequests.map((r) => r.limit),
		[20, 20, 20],
	);
});

test("aligned downtrend without boosts gives a SELL at half confidence", async () => {
	const { generator } = setup({ "1h": falling, "4h": falling }, quietShort());
	const signal = await generator.generate("BTCUSDT", T0);

	assert.equal(signal.direction, "SELL");
	assert.equal(signal.trendScore, -1);
	assert.equal(signal.multiplier, 1);
	assert.equal(signal.confidenceScore, 0.5);
	assert.deepEqual(signal.reasons, ["TREND_-1"]);
});

test("disagreeing trend timeframes hold", async () => {
	const { generator, tracker } = setup({ "1h": rising, "4h": falling }, quietShort(300));
	const signal = await generator.generate("BTCUSDT", T0);

	assert.equal(signal.direction, "HOLD");
	assert.equal(signal.trendScore, 0);
	assert.equal(signal.confidenceScore, 0);
	assert.equal(tracker.lastSignalEmittedAt("BTCUSDT"), null);
});

test("a second signal inside the minimum interval is suppressed", async () => {
	const { generator, tracker } = setup({ "1h": rising, "4h": rising }, quietShort());

	const first = await generator.generate("BTCUSDT", T0);
	const second = await generator.generate("BTCUSDT", T0 + 4 * MINUTE);
	const third = await generator.generate("BTCUSDT", T0 + 5 * MINUTE);

	assert.equal(first.direction, "BUY");
	assert.equal(second.direction, "HOLD");
	assert.equal(second.suppressed, true);
	assert.equal(second.confidenceScore, 0);
	assert.deepEqual(second.reasons, ["TREND_1", "RATE_LIMITED"]);
	assert.equal(third.direction, "BUY");
	assert.equal(tracker.lastSignalEmittedAt("BTCUSDT"), T0 + 5 * MINUTE);
});

test("too few candles is insufficient history", async () => {
	const { generator } = setup({ "1h": rising.slice(0, 5), "4h": rising }, quietShort());
	await assert.rejects(generator.generate("BTCUSDT", T0), InsufficientHistoryError);
});

const strengthOptions = {
	volumeWindow: 3,
	momentumWindow: 2,
	multiplierIncrement: 0.5,
	maxMultiplier: 2,
};
const thresholds = { volumeSpikeThreshold: 2, priceMomentumThreshold: 0.003 };

test("short-term strength adds one increment per threshold crossed", () => {
	const candles = makeCandles([
		{ close: 100, volume: 100 },
		{ close: 100, volume: 100 },
		{ close: 100, volume: 100 },
		{ close: 100, volume: 100 },
		{ close: 101, volume: 250 },
	]);
	const strength = shortTermStrength(candles, thresholds, strengthOptions);
	assert.equal(strength.volumeRatio, 2.5);
	assert.equal(strength.priceChange, 0.01);
	assert.equal(strength.volumeSpike, true);
	assert.equal(strength.momentum, true);
	assert.equal(strength.multiplier, 2);
});

test("short-term multiplier is capped", () => {
	const candles = makeCandles([100, 100, 100, { close: 110, volume: 1_000 }]);
	const strength = shortTermStrength(candles, thresholds, {
		...strengthOptions,
		multiplierIncrement: 0.75,
	});
	assert.equal(strength.multiplier, 2);
});

test("short-term strength ignores the open candle", () => {
	const candles = makeCandles([100, 100, 100, 100]);
	candles.push({ ...candles[3], close: 150, volume: 10_000, isClosed: false });
	const strength = shortTermStrength(candles, thresholds, strengthOptions);
	assert.equal(strength.multiplier, 1);
	assert.equal(strength.volumeRatio, 1);
});

test("direction needs the score strictly past the cutoff", () => {
	assert.equal(directionFromScore(0.5, 0.5), "HOLD");
	assert.equal(directionFromScore(0.51, 0.5), "BUY");
	assert.equal(directionFromScore(-0.51, 0.5), "SELL");
});

function snapshot(overrides: Partial<IndicatorSnapshot>): IndicatorSnapshot {
	return {
		timeframe: "1h",
		candleTime: 0,
		close: 100,
		volume: 1,
		sma: 100,
		emaFast: 100,
		emaSlow: 100,
		rsi: 50,
		macd: 0,
		macdSignal: 0,
		macdHistogram: 0,
		atr: 1,
		...overrides,
	};
}

test("a timeframe votes only when EMA and MACD agree", () => {
	assert.equal(trendVote(snapshot({ emaFast: 101, macd: 1 })), 1);
	assert.equal(trendVote(snapshot({ emaFast: 99, macd: -1 })), -1);
	assert.equal(trendVote(snapshot({ emaFast: 101, macd: -1 })), 0);
	assert.equal(combineTrendVotes([1, 1]), 1);
	assert.equal(combineTrendVotes([1, 0]), 0);
	assert.equal(combineTrendVotes([]), 0);
});
