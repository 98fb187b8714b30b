import assert from "node:assert/strict";
import test from "node:test";

import { FakeExchange, testSettings } from "../testing/fakes";
import type { ExchangeInfo, Signal } from "../types";
import { InvalidRiskParametersError, type RiskErrorCode } from "../utils/errors";
import { buildOrderPlan, floorToStep, RiskManager, roundToStep } from "./riskManager";
import { SettingsStore } from "./settingsStore";

const info: ExchangeInfo = {
	symbol: "BTCUSDT",
	minQuantity: 0.001,
	quantityStep: 0.001,
	priceStep: 0.01,
};

const settings = {
	atrMultiplier: 1,
	tpRatio: 1.5,
	accountBalance: 10_000,
	riskPerTrade: 0.02,
	leverage: 10,
};

function rejectsWith(code: RiskErrorCode) {
	return (err: unknown) => err instanceof InvalidRiskParametersError && err.code === code;
}

test("BUY plan sizes the position from the stop distance", () => {
	const plan = buildOrderPlan(
		{ symbol: "BTCUSDT", direction: "BUY", atr: 5, id: "sig-1" },
		settings,
		100,
		info,
	);
	assert.deepEqual(plan, {
		symbol: "BTCUSDT",
		side: "BUY",
		size: 400,
		entryPrice: 100,
		stopLossPrice: 95,
		takeProfitPrice: 107.5,
		stopDistance: 5,
		atr: 5,
		leverage: 10,
		signalId: "sig-1",
	});
});

test("SELL plan mirrors stop and target", () => {
	const plan = buildOrderPlan({ symbol: "BTCUSDT", direction: "SELL", atr: 5 }, settings, 100, info);
	assert.equal(plan.stopLossPrice, 105);
	assert.equal(plan.takeProfitPrice, 92.5);
	assert.equal(plan.size, 400);
});

test("a stop at or below zero is on the wrong side", () => {
	assert.throws(
		() =>
			buildOrderPlan(
				{ symbol: "BTCUSDT", direction: "BUY", atr: 50 },
				{ ...settings, atrMultiplier: 2 },
				100,
				info,
			),
		rejectsWith("STOP_WRONG_SIDE"),
	);
});

test("a SELL target below zero is on the wrong side", () => {
	assert.throws(
		() => buildOrderPlan({ symbol: "BTCUSDT", direction: "SELL", atr: 50 }, settings, 100, info),
		rejectsWith("TARGET_WRONG_SIDE"),
	);
});

test("HOLD signals cannot be planned", () => {
	assert.throws(
		() => buildOrderPlan({ symbol: "BTCUSDT", direction: "HOLD", atr: 5 }, settings, 100, info),
		rejectsWith("HOLD_SIGNAL"),
	);
});

test("a zero ATR gives no stop distance", () => {
	assert.throws(
		() => buildOrderPlan({ symbol: "BTCUSDT", direction: "BUY", atr: 0 }, settings, 100, info),
		rejectsWith("NON_POSITIVE_STOP_DISTANCE"),
	);
});

test("the entry price must be positive", () => {
	assert.throws(
		() => buildOrderPlan({ symbol: "BTCUSDT", direction: "BUY", atr: 5 }, settings, 0, info),
		rejectsWith("INVALID_ENTRY_PRICE"),
	);
});

test("a size under the exchange minimum is rejected", () => {
	assert.throws(
		() =>
			buildOrderPlan(
				{ symbol: "BTCUSDT", direction: "BUY", atr: 5 },
				{ ...settings, accountBalance: 10, riskPerTrade: 0.01, leverage: 1 },
				100,
				{ ...info, minQuantity: 0.1 },
			),
		(err: unknown) =>
			err instanceof InvalidRiskParametersError &&
			err.code === "BELOW_MIN_QUANTITY" &&
			err.details.size === 0.02,
	);
});

test("prices snap to the tick and sizes floor to the lot step", () => {
	assert.equal(roundToStep(100.123, 0.05), 100.1);
	assert.equal(roundToStep(100.004, 0.01), 100);
	assert.equal(floorToStep(0.3, 0.1), 0.3);
	assert.equal(floorToStep(1.2389, 0.01), 1.23);
	assert.equal(floorToStep(7, 0), 7);
});

test("planOrder reads settings and exchange filters", async () => {
	const exchange = new FakeExchange();
	exchange.info = { minQuantity: 1, quantityStep: 1, priceStep: 0.1 };
	const store = new SettingsStore({ filePath: null, initial: testSettings });
	const risk = new RiskManager(exchange, store);

	const signal: Signal = {
		id: "sig-2",
		symbol: "ETHUSDT",
		direction: "BUY",
		confidenceScore: 0.5,
		generatedAt: 0,
		contributingTimeframes: ["5m"],
		indicatorSnapshotRef: {},
		trendScore: 1,
		multiplier: 1,
		aggregateScore: 1,
		price: 100,
		atr: 3,
		suppressed: false,
		reasons: ["TREND_1"],
	};

	const plan = await risk.planOrder(signal, 100.04);
	// 10000 * 0.02 * 10 / 3 = 666.67 floored to whole units
	assert.equal(plan.size, 666);
	assert.equal(plan.entryPrice, 100);
	assert.equal(plan.stopLossPrice, 97);
	assert.equal(plan.takeProfitPrice, 104.5);
	assert.equal(plan.symbol, "ETHUSDT");
});
