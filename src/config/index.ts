import path from "node:path";
import dotenv from "dotenv";
import type { Timeframe, TradingSettings } from "../types";

dotenv.config();

const TIMEFRAMES: readonly Timeframe[] = [
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"1d",
];

function isTimeframe(value: string): value is Timeframe {
	return (TIMEFRAMES as readonly string[]).includes(value);
}

function parseTimeframe(raw: string | undefined, fallback: Timeframe): Timeframe {
	const value = (raw || "").trim();
	if (!value) return fallback;
	if (!isTimeframe(value)) {
		throw new Error(`Unsupported timeframe "${value}"`);
	}
	return value;
}

function parseTimeframes(raw: string | undefined, fallback: Timeframe[]): Timeframe[] {
	if (!raw || !raw.trim()) return fallback;
	return raw.split(",").map((tf) => parseTimeframe(tf, fallback[0]));
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
	if (!raw || !raw.trim()) return fallback;
	return raw
		.split(",")
		.map((s) => s.trim().toUpperCase())
		.filter(Boolean);
}

export type ReenablePolicy = "manual" | "on_win";
export type LossCounterScope = "global" | "symbol";

const reenablePolicy: ReenablePolicy =
	(process.env.AUTO_TRADING_REENABLE_POLICY || "manual").toLowerCase() === "on_win"
		? "on_win"
		: "manual";
const lossCounterScope: LossCounterScope =
	(process.env.LOSS_COUNTER_SCOPE || "global").toLowerCase() === "symbol"
		? "symbol"
		: "global";

const useTestnet =
	(process.env.BINANCE_USE_TESTNET || "true").toLowerCase() === "true";
const futuresUrl =
	process.env.BINANCE_FUTURES_URL ||
	(useTestnet
		? "https://testnet.binancefuture.com"
		: "https://fapi.binance.com");

export const defaultTradingSettings: TradingSettings = {
	leverage: 10,
	riskPerTrade: 0.02,
	accountBalance: 10_000,
	atrMultiplier: 1.5,
	tpRatio: 1.5,
	volumeSpikeThreshold: 2.0,
	priceMomentumThreshold: 0.003,
	minSignalIntervalMinutes: 5,
	maxConsecutiveLosses: 3,
	activeHours: [
		{ start: 0, end: 2 },
		{ start: 9, end: 24 },
	],
};

export const config = {
	logLevel: process.env.LOG_LEVEL || "info",
	binance: {
		apiKey: process.env.BINANCE_API_KEY || "",
		apiSecret: process.env.BINANCE_API_SECRET || "",
		baseUrl: futuresUrl,
		testnet: useTestnet,
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	indicators: {
		sma: Number(process.env.INDICATOR_SMA_PERIOD || "20"),
		emaFast: Number(process.env.INDICATOR_EMA_FAST || "12"),
		emaSlow: Number(process.env.INDICATOR_EMA_SLOW || "26"),
		macdSignal: Number(process.env.INDICATOR_MACD_SIGNAL || "9"),
		rsi: Number(process.env.INDICATOR_RSI_PERIOD || "14"),
		atr: Number(process.env.INDICATOR_ATR_PERIOD || "14"),
	},
	strategy: {
		symbols: parseList(process.env.TRADING_SYMBOLS, ["BTCUSDT", "ETHUSDT"]),
		shortTimeframe: parseTimeframe(process.env.SHORT_TIMEFRAME, "5m"),
		trendTimeframes: parseTimeframes(process.env.TREND_TIMEFRAMES, ["1h", "4h"]),
		volumeWindow: Number(process.env.SIGNAL_VOLUME_WINDOW || "20"),
		momentumWindow: Number(process.env.SIGNAL_MOMENTUM_WINDOW || "3"),
		candleLimit: Number(process.env.SIGNAL_CANDLE_LIMIT || "150"),
		signalCutoff: 0.5,
		multiplierIncrement: 0.5,
		maxMultiplier: 2,
		maxPositionHoldHours: Number(process.env.MAX_POSITION_HOLD_HOURS || "4"),
		// trailing starts once price moves this many stop distances in profit; 0 turns it off
		trailingActivationRatio: Number(process.env.TRAILING_ACTIVATION_RATIO || "1"),
		// close when the current ATR reaches this multiple of the entry ATR; 0 turns it off
		volatilityExitRatio: Number(process.env.VOLATILITY_EXIT_RATIO || "3"),
	},
	autoTrading: {
		enabledOnStart:
			(process.env.AUTO_TRADING_ENABLED || "false").toLowerCase() === "true",
		reenablePolicy,
		lossCounterScope,
		eventLogSize: 100,
	},
	execution: {
		timeoutMs: Number(process.env.EXCHANGE_TIMEOUT_MS || "10000"),
		maxAttempts: Number(process.env.EXCHANGE_MAX_ATTEMPTS || "3"),
		backoffMs: Number(process.env.EXCHANGE_BACKOFF_MS || "500"),
		lockWaitMs: Number(process.env.LOCK_WAIT_MS || "30000"),
		exchangeInfoTtlMs: 60 * 60 * 1000,
	},
	monitor: {
		positionCheckIntervalSec: Number(
			process.env.POSITION_CHECK_INTERVAL_SEC || "5",
		),
		concurrency: Number(process.env.MONITOR_CONCURRENCY || "4"),
	},
	scheduling: {
		signalCron: process.env.SIGNAL_CRON || "5 * * * * *", // second 5 of every minute
		timezone: "UTC",
	},
	paths: {
		settings: path.join(process.cwd(), "data/settings.json"),
		signalLog: path.join(process.cwd(), "data/signals.log"),
		tradeLog: path.join(process.cwd(), "data/trades.log"),
		openPositions: path.join(process.cwd(), "data/open-positions.json"),
	},
};
