import crypto from "node:crypto";
import { config } from "../config";
import { computeSnapshot, requiredHistory } from "../indicators";
import type {
	Candle,
	IndicatorPeriods,
	IndicatorSnapshot,
	MarketDataProvider,
	Signal,
	SignalDirection,
	Timeframe,
} from "../types";
import { InsufficientHistoryError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { SettingsStore } from "./settingsStore";

export interface EmissionTracker {
	lastSignalEmittedAt(symbol: string): number | null;
	markSignalEmitted(symbol: string, at: number): void;
}

export type SignalGeneratorOptions = {
	shortTimeframe: Timeframe;
	trendTimeframes: Timeframe[];
	periods: IndicatorPeriods;
	volumeWindow: number;
	momentumWindow: number;
	candleLimit: number;
	signalCutoff: number;
	multiplierIncrement: number;
	maxMultiplier: number;
};

export function defaultSignalOptions(): SignalGeneratorOptions {
	return {
		shortTimeframe: config.strategy.shortTimeframe,
		trendTimeframes: config.strategy.trendTimeframes,
		periods: config.indicators,
		volumeWindow: config.strategy.volumeWindow,
		momentumWindow: config.strategy.momentumWindow,
		candleLimit: config.strategy.candleLimit,
		signalCutoff: config.strategy.signalCutoff,
		multiplierIncrement: config.strategy.multiplierIncrement,
		maxMultiplier: config.strategy.maxMultiplier,
	};
}

export type TrendVote = -1 | 0 | 1;

export function trendVote(snapshot: IndicatorSnapshot): TrendVote {
	const emaBull = snapshot.emaFast > snapshot.emaSlow;
	const emaBear = snapshot.emaFast < snapshot.emaSlow;
	const macdBull = snapshot.macd > snapshot.macdSignal;
	const macdBear = snapshot.macd < snapshot.macdSignal;
	if (emaBull && macdBull) return 1;
	if (emaBear && macdBear) return -1;
	return 0;
}

export function combineTrendVotes(votes: TrendVote[]): TrendVote {
	if (!votes.length) return 0;
	if (votes.every((v) => v === 1)) return 1;
	if (votes.every((v) => v === -1)) return -1;
	return 0;
}

export type ShortTermStrength = {
	volumeRatio: number;
	priceChange: number;
	volumeSpike: boolean;
	momentum: boolean;
	multiplier: number;
};

/**
 * Volume ratio is the newest volume over the mean of the `volumeWindow`
 * candles before it; price change is measured over `momentumWindow` candles.
 */
export function shortTermStrength(
	candles: Candle[],
	thresholds: { volumeSpikeThreshold: number; priceMomentumThreshold: number },
	options: Pick<
		SignalGeneratorOptions,
		"volumeWindow" | "momentumWindow" | "multiplierIncrement" | "maxMultiplier"
	>,
): ShortTermStrength {
	const closed = candles.filter((c) => c.isClosed);
	const required = Math.max(options.volumeWindow, options.momentumWindow) + 1;
	if (closed.length < required) {
		throw new InsufficientHistoryError("short-term strength", required, closed.length);
	}

	const latest = closed[closed.length - 1];
	const previous = closed.slice(-(options.volumeWindow + 1), -1);
	const avgVolume = previous.reduce((acc, c) => acc + c.volume, 0) / previous.length;
	const volumeRatio = avgVolume > 0 ? latest.volume / avgVolume : 0;

	const base = closed[closed.length - 1 - options.momentumWindow];
	const priceChange = base.close > 0 ? (latest.close - base.close) / base.close : 0;

	const volumeSpike = volumeRatio >= thresholds.volumeSpikeThreshold;
	const momentum = Math.abs(priceChange) >= thresholds.priceMomentumThreshold;
	let multiplier = 1;
	if (volumeSpike) multiplier += options.multiplierIncrement;
	if (momentum) multiplier += options.multiplierIncrement;

	return {
		volumeRatio,
		priceChange,
		volumeSpike,
		momentum,
		multiplier: Math.min(multiplier, options.maxMultiplier),
	};
}

export function directionFromScore(score: number, cutoff: number): SignalDirection {
	if (score > cutoff) return "BUY";
	if (score < -cutoff) return "SELL";
	return "HOLD";
}

export class SignalGenerator {
	private readonly options: SignalGeneratorOptions;

	constructor(
		private readonly marketData: MarketDataProvider,
		private readonly settings: SettingsStore,
		private readonly tracker: EmissionTracker,
		options: Partial<SignalGeneratorOptions> = {},
	) {
		this.options = { ...defaultSignalOptions(), ...options };
	}

	async generate(symbol: string, now: number = Date.now()): Promise<Signal> {
		const opts = this.options;
		const settings = this.settings.getSettings();
		const limit = Math.max(
			opts.candleLimit,
			requiredHistory(opts.periods) + 1,
			opts.volumeWindow + 2,
			opts.momentumWindow + 2,
		);

		const timeframes = [opts.shortTimeframe, ...opts.trendTimeframes];
		const candleSets = await Promise.all(
			timeframes.map((tf) => this.marketData.getCandles(symbol, tf, limit)),
		);

		const computed = timeframes.map((tf, i) =>
			computeSnapshot(tf, candleSets[i], opts.periods),
		);
		const [shortSnapshot, ...trendSnapshots] = computed;
		const snapshots: Partial<Record<Timeframe, IndicatorSnapshot>> = {};
		for (const snapshot of computed) {
			snapshots[snapshot.timeframe] = snapshot;
		}

		const trendScore = combineTrendVotes(trendSnapshots.map(trendVote));
		const strength = shortTermStrength(candleSets[0], settings, opts);
		const aggregateScore = trendScore * strength.multiplier;
		let direction = directionFromScore(aggregateScore, opts.signalCutoff);
		const confidenceScore =
			direction === "HOLD"
				? 0
				: Math.min(1, Math.abs(aggregateScore) / opts.maxMultiplier);

		const reasons: string[] = [`TREND_${trendScore}`];
		if (strength.volumeSpike) reasons.push("VOLUME_SPIKE");
		if (strength.momentum) reasons.push("PRICE_MOMENTUM");

		let suppressed = false;
		if (direction !== "HOLD") {
			const last = this.tracker.lastSignalEmittedAt(symbol);
			const minIntervalMs = settings.minSignalIntervalMinutes * 60_000;
			if (last !== null && now - last < minIntervalMs) {
				suppressed = true;
				reasons.push("RATE_LIMITED");
				logger.info(
					{ symbol, direction, lastEmittedAt: last, minIntervalMs },
					"Signal suppressed by minimum interval",
				);
				direction = "HOLD";
			} else {
				this.tracker.markSignalEmitted(symbol, now);
			}
		}

		const signal: Signal = Object.freeze({
			id: crypto.randomUUID(),
			symbol,
			direction,
			confidenceScore: suppressed ? 0 : confidenceScore,
			generatedAt: now,
			contributingTimeframes: Object.freeze([...timeframes]),
			indicatorSnapshotRef: Object.freeze(snapshots),
			trendScore,
			multiplier: strength.multiplier,
			aggregateScore,
			price: shortSnapshot.close,
			atr: shortSnapshot.atr,
			suppressed,
			reasons: Object.freeze(reasons),
		});

		logger.info(
			{
				symbol,
				direction: signal.direction,
				confidence: signal.confidenceScore,
				trendScore,
				volumeRatio: strength.volumeRatio,
				priceChange: strength.priceChange,
				multiplier: strength.multiplier,
			},
			"Signal evaluated",
		);
		return signal;
	}
}
