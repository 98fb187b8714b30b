import { Subject } from "rxjs";
import { config, type LossCounterScope, type ReenablePolicy } from "../config";
import type { ActiveHoursInterval, ClosedTrade, Notifier, Signal } from "../types";
import { CircuitBreakerTrippedError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { SettingsStore } from "./settingsStore";

export type GateReason =
	| "ALLOWED"
	| "HOLD_SIGNAL"
	| "CIRCUIT_BREAKER"
	| "DISABLED"
	| "OUTSIDE_ACTIVE_HOURS";

export type GateDecision = {
	allowed: boolean;
	reason: GateReason;
};

export type ConsecutiveLossCounter = {
	key: string;
	count: number;
	lastOutcomeAt: number | null;
};

export type AutoTradingEventType =
	| "ENABLED"
	| "DISABLED"
	| "BREAKER_TRIPPED"
	| "BREAKER_CLEARED"
	| "BREAKER_RESET";

export type AutoTradingEvent = {
	type: AutoTradingEventType;
	at: number;
	symbol?: string;
	lossCount?: number;
};

export type AutoTradingStatus = {
	enabled: boolean;
	circuitBreakerTripped: boolean;
	trippedAt: number | null;
	wins: number;
	losses: number;
	counters: ConsecutiveLossCounter[];
	lastSignalEmittedAt: Record<string, number>;
	reenablePolicy: ReenablePolicy;
};

const GLOBAL_COUNTER = "*";

export function isWithinActiveHours(
	hour: number,
	intervals: readonly ActiveHoursInterval[],
): boolean {
	return intervals.some(({ start, end }) =>
		start < end ? hour >= start && hour < end : hour >= start || hour < end,
	);
}

export type AutoTradingOptions = {
	enabled?: boolean;
	reenablePolicy?: ReenablePolicy;
	lossCounterScope?: LossCounterScope;
	notifier?: Notifier;
};

/**
 * Gate in front of automatic execution plus the consecutive-loss circuit
 * breaker. All mutations are synchronous, so each one completes inside the
 * caller's exclusive section.
 */
export class AutoTradingController {
	private enabled: boolean;
	private circuitBreakerTripped = false;
	private trippedAt: number | null = null;
	private wins = 0;
	private losses = 0;
	private readonly counters = new Map<string, ConsecutiveLossCounter>();
	private readonly lastEmitted = new Map<string, number>();
	private readonly eventLog: AutoTradingEvent[] = [];
	private readonly reenablePolicy: ReenablePolicy;
	private readonly lossCounterScope: LossCounterScope;
	private readonly notifier?: Notifier;

	readonly events$ = new Subject<AutoTradingEvent>();

	constructor(
		private readonly settings: SettingsStore,
		options: AutoTradingOptions = {},
	) {
		this.enabled = options.enabled ?? config.autoTrading.enabledOnStart;
		this.reenablePolicy = options.reenablePolicy ?? config.autoTrading.reenablePolicy;
		this.lossCounterScope = options.lossCounterScope ?? config.autoTrading.lossCounterScope;
		this.notifier = options.notifier;
	}

	isEnabled(): boolean {
		return this.enabled;
	}

	isTripped(): boolean {
		return this.circuitBreakerTripped;
	}

	/** Trips the breaker first when a lowered loss limit is already reached. */
	evaluateGate(signal: Signal, now: number = Date.now()): GateDecision {
		if (signal.direction === "HOLD") {
			return { allowed: false, reason: "HOLD_SIGNAL" };
		}
		if (!this.circuitBreakerTripped) {
			this.enforceLossLimit(now, signal.symbol);
		}
		if (this.circuitBreakerTripped) {
			return { allowed: false, reason: "CIRCUIT_BREAKER" };
		}
		const { activeHours } = this.settings.getSettings();
		if (!isWithinActiveHours(new Date(now).getUTCHours(), activeHours)) {
			return { allowed: false, reason: "OUTSIDE_ACTIVE_HOURS" };
		}
		if (!this.enabled) {
			return { allowed: false, reason: "DISABLED" };
		}
		return { allowed: true, reason: "ALLOWED" };
	}

	setEnabled(enabled: boolean, now: number = Date.now()): boolean {
		if (enabled && this.circuitBreakerTripped) {
			throw new CircuitBreakerTrippedError(
				"Circuit breaker is tripped; reset it before enabling auto-trading",
			);
		}
		if (this.enabled === enabled) return this.enabled;
		this.enabled = enabled;
		this.record({ type: enabled ? "ENABLED" : "DISABLED", at: now });
		logger.info({ enabled }, "Auto-trading toggled");
		return this.enabled;
	}

	lastSignalEmittedAt(symbol: string): number | null {
		return this.lastEmitted.get(symbol) ?? null;
	}

	markSignalEmitted(symbol: string, at: number): void {
		this.lastEmitted.set(symbol, at);
	}

	lossCount(symbol: string): number {
		return this.counters.get(this.counterKey(symbol))?.count ?? 0;
	}

	recordOutcome(trade: ClosedTrade): void {
		const key = this.counterKey(trade.symbol);
		const counter = this.counters.get(key) ?? {
			key,
			count: 0,
			lastOutcomeAt: null,
		};
		counter.lastOutcomeAt = trade.closedAt;

		if (trade.outcome === "WIN") {
			this.wins += 1;
			counter.count = 0;
			this.counters.set(key, counter);
			if (this.circuitBreakerTripped && !this.anyCounterAtLimit()) {
				this.clearBreaker(trade.closedAt, trade.symbol);
			}
			return;
		}

		this.losses += 1;
		counter.count += 1;
		this.counters.set(key, counter);
		const { maxConsecutiveLosses } = this.settings.getSettings();
		logger.info(
			{ symbol: trade.symbol, lossCount: counter.count, maxConsecutiveLosses },
			"Losing trade recorded",
		);
		if (counter.count >= maxConsecutiveLosses && !this.circuitBreakerTripped) {
			this.trip(trade.closedAt, trade.symbol, counter.count);
		}
	}

	resetCircuitBreaker(now: number = Date.now()): void {
		for (const counter of this.counters.values()) {
			counter.count = 0;
		}
		this.circuitBreakerTripped = false;
		this.trippedAt = null;
		this.record({ type: "BREAKER_RESET", at: now });
		logger.info("Circuit breaker reset");
	}

	recentEvents(): AutoTradingEvent[] {
		return [...this.eventLog];
	}

	getStatus(): AutoTradingStatus {
		return {
			enabled: this.enabled,
			circuitBreakerTripped: this.circuitBreakerTripped,
			trippedAt: this.trippedAt,
			wins: this.wins,
			losses: this.losses,
			counters: [...this.counters.values()].map((c) => ({ ...c })),
			lastSignalEmittedAt: Object.fromEntries(this.lastEmitted),
			reenablePolicy: this.reenablePolicy,
		};
	}

	private counterKey(symbol: string): string {
		return this.lossCounterScope === "symbol" ? symbol : GLOBAL_COUNTER;
	}

	private anyCounterAtLimit(): boolean {
		return this.counterAtLimit() !== undefined;
	}

	private counterAtLimit(): ConsecutiveLossCounter | undefined {
		const { maxConsecutiveLosses } = this.settings.getSettings();
		return [...this.counters.values()].find((c) => c.count >= maxConsecutiveLosses);
	}

	private enforceLossLimit(at: number, symbol: string): void {
		const counter = this.counterAtLimit();
		if (!counter) return;
		this.trip(at, counter.key === GLOBAL_COUNTER ? symbol : counter.key, counter.count);
	}

	private trip(at: number, symbol: string, lossCount: number): void {
		this.circuitBreakerTripped = true;
		this.trippedAt = at;
		this.enabled = false;
		this.record({ type: "BREAKER_TRIPPED", at, symbol, lossCount });
		logger.warn({ symbol, lossCount }, "Circuit breaker tripped; auto-trading disabled");
		this.sendNotice(
			`Circuit breaker tripped after ${lossCount} consecutive losses (last: ${symbol}). Auto-trading disabled.`,
		);
	}

	private clearBreaker(at: number, symbol: string): void {
		this.circuitBreakerTripped = false;
		this.trippedAt = null;
		this.record({ type: "BREAKER_CLEARED", at, symbol });
		if (this.reenablePolicy === "on_win") {
			this.enabled = true;
			this.record({ type: "ENABLED", at, symbol });
		}
		logger.info(
			{ symbol, enabled: this.enabled, policy: this.reenablePolicy },
			"Circuit breaker cleared by winning trade",
		);
	}

	private record(event: AutoTradingEvent): void {
		this.eventLog.push(event);
		if (this.eventLog.length > config.autoTrading.eventLogSize) {
			this.eventLog.shift();
		}
		this.events$.next(event);
	}

	private sendNotice(text: string): void {
		if (!this.notifier) return;
		void this.notifier.notify(text).catch((err) => {
			logger.warn({ err }, "Failed to send auto-trading notification");
		});
	}
}
