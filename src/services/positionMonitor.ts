import { from, lastValueFrom } from "rxjs";
import { mergeMap, toArray } from "rxjs/operators";
import { config } from "../config";
import { calculateAtr } from "../indicators";
import type {
	CloseReason,
	ExchangeClient,
	ExchangePosition,
	MarketDataProvider,
	Position,
	Timeframe,
} from "../types";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { RecurringTask } from "../utils/recurringTask";
import type { OrderExecutor } from "./orderExecutor";

export type MonitorOptions = {
	intervalMs: number;
	concurrency: number;
	maxHoldMs: number;
	trailingActivationRatio: number;
	volatilityExitRatio: number;
	volatilityTimeframe: Timeframe;
	atrPeriod: number;
	now: () => number;
};

export type ExitRules = {
	maxHoldMs: number;
	volatilityExitRatio: number;
	currentAtr?: number | null;
};

export type PositionCheckResult = {
	symbol: string;
	action: "HELD" | "CLOSED" | "RECONCILED" | "FAILED";
	reason?: CloseReason;
	error?: string;
};

/** Checked in order: stop, target, volatility, holding time. */
export function exitReason(
	position: Pick<
		Position,
		"side" | "stopLossPrice" | "takeProfitPrice" | "openedAt" | "entryAtr" | "trailingActive"
	>,
	price: number,
	now: number,
	rules: ExitRules,
): CloseReason | null {
	const isLong = position.side === "BUY";
	if (isLong ? price <= position.stopLossPrice : price >= position.stopLossPrice) {
		return position.trailingActive ? "TRAILING_STOP_TRIGGERED" : "STOP_TRIGGERED";
	}
	if (isLong ? price >= position.takeProfitPrice : price <= position.takeProfitPrice) {
		return "TP_TRIGGERED";
	}
	const { currentAtr, volatilityExitRatio } = rules;
	if (
		volatilityExitRatio > 0 &&
		position.entryAtr > 0 &&
		typeof currentAtr === "number" &&
		currentAtr >= position.entryAtr * volatilityExitRatio
	) {
		return "HIGH_VOLATILITY";
	}
	if (rules.maxHoldMs > 0 && now - position.openedAt >= rules.maxHoldMs) {
		return "TIME_LIMIT_EXCEEDED";
	}
	return null;
}

export class PositionMonitor {
	private readonly options: MonitorOptions;
	private readonly task: RecurringTask;

	constructor(
		private readonly executor: OrderExecutor,
		private readonly exchange: ExchangeClient,
		private readonly marketData: MarketDataProvider,
		options: Partial<MonitorOptions> = {},
	) {
		this.options = {
			intervalMs: Math.max(config.monitor.positionCheckIntervalSec, 1) * 1000,
			concurrency: config.monitor.concurrency,
			maxHoldMs: config.strategy.maxPositionHoldHours * 60 * 60 * 1000,
			trailingActivationRatio: config.strategy.trailingActivationRatio,
			volatilityExitRatio: config.strategy.volatilityExitRatio,
			volatilityTimeframe: config.strategy.shortTimeframe,
			atrPeriod: config.indicators.atr,
			now: Date.now,
			...options,
		};
		this.task = new RecurringTask("position-monitor", this.options.intervalMs, () =>
			this.monitorPositions().then(() => undefined),
		);
	}

	get running(): boolean {
		return this.task.running;
	}

	start(): void {
		this.task.start();
	}

	stop(): void {
		this.task.stop();
	}

	async monitorPositions(): Promise<PositionCheckResult[]> {
		const positions = this.executor.listPositions();
		const pending = this.executor
			.symbolsNeedingReconcile()
			.filter((symbol) => !positions.some((p) => p.symbol === symbol));
		if (!positions.length && !pending.length) return [];

		const remote = await this.exchange.getOpenPositions();

		const symbols = [...positions.map((p) => p.symbol), ...pending];
		const results = await lastValueFrom(
			from(symbols).pipe(
				mergeMap((symbol) => this.checkSymbol(symbol, remote), this.options.concurrency),
				toArray(),
			),
		);

		const closed = results.filter((r) => r.action === "CLOSED").length;
		const failed = results.filter((r) => r.action === "FAILED").length;
		logger.debug({ checked: results.length, closed, failed }, "Position monitor iteration");
		return results;
	}

	private async checkSymbol(
		symbol: string,
		remote: ExchangePosition[],
	): Promise<PositionCheckResult> {
		try {
			// the snapshot only decides whether to reconcile; reconcile refetches under the lock
			const onExchange = remote.some((p) => p.symbol === symbol && p.size > 0);
			if (!onExchange || this.executor.needsReconcile(symbol)) {
				await this.executor.reconcile(symbol);
				return { symbol, action: "RECONCILED" };
			}

			const price = await this.marketData.getLatestPrice(symbol);
			const position = await this.executor.refreshPnl(symbol, price);
			if (!position) return { symbol, action: "HELD" };

			const { maxHoldMs, volatilityExitRatio } = this.options;
			const currentAtr = await this.currentAtr(symbol, position);
			const reason = exitReason(position, price, this.options.now(), {
				maxHoldMs,
				volatilityExitRatio,
				currentAtr,
			});
			logger.debug(
				{
					symbol,
					side: position.side,
					price,
					stopLoss: position.stopLossPrice,
					takeProfit: position.takeProfitPrice,
					unrealizedPnl: position.unrealizedPnl,
					currentAtr,
					reason,
				},
				"Monitoring position",
			);
			if (!reason) {
				await this.executor.trailStop(symbol, price, this.options.trailingActivationRatio);
				return { symbol, action: "HELD" };
			}

			logger.info({ symbol, price, reason }, "Exit condition met; closing position");
			const trade = await this.executor.close(symbol, reason);
			return trade ? { symbol, action: "CLOSED", reason } : { symbol, action: "HELD" };
		} catch (err) {
			logger.error({ symbol, err }, "Position check failed");
			return {
				symbol,
				action: "FAILED",
				error: errorMessage(err),
			};
		}
	}

	private async currentAtr(symbol: string, position: Position): Promise<number | null> {
		const { volatilityExitRatio, volatilityTimeframe, atrPeriod } = this.options;
		if (volatilityExitRatio <= 0 || position.entryAtr <= 0) return null;
		try {
			const candles = await this.marketData.getCandles(symbol, volatilityTimeframe, atrPeriod * 3);
			return calculateAtr(
				candles.filter((c) => c.isClosed),
				atrPeriod,
			);
		} catch (err) {
			logger.warn({ symbol, err }, "Volatility check skipped");
			return null;
		}
	}
}
