import { Subject } from "rxjs";
import { config } from "../config";
import type {
	CloseReason,
	ClosedTrade,
	ExchangeClient,
	ExchangePosition,
	ExecutionPhase,
	Notifier,
	OrderPlan,
	Position,
	TradeSide,
} from "../types";
import {
	ExecutionFailedError,
	TransientExchangeError,
	errorMessage,
} from "../utils/errors";
import { KeyedMutex } from "../utils/keyedMutex";
import { logger } from "../utils/logger";
import { backoffDelay, sleep } from "../utils/retry";
import type { PositionRepository } from "./positionStore";
import type { TradeLogger } from "./tradeLogger";

type SymbolState = {
	phase: ExecutionPhase;
	position: Position | null;
	// set when an exchange outcome could not be confirmed either way
	needsReconcile: boolean;
	pendingPlan: OrderPlan | null;
};

export type PhaseTransition = {
	symbol: string;
	from: ExecutionPhase;
	to: ExecutionPhase;
	at: number;
};

export type CloseAllResult = {
	symbol: string;
	trade: ClosedTrade | null;
	error?: string;
};

export type OrderExecutorOptions = {
	maxAttempts: number;
	backoffMs: number;
	lockWaitMs: number;
	now: () => number;
	tradeLogger?: TradeLogger;
	notifier?: Notifier;
	store?: PositionRepository;
};

export function positionPnl(
	side: TradeSide,
	entry: number,
	mark: number,
	size: number,
): number {
	const diff = side === "BUY" ? mark - entry : entry - mark;
	return diff * Math.abs(size);
}

export type StopUpdate = Pick<Position, "trailingActive" | "peakPrice" | "stopLossPrice">;

/**
 * Trailing starts once price has moved `activationRatio` initial stop
 * distances in profit. From then on the stop sits one initial stop distance
 * behind the best price seen and never moves back.
 */
export function trailingStopUpdate(
	position: Pick<
		Position,
		"side" | "entryPrice" | "stopLossPrice" | "initialStopDistance" | "trailingActive" | "peakPrice"
	>,
	price: number,
	activationRatio: number,
): StopUpdate {
	const isLong = position.side === "BUY";
	const distance = position.initialStopDistance;
	const peakPrice = isLong
		? Math.max(position.peakPrice, price)
		: Math.min(position.peakPrice, price);

	let trailingActive = position.trailingActive;
	if (!trailingActive && activationRatio > 0 && distance > 0) {
		const activation = isLong
			? position.entryPrice + distance * activationRatio
			: position.entryPrice - distance * activationRatio;
		trailingActive = isLong ? price >= activation : price <= activation;
	}

	let stopLossPrice = position.stopLossPrice;
	if (trailingActive) {
		const candidate = isLong ? peakPrice - distance : peakPrice + distance;
		if (isLong ? candidate > stopLossPrice : candidate < stopLossPrice) {
			stopLossPrice = candidate;
		}
	}
	return { trailingActive, peakPrice, stopLossPrice };
}

function positionFromPlan(
	plan: OrderPlan,
	fill: { size: number; entryPrice: number; markPrice: number; unrealizedPnl: number },
	openedAt: number,
): Position {
	return {
		symbol: plan.symbol,
		side: plan.side,
		size: fill.size,
		entryPrice: fill.entryPrice,
		stopLossPrice: plan.stopLossPrice,
		takeProfitPrice: plan.takeProfitPrice,
		unrealizedPnl: fill.unrealizedPnl,
		markPrice: fill.markPrice,
		openedAt,
		initialStopDistance: plan.stopDistance,
		entryAtr: plan.atr,
		trailingActive: false,
		peakPrice: fill.entryPrice,
	};
}

/**
 * Owns the per-symbol lifecycle IDLE → PENDING_OPEN → OPEN → PENDING_CLOSE
 * → IDLE. Every transition for a symbol runs inside that symbol's exclusive
 * section and only advances on an exchange-confirmed result.
 */
export class OrderExecutor {
	private readonly states = new Map<string, SymbolState>();
	private readonly mutex: KeyedMutex;
	private readonly options: OrderExecutorOptions;

	readonly closed$ = new Subject<ClosedTrade>();
	readonly transitions$ = new Subject<PhaseTransition>();

	constructor(
		private readonly exchange: ExchangeClient,
		options: Partial<OrderExecutorOptions> = {},
	) {
		this.options = {
			maxAttempts: config.execution.maxAttempts,
			backoffMs: config.execution.backoffMs,
			lockWaitMs: config.execution.lockWaitMs,
			now: Date.now,
			...options,
		};
		this.mutex = new KeyedMutex(this.options.lockWaitMs);
	}

	getPhase(symbol: string): ExecutionPhase {
		return this.states.get(symbol)?.phase ?? "IDLE";
	}

	getPosition(symbol: string): Position | null {
		const position = this.states.get(symbol)?.position;
		return position ? { ...position } : null;
	}

	listPositions(): Position[] {
		return [...this.states.values()]
			.map((s) => s.position)
			.filter((p): p is Position => p !== null)
			.map((p) => ({ ...p }));
	}

	needsReconcile(symbol: string): boolean {
		return this.states.get(symbol)?.needsReconcile ?? false;
	}

	symbolsNeedingReconcile(): string[] {
		return [...this.states.entries()]
			.filter(([, state]) => state.needsReconcile)
			.map(([symbol]) => symbol);
	}

	async open(plan: OrderPlan): Promise<Position> {
		const { symbol } = plan;
		return this.mutex.runExclusive(symbol, async () => {
			const state = this.state(symbol);
			await this.ensureReconciled(symbol, state);
			if (state.phase !== "IDLE" || state.position) {
				throw new ExecutionFailedError(
					symbol,
					"POSITION_EXISTS",
					`${symbol} already has a position in phase ${state.phase}`,
				);
			}

			this.transition(symbol, state, "PENDING_OPEN");
			state.pendingPlan = plan;
			try {
				return await this.submitOpen(plan, state);
			} finally {
				state.pendingPlan = state.needsReconcile ? plan : null;
				if (state.phase === "PENDING_OPEN") {
					this.transition(symbol, state, "IDLE");
				}
			}
		});
	}

	/** Returns null when the symbol has nothing open. */
	async close(symbol: string, reason: CloseReason): Promise<ClosedTrade | null> {
		return this.mutex.runExclusive(symbol, async () => {
			const state = this.state(symbol);
			await this.ensureReconciled(symbol, state);
			const position = state.position;
			if (state.phase !== "OPEN" || !position) return null;

			this.transition(symbol, state, "PENDING_CLOSE");
			try {
				return await this.submitClose(symbol, position, reason, state);
			} finally {
				if (state.phase === "PENDING_CLOSE") {
					this.transition(symbol, state, "OPEN");
				}
			}
		});
	}

	async closeAll(reason: CloseReason = "CLOSE_ALL"): Promise<CloseAllResult[]> {
		const symbols = this.listPositions().map((p) => p.symbol);
		const settled = await Promise.allSettled(
			symbols.map((symbol) => this.close(symbol, reason)),
		);
		return settled.map((result, i) =>
			result.status === "fulfilled"
				? { symbol: symbols[i], trade: result.value }
				: { symbol: symbols[i], trade: null, error: errorMessage(result.reason) },
		);
	}

	/**
	 * Aligns local state for `symbol` with the exchange. Positions are always
	 * fetched inside the symbol's exclusive section.
	 */
	async reconcile(symbol: string): Promise<Position | null> {
		return this.mutex.runExclusive(symbol, async () => {
			const state = this.state(symbol);
			await this.reconcileLocked(symbol, state);
			return state.position ? { ...state.position } : null;
		});
	}

	/**
	 * Loads positions saved by an earlier run. Each restored symbol is flagged
	 * for reconciliation so the exchange confirms it before anything else.
	 */
	async restore(): Promise<Position[]> {
		const store = this.options.store;
		if (!store) return [];
		const stored = await store.load();
		const restored: Position[] = [];
		for (const position of stored) {
			await this.mutex.runExclusive(position.symbol, async () => {
				const state = this.state(position.symbol);
				if (state.phase !== "IDLE" || state.position) return;
				state.position = { ...position };
				state.needsReconcile = true;
				this.transition(position.symbol, state, "OPEN");
				restored.push({ ...position });
			});
		}
		logger.info({ count: restored.length }, "Open positions restored");
		return restored;
	}

	/** Applies the trailing-stop rule for `price`; null when nothing is open. */
	async trailStop(
		symbol: string,
		price: number,
		activationRatio: number,
	): Promise<Position | null> {
		return this.mutex.runExclusive(symbol, async () => {
			const state = this.states.get(symbol);
			const position = state?.position;
			if (!state || state.phase !== "OPEN" || !position) return null;

			const update = trailingStopUpdate(position, price, activationRatio);
			const activated = update.trailingActive && !position.trailingActive;
			const previousStop = position.stopLossPrice;
			const changed =
				activated ||
				update.stopLossPrice !== previousStop ||
				update.peakPrice !== position.peakPrice;
			position.trailingActive = update.trailingActive;
			position.peakPrice = update.peakPrice;
			position.stopLossPrice = update.stopLossPrice;

			if (activated) {
				logger.info({ symbol, price }, "Trailing stop activated");
			}
			if (update.stopLossPrice !== previousStop) {
				logger.info({ symbol, from: previousStop, to: update.stopLossPrice }, "Stop loss moved");
			}
			if (changed) await this.persist();
			return { ...position };
		});
	}

	async refreshPnl(symbol: string, price: number): Promise<Position | null> {
		return this.mutex.runExclusive(symbol, async () => {
			const state = this.states.get(symbol);
			const position = state?.position;
			if (!state || state.phase !== "OPEN" || !position) return null;
			position.markPrice = price;
			position.unrealizedPnl = positionPnl(
				position.side,
				position.entryPrice,
				price,
				position.size,
			);
			return { ...position };
		});
	}

	private state(symbol: string): SymbolState {
		let state = this.states.get(symbol);
		if (!state) {
			state = { phase: "IDLE", position: null, needsReconcile: false, pendingPlan: null };
			this.states.set(symbol, state);
		}
		return state;
	}

	private transition(symbol: string, state: SymbolState, to: ExecutionPhase): void {
		const from = state.phase;
		if (from === to) return;
		state.phase = to;
		this.transitions$.next({ symbol, from, to, at: this.options.now() });
		logger.debug({ symbol, from, to }, "Execution phase changed");
	}

	private async ensureReconciled(symbol: string, state: SymbolState): Promise<void> {
		if (!state.needsReconcile) return;
		try {
			await this.reconcileLocked(symbol, state);
		} catch (err) {
			throw new ExecutionFailedError(
				symbol,
				"RECONCILE_FAILED",
				`Cannot confirm exchange state for ${symbol}: ${errorMessage(err)}`,
			);
		}
	}

	private async persist(): Promise<void> {
		const store = this.options.store;
		if (!store) return;
		try {
			await store.save(this.listPositions());
		} catch (err) {
			logger.error({ err }, "Failed to save open positions");
		}
	}

	private async reconcileLocked(symbol: string, state: SymbolState): Promise<void> {
		const positions = await this.exchange.getOpenPositions();
		const live = positions.find((p) => p.symbol === symbol && p.size > 0);
		const local = state.position;

		if (local && !live) {
			logger.warn({ symbol }, "Position no longer on exchange; recording external close");
			await this.finalizeClose(
				symbol,
				state,
				local,
				local.markPrice,
				positionPnl(local.side, local.entryPrice, local.markPrice, local.size),
				"EXTERNAL_CLOSE",
			);
		} else if (!local && live) {
			const plan = state.pendingPlan;
			if (plan && plan.side === live.side) {
				this.adopt(symbol, state, plan, live);
			} else {
				logger.warn(
					{ symbol, side: live.side, size: live.size },
					"Untracked exchange position left unmanaged",
				);
			}
		} else if (local && live) {
			local.size = live.size;
			local.entryPrice = live.entryPrice || local.entryPrice;
			local.markPrice = live.markPrice || local.markPrice;
			local.unrealizedPnl = positionPnl(
				local.side,
				local.entryPrice,
				local.markPrice,
				local.size,
			);
		}

		state.needsReconcile = false;
		state.pendingPlan = null;
		this.transition(symbol, state, state.position ? "OPEN" : "IDLE");
		await this.persist();
	}

	private adopt(
		symbol: string,
		state: SymbolState,
		plan: OrderPlan,
		live: ExchangePosition,
	): Position {
		const position = positionFromPlan(
			plan,
			{
				size: live.size,
				entryPrice: live.entryPrice,
				markPrice: live.markPrice || live.entryPrice,
				unrealizedPnl: live.unrealizedPnl,
			},
			this.options.now(),
		);
		state.position = position;
		this.transition(symbol, state, "OPEN");
		logger.info(
			{ symbol, side: position.side, size: position.size, entry: position.entryPrice },
			"Position confirmed from exchange state",
		);
		return { ...position };
	}

	/**
	 * Looks for the order's position on the exchange after an ambiguous
	 * failure. Throws RECONCILE_FAILED when the exchange cannot be read; the
	 * order is not resent until a later reconciliation succeeds.
	 */
	private async findFill(plan: OrderPlan, state: SymbolState): Promise<Position | null> {
		let positions: ExchangePosition[];
		try {
			positions = await this.exchange.getOpenPositions();
		} catch (err) {
			state.needsReconcile = true;
			logger.warn({ symbol: plan.symbol, err }, "Reconciliation after failed open did not complete");
			throw new ExecutionFailedError(
				plan.symbol,
				"RECONCILE_FAILED",
				`Open order for ${plan.symbol} has an unknown outcome: ${errorMessage(err)}`,
			);
		}
		state.needsReconcile = false;
		const live = positions.find((p) => p.symbol === plan.symbol && p.size > 0);
		if (!live || live.side !== plan.side) return null;
		const adopted = this.adopt(plan.symbol, state, plan, live);
		await this.persist();
		return adopted;
	}

	private async submitOpen(plan: OrderPlan, state: SymbolState): Promise<Position> {
		const { symbol } = plan;
		const { maxAttempts, backoffMs } = this.options;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				const result = await this.exchange.placeOrder(plan);
				if (result.status === "REJECTED") {
					logger.warn({ symbol, reason: result.reason }, "Open order rejected");
					throw new ExecutionFailedError(
						symbol,
						"REJECTED",
						`Open order for ${symbol} rejected: ${result.reason}`,
					);
				}

				const position = positionFromPlan(
					plan,
					{
						size: result.filledSize,
						entryPrice: result.entryPrice,
						markPrice: result.entryPrice,
						unrealizedPnl: 0,
					},
					this.options.now(),
				);
				state.position = position;
				this.transition(symbol, state, "OPEN");
				await this.persist();
				logger.info(
					{ symbol, side: plan.side, size: position.size, entry: position.entryPrice, orderId: result.orderId },
					"Position opened",
				);
				this.sendNotice(
					[
						`New trade ${symbol} (${plan.side})`,
						`Entry: ${position.entryPrice}`,
						`Qty: ${position.size}`,
						`SL: ${position.stopLossPrice}`,
						`TP: ${position.takeProfitPrice}`,
					].join("\n"),
				);
				return { ...position };
			} catch (err) {
				if (err instanceof ExecutionFailedError) throw err;
				if (!(err instanceof TransientExchangeError)) {
					state.needsReconcile = true;
					throw new ExecutionFailedError(
						symbol,
						"UNEXPECTED",
						`Open order for ${symbol} failed: ${errorMessage(err)}`,
					);
				}

				logger.warn(
					{ symbol, attempt, maxAttempts, err: err.message, indeterminate: err.indeterminate },
					"Transient error placing order",
				);
				if (err.indeterminate) {
					const adopted = await this.findFill(plan, state);
					if (adopted) return adopted;
				}
				if (attempt < maxAttempts) {
					await sleep(backoffDelay(attempt, backoffMs));
				}
			}
		}

		throw new ExecutionFailedError(
			symbol,
			"RETRIES_EXHAUSTED",
			`Open order for ${symbol} failed after ${maxAttempts} attempts`,
		);
	}

	private async submitClose(
		symbol: string,
		position: Position,
		reason: CloseReason,
		state: SymbolState,
	): Promise<ClosedTrade> {
		const { maxAttempts, backoffMs } = this.options;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				const result = await this.exchange.closePosition(symbol, reason);
				if (result.status === "REJECTED") {
					logger.warn({ symbol, reason: result.reason }, "Close order rejected");
					throw new ExecutionFailedError(
						symbol,
						"REJECTED",
						`Close order for ${symbol} rejected: ${result.reason}`,
					);
				}
				return await this.finalizeClose(
					symbol,
					state,
					position,
					result.exitPrice,
					result.realizedPnl,
					reason,
				);
			} catch (err) {
				if (err instanceof ExecutionFailedError) throw err;
				if (!(err instanceof TransientExchangeError)) {
					state.needsReconcile = true;
					throw new ExecutionFailedError(
						symbol,
						"UNEXPECTED",
						`Close order for ${symbol} failed: ${errorMessage(err)}`,
					);
				}

				logger.warn(
					{ symbol, attempt, maxAttempts, err: err.message, indeterminate: err.indeterminate },
					"Transient error closing position",
				);
				if (err.indeterminate && !(await this.stillOpen(symbol, state))) {
					return await this.finalizeClose(
						symbol,
						state,
						position,
						position.markPrice,
						position.unrealizedPnl,
						reason,
					);
				}
				if (attempt < maxAttempts) {
					await sleep(backoffDelay(attempt, backoffMs));
				}
			}
		}

		throw new ExecutionFailedError(
			symbol,
			"RETRIES_EXHAUSTED",
			`Close order for ${symbol} failed after ${maxAttempts} attempts`,
		);
	}

	private async stillOpen(symbol: string, state: SymbolState): Promise<boolean> {
		let positions: ExchangePosition[];
		try {
			positions = await this.exchange.getOpenPositions();
		} catch (err) {
			state.needsReconcile = true;
			logger.warn({ symbol, err }, "Reconciliation after failed close did not complete");
			throw new ExecutionFailedError(
				symbol,
				"RECONCILE_FAILED",
				`Close order for ${symbol} has an unknown outcome: ${errorMessage(err)}`,
			);
		}
		state.needsReconcile = false;
		return positions.some((p) => p.symbol === symbol && p.size > 0);
	}

	private async finalizeClose(
		symbol: string,
		state: SymbolState,
		position: Position,
		exitPrice: number,
		realizedPnl: number,
		reason: CloseReason,
	): Promise<ClosedTrade> {
		const trade: ClosedTrade = {
			symbol,
			side: position.side,
			size: position.size,
			entryPrice: position.entryPrice,
			exitPrice,
			realizedPnl,
			outcome: realizedPnl >= 0 ? "WIN" : "LOSS",
			reason,
			openedAt: position.openedAt,
			closedAt: this.options.now(),
		};

		state.position = null;
		this.transition(symbol, state, "IDLE");
		await this.persist();
		this.closed$.next(trade);

		logger.info(
			{ symbol, reason, outcome: trade.outcome, pnl: realizedPnl, exitPrice },
			"Position closed",
		);
		if (this.options.tradeLogger) {
			try {
				await this.options.tradeLogger(trade);
			} catch (err) {
				logger.error({ symbol, err }, "Failed to write trade log");
			}
		}
		this.sendNotice(
			[
				`Trade closed ${symbol}`,
				`Reason: ${reason}`,
				`Price: ${exitPrice}`,
				`Qty: ${trade.size}`,
				`PnL: ${realizedPnl}`,
			].join("\n"),
		);
		return trade;
	}

	private sendNotice(text: string): void {
		const notifier = this.options.notifier;
		if (!notifier) return;
		void notifier.notify(text).catch((err) => {
			logger.warn({ err }, "Failed to send execution notification");
		});
	}
}
