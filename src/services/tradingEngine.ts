import { from, lastValueFrom } from "rxjs";
import { mergeMap, toArray } from "rxjs/operators";
import { config } from "../config";
import type {
	CloseReason,
	ClosedTrade,
	ExchangeClient,
	MarketDataProvider,
	Notifier,
	OrderPlan,
	Position,
	Signal,
	TradingSettings,
} from "../types";
import { ExecutionFailedError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import {
	AutoTradingController,
	type AutoTradingOptions,
	type AutoTradingStatus,
	type GateReason,
} from "./autoTrading";
import {
	type CloseAllResult,
	OrderExecutor,
	type OrderExecutorOptions,
} from "./orderExecutor";
import { type MonitorOptions, PositionMonitor } from "./positionMonitor";
import type { PositionRepository } from "./positionStore";
import { RiskManager } from "./riskManager";
import type { SettingsStore } from "./settingsStore";
import { SignalGenerator, type SignalGeneratorOptions } from "./signalGenerator";
import type { SignalHistory } from "./signalHistory";
import type { TradeLogger } from "./tradeLogger";

export type ProcessResult =
	| { status: "EXECUTED"; plan: OrderPlan; position: Position }
	| { status: "SKIPPED"; reason: GateReason | "POSITION_EXISTS" };

export type CycleResult = {
	symbol: string;
	signal?: Signal;
	result?: ProcessResult;
	error?: string;
};

export type PositionSummary = {
	count: number;
	totalUnrealizedPnl: number;
	positions: Position[];
};

export type EngineStatus = {
	autoTrading: AutoTradingStatus;
	openPositions: number;
	pendingReconcile: string[];
	monitorRunning: boolean;
	settings: TradingSettings;
};

export type TradingEngineDeps = {
	marketData: MarketDataProvider;
	exchange: ExchangeClient;
	settings: SettingsStore;
	notifier?: Notifier;
	signalHistory?: SignalHistory;
	tradeLogger?: TradeLogger;
	positionStore?: PositionRepository;
	autoTrading?: Omit<AutoTradingOptions, "notifier">;
	execution?: Partial<Omit<OrderExecutorOptions, "tradeLogger" | "notifier" | "store">>;
	monitor?: Partial<MonitorOptions>;
	signals?: Partial<SignalGeneratorOptions>;
	concurrency?: number;
	now?: () => number;
};

export class TradingEngine {
	readonly controller: AutoTradingController;
	readonly executor: OrderExecutor;
	readonly monitor: PositionMonitor;
	private readonly generator: SignalGenerator;
	private readonly risk: RiskManager;
	private readonly now: () => number;

	constructor(private readonly deps: TradingEngineDeps) {
		this.now = deps.now ?? Date.now;
		this.controller = new AutoTradingController(deps.settings, {
			...deps.autoTrading,
			notifier: deps.notifier,
		});
		this.executor = new OrderExecutor(deps.exchange, {
			now: this.now,
			...deps.execution,
			tradeLogger: deps.tradeLogger,
			notifier: deps.notifier,
			store: deps.positionStore,
		});
		this.generator = new SignalGenerator(
			deps.marketData,
			deps.settings,
			this.controller,
			deps.signals,
		);
		this.risk = new RiskManager(deps.exchange, deps.settings);
		this.monitor = new PositionMonitor(this.executor, deps.exchange, deps.marketData, {
			now: this.now,
			...deps.monitor,
		});

		this.executor.closed$.subscribe((trade) => this.onTradeClosed(trade));
	}

	async generateSignal(symbol: string): Promise<Signal> {
		const signal = await this.generator.generate(symbol, this.now());
		await this.deps.signalHistory?.append(signal);
		return signal;
	}

	/** Manual processing skips the auto-trading gate; risk checks still apply. */
	async processSignal(signal: Signal, options: { manual?: boolean } = {}): Promise<ProcessResult> {
		const { symbol } = signal;
		if (!options.manual) {
			const gate = this.controller.evaluateGate(signal, this.now());
			if (!gate.allowed) {
				logger.info({ symbol, direction: signal.direction, reason: gate.reason }, "Signal not executed");
				return { status: "SKIPPED", reason: gate.reason };
			}
			if (this.executor.getPhase(symbol) !== "IDLE") {
				logger.info({ symbol, phase: this.executor.getPhase(symbol) }, "Position already active");
				return { status: "SKIPPED", reason: "POSITION_EXISTS" };
			}
		}

		const price = await this.deps.marketData.getLatestPrice(symbol);
		const plan = await this.risk.planOrder(signal, price);
		const position = await this.executor.open(plan);
		return { status: "EXECUTED", plan, position };
	}

	toggleAutoTrading(enabled: boolean): boolean {
		return this.controller.setEnabled(enabled, this.now());
	}

	/**
	 * `"all"` closes every open symbol (reason defaults to CLOSE_ALL); a single
	 * symbol with nothing open throws.
	 */
	async closePosition(target: string, reason?: CloseReason): Promise<CloseAllResult[]> {
		if (target === "all") {
			return this.executor.closeAll(reason ?? "CLOSE_ALL");
		}
		const trade = await this.executor.close(target, reason ?? "MANUAL");
		if (!trade) {
			throw new ExecutionFailedError(target, "NO_OPEN_POSITION", `No open position for ${target}`);
		}
		return [{ symbol: target, trade }];
	}

	async runAutoCycle(symbols: string[] = config.strategy.symbols): Promise<CycleResult[]> {
		const results = await lastValueFrom(
			from(symbols).pipe(
				mergeMap((symbol) => this.runSymbol(symbol), this.deps.concurrency ?? config.monitor.concurrency),
				toArray(),
			),
		);
		const executed = results.filter((r) => r.result?.status === "EXECUTED").length;
		const failed = results.filter((r) => r.error !== undefined).length;
		logger.info({ symbols: symbols.length, executed, failed }, "Auto-trading cycle finished");
		return results;
	}

	resetCircuitBreaker(): void {
		this.controller.resetCircuitBreaker(this.now());
	}

	getStatus(): EngineStatus {
		return {
			autoTrading: this.controller.getStatus(),
			openPositions: this.executor.listPositions().length,
			pendingReconcile: this.executor.symbolsNeedingReconcile(),
			monitorRunning: this.monitor.running,
			settings: this.deps.settings.getSettings(),
		};
	}

	getPositionSummary(): PositionSummary {
		const positions = this.executor.listPositions();
		return {
			count: positions.length,
			totalUnrealizedPnl: positions.reduce((sum, p) => sum + p.unrealizedPnl, 0),
			positions,
		};
	}

	start(): void {
		this.monitor.start();
	}

	stop(): void {
		this.monitor.stop();
	}

	private async runSymbol(symbol: string): Promise<CycleResult> {
		try {
			const signal = await this.generateSignal(symbol);
			const result = await this.processSignal(signal);
			return { symbol, signal, result };
		} catch (err) {
			logger.error({ symbol, err }, "Auto-trading cycle failed for symbol");
			return { symbol, error: errorMessage(err) };
		}
	}

	private onTradeClosed(trade: ClosedTrade): void {
		this.controller.recordOutcome(trade);
	}
}
