import { positionPnl } from "../services/orderExecutor";
import type {
	Candle,
	ClosePositionResult,
	ClosedTrade,
	CloseReason,
	ExchangeClient,
	ExchangeInfo,
	ExchangePosition,
	MarketDataProvider,
	Notifier,
	OrderPlan,
	PlaceOrderResult,
	Timeframe,
	TradingSettings,
} from "../types";

export const testSettings: TradingSettings = {
	leverage: 10,
	riskPerTrade: 0.02,
	accountBalance: 10_000,
	atrMultiplier: 1,
	tpRatio: 1.5,
	volumeSpikeThreshold: 2,
	priceMomentumThreshold: 0.003,
	minSignalIntervalMinutes: 5,
	maxConsecutiveLosses: 3,
	activeHours: [{ start: 0, end: 24 }],
};

export const HOUR_MS = 60 * 60 * 1000;

type CandleInput = { close: number; volume?: number; high?: number; low?: number };

/** Closed candles one `stepMs` apart; high/low default to close ± 1. */
export function makeCandles(
	inputs: Array<number | CandleInput>,
	options: { symbol?: string; timeframe?: Timeframe; stepMs?: number; start?: number } = {},
): Candle[] {
	const stepMs = options.stepMs ?? 60_000;
	const start = options.start ?? 0;
	return inputs.map((input, i) => {
		const c = typeof input === "number" ? { close: input } : input;
		const open = i === 0 ? c.close : closeOf(inputs[i - 1]);
		return {
			symbol: options.symbol ?? "BTCUSDT",
			timeframe: options.timeframe ?? "5m",
			startTime: start + i * stepMs,
			endTime: start + (i + 1) * stepMs - 1,
			open,
			high: c.high ?? Math.max(open, c.close) + 1,
			low: c.low ?? Math.min(open, c.close) - 1,
			close: c.close,
			volume: c.volume ?? 100,
			isClosed: true,
		};
	});
}

function closeOf(input: number | CandleInput): number {
	return typeof input === "number" ? input : input.close;
}

export function linearCloses(count: number, from: number, step: number): number[] {
	return Array.from({ length: count }, (_, i) => from + i * step);
}

export class FakeMarketData implements MarketDataProvider {
	readonly candles = new Map<string, Candle[]>();
	readonly prices = new Map<string, number>();
	candleRequests: Array<{ symbol: string; timeframe: Timeframe; limit: number }> = [];

	setCandles(symbol: string, timeframe: Timeframe, candles: Candle[]): void {
		this.candles.set(`${symbol}:${timeframe}`, candles);
	}

	async getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
		this.candleRequests.push({ symbol, timeframe, limit });
		const candles = this.candles.get(`${symbol}:${timeframe}`);
		if (!candles) throw new Error(`no candles for ${symbol} ${timeframe}`);
		return candles.slice(-limit);
	}

	async getLatestPrice(symbol: string): Promise<number> {
		const price = this.prices.get(symbol);
		if (price === undefined) throw new Error(`no price for ${symbol}`);
		return price;
	}
}

/**
 * In-memory exchange. By default orders fill at the plan's entry price and
 * closes fill at the symbol's price from `prices` (or the entry price).
 * Each handler can be swapped per test.
 */
export class FakeExchange implements ExchangeClient {
	readonly positions = new Map<string, ExchangePosition>();
	readonly prices = new Map<string, number>();
	info: Omit<ExchangeInfo, "symbol"> = { minQuantity: 0.001, quantityStep: 0.001, priceStep: 0.01 };
	placeCalls: OrderPlan[] = [];
	closeCalls: Array<{ symbol: string; reason: CloseReason }> = [];
	positionQueries = 0;
	private orderSeq = 0;

	placeHandler: (plan: OrderPlan) => Promise<PlaceOrderResult> = async (plan) => this.fill(plan);
	closeHandler: (symbol: string) => Promise<ClosePositionResult> = async (symbol) =>
		this.flatten(symbol);
	positionsHandler: () => Promise<ExchangePosition[]> = async () => [...this.positions.values()];

	async getOpenPositions(): Promise<ExchangePosition[]> {
		this.positionQueries += 1;
		return this.positionsHandler();
	}

	async placeOrder(plan: OrderPlan): Promise<PlaceOrderResult> {
		this.placeCalls.push(plan);
		return this.placeHandler(plan);
	}

	async closePosition(symbol: string, reason: CloseReason): Promise<ClosePositionResult> {
		this.closeCalls.push({ symbol, reason });
		return this.closeHandler(symbol);
	}

	async getExchangeInfo(symbol: string): Promise<ExchangeInfo> {
		return { symbol, ...this.info };
	}

	fill(plan: OrderPlan): PlaceOrderResult {
		this.orderSeq += 1;
		this.positions.set(plan.symbol, {
			symbol: plan.symbol,
			side: plan.side,
			size: plan.size,
			entryPrice: plan.entryPrice,
			markPrice: plan.entryPrice,
			unrealizedPnl: 0,
		});
		return {
			status: "FILLED",
			orderId: String(this.orderSeq),
			entryPrice: plan.entryPrice,
			filledSize: plan.size,
		};
	}

	flatten(symbol: string): ClosePositionResult {
		const position = this.positions.get(symbol);
		if (!position) return { status: "REJECTED", reason: "no position" };
		this.orderSeq += 1;
		this.positions.delete(symbol);
		const exitPrice = this.prices.get(symbol) ?? position.entryPrice;
		return {
			status: "CLOSED",
			orderId: String(this.orderSeq),
			exitPrice,
			realizedPnl: positionPnl(position.side, position.entryPrice, exitPrice, position.size),
		};
	}
}

export class RecordingNotifier implements Notifier {
	readonly messages: string[] = [];

	async notify(text: string): Promise<void> {
		this.messages.push(text);
	}
}

export function makePlan(overrides: Partial<OrderPlan> = {}): OrderPlan {
	return {
		symbol: "BTCUSDT",
		side: "BUY",
		size: 1,
		entryPrice: 100,
		stopLossPrice: 95,
		takeProfitPrice: 107.5,
		stopDistance: 5,
		atr: 5,
		leverage: 10,
		...overrides,
	};
}

export function makeTrade(overrides: Partial<ClosedTrade> = {}): ClosedTrade {
	const realizedPnl = overrides.realizedPnl ?? -10;
	return {
		symbol: "BTCUSDT",
		side: "BUY",
		size: 1,
		entryPrice: 100,
		exitPrice: 90,
		realizedPnl,
		outcome: realizedPnl >= 0 ? "WIN" : "LOSS",
		reason: "STOP_TRIGGERED",
		openedAt: 0,
		closedAt: 1_000,
		...overrides,
	};
}

/** Promise plus its resolve/reject, for holding an exchange call open. */
export function deferred<T>(): {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (err: unknown) => void;
} {
	let resolve: (value: T) => void = () => undefined;
	let reject: (err: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}
