import { USDMClient } from "binance";
import { config } from "../config";
import { positionPnl } from "../services/orderExecutor";
import type {
  Candle,
  ClosePositionResult,
  CloseReason,
  ExchangeClient,
  ExchangeInfo,
  ExchangePosition,
  MarketDataProvider,
  OrderPlan,
  PlaceOrderResult,
  SymbolMeta,
  Timeframe,
  TradeSide,
} from "../types";
import { ExchangeRejectedError, TransientExchangeError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
  composeInterceptors,
  errorTranslationInterceptor,
  Interceptor,
  timeoutInterceptor,
  withTtlCache,
} from "./interceptors";

const FINAL_REJECTED_STATUSES = new Set(["CANCELED", "EXPIRED", "REJECTED", "EXPIRED_IN_MATCH"]);

function ensureNumber(value: unknown): number {
  const num = Number(value);
  return Number.isFinite(num) ? num : 0;
}

function filterValue(meta: SymbolMeta, filterType: string, key: string): number {
  const filter = meta.filters.find((f) => f.filterType === filterType);
  return filter ? ensureNumber(filter[key]) : 0;
}

export function toExchangeInfo(meta: SymbolMeta): ExchangeInfo {
  const lotStep = filterValue(meta, "LOT_SIZE", "stepSize");
  const marketStep = filterValue(meta, "MARKET_LOT_SIZE", "stepSize");
  return {
    symbol: meta.symbol,
    minQuantity: Math.max(
      filterValue(meta, "LOT_SIZE", "minQty"),
      filterValue(meta, "MARKET_LOT_SIZE", "minQty"),
    ),
    quantityStep: Math.max(lotStep, marketStep),
    priceStep: filterValue(meta, "PRICE_FILTER", "tickSize"),
  };
}

function oppositeSide(side: TradeSide): TradeSide {
  return side === "BUY" ? "SELL" : "BUY";
}

/**
 * USDⓈ-M futures adapter. Every REST call runs through the interceptor chain:
 * error translation outermost, then the per-call timeout.
 */
export class BinanceExchange implements ExchangeClient, MarketDataProvider {
  private readonly call: Interceptor;
  private readonly loadExchangeInfo: (symbol: string) => Promise<ExchangeInfo>;

  constructor(
    private readonly client: USDMClient,
    interceptors: Interceptor[] = [
      errorTranslationInterceptor(),
      timeoutInterceptor(config.execution.timeoutMs),
    ],
  ) {
    this.call = composeInterceptors(interceptors);
    this.loadExchangeInfo = withTtlCache(
      (symbol) => this.fetchExchangeInfo(symbol),
      config.execution.exchangeInfoTtlMs,
    );
  }

  async getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const data = await this.call({ name: "getKlines", symbol }, () =>
      this.client.getKlines({ symbol, interval: timeframe, limit }),
    );
    const now = Date.now();

    return data.map((kline) => ({
      symbol,
      timeframe,
      startTime: kline[0],
      open: Number(kline[1]),
      high: Number(kline[2]),
      low: Number(kline[3]),
      close: Number(kline[4]),
      volume: Number(kline[5]),
      endTime: kline[6],
      isClosed: kline[6] < now,
    }));
  }

  async getLatestPrice(symbol: string): Promise<number> {
    const ticker = await this.call({ name: "getSymbolPriceTicker", symbol }, () =>
      this.client.getSymbolPriceTicker({ symbol }),
    );
    const entry = Array.isArray(ticker) ? ticker.find((t) => t.symbol === symbol) : ticker;
    const price = ensureNumber(entry?.price);
    if (price <= 0) {
      throw new TransientExchangeError(`No price available for ${symbol}`, false, { symbol });
    }
    return price;
  }

  async getOpenPositions(): Promise<ExchangePosition[]> {
    const positions = await this.call({ name: "getPositionsV3" }, () =>
      this.client.getPositionsV3(),
    );

    return positions
      .map((p) => ({ symbol: p.symbol, amount: ensureNumber(p.positionAmt), p }))
      .filter(({ amount }) => amount !== 0)
      .map(({ symbol, amount, p }) => {
        const side: TradeSide = amount > 0 ? "BUY" : "SELL";
        const size = Math.abs(amount);
        const entryPrice = ensureNumber(p.entryPrice);
        const markPrice = ensureNumber(p.markPrice);
        return {
          symbol,
          side,
          size,
          entryPrice,
          markPrice,
          unrealizedPnl: positionPnl(side, entryPrice, markPrice, size),
        };
      });
  }

  async placeOrder(plan: OrderPlan): Promise<PlaceOrderResult> {
    const { symbol } = plan;
    try {
      await this.call({ name: "setLeverage", symbol }, () =>
        this.client.setLeverage({ symbol, leverage: plan.leverage }),
      );

      const order = await this.call({ name: "submitNewOrder", symbol }, () =>
        this.client.submitNewOrder({
          symbol,
          side: plan.side,
          type: "MARKET",
          quantity: plan.size,
          newOrderRespType: "RESULT",
        }),
      );

      let status = String(order.status);
      let executedQty = ensureNumber(order.executedQty);
      let avgPrice = ensureNumber(order.avgPrice);

      if (status !== "FILLED") {
        const latest = await this.call({ name: "getOrder", symbol }, () =>
          this.client.getOrder({ symbol, orderId: order.orderId }),
        );
        status = String(latest.status);
        executedQty = ensureNumber(latest.executedQty);
        avgPrice = ensureNumber(latest.avgPrice);
      }

      if (status === "FILLED" && executedQty > 0) {
        logger.info({ symbol, orderId: order.orderId, executedQty, avgPrice }, "Market order filled");
        return {
          status: "FILLED",
          orderId: String(order.orderId),
          entryPrice: avgPrice,
          filledSize: executedQty,
        };
      }
      if (FINAL_REJECTED_STATUSES.has(status) && executedQty === 0) {
        return { status: "REJECTED", reason: `Order ${order.orderId} ended ${status}` };
      }
      throw new TransientExchangeError(
        `Order ${order.orderId} for ${symbol} is ${status}`,
        true,
        { symbol, orderId: order.orderId, status, executedQty },
      );
    } catch (err) {
      if (err instanceof ExchangeRejectedError) {
        return { status: "REJECTED", reason: err.message };
      }
      throw err;
    }
  }

  async closePosition(symbol: string, reason: CloseReason): Promise<ClosePositionResult> {
    const position = (await this.getOpenPositions()).find((p) => p.symbol === symbol);
    if (!position) {
      return { status: "REJECTED", reason: `No open position for ${symbol}` };
    }

    try {
      const order = await this.call({ name: "submitNewOrder", symbol }, () =>
        this.client.submitNewOrder({
          symbol,
          side: oppositeSide(position.side),
          type: "MARKET",
          quantity: position.size,
          reduceOnly: "true",
          newOrderRespType: "RESULT",
        }),
      );

      const avgPrice = ensureNumber(order.avgPrice);
      if (String(order.status) !== "FILLED" || avgPrice <= 0) {
        throw new TransientExchangeError(
          `Close order ${order.orderId} for ${symbol} is ${order.status}`,
          true,
          { symbol, orderId: order.orderId },
        );
      }

      logger.info({ symbol, orderId: order.orderId, avgPrice, reason }, "Position closed on exchange");
      return {
        status: "CLOSED",
        orderId: String(order.orderId),
        exitPrice: avgPrice,
        realizedPnl: positionPnl(position.side, position.entryPrice, avgPrice, position.size),
      };
    } catch (err) {
      if (err instanceof ExchangeRejectedError) {
        return { status: "REJECTED", reason: err.message };
      }
      throw err;
    }
  }

  getExchangeInfo(symbol: string): Promise<ExchangeInfo> {
    return this.loadExchangeInfo(symbol);
  }

  private async fetchExchangeInfo(symbol: string): Promise<ExchangeInfo> {
    const info = await this.call({ name: "getExchangeInfo", symbol }, () =>
      this.client.getExchangeInfo(),
    );
    const symbols = info.symbols as unknown as SymbolMeta[];
    const meta = symbols.find((s) => s.symbol === symbol);
    if (!meta) {
      throw new ExchangeRejectedError(`Unknown symbol ${symbol}`, { symbol });
    }
    return toExchangeInfo(meta);
  }
}

export function createRestClient(): USDMClient {
  return new USDMClient(
    {
      api_key: config.binance.apiKey,
      api_secret: config.binance.apiSecret,
      baseUrl: config.binance.baseUrl,
      beautifyResponses: true,
      testnet: config.binance.testnet,
    },
    { timeout: config.execution.timeoutMs },
  );
}
