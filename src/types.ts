export type Timeframe = "1m" | "3m" | "5m" | "15m" | "30m" | "1h" | "2h" | "4h" | "1d";

export type Candle = {
  symbol: string;
  timeframe: Timeframe;
  startTime: number;
  endTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  isClosed: boolean;
};

export type IndicatorPeriods = {
  sma: number;
  emaFast: number;
  emaSlow: number;
  macdSignal: number;
  rsi: number;
  atr: number;
};

export type IndicatorSnapshot = {
  timeframe: Timeframe;
  candleTime: number;
  close: number;
  volume: number;
  sma: number;
  emaFast: number;
  emaSlow: number;
  rsi: number;
  macd: number;
  macdSignal: number;
  macdHistogram: number;
  atr: number;
};

export type TradeSide = "BUY" | "SELL";

export type SignalDirection = TradeSide | "HOLD";

export type Signal = {
  readonly id: string;
  readonly symbol: string;
  readonly direction: SignalDirection;
  readonly confidenceScore: number;
  readonly generatedAt: number;
  readonly contributingTimeframes: readonly Timeframe[];
  readonly indicatorSnapshotRef: Readonly<Partial<Record<Timeframe, IndicatorSnapshot>>>;
  readonly trendScore: number;
  readonly multiplier: number;
  readonly aggregateScore: number;
  readonly price: number;
  readonly atr: number;
  readonly suppressed: boolean;
  readonly reasons: readonly string[];
};

export type ActiveHoursInterval = {
  start: number;
  end: number;
};

export type TradingSettings = {
  leverage: number;
  riskPerTrade: number;
  accountBalance: number;
  atrMultiplier: number;
  tpRatio: number;
  volumeSpikeThreshold: number;
  priceMomentumThreshold: number;
  minSignalIntervalMinutes: number;
  maxConsecutiveLosses: number;
  activeHours: ActiveHoursInterval[];
};

export type ExchangeInfo = {
  symbol: string;
  minQuantity: number;
  quantityStep: number;
  priceStep: number;
};

export type OrderPlan = {
  symbol: string;
  side: TradeSide;
  size: number;
  entryPrice: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  stopDistance: number;
  // short-timeframe ATR the stop was sized from
  atr: number;
  leverage: number;
  signalId?: string;
};

export type Position = {
  symbol: string;
  side: TradeSide;
  size: number;
  entryPrice: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  unrealizedPnl: number;
  markPrice: number;
  openedAt: number;
  initialStopDistance: number;
  entryAtr: number;
  trailingActive: boolean;
  // best price seen since entry: highest for BUY, lowest for SELL
  peakPrice: number;
};

export type CloseReason =
  | "MANUAL"
  | "CLOSE_ALL"
  | "STOP_TRIGGERED"
  | "TRAILING_STOP_TRIGGERED"
  | "TP_TRIGGERED"
  | "HIGH_VOLATILITY"
  | "TIME_LIMIT_EXCEEDED"
  | "EXTERNAL_CLOSE";

export type TradeOutcome = "WIN" | "LOSS";

export type ClosedTrade = {
  symbol: string;
  side: TradeSide;
  size: number;
  entryPrice: number;
  exitPrice: number;
  realizedPnl: number;
  outcome: TradeOutcome;
  reason: CloseReason;
  openedAt: number;
  closedAt: number;
};

export type ExecutionPhase = "IDLE" | "PENDING_OPEN" | "OPEN" | "PENDING_CLOSE";

// Exchange-side view of a live position, as reported by getOpenPositions().
export type ExchangePosition = {
  symbol: string;
  side: TradeSide;
  size: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
};

export type OrderFill = {
  status: "FILLED";
  orderId: string;
  entryPrice: number;
  filledSize: number;
};

export type OrderRejection = {
  status: "REJECTED";
  reason: string;
};

export type PlaceOrderResult = OrderFill | OrderRejection;

export type CloseConfirmation = {
  status: "CLOSED";
  orderId: string;
  exitPrice: number;
  realizedPnl: number;
};

export type ClosePositionResult = CloseConfirmation | OrderRejection;

export interface MarketDataProvider {
  getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]>;
  getLatestPrice(symbol: string): Promise<number>;
}

/**
 * Trading side of the exchange. Network failures and timeouts surface as
 * thrown TransientExchangeError; a definite refusal is returned as REJECTED.
 */
export interface ExchangeClient {
  getOpenPositions(): Promise<ExchangePosition[]>;
  placeOrder(plan: OrderPlan): Promise<PlaceOrderResult>;
  closePosition(symbol: string, reason: CloseReason): Promise<ClosePositionResult>;
  getExchangeInfo(symbol: string): Promise<ExchangeInfo>;
}

export interface Notifier {
  notify(text: string): Promise<void>;
}

export type SymbolMeta = {
  symbol: string;
  pair: string;
  quoteAsset: string;
  status: string;
  filters: Array<{ filterType: string; [key: string]: string | number }>;
};
