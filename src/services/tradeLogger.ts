import { config } from "../config";
import type { ClosedTrade } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

export type TradeLogger = (trade: ClosedTrade) => Promise<void>;

export function createTradeLogger(filePath: string | null = config.paths.tradeLog): TradeLogger {
	return async (trade) => {
		if (filePath) {
			await appendLine(filePath, JSON.stringify(trade));
		}
		logger.info(
			{ symbol: trade.symbol, outcome: trade.outcome, pnl: trade.realizedPnl, reason: trade.reason },
			"Trade recorded",
		);
	};
}
