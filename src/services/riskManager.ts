import type {
	ExchangeClient,
	ExchangeInfo,
	OrderPlan,
	Signal,
	TradingSettings,
} from "../types";
import { InvalidRiskParametersError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { SettingsStore } from "./settingsStore";

function stepDecimals(step: number): number {
	const text = step.toString();
	const exp = text.indexOf("e-");
	if (exp >= 0) return Number(text.slice(exp + 2));
	const dot = text.indexOf(".");
	return dot < 0 ? 0 : text.length - dot - 1;
}

export function floorToStep(value: number, step: number): number {
	if (step <= 0) return value;
	// tolerance keeps 0.3 / 0.1 from flooring to 2
	const adjusted = Math.floor(value / step + 1e-9) * step;
	return Number(adjusted.toFixed(stepDecimals(step)));
}

export function roundToStep(value: number, step: number): number {
	if (step <= 0) return value;
	const adjusted = Math.round(value / step) * step;
	return Number(adjusted.toFixed(stepDecimals(step)));
}

export function buildOrderPlan(
	signal: Pick<Signal, "symbol" | "direction" | "atr"> & { id?: string },
	settings: Pick<
		TradingSettings,
		"atrMultiplier" | "tpRatio" | "accountBalance" | "riskPerTrade" | "leverage"
	>,
	marketPrice: number,
	info: ExchangeInfo,
): OrderPlan {
	const side = signal.direction;
	if (side === "HOLD") {
		throw new InvalidRiskParametersError("HOLD_SIGNAL", "HOLD signals are not executable", {
			symbol: signal.symbol,
		});
	}
	if (!Number.isFinite(marketPrice) || marketPrice <= 0) {
		throw new InvalidRiskParametersError(
			"INVALID_ENTRY_PRICE",
			`Entry price must be positive, got ${marketPrice}`,
			{ symbol: signal.symbol, marketPrice },
		);
	}

	const stopDistance = settings.atrMultiplier * signal.atr;
	if (!Number.isFinite(stopDistance) || stopDistance <= 0) {
		throw new InvalidRiskParametersError(
			"NON_POSITIVE_STOP_DISTANCE",
			`Stop distance must be positive, got ${stopDistance}`,
			{ symbol: signal.symbol, atr: signal.atr, atrMultiplier: settings.atrMultiplier },
		);
	}

	const entryPrice = roundToStep(marketPrice, info.priceStep);
	const isLong = side === "BUY";
	const stopLossPrice = roundToStep(
		isLong ? entryPrice - stopDistance : entryPrice + stopDistance,
		info.priceStep,
	);
	const targetDistance = settings.tpRatio * stopDistance;
	const takeProfitPrice = roundToStep(
		isLong ? entryPrice + targetDistance : entryPrice - targetDistance,
		info.priceStep,
	);

	const stopOnLossSide = isLong
		? stopLossPrice > 0 && stopLossPrice < entryPrice
		: stopLossPrice > entryPrice;
	if (!stopOnLossSide) {
		throw new InvalidRiskParametersError(
			"STOP_WRONG_SIDE",
			`Stop ${stopLossPrice} is not on the loss side of ${side} entry ${entryPrice}`,
			{ symbol: signal.symbol, entryPrice, stopLossPrice, stopDistance },
		);
	}
	const targetOnProfitSide = isLong
		? takeProfitPrice > entryPrice
		: takeProfitPrice > 0 && takeProfitPrice < entryPrice;
	if (!targetOnProfitSide) {
		throw new InvalidRiskParametersError(
			"TARGET_WRONG_SIDE",
			`Target ${takeProfitPrice} is not on the profit side of ${side} entry ${entryPrice}`,
			{ symbol: signal.symbol, entryPrice, takeProfitPrice },
		);
	}

	const rawSize =
		(settings.accountBalance * settings.riskPerTrade * settings.leverage) / stopDistance;
	if (!Number.isFinite(rawSize) || rawSize <= 0) {
		throw new InvalidRiskParametersError(
			"NON_POSITIVE_SIZE",
			`Position size must be positive, got ${rawSize}`,
			{ symbol: signal.symbol, rawSize },
		);
	}
	const size = floorToStep(rawSize, info.quantityStep);
	if (size <= 0 || size < info.minQuantity) {
		throw new InvalidRiskParametersError(
			"BELOW_MIN_QUANTITY",
			`Size ${size} is below the exchange minimum ${info.minQuantity}`,
			{ symbol: signal.symbol, rawSize, size, minQuantity: info.minQuantity },
		);
	}

	return {
		symbol: signal.symbol,
		side,
		size,
		entryPrice,
		stopLossPrice,
		takeProfitPrice,
		stopDistance,
		atr: signal.atr,
		leverage: settings.leverage,
		signalId: signal.id,
	};
}

export class RiskManager {
	constructor(
		private readonly exchange: ExchangeClient,
		private readonly settings: SettingsStore,
	) {}

	async planOrder(signal: Signal, marketPrice: number): Promise<OrderPlan> {
		const info = await this.exchange.getExchangeInfo(signal.symbol);
		const plan = buildOrderPlan(signal, this.settings.getSettings(), marketPrice, info);
		logger.info(
			{
				symbol: plan.symbol,
				side: plan.side,
				size: plan.size,
				entry: plan.entryPrice,
				stopLoss: plan.stopLossPrice,
				takeProfit: plan.takeProfitPrice,
			},
			"Order plan built",
		);
		return plan;
	}
}
