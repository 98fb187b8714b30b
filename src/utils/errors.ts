export type ErrorDetails = Record<string, unknown>;

export class TradingError extends Error {
	readonly code: string;
	readonly details: ErrorDetails;

	constructor(message: string, code: string, details: ErrorDetails = {}) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
	}
}

export class InsufficientHistoryError extends TradingError {
	constructor(
		readonly indicator: string,
		readonly required: number,
		readonly available: number,
	) {
		super(
			`Not enough candles to calculate ${indicator}: need ${required}, have ${available}`,
			"INSUFFICIENT_HISTORY",
			{ indicator, required, available },
		);
	}
}

export type RiskErrorCode =
	| "HOLD_SIGNAL"
	| "INVALID_ENTRY_PRICE"
	| "NON_POSITIVE_STOP_DISTANCE"
	| "STOP_WRONG_SIDE"
	| "TARGET_WRONG_SIDE"
	| "NON_POSITIVE_SIZE"
	| "BELOW_MIN_QUANTITY";

export class InvalidRiskParametersError extends TradingError {
	declare readonly code: RiskErrorCode;

	constructor(code: RiskErrorCode, message: string, details: ErrorDetails = {}) {
		super(message, code, details);
	}
}

export type ExecutionErrorCode =
	| "POSITION_EXISTS"
	| "NO_OPEN_POSITION"
	| "REJECTED"
	| "RETRIES_EXHAUSTED"
	| "RECONCILE_FAILED"
	| "UNEXPECTED";

export class ExecutionFailedError extends TradingError {
	declare readonly code: ExecutionErrorCode;

	constructor(
		readonly symbol: string,
		code: ExecutionErrorCode,
		message: string,
		details: ErrorDetails = {},
	) {
		super(message, code, { symbol, ...details });
	}
}

export class ConcurrentModificationError extends TradingError {
	constructor(
		readonly key: string,
		readonly waitMs: number,
	) {
		super(
			`Exclusive section for ${key} not acquired within ${waitMs}ms`,
			"CONCURRENT_MODIFICATION",
			{ key, waitMs },
		);
	}
}

export class CircuitBreakerTrippedError extends TradingError {
	constructor(message = "Auto-trading is disabled by the circuit breaker") {
		super(message, "CIRCUIT_BREAKER_TRIPPED");
	}
}

export class SettingsValidationError extends TradingError {
	constructor(
		readonly field: string,
		message: string,
	) {
		super(`Invalid setting ${field}: ${message}`, "SETTINGS_VALIDATION", {
			field,
		});
	}
}

/**
 * Network failure or timeout talking to the exchange. `indeterminate` is set
 * when the request may have reached the exchange, so the outcome is unknown.
 */
export class TransientExchangeError extends TradingError {
	constructor(
		message: string,
		readonly indeterminate: boolean,
		details: ErrorDetails = {},
	) {
		super(message, "EXCHANGE_TRANSIENT", details);
	}
}

export class ExchangeRejectedError extends TradingError {
	constructor(message: string, details: ErrorDetails = {}) {
		super(message, "EXCHANGE_REJECTED", details);
	}
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
