import {
	ExchangeRejectedError,
	TradingError,
	TransientExchangeError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { withTimeout } from "../utils/retry";

export type CallContext = {
	name: string;
	symbol?: string;
};

export type ExchangeCall<T> = () => Promise<T>;

export type Interceptor = <T>(context: CallContext, call: ExchangeCall<T>) => Promise<T>;

/** The first interceptor is the outermost one. */
export function composeInterceptors(interceptors: Interceptor[]): Interceptor {
	return <T>(context: CallContext, call: ExchangeCall<T>): Promise<T> => {
		const chain = interceptors.reduceRight<ExchangeCall<T>>(
			(next, interceptor) => () => interceptor(context, next),
			call,
		);
		return chain();
	};
}

export function timeoutInterceptor(timeoutMs: number): Interceptor {
	return (context, call) => withTimeout(context.name, call(), timeoutMs);
}

// Socket-level failures; the request may or may not have been processed.
const NETWORK_ERROR_CODES = new Set([
	"ECONNABORTED",
	"ETIMEDOUT",
	"ECONNRESET",
	"EPIPE",
	"ERR_NETWORK",
]);
// Failures where the request never left this process or never reached the exchange.
const UNREACHABLE_ERROR_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN"]);
// Binance: -1001 disconnected, -1003 rate limited, -1006 unexpected response,
// -1007 backend timeout (execution status unknown), -1008 server overloaded.
const TRANSIENT_API_CODES = new Set([-1001, -1003, -1006, -1007, -1008]);
const INDETERMINATE_API_CODES = new Set([-1006, -1007]);

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

function messageOf(err: unknown): string {
	if (isRecord(err) && typeof err.message === "string") return err.message;
	return String(err);
}

export function classifyExchangeError(err: unknown): TradingError {
	if (err instanceof TradingError) return err;

	const message = messageOf(err);
	const code = isRecord(err) ? err.code : undefined;
	const details = { code, message };

	if (typeof code === "string") {
		if (NETWORK_ERROR_CODES.has(code)) {
			return new TransientExchangeError(message, true, details);
		}
		if (UNREACHABLE_ERROR_CODES.has(code)) {
			return new TransientExchangeError(message, false, details);
		}
	}
	if (typeof code === "number") {
		if (TRANSIENT_API_CODES.has(code)) {
			return new TransientExchangeError(message, INDETERMINATE_API_CODES.has(code), details);
		}
		return new ExchangeRejectedError(message, details);
	}
	// no recognizable code: treat the outcome as unknown
	return new TransientExchangeError(message, true, details);
}

export function errorTranslationInterceptor(): Interceptor {
	return async (context, call) => {
		try {
			return await call();
		} catch (err) {
			const translated = classifyExchangeError(err);
			logger.warn(
				{ call: context.name, symbol: context.symbol, code: translated.code, err: translated.message },
				"Exchange call failed",
			);
			throw translated;
		}
	};
}

type CacheEntry<T> = {
	value: Promise<T>;
	expiresAt: number;
};

/**
 * Memoizes `load` per key for `ttlMs`. A rejected load is evicted so the
 * next caller retries.
 */
export function withTtlCache<T>(
	load: (key: string) => Promise<T>,
	ttlMs: number,
	now: () => number = Date.now,
): (key: string) => Promise<T> {
	const entries = new Map<string, CacheEntry<T>>();
	return (key) => {
		const hit = entries.get(key);
		if (hit && hit.expiresAt > now()) return hit.value;

		const value = load(key);
		entries.set(key, { value, expiresAt: now() + ttlMs });
		void value.catch(() => {
			if (entries.get(key)?.value === value) entries.delete(key);
		});
		return value;
	};
}
