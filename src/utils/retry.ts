import { TransientExchangeError } from "./errors";

export async function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseMs: number): number {
	return baseMs * 2 ** (attempt - 1);
}

export async function withTimeout<T>(
	label: string,
	promise: Promise<T>,
	timeoutMs: number,
): Promise<T> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(
				new TransientExchangeError(`${label} timed out after ${timeoutMs}ms`, true, {
					label,
					timeoutMs,
				}),
			);
		}, timeoutMs);
	});

	try {
		return await Promise.race([promise, timeout]);
	} finally {
		clearTimeout(timer);
	}
}
