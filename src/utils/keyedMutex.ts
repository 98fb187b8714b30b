import { ConcurrentModificationError } from "./errors";

type Waiter = {
	grant: () => void;
	timer: NodeJS.Timeout;
};

/**
 * Exclusive sections keyed by an arbitrary string (a symbol, "settings").
 * Different keys never block each other; waiters on one key run in FIFO
 * order and give up with ConcurrentModificationError after `waitMs`.
 */
export class KeyedMutex {
	private readonly held = new Set<string>();
	private readonly queues = new Map<string, Waiter[]>();

	constructor(private readonly defaultWaitMs: number) {}

	isLocked(key: string): boolean {
		return this.held.has(key);
	}

	async runExclusive<T>(
		key: string,
		task: () => Promise<T>,
		waitMs: number = this.defaultWaitMs,
	): Promise<T> {
		await this.acquire(key, waitMs);
		try {
			return await task();
		} finally {
			this.release(key);
		}
	}

	private acquire(key: string, waitMs: number): Promise<void> {
		if (!this.held.has(key)) {
			this.held.add(key);
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const queue = this.queues.get(key) ?? [];
			const waiter: Waiter = {
				grant: () => {
					clearTimeout(waiter.timer);
					resolve();
				},
				timer: setTimeout(() => {
					const pending = this.queues.get(key) ?? [];
					const idx = pending.indexOf(waiter);
					if (idx >= 0) pending.splice(idx, 1);
					reject(new ConcurrentModificationError(key, waitMs));
				}, waitMs),
			};
			queue.push(waiter);
			this.queues.set(key, queue);
		});
	}

	private release(key: string): void {
		const queue = this.queues.get(key);
		const next = queue?.shift();
		if (next) {
			// ownership passes straight to the next waiter
			next.grant();
			return;
		}
		this.queues.delete(key);
		this.held.delete(key);
	}
}
