import { config } from "../config";
import type { Signal } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";

/** Append-only log of evaluated signals, newest last. */
export class SignalHistory {
	private readonly entries: Signal[] = [];

	constructor(
		private readonly filePath: string | null = config.paths.signalLog,
		private readonly capacity = 500,
	) {}

	async append(signal: Signal): Promise<void> {
		this.entries.push(signal);
		if (this.entries.length > this.capacity) {
			this.entries.shift();
		}
		if (!this.filePath) return;
		try {
			await appendLine(this.filePath, JSON.stringify(signal));
		} catch (err) {
			logger.error({ err, signalId: signal.id }, "Failed to persist signal");
		}
	}

	recent(symbol?: string, limit = 50): Signal[] {
		const filtered = symbol
			? this.entries.filter((s) => s.symbol === symbol)
			: this.entries;
		return filtered.slice(-limit);
	}
}
