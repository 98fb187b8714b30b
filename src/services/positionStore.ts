import { config } from "../config";
import type { Position, TradeSide } from "../types";
import { KeyedMutex } from "../utils/keyedMutex";
import { logger } from "../utils/logger";
import { isRecord, readJson, writeJson } from "../utils/storage";

export interface PositionRepository {
	load(): Promise<Position[]>;
	save(positions: Position[]): Promise<void>;
}

const NUMERIC_FIELDS = [
	"size",
	"entryPrice",
	"stopLossPrice",
	"takeProfitPrice",
	"unrealizedPnl",
	"markPrice",
	"openedAt",
	"initialStopDistance",
	"entryAtr",
	"peakPrice",
] as const;

function isSide(value: unknown): value is TradeSide {
	return value === "BUY" || value === "SELL";
}

export function toPosition(entry: unknown): Position | null {
	if (!isRecord(entry)) return null;
	const { symbol, side, trailingActive } = entry;
	if (typeof symbol !== "string" || !isSide(side) || typeof trailingActive !== "boolean") {
		return null;
	}
	const numbers: number[] = [];
	for (const field of NUMERIC_FIELDS) {
		const value = entry[field];
		if (typeof value !== "number" || !Number.isFinite(value)) return null;
		numbers.push(value);
	}
	const [
		size,
		entryPrice,
		stopLossPrice,
		takeProfitPrice,
		unrealizedPnl,
		markPrice,
		openedAt,
		initialStopDistance,
		entryAtr,
		peakPrice,
	] = numbers;
	return {
		symbol,
		side,
		size,
		entryPrice,
		stopLossPrice,
		takeProfitPrice,
		unrealizedPnl,
		markPrice,
		openedAt,
		initialStopDistance,
		entryAtr,
		trailingActive,
		peakPrice,
	};
}

/**
 * Open positions snapshot in `data/open-positions.json`. Without a file path
 * the snapshot lives in memory only.
 */
export class PositionStore implements PositionRepository {
	private readonly mutex = new KeyedMutex(config.execution.lockWaitMs);
	private snapshot: Position[] = [];

	constructor(private readonly filePath: string | null = config.paths.openPositions) {}

	async load(): Promise<Position[]> {
		if (!this.filePath) return this.snapshot.map((p) => ({ ...p }));
		const stored = await readJson(this.filePath);
		if (stored === undefined) return [];
		if (!Array.isArray(stored)) {
			logger.warn({ file: this.filePath }, "Open positions file is not a list; ignoring it");
			return [];
		}
		const positions: Position[] = [];
		for (const entry of stored) {
			const position = toPosition(entry);
			if (position) {
				positions.push(position);
			} else {
				logger.warn({ entry }, "Skipping malformed stored position");
			}
		}
		return positions;
	}

	async save(positions: Position[]): Promise<void> {
		const copy = positions.map((p) => ({ ...p }));
		await this.mutex.runExclusive("positions", async () => {
			this.snapshot = copy;
			if (this.filePath) {
				await writeJson(this.filePath, copy);
			}
		});
	}
}
