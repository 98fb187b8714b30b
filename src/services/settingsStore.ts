import { config, defaultTradingSettings } from "../config";
import type { ActiveHoursInterval, TradingSettings } from "../types";
import { SettingsValidationError } from "../utils/errors";
import { KeyedMutex } from "../utils/keyedMutex";
import { logger } from "../utils/logger";
import { isRecord, readJson, writeJson } from "../utils/storage";

export type SettingKey = keyof TradingSettings;
type NumericSettingKey = Exclude<SettingKey, "activeHours">;

type NumericRule = {
	min: number;
	max?: number;
	exclusiveMin?: boolean;
	integer?: boolean;
};

const NUMERIC_RULES: Record<NumericSettingKey, NumericRule> = {
	leverage: { min: 1, max: 125, integer: true },
	riskPerTrade: { min: 0, max: 1, exclusiveMin: true },
	accountBalance: { min: 0, exclusiveMin: true },
	atrMultiplier: { min: 0, exclusiveMin: true },
	tpRatio: { min: 0, exclusiveMin: true },
	volumeSpikeThreshold: { min: 0, exclusiveMin: true },
	priceMomentumThreshold: { min: 0, exclusiveMin: true },
	minSignalIntervalMinutes: { min: 1 },
	maxConsecutiveLosses: { min: 1, integer: true },
};

const SETTING_KEYS: readonly SettingKey[] = [
	"leverage",
	"riskPerTrade",
	"accountBalance",
	"atrMultiplier",
	"tpRatio",
	"volumeSpikeThreshold",
	"priceMomentumThreshold",
	"minSignalIntervalMinutes",
	"maxConsecutiveLosses",
	"activeHours",
];

const SETTINGS_LOCK = "settings";

export function isSettingKey(key: string): key is SettingKey {
	return (SETTING_KEYS as readonly string[]).includes(key);
}

function validateNumber(key: NumericSettingKey, value: unknown): number {
	const rule = NUMERIC_RULES[key];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new SettingsValidationError(key, "must be a finite number");
	}
	if (rule.integer && !Number.isInteger(value)) {
		throw new SettingsValidationError(key, "must be an integer");
	}
	if (rule.exclusiveMin ? value <= rule.min : value < rule.min) {
		throw new SettingsValidationError(
			key,
			`must be ${rule.exclusiveMin ? ">" : ">="} ${rule.min}`,
		);
	}
	if (rule.max !== undefined && value > rule.max) {
		throw new SettingsValidationError(key, `must be <= ${rule.max}`);
	}
	return value;
}

function toInterval(entry: unknown): ActiveHoursInterval {
	if (Array.isArray(entry) && entry.length === 2) {
		return toInterval({ start: entry[0], end: entry[1] });
	}
	if (!isRecord(entry)) {
		throw new SettingsValidationError("activeHours", "each interval must be {start, end}");
	}
	const { start, end } = entry;
	if (typeof start !== "number" || !Number.isInteger(start) || start < 0 || start > 23) {
		throw new SettingsValidationError("activeHours", "start must be an hour in 0..23");
	}
	if (typeof end !== "number" || !Number.isInteger(end) || end < 0 || end > 24) {
		throw new SettingsValidationError("activeHours", "end must be an hour in 0..24");
	}
	if (start === end) {
		throw new SettingsValidationError("activeHours", `interval [${start},${end}) is empty`);
	}
	return { start, end };
}

export function validateActiveHours(value: unknown): ActiveHoursInterval[] {
	if (!Array.isArray(value)) {
		throw new SettingsValidationError("activeHours", "must be a list of intervals");
	}
	return value.map(toInterval).sort((a, b) => a.start - b.start || a.end - b.end);
}

export function validateSettings(candidate: unknown): TradingSettings {
	if (!isRecord(candidate)) {
		throw new SettingsValidationError("settings", "must be an object");
	}
	for (const key of Object.keys(candidate)) {
		if (!isSettingKey(key)) {
			throw new SettingsValidationError(key, "unknown setting");
		}
	}

	return {
		leverage: validateNumber("leverage", candidate.leverage),
		riskPerTrade: validateNumber("riskPerTrade", candidate.riskPerTrade),
		accountBalance: validateNumber("accountBalance", candidate.accountBalance),
		atrMultiplier: validateNumber("atrMultiplier", candidate.atrMultiplier),
		tpRatio: validateNumber("tpRatio", candidate.tpRatio),
		volumeSpikeThreshold: validateNumber(
			"volumeSpikeThreshold",
			candidate.volumeSpikeThreshold,
		),
		priceMomentumThreshold: validateNumber(
			"priceMomentumThreshold",
			candidate.priceMomentumThreshold,
		),
		minSignalIntervalMinutes: validateNumber(
			"minSignalIntervalMinutes",
			candidate.minSignalIntervalMinutes,
		),
		maxConsecutiveLosses: validateNumber(
			"maxConsecutiveLosses",
			candidate.maxConsecutiveLosses,
		),
		activeHours: validateActiveHours(candidate.activeHours),
	};
}

/**
 * Converts operator/env input to the value type of `key`. Active hours take
 * either JSON or the short form "9-24,0-2".
 */
export function parseSettingValue(key: SettingKey, raw: string): unknown {
	const text = raw.trim();
	if (key !== "activeHours") {
		return text === "" ? Number.NaN : Number(text);
	}
	if (text.startsWith("[")) {
		try {
			return JSON.parse(text);
		} catch {
			throw new SettingsValidationError(key, "is not valid JSON");
		}
	}
	return text
		.split(",")
		.filter((part) => part.trim())
		.map((part) => {
			const [start, end] = part.split("-").map((n) => Number(n.trim()));
			return { start, end };
		});
}

function cloneSettings(settings: TradingSettings): TradingSettings {
	return {
		...settings,
		activeHours: settings.activeHours.map((interval) => ({ ...interval })),
	};
}

export type SettingsStoreOptions = {
	filePath?: string | null;
	initial?: TradingSettings;
	lockWaitMs?: number;
};

/**
 * Process-wide TradingSettings. Every write is validate → persist → swap,
 * inside one exclusive section of its own, so a failed write leaves the
 * previous settings in place.
 */
export class SettingsStore {
	private current: TradingSettings;
	private readonly filePath: string | null;
	private readonly mutex: KeyedMutex;

	constructor(options: SettingsStoreOptions = {}) {
		this.current = cloneSettings(options.initial ?? defaultTradingSettings);
		this.filePath = options.filePath === undefined ? config.paths.settings : options.filePath;
		this.mutex = new KeyedMutex(options.lockWaitMs ?? config.execution.lockWaitMs);
	}

	getSettings(): TradingSettings {
		return cloneSettings(this.current);
	}

	async load(): Promise<TradingSettings> {
		const filePath = this.filePath;
		if (!filePath) return this.getSettings();
		return this.mutex.runExclusive(SETTINGS_LOCK, async () => {
			const stored = await readJson(filePath);
			if (stored === undefined) {
				logger.info({ filePath }, "No stored trading settings, using defaults");
				return this.getSettings();
			}
			this.current = validateSettings(stored);
			logger.info({ filePath }, "Loaded trading settings");
			return this.getSettings();
		});
	}

	async updateSetting<K extends SettingKey>(
		key: K,
		value: TradingSettings[K],
	): Promise<TradingSettings> {
		return this.write(() => ({ ...this.current, [key]: value }), { key });
	}

	async updateSettingFromString(key: string, raw: string): Promise<TradingSettings> {
		if (!isSettingKey(key)) {
			throw new SettingsValidationError(key, "unknown setting");
		}
		const value = parseSettingValue(key, raw);
		return this.write(() => ({ ...this.current, [key]: value }), { key });
	}

	async replaceSettings(next: TradingSettings): Promise<TradingSettings> {
		return this.write(() => next, { key: "*" });
	}

	async resetToDefaults(): Promise<TradingSettings> {
		return this.write(() => defaultTradingSettings, { key: "defaults" });
	}

	private async write(
		build: () => unknown,
		context: { key: string },
	): Promise<TradingSettings> {
		return this.mutex.runExclusive(SETTINGS_LOCK, async () => {
			const next = validateSettings(build());
			if (this.filePath) {
				await writeJson(this.filePath, next);
			}
			this.current = next;
			logger.info({ ...context, settings: next }, "Trading settings updated");
			return this.getSettings();
		});
	}
}
