import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import type { InstrumentId } from "./types";

export interface InstrumentSources {
	/** Path to the BBO snapshot CSV. */
	bbo: string;
	/** Path to the public trades CSV (needed by candle based strategies). */
	trades?: string;
}

export type StrategyId = "random" | "lookahead";

export const STRATEGY_IDS: readonly StrategyId[] = ["random", "lookahead"];

export interface StrategySettings {
	id: StrategyId;
	/** Number of random intents before the closing ones. */
	count: number;
	/** Absolute quantity per lookahead intent, upper bound for random ones. */
	amount: number;
	candleDurationMs: number;
	seed?: number;
}

export interface BacktestConfig {
	instruments: Record<InstrumentId, InstrumentSources>;
	actionDurationMs: number;
	strategy: StrategySettings;
}

export interface ConfigLoadOptions {
	configPath?: string;
	envPath?: string;
}

export type EnvSource = Record<string, string | undefined>;

const DEFAULT_STRATEGY: StrategySettings = {
	id: "random",
	count: 100,
	amount: 1000,
	candleDurationMs: 60 * 60 * 1000,
};

const WORKSPACE_SENTINELS = ["package-lock.json", ".git"];

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigPath = (): string =>
	path.join(findWorkspaceRoot(), "config", "backtest.json");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isStrategyId = (value: unknown): value is StrategyId =>
	typeof value === "string" && STRATEGY_IDS.some((id) => id === value);

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositive = (value: unknown, field: string): number => {
	const num = ensureNumber(value, field);
	if (num <= 0) {
		throw new Error(`${field} must be positive, got ${num}`);
	}
	return num;
};

const ensureString = (value: unknown, field: string): string => {
	if (typeof value !== "string" || value.trim() === "") {
		throw new Error(`Required string field missing in ${field}`);
	}
	return value;
};

const parseEnvNumber = (value: string | undefined, key: string): number | undefined => {
	if (value === undefined || value === "") {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new Error(`Invalid numeric environment variable ${key}: ${value}`);
	}
	return num;
};

const envKey = (prefix: string, instrument: InstrumentId): string =>
	`${prefix}_${instrument.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`;

const resolvePath = (baseDir: string, candidate: string): string =>
	path.isAbsolute(candidate) ? candidate : path.resolve(baseDir, candidate);

const parseInstruments = (
	raw: unknown,
	baseDir: string,
	env: EnvSource
): Record<InstrumentId, InstrumentSources> => {
	if (!isRecord(raw) || Object.keys(raw).length === 0) {
		throw new Error("Backtest config must define at least one instrument");
	}
	const instruments: Record<InstrumentId, InstrumentSources> = {};
	for (const [instrument, entry] of Object.entries(raw)) {
		if (!isRecord(entry)) {
			throw new Error(`instruments.${instrument} must be an object`);
		}
		const bbo =
			env[envKey("BBO_PATH", instrument)] ??
			ensureString(entry.bbo, `instruments.${instrument}.bbo`);
		const tradesRaw = env[envKey("TRADES_PATH", instrument)] ?? entry.trades;
		const sources: InstrumentSources = { bbo: resolvePath(baseDir, bbo) };
		if (tradesRaw !== undefined) {
			sources.trades = resolvePath(
				baseDir,
				ensureString(tradesRaw, `instruments.${instrument}.trades`)
			);
		}
		instruments[instrument] = sources;
	}
	return instruments;
};

const parseStrategy = (raw: unknown): StrategySettings => {
	if (raw === undefined) {
		return { ...DEFAULT_STRATEGY };
	}
	if (!isRecord(raw)) {
		throw new Error("strategy must be an object");
	}
	const id = raw.id ?? DEFAULT_STRATEGY.id;
	if (!isStrategyId(id)) {
		throw new Error(
			`Unknown strategy id "${String(id)}". Expected one of ${STRATEGY_IDS.join(", ")}`
		);
	}
	const settings: StrategySettings = {
		id,
		count: ensurePositive(raw.count ?? DEFAULT_STRATEGY.count, "strategy.count"),
		amount: ensurePositive(
			raw.amount ?? DEFAULT_STRATEGY.amount,
			"strategy.amount"
		),
		candleDurationMs: ensurePositive(
			raw.candleDurationMs ?? DEFAULT_STRATEGY.candleDurationMs,
			"strategy.candleDurationMs"
		),
	};
	if (raw.seed !== undefined) {
		settings.seed = ensureNumber(raw.seed, "strategy.seed");
	}
	return settings;
};

/**
 * Validate a raw config object. Relative data paths resolve against
 * `baseDir`; `BBO_PATH_<ID>`, `TRADES_PATH_<ID>` and `ACTION_DURATION_MS`
 * in `env` take precedence over the file.
 */
export const parseBacktestConfig = (
	raw: unknown,
	baseDir: string,
	env: EnvSource = {}
): BacktestConfig => {
	if (!isRecord(raw)) {
		throw new Error("Backtest config must be a JSON object");
	}
	const actionDurationMs =
		parseEnvNumber(env.ACTION_DURATION_MS, "ACTION_DURATION_MS") ??
		raw.actionDurationMs;
	return {
		instruments: parseInstruments(raw.instruments, baseDir, env),
		actionDurationMs: ensurePositive(actionDurationMs, "actionDurationMs"),
		strategy: parseStrategy(raw.strategy),
	};
};

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Failed to parse JSON at ${filePath}: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
};

export const loadBacktestConfig = (
	options: ConfigLoadOptions = {}
): BacktestConfig => {
	loadEnvFiles(getWorkspaceRoot(), options.envPath);
	const configPath = options.configPath
		? path.resolve(options.configPath)
		: getDefaultConfigPath();
	return parseBacktestConfig(
		readJsonFile(configPath),
		path.dirname(configPath),
		process.env
	);
};
