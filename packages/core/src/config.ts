import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError } from "./errors";
import { parseTimeframe } from "./time/time";
import type { SignalBand } from "./types";

export type ThresholdKind = SignalBand["kind"];
export type ThresholdOverrides = Partial<Record<ThresholdKind, number>>;

export interface MonitorConfig {
	symbol: string;
	timeframe: string;
	/** Candles fetched per poll; the whole RSI input series. */
	limit: number;
	rsiWindow: number;
	pollIntervalMs: number;
	suppressRepeats: boolean;
	thresholds: ThresholdOverrides;
}

export type ConfigSourceType = "defaults" | "file" | "env" | "overrides";

export interface ConfigMetadata {
	sources: ConfigSourceType[];
	profile?: string;
	path?: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	/** Profile name under `<configDir>/monitor/`. Missing is an error only when named explicitly. */
	profile?: string;
	overrides?: Partial<MonitorConfig>;
	env?: NodeJS.ProcessEnv;
}

export interface LoadedMonitorConfig {
	config: MonitorConfig;
	metadata: ConfigMetadata;
}

export const DEFAULT_MONITOR_CONFIG: Readonly<MonitorConfig> = Object.freeze({
	symbol: "BTC/USDT",
	timeframe: "1m",
	limit: 100,
	rsiWindow: 14,
	pollIntervalMs: 1_000,
	suppressRepeats: false,
	thresholds: {},
});

export const MIN_POLL_INTERVAL_MS = 250;
const DEFAULT_PROFILE = "default";
const THRESHOLD_KINDS: readonly ThresholdKind[] = [
	"OVERBOUGHT_STOP_BUYING",
	"EXIT_SHORT",
	"OVERSOLD_BUY",
	"LOCK_PROFITS",
];

let cachedWorkspaceRoot: string | undefined;
const loadedEnvPaths = new Set<string>();

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseNumber = (raw: string, field: string): number => {
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(`${field} must be a number, got "${raw}"`);
	}
	return value;
};

export const parseBoolean = (raw: string, field: string): boolean => {
	const normalized = raw.toLowerCase();
	if (["true", "1", "yes", "on"].includes(normalized)) {
		return true;
	}
	if (["false", "0", "no", "off"].includes(normalized)) {
		return false;
	}
	throw new ConfigError(`${field} must be a boolean, got "${raw}"`);
};

const pickString = (
	file: Record<string, unknown>,
	key: string,
	field: string
): string | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new ConfigError(`${field} must be a string`);
	}
	return value;
};

const pickNumber = (
	file: Record<string, unknown>,
	key: string,
	field: string
): number | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new ConfigError(`${field} must be a number`);
	}
	return value;
};

const pickBoolean = (
	file: Record<string, unknown>,
	key: string,
	field: string
): boolean | undefined => {
	const value = file[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "boolean") {
		throw new ConfigError(`${field} must be a boolean`);
	}
	return value;
};

const isThresholdKind = (value: string): value is ThresholdKind =>
	THRESHOLD_KINDS.some((kind) => kind === value);

const parseThresholds = (value: unknown, field: string): ThresholdOverrides => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigError(`${field} must be an object`);
	}
	const thresholds: ThresholdOverrides = {};
	for (const [key, raw] of Object.entries(value)) {
		if (!isThresholdKind(key)) {
			throw new ConfigError(
				`${field}.${key} is not a signal band (expected one of ${THRESHOLD_KINDS.join(", ")})`
			);
		}
		if (typeof raw !== "number") {
			throw new ConfigError(`${field}.${key} must be a number`);
		}
		thresholds[key] = raw;
	}
	return thresholds;
};

const hasDefinedValues = (value: object): boolean =>
	Object.values(value).some((entry) => entry !== undefined);

const mergeDefined = (
	base: MonitorConfig,
	patch: Partial<MonitorConfig>
): MonitorConfig => ({
	symbol: patch.symbol ?? base.symbol,
	timeframe: patch.timeframe ?? base.timeframe,
	limit: patch.limit ?? base.limit,
	rsiWindow: patch.rsiWindow ?? base.rsiWindow,
	pollIntervalMs: patch.pollIntervalMs ?? base.pollIntervalMs,
	suppressRepeats: patch.suppressRepeats ?? base.suppressRepeats,
	thresholds: { ...base.thresholds, ...patch.thresholds },
});

export const resolveProfilePath = (configDir: string, profile: string): string =>
	path.join(
		configDir,
		"monitor",
		profile.endsWith(".json") ? profile : `${profile}.json`
	);

export const loadProfileFile = (filePath: string): Partial<MonitorConfig> => {
	const file = readJsonFile(filePath);
	if (!isRecord(file)) {
		throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
	}
	const prefix = path.basename(filePath);
	return {
		symbol: pickString(file, "symbol", `${prefix}:symbol`),
		timeframe: pickString(file, "timeframe", `${prefix}:timeframe`),
		limit: pickNumber(file, "limit", `${prefix}:limit`),
		rsiWindow: pickNumber(file, "rsiWindow", `${prefix}:rsiWindow`),
		pollIntervalMs: pickNumber(
			file,
			"pollIntervalMs",
			`${prefix}:pollIntervalMs`
		),
		suppressRepeats: pickBoolean(
			file,
			"suppressRepeats",
			`${prefix}:suppressRepeats`
		),
		thresholds:
			file.thresholds === undefined
				? undefined
				: parseThresholds(file.thresholds, `${prefix}:thresholds`),
	};
};

export const readEnvConfig = (
	env: NodeJS.ProcessEnv
): Partial<MonitorConfig> => {
	const limit = readOptionalEnvVar(env, "MONITOR_LIMIT");
	const rsiWindow = readOptionalEnvVar(env, "MONITOR_RSI_WINDOW");
	const pollIntervalMs = readOptionalEnvVar(env, "MONITOR_POLL_INTERVAL_MS");
	const suppressRepeats = readOptionalEnvVar(env, "MONITOR_SUPPRESS_REPEATS");
	return {
		symbol: readOptionalEnvVar(env, "MONITOR_SYMBOL"),
		timeframe: readOptionalEnvVar(env, "MONITOR_TIMEFRAME"),
		limit: limit === undefined ? undefined : parseNumber(limit, "MONITOR_LIMIT"),
		rsiWindow:
			rsiWindow === undefined
				? undefined
				: parseNumber(rsiWindow, "MONITOR_RSI_WINDOW"),
		pollIntervalMs:
			pollIntervalMs === undefined
				? undefined
				: parseNumber(pollIntervalMs, "MONITOR_POLL_INTERVAL_MS"),
		suppressRepeats:
			suppressRepeats === undefined
				? undefined
				: parseBoolean(suppressRepeats, "MONITOR_SUPPRESS_REPEATS"),
	};
};

/**
 * @throws ConfigError on the first invalid field
 */
export const validateMonitorConfig = (config: MonitorConfig): MonitorConfig => {
	if (!config.symbol.trim()) {
		throw new ConfigError("symbol must not be empty");
	}
	try {
		parseTimeframe(config.timeframe);
	} catch (error) {
		throw new ConfigError(
			error instanceof Error ? error.message : String(error)
		);
	}
	if (!Number.isInteger(config.limit) || config.limit < 2) {
		throw new ConfigError(
			`limit must be an integer of at least 2, got ${config.limit}`
		);
	}
	if (!Number.isInteger(config.rsiWindow) || config.rsiWindow <= 0) {
		throw new ConfigError(
			`rsiWindow must be a positive integer, got ${config.rsiWindow}`
		);
	}
	if (
		!Number.isFinite(config.pollIntervalMs) ||
		config.pollIntervalMs < MIN_POLL_INTERVAL_MS
	) {
		throw new ConfigError(
			`pollIntervalMs must be at least ${MIN_POLL_INTERVAL_MS}, got ${config.pollIntervalMs}`
		);
	}
	for (const [kind, threshold] of Object.entries(config.thresholds)) {
		if (
			typeof threshold !== "number" ||
			!Number.isFinite(threshold) ||
			threshold < 0 ||
			threshold > 100
		) {
			throw new ConfigError(
				`thresholds.${kind} must be within [0, 100], got ${threshold}`
			);
		}
	}
	return config;
};

const loadEnvFile = (envPath: string): void => {
	if (loadedEnvPaths.has(envPath) || !fs.existsSync(envPath)) {
		return;
	}
	dotenv.config({ path: envPath });
	loadedEnvPaths.add(envPath);
};

/**
 * Resolve the monitor configuration. Later sources win:
 * built-in defaults, JSON profile, environment, explicit overrides.
 */
export const loadMonitorConfig = (
	options: ConfigLoadOptions = {}
): LoadedMonitorConfig => {
	const envPath = options.envPath ?? path.join(getWorkspaceRoot(), ".env");
	const configDir =
		options.configDir ?? path.join(getWorkspaceRoot(), "config");

	if (!options.env) {
		loadEnvFile(envPath);
	}
	const env = options.env ?? process.env;

	const metadata: ConfigMetadata = { sources: ["defaults"] };
	const profileName = options.profile ?? DEFAULT_PROFILE;
	const profilePath = resolveProfilePath(configDir, profileName);
	let config: MonitorConfig = { ...DEFAULT_MONITOR_CONFIG };

	if (fs.existsSync(profilePath)) {
		config = mergeDefined(config, loadProfileFile(profilePath));
		metadata.sources.push("file");
		metadata.profile = profileName;
		metadata.path = profilePath;
	} else if (options.profile) {
		throw new ConfigError(`Monitor profile not found at ${profilePath}`);
	}

	const fromEnv = readEnvConfig(env);
	if (hasDefinedValues(fromEnv)) {
		config = mergeDefined(config, fromEnv);
		metadata.sources.push("env");
	}

	const overrides = options.overrides ?? {};
	if (hasDefinedValues(overrides)) {
		config = mergeDefined(config, overrides);
		metadata.sources.push("overrides");
	}

	return { config: validateMonitorConfig(config), metadata };
};
