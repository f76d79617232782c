export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type LogData = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

interface LoggerSettings {
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

// Read per call so keys loaded from `.env` after import still apply.
const readSettings = (env: NodeJS.ProcessEnv = process.env): LoggerSettings => {
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		moduleFilter: parseModuleFilter(env.LOG_MODULE),
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

export const shouldLog = (
	level: LogLevel,
	moduleName: string,
	settings: Pick<LoggerSettings, "minLevel" | "moduleFilter"> = readSettings()
): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const settings = readSettings();
	if (!shouldLog(payload.level, payload.module, settings)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ...payload, ts };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		console.log(serializeLogPayload(base));
	}
}

/**
 * Render a payload as one JSON line. Serialisation failures degrade to a
 * `logging_error` line rather than throwing into the caller.
 */
export const serializeLogPayload = (payload: BaseLogPayload): string => {
	try {
		return JSON.stringify(sanitizeValue(payload, new WeakSet<object>()));
	} catch (err) {
		return JSON.stringify({
			ts: payload.ts,
			level: "error",
			event: "logging_error",
			module: "logger",
			error: err instanceof Error ? err.message : "serialization_failed",
		});
	}
};

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: LogData) => void;
	debug: (event: string, data?: LogData) => void;
	info: (event: string, data?: LogData) => void;
	warn: (event: string, data?: LogData) => void;
	error: (event: string, data?: LogData) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => {
	const emit = (level: LogLevel, event: string, data?: LogData): void =>
		log({ ...(data ?? {}), level, event, module: moduleName });
	return {
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
	};
};

export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object>
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const fmtNumber = (value: unknown, digits = 2): string =>
	typeof value === "number" && Number.isFinite(value)
		? value.toFixed(digits)
		: "n/a";

const fmtValue = (value: unknown): string =>
	value === undefined || value === null ? "-" : String(value);

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "cycle_completed":
			console.log(
				[
					`${fmtValue(rest.symbol)} ${fmtValue(rest.timeframe)}`,
					`close=${fmtValue(rest.latestClose)}`,
					`rsi=${fmtNumber(rest.rsi)}`,
					`signal=${fmtValue(rest.signal)}`,
					`samples=${fmtValue(rest.sampleCount)}`,
				].join(" | ")
			);
			break;
		case "monitor_started":
			console.table([
				{
					symbol: rest.symbol,
					timeframe: rest.timeframe,
					limit: rest.limit,
					window: rest.window,
					pollIntervalMs: rest.pollIntervalMs,
				},
			]);
			break;
		default:
			break;
	}
}
