import { ConfigError, parseBoolean, type MonitorConfig } from "@rsiwatch/core";

export type ArgValue = string | boolean;

export interface MonitorCliOptions {
	profile?: string;
	futures: boolean;
	help: boolean;
	overrides: Partial<MonitorConfig>;
}

export const USAGE = `Usage: rsi-watch [options]

  --symbol <pair>        Trading pair, e.g. BTC/USDT
  --timeframe <tf>       Candle interval, e.g. 1m, 15m, 1h
  --limit <n>            Candles fetched per poll
  --window <n>           RSI lookback window
  --interval <ms>        Poll interval in milliseconds
  --profile <name>       Profile under config/monitor/
  --suppressRepeats      Skip an alert identical to the previous cycle's
  --futures              Read USD-M futures klines instead of spot
  --help                 Show this message`;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === true) {
		throw new ConfigError(`--${key} requires a value`);
	}
	return typeof value === "string" && value.length ? value : undefined;
};

const getNumberArg = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const raw = getStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(`--${key} must be a number, got "${raw}"`);
	}
	return value;
};

const getFlagArg = (
	args: Record<string, ArgValue>,
	key: string
): boolean | undefined => {
	const value = args[key];
	if (value === undefined || typeof value === "boolean") {
		return value;
	}
	return parseBoolean(value, `--${key}`);
};

export const toMonitorCliOptions = (
	args: Record<string, ArgValue>
): MonitorCliOptions => ({
	profile: getStringArg(args, "profile"),
	futures: getFlagArg(args, "futures") ?? false,
	help: getFlagArg(args, "help") ?? false,
	overrides: {
		symbol: getStringArg(args, "symbol"),
		timeframe: getStringArg(args, "timeframe"),
		limit: getNumberArg(args, "limit"),
		rsiWindow: getNumberArg(args, "window"),
		pollIntervalMs: getNumberArg(args, "interval"),
		suppressRepeats: getFlagArg(args, "suppressRepeats"),
	},
});
