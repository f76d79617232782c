#!/usr/bin/env tsx
import {
	createLogger,
	describeError,
	loadMonitorConfig,
} from "@rsiwatch/core";
import { BinanceMarketDataClient } from "@rsiwatch/exchange-binance";
import {
	ConsoleNotificationSink,
	LoggerNotificationSink,
	RsiMonitor,
} from "@rsiwatch/runtime";
import { USAGE, parseCliArgs, toMonitorCliOptions } from "./cliArgs";

const logger = createLogger("monitor-cli");

const main = async (): Promise<void> => {
	const cli = toMonitorCliOptions(parseCliArgs(process.argv.slice(2)));
	if (cli.help) {
		console.log(USAGE);
		return;
	}

	const { config, metadata } = loadMonitorConfig({
		profile: cli.profile,
		overrides: cli.overrides,
	});
	logger.info("cli_starting", {
		...config,
		futures: cli.futures,
		configSources: metadata.sources,
		configPath: metadata.path ?? null,
	});

	const client = BinanceMarketDataClient.create({ futures: cli.futures });
	const monitor = new RsiMonitor({
		client,
		settings: config,
		sinks: [
			new ConsoleNotificationSink(),
			new LoggerNotificationSink(logger, config.symbol),
		],
	});

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals): void => {
		if (stopping) {
			return;
		}
		stopping = true;
		logger.info("cli_shutdown", { signal });
		monitor
			.stop()
			.then(() => {
				console.log("\nNotification system stopped by user.");
				process.exit(0);
			})
			.catch((error: unknown) => {
				logger.error("cli_shutdown_failed", { message: describeError(error) });
				process.exit(1);
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	console.log("Starting RSI-based Notification System. Press Ctrl+C to stop.");
	monitor.start();
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
