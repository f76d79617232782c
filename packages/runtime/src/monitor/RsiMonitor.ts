import {
	InsufficientHistoryError,
	describeError,
	type MarketDataClient,
	type MonitorConfig,
	type SignalBand,
	type SignalKind,
} from "@rsiwatch/core";
import { formatSignal, withThresholds } from "@rsiwatch/signals";
import { runCycle, type CycleResult } from "../loop/runCycle";
import type { NotificationSink } from "../notify/notificationSink";
import { STALE_BAR_THRESHOLD, runtimeLogger } from "../runtimeShared";

export type MonitorSettings = Pick<
	MonitorConfig,
	| "symbol"
	| "timeframe"
	| "limit"
	| "rsiWindow"
	| "pollIntervalMs"
	| "suppressRepeats"
	| "thresholds"
>;

export interface RsiMonitorOptions {
	client: MarketDataClient;
	settings: MonitorSettings;
	sinks: NotificationSink[];
	now?: () => number;
}

export type CycleOutcome =
	| { status: "ok"; result: CycleResult; message: string | null; delivered: boolean }
	| { status: "error"; error: unknown };

/**
 * Fixed-cadence poll loop: run a cycle, wait `pollIntervalMs`, repeat.
 * Cycles never overlap and a failed cycle is logged, not rethrown.
 */
export class RsiMonitor {
	private readonly bands: readonly SignalBand[];
	private running = false;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private inFlight: Promise<CycleOutcome> | null = null;
	private lastKind: SignalKind | null = null;

	constructor(private readonly options: RsiMonitorOptions) {
		this.bands = withThresholds(options.settings.thresholds);
	}

	get isRunning(): boolean {
		return this.running;
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		const { symbol, timeframe, limit, rsiWindow, pollIntervalMs } =
			this.options.settings;
		runtimeLogger.info("monitor_started", {
			symbol,
			timeframe,
			limit,
			window: rsiWindow,
			pollIntervalMs,
		});
		void this.tick();
	}

	/** Stop scheduling and wait for a cycle already in progress. */
	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.inFlight) {
			await this.inFlight;
		}
		runtimeLogger.info("monitor_stopped", {
			symbol: this.options.settings.symbol,
		});
	}

	/** Run one cycle now, or join the cycle already in progress. */
	async runOnce(): Promise<CycleOutcome> {
		if (this.inFlight) {
			return this.inFlight;
		}
		const cycle = this.evaluate();
		this.inFlight = cycle;
		try {
			return await cycle;
		} finally {
			if (this.inFlight === cycle) {
				this.inFlight = null;
			}
		}
	}

	private async tick(): Promise<void> {
		if (!this.running) {
			return;
		}

		await this.runOnce();

		if (this.running) {
			this.timer = setTimeout(() => {
				this.timer = null;
				void this.tick();
			}, this.options.settings.pollIntervalMs);
		}
	}

	private async evaluate(): Promise<CycleOutcome> {
		const { settings, client, now } = this.options;
		let result: CycleResult;
		try {
			result = await runCycle({
				client,
				symbol: settings.symbol,
				timeframe: settings.timeframe,
				limit: settings.limit,
				window: settings.rsiWindow,
				bands: this.bands,
				now,
			});
		} catch (error) {
			const level =
				error instanceof InsufficientHistoryError ? "warn" : "error";
			runtimeLogger.log(level, "cycle_failed", {
				symbol: settings.symbol,
				timeframe: settings.timeframe,
				message: describeError(error),
			});
			return { status: "error", error };
		}

		runtimeLogger.debug("cycle_completed", {
			symbol: settings.symbol,
			timeframe: settings.timeframe,
			latestClose: result.latestClose,
			rsi: result.signal.rsi,
			signal: result.signal.kind,
			sampleCount: result.sampleCount,
		});
		if (result.staleBars > STALE_BAR_THRESHOLD) {
			runtimeLogger.warn("stale_market_data", {
				symbol: settings.symbol,
				timeframe: settings.timeframe,
				latestTimestamp: result.latestTimestamp,
				staleBars: result.staleBars,
			});
		}

		const repeated =
			settings.suppressRepeats && result.signal.kind === this.lastKind;
		this.lastKind = result.signal.kind;

		const message = formatSignal(result.signal, { symbol: settings.symbol });
		if (message === null || repeated) {
			return { status: "ok", result, message, delivered: false };
		}
		await this.deliver(message, result);
		return { status: "ok", result, message, delivered: true };
	}

	private async deliver(message: string, result: CycleResult): Promise<void> {
		await Promise.all(
			this.options.sinks.map(async (sink) => {
				try {
					await sink.notify(message, result.signal);
				} catch (error) {
					runtimeLogger.error("notification_failed", {
						symbol: this.options.settings.symbol,
						kind: result.signal.kind,
						message: describeError(error),
					});
				}
			})
		);
	}
}
