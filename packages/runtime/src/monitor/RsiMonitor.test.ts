import { afterEach, describe, expect, it, vi } from "vitest";
import type { Candle, MarketDataClient, Signal } from "@rsiwatch/core";
import { RsiMonitor, type MonitorSettings } from "./RsiMonitor";
import type { NotificationSink } from "../notify/notificationSink";
import {
	MINUTE,
	ScriptedMarketDataClient,
	candlesFromCloses,
} from "../__tests__/scriptedMarketDataClient";

const RISING = [1, 2, 3, 4, 5];
const FLAT = [5, 5, 5, 5, 5];

const settings: MonitorSettings = {
	symbol: "BTC/USDT",
	timeframe: "1m",
	limit: 100,
	rsiWindow: 14,
	pollIntervalMs: 1_000,
	suppressRepeats: false,
	thresholds: {},
};

class RecordingSink implements NotificationSink {
	public messages: string[] = [];
	public signals: Signal[] = [];

	notify(message: string, signal: Signal): void {
		this.messages.push(message);
		this.signals.push(signal);
	}
}

/** Holds every fetch open until `release()` and tracks concurrent fetches. */
class GatedMarketDataClient implements MarketDataClient {
	public calls = 0;
	public active = 0;
	public maxActive = 0;
	private pending: Array<() => void> = [];

	async fetchOHLCV(symbol: string, timeframe: string): Promise<Candle[]> {
		this.calls += 1;
		this.active += 1;
		this.maxActive = Math.max(this.maxActive, this.active);
		await new Promise<void>((resolve) => this.pending.push(resolve));
		this.active -= 1;
		return candlesFromCloses(RISING, symbol, timeframe);
	}

	release(): void {
		const waiting = this.pending;
		this.pending = [];
		for (const resolve of waiting) {
			resolve();
		}
	}
}

const flushMicrotasks = async (): Promise<void> => {
	for (let i = 0; i < 100; i += 1) {
		await Promise.resolve();
	}
};

const createMonitor = (
	script: Array<readonly number[] | Error>,
	overrides: Partial<MonitorSettings> = {},
	sinks: NotificationSink[] = [new RecordingSink()]
) => {
	const client = new ScriptedMarketDataClient(script);
	const monitor = new RsiMonitor({
		client,
		settings: { ...settings, ...overrides },
		sinks,
		now: () => 4 * MINUTE + 1_000,
	});
	return { client, monitor };
};

describe("RsiMonitor.runOnce", () => {
	it("formats and delivers an alert to every sink", async () => {
		const first = new RecordingSink();
		const second = new RecordingSink();
		const { monitor } = createMonitor([RISING], {}, [first, second]);

		const outcome = await monitor.runOnce();

		const expected =
			"[1970-01-01T00:04:01.000Z] BTC/USDT RSI: 100.00 - Stop Buying. Overbought condition (Short Strategy).";
		expect(outcome).toMatchObject({
			status: "ok",
			message: expected,
			delivered: true,
		});
		expect(first.messages).toEqual([expected]);
		expect(second.messages).toEqual([expected]);
		expect(first.signals[0]).toEqual({
			kind: "OVERBOUGHT_STOP_BUYING",
			rsi: 100,
			evaluatedAt: 4 * MINUTE + 1_000,
		});
	});

	it("stays quiet when there is no signal", async () => {
		const sink = new RecordingSink();
		const { monitor } = createMonitor([FLAT], {}, [sink]);

		const outcome = await monitor.runOnce();

		expect(outcome).toMatchObject({
			status: "ok",
			message: null,
			delivered: false,
		});
		expect(sink.messages).toEqual([]);
	});

	it("repeats an alert every cycle while the condition holds", async () => {
		const sink = new RecordingSink();
		const { monitor } = createMonitor([RISING], {}, [sink]);

		await monitor.runOnce();
		await monitor.runOnce();
		await monitor.runOnce();

		expect(sink.messages).toHaveLength(3);
	});

	it("drops consecutive repeats when asked to", async () => {
		const sink = new RecordingSink();
		const { monitor } = createMonitor(
			[RISING, RISING, FLAT, RISING],
			{ suppressRepeats: true },
			[sink]
		);

		const outcomes = [
			await monitor.runOnce(),
			await monitor.runOnce(),
			await monitor.runOnce(),
			await monitor.runOnce(),
		];

		expect(
			outcomes.map((outcome) =>
				outcome.status === "ok" ? outcome.delivered : "error"
			)
		).toEqual([true, false, false, true]);
		expect(sink.messages).toHaveLength(2);
	});

	it("applies configured thresholds", async () => {
		const sink = new RecordingSink();
		const { monitor } = createMonitor(
			[[10, 12, 11, 13, 9]],
			{ thresholds: { EXIT_SHORT: 45 } },
			[sink]
		);

		await monitor.runOnce();

		expect(sink.signals.map((signal) => signal.kind)).toEqual(["EXIT_SHORT"]);
	});

	it("reports failed cycles without throwing", async () => {
		const upstream = new Error("upstream down");
		const { monitor } = createMonitor([upstream, [100]]);

		await expect(monitor.runOnce()).resolves.toEqual({
			status: "error",
			error: upstream,
		});
		const second = await monitor.runOnce();
		expect(second.status).toBe("error");
	});

	it("keeps delivering when one sink fails", async () => {
		const failing: NotificationSink = {
			notify: () => {
				throw new Error("sink offline");
			},
		};
		const healthy = new RecordingSink();
		const { monitor } = createMonitor([RISING], {}, [failing, healthy]);

		const outcome = await monitor.runOnce();

		expect(outcome.status).toBe("ok");
		expect(healthy.messages).toHaveLength(1);
	});
});

describe("RsiMonitor loop", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("polls at the configured cadence until stopped", async () => {
		vi.useFakeTimers();
		const { client, monitor } = createMonitor([RISING]);

		monitor.start();
		await flushMicrotasks();
		expect(client.calls).toHaveLength(1);
		expect(monitor.isRunning).toBe(true);

		vi.advanceTimersByTime(999);
		await flushMicrotasks();
		expect(client.calls).toHaveLength(1);

		vi.advanceTimersByTime(1);
		await flushMicrotasks();
		expect(client.calls).toHaveLength(2);

		await monitor.stop();
		vi.advanceTimersByTime(5_000);
		await flushMicrotasks();
		expect(client.calls).toHaveLength(2);
		expect(monitor.isRunning).toBe(false);
	});

	it("keeps polling after a failed cycle", async () => {
		vi.useFakeTimers();
		const { client, monitor } = createMonitor([new Error("timeout"), RISING]);

		monitor.start();
		await flushMicrotasks();
		vi.advanceTimersByTime(1_000);
		await flushMicrotasks();

		expect(client.calls).toHaveLength(2);
		await monitor.stop();
	});

	it("ignores a second start", async () => {
		vi.useFakeTimers();
		const { client, monitor } = createMonitor([RISING]);

		monitor.start();
		monitor.start();
		await flushMicrotasks();

		expect(client.calls).toHaveLength(1);
		await monitor.stop();
	});

	it("never runs a manual cycle alongside the loop's cycle", async () => {
		const client = new GatedMarketDataClient();
		const sink = new RecordingSink();
		const monitor = new RsiMonitor({
			client,
			settings,
			sinks: [sink],
			now: () => 4 * MINUTE + 1_000,
		});

		monitor.start();
		await flushMicrotasks();
		expect(client.active).toBe(1);

		const joined = monitor.runOnce();
		await flushMicrotasks();
		expect(client.calls).toBe(1);
		expect(client.maxActive).toBe(1);

		let stopped = false;
		const stopping = monitor.stop().then(() => {
			stopped = true;
		});
		await flushMicrotasks();
		expect(stopped).toBe(false);

		client.release();
		const outcome = await joined;
		await stopping;

		expect(outcome.status).toBe("ok");
		expect(stopped).toBe(true);
		expect(client.active).toBe(0);
		expect(client.maxActive).toBe(1);
		expect(sink.messages).toHaveLength(1);
	});
});
