import { describe, expect, it } from "vitest";
import { InsufficientHistoryError } from "@rsiwatch/core";
import { withThresholds } from "@rsiwatch/signals";
import { runCycle } from "./runCycle";
import {
	MINUTE,
	ScriptedMarketDataClient,
} from "../__tests__/scriptedMarketDataClient";

const base = {
	symbol: "BTC/USDT",
	timeframe: "1m",
	limit: 100,
	window: 14,
	now: () => 4 * MINUTE + 1_000,
};

describe("runCycle", () => {
	it("classifies the RSI of the most recent close", async () => {
		const client = new ScriptedMarketDataClient([[10, 12, 11, 13, 9]]);
		const result = await runCycle({ ...base, client });

		expect(result).toEqual({
			signal: { kind: "NONE", rsi: 400 / 9, evaluatedAt: 4 * MINUTE + 1_000 },
			latestClose: 9,
			latestTimestamp: 4 * MINUTE,
			sampleCount: 5,
			staleBars: 0,
		});
		expect(client.calls).toEqual([
			{ symbol: "BTC/USDT", timeframe: "1m", limit: 100 },
		]);
	});

	it("alerts on a rising series", async () => {
		const client = new ScriptedMarketDataClient([[1, 2, 3, 4, 5]]);
		const result = await runCycle({ ...base, client });
		expect(result.signal.kind).toBe("OVERBOUGHT_STOP_BUYING");
		expect(result.signal.rsi).toBe(100);
	});

	it("alerts on a falling series", async () => {
		const client = new ScriptedMarketDataClient([[5, 4, 3, 2, 1]]);
		const result = await runCycle({ ...base, client });
		expect(result.signal.kind).toBe("EXIT_SHORT");
		expect(result.signal.rsi).toBe(0);
	});

	it("uses custom bands when given", async () => {
		const client = new ScriptedMarketDataClient([[10, 12, 11, 13, 9]]);
		const result = await runCycle({
			...base,
			client,
			bands: withThresholds({ EXIT_SHORT: 45 }),
		});
		expect(result.signal.kind).toBe("EXIT_SHORT");
	});

	it("counts bars since the latest candle", async () => {
		const client = new ScriptedMarketDataClient([[1, 2, 3]]);
		const result = await runCycle({ ...base, client, now: () => 10 * MINUTE });
		expect(result.staleBars).toBe(8);
	});

	it("reports insufficient history for a single candle", async () => {
		const client = new ScriptedMarketDataClient([[100]]);
		await expect(runCycle({ ...base, client })).rejects.toBeInstanceOf(
			InsufficientHistoryError
		);
	});

	it("reports insufficient history for an empty response", async () => {
		const client = new ScriptedMarketDataClient([[]]);
		await expect(runCycle({ ...base, client })).rejects.toThrow(
			"Insufficient history for BTC/USDT 1m: need at least 2 sample(s), got 0"
		);
	});

	it("propagates fetch failures", async () => {
		const client = new ScriptedMarketDataClient([new Error("upstream down")]);
		await expect(runCycle({ ...base, client })).rejects.toThrow(
			"upstream down"
		);
	});
});
