import { describe, expect, it } from "vitest";
import type { Candle } from "../types";
import { closesOf, toPriceSeries } from "./priceSeries";

const candle = (timestamp: number, close: number): Candle => ({
	symbol: "BTC/USDT",
	timeframe: "1m",
	timestamp,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
});

describe("toPriceSeries", () => {
	it("sorts by timestamp and keeps only the close", () => {
		const series = toPriceSeries([
			candle(120_000, 12),
			candle(0, 10),
			candle(60_000, 11),
		]);
		expect(series).toEqual([
			{ timestamp: 0, close: 10 },
			{ timestamp: 60_000, close: 11 },
			{ timestamp: 120_000, close: 12 },
		]);
		expect(closesOf(series)).toEqual([10, 11, 12]);
	});

	it("keeps duplicate timestamps", () => {
		const series = toPriceSeries([candle(0, 10), candle(0, 11)]);
		expect(closesOf(series)).toEqual([10, 11]);
	});

	it("returns immutable samples", () => {
		const [sample] = toPriceSeries([candle(0, 10)]);
		expect(Object.isFrozen(sample)).toBe(true);
	});
});
