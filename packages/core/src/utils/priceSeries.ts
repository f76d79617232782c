import type { Candle, PriceSample, PriceSeries } from "../types";

/**
 * Narrow candles to closing prices, oldest first. Input order is not
 * trusted; duplicate timestamps are kept in their original relative order.
 */
export const toPriceSeries = (candles: readonly Candle[]): PriceSeries =>
	[...candles]
		.sort((a, b) => a.timestamp - b.timestamp)
		.map(
			(candle): PriceSample =>
				Object.freeze({ timestamp: candle.timestamp, close: candle.close })
		);

export const closesOf = (series: PriceSeries): number[] =>
	series.map((sample) => sample.close);
