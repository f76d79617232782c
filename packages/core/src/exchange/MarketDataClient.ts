import type { Candle } from "../types";

/**
 * Read-only source of exchange candles. Implementations return candles in
 * chronological order, most recent last, and reject when the upstream data
 * is unavailable or malformed.
 */
export interface MarketDataClient {
	/**
	 * @param symbol - Trading pair symbol (e.g., "BTC/USDT")
	 * @param timeframe - Candle interval (e.g., "1m", "1h")
	 * @param limit - Number of most recent candles to fetch
	 * @param since - Optional epoch ms of the oldest candle wanted
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit: number,
		since?: number
	): Promise<Candle[]>;
}
