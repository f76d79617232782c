import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import {
	MarketDataError,
	createLogger,
	describeError,
	type Candle,
	type MarketDataClient,
} from "@rsiwatch/core";
import { mapCcxtCandles } from "./ccxtMapper";

const logger = createLogger("exchange-binance");

/** The slice of a ccxt exchange this client calls. */
export interface OhlcvExchange {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

export interface BinanceMarketDataClientOptions {
	/** Use USD-M futures klines instead of spot. */
	futures?: boolean;
	timeoutMs?: number;
}

/**
 * Public Binance kline access through ccxt. No credentials: only market
 * data endpoints are called.
 */
export class BinanceMarketDataClient implements MarketDataClient {
	constructor(
		private readonly exchange: OhlcvExchange,
		readonly venue = "binance"
	) {}

	static create(
		options: BinanceMarketDataClientOptions = {}
	): BinanceMarketDataClient {
		const settings = {
			enableRateLimit: true,
			timeout: options.timeoutMs ?? 10_000,
		};
		if (options.futures) {
			return new BinanceMarketDataClient(
				new ccxt.binanceusdm({
					...settings,
					options: { defaultType: "future" },
				}),
				"binanceusdm"
			);
		}
		return new BinanceMarketDataClient(
			new ccxt.binance({ ...settings, options: { defaultType: "spot" } })
		);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit: number,
		since?: number
	): Promise<Candle[]> {
		let rows: OHLCV[];
		try {
			rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		} catch (error) {
			logger.warn("fetch_ohlcv_failed", {
				venue: this.venue,
				symbol,
				timeframe,
				limit,
				message: describeError(error),
			});
			throw new MarketDataError(
				`Failed to fetch ${symbol} ${timeframe} klines from ${this.venue}: ${describeError(error)}`,
				{ cause: error }
			);
		}

		if (!Array.isArray(rows)) {
			throw new MarketDataError(
				`Unexpected kline payload from ${this.venue} for ${symbol} ${timeframe}`
			);
		}

		const candles = mapCcxtCandles(rows, symbol, timeframe);
		logger.debug("fetch_ohlcv", {
			venue: this.venue,
			symbol,
			timeframe,
			requested: limit,
			received: candles.length,
		});
		return candles;
	}
}
