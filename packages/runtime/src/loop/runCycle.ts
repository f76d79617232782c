import {
	InsufficientHistoryError,
	barsSince,
	closesOf,
	toPriceSeries,
	type MarketDataClient,
	type Signal,
	type SignalBand,
} from "@rsiwatch/core";
import { computeRsi } from "@rsiwatch/indicators";
import { DEFAULT_SIGNAL_BANDS, classifyRsi } from "@rsiwatch/signals";

export interface CycleInput {
	client: MarketDataClient;
	symbol: string;
	timeframe: string;
	limit: number;
	window: number;
	bands?: readonly SignalBand[];
	now?: () => number;
}

export interface CycleResult {
	signal: Signal;
	latestClose: number;
	latestTimestamp: number;
	sampleCount: number;
	/** Whole bars between the latest candle and the evaluation instant. */
	staleBars: number;
}

/**
 * One fetch → RSI → classify pass. Only the latest RSI is kept; the rest of
 * the series is discarded with the fetched candles.
 * @throws InsufficientHistoryError when fewer than two candles come back
 */
export const runCycle = async (input: CycleInput): Promise<CycleResult> => {
	const now = input.now ?? Date.now;
	const candles = await input.client.fetchOHLCV(
		input.symbol,
		input.timeframe,
		input.limit
	);
	const series = toPriceSeries(candles);
	const latest = series[series.length - 1];
	if (series.length < 2 || latest === undefined) {
		throw new InsufficientHistoryError(
			2,
			series.length,
			`${input.symbol} ${input.timeframe}`
		);
	}

	const rsi = computeRsi(closesOf(series), input.window);
	const latestRsi = rsi[rsi.length - 1];
	if (latestRsi === undefined) {
		throw new InsufficientHistoryError(2, series.length, "RSI");
	}

	const evaluatedAt = now();
	return {
		signal: classifyRsi(
			latestRsi,
			evaluatedAt,
			input.bands ?? DEFAULT_SIGNAL_BANDS
		),
		latestClose: latest.close,
		latestTimestamp: latest.timestamp,
		sampleCount: series.length,
		staleBars: barsSince(latest.timestamp, input.timeframe, evaluatedAt),
	};
};
