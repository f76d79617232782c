import type { OHLCV } from "ccxt";
import { MarketDataError, type Candle } from "@rsiwatch/core";

const OHLCV_FIELDS = [
	"timestamp",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

const readField = (
	row: OHLCV,
	index: number,
	rowIndex: number,
	required: boolean
): number => {
	const raw = row[index];
	if (typeof raw === "number" && Number.isFinite(raw)) {
		return raw;
	}
	if (required) {
		throw new MarketDataError(
			`Malformed OHLCV row ${rowIndex}: ${OHLCV_FIELDS[index]} is ${String(raw)}`
		);
	}
	return 0;
};

/**
 * Map one ccxt OHLCV row to a Candle. Timestamp and close must be finite;
 * the other fields default to 0 since nothing downstream reads them.
 * @throws MarketDataError for a row without a usable timestamp or close
 */
export const mapCcxtCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string,
	rowIndex = 0
): Candle => ({
	symbol,
	timeframe,
	timestamp: readField(row, 0, rowIndex, true),
	open: readField(row, 1, rowIndex, false),
	high: readField(row, 2, rowIndex, false),
	low: readField(row, 3, rowIndex, false),
	close: readField(row, 4, rowIndex, true),
	volume: readField(row, 5, rowIndex, false),
});

export const mapCcxtCandles = (
	rows: readonly OHLCV[],
	symbol: string,
	timeframe: string
): Candle[] =>
	rows
		.map((row, idx) => mapCcxtCandle(row, symbol, timeframe, idx))
		.sort((a, b) => a.timestamp - b.timestamp);
