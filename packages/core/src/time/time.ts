/**
 * Timeframe helpers. All values are UTC epoch milliseconds.
 */

export type TimeframeUnit = "m" | "h" | "d" | "w";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	ms: number;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const UNIT_MS: Record<TimeframeUnit, number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: 7 * DAY_MS,
};

const TIMEFRAME_PATTERN = /^(\d+)([mhdw])$/;

const isTimeframeUnit = (value: string): value is TimeframeUnit =>
	value in UNIT_MS;

/**
 * Parse an exchange interval string such as "1m", "15m", "4h", "1d" or "1w".
 * @throws Error if the format is not recognised or the count is zero
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	const unit = match?.[2];
	if (!match || unit === undefined || !isTimeframeUnit(unit)) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Number of whole timeframe periods between a candle's open time and `now`.
 * A value above 1 means the exchange has not published a newer candle.
 */
export const barsSince = (
	timestamp: number,
	timeframe: string,
	now: number
): number => {
	const tfMs = timeframeToMs(timeframe);
	return Math.max(0, Math.floor((now - timestamp) / tfMs));
};
