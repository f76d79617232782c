import type {
	Signal,
	SignalBand,
	SignalKind,
	ThresholdOverrides,
} from "@rsiwatch/core";

/**
 * Evaluated top to bottom, first match wins. The bands overlap: anything at
 * or below 20 also satisfies the EXIT_SHORT band, so EXIT_SHORT fires there
 * and OVERSOLD_BUY is unreachable with these thresholds. That ordering is
 * the alerting contract; keep it.
 */
export const DEFAULT_SIGNAL_BANDS: readonly SignalBand[] = [
	{ kind: "OVERBOUGHT_STOP_BUYING", comparator: "gte", threshold: 80 },
	{ kind: "EXIT_SHORT", comparator: "lte", threshold: 40 },
	{ kind: "OVERSOLD_BUY", comparator: "lte", threshold: 20 },
	{ kind: "LOCK_PROFITS", comparator: "gte", threshold: 60 },
];

export const bandMatches = (band: SignalBand, rsi: number): boolean =>
	band.comparator === "gte" ? rsi >= band.threshold : rsi <= band.threshold;

/**
 * Replace thresholds while keeping band order and comparators fixed.
 */
export const withThresholds = (
	overrides: ThresholdOverrides,
	bands: readonly SignalBand[] = DEFAULT_SIGNAL_BANDS
): readonly SignalBand[] =>
	bands.map((band) => ({
		...band,
		threshold: overrides[band.kind] ?? band.threshold,
	}));

export const matchBand = (
	rsi: number,
	bands: readonly SignalBand[] = DEFAULT_SIGNAL_BANDS
): SignalKind => bands.find((band) => bandMatches(band, rsi))?.kind ?? "NONE";

/**
 * Classify the latest RSI. Stateless: the same value always yields the same
 * kind, so a held condition repeats on every poll.
 */
export const classifyRsi = (
	rsi: number,
	evaluatedAt: number = Date.now(),
	bands: readonly SignalBand[] = DEFAULT_SIGNAL_BANDS
): Signal => ({
	kind: matchBand(rsi, bands),
	rsi,
	evaluatedAt,
});
