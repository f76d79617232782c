export * from "./time/time";

export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/** A single closing price, epoch milliseconds UTC. */
export interface PriceSample {
	readonly timestamp: number;
	readonly close: number;
}

/** Chronological, oldest first. Rebuilt from scratch on every poll. */
export type PriceSeries = readonly PriceSample[];

/** `undefined` where no prior close exists to form a delta. */
export type RsiValue = number | undefined;

export type SignalKind =
	| "NONE"
	| "OVERBOUGHT_STOP_BUYING"
	| "EXIT_SHORT"
	| "OVERSOLD_BUY"
	| "LOCK_PROFITS";

export interface Signal {
	kind: SignalKind;
	rsi: number;
	evaluatedAt: number;
}

export type BandComparator = "gte" | "lte";

export interface SignalBand {
	kind: Exclude<SignalKind, "NONE">;
	comparator: BandComparator;
	threshold: number;
}
