export type RsiWatchErrorCode =
	| "INSUFFICIENT_HISTORY"
	| "INVALID_ARGUMENT"
	| "MARKET_DATA"
	| "CONFIG";

/**
 * Base class for every error raised by rsi-watch packages. The `code` is
 * stable and safe to switch on; the message is for humans.
 */
export class RsiWatchError extends Error {
	readonly code: RsiWatchErrorCode;

	constructor(
		code: RsiWatchErrorCode,
		message: string,
		options?: ErrorOptions
	) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Fewer samples than an indicator needs to produce a value. */
export class InsufficientHistoryError extends RsiWatchError {
	readonly required: number;
	readonly received: number;

	constructor(required: number, received: number, context = "series") {
		super(
			"INSUFFICIENT_HISTORY",
			`Insufficient history for ${context}: need at least ${required} sample(s), got ${received}`
		);
		this.required = required;
		this.received = received;
	}
}

export class InvalidArgumentError extends RsiWatchError {
	constructor(message: string) {
		super("INVALID_ARGUMENT", message);
	}
}

/** Upstream candle data was unavailable or malformed. */
export class MarketDataError extends RsiWatchError {
	constructor(message: string, options?: ErrorOptions) {
		super("MARKET_DATA", message, options);
	}
}

export class ConfigError extends RsiWatchError {
	constructor(message: string) {
		super("CONFIG", message);
	}
}

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
