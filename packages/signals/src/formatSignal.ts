import type { Signal, SignalKind } from "@rsiwatch/core";

export const SIGNAL_MESSAGES: Readonly<
	Record<Exclude<SignalKind, "NONE">, string>
> = {
	OVERBOUGHT_STOP_BUYING: "Stop Buying. Overbought condition (Short Strategy).",
	EXIT_SHORT: "Sell Signal. Exit short position (Short Strategy).",
	OVERSOLD_BUY: "Buy Signal. Oversold condition (Long Strategy).",
	LOCK_PROFITS: "Sell Signal. Lock profits (Long Strategy).",
};

export interface FormatSignalOptions {
	symbol?: string;
}

/**
 * `[<ISO instant>] [<symbol> ]RSI: <2dp> - <message>`, or `null` for NONE.
 */
export const formatSignal = (
	signal: Signal,
	options: FormatSignalOptions = {}
): string | null => {
	if (signal.kind === "NONE") {
		return null;
	}
	const instant = new Date(signal.evaluatedAt).toISOString();
	const symbol = options.symbol ? `${options.symbol} ` : "";
	return `[${instant}] ${symbol}RSI: ${signal.rsi.toFixed(2)} - ${
		SIGNAL_MESSAGES[signal.kind]
	}`;
};
