import {
	InsufficientHistoryError,
	InvalidArgumentError,
	type RsiValue,
} from "@rsiwatch/core";
import { rollingMeanSeries } from "./sma";

export const DEFAULT_RSI_WINDOW = 14;
/** Returned when a window holds neither gains nor losses. */
export const NEUTRAL_RSI = 50;

export interface RsiPoint {
	rsi: number;
	avgGain: number;
	avgLoss: number;
}

/**
 * RSI from already-averaged gains and losses.
 *
 * - no losses, some gains: 100
 * - no gains, no losses: {@link NEUTRAL_RSI} (0/0 is a flat market, not an error)
 */
export const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
	if (avgGain === 0 && avgLoss === 0) {
		return NEUTRAL_RSI;
	}
	if (avgLoss === 0) {
		return 100;
	}
	const rsi = (100 * avgGain) / (avgGain + avgLoss);
	if (Number.isNaN(rsi)) {
		return NEUTRAL_RSI;
	}
	return Math.min(100, Math.max(0, rsi));
};

const assertWindow = (window: number): void => {
	if (!Number.isInteger(window) || window <= 0) {
		throw new InvalidArgumentError(
			`RSI window must be a positive integer, got ${window}`
		);
	}
};

const assertCloses = (closes: readonly number[]): void => {
	if (closes.length === 0) {
		throw new InsufficientHistoryError(1, 0, "RSI");
	}
	const badIndex = closes.findIndex((value) => !Number.isFinite(value));
	if (badIndex !== -1) {
		throw new InvalidArgumentError(
			`RSI input must be finite, got ${closes[badIndex]} at index ${badIndex}`
		);
	}
};

/**
 * RSI at every position, with the averages behind it. Index 0 has no
 * preceding close and is `undefined`.
 *
 * Gains and losses are averaged with a plain trailing mean over the last
 * `min(i, window)` deltas, not Wilder's smoothing, so early values are
 * defined but noisier.
 */
export function rsiDetails(
	closes: readonly number[],
	window = DEFAULT_RSI_WINDOW
): (RsiPoint | undefined)[] {
	assertWindow(window);
	assertCloses(closes);

	const deltas = closes.slice(1).map((close, idx) => close - closes[idx]);
	const avgGains = rollingMeanSeries(
		deltas.map((delta) => Math.max(delta, 0)),
		window
	);
	const avgLosses = rollingMeanSeries(
		deltas.map((delta) => Math.max(-delta, 0)),
		window
	);

	const points: (RsiPoint | undefined)[] = [undefined];
	for (let i = 0; i < deltas.length; i += 1) {
		const avgGain = avgGains[i];
		const avgLoss = avgLosses[i];
		points.push({ rsi: rsiFromAverages(avgGain, avgLoss), avgGain, avgLoss });
	}
	return points;
}

/**
 * RSI aligned with `closes`: same length, `undefined` at index 0.
 * @throws InsufficientHistoryError for an empty series
 * @throws InvalidArgumentError for a bad window or a non-finite close
 */
export function computeRsi(
	closes: readonly number[],
	window = DEFAULT_RSI_WINDOW
): RsiValue[] {
	return rsiDetails(closes, window).map((point) => point?.rsi);
}

/**
 * The RSI of the most recent close; what the poll loop classifies.
 * @throws InsufficientHistoryError when fewer than two closes are given
 */
export function latestRsi(
	closes: readonly number[],
	window = DEFAULT_RSI_WINDOW
): number {
	const series = computeRsi(closes, window);
	const last = series[series.length - 1];
	if (last === undefined) {
		throw new InsufficientHistoryError(2, closes.length, "RSI");
	}
	return last;
}
