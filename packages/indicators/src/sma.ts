import { InvalidArgumentError } from "@rsiwatch/core";
import { RollingWindow } from "./rollingWindow";

/**
 * Trailing simple mean at every position, over the last `min(i + 1, window)`
 * values. The window shrinks at the start instead of leaving gaps, so every
 * output is defined.
 */
export function rollingMeanSeries(
	values: readonly number[],
	window: number
): number[] {
	if (!Number.isInteger(window) || window <= 0) {
		throw new InvalidArgumentError(
			`Rolling mean window must be a positive integer, got ${window}`
		);
	}

	const rolling = new RollingWindow(window);
	return values.map((value) => {
		rolling.push(value);
		return rolling.mean();
	});
}
