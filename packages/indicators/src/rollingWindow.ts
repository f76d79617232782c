import { InvalidArgumentError } from "@rsiwatch/core";

/**
 * Fixed-capacity ring buffer with a running sum over its contents.
 *
 * Until `capacity` values have been pushed the window simply grows, so
 * `mean()` is the average of whatever is available (minimum one value).
 * Once full, each push evicts the oldest value.
 *
 * The running sum is snapped to exactly 0 whenever every buffered value is
 * zero; add/subtract drift would otherwise leave a residue like 1e-17.
 */
export class RollingWindow {
	private readonly buffer: Float64Array;
	private head = 0;
	private count = 0;
	private total = 0;
	private nonZero = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new InvalidArgumentError(
				`Rolling window capacity must be a positive integer, got ${capacity}`
			);
		}
		this.buffer = new Float64Array(capacity);
	}

	get size(): number {
		return this.count;
	}

	push(value: number): void {
		if (this.count === this.capacity) {
			const evicted = this.buffer[this.head];
			this.total -= evicted;
			if (evicted !== 0) {
				this.nonZero -= 1;
			}
		} else {
			this.count += 1;
		}

		this.buffer[this.head] = value;
		this.head = (this.head + 1) % this.capacity;
		this.total += value;
		if (value !== 0) {
			this.nonZero += 1;
		}
		if (this.nonZero === 0) {
			this.total = 0;
		}
	}

	sum(): number {
		return this.total;
	}

	/** `NaN` while empty. */
	mean(): number {
		return this.count === 0 ? Number.NaN : this.total / this.count;
	}

	values(): number[] {
		const start = this.count === this.capacity ? this.head : 0;
		return Array.from(
			{ length: this.count },
			(_, idx) => this.buffer[(start + idx) % this.capacity]
		);
	}
}
