/**
 * Fixed-size window over the most recent values
 */
export class RollingWindow {
	private readonly values: number[] = [];
	private total = 0;

	constructor(private readonly size: number) {
		if (!Number.isInteger(size) || size < 1) {
			throw new RangeError(`Window size must be a positive integer, got ${size}`);
		}
	}

	push(value: number): void {
		this.values.push(value);
		this.total += value;
		if (this.values.length > this.size) {
			this.total -= this.values.shift() ?? 0;
		}
	}

	get length(): number {
		return this.values.length;
	}

	get sum(): number {
		return this.total;
	}

	/** Mean over the values held; 0 when empty */
	get mean(): number {
		return this.values.length ? this.total / this.values.length : 0;
	}
}
