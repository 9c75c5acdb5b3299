/**
 * Exponential moving average with smoothing factor 2 / (period + 1), seeded
 * with the simple average of the first `period` values.
 */
export class Ema {
	private readonly k: number;
	private seedSum = 0;
	private count = 0;
	private current: number | null = null;

	constructor(readonly period: number) {
		if (!Number.isInteger(period) || period <= 0) {
			throw new Error(`EMA period must be a positive integer, got ${period}`);
		}
		this.k = 2 / (period + 1);
	}

	update(value: number): number | null {
		this.count += 1;
		if (this.current === null) {
			this.seedSum += value;
			if (this.count === this.period) {
				this.current = this.seedSum / this.period;
			}
			return this.current;
		}
		this.current = value * this.k + this.current * (1 - this.k);
		return this.current;
	}

	get value(): number | null {
		return this.current;
	}
}
