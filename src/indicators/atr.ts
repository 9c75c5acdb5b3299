import type { Candle } from "../types";

/**
 * Average true range over the trailing `period` candles where true range is
 * `high - low`. The previous-close term is left out: every candle here is
 * built from one continuous feed, and including it would change decision
 * outputs.
 */
export class RangeAtr {
	private readonly ranges: number[] = [];

	constructor(readonly period: number) {
		if (!Number.isInteger(period) || period <= 0) {
			throw new Error(`ATR period must be a positive integer, got ${period}`);
		}
	}

	update(candle: Pick<Candle, "high" | "low">): number | null {
		this.ranges.push(candle.high - candle.low);
		if (this.ranges.length > this.period) {
			this.ranges.shift();
		}
		return this.value;
	}

	get value(): number | null {
		if (this.ranges.length < this.period) return null;
		const sum = this.ranges.reduce((acc, val) => acc + val, 0);
		return sum / this.period;
	}
}
