import type { CandleConfig } from "../config/schema";
import type { Candle, Tick } from "../types";
import { logger } from "../utils/logger";

type OpenBucket = {
	index: number;
	openTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	lastTimestamp: number;
	tickCount: number;
};

function closeBucket(bucket: OpenBucket): Candle {
	return Object.freeze({
		openTime: bucket.openTime,
		open: bucket.open,
		high: bucket.high,
		low: bucket.low,
		close: bucket.close,
		tickCount: bucket.tickCount,
	});
}

/**
 * Buckets ticks into fixed-interval OHLC candles.
 *
 * A bucket stays open until a tick from a strictly later bucket arrives.
 * Closed candles are published as a new frozen array on every close, so a
 * reader holding the previous array never observes a change in place.
 */
export class CandleAggregator {
	private current: OpenBucket | null = null;
	private closed: readonly Candle[] = Object.freeze([]);
	private ticks: Tick[] = [];
	private accepted = 0;
	private dropped = 0;

	constructor(private readonly options: CandleConfig) {}

	get droppedTicks(): number {
		return this.dropped;
	}

	get tickCount(): number {
		return this.accepted;
	}

	/** Returns the candle that closed because of this tick, if any. */
	ingest(tick: Tick): Candle | null {
		if (!Number.isFinite(tick.price) || tick.price <= 0 || !Number.isFinite(tick.timestamp)) {
			this.dropped += 1;
			logger.warn({ tick }, "Dropping malformed tick");
			return null;
		}

		const intervalMs = this.options.intervalSeconds * 1000;
		const index = Math.floor(tick.timestamp / intervalMs);

		if (this.current && index < this.current.index) {
			this.dropped += 1;
			logger.warn(
				{
					tickTime: new Date(tick.timestamp).toISOString(),
					openBucket: new Date(this.current.openTime).toISOString(),
					price: tick.price,
				},
				"Dropping tick for an already closed candle",
			);
			return null;
		}

		this.rememberTick(tick);
		this.accepted += 1;

		if (this.current && index === this.current.index) {
			this.update(this.current, tick);
			return null;
		}

		const finished = this.current ? closeBucket(this.current) : null;
		this.current = {
			index,
			openTime: index * intervalMs,
			open: tick.price,
			high: tick.price,
			low: tick.price,
			close: tick.price,
			lastTimestamp: tick.timestamp,
			tickCount: 1,
		};

		if (finished) {
			this.publish(finished);
		}
		return finished;
	}

	closedCandles(): readonly Candle[] {
		return this.closed;
	}

	latestPrice(): number | null {
		if (this.current) return this.current.close;
		const last = this.closed[this.closed.length - 1];
		return last ? last.close : null;
	}

	lastTick(): Tick | null {
		return this.ticks[this.ticks.length - 1] ?? null;
	}

	recentTicks(): readonly Tick[] {
		return [...this.ticks];
	}

	private update(bucket: OpenBucket, tick: Tick): void {
		bucket.high = Math.max(bucket.high, tick.price);
		bucket.low = Math.min(bucket.low, tick.price);
		bucket.tickCount += 1;
		// late arrivals inside the bucket do not move the close backwards in time
		if (tick.timestamp >= bucket.lastTimestamp) {
			bucket.close = tick.price;
			bucket.lastTimestamp = tick.timestamp;
		}
	}

	private publish(candle: Candle): void {
		const next = [...this.closed, candle];
		const overflow = next.length - this.options.maxCandles;
		this.closed = Object.freeze(overflow > 0 ? next.slice(overflow) : next);
	}

	private rememberTick(tick: Tick): void {
		const last = this.ticks[this.ticks.length - 1];
		if (last && tick.timestamp < last.timestamp) {
			// keep the diagnostic window ordered by feed time
			const at = this.ticks.findIndex((t) => t.timestamp > tick.timestamp);
			this.ticks.splice(at, 0, tick);
		} else {
			this.ticks.push(tick);
		}
		if (this.ticks.length > this.options.recentTicks) {
			this.ticks.splice(0, this.ticks.length - this.options.recentTicks);
		}
	}
}
