import { describe, expect, it } from "vitest";
import type { Tick } from "../types";
import { CandleAggregator } from "./candleAggregator";

const T0 = Date.UTC(2025, 0, 20, 12, 0, 0);

const at = (seconds: number, price: number): Tick => ({ timestamp: T0 + seconds * 1000, price });

function aggregator(overrides: Partial<{ maxCandles: number; recentTicks: number }> = {}) {
	return new CandleAggregator({
		intervalSeconds: 60,
		maxCandles: overrides.maxCandles ?? 100,
		recentTicks: overrides.recentTicks ?? 10,
	});
}

describe("CandleAggregator", () => {
	it("builds OHLC from ticks in one bucket and closes it on the next bucket", () => {
		const agg = aggregator();
		expect(agg.ingest(at(0, 100))).toBeNull();
		expect(agg.ingest(at(10, 105))).toBeNull();
		expect(agg.ingest(at(20, 98))).toBeNull();
		expect(agg.ingest(at(59, 101))).toBeNull();

		const closed = agg.ingest(at(60, 102));
		expect(closed).toEqual({
			openTime: T0,
			open: 100,
			high: 105,
			low: 98,
			close: 101,
			tickCount: 4,
		});
		expect(agg.closedCandles()).toHaveLength(1);
		expect(agg.latestPrice()).toBe(102);
	});

	it("produces the same candles when the same ticks are replayed", () => {
		const ticks = [at(0, 10), at(30, 12), at(61, 11), at(90, 9), at(125, 13), at(185, 14)];
		const first = aggregator();
		const second = aggregator();
		for (const tick of ticks) first.ingest(tick);
		for (const tick of ticks) second.ingest(tick);
		expect(second.closedCandles()).toEqual(first.closedCandles());
		expect(first.closedCandles().map((c) => c.close)).toEqual([12, 9, 13]);
	});

	it("drops ticks that belong to an already closed bucket", () => {
		const agg = aggregator();
		agg.ingest(at(0, 100));
		agg.ingest(at(61, 101));
		expect(agg.ingest(at(30, 50))).toBeNull();
		expect(agg.droppedTicks).toBe(1);
		expect(agg.tickCount).toBe(2);
		expect(agg.closedCandles()[0].low).toBe(100);
	});

	it("keeps the close on the latest timestamp when ticks arrive late within a bucket", () => {
		const agg = aggregator();
		agg.ingest(at(0, 100));
		agg.ingest(at(40, 104));
		agg.ingest(at(20, 97));
		const closed = agg.ingest(at(60, 103));
		expect(closed?.close).toBe(104);
		expect(closed?.low).toBe(97);
	});

	it("rejects malformed ticks", () => {
		const agg = aggregator();
		expect(agg.ingest({ timestamp: T0, price: Number.NaN })).toBeNull();
		expect(agg.ingest({ timestamp: T0, price: 0 })).toBeNull();
		expect(agg.droppedTicks).toBe(2);
		expect(agg.latestPrice()).toBeNull();
		expect(agg.lastTick()).toBeNull();
	});

	it("evicts the oldest candles beyond the cap", () => {
		const agg = aggregator({ maxCandles: 2 });
		for (let minute = 0; minute <= 4; minute++) {
			agg.ingest(at(minute * 60, 100 + minute));
		}
		expect(agg.closedCandles().map((c) => c.open)).toEqual([102, 103]);
	});

	it("publishes a new array instead of changing one a reader already holds", () => {
		const agg = aggregator();
		agg.ingest(at(0, 100));
		agg.ingest(at(60, 101));
		const held = agg.closedCandles();
		agg.ingest(at(120, 102));
		expect(held).toHaveLength(1);
		expect(Object.isFrozen(held)).toBe(true);
		expect(Object.isFrozen(held[0])).toBe(true);
		expect(agg.closedCandles()).toHaveLength(2);
	});

	it("keeps recent ticks ordered and capped", () => {
		const agg = aggregator({ recentTicks: 3 });
		agg.ingest(at(0, 1));
		agg.ingest(at(10, 2));
		agg.ingest(at(5, 3));
		agg.ingest(at(20, 4));
		expect(agg.recentTicks().map((t) => t.price)).toEqual([3, 2, 4]);
		expect(agg.lastTick()).toEqual(at(20, 4));
	});
});
