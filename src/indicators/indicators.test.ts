import { describe, expect, it } from "vitest";
import type { Candle } from "../types";
import { RangeAtr } from "./atr";
import { Ema } from "./ema";
import { IndicatorEngine } from "./indicatorEngine";
import { candlesForMinutes, percentReturn } from "./returns";

const candle = (close: number, high = close, low = close): Candle => ({
	openTime: 0,
	open: close,
	high,
	low,
	close,
	tickCount: 1,
});

describe("Ema", () => {
	it("is undefined until the period is filled, then seeds with the simple average", () => {
		const ema = new Ema(3);
		expect(ema.update(1)).toBeNull();
		expect(ema.update(2)).toBeNull();
		expect(ema.update(3)).toBe(2);
		// k = 0.5
		expect(ema.update(6)).toBe(4);
		expect(ema.value).toBe(4);
	});

	it("rejects a non-positive period", () => {
		expect(() => new Ema(0)).toThrow("EMA period must be a positive integer");
	});
});

describe("RangeAtr", () => {
	it("averages high minus low over the trailing period", () => {
		const atr = new RangeAtr(2);
		expect(atr.update({ high: 10, low: 8 })).toBeNull();
		expect(atr.update({ high: 12, low: 8 })).toBe(3);
		expect(atr.update({ high: 9, low: 9 })).toBe(2);
	});
});

describe("returns", () => {
	it("converts minutes to candles", () => {
		expect(candlesForMinutes(3, 60)).toBe(3);
		expect(candlesForMinutes(5, 30)).toBe(10);
	});

	it("is null without enough history and a percent change otherwise", () => {
		expect(percentReturn([100, 101, 102], 3)).toBeNull();
		expect(percentReturn([100, 101, 102, 110], 3)).toBeCloseTo(10, 10);
		expect(percentReturn([200, 150], 1)).toBe(-25);
	});
});

describe("IndicatorEngine", () => {
	const options = {
		emaFast: 2,
		emaSlow: 3,
		atrPeriod: 2,
		returnPeriods: [1, 2],
		intervalSeconds: 60,
	};

	it("reports every indicator as undefined before enough candles", () => {
		const engine = new IndicatorEngine(options);
		expect(engine.snapshot()).toEqual({
			candleCount: 0,
			close: null,
			emaFast: null,
			emaSlow: null,
			atr: null,
			returns: { 1: null, 2: null },
		});
	});

	it("fills indicators as candles close", () => {
		const engine = new IndicatorEngine(options);
		engine.onCandleClosed(candle(100, 101, 99));
		const second = engine.onCandleClosed(candle(110, 112, 108));
		expect(second.emaFast).toBe(105);
		expect(second.emaSlow).toBeNull();
		expect(second.atr).toBe(3);
		expect(second.returns[1]).toBeCloseTo(10, 10);
		expect(second.returns[2]).toBeNull();

		const third = engine.onCandleClosed(candle(120));
		expect(third.candleCount).toBe(3);
		expect(third.close).toBe(120);
		expect(third.emaSlow).toBe(110);
		expect(third.returns[2]).toBeCloseTo(20, 10);
		expect(engine.snapshot()).toBe(third);
	});

	it("uses the smallest lookback as the short period", () => {
		expect(new IndicatorEngine({ ...options, returnPeriods: [5, 3] }).shortPeriod).toBe(3);
	});
});
