import type { IndicatorConfig } from "../config/schema";
import type { Candle, IndicatorSnapshot } from "../types";
import { RangeAtr } from "./atr";
import { Ema } from "./ema";
import { candlesForMinutes, percentReturn } from "./returns";

/** Incrementally maintained EMA pair, ATR and multi-period returns over closed candles. */
export class IndicatorEngine {
	private readonly fast: Ema;
	private readonly slow: Ema;
	private readonly atr: RangeAtr;
	private readonly lookbacks: Array<{ minutes: number; candles: number }>;
	private readonly closes: number[] = [];
	private readonly keep: number;
	private count = 0;
	private latest: IndicatorSnapshot;

	constructor(private readonly options: IndicatorConfig) {
		this.fast = new Ema(options.emaFast);
		this.slow = new Ema(options.emaSlow);
		this.atr = new RangeAtr(options.atrPeriod);
		this.lookbacks = options.returnPeriods.map((minutes) => ({
			minutes,
			candles: candlesForMinutes(minutes, options.intervalSeconds),
		}));
		this.keep = Math.max(...this.lookbacks.map((l) => l.candles)) + 1;
		this.latest = this.build(null);
	}

	onCandleClosed(candle: Candle): IndicatorSnapshot {
		this.count += 1;
		this.fast.update(candle.close);
		this.slow.update(candle.close);
		this.atr.update(candle);
		this.closes.push(candle.close);
		if (this.closes.length > this.keep) {
			this.closes.shift();
		}
		this.latest = this.build(candle.close);
		return this.latest;
	}

	snapshot(): IndicatorSnapshot {
		return this.latest;
	}

	/** The lookback (minutes) used as the short-period trend confirmation. */
	get shortPeriod(): number {
		return Math.min(...this.options.returnPeriods);
	}

	private build(close: number | null): IndicatorSnapshot {
		const returns: Record<number, number | null> = {};
		for (const { minutes, candles } of this.lookbacks) {
			returns[minutes] = percentReturn(this.closes, candles);
		}
		return Object.freeze({
			candleCount: this.count,
			close,
			emaFast: this.fast.value,
			emaSlow: this.slow.value,
			atr: this.atr.value,
			returns: Object.freeze(returns),
		});
	}
}
