import type { Observable, Subscription } from "rxjs";
import type { IndicatorEngine } from "../indicators/indicatorEngine";
import type { MarketView, Tick } from "../types";
import { logger } from "../utils/logger";
import type { CandleAggregator } from "./candleAggregator";

/**
 * Single writer of candle and indicator state. The evaluation pass reads it
 * through `view()`, which only hands out immutable values.
 */
export class PriceIngestor {
	constructor(
		private readonly aggregator: CandleAggregator,
		private readonly indicators: IndicatorEngine,
	) {}

	attach(ticks$: Observable<Tick>): Subscription {
		return ticks$.subscribe({
			next: (tick) => this.ingest(tick),
			error: (err) => logger.error({ err }, "Price stream errored"),
			complete: () => logger.info("Price stream completed"),
		});
	}

	ingest(tick: Tick): void {
		const closed = this.aggregator.ingest(tick);
		if (!closed) return;

		const snapshot = this.indicators.onCandleClosed(closed);
		logger.debug(
			{
				openTime: new Date(closed.openTime).toISOString(),
				close: closed.close,
				emaFast: snapshot.emaFast,
				emaSlow: snapshot.emaSlow,
				atr: snapshot.atr,
			},
			"Candle closed",
		);
	}

	view(): MarketView {
		return {
			indicators: this.indicators.snapshot(),
			tickCount: this.aggregator.tickCount,
			lastTick: this.aggregator.lastTick(),
			latestPrice: this.aggregator.latestPrice(),
			closedCandles: this.aggregator.closedCandles(),
		};
	}
}
