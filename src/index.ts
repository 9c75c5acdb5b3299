import cron from "node-cron";
import { GammaRoundSource } from "./clients/gamma";
import { createHttpGet } from "./clients/http";
import { LiveViewRoundSource } from "./clients/liveView";
import { createPriceFeed } from "./clients/rtds";
import { createTelegramNotifier } from "./clients/telegram";
import type { AppConfig } from "./config/schema";
import { IndicatorEngine } from "./indicators/indicatorEngine";
import { CandleAggregator } from "./services/candleAggregator";
import { DecisionJournal } from "./services/decisionJournal";
import { DecisionEngine } from "./services/decisionEngine";
import { type CycleDeps, type CycleResult, runEvaluationCycle } from "./services/evaluationCycle";
import { PriceIngestor } from "./services/priceIngestor";
import { watchRounds } from "./services/roundWatcher";
import { StakeManager } from "./services/stakeManager";
import { StakeStore } from "./services/stakeStore";
import { logger } from "./utils/logger";
import { sleep, systemClock } from "./utils/time";

const WARMUP_MS = 60_000;

function describe(result: CycleResult): string {
	switch (result.kind) {
		case "no_round":
			return "No live round";
		case "outside_window":
			return `Outside trade window (${result.secondsRemaining}s left)`;
		case "abort":
			return `Aborted: ${result.abort.reason} (${result.abort.detail})`;
		case "blocked":
			return `${result.decision.direction} but blocked: ${result.quote.detail}`;
		case "ready":
			return `${result.decision.direction} for ${result.stake.toFixed(2)} USD, awaiting your confirmation`;
	}
}

function scheduleDailyRollover(stakes: StakeManager) {
	return cron.schedule(
		"0 0 * * *", // 00:00 UTC
		() => {
			stakes
				.snapshot()
				.then((state) =>
					logger.info(
						{ day: state.dailyDate, stake: state.currentStake, streak: state.winStreak },
						"Daily stake rollover",
					),
				)
				.catch((err) => logger.error({ err }, "Daily rollover failed"));
		},
		{ timezone: "UTC" },
	);
}

async function bootstrap(config: AppConfig) {
	const { asset } = config;
	logger.info(
		{ asset: asset.symbol, watch: config.watch.enabled },
		`Starting ${asset.displayName} up/down advisor`,
	);

	const aggregator = new CandleAggregator(config.candles);
	const indicators = new IndicatorEngine(config.indicators);
	const ingestor = new PriceIngestor(aggregator, indicators);
	const feed = ingestor.attach(
		createPriceFeed({ url: config.api.rtdsUrl, symbol: asset.feedSymbol }),
	);

	const http = createHttpGet(config.discovery.timeoutMs);
	const stakes = new StakeManager(
		config.stake,
		new StakeStore(config.paths.stakeState, config.stake),
	);
	const initial = await stakes.snapshot();
	logger.info(
		{
			stake: initial.currentStake,
			streak: initial.winStreak,
			dailyTrades: initial.dailyTradeCount,
			pending: initial.pendingTrade?.slug ?? null,
		},
		"Stake state loaded",
	);

	const deps: CycleDeps = {
		asset,
		sources: [
			new GammaRoundSource(http, {
				baseUrl: config.api.gammaUrl,
				pageSize: config.discovery.pageSize,
				maxPages: config.discovery.maxPages,
				minCandidates: config.discovery.minCandidates,
			}),
			new LiveViewRoundSource(http, config.api.liveViewUrl),
		],
		locator: {
			timeoutMs: config.discovery.timeoutMs,
			marketBaseUrl: config.api.marketBaseUrl,
		},
		market: ingestor,
		engine: new DecisionEngine({
			...config.strategy,
			minPlausiblePrice: asset.minPlausiblePrice,
			shortReturnPeriod: indicators.shortPeriod,
		}),
		stakes,
		tradeWindow: config.strategy,
		clock: systemClock,
		journal: new DecisionJournal(config.paths),
		notifier: createTelegramNotifier(config.telegram),
	};

	logger.info({ seconds: WARMUP_MS / 1000 }, "Collecting initial price data");
	await sleep(WARMUP_MS);
	logger.info(
		{
			ticks: aggregator.tickCount,
			dropped: aggregator.droppedTicks,
			candles: aggregator.closedCandles().length,
		},
		"Warm-up finished",
	);

	if (!config.watch.enabled) {
		const result = await runEvaluationCycle(deps);
		logger.info({ kind: result.kind }, describe(result));
		feed.unsubscribe();
		return;
	}

	const rollover = scheduleDailyRollover(stakes);
	const watch = watchRounds(
		() => runEvaluationCycle(deps),
		config.watch.intervalSec * 1000,
	).subscribe({
		next: (result) => logger.info({ kind: result.kind }, describe(result)),
		error: (err) => logger.error({ err }, "Watch loop errored"),
	});

	const stop = () => {
		logger.info("Shutdown signal received");
		watch.unsubscribe();
		feed.unsubscribe();
		rollover.stop();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);
}

async function main() {
	// config errors are fatal and surface before anything starts
	const { config } = await import("./config");
	await bootstrap(config);
}

main().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
