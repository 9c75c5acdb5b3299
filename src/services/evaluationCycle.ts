import type { Notifier } from "../clients/telegram";
import type { AssetConfig, StrategyConfig } from "../config/schema";
import type { Abort, Decision, MarketView, Round, StakeQuote } from "../types";
import { logger } from "../utils/logger";
import type { Clock } from "../utils/time";
import type { DecisionJournal } from "./decisionJournal";
import { type DecisionEngine, isWithinTradeWindow } from "./decisionEngine";
import { findLiveRound, type LocatorOptions, type RoundSource } from "./roundLocator";
import type { StakeManager } from "./stakeManager";

export type CycleDeps = {
	asset: AssetConfig;
	sources: readonly RoundSource[];
	locator: LocatorOptions;
	market: { view(): MarketView };
	engine: DecisionEngine;
	stakes: Pick<StakeManager, "prepareTrade">;
	tradeWindow: Pick<StrategyConfig, "minSecondsBeforeClose" | "maxSecondsBeforeClose">;
	clock: Clock;
	journal?: Pick<DecisionJournal, "recordDecision">;
	notifier?: Notifier;
};

type BlockedQuote = Extract<StakeQuote, { status: "blocked" }>;

export type CycleResult =
	| { kind: "no_round" }
	| { kind: "outside_window"; round: Round; secondsRemaining: number }
	| { kind: "abort"; round: Round; abort: Abort }
	| { kind: "blocked"; round: Round; decision: Decision; quote: BlockedQuote }
	| { kind: "ready"; round: Round; decision: Decision; stake: number };

export function secondsUntil(endTime: number, now: number): number {
	return Math.max(0, Math.floor((endTime - now) / 1000));
}

function formatReadyMessage(round: Round, decision: Decision, stake: number): string {
	return [
		`${round.asset} ${decision.direction} for ${stake.toFixed(2)} USD`,
		`Round: ${round.slug}`,
		`Price: ${decision.currentPrice.toFixed(2)} vs target ${decision.targetPrice.toFixed(2)}`,
		`Left: ${decision.secondsRemaining}s`,
		`Why: ${decision.rationale}`,
		`Confirm in the market page yourself, then report win/loss/skip.`,
	].join("\n");
}

async function bestEffort(task: Promise<void>, what: string): Promise<void> {
	try {
		await task;
	} catch (err) {
		logger.error({ err }, `Failed to ${what}`);
	}
}

/**
 * One evaluation pass: locate the live round, decide, and size the trade.
 * Nothing is submitted; a ready result is only offered to a human.
 */
export async function runEvaluationCycle(deps: CycleDeps): Promise<CycleResult> {
	const round = await findLiveRound(deps.asset, deps.sources, deps.clock(), deps.locator);
	if (!round) return { kind: "no_round" };

	const now = deps.clock();
	const secondsRemaining = secondsUntil(round.endTime, now);
	const { minSecondsBeforeClose, maxSecondsBeforeClose } = deps.tradeWindow;
	if (!isWithinTradeWindow(secondsRemaining, minSecondsBeforeClose, maxSecondsBeforeClose)) {
		logger.info(
			{ slug: round.slug, secondsRemaining, minSecondsBeforeClose, maxSecondsBeforeClose },
			"Outside trade window; skipping",
		);
		return { kind: "outside_window", round, secondsRemaining };
	}

	const market = deps.market.view();
	const result = deps.engine.decide({
		round,
		currentPrice: market.latestPrice,
		secondsRemaining,
		market,
		now,
	});

	const record = (stake: StakeQuote | null) =>
		deps.journal
			? bestEffort(
					deps.journal.recordDecision({
						at: new Date(now).toISOString(),
						round: {
							asset: round.asset,
							slug: round.slug,
							source: round.source,
							priceToBeat: round.priceToBeat,
						},
						result,
						stake,
						indicators: {
							emaFast: market.indicators.emaFast,
							emaSlow: market.indicators.emaSlow,
							atr: market.indicators.atr,
							returns: market.indicators.returns,
						},
					}),
					"record decision",
				)
			: Promise.resolve();

	if (result.kind === "abort") {
		logger.warn({ slug: round.slug, reason: result.reason, detail: result.detail }, "Decision aborted");
		await record(null);
		return { kind: "abort", round, abort: result };
	}

	logger.info(
		{ slug: round.slug, direction: result.direction, rule: result.rule, rationale: result.rationale },
		"Decision made",
	);

	const quote = await deps.stakes.prepareTrade({ slug: round.slug, direction: result.direction });
	await record(quote);

	if (quote.status === "blocked") {
		logger.warn({ slug: round.slug, reason: quote.reason, detail: quote.detail }, "Trade blocked");
		return { kind: "blocked", round, decision: result, quote };
	}

	if (deps.notifier) {
		await bestEffort(
			deps.notifier.send(formatReadyMessage(round, result, quote.stake)),
			"send notification",
		);
	}
	return { kind: "ready", round, decision: result, stake: quote.stake };
}
