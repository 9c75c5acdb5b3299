import type { Abort, Decision, Round, StakeQuote } from "../types";
import { logger } from "../utils/logger";
import { appendLine } from "../utils/storage";
import type { OutcomeReport } from "./stakeManager";

export type JournalPaths = {
	decisionLog: string;
	outcomeLog: string;
};

export type DecisionEntry = {
	at: string;
	round: Pick<Round, "asset" | "slug" | "source" | "priceToBeat">;
	result: Decision | Abort;
	stake: StakeQuote | null;
	indicators: {
		emaFast: number | null;
		emaSlow: number | null;
		atr: number | null;
		returns: Record<number, number | null>;
	};
};

/** Append-only JSON-lines record of decisions and reported outcomes. */
export class DecisionJournal {
	constructor(private readonly paths: JournalPaths) {}

	async recordDecision(entry: DecisionEntry): Promise<void> {
		await appendLine(this.paths.decisionLog, JSON.stringify(entry));
		logger.debug({ slug: entry.round.slug, kind: entry.result.kind }, "Decision recorded");
	}

	async recordOutcome(report: OutcomeReport, at: string): Promise<void> {
		const { state, ...rest } = report;
		await appendLine(
			this.paths.outcomeLog,
			JSON.stringify({
				at,
				...rest,
				after: { currentStake: state.currentStake, winStreak: state.winStreak },
				daily: {
					date: state.dailyDate,
					trades: state.dailyTradeCount,
					wins: state.dailyWins,
					losses: state.dailyLosses,
					pnl: state.dailyPnl,
				},
			}),
		);
		logger.info({ slug: report.slug, result: report.result }, "Outcome recorded");
	}
}
