import type { DecisionJournal } from "./decisionJournal";
import type { OutcomeReport, StakeManager } from "./stakeManager";
import type { StakeState } from "./stakeStore";

export const OUTCOME_COMMANDS = ["win", "loss", "skip", "reset"] as const;
export type OutcomeCommand = (typeof OUTCOME_COMMANDS)[number];

export function isOutcomeCommand(value: string | undefined): value is OutcomeCommand {
	return OUTCOME_COMMANDS.some((command) => command === value);
}

export type OutcomeApplied =
	| { kind: "outcome"; report: OutcomeReport }
	| { kind: "reset"; state: StakeState };

type Stakes = Pick<StakeManager, "reportWin" | "reportLoss" | "reportSkip" | "resetProgression">;

/** Applies an operator command to the stake state; outcomes are also journalled. */
export async function applyOutcome(
	command: OutcomeCommand,
	stakes: Stakes,
	journal: Pick<DecisionJournal, "recordOutcome">,
): Promise<OutcomeApplied> {
	if (command === "reset") {
		return { kind: "reset", state: await stakes.resetProgression() };
	}

	const report =
		command === "win"
			? await stakes.reportWin()
			: command === "loss"
				? await stakes.reportLoss()
				: await stakes.reportSkip();
	await journal.recordOutcome(report, report.state.updatedAt);
	return { kind: "outcome", report };
}
