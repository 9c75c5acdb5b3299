import { OutcomeError } from "./errors";
import { DecisionJournal } from "./services/decisionJournal";
import { applyOutcome, isOutcomeCommand, OUTCOME_COMMANDS } from "./services/outcomeReporter";
import { StakeManager } from "./services/stakeManager";
import { StakeStore } from "./services/stakeStore";
import { logger } from "./utils/logger";

async function main() {
	const command = process.argv[2]?.toLowerCase();
	if (!isOutcomeCommand(command)) {
		logger.error({ command: command ?? null }, `Usage: report <${OUTCOME_COMMANDS.join("|")}>`);
		process.exitCode = 1;
		return;
	}

	const { config } = await import("./config");
	const stakes = new StakeManager(
		config.stake,
		new StakeStore(config.paths.stakeState, config.stake),
	);
	const applied = await applyOutcome(command, stakes, new DecisionJournal(config.paths));

	if (applied.kind === "reset") {
		logger.info({ stake: applied.state.currentStake }, "Progression reset");
		return;
	}
	const { report } = applied;
	logger.info(
		{
			slug: report.slug,
			result: report.result,
			nextStake: report.state.currentStake,
			streak: report.state.winStreak,
			dailyPnl: report.state.dailyPnl,
		},
		"Outcome reported",
	);
}

main().catch((err) => {
	if (err instanceof OutcomeError) {
		logger.error(err.message);
	} else {
		logger.error({ err }, "Fatal error");
	}
	process.exitCode = 1;
});
