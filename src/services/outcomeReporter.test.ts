import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OutcomeError } from "../errors";
import { DecisionJournal } from "./decisionJournal";
import { applyOutcome, isOutcomeCommand } from "./outcomeReporter";
import { StakeManager } from "./stakeManager";
import { StakeStore } from "./stakeStore";

const stakeConfig = { baseStake: 2, maxStake: 1024, maxDailyTrades: 10, maxDailyLoss: 20 };
const trade = { slug: "btc-updown-15m-1737381600", direction: "UP" } as const;

let dir: string;

beforeEach(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), "outcome-"));
});

afterEach(async () => {
	await fs.rm(dir, { recursive: true, force: true });
});

function setup() {
	const stakes = new StakeManager(
		stakeConfig,
		new StakeStore(path.join(dir, "stake.json"), stakeConfig),
		() => Date.UTC(2025, 0, 20, 14, 20, 0),
	);
	const outcomeLog = path.join(dir, "outcomes.log");
	const journal = new DecisionJournal({ decisionLog: path.join(dir, "decisions.log"), outcomeLog });
	return { stakes, journal, outcomeLog };
}

describe("isOutcomeCommand", () => {
	it("accepts only the known commands", () => {
		expect(["win", "loss", "skip", "reset"].every(isOutcomeCommand)).toBe(true);
		expect(isOutcomeCommand("double")).toBe(false);
		expect(isOutcomeCommand(undefined)).toBe(false);
	});
});

describe("applyOutcome", () => {
	it("reports a win and journals it", async () => {
		const { stakes, journal, outcomeLog } = setup();
		await stakes.prepareTrade(trade);

		const applied = await applyOutcome("win", stakes, journal);

		expect(applied.kind === "outcome" && applied.report.state.currentStake).toBe(4);
		const lines = (await fs.readFile(outcomeLog, "utf8")).trim().split("\n");
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0])).toMatchObject({ slug: trade.slug, result: "W", signal: "doubled" });
	});

	it("resets the progression without journalling", async () => {
		const { stakes, journal, outcomeLog } = setup();
		const applied = await applyOutcome("reset", stakes, journal);
		expect(applied).toMatchObject({ kind: "reset", state: { currentStake: 2, winStreak: 0 } });
		await expect(fs.access(outcomeLog)).rejects.toThrow();
	});

	it("fails without a prepared trade and writes nothing", async () => {
		const { stakes, journal, outcomeLog } = setup();
		await expect(applyOutcome("loss", stakes, journal)).rejects.toBeInstanceOf(OutcomeError);
		await expect(fs.access(outcomeLog)).rejects.toThrow();
	});
});
