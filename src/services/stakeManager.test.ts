import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { StakeConfig } from "../config/schema";
import { OutcomeError } from "../errors";
import { StakeManager } from "./stakeManager";
import { StakeStore } from "./stakeStore";

const config: StakeConfig = {
	baseStake: 2,
	maxStake: 1024,
	maxDailyTrades: 10,
	maxDailyLoss: 20,
};

let dir: string;
let now: number;

beforeEach(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), "stake-manager-"));
	now = Date.UTC(2025, 0, 20, 12, 0, 0);
});

afterEach(async () => {
	await fs.rm(dir, { recursive: true, force: true });
});

function manager(overrides: Partial<StakeConfig> = {}) {
	const merged = { ...config, ...overrides };
	return new StakeManager(
		merged,
		new StakeStore(path.join(dir, "stake.json"), merged),
		() => now,
	);
}

const trade = { slug: "btc-updown-15m-1737381600", direction: "UP" } as const;

describe("StakeManager", () => {
	it("starts at the base stake", async () => {
		const stakes = manager();
		expect(await stakes.nextStake()).toEqual({ status: "ok", stake: 2 });
		const state = await stakes.snapshot();
		expect(state.winStreak).toBe(0);
		expect(state.dailyDate).toBe("2025-01-20");
	});

	it("doubles on wins and resets on a loss", async () => {
		const stakes = manager();
		const stakesSeen = [(await stakes.snapshot()).currentStake];
		const streaks = [0];
		for (const result of ["W", "W", "L", "W"]) {
			await stakes.prepareTrade(trade);
			const report = result === "W" ? await stakes.reportWin() : await stakes.reportLoss();
			stakesSeen.push(report.state.currentStake);
			streaks.push(report.state.winStreak);
		}
		expect(stakesSeen).toEqual([2, 4, 8, 2, 4]);
		expect(streaks).toEqual([0, 1, 2, 0, 1]);

		const state = await stakes.snapshot();
		expect(state.dailyTradeCount).toBe(4);
		expect(state.dailyWins).toBe(3);
		expect(state.dailyLosses).toBe(1);
		expect(state.dailyLoss).toBe(8);
		// +2 +4 -8 +2
		expect(state.dailyPnl).toBe(0);
	});

	it("returns to the base stake when the win streak reaches its cap", async () => {
		const stakes = manager({ baseStake: 1, maxStake: 1_000_000, maxDailyTrades: 100 });
		for (let i = 0; i < 14; i++) {
			await stakes.prepareTrade(trade);
			await stakes.reportWin();
		}
		expect((await stakes.snapshot()).currentStake).toBe(16384);

		await stakes.prepareTrade(trade);
		const report = await stakes.reportWin();
		expect(report.signal).toBe("streak_reset");
		expect(report.state.currentStake).toBe(1);
		expect(report.state.winStreak).toBe(0);
	});

	it("halts when doubling would pass the maximum, until reset", async () => {
		const stakes = manager({ maxStake: 5 });
		await stakes.prepareTrade(trade);
		await stakes.reportWin();
		await stakes.prepareTrade(trade);
		const report = await stakes.reportWin();

		expect(report.signal).toBe("limit_reached");
		expect(report.state.currentStake).toBe(4);
		expect(report.state.winStreak).toBe(2);
		expect(await stakes.prepareTrade(trade)).toMatchObject({ status: "blocked", reason: "stake_limit" });

		const reset = await stakes.resetProgression();
		expect(reset.currentStake).toBe(2);
		expect(reset.winStreak).toBe(0);
		expect(await stakes.prepareTrade(trade)).toEqual({ status: "ok", stake: 2 });
	});

	it("blocks once the daily trade count is reached", async () => {
		const stakes = manager({ maxDailyTrades: 2 });
		for (let i = 0; i < 2; i++) {
			await stakes.prepareTrade(trade);
			await stakes.reportLoss();
		}
		expect(await stakes.nextStake()).toEqual({
			status: "blocked",
			reason: "daily_trade_limit",
			detail: "daily trade limit reached (2/2)",
		});
	});

	it("blocks once the daily loss is reached", async () => {
		const stakes = manager({ maxDailyLoss: 3 });
		for (let i = 0; i < 2; i++) {
			await stakes.prepareTrade(trade);
			await stakes.reportLoss();
		}
		expect(await stakes.nextStake()).toMatchObject({ status: "blocked", reason: "daily_loss_limit" });
	});

	it("rolls daily counters over at the UTC day boundary and keeps the progression", async () => {
		now = Date.UTC(2025, 0, 20, 23, 59, 0);
		const stakes = manager();
		await stakes.prepareTrade(trade);
		await stakes.reportWin();

		now = Date.UTC(2025, 0, 21, 0, 1, 0);
		const state = await stakes.snapshot();
		expect(state.dailyDate).toBe("2025-01-21");
		expect(state.dailyTradeCount).toBe(0);
		expect(state.dailyPnl).toBe(0);
		expect(state.currentStake).toBe(4);
		expect(state.winStreak).toBe(1);
	});

	it("refuses to report an outcome without a prepared trade", async () => {
		const stakes = manager();
		await expect(stakes.reportWin()).rejects.toBeInstanceOf(OutcomeError);
		await expect(stakes.reportLoss()).rejects.toThrow("cannot report L: no trade was prepared");
	});

	it("blocks a second trade while an outcome is pending", async () => {
		const stakes = manager();
		await stakes.prepareTrade(trade);
		expect(await stakes.prepareTrade({ ...trade, slug: "btc-updown-15m-1737382500" })).toMatchObject({
			status: "blocked",
			reason: "pending_outcome",
		});
	});

	it("leaves the progression untouched on a skip", async () => {
		const stakes = manager();
		await stakes.prepareTrade(trade);
		await stakes.reportWin();
		await stakes.prepareTrade(trade);
		const report = await stakes.reportSkip();

		expect(report.signal).toBe("skipped");
		expect(report.stakeUsed).toBe(4);
		expect(report.state.currentStake).toBe(4);
		expect(report.state.winStreak).toBe(1);
		expect(report.state.dailyTradeCount).toBe(1);
		expect(report.state.pendingTrade).toBeNull();
		expect(report.state.lastResult).toBe("S");
	});

	it("persists across instances", async () => {
		await manager().prepareTrade(trade);
		const report = await manager().reportWin();
		expect(report.slug).toBe(trade.slug);
		expect((await manager().snapshot()).currentStake).toBe(4);
	});

	it("applies a rollover and a prepared trade that arrive together", async () => {
		const stakes = manager();
		await stakes.snapshot();

		now = Date.UTC(2025, 0, 21, 0, 0, 1);
		const [rolled, quote] = await Promise.all([stakes.snapshot(), stakes.prepareTrade(trade)]);

		expect(rolled.dailyDate).toBe("2025-01-21");
		expect(quote).toEqual({ status: "ok", stake: 2 });
		const state = await stakes.snapshot();
		expect(state.dailyDate).toBe("2025-01-21");
		expect(state.pendingTrade).toMatchObject({ slug: trade.slug, stake: 2 });
		expect(await fs.readdir(dir)).toEqual(["stake.json"]);
	});

	it("keeps serving calls after one of them fails", async () => {
		const stakes = manager();
		const [failed, quote] = await Promise.allSettled([stakes.reportWin(), stakes.prepareTrade(trade)]);
		expect(failed.status).toBe("rejected");
		expect(quote).toEqual({ status: "fulfilled", value: { status: "ok", stake: 2 } });
	});
});
