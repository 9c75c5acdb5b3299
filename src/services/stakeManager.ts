import type { StakeConfig } from "../config/schema";
import { OutcomeError } from "../errors";
import type { Direction, StakeQuote, TradeResult } from "../types";
import { logger } from "../utils/logger";
import { type Clock, systemClock, utcDay } from "../utils/time";
import {
	defaultStakeState,
	MAX_WIN_STREAK,
	type StakeState,
	type StakeStore,
} from "./stakeStore";

export type OutcomeSignal = "doubled" | "streak_reset" | "limit_reached" | "reset" | "skipped";

export type OutcomeReport = {
	result: TradeResult;
	signal: OutcomeSignal;
	stakeUsed: number;
	pnl: number;
	slug: string;
	direction: Direction;
	before: Pick<StakeState, "currentStake" | "winStreak">;
	state: StakeState;
};

/**
 * Doubling progression with daily limits. Stake doubles on a reported win,
 * returns to base on a loss or when the streak cap is hit; a win whose double
 * would pass the maximum halts the progression until an operator resets it.
 */
export class StakeManager {
	constructor(
		private readonly config: StakeConfig,
		private readonly store: StakeStore,
		private readonly clock: Clock = systemClock,
	) {}

	// every read-modify-write of the state file runs one at a time
	private queue: Promise<unknown> = Promise.resolve();

	private serialize<T>(task: () => Promise<T>): Promise<T> {
		const run = this.queue.then(task, task);
		this.queue = run.catch(() => undefined);
		return run;
	}

	/** Current persisted state, with daily counters rolled over when the UTC day changed. */
	snapshot(): Promise<StakeState> {
		return this.serialize(() => this.current());
	}

	private async current(): Promise<StakeState> {
		const now = this.clock();
		const today = utcDay(now);
		const stored = await this.store.load(() =>
			defaultStakeState(this.config, today, new Date(now).toISOString()),
		);

		if (stored.dailyDate === today) return stored;

		const rolled: StakeState = {
			...stored,
			dailyDate: today,
			dailyTradeCount: 0,
			dailyLoss: 0,
			dailyPnl: 0,
			dailyWins: 0,
			dailyLosses: 0,
			updatedAt: new Date(now).toISOString(),
		};
		await this.store.save(rolled);
		logger.info(
			{
				previousDay: stored.dailyDate || null,
				day: today,
				trades: stored.dailyTradeCount,
				pnl: stored.dailyPnl,
			},
			"Reset daily stake counters",
		);
		return rolled;
	}

	async nextStake(): Promise<StakeQuote> {
		return this.quote(await this.snapshot());
	}

	/** Records the trade about to be offered so that its outcome can be reported later. */
	prepareTrade(trade: { slug: string; direction: Direction }): Promise<StakeQuote> {
		return this.serialize(() => this.prepare(trade));
	}

	reportWin(): Promise<OutcomeReport> {
		return this.serialize(() => this.win());
	}

	reportLoss(): Promise<OutcomeReport> {
		return this.serialize(() => this.loss());
	}

	reportSkip(): Promise<OutcomeReport> {
		return this.serialize(() => this.skip());
	}

	/** Operator action after a `stake_limit` halt: back to base stake and a zero streak. */
	resetProgression(): Promise<StakeState> {
		return this.serialize(() => this.reset());
	}

	private async prepare(trade: { slug: string; direction: Direction }): Promise<StakeQuote> {
		const state = await this.current();
		const quote = this.quote(state);
		if (quote.status === "blocked") return quote;

		if (state.pendingTrade) {
			return {
				status: "blocked",
				reason: "pending_outcome",
				detail: `outcome of ${state.pendingTrade.slug} (${state.pendingTrade.direction}) not reported yet`,
			};
		}

		const now = new Date(this.clock()).toISOString();
		await this.store.save({
			...state,
			pendingTrade: {
				slug: trade.slug,
				direction: trade.direction,
				stake: quote.stake,
				preparedAt: now,
			},
			updatedAt: now,
		});
		logger.info({ ...trade, stake: quote.stake }, "Prepared trade");
		return quote;
	}

	private async win(): Promise<OutcomeReport> {
		const state = await this.current();
		const pending = this.requirePending(state, "W");
		const streak = state.winStreak + 1;
		const doubled = state.currentStake * 2;

		let next: Pick<StakeState, "currentStake" | "winStreak" | "haltReason">;
		let signal: OutcomeSignal;
		if (streak >= MAX_WIN_STREAK) {
			next = { currentStake: this.config.baseStake, winStreak: 0, haltReason: null };
			signal = "streak_reset";
		} else if (doubled > this.config.maxStake) {
			next = { currentStake: state.currentStake, winStreak: streak, haltReason: "stake_limit" };
			signal = "limit_reached";
		} else {
			next = { currentStake: doubled, winStreak: streak, haltReason: null };
			signal = "doubled";
		}

		return this.commit(state, "W", signal, pending.stake, {
			...next,
			dailyTradeCount: state.dailyTradeCount + 1,
			dailyWins: state.dailyWins + 1,
			dailyPnl: state.dailyPnl + pending.stake,
		});
	}

	private async loss(): Promise<OutcomeReport> {
		const state = await this.current();
		const pending = this.requirePending(state, "L");
		return this.commit(state, "L", "reset", -pending.stake, {
			currentStake: this.config.baseStake,
			winStreak: 0,
			haltReason: null,
			dailyTradeCount: state.dailyTradeCount + 1,
			dailyLosses: state.dailyLosses + 1,
			dailyLoss: state.dailyLoss + pending.stake,
			dailyPnl: state.dailyPnl - pending.stake,
		});
	}

	private async skip(): Promise<OutcomeReport> {
		const state = await this.current();
		this.requirePending(state, "S");
		return this.commit(state, "S", "skipped", 0, {});
	}

	private async reset(): Promise<StakeState> {
		const state = await this.current();
		const next: StakeState = {
			...state,
			currentStake: this.config.baseStake,
			winStreak: 0,
			haltReason: null,
			updatedAt: new Date(this.clock()).toISOString(),
		};
		await this.store.save(next);
		logger.warn(
			{ previousStake: state.currentStake, previousStreak: state.winStreak },
			"Stake progression reset by operator",
		);
		return next;
	}

	private quote(state: StakeState): StakeQuote {
		const { maxDailyTrades, maxDailyLoss } = this.config;
		if (state.haltReason === "stake_limit") {
			return {
				status: "blocked",
				reason: "stake_limit",
				detail: `doubling ${state.currentStake.toFixed(2)} would exceed max stake ${this.config.maxStake.toFixed(2)}; reset required`,
			};
		}
		if (state.dailyTradeCount >= maxDailyTrades) {
			return {
				status: "blocked",
				reason: "daily_trade_limit",
				detail: `daily trade limit reached (${state.dailyTradeCount}/${maxDailyTrades})`,
			};
		}
		if (state.dailyLoss >= maxDailyLoss) {
			return {
				status: "blocked",
				reason: "daily_loss_limit",
				detail: `daily loss limit reached (${state.dailyLoss.toFixed(2)}/${maxDailyLoss.toFixed(2)})`,
			};
		}
		return { status: "ok", stake: state.currentStake };
	}

	private requirePending(state: StakeState, result: TradeResult) {
		if (!state.pendingTrade) {
			throw new OutcomeError(`cannot report ${result}: no trade was prepared`);
		}
		return state.pendingTrade;
	}

	private async commit(
		state: StakeState,
		result: TradeResult,
		signal: OutcomeSignal,
		pnl: number,
		changes: Partial<StakeState>,
	): Promise<OutcomeReport> {
		const pending = this.requirePending(state, result);
		const next: StakeState = {
			...state,
			...changes,
			lastResult: result,
			pendingTrade: null,
			updatedAt: new Date(this.clock()).toISOString(),
		};
		await this.store.save(next);

		const report: OutcomeReport = {
			result,
			signal,
			stakeUsed: pending.stake,
			pnl,
			slug: pending.slug,
			direction: pending.direction,
			before: { currentStake: state.currentStake, winStreak: state.winStreak },
			state: next,
		};
		const fields = {
			result,
			signal,
			stakeUsed: pending.stake,
			pnl,
			streak: `${state.winStreak} -> ${next.winStreak}`,
			nextStake: next.currentStake,
			dailyTrades: next.dailyTradeCount,
			dailyPnl: next.dailyPnl,
		};
		if (signal === "limit_reached") {
			logger.warn(fields, "Stake limit reached; progression halted");
		} else {
			logger.info(fields, "Stake outcome recorded");
		}
		return report;
	}
}
