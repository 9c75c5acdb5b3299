import { z } from "zod";
import type { StakeConfig } from "../config/schema";
import { logger } from "../utils/logger";
import { readJsonFile, writeJson } from "../utils/storage";

export const STAKE_STATE_VERSION = 1 as const;

// fixed policy: bounds exponential growth of the doubling progression
export const MAX_WIN_STREAK = 15;

const PROGRESSION_FIELDS = new Set(["currentStake", "winStreak", "haltReason"]);

const pendingTradeSchema = z.object({
	slug: z.string().min(1),
	direction: z.enum(["UP", "DOWN"]),
	stake: z.number().positive(),
	preparedAt: z.string().min(1),
});

export function createStakeStateSchema(config: Pick<StakeConfig, "baseStake" | "maxStake">) {
	return z.object({
		version: z.literal(STAKE_STATE_VERSION).default(STAKE_STATE_VERSION),
		currentStake: z.number().positive().max(config.maxStake).default(config.baseStake),
		winStreak: z.number().int().min(0).max(MAX_WIN_STREAK).default(0),
		haltReason: z.enum(["stake_limit"]).nullable().default(null),
		dailyDate: z.string().default(""),
		dailyTradeCount: z.number().int().nonnegative().default(0),
		dailyLoss: z.number().nonnegative().default(0),
		dailyPnl: z.number().default(0),
		dailyWins: z.number().int().nonnegative().default(0),
		dailyLosses: z.number().int().nonnegative().default(0),
		lastResult: z.enum(["W", "L", "S"]).nullable().default(null),
		pendingTrade: pendingTradeSchema.nullable().default(null),
		updatedAt: z.string().default(""),
	});
}

export type StakeState = z.infer<ReturnType<typeof createStakeStateSchema>>;

export function defaultStakeState(
	config: Pick<StakeConfig, "baseStake">,
	day: string,
	now: string,
): StakeState {
	return {
		version: STAKE_STATE_VERSION,
		currentStake: config.baseStake,
		winStreak: 0,
		haltReason: null,
		dailyDate: day,
		dailyTradeCount: 0,
		dailyLoss: 0,
		dailyPnl: 0,
		dailyWins: 0,
		dailyLosses: 0,
		lastResult: null,
		pendingTrade: null,
		updatedAt: now,
	};
}

/**
 * JSON persistence for the stake state. A missing file starts from defaults;
 * an unreadable or invalid one is reported and replaced by defaults rather
 * than stopping the process.
 */
export class StakeStore {
	private readonly schema: ReturnType<typeof createStakeStateSchema>;

	constructor(
		readonly filePath: string,
		config: Pick<StakeConfig, "baseStake" | "maxStake">,
	) {
		this.schema = createStakeStateSchema(config);
	}

	async load(fallback: () => StakeState): Promise<StakeState> {
		const read = await readJsonFile(this.filePath);

		if (read.status === "missing") {
			const fresh = fallback();
			await this.save(fresh);
			logger.info({ file: this.filePath }, "Initialized stake state");
			return fresh;
		}

		if (read.status === "corrupt") {
			logger.error(
				{ file: this.filePath, err: read.error },
				"Stake state file is not valid JSON; resetting to defaults",
			);
			return this.reset(fallback);
		}

		const parsed = this.schema.safeParse(read.value);
		if (!parsed.success) {
			const kept = this.withoutProgression(read.value, parsed.error.issues);
			if (kept) {
				logger.warn(
					{ file: this.filePath, issues: parsed.error.issues },
					"Stake progression outside configured bounds; restarting it at the base stake",
				);
				await this.save(kept);
				return kept;
			}
			logger.error(
				{ file: this.filePath, issues: parsed.error.issues },
				"Stake state failed validation; resetting to defaults",
			);
			return this.reset(fallback);
		}
		return parsed.data;
	}

	async save(state: StakeState): Promise<void> {
		await writeJson(this.filePath, state);
	}

	// when only stake/streak fail (e.g. MAX_STAKE_USD lowered), keep the daily counters
	private withoutProgression(value: unknown, issues: readonly z.ZodIssue[]): StakeState | null {
		if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
		if (!issues.every((issue) => PROGRESSION_FIELDS.has(String(issue.path[0])))) return null;
		const rest = Object.fromEntries(
			Object.entries(value).filter(([key]) => !PROGRESSION_FIELDS.has(key)),
		);
		const retried = this.schema.safeParse(rest);
		return retried.success ? retried.data : null;
	}

	private async reset(fallback: () => StakeState): Promise<StakeState> {
		const fresh = fallback();
		await this.save(fresh);
		return fresh;
	}
}
