import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { AssetSymbol } from "../types";

export type AssetConfig = {
	symbol: AssetSymbol;
	displayName: string;
	feedSymbol: string;
	slugPrefix: string;
	// below this the "price to beat" is noise or a share price, not the asset
	minPlausiblePrice: number;
};

export const ASSETS: Record<"btc" | "eth", AssetConfig> = {
	btc: {
		symbol: "BTC",
		displayName: "Bitcoin",
		feedSymbol: "btc/usd",
		slugPrefix: "btc-updown-15m-",
		minPlausiblePrice: 1000,
	},
	eth: {
		symbol: "ETH",
		displayName: "Ethereum",
		feedSymbol: "eth/usd",
		slugPrefix: "eth-updown-15m-",
		minPlausiblePrice: 100,
	},
};

const flag = (fallback: boolean) =>
	z
		.string()
		.optional()
		.transform((value) =>
			value === undefined || value === "" ? fallback : value.toLowerCase() === "true",
		);

const positiveInt = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback);

const positiveNumber = (fallback: number) =>
	z.coerce.number().positive().finite().default(fallback);

const envSchema = z.object({
	ASSET: z
		.string()
		.default("btc")
		.transform((value) => value.toLowerCase())
		.pipe(z.enum(["btc", "eth"])),
	WATCH_MODE: flag(false),
	WATCH_INTERVAL_SEC: positiveInt(30),
	GAMMA_API_URL: z.string().url().default("https://gamma-api.polymarket.com"),
	LIVE_VIEW_URL: z.string().url().default("https://polymarket.com/crypto/15m"),
	MARKET_BASE_URL: z.string().url().default("https://polymarket.com"),
	RTDS_WS_URL: z.string().url().default("wss://ws-live-data.polymarket.com"),
	DISCOVERY_TIMEOUT_MS: positiveInt(10_000),
	DISCOVERY_PAGE_SIZE: positiveInt(100),
	DISCOVERY_MAX_PAGES: positiveInt(5),
	DISCOVERY_MIN_CANDIDATES: positiveInt(3),
	CANDLE_INTERVAL_SEC: positiveInt(60),
	MAX_CANDLES: positiveInt(1000),
	RECENT_TICKS: positiveInt(50),
	EMA_FAST: positiveInt(9),
	EMA_SLOW: positiveInt(20),
	ATR_PERIOD: positiveInt(14),
	RETURN_PERIODS: z
		.string()
		.default("3,5")
		.transform((value) =>
			value
				.split(",")
				.map((part) => part.trim())
				.filter(Boolean)
				.map(Number),
		)
		.pipe(z.array(z.number().int().positive()).min(1)),
	GAP_ATR_THRESHOLD: positiveNumber(0.8),
	TIME_PRESSURE_SEC: positiveInt(600),
	TIME_PRESSURE_STANCE: z.enum(["hold", "fade"]).default("hold"),
	FEED_STALE_SEC: positiveInt(30),
	MIN_SECONDS_BEFORE_CLOSE: z.coerce.number().int().nonnegative().default(30),
	MAX_SECONDS_BEFORE_CLOSE: positiveInt(840),
	BASE_STAKE_USD: positiveNumber(2),
	MAX_STAKE_USD: positiveNumber(1024),
	DAILY_MAX_TRADES: positiveInt(10),
	DAILY_MAX_LOSS_USD: positiveNumber(20),
	TELEGRAM_BOT_TOKEN: z.string().default(""),
	TELEGRAM_CHAT_ID: z.string().default(""),
	DATA_DIR: z.string().min(1).default("data"),
});

function toConfig(env: z.infer<typeof envSchema>) {
	const dataDir = path.resolve(process.cwd(), env.DATA_DIR);
	return {
		asset: ASSETS[env.ASSET],
		watch: {
			enabled: env.WATCH_MODE,
			intervalSec: env.WATCH_INTERVAL_SEC,
		},
		api: {
			gammaUrl: env.GAMMA_API_URL,
			liveViewUrl: env.LIVE_VIEW_URL,
			marketBaseUrl: env.MARKET_BASE_URL,
			rtdsUrl: env.RTDS_WS_URL,
		},
		discovery: {
			timeoutMs: env.DISCOVERY_TIMEOUT_MS,
			pageSize: env.DISCOVERY_PAGE_SIZE,
			maxPages: env.DISCOVERY_MAX_PAGES,
			minCandidates: env.DISCOVERY_MIN_CANDIDATES,
		},
		candles: {
			intervalSeconds: env.CANDLE_INTERVAL_SEC,
			maxCandles: env.MAX_CANDLES,
			recentTicks: env.RECENT_TICKS,
		},
		indicators: {
			emaFast: env.EMA_FAST,
			emaSlow: env.EMA_SLOW,
			atrPeriod: env.ATR_PERIOD,
			returnPeriods: env.RETURN_PERIODS,
			intervalSeconds: env.CANDLE_INTERVAL_SEC,
		},
		strategy: {
			gapAtrThreshold: env.GAP_ATR_THRESHOLD,
			timePressureSeconds: env.TIME_PRESSURE_SEC,
			timePressureStance: env.TIME_PRESSURE_STANCE,
			feedStaleSeconds: env.FEED_STALE_SEC,
			minSecondsBeforeClose: env.MIN_SECONDS_BEFORE_CLOSE,
			maxSecondsBeforeClose: env.MAX_SECONDS_BEFORE_CLOSE,
		},
		stake: {
			baseStake: env.BASE_STAKE_USD,
			maxStake: env.MAX_STAKE_USD,
			maxDailyTrades: env.DAILY_MAX_TRADES,
			maxDailyLoss: env.DAILY_MAX_LOSS_USD,
		},
		telegram: {
			botToken: env.TELEGRAM_BOT_TOKEN,
			chatId: env.TELEGRAM_CHAT_ID,
		},
		paths: {
			dataDir,
			stakeState: path.join(dataDir, "stake-state.json"),
			decisionLog: path.join(dataDir, "decisions.log"),
			outcomeLog: path.join(dataDir, "outcomes.log"),
		},
	};
}

export type AppConfig = ReturnType<typeof toConfig>;
export type IndicatorConfig = AppConfig["indicators"];
export type StrategyConfig = AppConfig["strategy"];
export type StakeConfig = AppConfig["stake"];
export type CandleConfig = AppConfig["candles"];
export type DiscoveryConfig = AppConfig["discovery"];

function crossFieldIssues(config: AppConfig): string[] {
	const issues: string[] = [];
	const { indicators, strategy, stake } = config;
	if (indicators.emaFast >= indicators.emaSlow) {
		issues.push(
			`EMA_FAST (${indicators.emaFast}) must be lower than EMA_SLOW (${indicators.emaSlow})`,
		);
	}
	for (const minutes of indicators.returnPeriods) {
		if ((minutes * 60) % indicators.intervalSeconds !== 0) {
			issues.push(
				`RETURN_PERIODS entry ${minutes}m is not a whole number of ${indicators.intervalSeconds}s candles`,
			);
		}
	}
	if (strategy.minSecondsBeforeClose >= strategy.maxSecondsBeforeClose) {
		issues.push("MIN_SECONDS_BEFORE_CLOSE must be lower than MAX_SECONDS_BEFORE_CLOSE");
	}
	if (stake.baseStake > stake.maxStake) {
		issues.push(
			`BASE_STAKE_USD (${stake.baseStake}) must not exceed MAX_STAKE_USD (${stake.maxStake})`,
		);
	}
	return issues;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			"Invalid configuration",
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
			),
		);
	}

	const config = toConfig(parsed.data);
	const issues = crossFieldIssues(config);
	if (issues.length) {
		throw new ConfigError("Invalid configuration", issues);
	}
	return config;
}
