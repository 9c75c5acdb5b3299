export type AssetSymbol = "BTC" | "ETH";

export type Tick = {
	timestamp: number;
	price: number;
};

export type Candle = {
	openTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	tickCount: number;
};

export type RoundCandidate = {
	id: string;
	slug: string;
	start?: string | number;
	end?: string | number;
	priceToBeat?: number;
};

export type RoundWindowClass = "live" | "future" | "past" | "unknown_time";

export type Round = {
	asset: AssetSymbol;
	id: string;
	slug: string;
	url: string;
	startTime: number;
	endTime: number;
	priceToBeat?: number;
	source: string;
};

export type IndicatorSnapshot = {
	candleCount: number;
	close: number | null;
	emaFast: number | null;
	emaSlow: number | null;
	atr: number | null;
	// keyed by lookback in minutes, percent change; null = not enough history
	returns: Record<number, number | null>;
};

export type MarketView = {
	indicators: IndicatorSnapshot;
	tickCount: number;
	lastTick: Tick | null;
	latestPrice: number | null;
	closedCandles: readonly Candle[];
};

export type Direction = "UP" | "DOWN";

export type DecisionRule = "time_pressure" | "trend" | "default";

export type GateName = "target" | "feed" | "magnitude";

export type GateCheck = {
	gate: GateName;
	passed: boolean;
	detail: string;
};

export type AbortReason =
	| "target_missing"
	| "implausible_target"
	| "feed_absent"
	| "feed_stale"
	| "magnitude_mismatch";

export type Decision = {
	kind: "decision";
	direction: Direction;
	rule: DecisionRule;
	rationale: string;
	gap: number;
	gapOverAtr: number;
	currentPrice: number;
	targetPrice: number;
	secondsRemaining: number;
	checks: GateCheck[];
};

export type Abort = {
	kind: "abort";
	reason: AbortReason;
	detail: string;
	checks: GateCheck[];
};

export type TradeResult = "W" | "L" | "S";

export type StakeBlockReason =
	| "daily_trade_limit"
	| "daily_loss_limit"
	| "stake_limit"
	| "pending_outcome";

export type StakeQuote =
	| { status: "ok"; stake: number }
	| { status: "blocked"; reason: StakeBlockReason; detail: string };
