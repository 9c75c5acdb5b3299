import type { StrategyConfig } from "../config/schema";
import type {
	Abort,
	AbortReason,
	Decision,
	DecisionRule,
	Direction,
	GateCheck,
	GateName,
	MarketView,
	Round,
} from "../types";

export const MIN_PRICE_RATIO = 0.5;
export const MAX_PRICE_RATIO = 2.0;

export type DecisionOptions = Pick<
	StrategyConfig,
	"gapAtrThreshold" | "timePressureSeconds" | "timePressureStance" | "feedStaleSeconds"
> & {
	minPlausiblePrice: number;
	shortReturnPeriod: number;
};

export type DecisionInput = {
	round: Round;
	currentPrice: number | null;
	secondsRemaining: number;
	market: MarketView;
	now: number;
};

type GateFailure = { reason: AbortReason; detail: string };

const usd = (value: number) => value.toFixed(2);
const signedUsd = (value: number) => `${value >= 0 ? "+" : "-"}${Math.abs(value).toFixed(2)}`;

export function isWithinTradeWindow(
	secondsRemaining: number,
	minSeconds: number,
	maxSeconds: number,
): boolean {
	return secondsRemaining >= minSeconds && secondsRemaining <= maxSeconds;
}

/**
 * Turns round context and indicators into an UP/DOWN call. Validation gates
 * run first and any failure yields an Abort; every call carries a rationale
 * naming the rule that fired and its inputs.
 */
export class DecisionEngine {
	constructor(private readonly options: DecisionOptions) {}

	decide(input: DecisionInput): Decision | Abort {
		const checks: GateCheck[] = [];
		const gates: Array<[GateName, () => GateFailure | string]> = [
			["target", () => this.checkTarget(input.round.priceToBeat)],
			["feed", () => this.checkFeed(input)],
			["magnitude", () => this.checkMagnitude(input)],
		];

		for (const [gate, run] of gates) {
			const outcome = run();
			if (typeof outcome === "string") {
				checks.push({ gate, passed: true, detail: outcome });
				continue;
			}
			checks.push({ gate, passed: false, detail: outcome.detail });
			return { kind: "abort", reason: outcome.reason, detail: outcome.detail, checks };
		}

		// gates guarantee both prices are present and finite
		const target = input.round.priceToBeat ?? Number.NaN;
		const current = input.currentPrice ?? Number.NaN;
		return this.evaluate(current, target, input, checks);
	}

	private checkTarget(target: number | undefined): GateFailure | string {
		if (target === undefined) {
			return { reason: "target_missing", detail: "round has no price to beat yet" };
		}
		if (!Number.isFinite(target) || target < 0) {
			return { reason: "implausible_target", detail: `target ${target} is not a price` };
		}
		if (target <= 1) {
			return {
				reason: "implausible_target",
				detail: `target ${target} is within [0, 1], looks like a share price`,
			};
		}
		if (target < this.options.minPlausiblePrice) {
			return {
				reason: "implausible_target",
				detail: `target ${target} is below the asset floor ${this.options.minPlausiblePrice}`,
			};
		}
		return `target ${usd(target)} plausible`;
	}

	private checkFeed(input: DecisionInput): GateFailure | string {
		const { lastTick, tickCount } = input.market;
		if (tickCount === 0 || !lastTick || input.currentPrice === null) {
			return { reason: "feed_absent", detail: "no price ticks received" };
		}
		const ageSeconds = (input.now - lastTick.timestamp) / 1000;
		if (ageSeconds > this.options.feedStaleSeconds) {
			return {
				reason: "feed_stale",
				detail: `last tick is ${ageSeconds.toFixed(1)}s old (limit ${this.options.feedStaleSeconds}s)`,
			};
		}
		return `${tickCount} ticks, last ${ageSeconds.toFixed(1)}s ago`;
	}

	private checkMagnitude(input: DecisionInput): GateFailure | string {
		const target = input.round.priceToBeat ?? Number.NaN;
		const current = input.currentPrice ?? Number.NaN;
		const ratio = current / target;
		if (!(ratio >= MIN_PRICE_RATIO && ratio <= MAX_PRICE_RATIO)) {
			return {
				reason: "magnitude_mismatch",
				detail: `price ${current} / target ${target} = ${ratio.toFixed(4)} outside [${MIN_PRICE_RATIO}, ${MAX_PRICE_RATIO}]`,
			};
		}
		return `price/target ratio ${ratio.toFixed(4)}`;
	}

	private evaluate(
		current: number,
		target: number,
		input: DecisionInput,
		checks: GateCheck[],
	): Decision {
		const { indicators } = input.market;
		const { secondsRemaining } = input;
		const gap = current - target;
		const gapOverAtr = indicators.atr ? gap / indicators.atr : 0;

		const result = (direction: Direction, rule: DecisionRule, rationale: string): Decision => ({
			kind: "decision",
			direction,
			rule,
			rationale,
			gap,
			gapOverAtr,
			currentPrice: current,
			targetPrice: target,
			secondsRemaining,
			checks,
		});

		const { timePressureSeconds, gapAtrThreshold, timePressureStance } = this.options;
		if (
			secondsRemaining <= timePressureSeconds &&
			Math.abs(gapOverAtr) > gapAtrThreshold
		) {
			const holdSide: Direction = gap >= 0 ? "UP" : "DOWN";
			const direction: Direction =
				timePressureStance === "hold" ? holdSide : holdSide === "UP" ? "DOWN" : "UP";
			const side = gap >= 0 ? "above" : "below";
			const why =
				timePressureStance === "hold"
					? `unlikely to cross back in ${secondsRemaining}s`
					: "fading the move";
			return result(
				direction,
				"time_pressure",
				`time_pressure: ${secondsRemaining}s left <= ${timePressureSeconds}s and |gap/ATR| ${Math.abs(gapOverAtr).toFixed(2)} > ${gapAtrThreshold}; price ${usd(current)} is ${usd(Math.abs(gap))} ${side} target ${usd(target)}, ${why} -> ${direction}`,
			);
		}

		const shortPeriod = this.options.shortReturnPeriod;
		const shortReturn = indicators.returns[shortPeriod] ?? null;
		const { emaFast, emaSlow } = indicators;
		let trendNote: string;

		if (emaFast !== null && emaSlow !== null && shortReturn !== null) {
			const trendValues = `fast EMA ${usd(emaFast)}, slow EMA ${usd(emaSlow)}, ${shortPeriod}m return ${shortReturn.toFixed(3)}%, price ${usd(current)}`;
			if (emaFast < emaSlow && shortReturn < 0 && current < emaFast) {
				return result(
					"DOWN",
					"trend",
					`trend: downtrend (${trendValues}; fast < slow, return < 0, price < fast) -> DOWN`,
				);
			}
			if (emaFast > emaSlow && shortReturn > 0 && current > emaFast) {
				return result(
					"UP",
					"trend",
					`trend: uptrend (${trendValues}; fast > slow, return > 0, price > fast) -> UP`,
				);
			}
			trendNote = `no dominant trend (${trendValues})`;
		} else {
			const missing = [
				emaFast === null ? "fast EMA" : null,
				emaSlow === null ? "slow EMA" : null,
				shortReturn === null ? `${shortPeriod}m return` : null,
			].filter((name): name is string => name !== null);
			trendNote = `insufficient data for trend (${missing.join(", ")})`;
		}

		const direction: Direction = current >= target ? "UP" : "DOWN";
		return result(
			direction,
			"default",
			`default: ${trendNote}; price ${usd(current)} ${current >= target ? ">=" : "<"} target ${usd(target)} (gap ${signedUsd(gap)}) -> ${direction}`,
		);
	}
}
