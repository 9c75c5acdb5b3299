import type { AssetConfig } from "../config/schema";
import { DiscoveryError, errorMessage } from "../errors";
import type { Round, RoundCandidate, RoundWindowClass } from "../types";
import { logger } from "../utils/logger";
import { FIFTEEN_MINUTES_MS, parseUtc, slotStart } from "../utils/time";

const MAX_ROUND_DURATION_MS = 24 * 60 * 60 * 1000;

export type SourceContext = {
	now: number;
	signal: AbortSignal;
};

/**
 * One way of discovering rounds. Untrusted sources return raw candidates that
 * go through live-window selection; a trusted source returns at most one round
 * that already reflects the live view.
 */
export interface RoundSource {
	readonly name: string;
	readonly trusted: boolean;
	fetchCandidates(
		asset: AssetConfig,
		context: SourceContext,
	): Promise<RoundCandidate[]>;
}

export type LocatorOptions = {
	timeoutMs: number;
	marketBaseUrl: string;
};

type TimedCandidate = {
	candidate: RoundCandidate;
	startTime: number;
	endTime: number;
};

function windowOf(candidate: RoundCandidate): { startTime: number; endTime: number } | null {
	const startTime = parseUtc(candidate.start);
	const endTime = parseUtc(candidate.end);
	if (startTime === null || endTime === null) return null;
	const duration = endTime - startTime;
	if (duration <= 0 || duration >= MAX_ROUND_DURATION_MS) return null;
	return { startTime, endTime };
}

export function classifyRoundWindow(
	candidate: RoundCandidate,
	now: number,
): RoundWindowClass {
	const window = windowOf(candidate);
	if (!window) return "unknown_time";
	if (window.startTime <= now && now < window.endTime) return "live";
	return now < window.startTime ? "future" : "past";
}

/** Live candidate closing soonest; equal ends go to the greatest id. */
export function selectLiveRound(
	candidates: readonly RoundCandidate[],
	now: number,
): TimedCandidate | null {
	let best: TimedCandidate | null = null;
	for (const candidate of candidates) {
		if (classifyRoundWindow(candidate, now) !== "live") continue;
		const window = windowOf(candidate);
		if (!window) continue;
		if (
			!best ||
			window.endTime < best.endTime ||
			(window.endTime === best.endTime && candidate.id > best.candidate.id)
		) {
			best = { candidate, ...window };
		}
	}
	return best;
}

function trustedPick(
	candidates: readonly RoundCandidate[],
	now: number,
): TimedCandidate | null {
	const candidate = candidates[0];
	if (!candidate) return null;
	const window = windowOf(candidate);
	if (window) return { candidate, ...window };
	const startTime = slotStart(now, FIFTEEN_MINUTES_MS);
	return { candidate, startTime, endTime: startTime + FIFTEEN_MINUTES_MS };
}

function countClasses(candidates: readonly RoundCandidate[], now: number) {
	const counts: Record<RoundWindowClass, number> = {
		live: 0,
		future: 0,
		past: 0,
		unknown_time: 0,
	};
	for (const candidate of candidates) {
		counts[classifyRoundWindow(candidate, now)] += 1;
	}
	return counts;
}

async function attempt(
	source: RoundSource,
	asset: AssetConfig,
	now: number,
	timeoutMs: number,
): Promise<RoundCandidate[]> {
	const controller = new AbortController();
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			controller.abort();
			reject(new DiscoveryError(source.name, `timed out after ${timeoutMs}ms`));
		}, timeoutMs);
	});

	try {
		return await Promise.race([
			source.fetchCandidates(asset, { now, signal: controller.signal }),
			timeout,
		]);
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Tries each source once, in order, and returns the first live round found,
 * or null when none produced one. `now` is the only notion of time used.
 */
export async function findLiveRound(
	asset: AssetConfig,
	sources: readonly RoundSource[],
	now: number,
	options: LocatorOptions,
): Promise<Round | null> {
	for (const source of sources) {
		let candidates: RoundCandidate[];
		try {
			candidates = await attempt(source, asset, now, options.timeoutMs);
		} catch (error) {
			const failure =
				error instanceof DiscoveryError
					? error
					: new DiscoveryError(source.name, errorMessage(error), { cause: error });
			logger.warn({ err: failure, source: source.name }, "Round source failed");
			continue;
		}

		const picked = source.trusted
			? trustedPick(candidates, now)
			: selectLiveRound(candidates, now);

		if (!picked) {
			logger.warn(
				{
					source: source.name,
					candidates: candidates.length,
					...(source.trusted ? {} : countClasses(candidates, now)),
				},
				"No live round from source",
			);
			continue;
		}

		const { candidate, startTime, endTime } = picked;
		const round: Round = {
			asset: asset.symbol,
			id: candidate.id,
			slug: candidate.slug,
			url: `${options.marketBaseUrl.replace(/\/+$/, "")}/event/${candidate.slug}`,
			startTime,
			endTime,
			priceToBeat: candidate.priceToBeat,
			source: source.name,
		};
		logger.info(
			{
				source: source.name,
				slug: round.slug,
				start: new Date(startTime).toISOString(),
				end: new Date(endTime).toISOString(),
			},
			"Live round found",
		);
		return round;
	}

	logger.warn({ asset: asset.symbol }, "No live round from any source");
	return null;
}
