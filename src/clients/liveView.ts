import type { AssetConfig } from "../config/schema";
import { DiscoveryError } from "../errors";
import type { RoundSource, SourceContext } from "../services/roundLocator";
import type { RoundCandidate } from "../types";
import { FIFTEEN_MINUTES_MS, slotStart } from "../utils/time";
import type { HttpGet } from "./http";

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function findEventSlug(html: string, slugPrefix: string): string | null {
	const pattern = new RegExp(`/event/(${escapeRegExp(slugPrefix)}[a-z0-9-]+)`, "i");
	const match = pattern.exec(html);
	return match ? match[1].toLowerCase() : null;
}

/** Round start encoded as a trailing epoch-seconds stamp, e.g. `btc-updown-15m-1737381600`. */
export function slugStartTime(slug: string): number | null {
	const match = /-(\d{9,11})$/.exec(slug);
	return match ? Number(match[1]) * 1000 : null;
}

/**
 * Fallback discovery: the first event link for the asset on the live 15m
 * page. Whatever that page shows is the current round, so the result is
 * trusted without window filtering.
 */
export class LiveViewRoundSource implements RoundSource {
	readonly name = "live-view";
	readonly trusted = true;

	constructor(
		private readonly get: HttpGet,
		private readonly pageUrl: string,
	) {}

	async fetchCandidates(
		asset: AssetConfig,
		context: SourceContext,
	): Promise<RoundCandidate[]> {
		const html = await this.get(this.pageUrl, {
			signal: context.signal,
			responseType: "text",
		});
		if (typeof html !== "string") {
			throw new DiscoveryError(this.name, "live page did not return HTML");
		}

		const slug = findEventSlug(html, asset.slugPrefix);
		if (!slug) return [];

		const start = slugStartTime(slug) ?? slotStart(context.now, FIFTEEN_MINUTES_MS);
		return [{ id: slug, slug, start, end: start + FIFTEEN_MINUTES_MS }];
	}
}
