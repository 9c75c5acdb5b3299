import { z } from "zod";
import type { AssetConfig, DiscoveryConfig } from "../config/schema";
import { DiscoveryError } from "../errors";
import type { RoundSource, SourceContext } from "../services/roundLocator";
import type { RoundCandidate } from "../types";
import { logger } from "../utils/logger";
import type { HttpGet } from "./http";

const optionalText = z
	.string()
	.nullish()
	.transform((value) => value ?? undefined);

const gammaMarketSchema = z.object({
	eventStartTime: optionalText,
	endDate: optionalText,
});

const gammaEventSchema = z.object({
	id: z.union([z.string(), z.number()]).transform(String),
	slug: z.string().min(1),
	startTime: optionalText,
	eventStartTime: optionalText,
	startDate: optionalText,
	endDate: optionalText,
	eventMetadata: z
		.object({ priceToBeat: z.union([z.number(), z.string()]).nullish() })
		.nullish(),
	markets: z.array(gammaMarketSchema).nullish(),
});

type GammaEvent = z.infer<typeof gammaEventSchema>;

function priceToBeat(event: GammaEvent): number | undefined {
	const raw = event.eventMetadata?.priceToBeat;
	if (raw === undefined || raw === null) return undefined;
	const value = Number(raw);
	return Number.isFinite(value) ? value : undefined;
}

export function toCandidate(event: GammaEvent): RoundCandidate {
	const market = event.markets?.[0];
	return {
		id: event.id,
		slug: event.slug,
		// startDate is when the listing was created, the round starts later
		start:
			event.startTime ??
			event.eventStartTime ??
			market?.eventStartTime ??
			event.startDate,
		end: event.endDate ?? market?.endDate,
		priceToBeat: priceToBeat(event),
	};
}

export type GammaSourceOptions = Pick<
	DiscoveryConfig,
	"pageSize" | "maxPages" | "minCandidates"
> & { baseUrl: string };

/**
 * Primary discovery: open events ordered newest first, paged until enough
 * candidates for the asset are collected or the page ceiling is hit.
 */
export class GammaRoundSource implements RoundSource {
	readonly name = "gamma";
	readonly trusted = false;

	constructor(
		private readonly get: HttpGet,
		private readonly options: GammaSourceOptions,
	) {}

	async fetchCandidates(
		asset: AssetConfig,
		context: SourceContext,
	): Promise<RoundCandidate[]> {
		const { pageSize, maxPages, minCandidates } = this.options;
		const url = `${this.options.baseUrl.replace(/\/+$/, "")}/events`;
		const candidates: RoundCandidate[] = [];

		for (let page = 0; page < maxPages; page++) {
			const body = await this.get(url, {
				params: {
					closed: "false",
					order: "id",
					ascending: "false",
					limit: pageSize,
					offset: page * pageSize,
				},
				signal: context.signal,
			});

			if (!Array.isArray(body)) {
				throw new DiscoveryError(this.name, `page ${page} is not an array`);
			}

			for (const row of body) {
				const parsed = gammaEventSchema.safeParse(row);
				if (!parsed.success) continue;
				if (!parsed.data.slug.startsWith(asset.slugPrefix)) continue;
				candidates.push(toCandidate(parsed.data));
			}

			logger.debug(
				{ page, rows: body.length, matched: candidates.length },
				"Gamma discovery page",
			);

			if (candidates.length >= minCandidates || body.length < pageSize) break;
		}

		return candidates;
	}
}
