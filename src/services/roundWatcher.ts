import { defer, EMPTY, from, type Observable, timer } from "rxjs";
import { catchError, exhaustMap, tap } from "rxjs/operators";
import { logger } from "../utils/logger";
import type { CycleResult } from "./evaluationCycle";

export function roundSlugOf(result: CycleResult): string | null {
	return result.kind === "no_round" ? null : result.round.slug;
}

/**
 * Runs `runCycle` every `intervalMs`. A cycle still running when the next tick
 * fires is not overlapped; a failing cycle is logged and the next poll goes on.
 */
export function watchRounds(
	runCycle: () => Promise<CycleResult>,
	intervalMs: number,
): Observable<CycleResult> {
	return defer(() => {
		let currentSlug: string | null = null;

		return timer(0, intervalMs).pipe(
			exhaustMap(() =>
				from(runCycle()).pipe(
					catchError((err) => {
						logger.error({ err }, "Evaluation cycle failed");
						return EMPTY;
					}),
				),
			),
			tap((result) => {
				const slug = roundSlugOf(result);
				if (!slug || slug === currentSlug) return;
				if (currentSlug) {
					logger.info({ previous: currentSlug, next: slug }, "New round detected");
				}
				currentSlug = slug;
			}),
		);
	});
}
