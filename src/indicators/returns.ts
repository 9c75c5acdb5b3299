/** Candles to look back for a lookback expressed in minutes. */
export function candlesForMinutes(minutes: number, intervalSeconds: number): number {
	return Math.round((minutes * 60) / intervalSeconds);
}

/**
 * Percent change between the newest close and the close `lookback` candles
 * earlier; `null` when the history is too short.
 */
export function percentReturn(closes: readonly number[], lookback: number): number | null {
	if (lookback <= 0 || closes.length <= lookback) return null;
	const now = closes[closes.length - 1];
	const then = closes[closes.length - 1 - lookback];
	if (then === 0) return null;
	return ((now - then) / then) * 100;
}
