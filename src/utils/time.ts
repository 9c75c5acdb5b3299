export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const FIFTEEN_MINUTES_MS = 15 * 60 * 1000;

export function utcDay(timestamp: number): string {
	return new Date(timestamp).toISOString().slice(0, 10);
}

const TRAILING_OFFSET = /([+-])(\d{2}):?(\d{2})?$/;

// "2025-01-20 14:00:00" -> "2025-01-20T14:00:00Z", "...+00" -> "...+00:00"
function toIsoUtc(text: string): string {
	const iso = text.replace(/^(\d{4}-\d{2}-\d{2}) (?=\d)/, "$1T");
	if (!/^\d{4}-\d{2}-\d{2}T/.test(iso)) return iso;
	const time = iso.slice(10);
	if (/z$/i.test(time)) return iso;
	const offset = TRAILING_OFFSET.exec(time);
	if (!offset) return `${iso}Z`;
	const [whole, sign, hours, minutes] = offset;
	return `${iso.slice(0, iso.length - whole.length)}${sign}${hours}:${minutes ?? "00"}`;
}

/**
 * Epoch milliseconds for an ISO string or epoch number, `null` when the value
 * is missing or does not parse. Strings without an offset are read as UTC.
 */
export function parseUtc(value: string | number | undefined): number | null {
	if (value === undefined) return null;
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	const trimmed = value.trim();
	if (!trimmed) return null;
	const parsed = Date.parse(toIsoUtc(trimmed));
	return Number.isNaN(parsed) ? null : parsed;
}

export function slotStart(timestamp: number, slotMs: number): number {
	return Math.floor(timestamp / slotMs) * slotMs;
}

export async function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
