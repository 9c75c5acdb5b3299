import { Observable } from "rxjs";
import WebSocket from "ws";
import { z } from "zod";
import type { Tick } from "../types";
import { logger } from "../utils/logger";
import { parseUtc } from "../utils/time";

export const PRICE_TOPIC = "crypto_prices_chainlink";

const PING_INTERVAL_MS = 5_000;
const MAX_BACKOFF_MS = 30_000;

const numeric = z.union([z.number(), z.string()]);

const pricePointSchema = z.object({
	symbol: z.string(),
	value: numeric.optional(),
	price: numeric.optional(),
	timestamp: numeric.optional(),
});

const feedMessageSchema = z.object({
	topic: z.string(),
	timestamp: z.number().optional(),
	payload: pricePointSchema.optional(),
	data: pricePointSchema.optional(),
});

export type PriceFeedOptions = {
	url: string;
	symbol: string;
};

function toMillis(value: string | number | undefined): number | null {
	if (typeof value === "number") {
		// epoch seconds vs milliseconds
		return value < 1e12 ? value * 1000 : value;
	}
	if (typeof value === "string" && /^\d+(\.\d+)?$/.test(value.trim())) {
		return toMillis(Number(value));
	}
	return parseUtc(value);
}

/**
 * Maps one decoded feed message to a tick for `symbol`; anything else
 * (other topics, other symbols, heartbeats, unparseable prices) yields null.
 */
export function parseFeedMessage(
	raw: unknown,
	symbol: string,
	receivedAt: number,
): Tick | null {
	const parsed = feedMessageSchema.safeParse(raw);
	if (!parsed.success || parsed.data.topic !== PRICE_TOPIC) return null;

	const point = parsed.data.payload ?? parsed.data.data;
	if (!point || point.symbol.toLowerCase() !== symbol.toLowerCase()) return null;

	const price = Number(point.value ?? point.price);
	if (!Number.isFinite(price) || price <= 0) return null;

	const timestamp =
		toMillis(point.timestamp) ?? toMillis(parsed.data.timestamp) ?? receivedAt;
	return { timestamp, price };
}

export function subscribeMessage(symbol: string) {
	return {
		action: "subscribe",
		subscriptions: [
			{
				topic: PRICE_TOPIC,
				type: "*",
				filters: JSON.stringify({ symbol }),
			},
		],
	};
}

export function backoffDelay(attempt: number): number {
	return Math.min(1000 * 2 ** Math.max(attempt - 1, 0), MAX_BACKOFF_MS);
}

function decode(data: WebSocket.RawData): string {
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	return Buffer.from(data).toString("utf8");
}

/**
 * Live price ticks for one symbol. Reconnects with exponential backoff for as
 * long as someone is subscribed; gaps while disconnected are left to the
 * candle aggregator.
 */
export function createPriceFeed(options: PriceFeedOptions): Observable<Tick> {
	return new Observable<Tick>((subscriber) => {
		let socket: WebSocket | null = null;
		let pingTimer: NodeJS.Timeout | undefined;
		let retryTimer: NodeJS.Timeout | undefined;
		let attempt = 0;
		let stopped = false;

		const connect = () => {
			const ws = new WebSocket(options.url, { perMessageDeflate: false });
			socket = ws;

			ws.on("open", () => {
				attempt = 0;
				ws.send(JSON.stringify(subscribeMessage(options.symbol)));
				pingTimer = setInterval(() => {
					if (ws.readyState === WebSocket.OPEN) ws.send("PING");
				}, PING_INTERVAL_MS);
				logger.info(
					{ url: options.url, topic: PRICE_TOPIC, symbol: options.symbol },
					"Subscribed to price feed",
				);
			});

			ws.on("message", (data) => {
				const text = decode(data);
				let message: unknown;
				try {
					message = JSON.parse(text);
				} catch {
					logger.trace({ text }, "Ignoring non-JSON feed frame");
					return;
				}
				const tick = parseFeedMessage(message, options.symbol, Date.now());
				if (tick) subscriber.next(tick);
			});

			ws.on("error", (err) => {
				logger.warn({ err, url: options.url }, "Price feed socket error");
			});

			ws.on("close", (code, reason) => {
				clearInterval(pingTimer);
				if (stopped) return;
				attempt += 1;
				const delay = backoffDelay(attempt);
				logger.warn(
					{ code, reason: reason.toString(), attempt, delayMs: delay },
					"Price feed disconnected; reconnecting",
				);
				retryTimer = setTimeout(connect, delay);
			});
		};

		connect();

		return () => {
			stopped = true;
			clearInterval(pingTimer);
			clearTimeout(retryTimer);
			socket?.close();
		};
	});
}
