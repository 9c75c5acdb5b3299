import axios from "axios";

export type HttpGetOptions = {
	params?: Record<string, string | number | boolean>;
	signal?: AbortSignal;
	responseType?: "json" | "text";
};

export type HttpGet = (url: string, options?: HttpGetOptions) => Promise<unknown>;

export function createHttpGet(timeoutMs: number): HttpGet {
	const client = axios.create({
		timeout: timeoutMs,
		headers: { "User-Agent": "updown-advisor/0.1" },
	});
	return async (url, options = {}) => {
		const response = await client.get<unknown>(url, {
			params: options.params,
			signal: options.signal,
			responseType: options.responseType ?? "json",
		});
		return response.data;
	};
}
