export class ConfigError extends Error {
	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super(issues.length ? `${message}: ${issues.join("; ")}` : message);
		this.name = "ConfigError";
	}
}

export class DiscoveryError extends Error {
	constructor(
		readonly source: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${source}: ${message}`, options);
		this.name = "DiscoveryError";
	}
}

export class OutcomeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "OutcomeError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
