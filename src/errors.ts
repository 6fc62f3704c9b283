export class ConfigInvalidError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Configuration validation failed:\n${issues.map(i => `  - ${i}`).join("\n")}`);
		this.name = "ConfigInvalidError";
		this.issues = issues;
	}
}

/** A search or classifier call failed, timed out, or returned something unusable. */
export class AdapterUnavailableError extends Error {
	readonly adapter: string;
	readonly status?: number;

	constructor(adapter: string, message: string, options: { status?: number; cause?: unknown } = {}) {
		super(`${adapter}: ${message}`, { cause: options.cause });
		this.name = "AdapterUnavailableError";
		this.adapter = adapter;
		this.status = options.status;
	}
}

export class StorageUnavailableError extends Error {
	constructor(operation: string, cause: unknown) {
		super(`Lead store unavailable during ${operation}: ${errorMessage(cause)}`, { cause });
		this.name = "StorageUnavailableError";
	}
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
