/**
 * Base error class for configuration errors
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Error thrown when a URL prefix is unusable
 */
export class InvalidPrefixError extends ConfigError {
	constructor(prefix: unknown) {
		super(
			`Invalid URL prefix: ${JSON.stringify(prefix)}. Prefixes must be non-empty strings, usually ending in '/' (e.g., /webjars/).`,
		);
		this.name = "InvalidPrefixError";
	}
}

/**
 * Error thrown when a configured resource root cannot be read
 */
export class ResourceRootError extends ConfigError {
	readonly root: string;

	constructor(root: string, reason: string) {
		super(`Resource root '${root}' ${reason}`);
		this.name = "ResourceRootError";
		this.root = root;
	}
}

/**
 * Get a human-readable message from any thrown value
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	if (typeof error === "string") return error;
	return "Unknown error";
}
