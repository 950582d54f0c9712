/**
 * Core types shared by the resolvers, the aggregator and the setup facade.
 */

// =============================================================================
// JSON values
// =============================================================================

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Narrow a parsed value to a plain JSON object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Packages and prefixes
// =============================================================================

/**
 * One installed webjar, as reported by the package registry
 */
export interface PackageRef {
	/** WebJar id (e.g., "jquery", "validate.js") */
	readonly id: string;
	/** Installed version (e.g., "2.1.0") */
	readonly version: string;
}

/**
 * One location a module can be fetched from
 */
export interface PrefixSpec {
	/** URL prefix with a trailing slash (e.g., "/webjars/") */
	readonly prefix: string;
	/** Whether "/<version>" follows the package id in generated URLs */
	readonly includeVersion: boolean;
}

/**
 * Ordered prefixes; the first is the most preferred location
 */
export type PrefixChain = readonly PrefixSpec[];

export type DescriptorFormat = "legacy" | "bower" | "npm";

// =============================================================================
// Module config
// =============================================================================

/**
 * Canonical RequireJS config for one webjar.
 *
 * @example
 * ```json
 * {
 *   "paths": {
 *     "jquery": ["https://cdn.example.com/jquery/2.1.0/jquery", "/webjars/jquery/2.1.0/jquery", "jquery"]
 *   },
 *   "shim": { "jquery": { "exports": "$" } },
 *   "packages": []
 * }
 * ```
 */
export interface ModuleConfig {
	/** Module name -> candidate URLs, most preferred first */
	paths: Record<string, string[]>;
	[field: string]: JsonValue;
}

/**
 * A config with no entries in any of its fields carries no usable metadata
 */
export function isEmptyModuleConfig(config: ModuleConfig): boolean {
	return Object.values(config).every((value) => {
		if (Array.isArray(value)) return value.length === 0;
		if (isJsonObject(value)) return Object.keys(value).length === 0;
		return false;
	});
}

// =============================================================================
// Resolution outcomes
// =============================================================================

export type UnresolvedReason =
	| "no-descriptor"
	| "descriptor-missing"
	| "malformed-descriptor"
	| "missing-name"
	| "no-entry-point"
	| "empty-config";

export type ResolutionOutcome =
	| {
			status: "resolved";
			format: DescriptorFormat;
			config: ModuleConfig;
	  }
	| {
			status: "unresolved";
			format: DescriptorFormat | null;
			reason: UnresolvedReason;
			/** Extra context for diagnostics (e.g., the descriptor path) */
			detail?: string;
	  };

export function resolved(
	format: DescriptorFormat,
	config: ModuleConfig,
): ResolutionOutcome {
	return { status: "resolved", format, config };
}

export function unresolved(
	format: DescriptorFormat | null,
	reason: UnresolvedReason,
	detail?: string,
): ResolutionOutcome {
	return detail === undefined
		? { status: "unresolved", format, reason }
		: { status: "unresolved", format, reason, detail };
}
