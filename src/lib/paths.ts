/**
 * URL rewriting and resource path conventions for webjars.
 *
 * Resource layout inside a webjar:
 * - META-INF/maven/<group>/<id>/pom.xml (format markers)
 * - META-INF/resources/webjars/<id>/<version>/... (content)
 */

import type { DescriptorFormat, PackageRef, PrefixChain, PrefixSpec } from "./types";

// =============================================================================
// Constants
// =============================================================================

/** Root of the webjar content directories */
export const WEBJARS_PATH_PREFIX = "META-INF/resources/webjars";

/** Root of the Maven metadata directories */
export const WEBJARS_MAVEN_PREFIX = "META-INF/maven";

/** Maven group of each descriptor format */
export const MAVEN_GROUPS: Record<DescriptorFormat, string> = {
	npm: "org.webjars.npm",
	bower: "org.webjars.bower",
	legacy: "org.webjars",
};

/** File holding the pre-descriptor RequireJS config script */
export const LEGACY_SCRIPT_FILE = "webjars-requirejs.js";

// =============================================================================
// Resource paths
// =============================================================================

/**
 * Path of the pom.xml that marks a webjar as belonging to a format
 */
export function markerPath(format: DescriptorFormat, packageId: string): string {
	return `${WEBJARS_MAVEN_PREFIX}/${MAVEN_GROUPS[format]}/${packageId}/pom.xml`;
}

/**
 * Path of a file inside a webjar's versioned content directory
 */
export function contentPath(ref: PackageRef, file: string): string {
	return `${WEBJARS_PATH_PREFIX}/${ref.id}/${ref.version}/${file}`;
}

// =============================================================================
// Rewriting
// =============================================================================

function prefixedPath(
	spec: PrefixSpec,
	packageId: string,
	version: string,
	relativePath: string,
): string {
	const versionSegment = spec.includeVersion ? `/${version}` : "";
	return `${spec.prefix}${packageId}${versionSegment}/${relativePath}`;
}

/**
 * Rewrite a package-relative path into one URL per prefix, in chain order.
 *
 * @example
 * ```ts
 * rewritePath("jquery", "2.1.0", "jquery", [
 *   { prefix: "https://cdn.example.com/", includeVersion: true },
 *   { prefix: "/webjars/", includeVersion: false },
 * ]);
 * // ["https://cdn.example.com/jquery/2.1.0/jquery", "/webjars/jquery/jquery"]
 * ```
 */
export function rewritePath(
	packageId: string,
	version: string,
	relativePath: string,
	chain: PrefixChain,
): string[] {
	return chain.map((spec) =>
		prefixedPath(spec, packageId, version, relativePath),
	);
}

/**
 * Rewrite a path with the last prefix of the chain only.
 * Returns null for an empty chain.
 */
export function rewriteWithLastPrefix(
	packageId: string,
	version: string,
	relativePath: string,
	chain: PrefixChain,
): string | null {
	const last = chain[chain.length - 1];
	if (!last) return null;
	return prefixedPath(last, packageId, version, relativePath);
}

// =============================================================================
// Module names and entries
// =============================================================================

/**
 * RequireJS reads dots in module names as path separators, so they become
 * dashes (e.g., "validate.js" -> "validate-js")
 */
export function toModuleName(name: string): string {
	return name.replaceAll(".", "-");
}

/**
 * Turn a "main" file into a RequireJS module path: drop a trailing ".js",
 * then a leading "./"
 */
export function toModuleEntry(main: string): string {
	let entry = main;
	if (entry.endsWith(".js")) {
		entry = entry.slice(0, -".js".length);
	}
	if (entry.startsWith("./")) {
		entry = entry.slice(2);
	}
	return entry;
}

/**
 * Stable cache key for a prefix chain
 */
export function prefixChainKey(chain: PrefixChain): string {
	return JSON.stringify(
		chain.map((spec) => [spec.prefix, spec.includeVersion]),
	);
}

/**
 * Chain with every prefix carrying the version segment
 */
export function versionedChain(...prefixes: string[]): PrefixChain {
	return prefixes.map((prefix) => ({ prefix, includeVersion: true }));
}
