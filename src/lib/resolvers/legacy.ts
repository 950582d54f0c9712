/**
 * Legacy webjars embed their RequireJS config as lenient JSON in a
 * `<requirejs>` property of their pom.xml.
 */

import { extractPomProperty, parseLenientJson } from "../descriptors";
import { packageDiagnostic, type Reporter } from "../diagnostics";
import { markerPath, rewritePath, rewriteWithLastPrefix } from "../paths";
import {
	isJsonObject,
	type JsonObject,
	type JsonValue,
	type ModuleConfig,
	type PackageRef,
	type PrefixChain,
	type ResolutionOutcome,
	resolved,
	unresolved,
} from "../types";
import type { ResolveContext } from "./types";

export const REQUIREJS_PROPERTY = "requirejs";

/**
 * Read the raw RequireJS config text from a legacy webjar's pom.xml.
 * Returns "" when the pom or the property is missing, or the pom is not XML.
 */
export async function readLegacyRequireJsConfig(
	ref: PackageRef,
	context: ResolveContext,
): Promise<string> {
	const path = markerPath("legacy", ref.id);
	const xml = await context.store.readText(path);

	if (xml === null) {
		context.report(
			packageDiagnostic(
				"warn",
				"descriptor-missing",
				ref,
				`Could not read the RequireJS config: ${path} not found`,
			),
		);
		return "";
	}

	const property = extractPomProperty(xml, REQUIREJS_PROPERTY);
	if (!property.ok) {
		context.report(
			packageDiagnostic(
				"warn",
				"malformed-descriptor",
				ref,
				`Could not read the RequireJS config from ${path}: ${property.error}`,
			),
		);
		return "";
	}

	return property.value ?? "";
}

function originalPath(entry: JsonValue): string | null {
	if (typeof entry === "string") return entry;
	// Only the first location of an array is kept
	const first = Array.isArray(entry) ? entry[0] : undefined;
	return typeof first === "string" ? first : null;
}

function rewriteLegacyPaths(
	ref: PackageRef,
	value: JsonValue | undefined,
	chain: PrefixChain,
	report: Reporter,
): Record<string, string[]> {
	const paths: Record<string, string[]> = {};
	if (value === undefined) return paths;

	if (!isJsonObject(value)) {
		report(
			packageDiagnostic(
				"error",
				"unparseable-path",
				ref,
				`The 'paths' field is not an object and was dropped: ${JSON.stringify(value)}`,
			),
		);
		return paths;
	}

	for (const [moduleName, entry] of Object.entries(value)) {
		const original = originalPath(entry);
		if (original === null) {
			report(
				packageDiagnostic(
					"error",
					"unparseable-path",
					ref,
					`The path for '${moduleName}' could not be parsed: ${JSON.stringify(entry)}`,
				),
			);
			continue;
		}
		paths[moduleName] = [
			...rewritePath(ref.id, ref.version, original, chain),
			original,
		];
	}

	return paths;
}

function rewriteLegacyPackages(
	ref: PackageRef,
	value: JsonValue | undefined,
	chain: PrefixChain,
	report: Reporter,
): JsonValue[] {
	if (value === undefined) return [];

	if (!Array.isArray(value)) {
		report(
			packageDiagnostic(
				"error",
				"unparseable-path",
				ref,
				`The 'packages' field is not an array and was dropped: ${JSON.stringify(value)}`,
			),
		);
		return [];
	}

	return value.map((entry) => {
		if (!isJsonObject(entry) || typeof entry.location !== "string") {
			return entry;
		}
		// The last prefix is the local one; package sub-modules are not
		// pointed at the CDN
		const location = rewriteWithLastPrefix(
			ref.id,
			ref.version,
			entry.location,
			chain,
		);
		return location === null ? entry : { ...entry, location };
	});
}

/**
 * Rewrite the locations of a parsed legacy config.
 *
 * - `paths`: every prefixed URL, then the original relative path
 * - `packages`: `location` rewritten with the last prefix only
 * - any other field is kept as is
 */
export function rewriteLegacyConfig(
	ref: PackageRef,
	raw: JsonObject,
	chain: PrefixChain,
	report: Reporter,
): ModuleConfig {
	const paths = rewriteLegacyPaths(ref, raw.paths, chain, report);
	const packages = rewriteLegacyPackages(ref, raw.packages, chain, report);

	// Spreading keeps "paths" and "packages" where the source had them
	return { ...raw, paths, packages };
}

export async function resolveLegacy(
	ref: PackageRef,
	chain: PrefixChain,
	context: ResolveContext,
): Promise<ResolutionOutcome> {
	const text = await readLegacyRequireJsConfig(ref, context);

	if (text.trim() === "") {
		context.report(
			packageDiagnostic(
				"debug",
				"descriptor-missing",
				ref,
				"No RequireJS config in the pom.xml properties",
			),
		);
		return unresolved("legacy", "descriptor-missing", "no requirejs property");
	}

	const parsed = parseLenientJson(text);
	if (!parsed.ok) {
		context.report(
			packageDiagnostic(
				"warn",
				"malformed-descriptor",
				ref,
				`Could not parse the RequireJS config from ${markerPath("legacy", ref.id)}`,
			),
		);
		context.report(
			packageDiagnostic("error", "malformed-descriptor", ref, parsed.error),
		);
		return unresolved("legacy", "malformed-descriptor", parsed.error);
	}

	return resolved(
		"legacy",
		rewriteLegacyConfig(ref, parsed.value, chain, context.report),
	);
}
