/**
 * Bower and NPM webjars describe themselves with bower.json / package.json;
 * their RequireJS config is derived from the "name" and "main" fields.
 */

import { parseLenientJson } from "../descriptors";
import { packageDiagnostic } from "../diagnostics";
import { selectMainCandidate } from "../main-candidate";
import { contentPath, rewritePath, toModuleEntry, toModuleName } from "../paths";
import type { ResourceStore } from "../resource-store";
import {
	type JsonObject,
	type PackageRef,
	type ResolutionOutcome,
	resolved,
	unresolved,
} from "../types";
import type { FormatResolver } from "./types";

export type MainDescriptorFormat = "bower" | "npm";

export const DESCRIPTOR_FILES: Record<MainDescriptorFormat, string> = {
	bower: "bower.json",
	npm: "package.json",
};

/** Entry point assumed when a descriptor declares no "main" */
export const DEFAULT_MAIN = "index.js";

function nonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.trim() !== "";
}

/**
 * Find the main file of a webjar from its descriptor.
 *
 * - no "main" (or null): "index.js" if the webjar has one
 * - a string: that file
 * - an array: the best candidate (see {@link selectMainCandidate})
 *
 * @returns The main file as declared, or null when there is none
 */
export async function findMainFile(
	ref: PackageRef,
	descriptor: JsonObject,
	name: string,
	store: ResourceStore,
): Promise<string | null> {
	const main = descriptor.main;

	if (main === undefined || main === null) {
		const hasIndex = await store.exists(contentPath(ref, DEFAULT_MAIN));
		return hasIndex ? DEFAULT_MAIN : null;
	}

	if (typeof main === "string") {
		return nonEmptyString(main) ? main : null;
	}

	if (Array.isArray(main)) {
		const candidates = main.filter(nonEmptyString);
		return candidates.length > 0 ? selectMainCandidate(candidates, name) : null;
	}

	return null;
}

/**
 * Create the resolver for one of the descriptor formats
 */
export function createMainDescriptorResolver(
	format: MainDescriptorFormat,
): FormatResolver {
	return async (ref, chain, context): Promise<ResolutionOutcome> => {
		const path = contentPath(ref, DESCRIPTOR_FILES[format]);
		const text = await context.store.readText(path);

		if (text === null) {
			context.report(
				packageDiagnostic(
					"warn",
					"descriptor-missing",
					ref,
					`Could not create the RequireJS config: ${path} not found`,
				),
			);
			return unresolved(format, "descriptor-missing", path);
		}

		const parsed = parseLenientJson(text);
		if (!parsed.ok) {
			context.report(
				packageDiagnostic(
					"warn",
					"malformed-descriptor",
					ref,
					`Could not create the RequireJS config from ${path}: ${parsed.error}`,
				),
			);
			return unresolved(format, "malformed-descriptor", parsed.error);
		}

		const descriptor = parsed.value;
		const name = descriptor.name;
		if (!nonEmptyString(name)) {
			context.report(
				packageDiagnostic(
					"warn",
					"missing-name",
					ref,
					`Could not create the RequireJS config from ${path}: no 'name' field`,
				),
			);
			return unresolved(format, "missing-name", path);
		}

		const main = await findMainFile(ref, descriptor, name, context.store);
		if (main === null) {
			context.report(
				packageDiagnostic(
					"warn",
					"no-entry-point",
					ref,
					`Could not create the RequireJS config from ${path}: no usable 'main' field and no ${DEFAULT_MAIN}`,
				),
			);
			return unresolved(format, "no-entry-point", path);
		}

		const entry = toModuleEntry(main);
		return resolved(format, {
			paths: {
				[toModuleName(name)]: rewritePath(ref.id, ref.version, entry, chain),
			},
		});
	};
}

export const resolveBower = createMainDescriptorResolver("bower");

export const resolveNpm = createMainDescriptorResolver("npm");
