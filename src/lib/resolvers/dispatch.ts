import { packageDiagnostic } from "../diagnostics";
import { markerPath } from "../paths";
import type { ResourceStore } from "../resource-store";
import {
	type DescriptorFormat,
	type PackageRef,
	type PrefixChain,
	type ResolutionOutcome,
	unresolved,
} from "../types";
import { resolveLegacy } from "./legacy";
import { resolveBower, resolveNpm } from "./main-descriptor";
import type { FormatResolver, ResolveContext } from "./types";

/** Order in which format markers are checked; the first match wins */
export const FORMAT_PRIORITY: readonly DescriptorFormat[] = [
	"npm",
	"bower",
	"legacy",
];

const RESOLVERS: Record<DescriptorFormat, FormatResolver> = {
	npm: resolveNpm,
	bower: resolveBower,
	legacy: resolveLegacy,
};

/**
 * Detect which descriptor format a webjar uses from its Maven marker
 *
 * @returns The format, or null when the webjar has no known marker
 */
export async function classifyPackage(
	packageId: string,
	store: ResourceStore,
): Promise<DescriptorFormat | null> {
	for (const format of FORMAT_PRIORITY) {
		if (await store.exists(markerPath(format, packageId))) {
			return format;
		}
	}
	return null;
}

/**
 * Resolve one webjar with the resolver for its format
 */
export async function resolvePackage(
	ref: PackageRef,
	chain: PrefixChain,
	context: ResolveContext,
): Promise<ResolutionOutcome> {
	const format = await classifyPackage(ref.id, context.store);

	if (format === null) {
		context.report(
			packageDiagnostic(
				"debug",
				"no-descriptor",
				ref,
				"No npm, bower or legacy metadata found",
			),
		);
		return unresolved(null, "no-descriptor");
	}

	return RESOLVERS[format](ref, chain, context);
}
