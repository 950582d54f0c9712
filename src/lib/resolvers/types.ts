import type { Reporter } from "../diagnostics";
import type { ResourceStore } from "../resource-store";
import type { PackageRef, PrefixChain, ResolutionOutcome } from "../types";

/**
 * What a resolver reads from and reports to
 */
export interface ResolveContext {
	store: ResourceStore;
	report: Reporter;
}

/**
 * Turns one webjar's descriptor into its RequireJS config
 */
export type FormatResolver = (
	ref: PackageRef,
	chain: PrefixChain,
	context: ResolveContext,
) => Promise<ResolutionOutcome>;
