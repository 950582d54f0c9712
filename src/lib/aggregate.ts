/**
 * Resolves every installed webjar and merges the results into one
 * RequireJS setup.
 *
 * One webjar failing to resolve never stops the others: it is recorded as
 * unresolved, with diagnostics explaining why.
 */

import { describeError } from "@/errors";
import {
	collectDiagnostics,
	type Diagnostic,
	logDiagnostic,
	packageDiagnostic,
	type Reporter,
} from "./diagnostics";
import { contentPath, LEGACY_SCRIPT_FILE } from "./paths";
import { toVersionMap } from "./registry";
import type { ResourceStore } from "./resource-store";
import { resolvePackage } from "./resolvers/dispatch";
import type { ResolveContext } from "./resolvers/types";
import {
	isEmptyModuleConfig,
	type ModuleConfig,
	type PackageRef,
	type PrefixChain,
	type ResolutionOutcome,
	unresolved,
} from "./types";

// =============================================================================
// Types
// =============================================================================

/** Webjar id -> config, for the webjars that resolved */
export type AggregateConfig = Map<string, ModuleConfig>;

export interface AggregateResult {
	/** Webjar id -> version, in registry order */
	versions: Map<string, string>;
	/** Webjar id -> outcome, in registry order */
	outcomes: Map<string, ResolutionOutcome>;
	/** Configs of the resolved webjars, in registry order */
	configs: AggregateConfig;
	/** Everything reported while resolving */
	diagnostics: Diagnostic[];
}

export interface AggregateOptions {
	store: ResourceStore;
	/** Where diagnostics go besides the result (default: console) */
	report?: Reporter;
}

/**
 * View consumed by the setup script template
 */
export interface RenderContext {
	webJarVersions: Array<{
		idJson: string;
		versionJson: string;
		comma: boolean;
	}>;
	webJarPaths: Array<{
		prefixJson: string;
		versioned: boolean;
		comma: boolean;
	}>;
	/** One script block per webjar with a config, in registry order */
	webJarConfigs: string[];
}

// =============================================================================
// Aggregation
// =============================================================================

async function resolveIsolated(
	ref: PackageRef,
	chain: PrefixChain,
	context: ResolveContext,
): Promise<ResolutionOutcome> {
	let outcome: ResolutionOutcome;
	try {
		outcome = await resolvePackage(ref, chain, context);
	} catch (error) {
		context.report(
			packageDiagnostic(
				"error",
				"resolution-failed",
				ref,
				`Resolving the RequireJS config failed: ${describeError(error)}`,
			),
		);
		return unresolved(null, "malformed-descriptor", describeError(error));
	}

	if (outcome.status === "resolved" && isEmptyModuleConfig(outcome.config)) {
		context.report(
			packageDiagnostic(
				"debug",
				"empty-config",
				ref,
				`The ${outcome.format} metadata has no RequireJS config entries`,
			),
		);
		return unresolved(outcome.format, "empty-config");
	}

	return outcome;
}

/**
 * Resolve the RequireJS config of every webjar for one prefix chain.
 * Webjars are resolved concurrently; the result keeps the given order.
 */
export async function aggregate(
	packages: readonly PackageRef[],
	chain: PrefixChain,
	options: AggregateOptions,
): Promise<AggregateResult> {
	const { diagnostics, report } = collectDiagnostics(
		options.report ?? logDiagnostic,
	);
	const context: ResolveContext = { store: options.store, report };

	if (packages.length === 0) {
		report({
			level: "warn",
			code: "no-webjars",
			message: "Can't find any WebJars, the RequireJS configuration will be empty.",
		});
	}

	const settled = await Promise.all(
		packages.map((ref) => resolveIsolated(ref, chain, context)),
	);

	const outcomes = new Map<string, ResolutionOutcome>();
	const configs: AggregateConfig = new Map();
	packages.forEach((ref, index) => {
		const outcome = settled[index];
		outcomes.set(ref.id, outcome);
		if (outcome.status === "resolved") {
			configs.set(ref.id, outcome.config);
		}
	});

	return {
		versions: toVersionMap(packages),
		outcomes,
		configs,
		diagnostics,
	};
}

/**
 * The JSON setup: webjar id -> config. Unresolved webjars are left out.
 * The configs are copies; editing them leaves `result` unchanged.
 */
export function toSetupJson(result: AggregateResult): Record<string, ModuleConfig> {
	return structuredClone(Object.fromEntries(result.configs));
}

// =============================================================================
// Script rendering
// =============================================================================

/**
 * Read a webjar's legacy webjars-requirejs.js, headed by a comment naming
 * the webjar. Returns null when it has none.
 */
export async function readLegacyScript(
	ref: PackageRef,
	context: ResolveContext,
): Promise<string | null> {
	const text = await context.store.readText(contentPath(ref, LEGACY_SCRIPT_FILE));
	if (text === null) return null;

	context.report(
		packageDiagnostic(
			"warn",
			"legacy-script",
			ref,
			`Using the legacy ${LEGACY_SCRIPT_FILE} RequireJS config. A newer version of this WebJar may provide package metadata instead.`,
		),
	);

	const lines = text.split(/\r?\n/);
	if (lines.at(-1) === "") lines.pop();
	return [`// WebJar config for ${ref.id}`, ...lines].join("\n");
}

/**
 * Script block configuring RequireJS for one resolved webjar
 */
export function toConfigStatement(config: ModuleConfig): string {
	return `requirejs.config(${JSON.stringify(config)});`;
}

/**
 * Assemble the template view for the setup script. Unresolved webjars fall
 * back to their legacy script, or are left out when they have none.
 */
export async function buildRenderContext(
	result: AggregateResult,
	chain: PrefixChain,
	context: ResolveContext,
): Promise<RenderContext> {
	const refs = [...result.versions].map(([id, version]) => ({ id, version }));

	const blocks = await Promise.all(
		refs.map(async (ref) => {
			const config = result.configs.get(ref.id);
			if (config) return toConfigStatement(config);
			return readLegacyScript(ref, context);
		}),
	);

	return {
		webJarVersions: refs.map((ref, index) => ({
			idJson: JSON.stringify(ref.id),
			versionJson: JSON.stringify(ref.version),
			comma: index < refs.length - 1,
		})),
		webJarPaths: chain.map((spec, index) => ({
			prefixJson: JSON.stringify(spec.prefix),
			versioned: spec.includeVersion,
			comma: index < chain.length - 1,
		})),
		webJarConfigs: blocks.filter((block): block is string => block !== null),
	};
}
