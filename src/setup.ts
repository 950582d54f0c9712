/**
 * RequireJS setup for the webjars in a resource store.
 *
 * Results are cached per prefix chain for the lifetime of the instance, so
 * resolving and rendering only happen once per chain.
 */

import { InvalidPrefixError } from "./errors";
import {
	type AggregateResult,
	aggregate,
	buildRenderContext,
	listWebJars,
	logDiagnostic,
	type ModuleConfig,
	type PrefixChain,
	type Reporter,
	ResolutionCache,
	type ResourceStore,
	toSetupJson,
	versionedChain,
} from "./lib/index";
import { loadSetupTemplate, renderSetupScript } from "./render";

export interface LoaderSetupOptions {
	store: ResourceStore;
	/** Where diagnostics go (default: console) */
	report?: Reporter;
}

/**
 * Check that every prefix of a chain is a non-empty string
 */
export function validatePrefixChain(chain: PrefixChain): PrefixChain {
	for (const spec of chain) {
		if (typeof spec.prefix !== "string" || spec.prefix === "") {
			throw new InvalidPrefixError(spec.prefix);
		}
	}
	return chain;
}

function chainOf(first: string, second?: string): PrefixChain {
	// (urlPrefix) or (cdnPrefix, urlPrefix)
	const chain =
		second === undefined ? versionedChain(first) : versionedChain(first, second);
	return validatePrefixChain(chain);
}

export class LoaderSetup {
	private readonly store: ResourceStore;
	private readonly report: Reporter;
	private readonly aggregates = new ResolutionCache<AggregateResult>();
	private readonly scripts = new ResolutionCache<string>();

	constructor(options: LoaderSetupOptions) {
		this.store = options.store;
		this.report = options.report ?? logDiagnostic;
	}

	/**
	 * Resolve every webjar for a chain (cached). Returns a copy of the cached
	 * result.
	 */
	async resolveAll(chain: PrefixChain): Promise<AggregateResult> {
		return structuredClone(await this.cachedAggregate(chain));
	}

	/**
	 * JSON setup, cached. Pass `(urlPrefix)`, or `(cdnPrefix, urlPrefix)` to
	 * try the CDN first.
	 *
	 * @example
	 * ```ts
	 * const json = await setup.getSetupJson("https://cdn.example.com/webjars/", "/webjars/");
	 * json.jquery.paths.jquery;
	 * // ["https://cdn.example.com/webjars/jquery/2.1.0/jquery", "/webjars/jquery/2.1.0/jquery", "jquery"]
	 * ```
	 */
	async getSetupJson(
		first: string,
		second?: string,
	): Promise<Record<string, ModuleConfig>> {
		return toSetupJson(await this.cachedAggregate(chainOf(first, second)));
	}

	/**
	 * Setup script, cached. Same arguments as {@link getSetupJson}.
	 */
	async getSetupScript(first: string, second?: string): Promise<string> {
		const chain = chainOf(first, second);
		return this.scripts.get(chain, () => this.renderScript(chain));
	}

	/**
	 * JSON setup for any chain, resolved again on every call
	 */
	async generateSetupJson(
		chain: PrefixChain,
	): Promise<Record<string, ModuleConfig>> {
		validatePrefixChain(chain);
		return toSetupJson(await this.computeAggregate(chain));
	}

	/**
	 * Setup script for any chain, resolved and rendered on every call
	 */
	async generateSetupScript(chain: PrefixChain): Promise<string> {
		validatePrefixChain(chain);
		const result = await this.computeAggregate(chain);
		return this.render(result, chain);
	}

	private cachedAggregate(chain: PrefixChain): Promise<AggregateResult> {
		validatePrefixChain(chain);
		return this.aggregates.get(chain, () => this.computeAggregate(chain));
	}

	private async computeAggregate(chain: PrefixChain): Promise<AggregateResult> {
		const webJars = await listWebJars(this.store);
		return aggregate(webJars, chain, {
			store: this.store,
			report: this.report,
		});
	}

	private async renderScript(chain: PrefixChain): Promise<string> {
		return this.render(await this.cachedAggregate(chain), chain);
	}

	private async render(
		result: AggregateResult,
		chain: PrefixChain,
	): Promise<string> {
		const [template, context] = await Promise.all([
			loadSetupTemplate(),
			buildRenderContext(result, chain, {
				store: this.store,
				report: this.report,
			}),
		]);
		return renderSetupScript(template, context);
	}
}
