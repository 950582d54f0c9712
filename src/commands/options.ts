import { type ResolvedConfig, resolveConfig, toPrefixChain } from "@/config";
import type { PrefixChain } from "@/lib/index";
import { FileResourceStore } from "@/resources";
import { LoaderSetup } from "@/setup";

/**
 * Options shared by the commands that resolve webjars
 */
export interface ResolveOptions {
	root?: string[];
	prefix?: string;
	cdnPrefix?: string;
	versioned?: boolean;
}

export interface PreparedSetup {
	config: ResolvedConfig;
	chain: PrefixChain;
	setup: LoaderSetup;
}

/**
 * Resolve config (command-line options win), open the resource roots and
 * build the setup
 */
export async function prepareSetup(
	options: ResolveOptions,
): Promise<PreparedSetup> {
	const resolved = await resolveConfig();
	const config: ResolvedConfig = {
		...resolved,
		roots: options.root?.length ? options.root : resolved.roots,
		prefix: options.prefix ?? resolved.prefix,
		cdnPrefix: options.cdnPrefix ?? resolved.cdnPrefix,
		versioned: options.versioned ?? resolved.versioned,
	};

	const store = await FileResourceStore.open(config.roots);
	return {
		config,
		chain: toPrefixChain(config),
		setup: new LoaderSetup({ store }),
	};
}
