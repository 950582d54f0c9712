/**
 * Programmatic entry point.
 *
 * @example
 * ```ts
 * import { FileResourceStore, LoaderSetup } from "webjars-loader-config";
 *
 * const store = await FileResourceStore.open(["target/classes"]);
 * const setup = new LoaderSetup({ store });
 * const script = await setup.getSetupScript("https://cdn.example.com/webjars/", "/webjars/");
 * ```
 */

export {
	type ConfigLocations,
	type FileConfig,
	type ResolvedConfig,
	resolveConfig,
	toPrefixChain,
} from "./config";
export {
	ConfigError,
	describeError,
	InvalidPrefixError,
	ResourceRootError,
} from "./errors";
export * from "./lib/index";
export { loadSetupTemplate, renderSetupScript } from "./render";
export { FileResourceStore } from "./resources";
export { LoaderSetup, type LoaderSetupOptions, validatePrefixChain } from "./setup";
