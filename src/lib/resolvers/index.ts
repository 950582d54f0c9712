export { classifyPackage, FORMAT_PRIORITY, resolvePackage } from "./dispatch";
export {
	readLegacyRequireJsConfig,
	REQUIREJS_PROPERTY,
	resolveLegacy,
	rewriteLegacyConfig,
} from "./legacy";
export {
	createMainDescriptorResolver,
	DEFAULT_MAIN,
	DESCRIPTOR_FILES,
	findMainFile,
	type MainDescriptorFormat,
	resolveBower,
	resolveNpm,
} from "./main-descriptor";
export type { FormatResolver, ResolveContext } from "./types";
