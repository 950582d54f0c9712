/**
 * RequireJS config resolution for webjars.
 *
 * This module contains the resolution engine: format detection, descriptor
 * parsing, entry file selection and URL rewriting. It reads webjars only
 * through a {@link ResourceStore}.
 */

// Aggregation
export {
	type AggregateConfig,
	type AggregateOptions,
	type AggregateResult,
	aggregate,
	buildRenderContext,
	readLegacyScript,
	type RenderContext,
	toConfigStatement,
	toSetupJson,
} from "./aggregate";
// Cache
export { ResolutionCache } from "./cache";
// Descriptor parsing
export {
	extractPomProperty,
	type ParseResult,
	parseLenientJson,
} from "./descriptors";
// Diagnostics
export {
	collectDiagnostics,
	type Diagnostic,
	type DiagnosticCode,
	type DiagnosticLevel,
	formatDiagnostic,
	logDiagnostic,
	packageDiagnostic,
	type Reporter,
} from "./diagnostics";
// Entry file heuristic
export { selectMainCandidate } from "./main-candidate";
// Paths
export {
	contentPath,
	LEGACY_SCRIPT_FILE,
	MAVEN_GROUPS,
	markerPath,
	prefixChainKey,
	rewritePath,
	rewriteWithLastPrefix,
	toModuleEntry,
	toModuleName,
	versionedChain,
	WEBJARS_MAVEN_PREFIX,
	WEBJARS_PATH_PREFIX,
} from "./paths";
// Package registry
export { listWebJars, toVersionMap } from "./registry";
// Resource access
export { MemoryResourceStore, type ResourceStore } from "./resource-store";
// Resolvers
export {
	classifyPackage,
	createMainDescriptorResolver,
	DEFAULT_MAIN,
	DESCRIPTOR_FILES,
	FORMAT_PRIORITY,
	findMainFile,
	type FormatResolver,
	type MainDescriptorFormat,
	readLegacyRequireJsConfig,
	REQUIREJS_PROPERTY,
	type ResolveContext,
	resolveBower,
	resolveLegacy,
	resolveNpm,
	resolvePackage,
	rewriteLegacyConfig,
} from "./resolvers/index";
// Types
export {
	type DescriptorFormat,
	isEmptyModuleConfig,
	isJsonObject,
	type JsonObject,
	type JsonValue,
	type ModuleConfig,
	type PackageRef,
	type PrefixChain,
	type PrefixSpec,
	type ResolutionOutcome,
	resolved,
	type UnresolvedReason,
	unresolved,
} from "./types";
// Versions
export { pickInstalledVersion } from "./version";
