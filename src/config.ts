import { readFile, stat, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { delimiter, dirname, join, resolve } from "node:path";
import * as ini from "ini";
import { ConfigError, InvalidPrefixError } from "./errors";
import type { PrefixChain } from "./lib/index";

// =============================================================================
// Types
// =============================================================================

/**
 * Settings read from a .webjarsrc file (INI format)
 *
 * ```ini
 * ; Where webjars are unpacked (repeat root[] for several)
 * root = target/classes
 * prefix = /webjars/
 * cdnPrefix = https://cdn.jsdelivr.net/webjars/
 * versioned = true
 * ```
 */
export interface FileConfig {
	/** Resource roots, resolved against the file's directory */
	roots?: string[];
	prefix?: string;
	cdnPrefix?: string;
	versioned?: boolean;
}

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	roots: string[];
	prefix: string;
	cdnPrefix?: string;
	versioned: boolean;
	/** Config files that contributed, if any */
	userConfigPath: string | null;
	projectConfigPath: string | null;
}

export interface ConfigLocations {
	cwd?: string;
	homeDir?: string;
	env?: NodeJS.ProcessEnv;
}

// =============================================================================
// Constants
// =============================================================================

export const CONFIG_FILE_NAME = ".webjarsrc";

export const DEFAULT_PREFIX = "/webjars/";

/**
 * Get the user config file path (~/.webjarsrc)
 */
export function getConfigPath(homeDir: string = homedir()): string {
	return join(homeDir, CONFIG_FILE_NAME);
}

function isDebug(env: NodeJS.ProcessEnv): boolean {
	return Boolean(env.WEBJARS_DEBUG);
}

// =============================================================================
// INI Config Functions
// =============================================================================

function asString(value: unknown, key: string, path: string): string | undefined {
	if (value === undefined) return undefined;
	if (typeof value !== "string") {
		throw new ConfigError(`Invalid '${key}' in ${path}: expected a string`);
	}
	return value;
}

function asBoolean(value: unknown, key: string, path: string): boolean | undefined {
	if (value === undefined || typeof value === "boolean") return value;
	if (value === "true" || value === "1") return true;
	if (value === "false" || value === "0") return false;
	throw new ConfigError(`Invalid '${key}' in ${path}: expected true or false`);
}

/**
 * Parse the contents of a .webjarsrc file
 *
 * @param content - INI text
 * @param path - Path of the file, used to resolve relative roots
 */
export function parseConfigFile(content: string, path: string): FileConfig {
	const parsed: Record<string, unknown> = ini.parse(content);
	const baseDir = dirname(path);

	const rawRoots = parsed.root;
	let roots: string[] | undefined;
	if (typeof rawRoots === "string") {
		roots = [resolve(baseDir, rawRoots)];
	} else if (Array.isArray(rawRoots)) {
		roots = rawRoots
			.filter((root): root is string => typeof root === "string")
			.map((root) => resolve(baseDir, root));
	}

	return {
		roots,
		prefix: asString(parsed.prefix, "prefix", path),
		cdnPrefix: asString(parsed.cdnPrefix, "cdnPrefix", path),
		versioned: asBoolean(parsed.versioned, "versioned", path),
	};
}

async function readConfigFile(
	path: string,
	env: NodeJS.ProcessEnv,
): Promise<FileConfig | null> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch {
		return null;
	}

	const config = parseConfigFile(content, path);
	if (isDebug(env)) {
		console.error(`[config] Read ${path}:`, JSON.stringify(config, null, 2));
	}
	return config;
}

/**
 * Read the user config file (~/.webjarsrc)
 */
export async function readUserConfig(
	locations: ConfigLocations = {},
): Promise<FileConfig | null> {
	return readConfigFile(
		getConfigPath(locations.homeDir),
		locations.env ?? process.env,
	);
}

/**
 * Find the nearest project .webjarsrc by searching up the directory tree,
 * stopping before the home directory (which holds the user config)
 */
export async function findProjectConfigPath(
	locations: ConfigLocations = {},
): Promise<string | null> {
	const home = resolve(locations.homeDir ?? homedir());
	let currentDir = resolve(locations.cwd ?? process.cwd());

	while (currentDir !== home) {
		const configPath = join(currentDir, CONFIG_FILE_NAME);
		try {
			const stats = await stat(configPath);
			if (stats.isFile()) return configPath;
		} catch {
			// Not here, keep searching
		}

		const parent = dirname(currentDir);
		if (parent === currentDir) break;
		currentDir = parent;
	}

	return null;
}

/**
 * Write a project config file
 */
export async function writeProjectConfig(
	dir: string,
	config: FileConfig,
): Promise<string> {
	const configPath = join(dir, CONFIG_FILE_NAME);
	const lines: string[] = ["; WebJars RequireJS configuration", ""];

	for (const root of config.roots ?? []) {
		lines.push(`root[] = ${root}`);
	}
	if (config.prefix) {
		lines.push(`prefix = ${config.prefix}`);
	}
	if (config.cdnPrefix) {
		lines.push(`cdnPrefix = ${config.cdnPrefix}`);
	}
	if (config.versioned !== undefined) {
		lines.push(`versioned = ${config.versioned}`);
	}

	// Always end with a newline
	lines.push("");

	await writeFile(configPath, lines.join("\n"));
	return configPath;
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Environment variables (WEBJARS_ROOT, WEBJARS_PREFIX, WEBJARS_CDN_PREFIX, WEBJARS_VERSIONED)
 * 2. Project config (.webjarsrc in the project directory or above)
 * 3. User config (~/.webjarsrc)
 * 4. Defaults
 */
export async function resolveConfig(
	locations: ConfigLocations = {},
): Promise<ResolvedConfig> {
	const env = locations.env ?? process.env;
	const cwd = resolve(locations.cwd ?? process.cwd());

	const userConfigPath = getConfigPath(locations.homeDir);
	const userConfig = await readConfigFile(userConfigPath, env);
	const projectConfigPath = await findProjectConfigPath(locations);
	const projectConfig = projectConfigPath
		? await readConfigFile(projectConfigPath, env)
		: null;

	// Later layers override earlier ones
	const layers: FileConfig[] = [userConfig ?? {}, projectConfig ?? {}];

	const envRoots = env.WEBJARS_ROOT?.split(delimiter).filter(Boolean);
	layers.push({
		roots: envRoots?.length ? envRoots.map((root) => resolve(cwd, root)) : undefined,
		prefix: env.WEBJARS_PREFIX || undefined,
		cdnPrefix: env.WEBJARS_CDN_PREFIX || undefined,
		versioned: asBoolean(
			env.WEBJARS_VERSIONED || undefined,
			"WEBJARS_VERSIONED",
			"the environment",
		),
	});

	const resolved: ResolvedConfig = {
		roots: [cwd],
		prefix: DEFAULT_PREFIX,
		versioned: true,
		userConfigPath: userConfig ? userConfigPath : null,
		projectConfigPath: projectConfig ? projectConfigPath : null,
	};

	for (const layer of layers) {
		if (layer.roots?.length) resolved.roots = layer.roots;
		if (layer.prefix) resolved.prefix = layer.prefix;
		if (layer.cdnPrefix) resolved.cdnPrefix = layer.cdnPrefix;
		if (layer.versioned !== undefined) resolved.versioned = layer.versioned;
	}

	if (isDebug(env)) {
		console.error("[config] Resolved config:", JSON.stringify(resolved, null, 2));
	}

	return resolved;
}

/**
 * Prefix chain for a resolved config: the CDN (when set), then the local
 * prefix
 */
export function toPrefixChain(
	config: Pick<ResolvedConfig, "prefix" | "cdnPrefix" | "versioned">,
): PrefixChain {
	if (!config.prefix) {
		throw new InvalidPrefixError(config.prefix);
	}
	const prefixes = config.cdnPrefix
		? [config.cdnPrefix, config.prefix]
		: [config.prefix];
	return prefixes.map((prefix) => ({
		prefix,
		includeVersion: config.versioned,
	}));
}
