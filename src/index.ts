#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { configInit, configShow, json, list, script } from "./commands/index";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = JSON.parse(
	readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
);
const version: string = packageJson.version;

const program = new Command();

program
	.name("webjars-loader")
	.description("RequireJS configuration for the webjars on a resource path")
	.version(version);

/**
 * Options every resolving command takes; they override .webjarsrc and the
 * environment
 */
function withResolveOptions(command: Command): Command {
	return command
		.option(
			"-r, --root <dir...>",
			"Resource root(s) containing META-INF/ (searched in order)",
		)
		.option("-p, --prefix <url>", "Local URL prefix (e.g., /webjars/)")
		.option("-c, --cdn-prefix <url>", "CDN URL prefix, tried before the local one")
		.option("--versioned", "Include the version in generated URLs")
		.option("--no-versioned", "Leave the version out of generated URLs");
}

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program
	.command("config")
	.description("Manage webjars-loader configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

withResolveOptions(
	configCmd
		.command("init")
		.description("Create a .webjarsrc file in the current directory"),
)
	.option("-f, --force", "Overwrite an existing .webjarsrc")
	.action(async (options) => {
		await configInit({
			root: options.root,
			prefix: options.prefix,
			cdnPrefix: options.cdnPrefix,
			versioned: options.versioned,
			force: options.force,
		});
	});

// =============================================================================
// Resolution commands
// =============================================================================

withResolveOptions(
	program
		.command("json")
		.description("Print the RequireJS config of every webjar as JSON"),
).action(async (options) => {
	await json({
		root: options.root,
		prefix: options.prefix,
		cdnPrefix: options.cdnPrefix,
		versioned: options.versioned,
	});
});

withResolveOptions(
	program
		.command("script")
		.description("Print the RequireJS setup script for a <script> tag"),
)
	.option("-o, --out <file>", "Write the script to a file")
	.action(async (options) => {
		await script({
			root: options.root,
			prefix: options.prefix,
			cdnPrefix: options.cdnPrefix,
			versioned: options.versioned,
			out: options.out,
		});
	});

withResolveOptions(
	program
		.command("list")
		.description("List installed webjars and how their config resolved"),
)
	.option("--json", "Output as JSON")
	.action(async (options) => {
		await list({
			root: options.root,
			prefix: options.prefix,
			cdnPrefix: options.cdnPrefix,
			versioned: options.versioned,
			json: options.json,
		});
	});

program.parse();
