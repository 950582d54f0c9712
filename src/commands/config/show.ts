import { getConfigPath, resolveConfig, toPrefixChain } from "@/config";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();
		const chain = toPrefixChain(resolved);

		console.log("Resolved Configuration:\n");
		console.log(`  Roots:       ${resolved.roots.join(", ")}`);
		console.log(`  Prefix:      ${resolved.prefix}`);
		console.log(`  CDN prefix:  ${resolved.cdnPrefix || "(not set)"}`);
		console.log(`  Versioned:   ${resolved.versioned}`);
		console.log("");
		console.log("Prefix chain (most preferred first):");
		for (const spec of chain) {
			console.log(
				`  ${spec.prefix}<id>${spec.includeVersion ? "/<version>" : ""}/<path>`,
			);
		}
		console.log("");
		console.log("Config Locations:");
		console.log(
			`  User config:    ${resolved.userConfigPath ?? `${getConfigPath()} (not found)`}`,
		);
		console.log(`  Project config: ${resolved.projectConfigPath ?? "(none)"}`);
		console.log("");
		console.log("Environment Variables:");
		for (const name of [
			"WEBJARS_ROOT",
			"WEBJARS_PREFIX",
			"WEBJARS_CDN_PREFIX",
			"WEBJARS_VERSIONED",
		]) {
			console.log(`  ${name.padEnd(19)}${process.env[name] || "(not set)"}`);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
