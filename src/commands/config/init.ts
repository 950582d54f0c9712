import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILE_NAME, writeProjectConfig } from "@/config";

export interface ConfigInitOptions {
	root?: string[];
	prefix?: string;
	cdnPrefix?: string;
	versioned?: boolean;
	force?: boolean;
}

async function fileExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Create a .webjarsrc file in the current directory (INI format)
 */
export async function configInit(options: ConfigInitOptions): Promise<void> {
	try {
		const cwd = process.cwd();

		if (!options.force && (await fileExists(join(cwd, CONFIG_FILE_NAME)))) {
			console.error(
				`Error: ${CONFIG_FILE_NAME} already exists in this directory. Use --force to overwrite it.`,
			);
			process.exit(1);
		}

		const configPath = await writeProjectConfig(cwd, {
			roots: options.root,
			prefix: options.prefix,
			cdnPrefix: options.cdnPrefix,
			versioned: options.versioned,
		});

		console.log(`Created ${CONFIG_FILE_NAME}`);
		console.log("");
		console.log("Contents:");
		console.log(await readFile(configPath, "utf-8"));
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
