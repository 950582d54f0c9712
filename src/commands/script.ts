import { writeFile } from "node:fs/promises";
import { prepareSetup, type ResolveOptions } from "./options";

export interface ScriptOptions extends ResolveOptions {
	/** Write to this file instead of stdout */
	out?: string;
}

/**
 * Print (or write) the RequireJS setup script
 */
export async function script(options: ScriptOptions): Promise<void> {
	try {
		const { chain, setup } = await prepareSetup(options);
		const text = await setup.generateSetupScript(chain);

		if (options.out) {
			await writeFile(options.out, text);
			console.error(`Wrote RequireJS setup to ${options.out}`);
			return;
		}

		process.stdout.write(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
