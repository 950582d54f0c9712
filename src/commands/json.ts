import { toSetupJson } from "@/lib/index";
import { prepareSetup, type ResolveOptions } from "./options";

export type JsonOptions = ResolveOptions;

/**
 * Print the RequireJS config of every webjar as JSON
 */
export async function json(options: JsonOptions): Promise<void> {
	try {
		const { chain, setup } = await prepareSetup(options);
		const result = await setup.resolveAll(chain);
		console.log(JSON.stringify(toSetupJson(result), null, 2));
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
