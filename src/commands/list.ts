/**
 * List command - Show installed webjars and how they resolved.
 */

import type { AggregateResult, ResolutionOutcome } from "@/lib/index";
import { prepareSetup, type ResolveOptions } from "./options";

export interface ListOptions extends ResolveOptions {
	json?: boolean;
}

interface WebJarListItem {
	id: string;
	version: string;
	format: string | null;
	status: string;
	modules: string[];
}

function describeOutcome(outcome: ResolutionOutcome | undefined): string {
	if (!outcome) return "unknown";
	return outcome.status === "resolved" ? "resolved" : outcome.reason;
}

/**
 * Build one list row per webjar, in registry order
 */
export function toListItems(result: AggregateResult): WebJarListItem[] {
	return [...result.versions].map(([id, version]) => {
		const outcome = result.outcomes.get(id);
		return {
			id,
			version,
			format: outcome?.format ?? null,
			status: describeOutcome(outcome),
			modules:
				outcome?.status === "resolved" ? Object.keys(outcome.config.paths) : [],
		};
	});
}

export async function list(options: ListOptions): Promise<void> {
	try {
		const { chain, setup } = await prepareSetup(options);
		const items = toListItems(await setup.resolveAll(chain));

		if (options.json) {
			console.log(JSON.stringify(items, null, 2));
			return;
		}

		if (items.length === 0) {
			console.log("No webjars found.");
			return;
		}

		console.log("Installed webjars:\n");
		for (const item of items) {
			console.log(`  ${item.id}@${item.version} (${item.format ?? "no metadata"})`);
			if (item.status === "resolved") {
				console.log(`    modules: ${item.modules.join(", ") || "(none)"}`);
			} else {
				console.log(`    Status: UNRESOLVED (${item.status})`);
			}
		}

		const resolvedCount = items.filter((i) => i.status === "resolved").length;
		console.log(`\nTotal: ${items.length} webjar(s) (${resolvedCount} resolved)`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
