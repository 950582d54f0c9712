import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import Mustache from "mustache";
import type { RenderContext } from "./lib/index";

// src/ and dist/ both sit one level below the package root
const __dirname = dirname(fileURLToPath(import.meta.url));

export const SETUP_TEMPLATE_PATH = join(
	__dirname,
	"..",
	"templates",
	"requirejs-setup.mustache",
);

let setupTemplate: Promise<string> | null = null;

/**
 * Read the setup script template (once per process)
 */
export function loadSetupTemplate(): Promise<string> {
	if (!setupTemplate) {
		setupTemplate = readFile(SETUP_TEMPLATE_PATH, "utf-8");
		setupTemplate.catch(() => {
			setupTemplate = null;
		});
	}
	return setupTemplate;
}

/**
 * Render the RequireJS setup script: the `webjars` versions object and a
 * `require` callback running every webjar's config
 */
export function renderSetupScript(
	template: string,
	context: RenderContext,
): string {
	return Mustache.render(template, context);
}
