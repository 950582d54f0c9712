import type { PackageRef } from "./types";

export type DiagnosticLevel = "debug" | "warn" | "error";

export type DiagnosticCode =
	| "no-webjars"
	| "no-descriptor"
	| "descriptor-missing"
	| "malformed-descriptor"
	| "unparseable-path"
	| "missing-name"
	| "no-entry-point"
	| "empty-config"
	| "legacy-script"
	| "resolution-failed";

/**
 * A condition noticed while resolving, kept for operator visibility
 */
export interface Diagnostic {
	level: DiagnosticLevel;
	code: DiagnosticCode;
	message: string;
	packageId?: string;
	version?: string;
}

export type Reporter = (diagnostic: Diagnostic) => void;

/**
 * Build a diagnostic about one package
 */
export function packageDiagnostic(
	level: DiagnosticLevel,
	code: DiagnosticCode,
	ref: PackageRef,
	message: string,
): Diagnostic {
	return { level, code, message, packageId: ref.id, version: ref.version };
}

/**
 * Format a diagnostic as a single log line
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
	const subject = diagnostic.packageId
		? `${diagnostic.packageId}${diagnostic.version ? ` ${diagnostic.version}` : ""}: `
		: "";
	return `[webjars] ${subject}${diagnostic.message}`;
}

/**
 * Default reporter. Everything goes to stderr so that generated output on
 * stdout stays clean; debug records only when WEBJARS_DEBUG is set.
 */
export function logDiagnostic(diagnostic: Diagnostic): void {
	const line = formatDiagnostic(diagnostic);

	switch (diagnostic.level) {
		case "error":
			console.error(line);
			break;
		case "warn":
			console.warn(line);
			break;
		case "debug":
			if (process.env.WEBJARS_DEBUG) {
				console.error(line);
			}
			break;
	}
}

/**
 * Reporter that keeps every diagnostic and forwards it to another reporter
 */
export function collectDiagnostics(forward?: Reporter): {
	diagnostics: Diagnostic[];
	report: Reporter;
} {
	const diagnostics: Diagnostic[] = [];
	return {
		diagnostics,
		report: (diagnostic) => {
			diagnostics.push(diagnostic);
			forward?.(diagnostic);
		},
	};
}
