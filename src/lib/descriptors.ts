/**
 * Parsing of the raw descriptor formats webjars ship: lenient JSON
 * (bower.json, package.json, the RequireJS property) and pom.xml.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import JSON5 from "json5";
import { describeError } from "@/errors";
import { isJsonObject, type JsonObject } from "./types";

export type ParseResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: string };

/**
 * Parse JSON that may use unquoted keys and single-quoted strings.
 * Only a top-level object counts as success.
 */
export function parseLenientJson(text: string): ParseResult<JsonObject> {
	let parsed: unknown;
	try {
		parsed = JSON5.parse(text);
	} catch (error) {
		return { ok: false, error: describeError(error) };
	}

	if (!isJsonObject(parsed)) {
		return { ok: false, error: "Expected a JSON object at the top level" };
	}
	return { ok: true, value: parsed };
}

// =============================================================================
// pom.xml
// =============================================================================

const pomParser = new XMLParser({
	ignoreAttributes: true,
	ignoreDeclaration: true,
	parseTagValue: false,
});

function textOf(node: unknown): string | null {
	if (typeof node === "string") return node;
	if (Array.isArray(node)) return node.length > 0 ? textOf(node[0]) : null;
	if (isJsonObject(node)) {
		const text = node["#text"];
		return typeof text === "string" ? text : "";
	}
	return null;
}

function findProperty(node: unknown, property: string): string | null {
	if (Array.isArray(node)) {
		for (const item of node) {
			const found = findProperty(item, property);
			if (found !== null) return found;
		}
		return null;
	}
	if (!isJsonObject(node)) return null;

	for (const [key, value] of Object.entries(node)) {
		if (key === "properties") {
			const sections = Array.isArray(value) ? value : [value];
			for (const section of sections) {
				if (isJsonObject(section) && property in section) {
					const text = textOf(section[property]);
					if (text !== null) return text;
				}
			}
		}
		const nested = findProperty(value, property);
		if (nested !== null) return nested;
	}
	return null;
}

/**
 * Read the text of `<properties><name>...</name></properties>` from a
 * pom.xml document, e.g. the embedded RequireJS config:
 *
 * ```xml
 * <project>
 *   <properties>
 *     <requirejs>{ "paths": { "jquery": "jquery" } }</requirejs>
 *   </properties>
 * </project>
 * ```
 *
 * @returns The property text, or null when the property is absent
 */
export function extractPomProperty(
	xml: string,
	property: string,
): ParseResult<string | null> {
	const validation = XMLValidator.validate(xml);
	if (validation !== true) {
		return {
			ok: false,
			error: `${validation.err.msg} (line ${validation.err.line})`,
		};
	}

	let document: unknown;
	try {
		document = pomParser.parse(xml);
	} catch (error) {
		return { ok: false, error: describeError(error) };
	}

	return { ok: true, value: findProperty(document, property) };
}
