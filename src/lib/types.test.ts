import { describe, expect, it } from "vitest";
import { isEmptyModuleConfig, isJsonObject, unresolved } from "./types";

describe("isJsonObject", () => {
	it("should accept plain objects only", () => {
		expect(isJsonObject({})).toBe(true);
		expect(isJsonObject([])).toBe(false);
		expect(isJsonObject(null)).toBe(false);
		expect(isJsonObject("{}")).toBe(false);
	});
});

describe("isEmptyModuleConfig", () => {
	it("should be true when every field is empty", () => {
		expect(isEmptyModuleConfig({ paths: {} })).toBe(true);
		expect(isEmptyModuleConfig({ paths: {}, packages: [], shim: {} })).toBe(true);
	});

	it("should be false when any field has entries", () => {
		expect(isEmptyModuleConfig({ paths: {}, packages: ["when"] })).toBe(false);
		expect(isEmptyModuleConfig({ paths: { a: ["a"] } })).toBe(false);
	});

	it("should count scalar fields as entries", () => {
		expect(isEmptyModuleConfig({ paths: {}, waitSeconds: 0 })).toBe(false);
	});
});

describe("unresolved", () => {
	it("should leave detail out when not given", () => {
		expect(unresolved(null, "no-descriptor")).toEqual({
			status: "unresolved",
			format: null,
			reason: "no-descriptor",
		});
		expect("detail" in unresolved(null, "no-descriptor")).toBe(false);
	});
});
