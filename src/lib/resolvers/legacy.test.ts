import { describe, expect, it } from "vitest";
import {
	CDN_PREFIX,
	createWebJarStore,
	LOCAL_PREFIX,
	pom,
} from "@/testing/webjars";
import { collectDiagnostics } from "../diagnostics";
import { versionedChain } from "../paths";
import { MemoryResourceStore } from "../resource-store";
import {
	readLegacyRequireJsConfig,
	resolveLegacy,
	rewriteLegacyConfig,
} from "./legacy";

const JQUERY = { id: "jquery", version: "2.1.0" };
const WHEN = { id: "when-node", version: "3.5.2" };

describe("readLegacyRequireJsConfig", () => {
	it("should return the requirejs property text", async () => {
		const { report } = collectDiagnostics();
		const text = await readLegacyRequireJsConfig(JQUERY, {
			store: createWebJarStore(),
			report,
		});
		expect(text).toBe(
			'{ "paths": { "jquery": "jquery" }, "shim": { "jquery": { "exports": "$" } } }',
		);
	});

	it("should warn and return an empty string when the pom is missing", async () => {
		const { diagnostics, report } = collectDiagnostics();
		const text = await readLegacyRequireJsConfig(
			{ id: "ghost", version: "1.0.0" },
			{ store: new MemoryResourceStore(), report },
		);
		expect(text).toBe("");
		expect(diagnostics.map((d) => [d.level, d.code])).toEqual([
			["warn", "descriptor-missing"],
		]);
	});

	it("should warn and return an empty string when the pom is not XML", async () => {
		const { diagnostics, report } = collectDiagnostics();
		const store = new MemoryResourceStore({
			"META-INF/maven/org.webjars/broken/pom.xml": "<project><properties>",
		});
		const text = await readLegacyRequireJsConfig(
			{ id: "broken", version: "1.0.0" },
			{ store, report },
		);
		expect(text).toBe("");
		expect(diagnostics.map((d) => [d.level, d.code])).toEqual([
			["warn", "malformed-descriptor"],
		]);
	});

	it("should return an empty string when the property is absent", async () => {
		const { diagnostics, report } = collectDiagnostics();
		const text = await readLegacyRequireJsConfig(
			{ id: "old-lib", version: "1.0.0" },
			{ store: createWebJarStore(), report },
		);
		expect(text).toBe("");
		expect(diagnostics).toEqual([]);
	});
});

describe("rewriteLegacyConfig", () => {
	it("should prefix every path and keep the original last", () => {
		const { report } = collectDiagnostics();
		const config = rewriteLegacyConfig(
			JQUERY,
			{ paths: { jquery: "jquery" }, shim: { jquery: { exports: "$" } } },
			versionedChain(CDN_PREFIX, LOCAL_PREFIX),
			report,
		);

		expect(config).toEqual({
			paths: {
				jquery: [
					"https://cdn.example.com/webjars/jquery/2.1.0/jquery",
					"/webjars/jquery/2.1.0/jquery",
					"jquery",
				],
			},
			shim: { jquery: { exports: "$" } },
			packages: [],
		});
	});

	it("should keep only the first location of an array path", () => {
		const { report } = collectDiagnostics();
		const config = rewriteLegacyConfig(
			JQUERY,
			{ paths: { jquery: ["jquery.min", "jquery"] } },
			versionedChain(LOCAL_PREFIX),
			report,
		);

		expect(config.paths).toEqual({
			jquery: ["/webjars/jquery/2.1.0/jquery.min", "jquery.min"],
		});
	});

	it("should report and skip paths that cannot be parsed", () => {
		const { diagnostics, report } = collectDiagnostics();
		const config = rewriteLegacyConfig(
			JQUERY,
			{ paths: { jquery: "jquery", broken: 42, empty: [] } },
			versionedChain(LOCAL_PREFIX),
			report,
		);

		expect(Object.keys(config.paths)).toEqual(["jquery"]);
		expect(diagnostics.map((d) => [d.level, d.code])).toEqual([
			["error", "unparseable-path"],
			["error", "unparseable-path"],
		]);
		expect(diagnostics[0].message).toBe(
			"The path for 'broken' could not be parsed: 42",
		);
	});

	it("should rewrite package locations with the last prefix only", () => {
		const { report } = collectDiagnostics();
		const config = rewriteLegacyConfig(
			WHEN,
			{ packages: [{ name: "when", location: "when", main: "when" }] },
			versionedChain(CDN_PREFIX, LOCAL_PREFIX),
			report,
		);

		expect(config).toEqual({
			paths: {},
			packages: [
				{ name: "when", location: "/webjars/when-node/3.5.2/when", main: "when" },
			],
		});
	});

	it("should pass through packages without a location", () => {
		const { report } = collectDiagnostics();
		const config = rewriteLegacyConfig(
			WHEN,
			{ packages: ["when", { name: "poly" }] },
			versionedChain(LOCAL_PREFIX),
			report,
		);

		expect(config.packages).toEqual(["when", { name: "poly" }]);
	});

	it("should not modify the parsed input", () => {
		const { report } = collectDiagnostics();
		const raw = { packages: [{ name: "when", location: "when" }] };
		rewriteLegacyConfig(WHEN, raw, versionedChain(LOCAL_PREFIX), report);
		expect(raw).toEqual({ packages: [{ name: "when", location: "when" }] });
	});

	it("should drop paths and packages of the wrong shape", () => {
		const { diagnostics, report } = collectDiagnostics();
		const config = rewriteLegacyConfig(
			JQUERY,
			{ paths: "jquery", packages: { when: "when" }, deps: ["jquery"] },
			versionedChain(LOCAL_PREFIX),
			report,
		);

		expect(config).toEqual({ paths: {}, packages: [], deps: ["jquery"] });
		expect(diagnostics.map((d) => d.code)).toEqual([
			"unparseable-path",
			"unparseable-path",
		]);
	});
});

describe("resolveLegacy", () => {
	it("should resolve the config embedded in the pom", async () => {
		const { diagnostics, report } = collectDiagnostics();
		const outcome = await resolveLegacy(JQUERY, versionedChain(LOCAL_PREFIX), {
			store: createWebJarStore(),
			report,
		});

		expect(outcome).toEqual({
			status: "resolved",
			format: "legacy",
			config: {
				paths: { jquery: ["/webjars/jquery/2.1.0/jquery", "jquery"] },
				shim: { jquery: { exports: "$" } },
				packages: [],
			},
		});
		expect(diagnostics).toEqual([]);
	});

	it("should accept lenient JSON", async () => {
		const { report } = collectDiagnostics();
		const outcome = await resolveLegacy(WHEN, versionedChain(LOCAL_PREFIX), {
			store: createWebJarStore(),
			report,
		});

		expect(outcome).toEqual({
			status: "resolved",
			format: "legacy",
			config: {
				packages: [
					{ name: "when", location: "/webjars/when-node/3.5.2/when", main: "when" },
				],
				paths: {},
			},
		});
	});

	it("should be unresolved when the pom has no config", async () => {
		const { diagnostics, report } = collectDiagnostics();
		const outcome = await resolveLegacy(
			{ id: "old-lib", version: "1.0.0" },
			versionedChain(LOCAL_PREFIX),
			{ store: createWebJarStore(), report },
		);

		expect(outcome).toEqual({
			status: "unresolved",
			format: "legacy",
			reason: "descriptor-missing",
			detail: "no requirejs property",
		});
		expect(diagnostics.map((d) => [d.level, d.code])).toEqual([
			["debug", "descriptor-missing"],
		]);
	});

	it("should be unresolved when the config is not valid JSON", async () => {
		const { diagnostics, report } = collectDiagnostics();
		const store = new MemoryResourceStore({
			"META-INF/maven/org.webjars/broken/pom.xml": pom("{ paths: "),
		});
		const outcome = await resolveLegacy(
			{ id: "broken", version: "1.0.0" },
			versionedChain(LOCAL_PREFIX),
			{ store, report },
		);

		expect(outcome).toMatchObject({
			status: "unresolved",
			format: "legacy",
			reason: "malformed-descriptor",
		});
		expect(diagnostics.map((d) => [d.level, d.code])).toEqual([
			["warn", "malformed-descriptor"],
			["error", "malformed-descriptor"],
		]);
	});
});
