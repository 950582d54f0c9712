import { describe, expect, it } from "vitest";
import { listWebJars, toVersionMap } from "./registry";
import { MemoryResourceStore } from "./resource-store";

describe("listWebJars", () => {
	it("should list webjars ordered by id", async () => {
		const store = new MemoryResourceStore({
			"META-INF/resources/webjars/jquery/2.1.0/jquery.js": "",
			"META-INF/resources/webjars/Zepto/1.2.0/zepto.js": "",
			"META-INF/resources/webjars/bootstrap/3.3.7/js/bootstrap.js": "",
		});

		expect(await listWebJars(store)).toEqual([
			{ id: "Zepto", version: "1.2.0" },
			{ id: "bootstrap", version: "3.3.7" },
			{ id: "jquery", version: "2.1.0" },
		]);
	});

	it("should pick the highest of several installed versions", async () => {
		const store = new MemoryResourceStore({
			"META-INF/resources/webjars/jquery/1.11.1/jquery.js": "",
			"META-INF/resources/webjars/jquery/2.1.0/jquery.js": "",
			"META-INF/resources/webjars/jquery/1.9.0/jquery.js": "",
		});

		expect(await listWebJars(store)).toEqual([
			{ id: "jquery", version: "2.1.0" },
		]);
	});

	it("should skip ids without a version directory", async () => {
		const store = new MemoryResourceStore({
			"META-INF/resources/webjars/empty/README": "",
			"META-INF/resources/webjars/jquery/2.1.0/jquery.js": "",
		});

		expect(await listWebJars(store)).toEqual([
			{ id: "jquery", version: "2.1.0" },
		]);
	});

	it("should return nothing for an empty store", async () => {
		expect(await listWebJars(new MemoryResourceStore())).toEqual([]);
	});
});

describe("toVersionMap", () => {
	it("should keep the given order", () => {
		const versions = toVersionMap([
			{ id: "b", version: "1.0.0" },
			{ id: "a", version: "2.0.0" },
		]);
		expect([...versions]).toEqual([
			["b", "1.0.0"],
			["a", "2.0.0"],
		]);
	});
});
