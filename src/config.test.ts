import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { delimiter, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	findProjectConfigPath,
	parseConfigFile,
	resolveConfig,
	toPrefixChain,
	writeProjectConfig,
} from "./config";
import { ConfigError, InvalidPrefixError } from "./errors";

describe("parseConfigFile", () => {
	it("should read every setting", () => {
		const config = parseConfigFile(
			[
				"root = target/classes",
				"prefix = /assets/",
				"cdnPrefix = https://cdn.example.com/webjars/",
				"versioned = false",
			].join("\n"),
			"/project/.webjarsrc",
		);

		expect(config).toEqual({
			roots: ["/project/target/classes"],
			prefix: "/assets/",
			cdnPrefix: "https://cdn.example.com/webjars/",
			versioned: false,
		});
	});

	it("should read several roots", () => {
		const config = parseConfigFile(
			"root[] = build/resources\nroot[] = /opt/webjars\n",
			"/project/.webjarsrc",
		);
		expect(config.roots).toEqual(["/project/build/resources", "/opt/webjars"]);
	});

	it("should leave unset values undefined", () => {
		expect(parseConfigFile("; nothing here\n", "/project/.webjarsrc")).toEqual({});
	});

	it("should reject a versioned flag that is not a boolean", () => {
		expect(() =>
			parseConfigFile("versioned = sometimes\n", "/project/.webjarsrc"),
		).toThrow(
			new ConfigError(
				"Invalid 'versioned' in /project/.webjarsrc: expected true or false",
			),
		);
	});
});

describe("toPrefixChain", () => {
	it("should put the CDN before the local prefix", () => {
		expect(
			toPrefixChain({
				prefix: "/webjars/",
				cdnPrefix: "https://cdn.example.com/webjars/",
				versioned: false,
			}),
		).toEqual([
			{ prefix: "https://cdn.example.com/webjars/", includeVersion: false },
			{ prefix: "/webjars/", includeVersion: false },
		]);
	});

	it("should use the local prefix alone without a CDN", () => {
		expect(toPrefixChain({ prefix: "/webjars/", versioned: true })).toEqual([
			{ prefix: "/webjars/", includeVersion: true },
		]);
	});

	it("should reject an empty prefix", () => {
		expect(() => toPrefixChain({ prefix: "", versioned: true })).toThrow(
			InvalidPrefixError,
		);
	});
});

describe("config files", () => {
	let home: string;
	let project: string;
	let cwd: string;

	beforeEach(async () => {
		home = await mkdtemp(join(tmpdir(), "webjars-config-"));
		project = join(home, "work", "app");
		cwd = join(project, "src");
		await mkdir(cwd, { recursive: true });
	});

	afterEach(async () => {
		await rm(home, { recursive: true, force: true });
	});

	describe("findProjectConfigPath", () => {
		it("should find the nearest config above the working directory", async () => {
			await writeFile(join(project, ".webjarsrc"), "prefix = /assets/\n");
			expect(await findProjectConfigPath({ cwd, homeDir: home })).toBe(
				join(project, ".webjarsrc"),
			);
		});

		it("should not treat the user config as a project config", async () => {
			await writeFile(join(home, ".webjarsrc"), "prefix = /assets/\n");
			expect(await findProjectConfigPath({ cwd, homeDir: home })).toBeNull();
		});
	});

	describe("resolveConfig", () => {
		it("should use defaults without any config", async () => {
			expect(await resolveConfig({ cwd, homeDir: home, env: {} })).toEqual({
				roots: [cwd],
				prefix: "/webjars/",
				versioned: true,
				userConfigPath: null,
				projectConfigPath: null,
			});
		});

		it("should layer the project config over the user config", async () => {
			await writeFile(
				join(home, ".webjarsrc"),
				"prefix = /assets/\nversioned = false\n",
			);
			await writeFile(
				join(project, ".webjarsrc"),
				"root = ../../static\ncdnPrefix = https://cdn.example.com/webjars/\n",
			);

			expect(await resolveConfig({ cwd, homeDir: home, env: {} })).toEqual({
				roots: [join(home, "static")],
				prefix: "/assets/",
				cdnPrefix: "https://cdn.example.com/webjars/",
				versioned: false,
				userConfigPath: join(home, ".webjarsrc"),
				projectConfigPath: join(project, ".webjarsrc"),
			});
		});

		it("should let the environment override config files", async () => {
			await writeFile(
				join(project, ".webjarsrc"),
				"prefix = /assets/\nversioned = true\n",
			);

			const config = await resolveConfig({
				cwd,
				homeDir: home,
				env: {
					WEBJARS_ROOT: ["a", "b"].join(delimiter),
					WEBJARS_PREFIX: "/static/webjars/",
					WEBJARS_VERSIONED: "0",
				},
			});

			expect(config.roots).toEqual([join(cwd, "a"), join(cwd, "b")]);
			expect(config.prefix).toBe("/static/webjars/");
			expect(config.versioned).toBe(false);
		});

		it("should reject an invalid WEBJARS_VERSIONED", async () => {
			await expect(
				resolveConfig({
					cwd,
					homeDir: home,
					env: { WEBJARS_VERSIONED: "maybe" },
				}),
			).rejects.toThrow(
				"Invalid 'WEBJARS_VERSIONED' in the environment: expected true or false",
			);
		});
	});

	describe("writeProjectConfig", () => {
		it("should write the given settings", async () => {
			const path = await writeProjectConfig(project, {
				roots: ["static"],
				prefix: "/assets/",
				versioned: false,
			});

			expect(path).toBe(join(project, ".webjarsrc"));
			expect(await readFile(path, "utf-8")).toBe(
				"; WebJars RequireJS configuration\n\nroot[] = static\nprefix = /assets/\nversioned = false\n",
			);
		});

		it("should write a file that reads back the same", async () => {
			const path = await writeProjectConfig(project, {
				roots: [join(home, "static")],
				cdnPrefix: "https://cdn.example.com/webjars/",
				versioned: true,
			});

			expect(parseConfigFile(await readFile(path, "utf-8"), path)).toEqual({
				roots: [join(home, "static")],
				cdnPrefix: "https://cdn.example.com/webjars/",
				versioned: true,
			});
		});
	});
});
