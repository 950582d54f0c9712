import { defineConfig } from "tsup";

export default defineConfig({
	entry: ["src/index.ts", "src/api.ts"],
	format: ["esm"],
	target: "node20",
	dts: false,
	sourcemap: true,
	clean: true,
	splitting: false,
	shims: false,
	skipNodeModulesBundle: true,
});
