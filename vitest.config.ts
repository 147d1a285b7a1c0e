import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolvePackage = (name: string): string =>
	fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@bandwise/core": resolvePackage("core"),
			"@bandwise/indicators": resolvePackage("indicators"),
			"@bandwise/risk-engine": resolvePackage("risk-engine"),
			"@bandwise/strategy-engine": resolvePackage("strategy-engine"),
			"@bandwise/runtime": resolvePackage("runtime"),
			"@bandwise/metrics": resolvePackage("metrics"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts"],
		environment: "node",
	},
});
