import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@switchyard/core": `${packages}/core/src/index.ts`,
			"@switchyard/server": `${packages}/server/src/index.ts`,
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
