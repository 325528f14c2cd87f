import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "packages");

export default defineConfig({
	resolve: {
		alias: {
			"@ferry/core": path.join(packages, "core/src/index.ts"),
			"@ferry/app": path.join(packages, "app/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
