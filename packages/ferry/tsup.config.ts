import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		index: "src/index.ts",
	},
	format: ["esm"],
	dts: { resolve: true },
	sourcemap: true,
	clean: true,
	noExternal: ["@ferry/core", "@ferry/app"],
});
