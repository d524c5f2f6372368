import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@tabfeed/core": path.resolve(__dirname, "packages/core/src/index.ts"),
			"@tabfeed/data": path.resolve(__dirname, "packages/data/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
