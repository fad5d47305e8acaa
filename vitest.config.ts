import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

const workspace = (dir: string): string => path.join(root, dir, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@bbo-sim/core": workspace("packages/core"),
			"@bbo-sim/backtest-core": workspace("packages/backtest-core"),
			"@bbo-sim/data": workspace("packages/data"),
			"@bbo-sim/strategy-engine": workspace("packages/strategy-engine"),
			"@bbo-sim/metrics": workspace("packages/metrics"),
		},
	},
	test: {
		environment: "node",
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
	},
});
