import path from "node:path";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string =>
	path.resolve(__dirname, "packages", name, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@tradeloop/core": pkg("core"),
			"@tradeloop/indicators": pkg("indicators"),
			"@tradeloop/gateway": pkg("gateway"),
			"@tradeloop/exchange-delta": pkg("exchange-delta"),
			"@tradeloop/risk-engine": pkg("risk-engine"),
			"@tradeloop/strategy-engine": pkg("strategy-engine"),
			"@tradeloop/execution-engine": pkg("execution-engine"),
			"@tradeloop/persistence": pkg("persistence"),
			"@tradeloop/runtime": pkg("runtime"),
		},
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
	},
});
