import { defineConfig } from "vitest/config";

// Workspace packages export their sources under the "development" condition.
export default defineConfig({
	resolve: {
		conditions: ["development"],
	},
	ssr: {
		resolve: {
			conditions: ["development"],
		},
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		environment: "node",
	},
});
