import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/**/*.test.mts"],
		exclude: ["**/node_modules/**", "dist"],
		testTimeout: 10000,
	},
});
