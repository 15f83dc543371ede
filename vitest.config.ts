// CHANGE: Vitest configuration for CORE, SHELL and APP tests
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without shared state between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CORE is pure; hold it to full coverage, SHELL and APP to a floor
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**", "src/main.ts", "src/index.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
