// CHANGE: Vitest configuration for the divination table
// WHY: Native ESM runner matching the NodeNext build; CORE keeps full coverage
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: runs in-process, no network, no shared state between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: 100% threshold for CORE, low floor for SHELL
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
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
