import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			all: true,
			exclude: ["**/*.mock.ts", "**/index.ts", "src/tenant/Tenant.ts"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
			thresholds: {
				"100": true,
			},
		},
		env: {
			DISABLE_LOGGING: "true",
		},
		globals: true,
		pool: "threads",
		restoreMocks: true,
	},
});
