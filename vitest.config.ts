import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			src: path.resolve(__dirname, "./src"),
		},
	},
	test: {
		globals: true,
		environment: "node",
		include: ["tests/**/*.test.ts"],
		setupFiles: ["./tests/setup/vitest.setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			reportsDirectory: "./coverage",
			thresholds: { lines: 85, functions: 85, branches: 80, statements: 85 },
			exclude: ["node_modules/**", "tests/**", "**/*.test.*", "dist/**"],
		},
		poolOptions: {
			threads: {
				singleThread: true,
			},
		},
	},
});
