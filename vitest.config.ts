import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["cli/src/**/*.test.ts"],
		pool: "forks",
		// each manifest open starts an embedded Postgres
		testTimeout: 60000,
		hookTimeout: 30000,
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["cli/src/**/*.ts"],
			exclude: ["**/*.test.ts", "**/types.ts", "cli/src/client/cli.ts"],
		},
	},
});
