import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		coverage: {
			reporter: ["text"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/*.d.ts", "packages/cli/src/index.ts"],
		},
		// One node project per workspace package so failures are grouped by package
		projects: [
			{
				test: {
					name: "core",
					environment: "node",
					include: ["./packages/core/test/**/*.{test,spec}.ts"],
				},
			},
			{
				test: {
					name: "cli",
					environment: "node",
					include: ["./packages/cli/test/**/*.{test,spec}.ts"],
				},
			},
		],
	},
});
