import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			reporter: ["text"],
			include: ["packages/**/src/**/*.ts"],
			exclude: ["**/*.d.ts"],
		},
		projects: [
			// Node environment for all packages (core, database provider, MCP server)
			{
				test: {
					name: "node",
					environment: "node",
					include: ["./packages/**/test/**/*.{test,spec}.ts"],
					exclude: ["node_modules/**"],
				},
			},
		],
	},
});
