import { builtinModules } from "node:module";
import { defineConfig } from "vite";

// Bundles the MCP server into a single self-contained .mjs file. The server
// is a standalone Node.js stdio process, so Node built-ins are externalized
// rather than replaced with browser stubs.
export default defineConfig({
	build: {
		target: "node20",
		lib: {
			entry: "packages/mcp/src/index.ts",
			formats: ["es"],
			fileName: "server",
		},
		outDir: "dist/mcp",
		emptyOutDir: false,
		sourcemap: true,
		rollupOptions: {
			external: [...builtinModules, ...builtinModules.map((m) => `node:${m}`)],
			output: {
				entryFileNames: "server.mjs",
			},
		},
	},
});
