import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { McpConfig } from "../src/config";

export const fixtureDir = path.join(
	path.dirname(fileURLToPath(import.meta.url)),
	"fixtures",
);
export const databasePath = path.join(fixtureDir, "j1939db.json");
export const fixtureLogsDir = path.join(fixtureDir, "logs");

/** Config pointing at the fixtures; only errors reach stderr */
export function testConfig(overrides: Partial<McpConfig> = {}): McpConfig {
	return {
		databasePaths: [databasePath],
		logsDir: fixtureLogsDir,
		minSeverity: "error",
		...overrides,
	};
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "j1939-mcp-"));
	try {
		return await fn(dir);
	} finally {
		await fs.rm(dir, { recursive: true, force: true });
	}
}

/**
 * Data rows of the first markdown table in `output`, as trimmed cells.
 * The header and separator rows are skipped.
 */
export function tableRows(output: string): string[][] {
	const lines = output.split("\n").filter((l) => l.startsWith("|"));
	return lines.slice(2).map((line) =>
		line
			.slice(1, -1)
			.split(" | ")
			.map((cell) => cell.trim()),
	);
}

/** Header cells of the first markdown table in `output` */
export function tableHeaders(output: string): string[] {
	const header = output.split("\n").find((l) => l.startsWith("|"));
	if (header === undefined) return [];
	return header
		.slice(1, -1)
		.split(" | ")
		.map((cell) => cell.trim());
}
