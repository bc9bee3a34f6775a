/**
 * list_logs tool handler for the J1939 decode MCP server.
 *
 * Lists candump logs in the configured logs directory with metadata.
 * Returns YAML frontmatter + markdown table of log files sorted by recency.
 */

import type { McpConfig } from "../config.js";
import { LOG_EXTENSIONS, listLogFiles } from "../candump-reader.js";
import { buildMarkdownTable } from "../formatters/markdown.js";
import { toolOutput } from "../formatters/tool-output.js";

/**
 * Format a date as a UTC string for display.
 *
 * @example
 * formatDate(new Date("2026-02-22T14:30:00Z")); // "2026-02-22 14:30 UTC"
 */
export function formatDate(date: Date): string {
	const y = date.getUTCFullYear();
	const mo = String(date.getUTCMonth() + 1).padStart(2, "0");
	const d = String(date.getUTCDate()).padStart(2, "0");
	const h = String(date.getUTCHours()).padStart(2, "0");
	const mi = String(date.getUTCMinutes()).padStart(2, "0");
	return `${y}-${mo}-${d} ${h}:${mi} UTC`;
}

/**
 * Handle the list_logs tool call.
 */
export async function handleListLogs(config: McpConfig): Promise<string> {
	const logsDir = config.logsDir;
	const files = await listLogFiles(logsDir);

	const metadata = {
		logs_dir: logsDir,
		total_files: files.length,
	};

	if (files.length === 0) {
		return toolOutput(
			metadata,
			`(No ${LOG_EXTENSIONS.join("/")} files found in ${logsDir})`,
		);
	}

	const headers = ["#", "Filename", "Date", "Duration (s)", "Frames", "Channels"];
	const rows = files.map((file, index) => [
		String(index + 1),
		file.fileName,
		formatDate(file.mtime),
		file.durationS !== null ? file.durationS.toFixed(1) : "null",
		String(file.frameCount),
		file.channels.join(", "),
	]);

	return toolOutput(metadata, buildMarkdownTable(headers, rows));
}
