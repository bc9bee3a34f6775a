/**
 * decode_log tool handler for the J1939 decode MCP server.
 *
 * Decodes every frame of one or all candump logs, keeps the frames matching
 * a filter expression, and returns YAML frontmatter + a markdown table.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { DecodedMessage } from "@j1939-decode/core";
import { MessageDecoder } from "@j1939-decode/core";
import { compileExpression } from "filtrex";
import { listLogFiles, readCandumpLog } from "../candump-reader.js";
import type { McpConfig } from "../config.js";
import { loadDatabase } from "../database-loader.js";
import { buildMarkdownTable } from "../formatters/markdown.js";
import { formatSpnValue } from "../formatters/message-formatter.js";
import { toolOutput } from "../formatters/tool-output.js";
import { createStderrNoticeSink } from "../notice-sink.js";

export const DEFAULT_ROW_LIMIT = 100;

export interface DecodeLogOptions {
	/** filtrex expression; omit to keep every frame */
	filter?: string;
	/** Log file name from list_logs (or a path); omit to search all logs */
	file?: string;
	/** Maximum rows in the table (default 100) */
	limit?: number;
}

type FilterFn = (row: Record<string, number>) => unknown;

interface MatchedRow {
	fileName: string;
	/** Seconds since the first timestamp of the file */
	timeS: number | undefined;
	message: DecodedMessage;
}

/**
 * Normalize a filter expression from JS-style operators to filtrex syntax.
 * Converts && → and, || → or, ! → not (when not part of !=).
 */
export function normalizeFilterExpression(expr: string): string {
	return expr
		.replace(/&&/g, " and ")
		.replace(/\|\|/g, " or ")
		.replace(/!(?!=)/g, " not ");
}

/**
 * Variables visible to the filter for one decoded frame: `PGN`, `SA`,
 * `Priority`, `DLC`, `Decoded` (1 or 0) and `SPN<number>` for every SPN with
 * a valid decoded value.
 */
export function filterVariables(message: DecodedMessage): Record<string, number> {
	const vars: Record<string, number> = {
		PGN: message.pgn,
		SA: message.sourceAddress,
		Priority: message.priority,
		DLC: message.dlc,
		Decoded: message.decoded ? 1 : 0,
	};
	for (const spn of message.spns.values()) {
		if (spn.valid) vars[`SPN${spn.spn}`] = spn.value;
	}
	return vars;
}

function compileFilter(filter: string): FilterFn {
	try {
		return compileExpression(normalizeFilterExpression(filter));
	} catch (err) {
		throw new Error(
			`Invalid filter expression: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
}

async function resolveLogPaths(
	file: string | undefined,
	logsDir: string,
): Promise<string[]> {
	if (file !== undefined) {
		const filePath = path.isAbsolute(file) ? file : path.join(logsDir, file);
		try {
			await fs.stat(filePath);
		} catch {
			throw new Error(`Log file not found: ${filePath}`);
		}
		return [filePath];
	}

	const logFiles = await listLogFiles(logsDir);
	if (logFiles.length === 0) {
		throw new Error(
			`No log files found in ${logsDir}. Use list_logs to check available log files.`,
		);
	}
	return logFiles.map((f) => f.filePath);
}

/**
 * Handle the decode_log tool call.
 *
 * Frames the decoder rejects are counted as `frames_failed`. A filter that
 * errors on a frame (for example a comparison against an SPN the frame does
 * not carry) does not match it and is counted as `filter_errors`.
 *
 * @throws Error if the filter does not compile, the file is missing or the
 * database cannot be loaded
 */
export async function handleDecodeLog(
	options: DecodeLogOptions,
	config: McpConfig,
): Promise<string> {
	const { filter, file, limit = DEFAULT_ROW_LIMIT } = options;
	const filterFn = filter !== undefined ? compileFilter(filter) : undefined;

	const filePaths = await resolveLogPaths(file, config.logsDir);
	const { lookup } = await loadDatabase(config);
	const decoder = new MessageDecoder(lookup, {
		notify: createStderrNoticeSink(config.minSeverity),
		minSeverity: config.minSeverity,
	});

	const matched: MatchedRow[] = [];
	let framesRead = 0;
	let framesFailed = 0;
	let filterErrors = 0;

	for (const filePath of filePaths) {
		const fileName = path.basename(filePath);
		const { records } = await readCandumpLog(filePath);
		const start = records.find((r) => r.timestamp !== undefined)?.timestamp;

		for (const record of records) {
			framesRead++;
			const result = decoder.decodeFrame(record.frame);
			if (!result.ok) {
				framesFailed++;
				continue;
			}

			if (filterFn) {
				let outcome: unknown;
				try {
					outcome = filterFn(filterVariables(result.message));
				} catch {
					outcome = new Error("filter evaluation failed");
				}
				// filtrex returns runtime errors instead of throwing them
				if (outcome instanceof Error) {
					filterErrors++;
					continue;
				}
				if (!outcome) continue;
			}

			matched.push({
				fileName,
				timeS:
					record.timestamp !== undefined && start !== undefined
						? record.timestamp - start
						: undefined,
				message: result.message,
			});
		}
	}

	const shown = matched.slice(0, limit);
	const metadata = {
		filter,
		files_searched: filePaths.length,
		frames_read: framesRead,
		frames_failed: framesFailed,
		filter_errors: filter !== undefined ? filterErrors : undefined,
		rows_matched: matched.length,
		rows_shown: shown.length,
	};

	if (shown.length === 0) {
		return toolOutput(metadata, "(No frames matched the filter expression)");
	}

	const multiFile = filePaths.length > 1;
	const headers = [
		"Time (s)",
		...(multiFile ? ["File"] : []),
		"PGN",
		"SA",
		"PGN Name",
		"Values",
	];
	const rows = shown.map(({ fileName, timeS, message }) => [
		timeS !== undefined ? timeS.toFixed(3) : "",
		...(multiFile ? [fileName] : []),
		String(message.pgn),
		String(message.sourceAddress),
		message.pgnName ?? "",
		[...message.spns.values()]
			.map((spn) => `${spn.spn}=${formatSpnValue(spn)}`)
			.join("; "),
	]);

	return toolOutput(metadata, buildMarkdownTable(headers, rows));
}
