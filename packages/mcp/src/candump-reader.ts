/**
 * Log reader for the J1939 decode MCP server.
 *
 * Reads SocketCAN `candump` captures, either the log format written by
 * `candump -l`:
 *   (1699999999.123456) can0 18FEF100#0102030405060708
 * or the default column format, with or without timestamps:
 *   can0  18FEF100   [8]  01 02 03 04 05 06 07 08
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CandumpRecord } from "@j1939-decode/core";
import { parseCandumpLine } from "@j1939-decode/core";

export const LOG_EXTENSIONS: readonly string[] = [".log", ".candump", ".txt"];

export interface CandumpLogFile {
	/** Absolute path to the log file */
	filePath: string;
	/** File name (basename) */
	fileName: string;
	/** File size in bytes */
	fileSizeBytes: number;
	/** File modification time */
	mtime: Date;
	/** CAN interfaces seen in the log, in order of first appearance */
	channels: string[];
	/** Number of frames read */
	frameCount: number;
	/** Last timestamp - first timestamp, in seconds; null without timestamps */
	durationS: number | null;
}

export interface CandumpLog {
	records: CandumpRecord[];
	/** Non-blank lines that were not frames */
	skippedLines: number;
}

/**
 * Read every frame of a candump log.
 *
 * Lines that are not classic data frames (comments, error frames, CAN FD
 * frames, truncated lines) are counted and skipped.
 */
export async function readCandumpLog(filePath: string): Promise<CandumpLog> {
	const content = await fs.readFile(filePath, "utf8");
	const records: CandumpRecord[] = [];
	let skippedLines = 0;

	for (const line of content.split(/\r?\n/)) {
		if (line.trim().length === 0) continue;
		const record = parseCandumpLine(line);
		if (record) {
			records.push(record);
		} else {
			skippedLines++;
		}
	}

	return { records, skippedLines };
}

/** Seconds between the first and last timestamped record */
export function logDuration(records: readonly CandumpRecord[]): number | null {
	let first: number | undefined;
	let last: number | undefined;
	for (const record of records) {
		if (record.timestamp === undefined) continue;
		first ??= record.timestamp;
		last = record.timestamp;
	}
	if (first === undefined || last === undefined) return null;
	return last - first;
}

/**
 * Read metadata from a candump log.
 */
export async function readLogFileMeta(filePath: string): Promise<CandumpLogFile> {
	const stat = await fs.stat(filePath);
	const { records } = await readCandumpLog(filePath);

	const channels: string[] = [];
	for (const record of records) {
		if (!channels.includes(record.channel)) channels.push(record.channel);
	}

	return {
		filePath,
		fileName: path.basename(filePath),
		fileSizeBytes: stat.size,
		mtime: stat.mtime,
		channels,
		frameCount: records.length,
		durationS: logDuration(records),
	};
}

/**
 * List all candump logs in a directory.
 *
 * @returns Log metadata sorted by mtime descending (newest first); empty when
 * the directory does not exist
 */
export async function listLogFiles(logsDir: string): Promise<CandumpLogFile[]> {
	let entries: string[];
	try {
		const dirEntries = await fs.readdir(logsDir);
		entries = dirEntries.filter((e) =>
			LOG_EXTENSIONS.includes(path.extname(e).toLowerCase()),
		);
	} catch {
		return [];
	}

	const files: CandumpLogFile[] = [];
	for (const entry of entries) {
		const filePath = path.join(logsDir, entry);
		const stat = await fs.stat(filePath);
		if (!stat.isFile()) continue;
		files.push(await readLogFileMeta(filePath));
	}

	files.sort(
		(a, b) =>
			b.mtime.getTime() - a.mtime.getTime() ||
			a.fileName.localeCompare(b.fileName),
	);
	return files;
}
