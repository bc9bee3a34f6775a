/**
 * Database loader for the J1939 decode MCP server.
 *
 * Finds the J1939 JSON database from the configured paths, parses it with
 * the j1939db provider, and caches the result by file path + mtime so tool
 * calls do not re-parse a multi-megabyte database each time.
 */

import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { MemoryLookupService } from "@j1939-decode/core";
import { J1939DbProvider } from "@j1939-decode/definitions-j1939db";
import type { McpConfig } from "./config.js";
import { createStderrNoticeSink } from "./notice-sink.js";

export interface LoadedDatabase {
	/** Database file path */
	databasePath: string;
	lookup: MemoryLookupService;
	/** File size in bytes */
	fileSizeBytes: number;
	/** File modification time (for cache invalidation) */
	mtime: number;
}

const cache = new Map<string, LoadedDatabase>();

/**
 * Load the J1939 database named by the configuration.
 *
 * When several files are found, the first in sorted order is used.
 *
 * @throws Error if no database file is found or it cannot be parsed
 */
export async function loadDatabase(config: McpConfig): Promise<LoadedDatabase> {
	const notify = createStderrNoticeSink(config.minSeverity);
	const provider = new J1939DbProvider(config.databasePaths, notify);

	const uris = await provider.discoverDatabaseUris();
	const uri = uris[0];
	if (uri === undefined) {
		const searched =
			config.databasePaths.length > 0
				? config.databasePaths.join(", ")
				: "(no paths configured)";
		throw new Error(
			`No J1939 database found. Searched: ${searched}. ` +
				`Set J1939_DB_PATH or --database-path to a J1939 JSON database file or directory.`,
		);
	}
	const databasePath = fileURLToPath(uri);

	const stat = await fs.stat(databasePath);
	const cached = cache.get(databasePath);
	if (cached && cached.mtime === stat.mtimeMs) {
		return cached;
	}

	// A replaced entry is not released: tool calls still running keep decoding
	// against the lookup they started with.
	const lookup = await provider.parse(uri);

	const loaded: LoadedDatabase = {
		databasePath,
		lookup,
		fileSizeBytes: stat.size,
		mtime: stat.mtimeMs,
	};
	cache.set(databasePath, loaded);
	return loaded;
}

/**
 * Clear the database cache, releasing every cached database.
 *
 * Only call this once no tool call is using a database from the cache.
 */
export function clearDatabaseCache(): void {
	for (const loaded of cache.values()) {
		loaded.lookup.release();
	}
	cache.clear();
}
