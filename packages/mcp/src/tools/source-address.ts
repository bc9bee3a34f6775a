/**
 * source_address tool handler for the J1939 decode MCP server.
 */

import { resolveSourceAddressName } from "@j1939-decode/core";
import type { McpConfig } from "../config.js";
import { loadDatabase } from "../database-loader.js";
import { toYaml } from "../formatters/tool-output.js";
import { createStderrNoticeSink } from "../notice-sink.js";

/**
 * Handle the source_address tool call.
 *
 * @returns The resolved name as a YAML document
 */
export async function handleSourceAddress(
	sourceAddress: number,
	config: McpConfig,
): Promise<string> {
	const { lookup } = await loadDatabase(config);
	const name = resolveSourceAddressName(
		sourceAddress,
		lookup,
		createStderrNoticeSink(config.minSeverity),
	);

	return toYaml({
		source_address: sourceAddress,
		name,
		in_database: lookup.lookupSourceAddress(sourceAddress) !== undefined,
	});
}
