/**
 * lookup_spn tool handler for the J1939 decode MCP server.
 */

import type { McpConfig } from "../config.js";
import { loadDatabase } from "../database-loader.js";
import { toYaml } from "../formatters/tool-output.js";

/**
 * Handle the lookup_spn tool call.
 *
 * @returns SPN metadata as a YAML document
 * @throws Error if the SPN is not in the database
 */
export async function handleLookupSpn(
	spn: number,
	config: McpConfig,
): Promise<string> {
	const { databasePath, lookup } = await loadDatabase(config);
	const descriptor = lookup.lookupSpn(spn);
	if (!descriptor) {
		throw new Error(`SPN ${spn} not found in ${databasePath}`);
	}

	return toYaml({
		spn: descriptor.spn,
		name: descriptor.name,
		units: descriptor.units,
		length_bits: descriptor.lengthBits,
		resolution: descriptor.resolution,
		offset: descriptor.offset,
		operational_low: descriptor.operationalLow,
		operational_high: descriptor.operationalHigh,
	});
}
