/**
 * lookup_pgn tool handler for the J1939 decode MCP server.
 *
 * Returns YAML frontmatter with parameter group metadata + a markdown table
 * of its SPNs in declaration order.
 */

import { isPdu1, pduFormat, pduSpecific } from "@j1939-decode/core";
import type { McpConfig } from "../config.js";
import { loadDatabase } from "../database-loader.js";
import { buildMarkdownTable, formatNumber } from "../formatters/markdown.js";
import { toolOutput } from "../formatters/tool-output.js";

/**
 * Handle the lookup_pgn tool call.
 *
 * @throws Error if the PGN is not in the database
 */
export async function handleLookupPgn(
	pgn: number,
	config: McpConfig,
): Promise<string> {
	const { databasePath, lookup } = await loadDatabase(config);
	const group = lookup.lookupPgn(pgn);
	if (!group) {
		throw new Error(`PGN ${pgn} not found in ${databasePath}`);
	}

	const metadata = {
		pgn: group.pgn,
		name: group.name,
		label: group.label,
		length_bytes: group.length,
		pdu_format: pduFormat(group.pgn),
		pdu_specific: pduSpecific(group.pgn),
		destination_specific: isPdu1(group.pgn),
		spn_count: group.spns.length,
	};

	if (group.spns.length === 0) {
		return toolOutput(metadata, "(No SPNs declared for this PGN)");
	}

	const headers = [
		"SPN",
		"Name",
		"Start Bit",
		"Bits",
		"Units",
		"Resolution",
		"Offset",
		"Range",
	];
	const rows = group.spns.map(({ spn, startBit }) => {
		const start = startBit === undefined ? "?" : String(startBit);
		const descriptor = lookup.lookupSpn(spn);
		if (!descriptor) {
			return [String(spn), "(not in database)", start, "", "", "", "", ""];
		}
		return [
			String(spn),
			descriptor.name,
			start,
			String(descriptor.lengthBits),
			descriptor.units,
			formatNumber(descriptor.resolution, 6),
			formatNumber(descriptor.offset, 6),
			`${formatNumber(descriptor.operationalLow, 6)} to ${formatNumber(descriptor.operationalHigh, 6)}`,
		];
	});

	return toolOutput(metadata, buildMarkdownTable(headers, rows));
}
