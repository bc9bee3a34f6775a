/**
 * Decoded-message formatter for the J1939 decode MCP server.
 *
 * Output format:
 *   ---
 *   id: 0x0CF00400
 *   priority: 3
 *   pgn: 61444
 *   pgn_name: Electronic Engine Controller 1
 *   source_address: 0
 *   source_address_name: Engine #1
 *   dlc: 8
 *   data: FF 7D 82 20 1C FF FF FF
 *   decoded: true
 *   ---
 *
 *   | SPN | Name         | Value | Units | Raw  | Start Bit | Bits |
 *   |-----|--------------|-------|-------|------|-----------|------|
 *   | 190 | Engine Speed | 900   | rpm   | 7200 | 24        | 16   |
 */

import type { DecodedMessage, DecodedSpn } from "@j1939-decode/core";
import { NOT_AVAILABLE, formatHex, isPdu1, pduSpecific } from "@j1939-decode/core";
import { buildMarkdownTable, formatNumber } from "./markdown.js";
import { type ToolMetadata, toolOutput } from "./tool-output.js";

/** `0x` followed by eight uppercase hex digits */
export function formatIdentifier(id: number): string {
	return `0x${id.toString(16).toUpperCase().padStart(8, "0")}`;
}

/** Decoded value with units, or the not-available sentinel */
export function formatSpnValue(spn: DecodedSpn): string {
	if (!spn.valid) return NOT_AVAILABLE;
	const value = formatNumber(spn.value);
	return spn.units ? `${value} ${spn.units}` : value;
}

/**
 * Frontmatter fields describing a decoded message.
 * The destination address is included for destination-specific (PDU1) PGNs.
 */
export function messageMetadata(message: DecodedMessage): ToolMetadata {
	const data: ToolMetadata = {
		id: formatIdentifier(message.id),
		priority: message.priority,
		pgn: message.pgn,
		pgn_name: message.pgnName,
		source_address: message.sourceAddress,
		source_address_name: message.sourceAddressName,
	};
	if (isPdu1(message.pgn)) {
		data["destination_address"] = pduSpecific(message.pgn);
	}
	data["dlc"] = message.dlc;
	data["data"] = formatHex(message.dataRaw.slice(0, message.dlc));
	data["decoded"] = message.decoded;
	return data;
}

/**
 * Format a decoded message as YAML frontmatter + a markdown table of SPNs.
 */
export function formatDecodedMessage(message: DecodedMessage): string {
	const metadata = messageMetadata(message);

	if (message.pgnName === undefined) {
		return toolOutput(metadata, `(PGN ${message.pgn} not found in database)`);
	}
	if (message.spns.size === 0) {
		return toolOutput(metadata, "(No SPNs decoded)");
	}

	const headers = ["SPN", "Name", "Value", "Units", "Raw", "Start Bit", "Bits"];
	const rows = [...message.spns.values()].map((spn) => [
		String(spn.spn),
		spn.name,
		spn.valid ? formatNumber(spn.value) : NOT_AVAILABLE,
		spn.units,
		spn.rawValue.toString(),
		String(spn.startBit),
		String(spn.lengthBits),
	]);

	return toolOutput(metadata, buildMarkdownTable(headers, rows));
}
