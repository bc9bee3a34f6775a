/**
 * JSON rendering of decoded messages.
 *
 * Produces the document layout used by J1939 decoding tools: PascalCase keys,
 * SPNs keyed by number, "Not available" in place of out-of-range values.
 *
 * `JSON.stringify` cannot be used directly: it reorders integer-like keys
 * ascending, while SPNs must stay in declaration order, and it cannot write
 * a `bigint`.
 *
 * @module format/json
 */

import type { DecodedMessage, DecodedSpn } from "../decoder/types";

type JsonNode =
	| string
	| number
	| boolean
	| bigint
	| JsonNode[]
	| { entries: Array<[string, JsonNode]> };

export interface JsonFormatOptions {
	/**
	 * Put each object member on its own line, indented one tab per level,
	 * with a tab after the colon (default false)
	 */
	pretty?: boolean;
}

function spnNode(spn: DecodedSpn): JsonNode {
	return {
		entries: [
			["Name", spn.name],
			["Units", spn.units],
			["SPNLength", spn.lengthBits],
			["Resolution", spn.resolution],
			["Offset", spn.offset],
			["OperationalLow", spn.operationalLow],
			["OperationalHigh", spn.operationalHigh],
			["StartBit", spn.startBit],
			["ValueRaw", spn.rawValue],
			["ValueDecoded", spn.value],
			["Valid", spn.valid],
		],
	};
}

/** Build the ordered document tree for a message */
function messageNode(message: DecodedMessage): JsonNode {
	const entries: Array<[string, JsonNode]> = [
		["ID", message.id],
		["Priority", message.priority],
		["PGN", message.pgn],
		["SA", message.sourceAddress],
		["SAName", message.sourceAddressName],
		["DLC", message.dlc],
		["DataRaw", [...message.dataRaw]],
	];

	if (message.pgnName !== undefined) {
		entries.push(["PGNName", message.pgnName]);
		const spnEntries: Array<[string, JsonNode]> = [];
		for (const [number, spn] of message.spns) {
			spnEntries.push([String(number), spnNode(spn)]);
		}
		entries.push(["SPNs", { entries: spnEntries }]);
	}

	entries.push(["Decoded", message.decoded]);
	return { entries };
}

function renderScalar(value: string | number | boolean | bigint): string {
	if (typeof value === "bigint") return value.toString();
	if (typeof value === "number" && !Number.isFinite(value)) return "null";
	return JSON.stringify(value);
}

function render(node: JsonNode, depth: number, pretty: boolean): string {
	if (Array.isArray(node)) {
		const items = node.map((item) => render(item, depth + 1, pretty));
		return pretty ? `[${items.join(", ")}]` : `[${items.join(",")}]`;
	}
	if (typeof node === "object") {
		if (node.entries.length === 0) {
			return pretty ? `{\n${"\t".repeat(depth)}}` : "{}";
		}
		const parts = node.entries.map(([key, value]) => {
			const rendered = render(value, depth + 1, pretty);
			return pretty
				? `${"\t".repeat(depth + 1)}${JSON.stringify(key)}:\t${rendered}`
				: `${JSON.stringify(key)}:${rendered}`;
		});
		return pretty
			? `{\n${parts.join(",\n")}\n${"\t".repeat(depth)}}`
			: `{${parts.join(",")}}`;
	}
	return renderScalar(node);
}

/**
 * Render a decoded message as a JSON document.
 *
 * `PGNName` and `SPNs` appear only when the PGN was found in the database.
 *
 * @example
 * toJ1939Json(message);
 * // {"ID":217056256,"Priority":3,"PGN":61444,"SA":0,"SAName":"Engine #1",...,"Decoded":true}
 */
export function toJ1939Json(
	message: DecodedMessage,
	options: JsonFormatOptions = {},
): string {
	return render(messageNode(message), 0, options.pretty ?? false);
}
