/**
 * Tool output for the J1939 decode MCP server: a YAML metadata block,
 * optionally followed by a markdown body.
 */

import yaml from "js-yaml";

export type ToolMetadata = Record<string, unknown>;

/** Raw SPN values are 64-bit; YAML has no integer type that holds them all */
function toYamlValue(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Serialize tool metadata as a YAML document.
 *
 * Keys whose value is `undefined` are omitted. js-yaml writes integer-like
 * keys first; keep SPN-keyed data in tables where order matters.
 */
export function toYaml(data: ToolMetadata): string {
	return yaml.dump(data, {
		indent: 2,
		lineWidth: 120,
		noRefs: true,
		sortKeys: false,
		skipInvalid: true,
		replacer: toYamlValue,
	});
}

/**
 * Metadata as `---` delimited frontmatter, then a blank line and `body`
 * (a markdown table or a parenthesized note).
 *
 * @example
 * toolOutput({ pgn: 65262 }, "(No SPNs decoded)");
 * // "---\npgn: 65262\n---\n\n(No SPNs decoded)"
 */
export function toolOutput(metadata: ToolMetadata, body: string): string {
	return `---\n${toYaml(metadata)}---\n\n${body}`;
}
