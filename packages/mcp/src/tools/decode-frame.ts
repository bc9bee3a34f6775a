/**
 * decode_frame tool handler for the J1939 decode MCP server.
 *
 * Decodes one CAN frame against the configured J1939 database.
 */

import type { CanFrame } from "@j1939-decode/core";
import { MessageDecoder, parseFrameString, toJ1939Json } from "@j1939-decode/core";
import type { McpConfig } from "../config.js";
import { loadDatabase } from "../database-loader.js";
import { formatDecodedMessage } from "../formatters/message-formatter.js";
import { createStderrNoticeSink } from "../notice-sink.js";

export type DecodeFrameFormat = "yaml" | "json";

export interface DecodeFrameOptions {
	/** Frame in cansend syntax, e.g. "0CF00400#FF7D82201CFFFFFF" */
	frame?: string;
	/** Identifier as hex ("0x18FEEE00", "18FEEE00") or a decimal number */
	id?: string | number;
	/** Payload as hex, bytes optionally separated by spaces or dots */
	data?: string;
	/** Data length code; defaults to the number of data bytes */
	dlc?: number;
	format?: DecodeFrameFormat;
}

function parseIdentifier(id: string | number): number {
	if (typeof id === "number") return id;
	const text = id.trim().replace(/^0x/i, "");
	if (!/^[0-9A-Fa-f]{1,8}$/.test(text)) {
		throw new Error(`Invalid CAN identifier "${id}"`);
	}
	return Number.parseInt(text, 16);
}

/**
 * Build a frame from either the `frame` string or the `id`/`data` pair.
 *
 * @throws Error if neither or both forms are given, or the text is malformed
 */
export function resolveFrame(options: DecodeFrameOptions): CanFrame {
	const { frame, id, data, dlc } = options;
	if (frame !== undefined) {
		if (id !== undefined || data !== undefined) {
			throw new Error("Pass either `frame` or `id` + `data`, not both");
		}
		const parsed = parseFrameString(frame);
		return dlc !== undefined ? { ...parsed, dlc } : parsed;
	}
	if (id === undefined) {
		throw new Error("Pass `frame` (ID#DATA) or `id` + `data`");
	}

	// Borrow the cansend data syntax; the identifier is parsed on its own
	const payload = parseFrameString(`0#${data ?? ""}`);
	return {
		id: parseIdentifier(id),
		dlc: dlc ?? payload.dlc,
		data: payload.data,
	};
}

/**
 * Handle the decode_frame tool call.
 *
 * @throws Error if the frame is malformed or the database cannot be loaded
 */
export async function handleDecodeFrame(
	options: DecodeFrameOptions,
	config: McpConfig,
): Promise<string> {
	const frame = resolveFrame(options);
	const { lookup } = await loadDatabase(config);

	const decoder = new MessageDecoder(lookup, {
		notify: createStderrNoticeSink(config.minSeverity),
		minSeverity: config.minSeverity,
	});
	const result = decoder.decodeFrame(frame);
	if (!result.ok) {
		throw new Error(`${result.error.code}: ${result.error.message}`);
	}

	if (options.format === "json") {
		return toJ1939Json(result.message, { pretty: true });
	}
	return formatDecodedMessage(result.message);
}
