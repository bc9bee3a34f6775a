#!/usr/bin/env node
/**
 * J1939 decode MCP server
 *
 * Exposes J1939 frame decoding, reference-database lookups and candump log
 * decoding to LLM agents via the Model Context Protocol (MCP). Runs as a
 * standalone Node.js process using stdio transport.
 *
 * Usage:
 *   j1939-mcp [--database-path <path>] [--logs-dir <path>] [--min-severity <level>]
 *
 * Environment variables:
 *   J1939_DB_PATH       J1939 JSON database file or directory
 *   J1939_LOGS_DIR      Directory holding candump logs
 *   J1939_MIN_SEVERITY  debug, info, warning or error
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { type McpConfig, loadConfig } from "./config.js";
import { type DecodeFrameOptions, handleDecodeFrame } from "./tools/decode-frame.js";
import { type DecodeLogOptions, handleDecodeLog } from "./tools/decode-log.js";
import { handleListLogs } from "./tools/list-logs.js";
import { handleLookupPgn } from "./tools/lookup-pgn.js";
import { handleLookupSpn } from "./tools/lookup-spn.js";
import { handleSourceAddress } from "./tools/source-address.js";

type ToolResult = {
	content: Array<{ type: "text"; text: string }>;
	isError?: boolean;
};

/** Run a tool handler, turning a thrown error into an MCP error result */
async function runTool(handler: () => Promise<string>): Promise<ToolResult> {
	try {
		const text = await handler();
		return { content: [{ type: "text", text }] };
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		return {
			content: [{ type: "text", text: `Error: ${message}` }],
			isError: true,
		};
	}
}

let config: McpConfig;
try {
	config = loadConfig();
} catch (err) {
	process.stderr.write(
		`Warning: failed to load config, using defaults: ${err instanceof Error ? err.message : String(err)}\n`,
	);
	config = { databasePaths: [], logsDir: "./logs", minSeverity: "info" };
}

const server = new McpServer({
	name: "j1939-decode",
	version: "1.0.0",
});

// ─── Tool: decode_frame ───────────────────────────────────────────────────────

server.tool(
	"decode_frame",
	"Decode one J1939 CAN frame. Pass `frame` in cansend syntax (e.g. '0CF00400#FF7D82201CFFFFFF') or `id` + `data`. Values outside an SPN's operational range read 'Not available'.",
	{
		frame: z
			.string()
			.optional()
			.describe("Frame as <hex id>#<hex data>"),
		id: z
			.union([z.string(), z.number().int().nonnegative()])
			.optional()
			.describe("29-bit identifier as hex ('0x18FEEE00') or a number"),
		data: z
			.string()
			.optional()
			.describe("Payload as hex, up to 8 bytes; spaces and dots allowed"),
		dlc: z
			.number()
			.int()
			.min(0)
			.max(8)
			.optional()
			.describe("Data length code; defaults to the number of data bytes"),
		format: z
			.enum(["yaml", "json"])
			.optional()
			.describe("yaml (default): metadata + SPN table; json: full decode document"),
	},
	async ({ frame, id, data, dlc, format }) =>
		runTool(() => {
			const opts: DecodeFrameOptions = {};
			if (frame !== undefined) opts.frame = frame;
			if (id !== undefined) opts.id = id;
			if (data !== undefined) opts.data = data;
			if (dlc !== undefined) opts.dlc = dlc;
			if (format !== undefined) opts.format = format;
			return handleDecodeFrame(opts, config);
		}),
);

// ─── Tool: lookup_pgn ─────────────────────────────────────────────────────────

server.tool(
	"lookup_pgn",
	"Look up a parameter group (PGN) in the J1939 database. Returns its name, length and the SPNs it carries with their start bits and scaling.",
	{
		pgn: z.number().int().min(0).max(0x3ffff).describe("Parameter group number"),
	},
	async ({ pgn }) => runTool(() => handleLookupPgn(pgn, config)),
);

// ─── Tool: lookup_spn ─────────────────────────────────────────────────────────

server.tool(
	"lookup_spn",
	"Look up a suspect parameter (SPN) in the J1939 database: name, units, bit length, resolution, offset and operational range.",
	{
		spn: z.number().int().nonnegative().describe("Suspect parameter number"),
	},
	async ({ spn }) => runTool(() => handleLookupSpn(spn, config)),
);

// ─── Tool: source_address ─────────────────────────────────────────────────────

server.tool(
	"source_address",
	"Resolve a J1939 source address (0-255) to its name. Addresses 92-127 are reserved and 128-247 are industry-group specific.",
	{
		address: z.number().int().min(0).max(255).describe("Source address"),
	},
	async ({ address }) => runTool(() => handleSourceAddress(address, config)),
);

// ─── Tool: list_logs ──────────────────────────────────────────────────────────

server.tool(
	"list_logs",
	"List candump logs sorted by recency (1 = most recent) with frame counts and duration. Use the filename with `decode_log` to decode a specific capture, or omit it to search all logs.",
	{},
	async () => runTool(() => handleListLogs(config)),
);

// ─── Tool: decode_log ─────────────────────────────────────────────────────────

server.tool(
	"decode_log",
	"Decode candump logs and filter frames with an expression over PGN, SA, Priority, DLC, Decoded (1/0) and SPN<number> (valid decoded values only), e.g. 'PGN == 61444 && SPN190 > 1500'.",
	{
		filter: z
			.string()
			.optional()
			.describe("Filter expression; omit to keep every frame"),
		file: z
			.string()
			.optional()
			.describe("Filename from list_logs; omit to search all log files"),
		limit: z
			.number()
			.int()
			.positive()
			.optional()
			.describe("Maximum rows to return (default 100)"),
	},
	async ({ filter, file, limit }) =>
		runTool(() => {
			const opts: DecodeLogOptions = {};
			if (filter !== undefined) opts.filter = filter;
			if (file !== undefined) opts.file = file;
			if (limit !== undefined) opts.limit = limit;
			return handleDecodeLog(opts, config);
		}),
);

// ─── Start server ─────────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);
