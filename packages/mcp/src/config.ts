/**
 * Configuration for the J1939 decode MCP server.
 *
 * Reads configuration from:
 * 1. CLI arguments (--database-path, --logs-dir, --min-severity)
 * 2. Environment variables (J1939_DB_PATH, J1939_LOGS_DIR, J1939_MIN_SEVERITY)
 * 3. Workspace settings (.vscode/settings.json), optional
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { NoticeSeverity } from "@j1939-decode/core";
import { isNoticeSeverity } from "@j1939-decode/core";

export interface McpConfig {
	/** J1939 database files or directories to search */
	databasePaths: string[];
	/** Directory holding candump logs */
	logsDir: string;
	/** Notices below this severity are not written to stderr */
	minSeverity: NoticeSeverity;
}

export interface ConfigSources {
	/** Process arguments (default: process.argv) */
	argv?: string[];
	/** Environment (default: process.env) */
	env?: NodeJS.ProcessEnv;
	/** Workspace directory (default: process.cwd()) */
	cwd?: string;
}

interface CliArgs {
	databasePath: string | undefined;
	logsDir: string | undefined;
	minSeverity: string | undefined;
}

const CLI_FLAGS = {
	"--database-path": "databasePath",
	"--logs-dir": "logsDir",
	"--min-severity": "minSeverity",
} as const satisfies Record<string, keyof CliArgs>;

function isCliFlag(name: string): name is keyof typeof CLI_FLAGS {
	return Object.hasOwn(CLI_FLAGS, name);
}

/**
 * Parse CLI arguments for MCP server configuration.
 * Accepts both `--flag value` and `--flag=value`.
 */
function parseCliArgs(argv: string[]): CliArgs {
	const args: CliArgs = {
		databasePath: undefined,
		logsDir: undefined,
		minSeverity: undefined,
	};

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;

		const eq = arg.indexOf("=");
		const name = eq >= 0 ? arg.slice(0, eq) : arg;
		if (!isCliFlag(name)) continue;

		if (eq >= 0) {
			args[CLI_FLAGS[name]] = arg.slice(eq + 1);
		} else if (i + 1 < argv.length) {
			args[CLI_FLAGS[name]] = argv[i + 1];
			i++;
		}
	}

	return args;
}

/**
 * Try to read workspace settings from .vscode/settings.json.
 *
 * @returns Parsed settings or an empty object when the file is missing or
 * not a JSON object
 */
function readWorkspaceSettings(workspaceDir: string): Record<string, unknown> {
	const settingsPath = path.join(workspaceDir, ".vscode", "settings.json");
	let raw: string;
	try {
		raw = fs.readFileSync(settingsPath, "utf8");
	} catch {
		return {};
	}
	try {
		const parsed: unknown = JSON.parse(raw);
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			return {};
		}
		return Object.fromEntries(Object.entries(parsed));
	} catch (err) {
		throw new Error(
			`Unable to parse ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
}

function parseSeverity(value: string, source: string): NoticeSeverity {
	const normalized = value.trim().toLowerCase();
	if (!isNoticeSeverity(normalized)) {
		throw new Error(
			`Invalid notice severity "${value}" from ${source}; expected debug, info, warning or error`,
		);
	}
	return normalized;
}

/**
 * Load MCP server configuration from all sources.
 *
 * Priority: CLI args > env vars > workspace settings > defaults. Database
 * paths are not merged across sources; the first source that names any wins.
 *
 * @throws Error if a severity is not recognised or settings.json is not JSON
 */
export function loadConfig(sources: ConfigSources = {}): McpConfig {
	const argv = sources.argv ?? process.argv;
	const env = sources.env ?? process.env;
	const workspaceDir = sources.cwd ?? process.cwd();

	const cli = parseCliArgs(argv);
	const settings = readWorkspaceSettings(workspaceDir);

	let databasePaths: string[] = [];
	if (cli.databasePath !== undefined) {
		databasePaths = [cli.databasePath];
	} else if (env["J1939_DB_PATH"] !== undefined) {
		databasePaths = env["J1939_DB_PATH"]
			.split(path.delimiter)
			.filter((p) => p.length > 0);
	} else {
		// j1939.databasePath: a single path or a list
		const wsDatabasePath = settings["j1939.databasePath"];
		if (typeof wsDatabasePath === "string") {
			databasePaths = [wsDatabasePath];
		} else if (Array.isArray(wsDatabasePath)) {
			databasePaths = wsDatabasePath.filter(
				(p): p is string => typeof p === "string",
			);
		}
	}

	let logsDir = "./logs";
	if (cli.logsDir !== undefined) {
		logsDir = cli.logsDir;
	} else if (env["J1939_LOGS_DIR"] !== undefined) {
		logsDir = env["J1939_LOGS_DIR"];
	} else {
		const wsLogsFolder = settings["j1939.logsFolder"];
		if (typeof wsLogsFolder === "string") {
			logsDir = wsLogsFolder;
		}
	}

	let minSeverity: NoticeSeverity = "info";
	if (cli.minSeverity !== undefined) {
		minSeverity = parseSeverity(cli.minSeverity, "--min-severity");
	} else if (env["J1939_MIN_SEVERITY"] !== undefined) {
		minSeverity = parseSeverity(env["J1939_MIN_SEVERITY"], "J1939_MIN_SEVERITY");
	}

	const resolve = (p: string) =>
		path.isAbsolute(p) ? p : path.resolve(workspaceDir, p);

	return {
		databasePaths: databasePaths.map(resolve),
		logsDir: resolve(logsDir),
		minSeverity,
	};
}
