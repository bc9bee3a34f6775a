import * as fs from "node:fs/promises";
import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config";
import { withTempDir } from "./helpers";

const argv0 = ["node", "server.mjs"];

describe("loadConfig", () => {
	it("falls back to defaults", async () => {
		await withTempDir(async (dir) => {
			const config = loadConfig({ argv: argv0, env: {}, cwd: dir });
			expect(config).toEqual({
				databasePaths: [],
				logsDir: path.join(dir, "logs"),
				minSeverity: "info",
			});
		});
	});

	it("prefers CLI arguments over environment variables", async () => {
		await withTempDir(async (dir) => {
			const config = loadConfig({
				argv: [
					...argv0,
					"--database-path",
					"db/j1939.json",
					"--logs-dir=/var/can",
					"--min-severity",
					"Warning",
				],
				env: {
					J1939_DB_PATH: "/other/db.json",
					J1939_LOGS_DIR: "/other/logs",
					J1939_MIN_SEVERITY: "debug",
				},
				cwd: dir,
			});
			expect(config).toEqual({
				databasePaths: [path.join(dir, "db", "j1939.json")],
				logsDir: "/var/can",
				minSeverity: "warning",
			});
		});
	});

	it("splits J1939_DB_PATH on the path delimiter", async () => {
		await withTempDir(async (dir) => {
			const config = loadConfig({
				argv: argv0,
				env: {
					J1939_DB_PATH: ["a.json", "", "/abs/b"].join(path.delimiter),
					J1939_LOGS_DIR: "captures",
					J1939_MIN_SEVERITY: "debug",
				},
				cwd: dir,
			});
			expect(config).toEqual({
				databasePaths: [path.join(dir, "a.json"), "/abs/b"],
				logsDir: path.join(dir, "captures"),
				minSeverity: "debug",
			});
		});
	});

	it("reads workspace settings when no flag or variable is set", async () => {
		await withTempDir(async (dir) => {
			await fs.mkdir(path.join(dir, ".vscode"));
			await fs.writeFile(
				path.join(dir, ".vscode", "settings.json"),
				JSON.stringify({
					"j1939.databasePath": ["dbs", 5, "/abs/db.json"],
					"j1939.logsFolder": "captures",
				}),
			);

			const config = loadConfig({ argv: argv0, env: {}, cwd: dir });
			expect(config.databasePaths).toEqual([
				path.join(dir, "dbs"),
				"/abs/db.json",
			]);
			expect(config.logsDir).toBe(path.join(dir, "captures"));

			const overridden = loadConfig({
				argv: argv0,
				env: { J1939_DB_PATH: "env.json" },
				cwd: dir,
			});
			expect(overridden.databasePaths).toEqual([path.join(dir, "env.json")]);
			expect(overridden.logsDir).toBe(path.join(dir, "captures"));
		});
	});

	it("accepts a single database path in settings", async () => {
		await withTempDir(async (dir) => {
			await fs.mkdir(path.join(dir, ".vscode"));
			await fs.writeFile(
				path.join(dir, ".vscode", "settings.json"),
				JSON.stringify({ "j1939.databasePath": "j1939.json" }),
			);
			const config = loadConfig({ argv: argv0, env: {}, cwd: dir });
			expect(config.databasePaths).toEqual([path.join(dir, "j1939.json")]);
		});
	});

	it("rejects an unknown severity", async () => {
		await withTempDir(async (dir) => {
			expect(() =>
				loadConfig({
					argv: argv0,
					env: { J1939_MIN_SEVERITY: "loud" },
					cwd: dir,
				}),
			).toThrow(
				'Invalid notice severity "loud" from J1939_MIN_SEVERITY; expected debug, info, warning or error',
			);
		});
	});

	it("reports a settings file that is not JSON", async () => {
		await withTempDir(async (dir) => {
			await fs.mkdir(path.join(dir, ".vscode"));
			await fs.writeFile(path.join(dir, ".vscode", "settings.json"), "{ oops");
			expect(() => loadConfig({ argv: argv0, env: {}, cwd: dir })).toThrow(
				/^Unable to parse .*settings\.json: /,
			);
		});
	});
});
