import type { Dirent, Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import type {
	J1939DatabaseProvider,
	J1939DatabaseStub,
	NoticeSink,
	ParameterGroupDescriptor,
	SpnPlacement,
	SuspectParameterDescriptor,
} from "@j1939-decode/core";
import { MemoryLookupService, UNKNOWN_NAME } from "@j1939-decode/core";
import { z } from "zod";

/**
 * Numeric fields are usually JSON numbers, but some exports write them as
 * strings ("0.125", "-40").
 */
const numberish = z.union([
	z.number(),
	z
		.string()
		.trim()
		.regex(/^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/)
		.transform(Number),
]);

const PgnEntrySchema = z.object({
	/** Unnamed groups still decode, as "Unknown" */
	Name: z.string().optional(),
	Label: z.string().optional(),
	/** Bytes, or free text such as "Variable" */
	PGNLength: z.unknown().optional(),
	SPNs: z.array(z.number().int().nonnegative()).default([]),
	SPNStartBits: z.array(z.unknown()).default([]),
});

const SpnEntrySchema = z.object({
	Name: z.string(),
	Units: z.string().default(""),
	SPNLength: numberish.pipe(z.number().int().min(1).max(64)),
	Resolution: numberish,
	Offset: numberish,
	OperationalLow: numberish,
	OperationalHigh: numberish,
});

const DatabaseSchema = z.object({
	J1939PGNdb: z.record(z.string(), z.unknown()),
	J1939SPNdb: z.record(z.string(), z.unknown()),
	J1939SATabledb: z.record(z.string(), z.unknown()).default({}),
});

export interface ParseDatabaseOptions {
	/** Database name used in notices and errors */
	name?: string;
	/** Receives one notice per dropped entry and a summary */
	notify?: NoticeSink;
}

function uriToFsPath(uriOrPath: string): string {
	if (uriOrPath.startsWith("file:")) return fileURLToPath(uriOrPath);
	return uriOrPath;
}

function fsPathToUri(p: string): string {
	return pathToFileURL(p).toString();
}

function databaseName(fsPath: string): string {
	return path.basename(fsPath, path.extname(fsPath));
}

/** Database keys are plain decimal numbers */
function parseKey(key: string): number | undefined {
	if (!/^\d+$/.test(key)) return undefined;
	const n = Number.parseInt(key, 10);
	return Number.isSafeInteger(n) ? n : undefined;
}

/**
 * Start bits are plain numbers. Some exports wrap each one in a list, one
 * entry per fragment of the SPN; only single-fragment lists are usable.
 */
function parseStartBit(value: unknown): number | undefined {
	if (typeof value === "number" && Number.isInteger(value)) return value;
	if (Array.isArray(value) && value.length === 1) {
		return parseStartBit(value[0]);
	}
	return undefined;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `${where}: ${issue.message}`;
		})
		.join("; ");
}

/**
 * Convert a parsed J1939 database document into a lookup service.
 *
 * Entries that fail validation are dropped and reported; the rest of the
 * database stays usable. A dropped SPN then shows up as a missing entry when
 * decoding.
 *
 * @throws Error if the document lacks the PGN or SPN tables
 */
export function parseJ1939Database(
	document: unknown,
	options: ParseDatabaseOptions = {},
): MemoryLookupService {
	const name = options.name ?? "J1939 database";
	const notify = options.notify ?? (() => {});

	const parsed = DatabaseSchema.safeParse(document);
	if (!parsed.success) {
		throw new Error(`Invalid J1939 database ${name}: ${formatIssues(parsed.error)}`);
	}
	const db = parsed.data;
	let dropped = 0;

	const drop = (table: string, key: string, reason: string) => {
		dropped++;
		notify({
			kind: "MALFORMED_DESCRIPTOR",
			severity: "debug",
			message: `Dropped ${table} entry "${key}" from ${name}: ${reason}`,
		});
	};

	const parameterGroups: ParameterGroupDescriptor[] = [];
	for (const [key, raw] of Object.entries(db.J1939PGNdb)) {
		const pgn = parseKey(key);
		if (pgn === undefined) {
			drop("PGN", key, "key is not a decimal number");
			continue;
		}
		const entry = PgnEntrySchema.safeParse(raw);
		if (!entry.success) {
			drop("PGN", key, formatIssues(entry.error));
			continue;
		}

		const { Name, Label, PGNLength, SPNs, SPNStartBits } = entry.data;
		const spns: SpnPlacement[] = SPNs.map((spn, i) => ({
			spn,
			startBit: parseStartBit(SPNStartBits[i]),
		}));
		if (Name === undefined) {
			notify({
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "info",
				message: `No name found in ${name} for PGN ${pgn}, using "${UNKNOWN_NAME}"`,
				pgn,
			});
		}
		const descriptor: ParameterGroupDescriptor = {
			pgn,
			name: Name ?? UNKNOWN_NAME,
			spns,
		};
		if (Label !== undefined && Label !== "") descriptor.label = Label;
		const length = numberish.safeParse(PGNLength);
		if (length.success && Number.isInteger(length.data)) {
			descriptor.length = length.data;
		}
		parameterGroups.push(descriptor);
	}

	const suspectParameters: SuspectParameterDescriptor[] = [];
	for (const [key, raw] of Object.entries(db.J1939SPNdb)) {
		const spn = parseKey(key);
		if (spn === undefined) {
			drop("SPN", key, "key is not a decimal number");
			continue;
		}
		const entry = SpnEntrySchema.safeParse(raw);
		if (!entry.success) {
			drop("SPN", key, formatIssues(entry.error));
			continue;
		}
		const e = entry.data;
		suspectParameters.push({
			spn,
			name: e.Name,
			units: e.Units,
			lengthBits: e.SPNLength,
			resolution: e.Resolution,
			offset: e.Offset,
			operationalLow: e.OperationalLow,
			operationalHigh: e.OperationalHigh,
		});
	}

	const sourceAddresses: Array<[number, string]> = [];
	for (const [key, raw] of Object.entries(db.J1939SATabledb)) {
		const sa = parseKey(key);
		if (sa === undefined || sa > 255) {
			drop("source address", key, "key is not an address 0-255");
			continue;
		}
		if (typeof raw !== "string") {
			drop("source address", key, "name is not a string");
			continue;
		}
		sourceAddresses.push([sa, raw]);
	}

	if (dropped > 0) {
		notify({
			kind: "MALFORMED_DESCRIPTOR",
			severity: "info",
			message: `Dropped ${dropped} malformed entr${dropped === 1 ? "y" : "ies"} from ${name}`,
		});
	}

	return new MemoryLookupService({
		parameterGroups,
		suspectParameters,
		sourceAddresses,
	});
}

async function readDocument(fsPath: string): Promise<unknown> {
	let text: string;
	try {
		text = await fs.readFile(fsPath, "utf8");
	} catch (err) {
		throw new Error(
			`Could not open J1939 database ${fsPath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
	try {
		const document: unknown = JSON.parse(text);
		return document;
	} catch (err) {
		throw new Error(
			`Unable to parse J1939 database ${fsPath}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
}

/**
 * Provider for J1939 reference databases stored as JSON
 * (`J1939PGNdb`, `J1939SPNdb` and `J1939SATabledb` tables keyed by decimal
 * strings).
 */
export class J1939DbProvider implements J1939DatabaseProvider {
	id = "j1939db";
	label = "J1939 JSON database";

	constructor(
		private readonly searchPaths: string[] = [],
		private readonly notify?: NoticeSink,
	) {}

	async discoverDatabaseUris(nearUri?: string): Promise<string[]> {
		const roots: string[] = [];
		if (nearUri) roots.push(path.dirname(uriToFsPath(nearUri)));
		roots.push(...this.searchPaths.map(uriToFsPath));

		const found = new Set<string>();
		for (const root of roots) {
			let stat: Stats;
			try {
				stat = await fs.stat(root);
			} catch {
				continue;
			}

			if (stat.isFile()) {
				found.add(path.resolve(root));
				continue;
			}
			if (!stat.isDirectory()) continue;

			let entries: Dirent[];
			try {
				entries = await fs.readdir(root, { withFileTypes: true });
			} catch {
				continue;
			}
			for (const entry of entries) {
				if (
					entry.isFile() &&
					entry.name.toLowerCase().endsWith(".json") &&
					/j1939/i.test(entry.name)
				) {
					found.add(path.resolve(root, entry.name));
				}
			}
		}

		return [...found].sort().map(fsPathToUri);
	}

	async peek(databaseUri: string): Promise<J1939DatabaseStub> {
		const fsPath = uriToFsPath(databaseUri);
		const parsed = DatabaseSchema.safeParse(await readDocument(fsPath));
		if (!parsed.success) {
			throw new Error(
				`Invalid J1939 database ${fsPath}: ${formatIssues(parsed.error)}`,
			);
		}
		return {
			uri: fsPathToUri(path.resolve(fsPath)),
			name: databaseName(fsPath),
			counts: {
				pgns: Object.keys(parsed.data.J1939PGNdb).length,
				spns: Object.keys(parsed.data.J1939SPNdb).length,
				sourceAddresses: Object.keys(parsed.data.J1939SATabledb).length,
			},
		};
	}

	async parse(databaseUri: string): Promise<MemoryLookupService> {
		const fsPath = uriToFsPath(databaseUri);
		const document = await readDocument(fsPath);
		const options: ParseDatabaseOptions = { name: fsPath };
		if (this.notify) options.notify = this.notify;
		return parseJ1939Database(document, options);
	}
}
