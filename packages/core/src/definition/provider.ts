import type { MemoryLookupService } from "./lookup";

/** Minimal metadata about a database file, read without building lookups */
export interface J1939DatabaseStub {
	/** Database file URI (typically file://...) */
	uri: string;
	name: string;
	counts: {
		pgns: number;
		spns: number;
		sourceAddresses: number;
	};
}

export interface J1939DatabaseProvider {
	/**
	 * Internal ID
	 *
	 * @example "j1939db"
	 */
	id: string;
	/** Human-readable label */
	label: string;

	/**
	 * Discover candidate database files for this provider.
	 *
	 * @param nearUri - Optional URI of a capture or database file. If provided, the
	 *                  provider also searches the directory that contains it.
	 *
	 * @remarks
	 * This returns file URIs as strings so that they can be logged and cached as-is.
	 */
	discoverDatabaseUris(nearUri?: string): Promise<string[]>;

	/** Quickly count entries without building descriptors */
	peek(databaseUri: string): Promise<J1939DatabaseStub>;

	/** Parse a database file into a ready lookup service */
	parse(databaseUri: string): Promise<MemoryLookupService>;
}
