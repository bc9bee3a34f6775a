/** One SPN slot declared by a parameter group, in declaration order */
export interface SpnPlacement {
	spn: number;
	/**
	 * Zero-order start bit of the SPN within the 64-bit payload.
	 *
	 * @remarks `undefined` when the reference database carries no usable start
	 * bit for this slot. The decoder skips such slots.
	 */
	startBit: number | undefined;
}

/** Parameter Group (PGN) metadata */
export interface ParameterGroupDescriptor {
	pgn: number;
	name: string;
	/** Acronym, e.g. "EEC1" */
	label?: string;
	/** Data length in bytes, when the database declares a fixed one */
	length?: number;
	spns: readonly SpnPlacement[];
}

/** Suspect Parameter (SPN) metadata */
export interface SuspectParameterDescriptor {
	spn: number;
	name: string;
	units: string;
	/** 1-64 */
	lengthBits: number;
	/** Scale factor applied to the raw value */
	resolution: number;
	/** Added after scaling */
	offset: number;
	/** Inclusive lower bound, in converted units */
	operationalLow: number;
	/** Inclusive upper bound, in converted units */
	operationalHigh: number;
}

/**
 * Read-only query interface over a J1939 reference database.
 *
 * A missing entry is a normal outcome and is reported as `undefined`: most of
 * the PGN space is undefined, and vendors leave gaps in the source address
 * table.
 */
export interface J1939LookupService {
	/** `false` until the database is loaded, and again after it is released */
	readonly loaded: boolean;

	lookupPgn(pgn: number): ParameterGroupDescriptor | undefined;
	lookupSpn(spn: number): SuspectParameterDescriptor | undefined;
	lookupSourceAddress(sourceAddress: number): string | undefined;
}

/** Contents used to build a {@link MemoryLookupService} */
export interface LookupTables {
	parameterGroups: Iterable<ParameterGroupDescriptor>;
	suspectParameters: Iterable<SuspectParameterDescriptor>;
	/** Pairs of [source address, name] */
	sourceAddresses: Iterable<readonly [number, string]>;
}

function freezePgn(descriptor: ParameterGroupDescriptor): ParameterGroupDescriptor {
	return Object.freeze({
		...descriptor,
		spns: Object.freeze(descriptor.spns.map((slot) => Object.freeze({ ...slot }))),
	});
}

/**
 * In-memory lookup service.
 *
 * Built once, then only read. Decoders may share one instance freely; the
 * only mutation is {@link MemoryLookupService.release}, which the owner must
 * not run while decodes are in flight.
 */
export class MemoryLookupService implements J1939LookupService {
	private pgns = new Map<number, ParameterGroupDescriptor>();
	private spns = new Map<number, SuspectParameterDescriptor>();
	private sourceAddresses = new Map<number, string>();
	private isLoaded = true;

	constructor(tables: LookupTables) {
		for (const pg of tables.parameterGroups) {
			this.pgns.set(pg.pgn, freezePgn(pg));
		}
		for (const sp of tables.suspectParameters) {
			this.spns.set(sp.spn, Object.freeze({ ...sp }));
		}
		for (const [address, name] of tables.sourceAddresses) {
			this.sourceAddresses.set(address, name);
		}
	}

	get loaded(): boolean {
		return this.isLoaded;
	}

	/** Number of entries per table, for diagnostics */
	get size(): { pgns: number; spns: number; sourceAddresses: number } {
		return {
			pgns: this.pgns.size,
			spns: this.spns.size,
			sourceAddresses: this.sourceAddresses.size,
		};
	}

	lookupPgn(pgn: number): ParameterGroupDescriptor | undefined {
		return this.pgns.get(pgn);
	}

	lookupSpn(spn: number): SuspectParameterDescriptor | undefined {
		return this.spns.get(spn);
	}

	lookupSourceAddress(sourceAddress: number): string | undefined {
		return this.sourceAddresses.get(sourceAddress);
	}

	/** Drop all tables. Subsequent decodes fail with `NOT_INITIALIZED`. */
	release(): void {
		this.pgns.clear();
		this.spns.clear();
		this.sourceAddresses.clear();
		this.isLoaded = false;
	}
}
