/** Sentinel reported in place of a value outside the operational range */
export const NOT_AVAILABLE = "Not available";
export type NotAvailable = typeof NOT_AVAILABLE;

/** Linear scaling and operational range of an SPN */
export interface SpnScaling {
	resolution: number;
	offset: number;
	operationalLow: number;
	operationalHigh: number;
}

/**
 * Converted SPN value.
 *
 * Check `valid` rather than comparing `value` against the sentinel.
 */
export type SpnValue =
	| { valid: true; value: number }
	| { valid: false; value: NotAvailable };

/** Scale a raw value into engineering units: `raw * resolution + offset` */
export function scaleRawValue(raw: bigint, scaling: SpnScaling): number {
	return Number(raw) * scaling.resolution + scaling.offset;
}

/**
 * Convert a raw value and classify it against the operational range.
 *
 * Both bounds are inclusive. Values outside the range are the normal encoding
 * of "error" and "not available" states on the bus, not a failure.
 *
 * @example
 * convertSpnValue(7200n, { resolution: 0.125, offset: 0, operationalLow: 0, operationalHigh: 8031.875 });
 * // => { valid: true, value: 900 }
 */
export function convertSpnValue(raw: bigint, scaling: SpnScaling): SpnValue {
	const value = scaleRawValue(raw, scaling);
	if (value >= scaling.operationalLow && value <= scaling.operationalHigh) {
		return { valid: true, value };
	}
	return { valid: false, value: NOT_AVAILABLE };
}
