import type { J1939LookupService } from "./definition/lookup";
import type { NoticeSink } from "./notices";

export const RESERVED_NAME = "Reserved";
export const INDUSTRY_GROUP_NAME = "Industry Group specific";
export const UNKNOWN_NAME = "Unknown";

/**
 * Resolve a source address to a human-readable name.
 *
 * - 92-127: not yet assigned, always "Reserved"
 * - 0-91 and 248-255 (preferred addresses): the database name, or "Unknown"
 * - 128-247: "Industry Group specific"
 *
 * Never fails. A preferred address missing from the database and a value
 * outside 0-255 are reported through `notify`.
 */
export function resolveSourceAddressName(
	sourceAddress: number,
	lookup: J1939LookupService,
	notify: NoticeSink,
): string {
	const sa = sourceAddress;

	if (Number.isInteger(sa) && sa >= 92 && sa <= 127) {
		return RESERVED_NAME;
	}

	if (isPreferredAddress(sa)) {
		const name = lookup.lookupSourceAddress(sa);
		if (name === undefined) {
			notify({
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "info",
				message: `No source address name found in database for source address ${sa}`,
				sourceAddress: sa,
			});
			return UNKNOWN_NAME;
		}
		return name;
	}

	if (Number.isInteger(sa) && sa >= 128 && sa <= 247) {
		return INDUSTRY_GROUP_NAME;
	}

	notify({
		kind: "OUT_OF_RANGE_ADDRESS",
		severity: "warning",
		message: `Unknown source address ${sa} outside of expected range`,
		sourceAddress: sa,
	});
	return UNKNOWN_NAME;
}

function isPreferredAddress(sa: number): boolean {
	if (!Number.isInteger(sa)) return false;
	return (sa >= 0 && sa <= 127) || (sa >= 248 && sa <= 255);
}
