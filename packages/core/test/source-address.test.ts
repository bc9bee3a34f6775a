import { describe, expect, it } from "vitest";
import {
	INDUSTRY_GROUP_NAME,
	RESERVED_NAME,
	resolveSourceAddressName,
	UNKNOWN_NAME,
} from "../src/source-address";
import {
	createRecordingSink,
	createSampleLookup,
} from "./fixtures/sample-database";

describe("resolveSourceAddressName", () => {
	const lookup = createSampleLookup();

	it("returns the database name for a known preferred address", () => {
		const { notices, notify } = createRecordingSink();
		expect(resolveSourceAddressName(0, lookup, notify)).toBe("Engine #1");
		expect(resolveSourceAddressName(249, lookup, notify)).toBe(
			"Off Board Diagnostic-Service Tool #2",
		);
		expect(notices).toHaveLength(0);
	});

	it("returns Reserved for every address in 92-127", () => {
		const { notices, notify } = createRecordingSink();
		for (let sa = 92; sa <= 127; sa++) {
			expect(resolveSourceAddressName(sa, lookup, notify)).toBe(RESERVED_NAME);
		}
		expect(notices).toHaveLength(0);
	});

	it("returns Industry Group specific for every address in 128-247", () => {
		const { notices, notify } = createRecordingSink();
		for (let sa = 128; sa <= 247; sa++) {
			expect(resolveSourceAddressName(sa, lookup, notify)).toBe(
				INDUSTRY_GROUP_NAME,
			);
		}
		expect(notices).toHaveLength(0);
	});

	it("returns Unknown and reports a preferred address missing from the database", () => {
		const { notices, notify } = createRecordingSink();
		expect(resolveSourceAddressName(5, lookup, notify)).toBe(UNKNOWN_NAME);
		expect(resolveSourceAddressName(255, lookup, notify)).toBe(UNKNOWN_NAME);
		expect(notices).toEqual([
			{
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "info",
				message: "No source address name found in database for source address 5",
				sourceAddress: 5,
			},
			{
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "info",
				message:
					"No source address name found in database for source address 255",
				sourceAddress: 255,
			},
		]);
	});

	it("returns Unknown for a value that is not an 8-bit address", () => {
		const { notices, notify } = createRecordingSink();
		expect(resolveSourceAddressName(300, lookup, notify)).toBe(UNKNOWN_NAME);
		expect(resolveSourceAddressName(-1, lookup, notify)).toBe(UNKNOWN_NAME);
		expect(resolveSourceAddressName(100.5, lookup, notify)).toBe(UNKNOWN_NAME);
		expect(notices.map((n) => n.kind)).toEqual([
			"OUT_OF_RANGE_ADDRESS",
			"OUT_OF_RANGE_ADDRESS",
			"OUT_OF_RANGE_ADDRESS",
		]);
		expect(notices[0]?.message).toBe(
			"Unknown source address 300 outside of expected range",
		);
	});
});
