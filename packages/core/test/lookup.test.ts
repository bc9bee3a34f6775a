import { describe, expect, it } from "vitest";
import { filterNotices, isNoticeSeverity } from "../src/notices";
import type { DecodeNotice } from "../src/notices";
import { createSampleLookup, EEC1 } from "./fixtures/sample-database";

describe("MemoryLookupService", () => {
	it("finds entries by number", () => {
		const lookup = createSampleLookup();
		expect(lookup.loaded).toBe(true);
		expect(lookup.lookupPgn(61444)?.name).toBe("Electronic Engine Controller 1");
		expect(lookup.lookupSpn(190)?.units).toBe("rpm");
		expect(lookup.lookupSourceAddress(3)).toBe("Transmission #1");
	});

	it("returns undefined for absent entries", () => {
		const lookup = createSampleLookup();
		expect(lookup.lookupPgn(1)).toBeUndefined();
		expect(lookup.lookupSpn(1)).toBeUndefined();
		expect(lookup.lookupSourceAddress(200)).toBeUndefined();
	});

	it("keeps SPN declaration order and freezes descriptors", () => {
		const lookup = createSampleLookup();
		const pg = lookup.lookupPgn(61444);
		expect(pg?.spns.map((s) => s.spn)).toEqual([4154, 512, 513, 190]);
		expect(Object.isFrozen(pg)).toBe(true);
		expect(Object.isFrozen(pg?.spns)).toBe(true);
		expect(pg).not.toBe(EEC1);
	});

	it("counts its entries", () => {
		expect(createSampleLookup().size).toEqual({
			pgns: 5,
			spns: 8,
			sourceAddresses: 4,
		});
	});

	it("empties and unloads on release", () => {
		const lookup = createSampleLookup();
		lookup.release();
		expect(lookup.loaded).toBe(false);
		expect(lookup.lookupPgn(61444)).toBeUndefined();
		expect(lookup.size).toEqual({ pgns: 0, spns: 0, sourceAddresses: 0 });
	});
});

describe("filterNotices", () => {
	it("drops notices below the threshold", () => {
		const received: DecodeNotice[] = [];
		const notify = filterNotices((n) => received.push(n), "warning");
		notify({ kind: "MISSING_LOOKUP_ENTRY", severity: "info", message: "a" });
		notify({ kind: "MALFORMED_DESCRIPTOR", severity: "warning", message: "b" });
		notify({ kind: "INVALID_FRAME", severity: "error", message: "c" });
		notify({ kind: "MISSING_LOOKUP_ENTRY", severity: "debug", message: "d" });
		expect(received.map((n) => n.message)).toEqual(["b", "c"]);
	});

	it("recognizes severity names", () => {
		expect(isNoticeSeverity("warning")).toBe(true);
		expect(isNoticeSeverity("verbose")).toBe(false);
	});
});
