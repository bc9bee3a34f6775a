import { describe, expect, it } from "vitest";
import {
	convertSpnValue,
	NOT_AVAILABLE,
	scaleRawValue,
	type SpnScaling,
} from "../src/units";

const ENGINE_SPEED: SpnScaling = {
	resolution: 0.125,
	offset: 0,
	operationalLow: 0,
	operationalHigh: 8031.875,
};

const COOLANT_TEMP: SpnScaling = {
	resolution: 1,
	offset: -40,
	operationalLow: -40,
	operationalHigh: 210,
};

describe("scaleRawValue", () => {
	it("applies resolution then offset", () => {
		expect(scaleRawValue(7200n, ENGINE_SPEED)).toBe(900);
		expect(scaleRawValue(90n, COOLANT_TEMP)).toBe(50);
		expect(scaleRawValue(0n, COOLANT_TEMP)).toBe(-40);
	});
});

describe("convertSpnValue", () => {
	it("returns the value when inside the operational range", () => {
		expect(convertSpnValue(7200n, ENGINE_SPEED)).toEqual({
			valid: true,
			value: 900,
		});
	});

	it("includes the lower bound", () => {
		expect(convertSpnValue(0n, COOLANT_TEMP)).toEqual({
			valid: true,
			value: -40,
		});
	});

	it("includes the upper bound", () => {
		expect(convertSpnValue(64255n, ENGINE_SPEED)).toEqual({
			valid: true,
			value: 8031.875,
		});
	});

	it("rejects a value one floating-point step above the upper bound", () => {
		// 8031.875 lies in [2^12, 2^13), where one ulp is 2^-40
		const scaling = { ...ENGINE_SPEED, offset: 2 ** -40 };
		expect(scaleRawValue(64255n, scaling)).toBeGreaterThan(8031.875);
		expect(convertSpnValue(64255n, scaling)).toEqual({
			valid: false,
			value: NOT_AVAILABLE,
		});
	});

	it("reports the not-available pattern as invalid", () => {
		expect(convertSpnValue(0xffffn, ENGINE_SPEED)).toEqual({
			valid: false,
			value: "Not available",
		});
		expect(convertSpnValue(0xffn, COOLANT_TEMP).valid).toBe(false);
	});
});
