import type {
	ParameterGroupDescriptor,
	SuspectParameterDescriptor,
} from "../../src/definition/lookup";
import { MemoryLookupService } from "../../src/definition/lookup";
import type { DecodeNotice, NoticeSink } from "../../src/notices";

/**
 * Small reference database shared by the core tests
 */

export const EEC1: ParameterGroupDescriptor = {
	pgn: 61444,
	name: "Electronic Engine Controller 1",
	label: "EEC1",
	length: 8,
	spns: [
		{ spn: 4154, startBit: 4 },
		{ spn: 512, startBit: 8 },
		{ spn: 513, startBit: 16 },
		{ spn: 190, startBit: 24 },
	],
};

export const ET1: ParameterGroupDescriptor = {
	pgn: 65262,
	name: "Engine Temperature 1",
	label: "ET1",
	length: 8,
	spns: [
		{ spn: 110, startBit: 0 },
		{ spn: 174, startBit: undefined },
		{ spn: 175, startBit: -1 },
	],
};

export const VD: ParameterGroupDescriptor = {
	pgn: 65248,
	name: "Vehicle Distance",
	label: "VD",
	length: 8,
	spns: [
		{ spn: 244, startBit: 0 },
		{ spn: 245, startBit: 32 },
	],
};

export const PROPB: ParameterGroupDescriptor = {
	pgn: 65280,
	name: "Proprietary B",
	spns: [
		{ spn: 2551, startBit: 0 },
		{ spn: 110, startBit: 8 },
		{ spn: 3328, startBit: 16 },
		{ spn: 2550, startBit: 24 },
	],
};

export const EC1: ParameterGroupDescriptor = {
	pgn: 65251,
	name: "Engine Configuration 1",
	label: "EC1",
	spns: [],
};

export const SPNS: SuspectParameterDescriptor[] = [
	{
		spn: 512,
		name: "Driver's Demand Engine - Percent Torque",
		units: "%",
		lengthBits: 8,
		resolution: 1,
		offset: -125,
		operationalLow: -125,
		operationalHigh: 125,
	},
	{
		spn: 513,
		name: "Actual Engine - Percent Torque",
		units: "%",
		lengthBits: 8,
		resolution: 1,
		offset: -125,
		operationalLow: -125,
		operationalHigh: 125,
	},
	{
		spn: 190,
		name: "Engine Speed",
		units: "rpm",
		lengthBits: 16,
		resolution: 0.125,
		offset: 0,
		operationalLow: 0,
		operationalHigh: 8031.875,
	},
	{
		spn: 110,
		name: "Engine Coolant Temperature",
		units: "°C",
		lengthBits: 8,
		resolution: 1,
		offset: -40,
		operationalLow: -40,
		operationalHigh: 210,
	},
	{
		spn: 175,
		name: "Engine Oil Temperature 1",
		units: "°C",
		lengthBits: 16,
		resolution: 0.03125,
		offset: -273,
		operationalLow: -273,
		operationalHigh: 1734.96875,
	},
	{
		spn: 244,
		name: "Trip Distance",
		units: "km",
		lengthBits: 32,
		resolution: 0.125,
		offset: 0,
		operationalLow: 0,
		operationalHigh: 526385151.875,
	},
	{
		spn: 245,
		name: "Total Vehicle Distance",
		units: "km",
		lengthBits: 32,
		resolution: 0.125,
		offset: 0,
		operationalLow: 0,
		operationalHigh: 526385151.875,
	},
	{
		spn: 2550,
		name: "Manufacturer Defined Usage (PropB_PDU2)",
		units: "",
		lengthBits: 8,
		resolution: 1,
		offset: 0,
		operationalLow: 0,
		operationalHigh: 255,
	},
];

export const SOURCE_ADDRESSES: Array<[number, string]> = [
	[0, "Engine #1"],
	[3, "Transmission #1"],
	[11, "Brakes - System Controller"],
	[249, "Off Board Diagnostic-Service Tool #2"],
];

export function createSampleLookup(): MemoryLookupService {
	return new MemoryLookupService({
		parameterGroups: [EEC1, ET1, VD, PROPB, EC1],
		suspectParameters: SPNS,
		sourceAddresses: SOURCE_ADDRESSES,
	});
}

/** Sink that records every notice it receives */
export function createRecordingSink(): {
	notices: DecodeNotice[];
	notify: NoticeSink;
} {
	const notices: DecodeNotice[] = [];
	return {
		notices,
		notify: (notice) => {
			notices.push(notice);
		},
	};
}
