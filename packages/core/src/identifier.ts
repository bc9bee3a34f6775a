/**
 * J1939 sub-fields of a 29-bit CAN identifier.
 *
 * Layout (bit 28 down to bit 0):
 *   Priority(3) | EDP(1) | DP(1) | PF(8) | PS(8) | SA(8)
 *
 * The PGN is taken as the full 18 bits 8-25 (EDP, DP, PF and PS).
 *
 * @module identifier
 */

export interface IdentifierFields {
	/** 3 bits, 0-7 */
	priority: number;
	/** 18 bits, 0-262143 */
	pgn: number;
	/** 8 bits, 0-255 */
	sourceAddress: number;
}

const PRIORITY_SHIFT = 26;
const PRIORITY_MASK = 0x7;
const PGN_SHIFT = 8;
const PGN_MASK = 0x3ffff;
const SA_MASK = 0xff;

/** PDU formats below this value are destination specific (PDU1) */
const PDU2_THRESHOLD = 240;

/**
 * Split a CAN identifier into priority, PGN and source address.
 *
 * Bits above bit 28 are ignored.
 *
 * @example
 * decodeIdentifier(0x0cf00400); // => { priority: 3, pgn: 61444, sourceAddress: 0 }
 */
export function decodeIdentifier(id: number): IdentifierFields {
	return {
		priority: (id >>> PRIORITY_SHIFT) & PRIORITY_MASK,
		pgn: (id >>> PGN_SHIFT) & PGN_MASK,
		sourceAddress: id & SA_MASK,
	};
}

/** Rebuild the low 29 bits of an identifier from its sub-fields */
export function composeIdentifier(fields: IdentifierFields): number {
	return (
		(((fields.priority & PRIORITY_MASK) << PRIORITY_SHIFT) |
			((fields.pgn & PGN_MASK) << PGN_SHIFT) |
			(fields.sourceAddress & SA_MASK)) >>>
		0
	);
}

/** PDU format (PF) byte of a PGN */
export function pduFormat(pgn: number): number {
	return (pgn >>> 8) & 0xff;
}

/** PDU specific (PS) byte of a PGN */
export function pduSpecific(pgn: number): number {
	return pgn & 0xff;
}

/**
 * Whether the PGN is destination specific (PDU1).
 *
 * For PDU1 PGNs the PS byte carries the destination address.
 */
export function isPdu1(pgn: number): boolean {
	return pduFormat(pgn) < PDU2_THRESHOLD;
}
