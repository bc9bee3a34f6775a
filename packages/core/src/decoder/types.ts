import type { SuspectParameterDescriptor } from "../definition/lookup";
import type { NoticeSeverity, NoticeSink } from "../notices";
import type { SpnValue } from "../units";

/**
 * One decoded SPN: its database metadata, where it was read from, the raw
 * field and the converted value.
 */
export type DecodedSpn = Readonly<
	SuspectParameterDescriptor &
		SpnValue & {
			startBit: number;
			rawValue: bigint;
		}
>;

export interface DecodedMessage {
	readonly id: number;
	readonly priority: number;
	readonly pgn: number;
	readonly sourceAddress: number;
	readonly sourceAddressName: string;
	readonly dlc: number;
	/** Always 8 bytes; bytes past the supplied data are zero */
	readonly dataRaw: readonly number[];
	/** Set only when the PGN was found in the database */
	readonly pgnName?: string;
	/** Keyed by SPN number, in the PGN's declaration order */
	readonly spns: ReadonlyMap<number, DecodedSpn>;
	/** `true` once at least one SPN was decoded */
	readonly decoded: boolean;
}

/**
 * Error codes for decode calls that could not start
 */
export type DecodeErrorCode = "NOT_INITIALIZED" | "INVALID_FRAME";

export interface DecodeError {
	code: DecodeErrorCode;
	message: string;
}

export type DecodeResult =
	| { ok: true; message: DecodedMessage }
	| { ok: false; error: DecodeError };

export interface MessageDecoderOptions {
	/** Receives notices; defaults to {@link consoleNoticeSink} */
	notify?: NoticeSink;
	/** Notices below this severity are dropped (default "info") */
	minSeverity?: NoticeSeverity;
	/** SPNs omitted from every result (default {@link PROPRIETARY_SPNS}) */
	proprietarySpns?: Iterable<number>;
}
