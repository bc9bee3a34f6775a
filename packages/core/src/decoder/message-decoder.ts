import {
	extractSpnBits,
	MAX_PAYLOAD_BYTES,
	PAYLOAD_BITS,
	packPayload,
} from "../binary/bit-extract";
import type {
	J1939LookupService,
	SpnPlacement,
} from "../definition/lookup";
import type { CanFrame } from "../frame";
import { decodeIdentifier } from "../identifier";
import { consoleNoticeSink, filterNotices, type NoticeSink } from "../notices";
import { resolveSourceAddressName } from "../source-address";
import { convertSpnValue } from "../units";
import type {
	DecodedMessage,
	DecodedSpn,
	DecodeErrorCode,
	DecodeResult,
	MessageDecoderOptions,
} from "./types";

/** Manufacturer-specific SPNs, never decoded */
export const PROPRIETARY_SPNS: readonly number[] = [2550, 2551, 3328];

const MAX_IDENTIFIER = 0xffffffff;

/**
 * Decodes J1939 frames against a reference database.
 *
 * A decoder holds no per-call state: each call builds a fresh
 * {@link DecodedMessage} and keeps no reference to it. Several decoders may
 * share one lookup service, provided it finished loading before the first
 * decode call.
 *
 * @example
 * const decoder = new MessageDecoder(lookup, { minSeverity: "warning" });
 * const result = decoder.decode(0x0cf00400, 8, [0xff, 0xff, 0xff, 0x20, 0x1c, 0xff, 0xff, 0xff]);
 * if (result.ok) console.log(result.message.spns.get(190)?.value); // 900
 */
export class MessageDecoder {
	private readonly notify: NoticeSink;
	private readonly proprietarySpns: ReadonlySet<number>;

	constructor(
		private readonly lookup: J1939LookupService,
		options: MessageDecoderOptions = {},
	) {
		this.notify = filterNotices(
			options.notify ?? consoleNoticeSink,
			options.minSeverity ?? "info",
		);
		this.proprietarySpns = new Set(options.proprietarySpns ?? PROPRIETARY_SPNS);
	}

	decodeFrame(frame: CanFrame): DecodeResult {
		return this.decode(frame.id, frame.dlc, frame.data);
	}

	/**
	 * Decode one frame.
	 *
	 * Only an unloaded database or a malformed frame fails the call. Unknown
	 * PGNs, unknown SPNs and bad start bits narrow the result instead: see
	 * `pgnName`, `spns` and `decoded`.
	 *
	 * @param id - CAN identifier (unsigned 32-bit; only the low 29 bits are used)
	 * @param dlc - Data length code, 0-8
	 * @param data - Up to 8 payload bytes
	 */
	decode(id: number, dlc: number, data: ArrayLike<number>): DecodeResult {
		if (!this.lookup.loaded) {
			return this.fail("NOT_INITIALIZED", "J1939 database not loaded");
		}
		if (!Number.isInteger(dlc) || dlc < 0 || dlc > MAX_PAYLOAD_BYTES) {
			return this.fail("INVALID_FRAME", `DLC must be 0-8 bytes, got ${dlc}`);
		}
		if (data.length > MAX_PAYLOAD_BYTES) {
			return this.fail(
				"INVALID_FRAME",
				`Frame data cannot exceed 8 bytes, got ${data.length}`,
			);
		}
		if (!Number.isInteger(id) || id < 0 || id > MAX_IDENTIFIER) {
			return this.fail(
				"INVALID_FRAME",
				`CAN identifier must be an unsigned 32-bit integer, got ${id}`,
			);
		}

		const { priority, pgn, sourceAddress } = decodeIdentifier(id);
		const sourceAddressName = resolveSourceAddressName(
			sourceAddress,
			this.lookup,
			this.notify,
		);

		const dataRaw: number[] = [];
		for (let i = 0; i < MAX_PAYLOAD_BYTES; i++) {
			dataRaw.push((data[i] ?? 0) & 0xff);
		}

		const spns = new Map<number, DecodedSpn>();
		const base = {
			id,
			priority,
			pgn,
			sourceAddress,
			sourceAddressName,
			dlc,
			dataRaw: Object.freeze(dataRaw),
			spns,
		};

		const group = this.lookup.lookupPgn(pgn);
		if (!group) {
			this.notify({
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "debug",
				message: `PGN ${pgn} not found in database`,
				pgn,
			});
			return { ok: true, message: Object.freeze({ ...base, decoded: false }) };
		}

		if (group.spns.length === 0) {
			this.notify({
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "info",
				message: `Empty SPN list found in database for PGN ${pgn}`,
				pgn,
			});
		}

		const payload = packPayload(dataRaw);
		let decoded = false;

		for (const placement of group.spns) {
			if (this.proprietarySpns.has(placement.spn)) continue;

			const spn = this.decodeSpn(pgn, placement, payload);
			if (spn) {
				spns.set(spn.spn, spn);
				decoded = true;
			}
		}

		return {
			ok: true,
			message: Object.freeze({ ...base, pgnName: group.name, decoded }),
		};
	}

	private decodeSpn(
		pgn: number,
		placement: SpnPlacement,
		payload: bigint,
	): DecodedSpn | undefined {
		const { spn, startBit } = placement;

		if (startBit === undefined) {
			this.notify({
				kind: "MALFORMED_DESCRIPTOR",
				severity: "warning",
				message: `No start bit found in database for SPN ${spn}, skipping decode`,
				pgn,
				spn,
			});
			return undefined;
		}
		if (!Number.isInteger(startBit)) {
			this.notify({
				kind: "MALFORMED_DESCRIPTOR",
				severity: "warning",
				message: `Start bit ${startBit} is not a whole bit position for SPN ${spn}, skipping decode`,
				pgn,
				spn,
			});
			return undefined;
		}
		if (startBit < 0) {
			this.notify({
				kind: "MALFORMED_DESCRIPTOR",
				severity: "warning",
				message: `Start bit cannot be negative for SPN ${spn}, skipping decode`,
				pgn,
				spn,
			});
			return undefined;
		}
		if (startBit >= PAYLOAD_BITS) {
			this.notify({
				kind: "MALFORMED_DESCRIPTOR",
				severity: "warning",
				message: `Start bit ${startBit} is past the end of the payload for SPN ${spn}, skipping decode`,
				pgn,
				spn,
			});
			return undefined;
		}

		const descriptor = this.lookup.lookupSpn(spn);
		if (!descriptor) {
			this.notify({
				kind: "MISSING_LOOKUP_ENTRY",
				severity: "info",
				message: `No SPN data found in database for SPN ${spn}`,
				pgn,
				spn,
			});
			return undefined;
		}
		const { lengthBits } = descriptor;
		if (!Number.isInteger(lengthBits) || lengthBits < 1 || lengthBits > PAYLOAD_BITS) {
			this.notify({
				kind: "MALFORMED_DESCRIPTOR",
				severity: "warning",
				message: `SPN length ${lengthBits} is not 1-64 bits for SPN ${spn}, skipping decode`,
				pgn,
				spn,
			});
			return undefined;
		}

		const rawValue = extractSpnBits(payload, startBit, lengthBits);
		const converted = convertSpnValue(rawValue, descriptor);

		return Object.freeze({ ...descriptor, startBit, rawValue, ...converted });
	}

	private fail(code: DecodeErrorCode, message: string): DecodeResult {
		this.notify({ kind: code, severity: "error", message });
		return { ok: false, error: { code, message } };
	}
}
