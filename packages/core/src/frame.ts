/**
 * CAN frame value type and parsers for the text formats used by SocketCAN
 * tools (`cansend` and `candump`).
 *
 * @module frame
 */

export interface CanFrame {
	/** CAN identifier; only the low 29 bits are significant */
	id: number;
	/** Data length code, 0-8 */
	dlc: number;
	/** Payload bytes, at most 8 */
	data: Uint8Array;
}

export interface CandumpRecord {
	/** Seconds since the epoch, when the line carries one */
	timestamp?: number;
	channel: string;
	frame: CanFrame;
}

const HEX_ID = /^[0-9A-Fa-f]{1,8}$/;
const HEX_DATA = /^(?:[0-9A-Fa-f]{2})*$/;

function parseHexId(text: string): number {
	if (!HEX_ID.test(text)) {
		throw new Error(`Invalid CAN identifier "${text}"`);
	}
	return Number.parseInt(text, 16);
}

function parseHexBytes(text: string): Uint8Array {
	const compact = text.replace(/[\s.]/g, "");
	if (!HEX_DATA.test(compact)) {
		throw new Error(`Invalid frame data "${text}"`);
	}
	const bytes = new Uint8Array(compact.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(compact.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

/**
 * Parse a frame in `cansend` syntax: `<hex id>#<hex data>`.
 *
 * Data bytes may be separated by dots. The DLC is the number of data bytes.
 * Remote frames (`#R`) and CAN FD frames (`##`) are rejected.
 *
 * @throws Error if the text is not a classic data frame
 *
 * @example
 * parseFrameString("0CF00400#FFFFFF201CFFFFFF");
 * // => { id: 0x0cf00400, dlc: 8, data: Uint8Array [255, 255, 255, 32, 28, 255, 255, 255] }
 */
export function parseFrameString(text: string): CanFrame {
	const trimmed = text.trim();
	const hashIdx = trimmed.indexOf("#");
	if (hashIdx < 0) {
		throw new Error(`Expected "<id>#<data>", got "${trimmed}"`);
	}

	const idText = trimmed.slice(0, hashIdx);
	const dataText = trimmed.slice(hashIdx + 1);
	if (dataText.startsWith("#")) {
		throw new Error(`CAN FD frames are not supported: "${trimmed}"`);
	}
	if (/^R/i.test(dataText)) {
		throw new Error(`Remote frames carry no data: "${trimmed}"`);
	}

	const data = parseHexBytes(dataText);
	if (data.length > 8) {
		throw new Error(`Frame data exceeds 8 bytes: "${trimmed}"`);
	}

	return { id: parseHexId(idText), dlc: data.length, data };
}

// (1699999999.123456) can0 18FEF100#0102030405060708
const COMPACT_LINE = /^\((\d+(?:\.\d+)?)\)\s+(\S+)\s+(\S+#\S*)/;
// can0  18FEF100   [8]  01 02 03 04 05 06 07 08
const COLUMN_LINE =
	/^(?:\((\d+(?:\.\d+)?)\)\s+)?(\S+)\s+([0-9A-Fa-f]{1,8})\s+\[(\d)\]\s*((?:[0-9A-Fa-f]{2}\s*)*)$/;

/**
 * Parse one line of `candump` output.
 *
 * Accepts the log format written by `candump -l` and the default column
 * format, each with an optional leading timestamp.
 *
 * @returns The record, or `null` for blank lines, comments and anything else
 * that is not a classic data frame
 */
export function parseCandumpLine(line: string): CandumpRecord | null {
	const trimmed = line.trim();
	if (!trimmed || trimmed.startsWith("#")) return null;

	const compact = COMPACT_LINE.exec(trimmed);
	if (compact) {
		const [, ts, channel, frameText] = compact;
		if (ts === undefined || channel === undefined || frameText === undefined) {
			return null;
		}
		try {
			return {
				timestamp: Number.parseFloat(ts),
				channel,
				frame: parseFrameString(frameText),
			};
		} catch {
			return null;
		}
	}

	const column = COLUMN_LINE.exec(trimmed);
	if (column) {
		const [, ts, channel, idText, dlcText, dataText] = column;
		if (
			channel === undefined ||
			idText === undefined ||
			dlcText === undefined ||
			dataText === undefined
		) {
			return null;
		}
		const data = parseHexBytes(dataText);
		const dlc = Number.parseInt(dlcText, 10);
		if (data.length !== dlc) return null;
		const record: CandumpRecord = {
			channel,
			frame: { id: parseHexId(idText), dlc, data },
		};
		if (ts !== undefined) record.timestamp = Number.parseFloat(ts);
		return record;
	}

	return null;
}

/** Render bytes as uppercase hex pairs separated by `separator` */
export function formatHex(bytes: ArrayLike<number>, separator = " "): string {
	const parts: string[] = [];
	for (let i = 0; i < bytes.length; i++) {
		parts.push(((bytes[i] ?? 0) & 0xff).toString(16).toUpperCase().padStart(2, "0"));
	}
	return parts.join(separator);
}
