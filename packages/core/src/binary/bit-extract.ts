/**
 * Bit-level extraction of SPN fields from a J1939 payload.
 *
 * The (up to) 8 payload bytes are packed into a single little-endian 64-bit
 * value: byte 0 holds bits 0-7, byte 7 holds bits 56-63. A field starting at
 * bit `s` with length `n` occupies bits `[s, s + n)` of that value.
 *
 * All arithmetic is done on `bigint`, so fields up to 64 bits wide keep every
 * bit.
 *
 * @module binary/bit-extract
 */

export const PAYLOAD_BITS = 64;
export const MAX_PAYLOAD_BYTES = 8;

const MASK_64 = (1n << 64n) - 1n;

/**
 * Pack payload bytes into a little-endian 64-bit value.
 *
 * Missing trailing bytes are treated as zero. Only the low 8 bits of each
 * element are used.
 *
 * @throws RangeError if more than 8 bytes are given
 *
 * @example
 * packPayload([0x01, 0x02]); // => 0x0201n
 */
export function packPayload(data: ArrayLike<number>): bigint {
	if (data.length > MAX_PAYLOAD_BYTES) {
		throw new RangeError(
			`payload cannot exceed ${MAX_PAYLOAD_BYTES} bytes, got ${data.length}`,
		);
	}

	let packed = 0n;
	for (let i = data.length - 1; i >= 0; i--) {
		const byte = (data[i] ?? 0) & 0xff;
		packed = (packed << 8n) | BigInt(byte);
	}
	return packed;
}

/**
 * Extract an unsigned field from a packed payload.
 *
 * The payload is a 64-bit value with nothing above bit 63. When
 * `startBit + bitLength` runs past bit 63, the missing high bits read as zero
 * and the result holds only the `64 - startBit` bits that exist.
 *
 * @param payload - Packed payload from {@link packPayload}
 * @param startBit - Zero-order start bit (0-63)
 * @param bitLength - Field width in bits (1-64)
 * @throws RangeError if `startBit` or `bitLength` is out of range
 *
 * @example
 * // Engine speed (SPN 190): 16 bits at bit 24, 0.125 rpm/bit
 * const payload = packPayload([0xff, 0xff, 0xff, 0x20, 0x1c, 0xff, 0xff, 0xff]);
 * extractSpnBits(payload, 24, 16); // => 0x1c20n (7200 => 900 rpm)
 */
export function extractSpnBits(
	payload: bigint,
	startBit: number,
	bitLength: number,
): bigint {
	if (!Number.isInteger(startBit) || startBit < 0 || startBit >= PAYLOAD_BITS) {
		throw new RangeError(`startBit must be 0-63, got ${startBit}`);
	}
	if (!Number.isInteger(bitLength) || bitLength < 1 || bitLength > PAYLOAD_BITS) {
		throw new RangeError(`bitLength must be 1-64, got ${bitLength}`);
	}

	const mask = (1n << BigInt(bitLength)) - 1n;
	return ((payload & MASK_64) >> BigInt(startBit)) & mask;
}

/**
 * Extract a field straight from payload bytes.
 *
 * @see extractSpnBits
 */
export function extractSpnBitsFromBytes(
	data: ArrayLike<number>,
	startBit: number,
	bitLength: number,
): bigint {
	return extractSpnBits(packPayload(data), startBit, bitLength);
}
