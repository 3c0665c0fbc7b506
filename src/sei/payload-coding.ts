/**
 * SEI message header coding (H.264 section 7.3.2.3.1)
 *
 * payloadType and payloadSize are each written as a run of 0xFF bytes, one
 * per 255, followed by a final byte holding the remainder.
 */

export const SEI_NAL_HEADER = 0x06;
export const PAYLOAD_TYPE_USER_DATA_UNREGISTERED = 5;
export const UUID_LENGTH = 16;
export const RBSP_TRAILING_BITS = 0x80;

/**
 * Encode a payloadType or payloadSize value
 */
export function encodeSeiSize(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0) {
    throw new TypeError(`SEI size must be a non-negative integer, got ${value}`);
  }

  const out = new Uint8Array(Math.floor(value / 255) + 1);
  out.fill(0xff, 0, out.length - 1);
  out[out.length - 1] = value % 255;
  return out;
}

/**
 * Decode a payloadType or payloadSize value starting at offset
 *
 * Returns null when the value runs past the end of the data.
 */
export function readSeiSize(
  data: Uint8Array,
  offset: number
): { value: number; next: number } | null {
  let value = 0;
  let i = offset;
  while (i < data.length && data[i] === 0xff) {
    value += 255;
    i++;
  }
  if (i >= data.length) {
    return null;
  }
  value += data[i];
  return { value, next: i + 1 };
}
