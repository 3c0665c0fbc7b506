/**
 * NAL unit framing: Annex B start codes vs. 4-byte length prefixes
 */

import type { Framing } from '../types/index.js';

export const START_CODE = new Uint8Array([0x00, 0x00, 0x00, 0x01]);

/** Size of the big-endian length field in length-prefixed (avcC) samples */
export const LENGTH_PREFIX_SIZE = 4;

export function readUint32BE(data: Uint8Array, offset: number): number {
  return (
    data[offset] * 0x1000000 +
    ((data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3])
  );
}

/**
 * Find the next Annex B start code at or after offset
 *
 * A zero byte before 00 00 01 is reported as part of a 4-byte start code.
 */
export function findStartCode(
  data: Uint8Array,
  offset: number
): { position: number; length: 3 | 4 } | null {
  for (let i = offset; i + 2 < data.length; i++) {
    if (data[i] !== 0 || data[i + 1] !== 0) continue;
    if (data[i + 2] === 1) {
      return { position: i, length: 3 };
    }
    if (data[i + 2] === 0 && i + 3 < data.length && data[i + 3] === 1) {
      return { position: i, length: 4 };
    }
  }
  return null;
}

/**
 * Decide how a buffer delimits its NAL units
 *
 * A buffer is length-prefixed when its first four bytes read as a length
 * strictly between 0 and the buffer size, and the chain of length records
 * covers the buffer exactly. Annex B data starting with 00 00 00 01 reads as
 * length 1, so the chain check is what keeps it from being misread.
 */
export function detectFraming(data: Uint8Array): Exclude<Framing, 'auto'> {
  if (data.length <= LENGTH_PREFIX_SIZE) {
    return 'annexb';
  }

  const first = readUint32BE(data, 0);
  if (first === 0 || first >= data.length) {
    return 'annexb';
  }

  let offset = 0;
  while (offset + LENGTH_PREFIX_SIZE <= data.length) {
    const length = readUint32BE(data, offset);
    if (length === 0 || offset + LENGTH_PREFIX_SIZE + length > data.length) {
      return 'annexb';
    }
    offset += LENGTH_PREFIX_SIZE + length;
  }

  return offset === data.length ? 'length-prefixed' : 'annexb';
}

/**
 * Frame a bare NAL unit (header byte first) for the given framing
 */
export function frameNalUnit(nal: Uint8Array, framing: Exclude<Framing, 'auto'>): Uint8Array {
  const prefixSize = framing === 'annexb' ? START_CODE.length : LENGTH_PREFIX_SIZE;
  const out = new Uint8Array(prefixSize + nal.length);

  if (framing === 'annexb') {
    out.set(START_CODE, 0);
  } else {
    new DataView(out.buffer).setUint32(0, nal.length, false);
  }
  out.set(nal, prefixSize);
  return out;
}
