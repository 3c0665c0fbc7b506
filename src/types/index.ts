/**
 * Shared type definitions
 */

/**
 * A JSON value carried inside a metadata record
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | MetadataRecord;

/**
 * Application metadata embedded in an SEI message, serialized as a JSON object
 */
export interface MetadataRecord {
  [key: string]: MetadataValue;
}

/**
 * How NAL units are delimited inside a buffer
 *
 * - annexb: start codes (00 00 01 / 00 00 00 01)
 * - length-prefixed: 4-byte big-endian length before each NAL (avcC samples)
 * - auto: guess from the first four bytes, see detectFraming()
 */
export type Framing = 'annexb' | 'length-prefixed' | 'auto';
