/**
 * user_data_unregistered UUID helpers
 *
 * Injector and extractor must agree on the exact 16 bytes, or extraction
 * silently finds nothing.
 */

import { UUID_LENGTH } from './payload-coding.js';
import { validateByteLength } from '../utils/validation.js';

const HYPHENATED_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const BARE_UUID = /^[0-9a-f]{32}$/i;
const ASCII_TAG = /^[\x20-\x7e]{1,16}$/;

/**
 * Parse a UUID given as an RFC 4122 string, an ASCII tag, or raw bytes
 *
 * ASCII tags shorter than 16 characters are padded with zero bytes, so
 * `parseUuid('METADATA')` yields `METADATA` followed by eight 0x00 bytes.
 */
export function parseUuid(input: string | Uint8Array): Uint8Array {
  if (typeof input !== 'string') {
    return validateByteLength(new Uint8Array(input), UUID_LENGTH, 'uuid');
  }

  if (HYPHENATED_UUID.test(input) || BARE_UUID.test(input)) {
    return new Uint8Array(Buffer.from(input.replace(/-/g, ''), 'hex'));
  }

  if (ASCII_TAG.test(input)) {
    const bytes = new Uint8Array(UUID_LENGTH);
    bytes.set(Buffer.from(input, 'latin1'));
    return bytes;
  }

  throw new TypeError(
    `uuid must be a UUID string, an ASCII tag of at most ${UUID_LENGTH} characters, or ${UUID_LENGTH} bytes`
  );
}

/**
 * Format 16 bytes as 8-4-4-4-12 lower-case hex
 */
export function formatUuid(bytes: Uint8Array): string {
  const hex = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
}

/** The ASCII tag "METADATA" padded with zero bytes */
export const DEFAULT_METADATA_UUID: Uint8Array = parseUuid('METADATA');
