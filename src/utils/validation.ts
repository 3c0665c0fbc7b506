/**
 * Parameter validation helpers
 *
 * These throw TypeError, the way caller precondition violations are reported
 * at configuration time.
 */

export function validateNonNegativeInteger(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new TypeError(`${name} must be a non-negative integer`);
  }
  return value;
}

export function validateNonEmptyString(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new TypeError(`${name} must be a non-empty string`);
  }
  return value;
}

/**
 * Ensure a byte array has an exact length
 */
export function validateByteLength(value: Uint8Array, length: number, name: string): Uint8Array {
  if (value.byteLength !== length) {
    throw new TypeError(`${name} must be exactly ${length} bytes, got ${value.byteLength}`);
  }
  return value;
}
