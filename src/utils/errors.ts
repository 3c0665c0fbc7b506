/**
 * Standardized error utilities
 *
 * Per-frame codec paths never throw on malformed input. Errors surface only
 * from configuration and container I/O, using DOMException names:
 * - NotSupportedError: unsupported codec or NAL length size in a container
 * - DataError: container has no usable video track
 * - TypeError: invalid parameters (thrown directly, not via these helpers)
 */

/**
 * Error names raised by this library
 */
export type SeiMetadataErrorName =
  | 'NotSupportedError'
  | 'DataError';

/**
 * Create a NotSupportedError (e.g., non-AVC video track)
 */
export function notSupportedError(message: string): DOMException {
  return new DOMException(message, 'NotSupportedError');
}

/**
 * Create a DataError (e.g., no video track in a container)
 */
export function dataError(message: string): DOMException {
  return new DOMException(message, 'DataError');
}

/**
 * Check if an error is a specific library error type
 */
export function isSeiMetadataError(error: unknown, name: SeiMetadataErrorName): boolean {
  return error instanceof DOMException && error.name === name;
}
