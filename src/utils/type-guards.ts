/**
 * Type guards for checking object types at runtime
 */

import type { MetadataRecord, MetadataValue } from '../types/index.js';

/**
 * Interface for EncodedVideoChunk-like objects, including chunks produced by
 * other WebCodecs implementations
 */
export interface EncodedVideoChunkLike {
  type: 'key' | 'delta';
  timestamp: number;
  duration: number | null;
  byteLength: number;
  copyTo(destination: Uint8Array): void;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check if a value is representable as a metadata value (JSON-compatible)
 */
export function isMetadataValue(value: unknown): value is MetadataValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isMetadataValue);
      }
      return isMetadataRecord(value);
    default:
      return false;
  }
}

/**
 * Check if a value is a metadata record (a JSON object)
 */
export function isMetadataRecord(value: unknown): value is MetadataRecord {
  if (!isPlainObject(value)) return false;
  return Object.values(value).every(isMetadataValue);
}

/**
 * Check if an object looks like an EncodedVideoChunk
 */
export function isEncodedVideoChunkLike(value: unknown): value is EncodedVideoChunkLike {
  if (value === null || typeof value !== 'object') return false;
  if (!('type' in value && 'timestamp' in value && 'byteLength' in value && 'copyTo' in value)) {
    return false;
  }
  return (
    (value.type === 'key' || value.type === 'delta') &&
    typeof value.timestamp === 'number' &&
    typeof value.byteLength === 'number' &&
    typeof value.copyTo === 'function'
  );
}
