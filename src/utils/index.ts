/**
 * Utility exports
 */

// Buffer utilities
export {
  toUint8Array,
  isBufferSource,
  concatUint8Arrays,
  bytesEqual,
  type BufferSource,
} from './buffer.js';

// Validation utilities
export {
  validateNonNegativeInteger,
  validateNonEmptyString,
  validateByteLength,
} from './validation.js';

// Logger
export {
  Logger,
  createLogger,
  setDebugMode,
  isDebugMode,
  setLogSink,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './logger.js';

// Type guards
export {
  isMetadataValue,
  isMetadataRecord,
  isEncodedVideoChunkLike,
  type EncodedVideoChunkLike,
} from './type-guards.js';

// Error utilities
export {
  notSupportedError,
  dataError,
  isSeiMetadataError,
  type SeiMetadataErrorName,
} from './errors.js';
