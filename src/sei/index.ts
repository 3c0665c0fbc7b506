/**
 * SEI user_data_unregistered codec
 */

export {
  SEI_NAL_HEADER,
  PAYLOAD_TYPE_USER_DATA_UNREGISTERED,
  UUID_LENGTH,
  RBSP_TRAILING_BITS,
  encodeSeiSize,
  readSeiSize,
} from './payload-coding.js';

export {
  buildSeiRbsp,
  buildSeiNalUnit,
  buildMetadataSei,
  encodeMetadataRecord,
} from './builder.js';

export {
  parseSeiMessages,
  extractUserDataUnregistered,
  extractMetadata,
  decodeMetadataBody,
  type RawSeiMessage,
  type SeiMessage,
  type SeiParseResult,
} from './parser.js';

export { findInsertionPoint } from './insertion-point.js';

export { parseUuid, formatUuid, DEFAULT_METADATA_UUID } from './uuid.js';
