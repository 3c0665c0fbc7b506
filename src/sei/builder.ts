/**
 * SEI NAL unit builder for user_data_unregistered messages
 *
 * Wire layout (Annex B):
 *   00 00 00 01 | 06 | EPB( 05 | size | uuid[16] | payload | 80 )
 */

import type { Framing, MetadataRecord } from '../types/index.js';
import { addEmulationPrevention } from '../bitstream/emulation-prevention.js';
import { frameNalUnit } from '../bitstream/framing.js';
import { validateByteLength } from '../utils/validation.js';
import {
  encodeSeiSize,
  PAYLOAD_TYPE_USER_DATA_UNREGISTERED,
  RBSP_TRAILING_BITS,
  SEI_NAL_HEADER,
  UUID_LENGTH,
} from './payload-coding.js';

const textEncoder = new TextEncoder();

/**
 * Build the SEI RBSP (before emulation prevention) for one message
 */
export function buildSeiRbsp(uuid: Uint8Array, userPayload: Uint8Array): Uint8Array {
  validateByteLength(uuid, UUID_LENGTH, 'uuid');

  const payloadType = encodeSeiSize(PAYLOAD_TYPE_USER_DATA_UNREGISTERED);
  const payloadSize = encodeSeiSize(UUID_LENGTH + userPayload.length);

  const rbsp = new Uint8Array(
    payloadType.length + payloadSize.length + UUID_LENGTH + userPayload.length + 1
  );
  let offset = 0;
  rbsp.set(payloadType, offset);
  offset += payloadType.length;
  rbsp.set(payloadSize, offset);
  offset += payloadSize.length;
  rbsp.set(uuid, offset);
  offset += UUID_LENGTH;
  rbsp.set(userPayload, offset);
  offset += userPayload.length;
  rbsp[offset] = RBSP_TRAILING_BITS;

  return rbsp;
}

/**
 * Build a complete SEI NAL unit, framed with a start code or a length prefix
 */
export function buildSeiNalUnit(
  uuid: Uint8Array,
  userPayload: Uint8Array,
  framing: Exclude<Framing, 'auto'> = 'annexb'
): Uint8Array {
  const escaped = addEmulationPrevention(buildSeiRbsp(uuid, userPayload));

  const nal = new Uint8Array(1 + escaped.length);
  nal[0] = SEI_NAL_HEADER;
  nal.set(escaped, 1);

  return frameNalUnit(nal, framing);
}

/**
 * Serialize a metadata record as compact UTF-8 JSON
 */
export function encodeMetadataRecord(record: MetadataRecord): Uint8Array {
  return textEncoder.encode(JSON.stringify(record));
}

/**
 * Build an SEI NAL unit carrying a metadata record
 */
export function buildMetadataSei(
  uuid: Uint8Array,
  record: MetadataRecord,
  framing: Exclude<Framing, 'auto'> = 'annexb'
): Uint8Array {
  return buildSeiNalUnit(uuid, encodeMetadataRecord(record), framing);
}
