/**
 * SEI parser for user_data_unregistered metadata
 *
 * Extraction runs over live, possibly lossy streams, so nothing here throws
 * on malformed input: broken NAL units, foreign UUIDs and undecodable bodies
 * are skipped.
 */

import type { Framing, MetadataRecord } from '../types/index.js';
import { H264NalType, scanNalUnits } from '../bitstream/nal-scanner.js';
import { removeEmulationPrevention } from '../bitstream/emulation-prevention.js';
import { bytesEqual } from '../utils/buffer.js';
import { createLogger } from '../utils/logger.js';
import { isMetadataRecord } from '../utils/type-guards.js';
import { validateByteLength } from '../utils/validation.js';
import {
  PAYLOAD_TYPE_USER_DATA_UNREGISTERED,
  RBSP_TRAILING_BITS,
  UUID_LENGTH,
  readSeiSize,
} from './payload-coding.js';

const logger = createLogger('SeiParser');

/**
 * One sei_message() of any payload type
 */
export interface RawSeiMessage {
  payloadType: number;
  payloadSize: number;
  payload: Uint8Array;
}

/**
 * A user_data_unregistered message split into UUID and body
 */
export interface SeiMessage {
  payloadType: number;
  payloadSize: number;
  uuid: Uint8Array;
  body: Uint8Array;
}

export interface SeiParseResult {
  messages: RawSeiMessage[];
  /** True when a header or payload ran past the end of the RBSP */
  malformed: boolean;
}

/**
 * Check whether anything other than rbsp_trailing_bits (and zero padding)
 * remains from offset on
 */
function moreRbspData(rbsp: Uint8Array, offset: number): boolean {
  let end = rbsp.length;
  while (end > offset && rbsp[end - 1] === 0x00) {
    end--;
  }
  if (end === offset) return false;
  return !(end - offset === 1 && rbsp[offset] === RBSP_TRAILING_BITS);
}

/**
 * Split an SEI RBSP (emulation prevention already removed, NAL header
 * excluded) into its messages
 */
export function parseSeiMessages(rbsp: Uint8Array): SeiParseResult {
  const messages: RawSeiMessage[] = [];
  let offset = 0;

  while (moreRbspData(rbsp, offset)) {
    const type = readSeiSize(rbsp, offset);
    if (!type) return { messages, malformed: true };

    const size = readSeiSize(rbsp, type.next);
    if (!size) return { messages, malformed: true };

    const end = size.next + size.value;
    if (end > rbsp.length) return { messages, malformed: true };

    messages.push({
      payloadType: type.value,
      payloadSize: size.value,
      payload: rbsp.subarray(size.next, end),
    });
    offset = end;
  }

  return { messages, malformed: false };
}

/**
 * Collect every user_data_unregistered message in a buffer, whatever its UUID
 */
export function extractUserDataUnregistered(
  data: Uint8Array,
  framing: Framing = 'auto'
): SeiMessage[] {
  const found: SeiMessage[] = [];

  for (const unit of scanNalUnits(data, framing)) {
    if (unit.nalType !== H264NalType.SEI) continue;

    const rbsp = removeEmulationPrevention(data.subarray(unit.payloadOffset + 1, unit.endOffset));
    const { messages, malformed } = parseSeiMessages(rbsp);
    if (malformed) {
      logger.debug('Abandoning malformed SEI NAL unit', { offset: unit.startOffset });
    }

    for (const message of messages) {
      if (message.payloadType !== PAYLOAD_TYPE_USER_DATA_UNREGISTERED) continue;
      if (message.payload.length < UUID_LENGTH) continue;
      found.push({
        payloadType: message.payloadType,
        payloadSize: message.payloadSize,
        uuid: message.payload.subarray(0, UUID_LENGTH),
        body: message.payload.subarray(UUID_LENGTH),
      });
    }
  }

  return found;
}

/**
 * Decode a message body (after the UUID) into a metadata record
 *
 * Trailing 0x00 / 0x80 bytes are stripped before decoding. Returns null for
 * invalid UTF-8, invalid JSON, or JSON that is not an object.
 */
export function decodeMetadataBody(body: Uint8Array): MetadataRecord | null {
  let end = body.length;
  while (end > 0 && (body[end - 1] === 0x00 || body[end - 1] === RBSP_TRAILING_BITS)) {
    end--;
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(body.subarray(0, end));
  } catch (err) {
    logger.debug('Dropping SEI body with invalid UTF-8', { error: String(err) });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    logger.debug('Dropping SEI body with invalid JSON', { error: String(err) });
    return null;
  }

  if (!isMetadataRecord(parsed)) {
    logger.debug('Dropping SEI body that is not a JSON object');
    return null;
  }
  return parsed;
}

/**
 * Extract every metadata record tagged with wantUuid from a buffer
 */
export function extractMetadata(
  data: Uint8Array,
  wantUuid: Uint8Array,
  framing: Framing = 'auto'
): MetadataRecord[] {
  validateByteLength(wantUuid, UUID_LENGTH, 'uuid');

  const records: MetadataRecord[] = [];
  for (const message of extractUserDataUnregistered(data, framing)) {
    if (!bytesEqual(message.uuid, wantUuid)) continue;

    const record = decodeMetadataBody(message.body);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
