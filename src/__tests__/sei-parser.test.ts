/**
 * Tests for SEI metadata extraction
 */

import type { MetadataRecord } from '../types/index.js';
import { buildMetadataSei, buildSeiNalUnit, buildSeiRbsp } from '../sei/builder.js';
import {
  decodeMetadataBody,
  extractMetadata,
  extractUserDataUnregistered,
  parseSeiMessages,
} from '../sei/parser.js';
import { addEmulationPrevention } from '../bitstream/emulation-prevention.js';
import { parseUuid, formatUuid } from '../sei/uuid.js';
import { AUD, IDR_SLICE, bytes, concat, toLengthPrefixed } from './fixtures/access-units.js';

const UUID_A = parseUuid('METADATA');
const UUID_B = parseUuid('12345678-1234-1234-1234-1234567890ab');

function seiNal(rbsp: Uint8Array): Uint8Array {
  return concat(new Uint8Array([0x00, 0x00, 0x00, 0x01, 0x06]), addEmulationPrevention(rbsp));
}

describe('extractMetadata', () => {
  it.each<[string, MetadataRecord]>([
    ['flat', { user: 'a' }],
    ['mixed values', { user: 'vladi', note: 'sei', n: 42, ratio: 0.5, ok: true, none: null }],
    ['nested', { camera: { id: 7, tags: ['north', 'gate'] }, list: [1, [2, 3], { x: 'y' }] }],
    ['unicode', { name: 'Zoë', city: '東京', emoji: '🎥' }],
    ['empty', {}],
  ])('should round-trip %s metadata', (_label, record) => {
    expect(extractMetadata(buildMetadataSei(UUID_A, record), UUID_A)).toEqual([record]);
  });

  it('should round-trip bodies that need 0xFF size extension', () => {
    const record = { blob: 'x'.repeat(600) };
    expect(extractMetadata(buildMetadataSei(UUID_A, record), UUID_A)).toEqual([record]);
  });

  it('should preserve key order', () => {
    const [record] = extractMetadata(buildMetadataSei(UUID_A, { z: 1, a: 2, m: 3 }), UUID_A);
    expect(Object.keys(record)).toEqual(['z', 'a', 'm']);
  });

  it('should ignore messages with another UUID', () => {
    const buffer = concat(
      buildMetadataSei(UUID_A, { from: 'a' }),
      buildMetadataSei(UUID_B, { from: 'b' }),
      IDR_SLICE
    );

    expect(extractMetadata(buffer, UUID_A)).toEqual([{ from: 'a' }]);
    expect(extractMetadata(buffer, UUID_B)).toEqual([{ from: 'b' }]);
  });

  it('should find SEI among other NAL units', () => {
    const buffer = concat(AUD, buildMetadataSei(UUID_A, { user: 'a' }), IDR_SLICE);
    expect(extractMetadata(buffer, UUID_A)).toEqual([{ user: 'a' }]);
  });

  it('should read several messages from one SEI NAL unit', () => {
    const first = buildSeiRbsp(UUID_A, bytes('{"n":1}'));
    const second = buildSeiRbsp(UUID_A, bytes('{"n":2}'));
    const rbsp = concat(first.subarray(0, first.length - 1), second);

    expect(extractMetadata(seiNal(rbsp), UUID_A)).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should strip trailing 00/80 padding from the body', () => {
    const nal = buildSeiNalUnit(UUID_A, concat(bytes('{"a":1}'), new Uint8Array([0x00, 0x80, 0x00])));
    expect(extractMetadata(nal, UUID_A)).toEqual([{ a: 1 }]);
  });

  it('should skip bodies that are not valid JSON objects', () => {
    const buffer = concat(
      buildSeiNalUnit(UUID_A, bytes('{"broken":')),
      buildSeiNalUnit(UUID_A, new Uint8Array([0xc3, 0x28])),
      buildSeiNalUnit(UUID_A, bytes('[1,2,3]')),
      buildSeiNalUnit(UUID_A, bytes('"text"')),
      buildMetadataSei(UUID_A, { good: true })
    );

    expect(extractMetadata(buffer, UUID_A)).toEqual([{ good: true }]);
  });

  it('should abandon a SEI NAL unit whose size runs past its end and keep scanning', () => {
    const truncated = seiNal(concat(new Uint8Array([0x05, 0x40]), UUID_A, bytes('{"a":1}')));
    const buffer = concat(truncated, buildMetadataSei(UUID_A, { b: 2 }));

    expect(extractMetadata(buffer, UUID_A)).toEqual([{ b: 2 }]);
  });

  it('should ignore other SEI payload types', () => {
    // recovery_point (type 6) with a one-byte payload
    const nal = new Uint8Array([0x00, 0x00, 0x00, 0x01, 0x06, 0x06, 0x01, 0x84, 0x80]);
    expect(extractMetadata(nal, UUID_A)).toEqual([]);
  });

  it('should extract from length-prefixed access units', () => {
    const au = toLengthPrefixed(AUD, buildMetadataSei(UUID_A, { user: 'a' }), IDR_SLICE);

    expect(extractMetadata(au, UUID_A, 'length-prefixed')).toEqual([{ user: 'a' }]);
    expect(extractMetadata(au, UUID_A)).toEqual([{ user: 'a' }]);
  });

  it('should return nothing for garbage', () => {
    expect(extractMetadata(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]), UUID_A)).toEqual([]);
    expect(extractMetadata(new Uint8Array(0), UUID_A)).toEqual([]);
  });

  it('should reject a UUID that is not 16 bytes', () => {
    expect(() => extractMetadata(new Uint8Array(0), new Uint8Array(8))).toThrow(TypeError);
  });
});

describe('extractUserDataUnregistered', () => {
  it('should return every UUID with its raw body', () => {
    const buffer = concat(
      buildSeiNalUnit(UUID_A, bytes('one')),
      buildSeiNalUnit(UUID_B, bytes('two'))
    );

    const messages = extractUserDataUnregistered(buffer);
    expect(messages.map((m) => formatUuid(m.uuid))).toEqual([
      '4d455441-4441-5441-0000-000000000000',
      '12345678-1234-1234-1234-1234567890ab',
    ]);
    expect(messages.map((m) => Buffer.from(m.body).toString('utf8'))).toEqual(['one', 'two']);
    expect(messages.map((m) => m.payloadSize)).toEqual([19, 19]);
    expect(messages.every((m) => m.payloadType === 5)).toBe(true);
  });

  it('should skip user data shorter than a UUID', () => {
    const nal = seiNal(new Uint8Array([0x05, 0x03, 0x01, 0x02, 0x03, 0x80]));
    expect(extractUserDataUnregistered(nal)).toEqual([]);
  });
});

describe('parseSeiMessages', () => {
  it('should decode extended payload types and sizes', () => {
    const result = parseSeiMessages(new Uint8Array([0xff, 0x01, 0x02, 0xaa, 0xbb, 0x80]));

    expect(result.malformed).toBe(false);
    expect(result.messages).toHaveLength(1);
    expect(result.messages[0].payloadType).toBe(256);
    expect(result.messages[0].payloadSize).toBe(2);
    expect(Array.from(result.messages[0].payload)).toEqual([0xaa, 0xbb]);
  });

  it('should stop at the trailing bits and zero padding', () => {
    const result = parseSeiMessages(new Uint8Array([0x06, 0x01, 0x84, 0x80, 0x00, 0x00]));
    expect(result.malformed).toBe(false);
    expect(result.messages).toHaveLength(1);
  });

  it('should flag a payload that runs past the end', () => {
    const result = parseSeiMessages(new Uint8Array([0x06, 0x01, 0x84, 0x05, 0x20, 0x01]));
    expect(result.malformed).toBe(true);
    expect(result.messages).toHaveLength(1);
  });

  it('should flag a header cut off by the end of data', () => {
    expect(parseSeiMessages(new Uint8Array([0x05, 0xff])).malformed).toBe(true);
  });
});

describe('decodeMetadataBody', () => {
  it('should decode a padded JSON object', () => {
    expect(decodeMetadataBody(concat(bytes('{"k":"v"}'), new Uint8Array([0x80])))).toEqual({ k: 'v' });
  });

  it('should return null for an empty body', () => {
    expect(decodeMetadataBody(new Uint8Array([0x00, 0x80]))).toBeNull();
  });
});
