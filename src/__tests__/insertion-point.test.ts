/**
 * Tests for the SEI insertion-point policy
 */

import { collectNalUnits, type NalUnit } from '../bitstream/nal-scanner.js';
import { findInsertionPoint } from '../sei/insertion-point.js';
import { buildMetadataSei } from '../sei/builder.js';
import { parseUuid } from '../sei/uuid.js';
import { AUD, IDR_SLICE, NON_IDR_SLICE, PPS, SPS, concat, toLengthPrefixed } from './fixtures/access-units.js';

function unit(startOffset: number, endOffset: number, nalType: number): NalUnit {
  return { startOffset, payloadOffset: startOffset + 4, endOffset, startCodeLength: 4, nalType };
}

describe('findInsertionPoint', () => {
  it('should insert right before the IDR slice after AUD, SPS and PPS', () => {
    const au = concat(AUD, SPS, PPS, IDR_SLICE);
    expect(findInsertionPoint(collectNalUnits(au, 'annexb'))).toBe(24);
  });

  it('should insert at 0 when the access unit starts with a slice', () => {
    expect(findInsertionPoint(collectNalUnits(NON_IDR_SLICE, 'annexb'))).toBe(0);
  });

  it('should insert after existing SEI messages', () => {
    const sei = buildMetadataSei(parseUuid('OTHER'), { x: 1 });
    const au = concat(AUD, sei, IDR_SLICE);
    expect(findInsertionPoint(collectNalUnits(au, 'annexb'))).toBe(AUD.length + sei.length);
  });

  it('should insert after the last header unit when there is no slice', () => {
    const au = concat(AUD, SPS, PPS);
    expect(findInsertionPoint(collectNalUnits(au, 'annexb'))).toBe(au.length);
  });

  it('should not move past unrelated non-VCL units', () => {
    expect(findInsertionPoint([unit(0, 6, 9), unit(6, 12, 12)])).toBe(6);
    expect(findInsertionPoint([unit(0, 6, 9), unit(6, 12, 12), unit(12, 20, 1)])).toBe(12);
  });

  it('should insert at 0 for an empty access unit', () => {
    expect(findInsertionPoint([])).toBe(0);
    expect(findInsertionPoint(collectNalUnits(new Uint8Array([7, 7, 7]), 'annexb'))).toBe(0);
  });

  it('should work on length-prefixed access units', () => {
    const au = toLengthPrefixed(AUD, SPS, PPS, IDR_SLICE);
    // 6 + 10 + 8 bytes of headers, each with a 4-byte length in place of the start code
    expect(findInsertionPoint(collectNalUnits(au, 'length-prefixed'))).toBe(24);
  });
});
