/**
 * Where a new SEI NAL unit may go inside an access unit
 */

import { H264NalType, isVclNalType, type NalUnit } from '../bitstream/nal-scanner.js';

const HEADER_NAL_TYPES: ReadonlySet<number> = new Set([
  H264NalType.AUD,
  H264NalType.SEI,
  H264NalType.SPS,
  H264NalType.PPS,
]);

/**
 * Find the byte offset at which to insert an SEI NAL unit
 *
 * The offset is the start of the first coded slice, which keeps the SEI
 * after the AUD and parameter sets and inside the same access unit. Without
 * a slice it falls after the last AUD/SEI/SPS/PPS unit, or at 0.
 */
export function findInsertionPoint(units: Iterable<NalUnit>): number {
  let candidate = 0;

  for (const unit of units) {
    if (isVclNalType(unit.nalType)) {
      return unit.startOffset;
    }
    if (HEADER_NAL_TYPES.has(unit.nalType)) {
      candidate = unit.endOffset;
    }
  }

  return candidate;
}
