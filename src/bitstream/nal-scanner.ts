/**
 * H.264 NAL unit scanner
 *
 * Walks a buffer lazily and yields views describing each NAL unit. Views hold
 * offsets only; they stay valid as long as the scanned buffer is not mutated.
 */

import type { Framing } from '../types/index.js';
import { detectFraming, findStartCode, readUint32BE, LENGTH_PREFIX_SIZE } from './framing.js';

/**
 * NAL unit types for H.264
 */
export const H264NalType = {
  SLICE: 1,            // Non-IDR slice
  SLICE_DATA_A: 2,     // Slice data partition A
  SLICE_DATA_B: 3,     // Slice data partition B
  SLICE_DATA_C: 4,     // Slice data partition C
  IDR: 5,              // IDR slice (keyframe)
  SEI: 6,              // Supplemental Enhancement Information
  SPS: 7,              // Sequence Parameter Set
  PPS: 8,              // Picture Parameter Set
  AUD: 9,              // Access Unit Delimiter
  END_OF_SEQUENCE: 10,
  END_OF_STREAM: 11,
  FILLER: 12,
} as const;

/**
 * A NAL unit located inside a buffer
 *
 * startOffset < payloadOffset <= endOffset. payloadOffset points at the
 * one-byte NAL header; endOffset is exclusive.
 */
export interface NalUnit {
  readonly startOffset: number;
  readonly payloadOffset: number;
  readonly endOffset: number;
  /** Start code size, or the length field size for length-prefixed data */
  readonly startCodeLength: 3 | 4;
  readonly nalType: number;
}

/**
 * Coded slice (VCL) NAL types
 */
export function isVclNalType(nalType: number): boolean {
  return nalType >= H264NalType.SLICE && nalType <= H264NalType.IDR;
}

/**
 * Lazy iterator over the NAL units of one buffer
 *
 * Stops at the first truncated unit and never throws. Once exhausted it stays
 * exhausted; scan the buffer again to start over.
 */
export class NalUnitScanner implements IterableIterator<NalUnit> {
  private readonly data: Uint8Array;
  private cursor = 0;
  private nextStartCode: { position: number; length: 3 | 4 } | null = null;
  private _exhausted = false;

  readonly framing: Exclude<Framing, 'auto'>;

  constructor(data: Uint8Array, framing: Exclude<Framing, 'auto'>) {
    this.data = data;
    this.framing = framing;
    if (framing === 'annexb') {
      this.nextStartCode = findStartCode(data, 0);
    }
  }

  get exhausted(): boolean {
    return this._exhausted;
  }

  next(): IteratorResult<NalUnit> {
    if (this._exhausted) {
      return { done: true, value: undefined };
    }

    const unit = this.framing === 'annexb' ? this.nextAnnexB() : this.nextLengthPrefixed();
    if (!unit) {
      this._exhausted = true;
      return { done: true, value: undefined };
    }
    return { done: false, value: unit };
  }

  [Symbol.iterator](): IterableIterator<NalUnit> {
    return this;
  }

  private nextAnnexB(): NalUnit | null {
    const startCode = this.nextStartCode;
    if (!startCode) return null;

    const payloadOffset = startCode.position + startCode.length;
    if (payloadOffset >= this.data.length) {
      // Start code with no header byte after it
      return null;
    }

    const following = findStartCode(this.data, payloadOffset + 1);
    this.nextStartCode = following;

    return {
      startOffset: startCode.position,
      payloadOffset,
      endOffset: following ? following.position : this.data.length,
      startCodeLength: startCode.length,
      nalType: this.data[payloadOffset] & 0x1f,
    };
  }

  private nextLengthPrefixed(): NalUnit | null {
    const start = this.cursor;
    if (start + LENGTH_PREFIX_SIZE > this.data.length) return null;

    const length = readUint32BE(this.data, start);
    const payloadOffset = start + LENGTH_PREFIX_SIZE;
    if (length === 0 || payloadOffset + length > this.data.length) {
      return null;
    }

    this.cursor = payloadOffset + length;
    return {
      startOffset: start,
      payloadOffset,
      endOffset: this.cursor,
      startCodeLength: LENGTH_PREFIX_SIZE,
      nalType: this.data[payloadOffset] & 0x1f,
    };
  }
}

/**
 * Start scanning a buffer for NAL units
 *
 * With framing 'auto' the framing is guessed by detectFraming(); hosts that
 * know how their data is delimited should say so.
 */
export function scanNalUnits(data: Uint8Array, framing: Framing = 'auto'): NalUnitScanner {
  const resolved = framing === 'auto' ? detectFraming(data) : framing;
  return new NalUnitScanner(data, resolved);
}

/**
 * Scan a whole access unit into an array of NAL unit views
 */
export function collectNalUnits(data: Uint8Array, framing: Framing = 'auto'): NalUnit[] {
  return Array.from(scanNalUnits(data, framing));
}
