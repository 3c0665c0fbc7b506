/**
 * SeiInjector - splices metadata SEI messages into encoded access units
 *
 * Hold one injector per logical stream: the frame counter it keeps feeds the
 * frame index written into every record and the every-Nth-frame cadence.
 *
 * @example
 * ```typescript
 * const injector = new SeiInjector({ uuid: 'METADATA', injectEveryNFrames: 30 });
 *
 * encoder.output = (chunk) => {
 *   sink.write(injector.injectChunk(chunk, { camera: 'north-gate' }));
 * };
 * ```
 */

import type { MetadataRecord } from '../types/index.js';
import { EncodedVideoChunk } from '../core/EncodedVideoChunk.js';
import { collectNalUnits } from '../bitstream/nal-scanner.js';
import { buildMetadataSei } from '../sei/builder.js';
import { findInsertionPoint } from '../sei/insertion-point.js';
import { extractMetadata } from '../sei/parser.js';
import { parseUuid, formatUuid } from '../sei/uuid.js';
import { concatUint8Arrays } from '../utils/buffer.js';
import { createLogger } from '../utils/logger.js';
import type { EncodedVideoChunkLike } from '../utils/type-guards.js';
import { validateNonEmptyString, validateNonNegativeInteger } from '../utils/validation.js';
import { DEFAULT_FRAME_KEY, type SeiInjectorOptions } from './types.js';

const logger = createLogger('SeiInjector');

export class SeiInjector {
  private readonly _uuid: Uint8Array;
  private _frameIndex = 0;

  readonly injectEveryNFrames: number;
  readonly framing: 'annexb' | 'length-prefixed';
  readonly frameKey: string;

  constructor(options: SeiInjectorOptions) {
    this._uuid = parseUuid(options.uuid);
    this.injectEveryNFrames = validateNonNegativeInteger(
      options.injectEveryNFrames ?? 0,
      'injectEveryNFrames'
    );

    const framing: unknown = options.framing ?? 'annexb';
    if (framing !== 'annexb' && framing !== 'length-prefixed') {
      throw new TypeError("framing must be 'annexb' or 'length-prefixed'");
    }
    this.framing = framing;
    this.frameKey = validateNonEmptyString(options.frameKey ?? DEFAULT_FRAME_KEY, 'frameKey');

    logger.debug(`Created injector for uuid ${formatUuid(this._uuid)}`, {
      injectEveryNFrames: this.injectEveryNFrames,
      framing: this.framing,
    });
  }

  /**
   * Copy of the 16 UUID bytes this injector tags messages with
   */
  get uuid(): Uint8Array {
    return this._uuid.slice();
  }

  /**
   * Number of frames seen so far (the index written into the last record)
   */
  get frameIndex(): number {
    return this._frameIndex;
  }

  /**
   * Restart frame counting, e.g. when the host starts a new stream
   */
  reset(): void {
    this._frameIndex = 0;
  }

  /**
   * Inject metadata into one access unit
   *
   * Every call counts one frame. Frames that do not qualify (not a key frame,
   * and not on the every-N cadence) come back as the same Uint8Array.
   */
  inject(data: Uint8Array, isKeyFrame: boolean, metadata: MetadataRecord): Uint8Array {
    const frameIndex = this.advance(isKeyFrame);
    if (frameIndex === null) {
      return data;
    }
    return this.splice(data, metadata, frameIndex);
  }

  /**
   * Inject metadata into an encoded chunk
   *
   * The returned chunk keeps the type, timestamp and duration of the input.
   * A chunk that does not qualify is returned as is.
   */
  injectChunk<T extends EncodedVideoChunkLike>(
    chunk: T,
    metadata: MetadataRecord
  ): T | EncodedVideoChunk {
    const frameIndex = this.advance(chunk.type === 'key');
    if (frameIndex === null) {
      return chunk;
    }

    const data = new Uint8Array(chunk.byteLength);
    chunk.copyTo(data);

    return new EncodedVideoChunk({
      type: chunk.type,
      timestamp: chunk.timestamp,
      duration: chunk.duration,
      data: this.splice(data, metadata, frameIndex),
    });
  }

  /**
   * Extract records tagged with this injector's UUID
   */
  extract(data: Uint8Array): MetadataRecord[] {
    return extractMetadata(data, this._uuid, this.framing);
  }

  /**
   * Count one frame; returns its index when the frame gets metadata
   */
  private advance(isKeyFrame: boolean): number | null {
    this._frameIndex++;
    const frameIndex = this._frameIndex;

    if (isKeyFrame) return frameIndex;
    if (this.injectEveryNFrames > 0 && frameIndex % this.injectEveryNFrames === 0) {
      return frameIndex;
    }
    return null;
  }

  private splice(data: Uint8Array, metadata: MetadataRecord, frameIndex: number): Uint8Array {
    const record: MetadataRecord = { ...metadata, [this.frameKey]: frameIndex };
    const sei = buildMetadataSei(this._uuid, record, this.framing);
    const point = findInsertionPoint(collectNalUnits(data, this.framing));

    logger.debug(`Injecting ${sei.length}-byte SEI at offset ${point}`, { frame: frameIndex });

    return concatUint8Arrays([data.subarray(0, point), sei, data.subarray(point)]);
  }
}
