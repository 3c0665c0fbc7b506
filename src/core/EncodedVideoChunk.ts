/**
 * EncodedVideoChunk - One encoded access unit as a media host hands it over
 * https://developer.mozilla.org/en-US/docs/Web/API/EncodedVideoChunk
 *
 * Mirrors the WebCodecs shape so chunks from a WebCodecs encoder can be
 * tagged and handed back with their timing untouched.
 */

import { toUint8Array, type BufferSource } from '../utils/buffer.js';

export type EncodedVideoChunkType = 'key' | 'delta';

export interface EncodedVideoChunkInit {
  type: EncodedVideoChunkType;
  timestamp: number;
  duration?: number | null;
  data: BufferSource;
}

export class EncodedVideoChunk {
  private readonly _data: Uint8Array;

  readonly type: EncodedVideoChunkType;
  readonly timestamp: number;
  readonly duration: number | null;
  readonly byteLength: number;

  constructor(init: EncodedVideoChunkInit) {
    if (init.type !== 'key' && init.type !== 'delta') {
      throw new TypeError("type must be 'key' or 'delta'");
    }
    if (typeof init.timestamp !== 'number' || !Number.isFinite(init.timestamp)) {
      throw new TypeError('timestamp must be a finite number');
    }
    if (!init.data) {
      throw new TypeError('data is required');
    }
    if (init.duration !== undefined && init.duration !== null) {
      if (typeof init.duration !== 'number' || !Number.isFinite(init.duration) || init.duration < 0) {
        throw new TypeError('duration must be a non-negative finite number');
      }
    }

    this.type = init.type;
    this.timestamp = init.timestamp;
    this.duration = init.duration ?? null;

    // Chunks own their bytes; later writes to the caller's buffer must not leak in
    this._data = toUint8Array(init.data).slice();
    this.byteLength = this._data.byteLength;
  }

  copyTo(destination: BufferSource): void {
    const destArray = toUint8Array(destination);

    if (destArray.byteLength < this._data.byteLength) {
      throw new TypeError('destination buffer is too small');
    }

    destArray.set(this._data);
  }
}
