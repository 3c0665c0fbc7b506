/**
 * Injector configuration types
 */

import type { Framing } from '../types/index.js';

export interface SeiInjectorOptions {
  /** 16 bytes, an RFC 4122 string, or an ASCII tag of up to 16 characters */
  uuid: string | Uint8Array;
  /** Also inject on every Nth frame; 0 means key frames only */
  injectEveryNFrames?: number;
  /** How the access units handed to inject() delimit their NAL units */
  framing?: Exclude<Framing, 'auto'>;
  /** Reserved metadata key that receives the running frame index */
  frameKey?: string;
}

export const DEFAULT_FRAME_KEY = 'frame';
