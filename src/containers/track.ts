/**
 * Opening the AVC video track of a container file with mediabunny
 */

import {
  ALL_FORMATS,
  BufferSource as MediaBufferSource,
  FilePathSource,
  Input,
  type InputVideoTrack,
} from 'mediabunny';
import type { Framing } from '../types/index.js';
import { isBufferSource } from '../utils/buffer.js';
import { dataError, notSupportedError } from '../utils/errors.js';
import { readNalLengthSize } from './avc-config.js';

/** A file path, or the file contents */
export type ContainerInput = string | Uint8Array;

export interface OpenedVideoTrack {
  track: InputVideoTrack;
  decoderConfig: Awaited<ReturnType<InputVideoTrack['getDecoderConfig']>>;
  /** How the track's packets delimit NAL units */
  framing: Exclude<Framing, 'auto'>;
}

/**
 * Open the primary video track, which must be H.264
 *
 * Packets from tracks with an avcC description are length-prefixed; only
 * 4-byte length fields are supported.
 */
export async function openAvcTrack(input: ContainerInput): Promise<OpenedVideoTrack> {
  // Paths are read on demand; bytes are used in place
  const source = typeof input === 'string' ? new FilePathSource(input) : new MediaBufferSource(input);
  const media = new Input({ formats: ALL_FORMATS, source });

  const track = await media.getPrimaryVideoTrack();
  if (!track) {
    throw dataError('Container has no video track');
  }
  if (track.codec !== 'avc') {
    throw notSupportedError(`Only AVC (H.264) video is supported, got ${track.codec ?? 'unknown'}`);
  }

  const decoderConfig = await track.getDecoderConfig();
  const description: unknown = decoderConfig?.description;

  let framing: Exclude<Framing, 'auto'> = 'annexb';
  if (isBufferSource(description)) {
    const lengthSize = readNalLengthSize(description);
    if (lengthSize !== 4) {
      throw notSupportedError(`Unsupported avcC NAL length size ${lengthSize}`);
    }
    framing = 'length-prefixed';
  }

  return { track, decoderConfig, framing };
}
