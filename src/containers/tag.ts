/**
 * Rewriting a container's H.264 track with metadata SEI messages
 */

import {
  BufferTarget,
  EncodedPacket,
  EncodedPacketSink,
  EncodedVideoPacketSource,
  Mp4OutputFormat,
  Output,
} from 'mediabunny';
import type { MetadataRecord } from '../types/index.js';
import { SeiInjector } from '../injector/SeiInjector.js';
import type { SeiInjectorOptions } from '../injector/types.js';
import { dataError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { openAvcTrack, type ContainerInput } from './track.js';

const logger = createLogger('TagContainer');

export type TagContainerOptions = Omit<SeiInjectorOptions, 'framing'>;

/**
 * Inject metadata into the primary H.264 track and write it out as MP4
 *
 * Packets are copied without re-encoding. Only the video track is written.
 *
 * @example
 * ```typescript
 * const tagged = await tagContainer('input.mp4', { user: 'a' }, { uuid: 'METADATA' });
 * await fs.promises.writeFile('tagged.mp4', tagged);
 * ```
 */
export async function tagContainer(
  input: ContainerInput,
  metadata: MetadataRecord,
  options: TagContainerOptions
): Promise<Uint8Array> {
  const { track, decoderConfig, framing } = await openAvcTrack(input);
  if (!decoderConfig) {
    throw dataError('Video track has no decoder configuration');
  }

  const injector = new SeiInjector({ ...options, framing });

  const target = new BufferTarget();
  const output = new Output({ format: new Mp4OutputFormat(), target });
  const source = new EncodedVideoPacketSource('avc');
  output.addVideoTrack(source);
  await output.start();

  let packets = 0;
  let tagged = 0;
  const sink = new EncodedPacketSink(track);
  for await (const packet of sink.packets()) {
    const data = injector.inject(packet.data, packet.type === 'key', metadata);
    const outPacket = data === packet.data
      ? packet
      : new EncodedPacket(data, packet.type, packet.timestamp, packet.duration);

    await source.add(outPacket, packets === 0 ? { decoderConfig } : undefined);
    packets++;
    if (outPacket !== packet) tagged++;
  }

  await output.finalize();

  if (!target.buffer) {
    throw dataError('Muxer produced no output');
  }

  logger.info(`Tagged ${tagged} of ${packets} packets`);
  return new Uint8Array(target.buffer);
}
