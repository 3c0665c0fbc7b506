/**
 * Container handling module
 *
 * Tags the H.264 track of MP4, WebM or MKV files with metadata SEI messages
 * and reads it back, using mediabunny for demuxing and muxing.
 *
 * @example
 * ```typescript
 * import { tagContainer, extractContainerMetadata } from 'h264-sei-metadata/containers';
 *
 * const tagged = await tagContainer('input.mp4', { user: 'a' }, { uuid: 'METADATA' });
 *
 * for await (const packet of extractContainerMetadata(tagged, { uuid: 'METADATA' })) {
 *   console.log(packet.timestamp, packet.records);
 * }
 * ```
 */

export { tagContainer, type TagContainerOptions } from './tag.js';
export {
  extractContainerMetadata,
  type ContainerExtractOptions,
  type PacketMetadata,
} from './extract.js';
export { openAvcTrack, type ContainerInput, type OpenedVideoTrack } from './track.js';
export { readNalLengthSize } from './avc-config.js';
