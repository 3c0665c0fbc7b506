/**
 * h264-sei-metadata
 *
 * Embeds JSON metadata in H.264 bitstreams as SEI user_data_unregistered
 * messages and recovers it on the receiving side.
 *
 * @example
 * ```typescript
 * import { SeiInjector, MetadataCollector } from 'h264-sei-metadata';
 *
 * const injector = new SeiInjector({ uuid: 'METADATA' });
 * const tagged = injector.inject(accessUnit, true, { user: 'a' });
 *
 * const collector = new MetadataCollector({ uuid: 'METADATA', ignoreKey: 'frame' });
 * collector.push(tagged); // [{ user: 'a', frame: 1 }]
 * ```
 */

export type { MetadataRecord, MetadataValue, Framing } from './types/index.js';

export { EncodedVideoChunk } from './core/EncodedVideoChunk.js';
export type { EncodedVideoChunkInit, EncodedVideoChunkType } from './core/EncodedVideoChunk.js';

export * from './bitstream/index.js';
export * from './sei/index.js';
export * from './injector/index.js';
export * from './config/index.js';
export * from './utils/index.js';
