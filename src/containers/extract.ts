/**
 * Metadata extraction from container files
 */

import { EncodedPacketSink } from 'mediabunny';
import type { MetadataRecord } from '../types/index.js';
import { extractMetadata } from '../sei/parser.js';
import { parseUuid } from '../sei/uuid.js';
import { openAvcTrack, type ContainerInput } from './track.js';

export interface ContainerExtractOptions {
  uuid: string | Uint8Array;
}

export interface PacketMetadata {
  /** Presentation timestamp in seconds */
  timestamp: number;
  type: 'key' | 'delta';
  records: MetadataRecord[];
}

/**
 * Extract metadata from every packet of the primary H.264 track
 *
 * Only packets carrying at least one matching record are yielded.
 *
 * @example
 * ```typescript
 * for await (const { timestamp, records } of extractContainerMetadata('tagged.mp4', { uuid: 'METADATA' })) {
 *   console.log(`${timestamp.toFixed(3)}s`, records);
 * }
 * ```
 */
export async function* extractContainerMetadata(
  input: ContainerInput,
  options: ContainerExtractOptions
): AsyncGenerator<PacketMetadata> {
  const uuid = parseUuid(options.uuid);
  const { track, framing } = await openAvcTrack(input);

  const sink = new EncodedPacketSink(track);
  for await (const packet of sink.packets()) {
    const records = extractMetadata(packet.data, uuid, framing);
    if (records.length > 0) {
      yield { timestamp: packet.timestamp, type: packet.type, records };
    }
  }
}
