/**
 * MetadataCollector - receiver-side extraction with de-duplication
 *
 * Senders re-inject the same metadata on every key frame, so a receiver sees
 * each record many times. The collector reports a record only the first time
 * its content is seen, ignoring object key order.
 */

import { writeFile } from 'fs/promises';
import type { Framing, MetadataRecord, MetadataValue } from '../types/index.js';
import { extractMetadata } from '../sei/parser.js';
import { formatUuid, parseUuid } from '../sei/uuid.js';
import { createLogger } from '../utils/logger.js';
import { isEncodedVideoChunkLike, type EncodedVideoChunkLike } from '../utils/type-guards.js';
import { validateNonNegativeInteger } from '../utils/validation.js';
import { DEFAULT_FRAME_KEY } from './types.js';

const logger = createLogger('MetadataCollector');

export interface MetadataCollectorOptions {
  uuid: string | Uint8Array;
  /** Framing of pushed buffers; 'auto' guesses per buffer */
  framing?: Framing;
  /**
   * Key excluded when comparing records. Defaults to the injector's frame
   * key; pass null to compare whole records.
   */
  ignoreKey?: string | null;
  /**
   * Unique records kept in history; the oldest are evicted beyond this.
   * 0 keeps everything.
   */
  maxRecords?: number;
}

export const DEFAULT_MAX_RECORDS = 1000;

export interface MetadataCollectorStats {
  buffersProcessed: number;
  recordsFound: number;
  uniqueRecords: number;
}

/**
 * Serialize a value as JSON with object keys sorted at every level
 */
export function canonicalJson(value: MetadataValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export class MetadataCollector {
  private readonly uuid: Uint8Array;
  private readonly framing: Framing;
  private readonly ignoreKey: string | null;
  private readonly maxRecords: number;
  private readonly seen = new Set<string>();
  private readonly _records: MetadataRecord[] = [];
  // canonical identity of each entry in _records, same order
  private readonly identities: string[] = [];
  private uniqueRecords = 0;
  private _latest: MetadataRecord | null = null;
  private buffersProcessed = 0;
  private recordsFound = 0;

  constructor(options: MetadataCollectorOptions) {
    this.uuid = parseUuid(options.uuid);
    this.framing = options.framing ?? 'auto';
    this.ignoreKey = options.ignoreKey === undefined ? DEFAULT_FRAME_KEY : options.ignoreKey;
    this.maxRecords = validateNonNegativeInteger(
      options.maxRecords ?? DEFAULT_MAX_RECORDS,
      'maxRecords'
    );
  }

  /**
   * Extract records from one buffer or chunk; returns the ones not seen before
   */
  push(input: Uint8Array | EncodedVideoChunkLike): MetadataRecord[] {
    let data: Uint8Array;
    if (isEncodedVideoChunkLike(input)) {
      data = new Uint8Array(input.byteLength);
      input.copyTo(data);
    } else {
      data = input;
    }

    this.buffersProcessed++;
    const fresh: MetadataRecord[] = [];

    for (const record of extractMetadata(data, this.uuid, this.framing)) {
      this.recordsFound++;
      const key = canonicalJson(this.identityOf(record));
      if (this.seen.has(key)) continue;

      this.seen.add(key);
      this._records.push(record);
      this.identities.push(key);
      this.uniqueRecords++;
      this._latest = record;
      fresh.push(record);
      logger.debug(`New metadata record #${this.uniqueRecords}`, { record });
      this.evict();
    }

    return fresh;
  }

  get stats(): MetadataCollectorStats {
    return {
      buffersProcessed: this.buffersProcessed,
      recordsFound: this.recordsFound,
      uniqueRecords: this.uniqueRecords,
    };
  }

  /**
   * Most recently discovered unique record
   */
  get latest(): MetadataRecord | null {
    return this._latest;
  }

  /**
   * Unique records in the order they were first seen, at most maxRecords of
   * them. An evicted record is reported again if it reappears.
   */
  get records(): readonly MetadataRecord[] {
    return this._records;
  }

  /**
   * Write the latest record to a JSON file
   *
   * @returns false when nothing has been collected yet
   */
  async save(filePath: string): Promise<boolean> {
    if (!this._latest) {
      logger.warn(
        `No metadata for uuid ${formatUuid(this.uuid)} in ${this.buffersProcessed} buffers`
      );
      return false;
    }

    await writeFile(filePath, `${JSON.stringify(this._latest, null, 2)}\n`, 'utf8');
    logger.info(`Saved metadata to ${filePath}`, { ...this.stats });
    return true;
  }

  private evict(): void {
    if (this.maxRecords === 0) return;
    while (this._records.length > this.maxRecords) {
      this._records.shift();
      const identity = this.identities.shift();
      if (identity !== undefined) {
        this.seen.delete(identity);
      }
    }
  }

  private identityOf(record: MetadataRecord): MetadataRecord {
    if (this.ignoreKey === null || !(this.ignoreKey in record)) {
      return record;
    }
    const { [this.ignoreKey]: _ignored, ...rest } = record;
    return rest;
  }
}
