/**
 * Unified SEI metadata configuration
 *
 * Loads configuration from the JSON file named by SEI_METADATA_CONFIG, or from
 * sei-metadata.config.json in the working directory. All settings are
 * optional; omit them to use defaults.
 */

import fs from 'fs';
import path from 'path';
import type { SeiInjectorOptions } from '../injector/types.js';
import { DEFAULT_METADATA_UUID } from '../sei/uuid.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SeiConfig');

export const CONFIG_FILE_NAME = 'sei-metadata.config.json';

/**
 * Per-stream configuration overrides
 */
export interface StreamConfig {
  uuid?: string;
  injectEveryNFrames?: number;
  framing?: 'annexb' | 'length-prefixed';
  frameKey?: string;
}

/**
 * SEI metadata configuration options
 */
export interface SeiMetadataConfig extends StreamConfig {
  /** Per-stream overrides, keyed by stream name */
  streams?: Record<string, StreamConfig>;
}

const DEFAULT_CONFIG: SeiMetadataConfig = {};

let cachedConfig: SeiMetadataConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeStreamConfig(src: Record<string, unknown>): StreamConfig {
  const config: StreamConfig = {};

  if (typeof src.uuid === 'string' && src.uuid.length > 0) {
    config.uuid = src.uuid;
  }
  if (
    typeof src.injectEveryNFrames === 'number' &&
    Number.isInteger(src.injectEveryNFrames) &&
    src.injectEveryNFrames >= 0
  ) {
    config.injectEveryNFrames = src.injectEveryNFrames;
  }
  if (src.framing === 'annexb' || src.framing === 'length-prefixed') {
    config.framing = src.framing;
  }
  if (typeof src.frameKey === 'string' && src.frameKey.length > 0) {
    config.frameKey = src.frameKey;
  }

  return config;
}

/**
 * Validate and sanitize raw config object
 */
export function sanitizeConfig(raw: unknown): SeiMetadataConfig {
  if (!isRecord(raw)) {
    return DEFAULT_CONFIG;
  }

  const config: SeiMetadataConfig = sanitizeStreamConfig(raw);

  if (isRecord(raw.streams)) {
    config.streams = {};
    for (const [name, streamConfig] of Object.entries(raw.streams)) {
      if (isRecord(streamConfig)) {
        const parsed = sanitizeStreamConfig(streamConfig);
        if (Object.keys(parsed).length > 0) {
          config.streams[name] = parsed;
        }
      }
    }
  }

  return config;
}

function readConfigFile(configPath: string): SeiMetadataConfig {
  try {
    return sanitizeConfig(JSON.parse(fs.readFileSync(configPath, 'utf8')));
  } catch (err) {
    logger.warn(`Ignoring unreadable config file ${configPath}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return DEFAULT_CONFIG;
  }
}

/**
 * Load configuration from file
 */
export function loadConfig(): SeiMetadataConfig {
  if (process.env.SEI_METADATA_CONFIG) {
    const configPath = process.env.SEI_METADATA_CONFIG;
    if (fs.existsSync(configPath)) {
      return readConfigFile(configPath);
    }
    logger.warn(`SEI_METADATA_CONFIG points to a missing file: ${configPath}`);
    return DEFAULT_CONFIG;
  }

  const localConfigPath = path.join(process.cwd(), CONFIG_FILE_NAME);
  if (fs.existsSync(localConfigPath)) {
    return readConfigFile(localConfigPath);
  }

  return DEFAULT_CONFIG;
}

/**
 * Get the loaded configuration (cached)
 */
export function getConfig(): SeiMetadataConfig {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear cached config (for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Merge configuration and explicit options into injector options
 *
 * Explicit options win over per-stream settings, which win over global
 * settings. Without any uuid the "METADATA" tag is used.
 */
export function resolveInjectorOptions(
  overrides: Partial<SeiInjectorOptions> = {},
  streamName?: string
): SeiInjectorOptions {
  const config = getConfig();
  const stream = streamName ? config.streams?.[streamName] : undefined;

  const options: SeiInjectorOptions = {
    uuid: overrides.uuid ?? stream?.uuid ?? config.uuid ?? DEFAULT_METADATA_UUID,
  };

  const injectEveryNFrames =
    overrides.injectEveryNFrames ?? stream?.injectEveryNFrames ?? config.injectEveryNFrames;
  if (injectEveryNFrames !== undefined) {
    options.injectEveryNFrames = injectEveryNFrames;
  }

  const framing = overrides.framing ?? stream?.framing ?? config.framing;
  if (framing !== undefined) {
    options.framing = framing;
  }

  const frameKey = overrides.frameKey ?? stream?.frameKey ?? config.frameKey;
  if (frameKey !== undefined) {
    options.frameKey = frameKey;
  }

  return options;
}
