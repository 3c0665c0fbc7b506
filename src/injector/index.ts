export { SeiInjector } from './SeiInjector.js';
export {
  MetadataCollector,
  canonicalJson,
  DEFAULT_MAX_RECORDS,
  type MetadataCollectorOptions,
  type MetadataCollectorStats,
} from './MetadataCollector.js';
export { DEFAULT_FRAME_KEY, type SeiInjectorOptions } from './types.js';
