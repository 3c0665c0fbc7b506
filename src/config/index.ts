export {
  CONFIG_FILE_NAME,
  clearConfigCache,
  getConfig,
  loadConfig,
  resolveInjectorOptions,
  sanitizeConfig,
  type SeiMetadataConfig,
  type StreamConfig,
} from './sei-config.js';
