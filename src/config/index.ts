export {
  DEFAULT_CONFIG,
  envLayer,
  type IngestConfig,
  IngestConfigSchema,
  loadConfig,
  mergeLayers,
} from "./config.js";
export { ConfigError, type ConfigErrorCode } from "./errors.js";
export { loadIdentifiers } from "./identifiers.js";
