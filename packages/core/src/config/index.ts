/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  mergeConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  validateVersion,
  validateLogLevel,
  validateManifests,
} from './ConfigLoader.js';
export type { ReliquaryConfig } from './ConfigLoader.js';
