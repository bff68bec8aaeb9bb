/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  WORK_DIR,
  validateVersion,
  validatePatterns,
  validateConfig,
} from './ConfigLoader.js';
export type { FencelineConfig, DumpConfig } from './ConfigLoader.js';
