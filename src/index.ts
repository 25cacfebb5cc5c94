/**
 * airgap-transfer
 * Move text files across an air gap as hash-verified, optionally encrypted
 * chunks sized for optical codes
 */

export * from './core/chunking/index.js';
export * from './core/integrity/index.js';
export * from './core/crypto/index.js';
export * from './core/codec/index.js';
export * from './core/encoding/index.js';
export * from './core/reassembly/index.js';
export * from './core/symbols/index.js';
export * from './core/orchestration/index.js';
export {
  ConfigSchema,
  defaultConfig,
  loadConfig,
  loadConfigFile,
  applyEnvOverrides,
  saveConfig,
  resetConfig,
  createSampleConfig,
  getDefaultConfigPath,
} from './config.js';
export type { TransferConfig, LoadConfigOptions } from './config.js';
export * from './utils/errors.js';
export { createLogger, silentLogger, setDebugMode, setQuietMode } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
