/**
 * Configuration module exports
 */
export { getConfigDir, getRuntimeConfigPath } from './config-paths.js';
export { isDebugLoggingEnabled } from './debug-flags.js';
export {
  type MedAssistConfig,
  type MedAssistSecrets,
  ConfigValidationError,
  DEFAULT_RUNTIME_CONFIG,
  applyEnvironment,
  loadRuntimeConfig,
  normalizeConfig,
  resolveSecrets,
  validateConfigFile,
} from './runtime-config.js';
