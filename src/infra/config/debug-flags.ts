import { loadRuntimeConfig } from './runtime-config.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function isTruthy(value: string | undefined): boolean {
  return typeof value === 'string' && TRUE_VALUES.has(value.trim().toLowerCase());
}

/**
 * MEDASSIST_DEBUG wins over the config file when it is set at all.
 */
export function isDebugLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.MEDASSIST_DEBUG !== undefined) {
    return isTruthy(env.MEDASSIST_DEBUG);
  }

  return loadRuntimeConfig(env).debug.loggingEnabled;
}
