/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated; a missing config file means all defaults.
 */

export { TIMEOUTS, LIMITS, RISK_THRESHOLDS } from './defaults.js';
export {
  loadConfigFile,
  loadConfigOrDefaults,
  parseConfigText,
  parseDocument,
  loadTaskFile,
  ConfigError,
} from './loader.js';
export { loadEnvConfig } from './env.js';
export type { DocumentFormat } from './loader.js';
export type { EnvConfig } from './env.js';
