/**
 * Configuration module.
 * Loads and validates runtime config from the config file, CLI flags and env.
 * Zod-validated; a bad config stops the run before the browser starts.
 */

export {
  TIMEOUTS,
  DELAYS,
  LIMITS,
  EXCLUSIONS,
  DISCOVERY,
  ERROR_CAPTURE,
  LOGIN,
  BROWSER,
  OUTPUT,
} from './defaults.js';
export {
  loadConfigFile,
  parseConfig,
  applyOverrides,
  applyEnvCredentials,
  ConfigError,
} from './loader.js';
export type { ConfigOverrides } from './loader.js';
