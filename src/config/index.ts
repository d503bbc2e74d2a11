/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, LANGUAGES, DEFAULT_SELECTORS, BROWSERSTACK } from './defaults.js';
export { loadConfigFile, parseConfig } from './loader.js';
export { loadRemoteCredentials, ConfigError } from './env.js';
export type { RemoteCredentials } from './env.js';
