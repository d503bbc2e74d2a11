/**
 * matrixprobe — run one scrape → translate → analyze pipeline across a
 * matrix of browser sessions and report a verdict per session.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './translate/index.js';
export * from './report/index.js';
export { loadConfigFile, parseConfig, loadRemoteCredentials, ConfigError } from './config/index.js';
export type { RemoteCredentials } from './config/index.js';
