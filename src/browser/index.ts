/**
 * Browser session module.
 * One polymorphic session handle over Playwright, with a local variant
 * (shared Chromium, one context per session) and a remote grid variant.
 */

export { pageOperations, once, DEFAULT_SESSION_TIMEOUTS } from './session.js';
export type {
  SessionHandle,
  SessionProvider,
  SessionKind,
  SessionTimeouts,
  PageOperations,
} from './session.js';
export { createLocalProvider } from './local.js';
export type { LocalProviderConfig } from './local.js';
export {
  createRemoteProvider,
  buildCapabilities,
  connectUrl,
  statusCommand,
} from './remote.js';
export type { RemoteProviderConfig, RemoteCapabilities } from './remote.js';
