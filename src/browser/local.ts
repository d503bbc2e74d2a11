import { chromium } from 'playwright';
import type { Browser } from 'playwright';

import type { CapabilityDescriptor, SessionStatus } from '../schema/index.js';
import { describeCapability } from '../schema/index.js';
import { ProvisioningError, errorMessage } from '../core/errors.js';
import * as log from '../utils/logger.js';
import { DEFAULT_SESSION_TIMEOUTS, once, pageOperations } from './session.js';
import type { SessionHandle, SessionProvider, SessionTimeouts } from './session.js';

// ── Public types ─────────────────────────────────────────────

export interface LocalProviderConfig {
  headless: boolean;
  timeouts?: SessionTimeouts | undefined;
}

// ── Provider ─────────────────────────────────────────────────

/**
 * One fixed local Chromium, launched on first use and shared by every
 * session of this provider. Each session gets its own browser context, so
 * cookies and storage never leak between workers.
 */
export function createLocalProvider(config: LocalProviderConfig): SessionProvider {
  const timeouts = config.timeouts ?? DEFAULT_SESSION_TIMEOUTS;
  let launching: Promise<Browser> | undefined;

  function browser(): Promise<Browser> {
    launching ??= chromium.launch({ headless: config.headless });
    return launching;
  }

  return {
    async acquireSession(
      descriptor: CapabilityDescriptor,
      testName: string,
    ): Promise<SessionHandle> {
      const label = describeCapability(descriptor);

      try {
        const context = await (await browser()).newContext();
        const page = await context.newPage();
        log.session(label, `Local session opened for "${testName}"`);

        return {
          label,
          kind: 'local',
          ...pageOperations(page, timeouts),

          // No dashboard for local runs; the verdict only goes to the log.
          async reportStatus(status: SessionStatus, reason?: string): Promise<void> {
            log.detail(`[${label}] local status: ${status}${reason !== undefined ? ` (${reason})` : ''}`);
          },

          teardown: once(() => context.close()),
        };
      } catch (err) {
        throw new ProvisioningError(label, errorMessage(err), { cause: err });
      }
    },

    async releaseSession(handle: SessionHandle, _finalStatus: SessionStatus): Promise<void> {
      await handle.teardown();
    },

    async close(): Promise<void> {
      if (launching === undefined) return;
      const running = launching;
      launching = undefined;
      await (await running).close();
    },
  };
}
