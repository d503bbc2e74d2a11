import { chromium, firefox, webkit } from 'playwright';
import type { Browser, BrowserType } from 'playwright';

import type { CapabilityDescriptor, SessionStatus } from '../schema/index.js';
import { describeCapability } from '../schema/index.js';
import type { RemoteCredentials } from '../config/env.js';
import { BROWSERSTACK, LIMITS, TIMEOUTS } from '../config/defaults.js';
import { ProvisioningError, errorMessage } from '../core/errors.js';
import * as log from '../utils/logger.js';
import { DEFAULT_SESSION_TIMEOUTS, once, pageOperations } from './session.js';
import type { SessionHandle, SessionProvider, SessionTimeouts } from './session.js';

// ── Public types ─────────────────────────────────────────────

export interface RemoteProviderConfig {
  credentials: RemoteCredentials;
  build?: string | undefined;
  endpoint?: string | undefined;
  connectTimeout?: number | undefined;
  timeouts?: SessionTimeouts | undefined;
}

export type RemoteCapabilities = Record<string, string | boolean>;

// ── Capability mapping ───────────────────────────────────────

interface EngineChoice {
  engine: BrowserType;
  browser: string;
}

function chooseEngine(descriptor: CapabilityDescriptor): EngineChoice {
  switch (descriptor.browser) {
    case 'chrome':
      return { engine: chromium, browser: 'chrome' };
    case 'edge':
      return { engine: chromium, browser: 'edge' };
    case 'firefox':
      return { engine: firefox, browser: 'playwright-firefox' };
    case 'safari':
      return { engine: webkit, browser: 'playwright-webkit' };
  }
}

/**
 * Translate a descriptor into the grid's capability object. Desktop entries
 * name an OS; device entries name the device and skip the OS pair.
 */
export function buildCapabilities(
  descriptor: CapabilityDescriptor,
  testName: string,
  config: Pick<RemoteProviderConfig, 'credentials' | 'build'>,
): RemoteCapabilities {
  const caps: RemoteCapabilities = {
    browser: chooseEngine(descriptor).browser,
    browser_version: descriptor.browserVersion ?? 'latest',
    name: testName,
    'browserstack.username': config.credentials.username,
    'browserstack.accessKey': config.credentials.accessKey,
  };

  if (config.build !== undefined) caps['build'] = config.build;

  if (descriptor.device !== undefined) {
    caps['deviceName'] = descriptor.device;
    if (descriptor.osVersion !== undefined) caps['osVersion'] = descriptor.osVersion;
    caps['realMobile'] = descriptor.realMobile ?? true;
  } else {
    if (descriptor.os !== undefined) caps['os'] = descriptor.os;
    if (descriptor.osVersion !== undefined) caps['os_version'] = descriptor.osVersion;
  }

  return caps;
}

export function connectUrl(endpoint: string, caps: RemoteCapabilities): string {
  return `${endpoint}?caps=${encodeURIComponent(JSON.stringify(caps))}`;
}

/**
 * The grid reads session verdicts from a specially formatted evaluate
 * argument. Reasons are capped to what the dashboard stores.
 */
export function statusCommand(status: SessionStatus, reason?: string): string {
  const payload = {
    action: 'setSessionStatus',
    arguments: {
      status,
      reason: (reason ?? '').slice(0, LIMITS.MAX_REASON_CHARS),
    },
  };
  return `browserstack_executor: ${JSON.stringify(payload)}`;
}

// ── Provider ─────────────────────────────────────────────────

export function createRemoteProvider(config: RemoteProviderConfig): SessionProvider {
  const timeouts = config.timeouts ?? DEFAULT_SESSION_TIMEOUTS;
  const endpoint = config.endpoint ?? BROWSERSTACK.ENDPOINT;

  return {
    async acquireSession(
      descriptor: CapabilityDescriptor,
      testName: string,
    ): Promise<SessionHandle> {
      const label = describeCapability(descriptor);
      const caps = buildCapabilities(descriptor, testName, config);

      let browser: Browser;
      try {
        browser = await chooseEngine(descriptor).engine.connect(connectUrl(endpoint, caps), {
          timeout: config.connectTimeout ?? TIMEOUTS.CONNECT_TIMEOUT,
        });
      } catch (err) {
        throw new ProvisioningError(label, errorMessage(err), { cause: err });
      }

      try {
        const context = await browser.newContext();
        const page = await context.newPage();
        log.session(label, `Remote session connected as "${testName}"`);

        return {
          label,
          kind: 'remote',
          ...pageOperations(page, timeouts),

          async reportStatus(status: SessionStatus, reason?: string): Promise<void> {
            await page.evaluate((_command: string) => {}, statusCommand(status, reason));
          },

          teardown: once(() => browser.close()),
        };
      } catch (err) {
        await browser.close();
        throw new ProvisioningError(label, errorMessage(err), { cause: err });
      }
    },

    async releaseSession(handle: SessionHandle, _finalStatus: SessionStatus): Promise<void> {
      await handle.teardown();
    },

    async close(): Promise<void> {
      // Remote sessions own their browsers; nothing is shared.
    },
  };
}
