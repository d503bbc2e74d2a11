import type { Page } from 'playwright';

import type { CapabilityDescriptor, SessionStatus } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export type SessionKind = 'local' | 'remote';

/**
 * One live browser session, local or remote. The pipeline only talks to
 * this interface; Playwright stays behind it.
 */
export interface SessionHandle {
  readonly label: string;
  readonly kind: SessionKind;
  navigate(url: string): Promise<void>;
  /** Resolve once `selector` is attached, reject after the wait timeout. */
  waitFor(selector: string): Promise<void>;
  /** Inner text of every match, in document order. */
  extractText(selector: string): Promise<string[]>;
  /** One attribute of every match, in document order (`null` when absent). */
  extractAttribute(selector: string, name: string): Promise<(string | null)[]>;
  reportStatus(status: SessionStatus, reason?: string): Promise<void>;
  /** Release browser resources. Safe to call more than once. */
  teardown(): Promise<void>;
}

export interface SessionProvider {
  acquireSession(descriptor: CapabilityDescriptor, testName: string): Promise<SessionHandle>;
  releaseSession(handle: SessionHandle, finalStatus: SessionStatus): Promise<void>;
  /** Shut down anything the provider keeps across sessions. */
  close(): Promise<void>;
}

export interface SessionTimeouts {
  navigation: number;
  wait: number;
}

export const DEFAULT_SESSION_TIMEOUTS: SessionTimeouts = {
  navigation: TIMEOUTS.NAVIGATION_TIMEOUT,
  wait: TIMEOUTS.WAIT_TIMEOUT,
};

// ── Page-backed operations ───────────────────────────────────

export type PageOperations = Pick<
  SessionHandle,
  'navigate' | 'waitFor' | 'extractText' | 'extractAttribute'
>;

/** The Playwright half shared by the local and remote session variants. */
export function pageOperations(page: Page, timeouts: SessionTimeouts): PageOperations {
  return {
    async navigate(url: string): Promise<void> {
      const response = await page.goto(url, {
        timeout: timeouts.navigation,
        waitUntil: 'domcontentloaded',
      });
      if (response !== null && response.status() >= 400) {
        throw new Error(`HTTP ${String(response.status())}`);
      }
    },

    async waitFor(selector: string): Promise<void> {
      await page.locator(selector).first().waitFor({
        state: 'attached',
        timeout: timeouts.wait,
      });
    },

    async extractText(selector: string): Promise<string[]> {
      const texts = await page.locator(selector).allInnerTexts();
      return texts.map((text) => text.trim());
    },

    async extractAttribute(selector: string, name: string): Promise<(string | null)[]> {
      const locator = page.locator(selector);
      const total = await locator.count();
      const values: (string | null)[] = [];
      for (let i = 0; i < total; i++) {
        values.push(await locator.nth(i).getAttribute(name));
      }
      return values;
    },
  };
}

/** Run `close` at most once, sharing the first call's promise. */
export function once(close: () => Promise<void>): () => Promise<void> {
  let closing: Promise<void> | undefined;
  return () => {
    closing ??= close();
    return closing;
  };
}
