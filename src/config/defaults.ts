/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  WAIT_TIMEOUT: 10_000,
  CONNECT_TIMEOUT: 60_000,
  SESSION_TIMEOUT: 120_000,
  REPORT_TIMEOUT: 10_000,
  TRANSLATION_TIMEOUT: 15_000,
} as const;

export const LIMITS = {
  ARTICLE_COUNT: 5,
  MIN_WORD_COUNT: 2,
  MAX_TRANSLATION_RETRIES: 1,
  MAX_REASON_CHARS: 255,
} as const;

export const LANGUAGES = {
  SOURCE: 'es',
  TARGET: 'en',
} as const;

export const DEFAULT_SELECTORS = {
  link: 'h2 a',
  title: 'h1',
  body: 'div.c-article-body p',
  image: 'figure img',
} as const;

export const BROWSERSTACK = {
  ENDPOINT: 'wss://cdp.browserstack.com/playwright',
} as const;
