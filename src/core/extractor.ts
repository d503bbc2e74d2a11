import type { Article, SelectorConfig } from '../schema/index.js';
import { DEFAULT_SELECTORS, LIMITS } from '../config/defaults.js';
import type { SessionHandle } from '../browser/session.js';
import * as log from '../utils/logger.js';
import { ExtractionError, NavigationError, errorMessage } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ExtractOptions {
  selectors?: SelectorConfig | undefined;
  signal?: AbortSignal | undefined;
}

// ── Extractor ────────────────────────────────────────────────

/**
 * Open the listing, follow its first `count` links in document order and
 * read title, body and lead image of each article. Any article failure
 * aborts the whole extraction.
 */
export async function extract(
  session: SessionHandle,
  listingUrl: string,
  count: number = LIMITS.ARTICLE_COUNT,
  options: ExtractOptions = {},
): Promise<Article[]> {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`Article count must be a positive integer, got ${String(count)}`);
  }

  const selectors = options.selectors ?? DEFAULT_SELECTORS;
  const { signal } = options;

  signal?.throwIfAborted();
  await load(session, listingUrl);

  try {
    await session.waitFor(selectors.link);
  } catch (err) {
    throw new NavigationError(listingUrl, `listing links (${selectors.link}) did not render`, { cause: err });
  }

  const hrefs = await session.extractAttribute(selectors.link, 'href');
  const urls: string[] = [];
  for (const href of hrefs) {
    if (href === null || href.trim().length === 0) continue;
    const resolved = resolveUrl(href, listingUrl);
    if (resolved === undefined) {
      log.sessionWarn(session.label, `Skipping unparsable link ${href}`);
      continue;
    }
    urls.push(resolved);
    if (urls.length === count) break;
  }

  log.session(session.label, `Found ${String(urls.length)} article links`);

  const articles: Article[] = [];
  for (const [index, url] of urls.entries()) {
    signal?.throwIfAborted();
    log.session(session.label, `Scraping article ${String(index + 1)}/${String(urls.length)}`);
    articles.push(await readArticle(session, url, selectors));
  }

  return articles;
}

// ── Article page ─────────────────────────────────────────────

async function readArticle(
  session: SessionHandle,
  url: string,
  selectors: SelectorConfig,
): Promise<Article> {
  await load(session, url);

  await expectRegion(session, url, 'title', selectors.title);
  const title = (await session.extractText(selectors.title))[0] ?? '';
  if (title.length === 0) {
    throw new ExtractionError(url, 'title', 'title element is empty');
  }

  await expectRegion(session, url, 'body', selectors.body);
  const body = (await session.extractText(selectors.body))
    .filter((paragraph) => paragraph.length > 0)
    .join('\n');

  const article: Article = { url, title, body };

  // Images are informational; a missing one never fails the article.
  const [src] = await session.extractAttribute(selectors.image, 'src');
  const imageUrl = src ? resolveUrl(src, url) : undefined;
  if (imageUrl !== undefined) {
    article.imageUrl = imageUrl;
  } else if (src) {
    log.sessionWarn(session.label, `Ignoring unparsable image ${src} on ${url}`);
  } else {
    log.sessionWarn(session.label, `No image found on ${url}`);
  }

  return article;
}

// ── Helpers ──────────────────────────────────────────────────

function resolveUrl(href: string, base: string): string | undefined {
  const trimmed = href.trim();
  return URL.canParse(trimmed, base) ? new URL(trimmed, base).toString() : undefined;
}

async function load(session: SessionHandle, url: string): Promise<void> {
  try {
    await session.navigate(url);
  } catch (err) {
    throw new NavigationError(url, errorMessage(err), { cause: err });
  }
}

async function expectRegion(
  session: SessionHandle,
  url: string,
  region: string,
  selector: string,
): Promise<void> {
  try {
    await session.waitFor(selector);
  } catch (err) {
    throw new ExtractionError(url, region, `${selector} not found`, { cause: err });
  }
}
