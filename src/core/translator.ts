import type { TranslationResult } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import type { TranslationClient } from '../translate/client.js';
import { TranslationServiceError, errorMessage } from './errors.js';

// ── Translator ───────────────────────────────────────────────

/**
 * Translate titles one by one, keeping order and cardinality. Each item
 * gets one transparent retry; a second failure fails the whole batch and
 * no partial result is returned. An aborted `signal` stops before the next
 * request and rejects with its reason.
 */
export async function translate(
  client: TranslationClient,
  titles: readonly string[],
  sourceLang: string,
  targetLang: string,
  signal?: AbortSignal,
): Promise<TranslationResult> {
  const translations: string[] = [];

  for (const [index, title] of titles.entries()) {
    signal?.throwIfAborted();
    if (title.trim().length === 0) {
      translations.push('');
      continue;
    }
    translations.push(await translateItem(client, title, index, sourceLang, targetLang, signal));
  }

  return translations;
}

// ── Per-item call with retry ─────────────────────────────────

async function translateItem(
  client: TranslationClient,
  title: string,
  index: number,
  sourceLang: string,
  targetLang: string,
  signal: AbortSignal | undefined,
): Promise<string> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= LIMITS.MAX_TRANSLATION_RETRIES; attempt++) {
    signal?.throwIfAborted();
    try {
      const reply = await client.translateBatch([title], sourceLang, targetLang, { signal });
      return validateReply(reply, index);
    } catch (err) {
      lastError = err;
    }
  }

  throw new TranslationServiceError(
    `Translation failed for title ${String(index + 1)}: ${errorMessage(lastError)}`,
    index,
    { cause: lastError },
  );
}

function validateReply(reply: readonly string[], index: number): string {
  if (reply.length !== 1) {
    throw new TranslationServiceError(
      `Expected 1 translation, received ${String(reply.length)}`,
      index,
    );
  }

  const [translated] = reply;
  if (translated === undefined || translated.trim().length === 0) {
    throw new TranslationServiceError('Empty translation', index);
  }

  return translated.trim();
}
