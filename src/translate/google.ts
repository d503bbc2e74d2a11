import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import { TranslationServiceError } from '../core/errors.js';
import { deadlineSignal } from '../utils/deadline.js';
import type { TranslateRequestOptions, TranslationClient } from './client.js';

// ── Constants ────────────────────────────────────────────────

const TRANSLATE_URL = 'https://translate.googleapis.com/translate_a/single';

// ── Response validation ──────────────────────────────────────
// The public endpoint answers with nested arrays; the first element holds
// one [translated, original, ...] segment per sentence.

const segmentSchema = z.tuple([z.string()]).rest(z.unknown());

const translateResponseSchema = z
  .tuple([z.array(segmentSchema).nonempty()])
  .rest(z.unknown());

export function parseTranslateResponse(body: unknown): string {
  const result = translateResponseSchema.safeParse(body);
  if (!result.success) {
    throw new TranslationServiceError('Translation service returned a malformed response');
  }
  return result.data[0].map((segment) => segment[0]).join('');
}

// ── Provider factory ─────────────────────────────────────────

export function createGoogleClient(
  fetchImpl: typeof fetch = fetch,
): TranslationClient {
  async function translateOne(
    text: string,
    sourceLang: string,
    targetLang: string,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const params = new URLSearchParams({
      client: 'gtx',
      sl: sourceLang,
      tl: targetLang,
      dt: 't',
      q: text,
    });

    let response: Response;
    try {
      response = await fetchImpl(`${TRANSLATE_URL}?${params.toString()}`, {
        signal: deadlineSignal(signal, TIMEOUTS.TRANSLATION_TIMEOUT),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new TranslationServiceError(`Translation service unreachable: ${message}`, undefined, { cause: err });
    }

    if (!response.ok) {
      throw new TranslationServiceError(
        `Translation service error (${String(response.status)})`,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new TranslationServiceError('Translation service returned invalid JSON', undefined, { cause: err });
    }

    return parseTranslateResponse(body);
  }

  return {
    async translateBatch(
      texts: readonly string[],
      sourceLang: string,
      targetLang: string,
      options: TranslateRequestOptions = {},
    ): Promise<string[]> {
      const translations: string[] = [];
      for (const text of texts) {
        options.signal?.throwIfAborted();
        translations.push(await translateOne(text, sourceLang, targetLang, options.signal));
      }
      return translations;
    },
  };
}
