import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { TranslationServiceError } from '../core/errors.js';
import type { TranslateRequestOptions, TranslationClient } from './client.js';

// ── Shared LLM plumbing ──────────────────────────────────────

export type GenerateFn = (
  systemPrompt: string,
  userPrompt: string,
  signal: AbortSignal | undefined,
) => Promise<string>;

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const translatedListSchema = z.array(z.string());

async function buildSystemPrompt(sourceLang: string, targetLang: string): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'translate.txt'), 'utf-8');

  return template
    .replaceAll('{{sourceLang}}', sourceLang)
    .replaceAll('{{targetLang}}', targetLang);
}

/**
 * Pull the first JSON array out of a model reply. Models sometimes wrap
 * the array in a code fence or a sentence.
 */
export function extractJSONArray(raw: string): string {
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start === -1 || end < start) return raw.trim();
  return raw.slice(start, end + 1);
}

export function parseTranslatedList(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSONArray(raw));
  } catch (err) {
    throw new TranslationServiceError('Model reply is not a JSON array', undefined, { cause: err });
  }

  const result = translatedListSchema.safeParse(parsed);
  if (!result.success) {
    throw new TranslationServiceError('Model reply is not a list of strings');
  }
  return result.data;
}

/** Adapt a plain text-generation call into a TranslationClient. */
export function createLLMTranslationClient(generate: GenerateFn): TranslationClient {
  return {
    async translateBatch(
      texts: readonly string[],
      sourceLang: string,
      targetLang: string,
      options: TranslateRequestOptions = {},
    ): Promise<string[]> {
      options.signal?.throwIfAborted();
      const systemPrompt = await buildSystemPrompt(sourceLang, targetLang);

      let reply: string;
      try {
        reply = await generate(systemPrompt, JSON.stringify(texts), options.signal);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new TranslationServiceError(`Translation model unreachable: ${message}`, undefined, { cause: err });
      }

      return parseTranslatedList(reply);
    },
  };
}
