import { z } from 'zod';

import { translationProviderSchema } from '../schema/config.js';

// ── TranslationClient interface ──────────────────────────────

export interface TranslateRequestOptions {
  /** Aborts the in-flight request when the owning session gives up. */
  signal?: AbortSignal | undefined;
}

/**
 * External translation capability. Returns one string per input, in input
 * order; anything else is treated as malformed by the Translator.
 */
export interface TranslationClient {
  translateBatch(
    texts: readonly string[],
    sourceLang: string,
    targetLang: string,
    options?: TranslateRequestOptions,
  ): Promise<string[]>;
}

// ── Config schema ────────────────────────────────────────────

export const translationClientConfigSchema = z.object({
  provider: translationProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type TranslationClientConfig = z.infer<typeof translationClientConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

export function loadTranslationConfig(
  provider: z.infer<typeof translationProviderSchema>,
  model?: string,
  env: NodeJS.ProcessEnv = process.env,
): TranslationClientConfig {
  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : provider === 'openai'
      ? env['OPENAI_API_KEY']
      : undefined;

  return translationClientConfigSchema.parse({
    provider,
    apiKey,
    model: model ?? env['MATRIXPROBE_MODEL'],
  });
}
