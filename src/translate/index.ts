/**
 * Translation capability module.
 * Provider-agnostic client interface consumed by the Translator.
 * Only module allowed to call a translation service.
 */

import type { TranslationClient, TranslationClientConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createGoogleClient } from './google.js';
import { createMockClient } from './mock.js';
import { createOpenAIClient } from './openai.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createGoogleClient, parseTranslateResponse } from './google.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export { createLLMTranslationClient, parseTranslatedList, extractJSONArray } from './llm.js';

// ── Provider factory ─────────────────────────────────────────

export function createTranslationClient(config: TranslationClientConfig): TranslationClient {
  switch (config.provider) {
    case 'google':
      return createGoogleClient();
    case 'anthropic': {
      if (!config.apiKey) {
        throw new Error(
          'ANTHROPIC_API_KEY is required when using the anthropic translation provider',
        );
      }
      return createAnthropicClient(config.apiKey, config.model);
    }
    case 'openai': {
      if (!config.apiKey) {
        throw new Error(
          'OPENAI_API_KEY is required when using the openai translation provider',
        );
      }
      return createOpenAIClient(config.apiKey, config.model);
    }
    case 'mock':
      return createMockClient();
  }
}
