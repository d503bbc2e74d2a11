import type { TranslateRequestOptions, TranslationClient } from './client.js';

/**
 * Mock translation provider for dry runs and tests.
 * Looks each text up in `dictionary`, falling back to the text itself.
 */
export function createMockClient(
  dictionary: Readonly<Record<string, string>> = {},
): TranslationClient {
  return {
    async translateBatch(
      texts: readonly string[],
      _sourceLang: string,
      _targetLang: string,
      options: TranslateRequestOptions = {},
    ): Promise<string[]> {
      options.signal?.throwIfAborted();
      return texts.map((text) => dictionary[text] ?? text);
    },
  };
}
