import { describe, it, expect, vi } from 'vitest';

import {
  createLLMTranslationClient,
  extractJSONArray,
  parseTranslatedList,
} from '../../src/translate/llm.js';
import { createOpenAIClient } from '../../src/translate/openai.js';
import { createTranslationClient, loadTranslationConfig } from '../../src/translate/index.js';
import { TranslationServiceError } from '../../src/core/errors.js';

describe('extractJSONArray', () => {
  it('strips fences and chatter around the array', () => {
    expect(extractJSONArray('Sure!\n```json\n["a", "b"]\n```')).toBe('["a", "b"]');
  });

  it('returns the trimmed text when there is no array', () => {
    expect(extractJSONArray('  nothing here  ')).toBe('nothing here');
  });
});

describe('parseTranslatedList', () => {
  it('parses a list of strings', () => {
    expect(parseTranslatedList('["Hello", "World"]')).toEqual(['Hello', 'World']);
  });

  it('rejects non-string elements', () => {
    expect(() => parseTranslatedList('[1, 2]')).toThrow('Model reply is not a list of strings');
  });

  it('rejects non-JSON replies', () => {
    expect(() => parseTranslatedList('I cannot help with that')).toThrow(TranslationServiceError);
  });
});

describe('createLLMTranslationClient', () => {
  it('fills the language pair into the system prompt and sends the texts as JSON', async () => {
    const generate = vi.fn(async (_system: string, _user: string) => '["Hello"]');
    const client = createLLMTranslationClient(generate);

    await expect(client.translateBatch(['Hola'], 'es', 'en')).resolves.toEqual(['Hello']);

    const [system, user] = generate.mock.calls[0] ?? ['', ''];
    expect(system).toContain('from language "es" to language "en"');
    expect(system).not.toContain('{{');
    expect(user).toBe('["Hola"]');
  });

  it('wraps transport failures', async () => {
    const client = createLLMTranslationClient(async () => {
      throw new Error('overloaded');
    });

    await expect(client.translateBatch(['Hola'], 'es', 'en')).rejects.toMatchObject({
      name: 'TranslationServiceError',
      message: 'Translation model unreachable: overloaded',
    });
  });
});

describe('createOpenAIClient', () => {
  it('reads the first choice of a chat completion', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(JSON.stringify({ choices: [{ message: { content: '["Goodbye"]' } }] }), {
          status: 200,
        }),
    );
    const client = createOpenAIClient('test-key', undefined, fetchMock);

    await expect(client.translateBatch(['Adiós'], 'es', 'en')).resolves.toEqual(['Goodbye']);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
  });
});

describe('createTranslationClient', () => {
  it('requires an API key for LLM providers', () => {
    const config = loadTranslationConfig('anthropic', undefined, {});
    expect(() => createTranslationClient(config)).toThrow(
      'ANTHROPIC_API_KEY is required when using the anthropic translation provider',
    );
  });

  it('picks the key and model from the environment', () => {
    expect(
      loadTranslationConfig('openai', undefined, {
        OPENAI_API_KEY: 'test-key',
        MATRIXPROBE_MODEL: 'test-model',
      }),
    ).toEqual({ provider: 'openai', apiKey: 'test-key', model: 'test-model' });
  });

  it('builds the mock provider without credentials', async () => {
    const client = createTranslationClient(loadTranslationConfig('mock', undefined, {}));
    await expect(client.translateBatch(['Hola'], 'es', 'en')).resolves.toEqual(['Hola']);
  });
});
