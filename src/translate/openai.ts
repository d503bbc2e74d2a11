import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import { deadlineSignal } from '../utils/deadline.js';
import type { TranslationClient } from './client.js';
import { createLLMTranslationClient } from './llm.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'gpt-4o-mini';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
  fetchImpl: typeof fetch = fetch,
): TranslationClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  return createLLMTranslationClient(async (systemPrompt, userPrompt, signal) => {
    const response = await fetchImpl(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: resolvedModel,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0,
      }),
      signal: deadlineSignal(signal, TIMEOUTS.TRANSLATION_TIMEOUT),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OpenAI API error (${String(response.status)}): ${body}`);
    }

    const body: unknown = await response.json();
    const parsed = chatResponseSchema.parse(body);

    return parsed.choices[0].message.content;
  });
}
