import Anthropic from '@anthropic-ai/sdk';

import { TIMEOUTS } from '../config/defaults.js';
import { deadlineSignal } from '../utils/deadline.js';
import type { TranslationClient } from './client.js';
import { createLLMTranslationClient } from './llm.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';
const MAX_TOKENS = 2048;

// ── Provider factory ─────────────────────────────────────────
// Rate limits are left to the SDK's own retry handling; the Translator
// adds its single per-item retry on top.

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): TranslationClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  return createLLMTranslationClient(async (systemPrompt, userPrompt, signal) => {
    const response = await client.messages.create({
      model: resolvedModel,
      max_tokens: MAX_TOKENS,
      system: systemPrompt,
      messages: [{ role: 'user', content: userPrompt }],
      temperature: 0,
    }, { signal: deadlineSignal(signal, TIMEOUTS.TRANSLATION_TIMEOUT) });

    const firstBlock = response.content[0];
    if (!firstBlock || firstBlock.type !== 'text') {
      throw new Error('Anthropic API returned no text content');
    }

    return firstBlock.text;
  });
}
