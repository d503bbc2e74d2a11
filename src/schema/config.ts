import { z } from 'zod';

import { DEFAULT_SELECTORS, LANGUAGES, LIMITS, TIMEOUTS } from '../config/defaults.js';
import { capabilityMatrixSchema } from './capability.js';

// ── Selectors ───────────────────────────────────────────────

export const selectorConfigSchema = z.object({
  link: z.string().min(1).default(DEFAULT_SELECTORS.link),
  title: z.string().min(1).default(DEFAULT_SELECTORS.title),
  body: z.string().min(1).default(DEFAULT_SELECTORS.body),
  image: z.string().min(1).default(DEFAULT_SELECTORS.image),
});

export type SelectorConfig = z.infer<typeof selectorConfigSchema>;

// ── Translation block ───────────────────────────────────────

export const translationProviderSchema = z.enum(['google', 'anthropic', 'openai', 'mock']);

export type TranslationProvider = z.infer<typeof translationProviderSchema>;

export const translationConfigSchema = z.object({
  provider: translationProviderSchema.default('google'),
  model: z.string().min(1).optional(),
});

// ── Analysis block ──────────────────────────────────────────

export const analysisConfigSchema = z.object({
  canonical: z.string().min(1).optional(),
});

// ── Full config file ────────────────────────────────────────

export const runModeSchema = z.enum(['local', 'remote']);

export type RunMode = z.infer<typeof runModeSchema>;

export const fileConfigSchema = z
  .object({
    listingUrl: z.string().url(),
    articleCount: z.number().int().positive().optional().default(LIMITS.ARTICLE_COUNT),
    minCount: z.number().int().positive().optional().default(LIMITS.MIN_WORD_COUNT),
    sourceLang: z.string().min(2).optional().default(LANGUAGES.SOURCE),
    targetLang: z.string().min(2).optional().default(LANGUAGES.TARGET),
    testName: z.string().min(1).optional().default('matrixprobe'),
    build: z.string().min(1).optional(),
    mode: runModeSchema.optional().default('local'),
    headless: z.boolean().optional().default(true),
    timeout: z.number().positive().optional().default(TIMEOUTS.SESSION_TIMEOUT / 1000),
    selectors: selectorConfigSchema.optional().default({}),
    translation: translationConfigSchema.optional().default({}),
    analysis: analysisConfigSchema.optional().default({}),
    matrix: capabilityMatrixSchema.optional(),
  })
  .superRefine((config, ctx) => {
    if (config.mode === 'remote' && config.matrix === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['matrix'],
        message: 'Remote mode needs a capability matrix',
      });
    }
  });

export type FileConfig = z.infer<typeof fileConfigSchema>;
