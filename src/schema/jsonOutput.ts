import { z } from 'zod';

import { pipelineStageSchema, sessionStatusSchema } from './outcome.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Session output ──────────────────────────────────────────

export const jsonOutputSessionSchema = z.object({
  label: z.string().min(1),
  browser: z.string().min(1),
  platform: z.string(),
  status: sessionStatusSchema,
  reason: z.string(),
  stage: pipelineStageSchema.nullable(),
  durationMs: z.number().int().nonnegative(),
  articles: z.array(
    z.object({
      url: z.string(),
      title: z.string(),
      translation: z.string(),
    }),
  ),
  frequencies: z.record(z.string(), z.number().int().positive()),
  reportError: z.string().nullable(),
});

export type JsonOutputSession = z.infer<typeof jsonOutputSessionSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  summary: sessionStatusSchema,
  runId: z.string().min(1),
  listingUrl: z.string().url(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  sessions: z.array(jsonOutputSessionSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
