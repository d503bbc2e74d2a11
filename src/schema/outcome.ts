import { z } from 'zod';

import { capabilityDescriptorSchema } from './capability.js';
import { articleSchema, translationResultSchema, wordFrequencyTableSchema } from './article.js';

// ── Status ──────────────────────────────────────────────────

export const sessionStatusSchema = z.enum(['passed', 'failed']);

export type SessionStatus = z.infer<typeof sessionStatusSchema>;

export const pipelineStageSchema = z.enum(['extraction', 'translation', 'analysis']);

export type PipelineStage = z.infer<typeof pipelineStageSchema>;

// ── SessionOutcome ──────────────────────────────────────────

export const sessionOutcomeSchema = z.object({
  descriptor: capabilityDescriptorSchema,
  label: z.string().min(1),
  testName: z.string().min(1),
  status: sessionStatusSchema,
  articles: z.array(articleSchema),
  translations: translationResultSchema,
  frequencies: wordFrequencyTableSchema,
  failureReason: z.string().min(1).optional(),
  failedStage: pipelineStageSchema.optional(),
  reportError: z.string().min(1).optional(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type SessionOutcome = z.infer<typeof sessionOutcomeSchema>;

export function parseSessionOutcome(data: unknown): SessionOutcome {
  return sessionOutcomeSchema.parse(data);
}
