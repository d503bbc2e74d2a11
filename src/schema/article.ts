import { z } from 'zod';

// ── Article ─────────────────────────────────────────────────

export const articleSchema = z.object({
  url: z.string().url(),
  title: z.string().min(1),
  body: z.string(),
  imageUrl: z.string().optional(),
});

export type Article = z.infer<typeof articleSchema>;

// ── Translation ─────────────────────────────────────────────
// Index i of a TranslationResult belongs to the same article as index i
// of the Article list it was produced from.

export const translationResultSchema = z.array(z.string());

export type TranslationResult = z.infer<typeof translationResultSchema>;

// ── Word frequencies ────────────────────────────────────────

export const wordFrequencyTableSchema = z.record(
  z.string().min(1),
  z.number().int().positive(),
);

export type WordFrequencyTable = z.infer<typeof wordFrequencyTableSchema>;
