import type {
  Article,
  PipelineStage,
  SelectorConfig,
  TranslationResult,
  WordFrequencyTable,
} from '../schema/index.js';
import { LANGUAGES, LIMITS } from '../config/defaults.js';
import type { SessionHandle } from '../browser/session.js';
import type { TranslationClient } from '../translate/client.js';
import * as log from '../utils/logger.js';
import { PipelineError } from './errors.js';
import { extract } from './extractor.js';
import { analyze, repeatedWords } from './frequency.js';
import { translate } from './translator.js';

// ── Public types ─────────────────────────────────────────────

export interface PipelineOptions {
  listingUrl: string;
  translator: TranslationClient;
  count?: number | undefined;
  minCount?: number | undefined;
  sourceLang?: string | undefined;
  targetLang?: string | undefined;
  selectors?: SelectorConfig | undefined;
  /** When false the analysis stage is skipped and the table stays empty. */
  analyze?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface PipelineResult {
  articles: Article[];
  translations: TranslationResult;
  frequencies: WordFrequencyTable;
}

// ── Pipeline ─────────────────────────────────────────────────

/**
 * Extract → translate → analyze, strictly in that order. Resolves with a
 * complete result or rejects with exactly one PipelineError.
 */
export async function runPipeline(
  session: SessionHandle,
  options: PipelineOptions,
): Promise<PipelineResult> {
  const sourceLang = options.sourceLang ?? LANGUAGES.SOURCE;
  const targetLang = options.targetLang ?? LANGUAGES.TARGET;

  const articles = await stage('extraction', options.signal, () =>
    extract(session, options.listingUrl, options.count ?? LIMITS.ARTICLE_COUNT, {
      selectors: options.selectors,
      signal: options.signal,
    }),
  );

  const translations = await stage('translation', options.signal, async () => {
    log.translate(session.label, `Translating ${String(articles.length)} titles (${sourceLang} → ${targetLang})`);
    return translate(
      options.translator,
      articles.map((article) => article.title),
      sourceLang,
      targetLang,
      options.signal,
    );
  });

  for (const [index, translated] of translations.entries()) {
    log.translate(session.label, `${String(index + 1)}. ${translated}`);
  }

  const frequencies = options.analyze === false
    ? {}
    : await stage('analysis', options.signal, async () =>
        analyze(translations, options.minCount ?? LIMITS.MIN_WORD_COUNT),
      );

  const repeated = repeatedWords(frequencies);
  for (const [word, count] of repeated) {
    log.repeated(session.label, word, count);
  }
  if (options.analyze !== false && repeated.length === 0) {
    log.session(session.label, 'No repeated words found');
  }

  return { articles, translations, frequencies };
}

// ── Stage wrapper ────────────────────────────────────────────

async function stage<T>(
  name: PipelineStage,
  signal: AbortSignal | undefined,
  run: () => Promise<T>,
): Promise<T> {
  try {
    signal?.throwIfAborted();
    return await run();
  } catch (err) {
    throw new PipelineError(name, err);
  }
}
