import type { PipelineStage } from '../schema/index.js';

// ── Stage errors ─────────────────────────────────────────────

/** A listing or article page did not load within the bounded wait. */
export class NavigationError extends Error {
  readonly url: string;

  constructor(url: string, reason: string, options?: ErrorOptions) {
    super(`Could not load ${url}: ${reason}`, options);
    this.name = 'NavigationError';
    this.url = url;
  }
}

/** An expected title or body region was absent after the wait. */
export class ExtractionError extends Error {
  readonly url: string;
  readonly region: string;

  constructor(url: string, region: string, reason: string, options?: ErrorOptions) {
    super(`Missing ${region} on ${url}: ${reason}`, options);
    this.name = 'ExtractionError';
    this.url = url;
    this.region = region;
  }
}

export class TranslationServiceError extends Error {
  readonly itemIndex: number | undefined;

  constructor(message: string, itemIndex?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TranslationServiceError';
    this.itemIndex = itemIndex;
  }
}

export class ProvisioningError extends Error {
  readonly label: string;

  constructor(label: string, reason: string, options?: ErrorOptions) {
    super(`Could not acquire a session for ${label}: ${reason}`, options);
    this.name = 'ProvisioningError';
    this.label = label;
  }
}

// ── Pipeline wrapper ─────────────────────────────────────────

const STAGE_LABELS: Record<PipelineStage, string> = {
  extraction: 'Extraction',
  translation: 'Translation',
  analysis: 'Analysis',
};

/**
 * The only error a pipeline run yields. Carries the stage that failed and
 * the stage error as `cause`.
 */
export class PipelineError extends Error {
  readonly stage: PipelineStage;
  override readonly cause: Error;

  constructor(stage: PipelineStage, cause: unknown) {
    const error = toError(cause);
    super(`${STAGE_LABELS[stage]} stage failed: ${error.message}`, { cause: error });
    this.name = 'PipelineError';
    this.stage = stage;
    this.cause = error;
  }

  /** One-line reason for logs and the dashboard, e.g. `Extraction stage failed (NavigationError): …`. */
  describe(): string {
    return `${STAGE_LABELS[this.stage]} stage failed (${this.cause.name}): ${this.cause.message}`;
  }
}

// ── Orchestrator-level reasons ───────────────────────────────

export const TIMEOUT_REASON = 'Timeout';

// ── Helpers ──────────────────────────────────────────────────

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
