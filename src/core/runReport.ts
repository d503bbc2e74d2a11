import type { CapabilityDescriptor, SessionOutcome } from '../schema/index.js';
import { describeCapability } from '../schema/index.js';

// ── Public interface ─────────────────────────────────────────

/**
 * Outcomes of one matrix run, keyed by capability label. Each label is
 * written exactly once; after `finalize()` the report is read-only.
 */
export interface RunReport {
  readonly labels: readonly string[];
  record(outcome: SessionOutcome): void;
  get(key: CapabilityDescriptor | string): SessionOutcome | undefined;
  /** Recorded outcomes in matrix order. */
  outcomes(): SessionOutcome[];
  passedCount(): number;
  failedCount(): number;
  allPassed(): boolean;
  finalize(): void;
  isFinalized(): boolean;
}

// ── Factory ──────────────────────────────────────────────────

export function createRunReport(labels: readonly string[]): RunReport {
  const expected = Object.freeze([...labels]);
  const entries = new Map<string, SessionOutcome>();
  let finalized = false;

  function outcomes(): SessionOutcome[] {
    return expected
      .map((label) => entries.get(label))
      .filter((outcome): outcome is SessionOutcome => outcome !== undefined);
  }

  return {
    labels: expected,

    record(outcome: SessionOutcome): void {
      if (finalized) {
        throw new Error(`Run report is finalized; cannot record "${outcome.label}"`);
      }
      if (!expected.includes(outcome.label)) {
        throw new Error(`"${outcome.label}" is not part of this run`);
      }
      if (entries.has(outcome.label)) {
        throw new Error(`Outcome for "${outcome.label}" was already recorded`);
      }
      entries.set(outcome.label, freezeOutcome(outcome));
    },

    get(key: CapabilityDescriptor | string): SessionOutcome | undefined {
      return entries.get(typeof key === 'string' ? key : describeCapability(key));
    },

    outcomes,

    passedCount(): number {
      return outcomes().filter((outcome) => outcome.status === 'passed').length;
    },

    failedCount(): number {
      return outcomes().filter((outcome) => outcome.status === 'failed').length;
    },

    allPassed(): boolean {
      return entries.size === expected.length
        && outcomes().every((outcome) => outcome.status === 'passed');
    },

    finalize(): void {
      finalized = true;
    },

    isFinalized(): boolean {
      return finalized;
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function freezeOutcome(outcome: SessionOutcome): SessionOutcome {
  for (const article of outcome.articles) Object.freeze(article);
  Object.freeze(outcome.articles);
  Object.freeze(outcome.translations);
  Object.freeze(outcome.frequencies);
  return Object.freeze(outcome);
}
