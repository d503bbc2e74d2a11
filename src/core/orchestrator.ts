import type {
  CapabilityDescriptor,
  PipelineStage,
  SessionOutcome,
  SessionStatus,
} from '../schema/index.js';
import { describeCapability } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { SessionHandle, SessionProvider } from '../browser/session.js';
import * as log from '../utils/logger.js';
import { TIMED_OUT, settle, withTimeout } from '../utils/deadline.js';
import { PipelineError, TIMEOUT_REASON, errorMessage } from './errors.js';
import { runPipeline } from './pipeline.js';
import type { PipelineOptions, PipelineResult } from './pipeline.js';
import { createRunReport } from './runReport.js';
import type { RunReport } from './runReport.js';

// ── Public types ─────────────────────────────────────────────

/** Pipeline settings shared by every session of the matrix. */
export type MatrixPipelineOptions = Omit<PipelineOptions, 'signal' | 'analyze'>;

export interface OrchestratorConfig {
  provider: SessionProvider;
  testName: string;
  pipeline: MatrixPipelineOptions;
  /** Budget for one session's pipeline, counted once the session is acquired. */
  sessionTimeoutMs?: number | undefined;
  reportTimeoutMs?: number | undefined;
  /** Only this label runs the analysis stage; every label does when unset. */
  canonical?: string | undefined;
  onOutcome?: ((outcome: SessionOutcome) => void) | undefined;
}

// ── Matrix run ───────────────────────────────────────────────

/**
 * Run the pipeline once per descriptor, all concurrently. Resolves with a
 * finalized report after every worker has finished or timed out; a
 * worker's failure is isolated to its own outcome.
 */
export async function runMatrix(
  descriptors: readonly CapabilityDescriptor[],
  config: OrchestratorConfig,
): Promise<RunReport> {
  const labels = descriptors.map(describeCapability);
  if (new Set(labels).size !== labels.length) {
    throw new Error('Capability labels must be unique within a matrix');
  }
  if (config.canonical !== undefined && !labels.includes(config.canonical)) {
    throw new Error(`Canonical session "${config.canonical}" is not in the matrix`);
  }

  const report = createRunReport(labels);

  await Promise.all(
    descriptors.map(async (descriptor) => {
      const outcome = await runWorker(descriptor, config);
      report.record(outcome);
      notify(config, outcome);
    }),
  );

  report.finalize();
  return report;
}

// ── Worker ───────────────────────────────────────────────────

interface Verdict {
  status: SessionStatus;
  result?: PipelineResult | undefined;
  failureReason?: string | undefined;
  failedStage?: PipelineStage | undefined;
}

async function runWorker(
  descriptor: CapabilityDescriptor,
  config: OrchestratorConfig,
): Promise<SessionOutcome> {
  const label = describeCapability(descriptor);
  const testName = `${config.testName} - ${label}`;
  const startedAt = new Date();

  log.session(label, `Starting "${testName}"`);

  let handle: SessionHandle;
  try {
    handle = await config.provider.acquireSession(descriptor, testName);
  } catch (err) {
    const verdict: Verdict = {
      status: 'failed',
      failureReason: `ProvisioningError: ${errorMessage(err)}`,
    };
    log.verdict(label, false, verdict.failureReason);
    return buildOutcome(descriptor, testName, startedAt, verdict);
  }

  const verdict = await runBudgeted(handle, label, config);
  log.verdict(label, verdict.status === 'passed', verdict.failureReason);

  const reportError = await reportVerdict(handle, verdict, config);
  await release(config.provider, handle, verdict.status);

  return buildOutcome(descriptor, testName, startedAt, verdict, reportError);
}

async function runBudgeted(
  handle: SessionHandle,
  label: string,
  config: OrchestratorConfig,
): Promise<Verdict> {
  const controller = new AbortController();
  const work = settle(
    runPipeline(handle, {
      ...config.pipeline,
      analyze: config.canonical === undefined || config.canonical === label,
      signal: controller.signal,
    }),
  );

  const settled = await withTimeout(work, config.sessionTimeoutMs ?? TIMEOUTS.SESSION_TIMEOUT);

  if (settled === TIMED_OUT) {
    // The session stays open for the verdict; release closes it, and the
    // late rejection of the aborted work lands in `work` and goes nowhere.
    controller.abort(new Error(TIMEOUT_REASON));
    return { status: 'failed', failureReason: TIMEOUT_REASON };
  }

  if (settled.ok) {
    return { status: 'passed', result: settled.value };
  }

  const error = settled.error;
  if (error instanceof PipelineError) {
    return { status: 'failed', failureReason: error.describe(), failedStage: error.stage };
  }
  return { status: 'failed', failureReason: errorMessage(error) };
}

// ── Dashboard + release ──────────────────────────────────────

async function reportVerdict(
  handle: SessionHandle,
  verdict: Verdict,
  config: OrchestratorConfig,
): Promise<string | undefined> {
  const reason = verdict.status === 'passed'
    ? 'Scraping, translation and analysis complete'
    : verdict.failureReason;

  const reported = await withTimeout(
    settle(handle.reportStatus(verdict.status, reason)),
    config.reportTimeoutMs ?? TIMEOUTS.REPORT_TIMEOUT,
  );

  let problem: string | undefined;
  if (reported === TIMED_OUT) {
    problem = 'status report timed out';
  } else if (!reported.ok) {
    problem = errorMessage(reported.error);
  }

  if (problem !== undefined) {
    log.error(`[${handle.label}] Could not report status to the dashboard: ${problem}`);
  }
  return problem;
}

async function release(
  provider: SessionProvider,
  handle: SessionHandle,
  status: SessionStatus,
): Promise<void> {
  try {
    await provider.releaseSession(handle, status);
  } catch (err) {
    log.error(`[${handle.label}] Session release failed: ${errorMessage(err)}`);
  }
}

// ── Outcome ──────────────────────────────────────────────────

function buildOutcome(
  descriptor: CapabilityDescriptor,
  testName: string,
  startedAt: Date,
  verdict: Verdict,
  reportError?: string,
): SessionOutcome {
  const finishedAt = new Date();
  const outcome: SessionOutcome = {
    descriptor,
    label: describeCapability(descriptor),
    testName,
    status: verdict.status,
    articles: verdict.result?.articles ?? [],
    translations: verdict.result?.translations ?? [],
    frequencies: verdict.result?.frequencies ?? {},
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };

  if (verdict.failureReason !== undefined) outcome.failureReason = verdict.failureReason;
  if (verdict.failedStage !== undefined) outcome.failedStage = verdict.failedStage;
  if (reportError !== undefined) outcome.reportError = reportError;

  return outcome;
}

function notify(config: OrchestratorConfig, outcome: SessionOutcome): void {
  if (config.onOutcome === undefined) return;
  try {
    config.onOutcome(outcome);
  } catch (err) {
    log.error(`[${outcome.label}] Outcome listener failed: ${errorMessage(err)}`);
  }
}
