import type { SessionOutcome, SessionStatus } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputSession } from '../schema/jsonOutput.js';
import type { RunReport } from '../core/runReport.js';
import { repeatedWords } from '../core/frequency.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputSession };

// ── Run metadata ─────────────────────────────────────────────

export interface RunMetadata {
  runId: string;
  listingUrl: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  /** Label whose frequency table represents the run, when analysis is canonical. */
  canonical?: string | undefined;
}

export function exitCodeFor(report: RunReport): number {
  return report.allPassed() ? 0 : 1;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(report: RunReport, meta: RunMetadata): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    summary: report.allPassed() ? 'passed' : 'failed',
    runId: meta.runId,
    listingUrl: meta.listingUrl,
    passed: report.passedCount(),
    failed: report.failedCount(),
    exitCode: exitCodeFor(report),
    sessions: report.outcomes().map(sessionToJSON),
  };
}

function sessionToJSON(outcome: SessionOutcome): JsonOutputSession {
  return {
    label: outcome.label,
    browser: outcome.descriptor.browser,
    platform: platformOf(outcome),
    status: outcome.status,
    reason: outcome.failureReason ?? '',
    stage: outcome.failedStage ?? null,
    durationMs: outcome.durationMs,
    articles: outcome.articles.map((article, index) => ({
      url: article.url,
      title: article.title,
      translation: outcome.translations[index] ?? '',
    })),
    frequencies: { ...outcome.frequencies },
    reportError: outcome.reportError ?? null,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const source = new Map(Object.entries(value));
  const sorted: Record<string, unknown> = {};
  for (const k of [...source.keys()].sort()) {
    sorted[k] = source.get(k);
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: RunReport, meta: RunMetadata): string {
  const lines: string[] = [];
  const verdict: SessionStatus = report.allPassed() ? 'passed' : 'failed';

  // Header + metadata
  lines.push(`# matrixprobe Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Listing** | ${meta.listingUrl} |`);
  lines.push(`| **Run ID** | \`${meta.runId}\` |`);
  lines.push(`| **Started** | ${meta.startedAt} |`);
  lines.push(`| **Finished** | ${meta.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(meta.durationMs)} |`);
  lines.push(
    `| **Result** | **${verdictIcon(verdict)}** ${String(report.passedCount())} passed, ${String(report.failedCount())} failed |`,
  );
  lines.push('');

  // Session summary table
  lines.push(`## Sessions`);
  lines.push('');
  lines.push(`| Capability | Platform | Result | Articles | Duration | Reason |`);
  lines.push(`|------------|----------|--------|----------|----------|--------|`);

  for (const outcome of report.outcomes()) {
    lines.push(
      `| ${escapeMarkdownCell(outcome.label)} | ${escapeMarkdownCell(platformOf(outcome))} | ${verdictIcon(outcome.status)} | ${String(outcome.articles.length)} | ${formatDuration(outcome.durationMs)} | ${escapeMarkdownCell(outcome.failureReason ?? '')} |`,
    );
  }

  lines.push('');

  // Repeated words
  const analyzed = report
    .outcomes()
    .filter((outcome) => outcome.status === 'passed')
    .filter((outcome) => meta.canonical === undefined || outcome.label === meta.canonical);

  if (analyzed.length > 0) {
    lines.push(`## Repeated Words`);
    lines.push('');

    for (const outcome of analyzed) {
      lines.push(`### ${outcome.label}`);
      lines.push('');
      const words = repeatedWords(outcome.frequencies);
      if (words.length === 0) {
        lines.push('_No repeated words._');
      }
      for (const [word, count] of words) {
        lines.push(`- **${word}**: ${String(count)}`);
      }
      lines.push('');
    }
  }

  // Per-session articles
  lines.push(`## Articles`);
  lines.push('');

  for (const outcome of report.outcomes()) {
    if (outcome.articles.length === 0) continue;

    lines.push(`### ${outcome.label}`);
    lines.push('');
    lines.push(`| # | Title | Translation |`);
    lines.push(`|---|-------|-------------|`);
    outcome.articles.forEach((article, index) => {
      lines.push(
        `| ${String(index + 1)} | [${escapeMarkdownCell(article.title)}](${article.url}) | ${escapeMarkdownCell(outcome.translations[index] ?? '')} |`,
      );
    });
    lines.push('');
  }

  // Dashboard problems
  const unreported = report.outcomes().filter((outcome) => outcome.reportError !== undefined);
  if (unreported.length > 0) {
    lines.push(`## Dashboard Reporting Errors`);
    lines.push('');
    for (const outcome of unreported) {
      lines.push(`- ${outcome.label}: ${outcome.reportError ?? ''}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── Console summary ──────────────────────────────────────────

/** One status line per capability followed by the aggregate, for stderr. */
export function formatSummary(report: RunReport): string {
  const lines = report.outcomes().map((outcome) => {
    const suffix = outcome.failureReason !== undefined ? `  ${outcome.failureReason}` : '';
    return `${verdictIcon(outcome.status)} ${outcome.label}${suffix}`;
  });

  lines.push('');
  lines.push(
    `Total:   ${String(report.outcomes().length)} sessions, ${String(report.passedCount())} passed, ${String(report.failedCount())} failed`,
  );
  lines.push(`Result:  ${report.allPassed() ? 'PASSED' : 'FAILED'}`);

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function platformOf(outcome: SessionOutcome): string {
  const { device, os, osVersion } = outcome.descriptor;
  if (device !== undefined) return osVersion !== undefined ? `${device} (${osVersion})` : device;
  return [os, osVersion].filter((part): part is string => part !== undefined).join(' ');
}

function verdictIcon(status: SessionStatus): string {
  switch (status) {
    case 'passed':
      return '[PASS]';
    case 'failed':
      return '[FAIL]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
