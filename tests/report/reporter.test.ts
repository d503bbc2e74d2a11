import { describe, it, expect } from 'vitest';

import {
  exitCodeFor,
  formatSummary,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../../src/report/reporter.js';
import type { RunMetadata } from '../../src/report/reporter.js';
import { createRunReport } from '../../src/core/runReport.js';
import type { RunReport } from '../../src/core/runReport.js';
import { jsonOutputSchema } from '../../src/schema/jsonOutput.js';

// ============================================
// MOCK DATA
// ============================================

const META: RunMetadata = {
  runId: 'run-1',
  listingUrl: 'https://news.test/opinion/',
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:02.000Z',
  durationMs: 2000,
};

function buildReport(): RunReport {
  const report = createRunReport(['a', 'b']);
  report.record({
    descriptor: { name: 'a', browser: 'chrome', os: 'Windows', osVersion: '11' },
    label: 'a',
    testName: 'suite - a',
    status: 'passed',
    articles: [{ url: 'https://news.test/articles/1', title: 'El Gobierno cae', body: 'Texto' }],
    translations: ['The government falls'],
    frequencies: { government: 3 },
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 1000,
  });
  report.record({
    descriptor: { name: 'b', browser: 'safari', device: 'iPhone 14 Pro', osVersion: '16' },
    label: 'b',
    testName: 'suite - b',
    status: 'failed',
    articles: [],
    translations: [],
    frequencies: {},
    failureReason: 'Timeout',
    reportError: 'dashboard offline',
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:00.250Z',
    durationMs: 250,
  });
  report.finalize();
  return report;
}

// ============================================
// TESTS
// ============================================

describe('generateJSON', () => {
  it('summarizes the run and validates against the contract', () => {
    const json = generateJSON(buildReport(), META);

    expect(jsonOutputSchema.parse(json)).toEqual(json);
    expect(json).toMatchObject({
      version: '1.0',
      summary: 'failed',
      passed: 1,
      failed: 1,
      exitCode: 1,
    });
    expect(json.sessions[0]).toEqual({
      label: 'a',
      browser: 'chrome',
      platform: 'Windows 11',
      status: 'passed',
      reason: '',
      stage: null,
      durationMs: 1000,
      articles: [
        {
          url: 'https://news.test/articles/1',
          title: 'El Gobierno cae',
          translation: 'The government falls',
        },
      ],
      frequencies: { government: 3 },
      reportError: null,
    });
    expect(json.sessions[1]).toMatchObject({
      platform: 'iPhone 14 Pro (16)',
      reason: 'Timeout',
      reportError: 'dashboard offline',
    });
  });
});

describe('serializeJSON', () => {
  it('sorts keys for stable output', () => {
    const text = serializeJSON(generateJSON(buildReport(), META));
    expect(text.split('\n').slice(0, 3)).toEqual(['{', '  "exitCode": 1,', '  "failed": 1,']);
  });
});

describe('generateMarkdown', () => {
  it('renders one row per session', () => {
    const lines = generateMarkdown(buildReport(), META).split('\n');

    expect(lines).toContain('| a | Windows 11 | [PASS] | 1 | 1.0s |  |');
    expect(lines).toContain('| b | iPhone 14 Pro (16) | [FAIL] | 0 | 250ms | Timeout |');
    expect(lines).toContain('| **Result** | **[FAIL]** 1 passed, 1 failed |');
  });

  it('lists repeated words and translated titles of passed sessions', () => {
    const lines = generateMarkdown(buildReport(), META).split('\n');

    expect(lines).toContain('- **government**: 3');
    expect(lines).toContain(
      '| 1 | [El Gobierno cae](https://news.test/articles/1) | The government falls |',
    );
    expect(lines).toContain('- b: dashboard offline');
  });
});

describe('formatSummary', () => {
  it('prints a status line per session and the aggregate', () => {
    expect(formatSummary(buildReport())).toBe(
      [
        '[PASS] a',
        '[FAIL] b  Timeout',
        '',
        'Total:   2 sessions, 1 passed, 1 failed',
        'Result:  FAILED',
      ].join('\n'),
    );
  });
});

describe('exitCodeFor', () => {
  it('is non-zero when any session failed', () => {
    expect(exitCodeFor(buildReport())).toBe(1);
  });

  it('is zero when every session passed', () => {
    const report = createRunReport([]);
    report.finalize();
    expect(exitCodeFor(report)).toBe(0);
  });
});
