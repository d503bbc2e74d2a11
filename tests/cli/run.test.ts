import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';

import { parsePositiveInt, parsePositiveNumber, resolveRunSettings } from '../../src/cli/run.js';
import { parseConfig } from '../../src/config/loader.js';

const REMOTE = parseConfig(
  `
listingUrl: https://news.test/opinion/
mode: remote
timeout: 90
analysis:
  canonical: Win11/Chrome
matrix:
  - name: Win11/Chrome
    browser: chrome
    os: Windows
    osVersion: "11"
  - name: Galaxy S23
    browser: chrome
    device: Samsung Galaxy S23
`,
  'yaml',
);

describe('resolveRunSettings', () => {
  it('takes everything from the file when no flags are given', () => {
    const settings = resolveRunSettings(REMOTE, { config: 'x', reportPath: '.artifacts' });

    expect(settings).toMatchObject({
      mode: 'remote',
      headless: true,
      sessionTimeoutMs: 90_000,
      count: 5,
      minCount: 2,
      canonical: 'Win11/Chrome',
      translator: 'google',
    });
    expect(settings.descriptors.map((d) => d.name)).toEqual(['Win11/Chrome', 'Galaxy S23']);
  });

  it('lets flags override the file', () => {
    const settings = resolveRunSettings(REMOTE, {
      config: 'x',
      reportPath: '.artifacts',
      timeout: 30,
      count: 3,
      minCount: 4,
      translator: 'mock',
      only: ['Galaxy S23'],
      canonical: 'Galaxy S23',
    });

    expect(settings).toMatchObject({
      sessionTimeoutMs: 30_000,
      count: 3,
      minCount: 4,
      translator: 'mock',
      canonical: 'Galaxy S23',
    });
    expect(settings.descriptors.map((d) => d.name)).toEqual(['Galaxy S23']);
  });

  it('runs a single local Chromium in local mode', () => {
    const settings = resolveRunSettings(REMOTE, {
      config: 'x',
      reportPath: '.artifacts',
      local: true,
      headed: true,
      canonical: 'local/chromium',
    });

    expect(settings.mode).toBe('local');
    expect(settings.headless).toBe(false);
    expect(settings.descriptors).toEqual([{ name: 'local/chromium', browser: 'chrome' }]);
  });

  it('rejects a canonical label that is not running', () => {
    expect(() =>
      resolveRunSettings(REMOTE, { config: 'x', reportPath: '.artifacts', only: ['Galaxy S23'] }),
    ).toThrow('Canonical capability "Win11/Chrome" is not part of this run');
  });

  it('rejects an --only filter that matches nothing', () => {
    expect(() =>
      resolveRunSettings(REMOTE, { config: 'x', reportPath: '.artifacts', only: ['Nope'] }),
    ).toThrow('No capability matches --only Nope');
  });

  it('rejects --local together with --remote', () => {
    expect(() =>
      resolveRunSettings(REMOTE, { config: 'x', reportPath: '.artifacts', local: true, remote: true }),
    ).toThrow('--local and --remote cannot be combined');
  });
});

describe('argument parsers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('5')).toBe(5);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer.');
  });

  it('parses positive numbers', () => {
    expect(parsePositiveNumber('1.5')).toBe(1.5);
    expect(() => parsePositiveNumber('-1')).toThrow('Expected a positive number.');
  });
});
