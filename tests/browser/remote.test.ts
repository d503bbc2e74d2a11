import { describe, it, expect } from 'vitest';

import { buildCapabilities, connectUrl, statusCommand } from '../../src/browser/remote.js';

const credentials = { username: 'test-user', accessKey: 'test-key' };

describe('buildCapabilities', () => {
  it('maps a desktop descriptor onto OS capabilities', () => {
    expect(
      buildCapabilities(
        { browser: 'chrome', os: 'Windows', osVersion: '11' },
        'Scraper - Windows 11/chrome',
        { credentials, build: 'nightly' },
      ),
    ).toEqual({
      browser: 'chrome',
      browser_version: 'latest',
      name: 'Scraper - Windows 11/chrome',
      build: 'nightly',
      os: 'Windows',
      os_version: '11',
      'browserstack.username': 'test-user',
      'browserstack.accessKey': 'test-key',
    });
  });

  it('maps a device descriptor onto device capabilities', () => {
    expect(
      buildCapabilities(
        { browser: 'safari', device: 'iPhone 14 Pro', osVersion: '16' },
        'Scraper - iPhone',
        { credentials },
      ),
    ).toEqual({
      browser: 'playwright-webkit',
      browser_version: 'latest',
      name: 'Scraper - iPhone',
      deviceName: 'iPhone 14 Pro',
      osVersion: '16',
      realMobile: true,
      'browserstack.username': 'test-user',
      'browserstack.accessKey': 'test-key',
    });
  });

  it('uses the Playwright engine names for Firefox and pins versions', () => {
    const caps = buildCapabilities(
      { browser: 'firefox', browserVersion: '120', os: 'Windows', osVersion: '10' },
      'Scraper',
      { credentials },
    );
    expect(caps['browser']).toBe('playwright-firefox');
    expect(caps['browser_version']).toBe('120');
  });
});

describe('connectUrl', () => {
  it('encodes capabilities into the query string', () => {
    const url = connectUrl('wss://grid.test/playwright', { browser: 'chrome', realMobile: true });

    expect(url).toBe(
      'wss://grid.test/playwright?caps=%7B%22browser%22%3A%22chrome%22%2C%22realMobile%22%3Atrue%7D',
    );
    expect(JSON.parse(new URL(url).searchParams.get('caps') ?? '')).toEqual({
      browser: 'chrome',
      realMobile: true,
    });
  });
});

describe('statusCommand', () => {
  it('formats the session status action', () => {
    expect(statusCommand('passed', 'all good')).toBe(
      'browserstack_executor: {"action":"setSessionStatus","arguments":{"status":"passed","reason":"all good"}}',
    );
  });

  it('sends an empty reason when none is given', () => {
    expect(statusCommand('failed')).toBe(
      'browserstack_executor: {"action":"setSessionStatus","arguments":{"status":"failed","reason":""}}',
    );
  });

  it('caps long reasons', () => {
    const command = statusCommand('failed', 'x'.repeat(400));
    const payload: unknown = JSON.parse(command.slice('browserstack_executor: '.length));
    expect(payload).toEqual({
      action: 'setSessionStatus',
      arguments: { status: 'failed', reason: 'x'.repeat(255) },
    });
  });
});
