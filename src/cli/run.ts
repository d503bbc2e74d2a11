import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import type {
  CapabilityDescriptor,
  FileConfig,
  RunMode,
  TranslationProvider,
} from '../schema/index.js';
import { LOCAL_DESCRIPTOR, describeCapability, translationProviderSchema } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { ConfigError, loadRemoteCredentials } from '../config/env.js';
import { loadConfigFile } from '../config/loader.js';
import type { SessionProvider } from '../browser/session.js';
import { createLocalProvider } from '../browser/local.js';
import { createRemoteProvider } from '../browser/remote.js';
import { createTranslationClient, loadTranslationConfig } from '../translate/index.js';
import { runMatrix } from '../core/orchestrator.js';
import {
  exitCodeFor,
  formatSummary,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/reporter.js';
import type { RunMetadata } from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── CLI options ──────────────────────────────────────────────

export interface RunOptions {
  config: string;
  local?: true;
  remote?: true;
  headed?: true;
  timeout?: number;
  count?: number;
  minCount?: number;
  only?: string[];
  canonical?: string;
  translator?: TranslationProvider;
  json?: true;
  reportPath: string;
}

export interface RunSettings {
  mode: RunMode;
  headless: boolean;
  descriptors: CapabilityDescriptor[];
  sessionTimeoutMs: number;
  count: number;
  minCount: number;
  canonical: string | undefined;
  translator: TranslationProvider;
}

// ── Settings merge ───────────────────────────────────────────

/**
 * Merge the validated config file with CLI flags; flags take precedence.
 * Local runs always use the single local Chromium descriptor.
 */
export function resolveRunSettings(config: FileConfig, opts: RunOptions): RunSettings {
  if (opts.local && opts.remote) {
    throw new ConfigError('--local and --remote cannot be combined');
  }

  const mode: RunMode = opts.local ? 'local' : opts.remote ? 'remote' : config.mode;

  let descriptors: CapabilityDescriptor[];
  if (mode === 'local') {
    descriptors = [LOCAL_DESCRIPTOR];
  } else {
    if (config.matrix === undefined) {
      throw new ConfigError('Remote mode needs a capability matrix in the config file');
    }
    descriptors = [...config.matrix];
  }

  if (opts.only !== undefined && opts.only.length > 0) {
    const wanted = new Set(opts.only);
    descriptors = descriptors.filter((descriptor) => wanted.has(describeCapability(descriptor)));
    if (descriptors.length === 0) {
      throw new ConfigError(`No capability matches --only ${opts.only.join(', ')}`);
    }
  }

  const canonical = opts.canonical ?? config.analysis.canonical;
  if (canonical !== undefined && !descriptors.some((d) => describeCapability(d) === canonical)) {
    throw new ConfigError(`Canonical capability "${canonical}" is not part of this run`);
  }

  return {
    mode,
    headless: opts.headed ? false : config.headless,
    descriptors,
    sessionTimeoutMs: (opts.timeout ?? config.timeout) * 1000,
    count: opts.count ?? config.articleCount,
    minCount: opts.minCount ?? config.minCount,
    canonical,
    translator: opts.translator ?? config.translation.provider,
  };
}

// ── Argument parsers ─────────────────────────────────────────

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function parseProvider(value: string): TranslationProvider {
  const result = translationProviderSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of ${translationProviderSchema.options.join(', ')}.`);
  }
  return result.data;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

// ── Provider wiring ──────────────────────────────────────────

function createProvider(settings: RunSettings, config: FileConfig): SessionProvider {
  if (settings.mode === 'local') {
    return createLocalProvider({ headless: settings.headless });
  }
  return createRemoteProvider({
    credentials: loadRemoteCredentials(),
    build: config.build ?? config.testName,
  });
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the scrape → translate → analyze pipeline across the capability matrix')
    .option('--config <path>', 'Path to config file', '.matrixprobe.yaml')
    .option('--local', 'Run once against a local Chromium')
    .option('--remote', 'Run every matrix entry on the remote grid')
    .option('--headed', 'Show the local browser window')
    .option('--timeout <seconds>', 'Per-session time budget in seconds', parsePositiveNumber)
    .option('--count <n>', 'Number of articles to scrape', parsePositiveInt)
    .option('--min-count <n>', 'Minimum occurrences for a repeated word', parsePositiveInt)
    .option('--only <label>', 'Run only this capability (repeatable)', collect)
    .option('--canonical <label>', 'Analyze word frequencies in this session only')
    .option('--translator <provider>', 'Translation provider', parseProvider)
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Artifact directory', '.artifacts')
    .action(async (opts: RunOptions) => {
      let config: FileConfig;
      let settings: RunSettings;
      let provider: SessionProvider;
      try {
        config = await loadConfigFile(opts.config);
        settings = resolveRunSettings(config, opts);
        provider = createProvider(settings, config);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Config error: ${message}\n`);
        process.exitCode = 4;
        return;
      }

      try {
        const translator = createTranslationClient(
          loadTranslationConfig(settings.translator, config.translation.model),
        );

        log.section(
          `Running ${String(settings.descriptors.length)} session(s) in ${settings.mode} mode`,
        );
        for (const descriptor of settings.descriptors) {
          log.detail(describeCapability(descriptor));
        }

        const startedAt = new Date();
        const report = await runMatrix(settings.descriptors, {
          provider,
          testName: config.testName,
          sessionTimeoutMs: settings.sessionTimeoutMs,
          reportTimeoutMs: TIMEOUTS.REPORT_TIMEOUT,
          canonical: settings.canonical,
          pipeline: {
            listingUrl: config.listingUrl,
            translator,
            count: settings.count,
            minCount: settings.minCount,
            sourceLang: config.sourceLang,
            targetLang: config.targetLang,
            selectors: config.selectors,
          },
        });
        const finishedAt = new Date();

        const meta: RunMetadata = {
          runId: randomUUID(),
          listingUrl: config.listingUrl,
          startedAt: startedAt.toISOString(),
          finishedAt: finishedAt.toISOString(),
          durationMs: finishedAt.getTime() - startedAt.getTime(),
          canonical: settings.canonical,
        };

        // Artifacts
        const outputDir = path.resolve(opts.reportPath);
        await mkdir(outputDir, { recursive: true });
        const json = generateJSON(report, meta);
        await writeFile(path.join(outputDir, 'summary.json'), serializeJSON(json) + '\n', 'utf-8');
        await writeFile(path.join(outputDir, 'report.md'), generateMarkdown(report, meta), 'utf-8');

        if (opts.json) {
          process.stdout.write(serializeJSON(json) + '\n');
        }

        log.section('Summary');
        process.stderr.write(formatSummary(report) + '\n');
        log.info(`Report written to ${path.join(outputDir, 'report.md')}`);

        process.exitCode = exitCodeFor(report);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = 4;
      } finally {
        await provider.close().catch((err: unknown) => {
          log.warn(`Browser shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        });
      }
    });
}
