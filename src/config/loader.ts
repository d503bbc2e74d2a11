import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { ConfigError } from './env.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.matrixprobe.yaml` (or JSON) config file.
 * Throws a ConfigError naming the offending fields if the file is
 * missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}`, { cause: err });
  }

  return parseConfig(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

export function parseConfig(raw: string, format: 'json' | 'yaml'): FileConfig {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config is not valid ${format.toUpperCase()}: ${message}`, { cause: err });
  }

  try {
    return fileConfigSchema.parse(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid config: ${formatIssues(err)}`, { cause: err });
    }
    throw err;
  }
}

// ── Helpers ─────────────────────────────────────────────────

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
