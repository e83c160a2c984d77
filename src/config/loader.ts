import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { formatIssues } from '../utils/issues.js';
import { SESSION_DEFAULTS } from './defaults.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

export interface LoadConfigOptions {
  /** Return defaults instead of failing when the file does not exist. */
  optional?: boolean | undefined;
}

/**
 * Load and validate a `.plangraph.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (options.optional && isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config ${configPath}: ${message}`);
  }

  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    const message = err instanceof ZodError
      ? formatIssues(err)
      : err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config ${configPath}: ${message}`);
  }
}

/**
 * Pick the plan library path: CLI flag, then config file, then
 * PLANGRAPH_LIBRARY, then the bundled default.
 */
export function resolveLibraryPath(
  flag: string | undefined,
  config: FileConfig,
): string {
  return (
    flag ??
    config.library ??
    process.env['PLANGRAPH_LIBRARY'] ??
    SESSION_DEFAULTS.LIBRARY_PATH
  );
}

// ── Helpers ──────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
