import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { isMap, isScalar, parse as parseYaml, parseDocument } from 'yaml';
import { ZodError } from 'zod';

import { parsePlanLibrary } from '../schema/index.js';
import type { PlanLibrary } from '../schema/index.js';
import { formatIssues } from '../utils/issues.js';

// ── Error ────────────────────────────────────────────────────

export class LibraryError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'LibraryError';
  }
}

// ── Process-lifetime cache ───────────────────────────────────
// The library is read once per path; reloading needs a restart.

const cache = new Map<string, Promise<PlanLibrary>>();

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a plan library document (YAML or JSON).
 * Shape and graph reference errors surface here, not mid-traversal.
 */
export function loadPlanLibrary(libraryPath: string): Promise<PlanLibrary> {
  const key = path.resolve(libraryPath);
  const cached = cache.get(key);
  if (cached) return cached;

  const pending = readLibrary(key);
  cache.set(key, pending);
  // A failed load is not cached, so a fixed file can be retried.
  void pending.catch(() => cache.delete(key));
  return pending;
}

/** Validate an already-parsed library document. */
export function parseLibraryDocument(data: unknown, source = '(inline)'): PlanLibrary {
  try {
    return parsePlanLibrary(data);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new LibraryError(`Invalid plan library ${source}: ${formatIssues(err)}`);
    }
    throw err;
  }
}

export function clearLibraryCache(): void {
  cache.clear();
}

// ── Reading ──────────────────────────────────────────────────

async function readLibrary(libraryPath: string): Promise<PlanLibrary> {
  let raw: string;
  try {
    raw = await readFile(libraryPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new LibraryError(`Cannot read plan library ${libraryPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = libraryPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new LibraryError(`Cannot parse plan library ${libraryPath}: ${message}`);
  }

  const library = parseLibraryDocument(parsed, libraryPath);
  return { ...library, order: library.order ?? documentPlanOrder(raw) };
}

/**
 * Plan ids in the order the file lists them. JSON is read as YAML here,
 * which it is a subset of.
 */
function documentPlanOrder(raw: string): string[] {
  const plans: unknown = parseDocument(raw).get('plans');
  if (!isMap(plans)) return [];
  return plans.items.flatMap((pair) => (isScalar(pair.key) ? [String(pair.key.value)] : []));
}
