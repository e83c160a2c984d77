import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import type { SimulationRun, SimulationScript } from '../schema/index.js';
import { parseSimulationScript } from '../schema/index.js';
import { loadPlanLibrary } from '../library/index.js';
import { loadConfigFile, resolveLibraryPath } from '../config/loader.js';
import { SESSION_DEFAULTS } from '../config/defaults.js';
import { exitCodeFor, runScript } from '../core/simulate.js';
import { generateMarkdown, generateJSON, serializeJSON } from '../report/reporter.js';
import { formatIssues } from '../utils/issues.js';
import * as log from '../utils/logger.js';

// ── Script file loading ──────────────────────────────────────

export async function loadScriptFile(scriptPath: string): Promise<SimulationScript> {
  const raw = await readFile(scriptPath, 'utf-8');
  const parsed: unknown = scriptPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);
  try {
    return parseSimulationScript(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(`Invalid script ${scriptPath}: ${formatIssues(err)}`);
    }
    throw err;
  }
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(run: SimulationRun): void {
  const activations = run.turns.filter((t) => t.outcome === 'activated').length;

  process.stderr.write(`\n--- plangraph Simulation ---\n`);
  process.stderr.write(`Script:   ${run.script}\n`);
  process.stderr.write(`Outcome:  ${run.finalOutcome}\n`);
  process.stderr.write(
    `Turns:    ${String(run.turns.length)} (${String(activations)} activations)\n`,
  );
  process.stderr.write(`PACE:     ${run.paceLevel}\n`);
  process.stderr.write(`Events:   ${String(run.events.length)}\n`);
  process.stderr.write(`Run ID:   ${run.runId}\n\n`);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Validate command ─────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Load a plan library and report shape or graph reference errors')
    .argument('[library]', 'Path to the plan library (YAML or JSON)')
    .option('--config <path>', 'Path to config file', SESSION_DEFAULTS.CONFIG_PATH)
    .action(async (libraryArg: string | undefined, opts: { config: string }) => {
      try {
        const config = await loadConfigFile(opts.config, { optional: true });
        const libraryPath = resolveLibraryPath(libraryArg, config);
        const library = await loadPlanLibrary(libraryPath);

        const entries = Object.entries(library.plans);
        log.info(`Library: ${libraryPath}`);
        for (const [planId, plan] of entries) {
          const nodes = plan.graph ? Object.keys(plan.graph.nodes).length : 0;
          const edges = plan.graph ? plan.graph.edges.length : 0;
          log.detail(
            `${planId}: ${String(nodes)} nodes, ${String(edges)} edges${plan.graph ? '' : ' (no graph)'}`,
          );
        }
        log.info(`OK: ${String(entries.length)} plans`);
        process.exitCode = 0;
      } catch (err) {
        log.error(errorMessage(err));
        process.exitCode = 4;
      }
    });
}

// ── Simulate command ─────────────────────────────────────────

export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate')
    .description('Replay a scripted session (YAML or JSON) through the engine')
    .argument('<script>', 'Path to the simulation script')
    .option('--library <path>', 'Path to the plan library')
    .option('--config <path>', 'Path to config file', SESSION_DEFAULTS.CONFIG_PATH)
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Directory for report.md', '.artifacts')
    .action(
      async (
        scriptPath: string,
        opts: {
          library?: string;
          config: string;
          json?: true;
          reportPath: string;
        },
      ) => {
        try {
          // 1. Load config file (CLI flags override)
          const config = await loadConfigFile(opts.config, { optional: true });

          // 2. Load library + script
          const library = await loadPlanLibrary(resolveLibraryPath(opts.library, config));
          const script = await loadScriptFile(scriptPath);

          // 3. Run the session
          const { run } = runScript(library, script, {
            scriptName: script.name ?? path.basename(scriptPath),
            confirmation: config.confirmation,
            staleAfterTurns: config.staleAfterTurns,
          });
          const exitCode = exitCodeFor(run);

          // 4. Write markdown report
          const outputDir = path.resolve(opts.reportPath);
          await mkdir(outputDir, { recursive: true });
          await writeFile(path.join(outputDir, 'report.md'), generateMarkdown(run), 'utf-8');

          // 5. JSON to stdout if --json
          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(run, exitCode)) + '\n');
          }

          // 6. Summary to stderr always
          printSummary(run);

          process.exitCode = exitCode;
        } catch (err) {
          log.error(errorMessage(err));
          process.exitCode = 4;
        }
      },
    );
}
