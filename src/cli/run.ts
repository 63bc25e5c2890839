import { readFile, writeFile } from 'node:fs/promises';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import type { FileConfig } from '../schema/config.js';
import { crawlStrategySchema } from '../schema/config.js';
import { parseTestSession } from '../schema/results.js';
import {
  applyEnvCredentials,
  applyOverrides,
  loadConfigFile,
} from '../config/loader.js';
import type { ConfigOverrides } from '../config/loader.js';
import { runSession } from '../core/run.js';
import { runSmoke } from '../core/smoke.js';
import { generateMarkdown, serializeJSON } from '../report/reporter.js';
import * as log from '../utils/logger.js';

const DEFAULT_CONFIG = '.pagewalk.yaml';

// ── Option parsers ───────────────────────────────────────────

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function parsePositiveInt(value: string): number {
  const n = parseNonNegativeInt(value);
  if (n === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseStrategy(value: string): 'bfs' | 'dfs' {
  const result = crawlStrategySchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new InvalidArgumentError('Expected "bfs" or "dfs".');
  }
  return result.data;
}

// ── Shared plumbing ──────────────────────────────────────────

interface RunOptions {
  config: string;
  module?: string;
  strategy?: 'bfs' | 'dfs';
  maxPages?: number;
  maxDepth?: number;
  headless?: true;
  output?: string;
  json?: true;
}

/** File, then CLI flags, then credentials from the environment. */
export async function resolveConfig(
  configPath: string,
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
): Promise<FileConfig> {
  const fileConfig = await loadConfigFile(configPath);
  return applyEnvCredentials(applyOverrides(fileConfig, overrides), env);
}

/** Known failures carry their own exit code; anything else exits 4. */
function exitCodeOf(err: unknown): number {
  if (err instanceof Error && 'exitCode' in err && typeof err.exitCode === 'number') {
    return err.exitCode;
  }
  return 4;
}

function reportFailure(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  log.error(message);
  process.exitCode = exitCodeOf(err);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run', { isDefault: true })
    .description('Log in, crawl the site and exercise every page it reaches')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--module <name>', 'Only crawl this configured module')
    .option('--strategy <bfs|dfs>', 'Crawl order', parseStrategy)
    .option('--max-pages <n>', 'Page budget', parsePositiveInt)
    .option('--max-depth <n>', 'Maximum link depth', parseNonNegativeInt)
    .option('--headless', 'Run browser headless')
    .option('--output <dir>', 'Output directory')
    .option('--json', 'Write the session JSON to stdout')
    .action(async (opts: RunOptions) => {
      try {
        const config = await resolveConfig(opts.config, {
          module: opts.module,
          strategy: opts.strategy,
          maxPages: opts.maxPages,
          maxDepth: opts.maxDepth,
          headless: opts.headless,
          outputDir: opts.output,
        });

        const outcome = await runSession(config);

        if (opts.json) {
          process.stdout.write(serializeJSON(outcome.session) + '\n');
        }
        process.exitCode = outcome.exitCode;
      } catch (err) {
        reportFailure(err);
      }
    });
}

export function registerSmokeCommand(program: Command): void {
  program
    .command('smoke')
    .description('Load one page and fail if it logs a console error')
    .argument('[url]', 'Page to load (defaults to baseUrl)')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG)
    .option('--headless', 'Run browser headless')
    .action(async (url: string | undefined, opts: { config: string; headless?: true }) => {
      try {
        const config = await resolveConfig(opts.config, { headless: opts.headless });
        const result = await runSmoke(config, url);
        process.exitCode = result.exitCode;
      } catch (err) {
        reportFailure(err);
      }
    });
}

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Render the markdown report of a saved session.json')
    .argument('<session>', 'Path to session.json')
    .option('--out <file>', 'Write the report here instead of stdout')
    .action(async (sessionPath: string, opts: { out?: string }) => {
      try {
        const raw: unknown = JSON.parse(await readFile(sessionPath, 'utf-8'));
        const markdown = generateMarkdown(parseTestSession(raw));
        if (opts.out !== undefined) {
          await writeFile(opts.out, markdown, 'utf-8');
          log.info(`Report saved to: ${opts.out}`);
        } else {
          process.stdout.write(markdown + '\n');
        }
      } catch (err) {
        reportFailure(err);
      }
    });
}
