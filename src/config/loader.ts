import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { CrawlStrategy, FileConfig } from '../schema/config.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.pagewalk.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid, before any
 * browser work starts.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse config file ${configPath}: ${reason}`);
  }

  return parseConfig(parsed ?? {});
}

export function parseConfig(data: unknown): FileConfig {
  try {
    return fileConfigSchema.parse(data);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(formatIssues(err));
    }
    throw err;
  }
}

// ── Overrides ────────────────────────────────────────────────

export interface ConfigOverrides {
  module?: string | undefined;
  strategy?: CrawlStrategy | undefined;
  maxPages?: number | undefined;
  maxDepth?: number | undefined;
  headless?: boolean | undefined;
  outputDir?: string | undefined;
}

/**
 * CLI flags take precedence over the file. The result is re-validated so
 * an override can never produce a config the schema would reject.
 */
export function applyOverrides(
  config: FileConfig,
  overrides: ConfigOverrides,
): FileConfig {
  return parseConfig({
    ...config,
    singleModule: overrides.module ?? config.singleModule,
    crawl: {
      ...config.crawl,
      strategy: overrides.strategy ?? config.crawl.strategy,
      maxPages: overrides.maxPages ?? config.crawl.maxPages,
      maxDepth: overrides.maxDepth ?? config.crawl.maxDepth,
    },
    browser: {
      ...config.browser,
      headless: overrides.headless ?? config.browser.headless,
    },
    output: {
      dir: overrides.outputDir ?? config.output.dir,
    },
  });
}

/** Fill login credentials missing from the file from the environment. */
export function applyEnvCredentials(
  config: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): FileConfig {
  const username = config.login.username ?? env['PAGEWALK_USERNAME'];
  const password = config.login.password ?? env['PAGEWALK_PASSWORD'];
  const cookie = config.login.cookie ?? env['PAGEWALK_COOKIE'];

  return {
    ...config,
    login: {
      ...config.login,
      ...(username !== undefined ? { username } : {}),
      ...(password !== undefined ? { password } : {}),
      ...(cookie !== undefined ? { cookie } : {}),
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

function formatIssues(err: ZodError): string {
  const lines = err.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `  ${where}: ${issue.message}`;
  });
  return `Invalid configuration:\n${lines.join('\n')}`;
}
