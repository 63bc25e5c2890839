/**
 * Route seeds from a client-side route table.
 *
 * Best effort by construction: path literals are found by pattern matching
 * (`path="/x"`, `path={'/x'}`, `path: "/x"`), not by parsing the file, so
 * paths assembled from constants or expressions at runtime are invisible.
 * Treat the output as a coverage heuristic, never as the site's route list.
 */

import { readFile } from 'node:fs/promises';

// ── Types ────────────────────────────────────────────────────

/** Path template such as `/orders/:id`. */
export type RoutePath = string;

/** Parameter name → known concrete values, insertion-ordered. */
export type RouteParamValues = Record<string, string[]>;

export interface RouteMatcher {
  readonly path: RoutePath;
  readonly pattern: RegExp;
  readonly params: readonly string[];
}

export interface ExpandOptions {
  includeDynamic: boolean;
  /** Kept for config compatibility: a path with an unknown segment is skipped either way. */
  skipMissing: boolean;
  maxExpansionsPerPath: number;
}

export interface RouteSeedStats {
  totalPaths: number;
  staticPaths: number;
  dynamicPaths: number;
  dynamicExpanded: number;
  skippedMissing: number;
  truncatedPaths: number;
}

export interface ExpansionResult {
  urls: string[];
  stats: RouteSeedStats;
}

const PATH_PATTERN = /\bpath\s*(?:=\s*\{?|:)\s*(['"`])([^'"`]+)\1/g;

const SENTINEL_VALUES = new Set(['', 'undefined', 'null', 'none', 'nan']);

// ── Extraction ───────────────────────────────────────────────

export function extractRoutePaths(content: string): RoutePath[] {
  const seen = new Set<string>();
  const paths: RoutePath[] = [];

  for (const match of content.matchAll(PATH_PATTERN)) {
    let path = (match[2] ?? '').trim();
    if (!path || path.includes('*')) continue;
    if (!path.startsWith('/')) path = `/${path}`;
    if (seen.has(path)) continue;
    seen.add(path);
    paths.push(path);
  }

  return paths;
}

export async function loadRoutePaths(
  file: string,
): Promise<{ paths: RoutePath[]; missingFile: boolean }> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return { paths: [], missingFile: true };
    throw err;
  }
  return { paths: extractRoutePaths(content), missingFile: false };
}

// ── Parameter values ─────────────────────────────────────────

function isSentinel(value: string): boolean {
  return SENTINEL_VALUES.has(value.toLowerCase());
}

/**
 * Clean configured values: scalars become one-element lists, values are
 * trimmed and stringified, sentinels and duplicates dropped, and names left
 * with no values removed.
 */
export function normalizeParamValues(
  raw: Readonly<Record<string, unknown>>,
): RouteParamValues {
  const normalized: RouteParamValues = {};

  for (const [name, values] of Object.entries(raw)) {
    if (values === null || values === undefined) continue;
    const list: unknown[] = Array.isArray(values) ? values : [values];

    const cleaned: string[] = [];
    for (const value of list) {
      if (typeof value !== 'string' && typeof value !== 'number') continue;
      const text = String(value).trim();
      if (isSentinel(text) || cleaned.includes(text)) continue;
      cleaned.push(text);
    }

    if (cleaned.length > 0) normalized[name] = cleaned;
  }

  return normalized;
}

/**
 * Add `learned` into `target` without dropping anything already known.
 * Returns the number of values that were new.
 */
export function mergeParamValues(
  target: RouteParamValues,
  learned: Readonly<RouteParamValues>,
): number {
  let added = 0;
  for (const [name, values] of Object.entries(learned)) {
    const known = target[name] ?? [];
    for (const value of values) {
      if (!known.includes(value)) {
        known.push(value);
        added++;
      }
    }
    if (known.length > 0) target[name] = known;
  }
  return added;
}

// ── Matching ─────────────────────────────────────────────────

function segmentsOf(path: string): string[] {
  return path.split('/').filter((s) => s.length > 0);
}

function paramName(segment: string): string | null {
  if (!segment.startsWith(':')) return null;
  const name = segment.slice(1).replace(/\?$/, '');
  return /^\w+$/.test(name) ? name : null;
}

export function dynamicParams(path: RoutePath): string[] {
  return segmentsOf(path)
    .map(paramName)
    .filter((name): name is string => name !== null);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Exact segment count: each `:name` matches one non-slash segment. */
export function buildRouteMatchers(paths: readonly RoutePath[]): RouteMatcher[] {
  const matchers: RouteMatcher[] = [];

  for (const path of paths) {
    const params = dynamicParams(path);
    if (params.length === 0) continue;

    const source = segmentsOf(path)
      .map((segment) => (paramName(segment) !== null ? '([^/]+)' : escapeRegExp(segment)))
      .join('/');
    matchers.push({ path, pattern: new RegExp(`^/${source}$`), params });
  }

  return matchers;
}

/** Harvest parameter values from concrete URLs, sorted per name. */
export function extractParamValues(
  matchers: readonly RouteMatcher[],
  urls: Iterable<string>,
): RouteParamValues {
  const collected = new Map<string, Set<string>>();

  for (const url of urls) {
    let path: string;
    try {
      path = new URL(url).pathname.replace(/\/+$/, '');
    } catch {
      continue;
    }
    if (!path) continue;

    for (const matcher of matchers) {
      const match = matcher.pattern.exec(path);
      if (!match) continue;

      matcher.params.forEach((name, i) => {
        const value = match[i + 1];
        if (value === undefined || isSentinel(value)) return;
        const values = collected.get(name) ?? new Set<string>();
        values.add(value);
        collected.set(name, values);
      });
    }
  }

  const result: RouteParamValues = {};
  for (const [name, values] of collected) {
    result[name] = [...values].sort();
  }
  return result;
}

// ── Expansion ────────────────────────────────────────────────

function emptyStats(totalPaths: number): RouteSeedStats {
  return {
    totalPaths,
    staticPaths: 0,
    dynamicPaths: 0,
    dynamicExpanded: 0,
    skippedMissing: 0,
    truncatedPaths: 0,
  };
}

/**
 * Concrete paths for one template: the cartesian product of the known
 * values of its dynamic segments, first segment varying slowest, capped at
 * `limit`. Returns null when any segment has no known value.
 */
function expandTemplate(
  path: RoutePath,
  paramValues: Readonly<RouteParamValues>,
  limit: number,
): { paths: string[]; truncated: boolean } | null {
  const segments = segmentsOf(path);
  const choices: string[][] = [];

  for (const segment of segments) {
    const name = paramName(segment);
    if (name === null) {
      choices.push([segment]);
      continue;
    }
    const values = paramValues[name];
    if (!values || values.length === 0) return null;
    choices.push([...values]);
  }

  const total = choices.reduce((n, c) => n * c.length, 1);
  const paths: string[] = [];
  const indices = choices.map(() => 0);

  while (paths.length < Math.min(total, limit)) {
    paths.push('/' + indices.map((idx, i) => choices[i]?.[idx] ?? '').join('/'));

    // odometer increment, last segment fastest
    for (let i = indices.length - 1; i >= 0; i--) {
      const size = choices[i]?.length ?? 1;
      const next = (indices[i] ?? 0) + 1;
      if (next < size) {
        indices[i] = next;
        break;
      }
      indices[i] = 0;
    }
  }

  return { paths, truncated: total > limit };
}

export function expandRoutePaths(
  paths: readonly RoutePath[],
  baseOrigin: string,
  paramValues: Readonly<RouteParamValues>,
  options: ExpandOptions,
): ExpansionResult {
  const stats = emptyStats(paths.length);
  const concrete: string[] = [];

  for (const path of paths) {
    if (dynamicParams(path).length === 0) {
      stats.staticPaths++;
      concrete.push(path);
      continue;
    }

    stats.dynamicPaths++;
    if (!options.includeDynamic) continue;

    const expanded = expandTemplate(path, paramValues, options.maxExpansionsPerPath);
    if (!expanded) {
      stats.skippedMissing++;
      continue;
    }
    if (expanded.truncated) stats.truncatedPaths++;
    stats.dynamicExpanded += expanded.paths.length;
    concrete.push(...expanded.paths);
  }

  const seen = new Set<string>();
  const urls: string[] = [];
  for (const path of concrete) {
    const url = new URL(path, baseOrigin).href;
    if (seen.has(url)) continue;
    seen.add(url);
    urls.push(url);
  }

  return { urls, stats };
}

// ── Stateful source ──────────────────────────────────────────

/**
 * Route table plus the parameter values known so far. Values only grow:
 * URLs observed during the crawl teach new values, which can make more
 * dynamic paths expandable.
 */
export class RouteSeedSource {
  private readonly paths: readonly RoutePath[];
  private readonly matchers: readonly RouteMatcher[];
  private readonly params: RouteParamValues;

  constructor(
    paths: readonly RoutePath[],
    private readonly baseOrigin: string,
    initialParams: Readonly<Record<string, unknown>>,
    private readonly options: ExpandOptions,
  ) {
    this.paths = paths;
    this.matchers = buildRouteMatchers(paths);
    this.params = normalizeParamValues(initialParams);
  }

  get routePaths(): readonly RoutePath[] {
    return this.paths;
  }

  get paramValues(): Readonly<RouteParamValues> {
    return this.params;
  }

  expand(): ExpansionResult {
    return expandRoutePaths(this.paths, this.baseOrigin, this.params, this.options);
  }

  /**
   * Learn parameter values from `urls`. When anything new was learned the
   * table is re-expanded and every producible URL is returned; callers
   * dedup against the seeds they already have.
   */
  learnFrom(urls: Iterable<string>): { added: number; expansion: ExpansionResult | null } {
    if (this.matchers.length === 0) return { added: 0, expansion: null };

    const learned = extractParamValues(this.matchers, urls);
    const added = mergeParamValues(this.params, learned);
    return { added, expansion: added > 0 ? this.expand() : null };
  }
}

// ── Helpers ──────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}
