import type { ModuleDefinition } from './modules.js';
import { isUrlInModule } from './modules.js';

// ── Normalization ────────────────────────────────────────────

export interface NormalizeOptions {
  includeQuery: boolean;
  includeHash: boolean;
}

/**
 * Canonical form used as the dedup key for pages:
 * `scheme://host/path[?query][#fragment]`.
 *
 * Relative URLs resolve against `contextUrl` (the page's current URL).
 * Trailing slashes are removed from every path except `/`, so the result is
 * a fixed point: normalizing it again returns the same string.
 * Returns null when the input cannot be parsed.
 */
export function normalizeUrl(
  contextUrl: string,
  rawUrl: string,
  options: NormalizeOptions,
): string | null {
  const url = resolveUrl(contextUrl, rawUrl);
  if (!url) return null;

  const path = url.pathname.replace(/\/+$/, '') || '/';
  let normalized = `${url.protocol}//${url.host}${path}`;

  // `search` and `hash` are "" for both an absent and an empty component
  if (options.includeQuery && url.search) {
    normalized += url.search;
  }
  if (options.includeHash && url.hash) {
    normalized += url.hash;
  }

  return normalized;
}

export function resolveUrl(contextUrl: string, rawUrl: string): URL | null {
  try {
    return new URL(rawUrl.trim(), contextUrl);
  } catch {
    return null;
  }
}

export function originOf(url: string): string {
  const parsed = resolveUrl(url, url);
  return parsed ? parsed.origin : url.replace(/\/+$/, '');
}

/** `#`, `javascript:` and `void(0)` targets do not navigate. */
export function isNonNavigatingHref(href: string): boolean {
  const lower = href.trim().toLowerCase();
  return (
    lower === '' ||
    lower === '#' ||
    lower.startsWith('javascript:') ||
    lower.includes('void(0)')
  );
}

// ── Validity policy ──────────────────────────────────────────

export interface UrlPolicyOptions {
  baseUrl: string;
  excludedPatterns: readonly string[];
  modules: readonly ModuleDefinition[];
  moduleFilter?: string | undefined;
  normalize: NormalizeOptions;
}

/**
 * Decides which URLs the crawl may visit and gives them their canonical
 * form. Bound to the target origin and, optionally, to one module.
 */
export class UrlPolicy {
  readonly moduleFilter: string | undefined;
  readonly modules: readonly ModuleDefinition[];
  private readonly base: URL;
  private readonly excluded: readonly string[];
  private readonly normalizeOptions: NormalizeOptions;

  constructor(options: UrlPolicyOptions) {
    const base = resolveUrl(options.baseUrl, options.baseUrl);
    if (!base) {
      throw new TypeError(`Invalid base URL: ${options.baseUrl}`);
    }
    this.base = base;
    this.excluded = options.excludedPatterns.map((p) => p.toLowerCase());
    this.modules = options.modules;
    this.moduleFilter = options.moduleFilter;
    this.normalizeOptions = options.normalize;
  }

  get origin(): string {
    return this.base.origin;
  }

  normalize(rawUrl: string, contextUrl: string): string | null {
    return normalizeUrl(contextUrl, rawUrl, this.normalizeOptions);
  }

  /**
   * http(s) only, same scheme and host as the target, no excluded
   * substring anywhere in the absolute URL, and inside the selected
   * module when a module filter is active.
   */
  isValid(rawUrl: string, contextUrl: string): boolean {
    if (!rawUrl.trim()) return false;

    const url = resolveUrl(contextUrl, rawUrl);
    if (!url) return false;

    if (url.protocol !== 'http:' && url.protocol !== 'https:') return false;
    if (!this.isSameOrigin(url)) return false;

    const lower = url.href.toLowerCase();
    if (this.excluded.some((pattern) => lower.includes(pattern))) return false;

    return this.inScope(url.href);
  }

  isSameOrigin(url: URL): boolean {
    return url.protocol === this.base.protocol && url.host === this.base.host;
  }

  /** Module-filter check alone; always true without a filter. */
  inScope(absoluteUrl: string): boolean {
    if (this.moduleFilter === undefined) return true;
    return isUrlInModule(absoluteUrl, this.moduleFilter, this.modules);
  }
}
