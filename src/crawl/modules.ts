// ── Module definitions ───────────────────────────────────────

export const UNCATEGORIZED = 'Uncategorized';

export interface ModuleDefinition {
  readonly name: string;
  readonly seeds: readonly string[];
}

/** Config order is declaration order; attribution depends on it. */
export function toModuleList(
  modules: Readonly<Record<string, readonly string[]>>,
): ModuleDefinition[] {
  return Object.entries(modules).map(([name, seeds]) => ({ name, seeds }));
}

export function findModule(
  modules: readonly ModuleDefinition[],
  name: string,
): ModuleDefinition | undefined {
  return modules.find((m) => m.name === name);
}

// ── Matching ─────────────────────────────────────────────────

/**
 * True when `url` sits under one of the module's seed paths: same scheme
 * and host, and a slash-bounded path prefix (`/shop` covers `/shop` and
 * `/shop/cart`, not `/shopping`). Unknown or seedless modules match nothing.
 */
export function isUrlInModule(
  url: string,
  moduleName: string,
  modules: readonly ModuleDefinition[],
): boolean {
  const module = findModule(modules, moduleName);
  if (!module || module.seeds.length === 0) return false;

  const parsed = parseUrl(url);
  if (!parsed) return false;

  return module.seeds.some((seed) => matchesSeed(parsed, seed));
}

/**
 * First module (in declaration order) whose seed prefix covers `url`.
 * Overlapping prefixes are resolved by that order, not by specificity.
 */
export function resolveModule(
  url: string,
  modules: readonly ModuleDefinition[],
): string {
  const parsed = parseUrl(url);
  if (!parsed) return UNCATEGORIZED;

  for (const module of modules) {
    if (module.seeds.some((seed) => matchesSeed(parsed, seed))) {
      return module.name;
    }
  }
  return UNCATEGORIZED;
}

// ── Helpers ──────────────────────────────────────────────────

function matchesSeed(url: URL, seed: string): boolean {
  const seedUrl = parseUrl(seed);
  if (!seedUrl) return false;
  if (url.protocol !== seedUrl.protocol || url.host !== seedUrl.host) {
    return false;
  }

  const seedPath = trimTrailingSlashes(seedUrl.pathname);
  const urlPath = trimTrailingSlashes(url.pathname);
  return urlPath === seedPath || urlPath.startsWith(`${seedPath}/`);
}

function trimTrailingSlashes(path: string): string {
  return path.replace(/\/+$/, '');
}

function parseUrl(url: string): URL | null {
  try {
    return new URL(url);
  } catch {
    return null;
  }
}
