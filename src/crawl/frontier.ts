import type { CrawlStrategy } from '../schema/config.js';

// ── Public types ─────────────────────────────────────────────

export interface FrontierEntry {
  readonly url: string;
  readonly discoveredFrom: string;
  readonly depth: number;
}

export const SEED_LABELS = {
  START_PAGE: 'Start Page',
  ROUTE_SEED: 'Route Seed',
  DYNAMIC_ROUTE_SEED: 'Route Seed (dynamic)',
  moduleSeed: (name: string): string => `Module Seed: ${name}`,
} as const;

export interface CrawlStateOptions {
  strategy: CrawlStrategy;
  maxDepth: number;
  maxPages: number;
  /** A single-module run always walks depth-first. */
  forceDfs?: boolean | undefined;
  /** Extra admission predicate (module bounds); every URL passes by default. */
  accepts?: ((url: string) => boolean) | undefined;
}

// ── Crawl state ──────────────────────────────────────────────

/**
 * Frontier, visited set and seed bookkeeping for one run. All mutation
 * goes through these methods; nothing here touches the browser.
 *
 * A URL is tested at most once: it enters `visited` when dequeued and is
 * never enqueued again afterwards.
 */
export class CrawlState {
  readonly strategy: CrawlStrategy;
  readonly maxDepth: number;
  readonly maxPages: number;

  private readonly frontier: FrontierEntry[] = [];
  private readonly queued = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly seenSeeds = new Set<string>();
  private readonly accepts: (url: string) => boolean;
  private tested = 0;

  constructor(options: CrawlStateOptions) {
    this.strategy = options.forceDfs ? 'dfs' : options.strategy;
    this.maxDepth = options.maxDepth;
    this.maxPages = options.maxPages;
    this.accepts = options.accepts ?? (() => true);
  }

  get pagesTested(): number {
    return this.tested;
  }

  get size(): number {
    return this.frontier.length;
  }

  get budgetExhausted(): boolean {
    return this.tested >= this.maxPages;
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  isQueued(url: string): boolean {
    return this.queued.has(url);
  }

  /** Pending entries in append order. */
  pending(): readonly FrontierEntry[] {
    return [...this.frontier];
  }

  // ── Enqueue ───────────────────────────────────────────────

  /**
   * Append an entry unless its URL was already tested or is already
   * waiting, it is deeper than `maxDepth`, or the admission predicate
   * rejects it. Returns whether it was appended.
   */
  enqueue(entry: FrontierEntry): boolean {
    if (entry.depth < 0 || entry.depth > this.maxDepth) return false;
    if (this.visited.has(entry.url) || this.queued.has(entry.url)) return false;
    if (!this.accepts(entry.url)) return false;

    this.frontier.push(entry);
    this.queued.add(entry.url);
    return true;
  }

  seed(url: string, label: string): boolean {
    return this.enqueue({ url, discoveredFrom: label, depth: 0 });
  }

  /**
   * Route seeds are offered at most once per run, even if a later
   * re-expansion produces the same URL again.
   */
  seedRoute(url: string, label: string): boolean {
    if (this.seenSeeds.has(url)) return false;
    this.seenSeeds.add(url);
    return this.seed(url, label);
  }

  /** Feed links found on `from` back as children one level deeper. */
  admitLinks(links: Iterable<string>, from: FrontierEntry): number {
    let added = 0;
    for (const url of links) {
      const appended = this.enqueue({
        url,
        discoveredFrom: from.url,
        depth: from.depth + 1,
      });
      if (appended) added++;
    }
    return added;
  }

  // ── Dequeue ───────────────────────────────────────────────

  /**
   * Next entry to test, or undefined when the frontier is empty or the
   * page budget is spent. DFS takes the newest entry, BFS the oldest.
   * Visited or too-deep entries are dropped on the way.
   */
  next(): FrontierEntry | undefined {
    while (!this.budgetExhausted) {
      const entry = this.strategy === 'dfs' ? this.frontier.pop() : this.frontier.shift();
      if (entry === undefined) return undefined;

      this.queued.delete(entry.url);
      if (this.visited.has(entry.url) || entry.depth > this.maxDepth) continue;

      this.visited.add(entry.url);
      this.tested++;
      return entry;
    }
    return undefined;
  }
}
