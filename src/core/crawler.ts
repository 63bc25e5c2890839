import type { FileConfig } from '../schema/config.js';
import type { CrawlPathStep, PageTestResult, SeedStats, TestSession } from '../schema/results.js';
import type { PageDriver } from '../browser/driver.js';
import type { DiscoveryContext } from '../browser/discover.js';
import type { ElementTester } from '../browser/interact.js';
import { CrawlState, SEED_LABELS } from '../crawl/frontier.js';
import type { FrontierEntry } from '../crawl/frontier.js';
import type { ModuleDefinition } from '../crawl/modules.js';
import { toModuleList } from '../crawl/modules.js';
import type { ExpansionResult, RouteSeedSource } from '../crawl/routeSeeds.js';
import { UrlPolicy } from '../crawl/urls.js';
import * as log from '../utils/logger.js';
import type { ErrorCollector } from './capture.js';
import { testPage } from './pageTest.js';
import type { PageTestContext } from './pageTest.js';

// ── Public types ─────────────────────────────────────────────

export interface CrawlDeps {
  page: PageDriver;
  collector: ErrorCollector;
  tester: ElementTester;
  routeSeeds?: RouteSeedSource | undefined;
  clock?: () => number;
}

// ── Seeding ──────────────────────────────────────────────────

function logExpansion(expansion: ExpansionResult, dynamic: boolean): void {
  const s = expansion.stats;
  if (!dynamic) {
    log.seeds(
      `Route table: ${String(s.totalPaths)} paths (${String(s.staticPaths)} static, ` +
        `${String(s.dynamicPaths)} dynamic, ${String(s.dynamicExpanded)} expanded, ` +
        `${String(s.skippedMissing)} missing values)`,
    );
  }
  if (s.truncatedPaths > 0) {
    log.warn(`${String(s.truncatedPaths)} dynamic route(s) hit the per-path expansion cap`);
  }
}

function seedModules(
  state: CrawlState,
  policy: UrlPolicy,
  modules: readonly ModuleDefinition[],
): number {
  let added = 0;
  for (const module of modules) {
    if (policy.moduleFilter !== undefined && module.name !== policy.moduleFilter) continue;
    for (const seed of module.seeds) {
      const url = policy.normalize(seed, seed);
      if (url !== null && state.seed(url, SEED_LABELS.moduleSeed(module.name))) added++;
    }
  }
  return added;
}

/** Route seeds pass the same validity rules as discovered links. */
function seedRoutes(
  state: CrawlState,
  policy: UrlPolicy,
  urls: readonly string[],
  label: string,
): number {
  let added = 0;
  for (const raw of urls) {
    if (!policy.isValid(raw, raw)) continue;
    const url = policy.normalize(raw, raw);
    if (url !== null && state.seedRoute(url, label)) added++;
  }
  return added;
}

function seedStartPage(state: CrawlState, policy: UrlPolicy, startUrl: string): void {
  if (!/^https?:/i.test(startUrl)) {
    log.warn(`Start page ${startUrl} is not an http(s) page, not seeding it`);
    return;
  }
  const url = policy.normalize(startUrl, startUrl);
  if (url === null) return;

  if (!policy.inScope(url)) {
    log.warn(`Start page ${url} is outside module "${String(policy.moduleFilter)}", skipping it`);
    return;
  }
  state.seed(url, SEED_LABELS.START_PAGE);
}

// ── Crawl loop ───────────────────────────────────────────────

function pathStep(step: number, page: PageTestResult): CrawlPathStep {
  return {
    stepNumber: step,
    url: page.url,
    title: page.title,
    discoveredFrom: page.discoveredFrom,
    status: page.status,
    linksFound: page.discoveredLinks.length,
    module: page.module,
  };
}

function summaryLine(page: PageTestResult): string {
  const failed = page.elementTests.filter((e) => e.status === 'failed').length;
  return (
    `${String(Math.round(page.loadTimeMs))}ms, ` +
    `${String(page.networkErrors.length)} network / ${String(page.consoleErrors.length)} console errors, ` +
    `${String(page.elementTests.length)} elements (${String(failed)} failed)`
  );
}

/**
 * Seed the frontier, then test pages one at a time until the frontier is
 * empty or the page budget is spent. Links found on each page, and route
 * seeds made producible by parameter values learned there, feed back into
 * the frontier.
 */
export async function runCrawl(config: FileConfig, deps: CrawlDeps): Promise<TestSession> {
  const clock = deps.clock ?? Date.now;
  const startedAt = clock();

  const modules = toModuleList(config.modules);
  const moduleFilter = config.singleModule ?? undefined;
  const policy = new UrlPolicy({
    baseUrl: config.baseUrl,
    excludedPatterns: config.exclusions.urlPatterns,
    modules,
    moduleFilter,
    normalize: {
      includeQuery: config.crawl.includeQuery,
      includeHash: config.crawl.includeHash,
    },
  });

  const state = new CrawlState({
    strategy: config.crawl.strategy,
    maxDepth: config.crawl.maxDepth,
    maxPages: config.crawl.maxPages,
    forceDfs: moduleFilter !== undefined,
    accepts: (url) => policy.inScope(url),
  });

  const seeds: SeedStats = { moduleSeeds: 0, routeSeeds: 0, dynamicRouteSeeds: 0 };
  seeds.moduleSeeds = seedModules(state, policy, modules);

  if (deps.routeSeeds) {
    const expansion = deps.routeSeeds.expand();
    logExpansion(expansion, false);
    seeds.routeSeeds = seedRoutes(state, policy, expansion.urls, SEED_LABELS.ROUTE_SEED);
  }

  seedStartPage(state, policy, deps.page.url());
  log.seeds(
    `${String(seeds.moduleSeeds)} module seeds, ${String(seeds.routeSeeds)} route seeds, ` +
      `${String(state.size)} queued (${state.strategy.toUpperCase()})`,
  );

  const discovery: DiscoveryContext = {
    policy,
    excludedSelectors: config.exclusions.elementSelectors,
    isVisited: (url) => state.isVisited(url),
  };
  const ctx: PageTestContext = {
    page: deps.page,
    collector: deps.collector,
    tester: deps.tester,
    discovery,
    modules,
    config,
    clock,
  };

  const pages: PageTestResult[] = [];
  const crawlPath: CrawlPathStep[] = [];

  let entry: FrontierEntry | undefined;
  while ((entry = state.next()) !== undefined) {
    log.page(state.pagesTested, state.maxPages, entry.url);

    const result = await testPage(ctx, entry);
    pages.push(result);
    crawlPath.push(pathStep(state.pagesTested, result));
    log.pageResult(result.status, summaryLine(result));

    const added = state.admitLinks(result.discoveredLinks, entry);
    log.detail(`Queued ${String(added)} new links (depth ${String(entry.depth)})`);

    if (deps.routeSeeds && config.routeSeeds.learnParams) {
      const learned = deps.routeSeeds.learnFrom([
        entry.url,
        deps.page.url(),
        ...result.discoveredLinks,
      ]);
      if (learned.expansion) {
        logExpansion(learned.expansion, true);
        const dynamic = seedRoutes(
          state,
          policy,
          learned.expansion.urls,
          SEED_LABELS.DYNAMIC_ROUTE_SEED,
        );
        seeds.dynamicRouteSeeds += dynamic;
        if (dynamic > 0) {
          log.seeds(`Learned ${String(learned.added)} route values, queued ${String(dynamic)} seeds`);
        }
      }
    }
  }

  const finishedAt = clock();
  return {
    websiteUrl: config.baseUrl,
    strategy: state.strategy,
    module: moduleFilter ?? null,
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: new Date(finishedAt).toISOString(),
    durationMs: Math.max(0, Math.round(finishedAt - startedAt)),
    pages,
    crawlPath,
    seeds,
  };
}
