import type { FileConfig } from '../schema/config.js';
import type { ElementTestResult, PageFailure, PageTestResult } from '../schema/results.js';
import { computePageStatus } from '../schema/results.js';
import type { PageDriver } from '../browser/driver.js';
import { errorMessage, isTimeoutError } from '../browser/driver.js';
import type { DiscoveryContext } from '../browser/discover.js';
import { discoverInteractiveElements, discoverLinks } from '../browser/discover.js';
import { expandNavigation, scrollForLazyContent } from '../browser/expand.js';
import type { ElementTester } from '../browser/interact.js';
import type { FrontierEntry } from '../crawl/frontier.js';
import type { ModuleDefinition } from '../crawl/modules.js';
import { resolveModule } from '../crawl/modules.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { ErrorCollector } from './capture.js';
import { explainElementError, explainPageError } from './explanations.js';

// ── Errors ───────────────────────────────────────────────────

/** The page itself could not be loaded; fatal to this page only. */
export class NavigationError extends Error {
  constructor(
    readonly url: string,
    message: string,
  ) {
    super(message);
    this.name = 'NavigationError';
  }
}

// ── Context ──────────────────────────────────────────────────

export interface PageTestContext {
  page: PageDriver;
  collector: ErrorCollector;
  tester: ElementTester;
  discovery: DiscoveryContext;
  modules: readonly ModuleDefinition[];
  config: Pick<FileConfig, 'crawl' | 'timeouts' | 'discovery' | 'screenshots'>;
  clock?: () => number;
}

// ── Steps ────────────────────────────────────────────────────

async function loadPage(ctx: PageTestContext, url: string): Promise<void> {
  const { timeouts } = ctx.config;
  try {
    await ctx.page.goto(url, { timeout: timeouts.pageLoad, waitUntil: timeouts.pageWaitUntil });
  } catch (err) {
    const message = isTimeoutError(err)
      ? `Page load timeout after ${String(timeouts.pageLoad)}ms`
      : errorMessage(err).slice(0, LIMITS.ERROR_MESSAGE_CHARS);
    throw new NavigationError(url, message);
  }
}

/** Links first, then expansion and scrolling, then a rescan. */
async function collectLinks(ctx: PageTestContext): Promise<Set<string>> {
  const links = new Set(await discoverLinks(ctx.page, ctx.discovery));
  const { discovery, timeouts, crawl } = ctx.config;

  let changed = false;
  if (discovery.expandNavigation) {
    const clicks = await expandNavigation(ctx.page, ctx.discovery, {
      maxExpandClicks: discovery.maxExpandClicks,
      clickSelectors: discovery.clickSelectors,
      excludedText: discovery.excludedText,
      clickTimeout: timeouts.element,
      settleMs: crawl.elementDelayMs,
    });
    if (clicks > 0) log.detail(`Expanded ${String(clicks)} navigation toggles`);
    changed = clicks > 0;
  }
  if (discovery.scroll) {
    const scrolled = await scrollForLazyContent(ctx.page, {
      steps: discovery.scrollSteps,
      pauseMs: discovery.scrollPauseMs,
      toTop: discovery.scrollToTop,
    });
    changed = changed || scrolled;
  }

  if (changed) {
    for (const link of await discoverLinks(ctx.page, ctx.discovery)) links.add(link);
  }
  return links;
}

async function testElements(ctx: PageTestContext): Promise<ElementTestResult[]> {
  const elements = await discoverInteractiveElements(ctx.page, ctx.discovery);
  log.detail(`Found ${String(elements.length)} interactive elements`);

  const results: ElementTestResult[] = [];
  for (const element of elements) {
    try {
      const result = await ctx.tester.test(element);
      if (result.status === 'failed' && result.errorMessage !== undefined) {
        result.explanation = explainElementError(result.errorMessage, result.elementType);
      }
      results.push(result);
    } catch (err) {
      log.warn(`Error testing element ${element.selector}: ${errorMessage(err)}`);
    }
  }
  return results;
}

/** Where clicks led, when those targets are themselves crawlable. */
function navigationTargets(ctx: PageTestContext, results: readonly ElementTestResult[]): string[] {
  const pageUrl = ctx.page.url();
  const targets: string[] = [];
  for (const result of results) {
    const target = result.navigatedTo;
    if (target === undefined || !ctx.discovery.policy.isValid(target, pageUrl)) continue;
    const normalized = ctx.discovery.policy.normalize(target, pageUrl);
    if (normalized !== null && !ctx.discovery.isVisited(normalized)) targets.push(normalized);
  }
  return targets;
}

// ── Page test ────────────────────────────────────────────────

/**
 * Load one frontier entry and exercise everything on it. Never throws:
 * a page that cannot be loaded comes back as a failed result.
 */
export async function testPage(
  ctx: PageTestContext,
  entry: FrontierEntry,
): Promise<PageTestResult> {
  const clock = ctx.clock ?? Date.now;
  const base = {
    url: entry.url,
    crawlDepth: entry.depth,
    discoveredFrom: entry.discoveredFrom,
    module: resolveModule(entry.url, ctx.modules),
    timestamp: new Date(clock()).toISOString(),
  };

  // errors left over from the previous page or from login
  ctx.collector.flush();

  const started = clock();
  try {
    await loadPage(ctx, entry.url);
  } catch (err) {
    const message = errorMessage(err);
    log.error(`Page load failed: ${message}`);
    const failure: PageFailure = { message, explanation: explainPageError(message) };
    const captured = ctx.collector.flush();
    const result: PageTestResult = {
      ...base,
      title: '',
      status: 'failed',
      loadTimeMs: Math.max(0, clock() - started),
      failure,
      networkErrors: captured.networkErrors,
      consoleErrors: captured.consoleErrors,
      elementTests: [],
      discoveredLinks: [],
    };
    await attachPageScreenshot(ctx, result);
    return result;
  }
  const loadTimeMs = Math.max(0, clock() - started);

  const title = await ctx.page.title();
  await ctx.page.wait(ctx.config.crawl.crawlDelayMs);

  const links = await collectLinks(ctx);
  const elementTests = await testElements(ctx);
  for (const target of navigationTargets(ctx, elementTests)) links.add(target);

  const captured = ctx.collector.flush();
  const result: PageTestResult = {
    ...base,
    title,
    status: 'passed',
    loadTimeMs,
    networkErrors: captured.networkErrors,
    consoleErrors: captured.consoleErrors,
    elementTests,
    discoveredLinks: [...links],
  };
  result.status = computePageStatus(result);

  if (result.status !== 'passed') await attachPageScreenshot(ctx, result);
  return result;
}

async function attachPageScreenshot(ctx: PageTestContext, result: PageTestResult): Promise<void> {
  if (!ctx.config.screenshots.onError) return;
  const path = await ctx.tester.screenshot(`page_${result.status}`);
  if (path !== undefined) result.screenshotPath = path;
}
