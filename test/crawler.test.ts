import { ElementTester } from '../src/browser/interact.js';
import { parseConfig } from '../src/config/loader.js';
import { ErrorCollector } from '../src/core/capture.js';
import { runCrawl } from '../src/core/crawler.js';
import { RouteSeedSource } from '../src/crawl/routeSeeds.js';
import type { FileConfig } from '../src/schema/config.js';
import { sessionExitCode } from '../src/schema/results.js';
import { FakePage, FakeTimeoutError } from './fakes.js';
import type { FakeElementInit, FakeSite } from './fakes.js';

const ROOT = 'https://ex.com/';
const T0 = Date.parse('2024-05-01T08:00:00.000Z');

interface ConfigExtras {
  crawl?: Record<string, unknown>;
  [key: string]: unknown;
}

function configWith(extra: ConfigExtras = {}): FileConfig {
  return parseConfig({
    baseUrl: 'https://ex.com',
    exclusions: { urlPatterns: ['logout'], elementSelectors: ['#logout'] },
    discovery: { expandNavigation: false, scroll: false },
    screenshots: { onError: false },
    ...extra,
    crawl: {
      strategy: 'bfs',
      maxDepth: 3,
      maxPages: 10,
      crawlDelayMs: 0,
      elementDelayMs: 0,
      ...extra.crawl,
    },
  });
}

function links(...hrefs: string[]): FakeElementInit[] {
  return hrefs.map((href) => ({ selectors: ['a[href]'], attrs: { href } }));
}

function harness(config: FileConfig, sites: Record<string, FakeSite>, startUrl = ROOT) {
  const page = new FakePage(sites, startUrl);
  const collector = new ErrorCollector(config.errors);
  const tester = new ElementTester(page, {
    elementTimeout: config.timeouts.element,
    navigationTimeout: config.timeouts.navigation,
    popupTimeout: 0,
    navigationWaitUntil: config.timeouts.navigationWaitUntil,
    interactionDelayMs: 0,
    screenshots: config.screenshots,
    screenshotDir: '/tmp/shots',
  });
  return { page, collector, tester, clock: () => T0 };
}

const SITE: Record<string, FakeSite> = {
  [ROOT]: { title: 'Home', elements: links('/a', '/b', '/logout') },
  'https://ex.com/a': { title: 'A' },
  'https://ex.com/b': { title: 'B', elements: links('/c/', '/') },
  'https://ex.com/c': { loadError: new FakeTimeoutError() },
};

describe('runCrawl', () => {
  beforeEach(() => {
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should crawl breadth-first and record a page that fails to load', async () => {
    const config = configWith();

    const session = await runCrawl(config, harness(config, SITE));

    expect(session.pages.map((p) => p.url)).toEqual([
      'https://ex.com/',
      'https://ex.com/a',
      'https://ex.com/b',
      'https://ex.com/c',
    ]);
    expect(session.pages.map((p) => p.discoveredFrom)).toEqual([
      'Start Page',
      'https://ex.com/',
      'https://ex.com/',
      'https://ex.com/b',
    ]);
    expect(session.pages.map((p) => p.crawlDepth)).toEqual([0, 1, 1, 2]);

    const failed = session.pages[3];
    expect(failed?.status).toBe('failed');
    expect(failed?.failure?.message).toBe('Page load timeout after 30000ms');
    expect(failed?.failure?.explanation.title).toBe('Page Load Timeout');

    expect(session.pages[0]?.title).toBe('Home');
    expect(session.pages[0]?.discoveredLinks).toEqual(['https://ex.com/a', 'https://ex.com/b']);
    expect(session.crawlPath[0]).toEqual({
      stepNumber: 1,
      url: 'https://ex.com/',
      title: 'Home',
      discoveredFrom: 'Start Page',
      status: 'passed',
      linksFound: 2,
      module: 'Uncategorized',
    });
    expect(session.strategy).toBe('bfs');
    expect(session.module).toBeNull();
    expect(session.startedAt).toBe('2024-05-01T08:00:00.000Z');
    expect(session.durationMs).toBe(0);
    expect(sessionExitCode(session)).toBe(1);
  });

  it('should crawl depth-first when configured', async () => {
    const config = configWith({ crawl: { strategy: 'dfs' } });

    const session = await runCrawl(config, harness(config, SITE));

    expect(session.pages.map((p) => p.url)).toEqual([
      'https://ex.com/',
      'https://ex.com/b',
      'https://ex.com/c',
      'https://ex.com/a',
    ]);
  });

  it('should stop at the page budget', async () => {
    const config = configWith({ crawl: { maxPages: 2 } });

    const session = await runCrawl(config, harness(config, SITE));

    expect(session.pages).toHaveLength(2);
    expect(session.crawlPath.map((s) => s.stepNumber)).toEqual([1, 2]);
  });

  it('should warn about errors captured while a page loads', async () => {
    const config = configWith();
    const sites: Record<string, FakeSite> = {};
    const deps = harness(config, sites);
    sites[ROOT] = {
      title: 'Home',
      onLoad: () => {
        deps.collector.recordResponse({
          url: 'https://ex.com/api/feed',
          method: 'GET',
          status: 500,
          statusText: 'Internal Server Error',
        });
      },
    };

    const session = await runCrawl(config, deps);

    expect(session.pages[0]?.status).toBe('warning');
    expect(session.pages[0]?.networkErrors.map((e) => e.url)).toEqual(['https://ex.com/api/feed']);
    expect(sessionExitCode(session)).toBe(2);
  });

  it('should stay inside the selected module', async () => {
    const config = configWith({
      modules: {
        pets: ['https://ex.com/pawmatch'],
        grooming: ['https://ex.com/grooming'],
      },
      singleModule: 'pets',
    });
    const deps = harness(config, {
      [ROOT]: { elements: links('/pawmatch') },
      'https://ex.com/pawmatch': {
        title: 'Pets',
        elements: links('/pawmatch/profile', '/grooming', '/about'),
      },
      'https://ex.com/pawmatch/profile': { title: 'Profile' },
    });

    const session = await runCrawl(config, deps);

    expect(session.pages.map((p) => p.url)).toEqual([
      'https://ex.com/pawmatch',
      'https://ex.com/pawmatch/profile',
    ]);
    expect(session.strategy).toBe('dfs');
    expect(session.module).toBe('pets');
    expect(session.seeds.moduleSeeds).toBe(1);
    expect(session.pages[0]?.discoveredFrom).toBe('Module Seed: pets');
    expect(session.pages.map((p) => p.module)).toEqual(['pets', 'pets']);
  });

  it('should seed routes and queue routes made expandable by learned values', async () => {
    const config = configWith({ crawl: { maxDepth: 0 } });
    const routeSeeds = new RouteSeedSource(['/orders', '/orders/:id'], 'https://ex.com', {}, {
      includeDynamic: true,
      skipMissing: true,
      maxExpansionsPerPath: 100,
    });
    const deps = harness(config, {
      [ROOT]: { title: 'Home' },
      'https://ex.com/orders': { title: 'Orders', elements: links('/orders/7') },
      'https://ex.com/orders/7': { title: 'Order 7' },
    });

    const session = await runCrawl(config, { ...deps, routeSeeds });

    expect(session.pages.map((p) => p.url)).toEqual([
      'https://ex.com/orders',
      'https://ex.com/',
      'https://ex.com/orders/7',
    ]);
    expect(session.pages.map((p) => p.discoveredFrom)).toEqual([
      'Route Seed',
      'Start Page',
      'Route Seed (dynamic)',
    ]);
    expect(session.seeds).toEqual({ moduleSeeds: 0, routeSeeds: 1, dynamicRouteSeeds: 1 });
  });

  it('should crawl pages reached by clicking elements', async () => {
    const config = configWith();
    const deps = harness(config, {
      [ROOT]: {
        title: 'Home',
        elements: [
          {
            selectors: ['button:visible'],
            attrs: { id: 'open' },
            innerText: 'Open',
            onClick: (page) => page.navigateTo('https://ex.com/secret'),
          },
        ],
      },
      'https://ex.com/secret': { title: 'Secret' },
    });

    const session = await runCrawl(config, deps);

    const home = session.pages[0];
    expect(home?.elementTests.map((e) => [e.selector, e.status, e.navigatedTo])).toEqual([
      ['#open', 'passed', 'https://ex.com/secret'],
    ]);
    expect(home?.discoveredLinks).toEqual(['https://ex.com/secret']);
    expect(session.pages.map((p) => p.url)).toEqual(['https://ex.com/', 'https://ex.com/secret']);
    expect(session.pages[1]?.crawlDepth).toBe(1);
  });
});
