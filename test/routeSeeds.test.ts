import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  RouteSeedSource,
  buildRouteMatchers,
  dynamicParams,
  expandRoutePaths,
  extractParamValues,
  extractRoutePaths,
  loadRoutePaths,
  mergeParamValues,
  normalizeParamValues,
} from '../src/crawl/routeSeeds.js';
import type { ExpandOptions } from '../src/crawl/routeSeeds.js';

const ORIGIN = 'https://ex.com';
const OPTIONS: ExpandOptions = {
  includeDynamic: true,
  skipMissing: true,
  maxExpansionsPerPath: 50,
};

const ROUTES_SOURCE = `
  const routes = [
    <Route path={'/orders/:id'} element={<Order />} />,
    { path: '/settings', component: Settings },
    <Route path="/users/:userId" />,
    <Route path="*" element={<NotFound />} />,
    { path: "settings" },
    { pathname: "/ignored" },
  ];
`;

describe('extractRoutePaths', () => {
  it('should find path literals in source order without duplicates or wildcards', () => {
    expect(extractRoutePaths(ROUTES_SOURCE)).toEqual(['/orders/:id', '/settings', '/users/:userId']);
  });

  it('should list dynamic parameter names', () => {
    expect(dynamicParams('/teams/:teamId/members/:memberId?')).toEqual(['teamId', 'memberId']);
    expect(dynamicParams('/about')).toEqual([]);
  });
});

describe('loadRoutePaths', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pagewalk-routes-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read paths from a routes file', async () => {
    const file = join(dir, 'routes.tsx');
    await writeFile(file, ROUTES_SOURCE, 'utf-8');

    const result = await loadRoutePaths(file);

    expect(result.missingFile).toBe(false);
    expect(result.paths).toHaveLength(3);
  });

  it('should report a missing file instead of throwing', async () => {
    const result = await loadRoutePaths(join(dir, 'nope.tsx'));

    expect(result).toEqual({ paths: [], missingFile: true });
  });
});

describe('normalizeParamValues', () => {
  it('should stringify, trim and dedup values and drop sentinels', () => {
    expect(
      normalizeParamValues({
        id: [42, ' 42 ', 'null', 7],
        slug: 'intro',
        tag: ['', 'undefined', 'NaN'],
        gone: null,
      }),
    ).toEqual({ id: ['42', '7'], slug: ['intro'] });
  });
});

describe('mergeParamValues', () => {
  it('should add only unseen values', () => {
    const target = { id: ['1'] };

    const added = mergeParamValues(target, { id: ['1', '2'], slug: ['a'] });

    expect(added).toBe(2);
    expect(target).toEqual({ id: ['1', '2'], slug: ['a'] });
  });
});

describe('expandRoutePaths', () => {
  it('should keep static paths and expand known parameters', () => {
    const result = expandRoutePaths(['/settings', '/orders/:id'], ORIGIN, { id: ['42', '99'] }, OPTIONS);

    expect(result.urls).toEqual([
      'https://ex.com/settings',
      'https://ex.com/orders/42',
      'https://ex.com/orders/99',
    ]);
    expect(result.stats).toEqual({
      totalPaths: 2,
      staticPaths: 1,
      dynamicPaths: 1,
      dynamicExpanded: 2,
      skippedMissing: 0,
      truncatedPaths: 0,
    });
  });

  it('should skip a template with any unknown parameter', () => {
    const params = normalizeParamValues({ x: ['1'], y: '' });

    const result = expandRoutePaths(['/a/:x/:y'], ORIGIN, params, OPTIONS);

    expect(result.urls).toEqual([]);
    expect(result.stats.skippedMissing).toBe(1);
  });

  it('should produce the cartesian product with the first segment varying slowest', () => {
    const result = expandRoutePaths(['/t/:a/:b'], ORIGIN, { a: ['1', '2'], b: ['x', 'y'] }, OPTIONS);

    expect(result.urls).toEqual([
      'https://ex.com/t/1/x',
      'https://ex.com/t/1/y',
      'https://ex.com/t/2/x',
      'https://ex.com/t/2/y',
    ]);
  });

  it('should cap expansions per path', () => {
    const result = expandRoutePaths(
      ['/t/:a/:b'],
      ORIGIN,
      { a: ['1', '2'], b: ['x', 'y'] },
      { ...OPTIONS, maxExpansionsPerPath: 3 },
    );

    expect(result.urls).toHaveLength(3);
    expect(result.stats.truncatedPaths).toBe(1);
    expect(result.stats.dynamicExpanded).toBe(3);
  });

  it('should leave dynamic paths out when disabled', () => {
    const result = expandRoutePaths(
      ['/settings', '/orders/:id'],
      ORIGIN,
      { id: ['1'] },
      { ...OPTIONS, includeDynamic: false },
    );

    expect(result.urls).toEqual(['https://ex.com/settings']);
    expect(result.stats.dynamicPaths).toBe(1);
    expect(result.stats.dynamicExpanded).toBe(0);
  });
});

describe('extractParamValues', () => {
  it('should harvest sorted values from matching URLs', () => {
    const matchers = buildRouteMatchers(['/items/:id', '/about']);

    const values = extractParamValues(matchers, [
      'https://ex.com/items/7/',
      'https://ex.com/items/3',
      'https://ex.com/items/null',
      'https://ex.com/items/3/edit',
      'not a url',
    ]);

    expect(matchers).toHaveLength(1);
    expect(values).toEqual({ id: ['3', '7'] });
  });
});

describe('RouteSeedSource', () => {
  it('should expand again only when new values are learned', () => {
    const source = new RouteSeedSource(['/orders/:id'], ORIGIN, {}, OPTIONS);
    expect(source.expand().urls).toEqual([]);

    const first = source.learnFrom(['https://ex.com/orders/7', 'https://ex.com/about']);
    expect(first.added).toBe(1);
    expect(first.expansion?.urls).toEqual(['https://ex.com/orders/7']);
    expect(source.paramValues).toEqual({ id: ['7'] });

    const second = source.learnFrom(['https://ex.com/orders/7']);
    expect(second).toEqual({ added: 0, expansion: null });
  });

  it('should learn nothing without dynamic paths', () => {
    const source = new RouteSeedSource(['/settings'], ORIGIN, {}, OPTIONS);

    expect(source.learnFrom(['https://ex.com/orders/7'])).toEqual({ added: 0, expansion: null });
  });
});
