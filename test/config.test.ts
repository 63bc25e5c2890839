import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  ConfigError,
  applyEnvCredentials,
  applyOverrides,
  loadConfigFile,
  parseConfig,
} from '../src/config/index.js';

const MINIMAL = { baseUrl: 'https://ex.com' };

describe('parseConfig', () => {
  it('should fill every block with defaults', () => {
    const config = parseConfig(MINIMAL);

    expect(config.crawl).toEqual({
      strategy: 'dfs',
      maxPages: 100,
      maxDepth: 5,
      includeQuery: true,
      includeHash: false,
      crawlDelayMs: 1000,
      elementDelayMs: 500,
    });
    expect(config.timeouts.pageLoad).toBe(30000);
    expect(config.timeouts.popup).toBe(1500);
    expect(config.login.waitSeconds).toBe(30);
    expect(config.login.successUrlKeywords).toEqual(['dashboard', 'home']);
    expect(config.exclusions.elementSelectors).toContain('#logout');
    expect(config.errors.consoleTypes).toEqual(['error', 'pageerror', 'warning']);
    expect(config.routeSeeds.params).toEqual({});
    expect(config.output.dir).toBe('test_results');
    expect(config.modules).toEqual({});
  });

  it('should reject a config without a base URL', () => {
    expect(() => parseConfig({})).toThrow(ConfigError);
    expect(() => parseConfig({})).toThrow('baseUrl:');
  });

  it('should reject a non-http base URL', () => {
    expect(() => parseConfig({ baseUrl: 'ftp://ex.com' })).toThrow(
      'baseUrl: baseUrl must be an http(s) URL',
    );
  });

  it('should reject a singleModule that is not configured', () => {
    expect(() =>
      parseConfig({ ...MINIMAL, modules: { pets: ['https://ex.com/pawmatch'] }, singleModule: 'shop' }),
    ).toThrow('singleModule: singleModule "shop" is not one of the configured modules');
  });

  it('should not take an inherited property for a configured module', () => {
    expect(() =>
      parseConfig({ ...MINIMAL, modules: { pets: ['https://ex.com/pawmatch'] }, singleModule: 'constructor' }),
    ).toThrow('singleModule: singleModule "constructor" is not one of the configured modules');
  });

  it('should reject all-digit module names', () => {
    expect(() =>
      parseConfig({
        ...MINIMAL,
        modules: { shop: ['https://ex.com/shop'], '10': ['https://ex.com/shop/premium'] },
      }),
    ).toThrow('modules.10: module name must contain a non-digit character');
  });

  it('should carry exit code 4 on config errors', () => {
    try {
      parseConfig({ baseUrl: 42 });
      throw new Error('expected a ConfigError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError ? err.exitCode : 0).toBe(4);
    }
  });
});

describe('applyOverrides', () => {
  const base = parseConfig({
    ...MINIMAL,
    modules: { pets: ['https://ex.com/pawmatch'] },
    crawl: { strategy: 'bfs', maxPages: 20 },
  });

  it('should let CLI flags win over the file', () => {
    const config = applyOverrides(base, {
      module: 'pets',
      strategy: 'dfs',
      maxDepth: 2,
      headless: true,
      outputDir: 'out',
    });

    expect(config.singleModule).toBe('pets');
    expect(config.crawl.strategy).toBe('dfs');
    expect(config.crawl.maxPages).toBe(20);
    expect(config.crawl.maxDepth).toBe(2);
    expect(config.browser.headless).toBe(true);
    expect(config.output.dir).toBe('out');
  });

  it('should keep the file values when no flag is given', () => {
    expect(applyOverrides(base, {})).toEqual(base);
  });

  it('should re-validate the overridden config', () => {
    expect(() => applyOverrides(base, { module: 'shop' })).toThrow(ConfigError);
    expect(() => applyOverrides(base, { maxPages: 0 })).toThrow('crawl.maxPages:');
  });
});

describe('applyEnvCredentials', () => {
  it('should fill missing credentials from the environment', () => {
    const config = applyEnvCredentials(parseConfig(MINIMAL), {
      PAGEWALK_USERNAME: 'tester',
      PAGEWALK_PASSWORD: 'test-secret',
    });

    expect(config.login.username).toBe('tester');
    expect(config.login.password).toBe('test-secret');
    expect(config.login.cookie).toBeUndefined();
  });

  it('should prefer credentials from the file', () => {
    const config = applyEnvCredentials(
      parseConfig({ ...MINIMAL, login: { username: 'from-file' } }),
      { PAGEWALK_USERNAME: 'from-env' },
    );

    expect(config.login.username).toBe('from-file');
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pagewalk-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a YAML file', async () => {
    const file = join(dir, '.pagewalk.yaml');
    await writeFile(
      file,
      [
        'baseUrl: https://ex.com',
        'modules:',
        '  pets:',
        '    - https://ex.com/pawmatch',
        'crawl:',
        '  strategy: bfs',
        '  maxPages: 5',
        'routeSeeds:',
        '  params:',
        '    id: [1, 2]',
        '',
      ].join('\n'),
      'utf-8',
    );

    const config = await loadConfigFile(file);

    expect(config.baseUrl).toBe('https://ex.com');
    expect(config.modules).toEqual({ pets: ['https://ex.com/pawmatch'] });
    expect(config.crawl.strategy).toBe('bfs');
    expect(config.crawl.maxPages).toBe(5);
    expect(config.routeSeeds.params).toEqual({ id: [1, 2] });
  });

  it('should load a JSON file', async () => {
    const file = join(dir, 'config.json');
    await writeFile(file, JSON.stringify(MINIMAL), 'utf-8');

    expect((await loadConfigFile(file)).baseUrl).toBe('https://ex.com');
  });

  it('should fail on a missing or empty file', async () => {
    const empty = join(dir, 'empty.yaml');
    await writeFile(empty, '', 'utf-8');

    await expect(loadConfigFile(join(dir, 'missing.yaml'))).rejects.toThrow('Cannot read config file');
    await expect(loadConfigFile(empty)).rejects.toThrow('baseUrl:');
  });
});
