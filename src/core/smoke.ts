import type { FileConfig } from '../schema/config.js';
import type { ConsoleError } from '../schema/capture.js';
import type { PageDriver } from '../browser/driver.js';
import { launchSession } from '../browser/runner.js';
import { attachCapture } from '../browser/capture.js';
import * as log from '../utils/logger.js';
import { ErrorCollector } from './capture.js';

export const SMOKE_CONSOLE_TYPES = ['error', 'pageerror'] as const;

export interface SmokeResult {
  url: string;
  errors: ConsoleError[];
  exitCode: number;
}

export function smokeCollector(): ErrorCollector {
  return new ErrorCollector({
    statusCodes: [],
    consoleTypes: [...SMOKE_CONSOLE_TYPES],
    ignorePatterns: [],
  });
}

/** Load `url` once and report whether anything was logged as an error. */
export async function smokeCheck(
  page: PageDriver,
  collector: ErrorCollector,
  url: string,
  config: Pick<FileConfig, 'timeouts' | 'crawl'>,
): Promise<SmokeResult> {
  await page.goto(url, {
    timeout: config.timeouts.pageLoad,
    waitUntil: config.timeouts.pageWaitUntil,
  });
  await page.wait(config.crawl.crawlDelayMs);

  const errors = collector.flush().consoleErrors;
  if (errors.length === 0) {
    log.info('Smoke test passed. No console errors found.');
    return { url, errors, exitCode: 0 };
  }

  log.error('Smoke test failed. Console errors found:');
  for (const e of errors) log.detail(`- ${e.type}: ${e.message}`);
  return { url, errors, exitCode: 1 };
}

export async function runSmoke(config: FileConfig, url?: string): Promise<SmokeResult> {
  const target = url ?? config.baseUrl;
  log.info(`Smoke testing ${target}`);

  const browser = await launchSession({
    headless: config.browser.headless,
    slowMo: 0,
    viewport: config.browser.viewport,
    elementTimeout: config.timeouts.element,
    navigationTimeout: config.timeouts.navigation,
    cookies: config.login.cookie,
    cookieUrl: config.baseUrl,
  });

  try {
    const collector = smokeCollector();
    attachCapture(browser.page, collector);
    return await smokeCheck(browser.driver, collector, target, config);
  } finally {
    await browser.close();
  }
}
