import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { FileConfig } from '../schema/config.js';
import type { TestSession } from '../schema/results.js';
import { sessionExitCode, summarizeSession } from '../schema/results.js';
import { OUTPUT } from '../config/defaults.js';
import { launchSession } from '../browser/runner.js';
import { attachCapture } from '../browser/capture.js';
import { performLogin } from '../browser/auth.js';
import { ElementTester } from '../browser/interact.js';
import { RouteSeedSource, loadRoutePaths } from '../crawl/routeSeeds.js';
import { originOf } from '../crawl/urls.js';
import { generateMarkdown, serializeJSON, formatDuration } from '../report/reporter.js';
import * as log from '../utils/logger.js';
import { ErrorCollector } from './capture.js';
import { runCrawl } from './crawler.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionOutcome {
  session: TestSession;
  exitCode: number;
  outputDir: string;
  reportPath: string;
  sessionPath: string;
}

// ── Helpers ──────────────────────────────────────────────────

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `run_YYYYMMDD_HHMMSS` in local time. */
export function runFolderName(date: Date): string {
  const day = `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `run_${day}_${time}`;
}

/** A configured route file that is missing is a warning, not an error. */
export async function loadRouteSeeds(config: FileConfig): Promise<RouteSeedSource | undefined> {
  const file = config.routeSeeds.file;
  if (file === undefined) return undefined;

  const { paths, missingFile } = await loadRoutePaths(file);
  if (missingFile) {
    log.warn(`Route seed file not found: ${file}`);
    return undefined;
  }

  return new RouteSeedSource(paths, originOf(config.baseUrl), config.routeSeeds.params, {
    includeDynamic: config.routeSeeds.includeDynamic,
    skipMissing: config.routeSeeds.skipMissing,
    maxExpansionsPerPath: config.routeSeeds.maxExpansionsPerPath,
  });
}

function printSummary(session: TestSession): void {
  const totals = summarizeSession(session);
  log.section('Test summary');
  log.detail(`Pages tested:      ${String(totals.pages)}`);
  log.detail(`Pages with errors: ${String(totals.pagesWithErrors)}`);
  log.detail(`Network errors:    ${String(totals.networkErrors)}`);
  log.detail(`Console errors:    ${String(totals.consoleErrors)}`);
  log.detail(`Elements tested:   ${String(totals.elementTests)}`);
  log.detail(`Element failures:  ${String(totals.elementFailures)}`);
  log.detail(`Duration:          ${formatDuration(session.durationMs)}`);
}

// ── Session ──────────────────────────────────────────────────

/**
 * One full run: browser up, login, crawl, browser down, artifacts written.
 * The browser is closed even when the crawl throws.
 */
export async function runSession(config: FileConfig): Promise<SessionOutcome> {
  const outputDir = path.resolve(config.output.dir, runFolderName(new Date()));
  const screenshotDir = path.join(outputDir, OUTPUT.SCREENSHOT_DIR);
  await mkdir(screenshotDir, { recursive: true });

  log.info(`Output folder: ${outputDir}`);
  log.info(`Target website: ${config.baseUrl}`);
  if (config.singleModule) log.info(`Module: ${config.singleModule}`);

  const routeSeeds = await loadRouteSeeds(config);

  log.section('Launching browser');
  const browser = await launchSession({
    headless: config.browser.headless,
    slowMo: config.browser.slowMo,
    viewport: config.browser.viewport,
    elementTimeout: config.timeouts.element,
    navigationTimeout: config.timeouts.navigation,
    cookies: config.login.cookie,
    cookieUrl: config.baseUrl,
  });

  let session: TestSession;
  try {
    const collector = new ErrorCollector(config.errors);
    attachCapture(browser.page, collector);

    log.section('Login');
    await performLogin(browser.driver, config.login, {
      baseUrl: config.baseUrl,
      timeouts: config.timeouts,
    });

    const tester = new ElementTester(browser.driver, {
      elementTimeout: config.timeouts.element,
      navigationTimeout: config.timeouts.navigation,
      popupTimeout: config.timeouts.popup,
      navigationWaitUntil: config.timeouts.navigationWaitUntil,
      interactionDelayMs: config.crawl.elementDelayMs,
      screenshots: config.screenshots,
      screenshotDir,
    });

    log.section('Crawling');
    session = await runCrawl(config, {
      page: browser.driver,
      collector,
      tester,
      routeSeeds,
    });
  } finally {
    await browser.close();
  }

  const reportPath = path.join(outputDir, OUTPUT.REPORT_FILE);
  const sessionPath = path.join(outputDir, OUTPUT.SESSION_FILE);
  await writeFile(reportPath, generateMarkdown(session), 'utf-8');
  await writeFile(sessionPath, serializeJSON(session) + '\n', 'utf-8');

  printSummary(session);
  log.info(`Report saved to: ${reportPath}`);
  log.info(`Data saved to: ${sessionPath}`);

  return {
    session,
    exitCode: sessionExitCode(session),
    outputDir,
    reportPath,
    sessionPath,
  };
}
