import { chromium } from 'playwright-core';
import type { Browser, Page } from 'playwright-core';

import type { PageDriver } from './driver.js';
import { createPageDriver } from './playwright.js';
import { parseCookieString } from './auth.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
  slowMo: number;
  viewport: { width: number; height: number };
  elementTimeout: number;
  navigationTimeout: number;
  /** Pre-authenticated cookie string, scoped to `cookieUrl`. */
  cookies?: string | undefined;
  cookieUrl: string;
}

export interface BrowserSession {
  readonly page: Page;
  readonly driver: PageDriver;
  close(): Promise<void>;
}

// ── Errors ───────────────────────────────────────────────────

/** The browser could not be started; nothing was tested. */
export class LaunchError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'LaunchError';
  }
}

// ── Session launcher ─────────────────────────────────────────

/**
 * One browser, one context, one page: every page visit and every click of
 * the run shares this session's cookies and login state.
 */
export async function launchSession(
  config: RunnerConfig,
): Promise<BrowserSession> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: config.headless,
      slowMo: config.slowMo,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LaunchError(`Cannot launch Chromium: ${reason}`);
  }

  try {
    const context = await browser.newContext({ viewport: config.viewport });

    if (config.cookies !== undefined && config.cookies.trim().length > 0) {
      await context.addCookies(parseCookieString(config.cookies, config.cookieUrl));
    }

    const page = await context.newPage();
    page.setDefaultTimeout(config.elementTimeout);
    page.setDefaultNavigationTimeout(config.navigationTimeout);

    return {
      page,
      driver: createPageDriver(page),
      async close(): Promise<void> {
        await browser.close();
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}
