import type { LoginConfig, TimeoutConfig } from '../schema/config.js';
import { LOGIN } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { PageDriver } from './driver.js';
import { errorMessage } from './driver.js';

// ── Cookie parsing ──────────────────────────────────────────

export interface ScopedCookie {
  name: string;
  value: string;
  url: string;
}

/**
 * Parse a cookie string ("name=value; name2=value2") into cookies scoped
 * to `url`, ready for `BrowserContext.addCookies`.
 */
export function parseCookieString(cookies: string, url: string): ScopedCookie[] {
  const pairs = cookies
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean);

  return pairs.map((pair) => {
    const eqIdx = pair.indexOf('=');
    if (eqIdx <= 0) {
      throw new Error(`Invalid cookie format: "${pair}" (expected name=value)`);
    }
    return {
      name: pair.slice(0, eqIdx).trim(),
      value: pair.slice(eqIdx + 1).trim(),
      url,
    };
  });
}

// ── Login flow ──────────────────────────────────────────────

export interface LoginOptions {
  baseUrl: string;
  timeouts: Pick<TimeoutConfig, 'pageLoad' | 'element' | 'pageWaitUntil'>;
  pollIntervalMs?: number | undefined;
}

function hasLoginStep(login: LoginConfig): boolean {
  return (
    login.url !== undefined ||
    login.username !== undefined ||
    login.password !== undefined ||
    login.successSelector !== undefined
  );
}

/**
 * Open the login page, fill credentials when selectors are configured,
 * then poll until the session looks logged in. The poll leaves time for a
 * human to finish an OTP step in a headed browser.
 *
 * Returns false on timeout; the run continues from wherever the page is.
 */
export async function performLogin(
  page: PageDriver,
  login: LoginConfig,
  options: LoginOptions,
): Promise<boolean> {
  const loginUrl = login.url ?? options.baseUrl;
  const navigate = {
    timeout: options.timeouts.pageLoad,
    waitUntil: options.timeouts.pageWaitUntil,
  };

  if (!hasLoginStep(login)) {
    log.login(`No login configured, opening ${loginUrl}`);
    await page.goto(loginUrl, navigate);
    return true;
  }

  log.login(`Opening login page: ${loginUrl}`);
  await page.goto(loginUrl, navigate);
  const initialUrl = page.url();

  await fillCredentials(page, login, options.timeouts.element);

  const interval = options.pollIntervalMs ?? LOGIN.POLL_INTERVAL;
  const polls = Math.max(1, Math.ceil((login.waitSeconds * 1000) / interval));
  log.login(`Waiting up to ${String(login.waitSeconds)}s for login to complete`);

  for (let i = 0; i < polls; i++) {
    if (await isLoggedIn(page, login, initialUrl)) {
      log.login(`Login detected at ${page.url()}`);
      return true;
    }
    await page.wait(interval);
  }

  if (await isLoggedIn(page, login, initialUrl)) {
    log.login(`Login detected at ${page.url()}`);
    return true;
  }

  log.warn('Login wait timed out, continuing from the current page');
  return false;
}

// ── Helpers ──────────────────────────────────────────────────

async function fillCredentials(
  page: PageDriver,
  login: LoginConfig,
  timeout: number,
): Promise<void> {
  const fields: Array<[string | undefined, string | undefined, string]> = [
    [login.usernameSelector, login.username, 'username'],
    [login.passwordSelector, login.password, 'password'],
  ];

  let filled = 0;
  for (const [selector, value, label] of fields) {
    if (selector === undefined || value === undefined) continue;
    const field = await page.query(selector);
    if (!field) {
      log.warn(`Login ${label} field not found: ${selector}`);
      continue;
    }
    try {
      await field.fill(value, { timeout });
      filled++;
    } catch (err) {
      log.warn(`Could not fill login ${label}: ${errorMessage(err)}`);
    }
  }

  if (filled === 0) return;

  try {
    if (login.submitSelector !== undefined) {
      const submit = await page.query(login.submitSelector);
      if (submit) {
        await submit.click({ timeout });
        return;
      }
      log.warn(`Login submit not found: ${login.submitSelector}`);
    }
    await page.pressKey('Enter');
  } catch (err) {
    log.warn(`Could not submit login form: ${errorMessage(err)}`);
  }
}

async function isLoggedIn(
  page: PageDriver,
  login: LoginConfig,
  initialUrl: string,
): Promise<boolean> {
  if (login.successSelector !== undefined) {
    const marker = await page.query(login.successSelector);
    if (marker && (await marker.isVisible()) === 'yes') return true;
  }

  const current = page.url().toLowerCase();
  if (login.successUrlKeywords.some((k) => current.includes(k.toLowerCase()))) {
    return true;
  }

  return page.url() !== initialUrl && !current.includes('login');
}
