import { join } from 'node:path';

import type { ElementTestResult, ElementType } from '../schema/results.js';
import type { ScreenshotConfig, WaitUntil } from '../schema/config.js';
import { DELAYS, LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import type { ElementRef, PageDriver, Probe } from './driver.js';
import { errorMessage, isTimeoutError } from './driver.js';
import type { DiscoveredElement } from './discover.js';

// ── Options ──────────────────────────────────────────────────

export interface TesterOptions {
  elementTimeout: number;
  navigationTimeout: number;
  /** How long a click waits for a popup window; 0 closes popups unloaded. */
  popupTimeout: number;
  navigationWaitUntil: WaitUntil;
  interactionDelayMs: number;
  screenshots: ScreenshotConfig;
  screenshotDir: string;
}

const ERROR_DIALOG_SELECTORS = [
  '.error-modal:visible',
  '.error-dialog:visible',
  "[role='alertdialog']:visible",
  '.alert-danger:visible',
  '.toast-error:visible',
  '.notification-error:visible',
];

const CLOSE_SELECTORS = [
  '.modal .close',
  '.modal .btn-close',
  "[aria-label='Close']",
  '.dialog-close',
  '.modal-close',
];

export const SKIP_REASONS = {
  NOT_VISIBLE: 'Element not visible',
  NOT_ENABLED: 'Element not enabled',
  NOT_INTERACTABLE: 'Element not interactable',
  UNKNOWN_STATE: 'Element state could not be read',
} as const;

export const FAILURE_MESSAGES = {
  CLICK_TIMEOUT: 'Click action timed out',
  NAVIGATION_TIMEOUT: 'Navigation timed out',
  ERROR_DIALOG: 'Error dialog appeared after interaction',
} as const;

// ── Internal ─────────────────────────────────────────────────

/** Thrown-free preflight outcome: null when every check answered yes. */
type Preflight = string | null;

function preflightReason(probe: Probe, whenNo: string): Preflight {
  if (probe === 'yes') return null;
  return probe === 'no' ? whenNo : SKIP_REASONS.UNKNOWN_STATE;
}

function slug(text: string): string {
  return text.replace(/[^a-z0-9]+/gi, '_').replace(/^_+|_+$/g, '').slice(0, 20) || 'element';
}

// ── Tester ───────────────────────────────────────────────────

/**
 * Exercises one discovered element at a time against the shared page:
 * preflight, act, recover to the original URL, check for an error dialog.
 * Nothing thrown by the driver escapes `test()`.
 */
export class ElementTester {
  private shots = 0;

  constructor(
    private readonly page: PageDriver,
    private readonly options: TesterOptions,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async test(target: DiscoveredElement): Promise<ElementTestResult> {
    const result: ElementTestResult = {
      elementType: target.type,
      text: target.text,
      selector: target.selector,
      action: target.type === 'input' ? 'focus' : 'click',
      status: 'passed',
      timestamp: this.now().toISOString(),
    };

    const startUrl = this.page.url();
    const skip = await this.preflight(target.type, target.element);
    if (skip !== null) {
      result.status = 'skipped';
      result.errorMessage = skip;
      return result;
    }

    try {
      switch (target.type) {
        case 'button':
        case 'clickable':
          await this.clickWithPopup(target.element);
          await this.page.wait(this.options.interactionDelayMs);
          break;
        case 'nav_link':
          await this.followLink(target.element, result);
          break;
        case 'input':
          result.action = await this.focusInput(target.element);
          return result;
        case 'dropdown':
        case 'modal_trigger':
          await this.toggle(target.element);
          break;
      }

      await this.recover(startUrl, result);

      if (await this.hasErrorDialog()) {
        await this.fail(result, FAILURE_MESSAGES.ERROR_DIALOG);
        await this.dismissDialogs();
      }
    } catch (err) {
      const message = isTimeoutError(err)
        ? target.type === 'nav_link'
          ? FAILURE_MESSAGES.NAVIGATION_TIMEOUT
          : FAILURE_MESSAGES.CLICK_TIMEOUT
        : errorMessage(err).slice(0, LIMITS.ERROR_MESSAGE_CHARS);
      await this.fail(result, message);
      await this.recover(startUrl, result);
    }

    return result;
  }

  // ── Preflight ─────────────────────────────────────────────

  private async preflight(type: ElementType, element: ElementRef): Promise<Preflight> {
    const visible = preflightReason(await element.isVisible(), SKIP_REASONS.NOT_VISIBLE);
    if (visible !== null) return visible;

    if (type === 'button') {
      const enabled = preflightReason(await element.isEnabled(), SKIP_REASONS.NOT_ENABLED);
      if (enabled !== null) return enabled;
    }

    if (type === 'button' || type === 'clickable' || type === 'nav_link') {
      const probe = await element.waitUntilInteractable(this.options.elementTimeout);
      return preflightReason(probe, SKIP_REASONS.NOT_INTERACTABLE);
    }

    return null;
  }

  // ── Actions ───────────────────────────────────────────────

  /** A popup that opens is left to load and then closed; none is fine. */
  private async clickWithPopup(element: ElementRef): Promise<void> {
    const popup = await this.page.withPopup(
      () => element.click({ timeout: this.options.elementTimeout }),
      this.options.popupTimeout,
    );
    if (!popup) return;

    await popup.settle(this.options.navigationWaitUntil, this.options.navigationTimeout);
    await popup.close();
  }

  private async followLink(element: ElementRef, result: ElementTestResult): Promise<void> {
    const href = await element.getAttribute('href');
    if (href !== null) result.href = href;

    await this.clickWithPopup(element);
    await this.page.wait(this.options.interactionDelayMs);
    // a link that does not navigate never reaches the state; that is fine
    await this.page.waitForLoadState(
      this.options.navigationWaitUntil,
      this.options.navigationTimeout,
    );
  }

  private async focusInput(element: ElementRef): Promise<string> {
    await element.focus();
    await this.page.wait(DELAYS.INPUT_FOCUS_SETTLE);
    return (await element.isEditable()) === 'yes' ? 'focus (editable)' : 'focus (read-only)';
  }

  private async toggle(element: ElementRef): Promise<void> {
    await element.click({ timeout: this.options.elementTimeout });
    await this.page.wait(this.options.interactionDelayMs);

    try {
      await element.click({ timeout: this.options.elementTimeout });
    } catch {
      // the open menu may cover its own trigger
      await this.page.clickAt(10, 10, this.options.elementTimeout);
    }
    await this.page.wait(this.options.interactionDelayMs);
  }

  // ── Recovery ──────────────────────────────────────────────

  /**
   * Return to `startUrl` after a click moved the page: history first, a
   * direct load if that did not land there. Failures are logged, never
   * thrown.
   */
  private async recover(startUrl: string, result: ElementTestResult): Promise<void> {
    const current = this.page.url();
    if (current === startUrl) return;
    if (result.navigatedTo === undefined) result.navigatedTo = current;

    const navigate = {
      timeout: this.options.navigationTimeout,
      waitUntil: this.options.navigationWaitUntil,
    };

    await this.page.goBack(navigate);
    await this.page.wait(this.options.interactionDelayMs);
    if (this.page.url() === startUrl) return;

    try {
      await this.page.goto(startUrl, navigate);
    } catch (err) {
      log.detail(`Could not return to ${startUrl}: ${errorMessage(err)}`);
    }
  }

  // ── Error dialogs ─────────────────────────────────────────

  private async hasErrorDialog(): Promise<boolean> {
    for (const selector of ERROR_DIALOG_SELECTORS) {
      if (await this.page.query(selector)) return true;
    }
    return false;
  }

  private async dismissDialogs(): Promise<void> {
    for (const selector of CLOSE_SELECTORS) {
      const button = await this.page.query(selector);
      if (!button || (await button.isVisible()) !== 'yes') continue;
      try {
        await button.click({ timeout: this.options.elementTimeout });
        await this.page.wait(DELAYS.DIALOG_CLOSE_SETTLE);
        break;
      } catch (err) {
        log.detail(`Close button ${selector} failed: ${errorMessage(err)}`);
      }
    }

    try {
      await this.page.pressKey('Escape');
    } catch (err) {
      log.detail(`Escape did not go through: ${errorMessage(err)}`);
    }
  }

  // ── Failure bookkeeping ───────────────────────────────────

  private async fail(result: ElementTestResult, message: string): Promise<void> {
    result.status = 'failed';
    result.errorMessage = message;
    if (!this.options.screenshots.onError) return;

    const path = await this.screenshot(`${result.elementType}_error_${slug(result.text)}`);
    if (path !== undefined) result.screenshotPath = path;
  }

  async screenshot(name: string): Promise<string | undefined> {
    this.shots++;
    const stamp = this.now().toISOString().replace(/[^0-9]/g, '');
    const path = join(this.options.screenshotDir, `${name}_${stamp}_${String(this.shots)}.png`);
    try {
      await this.page.screenshot(path, this.options.screenshots.fullPage);
      return path;
    } catch (err) {
      log.warn(`Failed to take screenshot: ${errorMessage(err)}`);
      return undefined;
    }
  }
}
