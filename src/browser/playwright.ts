import type { ElementHandle, Page } from 'playwright-core';

import type { WaitUntil } from '../schema/config.js';
import type {
  ClickOptions,
  ElementRef,
  NavigateOptions,
  PageDriver,
  PopupRef,
  Probe,
} from './driver.js';
import { isTimeoutError, probeOf } from './driver.js';

type DomHandle = ElementHandle<HTMLElement | SVGElement>;
type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

// ── Helpers ──────────────────────────────────────────────────

function loadStateOf(state: WaitUntil): LoadState {
  return state === 'commit' ? 'domcontentloaded' : state;
}

async function probe(check: () => Promise<boolean>): Promise<Probe> {
  try {
    return probeOf(await check());
  } catch {
    return 'unknown';
  }
}

async function read(get: () => Promise<string | null>): Promise<string | null> {
  try {
    return await get();
  } catch {
    return null;
  }
}

// ── Element adapter ──────────────────────────────────────────

export function wrapElement(handle: DomHandle): ElementRef {
  return {
    isVisible: () => probe(() => handle.isVisible()),
    isEnabled: () => probe(() => handle.isEnabled()),
    isEditable: () => probe(() => handle.isEditable()),

    async waitUntilInteractable(timeout: number): Promise<Probe> {
      try {
        await handle.waitForElementState('visible', { timeout });
        await handle.waitForElementState('stable', { timeout });
        return 'yes';
      } catch (err) {
        return isTimeoutError(err) ? 'no' : 'unknown';
      }
    },

    matches: (selector: string) =>
      probe(() => handle.evaluate((el, sel) => el.matches(sel), selector)),

    getAttribute: (name: string) => read(() => handle.getAttribute(name)),
    innerText: () => read(() => handle.innerText()),
    textContent: () => read(() => handle.textContent()),

    labelledByText: () =>
      read(() =>
        handle.evaluate((el) => {
          const ids = (el.getAttribute('aria-labelledby') ?? '')
            .split(/\s+/)
            .filter(Boolean);
          const parts = ids
            .map((id) => {
              const target: Element | null = document.getElementById(id);
              if (!target) return '';
              const text = target instanceof HTMLElement ? target.innerText : target.textContent;
              return (text ?? '').trim();
            })
            .filter(Boolean);
          return parts.length > 0 ? parts.join(' ') : null;
        }),
      ),

    tagName: () => read(() => handle.evaluate((el) => el.tagName.toLowerCase())),

    async click(options: ClickOptions): Promise<void> {
      await handle.click({ timeout: options.timeout, position: options.position });
    },

    async focus(): Promise<void> {
      await handle.focus();
    },

    async fill(value: string, options: { timeout: number }): Promise<void> {
      await handle.fill(value, { timeout: options.timeout });
    },
  };
}

// ── Popup adapter ────────────────────────────────────────────

function wrapPopup(popup: Page): PopupRef {
  return {
    async settle(state: WaitUntil, timeout: number): Promise<boolean> {
      try {
        await popup.waitForLoadState(loadStateOf(state), { timeout });
        return true;
      } catch {
        return false;
      }
    },

    async close(): Promise<void> {
      if (popup.isClosed()) return;
      // A popup may close itself between the check and the call.
      await popup.close().catch(() => undefined);
    },
  };
}

// ── Page adapter ─────────────────────────────────────────────

export function createPageDriver(page: Page): PageDriver {
  return {
    url: () => page.url(),
    title: () => page.title().catch(() => ''),

    async goto(url: string, options: NavigateOptions): Promise<void> {
      await page.goto(url, { timeout: options.timeout, waitUntil: options.waitUntil });
    },

    async goBack(options: NavigateOptions): Promise<boolean> {
      try {
        const response = await page.goBack({
          timeout: options.timeout,
          waitUntil: options.waitUntil,
        });
        return response !== null;
      } catch {
        return false;
      }
    },

    async waitForLoadState(state: WaitUntil, timeout: number): Promise<boolean> {
      try {
        await page.waitForLoadState(loadStateOf(state), { timeout });
        return true;
      } catch {
        return false;
      }
    },

    async queryAll(selector: string): Promise<ElementRef[]> {
      try {
        const handles = await page.$$(selector);
        return handles.map(wrapElement);
      } catch {
        return [];
      }
    },

    async query(selector: string): Promise<ElementRef | null> {
      try {
        const handle = await page.$(selector);
        return handle ? wrapElement(handle) : null;
      } catch {
        return null;
      }
    },

    async clickAt(x: number, y: number, timeout: number): Promise<void> {
      await page.click('body', { position: { x, y }, timeout });
    },

    async pressKey(key: string): Promise<void> {
      await page.keyboard.press(key);
    },

    async scrollHeight(): Promise<number> {
      try {
        const height = await page.evaluate(() => document.body.scrollHeight);
        return Number.isFinite(height) && height > 0 ? height : 0;
      } catch {
        return 0;
      }
    },

    async scrollTo(y: number): Promise<void> {
      await page.evaluate((top) => window.scrollTo(0, top), y);
    },

    async screenshot(path: string, fullPage: boolean): Promise<void> {
      await page.screenshot({ path, fullPage });
    },

    async withPopup(
      action: () => Promise<void>,
      timeout: number,
    ): Promise<PopupRef | null> {
      // Playwright treats a zero timeout as "wait forever".
      if (timeout <= 0) {
        const opened: Page[] = [];
        const onPopup = (popup: Page): void => {
          opened.push(popup);
        };
        page.on('popup', onPopup);
        try {
          await action();
        } finally {
          page.off('popup', onPopup);
          await Promise.all(opened.map((popup) => wrapPopup(popup).close()));
        }
        return null;
      }

      const popupPromise = page
        .waitForEvent('popup', { timeout })
        .then(wrapPopup, () => null);

      try {
        await action();
      } catch (err) {
        const popup = await popupPromise;
        await popup?.close();
        throw err;
      }

      return popupPromise;
    },

    wait: (ms: number) => page.waitForTimeout(ms),
  };
}
