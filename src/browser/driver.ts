/**
 * Browser capability interfaces.
 *
 * The crawl and interaction logic depends only on these; the Playwright
 * adapter in `playwright.ts` is the single implementation, and tests use an
 * in-process fake. Probes never throw: a probe the browser cannot answer
 * (detached element, closed page) reports `'unknown'`, and callers decide
 * explicitly what `'unknown'` means for them.
 */

import type { WaitUntil } from '../schema/config.js';

// ── Probes ───────────────────────────────────────────────────

export type Probe = 'yes' | 'no' | 'unknown';

export function probeOf(value: boolean): Probe {
  return value ? 'yes' : 'no';
}

// ── Elements ─────────────────────────────────────────────────

export interface ClickOptions {
  timeout: number;
  position?: { x: number; y: number } | undefined;
}

export interface ElementRef {
  isVisible(): Promise<Probe>;
  isEnabled(): Promise<Probe>;
  isEditable(): Promise<Probe>;
  /** Wait for the element to be visible and stop moving. */
  waitUntilInteractable(timeout: number): Promise<Probe>;
  /** `Element.matches(selector)` */
  matches(selector: string): Promise<Probe>;

  // Reads resolve to null when the value is absent or unreadable.
  getAttribute(name: string): Promise<string | null>;
  innerText(): Promise<string | null>;
  textContent(): Promise<string | null>;
  /** Joined text of the elements named by `aria-labelledby`. */
  labelledByText(): Promise<string | null>;
  tagName(): Promise<string | null>;

  // Actions throw on failure; a timeout surfaces as a TimeoutError.
  click(options: ClickOptions): Promise<void>;
  focus(): Promise<void>;
  fill(value: string, options: { timeout: number }): Promise<void>;
}

// ── Pages ────────────────────────────────────────────────────

export interface NavigateOptions {
  timeout: number;
  waitUntil: WaitUntil;
}

export interface PopupRef {
  /** Wait for the popup to load; false if it did not within `timeout`. */
  settle(state: WaitUntil, timeout: number): Promise<boolean>;
  /** Close the popup; a popup that already closed itself is fine. */
  close(): Promise<void>;
}

export interface PageDriver {
  url(): string;
  /** Empty string when the title cannot be read. */
  title(): Promise<string>;

  /** Throws when the page cannot be loaded within the timeout. */
  goto(url: string, options: NavigateOptions): Promise<void>;
  /** False when going back failed or loaded no new document. */
  goBack(options: NavigateOptions): Promise<boolean>;
  /** False when the state was not reached within the timeout. */
  waitForLoadState(state: WaitUntil, timeout: number): Promise<boolean>;

  /** A selector the page cannot evaluate yields no elements. */
  queryAll(selector: string): Promise<ElementRef[]>;
  query(selector: string): Promise<ElementRef | null>;

  /** Click the page body at a fixed viewport point. */
  clickAt(x: number, y: number, timeout: number): Promise<void>;
  pressKey(key: string): Promise<void>;

  /** Document scroll height in pixels, 0 when unknown. */
  scrollHeight(): Promise<number>;
  scrollTo(y: number): Promise<void>;

  screenshot(path: string, fullPage: boolean): Promise<void>;

  /**
   * Run `action` while listening for a popup window. Resolves to the popup
   * if one opened within `timeout`, else null. With a zero `timeout` there
   * is no wait: popups opened during `action` are closed and null returned.
   * Errors from `action` propagate.
   */
  withPopup(action: () => Promise<void>, timeout: number): Promise<PopupRef | null>;

  wait(ms: number): Promise<void>;
}

// ── Errors ───────────────────────────────────────────────────

/** Driver timeouts (Playwright's TimeoutError) are recognised by name. */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
