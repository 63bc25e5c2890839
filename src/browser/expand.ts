import type { DiscoveryConfig } from '../schema/config.js';
import { isNonNavigatingHref } from '../crawl/urls.js';
import * as log from '../utils/logger.js';
import type { ElementRef, PageDriver } from './driver.js';
import { errorMessage } from './driver.js';
import type { DiscoveryContext } from './discover.js';
import { NO_TEXT, admitElement, describeElement, selectorFor } from './discover.js';

// ── Options ──────────────────────────────────────────────────

export type ExpandOptions = Pick<
  DiscoveryConfig,
  'maxExpandClicks' | 'clickSelectors' | 'excludedText'
> & {
  clickTimeout: number;
  settleMs: number;
};

export interface ScrollOptions {
  steps: number;
  pauseMs: number;
  toTop: boolean;
}

// ── Safety ───────────────────────────────────────────────────

export function hasExcludedText(label: string, excludedText: readonly string[]): boolean {
  const lower = label.toLowerCase();
  if (!lower || label === NO_TEXT) return false;
  return excludedText.some((token) => token !== '' && lower.includes(token.toLowerCase()));
}

/**
 * Only low-risk toggles are clicked during discovery: admitted, no
 * destructive label, visible, not disabled, and not a real link.
 */
async function isSafeTarget(
  element: ElementRef,
  label: string,
  context: DiscoveryContext,
  pageUrl: string,
  excludedText: readonly string[],
): Promise<boolean> {
  if (!(await admitElement(element, context, pageUrl))) return false;
  if (hasExcludedText(label, excludedText)) return false;
  if ((await element.isVisible()) !== 'yes') return false;
  if ((await element.isEnabled()) === 'no') return false;

  const href = await element.getAttribute('href');
  return !href || isNonNavigatingHref(href);
}

// ── Expansion ────────────────────────────────────────────────

/**
 * Click collapsed menus and toggles so links they hide become part of the
 * DOM. Returns the number of clicks that went through.
 */
export async function expandNavigation(
  page: PageDriver,
  context: DiscoveryContext,
  options: ExpandOptions,
): Promise<number> {
  const maxClicks = Math.max(0, options.maxExpandClicks);
  if (maxClicks === 0) return 0;

  const pageUrl = page.url();
  const seen = new Set<string>();
  let attempts = 0;
  let clicked = 0;

  for (const selector of options.clickSelectors) {
    if (attempts >= maxClicks) break;
    const query = selector.includes(':visible') ? selector : `${selector}:visible`;

    for (const element of await page.queryAll(query)) {
      if (attempts >= maxClicks) break;

      const label = await describeElement(element);
      if (!(await isSafeTarget(element, label, context, pageUrl, options.excludedText))) {
        continue;
      }

      const key = `${await selectorFor(element, label)}|${label}`;
      if (seen.has(key)) continue;
      seen.add(key);

      attempts++;
      try {
        await element.click({ timeout: options.clickTimeout });
        clicked++;
        await page.wait(options.settleMs);
      } catch (err) {
        log.detail(`Expand click failed on ${key}: ${errorMessage(err)}`);
      }
    }
  }

  return clicked;
}

/** Scroll through the page so lazy content renders. */
export async function scrollForLazyContent(
  page: PageDriver,
  options: ScrollOptions,
): Promise<boolean> {
  const height = await page.scrollHeight();
  if (height <= 0) return false;

  const steps = Math.max(1, Math.trunc(options.steps));
  const stepSize = Math.max(1, Math.trunc(height / steps));

  try {
    for (let step = 1; step <= steps; step++) {
      await page.scrollTo(Math.min(height, step * stepSize));
      await page.wait(options.pauseMs);
    }
    if (options.toTop) {
      await page.scrollTo(0);
      await page.wait(options.pauseMs);
    }
  } catch (err) {
    log.detail(`Scroll stopped: ${errorMessage(err)}`);
    return false;
  }

  return true;
}
