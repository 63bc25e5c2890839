import type { ElementType } from '../schema/results.js';
import { LIMITS } from '../config/defaults.js';
import type { UrlPolicy } from '../crawl/urls.js';
import { isNonNavigatingHref, resolveUrl } from '../crawl/urls.js';
import type { ElementRef, PageDriver } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export interface DiscoveredElement {
  type: ElementType;
  element: ElementRef;
  text: string;
  selector: string;
}

export interface DiscoveryContext {
  policy: UrlPolicy;
  excludedSelectors: readonly string[];
  isVisited(url: string): boolean;
}

export const NO_TEXT = '[No text]';
export const UNKNOWN_SELECTOR = '[unknown]';

// ── Selector groups ──────────────────────────────────────────

const ELEMENT_GROUPS: ReadonlyArray<{ type: ElementType; selector: string }> = [
  {
    type: 'button',
    selector:
      "button:visible, [role='button']:visible, input[type='button']:visible, input[type='submit']:visible",
  },
  { type: 'clickable', selector: '[onclick]:visible, [data-action]:visible' },
  {
    type: 'input',
    selector: "input:visible:not([type='hidden']), select:visible, textarea:visible",
  },
  {
    type: 'nav_link',
    selector: 'nav a:visible, .nav a:visible, .navbar a:visible, .menu a:visible',
  },
  {
    type: 'dropdown',
    selector: '[data-toggle]:visible, [data-bs-toggle]:visible, .dropdown-toggle:visible',
  },
  { type: 'modal_trigger', selector: "[data-modal]:visible, [data-bs-target^='#']:visible" },
];

const LINK_CARRIERS: ReadonlyArray<{ selector: string; attribute: string }> = [
  { selector: 'a[href]', attribute: 'href' },
  { selector: '[data-href]', attribute: 'data-href' },
  { selector: '[data-route]', attribute: 'data-route' },
  { selector: '[data-url]', attribute: 'data-url' },
];

const TARGET_ATTRIBUTES = ['href', 'data-href', 'data-route', 'data-url'] as const;

// ── Admission ────────────────────────────────────────────────

/**
 * An element is excluded unless every "do not touch" probe answers a
 * definite no. A probe the browser cannot answer excludes it too.
 */
export async function isExcludedElement(
  element: ElementRef,
  excludedSelectors: readonly string[],
): Promise<boolean> {
  for (const selector of excludedSelectors) {
    if ((await element.matches(selector)) !== 'no') return true;
  }
  return false;
}

/** First target attribute with a value; placeholder hrefs fall through. */
async function targetOf(element: ElementRef): Promise<string | null> {
  for (const attribute of TARGET_ATTRIBUTES) {
    const value = (await element.getAttribute(attribute))?.trim();
    if (!value) continue;
    if (attribute === 'href' && isNonNavigatingHref(value)) continue;
    return value;
  }
  return null;
}

/**
 * Excluded elements never pass. In a module-scoped run, an element whose
 * navigation target leaves the origin or the module does not pass either;
 * elements without a real target always do.
 */
export async function admitElement(
  element: ElementRef,
  context: DiscoveryContext,
  pageUrl: string,
): Promise<boolean> {
  if (await isExcludedElement(element, context.excludedSelectors)) return false;
  if (context.policy.moduleFilter === undefined) return true;

  const target = await targetOf(element);
  if (target === null || target.startsWith('#') || isNonNavigatingHref(target)) {
    return true;
  }

  const url = resolveUrl(pageUrl, target);
  if (!url) return false;
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return false;
  if (!context.policy.isSameOrigin(url)) return false;
  return context.policy.inScope(url.href);
}

// ── Labels and selectors ─────────────────────────────────────

const LABEL_ATTRIBUTES = ['value', 'placeholder', 'title', 'name', 'alt', 'data-testid'];

function clip(text: string): string {
  return text.slice(0, LIMITS.LABEL_CHARS);
}

/** Best-effort human-readable label, probed in a fixed priority order. */
export async function describeElement(element: ElementRef): Promise<string> {
  const inner = (await element.innerText())?.trim();
  if (inner) return clip(inner);

  const aria = (await element.getAttribute('aria-label'))?.trim();
  if (aria) return clip(aria);

  const labelledBy = (await element.labelledByText())?.trim();
  if (labelledBy) return clip(labelledBy);

  const content = (await element.textContent())?.trim();
  if (content) return clip(content);

  for (const attribute of LABEL_ATTRIBUTES) {
    const value = await element.getAttribute(attribute);
    if (value) return clip(value);
  }

  return NO_TEXT;
}

export async function selectorFor(element: ElementRef, label: string): Promise<string> {
  const id = await element.getAttribute('id');
  if (id) return `#${id}`;

  const testId = await element.getAttribute('data-testid');
  if (testId) return `[data-testid='${testId}']`;

  const mainClass = (await element.getAttribute('class'))?.trim().split(/\s+/)[0];
  if (mainClass && label !== NO_TEXT) {
    return `.${mainClass}:has-text('${label.slice(0, LIMITS.SELECTOR_TEXT_CHARS)}')`;
  }

  return (await element.tagName()) ?? UNKNOWN_SELECTOR;
}

// ── Discovery ────────────────────────────────────────────────

/**
 * Navigable URLs on the current page: anchors plus data-attribute
 * carriers, validated, normalized, deduplicated, unvisited.
 */
export async function discoverLinks(
  page: PageDriver,
  context: DiscoveryContext,
): Promise<string[]> {
  const pageUrl = page.url();
  const found = new Set<string>();

  for (const carrier of LINK_CARRIERS) {
    const elements = await page.queryAll(carrier.selector);
    for (const element of elements) {
      const raw = await element.getAttribute(carrier.attribute);
      if (!raw || !context.policy.isValid(raw, pageUrl)) continue;
      if (await isExcludedElement(element, context.excludedSelectors)) continue;

      const normalized = context.policy.normalize(raw, pageUrl);
      if (normalized === null || context.isVisited(normalized)) continue;
      found.add(normalized);
    }
  }

  return [...found];
}

export async function discoverInteractiveElements(
  page: PageDriver,
  context: DiscoveryContext,
): Promise<DiscoveredElement[]> {
  const pageUrl = page.url();
  const discovered: DiscoveredElement[] = [];

  for (const group of ELEMENT_GROUPS) {
    const elements = await page.queryAll(group.selector);
    for (const element of elements) {
      if (!(await admitElement(element, context, pageUrl))) continue;
      const text = await describeElement(element);
      discovered.push({
        type: group.type,
        element,
        text,
        selector: await selectorFor(element, text),
      });
    }
  }

  return discovered;
}
