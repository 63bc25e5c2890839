/**
 * Browser module.
 * Everything that talks to the page: the Playwright adapter, login,
 * error capture wiring, discovery, expansion and element interaction.
 */

export { probeOf, isTimeoutError, errorMessage } from './driver.js';
export type {
  Probe,
  ElementRef,
  PageDriver,
  PopupRef,
  ClickOptions,
  NavigateOptions,
} from './driver.js';
export { createPageDriver, wrapElement } from './playwright.js';
export { launchSession, LaunchError } from './runner.js';
export type { RunnerConfig, BrowserSession } from './runner.js';
export { parseCookieString, performLogin } from './auth.js';
export type { ScopedCookie, LoginOptions } from './auth.js';
export { attachCapture } from './capture.js';
export {
  discoverLinks,
  discoverInteractiveElements,
  describeElement,
  selectorFor,
  admitElement,
  isExcludedElement,
  NO_TEXT,
} from './discover.js';
export type { DiscoveredElement, DiscoveryContext } from './discover.js';
export { expandNavigation, scrollForLazyContent, hasExcludedText } from './expand.js';
export type { ExpandOptions, ScrollOptions } from './expand.js';
export { ElementTester, SKIP_REASONS, FAILURE_MESSAGES } from './interact.js';
export type { TesterOptions } from './interact.js';
