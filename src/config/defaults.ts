/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  PAGE_LOAD_TIMEOUT: 30_000,
  ELEMENT_TIMEOUT: 5_000,
  NAVIGATION_TIMEOUT: 30_000,
  POPUP_WAIT_TIMEOUT: 1_500,
} as const;

export const DELAYS = {
  CRAWL_DELAY: 1_000,
  ELEMENT_INTERACTION_DELAY: 500,
  INPUT_FOCUS_SETTLE: 200,
  DIALOG_CLOSE_SETTLE: 300,
  SCROLL_PAUSE: 300,
} as const;

export const LIMITS = {
  MAX_PAGES: 100,
  MAX_DEPTH: 5,
  MAX_EXPAND_CLICKS: 10,
  MAX_EXPANSIONS_PER_PATH: 100,
  SCROLL_STEPS: 5,
  LABEL_CHARS: 100,
  SELECTOR_TEXT_CHARS: 30,
  ERROR_MESSAGE_CHARS: 500,
} as const;

export const EXCLUSIONS = {
  URL_PATTERNS: [
    'logout',
    'signout',
    'sign-out',
    'log-out',
    '/api/',
    '.pdf',
    '.zip',
    '.exe',
    'mailto:',
    'tel:',
    'javascript:',
    '#',
  ],
  ELEMENT_SELECTORS: [
    "[data-testid='logout']",
    '.logout-btn',
    '#logout',
    "[href*='logout']",
    "[href*='signout']",
  ],
  DISCOVERY_TEXT: ['logout', 'log out', 'sign out', 'signout', 'delete', 'remove'],
} as const;

export const DISCOVERY = {
  CLICK_SELECTORS: [
    "[aria-expanded='false']",
    "[data-toggle='collapse']",
    "[data-bs-toggle='collapse']",
    '.dropdown-toggle',
    '.navbar-toggler',
    '.menu-toggle',
    '[aria-controls]',
  ],
} as const;

export const ERROR_CAPTURE = {
  STATUS_CODES: [400, 401, 403, 404, 405, 500, 502, 503, 504],
  CONSOLE_TYPES: ['error', 'pageerror', 'warning'],
  IGNORE_PATTERNS: [
    'google-analytics.com',
    'gtag/js',
    'googletagmanager.com',
    'facebook.com/tr',
    'sentry.io',
  ],
} as const;

export const LOGIN = {
  WAIT_SECONDS: 30,
  POLL_INTERVAL: 1_000,
  SUCCESS_URL_KEYWORDS: ['dashboard', 'home'],
} as const;

export const BROWSER = {
  SLOW_MO: 100,
  VIEWPORT_WIDTH: 1920,
  VIEWPORT_HEIGHT: 1080,
} as const;

export const OUTPUT = {
  DIR: 'test_results',
  REPORT_FILE: 'report.md',
  SESSION_FILE: 'session.json',
  SCREENSHOT_DIR: 'screenshots',
} as const;
