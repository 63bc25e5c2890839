import { z } from 'zod';

import {
  BROWSER,
  DELAYS,
  DISCOVERY,
  ERROR_CAPTURE,
  EXCLUSIONS,
  LIMITS,
  LOGIN,
  OUTPUT,
  TIMEOUTS,
} from '../config/defaults.js';

// ── Shared enums ─────────────────────────────────────────────

export const crawlStrategySchema = z.enum(['bfs', 'dfs']);

export type CrawlStrategy = z.infer<typeof crawlStrategySchema>;

export const waitUntilSchema = z.enum([
  'load',
  'domcontentloaded',
  'networkidle',
  'commit',
]);

export type WaitUntil = z.infer<typeof waitUntilSchema>;

// ── Login block ──────────────────────────────────────────────

export const loginConfigSchema = z.object({
  url: z.string().url().optional(),
  waitSeconds: z.number().nonnegative().default(LOGIN.WAIT_SECONDS),
  cookie: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  usernameSelector: z.string().min(1).optional(),
  passwordSelector: z.string().min(1).optional(),
  submitSelector: z.string().min(1).optional(),
  successSelector: z.string().min(1).optional(),
  successUrlKeywords: z
    .array(z.string().min(1))
    .default([...LOGIN.SUCCESS_URL_KEYWORDS]),
});

export type LoginConfig = z.infer<typeof loginConfigSchema>;

// ── Crawl block ──────────────────────────────────────────────

export const crawlConfigSchema = z.object({
  strategy: crawlStrategySchema.default('dfs'),
  maxPages: z.number().int().positive().default(LIMITS.MAX_PAGES),
  maxDepth: z.number().int().nonnegative().default(LIMITS.MAX_DEPTH),
  includeQuery: z.boolean().default(true),
  includeHash: z.boolean().default(false),
  crawlDelayMs: z.number().nonnegative().default(DELAYS.CRAWL_DELAY),
  elementDelayMs: z
    .number()
    .nonnegative()
    .default(DELAYS.ELEMENT_INTERACTION_DELAY),
});

export type CrawlConfig = z.infer<typeof crawlConfigSchema>;

// ── Timeouts block ───────────────────────────────────────────

export const timeoutConfigSchema = z.object({
  pageLoad: z.number().int().positive().default(TIMEOUTS.PAGE_LOAD_TIMEOUT),
  element: z.number().int().positive().default(TIMEOUTS.ELEMENT_TIMEOUT),
  navigation: z.number().int().positive().default(TIMEOUTS.NAVIGATION_TIMEOUT),
  popup: z.number().int().nonnegative().default(TIMEOUTS.POPUP_WAIT_TIMEOUT),
  pageWaitUntil: waitUntilSchema.default('domcontentloaded'),
  navigationWaitUntil: waitUntilSchema.default('domcontentloaded'),
});

export type TimeoutConfig = z.infer<typeof timeoutConfigSchema>;

// ── Exclusions block ─────────────────────────────────────────

export const exclusionConfigSchema = z.object({
  urlPatterns: z.array(z.string().min(1)).default([...EXCLUSIONS.URL_PATTERNS]),
  elementSelectors: z
    .array(z.string().min(1))
    .default([...EXCLUSIONS.ELEMENT_SELECTORS]),
});

export type ExclusionConfig = z.infer<typeof exclusionConfigSchema>;

// ── Discovery block ──────────────────────────────────────────

export const discoveryConfigSchema = z.object({
  expandNavigation: z.boolean().default(true),
  maxExpandClicks: z.number().int().nonnegative().default(LIMITS.MAX_EXPAND_CLICKS),
  clickSelectors: z
    .array(z.string().min(1))
    .default([...DISCOVERY.CLICK_SELECTORS]),
  excludedText: z
    .array(z.string().min(1))
    .default([...EXCLUSIONS.DISCOVERY_TEXT]),
  scroll: z.boolean().default(true),
  scrollSteps: z.number().int().positive().default(LIMITS.SCROLL_STEPS),
  scrollPauseMs: z.number().nonnegative().default(DELAYS.SCROLL_PAUSE),
  scrollToTop: z.boolean().default(true),
});

export type DiscoveryConfig = z.infer<typeof discoveryConfigSchema>;

// ── Route seeds block ────────────────────────────────────────

const paramValueSchema = z.union([z.string(), z.number()]);

export const routeSeedConfigSchema = z.object({
  file: z.string().min(1).optional(),
  includeDynamic: z.boolean().default(true),
  skipMissing: z.boolean().default(true),
  learnParams: z.boolean().default(true),
  maxExpansionsPerPath: z
    .number()
    .int()
    .positive()
    .default(LIMITS.MAX_EXPANSIONS_PER_PATH),
  params: z
    .record(z.union([paramValueSchema, z.array(paramValueSchema.nullable()), z.null()]))
    .default({}),
});

export type RouteSeedConfig = z.infer<typeof routeSeedConfigSchema>;

// ── Error capture block ──────────────────────────────────────

export const errorCaptureConfigSchema = z.object({
  statusCodes: z
    .array(z.number().int().min(100).max(599))
    .default([...ERROR_CAPTURE.STATUS_CODES]),
  consoleTypes: z
    .array(z.string().min(1))
    .default([...ERROR_CAPTURE.CONSOLE_TYPES]),
  ignorePatterns: z
    .array(z.string().min(1))
    .default([...ERROR_CAPTURE.IGNORE_PATTERNS]),
});

export type ErrorCaptureConfig = z.infer<typeof errorCaptureConfigSchema>;

// ── Screenshots, browser, output ─────────────────────────────

export const screenshotConfigSchema = z.object({
  onError: z.boolean().default(true),
  fullPage: z.boolean().default(true),
});

export type ScreenshotConfig = z.infer<typeof screenshotConfigSchema>;

export const browserConfigSchema = z.object({
  headless: z.boolean().default(false),
  slowMo: z.number().int().nonnegative().default(BROWSER.SLOW_MO),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: BROWSER.VIEWPORT_WIDTH, height: BROWSER.VIEWPORT_HEIGHT }),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

export const outputConfigSchema = z.object({
  dir: z.string().min(1).default(OUTPUT.DIR),
});

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    baseUrl: z
      .string()
      .url()
      .refine((u) => /^https?:\/\//i.test(u), 'baseUrl must be an http(s) URL'),
    singleModule: z.string().min(1).nullish(),
    // All-digit keys would be reordered ahead of the rest by the object.
    modules: z
      .record(
        z.string().min(1).regex(/\D/, 'module name must contain a non-digit character'),
        z.array(z.string().url()),
      )
      .default({}),
    login: loginConfigSchema.default({}),
    crawl: crawlConfigSchema.default({}),
    timeouts: timeoutConfigSchema.default({}),
    exclusions: exclusionConfigSchema.default({}),
    discovery: discoveryConfigSchema.default({}),
    routeSeeds: routeSeedConfigSchema.default({}),
    errors: errorCaptureConfigSchema.default({}),
    screenshots: screenshotConfigSchema.default({}),
    browser: browserConfigSchema.default({}),
    output: outputConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const selected = config.singleModule;
    const known =
      selected === undefined ||
      selected === null ||
      Object.prototype.hasOwnProperty.call(config.modules, selected);
    if (!known) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['singleModule'],
        message: `singleModule "${selected}" is not one of the configured modules`,
      });
    }
  });

export type FileConfig = z.infer<typeof fileConfigSchema>;
