import { z } from 'zod';

import {
  consoleErrorSchema,
  explanationSchema,
  networkErrorSchema,
} from './capture.js';

// ── Status ───────────────────────────────────────────────────

export const elementStatusSchema = z.enum(['passed', 'failed', 'skipped']);

export type ElementStatus = z.infer<typeof elementStatusSchema>;

export const pageStatusSchema = z.enum(['passed', 'warning', 'failed']);

export type PageStatus = z.infer<typeof pageStatusSchema>;

export type TestStatus = ElementStatus | PageStatus;

// ── ElementTestResult ────────────────────────────────────────

export const elementTypeSchema = z.enum([
  'button',
  'clickable',
  'input',
  'nav_link',
  'dropdown',
  'modal_trigger',
]);

export type ElementType = z.infer<typeof elementTypeSchema>;

export const elementTestResultSchema = z.object({
  elementType: elementTypeSchema,
  text: z.string(),
  selector: z.string(),
  action: z.string().min(1),
  status: elementStatusSchema,
  errorMessage: z.string().optional(),
  /** Link target read before the click (nav links only). */
  href: z.string().optional(),
  navigatedTo: z.string().optional(),
  screenshotPath: z.string().optional(),
  explanation: explanationSchema.optional(),
  timestamp: z.string().datetime(),
});

export type ElementTestResult = z.infer<typeof elementTestResultSchema>;

// ── PageTestResult ───────────────────────────────────────────

export const pageFailureSchema = z.object({
  message: z.string(),
  explanation: explanationSchema,
});

export type PageFailure = z.infer<typeof pageFailureSchema>;

export const pageTestResultSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  status: pageStatusSchema,
  loadTimeMs: z.number().nonnegative(),
  screenshotPath: z.string().optional(),
  failure: pageFailureSchema.optional(),
  networkErrors: z.array(networkErrorSchema),
  consoleErrors: z.array(consoleErrorSchema),
  elementTests: z.array(elementTestResultSchema),
  discoveredLinks: z.array(z.string()),
  crawlDepth: z.number().int().nonnegative(),
  discoveredFrom: z.string(),
  module: z.string(),
  timestamp: z.string().datetime(),
});

export type PageTestResult = z.infer<typeof pageTestResultSchema>;

// ── Crawl path ───────────────────────────────────────────────

export const crawlPathStepSchema = z.object({
  stepNumber: z.number().int().positive(),
  url: z.string(),
  title: z.string(),
  discoveredFrom: z.string(),
  status: pageStatusSchema,
  linksFound: z.number().int().nonnegative(),
  module: z.string(),
});

export type CrawlPathStep = z.infer<typeof crawlPathStepSchema>;

// ── Seed stats ───────────────────────────────────────────────

export const seedStatsSchema = z.object({
  moduleSeeds: z.number().int().nonnegative(),
  routeSeeds: z.number().int().nonnegative(),
  dynamicRouteSeeds: z.number().int().nonnegative(),
});

export type SeedStats = z.infer<typeof seedStatsSchema>;

// ── TestSession ──────────────────────────────────────────────

export const testSessionSchema = z.object({
  websiteUrl: z.string().url(),
  strategy: z.enum(['bfs', 'dfs']),
  module: z.string().nullable(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  pages: z.array(pageTestResultSchema),
  crawlPath: z.array(crawlPathStepSchema),
  seeds: seedStatsSchema,
});

export type TestSession = z.infer<typeof testSessionSchema>;

// ── Deterministic status decisions ───────────────────────────

/**
 * Aggregate page status: any failed element or a failed navigation
 * dominates, then any captured network or console error.
 */
export function computePageStatus(
  page: Pick<PageTestResult, 'elementTests' | 'networkErrors' | 'consoleErrors' | 'failure'>,
): PageStatus {
  if (page.failure !== undefined) return 'failed';
  if (page.elementTests.some((e) => e.status === 'failed')) return 'failed';
  if (page.networkErrors.length > 0 || page.consoleErrors.length > 0) {
    return 'warning';
  }
  return 'passed';
}

export function pageHasErrors(page: PageTestResult): boolean {
  return (
    page.failure !== undefined ||
    page.networkErrors.length > 0 ||
    page.consoleErrors.length > 0 ||
    page.elementTests.some((e) => e.status === 'failed')
  );
}

export interface SessionTotals {
  pages: number;
  pagesWithErrors: number;
  networkErrors: number;
  consoleErrors: number;
  elementTests: number;
  elementFailures: number;
  elementSkips: number;
}

export function summarizeSession(session: TestSession): SessionTotals {
  const totals: SessionTotals = {
    pages: session.pages.length,
    pagesWithErrors: 0,
    networkErrors: 0,
    consoleErrors: 0,
    elementTests: 0,
    elementFailures: 0,
    elementSkips: 0,
  };

  for (const page of session.pages) {
    if (pageHasErrors(page)) totals.pagesWithErrors++;
    totals.networkErrors += page.networkErrors.length;
    totals.consoleErrors += page.consoleErrors.length;
    totals.elementTests += page.elementTests.length;
    for (const e of page.elementTests) {
      if (e.status === 'failed') totals.elementFailures++;
      if (e.status === 'skipped') totals.elementSkips++;
    }
  }

  return totals;
}

/** 0 all passed, 1 any page failed, 2 warnings only. */
export function sessionExitCode(session: TestSession): number {
  if (session.pages.some((p) => p.status === 'failed')) return 1;
  if (session.pages.some((p) => p.status === 'warning')) return 2;
  return 0;
}

// ── Validators ────────────────────────────────────────────────

export function parseTestSession(data: unknown): TestSession {
  return testSessionSchema.parse(data);
}
