import type {
  PageStatus,
  PageTestResult,
  TestSession,
} from '../schema/index.js';
import { sessionExitCode, summarizeSession } from '../schema/index.js';

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(session: TestSession): string {
  return JSON.stringify(session, sortedReplacer, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isRecord(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

// ── Module summary ───────────────────────────────────────────

export interface ModuleSummary {
  module: string;
  pages: number;
  passed: number;
  warning: number;
  failed: number;
}

/** One row per module, in order of first appearance in the crawl. */
export function summarizeModules(session: TestSession): ModuleSummary[] {
  const rows = new Map<string, ModuleSummary>();
  for (const page of session.pages) {
    const row = rows.get(page.module) ?? {
      module: page.module,
      pages: 0,
      passed: 0,
      warning: 0,
      failed: 0,
    };
    row.pages++;
    row[page.status]++;
    rows.set(page.module, row);
  }
  return [...rows.values()];
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(session: TestSession): string {
  const totals = summarizeSession(session);
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# pagewalk Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **URL** | ${session.websiteUrl} |`);
  lines.push(`| **Module** | ${session.module ?? 'All modules'} |`);
  lines.push(`| **Strategy** | ${session.strategy.toUpperCase()} |`);
  lines.push(`| **Started** | ${session.startedAt} |`);
  lines.push(`| **Finished** | ${session.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(session.durationMs)} |`);
  lines.push(`| **Result** | ${resultLabel(sessionExitCode(session))} |`);
  lines.push('');

  // Totals
  lines.push(`## Summary`);
  lines.push('');
  lines.push(`| Metric | Count |`);
  lines.push(`|--------|-------|`);
  lines.push(`| Pages tested | ${String(totals.pages)} |`);
  lines.push(`| Pages with errors | ${String(totals.pagesWithErrors)} |`);
  lines.push(`| Network errors | ${String(totals.networkErrors)} |`);
  lines.push(`| Console errors | ${String(totals.consoleErrors)} |`);
  lines.push(`| Elements tested | ${String(totals.elementTests)} |`);
  lines.push(`| Element failures | ${String(totals.elementFailures)} |`);
  lines.push(`| Elements skipped | ${String(totals.elementSkips)} |`);
  lines.push(
    `| Seeds (module / route / dynamic) | ${String(session.seeds.moduleSeeds)} / ${String(session.seeds.routeSeeds)} / ${String(session.seeds.dynamicRouteSeeds)} |`,
  );
  lines.push('');

  // Modules
  const modules = summarizeModules(session);
  if (modules.length > 0) {
    lines.push(`## Modules`);
    lines.push('');
    lines.push(`| Module | Pages | Passed | Warning | Failed |`);
    lines.push(`|--------|-------|--------|---------|--------|`);
    for (const row of modules) {
      lines.push(
        `| ${escapeMarkdownCell(row.module)} | ${String(row.pages)} | ${String(row.passed)} | ${String(row.warning)} | ${String(row.failed)} |`,
      );
    }
    lines.push('');
  }

  // Crawl path
  lines.push(`## Crawl Path`);
  lines.push('');
  lines.push(`| # | URL | Title | Discovered From | Status | Links | Module |`);
  lines.push(`|---|-----|-------|-----------------|--------|-------|--------|`);
  for (const step of session.crawlPath) {
    lines.push(
      `| ${String(step.stepNumber)} | ${escapeMarkdownCell(step.url)} | ${escapeMarkdownCell(step.title)} | ${escapeMarkdownCell(step.discoveredFrom)} | ${statusIcon(step.status)} | ${String(step.linksFound)} | ${escapeMarkdownCell(step.module)} |`,
    );
  }
  lines.push('');

  // Per-page details
  lines.push(`## Page Details`);
  lines.push('');
  for (const page of session.pages) {
    lines.push(...pageDetails(page));
  }

  return lines.join('\n');
}

function pageDetails(page: PageTestResult): string[] {
  const lines: string[] = [];
  lines.push(`### ${statusIcon(page.status)} ${page.title || page.url}`);
  lines.push('');
  lines.push(`- URL: ${page.url}`);
  lines.push(`- Module: ${page.module}`);
  lines.push(`- Depth: ${String(page.crawlDepth)} (from ${page.discoveredFrom})`);
  lines.push(`- Load time: ${String(Math.round(page.loadTimeMs))}ms`);
  if (page.screenshotPath !== undefined) {
    lines.push('');
    lines.push(`![screenshot](${page.screenshotPath})`);
  }
  lines.push('');

  if (page.failure) {
    lines.push(`**Page Failure:** ${page.failure.explanation.title}: ${page.failure.message}`);
    lines.push('');
    lines.push(`> ${page.failure.explanation.suggestion}`);
    lines.push('');
  }

  if (page.networkErrors.length > 0) {
    lines.push(`**Network Failures:**`);
    lines.push('');
    for (const f of page.networkErrors) {
      lines.push(
        `- [${f.explanation.severity.toUpperCase()}] \`${f.method} ${f.url}\` -> ${String(f.status)} ${f.statusText}: ${f.explanation.suggestion}`,
      );
    }
    lines.push('');
  }

  if (page.consoleErrors.length > 0) {
    lines.push(`**Console Errors:**`);
    lines.push('');
    for (const e of page.consoleErrors) {
      lines.push(`- [${e.explanation.severity.toUpperCase()}] ${e.type}: ${e.message}`);
    }
    lines.push('');
  }

  const failed = page.elementTests.filter((e) => e.status === 'failed');
  if (failed.length > 0) {
    lines.push(`**Element Failures:**`);
    lines.push('');
    for (const e of failed) {
      lines.push(
        `- ${e.elementType} \`${e.selector}\` (${e.text}): ${e.errorMessage ?? 'failed'}`,
      );
    }
    lines.push('');
  }

  if (page.elementTests.length > 0) {
    lines.push(`| Type | Element | Action | Status | Note |`);
    lines.push(`|------|---------|--------|--------|------|`);
    for (const e of page.elementTests) {
      lines.push(
        `| ${e.elementType} | ${escapeMarkdownCell(e.text)} | ${escapeMarkdownCell(e.action)} | ${e.status} | ${escapeMarkdownCell(e.errorMessage ?? e.navigatedTo ?? '')} |`,
      );
    }
    lines.push('');
  }

  return lines;
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(status: PageStatus): string {
  switch (status) {
    case 'passed':
      return '[PASS]';
    case 'warning':
      return '[WARN]';
    case 'failed':
      return '[FAIL]';
  }
}

function resultLabel(exitCode: number): string {
  if (exitCode === 1) return '**FAILED**';
  if (exitCode === 2) return '**WARNINGS**';
  return '**PASSED**';
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
