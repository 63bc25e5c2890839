import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { z } from 'zod';

import { explanationSchema } from '../schema/capture.js';
import type { Explanation } from '../schema/capture.js';

// ── Table shape ──────────────────────────────────────────────

const ruleSchema = explanationSchema.extend({
  /** Matches when the lowercased message contains any of these. */
  any: z.array(z.string()).min(1),
  /** ...and every one of these, when given. */
  all: z.array(z.string()).optional(),
});

type Rule = z.infer<typeof ruleSchema>;

const tableSchema = z.object({
  network: z.record(explanationSchema),
  networkDefault: explanationSchema,
  console: z.array(ruleSchema),
  consoleByType: z.record(explanationSchema),
  consoleDefault: explanationSchema,
  element: z.array(ruleSchema),
  elementDefault: explanationSchema,
  page: z.array(ruleSchema),
  pageDefault: explanationSchema,
});

export type ExplanationTable = z.infer<typeof tableSchema>;

// Both src/core and dist/core sit two levels below the package root.
const TABLE_PATH = join(__dirname, '..', '..', 'data', 'explanations.json');

let cached: ExplanationTable | undefined;

export function loadExplanationTable(path: string = TABLE_PATH): ExplanationTable {
  if (path === TABLE_PATH && cached) return cached;
  const table = tableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  if (path === TABLE_PATH) cached = table;
  return table;
}

// ── Lookups ──────────────────────────────────────────────────

function strip(rule: Rule): Explanation {
  return {
    title: rule.title,
    explanation: rule.explanation,
    suggestion: rule.suggestion,
    severity: rule.severity,
  };
}

function firstMatch(rules: readonly Rule[], message: string): Explanation | undefined {
  const lower = message.toLowerCase();
  const rule = rules.find(
    (r) =>
      r.any.some((token) => lower.includes(token)) &&
      (r.all ?? []).every((token) => lower.includes(token)),
  );
  return rule ? strip(rule) : undefined;
}

function fill(entry: Explanation, key: string, value: string): Explanation {
  const pattern = `{${key}}`;
  return {
    ...entry,
    title: entry.title.split(pattern).join(value),
    explanation: entry.explanation.split(pattern).join(value),
  };
}

export function explainNetworkError(
  status: number,
  table: ExplanationTable = loadExplanationTable(),
): Explanation {
  return table.network[String(status)] ?? fill(table.networkDefault, 'status', String(status));
}

export function explainConsoleError(
  message: string,
  type: string,
  table: ExplanationTable = loadExplanationTable(),
): Explanation {
  return (
    firstMatch(table.console, message) ??
    table.consoleByType[type] ??
    table.consoleDefault
  );
}

/** `elementType` reads as "nav link" etc. in the explanation text. */
export function explainElementError(
  message: string,
  elementType: string,
  table: ExplanationTable = loadExplanationTable(),
): Explanation {
  const element = elementType.replace(/_/g, ' ');
  return fill(firstMatch(table.element, message) ?? table.elementDefault, 'element', element);
}

export function explainPageError(
  message: string,
  table: ExplanationTable = loadExplanationTable(),
): Explanation {
  return firstMatch(table.page, message) ?? table.pageDefault;
}
