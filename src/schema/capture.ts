import { z } from 'zod';

// ── Explanation ──────────────────────────────────────────────

export const severitySchema = z.enum(['low', 'medium', 'high', 'critical']);

export type Severity = z.infer<typeof severitySchema>;

export const explanationSchema = z.object({
  title: z.string().min(1),
  explanation: z.string(),
  suggestion: z.string(),
  severity: severitySchema,
});

export type Explanation = z.infer<typeof explanationSchema>;

// ── Network error ────────────────────────────────────────────

export const networkErrorSchema = z.object({
  url: z.string(),
  method: z.string(),
  status: z.number().int(),
  statusText: z.string(),
  timestamp: z.string().datetime(),
  explanation: explanationSchema,
});

export type NetworkError = z.infer<typeof networkErrorSchema>;

// ── Console error ────────────────────────────────────────────
// `type` is the console message type ("error", "warning", …) or
// "pageerror" for uncaught exceptions.

export const consoleErrorSchema = z.object({
  message: z.string(),
  type: z.string().min(1),
  source: z.string(),
  lineNumber: z.number().int().nonnegative(),
  timestamp: z.string().datetime(),
  explanation: explanationSchema,
});

export type ConsoleError = z.infer<typeof consoleErrorSchema>;

// ── Page capture (aggregate per page visit) ──────────────────

export const pageCaptureSchema = z.object({
  networkErrors: z.array(networkErrorSchema),
  consoleErrors: z.array(consoleErrorSchema),
});

export type PageCapture = z.infer<typeof pageCaptureSchema>;
