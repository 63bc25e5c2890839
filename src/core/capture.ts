import type { ConsoleError, NetworkError, PageCapture } from '../schema/index.js';
import type { ErrorCaptureConfig } from '../schema/config.js';
import type { ExplanationTable } from './explanations.js';
import {
  explainConsoleError,
  explainNetworkError,
  loadExplanationTable,
} from './explanations.js';

// ── Events ───────────────────────────────────────────────────
// Driver-neutral shapes of the three passive browser streams.

export interface ResponseEvent {
  url: string;
  method: string;
  status: number;
  statusText: string;
}

export interface ConsoleEvent {
  type: string;
  text: string;
  source: string;
  lineNumber: number;
}

export interface PageErrorEvent {
  message: string;
}

// ── Collector ────────────────────────────────────────────────

/**
 * Buffers the errors seen while one page is under test. Filtering and
 * explanation happen at record time; `flush()` drains the buffers at each
 * page boundary.
 */
export class ErrorCollector {
  private networkErrors: NetworkError[] = [];
  private consoleErrors: ConsoleError[] = [];
  private readonly statusCodes: ReadonlySet<number>;
  private readonly consoleTypes: ReadonlySet<string>;
  private readonly ignorePatterns: readonly string[];

  constructor(
    config: ErrorCaptureConfig,
    private readonly table: ExplanationTable = loadExplanationTable(),
    private readonly now: () => Date = () => new Date(),
  ) {
    this.statusCodes = new Set(config.statusCodes);
    this.consoleTypes = new Set(config.consoleTypes);
    this.ignorePatterns = config.ignorePatterns.map((p) => p.toLowerCase());
  }

  recordResponse(event: ResponseEvent): boolean {
    if (!this.statusCodes.has(event.status)) return false;
    const url = event.url.toLowerCase();
    if (this.ignorePatterns.some((pattern) => url.includes(pattern))) return false;

    this.networkErrors.push({
      ...event,
      timestamp: this.now().toISOString(),
      explanation: explainNetworkError(event.status, this.table),
    });
    return true;
  }

  recordConsole(event: ConsoleEvent): boolean {
    if (!this.consoleTypes.has(event.type)) return false;

    this.consoleErrors.push({
      message: event.text,
      type: event.type,
      source: event.source,
      lineNumber: Math.max(0, Math.trunc(event.lineNumber)),
      timestamp: this.now().toISOString(),
      explanation: explainConsoleError(event.text, event.type, this.table),
    });
    return true;
  }

  /** Uncaught exceptions count only when `pageerror` is a captured type. */
  recordPageError(event: PageErrorEvent): boolean {
    if (!this.consoleTypes.has('pageerror')) return false;

    this.consoleErrors.push({
      message: event.message,
      type: 'pageerror',
      source: 'page',
      lineNumber: 0,
      timestamp: this.now().toISOString(),
      explanation: explainConsoleError(event.message, 'pageerror', this.table),
    });
    return true;
  }

  /** Return accumulated errors and reset all buffers. */
  flush(): PageCapture {
    const captured: PageCapture = {
      networkErrors: this.networkErrors,
      consoleErrors: this.consoleErrors,
    };
    this.networkErrors = [];
    this.consoleErrors = [];
    return captured;
  }
}
