import type { ConsoleMessage, Page, Response } from 'playwright-core';

import type { ErrorCollector } from '../core/capture.js';

/**
 * Attach capture listeners to a Playwright page.
 * Call once at page creation; listeners persist for the session, and the
 * collector's `flush()` splits what they record into per-page batches.
 * Returns a function that detaches the listeners.
 */
export function attachCapture(page: Page, collector: ErrorCollector): () => void {
  const onResponse = (response: Response): void => {
    collector.recordResponse({
      url: response.url(),
      method: response.request().method(),
      status: response.status(),
      statusText: response.statusText(),
    });
  };

  const onConsole = (msg: ConsoleMessage): void => {
    const location = msg.location();
    collector.recordConsole({
      type: msg.type(),
      text: msg.text(),
      source: location.url,
      lineNumber: location.lineNumber,
    });
  };

  const onPageError = (error: Error): void => {
    collector.recordPageError({ message: error.message || String(error) });
  };

  page.on('response', onResponse);
  page.on('console', onConsole);
  page.on('pageerror', onPageError);

  return () => {
    page.off('response', onResponse);
    page.off('console', onConsole);
    page.off('pageerror', onPageError);
  };
}
