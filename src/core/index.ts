/**
 * Core orchestration module.
 * Coordinates login → crawl → page test → report for one run.
 * Talks to the browser only through the driver interfaces.
 */

export { runSession, runFolderName, loadRouteSeeds } from './run.js';
export type { SessionOutcome } from './run.js';
export { runCrawl } from './crawler.js';
export type { CrawlDeps } from './crawler.js';
export { testPage, NavigationError } from './pageTest.js';
export type { PageTestContext } from './pageTest.js';
export { ErrorCollector } from './capture.js';
export type { ResponseEvent, ConsoleEvent, PageErrorEvent } from './capture.js';
export {
  loadExplanationTable,
  explainNetworkError,
  explainConsoleError,
  explainElementError,
  explainPageError,
} from './explanations.js';
export type { ExplanationTable } from './explanations.js';
export { runSmoke, smokeCheck, smokeCollector } from './smoke.js';
export type { SmokeResult } from './smoke.js';

export * from '../schema/index.js';
export { loadConfigFile, parseConfig, applyOverrides, ConfigError } from '../config/index.js';
export { normalizeUrl, UrlPolicy } from '../crawl/urls.js';
export { resolveModule, isUrlInModule, UNCATEGORIZED } from '../crawl/modules.js';
export { CrawlState, SEED_LABELS } from '../crawl/frontier.js';
export { RouteSeedSource, extractRoutePaths, expandRoutePaths } from '../crawl/routeSeeds.js';
export * from '../browser/index.js';
export * from '../report/index.js';
