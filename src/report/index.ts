/**
 * Report generation module.
 * Deterministic: transforms a finished session into markdown + JSON artifacts.
 */

export {
  generateMarkdown,
  serializeJSON,
  summarizeModules,
  formatDuration,
} from './reporter.js';
export type { ModuleSummary } from './reporter.js';
