/**
 * CLI module. Thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerRunCommand,
  registerSmokeCommand,
  registerReportCommand,
  resolveConfig,
  parsePositiveInt,
  parseNonNegativeInt,
  parseStrategy,
} from './run.js';
