#!/usr/bin/env node

/**
 * pagewalk CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerReportCommand,
  registerRunCommand,
  registerSmokeCommand,
} from './index.js';

const program = new Command();

program
  .name('pagewalk')
  .description(
    'Black-box web app exerciser. Crawls a site with Playwright, clicks what is safe to click, and reports network and console errors.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerSmokeCommand(program);
registerReportCommand(program);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 4;
});
