/**
 * Live crawl logger for pagewalk.
 *
 * All output goes to stderr so stdout stays clean for the JSON session dump.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { TestStatus } from '../schema/results.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function timestamp(): string {
  return new Date().toTimeString().slice(0, 8);
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function page(index: number, budget: number, url: string): void {
  write(`\n🌐 [${timestamp()}] [${String(index)}/${String(budget)}] ${url}`);
}

export function pageResult(status: TestStatus, summary: string): void {
  const icon = status === 'passed' ? '✅' : status === 'warning' ? '🟡' : '❌';
  write(`${icon} ${status.toUpperCase()} ${summary}`);
}

export function seeds(message: string): void {
  write(`🌱 ${message}`);
}

export function login(message: string): void {
  write(`🔐 ${message}`);
}
