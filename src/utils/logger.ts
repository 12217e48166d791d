/**
 * Live progress logger for testbatch.
 *
 * All output goes to stderr so stdout carries nothing but the test report.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { BatchResult } from '../schema/index.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function moduleLoaded(modulePath: string, registered: number): void {
  write(`📦 Loaded ${modulePath}: ${String(registered)} test(s) registered`);
}

export function batchResult(result: BatchResult): void {
  const icon = result.passed ? '✅' : '❌';
  const failed = String(result.failed.length);
  write(
    `${icon} Batch ${String(result.batchIndex)}: ${failed}/${String(result.total)} failed`,
  );
}
