import type { BatchResult, TestBody, TestCase } from '../schema/index.js';
import { TestRegistry } from './registry.js';

// ── Shutdown flush ───────────────────────────────────────────

/** The slice of `process` the shutdown flush needs. */
export interface ExitEmitter {
  once(event: 'exit', listener: () => void): unknown;
  off(event: 'exit', listener: () => void): unknown;
}

/**
 * Run whatever is still pending in `registry` when `emitter` exits.
 * `run()` is synchronous, so the batch completes inside the `exit` event.
 * Returns a disposer that removes the hook.
 */
export function installShutdownFlush(
  registry: TestRegistry,
  emitter: ExitEmitter = process,
): () => void {
  const flush = (): void => {
    registry.run();
  };

  emitter.once('exit', flush);

  return () => {
    emitter.off('exit', flush);
  };
}

// ── Process-wide registry ────────────────────────────────────

let defaultRegistry: TestRegistry | undefined;

export function getDefaultRegistry(): TestRegistry {
  if (defaultRegistry === undefined) {
    defaultRegistry = new TestRegistry();
    installShutdownFlush(defaultRegistry);
  }
  return defaultRegistry;
}

export function addTest(body: TestBody, name?: string): TestCase {
  return getDefaultRegistry().addTest(body, name);
}

export function registerTest(test: TestCase): void {
  getDefaultRegistry().register(test);
}

export function runTests(): BatchResult | undefined {
  return getDefaultRegistry().run();
}
