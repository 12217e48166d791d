import type {
  BatchResult,
  FailedTest,
  TestBody,
  TestCase,
} from '../schema/index.js';
import { formatBatchResult } from '../report/reporter.js';
import { stdoutSink } from '../report/sinks.js';
import type { ReportSink } from '../report/sinks.js';
import { execute } from './classifier.js';
import { createTestCase } from './testCase.js';

// ── Public types ─────────────────────────────────────────────

export type BatchListener = (result: BatchResult) => void;

export interface TestRegistryOptions {
  sink?: ReportSink | undefined;
}

// ── Registry ─────────────────────────────────────────────────

/**
 * Ordered collection of tests for the current batch.
 *
 * Tests run in registration order. Every non-empty `run()` drains the
 * pending list and advances the batch index by one; an empty `run()` does
 * nothing at all.
 */
export class TestRegistry {
  private readonly pending: TestCase[] = [];
  private batch = 0;
  private readonly sink: ReportSink;
  private readonly listeners = new Set<BatchListener>();

  constructor(options: TestRegistryOptions = {}) {
    this.sink = options.sink ?? stdoutSink;
  }

  get batchIndex(): number {
    return this.batch;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Call `listener` after every completed batch, whoever started it.
   * Returns a function that removes the listener.
   */
  onBatch(listener: BatchListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  register(test: TestCase): void {
    this.pending.push(test);
  }

  /** Register `body`, named after the function itself unless `name` is given. */
  addTest(body: TestBody, name?: string): TestCase {
    const test = createTestCase(body, name ?? body.name);
    this.register(test);
    return test;
  }

  run(): BatchResult | undefined {
    if (this.pending.length === 0) return undefined;

    // Tests registered while this batch runs belong to the next one.
    const tests = this.pending.splice(0);
    const failed: FailedTest[] = [];

    tests.forEach((test, index) => {
      if (!execute(test, this.sink)) {
        failed.push({ index, name: test.name });
      }
    });

    const result: BatchResult = {
      batchIndex: this.batch,
      total: tests.length,
      failed,
      passed: failed.length === 0,
    };

    this.sink.write(formatBatchResult(result));
    this.batch++;

    for (const listener of this.listeners) {
      listener(result);
    }

    return result;
  }
}
