import type { TestBody, TestCase, TestOutcome } from '../schema/index.js';
import { isPassingOutcome } from '../schema/index.js';
import { formatOutcome, formatTestHeader } from '../report/reporter.js';
import { stdoutSink } from '../report/sinks.js';
import type { ReportSink } from '../report/sinks.js';
import { isConditionFailure } from './conditions.js';

// ── Classification ───────────────────────────────────────────

/**
 * Run a test body and turn whatever happens into a TestOutcome.
 * Nothing thrown by the body escapes.
 */
export function classify(body: TestBody): TestOutcome {
  try {
    return body() === true ? { kind: 'passed' } : { kind: 'returned-false' };
  } catch (thrown) {
    return classifyThrown(thrown);
  }
}

export function classifyThrown(thrown: unknown): TestOutcome {
  if (isConditionFailure(thrown)) {
    return { kind: 'condition-failure', failure: thrown.details };
  }

  if (thrown instanceof Error) {
    return {
      kind: 'domain-error',
      category: thrown.name || 'Error',
      message: thrown.message,
    };
  }

  return { kind: 'unknown-error' };
}

// ── Execution ────────────────────────────────────────────────

/** Run one test, writing its header and diagnostic to `sink`. */
export function execute(test: TestCase, sink: ReportSink = stdoutSink): boolean {
  sink.write(formatTestHeader(test.name));

  const outcome = classify(test.body);
  sink.write(formatOutcome(outcome));

  return isPassingOutcome(outcome);
}
