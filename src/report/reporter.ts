import type {
  BatchResult,
  ConditionFailureDetails,
  FatalAssertionDetails,
  TestOutcome,
} from '../schema/index.js';
import { LAYOUT, PLACEHOLDERS } from '../config/defaults.js';

// ── Test header ──────────────────────────────────────────────

export function formatRule(): string {
  return '-'.repeat(LAYOUT.RULE_WIDTH);
}

export function formatTestHeader(name: string): string {
  const rule = formatRule();
  return `${rule}\n\t${name}\n${rule}\n`;
}

// ── Test outcome ─────────────────────────────────────────────

export function formatOutcome(outcome: TestOutcome): string {
  switch (outcome.kind) {
    case 'passed':
      return 'Test succeeded.\n';
    case 'returned-false':
      return 'Test failed.\n';
    case 'condition-failure':
      return formatConditionFailure(outcome.failure);
    case 'domain-error':
      return `Test failed (${outcome.category}): ${outcome.message}\n`;
    case 'unknown-error':
      return 'Test failed (unknown error).\n';
  }
}

export function formatConditionFailure(failure: ConditionFailureDetails): string {
  const condition = failure.conditionText ?? PLACEHOLDERS.CONDITION;
  const expected = String(failure.expectedTruth);
  const actual = String(!failure.expectedTruth);

  return [
    'Test failed:',
    `${LAYOUT.INDENT}Assertion ${condition} should have been ${expected} but was ${actual}.`,
    `${LAYOUT.INDENT}File: ${failure.file ?? PLACEHOLDERS.FILE}`,
    `${LAYOUT.INDENT}Line: ${formatLine(failure.line)}`,
  ].join('\n') + '\n';
}

// ── Batch summary ────────────────────────────────────────────

export function formatBatchResult(result: BatchResult): string {
  const total = String(result.total);
  const batch = String(result.batchIndex);

  if (result.failed.length === 0) {
    return `All tests (${total}) passed for batch ${batch}.\n`;
  }

  const lines = [
    `${String(result.failed.length)} out of ${total} test(s) failed for batch ${batch}:`,
    'Following test(s) failed:',
    ...result.failed.map(
      (f) => `${LAYOUT.INDENT}${String(f.index)} (${f.name})`,
    ),
  ];

  return lines.join('\n') + '\n\n';
}

// ── Fatal assertion ──────────────────────────────────────────

export function formatFatalAssertion(details: FatalAssertionDetails): string {
  return [
    `Assertion ${details.conditionText ?? PLACEHOLDERS.FATAL_CONDITION} failed.`,
    `${LAYOUT.INDENT}Message: ${details.message ?? PLACEHOLDERS.FATAL_MESSAGE}`,
    `${LAYOUT.INDENT}File: ${details.file ?? PLACEHOLDERS.FILE}`,
    `${LAYOUT.INDENT}Line: ${formatLine(details.line)}`,
  ].join('\n') + '\n';
}

// ── Helpers ──────────────────────────────────────────────────

function formatLine(line: number | undefined): string {
  return line !== undefined ? String(line) : PLACEHOLDERS.LINE;
}
