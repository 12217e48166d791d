import { describe, it, expect } from 'vitest';

import {
  formatBatchResult,
  formatConditionFailure,
  formatOutcome,
  formatTestHeader,
} from './reporter.js';

describe('formatTestHeader', () => {
  it('frames the name between two rules', () => {
    const rule = '-'.repeat(54);
    expect(formatTestHeader('parser')).toBe(`${rule}\n\tparser\n${rule}\n`);
  });
});

describe('formatConditionFailure', () => {
  it('fills every absent field with its placeholder', () => {
    expect(formatConditionFailure({ expectedTruth: true })).toBe(
      [
        'Test failed:',
        '    Assertion <Unspecified condition literal> should have been true but was false.',
        '    File: <Unspecified file>',
        '    Line: <Unspecified line>',
        '',
      ].join('\n'),
    );
  });

  it('prints present fields as given', () => {
    expect(
      formatConditionFailure({
        conditionText: 'list.length === 0',
        file: 'list.test.ts',
        line: 7,
        expectedTruth: false,
      }),
    ).toBe(
      [
        'Test failed:',
        '    Assertion list.length === 0 should have been false but was true.',
        '    File: list.test.ts',
        '    Line: 7',
        '',
      ].join('\n'),
    );
  });
});

describe('formatOutcome', () => {
  it('covers every outcome kind', () => {
    expect(formatOutcome({ kind: 'passed' })).toBe('Test succeeded.\n');
    expect(formatOutcome({ kind: 'returned-false' })).toBe('Test failed.\n');
    expect(
      formatOutcome({ kind: 'domain-error', category: 'TypeError', message: 'x is undefined' }),
    ).toBe('Test failed (TypeError): x is undefined\n');
    expect(formatOutcome({ kind: 'unknown-error' })).toBe('Test failed (unknown error).\n');
  });
});

describe('formatBatchResult', () => {
  it('summarises a passing batch on one line', () => {
    expect(
      formatBatchResult({ batchIndex: 2, total: 5, failed: [], passed: true }),
    ).toBe('All tests (5) passed for batch 2.\n');
  });

  it('lists failures with index and name', () => {
    expect(
      formatBatchResult({
        batchIndex: 0,
        total: 3,
        failed: [
          { index: 0, name: 'opens' },
          { index: 2, name: 'closes' },
        ],
        passed: false,
      }),
    ).toBe(
      '2 out of 3 test(s) failed for batch 0:\n' +
        'Following test(s) failed:\n' +
        '    0 (opens)\n' +
        '    2 (closes)\n\n',
    );
  });
});
