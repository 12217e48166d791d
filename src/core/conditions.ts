import type { ConditionFailureDetails } from '../schema/index.js';
import type { CallSite } from './callSite.js';
import { captureCallSite } from './callSite.js';

// ── ConditionFailure signal ──────────────────────────────────

/**
 * Thrown by the condition checks when a checked condition does not hold.
 *
 * Not an `Error`, so it stays distinct from anything the code under test
 * throws. Only the classifier catches it.
 */
export class ConditionFailure {
  readonly kind = 'condition-failure' as const;

  constructor(readonly details: ConditionFailureDetails) {}
}

export function isConditionFailure(value: unknown): value is ConditionFailure {
  return value instanceof ConditionFailure;
}

// ── Conditions ───────────────────────────────────────────────

/** A plain boolean, or a thunk whose source doubles as the condition text. */
export type Condition = boolean | (() => boolean);

const ARROW_PREFIX = /^\s*\(\s*\)\s*=>\s*/;
const SINGLE_RETURN_BLOCK = /^\{\s*return\s+([\s\S]+?);?\s*\}$/;

/**
 * Condition text for an arrow thunk: its expression body, or the expression
 * of a block holding a single `return`. Anything else has no text.
 */
export function describeCondition(thunk: () => boolean): string | undefined {
  const source = thunk.toString();
  if (!ARROW_PREFIX.test(source)) return undefined;

  const body = source.replace(ARROW_PREFIX, '').trim();
  if (!body.startsWith('{')) return body;

  return SINGLE_RETURN_BLOCK.exec(body)?.[1]?.trim();
}

function evaluate(condition: Condition): boolean {
  return typeof condition === 'function' ? condition() : condition;
}

function buildDetails(
  condition: Condition,
  conditionText: string | undefined,
  expectedTruth: boolean,
  site: CallSite,
): ConditionFailureDetails {
  const text =
    conditionText ??
    (typeof condition === 'function' ? describeCondition(condition) : undefined);

  return {
    expectedTruth,
    ...(text !== undefined ? { conditionText: text } : {}),
    ...(site.file !== undefined ? { file: site.file } : {}),
    ...(site.line !== undefined ? { line: site.line } : {}),
  };
}

// ── Checks ───────────────────────────────────────────────────

/** Fails the running test when `condition` holds. */
export function failTestIf(condition: Condition, conditionText?: string): void {
  if (evaluate(condition)) {
    throw new ConditionFailure(
      buildDetails(condition, conditionText, false, captureCallSite(1)),
    );
  }
}

/** Fails the running test unless `condition` holds. */
export function testSuccessRequires(
  condition: Condition,
  conditionText?: string,
): void {
  if (!evaluate(condition)) {
    throw new ConditionFailure(
      buildDetails(condition, conditionText, true, captureCallSite(1)),
    );
  }
}
