import { z } from 'zod';

import { conditionFailureDetailsSchema } from './conditions.js';

// ── TestOutcome ───────────────────────────────────────────────

export const testOutcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('passed') }),
  z.object({ kind: z.literal('returned-false') }),
  z.object({
    kind: z.literal('condition-failure'),
    failure: conditionFailureDetailsSchema,
  }),
  z.object({
    kind: z.literal('domain-error'),
    category: z.string().min(1),
    message: z.string(),
  }),
  z.object({ kind: z.literal('unknown-error') }),
]);

export type TestOutcome = z.infer<typeof testOutcomeSchema>;

export function isPassingOutcome(outcome: TestOutcome): boolean {
  return outcome.kind === 'passed';
}

// ── BatchResult ───────────────────────────────────────────────

export const failedTestSchema = z.object({
  index: z.number().int().nonnegative(),
  name: z.string().min(1),
});

export type FailedTest = z.infer<typeof failedTestSchema>;

export const batchResultSchema = z.object({
  batchIndex: z.number().int().nonnegative(),
  total: z.number().int().positive(),
  failed: z.array(failedTestSchema),
  passed: z.boolean(),
});

export type BatchResult = z.infer<typeof batchResultSchema>;
