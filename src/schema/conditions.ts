import { z } from 'zod';

// ── ConditionFailure details ──────────────────────────────────
// Every field but the polarity may be absent; formatting fills in placeholders.

export const conditionFailureDetailsSchema = z.object({
  conditionText: z.string().optional(),
  file: z.string().optional(),
  line: z.number().int().positive().optional(),
  expectedTruth: z.boolean(),
});

export type ConditionFailureDetails = z.infer<
  typeof conditionFailureDetailsSchema
>;

// ── Fatal assertion details ───────────────────────────────────

export const fatalAssertionDetailsSchema = z.object({
  message: z.string().optional(),
  conditionText: z.string().optional(),
  file: z.string().optional(),
  line: z.number().int().positive().optional(),
});

export type FatalAssertionDetails = z.infer<typeof fatalAssertionDetailsSchema>;
