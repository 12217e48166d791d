import { z } from 'zod';

import { PLACEHOLDERS } from '../config/defaults.js';

// ── TestBody ──────────────────────────────────────────────────

/** Zero-argument callable answering "did this test pass". */
export type TestBody = () => boolean;

export const testBodySchema = z.custom<TestBody>(
  (value) => typeof value === 'function',
  { message: 'Test body must be a function' },
);

// ── TestCase ──────────────────────────────────────────────────

export const testNameSchema = z
  .string()
  .min(1)
  .optional()
  .transform((name) => name ?? PLACEHOLDERS.UNNAMED_TEST);

export const testCaseSchema = z.object({
  body: testBodySchema,
  name: testNameSchema,
});

export type TestCase = Readonly<z.infer<typeof testCaseSchema>>;
