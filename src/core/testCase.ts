import { testCaseSchema } from '../schema/index.js';
import type { TestBody, TestCase } from '../schema/index.js';
import { InvalidArgumentError } from './errors.js';

/**
 * Build a frozen TestCase. An empty or missing name becomes the unnamed-test
 * placeholder.
 */
export function createTestCase(body: TestBody, name?: string): TestCase {
  const result = testCaseSchema.safeParse({
    body,
    name: name === '' ? undefined : name,
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => i.message).join('; ');
    throw new InvalidArgumentError(`Invalid test case: ${issues}`);
  }

  return Object.freeze(result.data);
}
