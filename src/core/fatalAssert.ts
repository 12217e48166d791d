import type { FatalAssertionDetails } from '../schema/index.js';
import { formatFatalAssertion } from '../report/reporter.js';
import { stderrSink } from '../report/sinks.js';
import { captureCallSite } from './callSite.js';

/**
 * Process-wide invariant check, usable outside tests.
 *
 * On a false condition, writes the diagnostic to stderr and aborts the
 * process. There is no unwinding: `finally` blocks and exit hooks do not run.
 * File and line default to the caller's location.
 */
export function fatalAssert(
  condition: boolean,
  details: FatalAssertionDetails = {},
): asserts condition {
  if (condition) return;

  const site = captureCallSite(1);
  const file = details.file ?? site.file;
  const line = details.line ?? site.line;

  stderrSink.write(
    formatFatalAssertion({
      ...details,
      ...(file !== undefined ? { file } : {}),
      ...(line !== undefined ? { line } : {}),
    }),
  );
  process.abort();
}
