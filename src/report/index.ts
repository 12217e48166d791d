/**
 * Report module.
 * All console text the harness produces is built here; sinks decide where it goes.
 */

export {
  formatRule,
  formatTestHeader,
  formatOutcome,
  formatConditionFailure,
  formatBatchResult,
  formatFatalAssertion,
} from './reporter.js';
export { stdoutSink, stderrSink, createBufferSink } from './sinks.js';
export type { ReportSink, BufferSink } from './sinks.js';
