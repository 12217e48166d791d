/**
 * Core module.
 * Registry, runner, outcome classifier and the checks test bodies use.
 */

export { TestRegistry } from './registry.js';
export type { BatchListener, TestRegistryOptions } from './registry.js';
export {
  getDefaultRegistry,
  installShutdownFlush,
  addTest,
  registerTest,
  runTests,
} from './defaultRegistry.js';
export type { ExitEmitter } from './defaultRegistry.js';
export { classify, classifyThrown, execute } from './classifier.js';
export {
  ConditionFailure,
  isConditionFailure,
  describeCondition,
  failTestIf,
  testSuccessRequires,
} from './conditions.js';
export type { Condition } from './conditions.js';
export { createTestCase } from './testCase.js';
export { fatalAssert } from './fatalAssert.js';
export { captureCallSite, parseStackFrame } from './callSite.js';
export type { CallSite } from './callSite.js';
export {
  InvalidArgumentError,
  RuntimeError,
  ConfigError,
  ModuleLoadError,
} from './errors.js';
export { runModules, importFromPath, exitCodeFor } from './runModules.js';
export type {
  ModuleImporter,
  RunModulesConfig,
  RunModulesResult,
} from './runModules.js';
