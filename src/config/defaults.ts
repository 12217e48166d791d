/**
 * Default configuration values.
 * Placeholders are resolved at print time, never stored on the values they describe.
 */

export const PLACEHOLDERS = {
  UNNAMED_TEST: '<Unnamed test>',
  CONDITION: '<Unspecified condition literal>',
  FILE: '<Unspecified file>',
  LINE: '<Unspecified line>',
  FATAL_CONDITION: '<No condition literal specified>',
  FATAL_MESSAGE: '<No error message specified>',
} as const;

export const LAYOUT = {
  RULE_WIDTH: 54,
  INDENT: '    ',
} as const;

export const EXIT_CODES = {
  OK: 0,
  TEST_FAILURES: 1,
  NO_TESTS: 2,
  CONFIG_ERROR: 4,
} as const;

export const CONFIG_FILE = {
  DEFAULT_PATH: '.testbatch.yaml',
} as const;
