/**
 * Configuration module.
 * Loads and validates run settings from env, CLI flags, and config files.
 * Zod-validated.
 */

export { PLACEHOLDERS, LAYOUT, EXIT_CODES, CONFIG_FILE } from './defaults.js';
export {
  loadConfigFile,
  loadOptionalConfigFile,
  parseConfigText,
  loadEnvOverrides,
  resolveRunSettings,
} from './loader.js';
export type { CliOverrides } from './loader.js';
