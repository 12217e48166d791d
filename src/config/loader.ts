import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { envOverridesSchema, fileConfigSchema } from '../schema/config.js';
import type {
  EnvOverrides,
  FileConfig,
  RunSettings,
} from '../schema/config.js';
import { ConfigError } from '../core/errors.js';

// ── Config file ─────────────────────────────────────────────

/**
 * Load and validate a `.testbatch.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  return parseConfigText(raw, configPath);
}

/** Like `loadConfigFile`, but a missing file yields `undefined`. */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<FileConfig | undefined> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  return parseConfigText(raw, configPath);
}

export function parseConfigText(raw: string, configPath: string): FileConfig {
  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);

    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    throw new ConfigError(`Invalid config file ${configPath}: ${describe(err)}`);
  }
}

// ── Env overrides ───────────────────────────────────────────

export function loadEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
): EnvOverrides {
  const result = envOverridesSchema.safeParse({
    batchPerModule: env['TESTBATCH_BATCH_PER_MODULE'],
    failOnEmpty: env['TESTBATCH_FAIL_ON_EMPTY'],
  });

  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${describe(result.error)}`);
  }
  return result.data;
}

// ── Merge ───────────────────────────────────────────────────
// CLI flags override env, env overrides the config file.

export interface CliOverrides {
  modules: readonly string[];
  batchPerModule?: boolean | undefined;
  failOnEmpty?: boolean | undefined;
}

export function resolveRunSettings(
  cli: CliOverrides,
  env: EnvOverrides,
  file: FileConfig | undefined,
): RunSettings {
  return {
    modules: cli.modules.length > 0 ? [...cli.modules] : (file?.modules ?? []),
    batchPerModule:
      cli.batchPerModule ?? env.batchPerModule ?? file?.batchPerModule ?? false,
    failOnEmpty:
      cli.failOnEmpty ?? env.failOnEmpty ?? file?.failOnEmpty ?? false,
  };
}

// ── Helpers ─────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
