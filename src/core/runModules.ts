import path from 'node:path';
import { pathToFileURL } from 'node:url';

import type { BatchResult, RunSettings } from '../schema/index.js';
import { EXIT_CODES } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { getDefaultRegistry } from './defaultRegistry.js';
import { ModuleLoadError } from './errors.js';
import type { TestRegistry } from './registry.js';

// ── Public types ─────────────────────────────────────────────

export type ModuleImporter = (modulePath: string) => Promise<unknown>;

export interface RunModulesConfig extends RunSettings {
  registry?: TestRegistry | undefined;
  importModule?: ModuleImporter | undefined;
}

export interface RunModulesResult {
  batches: BatchResult[];
  exitCode: number;
}

// ── Module loading ───────────────────────────────────────────

export const importFromPath: ModuleImporter = (modulePath) =>
  import(pathToFileURL(path.resolve(modulePath)).href);

// ── Main entry ───────────────────────────────────────────────

/**
 * Import each test module in order, letting it register its tests, then run
 * them. With `batchPerModule`, each module's tests form their own batch.
 * Batches a module runs by itself count towards the result too.
 */
export async function runModules(
  config: RunModulesConfig,
): Promise<RunModulesResult> {
  const registry = config.registry ?? getDefaultRegistry();
  const importModule = config.importModule ?? importFromPath;
  const batches: BatchResult[] = [];
  let executed = 0;

  // Modules may run their own batches while they load.
  const unsubscribe = registry.onBatch((result) => {
    batches.push(result);
    executed += result.total;
  });

  try {
    for (const modulePath of config.modules) {
      const pendingBefore = registry.pendingCount;
      const executedBefore = executed;

      try {
        await importModule(modulePath);
      } catch (err) {
        throw new ModuleLoadError(modulePath, err);
      }

      log.moduleLoaded(
        modulePath,
        registry.pendingCount - pendingBefore + (executed - executedBefore),
      );

      if (config.batchPerModule) registry.run();
    }

    registry.run();
  } finally {
    unsubscribe();
  }

  return { batches, exitCode: exitCodeFor(batches, config.failOnEmpty) };
}

// ── Exit code ────────────────────────────────────────────────

export function exitCodeFor(
  batches: readonly BatchResult[],
  failOnEmpty: boolean,
): number {
  if (batches.length === 0) {
    return failOnEmpty ? EXIT_CODES.NO_TESTS : EXIT_CODES.OK;
  }
  return batches.every((b) => b.passed)
    ? EXIT_CODES.OK
    : EXIT_CODES.TEST_FAILURES;
}
