import type { Command } from 'commander';

import { CONFIG_FILE, EXIT_CODES } from '../config/defaults.js';
import {
  loadConfigFile,
  loadEnvOverrides,
  loadOptionalConfigFile,
  resolveRunSettings,
} from '../config/loader.js';
import { runModules } from '../core/runModules.js';
import * as log from '../utils/logger.js';

// ── Exit code extraction ─────────────────────────────────────

function exitCodeOf(err: unknown): number {
  if (
    err instanceof Error &&
    'exitCode' in err &&
    typeof err.exitCode === 'number'
  ) {
    return err.exitCode;
  }
  return EXIT_CODES.CONFIG_ERROR;
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Load test modules and run the tests they register')
    .argument('[modules...]', 'Test modules to load, in order')
    .option('--config <path>', 'Path to config file')
    .option('--batch-per-module', 'Run each module\'s tests as their own batch')
    .option('--fail-on-empty', 'Exit non-zero when no test was registered')
    .action(
      async (
        modules: string[],
        opts: {
          config?: string;
          batchPerModule?: true;
          failOnEmpty?: true;
        },
      ) => {
        try {
          // 1. Config file: required when named, optional at the default path
          const fileConfig =
            opts.config !== undefined
              ? await loadConfigFile(opts.config)
              : await loadOptionalConfigFile(CONFIG_FILE.DEFAULT_PATH);

          // 2. Merge: CLI flags > env > file
          const settings = resolveRunSettings(
            {
              modules,
              batchPerModule: opts.batchPerModule,
              failOnEmpty: opts.failOnEmpty,
            },
            loadEnvOverrides(),
            fileConfig,
          );

          if (settings.modules.length === 0) {
            log.warn('No test modules given on the command line or in config');
          }

          // 3. Load modules and run batches
          const { batches, exitCode } = await runModules(settings);

          // 4. Per-batch recap to stderr
          for (const batch of batches) {
            log.batchResult(batch);
          }
          if (batches.length === 0) {
            log.info('No tests were registered');
          }

          process.exitCode = exitCode;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          log.error(`Error: ${message}`);
          process.exitCode = exitCodeOf(err);
        }
      },
    );
}
