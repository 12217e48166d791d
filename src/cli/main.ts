#!/usr/bin/env node

/**
 * testbatch CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand } from './run.js';

const program = new Command();

program
  .name('testbatch')
  .description(
    'Minimal in-process unit-testing harness. Loads test modules, runs their tests in batches, prints a summary per batch.',
  )
  .version('0.1.0');

registerRunCommand(program);

await program.parseAsync();
