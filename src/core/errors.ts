import { EXIT_CODES } from '../config/defaults.js';

// ── Domain errors ────────────────────────────────────────────
// Raised by code under test (or by the harness on bad input).
// The classifier reports them by `name`, so every subclass sets it.

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

// ── Harness errors ───────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ModuleLoadError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG_ERROR;

  constructor(
    readonly modulePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load test module ${modulePath}: ${reason}`, { cause });
    this.name = 'ModuleLoadError';
  }
}
