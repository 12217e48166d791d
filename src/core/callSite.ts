import { fileURLToPath } from 'node:url';

// ── Public types ─────────────────────────────────────────────

export interface CallSite {
  file?: string | undefined;
  line?: number | undefined;
}

// ── Frame parsing ────────────────────────────────────────────
// "at fn (path:line:col)" and "at path:line:col". Paths may contain spaces.

const NAMED_FRAME = /\((?<file>.+):(?<line>\d+):\d+\)$/;
const BARE_FRAME = /^at (?<file>.+):(?<line>\d+):\d+$/;

export function parseStackFrame(frame: string): CallSite {
  const trimmed = frame.trim();
  const match = NAMED_FRAME.exec(trimmed) ?? BARE_FRAME.exec(trimmed);
  const file = match?.groups?.['file'];
  const line = match?.groups?.['line'];
  if (file === undefined || line === undefined) return {};

  return {
    file: file.startsWith('file://') ? fileURLToPath(file) : file,
    line: Number(line),
  };
}

/**
 * Location of a caller up the stack.
 * `depth` 0 is the function calling `captureCallSite`, 1 is its caller, and so on.
 */
export function captureCallSite(depth = 1): CallSite {
  const stack = new Error().stack;
  if (stack === undefined) return {};

  // First line is the error header, second is this function.
  const frame = stack.split('\n')[depth + 2];
  return frame === undefined ? {} : parseStackFrame(frame);
}
