// ── ReportSink ───────────────────────────────────────────────

/** Destination for report text. Writes are best-effort. */
export interface ReportSink {
  write(text: string): void;
}

export const stdoutSink: ReportSink = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

export const stderrSink: ReportSink = {
  write(text: string): void {
    process.stderr.write(text);
  },
};

// ── In-memory sink ───────────────────────────────────────────

export interface BufferSink extends ReportSink {
  text(): string;
  lines(): string[];
  clear(): void;
}

export function createBufferSink(): BufferSink {
  let chunks: string[] = [];

  return {
    write(text: string): void {
      chunks.push(text);
    },
    text(): string {
      return chunks.join('');
    },
    lines(): string[] {
      const text = chunks.join('');
      if (text.length === 0) return [];
      return text.endsWith('\n')
        ? text.slice(0, -1).split('\n')
        : text.split('\n');
    },
    clear(): void {
      chunks = [];
    },
  };
}
