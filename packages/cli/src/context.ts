import type { BatchIngestion, Logger } from '@aep-ingest/core';

/** Options every command accepts. */
export interface OutputOptions {
  readonly json?: boolean;
}

/** What a command needs from the running CLI. */
export interface CliContext {
  readonly logger: Logger;
  /** Built on first use, so `--help` works without credentials. */
  ingestion(): BatchIngestion;
  /** Print `value` as JSON with `--json`, otherwise the text lines. */
  report(options: OutputOptions, value: unknown, text: readonly string[]): void;
  /** Mark the run as failed without aborting the command. */
  fail(): void;
}
