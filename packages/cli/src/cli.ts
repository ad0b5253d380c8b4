import { Command, CommanderError } from 'commander';
import type { FetchFn, Logger } from '@aep-ingest/core';
import { BatchIngestion, createLogger, errorMessage, loadConfig } from '@aep-ingest/core';
import type { CliContext, OutputOptions } from './context.js';
import { registerBatchCommands } from './commands/batch.js';
import { registerIngestCommands } from './commands/ingest.js';
import { registerDatasetCommands } from './commands/dataset.js';
import { registerDataflowCommands } from './commands/dataflow.js';

export const CLI_VERSION = '0.1.0';

/** Process wiring, replaceable in tests. */
export interface CliDeps {
  /** Default: `process.env`. */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly fetch?: FetchFn;
  /** Receives command output. Default: `process.stdout`. */
  readonly stdout?: (text: string) => void;
  /** Receives usage errors and help from the argument parser. Default: `process.stderr`. */
  readonly stderr?: (text: string) => void;
  /** Default: a console logger on stderr at `LOG_LEVEL`. */
  readonly logger?: Logger;
}

/**
 * Run the CLI and resolve to its exit code: `0` on success, `1` when a command
 * failed, an upload failed or an awaited batch did not succeed.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const logger = deps.logger ?? createLogger({ level: env.LOG_LEVEL, plain: !process.stderr.isTTY });

  let exitCode = 0;
  let ingestion: BatchIngestion | undefined;

  const ctx: CliContext = {
    logger,
    ingestion() {
      if (!ingestion) {
        ingestion = BatchIngestion.fromConfig(loadConfig(env), { fetch: deps.fetch, logger });
      }
      return ingestion;
    },
    report(options: OutputOptions, value: unknown, text: readonly string[]) {
      stdout(options.json ? `${JSON.stringify(value, null, 2)}\n` : `${text.join('\n')}\n`);
    },
    fail() {
      exitCode = 1;
    },
  };

  const program = buildProgram(ctx, { stdout, stderr });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    logger.error(errorMessage(error));
    return 1;
  }
  return exitCode;
}

export function buildProgram(
  ctx: CliContext,
  output: { stdout: (text: string) => void; stderr: (text: string) => void },
): Command {
  const program = new Command();

  // Settings below are inherited by every subcommand created afterwards.
  program
    .name('aep-ingest')
    .description('Batch ingestion into Adobe Experience Platform datasets')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({ writeOut: output.stdout, writeErr: output.stderr })
    .showHelpAfterError();

  registerBatchCommands(program, ctx);
  registerIngestCommands(program, ctx);
  registerDatasetCommands(program, ctx);
  registerDataflowCommands(program, ctx);

  return program;
}
