import type { Command } from 'commander';
import type { BatchStatus } from '@aep-ingest/core';
import type { CliContext, OutputOptions } from '../context.js';
import { formatBatch, formatBatchRow } from '../format.js';
import { parseBatchStatus, parseNonNegativeInt, parsePositiveInt } from '../options.js';

interface CreateOptions extends OutputOptions {
  readonly dataset: string;
  readonly format: string;
}

interface ListOptions extends OutputOptions {
  readonly dataset?: string;
  readonly status?: BatchStatus;
  readonly limit: number;
}

interface WaitOptions extends OutputOptions {
  readonly interval: number;
  readonly timeout: number;
}

export function registerBatchCommands(program: Command, ctx: CliContext): void {
  const batch = program.command('batch').description('Create, inspect and finish ingestion batches');

  batch
    .command('create')
    .description('Open a new batch for a dataset')
    .requiredOption('-d, --dataset <id>', 'Target dataset id')
    .option('-f, --format <format>', 'Input format: parquet, json, csv or avro', 'json')
    .option('--json', 'Print the result as JSON')
    .action(async (options: CreateOptions) => {
      const batchId = await ctx.ingestion().createBatch(options.dataset, options.format);
      ctx.report(options, { batchId }, [`Created batch ${batchId}`]);
    });

  batch
    .command('status <batchId>')
    .description('Show the current state of a batch')
    .option('--json', 'Print the result as JSON')
    .action(async (batchId: string, options: OutputOptions) => {
      const result = await ctx.ingestion().getBatch(batchId);
      ctx.report(options, result, formatBatch(result));
    });

  batch
    .command('list')
    .description('List recent batches')
    .option('-d, --dataset <id>', 'Only batches of this dataset')
    .option('-s, --status <status>', 'Only batches in this status', parseBatchStatus)
    .option('-l, --limit <n>', 'Maximum number of batches (1-100)', parsePositiveInt, 20)
    .option('--json', 'Print the result as JSON')
    .action(async (options: ListOptions) => {
      const batches = await ctx.ingestion().catalog.listBatches({
        datasetId: options.dataset,
        status: options.status,
        limit: options.limit,
      });
      ctx.report(options, batches, batches.length > 0 ? batches.map(formatBatchRow) : ['No batches found']);
    });

  batch
    .command('complete <batchId>')
    .description('Signal that all files are uploaded')
    .option('--json', 'Print the result as JSON')
    .action(async (batchId: string, options: OutputOptions) => {
      await ctx.ingestion().completeBatch(batchId);
      ctx.report(options, { batchId, action: 'COMPLETE' }, [`Batch ${batchId} marked complete`]);
    });

  batch
    .command('abort <batchId>')
    .description('Abandon a batch')
    .option('--json', 'Print the result as JSON')
    .action(async (batchId: string, options: OutputOptions) => {
      await ctx.ingestion().abortBatch(batchId);
      ctx.report(options, { batchId, action: 'ABORT' }, [`Batch ${batchId} aborted`]);
    });

  batch
    .command('wait <batchId>')
    .description('Poll until the batch succeeds, fails or is aborted')
    .option('-i, --interval <ms>', 'Delay between status checks', parseNonNegativeInt, 5000)
    .option('-t, --timeout <ms>', 'Give up after this long', parseNonNegativeInt, 300_000)
    .option('--json', 'Print the result as JSON')
    .action(async (batchId: string, options: WaitOptions) => {
      const result = await ctx.ingestion().pollUntilTerminal(batchId, options.interval, options.timeout);
      ctx.report(options, result, formatBatch(result));
      if (result.status !== 'success') ctx.fail();
    });
}
