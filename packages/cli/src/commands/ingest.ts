import type { Command } from 'commander';
import type { UploadSummary } from '@aep-ingest/core';
import type { CliContext, OutputOptions } from '../context.js';
import { formatBatch, formatSummary, formatUploadStatus } from '../format.js';
import { parseNonNegativeInt, parsePositiveInt } from '../options.js';

interface UploadFileOptions extends OutputOptions {
  readonly batch: string;
  readonly name?: string;
}

interface UploadManyOptions extends OutputOptions {
  readonly batch: string;
  readonly concurrent: number;
}

interface UploadDirectoryOptions extends UploadManyOptions {
  readonly pattern: string;
  readonly recursive?: boolean;
}

interface StatusOptions extends OutputOptions {
  readonly file?: string;
}

interface RunOptions extends OutputOptions {
  readonly dataset: string;
  readonly format: string;
  readonly concurrent: number;
  readonly wait: boolean;
  readonly allowPartial?: boolean;
  readonly interval: number;
  readonly timeout: number;
}

export function registerIngestCommands(program: Command, ctx: CliContext): void {
  const ingest = program.command('ingest').description('Upload files into batches');

  const reportSummary = (options: OutputOptions, summary: UploadSummary): void => {
    ctx.report(options, summary, formatSummary(summary));
    if (summary.failed > 0) ctx.fail();
  };

  ingest
    .command('upload-file <file>')
    .description('Upload a single file into a batch')
    .requiredOption('-b, --batch <id>', 'Target batch id')
    .option('-n, --name <name>', 'Name stored in the batch (default: the file name)')
    .option('--json', 'Print the result as JSON')
    .action(async (file: string, options: UploadFileOptions) => {
      const result = await ctx.ingestion().uploadFile(options.batch, file, options.name);
      ctx.report(options, result, [`Uploaded ${result.fileName} (${String(result.sizeBytes)} bytes) to batch ${options.batch}`]);
    });

  ingest
    .command('upload-batch <files...>')
    .description('Upload several files into a batch')
    .requiredOption('-b, --batch <id>', 'Target batch id')
    .option('-c, --concurrent <n>', 'Maximum concurrent uploads', parsePositiveInt, 3)
    .option('--json', 'Print the result as JSON')
    .action(async (files: string[], options: UploadManyOptions) => {
      const summary = await ctx.ingestion().uploadMany(files, options.batch, options.concurrent);
      reportSummary(options, summary);
    });

  ingest
    .command('upload-directory <dir>')
    .description('Upload every matching file of a directory into a batch')
    .requiredOption('-b, --batch <id>', 'Target batch id')
    .option('-p, --pattern <glob>', 'File name pattern, e.g. "*.json"', '*')
    .option('-r, --recursive', 'Include subdirectories')
    .option('-c, --concurrent <n>', 'Maximum concurrent uploads', parsePositiveInt, 3)
    .option('--json', 'Print the result as JSON')
    .action(async (dir: string, options: UploadDirectoryOptions) => {
      const summary = await ctx.ingestion().uploadDirectory(dir, options.batch, {
        pattern: options.pattern,
        recursive: options.recursive ?? false,
        maxConcurrency: options.concurrent,
      });
      reportSummary(options, summary);
    });

  ingest
    .command('status <batchId>')
    .description('Show a batch, or whether one file is stored in it')
    .option('-f, --file <name>', 'Check a single uploaded file')
    .option('--json', 'Print the result as JSON')
    .action(async (batchId: string, options: StatusOptions) => {
      if (options.file === undefined) {
        const batch = await ctx.ingestion().getBatch(batchId);
        ctx.report(options, batch, formatBatch(batch));
        return;
      }
      const status = await ctx.ingestion().getUploadStatus(batchId, options.file);
      ctx.report(options, status, [formatUploadStatus(status)]);
      if (!status.exists) ctx.fail();
    });

  ingest
    .command('run <files...>')
    .description('Create a batch, upload files, complete it and wait for the result')
    .requiredOption('-d, --dataset <id>', 'Target dataset id')
    .option('-f, --format <format>', 'Input format: parquet, json, csv or avro', 'json')
    .option('-c, --concurrent <n>', 'Maximum concurrent uploads', parsePositiveInt, 3)
    .option('--no-wait', 'Return after completing the batch without polling')
    .option('--allow-partial', 'Complete the batch even if some uploads failed')
    .option('-i, --interval <ms>', 'Delay between status checks', parseNonNegativeInt, 5000)
    .option('-t, --timeout <ms>', 'Give up waiting after this long', parseNonNegativeInt, 300_000)
    .option('--json', 'Print the result as JSON')
    .action(async (files: string[], options: RunOptions) => {
      const report = await ctx.ingestion().ingest(options.dataset, files, {
        format: options.format,
        maxConcurrency: options.concurrent,
        wait: options.wait,
        allowPartial: options.allowPartial ?? false,
        pollIntervalMs: options.interval,
        pollTimeoutMs: options.timeout,
      });
      ctx.report(options, report, [...formatSummary(report.uploads), ...formatBatch(report.batch)]);

      const settledBadly = report.batch.status === 'failed' || report.batch.status === 'aborted';
      if (report.uploads.failed > 0 || settledBadly) ctx.fail();
    });
}
