import type { Command } from 'commander';
import type { DataflowState } from '@aep-ingest/core';
import type { CliContext, OutputOptions } from '../context.js';
import { formatDataflow, formatDataflowRow, formatHealth, formatRunRow } from '../format.js';
import { parseDataflowState, parsePositiveInt } from '../options.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface ListOptions extends OutputOptions {
  readonly limit: number;
  readonly state?: DataflowState;
}

interface RunsOptions extends OutputOptions {
  readonly limit: number;
  readonly days?: number;
}

interface HealthOptions extends OutputOptions {
  readonly days: number;
}

export function registerDataflowCommands(program: Command, ctx: CliContext): void {
  const dataflow = program.command('dataflow').description('Inspect Flow Service dataflows and their runs');

  dataflow
    .command('list')
    .description('List dataflows')
    .option('-l, --limit <n>', 'Maximum number of dataflows (1-100)', parsePositiveInt, 20)
    .option('--state <state>', 'Only enabled or disabled dataflows', parseDataflowState)
    .option('--json', 'Print the result as JSON')
    .action(async (options: ListOptions) => {
      const flows = await ctx.ingestion().flow.listDataflows({ limit: options.limit, state: options.state });
      ctx.report(options, flows, flows.length > 0 ? flows.map(formatDataflowRow) : ['No dataflows found']);
    });

  dataflow
    .command('get <flowId>')
    .description('Show one dataflow')
    .option('--json', 'Print the result as JSON')
    .action(async (flowId: string, options: OutputOptions) => {
      const flow = await ctx.ingestion().flow.getDataflow(flowId);
      ctx.report(options, flow, formatDataflow(flow));
    });

  dataflow
    .command('runs <flowId>')
    .description('List the latest runs of a dataflow')
    .option('-l, --limit <n>', 'Maximum number of runs (1-100)', parsePositiveInt, 20)
    .option('--days <n>', 'Only runs created in the last n days', parsePositiveInt)
    .option('--json', 'Print the result as JSON')
    .action(async (flowId: string, options: RunsOptions) => {
      const since = options.days === undefined ? undefined : new Date(Date.now() - options.days * DAY_MS);
      const runs = await ctx.ingestion().flow.listRuns(flowId, { limit: options.limit, since });
      ctx.report(options, runs, runs.length > 0 ? runs.map(formatRunRow) : [`No runs found for dataflow ${flowId}`]);
    });

  dataflow
    .command('failures <flowId>')
    .description('List failed runs among the latest runs of a dataflow')
    .option('-l, --limit <n>', 'Number of latest runs to look at (1-100)', parsePositiveInt, 50)
    .option('--json', 'Print the result as JSON')
    .action(async (flowId: string, options: RunsOptions) => {
      const runs = await ctx.ingestion().flow.listFailedRuns(flowId, { limit: options.limit });
      ctx.report(options, runs, runs.length > 0 ? runs.map(formatRunRow) : [`No failed runs for dataflow ${flowId}`]);
    });

  dataflow
    .command('health <flowId>')
    .description('Summarize the runs of a dataflow over recent days')
    .option('--days <n>', 'Lookback window in days', parsePositiveInt, 7)
    .option('--json', 'Print the result as JSON')
    .action(async (flowId: string, options: HealthOptions) => {
      const health = await ctx.ingestion().flow.getDataflowHealth(flowId, options.days);
      ctx.report(options, health, formatHealth(health));
    });
}
