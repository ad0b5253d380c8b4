import { Argument } from 'commander';
import type { Command } from 'commander';
import type { CliContext, OutputOptions } from '../context.js';
import { formatDataset, formatDatasetRow } from '../format.js';
import { parsePositiveInt } from '../options.js';

interface ListOptions extends OutputOptions {
  readonly limit: number;
  readonly state?: string;
  readonly schema?: string;
}

interface CreateOptions extends OutputOptions {
  readonly schema: string;
  readonly description?: string;
  readonly profile?: boolean;
  readonly identity?: boolean;
}

interface UpdateOptions extends OutputOptions {
  readonly name?: string;
  readonly description?: string;
}

export function registerDatasetCommands(program: Command, ctx: CliContext): void {
  const dataset = program.command('dataset').description('Inspect and create Catalog datasets');

  dataset
    .command('list')
    .description('List datasets')
    .option('-l, --limit <n>', 'Maximum number of datasets (1-100)', parsePositiveInt, 50)
    .option('--state <state>', 'Only DRAFT or ENABLED datasets')
    .option('--schema <id>', 'Only datasets of this schema')
    .option('--json', 'Print the result as JSON')
    .action(async (options: ListOptions) => {
      const datasets = await ctx.ingestion().catalog.listDatasets({
        limit: options.limit,
        state: options.state,
        schemaId: options.schema,
      });
      ctx.report(options, datasets, datasets.length > 0 ? datasets.map(formatDatasetRow) : ['No datasets found']);
    });

  dataset
    .command('get <datasetId>')
    .description('Show one dataset')
    .option('--json', 'Print the result as JSON')
    .action(async (datasetId: string, options: OutputOptions) => {
      const result = await ctx.ingestion().catalog.getDataset(datasetId);
      ctx.report(options, result, formatDataset(result));
    });

  dataset
    .command('create <name>')
    .description('Create a dataset bound to an XDM schema')
    .requiredOption('-s, --schema <id>', 'Schema $id URI')
    .option('--description <text>', 'Dataset description')
    .option('--profile', 'Enable the dataset for Real-Time Customer Profile')
    .option('--identity', 'Enable the dataset for Identity Service')
    .option('--json', 'Print the result as JSON')
    .action(async (name: string, options: CreateOptions) => {
      const datasetId = await ctx.ingestion().catalog.createDataset(name, options.schema, {
        description: options.description,
        enableProfile: options.profile ?? false,
        enableIdentity: options.identity ?? false,
      });
      ctx.report(options, { datasetId }, [`Created dataset ${datasetId}`]);
    });

  dataset
    .command('update <datasetId>')
    .description('Rename or describe a dataset')
    .option('--name <name>', 'New dataset name')
    .option('--description <text>', 'New dataset description')
    .option('--json', 'Print the result as JSON')
    .action(async (datasetId: string, options: UpdateOptions) => {
      const result = await ctx.ingestion().catalog.updateDataset(datasetId, {
        name: options.name,
        description: options.description,
      });
      ctx.report(options, result, formatDataset(result));
    });

  dataset
    .command('enable')
    .description('Enable a dataset for Profile or Identity Service')
    .argument('<datasetId>')
    .addArgument(new Argument('<service>').choices(['profile', 'identity']))
    .option('--json', 'Print the result as JSON')
    .action(async (datasetId: string, service: string, options: OutputOptions) => {
      const catalog = ctx.ingestion().catalog;
      const result =
        service === 'profile'
          ? await catalog.enableDatasetForProfile(datasetId)
          : await catalog.enableDatasetForIdentity(datasetId);
      ctx.report(options, result, [`Enabled dataset ${datasetId} for ${service}`]);
    });
}
