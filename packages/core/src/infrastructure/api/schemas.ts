import { z } from 'zod';
import { BatchStatus } from '../../domain/model/BatchStatus.js';
import type { Batch } from '../../domain/model/Batch.js';
import type { Dataset, DataSetFile } from '../../domain/model/Dataset.js';
import { DataflowState } from '../../domain/model/Dataflow.js';
import type { Dataflow, DataflowRun } from '../../domain/model/Dataflow.js';
import { ServiceError } from '../../domain/errors/AepError.js';

// Response shapes of the Catalog Service, Flow Service and bulk ingestion API. Unknown keys are dropped.

const BatchSchema = z.object({
  id: z.string().min(1),
  status: z.nativeEnum(BatchStatus),
  imsOrg: z.string().optional(),
  created: z.number().optional(),
  updated: z.number().optional(),
  relatedObjects: z.array(z.object({ type: z.string(), id: z.string() })).default([]),
  inputFormat: z
    .object({
      format: z.string(),
      delimiter: z.string().optional(),
      quote: z.string().optional(),
      escape: z.string().optional(),
    })
    .optional(),
  metrics: z
    .object({
      recordsRead: z.number().optional(),
      recordsWritten: z.number().optional(),
      recordsFailed: z.number().optional(),
      startTime: z.number().optional(),
      endTime: z.number().optional(),
      failureReason: z.string().optional(),
    })
    .optional(),
  errors: z
    .array(
      z.object({
        code: z.string(),
        description: z.string().default(''),
        rows: z.array(z.number()).optional(),
      }),
    )
    .default([]),
  createdUser: z.string().optional(),
  tags: z.record(z.unknown()).optional(),
});

const DatasetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  schemaRef: z.object({ id: z.string(), contentType: z.string() }).optional(),
  description: z.string().optional(),
  tags: z
    .object({
      unifiedProfile: z.array(z.string()).optional(),
      unifiedIdentity: z.array(z.string()).optional(),
    })
    .optional(),
  state: z.string().optional(),
  created: z.number().optional(),
  updated: z.number().optional(),
  imsOrg: z.string().optional(),
  version: z.string().optional(),
});

const DataSetFileSchema = z.object({
  id: z.string().min(1),
  dataSetId: z.string(),
  batchId: z.string(),
  name: z.string().optional(),
  sizeInBytes: z.number().optional(),
  records: z.number().optional(),
  isValid: z.boolean().optional(),
  created: z.number().optional(),
});

const DataflowSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  flowSpec: z.object({ id: z.string(), version: z.string().optional(), name: z.string().optional() }),
  state: z.nativeEnum(DataflowState),
  sourceConnectionIds: z.array(z.string()).default([]),
  targetConnectionIds: z.array(z.string()).default([]),
  scheduleParams: z
    .object({
      startTime: z.coerce.number().optional(),
      interval: z.number().optional(),
      frequency: z.string().optional(),
    })
    .optional(),
  createdAt: z.number().optional(),
  updatedAt: z.number().optional(),
  createdBy: z.string().optional(),
  etag: z.string().optional(),
});

const RunErrorSchema = z.object({ code: z.string(), message: z.string().default('') });

const RunSchema = z.object({
  id: z.string().min(1),
  flowId: z.string(),
  createdAt: z.number().optional(),
  updatedAt: z.number().optional(),
  metrics: z
    .object({
      durationSummary: z
        .object({ startedAtUTC: z.number().optional(), completedAtUTC: z.number().optional() })
        .optional(),
      recordSummary: z
        .object({
          inputRecordCount: z.number().optional(),
          outputRecordCount: z.number().optional(),
          failedRecordCount: z.number().optional(),
        })
        .optional(),
      statusSummary: z
        .object({
          status: z.string(),
          extensions: z.object({ errors: z.array(RunErrorSchema).default([]) }).optional(),
        })
        .optional(),
    })
    .default({}),
});

/** Flow Service list responses: `{ items: [...], _page: { next? } }`. */
const ItemsSchema = z.object({
  items: z.array(z.unknown()).default([]),
  _page: z.object({ next: z.string().optional() }).optional(),
});

const CreatedBatchSchema = z.object({ id: z.string().min(1) });

/** `["@/dataSets/5c8c3c555033b814b69f947f"]` */
const CreatedDatasetSchema = z.array(z.string()).min(1);

export interface ResponseContext {
  readonly method: string;
  readonly path: string;
}

function unexpected(ctx: ResponseContext, body: unknown, issue: string): ServiceError {
  return new ServiceError(`Unexpected response from ${ctx.method} ${ctx.path}: ${issue}`, {
    status: 0,
    method: ctx.method,
    path: ctx.path,
    body,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Catalog list and lookup responses are objects keyed by entity id. The entity
 * bodies may omit their own id, so the key is copied in when missing.
 */
function entriesOf(body: unknown, ctx: ResponseContext): Array<[string, Record<string, unknown>]> {
  if (body === undefined) return [];
  if (!isRecord(body)) {
    throw unexpected(ctx, body, 'expected an object keyed by id');
  }
  const entries: Array<[string, Record<string, unknown>]> = [];
  for (const [key, value] of Object.entries(body)) {
    if (isRecord(value)) {
      entries.push([key, { ...value, id: typeof value.id === 'string' ? value.id : key }]);
    }
  }
  return entries;
}

export function parseBatch(value: unknown, ctx: ResponseContext): Batch {
  const parsed = BatchSchema.safeParse(value);
  if (!parsed.success) {
    throw unexpected(ctx, value, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

/** Single-batch lookup: `{ "<batchId>": { ... } }`. */
export function parseBatchLookup(body: unknown, ctx: ResponseContext): Batch {
  const [first] = entriesOf(body, ctx);
  if (!first) {
    throw unexpected(ctx, body, 'no batch in response');
  }
  return parseBatch(first[1], ctx);
}

/** Batch listing. Entries that do not match the expected shape are skipped. */
export function parseBatchList(body: unknown, ctx: ResponseContext): Batch[] {
  const batches: Batch[] = [];
  for (const [, value] of entriesOf(body, ctx)) {
    const parsed = BatchSchema.safeParse(value);
    if (parsed.success) batches.push(parsed.data);
  }
  return batches;
}

export function parseDatasetLookup(body: unknown, ctx: ResponseContext): Dataset {
  const [first] = entriesOf(body, ctx);
  const parsed = DatasetSchema.safeParse(first?.[1]);
  if (!parsed.success) {
    throw unexpected(ctx, body, 'no dataset in response');
  }
  return parsed.data;
}

export function parseDatasetList(body: unknown, ctx: ResponseContext): Dataset[] {
  const datasets: Dataset[] = [];
  for (const [, value] of entriesOf(body, ctx)) {
    const parsed = DatasetSchema.safeParse(value);
    if (parsed.success) datasets.push(parsed.data);
  }
  return datasets;
}

export function parseDataSetFileList(body: unknown, ctx: ResponseContext): DataSetFile[] {
  const files: DataSetFile[] = [];
  for (const [, value] of entriesOf(body, ctx)) {
    const parsed = DataSetFileSchema.safeParse(value);
    if (parsed.success) files.push(parsed.data);
  }
  return files;
}

export function parseCreatedBatchId(body: unknown, ctx: ResponseContext): string {
  const parsed = CreatedBatchSchema.safeParse(body);
  if (!parsed.success) {
    throw unexpected(ctx, body, 'missing batch id');
  }
  return parsed.data.id;
}

export function parseCreatedDatasetId(body: unknown, ctx: ResponseContext): string {
  const parsed = CreatedDatasetSchema.safeParse(body);
  const ref = parsed.success ? parsed.data[0] : undefined;
  const id = ref?.split('/').pop();
  if (!id) {
    throw unexpected(ctx, body, 'missing dataset reference');
  }
  return id;
}

function toRun(raw: z.infer<typeof RunSchema>): DataflowRun {
  const { durationSummary, recordSummary, statusSummary } = raw.metrics;
  return {
    id: raw.id,
    flowId: raw.flowId,
    status: statusSummary?.status,
    errors: statusSummary?.extensions?.errors ?? [],
    metrics: {
      inputRecordCount: recordSummary?.inputRecordCount,
      outputRecordCount: recordSummary?.outputRecordCount,
      failedRecordCount: recordSummary?.failedRecordCount,
      startedAt: durationSummary?.startedAtUTC,
      completedAt: durationSummary?.completedAtUTC,
    },
    createdAt: raw.createdAt,
    updatedAt: raw.updatedAt,
  };
}

/** One page of a Flow Service listing. */
export interface Page<T> {
  readonly items: T[];
  /** Token for the following page, absent on the last one. */
  readonly next?: string;
}

function parseItems<T>(body: unknown, ctx: ResponseContext, parseItem: (item: unknown) => T | undefined): Page<T> {
  const parsed = ItemsSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw unexpected(ctx, body, 'expected an items list');
  }
  const items: T[] = [];
  for (const item of parsed.data.items) {
    const value = parseItem(item);
    if (value !== undefined) items.push(value);
  }
  return { items, next: parsed.data._page?.next };
}

/** Dataflow listing. Entries that do not match the expected shape are skipped. */
export function parseDataflowPage(body: unknown, ctx: ResponseContext): Page<Dataflow> {
  return parseItems(body, ctx, (item) => {
    const parsed = DataflowSchema.safeParse(item);
    return parsed.success ? parsed.data : undefined;
  });
}

/** Flow Service lookups answer with the entity itself or with it wrapped in `items`. */
function unwrapSingle(body: unknown): unknown {
  if (isRecord(body) && Array.isArray(body.items)) return body.items[0];
  return body;
}

function parseSingle<S extends z.ZodTypeAny>(schema: S, body: unknown, ctx: ResponseContext): z.output<S> | undefined {
  const value = unwrapSingle(body);
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw unexpected(ctx, body, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

export function parseDataflow(body: unknown, ctx: ResponseContext): Dataflow | undefined {
  return parseSingle(DataflowSchema, body, ctx);
}

export function parseRunPage(body: unknown, ctx: ResponseContext): Page<DataflowRun> {
  return parseItems(body, ctx, (item) => {
    const parsed = RunSchema.safeParse(item);
    return parsed.success ? toRun(parsed.data) : undefined;
  });
}

export function parseRun(body: unknown, ctx: ResponseContext): DataflowRun | undefined {
  const raw = parseSingle(RunSchema, body, ctx);
  return raw && toRun(raw);
}
