import type { FetchFn } from '../../src/infrastructure/http/AepHttpClient.js';
import type { BatchStatus } from '../../src/domain/model/BatchStatus.js';
import { BatchIngestion } from '../../src/BatchIngestion.js';
import type { BatchIngestionConfig } from '../../src/BatchIngestion.js';
import { StaticTokenProvider } from '../../src/infrastructure/auth/StaticTokenProvider.js';

export interface RecordedRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Headers;
  readonly body: RequestInit['body'];
}

export type Handler = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export function emptyResponse(status = 200): Response {
  return new Response(null, { status });
}

export function bodyText(request: RecordedRequest): string {
  if (typeof request.body === 'string') return request.body;
  if (Buffer.isBuffer(request.body)) return request.body.toString('utf-8');
  return '';
}

/** A fetch that records every request and answers through `handler`. */
export function createFakeFetch(handler: Handler): { fetch: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(input),
      headers: new Headers(init?.headers),
      body: init?.body,
    };
    requests.push(request);
    return handler(request);
  };
  return { fetch, requests };
}

/** Answers requests in order; the last factory keeps answering once the others are used. */
export function sequence(...responses: Array<() => Response>): Handler {
  let index = 0;
  return () => {
    const next = responses[Math.min(index, responses.length - 1)];
    index++;
    if (!next) throw new Error('sequence() needs at least one response');
    return next();
  };
}

interface FakeBatch {
  readonly id: string;
  readonly datasetId: string;
  status: BatchStatus;
  readonly files: Map<string, number>;
  /** Statuses returned by the next catalog reads, in order. The last one sticks. */
  readonly script: BatchStatus[];
}

/**
 * In-process stand-in for the bulk ingestion and Catalog endpoints used by the
 * SDK. Tracks how many uploads are in flight at once.
 */
export class FakePlatform {
  readonly batches = new Map<string, FakeBatch>();
  readonly requests: RecordedRequest[] = [];
  inFlightUploads = 0;
  maxInFlightUploads = 0;
  uploadDelayMs = 5;

  private nextId = 1;
  private readonly uploadFailures = new Map<string, () => Response>();
  private readonly intercepts: Array<() => Response> = [];
  private readonly completionScript: BatchStatus[] = [];

  readonly fetch: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      url: new URL(input),
      headers: new Headers(init?.headers),
      body: init?.body,
    };
    this.requests.push(request);

    const intercept = this.intercepts.shift();
    if (intercept) return intercept();
    return this.route(request);
  };

  seedBatch(id: string, datasetId: string, status: BatchStatus = 'loading'): void {
    this.batches.set(id, { id, datasetId, status, files: new Map(), script: [] });
  }

  /** Statuses the next catalog reads of `batchId` report. */
  scriptStatuses(batchId: string, ...statuses: BatchStatus[]): void {
    this.batches.get(batchId)?.script.push(...statuses);
  }

  /** Statuses every batch reports after it has been completed. */
  settleOnComplete(...statuses: BatchStatus[]): void {
    this.completionScript.push(...statuses);
  }

  failUpload(fileName: string, response: () => Response): void {
    this.uploadFailures.set(fileName, response);
  }

  /** Answer the next requests with these responses, whatever they are. */
  interceptNext(...responses: Array<() => Response>): void {
    this.intercepts.push(...responses);
  }

  count(method: string, pathPrefix: string): number {
    return this.requests.filter((r) => r.method === method && r.url.pathname.startsWith(pathPrefix)).length;
  }

  private async route(request: RecordedRequest): Promise<Response> {
    const segments = request.url.pathname.split('/').filter(Boolean).map(decodeURIComponent);
    const [, , api, resource, batchId, datasets, datasetId, files, fileName] = segments;

    if (api === 'import' && resource === 'batches') {
      if (request.method === 'POST' && batchId === undefined) {
        return this.createBatch(request);
      }
      if (request.method === 'POST' && batchId !== undefined && datasets === undefined) {
        return this.batchAction(batchId, request.url.searchParams.get('action'));
      }
      if (
        request.method === 'PUT' &&
        batchId !== undefined &&
        datasets === 'datasets' &&
        datasetId !== undefined &&
        files === 'files' &&
        fileName !== undefined
      ) {
        return this.putFile(batchId, fileName, request);
      }
    }

    if (api === 'catalog' && resource === 'batches' && request.method === 'GET' && batchId !== undefined) {
      return this.getBatch(batchId);
    }

    if (api === 'catalog' && resource === 'dataSetFiles' && request.method === 'GET') {
      return this.listFiles(request.url.searchParams.get('batchId'));
    }

    return jsonResponse({ title: 'Not Found' }, 404);
  }

  private createBatch(request: RecordedRequest): Response {
    const payload: unknown = JSON.parse(bodyText(request));
    if (typeof payload !== 'object' || payload === null || !('datasetId' in payload) || typeof payload.datasetId !== 'string') {
      return jsonResponse({ title: 'Bad Request', detail: 'datasetId is required' }, 400);
    }
    const id = `batch-${String(this.nextId++)}`;
    this.seedBatch(id, payload.datasetId);
    return jsonResponse({ id, status: 'loading', relatedObjects: [{ type: 'dataSet', id: payload.datasetId }] }, 201);
  }

  private batchAction(batchId: string, action: string | null): Response {
    const batch = this.batches.get(batchId);
    if (!batch) return jsonResponse({ title: 'Not Found', detail: `Batch ${batchId} not found` }, 404);
    switch (action) {
      case 'COMPLETE':
        batch.status = 'staged';
        batch.script.push(...this.completionScript);
        break;
      case 'ABORT':
        batch.status = 'aborted';
        break;
      default:
        return jsonResponse({ title: 'Bad Request', detail: `Unknown action ${String(action)}` }, 400);
    }
    return emptyResponse(200);
  }

  private async putFile(batchId: string, fileName: string, request: RecordedRequest): Promise<Response> {
    const batch = this.batches.get(batchId);
    if (!batch) return jsonResponse({ title: 'Not Found', detail: `Batch ${batchId} not found` }, 404);

    const failure = this.uploadFailures.get(fileName);
    if (failure) return failure();

    this.inFlightUploads++;
    this.maxInFlightUploads = Math.max(this.maxInFlightUploads, this.inFlightUploads);
    await new Promise((resolve) => setTimeout(resolve, this.uploadDelayMs));
    this.inFlightUploads--;

    batch.files.set(fileName, Buffer.byteLength(bodyText(request)));
    return emptyResponse(200);
  }

  private getBatch(batchId: string): Response {
    const batch = this.batches.get(batchId);
    if (!batch) return jsonResponse({ title: 'Not Found', detail: `Batch ${batchId} not found` }, 404);

    const scripted = batch.script.length > 1 ? batch.script.shift() : batch.script[0];
    if (scripted !== undefined) batch.status = scripted;

    return jsonResponse({
      [batch.id]: {
        status: batch.status,
        relatedObjects: [{ type: 'dataSet', id: batch.datasetId }],
        errors: batch.status === 'failed' ? [{ code: 'INGEST-400', description: 'Record 3 is malformed' }] : [],
      },
    });
  }

  private listFiles(batchId: string | null): Response {
    const batch = batchId === null ? undefined : this.batches.get(batchId);
    const body: Record<string, unknown> = {};
    for (const [name, size] of batch?.files ?? []) {
      body[`file-${name}`] = { dataSetId: batch?.datasetId, batchId, name, sizeInBytes: size, records: 1, isValid: true };
    }
    return jsonResponse(body);
  }
}

export const TEST_CONNECTION = {
  baseUrl: 'https://platform.test',
  clientId: 'test-client',
  orgId: 'TEST@AdobeOrg',
  sandboxName: 'dev',
} as const;

/** A `BatchIngestion` wired to `platform`, with zero backoff and fast polling. */
export function createTestIngestion(platform: FakePlatform, overrides: Partial<BatchIngestionConfig> = {}): BatchIngestion {
  return new BatchIngestion({
    connection: {
      ...TEST_CONNECTION,
      tokenProvider: new StaticTokenProvider('test-token'),
      retry: { retryDelayMs: 0 },
      fetch: platform.fetch,
    },
    pollIntervalMs: 1,
    pollTimeoutMs: 1000,
    ...overrides,
  });
}
