import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { NotFoundError, ValidationError } from '../../src/domain/errors/AepError.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { FakePlatform, createTestIngestion, jsonResponse } from '../helpers/fakePlatform.js';

const TEST_DIR = join(tmpdir(), 'aep-ingest-test-upload');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

describe('Uploading files', () => {
  it('should create a batch and upload a file into it', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const filePath = writeTempFile('profiles.json', '{"id":"p1"}\n');

    const batchId = await ingestion.createBatch('dataset-1', 'json');
    const result = await ingestion.uploadFile(batchId, filePath);

    expect(batchId).toBe('batch-1');
    expect(result).toEqual({
      success: true,
      fileName: 'profiles.json',
      filePath,
      sizeBytes: 12,
      contentType: 'application/json',
    });
    expect(platform.batches.get('batch-1')?.files.get('profiles.json')).toBe(12);
    const put = platform.requests.find((r) => r.method === 'PUT');
    expect(put?.url.pathname).toBe('/data/foundation/import/batches/batch-1/datasets/dataset-1/files/profiles.json');
  });

  it('should reject an empty file without touching the network', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const filePath = writeTempFile('empty.json', '');

    const error = await ingestion.uploadFile('batch-x', filePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toEqual(new ValidationError(`File is empty: ${filePath}`));
    expect(platform.requests).toHaveLength(0);
  });

  it('should raise NotFoundError for a missing file without touching the network', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);

    await expect(ingestion.uploadFile('batch-x', join(TEST_DIR, 'nope.json'))).rejects.toBeInstanceOf(NotFoundError);
    expect(platform.requests).toHaveLength(0);
  });

  it('should store the file under a custom name', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');

    const result = await ingestion.uploadFile(batchId, new BufferSource('{"a":1}', 'tmp.json'), 'events-2026.json');

    expect(result.fileName).toBe('events-2026.json');
    expect(platform.batches.get(batchId)?.files.has('events-2026.json')).toBe(true);
  });

  it('should look up the dataset of a batch it did not create, once', async () => {
    const platform = new FakePlatform();
    platform.seedBatch('existing', 'dataset-9');
    const ingestion = createTestIngestion(platform);

    const summary = await ingestion.uploadMany(
      [new BufferSource('{}', 'a.json'), new BufferSource('{}', 'b.json'), new BufferSource('{}', 'c.json')],
      'existing',
    );

    expect(summary.succeeded).toBe(3);
    expect(platform.count('GET', '/data/foundation/catalog/batches/existing')).toBe(1);
    const put = platform.requests.find((r) => r.method === 'PUT');
    expect(put?.url.pathname).toContain('/datasets/dataset-9/files/');
  });

  it('should forget the dataset of a batch once it is completed', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');
    await ingestion.uploadFile(batchId, new BufferSource('{}', 'a.json'));
    expect(platform.count('GET', '/data/foundation/catalog/batches')).toBe(0);

    await ingestion.completeBatch(batchId);
    await ingestion.uploadFile(batchId, new BufferSource('{}', 'b.json'));

    expect(platform.count('GET', `/data/foundation/catalog/batches/${batchId}`)).toBe(1);
  });

  it('should forget the dataset of a batch once it is aborted', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');

    await ingestion.abortBatch(batchId);
    await ingestion.uploadFile(batchId, new BufferSource('{}', 'a.json'));

    expect(platform.count('GET', `/data/foundation/catalog/batches/${batchId}`)).toBe(1);
  });

  it('should keep the dataset of a batch whose completion failed', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');
    platform.interceptNext(() => jsonResponse({ title: 'Bad Request' }, 400));

    await expect(ingestion.completeBatch(batchId)).rejects.toThrow('HTTP 400');
    await ingestion.uploadFile(batchId, new BufferSource('{}', 'a.json'));

    expect(platform.count('GET', '/data/foundation/catalog/batches')).toBe(0);
  });

  it('should reject an unknown format before calling the platform', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);

    await expect(ingestion.createBatch('dataset-1', 'xml')).rejects.toThrow(
      "Unsupported input format 'xml'. Expected one of: parquet, json, csv, avro",
    );
    expect(platform.requests).toHaveLength(0);
  });

  it('should accept formats case-insensitively', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);

    await ingestion.createBatch('dataset-1', 'PARQUET');

    expect(JSON.parse(String(platform.requests[0]?.body))).toEqual({
      datasetId: 'dataset-1',
      inputFormat: { format: 'parquet' },
    });
  });
});

describe('Uploading many files', () => {
  it('should never have more than maxConcurrency uploads in flight', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');
    const sources = Array.from({ length: 10 }, (_, i) => new BufferSource(`{"n":${String(i)}}`, `part-${String(i)}.json`));

    const summary = await ingestion.uploadMany(sources, batchId, 3);

    expect(platform.maxInFlightUploads).toBe(3);
    expect(summary.total).toBe(10);
    expect(summary.succeeded).toBe(10);
    expect(summary.results.map((r) => r.fileName)).toEqual(sources.map((_, i) => `part-${String(i)}.json`));
  });

  it('should default to three concurrent uploads', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');

    await ingestion.uploadMany(
      Array.from({ length: 8 }, (_, i) => new BufferSource('{}', `f${String(i)}.json`)),
      batchId,
    );

    expect(platform.maxInFlightUploads).toBe(3);
  });

  it('should upload one at a time when maxConcurrency is 1', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);
    const batchId = await ingestion.createBatch('dataset-1');

    await ingestion.uploadMany(
      Array.from({ length: 4 }, (_, i) => new BufferSource('{}', `f${String(i)}.json`)),
      batchId,
      1,
    );

    expect(platform.maxInFlightUploads).toBe(1);
  });

  it('should report per-file failures without stopping the other uploads', async () => {
    const platform = new FakePlatform();
    platform.failUpload('bad.json', () => jsonResponse({ title: 'Bad Request', detail: 'not valid JSON' }, 400));
    const ingestion = createTestIngestion(platform);
    const events: DomainEvent[] = [];
    ingestion.onAny((e) => events.push(e));
    const batchId = await ingestion.createBatch('dataset-1');
    const emptyPath = writeTempFile('blank.json', '');

    const summary = await ingestion.uploadMany(
      [new BufferSource('{}', 'good.json'), new BufferSource('{', 'bad.json'), emptyPath],
      batchId,
    );

    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(1);
    expect(summary.failed).toBe(2);
    expect(summary.totalBytes).toBe(2);
    expect(summary.results[1]).toEqual({
      success: false,
      fileName: 'bad.json',
      filePath: 'bad.json',
      sizeBytes: 0,
      error: {
        type: 'ServiceError',
        message:
          'PUT /data/foundation/import/batches/batch-1/datasets/dataset-1/files/bad.json failed with HTTP 400: Bad Request - not valid JSON',
      },
    });
    expect(summary.results[2]).toEqual({
      success: false,
      fileName: 'blank.json',
      filePath: emptyPath,
      sizeBytes: 0,
      error: { type: 'ValidationError', message: `File is empty: ${emptyPath}` },
    });
    expect(events.filter((e) => e.type === 'file:failed')).toHaveLength(2);
    expect(events.filter((e) => e.type === 'file:uploaded')).toHaveLength(1);
  });

  it('should reject a non-positive maxConcurrency', async () => {
    const platform = new FakePlatform();
    const ingestion = createTestIngestion(platform);

    await expect(ingestion.uploadMany([new BufferSource('{}', 'a.json')], 'batch-1', 0)).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
