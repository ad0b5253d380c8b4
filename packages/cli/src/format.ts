import type { Batch, Dataflow, DataflowHealth, DataflowRun, Dataset, UploadStatus, UploadSummary } from '@aep-ingest/core';
import { describeBatchFailure, getBatchDatasetId } from '@aep-ingest/core';

export function formatBatch(batch: Batch): string[] {
  const lines = [`Batch ${batch.id}: ${batch.status}`];
  const datasetId = getBatchDatasetId(batch);
  if (datasetId) lines.push(`  dataset: ${datasetId}`);
  if (batch.inputFormat) lines.push(`  format:  ${batch.inputFormat.format}`);
  const metrics = batch.metrics;
  if (metrics && (metrics.recordsRead !== undefined || metrics.recordsWritten !== undefined)) {
    lines.push(`  records: ${String(metrics.recordsRead ?? 0)} read, ${String(metrics.recordsWritten ?? 0)} written`);
  }
  if (batch.status === 'failed' || batch.errors.length > 0) {
    lines.push(`  reason:  ${describeBatchFailure(batch)}`);
  }
  return lines;
}

export function formatBatchRow(batch: Batch): string {
  return `${batch.id}  ${batch.status}  ${getBatchDatasetId(batch) ?? '-'}`;
}

export function formatSummary(summary: UploadSummary): string[] {
  const lines = [
    `Uploaded ${String(summary.succeeded)}/${String(summary.total)} file(s) to batch ${summary.batchId} ` +
      `(${String(summary.totalBytes)} bytes, ${String(summary.elapsedMs)}ms)`,
  ];
  for (const result of summary.results) {
    lines.push(
      result.success
        ? `  ok      ${result.fileName}  ${String(result.sizeBytes)} bytes`
        : `  failed  ${result.fileName}  ${result.error.type}: ${result.error.message}`,
    );
  }
  return lines;
}

export function formatUploadStatus(status: UploadStatus): string {
  return status.exists
    ? `${status.fileName}: present (${String(status.sizeBytes)} bytes, ${String(status.records)} records, ${status.isValid ? 'valid' : 'invalid'})`
    : `${status.fileName}: not found`;
}

export function formatDatasetRow(dataset: Dataset): string {
  return `${dataset.id}  ${dataset.name}${dataset.state ? `  ${dataset.state}` : ''}`;
}

export function formatDataset(dataset: Dataset): string[] {
  const lines = [`Dataset ${dataset.id}: ${dataset.name}`];
  if (dataset.schemaRef) lines.push(`  schema:  ${dataset.schemaRef.id}`);
  if (dataset.state) lines.push(`  state:   ${dataset.state}`);
  if (dataset.description) lines.push(`  about:   ${dataset.description}`);
  return lines;
}

export function formatDataflowRow(flow: Dataflow): string {
  return `${flow.id}  ${flow.state}  ${flow.name}`;
}

export function formatDataflow(flow: Dataflow): string[] {
  const lines = [`Dataflow ${flow.id}: ${flow.name}`, `  state:   ${flow.state}`, `  spec:    ${flow.flowSpec.id}`];
  if (flow.sourceConnectionIds.length > 0) lines.push(`  sources: ${flow.sourceConnectionIds.join(', ')}`);
  if (flow.targetConnectionIds.length > 0) lines.push(`  targets: ${flow.targetConnectionIds.join(', ')}`);
  const schedule = flow.scheduleParams;
  if (schedule?.frequency) lines.push(`  every:   ${String(schedule.interval ?? 1)} ${schedule.frequency}`);
  if (flow.description) lines.push(`  about:   ${flow.description}`);
  return lines;
}

export function formatRunRow(run: DataflowRun): string {
  const row = `${run.id}  ${run.status ?? 'unknown'}`;
  const { inputRecordCount, outputRecordCount, failedRecordCount } = run.metrics;
  const counts =
    inputRecordCount === undefined
      ? ''
      : `  ${String(inputRecordCount)} in, ${String(outputRecordCount ?? 0)} out, ${String(failedRecordCount ?? 0)} failed`;
  const error = run.errors[0];
  return `${row}${counts}${error ? `  ${error.code}: ${error.message}` : ''}`;
}

export function formatHealth(health: DataflowHealth): string[] {
  const lines = [
    `Dataflow ${health.flowId}, last ${String(health.lookbackDays)} day(s)`,
    `  runs:    ${String(health.totalRuns)} (${String(health.successRuns)} succeeded, ${String(health.failedRuns)} failed, ${String(health.pendingRuns)} pending)`,
    `  success: ${health.successRate.toFixed(1)}%`,
    `  average: ${health.averageDurationSeconds.toFixed(1)}s`,
  ];
  for (const error of health.errors) {
    lines.push(`  ${error.runId}  ${error.code}: ${error.message}`);
  }
  return lines;
}
