import type { Dataflow, DataflowHealth, DataflowRun, DataflowState } from '../../domain/model/Dataflow.js';
import { RunStatus, summarizeRuns } from '../../domain/model/Dataflow.js';
import { NotFoundError } from '../../domain/errors/AepError.js';
import type { AepHttpClient } from '../http/AepHttpClient.js';
import { parseDataflow, parseDataflowPage, parseRun, parseRunPage } from './schemas.js';

export const FLOW_SERVICE_PATH = '/data/foundation/flowservice';

/** Flow Service list endpoints cap `limit` at 100. */
const MAX_LIMIT = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ListDataflowsOptions {
  readonly limit?: number;
  readonly state?: DataflowState;
  /** Sort field, e.g. `createdAt` or `updatedAt`, without a direction suffix. */
  readonly orderBy?: string;
  /** Follow `_page.next` until exhausted or this many pages were read. Default: `1`. */
  readonly maxPages?: number;
}

export interface ListRunsOptions {
  readonly limit?: number;
  /** Default: `createdAt`. */
  readonly orderBy?: string;
  /** Only runs created at or after this time. */
  readonly since?: Date;
  /** Only runs created at or before this time. */
  readonly until?: Date;
}

/**
 * Read-only client for the Flow Service: dataflows (scheduled source ingestion
 * pipelines) and their runs.
 */
export class FlowClient {
  constructor(
    private readonly http: AepHttpClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async listDataflows(options: ListDataflowsOptions = {}): Promise<Dataflow[]> {
    const path = `${FLOW_SERVICE_PATH}/flows`;
    const maxPages = options.maxPages ?? 1;
    const dataflows: Dataflow[] = [];
    let start: string | undefined;

    for (let page = 0; page < maxPages; page++) {
      const body = await this.http.get(path, {
        query: {
          limit: clampLimit(options.limit),
          orderby: options.orderBy,
          property: options.state ? `state==${options.state}` : undefined,
          start,
        },
      });
      const result = parseDataflowPage(body, { method: 'GET', path });
      dataflows.push(...result.items);
      start = result.next;
      if (!start) break;
    }
    return dataflows;
  }

  /** @throws NotFoundError when the dataflow does not exist. */
  async getDataflow(flowId: string): Promise<Dataflow> {
    const path = `${FLOW_SERVICE_PATH}/flows/${encodeURIComponent(flowId)}`;
    const message = `Dataflow not found: ${flowId}`;
    const body = await withNotFound(message, () => this.http.get(path));
    const dataflow = parseDataflow(body, { method: 'GET', path });
    if (!dataflow) {
      throw new NotFoundError(message, { status: 404, method: 'GET', path, body });
    }
    return dataflow;
  }

  /** Runs of one dataflow, sorted by `orderBy`. */
  async listRuns(flowId: string, options: ListRunsOptions = {}): Promise<DataflowRun[]> {
    const path = `${FLOW_SERVICE_PATH}/runs`;
    const property = [`flowId==${flowId}`];
    if (options.since) property.push(`createdAt>=${String(options.since.getTime())}`);
    if (options.until) property.push(`createdAt<=${String(options.until.getTime())}`);

    const body = await this.http.get(path, {
      query: {
        property,
        limit: clampLimit(options.limit),
        orderby: options.orderBy ?? 'createdAt',
      },
    });
    return parseRunPage(body, { method: 'GET', path }).items;
  }

  /** @throws NotFoundError when the run does not exist. */
  async getRun(runId: string): Promise<DataflowRun> {
    const path = `${FLOW_SERVICE_PATH}/runs/${encodeURIComponent(runId)}`;
    const message = `Dataflow run not found: ${runId}`;
    const body = await withNotFound(message, () => this.http.get(path));
    const run = parseRun(body, { method: 'GET', path });
    if (!run) {
      throw new NotFoundError(message, { status: 404, method: 'GET', path, body });
    }
    return run;
  }

  /** Failed runs among the latest `limit` runs. */
  async listFailedRuns(flowId: string, options: { readonly limit?: number } = {}): Promise<DataflowRun[]> {
    const runs = await this.listRuns(flowId, { limit: options.limit });
    return runs.filter((run) => run.status === RunStatus.FAILED);
  }

  /** Success rate, durations and errors of the runs created in the last `lookbackDays` days. */
  async getDataflowHealth(flowId: string, lookbackDays = 7): Promise<DataflowHealth> {
    const since = new Date(this.now().getTime() - lookbackDays * DAY_MS);
    const runs = await this.listRuns(flowId, { since, limit: MAX_LIMIT });
    return summarizeRuns(flowId, lookbackDays, runs);
  }
}

async function withNotFound(message: string, call: () => Promise<unknown>): Promise<unknown> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new NotFoundError(message, error, { cause: error });
    }
    throw error;
  }
}

function clampLimit(limit: number | undefined): number {
  return Math.min(Math.max(1, limit ?? 50), MAX_LIMIT);
}
