/** Whether a dataflow's schedule is active. */
export const DataflowState = {
  ENABLED: 'enabled',
  DISABLED: 'disabled',
} as const;

export type DataflowState = (typeof DataflowState)[keyof typeof DataflowState];

/** Status of one dataflow run, from the run's status summary. */
export const RunStatus = {
  PENDING: 'pending',
  IN_PROGRESS: 'inProgress',
  SUCCESS: 'success',
  FAILED: 'failed',
  CANCELLED: 'cancelled',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

export interface FlowSpecRef {
  readonly id: string;
  readonly version?: string;
  readonly name?: string;
}

export interface DataflowSchedule {
  /** Epoch seconds. */
  readonly startTime?: number;
  readonly interval?: number;
  readonly frequency?: string;
}

/** A Flow Service pipeline moving data from source connections into target connections. */
export interface Dataflow {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly flowSpec: FlowSpecRef;
  readonly state: DataflowState;
  readonly sourceConnectionIds: readonly string[];
  readonly targetConnectionIds: readonly string[];
  readonly scheduleParams?: DataflowSchedule;
  readonly createdAt?: number;
  readonly updatedAt?: number;
  readonly createdBy?: string;
  readonly etag?: string;
}

export interface RunError {
  readonly code: string;
  readonly message: string;
}

/** Counters of a run. Timestamps are epoch milliseconds. */
export interface RunMetrics {
  readonly inputRecordCount?: number;
  readonly outputRecordCount?: number;
  readonly failedRecordCount?: number;
  readonly startedAt?: number;
  readonly completedAt?: number;
}

/** One execution of a dataflow. */
export interface DataflowRun {
  readonly id: string;
  readonly flowId: string;
  /** Undefined while the platform has not reported a status yet. */
  readonly status?: string;
  readonly errors: readonly RunError[];
  readonly metrics: RunMetrics;
  readonly createdAt?: number;
  readonly updatedAt?: number;
}

export interface DataflowRunFailure extends RunError {
  readonly runId: string;
}

/** Run statistics of a dataflow over a lookback window. */
export interface DataflowHealth {
  readonly flowId: string;
  readonly lookbackDays: number;
  readonly totalRuns: number;
  readonly successRuns: number;
  readonly failedRuns: number;
  readonly pendingRuns: number;
  /** Percentage of runs that succeeded, `0` when there were none. */
  readonly successRate: number;
  /** Mean duration of runs with both start and completion times, in seconds. */
  readonly averageDurationSeconds: number;
  readonly errors: readonly DataflowRunFailure[];
}

export function summarizeRuns(flowId: string, lookbackDays: number, runs: readonly DataflowRun[]): DataflowHealth {
  const count = (...statuses: string[]) => runs.filter((run) => run.status !== undefined && statuses.includes(run.status)).length;
  const successRuns = count(RunStatus.SUCCESS);
  const failedRuns = count(RunStatus.FAILED);

  const durations: number[] = [];
  for (const { metrics } of runs) {
    if (metrics.startedAt !== undefined && metrics.completedAt !== undefined) {
      durations.push((metrics.completedAt - metrics.startedAt) / 1000);
    }
  }

  return {
    flowId,
    lookbackDays,
    totalRuns: runs.length,
    successRuns,
    failedRuns,
    pendingRuns: count(RunStatus.PENDING, RunStatus.IN_PROGRESS),
    successRate: runs.length > 0 ? (successRuns / runs.length) * 100 : 0,
    averageDurationSeconds: durations.length > 0 ? durations.reduce((a, b) => a + b, 0) / durations.length : 0,
    errors: runs
      .filter((run) => run.status === RunStatus.FAILED)
      .flatMap((run) => run.errors.map((error) => ({ ...error, runId: run.id }))),
  };
}
