export const RUN_STATUSES = ["SCHEDULED", "RUNNING", "FINISHED", "FAILED", "KILLED", "UNINITIALIZED"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const LIFECYCLE_STAGES = ["active", "deleted"] as const;
export type LifecycleStage = (typeof LIFECYCLE_STAGES)[number];

export interface Experiment {
  experimentId: string;
  name: string;
  artifactLocation: string;
  lifecycleStage: LifecycleStage;
  tags: Record<string, string>;
  /** Epoch milliseconds, when the server reports it. */
  creationTime: number | null;
  lastUpdateTime: number | null;
}

export interface RunInfo {
  runId: string;
  runUuid: string;
  experimentId: string;
  userId: string;
  status: RunStatus;
  /** Epoch seconds. */
  startTime: number;
  endTime: number | null;
  artifactUri: string;
  lifecycleStage: LifecycleStage;
}

export interface Run {
  info: RunInfo;
  /** Metrics, params and tags exactly as the server sent them. */
  data: Record<string, unknown>;
}

export interface RunTag {
  key: string;
  value: string;
}
