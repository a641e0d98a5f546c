import * as z from "zod/v4";
import { LIFECYCLE_STAGES, RUN_STATUSES } from "../core/entities.js";
import type { Experiment, Run, RunInfo } from "../core/entities.js";

// int64 fields may be serialized as JSON strings
const zInt = z.union([z.number().int(), z.string().regex(/^-?\d+$/).transform((s) => Number(s))]);

export const zRunStatus = z.enum(RUN_STATUSES);
export const zLifecycleStage = z.enum(LIFECYCLE_STAGES);

export const zWireExperiment = z.object({
  experiment_id: z.string(),
  name: z.string().default(""),
  artifact_location: z.string().default(""),
  lifecycle_stage: zLifecycleStage,
  tags: z.array(z.object({ key: z.string(), value: z.string() })).optional(),
  creation_time: zInt.optional(),
  last_update_time: zInt.optional()
});

export const zWireRunInfo = z.object({
  run_id: z.string().default(""),
  run_uuid: z.string().default(""),
  experiment_id: z.string(),
  user_id: z.string().default(""),
  status: zRunStatus,
  start_time: zInt.default(0),
  end_time: zInt.optional(),
  artifact_uri: z.string().default(""),
  lifecycle_stage: zLifecycleStage
});

export const zWireRun = z.object({
  info: zWireRunInfo,
  data: z.record(z.string(), z.unknown()).default({})
});

export const zExperimentResponse = z.object({ experiment: zWireExperiment });
export const zCreateExperimentResponse = z.object({ experiment_id: z.string() });
export const zRunResponse = z.object({ run: zWireRun });
export const zRunUpdateResponse = z.object({ run_info: zWireRunInfo });

export type WireExperiment = z.output<typeof zWireExperiment>;
export type WireRunInfo = z.output<typeof zWireRunInfo>;
export type WireRun = z.output<typeof zWireRun>;

export function toExperiment(w: WireExperiment): Experiment {
  const tags: Record<string, string> = {};
  for (const tag of w.tags ?? []) tags[tag.key] = tag.value;
  return {
    experimentId: w.experiment_id,
    name: w.name,
    artifactLocation: w.artifact_location,
    lifecycleStage: w.lifecycle_stage,
    tags,
    creationTime: w.creation_time ?? null,
    lastUpdateTime: w.last_update_time ?? null
  };
}

export function toRunInfo(w: WireRunInfo): RunInfo {
  return {
    runId: w.run_id,
    runUuid: w.run_uuid,
    experimentId: w.experiment_id,
    userId: w.user_id,
    status: w.status,
    startTime: w.start_time,
    endTime: w.end_time ?? null,
    artifactUri: w.artifact_uri,
    lifecycleStage: w.lifecycle_stage
  };
}

export function toRun(w: WireRun): Run {
  return { info: toRunInfo(w.info), data: w.data };
}
