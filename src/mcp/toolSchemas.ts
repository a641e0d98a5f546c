import * as z from "zod/v4";
import { zLifecycleStage, zRunStatus } from "../client/schemas.js";

const zId = z.string().min(1);
const zEpochSeconds = z.number().int().min(0);

export const zExperimentSummary = z.object({
  experiment_id: z.string(),
  name: z.string(),
  artifact_location: z.string(),
  lifecycle_stage: zLifecycleStage,
  tags: z.record(z.string(), z.string()),
  creation_time: z.number().nullable(),
  last_update_time: z.number().nullable()
});

export const zRunInfoSummary = z.object({
  run_id: z.string(),
  run_uuid: z.string(),
  experiment_id: z.string(),
  user_id: z.string(),
  status: zRunStatus,
  start_time: z.number(),
  end_time: z.number().nullable(),
  artifact_uri: z.string(),
  lifecycle_stage: zLifecycleStage
});

export const zRunSummary = z.object({
  info: zRunInfoSummary,
  data: z.record(z.string(), z.unknown())
});

export const zRunTag = z.object({
  key: z.string().min(1).max(250),
  value: z.string()
});

export const zGetExperimentInput = z.object({
  experiment_id: zId
});

export const zGetExperimentByNameInput = z.object({
  experiment_name: zId
});

export const zExperimentOutput = z.object({
  experiment: zExperimentSummary
});

export const zCreateExperimentInput = z.object({
  name: z.string().min(1).max(500)
});

export const zCreateExperimentOutput = z.object({
  experiment_id: z.string()
});

export const zCreateRunInput = z.object({
  experiment_id: zId,
  start_time: zEpochSeconds.optional(),
  tags: z.array(zRunTag).max(100).default([])
});

export const zUpdateRunInput = z.object({
  run_id: zId,
  status: zRunStatus,
  end_time: zEpochSeconds.optional()
});

export const zUpdateRunOutput = z.object({
  run_info: zRunInfoSummary
});

export const zDeleteRunInput = z.object({
  run_id: zId
});

export const zDeleteRunOutput = z.object({
  run_id: z.string()
});

export const zGetRunInput = z.object({
  run_id: zId
});

export const zRunOutput = z.object({
  run: zRunSummary
});
