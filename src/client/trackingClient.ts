import type * as z from "zod/v4";
import type { Experiment, Run, RunInfo, RunStatus, RunTag } from "../core/entities.js";
import type { QueryParams } from "../core/queryParams.js";
import { RequestDispatcher, type FetchLike } from "./dispatcher.js";
import { TrackingDecodeError, TrackingSerializationError } from "./errors.js";
import {
  toExperiment,
  toRun,
  toRunInfo,
  zCreateExperimentResponse,
  zExperimentResponse,
  zRunResponse,
  zRunUpdateResponse
} from "./schemas.js";

export const ENDPOINTS = {
  experimentGet: "/api/2.0/mlflow/experiments/get",
  experimentGetByName: "/api/2.0/mlflow/experiments/get-by-name",
  experimentCreate: "/api/2.0/mlflow/experiments/create",
  runCreate: "/api/2.0/mlflow/runs/create",
  runUpdate: "/api/2.0/mlflow/runs/update",
  runDelete: "/api/2.0/mlflow/runs/delete",
  runGet: "/api/2.0/mlflow/runs/get"
} as const;

export interface TrackingClientOptions {
  baseUrl: string;
  fetch?: FetchLike;
  timeoutMs?: number;
  /** Wall clock in epoch milliseconds; defaults to `Date.now`. */
  now?: () => number;
}

export class TrackingClient {
  readonly baseUrl: string;
  private readonly dispatcher: RequestDispatcher;
  private readonly now: () => number;

  constructor(opts: TrackingClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.dispatcher = new RequestDispatcher({ fetch: opts.fetch, timeoutMs: opts.timeoutMs });
    this.now = opts.now ?? Date.now;
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }

  private async getJson<S extends z.ZodType>(path: string, params: QueryParams, schema: S): Promise<z.output<S> | null> {
    const body = await this.dispatcher.get(this.baseUrl + path, params);
    return body === null ? null : decode(path, body, schema);
  }

  private async postJson<S extends z.ZodType>(path: string, request: unknown, schema: S): Promise<z.output<S> | null> {
    const body = await this.dispatcher.post(this.baseUrl + path, request);
    return body === null ? null : decode(path, body, schema);
  }

  async getExperiment(experimentId: string): Promise<Experiment | null> {
    const res = await this.getJson(ENDPOINTS.experimentGet, { experiment_id: experimentId }, zExperimentResponse);
    return res ? toExperiment(res.experiment) : null;
  }

  async getExperimentByName(name: string): Promise<Experiment | null> {
    const res = await this.getJson(ENDPOINTS.experimentGetByName, { experiment_name: name }, zExperimentResponse);
    return res ? toExperiment(res.experiment) : null;
  }

  /** Resolves the new experiment's id. */
  async createExperiment(name: string): Promise<string | null> {
    const res = await this.postJson(ENDPOINTS.experimentCreate, { name }, zCreateExperimentResponse);
    return res ? res.experiment_id : null;
  }

  async createRunWithStartTime(experimentId: string, startTime: number, tags: RunTag[] = []): Promise<Run | null> {
    assertEpochSeconds("start_time", startTime);
    const res = await this.postJson(
      ENDPOINTS.runCreate,
      { experiment_id: experimentId, start_time: startTime, tags },
      zRunResponse
    );
    return res ? toRun(res.run) : null;
  }

  async createRun(experimentId: string, tags: RunTag[] = []): Promise<Run | null> {
    return this.createRunWithStartTime(experimentId, this.nowSeconds(), tags);
  }

  async updateRunWithEndTime(runId: string, status: RunStatus, endTime: number): Promise<RunInfo | null> {
    assertEpochSeconds("end_time", endTime);
    const res = await this.postJson(
      ENDPOINTS.runUpdate,
      { run_id: runId, status, end_time: endTime },
      zRunUpdateResponse
    );
    return res ? toRunInfo(res.run_info) : null;
  }

  async updateRun(runId: string, status: RunStatus): Promise<RunInfo | null> {
    return this.updateRunWithEndTime(runId, status, this.nowSeconds());
  }

  async deleteRun(runId: string): Promise<void> {
    await this.dispatcher.post(this.baseUrl + ENDPOINTS.runDelete, { run_id: runId });
  }

  async getRun(runId: string): Promise<Run | null> {
    const res = await this.getJson(ENDPOINTS.runGet, { run_id: runId }, zRunResponse);
    return res ? toRun(res.run) : null;
  }
}

function assertEpochSeconds(field: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new TrackingSerializationError(`${field} must be an integer number of epoch seconds (got ${value})`);
  }
}

function decode<S extends z.ZodType>(endpoint: string, body: Uint8Array, schema: S): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(body).toString("utf8")) as unknown;
  } catch (e) {
    throw new TrackingDecodeError(endpoint, "response is not valid JSON", { cause: e });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new TrackingDecodeError(endpoint, `unexpected response shape: ${parsed.error.message}`, { cause: parsed.error });
  }
  return parsed.data;
}
