import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import type { Experiment, Run, RunInfo } from "../core/entities.js";
import type { TrackingClient } from "../client/trackingClient.js";
import { TrackingDecodeError, TrackingSerializationError, TrackingTransportError } from "../client/errors.js";
import type { ToolName, TrackingConfig } from "../config/config.js";
import {
  zCreateExperimentInput,
  zCreateExperimentOutput,
  zCreateRunInput,
  zDeleteRunInput,
  zDeleteRunOutput,
  zExperimentOutput,
  zGetExperimentByNameInput,
  zGetExperimentInput,
  zGetRunInput,
  zRunOutput,
  zUpdateRunInput,
  zUpdateRunOutput,
  type zExperimentSummary,
  type zRunInfoSummary,
  type zRunSummary
} from "./toolSchemas.js";

export interface TrackingServerDeps {
  client: TrackingClient;
  config: TrackingConfig;
}

export const SERVER_NAME = "mlflow-tracking-mcp";
export const SERVER_VERSION = "0.1.0";

function toExperimentSummary(e: Experiment): z.output<typeof zExperimentSummary> {
  return {
    experiment_id: e.experimentId,
    name: e.name,
    artifact_location: e.artifactLocation,
    lifecycle_stage: e.lifecycleStage,
    tags: e.tags,
    creation_time: e.creationTime,
    last_update_time: e.lastUpdateTime
  };
}

function toRunInfoSummary(i: RunInfo): z.output<typeof zRunInfoSummary> {
  return {
    run_id: i.runId,
    run_uuid: i.runUuid,
    experiment_id: i.experimentId,
    user_id: i.userId,
    status: i.status,
    start_time: i.startTime,
    end_time: i.endTime,
    artifact_uri: i.artifactUri,
    lifecycle_stage: i.lifecycleStage
  };
}

function toRunSummary(r: Run): z.output<typeof zRunSummary> {
  return { info: toRunInfoSummary(r.info), data: r.data };
}

function noData(what: string): McpError {
  return new McpError(ErrorCode.InvalidParams, `no ${what} returned by tracking server`);
}

export function createTrackingServer(deps: TrackingServerDeps): McpServer {
  const mcp = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const allowed = new Set(deps.config.toolAllowlist);

  async function guarded(toolName: ToolName, fn: () => Promise<CallToolResult>): Promise<CallToolResult> {
    try {
      if (!allowed.has(toolName)) {
        throw new McpError(ErrorCode.InvalidRequest, `tool not allowed by config: ${toolName}`);
      }
      return await fn();
    } catch (e) {
      if (e instanceof McpError) throw e;
      if (
        e instanceof TrackingTransportError ||
        e instanceof TrackingDecodeError ||
        e instanceof TrackingSerializationError
      ) {
        throw new McpError(ErrorCode.InternalError, e.message);
      }
      throw e;
    }
  }

  mcp.registerTool(
    "tracking_get_experiment",
    {
      description: "Fetch an experiment by ID.",
      inputSchema: zGetExperimentInput,
      outputSchema: zExperimentOutput
    },
    async (args) =>
      guarded("tracking_get_experiment", async () => {
        const experiment = await deps.client.getExperiment(args.experiment_id);
        if (!experiment) throw noData(`experiment for experiment_id ${args.experiment_id}`);
        return {
          content: [{ type: "text", text: `Experiment ${experiment.experimentId} (${experiment.name})` }],
          structuredContent: { experiment: toExperimentSummary(experiment) }
        };
      })
  );

  mcp.registerTool(
    "tracking_get_experiment_by_name",
    {
      description: "Fetch an experiment by its unique name.",
      inputSchema: zGetExperimentByNameInput,
      outputSchema: zExperimentOutput
    },
    async (args) =>
      guarded("tracking_get_experiment_by_name", async () => {
        const experiment = await deps.client.getExperimentByName(args.experiment_name);
        if (!experiment) throw noData(`experiment named ${args.experiment_name}`);
        return {
          content: [{ type: "text", text: `Experiment ${experiment.experimentId} (${experiment.name})` }],
          structuredContent: { experiment: toExperimentSummary(experiment) }
        };
      })
  );

  mcp.registerTool(
    "tracking_create_experiment",
    {
      description: "Create an experiment and return its ID.",
      inputSchema: zCreateExperimentInput,
      outputSchema: zCreateExperimentOutput
    },
    async (args) =>
      guarded("tracking_create_experiment", async () => {
        const experimentId = await deps.client.createExperiment(args.name);
        if (experimentId === null) throw noData(`experiment_id for new experiment ${args.name}`);
        return {
          content: [{ type: "text", text: `Created experiment ${experimentId}` }],
          structuredContent: { experiment_id: experimentId }
        };
      })
  );

  mcp.registerTool(
    "tracking_create_run",
    {
      description: "Start a run in an experiment. start_time defaults to now (epoch seconds).",
      inputSchema: zCreateRunInput,
      outputSchema: zRunOutput
    },
    async (args) =>
      guarded("tracking_create_run", async () => {
        const run =
          args.start_time === undefined
            ? await deps.client.createRun(args.experiment_id, args.tags)
            : await deps.client.createRunWithStartTime(args.experiment_id, args.start_time, args.tags);
        if (!run) throw noData(`run for experiment_id ${args.experiment_id}`);
        return {
          content: [{ type: "text", text: `Created run ${run.info.runId}` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  mcp.registerTool(
    "tracking_update_run",
    {
      description: "Set a run's status. end_time defaults to now (epoch seconds).",
      inputSchema: zUpdateRunInput,
      outputSchema: zUpdateRunOutput
    },
    async (args) =>
      guarded("tracking_update_run", async () => {
        const info =
          args.end_time === undefined
            ? await deps.client.updateRun(args.run_id, args.status)
            : await deps.client.updateRunWithEndTime(args.run_id, args.status, args.end_time);
        if (!info) throw noData(`run_info for run_id ${args.run_id}`);
        return {
          content: [{ type: "text", text: `Run ${info.runId} is ${info.status}` }],
          structuredContent: { run_info: toRunInfoSummary(info) }
        };
      })
  );

  mcp.registerTool(
    "tracking_delete_run",
    {
      description: "Mark a run as deleted. The server's answer is not checked.",
      inputSchema: zDeleteRunInput,
      outputSchema: zDeleteRunOutput
    },
    async (args) =>
      guarded("tracking_delete_run", async () => {
        await deps.client.deleteRun(args.run_id);
        return {
          content: [{ type: "text", text: `Delete requested for run ${args.run_id}` }],
          structuredContent: { run_id: args.run_id }
        };
      })
  );

  mcp.registerTool(
    "tracking_get_run",
    {
      description: "Fetch a run with its metadata and data.",
      inputSchema: zGetRunInput,
      outputSchema: zRunOutput
    },
    async (args) =>
      guarded("tracking_get_run", async () => {
        const run = await deps.client.getRun(args.run_id);
        if (!run) throw noData(`run for run_id ${args.run_id}`);
        return {
          content: [{ type: "text", text: `Run ${run.info.runId} (${run.info.status})` }],
          structuredContent: { run: toRunSummary(run) }
        };
      })
  );

  return mcp;
}
