import { describe, it, expect, beforeEach } from "vitest";
import { TrackingClient, ENDPOINTS } from "../src/client/trackingClient.js";
import { TrackingDecodeError, TrackingSerializationError, TrackingTransportError } from "../src/client/errors.js";
import { FakeTrackingServer } from "./fakeTrackingServer.js";

const FIXED_NOW_MS = 1_700_000_123_900;
const FIXED_NOW_S = 1_700_000_123;

function replyingWith(status: number, payload: string): TrackingClient {
  return new TrackingClient({
    baseUrl: "http://tracking.test",
    fetch: async () => new Response(payload, { status })
  });
}

describe("TrackingClient", () => {
  let server: FakeTrackingServer;
  let client: TrackingClient;

  beforeEach(() => {
    server = new FakeTrackingServer();
    client = new TrackingClient({ baseUrl: "http://tracking.test/", fetch: server.fetch, now: () => FIXED_NOW_MS });
  });

  it("strips trailing slashes from the base url", () => {
    expect(client.baseUrl).toBe("http://tracking.test");
  });

  it("creates an experiment and reads it back by id", async () => {
    const experimentId = await client.createExperiment("exp-a");
    expect(experimentId).toBe("1");

    const experiment = await client.getExperiment("1");
    expect(experiment).toEqual({
      experimentId: "1",
      name: "exp-a",
      artifactLocation: "mlflow-artifacts:/1",
      lifecycleStage: "active",
      tags: {},
      creationTime: 1_700_000_000_000,
      lastUpdateTime: 1_700_000_000_000
    });

    const get = server.requests[1];
    expect(get?.method).toBe("GET");
    expect(get?.url.pathname).toBe(ENDPOINTS.experimentGet);
    expect(get?.url.search).toBe("?experiment_id=1");
  });

  it("reads an experiment back by name", async () => {
    const experimentId = await client.createExperiment("team a/exp");
    const experiment = await client.getExperimentByName("team a/exp");
    expect(experiment?.experimentId).toBe(experimentId);
    expect(server.requests[1]?.url.searchParams.get("experiment_name")).toBe("team a/exp");
  });

  it("defaults a new run's start time to the current second", async () => {
    await client.createExperiment("exp-b");
    const run = await client.createRun("1", [{ key: "mlflow.runName", value: "baseline" }]);

    expect(run?.info).toEqual({
      runId: "run0001",
      runUuid: "run0001",
      experimentId: "1",
      userId: "test-user",
      status: "RUNNING",
      startTime: FIXED_NOW_S,
      endTime: null,
      artifactUri: "mlflow-artifacts:/1/run0001/artifacts",
      lifecycleStage: "active"
    });
    expect(run?.data).toEqual({ tags: [{ key: "mlflow.runName", value: "baseline" }] });

    const create = server.requests[1];
    expect(create?.contentType).toBe("application/json");
    expect(create?.body).toEqual({
      experiment_id: "1",
      start_time: FIXED_NOW_S,
      tags: [{ key: "mlflow.runName", value: "baseline" }]
    });
  });

  it("uses the wall clock when no clock is injected", async () => {
    const realClock = new TrackingClient({ baseUrl: "http://tracking.test", fetch: server.fetch });
    await realClock.createExperiment("exp-clock");
    const run = await realClock.createRun("1");
    const nowS = Date.now() / 1000;
    expect(run).not.toBeNull();
    expect(Math.abs((run?.info.startTime ?? 0) - nowS)).toBeLessThan(5);
  });

  it("creates a run with an explicit start time and no tags", async () => {
    await client.createExperiment("exp-c");
    const run = await client.createRunWithStartTime("1", 1_600_000_000);
    expect(run?.info.startTime).toBe(1_600_000_000);
    expect(server.requests[1]?.body).toEqual({ experiment_id: "1", start_time: 1_600_000_000, tags: [] });
  });

  it("updates a run's status with a default end time", async () => {
    await client.createExperiment("exp-d");
    await client.createRunWithStartTime("1", 1_600_000_000);

    const info = await client.updateRun("run0001", "FINISHED");
    expect(info?.status).toBe("FINISHED");
    expect(info?.endTime).toBe(FIXED_NOW_S);
    expect(server.requests[2]?.body).toEqual({ run_id: "run0001", status: "FINISHED", end_time: FIXED_NOW_S });

    const failed = await client.updateRunWithEndTime("run0001", "FAILED", 1_600_000_500);
    expect(failed?.status).toBe("FAILED");
    expect(failed?.endTime).toBe(1_600_000_500);
  });

  it("rejects non-integer start and end times before sending", async () => {
    await expect(client.createRunWithStartTime("1", Number.NaN)).rejects.toBeInstanceOf(TrackingSerializationError);
    await expect(client.createRunWithStartTime("1", 1.5)).rejects.toThrow(
      "start_time must be an integer number of epoch seconds (got 1.5)"
    );
    await expect(client.updateRunWithEndTime("r", "FINISHED", Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(
      TrackingSerializationError
    );
    expect(server.requests).toHaveLength(0);
  });

  it("deletes a run", async () => {
    await client.createExperiment("exp-e");
    await client.createRun("1");

    await expect(client.deleteRun("run0001")).resolves.toBeUndefined();
    expect(server.requests[2]?.body).toEqual({ run_id: "run0001" });

    const run = await client.getRun("run0001");
    expect(run?.info.lifecycleStage).toBe("deleted");
    expect(server.requests[3]?.url.search).toBe("?run_id=run0001");
  });

  it("returns null for unknown ids", async () => {
    await expect(client.getExperiment("404")).resolves.toBeNull();
    await expect(client.getExperimentByName("nope")).resolves.toBeNull();
    await expect(client.getRun("missing")).resolves.toBeNull();
    await expect(client.createRun("404")).resolves.toBeNull();
  });

  it("returns null without an error from every endpoint on a non-200 answer", async () => {
    server.forcedStatus = 500;

    await expect(client.getExperiment("1")).resolves.toBeNull();
    await expect(client.getExperimentByName("exp")).resolves.toBeNull();
    await expect(client.createExperiment("exp")).resolves.toBeNull();
    await expect(client.createRun("1")).resolves.toBeNull();
    await expect(client.createRunWithStartTime("1", 1)).resolves.toBeNull();
    await expect(client.updateRun("r", "KILLED")).resolves.toBeNull();
    await expect(client.updateRunWithEndTime("r", "KILLED", 2)).resolves.toBeNull();
    await expect(client.deleteRun("r")).resolves.toBeUndefined();
    await expect(client.getRun("r")).resolves.toBeNull();

    expect(server.requests).toHaveLength(9);
  });
});

describe("TrackingClient decoding", () => {
  it("accepts int64 fields sent as strings and fills absent fields", async () => {
    const client = replyingWith(
      200,
      JSON.stringify({
        run: {
          info: {
            run_id: "r1",
            experiment_id: "0",
            status: "FINISHED",
            start_time: "1700000000",
            end_time: "1700000100",
            lifecycle_stage: "active"
          }
        }
      })
    );

    const run = await client.getRun("r1");
    expect(run).toEqual({
      info: {
        runId: "r1",
        runUuid: "",
        experimentId: "0",
        userId: "",
        status: "FINISHED",
        startTime: 1_700_000_000,
        endTime: 1_700_000_100,
        artifactUri: "",
        lifecycleStage: "active"
      },
      data: {}
    });
  });

  it("turns experiment tag lists into a map", async () => {
    const client = replyingWith(
      200,
      JSON.stringify({
        experiment: {
          experiment_id: "4",
          name: "tagged",
          artifact_location: "s3://bucket/4",
          lifecycle_stage: "active",
          tags: [{ key: "team", value: "vision" }]
        }
      })
    );

    const experiment = await client.getExperiment("4");
    expect(experiment?.tags).toEqual({ team: "vision" });
    expect(experiment?.creationTime).toBeNull();
  });

  it("rejects a 200 body that is not JSON", async () => {
    const client = replyingWith(200, "<html>oops</html>");
    const err = await client.getExperiment("1").catch((e: unknown) => e);
    if (!(err instanceof TrackingDecodeError)) throw new Error("expected TrackingDecodeError");
    expect(err.endpoint).toBe(ENDPOINTS.experimentGet);
    expect(err.message).toBe("/api/2.0/mlflow/experiments/get: response is not valid JSON");
  });

  it("requires lifecycle_stage, experiment_id and status", async () => {
    const err = await replyingWith(200, JSON.stringify({ experiment: { experiment_id: "1", name: "x" } }))
      .getExperiment("1")
      .catch((e: unknown) => e);
    if (!(err instanceof TrackingDecodeError)) throw new Error("expected TrackingDecodeError");
    expect(err.message).toContain("lifecycle_stage");

    await expect(
      replyingWith(200, JSON.stringify({ run: { info: { status: "RUNNING", lifecycle_stage: "active" } } })).getRun("r")
    ).rejects.toBeInstanceOf(TrackingDecodeError);
    await expect(
      replyingWith(200, JSON.stringify({ run: { info: { experiment_id: "0", lifecycle_stage: "active" } } })).getRun("r")
    ).rejects.toBeInstanceOf(TrackingDecodeError);
  });

  it("rejects a 200 body with the wrong shape", async () => {
    await expect(replyingWith(200, "{}").createExperiment("x")).rejects.toBeInstanceOf(TrackingDecodeError);
    await expect(
      replyingWith(
        200,
        JSON.stringify({ run_info: { experiment_id: "0", status: "DONE", lifecycle_stage: "active" } })
      ).updateRun("r", "FINISHED")
    ).rejects.toBeInstanceOf(TrackingDecodeError);
  });

  it("surfaces transport failures", async () => {
    const client = new TrackingClient({
      baseUrl: "http://tracking.test",
      fetch: async () => {
        throw new TypeError("fetch failed");
      }
    });
    await expect(client.getRun("r")).rejects.toBeInstanceOf(TrackingTransportError);
    await expect(client.deleteRun("r")).rejects.toBeInstanceOf(TrackingTransportError);
  });
});
