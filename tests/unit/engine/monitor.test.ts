import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ExecutionMonitor } from "../../../src/engine/monitor.js";
import type { EngineStatus } from "../../../src/engine/readiness.js";
import type { StreamConnection } from "../../../src/engine/stream.js";
import type { StreamConfig } from "../../../src/worker/config.js";
import { EngineUnreachableError, StreamDisconnectedError } from "../../../src/worker/errors.js";
import { expectRejection } from "../../helpers/assertions.js";
import { createTestConfig } from "../../helpers/config.js";
import { RecordingLogger } from "../../helpers/recordingLogger.js";
import {
  ScriptedConnection,
  closedFrame,
  createScriptedConnector,
  textFrame,
  timeoutFrame,
} from "../../helpers/stream.js";

const STREAM_URL = "ws://engine.test:8188/ws?clientId=test-client";
const REACHABLE: EngineStatus = { reachable: true, statusCode: 200, error: null };
const UNREACHABLE: EngineStatus = { reachable: false, statusCode: null, error: "fetch failed" };

const status = (queueRemaining: number) =>
  textFrame({ type: "status", data: { status: { exec_info: { queue_remaining: queueRemaining } } } });
const executing = (node: string | number | null, promptId = "abc123") =>
  textFrame({ type: "executing", data: { node, prompt_id: promptId } });
const executed = (node: string, promptId = "abc123") =>
  textFrame({ type: "executed", data: { node, prompt_id: promptId, output: {} } });

function createMonitor(
  sequence: ReadonlyArray<StreamConnection | Error>,
  statuses: readonly EngineStatus[] = [REACHABLE],
  streamOverrides: Partial<StreamConfig> = {},
) {
  const { connector, urls } = createScriptedConnector(sequence);
  const checkStatus = sinon.stub<[], Promise<EngineStatus>>();
  statuses.forEach((value, index) => checkStatus.onCall(index).resolves(value));
  checkStatus.resolves(statuses[statuses.length - 1] ?? REACHABLE);
  const sleep = sinon.stub<[number], Promise<void>>().resolves();
  const logger = new RecordingLogger();
  const config: StreamConfig = { ...createTestConfig().stream, ...streamOverrides };
  const monitor = new ExecutionMonitor(config, STREAM_URL, { connector, checkStatus, sleep, logger });
  return { monitor, urls, checkStatus, sleep, logger };
}

describe("engine/monitor", () => {
  it("completes on the null-node executing event of the watched job", async () => {
    const connection = new ScriptedConnection([status(1), executing(5), executing(null)]);
    const { monitor, urls, checkStatus } = createMonitor([connection]);

    await monitor.connect();
    expect(monitor.currentState).to.equal("connecting");
    const outcome = await monitor.watch("abc123");

    expect(outcome).to.deep.equal({
      state: "completed",
      engineJobId: "abc123",
      errors: [],
      executionError: null,
      executedNodes: [],
      reconnects: 0,
    });
    expect(monitor.currentState).to.equal("completed");
    expect(urls).to.deep.equal([STREAM_URL]);
    expect(connection.timeouts).to.deep.equal([500, 500, 500]);
    expect(checkStatus.callCount).to.equal(0);
  });

  it("ignores events that belong to other jobs", async () => {
    const connection = new ScriptedConnection([
      executing("ksampler_1", "other"),
      textFrame({
        type: "execution_error",
        data: { prompt_id: "other", node_id: "x", node_type: "X", exception_message: "boom" },
      }),
      executing(null, "other"),
      executed("saveimage_1"),
      executing(null),
    ]);
    const { monitor } = createMonitor([connection]);

    await monitor.connect();
    const outcome = await monitor.watch("abc123");

    expect(outcome.state).to.equal("completed");
    expect(outcome.errors).to.deep.equal([]);
    expect(outcome.executedNodes).to.deep.equal(["saveimage_1"]);
    expect(connection.delivered).to.equal(5);
  });

  it("fails on an execution error of the watched job", async () => {
    const connection = new ScriptedConnection([
      executing("vae_decode_1"),
      textFrame({
        type: "execution_error",
        data: {
          prompt_id: "abc123",
          node_id: "vae_decode_1",
          node_type: "VAEDecode",
          exception_message: "CUDA out of memory",
        },
      }),
    ]);
    const { monitor } = createMonitor([connection]);

    await monitor.connect();
    const outcome = await monitor.watch("abc123");

    expect(outcome.state).to.equal("failed");
    expect(outcome.errors).to.deep.equal([
      "Workflow execution error: Node Type: VAEDecode, Node ID: vae_decode_1, Message: CUDA out of memory",
    ]);
    expect(outcome.executionError).to.deep.equal({
      nodeId: "vae_decode_1",
      nodeType: "VAEDecode",
      message: "CUDA out of memory",
    });
    expect(monitor.currentState).to.equal("failed");
  });

  it("reconnects once after a drop and resumes without replaying events", async () => {
    const first = new ScriptedConnection([executing("ksampler_1"), executed("ksampler_1"), closedFrame()]);
    const second = new ScriptedConnection([executed("vae_decode_1"), executing(null)]);
    const { monitor, urls, checkStatus, sleep } = createMonitor([first, second]);

    await monitor.connect();
    const outcome = await monitor.watch("abc123");

    expect(outcome.state).to.equal("completed");
    expect(outcome.engineJobId).to.equal("abc123");
    expect(outcome.executedNodes).to.deep.equal(["ksampler_1", "vae_decode_1"]);
    expect(outcome.reconnects).to.equal(1);
    expect(urls).to.deep.equal([STREAM_URL, STREAM_URL]);
    expect(first.closed).to.equal(true);
    expect(checkStatus.callCount).to.equal(1);
    expect(sleep.callCount).to.equal(0);
  });

  it("aborts on the first reconnection attempt when the engine is unreachable", async () => {
    const { monitor, urls, checkStatus, sleep } = createMonitor(
      [new ScriptedConnection([closedFrame()]), new ScriptedConnection([executing(null)])],
      [UNREACHABLE],
    );

    await monitor.connect();
    const error = await expectRejection(monitor.watch("abc123"), EngineUnreachableError);

    expect(error.message).to.equal("Engine HTTP surface unreachable during stream reconnect: fetch failed");
    expect(urls).to.have.lengthOf(1);
    expect(checkStatus.callCount).to.equal(1);
    expect(sleep.callCount).to.equal(0);
  });

  it("gives up once every reconnection attempt failed", async () => {
    const refused = new Error("connection refused");
    const { monitor, checkStatus, sleep } = createMonitor([
      new ScriptedConnection([closedFrame()]),
      refused,
      refused,
      refused,
    ]);

    await monitor.connect();
    const error = await expectRejection(monitor.watch("abc123"), StreamDisconnectedError);

    expect(error.message).to.equal("Connection closed and failed to reconnect after 3 attempt(s). Last error: connection refused");
    expect(checkStatus.callCount).to.equal(3);
    expect(sleep.args).to.deep.equal([[3_000], [3_000]]);
  });

  it("stops reconnecting as soon as the engine goes away mid-sequence", async () => {
    const { monitor, checkStatus, sleep } = createMonitor(
      [new ScriptedConnection([closedFrame()]), new Error("connection refused")],
      [REACHABLE, UNREACHABLE],
    );

    await monitor.connect();
    await expectRejection(monitor.watch("abc123"), EngineUnreachableError);

    expect(checkStatus.callCount).to.equal(2);
    expect(sleep.callCount).to.equal(1);
  });

  it("probes liveness after consecutive receive timeouts and keeps waiting while the engine answers", async () => {
    const connection = new ScriptedConnection([timeoutFrame, timeoutFrame, timeoutFrame, executing(null)]);
    const { monitor, checkStatus, logger } = createMonitor([connection]);

    await monitor.connect();
    const outcome = await monitor.watch("abc123");

    expect(outcome.state).to.equal("completed");
    expect(checkStatus.callCount).to.equal(1);
    expect(logger.messages("info")).to.include("engine_alive_still_waiting");
  });

  it("treats a silent, unreachable engine as a fatal disconnect", async () => {
    const { monitor, checkStatus } = createMonitor(
      [new ScriptedConnection([timeoutFrame, timeoutFrame])],
      [UNREACHABLE],
    );

    await monitor.connect();
    await expectRejection(monitor.watch("abc123"), EngineUnreachableError);

    expect(checkStatus.callCount).to.equal(2);
  });

  it("does not reset the stall counter on malformed frames", async () => {
    const malformed = new ScriptedConnection([timeoutFrame, textFrame("not json"), timeoutFrame, executing(null)]);
    const malformedRun = createMonitor([malformed]);
    await malformedRun.monitor.connect();
    await malformedRun.monitor.watch("abc123");

    const healthy = new ScriptedConnection([timeoutFrame, status(0), timeoutFrame, executing(null)]);
    const healthyRun = createMonitor([healthy]);
    await healthyRun.monitor.connect();
    await healthyRun.monitor.watch("abc123");

    expect(malformedRun.checkStatus.callCount).to.equal(1);
    expect(malformedRun.logger.messages("warn")).to.include("stream_frame_malformed");
    expect(healthyRun.checkStatus.callCount).to.equal(0);
  });

  it("skips binary preview frames", async () => {
    const connection = new ScriptedConnection([{ kind: "binary", byteLength: 2048 }, executing(null)]);
    const { monitor } = createMonitor([connection]);

    await monitor.connect();

    expect((await monitor.watch("abc123")).state).to.equal("completed");
  });

  it("logs every frame in trace mode", async () => {
    const connection = new ScriptedConnection([status(0), executing(null)]);
    const { monitor, logger } = createMonitor([connection], [REACHABLE], { trace: true });

    await monitor.connect();
    await monitor.watch("abc123");

    expect(logger.messages("debug").filter((message) => message === "stream_frame")).to.have.lengthOf(2);
  });

  it("wraps connection failures in StreamDisconnectedError and closes idempotently", async () => {
    const { monitor } = createMonitor([new Error("handshake timed out")]);

    const error = await expectRejection(monitor.connect(), StreamDisconnectedError);

    expect(error.message).to.equal(`Unable to open stream ${STREAM_URL}: handshake timed out`);
    monitor.close();
    monitor.close();
  });

  it("starts a fresh stall count on the reconnected stream", async () => {
    const first = new ScriptedConnection([timeoutFrame, closedFrame()]);
    const second = new ScriptedConnection([timeoutFrame, executing(null)]);
    const { monitor, checkStatus } = createMonitor([first, second]);

    await monitor.connect();
    const outcome = await monitor.watch("abc123");

    expect(outcome.state).to.equal("completed");
    expect(outcome.reconnects).to.equal(1);
    // Only the liveness check that precedes the reconnect attempt.
    expect(checkStatus.callCount).to.equal(1);
  });
});
