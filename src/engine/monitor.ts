import { setTimeout as delay } from "node:timers/promises";

import type { StructuredLogger } from "../logger.js";
import type { StreamConfig } from "../worker/config.js";
import { EngineUnreachableError, StreamDisconnectedError, describeError } from "../worker/errors.js";
import { decodeLifecycleFrame, progressPercent, type LifecycleEvent } from "./events.js";
import type { EngineStatus } from "./readiness.js";
import type { StreamConnection, StreamConnector } from "./stream.js";

export type MonitorState = "connecting" | "submitted" | "running" | "completed" | "failed";

/** Node failure reported by the engine through an `execution_error` event. */
export interface ExecutionFailure {
  readonly nodeId: string | null;
  readonly nodeType: string | null;
  readonly message: string | null;
}

export interface MonitorOutcome {
  readonly state: "completed" | "failed";
  readonly engineJobId: string;
  /** Diagnostics accumulated while monitoring; forwarded to the collector. */
  readonly errors: readonly string[];
  readonly executionError: ExecutionFailure | null;
  /** Nodes confirmed by `executed` events, in arrival order. */
  readonly executedNodes: readonly string[];
  readonly reconnects: number;
}

export interface ExecutionMonitorDependencies {
  readonly connector: StreamConnector;
  /** Out-of-band HTTP liveness probe of the engine. */
  readonly checkStatus: () => Promise<EngineStatus>;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: StructuredLogger | null;
}

function describeStatus(status: EngineStatus): string {
  return status.error ?? `status ${status.statusCode ?? "unknown"}`;
}

/**
 * Follows one submitted job over the streaming connection until the engine
 * reports completion or failure. Dropped connections are re-established
 * transparently as long as the engine HTTP surface answers.
 */
export class ExecutionMonitor {
  private readonly connector: StreamConnector;
  private readonly checkStatus: () => Promise<EngineStatus>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: StructuredLogger | null;

  private connection: StreamConnection | null = null;
  private state: MonitorState = "connecting";
  private reconnects = 0;

  constructor(
    private readonly config: StreamConfig,
    private readonly url: string,
    deps: ExecutionMonitorDependencies,
  ) {
    this.connector = deps.connector;
    this.checkStatus = deps.checkStatus;
    this.sleep = deps.sleep ?? ((ms: number) => delay(ms));
    this.logger = deps.logger ?? null;
  }

  get currentState(): MonitorState {
    return this.state;
  }

  /** Opens the streaming connection. Must precede submission so no event is missed. */
  async connect(): Promise<void> {
    this.logger?.info("stream_connecting", { url: this.url });
    try {
      this.connection = await this.connector(this.url);
    } catch (error) {
      if (error instanceof StreamDisconnectedError) {
        throw error;
      }
      throw new StreamDisconnectedError(`Unable to open stream ${this.url}: ${describeError(error)}`, { cause: error });
    }
    this.logger?.info("stream_connected", { url: this.url });
  }

  /**
   * Consumes lifecycle events for {@link engineJobId} until a terminal state.
   *
   * @throws EngineUnreachableError when the engine stops answering while the stream is down.
   * @throws StreamDisconnectedError when every reconnection attempt failed.
   */
  async watch(engineJobId: string): Promise<MonitorOutcome> {
    this.state = "submitted";
    const errors: string[] = [];
    const executedNodes: string[] = [];
    const maxStalled = this.config.maxStalledReceives;
    let stalled = 0;

    this.logger?.info("job_monitor_started", { prompt_id: engineJobId });

    while (true) {
      const connection = this.requireConnection();
      const frame = await connection.receive(this.config.receiveTimeoutMs);

      if (frame.kind === "timeout") {
        stalled += 1;
        this.logger?.debug("stream_receive_timeout", { prompt_id: engineJobId, stalled, max_stalled: maxStalled });
        if (stalled >= maxStalled) {
          const status = await this.checkStatus();
          if (!status.reachable) {
            this.logger?.warn("engine_unresponsive_while_waiting", { prompt_id: engineJobId, reason: describeStatus(status) });
            await this.reconnect("engine stopped answering liveness probes");
          } else {
            this.logger?.info("engine_alive_still_waiting", { prompt_id: engineJobId });
          }
          stalled = 0;
        }
        continue;
      }

      if (frame.kind === "closed") {
        await this.reconnect(`connection closed (${frame.code ?? "no code"}): ${frame.reason}`);
        stalled = 0;
        continue;
      }

      if (frame.kind === "binary") {
        // Live previews; nothing to track.
        continue;
      }

      if (this.config.trace) {
        this.logger?.debug("stream_frame", { prompt_id: engineJobId, frame: frame.data });
      }

      const decoded = decodeLifecycleFrame(frame.data);
      if (!decoded.ok) {
        this.logger?.warn("stream_frame_malformed", { prompt_id: engineJobId, reason: decoded.reason });
        continue;
      }

      const event = decoded.event;
      switch (event.type) {
        case "status":
          stalled = 0;
          this.logger?.info("job_queue_status", { queue_remaining: event.queueRemaining });
          break;
        case "progress":
          if (!this.concerns(event, engineJobId)) {
            break;
          }
          stalled = 0;
          this.state = "running";
          this.logger?.debug("job_progress", {
            prompt_id: engineJobId,
            node: event.node,
            value: event.value,
            max: event.max,
            percent: Number(progressPercent(event).toFixed(1)),
          });
          break;
        case "executing":
          if (event.node === null) {
            if (event.promptId === engineJobId) {
              this.state = "completed";
              this.logger?.info("job_execution_finished", { prompt_id: engineJobId, reconnects: this.reconnects });
              return this.outcome("completed", engineJobId, errors, null, executedNodes);
            }
            break;
          }
          if (!this.concerns(event, engineJobId)) {
            break;
          }
          stalled = 0;
          this.state = "running";
          this.logger?.info("node_executing", { prompt_id: engineJobId, node: event.node });
          break;
        case "executed":
          if (!this.concerns(event, engineJobId)) {
            break;
          }
          stalled = 0;
          if (event.node !== null) {
            executedNodes.push(event.node);
          }
          this.logger?.info("node_executed", { prompt_id: engineJobId, node: event.node });
          break;
        case "execution_error": {
          if (event.promptId !== engineJobId) {
            break;
          }
          const failure: ExecutionFailure = {
            nodeId: event.nodeId,
            nodeType: event.nodeType,
            message: event.exceptionMessage,
          };
          const description = `Node Type: ${failure.nodeType}, Node ID: ${failure.nodeId}, Message: ${failure.message}`;
          errors.push(`Workflow execution error: ${description}`);
          this.state = "failed";
          this.logger?.error("job_execution_error", { prompt_id: engineJobId, node_id: failure.nodeId, node_type: failure.nodeType });
          return this.outcome("failed", engineJobId, errors, failure, executedNodes);
        }
        case "unknown":
          this.logger?.debug("stream_event_ignored", { type: event.rawType });
          break;
      }
    }
  }

  close(): void {
    if (this.connection) {
      this.connection.close();
      this.connection = null;
      this.logger?.info("stream_closed", { url: this.url });
    }
  }

  /** Events without a job id predate per-job tagging and are attributed to the watched job. */
  private concerns(event: Extract<LifecycleEvent, { promptId: string | null }>, engineJobId: string): boolean {
    return event.promptId === null || event.promptId === engineJobId;
  }

  private requireConnection(): StreamConnection {
    if (!this.connection) {
      throw new StreamDisconnectedError("Streaming connection is not open");
    }
    return this.connection;
  }

  private async reconnect(reason: string): Promise<void> {
    this.connection?.close();
    this.connection = null;

    const attempts = this.config.reconnectAttempts;
    const delayMs = this.config.reconnectDelaySeconds * 1_000;
    let lastError = reason;
    this.logger?.warn("stream_reconnect_started", { reason, attempts, delay_ms: delayMs });

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const status = await this.checkStatus();
      if (!status.reachable) {
        this.logger?.error("stream_reconnect_aborted", { attempt, reason: describeStatus(status) });
        throw new EngineUnreachableError(
          `Engine HTTP surface unreachable during stream reconnect: ${describeStatus(status)}`,
        );
      }

      this.logger?.info("stream_reconnect_attempt", { attempt, attempts });
      try {
        this.connection = await this.connector(this.url);
        this.reconnects += 1;
        this.logger?.info("stream_reconnected", { attempt });
        return;
      } catch (error) {
        lastError = describeError(error);
        this.logger?.warn("stream_reconnect_failed", { attempt, error: lastError });
        if (attempt < attempts) {
          await this.sleep(delayMs);
        }
      }
    }

    throw new StreamDisconnectedError(
      `Connection closed and failed to reconnect after ${attempts} attempt(s). Last error: ${lastError}`,
    );
  }

  private outcome(
    state: "completed" | "failed",
    engineJobId: string,
    errors: readonly string[],
    executionError: ExecutionFailure | null,
    executedNodes: readonly string[],
  ): MonitorOutcome {
    return { state, engineJobId, errors, executionError, executedNodes, reconnects: this.reconnects };
  }
}
