import { EngineClient } from "../engine/client.js";
import { ExecutionMonitor, type MonitorOutcome } from "../engine/monitor.js";
import { awaitEngineReady } from "../engine/readiness.js";
import { createWebSocketConnector, type StreamConnector } from "../engine/stream.js";
import { JobSubmitter } from "../engine/submitter.js";
import { canonicalizeGraph } from "../graph/canonicalize.js";
import type { StructuredLogger } from "../logger.js";
import { OutputCollector } from "../outputs/collector.js";
import { createUploader, type ArtifactUploader } from "../outputs/storage.js";
import { engineStreamUrl, type WorkerConfig } from "../worker/config.js";
import {
  EngineUnreachableError,
  GraphValidationError,
  InputValidationError,
  ManifestMissingError,
  StreamDisconnectedError,
  TransportError,
  WorkerError,
  describeError,
} from "../worker/errors.js";
import type {
  FailurePayload,
  JobGraph,
  JobHandle,
  JobResult,
  JobResultPayload,
  OutputPayloadEntry,
} from "../worker/types.js";
import { parseJobInput } from "./input.js";
import { uploadInputImages } from "./inputImages.js";

/** Unit of work handed over by the job harness. */
export interface Job {
  readonly id: string;
  readonly input: unknown;
}

export interface JobRunnerDependencies {
  readonly config: WorkerConfig;
  readonly logger: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
  readonly connector?: StreamConnector;
  /** Overrides the uploader derived from `config.storage`; `null` forces inline persistence. */
  readonly uploader?: ArtifactUploader | null;
  readonly sleep?: (ms: number) => Promise<void>;
}

const PREVIEWED_IDS = 5;

function preview(ids: readonly string[]): string {
  const head = ids.slice(0, PREVIEWED_IDS).join(", ");
  return ids.length > PREVIEWED_IDS ? `${head}...` : head;
}

function withDetails(error: string, details: readonly string[]): FailurePayload {
  return details.length > 0 ? { error, details } : { error };
}

/** Maps a collected {@link JobResult} onto the external result payload. */
export function buildResultPayload(result: JobResult): JobResultPayload {
  const images: OutputPayloadEntry[] = result.outputs.map((output): OutputPayloadEntry =>
    output.persistence.mode === "external"
      ? { filename: output.filename, type: "s3_url", data: output.persistence.url }
      : { filename: output.filename, type: "base64", data: output.persistence.base64 },
  );

  if (images.length === 0) {
    if (result.errors.length > 0) {
      return { error: "Job processing failed", details: result.errors };
    }
    return { images: [], status: "success_no_files" };
  }
  return result.errors.length > 0 ? { images, errors: result.errors } : { images };
}

/** Maps a fatal pipeline error onto the `{error, details?}` payload. */
export function describeFailure(error: unknown): FailurePayload {
  if (error instanceof InputValidationError || error instanceof GraphValidationError) {
    return withDetails(error.message, error.details);
  }
  if (error instanceof StreamDisconnectedError || error instanceof EngineUnreachableError) {
    return { error: `Streaming communication error: ${error.message}` };
  }
  if (error instanceof TransportError) {
    return { error: `HTTP communication error with the engine: ${error.message}` };
  }
  if (error instanceof WorkerError) {
    return withDetails(error.message, error.details);
  }
  return { error: `An unexpected error occurred: ${describeError(error)}` };
}

/**
 * Runs one job end to end: Canonicalize → Probe → (image preload) → Submit →
 * Monitor → Collect. Every outcome, fatal ones included, resolves to a result
 * payload; `run` never rejects.
 */
export class JobRunner {
  private readonly config: WorkerConfig;
  private readonly logger: StructuredLogger;
  private readonly fetchImpl: typeof fetch;
  private readonly client: EngineClient;
  private readonly submitter: JobSubmitter;
  private readonly collector: OutputCollector;
  private readonly connector: StreamConnector;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(deps: JobRunnerDependencies) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.sleep = deps.sleep;
    this.client = new EngineClient(deps.config.engine, { fetchImpl: this.fetchImpl, logger: deps.logger });
    this.submitter = new JobSubmitter(this.client, { logger: deps.logger });
    this.connector =
      deps.connector ?? createWebSocketConnector({ handshakeTimeoutMs: deps.config.stream.handshakeTimeoutMs });
    const uploader =
      deps.uploader !== undefined
        ? deps.uploader
        : createUploader(deps.config.storage, { fetchImpl: this.fetchImpl, logger: deps.logger });
    this.collector = new OutputCollector({ client: this.client, uploader, logger: deps.logger });
  }

  async run(job: Job): Promise<JobResultPayload> {
    this.logger.info("job_started", { job_id: job.id });
    try {
      return this.finish(job, await this.execute(job));
    } catch (error) {
      this.logger.error("job_failed", {
        job_id: job.id,
        error: describeError(error),
        code: error instanceof WorkerError ? error.code : null,
      });
      return this.finish(job, describeFailure(error));
    }
  }

  private async execute(job: Job): Promise<JobResultPayload> {
    const input = parseJobInput(job.input);
    const graph = canonicalizeGraph(input.workflow);
    this.logger.info("workflow_canonicalized", {
      nodes: Object.keys(graph).length,
      original_ids: preview(Object.keys(input.workflow)),
      canonical_ids: preview(Object.keys(graph)),
    });

    const { probe } = this.config.engine;
    const ready = await awaitEngineReady(this.client.rootUrl, {
      maxAttempts: probe.maxAttempts,
      intervalMs: probe.intervalMs,
      timeoutMs: probe.timeoutMs,
      fetchImpl: this.fetchImpl,
      sleep: this.sleep,
      logger: this.logger,
    });
    if (!ready) {
      return { error: `Engine (${this.config.engine.host}) not reachable after multiple retries.` };
    }

    const upload = await uploadInputImages(this.client, input.images, this.logger);
    if (upload.errors.length > 0) {
      return { error: "Failed to upload one or more input images", details: upload.errors };
    }

    const outcome = await this.submitAndWatch(graph);
    let result: JobResult;
    try {
      result = await this.collector.collect(outcome.engineJobId, { jobId: job.id, priorErrors: outcome.errors });
    } catch (error) {
      if (error instanceof ManifestMissingError && outcome.errors.length > 0) {
        return {
          error: "Job processing failed, job id not found in history.",
          details: [...outcome.errors, error.message],
        };
      }
      throw error;
    }
    return buildResultPayload(result);
  }

  private async submitAndWatch(graph: JobGraph): Promise<MonitorOutcome> {
    const monitor = new ExecutionMonitor(this.config.stream, engineStreamUrl(this.config.engine), {
      connector: this.connector,
      checkStatus: () => this.client.checkStatus(),
      sleep: this.sleep,
      logger: this.logger,
    });
    try {
      await monitor.connect();
      const engineJobId = await this.submitter.submit(graph, this.config.engine.clientId);
      const handle: JobHandle = { correlationId: this.config.engine.clientId, engineJobId };
      this.logger.info("job_queued", { client_id: handle.correlationId, prompt_id: handle.engineJobId });
      return await monitor.watch(handle.engineJobId);
    } finally {
      monitor.close();
    }
  }

  private finish(job: Job, payload: JobResultPayload): JobResultPayload {
    const final: JobResultPayload = this.config.refreshAfterJob ? { ...payload, refresh_worker: true } : payload;
    this.logger.info("job_finished", {
      job_id: job.id,
      failed: "error" in final,
      outputs: "images" in final && final.images ? final.images.length : 0,
    });
    return final;
  }
}
