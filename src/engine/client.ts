import { Buffer } from "node:buffer";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { engineHttpUrl, type EngineConfig } from "../worker/config.js";
import { ArtifactFetchError, TransportError, describeError } from "../worker/errors.js";
import type { ArtifactKind, JobGraph } from "../worker/types.js";
import { raceAbort } from "./deadline.js";
import { probeEngine, type EngineStatus } from "./readiness.js";

/** Single file entry listed under a node output of the history manifest. */
export const manifestFileSchema = z
  .object({
    filename: z.string().optional(),
    subfolder: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export type ManifestFile = z.infer<typeof manifestFileSchema>;

const historyEntrySchema = z
  .object({
    outputs: z.record(z.record(z.unknown())).default({}),
  })
  .passthrough();

/** `GET /history/{id}` answer, keyed by engine job id. */
const historySchema = z.record(historyEntrySchema);

export type HistoryEntry = z.infer<typeof historyEntrySchema>;
export type HistoryManifest = z.infer<typeof historySchema>;

const queueResponseSchema = z.object({ prompt_id: z.string().min(1) }).passthrough();

const systemStatsSchema = z
  .object({
    system: z.record(z.unknown()).optional(),
    devices: z
      .array(
        z
          .object({
            name: z.string().optional(),
            type: z.string().optional(),
            vram_total: z.number().optional(),
            vram_free: z.number().optional(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

export type SystemStats = z.infer<typeof systemStatsSchema>;

/** Location of an artifact on the engine, as passed to `GET /view`. */
export interface ArtifactLocation {
  readonly filename: string;
  readonly subfolder: string;
  readonly type: string;
}

/** Status and body text of a `/prompt` answer. */
export interface PromptAnswer {
  readonly status: number;
  readonly ok: boolean;
  readonly text: string;
}

export interface EngineClientDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger | null;
}

/**
 * Thin client over the engine HTTP surface. Every call carries its own timeout
 * and failures surface as {@link TransportError}, with the exception of
 * {@link EngineClient.submitPrompt} which hands the status and body text to
 * the submitter so validation failures can be decoded.
 */
export class EngineClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: StructuredLogger | null;

  constructor(
    private readonly config: EngineConfig,
    deps: EngineClientDependencies = {},
  ) {
    this.baseUrl = engineHttpUrl(config);
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.logger = deps.logger ?? null;
  }

  /** URL probed for liveness (`GET /`). */
  get rootUrl(): string {
    return `${this.baseUrl}/`;
  }

  /** Single liveness probe; never throws. */
  async checkStatus(): Promise<EngineStatus> {
    return probeEngine(this.rootUrl, { timeoutMs: this.config.probe.timeoutMs, fetchImpl: this.fetchImpl });
  }

  /**
   * Posts `{prompt, client_id}` to `/prompt` and returns the status and body
   * text, both read within the submit deadline.
   */
  async submitPrompt(graph: JobGraph, clientId: string): Promise<PromptAnswer> {
    return this.request(
      "/prompt",
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ prompt: graph, client_id: clientId }),
      },
      this.config.timeouts.submitMs,
      async (response) => ({ status: response.status, ok: response.ok, text: await response.text() }),
    );
  }

  /** Extracts the engine job id from a successful `/prompt` answer. */
  parsePromptId(answer: PromptAnswer): string {
    let payload: unknown;
    try {
      payload = JSON.parse(answer.text);
    } catch (error) {
      throw new TransportError("Unable to parse JSON returned by /prompt", {
        reason: "schema",
        status: answer.status,
        cause: error,
      });
    }
    const parsed = queueResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(`Missing 'prompt_id' in queue response: ${JSON.stringify(payload)}`, {
        reason: "schema",
        status: answer.status,
      });
    }
    return parsed.data.prompt_id;
  }

  async getObjectInfo(): Promise<Record<string, unknown>> {
    const { status, payload } = await this.getJson("/object_info", this.config.timeouts.objectInfoMs);
    const parsed = z.record(z.unknown()).safeParse(payload);
    if (!parsed.success) {
      throw new TransportError("Engine returned a malformed /object_info payload", {
        reason: "schema",
        status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * Lists the checkpoint names the engine reports as installed, read from the
   * `ckpt_name` choices of the `CheckpointLoaderSimple` operation.
   */
  async listCheckpointModels(): Promise<string[]> {
    const objectInfo = await this.getObjectInfo();
    const parsed = checkpointLoaderSchema.safeParse(objectInfo["CheckpointLoaderSimple"]);
    if (!parsed.success) {
      return [];
    }
    const [choices] = parsed.data.input.required.ckpt_name;
    return Array.isArray(choices) ? choices.filter((value): value is string => typeof value === "string") : [];
  }

  async getSystemStats(): Promise<SystemStats> {
    const { status, payload } = await this.getJson("/system_stats", this.config.timeouts.systemStatsMs);
    const parsed = systemStatsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError("Engine returned a malformed /system_stats payload", {
        reason: "schema",
        status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async getHistory(engineJobId: string): Promise<HistoryManifest> {
    const { status, payload } = await this.getJson(
      `/history/${encodeURIComponent(engineJobId)}`,
      this.config.timeouts.historyMs,
    );
    const parsed = historySchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(`Engine returned a malformed history for ${engineJobId}`, {
        reason: "schema",
        status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /**
   * Downloads the bytes of an artifact from `/view`. Videos get the longer
   * timeout, which also bounds reading the body. Failures surface as
   * {@link ArtifactFetchError}.
   */
  async fetchArtifact(location: ArtifactLocation, kind: ArtifactKind): Promise<Buffer> {
    const params = new URLSearchParams({
      filename: location.filename,
      subfolder: location.subfolder,
      type: location.type,
    });
    const timeoutMs = kind === "video" ? this.config.timeouts.videoMs : this.config.timeouts.imageMs;
    this.logger?.debug("artifact_fetch_started", { ...location, kind, timeout_ms: timeoutMs });
    try {
      const body = await this.requestOk(
        `/view?${params.toString()}`,
        { method: "GET" },
        timeoutMs,
        async (response) => Buffer.from(await response.arrayBuffer()),
      );
      this.logger?.debug("artifact_fetched", { filename: location.filename, kind, bytes: body.byteLength });
      return body;
    } catch (error) {
      throw new ArtifactFetchError(`Failed to fetch ${kind} data for ${location.filename}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  /** Uploads an input image through the multipart `/upload/image` endpoint. */
  async uploadImage(name: string, bytes: Buffer): Promise<void> {
    const form = new FormData();
    form.append("image", new Blob([bytes], { type: "image/png" }), name);
    form.append("overwrite", "true");
    await this.requestOk("/upload/image", { method: "POST", body: form }, this.config.timeouts.uploadMs, discardBody);
  }

  private async getJson(path: string, timeoutMs: number): Promise<{ status: number; payload: unknown }> {
    return this.requestOk(path, { method: "GET" }, timeoutMs, async (response) => ({
      status: response.status,
      payload: await this.readJson(response, path),
    }));
  }

  private async requestOk<T>(
    path: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    return this.request(path, init, timeoutMs, async (response) => {
      if (!response.ok) {
        await discardBody(response);
        throw new TransportError(`Engine responded with HTTP ${response.status} for ${path}`, {
          reason: "http",
          status: response.status,
        });
      }
      return read(response);
    });
  }

  /**
   * Runs one exchange under {@link timeoutMs}. The deadline covers the headers
   * and {@link read}, so a body that stalls after the headers still times out.
   */
  private async request<T>(
    path: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const exchange = async (): Promise<T> => {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
      return read(response);
    };
    try {
      return await raceAbort(exchange(), controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(`Engine request ${path} timed out after ${timeoutMs} ms`, {
          reason: "timeout",
          cause: error,
        });
      }
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(`Engine request ${path} failed: ${describeError(error)}`, {
        reason: "network",
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readJson(response: Response, path: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new TransportError(`Unable to parse JSON returned by ${path}`, {
        reason: "schema",
        status: response.status,
        cause: error,
      });
    }
  }
}

async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => undefined);
}

const checkpointLoaderSchema = z.object({
  input: z.object({
    required: z.object({
      ckpt_name: z.array(z.unknown()).min(1),
    }),
  }),
});
