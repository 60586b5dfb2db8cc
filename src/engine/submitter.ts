import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { GraphValidationError, TransportError, describeError } from "../worker/errors.js";
import type { JobGraph } from "../worker/types.js";
import type { EngineClient } from "./client.js";

const DEFAULT_VALIDATION_MESSAGE = "Workflow validation failed";
const OUTPUTS_FAILED_VALIDATION = "prompt_outputs_failed_validation";
const MODEL_HINT = "\n\nThis usually means a required model or parameter is not available.";
const NO_MODELS_HINT = "No checkpoint models appear to be available. Please check your model installation.";

/**
 * Loose view over the engine's 400 body. Every field is optional because the
 * shape differs between engine releases.
 */
const validationBodySchema = z
  .object({
    type: z.string().optional(),
    message: z.string().optional(),
    error: z.unknown().optional(),
    node_errors: z.record(z.unknown()).optional(),
  })
  .passthrough();

type ValidationBody = z.infer<typeof validationBodySchema>;

const errorInfoSchema = z
  .object({
    message: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export interface JobSubmitterDependencies {
  readonly logger?: StructuredLogger | null;
}

function stringify(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Formats the per-node validation messages as `Node <id> (<errorType>): <message>`. */
export function formatNodeErrors(nodeErrors: Record<string, unknown>): string[] {
  const details: string[] = [];
  for (const [nodeId, nodeError] of Object.entries(nodeErrors)) {
    if (isPlainRecord(nodeError)) {
      for (const [errorType, message] of Object.entries(nodeError)) {
        details.push(`Node ${nodeId} (${errorType}): ${stringify(message)}`);
      }
    } else {
      details.push(`Node ${nodeId}: ${stringify(nodeError)}`);
    }
  }
  return details;
}

function topLevelMessage(body: ValidationBody): string {
  if (body.error === undefined) {
    return DEFAULT_VALIDATION_MESSAGE;
  }
  const info = errorInfoSchema.safeParse(body.error);
  if (!info.success || !isPlainRecord(body.error)) {
    return stringify(body.error);
  }
  if (info.data.type === OUTPUTS_FAILED_VALIDATION) {
    return DEFAULT_VALIDATION_MESSAGE;
  }
  return info.data.message ?? DEFAULT_VALIDATION_MESSAGE;
}

/**
 * Submits canonical graphs to the engine and turns validation rejections into
 * readable {@link GraphValidationError}s.
 */
export class JobSubmitter {
  private readonly logger: StructuredLogger | null;

  constructor(
    private readonly client: EngineClient,
    deps: JobSubmitterDependencies = {},
  ) {
    this.logger = deps.logger ?? null;
  }

  /**
   * Queues {@link graph} under {@link correlationId} and resolves with the
   * engine job id.
   *
   * @throws GraphValidationError when the engine answers `400`.
   * @throws TransportError for any other failure.
   */
  async submit(graph: JobGraph, correlationId: string): Promise<string> {
    this.logger?.info("job_submit_started", { client_id: correlationId, nodes: Object.keys(graph).length });
    const answer = await this.client.submitPrompt(graph, correlationId);

    if (answer.status === 400) {
      this.logger?.warn("job_submit_rejected", { status: 400, body: answer.text });
      throw await this.decodeValidationFailure(answer.text);
    }
    if (!answer.ok) {
      throw new TransportError(`Engine responded with HTTP ${answer.status} for /prompt`, {
        reason: "http",
        status: answer.status,
      });
    }

    const engineJobId = this.client.parsePromptId(answer);
    this.logger?.info("job_submitted", { client_id: correlationId, prompt_id: engineJobId });
    return engineJobId;
  }

  /** Best-effort decoding of a `400` body; never throws. */
  async decodeValidationFailure(text: string): Promise<GraphValidationError> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return new GraphValidationError(`Engine validation failed (could not parse error response): ${text}`);
    }
    const parsed = validationBodySchema.safeParse(raw);
    if (!parsed.success) {
      return new GraphValidationError(`Engine validation failed (could not parse error response): ${text}`);
    }

    const body = parsed.data;
    let message = topLevelMessage(body);
    const details = body.node_errors ? formatNodeErrors(body.node_errors) : [];

    if (body.type === OUTPUTS_FAILED_VALIDATION) {
      // The engine omits node details for this failure; point at the installed models instead.
      message = `${body.message ?? DEFAULT_VALIDATION_MESSAGE}${MODEL_HINT}`;
      const models = await this.availableCheckpoints();
      message += models.length > 0 ? `\nAvailable checkpoint models: ${models.join(", ")}` : `\n${NO_MODELS_HINT}`;
      return new GraphValidationError(message, { details });
    }

    if (details.length === 0) {
      return new GraphValidationError(`${message}. Raw response: ${text}`);
    }

    let detailed = `${message}:\n${details.map((detail) => `• ${detail}`).join("\n")}`;
    if (details.some((detail) => detail.includes("not in list") && detail.includes("ckpt_name"))) {
      const models = await this.availableCheckpoints();
      detailed += models.length > 0 ? `\n\nAvailable checkpoint models: ${models.join(", ")}` : `\n\n${NO_MODELS_HINT}`;
    }
    return new GraphValidationError(detailed, { details });
  }

  private async availableCheckpoints(): Promise<string[]> {
    try {
      return await this.client.listCheckpointModels();
    } catch (error) {
      this.logger?.warn("checkpoint_listing_failed", { error: describeError(error) });
      return [];
    }
  }
}
