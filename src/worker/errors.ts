/**
 * Error taxonomy of the worker. Each category carries a stable code and
 * whether it aborts the job. Non-fatal categories only ever surface as
 * diagnostic strings in the `errors` list of a {@link JobResult}.
 */
export const WORKER_ERROR_TAXONOMY = {
  INPUT_VALIDATION: { code: "E-INPUT-INVALID", fatal: true, message: "Invalid job input" },
  ENGINE_UNREACHABLE: { code: "E-ENGINE-UNREACHABLE", fatal: true, message: "Engine is not reachable" },
  GRAPH_VALIDATION: { code: "E-GRAPH-VALIDATION", fatal: true, message: "Workflow validation failed" },
  TRANSPORT: { code: "E-ENGINE-TRANSPORT", fatal: true, message: "Engine request failed" },
  STREAM_DISCONNECTED: { code: "E-STREAM-DISCONNECTED", fatal: true, message: "Streaming connection lost" },
  MANIFEST_MISSING: { code: "E-MANIFEST-MISSING", fatal: true, message: "Job missing from history" },
  ARTIFACT_FETCH: { code: "E-ARTIFACT-FETCH", fatal: false, message: "Artifact download failed" },
  ARTIFACT_PERSIST: { code: "E-ARTIFACT-PERSIST", fatal: false, message: "Artifact persistence failed" },
} as const;

export type WorkerErrorCategory = keyof typeof WORKER_ERROR_TAXONOMY;

export interface WorkerErrorOptions {
  readonly details?: readonly string[];
  readonly cause?: unknown;
}

export class WorkerError extends Error {
  readonly category: WorkerErrorCategory;
  readonly code: string;
  readonly fatal: boolean;
  readonly details: readonly string[];

  constructor(category: WorkerErrorCategory, message?: string, options: WorkerErrorOptions = {}) {
    const taxonomy = WORKER_ERROR_TAXONOMY[category];
    super(message ?? taxonomy.message, { cause: options.cause });
    this.name = new.target.name;
    this.category = category;
    this.code = taxonomy.code;
    this.fatal = taxonomy.fatal;
    this.details = options.details ?? [];
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InputValidationError extends WorkerError {
  constructor(message: string, options: WorkerErrorOptions = {}) {
    super("INPUT_VALIDATION", message, options);
  }
}

export class EngineUnreachableError extends WorkerError {
  constructor(message?: string, options: WorkerErrorOptions = {}) {
    super("ENGINE_UNREACHABLE", message, options);
  }
}

/** Raised when the engine rejects the submitted graph (HTTP 400). */
export class GraphValidationError extends WorkerError {
  constructor(message: string, options: WorkerErrorOptions = {}) {
    super("GRAPH_VALIDATION", message, options);
  }
}

export type TransportFailureReason = "http" | "network" | "timeout" | "schema";

export interface TransportErrorOptions extends WorkerErrorOptions {
  readonly reason: TransportFailureReason;
  readonly status?: number | null;
}

/** HTTP call failure other than a graph validation rejection. */
export class TransportError extends WorkerError {
  readonly reason: TransportFailureReason;
  readonly status: number | null;

  constructor(message: string, options: TransportErrorOptions) {
    super("TRANSPORT", message, options);
    this.reason = options.reason;
    this.status = options.status ?? null;
  }
}

export class StreamDisconnectedError extends WorkerError {
  constructor(message?: string, options: WorkerErrorOptions = {}) {
    super("STREAM_DISCONNECTED", message, options);
  }
}

export class ManifestMissingError extends WorkerError {
  readonly engineJobId: string;

  constructor(engineJobId: string) {
    super("MANIFEST_MISSING", `Job ${engineJobId} not found in history after execution.`);
    this.engineJobId = engineJobId;
  }
}

/** Per-artifact download failure; recorded, never aborts the batch. */
export class ArtifactFetchError extends WorkerError {
  constructor(message: string, options: WorkerErrorOptions = {}) {
    super("ARTIFACT_FETCH", message, options);
  }
}

/** Per-artifact upload or encoding failure; recorded, never aborts the batch. */
export class ArtifactPersistError extends WorkerError {
  constructor(message: string, options: WorkerErrorOptions = {}) {
    super("ARTIFACT_PERSIST", message, options);
  }
}

/** Renders any thrown value as a single line suitable for diagnostics. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
