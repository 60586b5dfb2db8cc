import { Buffer } from "node:buffer";
import { extname } from "node:path";

import type { ArtifactLocation, EngineClient, HistoryEntry, ManifestFile } from "../engine/client.js";
import { manifestFileSchema } from "../engine/client.js";
import type { StructuredLogger } from "../logger.js";
import { ManifestMissingError, describeError } from "../worker/errors.js";
import type {
  ArtifactKind,
  ArtifactRef,
  CollectedOutput,
  JobResult,
  OutputPersistence,
  TerminalState,
} from "../worker/types.js";
import { withTempFile, type ArtifactUploader } from "./storage.js";

/** Output field of a manifest node → artifact kind. */
const OUTPUT_FIELDS: Readonly<Record<string, ArtifactKind>> = {
  images: "image",
  gifs: "video",
};

const DEFAULT_EXTENSION: Readonly<Record<ArtifactKind, string>> = {
  image: ".png",
  video: ".mp4",
};

export interface OutputCollectorDependencies {
  readonly client: Pick<EngineClient, "getHistory" | "fetchArtifact">;
  /** `null` selects inline base64 persistence for the whole job. */
  readonly uploader: ArtifactUploader | null;
  readonly logger?: StructuredLogger | null;
  readonly encodeBase64?: (bytes: Uint8Array) => string;
}

export interface CollectOptions {
  /** Job identifier used to scope uploads. */
  readonly jobId: string;
  /** Diagnostics recorded before collection (execution errors, ...). */
  readonly priorErrors?: readonly string[];
}

/** Derives the terminal state from what was gathered. */
export function classifyResult(outputs: readonly unknown[], errors: readonly string[]): TerminalState {
  if (outputs.length === 0) {
    return "failure";
  }
  return errors.length === 0 ? "success" : "partial_failure";
}

function defaultBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

/**
 * Turns the history manifest of a finished job into persisted outputs.
 * Artifacts are handled one at a time in manifest order; a failing artifact
 * adds a diagnostic and never stops the batch.
 */
export class OutputCollector {
  private readonly client: Pick<EngineClient, "getHistory" | "fetchArtifact">;
  private readonly uploader: ArtifactUploader | null;
  private readonly logger: StructuredLogger | null;
  private readonly encodeBase64: (bytes: Uint8Array) => string;

  constructor(deps: OutputCollectorDependencies) {
    this.client = deps.client;
    this.uploader = deps.uploader;
    this.logger = deps.logger ?? null;
    this.encodeBase64 = deps.encodeBase64 ?? defaultBase64;
  }

  /**
   * @throws ManifestMissingError when the job is absent from the engine history.
   * @throws TransportError when the history itself cannot be fetched.
   */
  async collect(engineJobId: string, options: CollectOptions): Promise<JobResult> {
    const errors = [...(options.priorErrors ?? [])];
    const outputs: CollectedOutput[] = [];

    const history = await this.client.getHistory(engineJobId);
    const entry: HistoryEntry | undefined = history[engineJobId];
    if (!entry) {
      throw new ManifestMissingError(engineJobId);
    }

    const nodes = Object.entries(entry.outputs);
    if (nodes.length === 0) {
      const warning = `No outputs found in history for job ${engineJobId}.`;
      this.logger?.warn("job_outputs_empty", { prompt_id: engineJobId });
      if (errors.length === 0) {
        errors.push(warning);
      }
    }

    this.logger?.info("job_outputs_processing", { prompt_id: engineJobId, nodes: nodes.length, persistence: this.mode });
    for (const [nodeId, nodeOutput] of nodes) {
      for (const [field, value] of Object.entries(nodeOutput)) {
        const kind = OUTPUT_FIELDS[field];
        if (kind === undefined) {
          this.logger?.warn("unhandled_output_key", { node: nodeId, key: field });
          continue;
        }
        const entries = Array.isArray(value) ? value : [];
        for (const raw of entries) {
          const ref = this.toArtifactRef(nodeId, kind, raw, errors);
          if (!ref) {
            continue;
          }
          const output = await this.collectArtifact(ref, options.jobId, errors);
          if (output) {
            outputs.push(output);
          }
        }
      }
    }

    const terminalState = classifyResult(outputs, errors);
    this.logger?.info("job_outputs_collected", {
      prompt_id: engineJobId,
      outputs: outputs.length,
      errors: errors.length,
      terminal_state: terminalState,
    });
    return { engineJobId, outputs, errors, terminalState };
  }

  private get mode(): OutputPersistence["mode"] {
    return this.uploader ? "external" : "inline";
  }

  private toArtifactRef(nodeId: string, kind: ArtifactKind, raw: unknown, errors: string[]): ArtifactRef | null {
    const parsed = manifestFileSchema.safeParse(raw);
    const file: ManifestFile = parsed.success ? parsed.data : {};
    const type = file.type ?? "output";
    if (type === "temp") {
      this.logger?.debug("artifact_skipped_temp", { node: nodeId, filename: file.filename ?? null, kind });
      return null;
    }
    if (!file.filename) {
      const message = `Skipping ${kind} in node ${nodeId} due to missing filename: ${JSON.stringify(raw)}`;
      this.logger?.warn("artifact_missing_filename", { node: nodeId, kind });
      errors.push(message);
      return null;
    }
    return { filename: file.filename, subfolder: file.subfolder ?? "", type, kind, sourceNodeId: nodeId };
  }

  private async collectArtifact(ref: ArtifactRef, jobId: string, errors: string[]): Promise<CollectedOutput | null> {
    const location: ArtifactLocation = { filename: ref.filename, subfolder: ref.subfolder, type: ref.type };
    let bytes: Uint8Array;
    try {
      bytes = await this.client.fetchArtifact(location, ref.kind);
    } catch (error) {
      this.logger?.warn("artifact_fetch_failed", { filename: ref.filename, kind: ref.kind, error: describeError(error) });
      bytes = new Uint8Array(0);
    }
    if (bytes.byteLength === 0) {
      errors.push(`Failed to fetch ${ref.kind} data for ${ref.filename} from /view endpoint.`);
      return null;
    }

    if (this.uploader) {
      const uploader = this.uploader;
      const fileName = extname(ref.filename) ? ref.filename : `${ref.filename}${DEFAULT_EXTENSION[ref.kind]}`;
      try {
        const url = await withTempFile(bytes, fileName, (path) => uploader.upload(jobId, path));
        this.logger?.info("artifact_uploaded", { filename: ref.filename, url });
        return { filename: ref.filename, persistence: { mode: "external", url } };
      } catch (error) {
        const message = `Error uploading ${ref.filename} to storage: ${describeError(error)}`;
        this.logger?.warn("artifact_upload_failed", { filename: ref.filename, error: describeError(error) });
        errors.push(message);
        return null;
      }
    }

    try {
      const base64 = this.encodeBase64(bytes);
      this.logger?.debug("artifact_encoded", { filename: ref.filename, bytes: bytes.byteLength });
      return { filename: ref.filename, persistence: { mode: "inline", base64 } };
    } catch (error) {
      errors.push(`Error encoding ${ref.filename} to base64: ${describeError(error)}`);
      return null;
    }
  }
}
