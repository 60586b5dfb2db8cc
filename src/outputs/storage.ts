import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import { raceAbort } from "../engine/deadline.js";
import type { StructuredLogger } from "../logger.js";
import type { StorageConfig } from "../worker/config.js";
import { ArtifactPersistError, describeError } from "../worker/errors.js";

/** External upload collaborator: stores a local file, returns its public URL. */
export interface ArtifactUploader {
  upload(jobId: string, localPath: string): Promise<string>;
}

export interface HttpBucketUploaderDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger | null;
  readonly timeoutMs?: number;
}

const DEFAULT_UPLOAD_TIMEOUT_MS = 60_000;

/**
 * Uploads artifacts with a plain `PUT <endpoint>/<jobId>/<file>`, the
 * lowest common denominator of object stores and presigned gateways.
 */
export class HttpBucketUploader implements ArtifactUploader {
  private readonly endpoint: string;
  private readonly authToken: string | null;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: StructuredLogger | null;
  private readonly timeoutMs: number;

  constructor(endpoint: string, authToken: string | null, deps: HttpBucketUploaderDependencies = {}) {
    this.endpoint = endpoint.replace(/\/+$/, "");
    this.authToken = authToken;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.logger = deps.logger ?? null;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
  }

  async upload(jobId: string, localPath: string): Promise<string> {
    const target = `${this.endpoint}/${encodeURIComponent(jobId)}/${encodeURIComponent(basename(localPath))}`;
    const body = await readFile(localPath);
    const headers: Record<string, string> = { "content-type": "application/octet-stream" };
    if (this.authToken) {
      headers.authorization = `Bearer ${this.authToken}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let response: Response;
    try {
      response = await raceAbort(
        this.fetchImpl(target, { method: "PUT", headers, body, signal: controller.signal }),
        controller.signal,
      );
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs} ms` : describeError(error);
      throw new ArtifactPersistError(`Upload to ${target} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    await response.body?.cancel().catch(() => undefined);
    if (!response.ok) {
      throw new ArtifactPersistError(`Upload to ${target} failed with HTTP ${response.status}`);
    }
    this.logger?.debug("bucket_upload_completed", { url: target, bytes: body.byteLength });
    return target;
  }
}

/** Returns the uploader matching {@link config}, or `null` for inline persistence. */
export function createUploader(
  config: StorageConfig,
  deps: HttpBucketUploaderDependencies = {},
): ArtifactUploader | null {
  return config.endpoint ? new HttpBucketUploader(config.endpoint, config.authToken, deps) : null;
}

/**
 * Writes {@link bytes} to a fresh temporary directory, runs {@link fn} with the
 * file path and removes the directory on every exit path.
 */
export async function withTempFile<T>(
  bytes: Uint8Array,
  fileName: string,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  const directory = await mkdtemp(join(tmpdir(), "render-worker-"));
  try {
    const path = join(directory, basename(fileName));
    await writeFile(path, bytes);
    return await fn(path);
  } finally {
    await rm(directory, { recursive: true, force: true });
  }
}
