/**
 * Domain types shared by the canonicalizer, the engine client, the monitor and
 * the output collector. Field names mirror the engine wire format wherever a
 * value is sent or received verbatim (`class_type`, `prompt_id`, ...).
 */

/** JSON-compatible value accepted inside node inputs. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * Positional edge `[targetNodeId, outputSlotIndex]`. Engines accept numeric
 * ids as well, hence the union on the first slot.
 */
export type NodeReference = readonly [string | number, number];

/** Single operation of a job graph. Extra keys (`_meta`, ...) are preserved. */
export interface GraphNode {
  readonly class_type: string;
  readonly inputs: Readonly<Record<string, JsonValue>>;
  readonly [extra: string]: JsonValue | undefined;
}

/** Mapping from node id to node. Every reference should resolve inside it. */
export type JobGraph = Readonly<Record<string, GraphNode>>;

/** Identity of a submitted job, kept for the whole monitoring phase. */
export interface JobHandle {
  /** Client-chosen token scoping the streaming connection. */
  readonly correlationId: string;
  /** Identifier assigned by the engine on submission. */
  readonly engineJobId: string;
}

export const ARTIFACT_KINDS = ["image", "video"] as const;
export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

/** Output file recorded in the job manifest. */
export interface ArtifactRef {
  readonly filename: string;
  readonly subfolder: string;
  /** Storage type declared by the engine (`output`, `temp`, ...). */
  readonly type: string;
  readonly kind: ArtifactKind;
  readonly sourceNodeId: string;
}

export type OutputPersistence =
  | { readonly mode: "inline"; readonly base64: string }
  | { readonly mode: "external"; readonly url: string };

export interface CollectedOutput {
  readonly filename: string;
  readonly persistence: OutputPersistence;
}

export type TerminalState = "success" | "partial_failure" | "failure";

export interface JobResult {
  readonly engineJobId: string;
  readonly outputs: readonly CollectedOutput[];
  readonly errors: readonly string[];
  readonly terminalState: TerminalState;
}

/** Entry of the `images` array of the external result payload. */
export interface OutputPayloadEntry {
  readonly filename: string;
  readonly type: "s3_url" | "base64";
  readonly data: string;
}

export interface SuccessPayload {
  readonly images?: readonly OutputPayloadEntry[];
  readonly errors?: readonly string[];
  readonly status?: "success_no_files";
  readonly refresh_worker?: boolean;
}

export interface FailurePayload {
  readonly error: string;
  readonly details?: readonly string[];
  readonly refresh_worker?: boolean;
}

/** Payload handed back to the job harness. */
export type JobResultPayload = SuccessPayload | FailurePayload;

export function isFailurePayload(payload: JobResultPayload): payload is FailurePayload {
  return "error" in payload;
}
