import type { GraphNode, JobGraph, JsonValue, NodeReference } from "../worker/types.js";

/**
 * Fixed ids for the operation types anchoring heavyweight, reusable resources
 * (model loaders, encoders, samplers). The engine keys its resource cache on
 * node ids, so pinning these ids keeps loaded models warm across jobs.
 */
export const STANDARD_NODE_IDS: Readonly<Record<string, string>> = {
  "LoadDiffusionModelShared //Inspire": "model_loader_1",
  CLIPLoader: "clip_loader_1",
  VAELoader: "vae_loader_1",
  CLIPVisionLoader: "clip_vision_loader_1",
  WanImageToVideo: "wan_i2v_1",
  LoadImage: "load_image_1",
  CLIPVisionEncode: "clip_vision_encode_1",
  ModelSamplingSD3: "model_sampling_1",
  KSampler: "ksampler_1",
  VAEDecode: "vae_decode_1",
  CLIPTextEncode: "clip_text_encode",
  SaveAnimatedWEBP: "save_webp_1",
  VHS_VideoCombine: "vhs_videocombine_1",
};

/**
 * Structural reference check: any two-element array whose second slot is a
 * number. A literal pair such as `[512, 512]` also matches; references are
 * only rewritten when the first slot names a node of the graph.
 */
export function isNodeReference(value: JsonValue | undefined): value is NodeReference {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    (typeof value[0] === "string" || typeof value[0] === "number") &&
    typeof value[1] === "number"
  );
}

/**
 * Builds the old-id → new-id table. Names depend only on the sequence of node
 * types, never on the incoming ids, which makes the pass idempotent.
 */
export function buildCanonicalNameTable(graph: JobGraph): Map<string, string> {
  const table = new Map<string, string>();
  const used = new Set<string>();
  const typeCounters = new Map<string, number>();

  const claim = (candidate: string): string => {
    used.add(candidate);
    return candidate;
  };

  for (const [oldId, node] of Object.entries(graph)) {
    const classType = node.class_type ?? "";
    const fixed = STANDARD_NODE_IDS[classType];

    if (fixed !== undefined) {
      if (!used.has(fixed)) {
        table.set(oldId, claim(fixed));
        continue;
      }
      let suffix = 2;
      while (used.has(`${fixed}_${suffix}`)) {
        suffix += 1;
      }
      table.set(oldId, claim(`${fixed}_${suffix}`));
      continue;
    }

    const base = classType.toLowerCase().replace(/ /g, "_");
    let ordinal = (typeCounters.get(classType) ?? 0) + 1;
    while (used.has(`${base}_${ordinal}`)) {
      ordinal += 1;
    }
    typeCounters.set(classType, ordinal);
    table.set(oldId, claim(`${base}_${ordinal}`));
  }

  return table;
}

function rewriteInputs(
  inputs: Readonly<Record<string, JsonValue>>,
  table: ReadonlyMap<string, string>,
): Record<string, JsonValue> {
  const rewritten: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(inputs)) {
    if (isNodeReference(value)) {
      const target = table.get(String(value[0]));
      // Dangling or foreign references pass through untouched.
      rewritten[key] = target !== undefined ? [target, value[1]] : structuredClone(value);
      continue;
    }
    rewritten[key] = structuredClone(value);
  }
  return rewritten;
}

/**
 * Renames every node of {@link graph} to a stable, content-derived id and
 * rewrites references in lock-step. The input graph is left untouched.
 */
export function canonicalizeGraph(graph: JobGraph): JobGraph {
  const table = buildCanonicalNameTable(graph);
  const canonical: Record<string, GraphNode> = {};

  for (const [oldId, node] of Object.entries(graph)) {
    const newId = table.get(oldId) ?? oldId;
    const copy: GraphNode = {
      ...structuredClone(node),
      inputs: rewriteInputs(node.inputs ?? {}, table),
    };
    canonical[newId] = copy;
  }

  return canonical;
}
