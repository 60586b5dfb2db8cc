import { describe, it } from "mocha";
import { expect } from "chai";

import {
  STANDARD_NODE_IDS,
  buildCanonicalNameTable,
  canonicalizeGraph,
  isNodeReference,
} from "../../../src/graph/canonicalize.js";
import type { JobGraph, JsonValue } from "../../../src/worker/types.js";

function collectReferences(graph: JobGraph): Array<readonly [string, JsonValue]> {
  const references: Array<readonly [string, JsonValue]> = [];
  for (const [id, node] of Object.entries(graph)) {
    for (const value of Object.values(node.inputs)) {
      if (isNodeReference(value)) {
        references.push([id, value[0]]);
      }
    }
  }
  return references;
}

const threeNodeGraph: JobGraph = {
  "4": { class_type: "CLIPLoader", inputs: { clip_name: "clip_l.safetensors", type: "sd3" } },
  "7": { class_type: "KSampler", inputs: { seed: 42, steps: 20, positive: ["4", 0], denoise: 1 } },
  "9": { class_type: "VAEDecode", inputs: { samples: ["7", 0], vae: ["4", 2] }, _meta: { title: "Decode" } },
};

const txt2imgGraph: JobGraph = {
  "3": {
    class_type: "KSampler",
    inputs: { model: ["4", 0], positive: ["6", 0], negative: ["7", 0], latent_image: ["5", 0], seed: 7 },
  },
  "4": { class_type: "CheckpointLoaderSimple", inputs: { ckpt_name: "base.safetensors" } },
  "5": { class_type: "EmptyLatentImage", inputs: { width: 512, height: 512, batch_size: 1 } },
  "6": { class_type: "CLIPTextEncode", inputs: { text: "a lighthouse", clip: ["4", 1] } },
  "7": { class_type: "CLIPTextEncode", inputs: { text: "blurry", clip: ["4", 1] } },
  "8": { class_type: "VAEDecode", inputs: { samples: ["3", 0], vae: ["4", 2] } },
  "9": { class_type: "SaveImage", inputs: { filename_prefix: "out", images: ["8", 0] } },
};

describe("graph/canonicalize", () => {
  it("renames the loader, sampler and decoder to their fixed ids and rewrites references", () => {
    const canonical = canonicalizeGraph(threeNodeGraph);

    expect(Object.keys(canonical)).to.deep.equal(["clip_loader_1", "ksampler_1", "vae_decode_1"]);
    expect(canonical["ksampler_1"]?.inputs).to.deep.equal({
      seed: 42,
      steps: 20,
      positive: ["clip_loader_1", 0],
      denoise: 1,
    });
    expect(canonical["vae_decode_1"]?.inputs).to.deep.equal({
      samples: ["ksampler_1", 0],
      vae: ["clip_loader_1", 2],
    });
    expect(canonical["vae_decode_1"]?._meta).to.deep.equal({ title: "Decode" });
  });

  it("synthesizes type_ordinal ids for operation types outside the fixed table", () => {
    const table = buildCanonicalNameTable(txt2imgGraph);

    expect(Object.fromEntries(table)).to.deep.equal({
      "3": "ksampler_1",
      "4": "checkpointloadersimple_1",
      "5": "emptylatentimage_1",
      "6": "clip_text_encode",
      "7": "clip_text_encode_2",
      "8": "vae_decode_1",
      "9": "saveimage_1",
    });
  });

  it("lower-cases type names and replaces spaces with underscores", () => {
    const table = buildCanonicalNameTable({
      a: { class_type: "Image Blend", inputs: {} },
      b: { class_type: "Image Blend", inputs: {} },
    });

    expect([...table.values()]).to.deep.equal(["image_blend_1", "image_blend_2"]);
  });

  it("keeps names unique when a synthesized name collides with an earlier one", () => {
    const table = buildCanonicalNameTable({
      a: { class_type: "Upscale_1", inputs: {} },
      b: { class_type: "Upscale", inputs: {} },
      c: { class_type: "Upscale", inputs: {} },
    });

    // "Upscale_1" claims "upscale_1_1"; "Upscale" counts independently.
    expect([...table.values()]).to.deep.equal(["upscale_1_1", "upscale_1", "upscale_2"]);

    const clash = buildCanonicalNameTable({
      a: { class_type: "Foo", inputs: {} },
      b: { class_type: "Foo_1", inputs: {} },
      c: { class_type: "foo", inputs: {} },
    });
    expect([...clash.values()]).to.deep.equal(["foo_1", "foo_1_1", "foo_2"]);
  });

  it("is idempotent and deterministic", () => {
    for (const graph of [threeNodeGraph, txt2imgGraph]) {
      const once = canonicalizeGraph(graph);
      const twice = canonicalizeGraph(once);

      expect(JSON.stringify(twice)).to.equal(JSON.stringify(once));
      expect(JSON.stringify(canonicalizeGraph(graph))).to.equal(JSON.stringify(once));
    }
  });

  it("preserves node count, field content and reference closure", () => {
    const canonical = canonicalizeGraph(txt2imgGraph);
    const table = buildCanonicalNameTable(txt2imgGraph);

    expect(Object.keys(canonical)).to.have.lengthOf(Object.keys(txt2imgGraph).length);
    for (const [oldId, node] of Object.entries(txt2imgGraph)) {
      const renamed = canonical[table.get(oldId) ?? ""];
      expect(renamed?.class_type).to.equal(node.class_type);
      expect(Object.keys(renamed?.inputs ?? {})).to.deep.equal(Object.keys(node.inputs));
    }
    for (const [, target] of collectReferences(canonical)) {
      expect(canonical).to.have.property(String(target));
    }
    expect(canonical["emptylatentimage_1"]?.inputs).to.deep.equal({ width: 512, height: 512, batch_size: 1 });
  });

  it("passes dangling references and literal pairs through untouched", () => {
    const canonical = canonicalizeGraph({
      "1": {
        class_type: "LatentUpscale",
        inputs: { samples: ["99", 0], size: [768, 768], crop: "disabled" },
      },
    });

    expect(canonical).to.deep.equal({
      latentupscale_1: {
        class_type: "LatentUpscale",
        inputs: { samples: ["99", 0], size: [768, 768], crop: "disabled" },
      },
    });
  });

  it("rewrites references whose id is numeric", () => {
    const canonical = canonicalizeGraph({
      "1": { class_type: "LoadImage", inputs: { image: "input.png" } },
      "2": { class_type: "CLIPVisionEncode", inputs: { image: [1, 0] } },
    });

    expect(canonical["clip_vision_encode_1"]?.inputs).to.deep.equal({ image: ["load_image_1", 0] });
  });

  it("never mutates the caller's graph", () => {
    const snapshot = structuredClone(txt2imgGraph);
    canonicalizeGraph(txt2imgGraph);
    expect(txt2imgGraph).to.deep.equal(snapshot);
  });

  it("treats only [id, slot] pairs with a numeric slot as references", () => {
    expect(isNodeReference(["4", 0])).to.equal(true);
    expect(isNodeReference([4, 1])).to.equal(true);
    expect(isNodeReference(["4", "0"])).to.equal(false);
    expect(isNodeReference(["4", 0, 1])).to.equal(false);
    expect(isNodeReference("4")).to.equal(false);
    expect(isNodeReference(undefined)).to.equal(false);
  });

  it("pins every fixed-table entry to its id", () => {
    for (const [classType, id] of Object.entries(STANDARD_NODE_IDS)) {
      const table = buildCanonicalNameTable({ n: { class_type: classType, inputs: {} } });
      expect(table.get("n")).to.equal(id);
    }
  });
});
