import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { EngineClient } from "../../../src/engine/client.js";
import { ArtifactFetchError, TransportError } from "../../../src/worker/errors.js";
import { createBytesResponse, createEngineFetch, createJsonResponse, type FetchRoute } from "../../helpers/fetch.js";
import { expectRejection } from "../../helpers/assertions.js";
import { createTestConfig } from "../../helpers/config.js";

const config = createTestConfig().engine;

/** Answers with headers and one chunk, then never finishes the body. */
const stalledBody: FetchRoute = () =>
  new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new Uint8Array([1]));
      },
    }),
    { status: 200 },
  );

/** Never answers at all. */
const silent: FetchRoute = () => new Promise<Response>(() => undefined);

describe("engine/client", () => {
  it("posts the graph and correlation token to /prompt", async () => {
    const stub = createEngineFetch({ "POST /prompt": () => createJsonResponse({ prompt_id: "abc123", number: 1 }) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });
    const graph = { ksampler_1: { class_type: "KSampler", inputs: { seed: 1 } } };

    const answer = await client.submitPrompt(graph, "test-client");

    expect(client.parsePromptId(answer)).to.equal("abc123");
    const [request] = stub.calls("POST /prompt");
    expect(request?.url.href).to.equal("http://engine.test:8188/prompt");
    expect(JSON.parse(String(request?.init?.body))).to.deep.equal({ prompt: graph, client_id: "test-client" });
  });

  it("rejects a queue answer without prompt_id as a schema failure", async () => {
    const stub = createEngineFetch({ "POST /prompt": () => createJsonResponse({ number: 3 }) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    const answer = await client.submitPrompt({}, "test-client");

    expect(answer).to.deep.equal({ status: 200, ok: true, text: `{"number":3}` });
    expect(() => client.parsePromptId(answer))
      .to.throw(TransportError, `Missing 'prompt_id' in queue response: {"number":3}`)
      .with.property("reason", "schema");
  });

  it("reads the history manifest of one job", async () => {
    const stub = createEngineFetch({
      "GET /history/abc123": () =>
        createJsonResponse({
          abc123: { outputs: { "9": { images: [{ filename: "a.png", subfolder: "", type: "output" }] } }, status: {} },
        }),
    });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    const history = await client.getHistory("abc123");

    expect(history["abc123"]?.outputs).to.deep.equal({
      "9": { images: [{ filename: "a.png", subfolder: "", type: "output" }] },
    });
  });

  it("maps non-success answers to http transport errors", async () => {
    const stub = createEngineFetch({ "GET /history/abc123": () => new Response("boom", { status: 500 }) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    const error = await expectRejection(client.getHistory("abc123"), TransportError);

    expect(error.reason).to.equal("http");
    expect(error.status).to.equal(500);
    expect(error.code).to.equal("E-ENGINE-TRANSPORT");
  });

  it("maps network failures to network transport errors", async () => {
    const stub = createEngineFetch({
      "GET /system_stats": () => {
        throw new TypeError("fetch failed");
      },
    });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    const error = await expectRejection(client.getSystemStats(), TransportError);

    expect(error.reason).to.equal("network");
    expect(error.message).to.equal("Engine request /system_stats failed: fetch failed");
  });

  it("downloads artifacts through /view with the location as query", async () => {
    const stub = createEngineFetch({ "GET /view": () => createBytesResponse(new Uint8Array([1, 2, 3])) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    const bytes = await client.fetchArtifact({ filename: "clip 1.mp4", subfolder: "video", type: "output" }, "video");

    expect([...bytes]).to.deep.equal([1, 2, 3]);
    const [request] = stub.calls("GET /view");
    expect(request?.url.search).to.equal("?filename=clip+1.mp4&subfolder=video&type=output");
  });

  it("wraps artifact download failures in ArtifactFetchError", async () => {
    const stub = createEngineFetch({ "GET /view": () => new Response("missing", { status: 404 }) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    const error = await expectRejection(
      client.fetchArtifact({ filename: "a.png", subfolder: "", type: "output" }, "image"),
      ArtifactFetchError,
    );

    expect(error.fatal).to.equal(false);
    expect(error.message).to.equal("Failed to fetch image data for a.png: Engine responded with HTTP 404 for /view?filename=a.png&subfolder=&type=output");
  });

  it("lists checkpoint names from the CheckpointLoaderSimple options", async () => {
    const stub = createEngineFetch({
      "GET /object_info": () =>
        createJsonResponse({
          CheckpointLoaderSimple: { input: { required: { ckpt_name: [["base.safetensors", "refiner.safetensors"], {}] } } },
          KSampler: { input: { required: {} } },
        }),
    });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    expect(await client.listCheckpointModels()).to.deep.equal(["base.safetensors", "refiner.safetensors"]);
  });

  it("returns no checkpoints when the loader is not installed", async () => {
    const stub = createEngineFetch({ "GET /object_info": () => createJsonResponse({ KSampler: {} }) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    expect(await client.listCheckpointModels()).to.deep.equal([]);
  });

  it("uploads input images as multipart form data", async () => {
    const stub = createEngineFetch({ "POST /upload/image": () => createJsonResponse({ name: "ref.png" }) });
    const client = new EngineClient(config, { fetchImpl: stub.fetchImpl });

    await client.uploadImage("ref.png", Buffer.from([137, 80, 78, 71]));

    const [request] = stub.calls("POST /upload/image");
    const body = request?.init?.body;
    expect(body).to.be.instanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get("overwrite")).to.equal("true");
      const image = body.get("image");
      expect(image).to.be.instanceOf(Blob);
      expect(typeof image === "string" ? image : image?.name).to.equal("ref.png");
    }
  });

  describe("deadlines", () => {
    let clock: sinon.SinonFakeTimers;

    beforeEach(() => {
      clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    });

    afterEach(() => {
      clock.restore();
    });

    it("times out a request whose headers never arrive", async () => {
      const client = new EngineClient(config, { fetchImpl: createEngineFetch({ "GET /history/abc123": silent }).fetchImpl });

      const failure = expectRejection(client.getHistory("abc123"), TransportError);
      await clock.tickAsync(config.timeouts.historyMs);
      const error = await failure;

      expect(error.reason).to.equal("timeout");
      expect(error.message).to.equal("Engine request /history/abc123 timed out after 1000 ms");
    });

    it("keeps the deadline running while the body is read", async () => {
      const client = new EngineClient(config, { fetchImpl: createEngineFetch({ "POST /prompt": stalledBody }).fetchImpl });

      const failure = expectRejection(client.submitPrompt({}, "test-client"), TransportError);
      await clock.tickAsync(config.timeouts.submitMs);
      const error = await failure;

      expect(error.reason).to.equal("timeout");
      expect(error.message).to.equal("Engine request /prompt timed out after 1000 ms");
    });

    it("gives video downloads the longer deadline and reports a stalled body per artifact", async () => {
      const client = new EngineClient(config, { fetchImpl: createEngineFetch({ "GET /view": stalledBody }).fetchImpl });
      let settled = false;

      const download = client.fetchArtifact({ filename: "clip.mp4", subfolder: "", type: "output" }, "video");
      const failure = expectRejection(
        download.finally(() => {
          settled = true;
        }),
        ArtifactFetchError,
      );
      await clock.tickAsync(config.timeouts.imageMs);
      expect(settled).to.equal(false);
      await clock.tickAsync(config.timeouts.videoMs - config.timeouts.imageMs);
      const error = await failure;

      expect(error.fatal).to.equal(false);
      expect(error.message).to.equal(
        "Failed to fetch video data for clip.mp4: " +
          "Engine request /view?filename=clip.mp4&subfolder=&type=output timed out after 2000 ms",
      );
      expect(error.cause).to.be.instanceOf(TransportError).with.property("reason", "timeout");
    });

    it("applies the image deadline to image downloads", async () => {
      const client = new EngineClient(config, { fetchImpl: createEngineFetch({ "GET /view": stalledBody }).fetchImpl });

      const failure = expectRejection(
        client.fetchArtifact({ filename: "a.png", subfolder: "", type: "output" }, "image"),
        ArtifactFetchError,
      );
      await clock.tickAsync(config.timeouts.imageMs);
      const error = await failure;

      expect(error.message).to.equal(
        "Failed to fetch image data for a.png: " +
          "Engine request /view?filename=a.png&subfolder=&type=output timed out after 1000 ms",
      );
    });
  });
});
