import fs from "node:fs/promises";
import path from "node:path";

import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildApp } from "../src/app.js";
import type { PipelineConfig } from "../src/config/pipeline.js";
import { AuthExhaustedError } from "../src/lib/errors.js";
import type { SpeechPipeline } from "../src/services/audio-pipeline.js";
import { ProvenanceLog } from "../src/services/provenance-log.js";
import type { PipelineRunSummary, SpeechRequest } from "../src/types/audio.js";
import { buildTestConfig, makeTempDir, removeDir } from "./helpers.js";

const API_KEY = "test-key";
const authorized = { "x-api-key": API_KEY };

function stubPipeline() {
  const run = vi.fn(
    async (_requests: readonly SpeechRequest[]): Promise<PipelineRunSummary> => ({
      artifacts: [],
      failures: [],
    }),
  );
  const pipeline: SpeechPipeline = {
    run,
    processRequest: vi.fn(async () => {
      throw new Error("not used by the routes");
    }),
  };
  return { pipeline, run };
}

describe("audio routes", () => {
  let outputDir: string;
  let config: PipelineConfig;
  let app: FastifyInstance;
  let run: ReturnType<typeof stubPipeline>["run"];

  beforeEach(async () => {
    outputDir = await makeTempDir();
    config = buildTestConfig(outputDir);
    const stub = stubPipeline();
    run = stub.run;
    app = await buildApp({ config, pipeline: stub.pipeline, serverApiKey: API_KEY });
  });

  afterEach(async () => {
    await app.close();
    await removeDir(outputDir);
  });

  it("rejects requests without an API key", async () => {
    const response = await app.inject({ method: "POST", url: "/audio/requests", payload: {} });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ message: "Missing API key" });
    expect(run).not.toHaveBeenCalled();
  });

  it("rejects requests with the wrong API key", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/audio/provenance",
      headers: { "x-api-key": "other-key" },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ message: "Invalid API key" });
  });

  it("rejects an empty request list", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/audio/requests",
      headers: authorized,
      payload: { requests: [] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      message: "requests Array must contain at least 1 element(s)",
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("runs the pipeline and returns its summary", async () => {
    const summary: PipelineRunSummary = {
      artifacts: [
        {
          path: path.join(outputDir, "abc_Joanna.mp3"),
          requestId: 1,
          speaker: "Joanna",
          chunkCount: 1,
          byteLength: 5,
        },
      ],
      failures: [{ requestId: 2, code: "TRANSPORT", message: "Polly synthesis failed (Error): down" }],
    };
    run.mockResolvedValueOnce(summary);

    const response = await app.inject({
      method: "POST",
      url: "/audio/requests",
      headers: authorized,
      payload: {
        requests: [
          { id: 1, speaker: " Joanna ", text: "Hello." },
          { id: 2, speaker: "Matthew", text: "Bye." },
        ],
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(summary);
    expect(run).toHaveBeenCalledWith([
      { id: 1, speaker: "Joanna", text: "Hello." },
      { id: 2, speaker: "Matthew", text: "Bye." },
    ]);
  });

  it("maps an authentication failure to 502", async () => {
    run.mockRejectedValueOnce(new AuthExhaustedError(2));

    const response = await app.inject({
      method: "POST",
      url: "/audio/requests",
      headers: authorized,
      payload: { requests: [{ id: 1, speaker: "Joanna", text: "Hello." }] },
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      code: "AUTH_EXHAUSTED",
      message: "Unable to authenticate after 2 attempt(s)",
    });
  });

  it("lists provenance records", async () => {
    const artifactPath = path.join(outputDir, "abc_Joanna.mp3");
    await new ProvenanceLog(config.provenancePath).append(artifactPath, "Hello, world.");

    const response = await app.inject({
      method: "GET",
      url: "/audio/provenance",
      headers: authorized,
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      records: [{ filename: artifactPath, text: "Hello, world." }],
    });
  });

  it("streams an artifact with its content type", async () => {
    await fs.writeFile(path.join(outputDir, "abc_Joanna.mp3"), "audio-bytes");

    const response = await app.inject({
      method: "GET",
      url: "/audio/files/abc_Joanna.mp3",
      headers: authorized,
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toBe("audio/mpeg");
    expect(response.body).toBe("audio-bytes");
  });

  it("refuses hidden files", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/audio/files/.env",
      headers: authorized,
    });

    expect(response.statusCode).toBe(400);
  });

  it("returns 404 for an unknown artifact", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/audio/files/missing_Joanna.mp3",
      headers: authorized,
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "Audio file not found" });
  });
});
