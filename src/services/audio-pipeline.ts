/**
 * - AudioPipeline.run: exported entry that acquires the session once, then calls processRequest per request.
 * - processRequest: chunks the text, synthesizes every chunk into a scoped ChunkAssembler, assembles the
 *   artifact and appends its provenance record; the artifact is removed again if that append fails.
 *   - synthesizeChunk: one synthesis call, refreshed and retried once when the session's credentials expire.
 * - Failures local to a request are logged and collected; configuration and authentication failures end the run.
 */
import fs from "node:fs/promises";
import path from "node:path";

import { nanoid } from "nanoid";

import { log } from "../logger.js";
import type { PipelineConfig } from "../config/pipeline.js";
import { forEachWithConcurrency } from "../lib/concurrency.js";
import {
  CredentialExpiredError,
  InvalidRequestError,
  describeError,
  isRunFatal,
} from "../lib/errors.js";
import type {
  AudioArtifact,
  BackendSession,
  Chunk,
  PipelineRunSummary,
  SpeechRequest,
} from "../types/audio.js";
import { SessionHandle, type Authenticator } from "./authenticator.js";
import { withChunkAssembler } from "./chunk-assembler.js";
import type { ProvenanceLog } from "./provenance-log.js";
import { buildArtifactFilename, chunkText, type SynthesisClient } from "./tts/index.js";

const ARTIFACT_ID_LENGTH = 12;

export type AudioPipelineOptions<S extends BackendSession> = {
  config: PipelineConfig;
  authenticator: Authenticator<S>;
  client: SynthesisClient<S>;
  provenance: ProvenanceLog;
  generateId?: () => string;
};

/** Backend-independent view of a pipeline, as handed to the CLI and HTTP routes. */
export interface SpeechPipeline {
  run(requests: readonly SpeechRequest[]): Promise<PipelineRunSummary>;
  processRequest(request: SpeechRequest): Promise<AudioArtifact>;
}

export class AudioPipeline<S extends BackendSession> implements SpeechPipeline {
  private readonly config: PipelineConfig;
  private readonly client: SynthesisClient<S>;
  private readonly provenance: ProvenanceLog;
  private readonly sessions: SessionHandle<S>;
  private readonly generateId: () => string;

  constructor(options: AudioPipelineOptions<S>) {
    this.config = options.config;
    this.client = options.client;
    this.provenance = options.provenance;
    this.sessions = new SessionHandle(options.authenticator);
    this.generateId = options.generateId ?? (() => nanoid(ARTIFACT_ID_LENGTH));
  }

  /** Processes requests in order; throws only for failures that end the whole run. */
  async run(requests: readonly SpeechRequest[]): Promise<PipelineRunSummary> {
    await this.sessions.current();

    const summary: PipelineRunSummary = { artifacts: [], failures: [] };

    for (const request of requests) {
      log.info({ requestId: request.id, speaker: request.speaker }, "Processing request");
      try {
        const artifact = await this.processRequest(request);
        summary.artifacts.push(artifact);
      } catch (error) {
        if (isRunFatal(error)) {
          log.error({ err: error, requestId: request.id }, "Aborting run");
          throw error;
        }
        log.error({ err: error, requestId: request.id }, "Failed to process request");
        summary.failures.push({ requestId: request.id, ...describeError(error) });
      }
    }

    log.info(
      { succeeded: summary.artifacts.length, failed: summary.failures.length },
      "Run complete",
    );
    return summary;
  }

  /** Produces one audio artifact for the request and records its provenance. */
  async processRequest(request: SpeechRequest): Promise<AudioArtifact> {
    const chunks: Chunk[] = chunkText(request.text, this.config.maxChunkLength).map(
      (text, index) => ({ index, text }),
    );
    if (chunks.length === 0) {
      throw new InvalidRequestError(`Request ${request.id} has no text to synthesize`);
    }

    const outputPath = path.join(
      this.config.outputDir,
      buildArtifactFilename({
        uniqueId: this.generateId(),
        speaker: request.speaker,
        format: this.config.audio.format,
      }),
    );

    log.debug({ requestId: request.id, chunkCount: chunks.length }, "Text chunked");

    const assembled = await withChunkAssembler(
      path.join(this.config.outputDir, "tmp"),
      async (assembler) => {
        await forEachWithConcurrency(chunks, this.config.concurrency, async (chunk) => {
          const bytes = await this.synthesizeChunk(request, chunk);
          await assembler.writeChunk(chunk.index, bytes);
        });
        return assembler.assemble(outputPath, chunks.length);
      },
    );

    try {
      await this.provenance.append(assembled.path, request.text);
    } catch (error) {
      // An artifact without a provenance row is not kept.
      await fs.rm(assembled.path, { force: true }).catch((removeError: unknown) => {
        log.warn({ err: removeError, path: assembled.path }, "Failed to remove unrecorded artifact");
      });
      throw error;
    }
    log.info(
      { requestId: request.id, path: assembled.path, byteLength: assembled.byteLength },
      "Audio saved",
    );

    return {
      path: assembled.path,
      requestId: request.id,
      speaker: request.speaker,
      chunkCount: assembled.chunkCount,
      byteLength: assembled.byteLength,
    };
  }

  private async synthesizeChunk(request: SpeechRequest, chunk: Chunk): Promise<Buffer> {
    const input = {
      text: chunk.text,
      voice: request.speaker,
      format: this.config.audio.format,
      languageCode: this.config.audio.languageCode,
    };
    const session = await this.sessions.current();

    try {
      return await this.client.synthesize(session, input);
    } catch (error) {
      if (!(error instanceof CredentialExpiredError)) {
        log.error(
          { err: error, requestId: request.id, chunkIndex: chunk.index, backend: this.client.name },
          "Chunk synthesis failed",
        );
        throw error;
      }

      log.warn(
        { requestId: request.id, chunkIndex: chunk.index },
        "Session expired during synthesis, refreshing",
      );
      const renewed = await this.sessions.renew(session);
      try {
        return await this.client.synthesize(renewed, input);
      } catch (retryError) {
        log.error(
          { err: retryError, requestId: request.id, chunkIndex: chunk.index, backend: this.client.name },
          "Chunk synthesis failed after session refresh",
        );
        throw retryError;
      }
    }
  }
}
