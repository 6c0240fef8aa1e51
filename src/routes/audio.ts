import type { FastifyInstance } from "fastify";
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { PipelineConfig } from "../config/pipeline.js";
import { AuthExhaustedError, describeError, isErrnoException } from "../lib/errors.js";
import type { SpeechPipeline } from "../services/audio-pipeline.js";
import { ProvenanceLog } from "../services/provenance-log.js";
import { speechRequestSchema } from "../services/request-source.js";
import { contentTypeForFilename } from "../services/tts/utils.js";
import type { PipelineRunSummary, ProvenanceRecord } from "../types/audio.js";
import { requireApiKey } from "../utils/auth.js";

type ErrorResponse = {
  message: string;
  code?: string;
};

type FileParams = {
  filename: string;
};

const generateBodySchema = z.object({
  requests: z.array(speechRequestSchema).min(1),
});

export type AudioRouteOptions = {
  config: PipelineConfig;
  pipeline: SpeechPipeline;
  serverApiKey: string;
};

/** Registers routes for generating audio, listing provenance and serving artifacts. */
export async function registerAudioRoutes(
  app: FastifyInstance,
  options: AudioRouteOptions,
): Promise<void> {
  const { config, pipeline, serverApiKey } = options;
  const provenance = new ProvenanceLog(config.provenancePath);

  app.post<{ Body: unknown; Reply: PipelineRunSummary | ErrorResponse }>(
    "/audio/requests",
    async (request, reply) => {
      if (!requireApiKey(request, reply, serverApiKey)) {
        return;
      }

      const parsed = generateBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          message: parsed.error.issues
            .map((issue) => `${issue.path.join(".")} ${issue.message}`)
            .join("; "),
        });
      }

      const { requests } = parsed.data;
      request.log.info({ requestCount: requests.length }, "Starting audio generation");

      try {
        const summary = await pipeline.run(requests);
        return reply.status(200).send(summary);
      } catch (error) {
        request.log.error({ err: error }, "Audio generation run aborted");
        const status = error instanceof AuthExhaustedError ? 502 : 500;
        return reply.status(status).send(describeError(error));
      }
    },
  );

  app.get<{ Reply: { records: ProvenanceRecord[] } | ErrorResponse }>(
    "/audio/provenance",
    async (request, reply) => {
      if (!requireApiKey(request, reply, serverApiKey)) {
        return;
      }

      try {
        const records = await provenance.readRecords();
        return reply.status(200).send({ records });
      } catch (error) {
        request.log.error({ err: error }, "Failed to read provenance log");
        return reply.status(500).send({ message: "Failed to read provenance log" });
      }
    },
  );

  app.get<{ Params: FileParams }>("/audio/files/:filename", async (request, reply) => {
    if (!requireApiKey(request, reply, serverApiKey)) {
      return;
    }

    const filename = request.params.filename?.trim();
    if (!filename || path.basename(filename) !== filename || filename.startsWith(".")) {
      return reply.status(400).send({ message: "A plain artifact filename is required" });
    }

    const audioPath = path.join(config.outputDir, filename);
    try {
      const stats = await fs.stat(audioPath);
      if (!stats.isFile()) {
        return reply.status(404).send({ message: "Audio file not found" });
      }
      reply.header("Content-Type", contentTypeForFilename(filename));
      reply.header("Content-Length", stats.size);
      return reply.send(createReadStream(audioPath));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        request.log.warn({ filename }, "Audio not found");
        return reply.status(404).send({ message: "Audio file not found" });
      }
      request.log.error({ err: error, filename }, "Failed to stream audio file");
      return reply.status(500).send({ message: "Failed to stream audio file" });
    }
  });
}
