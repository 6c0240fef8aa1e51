import Fastify from "fastify";
import cors from "@fastify/cors";

import { env } from "./config/env.js";
import type { PipelineConfig } from "./config/pipeline.js";
import type { SpeechPipeline } from "./services/audio-pipeline.js";
import { registerAudioRoutes } from "./routes/audio.js";

export type BuildAppOptions = {
  config: PipelineConfig;
  pipeline: SpeechPipeline;
  serverApiKey?: string;
};

export async function buildApp(options: BuildAppOptions) {
  const app = Fastify({
    logger: {
      level: env.logLevel,
    },
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await registerAudioRoutes(app, {
    config: options.config,
    pipeline: options.pipeline,
    serverApiKey: options.serverApiKey ?? env.serverApiKey,
  });

  return app;
}
