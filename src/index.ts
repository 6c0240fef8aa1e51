import { env } from "./config/env.js";
import { loadPipelineConfig } from "./config/pipeline.js";
import { log } from "./logger.js";
import { createAudioPipeline } from "./services/backends.js";
import { buildApp } from "./app.js";

async function main() {
  const config = loadPipelineConfig();
  const app = await buildApp({ config, pipeline: createAudioPipeline(config) });

  try {
    const address = await app.listen({
      port: env.port,
      host: env.host,
    });

    app.log.info({ backend: config.backend }, `Server running at ${address}`);
  } catch (error) {
    app.log.error(error, "Failed to start server");
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "Failed to initialize server");
  process.exitCode = 1;
});
