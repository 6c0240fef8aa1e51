/**
 * Generates one audio file per request in a JSON requests file.
 * Usage: tsx scripts/generate-audio.ts [path/to/requests.json]
 */
import path from "node:path";

import { env } from "../src/config/env.js";
import { loadPipelineConfig } from "../src/config/pipeline.js";
import { log } from "../src/logger.js";
import { createAudioPipeline } from "../src/services/backends.js";
import { loadRequests } from "../src/services/request-source.js";

async function main(): Promise<void> {
  const requestsFile = path.resolve(process.argv[2] ?? env.requestsFile);

  const config = loadPipelineConfig();
  const requests = await loadRequests(requestsFile);
  log.info(
    { backend: config.backend, requestCount: requests.length, outputDir: config.outputDir },
    "Starting audio generation",
  );

  const summary = await createAudioPipeline(config).run(requests);

  for (const failure of summary.failures) {
    log.error(failure, "Request failed");
  }
  log.info(
    {
      provenancePath: config.provenancePath,
      succeeded: summary.artifacts.length,
      failed: summary.failures.length,
    },
    "Audio generation finished",
  );

  if (summary.failures.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "Audio generation aborted");
  process.exitCode = 1;
});
