import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { loadPipelineConfig, type PipelineConfig } from "../src/config/pipeline.js";
import type { AwsSession } from "../src/types/audio.js";

export async function makeTempDir(prefix = "tts-pipeline-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function buildTestConfig(
  outputDir: string,
  settings: Record<string, string> = {},
): PipelineConfig {
  return loadPipelineConfig({ OUTPUT_DIR: outputDir, ...settings });
}

export function awsSession(accessKeyId = "test-key"): AwsSession {
  return {
    kind: "aws",
    profile: "test-profile",
    region: "us-east-1",
    credentials: { accessKeyId, secretAccessKey: "test-secret" },
    acquiredAt: new Date(0),
  };
}

/** 30 distinct words, 300 characters in total. */
export function threeHundredCharacterText(): string {
  return Array.from({ length: 30 }, (_, index) =>
    index === 29
      ? `word${String(index).padStart(6, "0")}`
      : `word${String(index).padStart(5, "0")}`,
  ).join(" ");
}
