/**
 * Resolves the read-only configuration handed to every pipeline component.
 * Nothing under services/ reads process.env; callers pass this value in.
 */
import path from "node:path";

import { z } from "zod";

import { InvalidConfigError } from "../lib/errors.js";
import { AUDIO_FORMATS, type AudioFormat, type BackendKind } from "../types/audio.js";

export const MAX_AUTH_ATTEMPTS = 2;
export const DEFAULT_MAX_CHUNK_LENGTH = 3000;
export const PLACEHOLDER_SESSION_COOKIE = "session=anonymous";

export type PipelineConfig = {
  readonly backend: BackendKind;
  readonly outputDir: string;
  readonly provenancePath: string;
  readonly maxChunkLength: number;
  readonly concurrency: number;
  readonly maxAuthAttempts: number;
  readonly audio: {
    readonly engine: string;
    readonly format: AudioFormat;
    readonly languageCode: string;
  };
  readonly polly: {
    readonly profile: string;
    readonly region: string;
  };
  readonly http: {
    readonly baseUrl: string;
    readonly clientId: string;
    readonly mappingType: string;
    readonly accountId: string;
    readonly sessionCookie: string;
  };
};

// `KEY=` lines in .env files arrive as empty strings; treat them as unset.
function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

function text(fallback: string) {
  return z.preprocess(blankToUndefined, z.string().default(fallback));
}

function positiveInteger(fallback: number) {
  return z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(fallback),
  );
}

const settingsSchema = z
  .object({
    TTS_BACKEND: z.preprocess(blankToUndefined, z.enum(["polly", "http"]).default("polly")),
    OUTPUT_DIR: text("./generated_files"),
    PROVENANCE_FILE: text("audio_to_text_map.csv"),
    MAX_CHUNK_LENGTH: positiveInteger(DEFAULT_MAX_CHUNK_LENGTH),
    SYNTHESIS_CONCURRENCY: positiveInteger(1),
    MAX_AUTH_ATTEMPTS: positiveInteger(MAX_AUTH_ATTEMPTS),
    TTS_ENGINE: text("standard"),
    TTS_AUDIO_FORMAT: z.preprocess(blankToUndefined, z.enum(AUDIO_FORMATS).default("mp3")),
    TTS_LANGUAGE_CODE: text("en-US"),
    AWS_PROFILE: text("default"),
    AWS_REGION: text("us-east-1"),
    TTS_HTTP_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    TTS_HTTP_CLIENT_ID: text("tts-audio-pipeline"),
    TTS_HTTP_MAPPING_TYPE: text("default"),
    TTS_HTTP_ACCOUNT_ID: z.preprocess(blankToUndefined, z.string().optional()),
    TTS_HTTP_SESSION_COOKIE: text(PLACEHOLDER_SESSION_COOKIE),
  })
  .superRefine((settings, context) => {
    if (settings.TTS_BACKEND !== "http") {
      return;
    }
    if (!settings.TTS_HTTP_BASE_URL) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TTS_HTTP_BASE_URL"],
        message: "is required when TTS_BACKEND=http",
      });
    }
    if (!settings.TTS_HTTP_ACCOUNT_ID) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TTS_HTTP_ACCOUNT_ID"],
        message: "is required when TTS_BACKEND=http",
      });
    }
  });

/** Validates raw settings (normally process.env) into a PipelineConfig. */
export function loadPipelineConfig(
  source: Record<string, string | undefined> = process.env,
): PipelineConfig {
  const result = settingsSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid pipeline configuration: ${details}`, {
      cause: result.error,
    });
  }

  const settings = result.data;
  const outputDir = path.resolve(settings.OUTPUT_DIR);

  return {
    backend: settings.TTS_BACKEND,
    outputDir,
    provenancePath: path.join(outputDir, settings.PROVENANCE_FILE),
    maxChunkLength: settings.MAX_CHUNK_LENGTH,
    concurrency: settings.SYNTHESIS_CONCURRENCY,
    maxAuthAttempts: settings.MAX_AUTH_ATTEMPTS,
    audio: {
      engine: settings.TTS_ENGINE,
      format: settings.TTS_AUDIO_FORMAT,
      languageCode: settings.TTS_LANGUAGE_CODE,
    },
    polly: {
      profile: settings.AWS_PROFILE,
      region: settings.AWS_REGION,
    },
    http: {
      baseUrl: settings.TTS_HTTP_BASE_URL ?? "",
      clientId: settings.TTS_HTTP_CLIENT_ID,
      mappingType: settings.TTS_HTTP_MAPPING_TYPE,
      accountId: settings.TTS_HTTP_ACCOUNT_ID ?? "",
      sessionCookie: settings.TTS_HTTP_SESSION_COOKIE,
    },
  };
}
