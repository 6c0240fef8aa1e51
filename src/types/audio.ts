import type { AwsCredentialIdentity } from "@aws-sdk/types";

export type BackendKind = "polly" | "http";

export type AudioFormat = "mp3" | "ogg_vorbis" | "pcm";

export const AUDIO_FORMATS = ["mp3", "ogg_vorbis", "pcm"] as const satisfies readonly AudioFormat[];

/** File extension written for each synthesized audio format. */
export const AUDIO_EXTENSIONS: Record<AudioFormat, string> = {
  mp3: "mp3",
  ogg_vorbis: "ogg",
  pcm: "pcm",
};

export type SpeechRequest = {
  readonly id: string | number;
  readonly speaker: string;
  readonly text: string;
};

export type Chunk = {
  index: number;
  text: string;
};

export type AudioArtifact = {
  path: string;
  requestId: SpeechRequest["id"];
  speaker: string;
  chunkCount: number;
  byteLength: number;
};

export type ProvenanceRecord = {
  filename: string;
  text: string;
};

export type AwsSession = {
  kind: "aws";
  profile: string;
  region: string;
  credentials: AwsCredentialIdentity;
  acquiredAt: Date;
};

export type CookieSession = {
  kind: "cookie";
  cookie: string;
  acquiredAt: Date;
};

export type BackendSession = AwsSession | CookieSession;

export type SynthesisInput = {
  text: string;
  voice: string;
  format: AudioFormat;
  languageCode: string;
};

export type FailedRequest = {
  requestId: SpeechRequest["id"];
  code: string;
  message: string;
};

export type PipelineRunSummary = {
  artifacts: AudioArtifact[];
  failures: FailedRequest[];
};
