/** Barrel export for TTS services. */
export { PollySynthesisClient, classifyPollyError, sendSynthesizeSpeech } from "./polly.js";
export {
  HttpSynthesisClient,
  decodeAudioResponse,
  describeBackendStatus,
} from "./http-endpoint.js";
export { chunkText, splitWords, buildArtifactFilename, contentTypeForFilename } from "./utils.js";
export type { SynthesisClient } from "./types.js";
export type { SpeechRequester, PollySynthesisClientOptions } from "./polly.js";
export type {
  BackendStatus,
  BackendStatusKind,
  HttpSynthesisClientOptions,
} from "./http-endpoint.js";
