import type { PipelineConfig } from "../config/pipeline.js";
import { AudioPipeline, type SpeechPipeline } from "./audio-pipeline.js";
import {
  SsoAuthenticator,
  StaticSessionAuthenticator,
  type CredentialResolver,
} from "./authenticator.js";
import { ProvenanceLog } from "./provenance-log.js";
import type { LoginRunner } from "./sso-login.js";
import {
  HttpSynthesisClient,
  PollySynthesisClient,
  type SpeechRequester,
} from "./tts/index.js";

/** Collaborators that tests (or other hosts) may swap out. */
export type BackendOverrides = {
  resolveCredentials?: CredentialResolver;
  login?: LoginRunner;
  pollyRequest?: SpeechRequester;
  generateId?: () => string;
};

/** Binds the configured backend's authenticator and client into a pipeline. */
export function createAudioPipeline(
  config: PipelineConfig,
  overrides: BackendOverrides = {},
): SpeechPipeline {
  const provenance = new ProvenanceLog(config.provenancePath);

  switch (config.backend) {
    case "polly":
      return new AudioPipeline({
        config,
        provenance,
        generateId: overrides.generateId,
        authenticator: new SsoAuthenticator({
          profile: config.polly.profile,
          region: config.polly.region,
          maxAuthAttempts: config.maxAuthAttempts,
          resolveCredentials: overrides.resolveCredentials,
          login: overrides.login,
        }),
        client: new PollySynthesisClient({
          engine: config.audio.engine,
          request: overrides.pollyRequest,
        }),
      });
    case "http":
      return new AudioPipeline({
        config,
        provenance,
        generateId: overrides.generateId,
        authenticator: new StaticSessionAuthenticator(config.http.sessionCookie),
        client: new HttpSynthesisClient({
          baseUrl: config.http.baseUrl,
          clientId: config.http.clientId,
          accountId: config.http.accountId,
          mappingType: config.http.mappingType,
        }),
      });
  }
}
