/**
 * AWS Polly synthesis client.
 */
import {
  Engine,
  LanguageCode,
  PollyClient,
  PollyServiceException,
  SynthesizeSpeechCommand,
  VoiceId,
  type SynthesizeSpeechCommandInput,
} from "@aws-sdk/client-polly";

import { log } from "../../logger.js";
import {
  CredentialExpiredError,
  DecodeError,
  InvalidConfigError,
  InvalidRequestError,
  TransportError,
} from "../../lib/errors.js";
import type { AwsSession, SynthesisInput } from "../../types/audio.js";
import type { SynthesisClient } from "./types.js";

/** Sends one SynthesizeSpeech call and returns the audio stream's bytes. */
export type SpeechRequester = (
  session: AwsSession,
  input: SynthesizeSpeechCommandInput,
) => Promise<Uint8Array | undefined>;

const CREDENTIAL_EXPIRY_ERRORS: ReadonlySet<string> = new Set([
  "ExpiredTokenException",
  "ExpiredToken",
  "UnrecognizedClientException",
  "CredentialsProviderError",
  "TokenProviderError",
]);

const POLLY_ENGINES: ReadonlySet<string> = new Set<string>(Object.values(Engine));
const POLLY_VOICES: ReadonlySet<string> = new Set<string>(Object.values(VoiceId));
const POLLY_LANGUAGES: ReadonlySet<string> = new Set<string>(Object.values(LanguageCode));

function isEngine(value: string): value is Engine {
  return POLLY_ENGINES.has(value);
}

function isVoiceId(value: string): value is VoiceId {
  return POLLY_VOICES.has(value);
}

function isLanguageCode(value: string): value is LanguageCode {
  return POLLY_LANGUAGES.has(value);
}

// One SDK client per session so renewed credentials get a fresh client.
const cachedClients = new WeakMap<AwsSession, PollyClient>();

export const sendSynthesizeSpeech: SpeechRequester = async (session, input) => {
  let client = cachedClients.get(session);
  if (!client) {
    client = new PollyClient({
      region: session.region,
      credentials: session.credentials,
    });
    cachedClients.set(session, client);
  }

  const response = await client.send(new SynthesizeSpeechCommand(input));
  return response.AudioStream?.transformToByteArray();
};

export type PollySynthesisClientOptions = {
  engine: string;
  request?: SpeechRequester;
};

export class PollySynthesisClient implements SynthesisClient<AwsSession> {
  readonly name = "polly";
  private readonly engine: Engine;
  private readonly request: SpeechRequester;

  constructor(options: PollySynthesisClientOptions) {
    if (!isEngine(options.engine)) {
      throw new InvalidConfigError(`Unsupported Polly engine "${options.engine}"`);
    }
    this.engine = options.engine;
    this.request = options.request ?? sendSynthesizeSpeech;
  }

  async synthesize(session: AwsSession, input: SynthesisInput): Promise<Buffer> {
    if (!isVoiceId(input.voice)) {
      throw new InvalidRequestError(`Unknown Polly voice "${input.voice}"`);
    }
    if (!isLanguageCode(input.languageCode)) {
      throw new InvalidConfigError(`Unsupported Polly language code "${input.languageCode}"`);
    }

    log.debug(
      { voice: input.voice, engine: this.engine, characters: input.text.length },
      "Calling Polly SynthesizeSpeech",
    );

    let audio: Uint8Array | undefined;
    try {
      audio = await this.request(session, {
        Engine: this.engine,
        VoiceId: input.voice,
        OutputFormat: input.format,
        LanguageCode: input.languageCode,
        Text: input.text,
        TextType: "text",
      });
    } catch (error) {
      throw classifyPollyError(error);
    }

    if (!audio) {
      throw new DecodeError("Polly response did not include an audio stream");
    }

    return Buffer.from(audio);
  }
}

/** Separates credential expiry (refreshable) from every other Polly failure. */
export function classifyPollyError(error: unknown): Error {
  const name = error instanceof Error ? error.name : "";
  const message = error instanceof Error ? error.message : String(error);

  if (CREDENTIAL_EXPIRY_ERRORS.has(name)) {
    return new CredentialExpiredError(`Polly rejected credentials (${name}): ${message}`, {
      cause: error,
    });
  }

  const httpStatus =
    error instanceof PollyServiceException ? error.$metadata.httpStatusCode : undefined;
  return new TransportError(`Polly synthesis failed (${name || "Error"}): ${message}`, {
    cause: error,
    httpStatus,
  });
}
