import { describe, expect, it, vi } from "vitest";
import { PollyServiceException } from "@aws-sdk/client-polly";

import {
  CredentialExpiredError,
  DecodeError,
  InvalidConfigError,
  InvalidRequestError,
  TransportError,
} from "../src/lib/errors.js";
import {
  PollySynthesisClient,
  classifyPollyError,
  type SpeechRequester,
} from "../src/services/tts/polly.js";
import type { SynthesisInput } from "../src/types/audio.js";
import { awsSession } from "./helpers.js";

const input: SynthesisInput = {
  text: "Hello there.",
  voice: "Joanna",
  format: "mp3",
  languageCode: "en-US",
};

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("PollySynthesisClient", () => {
  it("sends engine, voice, format and language and returns the audio bytes", async () => {
    const request = vi.fn<SpeechRequester>(async () => new Uint8Array([1, 2, 3]));
    const client = new PollySynthesisClient({ engine: "neural", request });
    const session = awsSession();

    const audio = await client.synthesize(session, input);

    expect(audio).toEqual(Buffer.from([1, 2, 3]));
    expect(request).toHaveBeenCalledWith(session, {
      Engine: "neural",
      VoiceId: "Joanna",
      OutputFormat: "mp3",
      LanguageCode: "en-US",
      Text: "Hello there.",
      TextType: "text",
    });
  });

  it("rejects an unknown engine at construction", () => {
    expect(() => new PollySynthesisClient({ engine: "turbo" })).toThrow(InvalidConfigError);
  });

  it("rejects a voice Polly does not offer without calling the service", async () => {
    const request = vi.fn<SpeechRequester>(async () => new Uint8Array([1]));
    const client = new PollySynthesisClient({ engine: "standard", request });

    await expect(
      client.synthesize(awsSession(), { ...input, voice: "NotAVoice" }),
    ).rejects.toBeInstanceOf(InvalidRequestError);
    expect(request).not.toHaveBeenCalled();
  });

  it("rejects an unsupported language code", async () => {
    const client = new PollySynthesisClient({
      engine: "standard",
      request: async () => new Uint8Array([1]),
    });

    await expect(
      client.synthesize(awsSession(), { ...input, languageCode: "xx-XX" }),
    ).rejects.toBeInstanceOf(InvalidConfigError);
  });

  it("reports expired credentials as CredentialExpiredError", async () => {
    const client = new PollySynthesisClient({
      engine: "standard",
      request: async () => {
        throw namedError("ExpiredTokenException", "The security token included in the request is expired");
      },
    });

    await expect(client.synthesize(awsSession(), input)).rejects.toBeInstanceOf(
      CredentialExpiredError,
    );
  });

  it("reports other failures as TransportError", async () => {
    const client = new PollySynthesisClient({
      engine: "standard",
      request: async () => {
        throw new Error("socket hang up");
      },
    });

    await expect(client.synthesize(awsSession(), input)).rejects.toMatchObject({
      code: "TRANSPORT",
      message: "Polly synthesis failed (Error): socket hang up",
    });
  });

  it("reports a missing audio stream as DecodeError", async () => {
    const client = new PollySynthesisClient({
      engine: "standard",
      request: async () => undefined,
    });

    await expect(client.synthesize(awsSession(), input)).rejects.toBeInstanceOf(DecodeError);
  });
});

describe("classifyPollyError", () => {
  it.each([
    "ExpiredTokenException",
    "ExpiredToken",
    "UnrecognizedClientException",
    "CredentialsProviderError",
    "TokenProviderError",
  ])("treats %s as credential expiry", (name) => {
    expect(classifyPollyError(namedError(name, "denied"))).toBeInstanceOf(CredentialExpiredError);
  });

  it("keeps the HTTP status of a Polly service exception", () => {
    const serviceError = new PollyServiceException({
      name: "ServiceFailureException",
      $fault: "server",
      $metadata: { httpStatusCode: 500 },
      message: "Internal failure",
    });

    const classified = classifyPollyError(serviceError);

    expect(classified).toBeInstanceOf(TransportError);
    expect(classified).toMatchObject({ httpStatus: 500, cause: serviceError });
  });
});
