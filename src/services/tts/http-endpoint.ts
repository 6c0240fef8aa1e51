/**
 * Client for the raw HTTP TTS endpoint.
 * One POST per chunk; the body carries speaker, text and account mapping, the
 * session travels as a cookie, and audio comes back base64-encoded in JSON.
 */
import { z } from "zod";

import { log } from "../../logger.js";
import {
  BackendStatusError,
  DecodeError,
  TransportError,
} from "../../lib/errors.js";
import type { CookieSession, SynthesisInput } from "../../types/audio.js";
import type { SynthesisClient } from "./types.js";

export type BackendStatusKind =
  | "success"
  | "invalid_account"
  | "text_too_long"
  | "unspecified_failure"
  | "invalid_speaker"
  | "unknown";

export type BackendStatus = {
  code: number;
  kind: BackendStatusKind;
  message: string;
};

const BACKEND_STATUSES: ReadonlyMap<number, Omit<BackendStatus, "code">> = new Map<
  number,
  Omit<BackendStatus, "code">
>([
  [0, { kind: "success", message: "Success" }],
  [1, { kind: "invalid_account", message: "Invalid account or missing parameters" }],
  [2, { kind: "text_too_long", message: "Text exceeds the backend character limit" }],
  [3, { kind: "unspecified_failure", message: "Synthesis failed for an unspecified reason" }],
  [4, { kind: "invalid_speaker", message: "Invalid speaker id" }],
]);

/** Maps the endpoint's status_code to a diagnostic; only code 0 is a success. */
export function describeBackendStatus(code: number): BackendStatus {
  const known = BACKEND_STATUSES.get(code);
  if (known) {
    return { code, ...known };
  }
  return { code, kind: "unknown", message: `Unknown status code ${code}` };
}

const responseSchema = z.object({
  status_code: z.number().int(),
  data: z
    .object({
      v_str: z.string().optional(),
    })
    .nullish(),
});

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export type HttpSynthesisClientOptions = {
  baseUrl: string;
  clientId: string;
  accountId: string;
  mappingType: string;
  requestTimeoutMs?: number;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export class HttpSynthesisClient implements SynthesisClient<CookieSession> {
  readonly name = "http";

  constructor(private readonly options: HttpSynthesisClientOptions) {}

  async synthesize(session: CookieSession, input: SynthesisInput): Promise<Buffer> {
    const { baseUrl, clientId, accountId, mappingType } = this.options;

    log.debug(
      { url: baseUrl, speaker: input.voice, characters: input.text.length },
      "Calling TTS endpoint",
    );

    let response: Response;
    try {
      response = await fetch(baseUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Cookie: session.cookie,
        },
        body: JSON.stringify({
          client: clientId,
          account: accountId,
          mapping_type: mappingType,
          speaker_id: input.voice,
          text: input.text,
        }),
        signal: AbortSignal.timeout(
          this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        ),
      });
    } catch (error) {
      throw new TransportError(`Request to TTS endpoint ${baseUrl} failed`, { cause: error });
    }

    let rawBody: string;
    try {
      rawBody = await response.text();
    } catch (error) {
      throw new TransportError("Failed to read TTS endpoint response body", {
        cause: error,
        httpStatus: response.status,
      });
    }

    if (response.status !== 200) {
      throw new TransportError(`TTS endpoint error (${response.status}): ${rawBody}`, {
        httpStatus: response.status,
      });
    }

    return decodeAudioResponse(rawBody);
  }
}

/** Parses the endpoint's JSON body and extracts the decoded audio bytes. */
export function decodeAudioResponse(rawBody: string): Buffer {
  let payload: unknown;
  try {
    payload = JSON.parse(rawBody);
  } catch (error) {
    throw new DecodeError("TTS endpoint response is not valid JSON", { cause: error });
  }

  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DecodeError(
      `TTS endpoint response has an unexpected shape: ${parsed.error.message}`,
      { cause: parsed.error },
    );
  }

  const status = describeBackendStatus(parsed.data.status_code);
  if (status.kind !== "success") {
    throw new BackendStatusError(status.code, status.message);
  }

  const encoded = parsed.data.data?.v_str?.replace(/\s+/g, "");
  if (!encoded) {
    throw new DecodeError("TTS endpoint response is missing data.v_str");
  }
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    throw new DecodeError("TTS endpoint returned audio that is not valid base64");
  }

  return Buffer.from(encoded, "base64");
}
