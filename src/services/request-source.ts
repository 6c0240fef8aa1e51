import fs from "node:fs/promises";

import { z } from "zod";

import { InvalidConfigError, IOError } from "../lib/errors.js";
import type { SpeechRequest } from "../types/audio.js";

export const speechRequestSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]),
  speaker: z.string().trim().min(1),
  text: z.string(),
});

export const speechRequestListSchema = z.array(speechRequestSchema);

/** Reads the JSON array of `{ id, speaker, text }` requests to synthesize. */
export async function loadRequests(filePath: string): Promise<SpeechRequest[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new IOError("Failed to read requests file", filePath, { cause: error });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new InvalidConfigError(`Requests file ${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = speechRequestListSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidConfigError(
      `Requests file ${filePath} is invalid: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`,
      { cause: parsed.error },
    );
  }

  return parsed.data;
}
