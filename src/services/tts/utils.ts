/**
 * Shared utilities for TTS audio generation.
 * Used by the audio pipeline and both synthesis clients.
 */
import { InvalidConfigError } from "../../lib/errors.js";
import { AUDIO_EXTENSIONS, type AudioFormat } from "../../types/audio.js";

/** Splits text on whitespace, dropping empty tokens. */
export function splitWords(input: string): string[] {
  return input.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Packs words into chunks no longer than maxLength, joined by single spaces.
 * A word longer than maxLength is cut into maxLength-sized pieces; the last
 * piece may share a chunk with the words after it.
 */
export function chunkText(text: string, maxLength: number): string[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new InvalidConfigError(
      `maxLength must be a positive integer, received ${maxLength}`,
    );
  }

  const chunks: string[] = [];
  let current = "";

  for (const word of splitWords(text)) {
    let remaining = word;

    if (remaining.length > maxLength) {
      if (current) {
        chunks.push(current);
        current = "";
      }
      while (remaining.length > maxLength) {
        chunks.push(remaining.slice(0, maxLength));
        remaining = remaining.slice(maxLength);
      }
    }

    if (!current) {
      current = remaining;
    } else if (current.length + 1 + remaining.length <= maxLength) {
      current = `${current} ${remaining}`;
    } else {
      chunks.push(current);
      current = remaining;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}

/** Builds the artifact file name `<id>_<speaker>.<ext>`. */
export function buildArtifactFilename(options: {
  uniqueId: string;
  speaker: string;
  format: AudioFormat;
}): string {
  const safeSpeaker = options.speaker.replace(/[^A-Za-z0-9_-]+/g, "-") || "speaker";
  return `${options.uniqueId}_${safeSpeaker}.${AUDIO_EXTENSIONS[options.format]}`;
}

/** Maps an artifact extension back to the HTTP content type used to serve it. */
export function contentTypeForFilename(filename: string): string {
  if (filename.endsWith(".mp3")) {
    return "audio/mpeg";
  }
  if (filename.endsWith(".ogg")) {
    return "audio/ogg";
  }
  return "application/octet-stream";
}
