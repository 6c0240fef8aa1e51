/**
 * Append-only CSV mapping each produced audio file to the text it was made from.
 */
import fs from "node:fs/promises";
import path from "node:path";

import { log } from "../logger.js";
import { IOError, isErrnoException } from "../lib/errors.js";
import type { ProvenanceRecord } from "../types/audio.js";

export const PROVENANCE_HEADER = ["Filename", "Text"] as const;

const ROW_TERMINATOR = "\r\n";

/** Quotes a field only when it holds a comma, quote or line break. */
export function formatCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return `${fields.map(formatCsvField).join(",")}${ROW_TERMINATOR}`;
}

/** Parses CSV text with quoted fields (doubled quotes, embedded line breaks). */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let index = 0; index < content.length; index += 1) {
    const char = content[index];

    if (quoted) {
      if (char === '"' && content[index + 1] === '"') {
        field += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && content[index + 1] === "\n") {
        index += 1;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

export class ProvenanceLog {
  // Appends run one after another so concurrent callers cannot both write the header.
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /** Appends one record, writing the header first when the log is new or empty. */
  append(artifactPath: string, text: string): Promise<void> {
    const next = this.queue.then(() => this.appendRecord(artifactPath, text));
    this.queue = next.catch(() => undefined);
    return next;
  }

  async readRecords(): Promise<ProvenanceRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return [];
      }
      throw new IOError("Failed to read provenance log", this.filePath, { cause: error });
    }

    const [header, ...rows] = parseCsv(content);
    if (!header) {
      return [];
    }
    return rows.map(([filename = "", text = ""]) => ({ filename, text }));
  }

  private async appendRecord(artifactPath: string, text: string): Promise<void> {
    try {
      const needsHeader = await this.isMissingOrEmpty();
      const payload =
        (needsHeader ? formatCsvRow(PROVENANCE_HEADER) : "") +
        formatCsvRow([artifactPath, text]);
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, payload, "utf8");
    } catch (error) {
      throw new IOError("Failed to append provenance record", this.filePath, { cause: error });
    }
    log.debug({ path: artifactPath, logPath: this.filePath }, "Provenance record appended");
  }

  private async isMissingOrEmpty(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.filePath);
      return stats.size === 0;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return true;
      }
      throw error;
    }
  }
}
