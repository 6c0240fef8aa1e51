/**
 * - ChunkAssembler.create: opens a per-request scratch directory under the given root.
 * - writeChunk: persists one chunk's bytes as `<index>.chunk` as soon as it is synthesized.
 * - assemble: lists the scratch directory, orders entries by parsed numeric index, and
 *   byte-appends them into a staging file that is renamed onto the artifact path.
 * - withChunkAssembler: scopes the scratch directory to a callback so it is always released.
 */
import fs from "node:fs/promises";
import path from "node:path";

import { log } from "../logger.js";
import { IOError } from "../lib/errors.js";

const CHUNK_SUFFIX = ".chunk";
const CHUNK_FILE_PATTERN = /^(\d+)\.chunk$/;
const STAGING_FILENAME = "artifact.partial";

export type AssembledFile = {
  path: string;
  chunkCount: number;
  byteLength: number;
};

type ChunkEntry = {
  index: number;
  filePath: string;
};

export class ChunkAssembler {
  private released = false;

  private constructor(readonly scratchDir: string) {}

  /** Creates a fresh scratch directory under `root` (created if missing). */
  static async create(root: string): Promise<ChunkAssembler> {
    try {
      await fs.mkdir(root, { recursive: true });
      const scratchDir = await fs.mkdtemp(path.join(root, "chunks-"));
      return new ChunkAssembler(scratchDir);
    } catch (error) {
      throw new IOError("Failed to create chunk scratch directory", root, { cause: error });
    }
  }

  async writeChunk(index: number, bytes: Uint8Array): Promise<void> {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Chunk index must be a non-negative integer, received ${index}`);
    }
    const filePath = path.join(this.scratchDir, `${index}${CHUNK_SUFFIX}`);
    try {
      await fs.writeFile(filePath, bytes);
    } catch (error) {
      throw new IOError(`Failed to write chunk ${index}`, filePath, { cause: error });
    }
  }

  /**
   * Concatenates chunks 0..expectedCount-1 into `outputPath`.
   * Entries are ordered by numeric index, never by listing order.
   */
  async assemble(outputPath: string, expectedCount: number): Promise<AssembledFile> {
    const entries = await this.listChunks();

    if (entries.length !== expectedCount || entries.some((entry, position) => entry.index !== position)) {
      throw new IOError(
        `Expected chunks 0..${expectedCount - 1} but found [${entries.map((entry) => entry.index).join(", ")}]`,
        this.scratchDir,
      );
    }

    const stagingPath = path.join(this.scratchDir, STAGING_FILENAME);
    let byteLength = 0;

    try {
      const handle = await fs.open(stagingPath, "w");
      try {
        for (const entry of entries) {
          const bytes = await fs.readFile(entry.filePath);
          await handle.write(bytes);
          byteLength += bytes.length;
        }
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new IOError("Failed to concatenate chunks", stagingPath, { cause: error });
    }

    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.rename(stagingPath, outputPath);
    } catch (error) {
      throw new IOError("Failed to move assembled audio into place", outputPath, { cause: error });
    }

    log.debug({ path: outputPath, chunkCount: entries.length, byteLength }, "Chunks assembled");
    return { path: outputPath, chunkCount: entries.length, byteLength };
  }

  /** Removes the scratch directory; safe to call more than once. */
  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await fs.rm(this.scratchDir, { recursive: true, force: true });
  }

  private async listChunks(): Promise<ChunkEntry[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.scratchDir);
    } catch (error) {
      throw new IOError("Failed to list chunk scratch directory", this.scratchDir, { cause: error });
    }

    const entries: ChunkEntry[] = [];
    for (const name of names) {
      const match = CHUNK_FILE_PATTERN.exec(name);
      if (!match) {
        continue;
      }
      entries.push({
        index: Number.parseInt(match[1], 10),
        filePath: path.join(this.scratchDir, name),
      });
    }

    return entries.sort((a, b) => a.index - b.index);
  }
}

/** Runs `work` with a scratch assembler that is released whether it succeeds or throws. */
export async function withChunkAssembler<T>(
  root: string,
  work: (assembler: ChunkAssembler) => Promise<T>,
): Promise<T> {
  const assembler = await ChunkAssembler.create(root);
  try {
    return await work(assembler);
  } finally {
    await assembler.release().catch((error: unknown) => {
      log.warn({ err: error, scratchDir: assembler.scratchDir }, "Failed to remove chunk scratch directory");
    });
  }
}
