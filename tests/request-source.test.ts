import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { IOError, InvalidConfigError } from "../src/lib/errors.js";
import { loadRequests } from "../src/services/request-source.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("loadRequests", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("reads a list of requests", async () => {
    const filePath = path.join(dir, "requests.json");
    await fs.writeFile(
      filePath,
      JSON.stringify([
        { id: 1, speaker: "Joanna", text: "One." },
        { id: "b-2", speaker: "Matthew", text: "Two." },
      ]),
    );

    expect(await loadRequests(filePath)).toEqual([
      { id: 1, speaker: "Joanna", text: "One." },
      { id: "b-2", speaker: "Matthew", text: "Two." },
    ]);
  });

  it("rejects entries without a speaker", async () => {
    const filePath = path.join(dir, "requests.json");
    await fs.writeFile(filePath, JSON.stringify([{ id: 1, text: "One." }]));

    await expect(loadRequests(filePath)).rejects.toBeInstanceOf(InvalidConfigError);
  });

  it("rejects a file that is not JSON", async () => {
    const filePath = path.join(dir, "requests.json");
    await fs.writeFile(filePath, "id,speaker,text");

    await expect(loadRequests(filePath)).rejects.toBeInstanceOf(InvalidConfigError);
  });

  it("reports a missing file as IOError", async () => {
    await expect(loadRequests(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(IOError);
  });

  it("loads the bundled sample requests", async () => {
    const samplePath = fileURLToPath(new URL("../data/requests.json", import.meta.url));

    const requests = await loadRequests(samplePath);

    expect(requests.map((request) => [request.id, request.speaker])).toEqual([
      [1, "Joanna"],
      [2, "Matthew"],
    ]);
  });
});
