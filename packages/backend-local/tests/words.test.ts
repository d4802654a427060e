import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadWordCatalog } from "../src/words.js";

describe("loadWordCatalog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "hintline-words-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the bundled word list", async () => {
    const catalog = await loadWordCatalog();

    expect(catalog.size).toBeGreaterThanOrEqual(16);
  });

  it("draws rounds from a custom list", async () => {
    const path = join(dir, "words.json");
    await writeFile(
      path,
      JSON.stringify([
        { id: "volcano", keywords: ["lava"] },
        { id: "piano", keywords: ["keys"] },
      ]),
    );

    const catalog = await loadWordCatalog(path, 3);
    const [draft] = await catalog.drawRounds(1, 2);

    expect(catalog.size).toBe(2);
    expect([...(draft?.possibleWordIds ?? [])].sort()).toEqual(["piano", "volcano"]);
  });

  it("rejects entries without keywords", async () => {
    const path = join(dir, "words.json");
    await writeFile(path, JSON.stringify([{ id: "volcano", keywords: [] }]));

    await expect(loadWordCatalog(path)).rejects.toThrow(
      `Invalid word list ${path}: 0.keywords: Array must contain at least 1 element(s)`,
    );
  });

  it("rejects duplicate ids", async () => {
    const path = join(dir, "words.json");
    await writeFile(
      path,
      JSON.stringify([
        { id: "volcano", keywords: ["lava"] },
        { id: "volcano", keywords: ["ash"] },
      ]),
    );

    await expect(loadWordCatalog(path)).rejects.toThrow("word ids must be unique");
  });
});
