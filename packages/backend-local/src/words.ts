import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { StaticWordCatalog } from "./core.js";
import { WordListSchema, describeIssues } from "./schemas.js";

export const DEFAULT_WORDS_FILE = fileURLToPath(new URL("../data/words.json", import.meta.url));

/** Load and validate a JSON word list into a catalog */
export async function loadWordCatalog(
  path: string = DEFAULT_WORDS_FILE,
  seed?: number,
): Promise<StaticWordCatalog> {
  const contents = await readFile(path, "utf8");
  const raw: unknown = JSON.parse(contents);

  const parsed = WordListSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid word list ${path}: ${describeIssues(parsed.error).join("; ")}`);
  }

  const ids = new Set(parsed.data.map((word) => word.id));
  if (ids.size !== parsed.data.length) {
    throw new Error(`Invalid word list ${path}: word ids must be unique`);
  }

  return new StaticWordCatalog(parsed.data, { seed });
}
