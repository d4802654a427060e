import { mulberry32, shuffle } from "../../domain/entities/RoundRules.js";
import { GameCommandInputError } from "../../domain/errors/GameCommandInputError.js";
import type { RoundDraft } from "../../domain/ports/RoundGateway.js";
import type { WordCatalog } from "../../domain/ports/WordCatalog.js";
import type { KeywordId, WordId } from "../../domain/typedefs.js";

export interface CatalogWord {
  readonly id: WordId;
  readonly keywords: readonly KeywordId[];
}

export interface StaticWordCatalogOptions {
  /** Fixed seed for reproducible draws; otherwise Math.random is used */
  readonly seed?: number;
}

export class StaticWordCatalog implements WordCatalog {
  readonly #words: readonly CatalogWord[];
  readonly #rng: () => number;

  constructor(words: readonly CatalogWord[], options: StaticWordCatalogOptions = {}) {
    this.#words = words.filter((word) => word.keywords.length > 0);
    this.#rng = options.seed === undefined ? Math.random : mulberry32(options.seed);
  }

  get size(): number {
    return this.#words.length;
  }

  async drawRounds(count: number, gridSize: number): Promise<readonly RoundDraft[]> {
    const issues: string[] = [];
    if (count > this.#words.length) {
      issues.push(`Catalog holds ${this.#words.length} words, ${count} rounds requested`);
    }
    if (gridSize > this.#words.length) {
      issues.push(`Catalog holds ${this.#words.length} words, grid needs ${gridSize}`);
    }
    if (issues.length > 0) {
      throw GameCommandInputError.because(issues);
    }

    const targets = shuffle(this.#words, this.#rng).slice(0, count);

    return targets.map((target) => {
      const others = shuffle(
        this.#words.filter((word) => word.id !== target.id),
        this.#rng,
      ).slice(0, gridSize - 1);

      return {
        wordId: target.id,
        keywordIds: [...target.keywords],
        possibleWordIds: shuffle([target, ...others], this.#rng).map((word) => word.id),
      };
    });
  }
}
