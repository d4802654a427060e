import type { RoundDraft } from "./RoundGateway.js";

export interface WordCatalog {
  /**
   * Draw content for `count` rounds. Target words are distinct and each grid
   * holds `gridSize` words including the target.
   */
  drawRounds(count: number, gridSize: number): Promise<readonly RoundDraft[]>;
}
