import type { StrategyChoiceT } from "../../config/index.js";
import { config } from "../../config/index.js";
import type { ParsedDocumentT } from "../../schemas/document.js";
import { scoreDocument, selectStrategy, type DocumentComplexity, type StrategyName } from "../complexity.js";
import { ChunkedStrategy } from "./chunked.js";
import { HybridStrategy } from "./hybrid.js";
import { SimpleStrategy } from "./simple.js";
import type { GenerateOptions, GenerationResult, GenerationStrategy } from "./types.js";

export { ChunkedStrategy, planChunks, buildChunkSegments } from "./chunked.js";
export { HybridStrategy, planRuns } from "./hybrid.js";
export { SimpleStrategy, buildSimpleSegment } from "./simple.js";
export type { GenerateOptions, GenerationResult, GenerationStats, GenerationStrategy, StrategySettings } from "./types.js";

export function getStrategy(name: StrategyName): GenerationStrategy {
  switch (name) {
    case "simple":
      return new SimpleStrategy();
    case "chunked":
      return new ChunkedStrategy();
    case "hybrid":
      return new HybridStrategy();
  }
}

export interface StrategySelection {
  strategy: StrategyName;
  complexity: DocumentComplexity;
  forced: boolean;
}

/**
 * A forced choice bypasses scoring; `auto` scores the document against the
 * configured thresholds.
 */
export function chooseStrategy(doc: ParsedDocumentT, choice: StrategyChoiceT = "auto"): StrategySelection {
  const complexity = scoreDocument(doc);
  if (choice !== "auto") {
    return { strategy: choice, complexity, forced: true };
  }
  const { lowThreshold, highThreshold } = config.strategy;
  return { strategy: selectStrategy(complexity.score, { lowThreshold, highThreshold }), complexity, forced: false };
}

export function generateGraph(
  doc: ParsedDocumentT,
  strategy: StrategyName,
  options: GenerateOptions = {}
): GenerationResult {
  return getStrategy(strategy).generate(doc, options);
}
