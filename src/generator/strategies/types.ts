import { config } from "../../config/index.js";
import type { ParsedDocumentT } from "../../schemas/document.js";
import type { GraphResultT } from "../../schemas/flow.js";
import type { StrategyName } from "../complexity.js";
import type { GenerationWarning, NamespaceAccumulator } from "../namespace.js";

export interface StrategySettings {
  chunkSize: number;
  smallFeatureMaxSteps: number;
  featureComplexityThreshold: number;
}

export interface GenerateOptions {
  /** Shared namespace; a fresh one is used when absent */
  namespace?: NamespaceAccumulator;
  settings?: Partial<StrategySettings>;
}

export interface GenerationStats {
  features: number;
  nodes: number;
  exits: number;
  chunks: number;
}

export interface GenerationResult {
  strategy: StrategyName;
  graph: GraphResultT;
  warnings: GenerationWarning[];
  stats: GenerationStats;
}

export interface GenerationStrategy {
  readonly name: StrategyName;
  generate(doc: ParsedDocumentT, options?: GenerateOptions): GenerationResult;
}

export function resolveSettings(overrides: Partial<StrategySettings> = {}): StrategySettings {
  const { chunkSize, smallFeatureMaxSteps, featureComplexityThreshold } = config.strategy;
  return {
    chunkSize: overrides.chunkSize ?? chunkSize,
    smallFeatureMaxSteps: overrides.smallFeatureMaxSteps ?? smallFeatureMaxSteps,
    featureComplexityThreshold: overrides.featureComplexityThreshold ?? featureComplexityThreshold,
  };
}
