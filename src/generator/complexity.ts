/**
 * Complexity Scorer
 *
 * Weighted size of a Parsed Document and of each feature; selects the
 * generation strategy from the document score.
 *
 * @module generator/complexity
 */

import type { FeatureT, ParsedDocumentT } from "../schemas/document.js";

export type StrategyName = "simple" | "chunked" | "hybrid";

export interface StrategyThresholds {
  lowThreshold: number;
  highThreshold: number;
}

export interface DocumentComplexity {
  score: number;
  features: number;
  steps: number;
  variables: number;
  apis: number;
}

export const WEIGHTS = {
  feature: 2,
  step: 1,
  variable: 0.5,
  api: 1,
} as const;

export function scoreDocument(doc: ParsedDocumentT): DocumentComplexity {
  const features = doc.features.length;
  const steps = doc.features.reduce((total, feature) => total + feature.steps.length, 0);
  const variables = doc.variables.length;
  const apis = doc.apis.length;
  return {
    score: WEIGHTS.feature * features + WEIGHTS.step * steps + WEIGHTS.variable * variables + WEIGHTS.api * apis,
    features,
    steps,
    variables,
    apis,
  };
}

/**
 * Below the low threshold → simple, above the high one → chunked,
 * otherwise hybrid. Both bounds are exclusive.
 */
export function selectStrategy(score: number, thresholds: StrategyThresholds): StrategyName {
  if (score < thresholds.lowThreshold) return "simple";
  if (score > thresholds.highThreshold) return "chunked";
  return "hybrid";
}

export function scoreFeature(feature: FeatureT): number {
  let score = 0;

  const steps = feature.steps.length;
  if (steps > 10) score += 3;
  else if (steps > 5) score += 2;
  else if (steps > 0) score += 1;

  const variables = feature.variables_used.length;
  if (variables > 5) score += 2;
  else if (variables > 2) score += 1;

  const apis = feature.apis_used.length;
  if (apis > 3) score += 2;
  else if (apis > 0) score += 1;

  if (feature.dependencies.length > 0) score += 1;
  if (feature.user_stories.length > 3) score += 1;

  return score;
}

export function isComplexFeature(feature: FeatureT, threshold: number): boolean {
  return scoreFeature(feature) > threshold;
}
