/**
 * Public API
 *
 * @module index
 */

export { runPipeline } from "./pipeline.js";
export type { PipelineDeps, PipelineOptions, PipelineOutcome, PipelineSuccess, PipelineError, PipelineSummary } from "./pipeline.js";

export { parseDocument } from "./parser/document-parser.js";
export { assistFeatureExtraction } from "./parser/llm-assist.js";
export { detectChannel, detectLanguage } from "./parser/metadata-extractor.js";

export { scoreDocument, scoreFeature, selectStrategy, isComplexFeature } from "./generator/complexity.js";
export type { StrategyName, DocumentComplexity } from "./generator/complexity.js";
export { NamespaceAccumulator } from "./generator/namespace.js";
export type { GenerationWarning, GenerationWarningCode } from "./generator/namespace.js";
export { buildStepNode } from "./generator/node-factory.js";
export {
  ChunkedStrategy,
  HybridStrategy,
  SimpleStrategy,
  chooseStrategy,
  generateGraph,
  getStrategy,
} from "./generator/strategies/index.js";
export type { GenerationResult, GenerationStrategy, GenerateOptions } from "./generator/strategies/index.js";

export { validateGraph, runAutoFix } from "./validators/index.js";
export type { AutoFixReport, FlowValidationResult, ValidationIssue } from "./validators/index.js";

export { buildFlowDocument } from "./output/document-builder.js";

export { FixturesLlmClient } from "./adapters/llm/fixtures.js";
export { getLlmClient } from "./adapters/llm/router.js";
export type { LlmClient, LlmResponse, GenerateContext } from "./adapters/llm/types.js";

export { EmptyInputError, GenerationError, toFailure } from "./utils/errors.js";
export type { PipelineFailure, FailureCode } from "./utils/errors.js";

export * from "./schemas/document.js";
export * from "./schemas/flow.js";
