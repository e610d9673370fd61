/**
 * Pipeline Driver
 *
 * parse → (LLM assist) → score → generate → validate → (auto-fix) → export
 *
 * Every failure comes back as a structured `PipelineFailure`; a document is
 * only ever returned when its graph validated.
 *
 * @module pipeline
 */

import type { LlmClient } from "./adapters/llm/types.js";
import { config, type StrategyChoiceT } from "./config/index.js";
import type { StrategyName } from "./generator/complexity.js";
import type { GenerationWarning } from "./generator/namespace.js";
import { chooseStrategy, generateGraph, type GenerationResult } from "./generator/strategies/index.js";
import { buildFlowDocument } from "./output/document-builder.js";
import { parseDocument } from "./parser/document-parser.js";
import { assistFeatureExtraction } from "./parser/llm-assist.js";
import type { ParsedDocumentT } from "./schemas/document.js";
import type { FlowDocumentT, GraphResultT } from "./schemas/flow.js";
import { buildFailure, toFailure, type PipelineFailure } from "./utils/errors.js";
import { emit, log, TelemetryEvents } from "./utils/telemetry.js";
import { runAutoFix, type AutoFixReport } from "./validators/auto-fixer.js";
import { validateGraph } from "./validators/flow-validator.js";
import type { FlowValidationResult } from "./validators/flow-validator.types.js";

// =============================================================================
// Types
// =============================================================================

export interface PipelineOptions {
  strict?: boolean;
  autoFix?: boolean;
  /** Run everything but skip building the document */
  dryRun?: boolean;
  strategy?: StrategyChoiceT;
  sourceName?: string;
  maxIterations?: number;
}

export interface PipelineDeps {
  /** Enables LLM-assisted feature extraction for sparse documents */
  llm?: LlmClient;
  now?: () => Date;
}

export interface PipelineSummary {
  name: string;
  language: string;
  channel: string;
  features: number;
  variables: number;
  apis: number;
  rules: number;
  strategy: StrategyName;
  complexity: number;
  nodes: number;
  exits: number;
  errors: number;
  warnings: number;
  open_questions: number;
}

export interface PipelineSuccess {
  ok: true;
  document: FlowDocumentT | null;
  graph: GraphResultT;
  summary: PipelineSummary;
  validation: FlowValidationResult;
  autoFix: AutoFixReport | null;
  generationWarnings: GenerationWarning[];
}

export interface PipelineError {
  ok: false;
  failure: PipelineFailure;
}

export type PipelineOutcome = PipelineSuccess | PipelineError;

/** Documents with fewer features than this are offered to the LLM */
export const ASSIST_FEATURE_THRESHOLD = 2;

// =============================================================================
// Helpers
// =============================================================================

function summarize(
  doc: ParsedDocumentT,
  graph: GraphResultT,
  strategy: StrategyName,
  complexity: number,
  validation: FlowValidationResult
): PipelineSummary {
  return {
    name: doc.metadata.name,
    language: doc.metadata.language,
    channel: doc.metadata.channel,
    features: doc.features.length,
    variables: graph.variables.length,
    apis: graph.tools.length,
    rules: doc.business_rules.length,
    strategy,
    complexity,
    nodes: Object.keys(graph.flow.nodes).length,
    exits: graph.flow.exits.length,
    errors: validation.errors.length,
    warnings: validation.warnings.length,
    open_questions: doc.open_questions.length,
  };
}

function fail(failure: PipelineFailure, startTime: number): PipelineError {
  emit(TelemetryEvents.PipelineFailed, {
    code: failure.code,
    message: failure.message,
    issue_count: failure.issues?.length ?? 0,
    duration_ms: Date.now() - startTime,
  });
  return { ok: false, failure };
}

async function parseWithAssist(text: string, deps: PipelineDeps): Promise<ParsedDocumentT> {
  const parsed = parseDocument(text, { defaultChannel: config.output.defaultChannel });
  if (!deps.llm || !config.llm.assistEnabled || parsed.features.length >= ASSIST_FEATURE_THRESHOLD) {
    return parsed;
  }
  return assistFeatureExtraction(parsed, text, deps.llm);
}

// =============================================================================
// Driver
// =============================================================================

export async function runPipeline(
  text: string,
  options: PipelineOptions = {},
  deps: PipelineDeps = {}
): Promise<PipelineOutcome> {
  const startTime = Date.now();
  const strict = options.strict ?? config.validation.strict;
  const autoFixEnabled = options.autoFix ?? config.validation.autoFixEnabled;

  emit(TelemetryEvents.PipelineStarted, {
    chars: text.length,
    strict,
    auto_fix: autoFixEnabled,
    dry_run: Boolean(options.dryRun),
  });

  try {
    const doc = await parseWithAssist(text, deps);
    emit(TelemetryEvents.ParseCompleted, {
      features: doc.features.length,
      variables: doc.variables.length,
      apis: doc.apis.length,
      rules: doc.business_rules.length,
      open_questions: doc.open_questions.length,
      language: doc.metadata.language,
      channel: doc.metadata.channel,
    });

    const selection = chooseStrategy(doc, options.strategy ?? config.strategy.choice);
    emit(TelemetryEvents.StrategySelected, {
      strategy: selection.strategy,
      score: selection.complexity.score,
      forced: selection.forced,
    });

    let generation: GenerationResult;
    try {
      generation = generateGraph(doc, selection.strategy);
    } catch (error) {
      emit(TelemetryEvents.GenerationFailed, { strategy: selection.strategy });
      return fail(toFailure(error), startTime);
    }
    emit(TelemetryEvents.GenerationCompleted, {
      strategy: generation.strategy,
      nodes: generation.stats.nodes,
      exits: generation.stats.exits,
      chunks: generation.stats.chunks,
      warnings: generation.warnings.length,
    });

    let graph = generation.graph;
    let validation = validateGraph(graph, { strict });
    emit(TelemetryEvents.ValidationCompleted, {
      valid: validation.valid,
      errors: validation.errors.length,
      warnings: validation.warnings.length,
    });

    let autoFix: AutoFixReport | null = null;
    if (!validation.valid) {
      if (!autoFixEnabled) {
        return fail(
          buildFailure("VALIDATION_FAILED", `Generated flow has ${validation.errors.length} blocking issue(s)`, {
            issues: validation.errors,
          }),
          startTime
        );
      }

      autoFix = runAutoFix(graph, {
        strict,
        maxIterations: options.maxIterations ?? config.validation.maxIterations,
        language: doc.metadata.language,
        agentName: doc.metadata.name,
      });
      emit(TelemetryEvents.AutoFixCompleted, {
        success: autoFix.success,
        iterations: autoFix.iterations,
        fixes: autoFix.fixes.length,
        reason: autoFix.reason,
      });

      if (!autoFix.success) {
        return fail(
          buildFailure("AUTO_FIX_DID_NOT_CONVERGE", `Auto-fix stopped (${autoFix.reason ?? "unknown"}) with blocking issues left`, {
            issues: autoFix.validation.errors,
            details: { reason: autoFix.reason, iterations: autoFix.iterations },
          }),
          startTime
        );
      }
      graph = autoFix.graph;
      validation = autoFix.validation;
    }

    const document = options.dryRun
      ? null
      : buildFlowDocument({
          doc,
          graph,
          strategy: generation.strategy,
          validation,
          autoFix: autoFix ?? undefined,
          sourceName: options.sourceName,
          now: deps.now,
        });

    const summary = summarize(doc, graph, generation.strategy, selection.complexity.score, validation);
    emit(TelemetryEvents.PipelineCompleted, {
      strategy: summary.strategy,
      nodes: summary.nodes,
      errors: summary.errors,
      warnings: summary.warnings,
      dry_run: document === null,
      duration_ms: Date.now() - startTime,
    });

    return {
      ok: true,
      document,
      graph,
      summary,
      validation,
      autoFix,
      generationWarnings: generation.warnings,
    };
  } catch (error) {
    log.error({ error: error instanceof Error ? error.message : String(error) }, "pipeline failed");
    return fail(toFailure(error), startTime);
  }
}
