/**
 * Flow Document Builder
 *
 * Wraps a validated Graph Result into the exported flow document: agent
 * settings, flow definition, HTTP tool definitions with JSON-schema
 * parameters, filler sentences and pronunciation replacements.
 *
 * @module output/document-builder
 */

import { config } from "../config/index.js";
import { buildSystemPrompt } from "../generator/graph-assembler.js";
import { toKebabCase } from "../parser/text-sections.js";
import type { ParsedDocumentT } from "../schemas/document.js";
import {
  FlowDocument,
  type FlowDocumentT,
  type FlowT,
  type GraphResultT,
  type GraphToolT,
  type IssueSummaryT,
  type OutputVariableT,
  type ToolDefinitionT,
} from "../schemas/flow.js";
import type { AutoFixReport } from "../validators/auto-fixer.js";
import type { FlowValidationResult, ValidationIssue } from "../validators/flow-validator.types.js";
import { EXPORT_VERSION, GENERATOR_VERSION } from "../version.js";
import { FILLER_SENTENCES, NIKUD_REPLACEMENTS } from "./phrases.js";

export const TOOL_TIMEOUT_MS = 30000;

const SCHEDULING_TOOL = /appointment|schedul|booking|calendar/i;

export interface DocumentBuildInput {
  doc: ParsedDocumentT;
  graph: GraphResultT;
  strategy: string;
  validation: FlowValidationResult;
  autoFix?: Pick<AutoFixReport, "iterations" | "fixes">;
  sourceName?: string;
  /** Clock for `exported_at` */
  now?: () => Date;
}

function summarize(issue: ValidationIssue): IssueSummaryT {
  return { code: issue.code, severity: issue.severity, message: issue.message, path: issue.path };
}

/** Id of the first collect node that fills the variable */
export function sourceNodeFor(flow: FlowT, variableName: string): string | null {
  for (const [key, node] of Object.entries(flow.nodes)) {
    if (node.type === "collect" && node.data.variable_name === variableName) return key;
  }
  return null;
}

export function buildOutputVariables(graph: GraphResultT): OutputVariableT[] {
  return graph.variables.map((variable) => ({
    ...variable,
    persist: variable.source !== "tool",
    source_node_id: sourceNodeFor(graph.flow, variable.name),
    allowed_file_types: [],
    max_file_size_mb: null,
  }));
}

export function buildToolDefinition(tool: GraphToolT): ToolDefinitionT {
  const properties: Record<string, { type: string; description: string }> = {};
  for (const parameter of tool.parameters) {
    properties[parameter.name] = { type: parameter.type, description: parameter.description };
  }

  return {
    original_id: tool.id,
    name: tool.id,
    type: "http",
    description: tool.description || tool.name,
    function_definition: {
      name: tool.id,
      description: tool.description || tool.name,
      parameters: {
        type: "object",
        properties,
        required: tool.parameters.filter((p) => p.required).map((p) => p.name),
      },
    },
    execution_config: {
      method: tool.method,
      url: tool.endpoint,
      timeout_ms: TOOL_TIMEOUT_MS,
    },
    error_handlers: tool.error_handlers.map((handler) => ({ ...handler })),
  };
}

function systemPromptOf(flow: FlowT, doc: ParsedDocumentT): string {
  const start = flow.nodes[flow.start_node_id];
  if (start?.type === "start" && start.data.system_prompt) return start.data.system_prompt;
  return buildSystemPrompt(doc);
}

/**
 * Assemble the flow document. The result is checked against the
 * FlowDocument schema before it is returned.
 */
export function buildFlowDocument(input: DocumentBuildInput): FlowDocumentT {
  const { doc, graph, validation } = input;
  const { metadata } = doc;
  const now = input.now ?? (() => new Date());
  const flow = graph.flow;
  const nodes = Object.values(flow.nodes);

  const document: FlowDocumentT = {
    metadata: {
      export_version: EXPORT_VERSION,
      exported_at: now().toISOString(),
      generator: `prd-flow-builder/${GENERATOR_VERSION}`,
      source_name: input.sourceName ?? metadata.name,
      strategy: input.strategy,
      validation: {
        valid: validation.valid,
        error_count: validation.errors.length,
        warning_count: validation.warnings.length,
        errors: validation.errors.map(summarize),
        warnings: validation.warnings.map(summarize),
      },
      auto_fix: {
        enabled: input.autoFix !== undefined,
        iterations: input.autoFix?.iterations ?? 0,
        fixes_applied: (input.autoFix?.fixes ?? []).map((fix) => `${fix.code}: ${fix.description}`),
      },
      open_questions: [...doc.open_questions],
    },
    agent: {
      name: metadata.name,
      description: metadata.description,
      channel: metadata.channel,
      language: metadata.language,
      is_active: true,
      is_test_mode: false,
    },
    flow_definition: {
      id: toKebabCase(metadata.name) || "flow",
      name: metadata.name,
      version: "1.0.0",
      channel: metadata.channel,
      language: metadata.language,
      global_settings: {
        system_prompt: systemPromptOf(flow, doc),
        llm_provider: config.output.flowLlmProvider,
        llm_model: config.output.flowLlmModel,
        temperature: config.llm.temperature,
      },
      variables: buildOutputVariables(graph),
      tools: {
        built_in_tools: {
          transfer_to_human: { enabled: nodes.some((node) => node.type === "end" && node.data.end_type === "transfer") },
          end_call: { enabled: true },
          schedule_appointment: { enabled: graph.tools.some((tool) => SCHEDULING_TOOL.test(tool.id)) },
          adjust_speech_rate: { enabled: metadata.channel !== "text" },
        },
        global_tools: graph.tools.map((tool) => tool.id),
      },
      flow,
    },
    tools: graph.tools.map(buildToolDefinition),
    filler_sentences: [...FILLER_SENTENCES[metadata.language]],
    nikud_replacements: metadata.language === "he-IL" ? NIKUD_REPLACEMENTS.map((entry) => ({ ...entry })) : [],
  };

  return FlowDocument.parse(document);
}
