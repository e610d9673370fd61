import { z } from "zod";
import { ApiErrorHandler, ApiExtraction, ApiParameter, Channel, Language } from "./document.js";

export const NODE_TYPES = [
  "start",
  "collect",
  "conversation",
  "set_variables",
  "api",
  "condition",
  "end",
] as const;

export const NodeType = z.enum(NODE_TYPES);

export const VARIABLE_SOURCES = ["user", "collect", "tool"] as const;
export const VARIABLE_TYPES = ["string", "number", "boolean", "object", "array"] as const;

export const KEBAB_CASE_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const Position = z.object({ x: z.number(), y: z.number() });

const NodeBase = z.object({
  id: z.string().min(1),
  name: z.string(),
  feature_id: z.string().optional(),
  position: Position,
});

export const CollectField = z.object({
  name: z.string(),
  type: z.string(),
  description: z.string(),
  required: z.boolean(),
});

export const ExtractionField = z.object({
  name: z.string(),
  type: z.string().default("string"),
  description: z.string().default(""),
});

export const StartNode = NodeBase.extend({
  type: z.literal("start"),
  data: z.object({
    initial_message: z.string(),
    system_prompt: z.string(),
  }),
});

export const CollectNode = NodeBase.extend({
  type: z.literal("collect"),
  data: z.object({
    variable_name: z.string(),
    fields: z.array(CollectField),
    prompt: z.string(),
    retry_count: z.number().int().nonnegative(),
  }),
});

export const ConversationNode = NodeBase.extend({
  type: z.literal("conversation"),
  data: z.object({
    message: z.string(),
    extraction_fields: z.array(ExtractionField),
  }),
});

export const Assignment = z.object({
  variable: z.string(),
  value: z.string(),
});

export const SetVariablesNode = NodeBase.extend({
  type: z.literal("set_variables"),
  data: z.object({
    assignments: z.array(Assignment),
  }),
});

export const ApiNode = NodeBase.extend({
  type: z.literal("api"),
  data: z.object({
    tool_id: z.string(),
    parameters: z.record(z.string(), z.string()),
    extractions: z.array(ApiExtraction),
  }),
});

export const ConditionBranch = z.object({
  expression: z.string(),
  exit_name: z.string(),
});

export const ConditionNode = NodeBase.extend({
  type: z.literal("condition"),
  data: z.object({
    conditions: z.array(ConditionBranch),
    default_exit: z.string(),
  }),
});

export const EndType = z.enum(["end_call", "transfer"]);

export const EndNode = NodeBase.extend({
  type: z.literal("end"),
  data: z.object({
    end_type: EndType,
    message: z.string(),
  }),
});

/**
 * Closed tagged variant: adding a node type is a compile-time-checked change
 * in every exhaustive switch (node factory, validator, auto-fixer).
 */
export const FlowNode = z.discriminatedUnion("type", [
  StartNode,
  CollectNode,
  ConversationNode,
  SetVariablesNode,
  ApiNode,
  ConditionNode,
  EndNode,
]);

export const ExitCondition = z.discriminatedUnion("type", [
  z.object({ type: z.literal("always") }),
  z.object({ type: z.literal("expression"), expression: z.string() }),
]);

export const Exit = z.object({
  id: z.string().min(1),
  name: z.string(),
  source_node_id: z.string(),
  target_node_id: z.string(),
  priority: z.number().int().nonnegative(),
  condition: ExitCondition,
});

export const Flow = z.object({
  start_node_id: z.string(),
  nodes: z.record(z.string(), FlowNode),
  exits: z.array(Exit),
});

/**
 * Variable as it appears in the flow document. Type and source are plain
 * strings: documents edited by hand or by an LLM may carry invalid values,
 * which the validator reports and the auto-fixer coerces.
 */
export const GraphVariable = z.object({
  name: z.string(),
  type: z.string(),
  description: z.string(),
  source: z.string(),
  required: z.boolean(),
  default: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  options: z.array(z.string()),
  validation_rules: z.array(z.string()),
  collection_mode: z.string(),
});

export const GraphTool = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  method: z.string(),
  endpoint: z.string(),
  parameters: z.array(ApiParameter),
  extractions: z.array(ApiExtraction),
  error_handlers: z.array(ApiErrorHandler),
  placeholder: z.boolean().default(false),
});

export const GraphResult = z.object({
  flow: Flow,
  variables: z.array(GraphVariable),
  tools: z.array(GraphTool),
});

// =============================================================================
// Flow document (external export format)
// =============================================================================

export const OutputVariable = GraphVariable.extend({
  persist: z.boolean(),
  source_node_id: z.string().nullable(),
  allowed_file_types: z.array(z.string()),
  max_file_size_mb: z.number().nullable(),
});

export const ToolDefinition = z.object({
  original_id: z.string(),
  name: z.string(),
  type: z.literal("http"),
  description: z.string(),
  function_definition: z.object({
    name: z.string(),
    description: z.string(),
    parameters: z.object({
      type: z.literal("object"),
      properties: z.record(z.string(), z.object({ type: z.string(), description: z.string() })),
      required: z.array(z.string()),
    }),
  }),
  execution_config: z.object({
    method: z.string(),
    url: z.string(),
    timeout_ms: z.number(),
  }),
  error_handlers: z.array(ApiErrorHandler),
});

export const BuiltInTool = z.object({ enabled: z.boolean() });

export const IssueSummary = z.object({
  code: z.string(),
  severity: z.enum(["error", "warning"]),
  message: z.string(),
  path: z.string(),
});

export const FlowDocument = z.object({
  metadata: z.object({
    export_version: z.string(),
    exported_at: z.string(),
    generator: z.string(),
    source_name: z.string(),
    strategy: z.string(),
    validation: z.object({
      valid: z.boolean(),
      error_count: z.number(),
      warning_count: z.number(),
      errors: z.array(IssueSummary),
      warnings: z.array(IssueSummary),
    }),
    auto_fix: z.object({
      enabled: z.boolean(),
      iterations: z.number(),
      fixes_applied: z.array(z.string()),
    }),
    open_questions: z.array(z.string()),
  }),
  agent: z.object({
    name: z.string(),
    description: z.string(),
    channel: Channel,
    language: Language,
    is_active: z.boolean(),
    is_test_mode: z.boolean(),
  }),
  flow_definition: z.object({
    id: z.string(),
    name: z.string(),
    version: z.string(),
    channel: Channel,
    language: Language,
    global_settings: z.object({
      system_prompt: z.string(),
      llm_provider: z.string(),
      llm_model: z.string(),
      temperature: z.number(),
    }),
    variables: z.array(OutputVariable),
    tools: z.object({
      built_in_tools: z.object({
        transfer_to_human: BuiltInTool,
        end_call: BuiltInTool,
        schedule_appointment: BuiltInTool,
        adjust_speech_rate: BuiltInTool,
      }),
      global_tools: z.array(z.string()),
    }),
    flow: Flow,
  }),
  tools: z.array(ToolDefinition),
  filler_sentences: z.array(z.string()),
  nikud_replacements: z.array(z.object({ original: z.string(), replacement: z.string() })),
});

export type NodeTypeT = z.infer<typeof NodeType>;
export type PositionT = z.infer<typeof Position>;
export type CollectFieldT = z.infer<typeof CollectField>;
export type ExtractionFieldT = z.infer<typeof ExtractionField>;
export type StartNodeT = z.infer<typeof StartNode>;
export type CollectNodeT = z.infer<typeof CollectNode>;
export type ConversationNodeT = z.infer<typeof ConversationNode>;
export type SetVariablesNodeT = z.infer<typeof SetVariablesNode>;
export type ApiNodeT = z.infer<typeof ApiNode>;
export type ConditionNodeT = z.infer<typeof ConditionNode>;
export type EndNodeT = z.infer<typeof EndNode>;
export type EndTypeT = z.infer<typeof EndType>;
export type FlowNodeT = z.infer<typeof FlowNode>;
export type ExitConditionT = z.infer<typeof ExitCondition>;
export type ExitT = z.infer<typeof Exit>;
export type FlowT = z.infer<typeof Flow>;
export type GraphVariableT = z.infer<typeof GraphVariable>;
export type GraphToolT = z.infer<typeof GraphTool>;
export type GraphResultT = z.infer<typeof GraphResult>;
export type OutputVariableT = z.infer<typeof OutputVariable>;
export type ToolDefinitionT = z.infer<typeof ToolDefinition>;
export type IssueSummaryT = z.infer<typeof IssueSummary>;
export type FlowDocumentT = z.infer<typeof FlowDocument>;

/**
 * Ordered exits of a node: the flow's exits whose source is the node,
 * in flow order.
 */
export function exitsFrom(flow: FlowT, nodeId: string): ExitT[] {
  return flow.exits.filter((exit) => exit.source_node_id === nodeId);
}
