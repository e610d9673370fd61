import { z } from "zod";

export const Language = z.enum(["he-IL", "en-US"]);
export const Channel = z.enum(["voice", "text", "both"]);

export const StepType = z.enum([
  "collect",
  "api_call",
  "condition",
  "conversation",
  "transfer",
  "set_variable",
  "end",
]);

export const VariableType = z.enum(["string", "number", "boolean", "object", "array"]);
export const VariableSource = z.enum(["user", "collect", "tool"]);
export const CollectionMode = z.enum(["explicit", "deducible"]);
export const HttpMethod = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"]);
export const FlowVariant = z.enum(["audio", "text", "generic"]);

export const FEATURE_ID_PATTERN = /^F-\d{2,}$/;
export const RULE_ID_PATTERN = /^BR-\d{2,}$/;
export const SNAKE_CASE_PATTERN = /^[a-z][a-z0-9_]*$/;

export const FlowStep = z.object({
  order: z.number().int().positive(),
  type: StepType,
  description: z.string(),
  variable_name: z.string().optional(),
  api_name: z.string().optional(),
  condition: z.string().optional(),
  // "then …" clause of a condition step
  branch_action: z.string().optional(),
  // assignment value of a set_variable step
  value: z.string().optional(),
});

export const Variable = z.object({
  name: z.string().regex(SNAKE_CASE_PATTERN),
  type: VariableType,
  description: z.string().default(""),
  source: VariableSource,
  required: z.boolean().default(false),
  default: z.union([z.string(), z.number(), z.boolean(), z.null()]).default(null),
  options: z.array(z.string()).default([]),
  validation_rules: z.array(z.string()).default([]),
  collection_mode: CollectionMode.default("explicit"),
  origin: z.enum(["declared", "inline"]),
});

export const Feature = z.object({
  id: z.string().regex(FEATURE_ID_PATTERN),
  name: z.string(),
  description: z.string().default(""),
  channel: Channel,
  phase: z.number().int().positive().default(1),
  steps: z.array(FlowStep),
  variables_used: z.array(z.string()).default([]),
  apis_used: z.array(z.string()).default([]),
  local_variables: z.array(Variable).default([]),
  dependencies: z.array(z.string()).default([]),
  user_stories: z.array(z.string()).default([]),
  acceptance_criteria: z.array(z.string()).default([]),
  open_questions: z.array(z.string()).default([]),
  flow_variants: z.array(FlowVariant).default([]),
});

export const ApiParameter = z.object({
  name: z.string(),
  type: VariableType.default("string"),
  required: z.boolean().default(true),
  description: z.string().default(""),
});

export const ApiExtraction = z.object({
  path: z.string(),
  variable: z.string(),
});

export const ApiErrorHandler = z.object({
  code: z.string(),
  action: z.string(),
});

export const Api = z.object({
  name: z.string(),
  function_name: z.string().regex(SNAKE_CASE_PATTERN),
  method: HttpMethod.default("POST"),
  endpoint: z.string().default(""),
  description: z.string().default(""),
  parameters: z.array(ApiParameter).default([]),
  extractions: z.array(ApiExtraction).default([]),
  error_handlers: z.array(ApiErrorHandler).default([]),
});

export const BusinessRule = z.object({
  id: z.string().regex(RULE_ID_PATTERN),
  name: z.string().default(""),
  condition: z.string(),
  action: z.string(),
  applies_to: z.array(z.string()).default([]),
  priority: z.number().default(0),
});

export const DocumentMetadata = z.object({
  name: z.string(),
  description: z.string().default(""),
  language: Language,
  channel: Channel,
  phase: z.number().int().positive().default(1),
});

export const ParsedDocument = z
  .object({
    metadata: DocumentMetadata,
    features: z.array(Feature),
    variables: z.array(Variable),
    apis: z.array(Api),
    business_rules: z.array(BusinessRule),
    open_questions: z.array(z.string()).default([]),
  })
  .superRefine((doc, ctx) => {
    const unique = (values: string[], label: string, path: string): void => {
      const seen = new Set<string>();
      for (const value of values) {
        if (seen.has(value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate ${label}: ${value}`,
            path: [path],
          });
        }
        seen.add(value);
      }
    };
    unique(doc.features.map((f) => f.id), "feature id", "features");
    unique(doc.variables.map((v) => v.name), "variable name", "variables");
    unique(doc.apis.map((a) => a.function_name), "API function name", "apis");
    unique(doc.business_rules.map((r) => r.id), "business rule id", "business_rules");
  });

export type LanguageT = z.infer<typeof Language>;
export type ChannelT = z.infer<typeof Channel>;
export type StepTypeT = z.infer<typeof StepType>;
export type VariableTypeT = z.infer<typeof VariableType>;
export type VariableSourceT = z.infer<typeof VariableSource>;
export type CollectionModeT = z.infer<typeof CollectionMode>;
export type HttpMethodT = z.infer<typeof HttpMethod>;
export type FlowVariantT = z.infer<typeof FlowVariant>;
export type FlowStepT = z.infer<typeof FlowStep>;
export type VariableT = z.infer<typeof Variable>;
export type FeatureT = z.infer<typeof Feature>;
export type ApiParameterT = z.infer<typeof ApiParameter>;
export type ApiExtractionT = z.infer<typeof ApiExtraction>;
export type ApiErrorHandlerT = z.infer<typeof ApiErrorHandler>;
export type ApiT = z.infer<typeof Api>;
export type BusinessRuleT = z.infer<typeof BusinessRule>;
export type DocumentMetadataT = z.infer<typeof DocumentMetadata>;
export type ParsedDocumentT = z.infer<typeof ParsedDocument>;
