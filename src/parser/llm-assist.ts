/**
 * LLM-assisted feature extraction for loosely structured documents.
 *
 * @module parser/llm-assist
 */

import { z } from "zod";
import type { LlmClient } from "../adapters/llm/types.js";
import { unwrapJsonFence } from "../adapters/llm/anthropic.js";
import { Channel, ParsedDocument, type FeatureT, type ParsedDocumentT } from "../schemas/document.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { buildExtractionContext } from "./document-parser.js";
import { buildStep } from "./feature-extractor.js";
import { cleanText, normalizeFeatureId, toSnakeCase } from "./text-sections.js";

const MAX_PROMPT_CHARS = 12000;

const AssistedFeature = z.object({
  id: z.string(),
  name: z.string().min(1),
  description: z.string().default(""),
  channel: Channel.optional(),
  steps: z.array(z.string()).default([]),
  variables_used: z.array(z.string()).default([]),
  apis_used: z.array(z.string()).default([]),
});

const AssistResponse = z.union([
  z.array(AssistedFeature),
  z.object({ features: z.array(AssistedFeature) }).transform((value) => value.features),
]);

type AssistedFeatureT = z.infer<typeof AssistedFeature>;

export function buildAssistPrompt(text: string): string {
  return `Identify the features of the product requirements document below.

Return ONLY valid JSON of the form:
{"features": [{"id": "F-01", "name": "...", "description": "...", "channel": "voice" | "text" | "both",
  "steps": ["one flow step per item"], "variables_used": ["snake_case"], "apis_used": ["snake_case"]}]}

## Document
${text.slice(0, MAX_PROMPT_CHARS)}`;
}

/**
 * Ask the client for features, keep those whose id is new. Any failure
 * leaves the document unchanged.
 */
export async function assistFeatureExtraction(
  doc: ParsedDocumentT,
  text: string,
  llm: LlmClient
): Promise<ParsedDocumentT> {
  emit(TelemetryEvents.LlmAssistRequested, { provider: llm.name, features_before: doc.features.length });

  let assisted: AssistedFeatureT[];
  try {
    const response = await llm.generate(buildAssistPrompt(text), {
      system: "You extract structured data from requirement documents.",
      json: true,
      purpose: "feature_extraction",
    });
    const parsed = AssistResponse.safeParse(JSON.parse(unwrapJsonFence(response.content)));
    if (!parsed.success) {
      log.warn({ errors: parsed.error.flatten() }, "LLM feature answer failed schema validation");
      emit(TelemetryEvents.LlmAssistFailed, { provider: llm.name, reason: "invalid_schema" });
      return doc;
    }
    assisted = parsed.data;
  } catch (error) {
    log.warn({ error: error instanceof Error ? error.message : String(error) }, "LLM feature assist failed");
    emit(TelemetryEvents.LlmAssistFailed, { provider: llm.name, reason: "call_failed" });
    return doc;
  }

  const ctx = buildExtractionContext(doc.metadata, doc.variables, doc.apis);
  const added: FeatureT[] = [];
  for (const candidate of assisted) {
    const id = normalizeFeatureId(candidate.id);
    if (!id || doc.features.some((f) => f.id === id) || added.some((f) => f.id === id)) continue;
    const steps = candidate.steps.map((step, i) => buildStep(step, i + 1, ctx));
    added.push({
      id,
      name: cleanText(candidate.name),
      description: cleanText(candidate.description),
      channel: candidate.channel ?? doc.metadata.channel,
      phase: doc.metadata.phase,
      steps,
      variables_used: candidate.variables_used.map(toSnakeCase).filter(Boolean),
      apis_used: candidate.apis_used.map(toSnakeCase).filter(Boolean),
      local_variables: [],
      dependencies: [],
      user_stories: [],
      acceptance_criteria: [],
      open_questions: steps.length === 0 ? [`No flow steps found for ${id}`] : [],
      flow_variants: [],
    });
  }

  if (added.length === 0) return doc;

  log.info({ added: added.length, provider: llm.name }, "LLM assist added features");
  return ParsedDocument.parse({
    ...doc,
    features: [...doc.features, ...added],
    open_questions: [...doc.open_questions, ...added.map((f) => `Feature ${f.id} was inferred by the language model`)],
  });
}
