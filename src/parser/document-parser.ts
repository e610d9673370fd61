/**
 * Parsed-Model Assembler
 *
 * Runs the extractors in dependency order and folds their results into one
 * immutable Parsed Document:
 *
 *   metadata → APIs → variables (knowing API names)
 *   → features (knowing variable and API names) → business rules
 *
 * Unresolved cross references become open questions; only empty input is
 * fatal.
 *
 * @module parser/document-parser
 */

import {
  ParsedDocument,
  type ApiT,
  type ChannelT,
  type DocumentMetadataT,
  type ParsedDocumentT,
  type VariableT,
} from "../schemas/document.js";
import { EmptyInputError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { extractApis } from "./api-extractor.js";
import { extractFeatures, type FeatureExtractionContext } from "./feature-extractor.js";
import { extractMetadata } from "./metadata-extractor.js";
import { extractBusinessRules } from "./rule-extractor.js";
import { toSnakeCase } from "./text-sections.js";
import { extractVariables } from "./variable-extractor.js";

export interface ParseOptions {
  /** Channel used when the document states none */
  defaultChannel?: ChannelT;
}

export function buildExtractionContext(
  metadata: DocumentMetadataT,
  variables: readonly VariableT[],
  apis: readonly ApiT[]
): FeatureExtractionContext {
  const apiAliases = new Map<string, string>();
  for (const api of apis) {
    const alias = toSnakeCase(api.name);
    if (alias && alias !== api.function_name && !apiAliases.has(alias)) {
      apiAliases.set(alias, api.function_name);
    }
  }
  return {
    variableNames: variables.map((v) => v.name),
    apiNames: apis.map((a) => a.function_name),
    apiAliases,
    documentChannel: metadata.channel,
    documentPhase: metadata.phase,
  };
}

/**
 * Open questions for references the extractors could not resolve
 */
export function crossReference(doc: Omit<ParsedDocumentT, "open_questions">): string[] {
  const questions: string[] = [];
  const featureIds = new Set(doc.features.map((f) => f.id));
  const apiNames = new Set(doc.apis.map((a) => a.function_name));

  for (const feature of doc.features) {
    if (feature.steps.length === 0) {
      questions.push(`Feature ${feature.id} has no flow steps`);
    }
    for (const step of feature.steps) {
      if (step.type === "api_call" && !step.api_name) {
        questions.push(`${feature.id} step ${step.order} calls an API that could not be identified`);
      }
      if (step.api_name && !apiNames.has(step.api_name)) {
        questions.push(`${feature.id} step ${step.order} references undeclared API "${step.api_name}"`);
      }
      if (step.type === "collect" && !step.variable_name) {
        questions.push(`${feature.id} step ${step.order} collects a value that could not be named`);
      }
    }
    for (const dependency of feature.dependencies) {
      if (!featureIds.has(dependency)) {
        questions.push(`${feature.id} depends on unknown feature ${dependency}`);
      }
    }
  }

  for (const rule of doc.business_rules) {
    for (const target of rule.applies_to) {
      if (!featureIds.has(target)) {
        questions.push(`${rule.id} applies to unknown feature ${target}`);
      }
    }
  }

  return questions;
}

export function parseDocument(text: string, options: ParseOptions = {}): ParsedDocumentT {
  if (!text || !text.trim()) {
    throw new EmptyInputError();
  }

  const metadata = extractMetadata(text, options.defaultChannel ?? "both");
  const apiResult = extractApis(text);
  const variableResult = extractVariables(text, {
    apiNames: new Set(apiResult.apis.map((a) => a.function_name)),
  });
  const featureResult = extractFeatures(
    text,
    buildExtractionContext(metadata, variableResult.variables, apiResult.apis)
  );
  const ruleResult = extractBusinessRules(text);

  const assembled = {
    metadata,
    features: featureResult.features,
    variables: variableResult.variables,
    apis: apiResult.apis,
    business_rules: ruleResult.rules,
  };

  const openQuestions = [
    ...apiResult.openQuestions,
    ...variableResult.openQuestions,
    ...featureResult.openQuestions,
    ...ruleResult.openQuestions,
    ...crossReference(assembled),
  ];

  const parsed = ParsedDocument.parse({ ...assembled, open_questions: openQuestions });

  log.debug(
    {
      name: parsed.metadata.name,
      features: parsed.features.length,
      variables: parsed.variables.length,
      apis: parsed.apis.length,
      rules: parsed.business_rules.length,
      open_questions: parsed.open_questions.length,
    },
    "document parsed"
  );

  return parsed;
}
