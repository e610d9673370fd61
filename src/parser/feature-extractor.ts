/**
 * Feature Extractor
 *
 * Segments the document into feature blocks at `F-NN` headings, then each
 * block into its sub-sections. Flow list items are classified into typed
 * flow steps by keyword heuristics.
 *
 * @module parser/feature-extractor
 */

import type {
  ChannelT,
  FeatureT,
  FlowStepT,
  FlowVariantT,
  StepTypeT,
  VariableT,
} from "../schemas/document.js";
import { toFunctionName } from "./api-extractor.js";
import {
  cleanText,
  column,
  featureIdsIn,
  findSection,
  firstParagraph,
  listHeadings,
  normalizeFeatureId,
  parseTable,
  splitLines,
  toSnakeCase,
  topLevelItems,
  type Heading,
} from "./text-sections.js";
import { parseVariableListItem, VARIABLE_STOPWORDS } from "./variable-extractor.js";

// =============================================================================
// Step classification
// =============================================================================

const STEP_RULES: ReadonlyArray<{ type: StepTypeT; pattern: RegExp }> = [
  { type: "condition", pattern: /^(?:if|when|in case)\b|\bbranch\b/ },
  { type: "transfer", pattern: /\b(?:transfer|hand ?off|handover|escalate|human agent|live agent|representative)\b/ },
  {
    type: "end",
    pattern: /^(?:end|finish|terminate|close)\b|\bgoodbye\b|\bhang up\b|\bend (?:the )?(?:call|conversation|chat|session)\b/,
  },
  { type: "api_call", pattern: /\b(?:call|invoke|fetch|api|send request|query)\b/ },
  { type: "condition", pattern: /^(?:check|verify)\s+(?:if|whether|that)\b/ },
  {
    type: "collect",
    pattern: /\b(?:collect|ask|request|input|prompt for|obtain)\b|\bget\b.*\bfrom (?:the )?(?:user|customer|caller)\b/,
  },
  { type: "set_variable", pattern: /^(?:set|store|save|assign|record)\b/ },
];

/** First matching rule wins; unmatched items are plain conversation turns */
export function classifyStep(text: string): StepTypeT {
  const lower = cleanText(text).toLowerCase().replace(/^otherwise\s*,?\s*/, "");
  for (const rule of STEP_RULES) {
    if (rule.pattern.test(lower)) return rule.type;
  }
  return "conversation";
}

// =============================================================================
// Reference resolution
// =============================================================================

export interface FeatureExtractionContext {
  /** Declared and inline variable names, in document order */
  variableNames: readonly string[];
  /** API function names */
  apiNames: readonly string[];
  /** snake_case display name → function name */
  apiAliases: ReadonlyMap<string, string>;
  documentChannel: ChannelT;
  documentPhase: number;
}

const TEMPLATE_TOKENS = /\{\{\s*([A-Za-z_][\w.]*)\s*\}\}|\$\{\s*([A-Za-z_][\w.]*)\s*\}|`([A-Za-z_][\w]*)`/g;

export function templateTokens(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(TEMPLATE_TOKENS)) {
    const token = (match[1] ?? match[2] ?? match[3] ?? "").split(".")[0];
    if (token && !tokens.includes(token)) tokens.push(token);
  }
  return tokens;
}

function words(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[`{}$]/g, " ")
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

const FILLER = /^(?:(?:the|their|his|her|a|an|its|customer'?s?|user'?s?|caller'?s?)\s+)+/i;

const VARIABLE_PHRASE =
  /\b(?:collect|ask(?:\s+(?:the\s+)?(?:user|customer|caller))?(?:\s+(?:for|to provide|to enter))?|request|get|obtain|prompt for|store|save|set|record|assign|input)\s+(.+)$/i;

function matchKnownPrefix(phrase: string, known: readonly string[]): string | undefined {
  const parts = words(phrase).slice(0, 4);
  for (let k = parts.length; k > 0; k -= 1) {
    const candidate = parts.slice(0, k).join("_");
    if (known.includes(candidate)) return candidate;
  }
  return undefined;
}

function matchAllWords(text: string, names: readonly string[]): string | undefined {
  const present = new Set(words(text));
  const ranked = [...names].sort((a, b) => b.split("_").length - a.split("_").length);
  return ranked.find((name) => name.split("_").every((part) => present.has(part)));
}

export function resolveVariableName(
  text: string,
  type: StepTypeT,
  ctx: FeatureExtractionContext
): string | undefined {
  const tokens = templateTokens(text).filter((t) => !ctx.apiNames.includes(t));
  const known = tokens.find((t) => ctx.variableNames.includes(t));
  if (known) return known;
  const snakeToken = tokens.map(toSnakeCase).find((t) => t.length > 1 && !VARIABLE_STOPWORDS.has(t));
  if (snakeToken) return snakeToken;

  if (type !== "collect" && type !== "set_variable") {
    return undefined;
  }

  const phrase = VARIABLE_PHRASE.exec(cleanText(text))?.[1]?.replace(FILLER, "") ?? "";
  const prefixed = matchKnownPrefix(phrase, ctx.variableNames);
  if (prefixed) return prefixed;
  const anyKnown = matchAllWords(text, ctx.variableNames);
  if (anyKnown) return anyKnown;

  const fallback = words(phrase.replace(/\b(?:to|=)\b.*$/i, "")).slice(0, 2).join("_");
  return fallback && !VARIABLE_STOPWORDS.has(fallback) ? toSnakeCase(fallback) : undefined;
}

const API_PHRASE =
  /\b(?:call|invoke|fetch|query|use)\s+(?:the\s+)?(.+?)(?:\s+(?:api|endpoint|tool|service)\b|[.,;:(]|$)/i;

export function resolveApiName(text: string, ctx: FeatureExtractionContext): string | undefined {
  const token = templateTokens(text).find((t) => ctx.apiNames.includes(t) || ctx.apiAliases.has(t));
  if (token) return ctx.apiAliases.get(token) ?? token;

  const phrase = API_PHRASE.exec(cleanText(text).replace(/`/g, ""))?.[1] ?? "";
  const direct = matchKnownPrefix(phrase, ctx.apiNames);
  if (direct) return direct;
  const alias = matchKnownPrefix(phrase, [...ctx.apiAliases.keys()]);
  if (alias) return ctx.apiAliases.get(alias);

  const byWords = matchAllWords(text, ctx.apiNames) ?? matchAllWords(text, [...ctx.apiAliases.keys()]);
  if (byWords) return ctx.apiAliases.get(byWords) ?? byWords;

  const unknown = toFunctionName(phrase);
  return unknown || undefined;
}

const CONDITION_CLAUSE =
  /^(?:if|when|in case|check(?:\s+(?:if|whether|that))?|verify(?:\s+(?:if|whether|that))?|branch(?:\s+on)?)\s+(.+?)(?:(?:\s*,\s*|\s+)then\s+(.+)|\s*[,:]\s+(.+))?$/i;

export function parseCondition(text: string): { condition: string; branchAction?: string } {
  const cleaned = cleanText(text).replace(/\.$/, "").replace(/^otherwise\s*,?\s*/i, "");
  const match = CONDITION_CLAUSE.exec(cleaned);
  if (!match) return { condition: cleaned };
  const action = (match[2] ?? match[3] ?? "").trim();
  return action ? { condition: match[1].trim(), branchAction: action } : { condition: match[1].trim() };
}

function assignedValue(text: string): string | undefined {
  const match = /\b(?:set|assign|store|save|record)\s+.+?\s+(?:to|=|as)\s+(.+)$/i.exec(cleanText(text));
  return match ? match[1].replace(/[`.]+$/g, "").replace(/`/g, "").trim() : undefined;
}

export function buildStep(text: string, order: number, ctx: FeatureExtractionContext): FlowStepT {
  const description = cleanText(text);
  const type = classifyStep(text);
  const step: FlowStepT = { order, type, description };

  switch (type) {
    case "collect":
    case "set_variable": {
      const variable = resolveVariableName(text, type, ctx);
      if (variable) step.variable_name = variable;
      if (type === "set_variable") step.value = assignedValue(text) ?? "true";
      break;
    }
    case "api_call": {
      const api = resolveApiName(text, ctx);
      if (api) step.api_name = api;
      break;
    }
    case "condition": {
      const { condition, branchAction } = parseCondition(text);
      step.condition = condition;
      if (branchAction) step.branch_action = branchAction;
      const variable = resolveVariableName(text, type, ctx);
      if (variable) step.variable_name = variable;
      break;
    }
    case "conversation":
    case "transfer":
    case "end": {
      const variable = resolveVariableName(text, type, ctx);
      if (variable) step.variable_name = variable;
      break;
    }
  }
  return step;
}

// =============================================================================
// Feature blocks
// =============================================================================

const FEATURE_HEADING = /^\**\s*(?:Feature\s+)?(F-?\s?\d+)\b\s*[.:\-–—)]?\s*(.*?)\s*\**\s*$/i;

function flowVariantOf(heading: Heading): FlowVariantT | null {
  const text = heading.text;
  if (text === "steps" || text === "flow steps") return "generic";
  if (!/\bflow\b/.test(text)) return null;
  if (/\b(?:audio|voice|call|phone)\b/.test(text)) return "audio";
  if (/\b(?:text|chat|whatsapp|sms)\b/.test(text)) return "text";
  return "generic";
}

function sectionBody(lines: string[], headings: Heading[], heading: Heading): string {
  const next = headings.find((h) => h.line > heading.line && h.level <= heading.level);
  return lines.slice(heading.line + 1, next ? next.line : lines.length).join("\n");
}

interface FlowSelection {
  items: string[];
  variants: FlowVariantT[];
}

/**
 * Audio and text flows render the same logical steps; the audio rendering
 * wins when both exist, the generic flow is used only when neither does.
 */
function selectFlow(block: string): FlowSelection {
  const lines = splitLines(block);
  const headings = listHeadings(lines);
  const bodies = new Map<FlowVariantT, string>();
  for (const heading of headings) {
    const variant = flowVariantOf(heading);
    if (variant && !bodies.has(variant)) {
      bodies.set(variant, sectionBody(lines, headings, heading));
    }
  }
  const variants = [...bodies.keys()];
  const chosen = bodies.get("audio") ?? bodies.get("text") ?? bodies.get("generic") ?? "";
  return { items: topLevelItems(chosen), variants };
}

function channelFromVariants(variants: FlowVariantT[], fallback: ChannelT): ChannelT {
  const audio = variants.includes("audio");
  const text = variants.includes("text");
  if (audio && text) return "both";
  if (audio) return "voice";
  if (text) return "text";
  return fallback;
}

function sectionItems(block: string, headers: readonly string[]): string[] {
  const section = findSection(block, headers);
  if (section === null) return [];
  const items = topLevelItems(section);
  if (items.length > 0) return items.map(cleanText);
  return section
    .split(/[,\n]/)
    .map((part) => cleanText(part))
    .filter(Boolean);
}

function describeFeature(block: string): string {
  const section = findSection(block, ["Description", "Overview", "Goal", "Purpose"]);
  if (section) {
    const first = cleanText(section.split(/\n\s*\n/)[0] ?? "");
    if (first) return first.slice(0, 500);
  }
  const lines = splitLines(block);
  const firstHeading = listHeadings(lines)[0];
  const preamble = lines.slice(0, firstHeading ? firstHeading.line : lines.length).join("\n");
  return firstParagraph(preamble);
}

function push(list: string[], value: string | undefined): void {
  if (value && !list.includes(value)) list.push(value);
}

function parseFeatureBlock(
  id: string,
  name: string,
  block: string,
  ctx: FeatureExtractionContext
): FeatureT {
  const { items, variants } = selectFlow(block);
  const steps = items.map((item, i) => buildStep(item, i + 1, ctx));

  const variablesUsed: string[] = [];
  const localVariables: VariableT[] = [];
  for (const item of sectionItems(block, ["Variables Used", "Variables", "Data Collected"])) {
    const declaration = parseVariableListItem(item.replace(/^`([^`]+)`/, "$1"));
    if (!declaration) continue;
    push(variablesUsed, declaration.variable.name);
    if (declaration.typed && !localVariables.some((v) => v.name === declaration.variable.name)) {
      localVariables.push(declaration.variable);
    }
  }
  for (const step of steps) push(variablesUsed, step.variable_name);
  for (const token of templateTokens(block)) {
    if (ctx.variableNames.includes(token)) push(variablesUsed, token);
  }

  const apisUsed: string[] = [];
  for (const item of sectionItems(block, ["APIs Used", "APIs", "Integrations", "Tools Used"])) {
    const label = (item.replace(/[`*]/g, "").split(/\s[-–—:]\s|:\s/)[0] ?? "")
      .replace(/\([^)]*\)/g, "")
      .replace(/\s+(?:api|endpoint|tool)\s*$/i, "");
    const fn = toFunctionName(label);
    push(apisUsed, ctx.apiAliases.get(fn) ?? fn);
  }
  for (const step of steps) push(apisUsed, step.api_name);

  const openQuestions = sectionItems(block, ["Open Questions", "Questions"]);
  if (steps.length === 0) {
    openQuestions.push(`No flow steps found for ${id}`);
  }

  const dependencyLine = /(?:depends on|dependencies|requires|prerequisites?)\s*:?\s*([^\n]+)/i.exec(block);
  const dependencies = dependencyLine ? featureIdsIn(dependencyLine[1]).filter((dep) => dep !== id) : [];

  const phaseMatch = /\bphase\s*:?\s*(\d+)/i.exec(block);
  const phase = phaseMatch ? Math.max(1, Number.parseInt(phaseMatch[1], 10)) : ctx.documentPhase;

  return {
    id,
    name,
    description: describeFeature(block),
    channel: channelFromVariants(variants, ctx.documentChannel),
    phase,
    steps,
    variables_used: variablesUsed,
    apis_used: apisUsed,
    local_variables: localVariables,
    dependencies,
    user_stories: sectionItems(block, ["User Stories", "Stories"]),
    acceptance_criteria: [
      ...sectionItems(block, ["Acceptance Criteria"]),
      ...sectionItems(block, ["Definition of Done", "DoD"]),
    ],
    open_questions: openQuestions,
    flow_variants: variants,
  };
}

function featuresFromTable(content: string, ctx: FeatureExtractionContext): FeatureT[] {
  const section = findSection(content, ["Features", "Feature List", "Feature Summary"], {
    maxLevel: 2,
    allowInline: false,
  });
  if (section === null) return [];
  const features: FeatureT[] = [];
  for (const row of parseTable(section)) {
    const id = normalizeFeatureId(column(row, ["id", "feature id", "#", "feature"]));
    const name = cleanText(column(row, ["name", "title", "feature"]));
    if (!id || !name || features.some((f) => f.id === id)) continue;
    features.push({
      id,
      name,
      description: cleanText(column(row, ["description", "summary"])),
      channel: ctx.documentChannel,
      phase: ctx.documentPhase,
      steps: [],
      variables_used: [],
      apis_used: [],
      local_variables: [],
      dependencies: [],
      user_stories: [],
      acceptance_criteria: [],
      open_questions: [`No flow steps found for ${id}`],
      flow_variants: [],
    });
  }
  return features;
}

/** "US-04 (F-02): As a customer …" lines in a global User Stories section */
function attachGlobalStories(content: string, features: FeatureT[]): void {
  const section = findSection(content, ["User Stories"], { maxLevel: 2, allowInline: false });
  if (section === null) return;
  for (const story of topLevelItems(section).map(cleanText)) {
    for (const id of featureIdsIn(story)) {
      const feature = features.find((f) => f.id === id);
      if (feature && !feature.user_stories.includes(story)) feature.user_stories.push(story);
    }
  }
}

export interface FeatureExtractionResult {
  features: FeatureT[];
  openQuestions: string[];
}

export function extractFeatures(content: string, ctx: FeatureExtractionContext): FeatureExtractionResult {
  const lines = splitLines(content);
  const headings = listHeadings(lines).filter((h) => h.level <= 6);
  const features: FeatureT[] = [];
  const openQuestions: string[] = [];

  for (const heading of headings) {
    const match = FEATURE_HEADING.exec(heading.raw);
    if (!match) continue;
    const id = normalizeFeatureId(match[1]);
    if (!id) continue;
    if (features.some((f) => f.id === id)) {
      openQuestions.push(`Feature ${id} appears more than once; the first block is kept`);
      continue;
    }
    const name = cleanText(match[2]) || id;
    features.push(parseFeatureBlock(id, name, sectionBody(lines, headings, heading), ctx));
  }

  const result = features.length > 0 ? features : featuresFromTable(content, ctx);
  attachGlobalStories(content, result);
  return { features: result, openQuestions };
}
