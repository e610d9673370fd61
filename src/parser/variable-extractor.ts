/**
 * Variable Extractor
 *
 * Merges two sources: declarations under the Variables section (table or
 * list) and inline template references anywhere in the document
 * (`{{x}}`, `${x}`, backtick tokens). Declarations win; inline-only
 * references become string variables collected from the user.
 *
 * @module parser/variable-extractor
 */

import {
  SNAKE_CASE_PATTERN,
  type VariableSourceT,
  type VariableT,
  type VariableTypeT,
} from "../schemas/document.js";
import {
  cleanText,
  column,
  findSection,
  parseTable,
  splitValues,
  toSnakeCase,
  topLevelItems,
  type TableRow,
} from "./text-sections.js";

export const VARIABLES_SECTION_HEADERS = [
  "Variables",
  "Global Variables",
  "Variable Definitions",
  "Data Fields",
  "Data Model",
] as const;

/** Template tokens that are prose or flow vocabulary, never variables */
export const VARIABLE_STOPWORDS: ReadonlySet<string> = new Set([
  "user", "agent", "bot", "system", "api", "response", "request",
  "if", "then", "else", "and", "or", "not", "true", "false",
  "flow", "step", "action", "condition", "end", "start",
  "name", "type", "description", "value", "data", "null",
]);

const TYPE_ALIASES: Readonly<Record<string, VariableTypeT>> = {
  string: "string", str: "string", text: "string", varchar: "string",
  date: "string", datetime: "string", time: "string", phone: "string", email: "string",
  number: "number", int: "number", integer: "number", float: "number",
  decimal: "number", double: "number", numeric: "number",
  boolean: "boolean", bool: "boolean",
  object: "object", dict: "object", json: "object", map: "object",
  array: "array", list: "array",
};

/** Recognised type keyword, or null when the text names no type */
export function typeAlias(raw: string): VariableTypeT | null {
  const lower = raw.trim().toLowerCase().replace(/`/g, "");
  if (!lower) return null;
  if (lower.endsWith("[]")) return "array";
  const word = lower.split(/[\s(<]/)[0];
  return TYPE_ALIASES[word] ?? null;
}

export function normalizeVariableType(raw: string): VariableTypeT {
  return typeAlias(raw) ?? "string";
}

export function parseVariableSource(raw: string): VariableSourceT {
  const lower = raw.toLowerCase();
  if (/collect|input|ask|prompt/.test(lower)) return "collect";
  if (/tool|api|system|integration|response/.test(lower)) return "tool";
  return "user";
}

export function parseRequired(raw: string): boolean {
  return /^(true|yes|y|1|required|mandatory|✓|✔)$/i.test(raw.trim());
}

export function parseDefault(raw: string): string | number | boolean | null {
  const value = raw.trim().replace(/^[`"']|[`"']$/g, "");
  if (!value || value === "-" || /^(none|null|n\/a)$/i.test(value)) return null;
  if (/^(true|false)$/i.test(value)) return value.toLowerCase() === "true";
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

export function inlineVariable(name: string): VariableT {
  return {
    name,
    type: "string",
    description: "",
    source: "collect",
    required: false,
    default: null,
    options: [],
    validation_rules: [],
    collection_mode: "explicit",
    origin: "inline",
  };
}

function variableFromRow(row: TableRow): VariableT | null {
  const name = toSnakeCase(column(row, ["name", "variable", "field", "parameter"]));
  if (!name || !SNAKE_CASE_PATTERN.test(name)) return null;
  const rules = cleanText(column(row, ["validation", "rules", "format"]));
  return {
    name,
    type: normalizeVariableType(column(row, ["type"])),
    description: cleanText(column(row, ["description", "desc", "purpose"])),
    source: parseVariableSource(column(row, ["source", "origin"])),
    required: parseRequired(column(row, ["required", "mandatory"])),
    default: parseDefault(column(row, ["default"])),
    options: splitValues(column(row, ["options", "values", "allowed"])),
    validation_rules: rules ? [rules] : [],
    collection_mode: /deduc|infer|implicit/i.test(column(row, ["collection", "mode"])) ? "deducible" : "explicit",
    origin: "declared",
  };
}

const LIST_DECLARATION = /^[`*]*([A-Za-z_][\w]*)[`*]*\s*(?:\(([^)]*)\))?\s*(?:[:\-–—]\s*(.*))?$/;

export interface ListDeclaration {
  variable: VariableT;
  /** Whether the item stated a type explicitly */
  typed: boolean;
}

/**
 * "`order_id` (string, required): The order number" → declaration.
 * Parenthetical tokens may name the type, required/optional and a source.
 */
export function parseVariableListItem(text: string): ListDeclaration | null {
  const match = LIST_DECLARATION.exec(text.trim());
  if (!match) return null;
  const name = toSnakeCase(match[1]);
  if (!SNAKE_CASE_PATTERN.test(name) || VARIABLE_STOPWORDS.has(name)) return null;

  let type: VariableTypeT = "string";
  let typed = false;
  let required = false;
  let source: VariableSourceT = "user";
  for (const token of (match[2] ?? "").split(",").map((t) => t.trim()).filter(Boolean)) {
    const alias = typeAlias(token);
    if (alias && !typed) {
      type = alias;
      typed = true;
    } else if (/^(required|mandatory)$/i.test(token)) {
      required = true;
    } else if (/^(collect|tool|user|api|input)$/i.test(token)) {
      source = parseVariableSource(token);
    }
  }

  return {
    variable: {
      name,
      type,
      description: cleanText(match[3] ?? ""),
      source,
      required,
      default: null,
      options: [],
      validation_rules: [],
      collection_mode: "explicit",
      origin: "declared",
    },
    typed,
  };
}

export interface DeclarationResult {
  variables: VariableT[];
  openQuestions: string[];
}

export function extractDeclaredVariables(content: string): DeclarationResult {
  const section = findSection(content, VARIABLES_SECTION_HEADERS, { maxLevel: 2, allowInline: false });
  if (section === null) return { variables: [], openQuestions: [] };

  const rows = parseTable(section);
  const candidates: VariableT[] = rows.length > 0
    ? rows.map(variableFromRow).filter((v): v is VariableT => v !== null)
    : topLevelItems(section)
        .map(parseVariableListItem)
        .filter((d): d is ListDeclaration => d !== null)
        .map((d) => d.variable);

  const variables: VariableT[] = [];
  const openQuestions: string[] = [];
  for (const candidate of candidates) {
    if (variables.some((v) => v.name === candidate.name)) {
      openQuestions.push(`Variable "${candidate.name}" is declared more than once; the first declaration is kept`);
      continue;
    }
    variables.push(candidate);
  }
  return { variables, openQuestions };
}

const INLINE_PATTERNS = [
  /\{\{\s*([A-Za-z_][\w.]*)\s*\}\}/g,
  /\$\{\s*([A-Za-z_][\w.]*)\s*\}/g,
  /`([a-z][a-z0-9_]*)`/g,
];

/**
 * Inline template references in order of first appearance. Dotted paths
 * reference their root variable.
 */
export function findInlineReferences(content: string, exclude: ReadonlySet<string> = new Set()): string[] {
  const hits: Array<{ index: number; name: string }> = [];
  for (const pattern of INLINE_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      hits.push({ index: match.index ?? 0, name: match[1].split(".")[0] });
    }
  }
  hits.sort((a, b) => a.index - b.index);

  const names: string[] = [];
  for (const { name } of hits) {
    if (name.length < 2 || !SNAKE_CASE_PATTERN.test(name)) continue;
    if (VARIABLE_STOPWORDS.has(name) || exclude.has(name) || names.includes(name)) continue;
    names.push(name);
  }
  return names;
}

export interface VariableExtractionOptions {
  /** API function names; backticked function names are not variables */
  apiNames?: ReadonlySet<string>;
}

export function extractVariables(content: string, options: VariableExtractionOptions = {}): DeclarationResult {
  const { variables, openQuestions } = extractDeclaredVariables(content);
  const declared = new Set(variables.map((v) => v.name));
  const exclude = new Set([...declared, ...(options.apiNames ?? [])]);
  const inline = findInlineReferences(content, exclude).map(inlineVariable);
  return { variables: [...variables, ...inline], openQuestions };
}
