/**
 * API Extractor
 *
 * Parses tabular or prose API sections into API records. Display names are
 * normalised to snake_case function names (the tool identifier); entries
 * without an explicit method default to POST.
 *
 * @module parser/api-extractor
 */

import {
  HttpMethod,
  SNAKE_CASE_PATTERN,
  type ApiErrorHandlerT,
  type ApiExtractionT,
  type ApiParameterT,
  type ApiT,
  type HttpMethodT,
} from "../schemas/document.js";
import {
  cleanText,
  column,
  listHeadings,
  parseTable,
  splitLines,
  splitValues,
  toSnakeCase,
  topLevelItems,
  findSection,
  type TableRow,
} from "./text-sections.js";

export const API_SECTION_HEADERS = [
  "APIs",
  "API",
  "API Integrations",
  "Integrations",
  "External APIs",
  "Tools",
  "Functions",
] as const;

const METHOD_AND_PATH = /\b(GET|POST|PUT|PATCH|DELETE)\s+`?((?:https?:\/\/|\/)[^\s`]*)/;

export function parseMethod(raw: string): HttpMethodT {
  const parsed = HttpMethod.safeParse(raw.trim().toUpperCase());
  return parsed.success ? parsed.data : "POST";
}

export function toFunctionName(raw: string): string {
  return toSnakeCase(raw.replace(/\(\)$/, ""));
}

function parseParameters(raw: string): ApiParameterT[] {
  const params: ApiParameterT[] = [];
  for (const part of splitValues(raw)) {
    const [name = "", type] = part.split(/[:\s]+/);
    const snake = toSnakeCase(name);
    if (snake && !params.some((p) => p.name === snake)) {
      params.push({ name: snake, type: type ? typeOf(type) : "string", required: true, description: "" });
    }
  }
  return params;
}

function typeOf(raw: string): ApiParameterT["type"] {
  const lower = raw.toLowerCase();
  if (/int|number|float|decimal/.test(lower)) return "number";
  if (/bool/.test(lower)) return "boolean";
  if (/list|array/.test(lower)) return "array";
  if (/obj|dict|json/.test(lower)) return "object";
  return "string";
}

/**
 * `order_status <- response.status` or `response.status -> order_status`
 */
export function parseExtraction(line: string): ApiExtractionT | null {
  const text = line.replace(/`/g, "");
  const left = /([A-Za-z_]\w*)\s*(?:<-|←|=)\s*((?:response|result|data)[\w.[\]]*)/.exec(text);
  if (left) return { variable: toSnakeCase(left[1]), path: left[2] };
  const right = /((?:response|result|data)[\w.[\]]*)\s*(?:->|→)\s*([A-Za-z_]\w*)/.exec(text);
  if (right) return { variable: toSnakeCase(right[2]), path: right[1] };
  return null;
}

function parseExtractions(raw: string): ApiExtractionT[] {
  return raw
    .split(/[,;\n]/)
    .map(parseExtraction)
    .filter((e): e is ApiExtractionT => e !== null);
}

function parseErrorHandler(line: string): ApiErrorHandlerT | null {
  const match = /^(?:on\s+)?(\d{3}|timeout|error)\s*[:\-–—]\s*(.+)$/i.exec(line.trim());
  return match ? { code: match[1].toLowerCase(), action: cleanText(match[2]) } : null;
}

function apiFromRow(row: TableRow): ApiT | null {
  const displayName = cleanText(column(row, ["name", "api", "tool"]).replace(/`/g, ""));
  const functionColumn = column(row, ["function"]).replace(/`/g, "");
  const functionName = toFunctionName(functionColumn || displayName);
  if (!functionName || !SNAKE_CASE_PATTERN.test(functionName)) return null;

  let endpoint = column(row, ["endpoint", "url", "path"]).replace(/`/g, "");
  let method = parseMethod(column(row, ["method", "verb"]));
  const inline = METHOD_AND_PATH.exec(endpoint);
  if (inline) {
    if (!column(row, ["method", "verb"])) method = parseMethod(inline[1]);
    endpoint = inline[2];
  }

  return {
    name: displayName || functionName,
    function_name: functionName,
    method,
    endpoint,
    description: cleanText(column(row, ["description", "purpose"])),
    parameters: parseParameters(column(row, ["parameters", "params", "inputs"])),
    extractions: parseExtractions(column(row, ["extract", "returns", "response", "outputs"])),
    error_handlers: [],
  };
}

function fieldValue(body: string, labels: readonly string[]): string {
  for (const label of labels) {
    const match = new RegExp(`^\\s*[-*]?\\s*\\**${label}\\**\\s*:\\s*(.+)$`, "im").exec(body);
    if (match) return match[1].trim();
  }
  return "";
}

function listUnder(body: string, label: string): string[] {
  const lines = splitLines(body);
  const start = lines.findIndex((line) => new RegExp(`^\\s*[-*]?\\s*\\**${label}\\**\\s*:\\s*$`, "i").test(line));
  if (start < 0) return [];
  const items: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const item = /^\s*[-*•]\s+(.*\S)\s*$/.exec(line);
    if (!item) break;
    items.push(item[1]);
  }
  return items;
}

function apiFromBlock(heading: string, body: string): ApiT | null {
  const backticked = /`([^`]+)`/.exec(heading);
  const displayName = cleanText(heading.replace(/`/g, "").replace(/\([^)]*\)/g, ""));
  const functionName = toFunctionName(fieldValue(body, ["Function", "Function Name"]).replace(/`/g, "") || backticked?.[1] || displayName);
  if (!functionName || !SNAKE_CASE_PATTERN.test(functionName)) return null;

  let method = parseMethod(fieldValue(body, ["Method"]));
  let endpoint = fieldValue(body, ["Endpoint", "URL", "Path"]).replace(/`/g, "");
  const inline = METHOD_AND_PATH.exec(endpoint || body);
  if (inline) {
    if (!fieldValue(body, ["Method"])) method = parseMethod(inline[1]);
    if (!endpoint || METHOD_AND_PATH.test(endpoint)) endpoint = inline[2].replace(/`/g, "");
  }

  const inlineParams = fieldValue(body, ["Parameters", "Params", "Inputs"]);
  const parameters = inlineParams
    ? parseParameters(inlineParams)
    : parseParameters(listUnder(body, "Parameters").map((p) => p.replace(/[:\-–].*$/, "")).join(","));

  const extractions = splitLines(body)
    .map(parseExtraction)
    .filter((e): e is ApiExtractionT => e !== null);

  const errorHandlers = [...listUnder(body, "Errors"), ...listUnder(body, "Error Handling")]
    .map(parseErrorHandler)
    .filter((h): h is ApiErrorHandlerT => h !== null);

  return {
    name: displayName || functionName,
    function_name: functionName,
    method,
    endpoint,
    description: cleanText(fieldValue(body, ["Description", "Purpose"])),
    parameters,
    extractions,
    error_handlers: errorHandlers,
  };
}

function apisFromBlocks(section: string): ApiT[] {
  const lines = splitLines(section);
  const headings = listHeadings(lines).filter((h) => h.level <= 6);
  return headings
    .map((heading, i) => {
      const end = headings[i + 1]?.line ?? lines.length;
      return apiFromBlock(heading.raw, lines.slice(heading.line + 1, end).join("\n"));
    })
    .filter((api): api is ApiT => api !== null);
}

function apiFromListItem(item: string): ApiT | null {
  const match = /^[`*]*([A-Za-z][\w ]*?)[`*]*\s*(?:\(([^)]*)\))?\s*(?:[:\-–—]\s*(.*))?$/.exec(item.trim());
  if (!match) return null;
  const functionName = toFunctionName(match[1]);
  if (!functionName || !SNAKE_CASE_PATTERN.test(functionName)) return null;
  const inline = METHOD_AND_PATH.exec(match[2] ?? "");
  return {
    name: cleanText(match[1]),
    function_name: functionName,
    method: inline ? parseMethod(inline[1]) : "POST",
    endpoint: inline ? inline[2] : "",
    description: cleanText(match[3] ?? ""),
    parameters: [],
    extractions: [],
    error_handlers: [],
  };
}

export interface ApiExtractionResult {
  apis: ApiT[];
  openQuestions: string[];
}

export function extractApis(content: string): ApiExtractionResult {
  const section = findSection(content, API_SECTION_HEADERS, { maxLevel: 2, allowInline: false });
  if (section === null) return { apis: [], openQuestions: [] };

  const rows = parseTable(section);
  let candidates: ApiT[];
  if (rows.length > 0) {
    candidates = rows.map(apiFromRow).filter((api): api is ApiT => api !== null);
  } else {
    candidates = apisFromBlocks(section);
    if (candidates.length === 0) {
      candidates = topLevelItems(section)
        .map(apiFromListItem)
        .filter((api): api is ApiT => api !== null);
    }
  }

  const apis: ApiT[] = [];
  const openQuestions: string[] = [];
  for (const candidate of candidates) {
    if (apis.some((api) => api.function_name === candidate.function_name)) {
      openQuestions.push(`API "${candidate.function_name}" is defined more than once; the first definition is kept`);
      continue;
    }
    apis.push(candidate);
  }
  return { apis, openQuestions };
}
