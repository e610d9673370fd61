/**
 * Text Sections
 *
 * Line-oriented helpers shared by every extractor: heading discovery,
 * section slicing, list items, pipe tables and identifier normalisation.
 *
 * @module parser/text-sections
 */

// =============================================================================
// Headings
// =============================================================================

/** Pseudo levels for non-Markdown headers, so one ordering rule ends sections */
const BOLD_HEADER_LEVEL = 7;
const COLON_HEADER_LEVEL = 8;

export interface Heading {
  /** Index of the heading line */
  line: number;
  /** 1-6 for Markdown headings, 7 for `**Bold**` lines, 8 for `Label:` lines */
  level: number;
  /** Heading text with markup and numbering removed */
  text: string;
  /** Heading text as written (after the hashes) */
  raw: string;
}

const MARKDOWN_HEADING = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const BOLD_HEADER = /^\*\*([^*\n]+?)\*\*\s*:?\s*$/;
const COLON_HEADER = /^([A-Za-z\u0590-\u05FF][^:|\n]{0,60}):\s*$/;

export function splitLines(content: string): string[] {
  return content.replace(/\r\n?/g, "\n").split("\n");
}

/**
 * Normalise heading text for comparison: markup, numbering and a trailing
 * colon removed, lower-cased.
 */
export function normalizeHeadingText(text: string): string {
  return text
    .replace(/[*_`]/g, "")
    .replace(/^\s*\d+(?:\.\d+)*\.?\s+/, "")
    .replace(/\s*:\s*$/, "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

function parseHeading(line: string, index: number): Heading | null {
  const md = MARKDOWN_HEADING.exec(line);
  if (md) {
    return { line: index, level: md[1].length, text: normalizeHeadingText(md[2]), raw: md[2] };
  }
  const bold = BOLD_HEADER.exec(line.trim());
  if (bold) {
    return { line: index, level: BOLD_HEADER_LEVEL, text: normalizeHeadingText(bold[1]), raw: bold[1] };
  }
  const colon = COLON_HEADER.exec(line.trim());
  if (colon) {
    return { line: index, level: COLON_HEADER_LEVEL, text: normalizeHeadingText(colon[1]), raw: colon[1] };
  }
  return null;
}

export function listHeadings(lines: string[]): Heading[] {
  const headings: Heading[] = [];
  lines.forEach((line, index) => {
    const heading = parseHeading(line, index);
    if (heading) headings.push(heading);
  });
  return headings;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * A header matches heading text that equals it, optionally followed by a
 * parenthetical or a dash clause ("Flow (Audio)", "Variables - global").
 */
export function headingMatches(headingText: string, header: string): boolean {
  const wanted = header.toLowerCase();
  if (headingText === wanted) return true;
  return new RegExp(`^${escapeRegExp(wanted)}\\s*(?:\\(|[-–—]\\s)`).test(headingText);
}

export interface FindSectionOptions {
  /** Only Markdown headings up to this level are considered (default 6) */
  maxLevel?: number;
  /** Fall back to `**Header**` and `Header:` lines (default true) */
  allowInline?: boolean;
}

/**
 * Body of the first section whose header matches one of `headers`, in
 * header priority order. The body ends at the next heading of the same or
 * a higher level. Returns null when no header matches.
 */
export function findSection(
  content: string,
  headers: readonly string[],
  options: FindSectionOptions = {}
): string | null {
  const { maxLevel = 6, allowInline = true } = options;
  const lines = splitLines(content);
  const headings = listHeadings(lines);

  const pick = (accept: (h: Heading) => boolean): Heading | undefined => {
    for (const header of headers) {
      const found = headings.find((h) => accept(h) && headingMatches(h.text, header));
      if (found) return found;
    }
    return undefined;
  };

  const match =
    pick((h) => h.level <= maxLevel) ??
    (allowInline ? pick((h) => h.level >= BOLD_HEADER_LEVEL) : undefined);
  if (!match) return null;

  const next = headings.find((h) => h.line > match.line && h.level <= match.level);
  const end = next ? next.line : lines.length;
  return lines.slice(match.line + 1, end).join("\n").trim();
}

// =============================================================================
// Lists and tables
// =============================================================================

export interface ListItem {
  text: string;
  indent: number;
}

const LIST_ITEM = /^(\s*)(?:[-*•+]|\d+[.)])\s+(.*\S)\s*$/;

export function extractListItems(section: string): ListItem[] {
  const items: ListItem[] = [];
  for (const line of splitLines(section)) {
    if (line.trim().startsWith("|")) continue;
    const match = LIST_ITEM.exec(line);
    if (match) {
      items.push({ text: stripEmphasis(match[2]), indent: match[1].replace(/\t/g, "  ").length });
    }
  }
  return items;
}

/** List items at the shallowest indentation present */
export function topLevelItems(section: string): string[] {
  const items = extractListItems(section);
  if (items.length === 0) return [];
  const minIndent = Math.min(...items.map((item) => item.indent));
  return items.filter((item) => item.indent === minIndent).map((item) => item.text);
}

export type TableRow = Record<string, string>;

function splitRow(line: string): string[] {
  return line
    .trim()
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split("|")
    .map((cell) => cell.trim());
}

function isSeparatorRow(cells: string[]): boolean {
  return cells.length > 0 && cells.every((cell) => /^:?-+:?$/.test(cell));
}

/**
 * Rows of the first pipe table in the section, keyed by lower-cased header.
 */
export function parseTable(section: string): TableRow[] {
  const tableLines: string[] = [];
  for (const line of splitLines(section)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("|") && trimmed.endsWith("|") && trimmed.length > 1) {
      tableLines.push(trimmed);
    } else if (tableLines.length > 0) {
      break;
    }
  }
  if (tableLines.length < 2) return [];

  const header = splitRow(tableLines[0]).map((cell) => normalizeHeadingText(cell));
  const rows: TableRow[] = [];
  for (const line of tableLines.slice(1)) {
    const cells = splitRow(line);
    if (isSeparatorRow(cells)) continue;
    const row: TableRow = {};
    header.forEach((key, i) => {
      if (key && !(key in row)) {
        row[key] = cells[i] ?? "";
      }
    });
    rows.push(row);
  }
  return rows;
}

/**
 * Value of the first column matching a candidate: exact header first,
 * then a header containing the candidate.
 */
export function column(row: TableRow, candidates: readonly string[]): string {
  const keys = Object.keys(row);
  for (const candidate of candidates) {
    if (candidate in row) return row[candidate].trim();
  }
  for (const candidate of candidates) {
    const key = keys.find((k) => k.includes(candidate));
    if (key !== undefined) return row[key].trim();
  }
  return "";
}

export function hasColumn(row: TableRow, candidates: readonly string[]): boolean {
  const keys = Object.keys(row);
  return candidates.some((candidate) => keys.some((k) => k === candidate || k.includes(candidate)));
}

// =============================================================================
// Text normalisation
// =============================================================================

export function stripEmphasis(text: string): string {
  return text.replace(/\*\*|__/g, "").trim();
}

/** Markup removed, whitespace collapsed */
export function cleanText(text: string): string {
  return text
    .replace(/\*\*|__/g, "")
    .replace(/^[*_\s]+|[*_\s]+$/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** First paragraph longer than 20 characters that is prose, not markup */
export function firstParagraph(text: string, maxLength = 500): string {
  for (const paragraph of text.split(/\n\s*\n/)) {
    const trimmed = paragraph.trim();
    if (/^(#|\||[-*•]\s|\d+[.)]\s)/.test(trimmed)) continue;
    const cleaned = cleanText(trimmed);
    if (cleaned.length > 20) {
      return cleaned.slice(0, maxLength);
    }
  }
  return "";
}

export function toSnakeCase(value: string): string {
  const snake = value
    .replace(/[`'"]/g, "")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .toLowerCase()
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
  return /^\d/.test(snake) ? `v_${snake}` : snake;
}

export function toKebabCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/[^A-Za-z0-9]+/g, "-")
    .toLowerCase()
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

function normalizeNumberedId(prefix: string, digits: string): string {
  return `${prefix}-${String(Number.parseInt(digits, 10)).padStart(2, "0")}`;
}

/** "F1", "F-1", "f-01" → "F-01"; null when the value carries no feature id */
export function normalizeFeatureId(value: string): string | null {
  const match = /\bF-?\s?(\d+)\b/i.exec(value);
  return match ? normalizeNumberedId("F", match[1]) : null;
}

export function normalizeRuleId(value: string): string | null {
  const match = /\bBR-?\s?(\d+)\b/i.exec(value);
  return match ? normalizeNumberedId("BR", match[1]) : null;
}

/** Every feature id mentioned in the text, normalised, in order, deduplicated */
export function featureIdsIn(text: string): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(/\bF-?\s?(\d+)\b/gi)) {
    const id = normalizeNumberedId("F", match[1]);
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function splitValues(value: string): string[] {
  return value
    .split(/[,;|/]/)
    .map((part) => cleanText(part.replace(/`/g, "")))
    .filter((part) => part.length > 0);
}
