/**
 * Business-Rule Extractor
 *
 * Rule tables, `### BR-NN` blocks, or "if …, then …" prose items.
 *
 * @module parser/rule-extractor
 */

import type { BusinessRuleT } from "../schemas/document.js";
import {
  cleanText,
  column,
  featureIdsIn,
  findSection,
  hasColumn,
  listHeadings,
  normalizeRuleId,
  parseTable,
  splitLines,
  topLevelItems,
} from "./text-sections.js";

export const RULE_SECTION_HEADERS = ["Business Rules", "Rules", "Business Logic", "Policies"] as const;

const CONDITION_COLUMNS = ["condition", "when", "if", "trigger"] as const;
const ACTION_COLUMNS = ["action", "then", "do", "outcome"] as const;
const SCOPE_COLUMNS = ["applies to", "applies", "features", "feature", "scope"] as const;

/** Rule parsed before id assignment */
interface RuleDraft {
  id: string | null;
  name: string;
  condition: string;
  action: string;
  applies_to: string[];
  priority: number | null;
}

function draftsFromTable(section: string): RuleDraft[] {
  const rows = parseTable(section).filter(
    (row) => hasColumn(row, CONDITION_COLUMNS) && hasColumn(row, ACTION_COLUMNS)
  );
  return rows.map((row, i) => {
    const explicitPriority = Number.parseFloat(column(row, ["priority"]));
    return {
      id: normalizeRuleId(column(row, ["id", "rule id", "rule"])),
      name: cleanText(column(row, ["name", "title"])),
      condition: cleanText(column(row, CONDITION_COLUMNS)),
      action: cleanText(column(row, ACTION_COLUMNS)),
      applies_to: featureIdsIn(column(row, SCOPE_COLUMNS)),
      priority: Number.isFinite(explicitPriority) ? explicitPriority : rows.length - i,
    };
  });
}

function labelled(body: string, labels: readonly string[]): string {
  for (const label of labels) {
    const match = new RegExp(`^\\s*[-*]?\\s*\\**${label}\\**\\s*:\\s*(.+)$`, "im").exec(body);
    if (match) return cleanText(match[1]);
  }
  return "";
}

function draftsFromBlocks(section: string): RuleDraft[] {
  const lines = splitLines(section);
  const headings = listHeadings(lines).filter((h) => h.level <= 6);
  const drafts: RuleDraft[] = [];
  headings.forEach((heading, i) => {
    const id = normalizeRuleId(heading.raw);
    if (!id) return;
    const body = lines.slice(heading.line + 1, headings[i + 1]?.line ?? lines.length).join("\n");
    const condition = labelled(body, ["Condition", "When", "If", "Trigger"]);
    const action = labelled(body, ["Action", "Then", "Do", "Outcome"]);
    if (!condition || !action) return;
    const priority = Number.parseFloat(labelled(body, ["Priority"]));
    drafts.push({
      id,
      name: cleanText(heading.raw.replace(/^\s*BR-?\s?\d+\s*[:.\-–—]?\s*/i, "")),
      condition,
      action,
      applies_to: featureIdsIn(labelled(body, ["Applies to", "Applies To", "Features", "Scope"])),
      priority: Number.isFinite(priority) ? priority : null,
    });
  });
  return drafts;
}

const PROSE_RULE = /^(?:(BR-?\s?\d+)\s*[:.\-–—]\s*)?(?:if|when)\s+(.+?),?\s+then\s+(.+)$/i;

/**
 * "BR-03: If the order is older than 30 days, then deny the return (F-03)"
 */
export function parseProseRule(text: string): RuleDraft | null {
  const match = PROSE_RULE.exec(cleanText(text));
  if (!match) return null;
  const action = match[3].replace(/\s*\((?:applies to\s*)?(?:F-?\s?\d+[,\s]*)+\)\s*\.?$/i, "");
  return {
    id: match[1] ? normalizeRuleId(match[1]) : null,
    name: "",
    condition: cleanText(match[2]),
    action: cleanText(action).replace(/\.$/, ""),
    applies_to: featureIdsIn(text),
    priority: null,
  };
}

function draftsFromProse(section: string): RuleDraft[] {
  return topLevelItems(section)
    .map(parseProseRule)
    .filter((draft): draft is RuleDraft => draft !== null);
}

export interface RuleExtractionResult {
  rules: BusinessRuleT[];
  openQuestions: string[];
}

/**
 * Ids are normalised to BR-NN; missing or duplicate ids take the next
 * number no rule declares. Rules without explicit priority rank by document position.
 */
export function extractBusinessRules(content: string): RuleExtractionResult {
  const section = findSection(content, RULE_SECTION_HEADERS, { maxLevel: 2, allowInline: false });
  if (section === null) return { rules: [], openQuestions: [] };

  let drafts = draftsFromTable(section);
  if (drafts.length === 0) drafts = draftsFromBlocks(section);
  if (drafts.length === 0) drafts = draftsFromProse(section);

  // explicit ids are reserved before any missing id is numbered
  const taken = new Set<string>(drafts.flatMap((draft) => (draft.id ? [draft.id] : [])));
  const claimed = new Set<string>();
  const openQuestions: string[] = [];
  let nextNumber = 1;
  const nextFreeId = (): string => {
    let id = `BR-${String(nextNumber).padStart(2, "0")}`;
    while (taken.has(id)) {
      nextNumber += 1;
      id = `BR-${String(nextNumber).padStart(2, "0")}`;
    }
    return id;
  };

  const rules = drafts.map((draft, i): BusinessRuleT => {
    let id = draft.id;
    if (id && claimed.has(id)) {
      const reassigned = nextFreeId();
      openQuestions.push(`Business rule id ${id} is used more than once; the later rule was renumbered ${reassigned}`);
      id = reassigned;
    }
    if (!id) id = nextFreeId();
    claimed.add(id);
    taken.add(id);
    return {
      id,
      name: draft.name || id,
      condition: draft.condition,
      action: draft.action,
      applies_to: draft.applies_to,
      priority: draft.priority ?? drafts.length - i,
    };
  });

  return { rules, openQuestions };
}
