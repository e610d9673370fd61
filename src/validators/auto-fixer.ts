/**
 * Auto-Fixer
 *
 * Deterministic repair loop over validator output. Each pass clones the
 * graph and applies one transform per reported issue code; the loop stops
 * when nothing blocking remains, when a pass fails to lower the total
 * issue count, or at the iteration ceiling.
 *
 * Pass order:
 * 1. Node record - ids, unknown types
 * 2. Exits - dangling endpoints, duplicate ids
 * 3. Start node - missing, duplicated, mis-pointed
 * 4. Node data - per-type payloads, tool references, extraction fields
 * 5. Declarations - variables and tools
 * 6. Text - names, prompts, messages
 * 7. Node ids - kebab-case renames
 * 8. Reachability - end node, dead ends, unreachable nodes
 *
 * @module validators/auto-fixer
 */

import { toKebabCase, toSnakeCase } from "../parser/text-sections.js";
import type { LanguageT } from "../schemas/document.js";
import { VARIABLE_SOURCES, VARIABLE_TYPES } from "../schemas/flow.js";
import type { ExitT, FlowNodeT, GraphResultT, GraphVariableT } from "../schemas/flow.js";
import { placeholderTool } from "../generator/namespace.js";
import { exitBase, IdAllocator } from "../generator/id-allocator.js";
import { closingMessage, collectPrompt, initialMessage } from "../output/phrases.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import {
  bfsForward,
  buildAdjacencyLists,
  buildNodeMap,
  issueCount,
  templatedTexts,
  templateReferences,
  validateGraph,
} from "./flow-validator.js";
import { VARIABLE_NAME_PATTERN } from "./flow-validator.types.js";
import type { FlowIssueCode, FlowValidationResult, ValidationIssue } from "./flow-validator.types.js";

// =============================================================================
// Types
// =============================================================================

export interface AppliedFix {
  code: FlowIssueCode;
  /** Node/exit id, variable name or tool id the fix touched */
  target: string;
  description: string;
}

export interface AutoFixOptions {
  strict?: boolean;
  maxIterations?: number;
  /** Language of synthesized prompts and messages */
  language?: LanguageT;
  /** Agent name used when a start node has to be synthesized */
  agentName?: string;
}

export type AutoFixFailureReason = "no_progress" | "max_iterations";

export interface AutoFixReport {
  success: boolean;
  /** Best graph reached: the input when nothing was applied */
  graph: GraphResultT;
  iterations: number;
  fixes: AppliedFix[];
  validation: FlowValidationResult;
  remaining: ValidationIssue[];
  reason?: AutoFixFailureReason;
}

interface FixSettings {
  language: LanguageT;
  agentName: string;
}

// =============================================================================
// Enum coercion
// =============================================================================

const TYPE_SET: ReadonlySet<string> = new Set(VARIABLE_TYPES);
const SOURCE_SET: ReadonlySet<string> = new Set(VARIABLE_SOURCES);

const TYPE_ALIASES: Readonly<Record<string, string>> = {
  str: "string",
  text: "string",
  date: "string",
  datetime: "string",
  email: "string",
  phone: "string",
  int: "number",
  integer: "number",
  float: "number",
  double: "number",
  decimal: "number",
  bool: "boolean",
  flag: "boolean",
  dict: "object",
  map: "object",
  json: "object",
  list: "array",
};

const SOURCE_ALIASES: Readonly<Record<string, string>> = {
  input: "user",
  user_input: "user",
  caller: "user",
  customer: "user",
  prompt: "collect",
  question: "collect",
  collected: "collect",
  api: "tool",
  system: "tool",
  tool_output: "tool",
};

export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i += 1) {
    const current = [i];
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost));
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Closest enum member: exact (case-insensitive), alias table, then the
 * smallest edit distance with ties going to the earlier member.
 */
export function nearestMember(value: string, members: readonly string[], aliases: Readonly<Record<string, string>>): string {
  const normalized = value.trim().toLowerCase();
  if (members.includes(normalized)) return normalized;
  const alias = aliases[normalized];
  if (alias !== undefined) return alias;

  let best = members[0];
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const member of members) {
    const distance = editDistance(normalized, member);
    if (distance < bestDistance) {
      best = member;
      bestDistance = distance;
    }
  }
  return best;
}

export function nearestVariableType(value: string): string {
  return nearestMember(value, VARIABLE_TYPES, TYPE_ALIASES);
}

export function nearestVariableSource(value: string): string {
  return nearestMember(value, VARIABLE_SOURCES, SOURCE_ALIASES);
}

/** "f-01-1-collect" → "F 01 1 Collect" */
export function nameFromId(id: string): string {
  return id
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

// =============================================================================
// Fix pass
// =============================================================================

function inlineVariable(name: string, type = "string"): GraphVariableT {
  return {
    name,
    type,
    description: "",
    source: "collect",
    required: false,
    default: null,
    options: [],
    validation_rules: [],
    collection_mode: "explicit",
  };
}

function replaceTemplates(text: string, from: string, to: string): string {
  return text.replace(/\{\{\s*([A-Za-z_][A-Za-z0-9_]*)((?:\.[A-Za-z0-9_.]+)?)\s*\}\}/g, (match, root: string, rest: string) =>
    root === from ? `{{${to}${rest}}}` : match
  );
}

/**
 * One repair pass over a private copy of the graph.
 */
class FixPass {
  readonly graph: GraphResultT;
  readonly fixes: AppliedFix[] = [];
  private readonly codes: ReadonlySet<FlowIssueCode>;
  private readonly exitIds: IdAllocator;

  constructor(
    source: GraphResultT,
    private readonly issues: readonly ValidationIssue[],
    private readonly settings: FixSettings
  ) {
    this.graph = structuredClone(source);
    this.codes = new Set(issues.map((found) => found.code));
    this.exitIds = new IdAllocator(this.graph.flow.exits.map((exit) => exit.id));
  }

  private record(code: FlowIssueCode, target: string, description: string): void {
    this.fixes.push({ code, target, description });
  }

  private targetsOf(code: FlowIssueCode): string[] {
    const ids: string[] = [];
    for (const found of this.issues) {
      if (found.code === code && !ids.includes(found.location.id)) ids.push(found.location.id);
    }
    return ids;
  }

  private get nodes(): Record<string, FlowNodeT> {
    return this.graph.flow.nodes;
  }

  private addExit(source: string, target: string): ExitT {
    const exit: ExitT = {
      id: this.exitIds.allocate(exitBase(source, target)),
      name: "Continue",
      source_node_id: source,
      target_node_id: target,
      priority: this.graph.flow.exits.filter((e) => e.source_node_id === source).length,
      condition: { type: "always" },
    };
    this.graph.flow.exits.push(exit);
    return exit;
  }

  /** Expression exit evaluated ahead of every other exit of `source` */
  private addRoute(source: string, target: string, expression: string): ExitT {
    for (const exit of this.graph.flow.exits) {
      if (exit.source_node_id === source) exit.priority += 1;
    }
    const exit: ExitT = {
      id: this.exitIds.allocate(exitBase(source, target)),
      name: expression,
      source_node_id: source,
      target_node_id: target,
      priority: 0,
      condition: { type: "expression", expression },
    };
    this.graph.flow.exits.push(exit);
    return exit;
  }

  private retarget(exit: ExitT, target: string): void {
    this.exitIds.release(exit.id);
    exit.target_node_id = target;
    exit.id = this.exitIds.allocate(exitBase(exit.source_node_id, target));
  }

  private asConversation(key: string, node: FlowNodeT, message: string): void {
    this.nodes[key] = {
      id: node.id,
      name: node.name,
      ...(node.feature_id ? { feature_id: node.feature_id } : {}),
      position: { ...node.position },
      type: "conversation",
      data: { message, extraction_fields: [] },
    };
  }

  run(): void {
    this.fixNodeRecord();
    this.fixExits();
    this.fixUnconditionalExits();
    this.fixStart();
    this.fixNodeData();
    this.fixDeclarations();
    this.fixTexts();
    this.fixNodeIds();
    this.fixReachability();
  }

  // ---------------------------------------------------------------------------
  // 1. Node record
  // ---------------------------------------------------------------------------

  private fixNodeRecord(): void {
    for (const code of ["NODE_ID_MISMATCH", "DUPLICATE_NODE_ID"] as const) {
      for (const key of this.targetsOf(code)) {
        const node = this.nodes[key];
        if (!node || node.id === key) continue;
        this.record(code, key, `Node id "${node.id}" reset to its record key "${key}"`);
        node.id = key;
      }
    }

    for (const key of this.targetsOf("INVALID_NODE_TYPE")) {
      const node = this.nodes[key];
      if (!node) continue;
      this.asConversation(key, node, node.name || nameFromId(key));
      this.record("INVALID_NODE_TYPE", key, `Node "${key}" converted to a conversation node`);
    }
  }

  // ---------------------------------------------------------------------------
  // 2. Exits
  // ---------------------------------------------------------------------------

  private fixExits(): void {
    const dropSource = this.codes.has("INVALID_EXIT_SOURCE");
    const dropTarget = this.codes.has("INVALID_EXIT_TARGET");
    if (dropSource || dropTarget) {
      this.graph.flow.exits = this.graph.flow.exits.filter((exit) => {
        const badSource = dropSource && !(exit.source_node_id in this.nodes);
        const badTarget = dropTarget && !(exit.target_node_id in this.nodes);
        if (badSource || badTarget) {
          this.record(badSource ? "INVALID_EXIT_SOURCE" : "INVALID_EXIT_TARGET", exit.id, `Exit "${exit.id}" dropped`);
          return false;
        }
        return true;
      });
    }

    if (this.codes.has("DUPLICATE_EXIT_ID")) {
      const seen = new Set<string>();
      for (const exit of this.graph.flow.exits) {
        if (seen.has(exit.id)) {
          const previous = exit.id;
          exit.id = this.exitIds.allocate(exit.id);
          this.record("DUPLICATE_EXIT_ID", previous, `Duplicate exit renamed to "${exit.id}"`);
        }
        seen.add(exit.id);
      }
    }
  }

  /**
   * The exit that already wins stays `always`; every other `always` exit of
   * the node becomes an expression exit named after its target and moves
   * ahead of it.
   */
  private fixUnconditionalExits(): void {
    for (const source of this.targetsOf("MULTIPLE_UNCONDITIONAL_EXITS")) {
      const outgoing = this.graph.flow.exits
        .filter((exit) => exit.source_node_id === source)
        .sort((a, b) => a.priority - b.priority);
      const fallthrough = outgoing.find((exit) => exit.condition.type === "always");
      if (!fallthrough) continue;

      for (const exit of outgoing) {
        if (exit === fallthrough || exit.condition.type !== "always") continue;
        const expression = this.nodes[exit.target_node_id]?.name || nameFromId(exit.target_node_id);
        exit.name = expression;
        exit.condition = { type: "expression", expression };
      }
      [...outgoing.filter((exit) => exit !== fallthrough), fallthrough].forEach((exit, i) => {
        exit.priority = i;
      });
      this.record("MULTIPLE_UNCONDITIONAL_EXITS", source, `Exits of "${source}" other than "${fallthrough.id}" made conditional`);
    }
  }

  // ---------------------------------------------------------------------------
  // 3. Start node
  // ---------------------------------------------------------------------------

  private fixStart(): void {
    const { flow } = this.graph;

    if (this.codes.has("NO_START_NODE")) {
      const taken = new IdAllocator(Object.keys(this.nodes));
      const id = taken.allocate("start");
      const firstTarget =
        Object.keys(this.nodes).find((key) => !flow.exits.some((exit) => exit.target_node_id === key)) ??
        Object.keys(this.nodes)[0];
      this.nodes[id] = {
        id,
        name: "Start",
        position: { x: 0, y: 0 },
        type: "start",
        data: { initial_message: initialMessage(this.settings.agentName, this.settings.language), system_prompt: "" },
      };
      flow.start_node_id = id;
      if (firstTarget !== undefined) this.addExit(id, firstTarget);
      this.record("NO_START_NODE", id, `Start node "${id}" added`);
      return;
    }

    const starts = Object.entries(this.nodes).filter(([, node]) => node.type === "start");
    const declared = this.nodes[flow.start_node_id];
    const keep = declared && declared.type === "start" ? flow.start_node_id : starts[0]?.[0];
    if (keep === undefined) return;

    if (this.codes.has("MULTIPLE_START_NODES")) {
      for (const [key, node] of starts) {
        if (key === keep || node.type !== "start") continue;
        this.asConversation(key, node, node.data.initial_message);
        this.record("MULTIPLE_START_NODES", key, `Extra start node "${key}" converted to a conversation node`);
      }
    }

    if (this.codes.has("INVALID_START_NODE") && flow.start_node_id !== keep) {
      this.record("INVALID_START_NODE", keep, `start_node_id re-pointed from "${flow.start_node_id}" to "${keep}"`);
      flow.start_node_id = keep;
    }
  }

  // ---------------------------------------------------------------------------
  // 4. Node data
  // ---------------------------------------------------------------------------

  private fixNodeData(): void {
    for (const key of this.targetsOf("COLLECT_NO_VARIABLE")) {
      const node = this.nodes[key];
      if (node?.type !== "collect") continue;
      this.asConversation(key, node, node.data.prompt || node.name);
      this.record("COLLECT_NO_VARIABLE", key, `Collect node "${key}" without a variable converted to a conversation node`);
    }

    for (const key of this.targetsOf("API_NO_TOOL_ID")) {
      const node = this.nodes[key];
      if (node?.type !== "api") continue;
      this.asConversation(key, node, node.name || nameFromId(key));
      this.record("API_NO_TOOL_ID", key, `API node "${key}" without a tool converted to a conversation node`);
    }

    for (const key of this.targetsOf("CONDITION_NO_CONDITIONS")) {
      const node = this.nodes[key];
      if (node?.type !== "condition") continue;
      this.asConversation(key, node, node.name || nameFromId(key));
      this.record("CONDITION_NO_CONDITIONS", key, `Condition node "${key}" without conditions converted to a conversation node`);
    }

    for (const key of this.targetsOf("SET_VARIABLES_EMPTY")) {
      const node = this.nodes[key];
      if (node?.type !== "set_variables") continue;
      this.asConversation(key, node, node.name || nameFromId(key));
      this.record("SET_VARIABLES_EMPTY", key, `Empty set-variables node "${key}" converted to a conversation node`);
    }

    for (const key of this.targetsOf("INVALID_TOOL_REFERENCE")) {
      const node = this.nodes[key];
      if (node?.type !== "api" || this.graph.tools.some((tool) => tool.id === node.data.tool_id)) continue;
      this.graph.tools.push(placeholderTool(node.data.tool_id));
      this.record("INVALID_TOOL_REFERENCE", node.data.tool_id, `Placeholder tool "${node.data.tool_id}" added`);
    }

    for (const key of this.targetsOf("CONVERSATION_HAS_EXTRACTION")) {
      this.splitExtraction(key);
    }
  }

  /**
   * Moves each extraction field of a conversation node into its own collect
   * node, chained ahead of the conversation.
   */
  private splitExtraction(key: string): void {
    const node = this.nodes[key];
    if (node?.type !== "conversation" || node.data.extraction_fields.length === 0) return;

    const taken = new IdAllocator(Object.keys(this.nodes));
    const collectIds = node.data.extraction_fields.map((field) => {
      const id = taken.allocate(`${key}-collect-${toKebabCase(field.name) || "field"}`);
      this.nodes[id] = {
        id,
        name: `Collect ${field.name.replace(/_/g, " ")}`,
        ...(node.feature_id ? { feature_id: node.feature_id } : {}),
        position: { ...node.position },
        type: "collect",
        data: {
          variable_name: field.name,
          fields: [{ name: field.name, type: field.type, description: field.description, required: true }],
          prompt: collectPrompt(field.name, this.settings.language),
          retry_count: 3,
        },
      };
      if (!this.graph.variables.some((variable) => variable.name === field.name)) {
        this.graph.variables.push(inlineVariable(field.name, nearestVariableType(field.type)));
      }
      return id;
    });

    for (const exit of this.graph.flow.exits) {
      if (exit.target_node_id === key) this.retarget(exit, collectIds[0]);
    }
    [...collectIds, key].forEach((id, i, chain) => {
      if (i > 0) this.addExit(chain[i - 1], id);
    });

    this.nodes[key] = { ...node, data: { ...node.data, extraction_fields: [] } };
    this.record("CONVERSATION_HAS_EXTRACTION", key, `Extraction fields of "${key}" moved into ${collectIds.length} collect node(s)`);
  }

  // ---------------------------------------------------------------------------
  // 5. Declarations
  // ---------------------------------------------------------------------------

  private fixDeclarations(): void {
    if (this.codes.has("DUPLICATE_VARIABLE")) {
      const seen = new Set<string>();
      this.graph.variables = this.graph.variables.filter((variable) => {
        if (!seen.has(variable.name)) {
          seen.add(variable.name);
          return true;
        }
        this.record("DUPLICATE_VARIABLE", variable.name, `Later declaration of "${variable.name}" dropped`);
        return false;
      });
    }

    if (this.codes.has("DUPLICATE_TOOL")) {
      const seen = new Set<string>();
      this.graph.tools = this.graph.tools.filter((tool) => {
        if (!seen.has(tool.id)) {
          seen.add(tool.id);
          return true;
        }
        this.record("DUPLICATE_TOOL", tool.id, `Later declaration of tool "${tool.id}" dropped`);
        return false;
      });
    }

    for (const variable of this.graph.variables) {
      if (this.codes.has("INVALID_VARIABLE_TYPE") && !TYPE_SET.has(variable.type)) {
        const coerced = nearestVariableType(variable.type);
        this.record("INVALID_VARIABLE_TYPE", variable.name, `Type "${variable.type}" coerced to "${coerced}"`);
        variable.type = coerced;
      }
      if (this.codes.has("INVALID_VARIABLE_SOURCE") && !SOURCE_SET.has(variable.source)) {
        const coerced = nearestVariableSource(variable.source);
        this.record("INVALID_VARIABLE_SOURCE", variable.name, `Source "${variable.source}" coerced to "${coerced}"`);
        variable.source = coerced;
      }
    }

    for (const name of this.targetsOf("INVALID_VARIABLE_NAME")) {
      this.renameVariable(name);
    }

    for (const key of this.targetsOf("UNDECLARED_VARIABLE_REFERENCE")) {
      const node = this.nodes[key];
      if (!node) continue;
      for (const name of templatedTexts(node).flatMap(templateReferences)) {
        if (this.graph.variables.some((variable) => variable.name === name)) continue;
        this.graph.variables.push(inlineVariable(name));
        this.record("UNDECLARED_VARIABLE_REFERENCE", name, `Variable "${name}" declared for node "${key}"`);
      }
    }
  }

  private renameVariable(name: string): void {
    const taken = new Set(this.graph.variables.map((variable) => variable.name));
    const base = toSnakeCase(name) || "variable";
    let renamed = VARIABLE_NAME_PATTERN.test(base) ? base : `v_${base}`;
    for (let n = 2; taken.has(renamed); n += 1) renamed = `${base}_${n}`;

    for (const variable of this.graph.variables) {
      if (variable.name === name) variable.name = renamed;
    }

    for (const node of Object.values(this.nodes)) {
      const swap = (text: string): string => replaceTemplates(text, name, renamed);
      switch (node.type) {
        case "start":
          node.data.initial_message = swap(node.data.initial_message);
          break;
        case "collect":
          if (node.data.variable_name === name) node.data.variable_name = renamed;
          for (const field of node.data.fields) if (field.name === name) field.name = renamed;
          node.data.prompt = swap(node.data.prompt);
          break;
        case "conversation":
          node.data.message = swap(node.data.message);
          break;
        case "set_variables":
          for (const assignment of node.data.assignments) {
            if (assignment.variable === name) assignment.variable = renamed;
            assignment.value = swap(assignment.value);
          }
          break;
        case "api":
          for (const extraction of node.data.extractions) if (extraction.variable === name) extraction.variable = renamed;
          for (const parameter of Object.keys(node.data.parameters)) {
            node.data.parameters[parameter] = swap(node.data.parameters[parameter]);
          }
          break;
        case "condition":
          break;
        case "end":
          node.data.message = swap(node.data.message);
          break;
      }
    }

    this.record("INVALID_VARIABLE_NAME", name, `Variable "${name}" renamed to "${renamed}"`);
  }

  // ---------------------------------------------------------------------------
  // 6. Text
  // ---------------------------------------------------------------------------

  private fixTexts(): void {
    for (const key of this.targetsOf("MISSING_NODE_NAME")) {
      const node = this.nodes[key];
      if (!node) continue;
      node.name = nameFromId(key);
      this.record("MISSING_NODE_NAME", key, `Node named "${node.name}"`);
    }

    for (const key of this.targetsOf("COLLECT_NO_PROMPT")) {
      const node = this.nodes[key];
      if (node?.type !== "collect") continue;
      node.data.prompt = collectPrompt(node.data.variable_name || "answer", this.settings.language);
      this.record("COLLECT_NO_PROMPT", key, `Prompt set to "${node.data.prompt}"`);
    }

    for (const key of this.targetsOf("CONVERSATION_NO_MESSAGE")) {
      const node = this.nodes[key];
      if (node?.type !== "conversation") continue;
      node.data.message = node.name || nameFromId(key);
      this.record("CONVERSATION_NO_MESSAGE", key, `Message set to "${node.data.message}"`);
    }
  }

  // ---------------------------------------------------------------------------
  // 7. Node ids
  // ---------------------------------------------------------------------------

  private fixNodeIds(): void {
    const targets = this.targetsOf("INVALID_NODE_ID").filter((key) => key in this.nodes);
    if (targets.length === 0) return;

    const taken = new IdAllocator(Object.keys(this.nodes));
    const renames = new Map<string, string>();
    for (const key of targets) {
      taken.release(key);
      renames.set(key, taken.allocate(toKebabCase(key) || "node"));
    }

    const { flow } = this.graph;
    flow.nodes = Object.fromEntries(
      Object.entries(flow.nodes).map(([key, node]) => {
        const id = renames.get(key) ?? key;
        return [id, id === key ? node : { ...node, id }];
      })
    );
    flow.start_node_id = renames.get(flow.start_node_id) ?? flow.start_node_id;
    for (const exit of flow.exits) {
      const source = renames.get(exit.source_node_id);
      const target = renames.get(exit.target_node_id);
      if (source === undefined && target === undefined) continue;
      exit.source_node_id = source ?? exit.source_node_id;
      this.retarget(exit, target ?? exit.target_node_id);
    }

    for (const [from, to] of renames) {
      this.record("INVALID_NODE_ID", from, `Node "${from}" renamed to "${to}"`);
    }
  }

  // ---------------------------------------------------------------------------
  // 8. Reachability
  // ---------------------------------------------------------------------------

  private endTarget(code: FlowIssueCode): string {
    const existing = Object.entries(this.nodes).find(([, node]) => node.type === "end");
    if (existing) return existing[0];

    const id = new IdAllocator(Object.keys(this.nodes)).allocate("auto-end");
    this.nodes[id] = {
      id,
      name: "End",
      position: { x: 0, y: 0 },
      type: "end",
      data: { end_type: "end_call", message: closingMessage(this.settings.language) },
    };
    this.record(code, id, `End node "${id}" added`);
    return id;
  }

  private fixReachability(): void {
    if (this.codes.has("NO_END_NODE") || this.codes.has("DEAD_END_NODE")) {
      const code: FlowIssueCode = this.codes.has("NO_END_NODE") ? "NO_END_NODE" : "DEAD_END_NODE";
      const deadEnds = Object.entries(this.nodes)
        .filter(([key, node]) => node.type !== "end" && !this.graph.flow.exits.some((exit) => exit.source_node_id === key))
        .map(([key]) => key);
      const end = this.endTarget(code);
      for (const key of deadEnds) {
        this.addExit(key, end);
        this.record("DEAD_END_NODE", key, `Exit from "${key}" to "${end}" added`);
      }
    }

    if (this.codes.has("UNREACHABLE_NODE")) {
      const start = this.graph.flow.start_node_id;
      if (this.nodes[start]?.type !== "start") return;
      for (const key of Object.keys(this.nodes)) {
        const nodeMap = buildNodeMap(this.graph.flow);
        const reachable = bfsForward([start], buildAdjacencyLists(this.graph.flow.exits, nodeMap));
        if (reachable.has(key)) continue;
        this.addRoute(start, key, this.nodes[key]?.name || nameFromId(key));
        this.record("UNREACHABLE_NODE", key, `Exit from "${start}" to "${key}" added`);
      }
    }
  }
}

// =============================================================================
// Loop
// =============================================================================

/**
 * Apply one repair pass for the given issues. Never mutates `graph`.
 */
export function applyFixes(
  graph: GraphResultT,
  issues: readonly ValidationIssue[],
  options: Pick<AutoFixOptions, "language" | "agentName"> = {}
): { graph: GraphResultT; fixes: AppliedFix[] } {
  const pass = new FixPass(graph, issues, {
    language: options.language ?? "en-US",
    agentName: options.agentName ?? "our service",
  });
  pass.run();
  return { graph: pass.graph, fixes: pass.fixes };
}

/**
 * Validate, repair, re-validate until nothing blocking remains.
 *
 * Fails with `no_progress` when a pass does not strictly lower the total
 * issue count, and with `max_iterations` at the ceiling.
 */
export function runAutoFix(graph: GraphResultT, options: AutoFixOptions = {}): AutoFixReport {
  const strict = Boolean(options.strict);
  const maxIterations = options.maxIterations ?? 5;

  let current = graph;
  let validation = validateGraph(current, { strict });
  const fixes: AppliedFix[] = [];
  let iterations = 0;

  const report = (success: boolean, reason?: AutoFixFailureReason): AutoFixReport => {
    const remaining = [...validation.errors, ...validation.warnings];
    const outcome: AutoFixReport = { success, graph: current, iterations, fixes, validation, remaining };
    if (reason) outcome.reason = reason;
    log.debug({ success, iterations, fixCount: fixes.length, remaining: remaining.length, reason }, "auto-fix finished");
    return outcome;
  };

  while (validation.errors.length > 0) {
    if (iterations >= maxIterations) {
      return report(false, "max_iterations");
    }

    const pass = applyFixes(current, [...validation.errors, ...validation.warnings], options);
    iterations += 1;
    const next = validateGraph(pass.graph, { strict });

    emit(TelemetryEvents.AutoFixIteration, {
      iteration: iterations,
      fixes: pass.fixes.length,
      issues_before: issueCount(validation),
      issues_after: issueCount(next),
    });

    if (issueCount(next) >= issueCount(validation)) {
      return report(false, "no_progress");
    }

    current = pass.graph;
    validation = next;
    fixes.push(...pass.fixes);
  }

  return report(true);
}
