/**
 * Flow Validator
 *
 * Deterministic validation of a Graph Result against the flow invariants:
 * one start node, at least one end node, referential integrity of exits,
 * node payload rules, reachability from the start node and well-formed
 * variable/tool declarations.
 *
 * Validation is a pure walk. It never mutates its input, so validating the
 * same graph twice yields the same issues.
 *
 * Tiers:
 * 1. Structure - start/end nodes
 * 2. Nodes - record keys, ids, types, names
 * 3. Exits - endpoints and ids
 * 4. Node data - per-type payload rules
 * 5. Reachability - unreachable and dead-end nodes
 * 6. Declarations - variables, tools, template references
 *
 * @module validators/flow-validator
 */

import { KEBAB_CASE_PATTERN, NODE_TYPES, VARIABLE_SOURCES, VARIABLE_TYPES } from "../schemas/flow.js";
import type { ExitT, FlowNodeT, FlowT, GraphResultT } from "../schemas/flow.js";
import { log } from "../utils/telemetry.js";
import {
  TEMPLATE_REFERENCE,
  VARIABLE_NAME_PATTERN,
  WARNING_CODES,
  type AdjacencyLists,
  type FlowIssueCode,
  type FlowValidationOptions,
  type FlowValidationResult,
  type IssueLocation,
  type NodeMap,
  type ValidationIssue,
} from "./flow-validator.types.js";

const NODE_TYPE_SET: ReadonlySet<string> = new Set(NODE_TYPES);
const SOURCE_SET: ReadonlySet<string> = new Set(VARIABLE_SOURCES);
const TYPE_SET: ReadonlySet<string> = new Set(VARIABLE_TYPES);

// =============================================================================
// Helper Functions
// =============================================================================

function issue(code: FlowIssueCode, message: string, path: string, location: IssueLocation): ValidationIssue {
  return {
    code,
    severity: WARNING_CODES.has(code) ? "warning" : "error",
    message,
    path,
    location,
  };
}

function nodePath(key: string): string {
  return `flow.nodes.${key}`;
}

/**
 * Build node lookup map, keyed by record key
 */
export function buildNodeMap(flow: FlowT): NodeMap {
  const byId = new Map<string, FlowNodeT>();
  const byType = new Map<string, FlowNodeT[]>();

  for (const [key, node] of Object.entries(flow.nodes)) {
    byId.set(key, node);
    const existing = byType.get(node.type) ?? [];
    existing.push(node);
    byType.set(node.type, existing);
  }

  return { byId, byType };
}

/**
 * Build adjacency lists over exits whose endpoints both exist
 */
export function buildAdjacencyLists(exits: readonly ExitT[], nodeMap: NodeMap): AdjacencyLists {
  const forward = new Map<string, string[]>();
  const reverse = new Map<string, string[]>();

  for (const exit of exits) {
    if (!nodeMap.byId.has(exit.source_node_id) || !nodeMap.byId.has(exit.target_node_id)) continue;

    const targets = forward.get(exit.source_node_id) ?? [];
    targets.push(exit.target_node_id);
    forward.set(exit.source_node_id, targets);

    const sources = reverse.get(exit.target_node_id) ?? [];
    sources.push(exit.source_node_id);
    reverse.set(exit.target_node_id, sources);
  }

  return { forward, reverse };
}

/**
 * BFS forward from the given roots
 */
export function bfsForward(roots: readonly string[], adjacency: AdjacencyLists): Set<string> {
  const visited = new Set<string>(roots);
  const queue = [...roots];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of adjacency.forward.get(current) ?? []) {
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }

  return visited;
}

/** Root variable names of every `{{...}}` reference in the text */
export function templateReferences(text: string): string[] {
  return [...text.matchAll(TEMPLATE_REFERENCE)].map((match) => match[1]);
}

/** Texts of a node that may carry `{{variable}}` references */
export function templatedTexts(node: FlowNodeT): string[] {
  switch (node.type) {
    case "start":
      return [node.data.initial_message];
    case "collect":
      return [node.data.prompt];
    case "conversation":
      return [node.data.message];
    case "set_variables":
      return node.data.assignments.map((a) => a.value);
    case "api":
      return Object.values(node.data.parameters);
    case "condition":
      return [];
    case "end":
      return [node.data.message];
  }
}

/**
 * Roots the reachability walk starts from: the declared start node, or every
 * start-typed node when the declared one is missing.
 */
function reachabilityRoots(flow: FlowT, nodeMap: NodeMap): string[] {
  const declared = nodeMap.byId.get(flow.start_node_id);
  if (declared && declared.type === "start") return [flow.start_node_id];
  return [...nodeMap.byId.entries()].filter(([, node]) => node.type === "start").map(([key]) => key);
}

// =============================================================================
// Tier 1: Structure
// =============================================================================

function validateStructure(flow: FlowT, nodeMap: NodeMap): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const starts = nodeMap.byType.get("start") ?? [];
  const flowLocation: IssueLocation = { kind: "flow", id: "" };

  if (starts.length === 0) {
    issues.push(issue("NO_START_NODE", "Flow has no start node", "flow.nodes", flowLocation));
  } else if (starts.length > 1) {
    issues.push(
      issue(
        "MULTIPLE_START_NODES",
        `Flow has ${starts.length} start nodes: ${starts.map((n) => n.id).join(", ")}`,
        "flow.nodes",
        flowLocation
      )
    );
  }

  const declared = nodeMap.byId.get(flow.start_node_id);
  if (!declared || declared.type !== "start") {
    issues.push(
      issue(
        "INVALID_START_NODE",
        declared
          ? `start_node_id "${flow.start_node_id}" is a ${declared.type} node, not a start node`
          : `start_node_id "${flow.start_node_id}" does not exist`,
        "flow.start_node_id",
        flowLocation
      )
    );
  }

  if ((nodeMap.byType.get("end") ?? []).length === 0) {
    issues.push(issue("NO_END_NODE", "Flow has no end node", "flow.nodes", flowLocation));
  }

  return issues;
}

// =============================================================================
// Tier 2: Nodes
// =============================================================================

function validateNodes(flow: FlowT): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seenIds = new Set<string>();

  for (const [key, node] of Object.entries(flow.nodes)) {
    const location: IssueLocation = { kind: "node", id: key };
    const path = nodePath(key);

    if (node.id !== key) {
      issues.push(issue("NODE_ID_MISMATCH", `Node stored under "${key}" has id "${node.id}"`, `${path}.id`, location));
    }
    if (seenIds.has(node.id)) {
      issues.push(issue("DUPLICATE_NODE_ID", `Node id "${node.id}" is used more than once`, `${path}.id`, location));
    }
    seenIds.add(node.id);

    if (!NODE_TYPE_SET.has(node.type)) {
      issues.push(issue("INVALID_NODE_TYPE", `Node "${key}" has unknown type "${String(node.type)}"`, `${path}.type`, location));
    }
    if (!KEBAB_CASE_PATTERN.test(key)) {
      issues.push(issue("INVALID_NODE_ID", `Node id "${key}" is not kebab-case`, path, location));
    }
    if (!node.name || node.name.trim() === "") {
      issues.push(issue("MISSING_NODE_NAME", `Node "${key}" has no name`, `${path}.name`, location));
    }
  }

  return issues;
}

// =============================================================================
// Tier 3: Exits
// =============================================================================

function validateExits(flow: FlowT, nodeMap: NodeMap): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const seenIds = new Set<string>();

  flow.exits.forEach((exit, index) => {
    const path = `flow.exits[${index}]`;
    const location: IssueLocation = { kind: "exit", id: exit.id };

    if (!nodeMap.byId.has(exit.source_node_id)) {
      issues.push(
        issue("INVALID_EXIT_SOURCE", `Exit "${exit.id}" leaves unknown node "${exit.source_node_id}"`, `${path}.source_node_id`, location)
      );
    }
    if (!nodeMap.byId.has(exit.target_node_id)) {
      issues.push(
        issue("INVALID_EXIT_TARGET", `Exit "${exit.id}" enters unknown node "${exit.target_node_id}"`, `${path}.target_node_id`, location)
      );
    }
    if (seenIds.has(exit.id)) {
      issues.push(issue("DUPLICATE_EXIT_ID", `Exit id "${exit.id}" is used more than once`, `${path}.id`, location));
    }
    seenIds.add(exit.id);
  });

  // the lowest priority `always` exit shadows every later one
  const unconditional = new Map<string, ExitT[]>();
  for (const exit of flow.exits) {
    if (exit.condition.type !== "always") continue;
    unconditional.set(exit.source_node_id, [...(unconditional.get(exit.source_node_id) ?? []), exit]);
  }
  for (const [source, exits] of unconditional) {
    if (exits.length < 2) continue;
    const taken = exits.reduce((best, exit) => (exit.priority < best.priority ? exit : best));
    issues.push(
      issue(
        "MULTIPLE_UNCONDITIONAL_EXITS",
        `Node "${source}" has ${exits.length} unconditional exits; only "${taken.id}" is ever taken`,
        nodePath(source),
        { kind: "node", id: source }
      )
    );
  }

  return issues;
}

// =============================================================================
// Tier 4: Node Data
// =============================================================================

function validateNodeData(graph: GraphResultT): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const toolIds = new Set(graph.tools.map((tool) => tool.id));

  for (const [key, node] of Object.entries(graph.flow.nodes)) {
    if (!NODE_TYPE_SET.has(node.type)) continue;
    const location: IssueLocation = { kind: "node", id: key };
    const path = `${nodePath(key)}.data`;

    switch (node.type) {
      case "collect":
        if (!node.data.variable_name) {
          issues.push(issue("COLLECT_NO_VARIABLE", `Collect node "${key}" names no variable`, `${path}.variable_name`, location));
        }
        if (!node.data.prompt.trim()) {
          issues.push(issue("COLLECT_NO_PROMPT", `Collect node "${key}" has an empty prompt`, `${path}.prompt`, location));
        }
        break;
      case "api":
        if (!node.data.tool_id) {
          issues.push(issue("API_NO_TOOL_ID", `API node "${key}" names no tool`, `${path}.tool_id`, location));
        } else if (!toolIds.has(node.data.tool_id)) {
          issues.push(
            issue("INVALID_TOOL_REFERENCE", `API node "${key}" calls undeclared tool "${node.data.tool_id}"`, `${path}.tool_id`, location)
          );
        }
        break;
      case "condition":
        if (node.data.conditions.length === 0) {
          issues.push(issue("CONDITION_NO_CONDITIONS", `Condition node "${key}" has no conditions`, `${path}.conditions`, location));
        }
        break;
      case "set_variables":
        if (node.data.assignments.length === 0) {
          issues.push(issue("SET_VARIABLES_EMPTY", `Set-variables node "${key}" has no assignments`, `${path}.assignments`, location));
        }
        break;
      case "conversation":
        if (node.data.extraction_fields.length > 0) {
          issues.push(
            issue(
              "CONVERSATION_HAS_EXTRACTION",
              `Conversation node "${key}" extracts ${node.data.extraction_fields.map((f) => f.name).join(", ")}; use collect nodes`,
              `${path}.extraction_fields`,
              location
            )
          );
        }
        if (!node.data.message.trim()) {
          issues.push(issue("CONVERSATION_NO_MESSAGE", `Conversation node "${key}" has an empty message`, `${path}.message`, location));
        }
        break;
      case "start":
      case "end":
        break;
    }
  }

  return issues;
}

// =============================================================================
// Tier 5: Reachability
// =============================================================================

function validateReachability(flow: FlowT, nodeMap: NodeMap, adjacency: AdjacencyLists): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const roots = reachabilityRoots(flow, nodeMap);
  const reachable = roots.length > 0 ? bfsForward(roots, adjacency) : null;

  for (const [key, node] of nodeMap.byId) {
    const location: IssueLocation = { kind: "node", id: key };

    if (reachable && !reachable.has(key)) {
      issues.push(issue("UNREACHABLE_NODE", `Node "${key}" cannot be reached from the start node`, nodePath(key), location));
    }
    if (node.type !== "end" && (adjacency.forward.get(key) ?? []).length === 0) {
      issues.push(issue("DEAD_END_NODE", `Node "${key}" has no outgoing exit and is not an end node`, nodePath(key), location));
    }
  }

  return issues;
}

// =============================================================================
// Tier 6: Declarations
// =============================================================================

function validateDeclarations(graph: GraphResultT): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const variableNames = new Set<string>();

  graph.variables.forEach((variable, index) => {
    const path = `variables[${index}]`;
    const location: IssueLocation = { kind: "variable", id: variable.name };

    if (variableNames.has(variable.name)) {
      issues.push(issue("DUPLICATE_VARIABLE", `Variable "${variable.name}" is declared more than once`, path, location));
    }
    variableNames.add(variable.name);

    if (!SOURCE_SET.has(variable.source)) {
      issues.push(
        issue("INVALID_VARIABLE_SOURCE", `Variable "${variable.name}" has unknown source "${variable.source}"`, `${path}.source`, location)
      );
    }
    if (!TYPE_SET.has(variable.type)) {
      issues.push(issue("INVALID_VARIABLE_TYPE", `Variable "${variable.name}" has unknown type "${variable.type}"`, `${path}.type`, location));
    }
    if (!VARIABLE_NAME_PATTERN.test(variable.name)) {
      issues.push(issue("INVALID_VARIABLE_NAME", `Variable name "${variable.name}" is not snake_case`, `${path}.name`, location));
    }
  });

  const toolIds = new Set<string>();
  graph.tools.forEach((tool, index) => {
    if (toolIds.has(tool.id)) {
      issues.push(issue("DUPLICATE_TOOL", `Tool "${tool.id}" is declared more than once`, `tools[${index}]`, { kind: "tool", id: tool.id }));
    }
    toolIds.add(tool.id);
  });

  for (const [key, node] of Object.entries(graph.flow.nodes)) {
    if (!NODE_TYPE_SET.has(node.type)) continue;
    const reported = new Set<string>();
    for (const name of templatedTexts(node).flatMap(templateReferences)) {
      if (variableNames.has(name) || reported.has(name)) continue;
      reported.add(name);
      issues.push(
        issue(
          "UNDECLARED_VARIABLE_REFERENCE",
          `Node "${key}" references undeclared variable "${name}"`,
          `${nodePath(key)}.data`,
          { kind: "node", id: key }
        )
      );
    }
  }

  return issues;
}

// =============================================================================
// Main Validation Function
// =============================================================================

/**
 * Every issue of the graph in tier order, unpromoted.
 */
export function collectIssues(graph: GraphResultT): ValidationIssue[] {
  const nodeMap = buildNodeMap(graph.flow);
  const adjacency = buildAdjacencyLists(graph.flow.exits, nodeMap);

  return [
    ...validateStructure(graph.flow, nodeMap),
    ...validateNodes(graph.flow),
    ...validateExits(graph.flow, nodeMap),
    ...validateNodeData(graph),
    ...validateReachability(graph.flow, nodeMap, adjacency),
    ...validateDeclarations(graph),
  ];
}

/**
 * Validate a Graph Result. Under `strict`, warnings are reported as errors.
 */
export function validateGraph(graph: GraphResultT, options: FlowValidationOptions = {}): FlowValidationResult {
  const issues = collectIssues(graph).map((found) =>
    options.strict && found.severity === "warning" ? { ...found, severity: "error" as const } : found
  );

  const errors = issues.filter((found) => found.severity === "error");
  const warnings = issues.filter((found) => found.severity === "warning");

  log.debug(
    {
      event: "flow_validator.complete",
      nodeCount: Object.keys(graph.flow.nodes).length,
      exitCount: graph.flow.exits.length,
      errorCount: errors.length,
      warningCount: warnings.length,
      strict: Boolean(options.strict),
    },
    errors.length === 0 ? "Flow validation passed" : "Flow validation failed"
  );

  return { valid: errors.length === 0, errors, warnings };
}

/** Error and warning count together */
export function issueCount(result: FlowValidationResult): number {
  return result.errors.length + result.warnings.length;
}
