/**
 * Flow Validator Types
 *
 * Issue codes and result shapes for deterministic validation of a
 * generated Graph Result (flow, variables, tools).
 *
 * @module validators/flow-validator.types
 */

import type { FlowNodeT } from "../schemas/flow.js";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Start/end structure of the flow
 */
export type StructureErrorCode =
  | "NO_START_NODE"
  | "MULTIPLE_START_NODES"
  | "INVALID_START_NODE"
  | "NO_END_NODE";

/**
 * Node record integrity
 */
export type NodeErrorCode =
  | "NODE_ID_MISMATCH"
  | "DUPLICATE_NODE_ID"
  | "INVALID_NODE_TYPE";

/**
 * Exit endpoints and ids
 */
export type ExitErrorCode =
  | "INVALID_EXIT_SOURCE"
  | "INVALID_EXIT_TARGET"
  | "DUPLICATE_EXIT_ID";

/**
 * Per-type node payload rules
 */
export type NodeDataErrorCode =
  | "COLLECT_NO_VARIABLE"
  | "API_NO_TOOL_ID"
  | "INVALID_TOOL_REFERENCE"
  | "CONDITION_NO_CONDITIONS"
  | "SET_VARIABLES_EMPTY"
  | "CONVERSATION_HAS_EXTRACTION";

/**
 * Graph walk from the start node
 */
export type ReachabilityErrorCode = "UNREACHABLE_NODE" | "DEAD_END_NODE";

/**
 * Variable and tool declarations
 */
export type DeclarationErrorCode =
  | "INVALID_VARIABLE_SOURCE"
  | "INVALID_VARIABLE_TYPE"
  | "DUPLICATE_VARIABLE"
  | "DUPLICATE_TOOL";

export type FlowErrorCode =
  | StructureErrorCode
  | NodeErrorCode
  | ExitErrorCode
  | NodeDataErrorCode
  | ReachabilityErrorCode
  | DeclarationErrorCode;

// =============================================================================
// Warning Codes
// =============================================================================

/**
 * Non-blocking quality issues (blocking under strict mode)
 */
export type FlowWarningCode =
  | "MISSING_NODE_NAME"
  | "COLLECT_NO_PROMPT"
  | "CONVERSATION_NO_MESSAGE"
  | "INVALID_NODE_ID"
  | "INVALID_VARIABLE_NAME"
  | "UNDECLARED_VARIABLE_REFERENCE"
  | "MULTIPLE_UNCONDITIONAL_EXITS";

export type FlowIssueCode = FlowErrorCode | FlowWarningCode;

export type ValidationSeverity = "error" | "warning";

// =============================================================================
// Issue
// =============================================================================

export type IssueLocationKind = "flow" | "node" | "exit" | "variable" | "tool";

export interface IssueLocation {
  kind: IssueLocationKind;
  /** Node/exit id, variable name or tool id; empty for flow-level issues */
  id: string;
}

export interface ValidationIssue {
  code: FlowIssueCode;
  severity: ValidationSeverity;
  message: string;
  /** JSON-path-like pointer into the Graph Result, e.g. `flow.exits[3]` */
  path: string;
  location: IssueLocation;
}

// =============================================================================
// Input/Output Types
// =============================================================================

export interface FlowValidationOptions {
  /** Promote every warning to an error */
  strict?: boolean;
}

export interface FlowValidationResult {
  /** No error-severity issue */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

// =============================================================================
// Internal Types
// =============================================================================

export interface NodeMap {
  byId: Map<string, FlowNodeT>;
  byType: Map<string, FlowNodeT[]>;
}

export interface AdjacencyLists {
  /** Forward adjacency: nodeId -> [target nodeIds] */
  forward: Map<string, string[]>;
  /** Reverse adjacency: nodeId -> [source nodeIds] */
  reverse: Map<string, string[]>;
}

// =============================================================================
// Constants
// =============================================================================

export const WARNING_CODES: ReadonlySet<FlowIssueCode> = new Set<FlowWarningCode>([
  "MISSING_NODE_NAME",
  "COLLECT_NO_PROMPT",
  "CONVERSATION_NO_MESSAGE",
  "INVALID_NODE_ID",
  "INVALID_VARIABLE_NAME",
  "UNDECLARED_VARIABLE_REFERENCE",
  "MULTIPLE_UNCONDITIONAL_EXITS",
]);

/** snake_case, leading letter or underscore */
export const VARIABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

/** `{{name}}` or `{{name.path}}`; group 1 is the root variable */
export const TEMPLATE_REFERENCE = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)(?:\.[A-Za-z0-9_.]+)?\s*\}\}/g;
