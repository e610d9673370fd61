/**
 * Validators module
 *
 * Exports deterministic validation and repair for generated flow graphs.
 */

export {
  validateGraph,
  collectIssues,
  issueCount,
  buildNodeMap,
  buildAdjacencyLists,
  bfsForward,
  templateReferences,
} from './flow-validator.js';

export {
  runAutoFix,
  applyFixes,
  nearestVariableType,
  nearestVariableSource,
  nameFromId,
  type AppliedFix,
  type AutoFixOptions,
  type AutoFixReport,
  type AutoFixFailureReason,
} from './auto-fixer.js';

export {
  type FlowValidationOptions,
  type FlowValidationResult,
  type ValidationIssue,
  type ValidationSeverity,
  type IssueLocation,
  type IssueLocationKind,
  type FlowIssueCode,
  type FlowErrorCode,
  type FlowWarningCode,
  type StructureErrorCode,
  type NodeErrorCode,
  type ExitErrorCode,
  type NodeDataErrorCode,
  type ReachabilityErrorCode,
  type DeclarationErrorCode,
  type NodeMap,
  type AdjacencyLists,
  WARNING_CODES,
} from './flow-validator.types.js';
