/**
 * Graph Assembler
 *
 * Builds flow segments out of features and stitches segments into one flow.
 *
 * A segment is a run of features framed by a start stub and an end stub.
 * Inside it features are chained in order: every open tail of a feature is
 * joined to the next feature's entry. Business rules become a guard
 * condition node ahead of the feature they apply to.
 *
 * Stitching re-targets exits into segment k's end stub to the node after
 * segment k+1's start stub and drops both stubs, so one segment holding
 * every feature and one segment per feature yield the same flow.
 *
 * @module generator/graph-assembler
 */

import { buildExtractionContext } from "../parser/document-parser.js";
import { buildStep, classifyStep, type FeatureExtractionContext } from "../parser/feature-extractor.js";
import { toKebabCase } from "../parser/text-sections.js";
import type { BusinessRuleT, FeatureT, FlowStepT, ParsedDocumentT } from "../schemas/document.js";
import type { ExitConditionT, ExitT, FlowNodeT, FlowT, GraphResultT } from "../schemas/flow.js";
import { applyLayout } from "../layout/deterministic.js";
import { closingMessage, initialMessage } from "../output/phrases.js";
import { exitBase, IdAllocator, stepNodeBase } from "./id-allocator.js";
import type { NamespaceAccumulator } from "./namespace.js";
import {
  buildStepNode,
  conversationNode,
  endNode,
  isTerminalStepType,
  nodeName,
  type NodeFactoryContext,
} from "./node-factory.js";

// =============================================================================
// Types
// =============================================================================

/** A pending exit: its source exists, its target is decided later */
export interface Tail {
  source: string;
  name: string;
  condition: ExitConditionT;
}

export interface AssemblyContext {
  doc: ParsedDocumentT;
  namespace: NamespaceAccumulator;
  nodeIds: IdAllocator;
  exitIds: IdAllocator;
}

export interface SegmentOptions {
  startId: string;
  endId: string;
  /** Whether the segment's last feature is the last feature of the flow */
  final: boolean;
}

export interface SegmentGraph {
  nodes: FlowNodeT[];
  exits: ExitT[];
  startId: string;
  endId: string;
  featureIds: string[];
}

interface FeatureOutcome {
  tails: Tail[];
  /** `else` tails on the nodes that led into a terminal step */
  fallback: Tail[];
  /** Unconditional exits into the terminal step */
  terminalExits: ExitT[];
  /** Condition the terminal exits take when the flow continues past them */
  terminalCondition: string;
}

export function continueTail(source: string): Tail {
  return { source, name: "Continue", condition: { type: "always" } };
}

function elseTail(source: string): Tail {
  return { source, name: "else", condition: { type: "always" } };
}

export function buildSystemPrompt(doc: ParsedDocumentT): string {
  const { metadata } = doc;
  const parts = [`You are ${metadata.name}.`];
  if (metadata.description) parts.push(metadata.description);
  parts.push(`Language: ${metadata.language}`);
  if (doc.features.length > 0) {
    parts.push("", "You can help with:");
    for (const feature of doc.features) {
      parts.push(`- ${feature.id}: ${feature.name}`);
    }
  }
  if (doc.business_rules.length > 0) {
    parts.push("", "Business rules:");
    for (const rule of doc.business_rules.slice(0, 10)) {
      parts.push(`- ${rule.id}: if ${rule.condition}, then ${rule.action}`);
    }
  }
  return parts.join("\n");
}

export function rulesFor(doc: ParsedDocumentT, featureId: string): BusinessRuleT[] {
  return doc.business_rules
    .filter((rule) => rule.applies_to.length === 0 || rule.applies_to.includes(featureId))
    .sort((a, b) => b.priority - a.priority || a.id.localeCompare(b.id));
}

// =============================================================================
// Builder
// =============================================================================

export class GraphBuilder {
  private readonly nodes = new Map<string, FlowNodeT>();
  private readonly exits: ExitT[] = [];
  private readonly extraction: FeatureExtractionContext;

  constructor(private readonly ctx: AssemblyContext) {
    const { doc } = ctx;
    this.extraction = buildExtractionContext(doc.metadata, doc.variables, doc.apis);
  }

  addNode(node: FlowNodeT): void {
    this.nodes.set(node.id, node);
  }

  connect(source: string, target: string, name: string, condition: ExitConditionT): ExitT {
    const exit: ExitT = {
      id: this.ctx.exitIds.allocate(exitBase(source, target)),
      name,
      source_node_id: source,
      target_node_id: target,
      priority: this.exits.filter((e) => e.source_node_id === source).length,
      condition,
    };
    this.exits.push(exit);
    return exit;
  }

  attach(tails: readonly Tail[], target: string): ExitT[] {
    return tails.map((tail) => this.connect(tail.source, target, tail.name, tail.condition));
  }

  addStart(baseId: string): string {
    const { metadata } = this.ctx.doc;
    const id = this.ctx.nodeIds.allocate(baseId);
    this.addNode({
      id,
      name: "Start",
      type: "start",
      position: { x: 0, y: 0 },
      data: {
        initial_message: initialMessage(metadata.name, metadata.language),
        system_prompt: buildSystemPrompt(this.ctx.doc),
      },
    });
    return id;
  }

  addEnd(baseId: string): string {
    const id = this.ctx.nodeIds.allocate(baseId);
    this.addNode(endNode({ id }, "End", "end_call", closingMessage(this.ctx.doc.metadata.language)));
    return id;
  }

  private factoryContext(id: string, featureId: string): NodeFactoryContext {
    return {
      id,
      featureId,
      variable: (name) => this.ctx.namespace.getVariable(name),
      api: (name) => this.ctx.doc.apis.find((api) => api.function_name === name),
    };
  }

  private resolveVariable(name: string, feature: FeatureT): void {
    const { namespace, doc } = this.ctx;
    const local = feature.local_variables.find((v) => v.name === name);
    if (local) {
      namespace.declareVariable(local, feature.id);
      return;
    }
    const declared = doc.variables.find((v) => v.name === name);
    if (declared) {
      namespace.declareVariable(declared, "document");
      return;
    }
    namespace.referenceVariable(name, feature.id);
  }

  private resolveTool(name: string, feature: FeatureT): void {
    const api = this.ctx.doc.apis.find((a) => a.function_name === name);
    if (api) {
      this.ctx.namespace.declareTool(api, feature.id);
    } else {
      this.ctx.namespace.referenceTool(name, feature.id);
    }
  }

  private resolveStepReferences(step: FlowStepT, feature: FeatureT): void {
    if (step.variable_name) this.resolveVariable(step.variable_name, feature);
    if (step.api_name) this.resolveTool(step.api_name, feature);
  }

  private declareFeatureNamespace(feature: FeatureT): void {
    for (const local of feature.local_variables) {
      this.ctx.namespace.declareVariable(local, feature.id);
    }
    for (const name of feature.variables_used) this.resolveVariable(name, feature);
    for (const name of feature.apis_used) this.resolveTool(name, feature);
    for (const step of feature.steps) this.resolveStepReferences(step, feature);
  }

  /**
   * Guard node with one exit per rule, highest priority first. Returns the
   * entry tails of the guarded feature: the `else` exit plus every
   * non-terminal rule action.
   */
  private addGuard(feature: FeatureT, rules: BusinessRuleT[], incoming: readonly Tail[]): Tail[] {
    const guardId = this.ctx.nodeIds.allocate(toKebabCase(`${feature.id}-guard`));
    this.addNode({
      id: guardId,
      name: `Business rules: ${feature.name}`,
      feature_id: feature.id,
      type: "condition",
      position: { x: 0, y: 0 },
      data: {
        conditions: rules.map((rule) => ({ expression: rule.condition, exit_name: `${rule.id}: ${rule.name}` })),
        default_exit: "else",
      },
    });
    this.attach(incoming, guardId);

    const entry: Tail[] = [elseTail(guardId)];
    for (const rule of rules) {
      const actionType = classifyStep(rule.action);
      const ctx = this.factoryContext(this.ctx.nodeIds.allocate(toKebabCase(`${rule.id}-${feature.id}-action`)), feature.id);
      const node = isTerminalStepType(actionType)
        ? endNode(ctx, nodeName(rule.action), actionType === "transfer" ? "transfer" : "end_call", rule.action)
        : conversationNode(ctx, nodeName(rule.action), rule.action);
      this.addNode(node);
      this.connect(guardId, node.id, `${rule.id}: ${rule.name}`, { type: "expression", expression: rule.condition });
      if (!isTerminalStepType(actionType)) entry.push(continueTail(node.id));
    }
    return entry;
  }

  /**
   * Expression exit to the branch action (or onward when there is none);
   * the `else` exit always continues to the next step.
   */
  private addBranch(feature: FeatureT, step: FlowStepT, conditionId: string, expression: string): Tail[] {
    const expressionTail: Tail = { source: conditionId, name: expression, condition: { type: "expression", expression } };
    if (!step.branch_action) {
      return [expressionTail, elseTail(conditionId)];
    }

    const parsed = buildStep(step.branch_action, step.order, this.extraction);
    const branchStep: FlowStepT = parsed.type === "condition" ? { ...parsed, type: "conversation" } : parsed;
    this.resolveStepReferences(branchStep, feature);

    const id = this.ctx.nodeIds.allocate(toKebabCase(`${feature.id}-${step.order}-branch`));
    const { node, exitStub } = buildStepNode(branchStep, this.factoryContext(id, feature.id));
    this.addNode(node);
    this.attach([expressionTail], id);

    return exitStub.kind === "terminal" ? [elseTail(conditionId)] : [continueTail(id), elseTail(conditionId)];
  }

  appendFeature(feature: FeatureT, incoming: readonly Tail[]): FeatureOutcome {
    this.declareFeatureNamespace(feature);

    const rules = rulesFor(this.ctx.doc, feature.id);
    const entry = rules.length > 0 ? this.addGuard(feature, rules, incoming) : [...incoming];

    if (feature.steps.length === 0) {
      const id = this.ctx.nodeIds.allocate(stepNodeBase(feature.id, 0, "conversation"));
      const text = feature.description || feature.name;
      this.addNode(conversationNode(this.factoryContext(id, feature.id), nodeName(feature.name), text));
      this.attach(entry, id);
      this.ctx.namespace.warn("EMPTY_FEATURE", `Feature ${feature.id} has no flow steps; a conversation node stands in for it`);
      return { tails: [continueTail(id)], fallback: entry, terminalExits: [], terminalCondition: "" };
    }

    let tails: Tail[] = entry;
    let fallback: Tail[] = entry;
    let terminalExits: ExitT[] = [];
    let terminalCondition = "";
    let terminated = false;
    const skipped: number[] = [];

    for (const step of feature.steps) {
      if (terminated) {
        skipped.push(step.order);
        continue;
      }
      const id = this.ctx.nodeIds.allocate(stepNodeBase(feature.id, step.order, step.type));
      const { node, exitStub } = buildStepNode(step, this.factoryContext(id, feature.id));
      this.addNode(node);
      const entering = this.attach(tails, id);

      switch (exitStub.kind) {
        case "continue":
          tails = [continueTail(id)];
          break;
        case "terminal":
          fallback = tails.filter((tail) => tail.condition.type === "always").map((tail) => elseTail(tail.source));
          terminalExits = entering.filter((exit) => exit.condition.type === "always");
          terminalCondition = step.description;
          tails = [];
          terminated = true;
          break;
        case "branch":
          tails = this.addBranch(feature, step, id, exitStub.expression);
          break;
      }
    }

    if (skipped.length > 0) {
      this.ctx.namespace.warn(
        "UNREACHABLE_STEPS",
        `Feature ${feature.id}: steps ${skipped.join(", ")} follow a terminal step and were skipped`
      );
    }
    return { tails, fallback, terminalExits, terminalCondition };
  }

  /**
   * Turns the unconditional exits into a terminal step into expression
   * exits so the `else` exits added after them stay reachable.
   */
  private continuePastTerminal(outcome: FeatureOutcome): Tail[] {
    const expression = outcome.terminalCondition;
    for (const exit of outcome.terminalExits) {
      exit.name = expression;
      exit.condition = { type: "expression", expression };
    }
    return outcome.fallback;
  }

  /**
   * Start stub, the features in order, end stub. When a feature that is
   * not the flow's last leaves no open tail, the exits into its terminal
   * step become expression exits and the next feature attaches to `else`
   * exits on the same nodes.
   */
  buildSegment(features: readonly FeatureT[], options: SegmentOptions): SegmentGraph {
    const startId = this.addStart(options.startId);
    let tails: Tail[] = [continueTail(startId)];

    features.forEach((feature, i) => {
      const outcome = this.appendFeature(feature, tails);
      const lastOfFlow = options.final && i === features.length - 1;
      tails = outcome.tails.length > 0 || lastOfFlow ? outcome.tails : this.continuePastTerminal(outcome);
    });

    const endId = this.addEnd(options.endId);
    this.attach(tails, endId);

    return {
      nodes: [...this.nodes.values()],
      exits: [...this.exits],
      startId,
      endId,
      featureIds: features.map((f) => f.id),
    };
  }
}

// =============================================================================
// Stitching
// =============================================================================

/**
 * Joins segments in order. Exits into segment k's end stub are re-targeted
 * to the successor of segment k+1's start stub; both stubs are removed.
 * The first segment's start and the last segment's end survive; the final
 * end is dropped when nothing reaches it and another end node exists.
 */
export function stitchSegments(segments: readonly SegmentGraph[], exitIds: IdAllocator): FlowT {
  if (segments.length === 0) {
    throw new Error("stitchSegments needs at least one segment");
  }

  const nodes = new Map<string, FlowNodeT>();
  let exits: ExitT[] = [];
  for (const segment of segments) {
    for (const node of segment.nodes) nodes.set(node.id, node);
    exits.push(...segment.exits);
  }

  for (let i = 1; i < segments.length; i += 1) {
    const previousEnd = segments[i - 1].endId;
    const stub = segments[i].startId;
    const successor = exits.find((exit) => exit.source_node_id === stub)?.target_node_id;

    const dropped = new Set<ExitT>(exits.filter((exit) => exit.source_node_id === stub));
    for (const exit of exits) {
      if (exit.target_node_id !== previousEnd) continue;
      if (successor === undefined) {
        dropped.add(exit);
        continue;
      }
      exitIds.release(exit.id);
      exit.target_node_id = successor;
      exit.id = exitIds.allocate(exitBase(exit.source_node_id, successor));
    }
    exits = exits.filter((exit) => !dropped.has(exit));
    nodes.delete(stub);
    nodes.delete(previousEnd);
  }

  const last = segments[segments.length - 1];
  const finalEnd = last.endId;
  const reached = exits.some((exit) => exit.target_node_id === finalEnd);
  const otherEnd = [...nodes.values()].some((node) => node.type === "end" && node.id !== finalEnd);
  if (!reached && otherEnd) {
    nodes.delete(finalEnd);
  }

  return {
    start_node_id: segments[0].startId,
    nodes: Object.fromEntries(nodes),
    exits,
  };
}

/**
 * Renames node and exit ids of later segments that collide with earlier
 * ones: `<id>-<kebab feature id>` first, then numeric suffixes. Segments
 * built with independent allocators need this before stitching.
 */
export function dedupeSegments(segments: readonly SegmentGraph[]): SegmentGraph[] {
  const nodeIds = new IdAllocator();
  const exitIds = new IdAllocator();

  return segments.map((segment) => {
    const renamed = new Map<string, string>();
    const fallbackFeature = segment.featureIds[0] ?? "segment";

    const nodes = segment.nodes.map((node) => {
      let id = node.id;
      if (nodeIds.has(id)) {
        id = nodeIds.allocate(`${node.id}-${toKebabCase(node.feature_id ?? fallbackFeature)}`);
      } else {
        nodeIds.reserve(id);
      }
      renamed.set(node.id, id);
      return id === node.id ? node : { ...node, id };
    });

    const exits = segment.exits.map((exit) => {
      const source = renamed.get(exit.source_node_id) ?? exit.source_node_id;
      const target = renamed.get(exit.target_node_id) ?? exit.target_node_id;
      let id = exit.id;
      if (exitIds.has(id) || source !== exit.source_node_id || target !== exit.target_node_id) {
        id = exitIds.allocate(exitBase(source, target));
      } else {
        exitIds.reserve(id);
      }
      return { ...exit, id, source_node_id: source, target_node_id: target };
    });

    return {
      nodes,
      exits,
      startId: renamed.get(segment.startId) ?? segment.startId,
      endId: renamed.get(segment.endId) ?? segment.endId,
      featureIds: segment.featureIds,
    };
  });
}

/**
 * Lays the flow out and closes the namespace into a Graph Result.
 */
export function finishGraph(flow: FlowT, doc: ParsedDocumentT, namespace: NamespaceAccumulator): GraphResultT {
  applyLayout(flow);
  const { variables, tools } = namespace.finalize(doc);
  return { flow, variables, tools };
}
