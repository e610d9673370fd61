/**
 * Node Factory
 *
 * Maps one flow step to one typed flow node plus a description of its
 * outgoing edge. The match over step types is exhaustive: a new step type
 * fails to compile here until it is handled.
 *
 * @module generator/node-factory
 */

import type { ApiT, FlowStepT, StepTypeT } from "../schemas/document.js";
import type { CollectFieldT, EndTypeT, FlowNodeT, GraphVariableT } from "../schemas/flow.js";

/**
 * How the graph continues after a node:
 * - continue: one unconditional exit to whatever comes next
 * - terminal: no exits
 * - branch: an expression exit and an `else` exit
 */
export type ExitStub =
  | { kind: "continue" }
  | { kind: "terminal" }
  | { kind: "branch"; expression: string };

export interface StepNodeResult {
  node: FlowNodeT;
  exitStub: ExitStub;
}

export interface NodeFactoryContext {
  /** Allocated node id */
  id: string;
  featureId?: string;
  /** Namespace lookup for collect fields */
  variable?: (name: string) => GraphVariableT | undefined;
  /** Document lookup for API parameters and extractions */
  api?: (name: string) => ApiT | undefined;
}

const ORIGIN = { x: 0, y: 0 };
const MAX_NAME_LENGTH = 60;

export function nodeName(text: string): string {
  const trimmed = text.trim().replace(/\.$/, "");
  if (trimmed.length <= MAX_NAME_LENGTH) return trimmed;
  return `${trimmed.slice(0, MAX_NAME_LENGTH - 1).trimEnd()}…`;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled step type: ${String(value)}`);
}

function base(ctx: NodeFactoryContext, name: string): { id: string; name: string; feature_id?: string; position: { x: number; y: number } } {
  return ctx.featureId
    ? { id: ctx.id, name, feature_id: ctx.featureId, position: { ...ORIGIN } }
    : { id: ctx.id, name, position: { ...ORIGIN } };
}

function collectFields(variableName: string, step: FlowStepT, ctx: NodeFactoryContext): CollectFieldT[] {
  if (!variableName) return [];
  const variable = ctx.variable?.(variableName);
  return [
    {
      name: variableName,
      type: variable?.type ?? "string",
      description: variable?.description || step.description,
      required: variable?.required ?? true,
    },
  ];
}

export function endNode(ctx: NodeFactoryContext, name: string, endType: EndTypeT, message: string): FlowNodeT {
  return { ...base(ctx, name), type: "end", data: { end_type: endType, message } };
}

export function conversationNode(ctx: NodeFactoryContext, name: string, message: string): FlowNodeT {
  return { ...base(ctx, name), type: "conversation", data: { message, extraction_fields: [] } };
}

export function isTerminalStepType(type: StepTypeT): boolean {
  return type === "transfer" || type === "end";
}

export function buildStepNode(step: FlowStepT, ctx: NodeFactoryContext): StepNodeResult {
  const name = nodeName(step.description);
  const type = step.type;

  switch (type) {
    case "collect": {
      const variableName = step.variable_name ?? "";
      return {
        node: {
          ...base(ctx, name),
          type: "collect",
          data: {
            variable_name: variableName,
            fields: collectFields(variableName, step, ctx),
            prompt: step.description,
            retry_count: 3,
          },
        },
        exitStub: { kind: "continue" },
      };
    }
    case "api_call": {
      const toolId = step.api_name ?? "";
      const api = toolId ? ctx.api?.(toolId) : undefined;
      const parameters: Record<string, string> = {};
      for (const parameter of api?.parameters ?? []) {
        parameters[parameter.name] = `{{${parameter.name}}}`;
      }
      return {
        node: {
          ...base(ctx, name),
          type: "api",
          data: {
            tool_id: toolId,
            parameters,
            extractions: (api?.extractions ?? []).map((e) => ({ ...e })),
          },
        },
        exitStub: { kind: "continue" },
      };
    }
    case "condition": {
      const expression = step.condition || step.description;
      return {
        node: {
          ...base(ctx, name),
          type: "condition",
          data: { conditions: [{ expression, exit_name: expression }], default_exit: "else" },
        },
        exitStub: { kind: "branch", expression },
      };
    }
    case "conversation":
      return { node: conversationNode(ctx, name, step.description), exitStub: { kind: "continue" } };
    case "set_variable":
      return {
        node: {
          ...base(ctx, name),
          type: "set_variables",
          data: {
            assignments: step.variable_name ? [{ variable: step.variable_name, value: step.value ?? "true" }] : [],
          },
        },
        exitStub: { kind: "continue" },
      };
    case "transfer":
      return { node: endNode(ctx, name, "transfer", step.description), exitStub: { kind: "terminal" } };
    case "end":
      return { node: endNode(ctx, name, "end_call", step.description), exitStub: { kind: "terminal" } };
    default:
      return assertNever(type);
  }
}
