/**
 * Shared Namespace Accumulator
 *
 * One variable/tool namespace threaded through every strategy call, so that
 * chunks and hybrid segments generated separately still agree on a single
 * declaration per name.
 *
 * Merge rules:
 * - first declaration wins;
 * - a later declaration differing in source, required or description warns;
 * - a later explicit declaration with a different type throws
 *   GenerationError, unless either side is an inline-only reference (then it
 *   warns and the explicit type is kept);
 * - references to unknown variables declare an inline string collected from
 *   the user; references to unknown APIs declare a placeholder tool and warn.
 *
 * @module generator/namespace
 */

import type { ApiT, ParsedDocumentT, VariableT } from "../schemas/document.js";
import type { GraphToolT, GraphVariableT } from "../schemas/flow.js";
import { GenerationError } from "../utils/errors.js";

export type GenerationWarningCode =
  | "VARIABLE_CONFLICT"
  | "TOOL_CONFLICT"
  | "UNDECLARED_API"
  | "UNREACHABLE_STEPS"
  | "EMPTY_FEATURE";

export interface GenerationWarning {
  code: GenerationWarningCode;
  message: string;
}

type Origin = "declared" | "inline" | "reference";

interface VariableEntry {
  variable: GraphVariableT;
  origin: Origin;
  scope: string;
}

export function toGraphVariable(variable: VariableT): GraphVariableT {
  return {
    name: variable.name,
    type: variable.type,
    description: variable.description,
    source: variable.source,
    required: variable.required,
    default: variable.default,
    options: [...variable.options],
    validation_rules: [...variable.validation_rules],
    collection_mode: variable.collection_mode,
  };
}

export function toGraphTool(api: ApiT): GraphToolT {
  return {
    id: api.function_name,
    name: api.name,
    description: api.description,
    method: api.method,
    endpoint: api.endpoint,
    parameters: api.parameters.map((p) => ({ ...p })),
    extractions: api.extractions.map((e) => ({ ...e })),
    error_handlers: api.error_handlers.map((h) => ({ ...h })),
    placeholder: false,
  };
}

export function placeholderTool(id: string): GraphToolT {
  return {
    id,
    name: id,
    description: `Placeholder for undeclared API "${id}"`,
    method: "POST",
    endpoint: "",
    parameters: [],
    extractions: [],
    error_handlers: [],
    placeholder: true,
  };
}

function referenceVariable(name: string): GraphVariableT {
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
  };
}

export class NamespaceAccumulator {
  private readonly variableEntries = new Map<string, VariableEntry>();
  private readonly toolEntries = new Map<string, GraphToolT>();
  readonly warnings: GenerationWarning[] = [];

  hasVariable(name: string): boolean {
    return this.variableEntries.has(name);
  }

  getVariable(name: string): GraphVariableT | undefined {
    return this.variableEntries.get(name)?.variable;
  }

  hasTool(id: string): boolean {
    return this.toolEntries.has(id);
  }

  getTool(id: string): GraphToolT | undefined {
    return this.toolEntries.get(id);
  }

  declareVariable(variable: VariableT, scope: string): GraphVariableT {
    const origin: Origin = variable.origin;
    const existing = this.variableEntries.get(variable.name);
    const incoming = toGraphVariable(variable);

    if (!existing || existing.origin === "reference") {
      this.variableEntries.set(variable.name, { variable: incoming, origin, scope });
      return incoming;
    }

    const kept = existing.variable;
    if (kept.type !== incoming.type) {
      if (existing.origin === "declared" && origin === "declared") {
        throw new GenerationError(
          `Variable "${variable.name}" is declared as ${kept.type} in ${existing.scope} and as ${incoming.type} in ${scope}`,
          { variable: variable.name, types: [kept.type, incoming.type], scopes: [existing.scope, scope] }
        );
      }
      this.warn(
        "VARIABLE_CONFLICT",
        `Variable "${variable.name}" has type ${kept.type} in ${existing.scope} and ${incoming.type} in ${scope}`
      );
      if (existing.origin === "inline" && origin === "declared") {
        kept.type = incoming.type;
        existing.origin = "declared";
      }
      return kept;
    }

    const differing = (["source", "required", "description"] as const).filter(
      (field) => incoming[field] !== kept[field] && !(field === "description" && incoming.description === "")
    );
    if (differing.length > 0) {
      this.warn(
        "VARIABLE_CONFLICT",
        `Variable "${variable.name}" differs in ${differing.join(", ")} between ${existing.scope} and ${scope}; the first declaration is kept`
      );
    }
    return kept;
  }

  /** A name used by a step or feature without any declaration in reach */
  referenceVariable(name: string, scope: string): GraphVariableT {
    const existing = this.variableEntries.get(name);
    if (existing) return existing.variable;
    const variable = referenceVariable(name);
    this.variableEntries.set(name, { variable, origin: "reference", scope });
    return variable;
  }

  declareTool(api: ApiT, scope: string): GraphToolT {
    const existing = this.toolEntries.get(api.function_name);
    const incoming = toGraphTool(api);
    if (!existing || existing.placeholder) {
      this.toolEntries.set(api.function_name, incoming);
      return incoming;
    }
    if (existing.method !== incoming.method || existing.endpoint !== incoming.endpoint) {
      this.warn("TOOL_CONFLICT", `Tool "${api.function_name}" is declared differently in ${scope}; the first declaration is kept`);
    }
    return existing;
  }

  referenceTool(id: string, scope: string): GraphToolT {
    const existing = this.toolEntries.get(id);
    if (existing) return existing;
    const tool = placeholderTool(id);
    this.toolEntries.set(id, tool);
    this.warn("UNDECLARED_API", `API "${id}" referenced in ${scope} is not declared; a placeholder tool was added`);
    return tool;
  }

  warn(code: GenerationWarningCode, message: string): void {
    this.warnings.push({ code, message });
  }

  /**
   * Append declared-but-unused document variables and APIs; afterwards every
   * declaration appears exactly once.
   */
  finalize(doc: ParsedDocumentT): { variables: GraphVariableT[]; tools: GraphToolT[] } {
    for (const variable of doc.variables) {
      if (!this.variableEntries.has(variable.name)) {
        this.declareVariable(variable, "document");
      }
    }
    for (const api of doc.apis) {
      if (!this.toolEntries.has(api.function_name)) {
        this.declareTool(api, "document");
      }
    }
    return {
      variables: [...this.variableEntries.values()].map((entry) => entry.variable),
      tools: [...this.toolEntries.values()],
    };
  }
}
