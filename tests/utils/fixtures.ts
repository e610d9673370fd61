/**
 * Test Fixtures
 *
 * Loads the Markdown fixtures under tests/fixtures/ and builds small
 * Parsed Documents by hand.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type {
  ApiT,
  BusinessRuleT,
  FeatureT,
  FlowStepT,
  ParsedDocumentT,
  StepTypeT,
  VariableT,
} from '../../src/schemas/document.js';

export const ORDER_SUPPORT_PRD = 'order-support-prd.md';

export function loadFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf-8');
}

// =============================================================================
// Parsed-model builders
// =============================================================================

export function step(order: number, type: StepTypeT, description: string, extra: Partial<FlowStepT> = {}): FlowStepT {
  return { order, type, description, ...extra };
}

export function feature(id: string, steps: FlowStepT[], overrides: Partial<FeatureT> = {}): FeatureT {
  return {
    id,
    name: `Feature ${id}`,
    description: '',
    channel: 'both',
    phase: 1,
    steps,
    variables_used: [],
    apis_used: [],
    local_variables: [],
    dependencies: [],
    user_stories: [],
    acceptance_criteria: [],
    open_questions: [],
    flow_variants: [],
    ...overrides,
  };
}

/** Feature with `count` plain conversation steps */
export function featureWithSteps(id: string, count: number): FeatureT {
  return feature(
    id,
    Array.from({ length: count }, (_, i) => step(i + 1, 'conversation', `Say line ${i + 1}`))
  );
}

export function docVariable(name: string, overrides: Partial<VariableT> = {}): VariableT {
  return {
    name,
    type: 'string',
    description: '',
    source: 'collect',
    required: false,
    default: null,
    options: [],
    validation_rules: [],
    collection_mode: 'explicit',
    origin: 'declared',
    ...overrides,
  };
}

export function docApi(functionName: string, overrides: Partial<ApiT> = {}): ApiT {
  return {
    name: functionName,
    function_name: functionName,
    method: 'POST',
    endpoint: `/api/${functionName}`,
    description: '',
    parameters: [],
    extractions: [],
    error_handlers: [],
    ...overrides,
  };
}

export function rule(id: string, overrides: Partial<BusinessRuleT> = {}): BusinessRuleT {
  return {
    id,
    name: `Rule ${id}`,
    condition: 'flag == true',
    action: 'Explain the policy',
    applies_to: [],
    priority: 1,
    ...overrides,
  };
}

export function parsedDocument(overrides: Partial<ParsedDocumentT> = {}): ParsedDocumentT {
  return {
    metadata: { name: 'Test Agent', description: '', language: 'en-US', channel: 'both', phase: 1 },
    features: [],
    variables: [],
    apis: [],
    business_rules: [],
    open_questions: [],
    ...overrides,
  };
}
