/**
 * Provider-agnostic LLM client interface.
 *
 * Every client (Anthropic, OpenAI, fixtures) implements `generate`; callers
 * never branch on the provider.
 */

/**
 * Usage metrics returned by LLM calls for telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Optional context accompanying a prompt.
 */
export interface GenerateContext {
  /** System instructions */
  system?: string;
  /** Ask the provider for a JSON object answer */
  json?: boolean;
  /** Per-call timeout override */
  timeoutMs?: number;
  /** Free-form caller metadata, recorded by the fixtures client */
  [key: string]: unknown;
}

export interface LlmResponse {
  content: string;
  model: string;
  usage: UsageMetrics;
}

export interface LlmClient {
  readonly name: string;
  readonly model: string;

  generate(prompt: string, context?: GenerateContext): Promise<LlmResponse>;
}

export type LlmProvider = "anthropic" | "openai" | "fixtures";
