import Anthropic from "@anthropic-ai/sdk";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { LlmClientError, UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";
import type { GenerateContext, LlmClient, LlmResponse } from "./types.js";

// Lazy initialization to allow testing without API key
let client: Anthropic | null = null;

function getClient(): Anthropic {
  const apiKey = config.llm.anthropicApiKey;
  if (!apiKey) {
    throw new LlmClientError("ANTHROPIC_API_KEY environment variable is required but not set", "anthropic");
  }
  if (!client) {
    client = new Anthropic({ apiKey });
  }
  return client;
}

/**
 * Strip a Markdown code fence around a JSON answer.
 */
export function unwrapJsonFence(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith("```json")) {
    return trimmed.replace(/^```json\n?/, "").replace(/\n?```$/, "");
  }
  if (trimmed.startsWith("```")) {
    return trimmed.replace(/^```\n?/, "").replace(/\n?```$/, "");
  }
  return trimmed;
}

export class AnthropicClient implements LlmClient {
  readonly name = "anthropic";
  readonly model: string;

  constructor(model?: string) {
    this.model = model || "claude-3-5-sonnet-20241022";
  }

  async generate(prompt: string, context: GenerateContext = {}): Promise<LlmResponse> {
    const startTime = Date.now();
    const timeoutMs = context.timeoutMs ?? config.llm.timeoutMs;

    log.info({ prompt_chars: prompt.length, model: this.model, provider: "anthropic" }, "calling Anthropic");

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      const response = await getClient().messages.create(
        {
          model: this.model,
          max_tokens: config.llm.maxTokens,
          temperature: config.llm.temperature,
          ...(context.system ? { system: context.system } : {}),
          messages: [{ role: "user", content: prompt }],
        },
        { signal: abortController.signal }
      );

      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      if (!text) {
        log.error({ content_types: response.content.map((block) => block.type) }, "unexpected Anthropic response type");
        throw new LlmClientError("unexpected_response_type", "anthropic");
      }

      return {
        content: context.json ? unwrapJsonFence(text) : text,
        model: response.model,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      if (error instanceof LlmClientError) throw error;

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "Anthropic call timed out");
        throw new UpstreamTimeoutError("Anthropic generate timed out", "anthropic", elapsedMs, error);
      }

      if (error instanceof Anthropic.APIError && typeof error.status === "number") {
        const requestId = error.headers?.["request-id"] ?? undefined;
        log.error({ status: error.status, request_id: requestId, elapsed_ms: elapsedMs }, "Anthropic API returned non-2xx status");
        throw new UpstreamHTTPError(
          `Anthropic generate failed: ${error.message}`,
          "anthropic",
          error.status,
          requestId,
          elapsedMs,
          error
        );
      }

      throw new LlmClientError(error instanceof Error ? error.message : String(error), "anthropic", error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
