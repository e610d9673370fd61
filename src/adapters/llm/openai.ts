import OpenAI from "openai";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { LlmClientError, UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";
import type { GenerateContext, LlmClient, LlmResponse } from "./types.js";

// Lazy initialization to allow testing without API key
let client: OpenAI | null = null;

function getClient(): OpenAI {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) {
    throw new LlmClientError("OPENAI_API_KEY environment variable is required but not set", "openai");
  }
  if (!client) {
    client = new OpenAI({ apiKey });
  }
  return client;
}

export class OpenAIClient implements LlmClient {
  readonly name = "openai";
  readonly model: string;

  constructor(model?: string) {
    this.model = model || "gpt-4o-mini";
  }

  async generate(prompt: string, context: GenerateContext = {}): Promise<LlmResponse> {
    const startTime = Date.now();
    const timeoutMs = context.timeoutMs ?? config.llm.timeoutMs;

    log.info({ prompt_chars: prompt.length, model: this.model, provider: "openai" }, "calling OpenAI");

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
      if (context.system) {
        messages.push({ role: "system", content: context.system });
      }
      messages.push({ role: "user", content: prompt });

      const response = await getClient().chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: config.llm.temperature,
          max_tokens: config.llm.maxTokens,
          ...(context.json ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal: abortController.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new LlmClientError("openai_empty_response", "openai");
      }

      return {
        content,
        model: response.model,
        usage: {
          input_tokens: response.usage?.prompt_tokens || 0,
          output_tokens: response.usage?.completion_tokens || 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      if (error instanceof LlmClientError) throw error;

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "OpenAI call timed out");
        throw new UpstreamTimeoutError("OpenAI generate timed out", "openai", elapsedMs, error);
      }

      if (error instanceof OpenAI.APIError && typeof error.status === "number") {
        const requestId = error.headers?.["x-request-id"] ?? undefined;
        log.error({ status: error.status, request_id: requestId, elapsed_ms: elapsedMs }, "OpenAI API returned non-2xx status");
        throw new UpstreamHTTPError(
          `OpenAI generate failed: ${error.message}`,
          "openai",
          error.status,
          requestId,
          elapsedMs,
          error
        );
      }

      throw new LlmClientError(error instanceof Error ? error.message : String(error), "openai", error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
