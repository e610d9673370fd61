/**
 * Provider router.
 *
 * Selects the LLM client (Anthropic, OpenAI, Fixtures) from LLM_PROVIDER and
 * LLM_MODEL. Instances are cached per provider and model.
 */

import { log } from "../../utils/telemetry.js";
import { config } from "../../config/index.js";
import type { LlmClient, LlmProvider } from "./types.js";
import { AnthropicClient } from "./anthropic.js";
import { OpenAIClient } from "./openai.js";
import { FixturesLlmClient } from "./fixtures.js";

const clients: Map<string, LlmClient> = new Map();

function createClient(provider: LlmProvider, model?: string): LlmClient {
  switch (provider) {
    case "anthropic":
      return new AnthropicClient(model);
    case "openai":
      return new OpenAIClient(model);
    case "fixtures":
      return new FixturesLlmClient();
  }
}

/**
 * Get or create the client for a provider; defaults come from configuration.
 */
export function getLlmClient(provider?: LlmProvider, model?: string): LlmClient {
  const selected = provider ?? config.llm.provider;
  const selectedModel = model ?? config.llm.model;
  const cacheKey = `${selected}:${selectedModel || "default"}`;

  const cached = clients.get(cacheKey);
  if (cached) return cached;

  const client = createClient(selected, selectedModel);
  clients.set(cacheKey, client);
  log.info({ provider: client.name, model: client.model, cache_key: cacheKey }, "Created LLM client instance");
  return client;
}

/** Test hook */
export function _resetLlmClients(): void {
  clients.clear();
}
