/**
 * Vitest Global Setup
 *
 * Runs before each test file. Resets the config cache so tests can use
 * vi.stubEnv() to set environment variables that the config module picks
 * up, and drops cached LLM clients built from an earlier config.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";
import { _resetLlmClients } from "./src/adapters/llm/router.js";

/**
 * Reset config cache before ALL tests in a file
 *
 * vi.stubEnv() calls made at file level (outside describe) are respected.
 */
beforeAll(() => {
  _resetConfigCache();
  _resetLlmClients();
});

/**
 * Reset config cache before each test
 *
 * Config changes in one test don't leak to others.
 */
beforeEach(() => {
  _resetConfigCache();
  _resetLlmClients();
});
