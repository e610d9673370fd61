/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 *
 * SECURITY: PRD documents routinely contain contact details and the LLM
 * clients carry API keys. Every sensitive field must be listed here.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.apikey",
  "*.authorization",
  "*.credentials",
  "*.accessToken",
  "*.access_token",
  "*.openaiApiKey",
  "*.anthropicApiKey",

  // Outbound tool definitions may carry auth headers
  "*.headers.authorization",
  "*.headers[\"x-api-key\"]",
  "*.headers.cookie",

  // PII fields
  "*.email",
  "*.phone",
  "*.phone_number",
  "*.id_number",
  "*.creditCard",
  "*.credit_card",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): {
  level: string;
  redact: { paths: string[]; censor: string };
} {
  return {
    level,
    redact: createRedactConfig(),
  };
}
