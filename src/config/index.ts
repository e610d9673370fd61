/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Sections:
 * - app: runtime environment and log level
 * - llm: optional LLM collaborator used for extraction assistance
 * - strategy: complexity thresholds and chunking for generation
 * - validation: strict mode and auto-fix loop bounds
 * - output: defaults written into the flow document
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "" || lower === "no") return false;
    return lower === "true" || lower === "1" || lower === "yes";
  });

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * LLM Provider enum
 */
const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Generation strategy enum ("auto" lets the complexity scorer decide)
 */
export const StrategyChoice = z.enum(["auto", "simple", "chunked", "hybrid"]);
export type StrategyChoiceT = z.infer<typeof StrategyChoice>;

const Channel = z.enum(["voice", "text", "both"]);

/**
 * Configuration schema with validation
 */
const ConfigSchema = z.object({
  app: z.object({
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    isVitest: booleanString.default(false),
  }),

  llm: z.object({
    provider: LLMProvider.default("fixtures"),
    model: z.string().optional(),
    openaiApiKey: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    temperature: z.coerce.number().min(0).max(2).default(0.3),
    maxTokens: z.coerce.number().int().positive().default(4096),
    timeoutMs: z.coerce.number().int().positive().default(60000),
    assistEnabled: booleanString.default(true),
  }),

  strategy: z.object({
    choice: StrategyChoice.default("auto"),
    lowThreshold: z.coerce.number().nonnegative().default(15),
    highThreshold: z.coerce.number().nonnegative().default(40),
    featureComplexityThreshold: z.coerce.number().nonnegative().default(5),
    chunkSize: z.coerce.number().int().positive().default(5),
    smallFeatureMaxSteps: z.coerce.number().int().nonnegative().default(2),
  }),

  validation: z.object({
    strict: booleanString.default(false),
    autoFixEnabled: booleanString.default(true),
    maxIterations: z.coerce.number().int().positive().max(50).default(5),
  }),

  output: z.object({
    defaultChannel: Channel.default("both"),
    flowLlmProvider: z.string().default("openai"),
    flowLlmModel: z.string().default("gpt-4o"),
  }),
}).refine((cfg) => cfg.strategy.lowThreshold <= cfg.strategy.highThreshold, {
  message: "COMPLEXITY_LOW_THRESHOLD must not exceed COMPLEXITY_HIGH_THRESHOLD",
  path: ["strategy", "lowThreshold"],
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    app: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      isVitest: env.VITEST,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      openaiApiKey: env.OPENAI_API_KEY,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
      timeoutMs: env.LLM_TIMEOUT_MS,
      assistEnabled: env.LLM_ASSIST_ENABLED,
    },
    strategy: {
      choice: env.STRATEGY,
      lowThreshold: env.COMPLEXITY_LOW_THRESHOLD,
      highThreshold: env.COMPLEXITY_HIGH_THRESHOLD,
      featureComplexityThreshold: env.FEATURE_COMPLEXITY_THRESHOLD,
      chunkSize: env.CHUNK_SIZE,
      smallFeatureMaxSteps: env.SMALL_FEATURE_MAX_STEPS,
    },
    validation: {
      strict: env.STRICT_MODE,
      autoFixEnabled: env.AUTO_FIX_ENABLED,
      maxIterations: env.AUTO_FIX_MAX_ITERATIONS,
    },
    output: {
      defaultChannel: env.DEFAULT_CHANNEL,
      flowLlmProvider: env.FLOW_LLM_PROVIDER,
      flowLlmModel: env.FLOW_LLM_MODEL,
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${details}`);
  }
  return parsed.data;
}

/**
 * Lazily parsed configuration.
 *
 * Parsing is deferred until the first section is read, so tests can set
 * environment variables (vi.stubEnv) before the config is materialised.
 *
 * ```
 * import { config } from './config/index.js';
 * const size = config.strategy.chunkSize;
 * ```
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (!_cachedConfig) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = {
  get app() {
    return loadConfig().app;
  },
  get llm() {
    return loadConfig().llm;
  },
  get strategy() {
    return loadConfig().strategy;
  },
  get validation() {
    return loadConfig().validation;
  },
  get output() {
    return loadConfig().output;
  },
};

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Check if running in test environment
 */
export function isTest(): boolean {
  return config.app.nodeEnv === "test" || config.app.isVitest;
}
