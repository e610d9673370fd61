import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * Writes to stderr so the CLI can stream the flow document on stdout.
 * Redaction paths are centralized in src/utils/logger-config.ts.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"), pino.destination(2));

/**
 * Test sink for capturing telemetry events in tests
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: ((eventName: string, data: TelemetryShape) => void) | null = null;

export function setTestSink(sink: ((eventName: string, data: TelemetryShape) => void) | null): void {
  // Direct env check avoids loading config during module initialization
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * Dashboards key on these strings; rename only together with them.
 */
export const TelemetryEvents = {
  PipelineStarted: "pipeline.started",
  PipelineCompleted: "pipeline.completed",
  PipelineFailed: "pipeline.failed",

  ParseCompleted: "parse.completed",
  LlmAssistRequested: "parse.llm_assist.requested",
  LlmAssistFailed: "parse.llm_assist.failed",

  StrategySelected: "generation.strategy_selected",
  GenerationCompleted: "generation.completed",
  GenerationFailed: "generation.failed",

  ValidationCompleted: "validation.completed",
  AutoFixIteration: "autofix.iteration",
  AutoFixCompleted: "autofix.completed",
} as const;

export type TelemetryEvent = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function isLeaf(value: unknown): value is TelemetryLeaf {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (isLeaf(value)) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  // functions, symbols and bigints never reach the log
  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit a telemetry event: always logged, mirrored to the test sink when set.
 */
export function emit(event: TelemetryEvent, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }
  log.info({ event, ...eventData });
}
