#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Reads a requirements document, runs the pipeline and writes the flow
 * document to a file or stdout. Logs go to stderr.
 *
 * Usage:
 *   prd-flow docs/prd.md -o flow.json
 *   prd-flow docs/prd.md --dry-run --strategy chunked
 *
 * Exit codes: 0 success, 1 pipeline failure, 2 unreadable input, 64 usage
 * error.
 */

import { config as loadDotenv } from "dotenv";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { readFile, writeFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import { basename, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { FixturesLlmClient } from "./adapters/llm/fixtures.js";
import { getLlmClient } from "./adapters/llm/router.js";
import type { LlmClient } from "./adapters/llm/types.js";
import { StrategyChoice, type StrategyChoiceT } from "./config/index.js";
import { runPipeline, type PipelineSummary } from "./pipeline.js";
import type { PipelineFailure } from "./utils/errors.js";
import { GENERATOR_VERSION } from "./version.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_UNREADABLE = 2;
export const EXIT_USAGE = 64;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  writeFile: (path: string, data: string) => Promise<void>;
  now?: () => Date;
  /** Overrides the client chosen by --llm / --mock-llm */
  llm?: LlmClient;
}

interface CliOptions {
  output?: string;
  strategy: StrategyChoiceT;
  strict: boolean;
  fix: boolean;
  dryRun: boolean;
  llm: boolean;
  mockLlm: boolean;
  indent: number;
  quiet: boolean;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readFile: (path) => readFile(path, "utf-8"),
  writeFile: (path, data) => writeFile(path, data, "utf-8"),
};

function parseIndent(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 8) {
    throw new InvalidArgumentError("indent must be an integer between 0 and 8");
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name("prd-flow")
    .description("Turn a product-requirements document into a validated conversation-flow document")
    .version(GENERATOR_VERSION)
    .argument("<input>", "Path to the requirements document (Markdown)")
    .option("-o, --output <file>", "Write the flow document to a file instead of stdout")
    .addOption(
      new Option("-s, --strategy <strategy>", "Generation strategy").choices(StrategyChoice.options).default("auto")
    )
    .option("--strict", "Treat validation warnings as errors", false)
    .option("--no-fix", "Disable the auto-fix loop")
    .option("--dry-run", "Run the pipeline and print a summary without writing a document", false)
    .option("--llm", "Use the configured LLM provider to extract features from sparse documents", false)
    .option("--mock-llm", "Use the deterministic fixtures client for LLM-assisted extraction", false)
    .option("--indent <n>", "JSON indentation", parseIndent, 2)
    .option("-q, --quiet", "Suppress the summary on stderr", false);
}

export function formatSummary(summary: PipelineSummary): string {
  return [
    `Name: ${summary.name}`,
    `Language: ${summary.language} | Channel: ${summary.channel}`,
    `Features: ${summary.features} | Variables: ${summary.variables} | APIs: ${summary.apis} | Rules: ${summary.rules}`,
    `Strategy: ${summary.strategy} (complexity ${summary.complexity})`,
    `Nodes: ${summary.nodes} | Exits: ${summary.exits}`,
    `Validation: ${summary.errors} error(s), ${summary.warnings} warning(s)`,
    `Open questions: ${summary.open_questions}`,
  ].join("\n");
}

export function formatFailure(failure: PipelineFailure): string {
  const lines = [`Error [${failure.code}]: ${failure.message}`];
  for (const issue of failure.issues ?? []) {
    lines.push(`  - ${issue.code} ${issue.path}: ${issue.message}`);
  }
  return lines.join("\n");
}

function selectLlm(opts: CliOptions, io: CliIo): LlmClient | undefined {
  if (io.llm) return io.llm;
  if (opts.mockLlm) return new FixturesLlmClient();
  if (opts.llm) return getLlmClient();
  return undefined;
}

/**
 * Run the CLI against `argv` (node-style: [node, script, ...args]) and
 * resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  loadDotenv();

  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  try {
    program.parse([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  const opts = program.opts<CliOptions>();
  const inputPath = program.args[0];

  let text: string;
  try {
    text = await io.readFile(inputPath);
  } catch (error) {
    io.stderr(`Cannot read input file ${inputPath}: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_UNREADABLE;
  }

  const outcome = await runPipeline(
    text,
    {
      strict: opts.strict,
      autoFix: opts.fix,
      dryRun: opts.dryRun,
      strategy: opts.strategy,
      sourceName: basename(inputPath),
    },
    { llm: selectLlm(opts, io), now: io.now }
  );

  if (!outcome.ok) {
    io.stderr(`${formatFailure(outcome.failure)}\n`);
    return EXIT_FAILURE;
  }

  if (outcome.document === null) {
    io.stdout(`${formatSummary(outcome.summary)}\n`);
    return EXIT_OK;
  }

  const json = `${JSON.stringify(outcome.document, null, opts.indent)}\n`;
  if (opts.output) {
    await io.writeFile(opts.output, json);
  } else {
    io.stdout(json);
  }
  if (!opts.quiet) {
    io.stderr(`${formatSummary(outcome.summary)}\n`);
  }
  return EXIT_OK;
}

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(resolve(entry)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  runCli(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error("Fatal error:", err instanceof Error ? err.message : err);
      process.exitCode = EXIT_FAILURE;
    });
}
