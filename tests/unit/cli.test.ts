/**
 * CLI Tests
 *
 * Drives runCli with in-memory files and captured output streams.
 */

import { describe, it, expect } from 'vitest';
import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_UNREADABLE,
  EXIT_USAGE,
  formatFailure,
  runCli,
  type CliIo,
} from '../../src/cli.js';
import { FixturesLlmClient } from '../../src/adapters/llm/fixtures.js';
import { buildFailure } from '../../src/utils/errors.js';
import { GENERATOR_VERSION } from '../../src/version.js';
import { loadFixture, ORDER_SUPPORT_PRD } from '../utils/fixtures.js';

interface FakeIo extends CliIo {
  out: string[];
  err: string[];
  written: Map<string, string>;
}

function fakeIo(files: Record<string, string>, extra: Partial<CliIo> = {}): FakeIo {
  const out: string[] = [];
  const err: string[] = [];
  const written = new Map<string, string>();
  return {
    out,
    err,
    written,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
      return content;
    },
    writeFile: async (path, data) => {
      written.set(path, data);
    },
    now: () => new Date('2026-01-01T00:00:00.000Z'),
    ...extra,
  };
}

const SUMMARY = [
  'Name: Acme Orders Voice Agent',
  'Language: en-US | Channel: voice',
  'Features: 4 | Variables: 9 | APIs: 5 | Rules: 3',
  'Strategy: hybrid (complexity 33.5)',
  'Nodes: 24 | Exits: 25',
  'Validation: 0 error(s), 0 warning(s)',
  'Open questions: 0',
].join('\n');

const argv = (...args: string[]): string[] => ['node', 'prd-flow', ...args];

const files = { 'prd.md': loadFixture(ORDER_SUPPORT_PRD) };

describe('runCli', () => {
  it('prints a summary on a dry run', async () => {
    const io = fakeIo(files);

    const code = await runCli(argv('prd.md', '--dry-run'), io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([`${SUMMARY}\n`]);
    expect(io.err).toEqual([]);
  });

  it('writes the document to stdout and the summary to stderr', async () => {
    const io = fakeIo(files);

    const code = await runCli(argv('prd.md'), io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toHaveLength(1);
    const document: unknown = JSON.parse(io.out[0]);
    expect(document).toMatchObject({
      metadata: { source_name: 'prd.md', exported_at: '2026-01-01T00:00:00.000Z' },
      flow_definition: { id: 'acme-orders-voice-agent' },
    });
    expect(io.out[0].split('\n')[1]).toBe('  "metadata": {');
    expect(io.err).toEqual([`${SUMMARY}\n`]);
  });

  it('writes to an output file with the requested indent', async () => {
    const io = fakeIo(files);

    const code = await runCli(argv('prd.md', '-o', 'flow.json', '--indent', '0', '--quiet'), io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([]);
    expect(io.err).toEqual([]);
    const json = io.written.get('flow.json') ?? '';
    expect(json.startsWith('{"metadata":{"export_version":"1.1"')).toBe(true);
    expect(json.endsWith('}\n')).toBe(true);
  });

  it('passes the strategy through', async () => {
    const io = fakeIo(files);

    await runCli(argv('prd.md', '--dry-run', '-s', 'simple'), io);

    expect(io.out[0].split('\n')[3]).toBe('Strategy: simple (complexity 33.5)');
  });

  it('exits 2 when the input cannot be read', async () => {
    const io = fakeIo({});

    const code = await runCli(argv('missing.md'), io);

    expect(code).toBe(EXIT_UNREADABLE);
    expect(code).toBe(2);
    expect(io.err).toEqual(["Cannot read input file missing.md: ENOENT: no such file, open 'missing.md'\n"]);
  });

  it('exits 64 on a usage error', async () => {
    const io = fakeIo(files);

    const code = await runCli(argv('prd.md', '--strategy', 'greedy'), io);

    expect(code).toBe(EXIT_USAGE);
    expect(code).toBe(64);
    expect(io.err.join('')).toContain("argument 'greedy' is invalid");
  });

  it('prints the version', async () => {
    const io = fakeIo(files);

    const code = await runCli(argv('--version'), io);

    expect(code).toBe(EXIT_OK);
    expect(io.out).toEqual([`${GENERATOR_VERSION}\n`]);
  });

  it('exits 1 with the blocking issues when validation fails', async () => {
    const io = fakeIo({ 'bot.md': '# Bot\n\n### F-01: Intake\n\n#### Flow\n\n1. Ask\n2. Thank the caller\n' });

    const code = await runCli(argv('bot.md', '--no-fix'), io);

    expect(code).toBe(EXIT_FAILURE);
    expect(io.err).toEqual([
      'Error [VALIDATION_FAILED]: Generated flow has 1 blocking issue(s)\n' +
        '  - COLLECT_NO_VARIABLE flow.nodes.f-01-1-collect.data.variable_name: Collect node "f-01-1-collect" names no variable\n',
    ]);
  });

  it('hands the injected client to a sparse document', async () => {
    const llm = new FixturesLlmClient().setResponses([
      '{"features": [{"id": "F-01", "name": "Greeting", "steps": ["Thank the caller"]}]}',
    ]);
    const io = fakeIo({ 'sparse.md': '# Plain Bot\n\nNothing about channels here.' }, { llm });

    const code = await runCli(argv('sparse.md', '--dry-run'), io);

    expect(code).toBe(EXIT_OK);
    expect(llm.calls).toHaveLength(1);
    expect(io.out[0].split('\n')[2]).toBe('Features: 1 | Variables: 0 | APIs: 0 | Rules: 0');
  });
});

describe('formatFailure', () => {
  it('prints the code and message without issues', () => {
    expect(formatFailure(buildFailure('EMPTY_INPUT', 'Input document is empty'))).toBe(
      'Error [EMPTY_INPUT]: Input document is empty'
    );
  });
});
