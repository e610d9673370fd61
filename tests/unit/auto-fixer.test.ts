/**
 * Auto-Fixer Tests
 *
 * Convergence on repairable graphs, the no-progress and iteration-ceiling
 * stops, and the enum coercion helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  applyFixes,
  nameFromId,
  nearestVariableSource,
  nearestVariableType,
  runAutoFix,
} from '../../src/validators/auto-fixer.js';
import { validateGraph } from '../../src/validators/flow-validator.js';
import {
  collectNode,
  conversationNode,
  createMinimalValidGraph,
  endNode,
  exit,
  variable,
} from '../utils/graph-builders.js';

describe('runAutoFix', () => {
  it('returns a valid graph untouched', () => {
    const graph = createMinimalValidGraph();

    const report = runAutoFix(graph);

    expect(report.success).toBe(true);
    expect(report.iterations).toBe(0);
    expect(report.fixes).toEqual([]);
    expect(report.graph).toBe(graph);
  });

  it('wires a dangling node in a single iteration', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.orphan = conversationNode('orphan');

    const report = runAutoFix(graph);

    expect(report.success).toBe(true);
    expect(report.iterations).toBe(1);
    expect(report.fixes.map((f) => `${f.code}:${f.target}`)).toEqual([
      'DEAD_END_NODE:orphan',
      'UNREACHABLE_NODE:orphan',
    ]);
    expect(report.graph.flow.exits[0]).toEqual(exit('start', 'greet', 'exit-start-to-greet', 1));
    expect(report.graph.flow.exits.slice(2)).toEqual([
      exit('orphan', 'end', 'exit-orphan-to-end', 0),
      {
        id: 'exit-start-to-orphan',
        name: 'Node orphan',
        source_node_id: 'start',
        target_node_id: 'orphan',
        priority: 0,
        condition: { type: 'expression', expression: 'Node orphan' },
      },
    ]);
    expect(report.validation.errors).toEqual([]);
    expect(report.remaining).toEqual([]);
  });

  it('never mutates the input graph', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.orphan = conversationNode('orphan');
    const before = JSON.stringify(graph);

    runAutoFix(graph);

    expect(JSON.stringify(graph)).toBe(before);
  });

  it('adds a start node ahead of the first node without incoming exits', () => {
    const graph = createMinimalValidGraph();
    delete graph.flow.nodes.start;
    graph.flow.exits = [exit('greet', 'end')];

    const report = runAutoFix(graph, { agentName: 'Acme Support' });

    expect(report.success).toBe(true);
    expect(report.fixes.map((f) => f.code)).toEqual(['NO_START_NODE']);
    expect(report.graph.flow.start_node_id).toBe('start');
    expect(report.graph.flow.nodes.start).toMatchObject({
      type: 'start',
      data: { initial_message: 'Welcome to Acme Support. How can I assist you today?' },
    });
    expect(report.graph.flow.exits.map((e) => e.id)).toEqual(['exit-greet-to-end', 'exit-start-to-greet']);
  });

  it('moves conversation extraction fields into collect nodes', () => {
    const graph = createMinimalValidGraph();
    const greet = conversationNode('greet');
    greet.data.extraction_fields.push({ name: 'order_id', type: 'int', description: '' });
    graph.flow.nodes.greet = greet;

    const report = runAutoFix(graph);
    const collect = report.graph.flow.nodes['greet-collect-order-id'];

    expect(report.success).toBe(true);
    expect(collect).toMatchObject({
      type: 'collect',
      name: 'Collect order id',
      data: { variable_name: 'order_id', prompt: 'Please provide your order id', retry_count: 3 },
    });
    expect(report.graph.flow.exits.map((e) => e.id)).toEqual([
      'exit-start-to-greet-collect-order-id',
      'exit-greet-to-end',
      'exit-greet-collect-order-id-to-greet',
    ]);
    expect(report.graph.variables).toEqual([variable('order_id', { type: 'number' })]);
  });

  it('coerces invalid variable types and sources', () => {
    const graph = createMinimalValidGraph();
    graph.variables = [variable('amount', { type: 'int', source: 'api' })];

    const report = runAutoFix(graph);

    expect(report.success).toBe(true);
    expect(report.graph.variables[0]).toMatchObject({ type: 'number', source: 'tool' });
  });

  it('renames a variable and its template references under strict mode', () => {
    const graph = createMinimalValidGraph();
    graph.variables = [variable('OrderId')];
    graph.flow.nodes.greet = conversationNode('greet', 'Order {{OrderId}} found');

    const report = runAutoFix(graph, { strict: true });

    expect(report.success).toBe(true);
    expect(report.graph.variables.map((v) => v.name)).toEqual(['order_id']);
    expect(report.graph.flow.nodes.greet).toMatchObject({ data: { message: 'Order {{order_id}} found' } });
  });

  it('fills blank collect prompts in the document language', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.greet = collectNode('greet', 'order_id', '');
    graph.variables = [variable('order_id')];

    const report = runAutoFix(graph, { strict: true, language: 'he-IL' });

    expect(report.success).toBe(true);
    expect(report.graph.flow.nodes.greet).toMatchObject({ data: { prompt: 'אנא מסרו את order id' } });
  });

  it('creates an end node when the flow has none', () => {
    const graph = createMinimalValidGraph();
    delete graph.flow.nodes.end;
    graph.flow.exits = [exit('start', 'greet')];

    const report = runAutoFix(graph);

    expect(report.success).toBe(true);
    expect(report.graph.flow.nodes['auto-end']).toMatchObject({
      type: 'end',
      data: { end_type: 'end_call', message: 'Thank you for contacting us. Goodbye!' },
    });
    expect(report.fixes.map((f) => `${f.code}:${f.target}`)).toEqual(['NO_END_NODE:auto-end', 'DEAD_END_NODE:greet']);
  });

  it('stops with no_progress when a pass does not lower the issue count', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.greet = conversationNode('greet', 'Your {{OrderId}}');

    const report = runAutoFix(graph, { strict: true });

    expect(report.success).toBe(false);
    expect(report.reason).toBe('no_progress');
    expect(report.iterations).toBe(1);
    expect(report.graph).toBe(graph);
    expect(report.fixes).toEqual([]);
    expect(report.remaining.map((i) => i.code)).toEqual(['UNDECLARED_VARIABLE_REFERENCE']);
  });

  it('makes shadowed unconditional exits conditional under strict mode', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.side = conversationNode('side');
    graph.flow.exits.push(exit('greet', 'side', 'exit-greet-to-side', 1), exit('side', 'end'));

    const report = runAutoFix(graph, { strict: true });

    expect(report.success).toBe(true);
    expect(report.iterations).toBe(1);
    expect(report.fixes.map((f) => `${f.code}:${f.target}`)).toEqual(['MULTIPLE_UNCONDITIONAL_EXITS:greet']);
    expect(
      report.graph.flow.exits
        .filter((e) => e.source_node_id === 'greet')
        .map((e) => [e.id, e.name, e.condition, e.priority])
    ).toEqual([
      ['exit-greet-to-end', 'Continue', { type: 'always' }, 1],
      ['exit-greet-to-side', 'Node side', { type: 'expression', expression: 'Node side' }, 0],
    ]);
  });

  it('stops at the iteration ceiling', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.orphan = conversationNode('orphan');

    const report = runAutoFix(graph, { maxIterations: 0 });

    expect(report.success).toBe(false);
    expect(report.reason).toBe('max_iterations');
    expect(report.iterations).toBe(0);
  });
});

describe('applyFixes', () => {
  it('repoints the start node id at the remaining start node', () => {
    const graph = createMinimalValidGraph();
    graph.flow.start_node_id = 'greet';

    const { graph: fixed, fixes } = applyFixes(graph, validateGraph(graph).errors);

    expect(fixed.flow.start_node_id).toBe('start');
    expect(fixes).toEqual([
      { code: 'INVALID_START_NODE', target: 'start', description: 'start_node_id re-pointed from "greet" to "start"' },
    ]);
    expect(graph.flow.start_node_id).toBe('greet');
  });

  it('drops exits into unknown nodes', () => {
    const graph = createMinimalValidGraph();
    graph.flow.exits.push(exit('greet', 'ghost'));

    const { graph: fixed } = applyFixes(graph, validateGraph(graph).errors);

    expect(fixed.flow.exits.map((e) => e.id)).toEqual(['exit-start-to-greet', 'exit-greet-to-end']);
  });

  it('renames non-kebab node ids and rewires their exits', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes = {
      start: graph.flow.nodes.start,
      Greet_Node: conversationNode('Greet_Node'),
      end: endNode(),
    };
    graph.flow.exits = [exit('start', 'Greet_Node'), exit('Greet_Node', 'end')];

    const { graph: fixed } = applyFixes(graph, validateGraph(graph).warnings);

    expect(Object.keys(fixed.flow.nodes)).toEqual(['start', 'greet-node', 'end']);
    expect(fixed.flow.exits.map((e) => `${e.id}|${e.source_node_id}|${e.target_node_id}`)).toEqual([
      'exit-start-to-greet-node|start|greet-node',
      'exit-greet-node-to-end|greet-node|end',
    ]);
    expect(validateGraph(fixed).warnings).toEqual([]);
  });
});

describe('enum coercion', () => {
  it('maps variable types through aliases and edit distance', () => {
    expect(nearestVariableType('int')).toBe('number');
    expect(nearestVariableType('Boolean')).toBe('boolean');
    expect(nearestVariableType('strng')).toBe('string');
    expect(nearestVariableType('arry')).toBe('array');
  });

  it('maps variable sources through aliases and edit distance', () => {
    expect(nearestVariableSource('api')).toBe('tool');
    expect(nearestVariableSource('usr')).toBe('user');
  });

  it('builds a display name from a node id', () => {
    expect(nameFromId('f-01-1-collect')).toBe('F 01 1 Collect');
  });
});
