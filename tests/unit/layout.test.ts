/**
 * Deterministic Layout Tests
 */

import { describe, it, expect } from 'vitest';
import { applyLayout, assignDepths, computeLayout } from '../../src/layout/deterministic.js';
import { conversationNode, createMinimalValidGraph, exit } from '../utils/graph-builders.js';

describe('assignDepths', () => {
  it('walks breadth-first from the start node', () => {
    const { flow } = createMinimalValidGraph();

    expect([...assignDepths(flow)]).toEqual([
      ['start', 0],
      ['greet', 1],
      ['end', 2],
    ]);
  });

  it('puts unreachable nodes one layer past the deepest', () => {
    const { flow } = createMinimalValidGraph();
    flow.nodes.orphan = conversationNode('orphan');

    expect(assignDepths(flow).get('orphan')).toBe(3);
  });

  it('keeps the first depth of a node reached twice', () => {
    const { flow } = createMinimalValidGraph();
    flow.exits.push(exit('start', 'end'));

    expect(assignDepths(flow).get('end')).toBe(1);
  });
});

describe('computeLayout', () => {
  it('spaces layers horizontally and siblings vertically', () => {
    const { flow } = createMinimalValidGraph();
    flow.nodes.side = conversationNode('side');
    flow.exits.push(exit('start', 'side'), exit('side', 'end'));

    expect(Object.fromEntries(computeLayout(flow))).toEqual({
      start: { x: 100, y: 100 },
      greet: { x: 400, y: 100 },
      side: { x: 400, y: 300 },
      end: { x: 700, y: 100 },
    });
  });

  it('takes custom spacing', () => {
    const { flow } = createMinimalValidGraph();

    const positions = computeLayout(flow, { originX: 0, originY: 0, horizontalSpacing: 50 });

    expect(positions.get('end')).toEqual({ x: 100, y: 0 });
  });
});

describe('applyLayout', () => {
  it('writes positions into the nodes', () => {
    const graph = createMinimalValidGraph();
    graph.flow.nodes.orphan = conversationNode('orphan');

    applyLayout(graph.flow);

    expect(graph.flow.nodes.start.position).toEqual({ x: 100, y: 100 });
    expect(graph.flow.nodes.end.position).toEqual({ x: 700, y: 100 });
    expect(graph.flow.nodes.orphan.position).toEqual({ x: 1000, y: 100 });
  });

  it('gives the same positions on every run', () => {
    const first = createMinimalValidGraph();
    const second = createMinimalValidGraph();

    applyLayout(first.flow);
    applyLayout(second.flow);

    expect(second.flow.nodes).toEqual(first.flow.nodes);
  });
});
