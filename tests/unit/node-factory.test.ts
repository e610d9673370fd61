/**
 * Node Factory Tests
 */

import { describe, it, expect } from 'vitest';
import { buildStepNode, nodeName, type NodeFactoryContext } from '../../src/generator/node-factory.js';
import { exitBase, IdAllocator, stepNodeBase } from '../../src/generator/id-allocator.js';
import { docApi, step } from '../utils/fixtures.js';
import { variable } from '../utils/graph-builders.js';

const getOrder = docApi('get_order', {
  parameters: [{ name: 'order_id', type: 'string', required: true, description: '' }],
  extractions: [{ variable: 'order_status', path: 'response.status' }],
});

const ctx: NodeFactoryContext = {
  id: 'node-1',
  featureId: 'F-01',
  variable: (name) => (name === 'order_id' ? variable('order_id', { type: 'number', description: 'Order number', required: true }) : undefined),
  api: (name) => (name === 'get_order' ? getOrder : undefined),
};

describe('buildStepNode', () => {
  it('builds a collect node with its field from the namespace', () => {
    const { node, exitStub } = buildStepNode(
      step(1, 'collect', 'Ask for the order number', { variable_name: 'order_id' }),
      ctx
    );

    expect(node).toEqual({
      id: 'node-1',
      name: 'Ask for the order number',
      feature_id: 'F-01',
      position: { x: 0, y: 0 },
      type: 'collect',
      data: {
        variable_name: 'order_id',
        fields: [{ name: 'order_id', type: 'number', description: 'Order number', required: true }],
        prompt: 'Ask for the order number',
        retry_count: 3,
      },
    });
    expect(exitStub).toEqual({ kind: 'continue' });
  });

  it('falls back to the step text for an unknown collect variable', () => {
    const { node } = buildStepNode(step(1, 'collect', 'Ask for a nickname', { variable_name: 'nickname' }), ctx);

    expect(node).toMatchObject({
      data: { fields: [{ name: 'nickname', type: 'string', description: 'Ask for a nickname', required: true }] },
    });
  });

  it('templates API parameters from the declaration', () => {
    const { node } = buildStepNode(step(2, 'api_call', 'Call the order API', { api_name: 'get_order' }), ctx);

    expect(node).toMatchObject({
      type: 'api',
      data: {
        tool_id: 'get_order',
        parameters: { order_id: '{{order_id}}' },
        extractions: [{ variable: 'order_status', path: 'response.status' }],
      },
    });
  });

  it('opens a branch for a condition step', () => {
    const { node, exitStub } = buildStepNode(
      step(3, 'condition', 'If the order is late', { condition: 'the order is late' }),
      ctx
    );

    expect(node).toMatchObject({
      type: 'condition',
      data: { conditions: [{ expression: 'the order is late', exit_name: 'the order is late' }], default_exit: 'else' },
    });
    expect(exitStub).toEqual({ kind: 'branch', expression: 'the order is late' });
  });

  it('ends the flow on transfer and end steps', () => {
    const transfer = buildStepNode(step(4, 'transfer', 'Transfer to an agent'), ctx);
    const end = buildStepNode(step(5, 'end', 'Say goodbye.'), ctx);

    expect(transfer.node).toMatchObject({ type: 'end', data: { end_type: 'transfer', message: 'Transfer to an agent' } });
    expect(transfer.exitStub).toEqual({ kind: 'terminal' });
    expect(end.node).toMatchObject({ type: 'end', name: 'Say goodbye', data: { end_type: 'end_call' } });
  });

  it('assigns the step value in a set-variables node', () => {
    const { node } = buildStepNode(
      step(6, 'set_variable', 'Set status to pending', { variable_name: 'status', value: 'pending' }),
      ctx
    );

    expect(node).toMatchObject({ type: 'set_variables', data: { assignments: [{ variable: 'status', value: 'pending' }] } });
  });

  it('omits the feature id when the context has none', () => {
    const { node } = buildStepNode(step(1, 'conversation', 'Say hello'), { id: 'hello' });

    expect(node).toEqual({
      id: 'hello',
      name: 'Say hello',
      position: { x: 0, y: 0 },
      type: 'conversation',
      data: { message: 'Say hello', extraction_fields: [] },
    });
  });
});

describe('nodeName', () => {
  it('truncates long step text', () => {
    const long = 'Explain the full returns policy including every exception that applies to sale items';

    expect(nodeName(long)).toBe(`${long.slice(0, 59).trimEnd()}…`);
    expect(nodeName(long)).toHaveLength(60);
  });
});

describe('IdAllocator', () => {
  it('suffixes taken ids', () => {
    const ids = new IdAllocator(['start']);

    expect(ids.allocate('start')).toBe('start-2');
    expect(ids.allocate('start')).toBe('start-3');
    expect(ids.allocate('end')).toBe('end');
  });

  it('reuses a released id', () => {
    const ids = new IdAllocator();
    ids.allocate('exit-a-to-b');
    ids.release('exit-a-to-b');

    expect(ids.allocate('exit-a-to-b')).toBe('exit-a-to-b');
  });

  it('builds kebab-case step and exit ids', () => {
    expect(stepNodeBase('F-01', 2, 'api_call')).toBe('f-01-2-api-call');
    expect(exitBase('start', 'f-01-1-collect')).toBe('exit-start-to-f-01-1-collect');
  });
});
