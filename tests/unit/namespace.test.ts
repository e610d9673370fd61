/**
 * Namespace Accumulator Tests
 */

import { describe, it, expect } from 'vitest';
import { NamespaceAccumulator, placeholderTool, toGraphTool } from '../../src/generator/namespace.js';
import { GenerationError } from '../../src/utils/errors.js';
import { docApi, docVariable, parsedDocument } from '../utils/fixtures.js';

describe('NamespaceAccumulator', () => {
  describe('variables', () => {
    it('keeps the first declaration and warns about differing fields', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareVariable(docVariable('order_id', { source: 'collect', description: 'Order number' }), 'F-01');

      const kept = namespace.declareVariable(docVariable('order_id', { source: 'tool', required: true }), 'F-02');

      expect(kept).toMatchObject({ source: 'collect', required: false, description: 'Order number' });
      expect(namespace.warnings).toEqual([
        {
          code: 'VARIABLE_CONFLICT',
          message: 'Variable "order_id" differs in source, required between F-01 and F-02; the first declaration is kept',
        },
      ]);
    });

    it('stays quiet when the same declaration arrives again', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareVariable(docVariable('order_id'), 'document');
      namespace.declareVariable(docVariable('order_id'), 'document');

      expect(namespace.warnings).toEqual([]);
    });

    it('throws on a type conflict between two explicit declarations', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareVariable(docVariable('amount', { type: 'string' }), 'F-01');

      expect(() => namespace.declareVariable(docVariable('amount', { type: 'number' }), 'F-02')).toThrow(
        new GenerationError('Variable "amount" is declared as string in F-01 and as number in F-02')
      );
    });

    it('lets an explicit type override an inline reference', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareVariable(docVariable('amount', { origin: 'inline' }), 'document');

      const kept = namespace.declareVariable(docVariable('amount', { type: 'number' }), 'F-02');

      expect(kept.type).toBe('number');
      expect(namespace.warnings.map((w) => w.message)).toEqual([
        'Variable "amount" has type string in document and number in F-02',
      ]);
    });

    it('keeps the explicit type when an inline reference disagrees', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareVariable(docVariable('amount', { type: 'number' }), 'F-01');

      const kept = namespace.declareVariable(docVariable('amount', { origin: 'inline' }), 'document');

      expect(kept.type).toBe('number');
      expect(namespace.warnings.map((w) => w.code)).toEqual(['VARIABLE_CONFLICT']);
    });

    it('replaces a bare reference with a later declaration', () => {
      const namespace = new NamespaceAccumulator();
      namespace.referenceVariable('total', 'F-01');

      namespace.declareVariable(docVariable('total', { type: 'number', source: 'tool' }), 'F-02');

      expect(namespace.getVariable('total')).toMatchObject({ type: 'number', source: 'tool' });
      expect(namespace.warnings).toEqual([]);
    });

    it('declares an unknown reference as a collected string', () => {
      const namespace = new NamespaceAccumulator();

      expect(namespace.referenceVariable('nickname', 'F-01')).toEqual({
        name: 'nickname',
        type: 'string',
        description: '',
        source: 'collect',
        required: false,
        default: null,
        options: [],
        validation_rules: [],
        collection_mode: 'explicit',
      });
    });
  });

  describe('tools', () => {
    it('adds a placeholder for an undeclared API and warns', () => {
      const namespace = new NamespaceAccumulator();

      const tool = namespace.referenceTool('lookup_weather', 'F-03');

      expect(tool).toEqual(placeholderTool('lookup_weather'));
      expect(tool.placeholder).toBe(true);
      expect(namespace.warnings).toEqual([
        {
          code: 'UNDECLARED_API',
          message: 'API "lookup_weather" referenced in F-03 is not declared; a placeholder tool was added',
        },
      ]);
    });

    it('replaces a placeholder with a later declaration', () => {
      const namespace = new NamespaceAccumulator();
      namespace.referenceTool('get_order', 'F-01');

      namespace.declareTool(docApi('get_order', { method: 'GET' }), 'F-02');

      expect(namespace.getTool('get_order')).toEqual(toGraphTool(docApi('get_order', { method: 'GET' })));
    });

    it('warns when a tool is redeclared with another endpoint', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareTool(docApi('get_order'), 'F-01');

      namespace.declareTool(docApi('get_order', { endpoint: '/v2/orders' }), 'F-02');

      expect(namespace.getTool('get_order')?.endpoint).toBe('/api/get_order');
      expect(namespace.warnings.map((w) => w.code)).toEqual(['TOOL_CONFLICT']);
    });
  });

  describe('finalize', () => {
    it('appends unused document declarations after the used ones', () => {
      const namespace = new NamespaceAccumulator();
      namespace.declareVariable(docVariable('second'), 'F-01');
      namespace.declareTool(docApi('beta'), 'F-01');
      const doc = parsedDocument({
        variables: [docVariable('first'), docVariable('second')],
        apis: [docApi('alpha'), docApi('beta')],
      });

      const { variables, tools } = namespace.finalize(doc);

      expect(variables.map((v) => v.name)).toEqual(['second', 'first']);
      expect(tools.map((t) => t.id)).toEqual(['beta', 'alpha']);
    });
  });
});
