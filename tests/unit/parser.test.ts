/**
 * Document Parser Tests
 *
 * Extractors run against the order-support fixture and against small inline
 * documents for the edge cases.
 */

import { describe, it, expect } from 'vitest';
import { parseDocument } from '../../src/parser/document-parser.js';
import { classifyStep, parseCondition } from '../../src/parser/feature-extractor.js';
import { detectChannel, detectLanguage, extractName } from '../../src/parser/metadata-extractor.js';
import { extractVariables, parseVariableListItem } from '../../src/parser/variable-extractor.js';
import { extractApis } from '../../src/parser/api-extractor.js';
import { parseProseRule, extractBusinessRules } from '../../src/parser/rule-extractor.js';
import { EmptyInputError } from '../../src/utils/errors.js';
import { loadFixture, ORDER_SUPPORT_PRD } from '../utils/fixtures.js';

const prd = loadFixture(ORDER_SUPPORT_PRD);

describe('parseDocument on the order-support document', () => {
  const doc = parseDocument(prd);

  it('extracts metadata', () => {
    expect(doc.metadata).toEqual({
      name: 'Acme Orders Voice Agent',
      description: 'Acme Orders helps customers track orders, request returns and reach a human agent by phone.',
      language: 'en-US',
      channel: 'voice',
      phase: 1,
    });
  });

  it('extracts the declared variables in table order', () => {
    expect(doc.variables.map((v) => v.name)).toEqual([
      'customer_name',
      'phone_number',
      'order_id',
      'order_status',
      'delivery_date',
      'order_age_days',
      'return_reason',
      'return_id',
      'is_vip',
    ]);
    expect(doc.variables.find((v) => v.name === 'order_age_days')).toMatchObject({
      type: 'number',
      source: 'tool',
      required: false,
      origin: 'declared',
    });
    expect(doc.variables.find((v) => v.name === 'phone_number')).toMatchObject({
      type: 'string',
      source: 'collect',
      required: true,
      description: 'Caller phone number',
    });
  });

  it('extracts APIs with parameters and response mappings', () => {
    expect(doc.apis.map((a) => a.function_name)).toEqual([
      'verify_customer',
      'get_order_status',
      'get_order_age',
      'create_return',
      'log_transfer',
    ]);
    expect(doc.apis[1]).toEqual({
      name: 'Get Order Status',
      function_name: 'get_order_status',
      method: 'GET',
      endpoint: '/orders/status',
      description: '',
      parameters: [{ name: 'order_id', type: 'string', required: true, description: '' }],
      extractions: [
        { variable: 'order_status', path: 'response.status' },
        { variable: 'delivery_date', path: 'response.eta' },
      ],
      error_handlers: [],
    });
    expect(doc.apis[3].parameters.map((p) => p.name)).toEqual(['order_id', 'return_reason']);
  });

  it('extracts business rule blocks', () => {
    expect(doc.business_rules).toEqual([
      {
        id: 'BR-01',
        name: 'Return Window',
        condition: 'order_age_days > 30',
        action: 'End the call and explain that returns are accepted within 30 days',
        applies_to: ['F-03'],
        priority: 2,
      },
      {
        id: 'BR-02',
        name: 'VIP Fast Lane',
        condition: 'is_vip == true',
        action: 'Transfer to a senior agent',
        applies_to: ['F-02'],
        priority: 1,
      },
      {
        id: 'BR-03',
        name: 'Missing Reason',
        condition: 'return_reason is empty',
        action: 'Ask the customer to describe the problem again',
        applies_to: ['F-03'],
        priority: 1,
      },
    ]);
  });

  it('extracts features with classified steps', () => {
    expect(doc.features.map((f) => `${f.id} ${f.name}`)).toEqual([
      'F-01 Greeting and Identification',
      'F-02 Order Tracking',
      'F-03 Return Request',
      'F-04 Transfer to Agent',
    ]);
    expect(doc.features.map((f) => f.steps.map((s) => s.type))).toEqual([
      ['conversation', 'collect', 'api_call', 'collect'],
      ['collect', 'api_call', 'condition', 'conversation'],
      ['collect', 'api_call', 'collect', 'api_call', 'conversation'],
      ['condition', 'api_call', 'transfer'],
    ]);
  });

  it('resolves step references against declared names', () => {
    const [greeting, tracking] = doc.features;

    expect(greeting.description).toBe('Greets the caller and confirms who they are.');
    expect(greeting.channel).toBe('voice');
    expect(greeting.flow_variants).toEqual(['generic']);
    expect(greeting.variables_used).toEqual(['phone_number', 'customer_name']);
    expect(greeting.apis_used).toEqual(['verify_customer']);
    expect(tracking.steps[2]).toEqual({
      order: 3,
      type: 'condition',
      description: 'If `order_status` is delayed, then apologize for the delay',
      condition: '`order_status` is delayed',
      branch_action: 'apologize for the delay',
      variable_name: 'order_status',
    });
  });

  it('raises no open questions for a consistent document', () => {
    expect(doc.open_questions).toEqual([]);
  });
});

describe('parseDocument edge cases', () => {
  it('rejects empty input', () => {
    expect(() => parseDocument('')).toThrow(EmptyInputError);
    expect(() => parseDocument('  \n\t')).toThrow(EmptyInputError);
  });

  it('turns unresolved references into open questions', () => {
    const doc = parseDocument(
      ['# Weather Bot', '', '### F-01: Forecast', '', '#### Flow', '', '1. Call `lookup_weather`', '2. Ask', '', '### F-02: Later', ''].join('\n')
    );

    expect(doc.features[0].steps[0].api_name).toBe('lookup_weather');
    expect(doc.open_questions).toEqual([
      'F-01 step 1 references undeclared API "lookup_weather"',
      'F-01 step 2 collects a value that could not be named',
      'Feature F-02 has no flow steps',
    ]);
    expect(doc.features[1].open_questions).toEqual(['No flow steps found for F-02']);
  });

  it('uses the configured default channel when the document names none', () => {
    const doc = parseDocument('# Plain Bot\n\nNothing about channels here.', { defaultChannel: 'text' });

    expect(doc.metadata.channel).toBe('text');
    expect(doc.metadata.name).toBe('Plain Bot');
  });
});

describe('metadata detection', () => {
  it('detects Hebrew from any Hebrew character', () => {
    expect(detectLanguage('Agent greeting: שלום')).toBe('he-IL');
    expect(detectLanguage('Language: Hebrew')).toBe('he-IL');
    expect(detectLanguage('Plain English text')).toBe('en-US');
  });

  it('detects the channel from keywords', () => {
    expect(detectChannel('Channel: WhatsApp')).toBe('text');
    expect(detectChannel('This voice bot answers calls')).toBe('voice');
    expect(detectChannel('Channel: voice and text')).toBe('both');
    expect(detectChannel('No hints at all')).toBe('both');
    expect(detectChannel('No hints at all', 'voice')).toBe('voice');
  });

  it('strips document suffixes from the title', () => {
    expect(extractName('# Pizza Ordering Bot - PRD\n')).toBe('Pizza Ordering Bot');
    expect(extractName('Agent Name: Helper\n')).toBe('Helper');
    expect(extractName('no title here')).toBeNull();
  });
});

describe('classifyStep', () => {
  it.each([
    ['If the order is late, then apologize', 'condition'],
    ['Check if the customer is verified', 'condition'],
    ['Transfer to a human agent', 'transfer'],
    ['End the call', 'end'],
    ['Say goodbye', 'end'],
    ['Call the shipping API', 'api_call'],
    ['Ask for the order number', 'collect'],
    ['Set status to pending', 'set_variable'],
    ['Thank the caller', 'conversation'],
  ])('classifies "%s" as %s', (text, expected) => {
    expect(classifyStep(text)).toBe(expected);
  });
});

describe('parseCondition', () => {
  it('splits the condition from its then-clause', () => {
    expect(parseCondition('If the order is late, then apologize.')).toEqual({
      condition: 'the order is late',
      branchAction: 'apologize',
    });
  });

  it('keeps a bare condition', () => {
    expect(parseCondition('Check whether the card is valid')).toEqual({ condition: 'the card is valid' });
  });
});

describe('variable extraction', () => {
  it('parses list declarations', () => {
    expect(parseVariableListItem('`order_id` (string, required): The order number')).toEqual({
      variable: {
        name: 'order_id',
        type: 'string',
        description: 'The order number',
        source: 'user',
        required: true,
        default: null,
        options: [],
        validation_rules: [],
        collection_mode: 'explicit',
        origin: 'declared',
      },
      typed: true,
    });
    expect(parseVariableListItem('user (string)')).toBeNull();
  });

  it('collects inline references in order of appearance', () => {
    const { variables } = extractVariables('Hello {{customer_name}}, total ${order.total} and `tracking_code`. {{user}}');

    expect(variables.map((v) => `${v.name}:${v.origin}:${v.type}:${v.source}`)).toEqual([
      'customer_name:inline:string:collect',
      'order:inline:string:collect',
      'tracking_code:inline:string:collect',
    ]);
  });

  it('keeps the first of duplicate declarations', () => {
    const { variables, openQuestions } = extractVariables(
      ['## Variables', '', '- `amount` (number)', '- `amount` (string)', ''].join('\n')
    );

    expect(variables.map((v) => `${v.name}:${v.type}`)).toEqual(['amount:number']);
    expect(openQuestions).toEqual(['Variable "amount" is declared more than once; the first declaration is kept']);
  });
});

describe('API extraction', () => {
  it('reads list items with an inline method and path', () => {
    const { apis } = extractApis(['## APIs', '', '- Check Stock (GET /stock): Reads stock levels', ''].join('\n'));

    expect(apis).toEqual([
      {
        name: 'Check Stock',
        function_name: 'check_stock',
        method: 'GET',
        endpoint: '/stock',
        description: 'Reads stock levels',
        parameters: [],
        extractions: [],
        error_handlers: [],
      },
    ]);
  });

  it('defaults the method to POST', () => {
    const { apis } = extractApis(['## APIs', '', '- Send Receipt', ''].join('\n'));

    expect(apis[0]).toMatchObject({ function_name: 'send_receipt', method: 'POST', endpoint: '' });
  });
});

describe('business rule extraction', () => {
  it('parses prose rules with a feature reference', () => {
    const { rules } = extractBusinessRules(
      ['## Business Rules', '', '- BR-03: If the order is older than 30 days, then deny the return (F-03)', '- When stock is low, then warn the caller', ''].join('\n')
    );

    expect(rules).toEqual([
      {
        id: 'BR-03',
        name: 'BR-03',
        condition: 'the order is older than 30 days',
        action: 'deny the return',
        applies_to: ['F-03'],
        priority: 2,
      },
      {
        id: 'BR-01',
        name: 'BR-01',
        condition: 'stock is low',
        action: 'warn the caller',
        applies_to: [],
        priority: 1,
      },
    ]);
  });

  it('returns null for prose that is not a rule', () => {
    expect(parseProseRule('Always be polite')).toBeNull();
  });

  it('keeps a declared id that appears after an unnumbered rule', () => {
    const { rules, openQuestions } = extractBusinessRules(
      [
        '## Business Rules',
        '',
        '| ID | Condition | Action |',
        '|----|-----------|--------|',
        '| | cart is empty | warn |',
        '| BR-01 | amount > 100 | escalate |',
        '',
      ].join('\n')
    );

    expect(rules.map((r) => [r.id, r.condition])).toEqual([
      ['BR-02', 'cart is empty'],
      ['BR-01', 'amount > 100'],
    ]);
    expect(openQuestions).toEqual([]);
  });

  it('renumbers a repeated id and reports it', () => {
    const { rules, openQuestions } = extractBusinessRules(
      [
        '## Business Rules',
        '',
        '| ID | Condition | Action |',
        '|----|-----------|--------|',
        '| BR-01 | cart is empty | warn |',
        '| BR-01 | amount > 100 | escalate |',
        '',
      ].join('\n')
    );

    expect(rules.map((r) => r.id)).toEqual(['BR-01', 'BR-02']);
    expect(openQuestions).toEqual([
      'Business rule id BR-01 is used more than once; the later rule was renumbered BR-02',
    ]);
  });
});
