/**
 * Complexity Scorer Tests
 */

import { describe, it, expect } from 'vitest';
import {
  isComplexFeature,
  scoreDocument,
  scoreFeature,
  selectStrategy,
} from '../../src/generator/complexity.js';
import { parseDocument } from '../../src/parser/document-parser.js';
import {
  docApi,
  docVariable,
  feature,
  featureWithSteps,
  loadFixture,
  ORDER_SUPPORT_PRD,
  parsedDocument,
} from '../utils/fixtures.js';

const thresholds = { lowThreshold: 15, highThreshold: 40 };

describe('scoreDocument', () => {
  it('weights features, steps, variables and APIs', () => {
    const doc = parsedDocument({
      features: [featureWithSteps('F-01', 3), featureWithSteps('F-02', 2)],
      variables: [docVariable('order_id'), docVariable('email'), docVariable('phone')],
      apis: [docApi('get_order')],
    });

    expect(scoreDocument(doc)).toEqual({ score: 2 * 2 + 5 + 1.5 + 1, features: 2, steps: 5, variables: 3, apis: 1 });
  });

  it('scores the order-support document into the hybrid band', () => {
    const complexity = scoreDocument(parseDocument(loadFixture(ORDER_SUPPORT_PRD)));

    expect(complexity).toEqual({ score: 33.5, features: 4, steps: 16, variables: 9, apis: 5 });
    expect(selectStrategy(complexity.score, thresholds)).toBe('hybrid');
  });

  it('scores an empty document as zero', () => {
    expect(scoreDocument(parsedDocument()).score).toBe(0);
  });
});

describe('selectStrategy', () => {
  it.each([
    [0, 'simple'],
    [14.5, 'simple'],
    [15, 'hybrid'],
    [40, 'hybrid'],
    [40.5, 'chunked'],
  ])('maps score %s to %s', (score, expected) => {
    expect(selectStrategy(score, thresholds)).toBe(expected);
  });
});

describe('scoreFeature', () => {
  it('bands the step count', () => {
    expect(scoreFeature(featureWithSteps('F-01', 0))).toBe(0);
    expect(scoreFeature(featureWithSteps('F-01', 5))).toBe(1);
    expect(scoreFeature(featureWithSteps('F-01', 6))).toBe(2);
    expect(scoreFeature(featureWithSteps('F-01', 11))).toBe(3);
  });

  it('adds variables, APIs, dependencies and user stories', () => {
    const busy = feature('F-02', featureWithSteps('F-02', 11).steps, {
      variables_used: ['a_1', 'a_2', 'a_3', 'a_4', 'a_5', 'a_6'],
      apis_used: ['one', 'two', 'three', 'four'],
      dependencies: ['F-01'],
      user_stories: ['s1', 's2', 's3', 's4'],
    });

    expect(scoreFeature(busy)).toBe(3 + 2 + 2 + 1 + 1);
  });

  it('uses a strict threshold for complex features', () => {
    const six = feature('F-01', featureWithSteps('F-01', 11).steps, {
      variables_used: ['a_1', 'a_2', 'a_3', 'a_4', 'a_5', 'a_6'],
      apis_used: ['lookup'],
    });
    const five = feature('F-01', featureWithSteps('F-01', 11).steps, {
      variables_used: ['a_1', 'a_2', 'a_3', 'a_4', 'a_5', 'a_6'],
    });

    expect(isComplexFeature(six, 5)).toBe(true);
    expect(isComplexFeature(five, 5)).toBe(false);
  });

  it('scores each order-support feature', () => {
    const doc = parseDocument(loadFixture(ORDER_SUPPORT_PRD));

    expect(doc.features.map(scoreFeature)).toEqual([2, 3, 3, 2]);
  });
});
