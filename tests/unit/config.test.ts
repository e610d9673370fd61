/**
 * Configuration Module Tests
 *
 * Tests the centralized configuration module with Zod validation.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { _resetConfigCache, config, getConfig, isTest } from '../../src/config/index.js';

describe('Configuration Module', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    _resetConfigCache();
  });

  describe('Default Configuration', () => {
    it('applies defaults for every section', () => {
      expect(config.llm).toMatchObject({
        provider: 'fixtures',
        temperature: 0.3,
        maxTokens: 4096,
        timeoutMs: 60000,
        assistEnabled: true,
      });
      expect(config.strategy).toEqual({
        choice: 'auto',
        lowThreshold: 15,
        highThreshold: 40,
        featureComplexityThreshold: 5,
        chunkSize: 5,
        smallFeatureMaxSteps: 2,
      });
      expect(config.validation).toEqual({ strict: false, autoFixEnabled: true, maxIterations: 5 });
      expect(config.output).toEqual({ defaultChannel: 'both', flowLlmProvider: 'openai', flowLlmModel: 'gpt-4o' });
    });

    it('knows it runs under the test runner', () => {
      expect(isTest()).toBe(true);
      expect(config.app.logLevel).toBe('silent');
    });
  });

  describe('Environment Overrides', () => {
    it('coerces numbers and booleans', () => {
      vi.stubEnv('CHUNK_SIZE', '3');
      vi.stubEnv('COMPLEXITY_HIGH_THRESHOLD', '60');
      vi.stubEnv('STRICT_MODE', 'yes');
      vi.stubEnv('AUTO_FIX_ENABLED', 'no');
      vi.stubEnv('LLM_ASSIST_ENABLED', '0');
      _resetConfigCache();

      expect(config.strategy.chunkSize).toBe(3);
      expect(config.strategy.highThreshold).toBe(60);
      expect(config.validation.strict).toBe(true);
      expect(config.validation.autoFixEnabled).toBe(false);
      expect(config.llm.assistEnabled).toBe(false);
    });

    it('reads the strategy and output channel', () => {
      vi.stubEnv('STRATEGY', 'chunked');
      vi.stubEnv('DEFAULT_CHANNEL', 'voice');
      _resetConfigCache();

      expect(getConfig().strategy.choice).toBe('chunked');
      expect(getConfig().output.defaultChannel).toBe('voice');
    });

    it('caches the parsed config until reset', () => {
      expect(config.strategy.chunkSize).toBe(5);

      vi.stubEnv('CHUNK_SIZE', '9');
      expect(config.strategy.chunkSize).toBe(5);

      _resetConfigCache();
      expect(config.strategy.chunkSize).toBe(9);
    });
  });

  describe('Validation', () => {
    it('rejects an unknown strategy', () => {
      vi.stubEnv('STRATEGY', 'greedy');
      _resetConfigCache();

      expect(() => config.strategy).toThrow(/^Invalid configuration\. Please check environment variables\. strategy\.choice: /);
    });

    it('rejects a non-positive chunk size', () => {
      vi.stubEnv('CHUNK_SIZE', '0');
      _resetConfigCache();

      expect(() => config.strategy).toThrow(/strategy\.chunkSize/);
    });

    it('rejects a low threshold above the high threshold', () => {
      vi.stubEnv('COMPLEXITY_LOW_THRESHOLD', '50');
      _resetConfigCache();

      expect(() => getConfig()).toThrow(
        'Invalid configuration. Please check environment variables. strategy.lowThreshold: COMPLEXITY_LOW_THRESHOLD must not exceed COMPLEXITY_HIGH_THRESHOLD'
      );
    });

    it('rejects an out-of-range temperature', () => {
      vi.stubEnv('LLM_TEMPERATURE', '3');
      _resetConfigCache();

      expect(() => config.llm).toThrow(/llm\.temperature/);
    });
  });
});
