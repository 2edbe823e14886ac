/**
 * Unit Tests - Engine Configuration
 */

import { describe, it, expect } from 'vitest';
import { createEngineConfig, validateConfig } from '../../../src/shared/config.js';
import { ConfigError } from '../../../src/shared/errors.js';
import { testConfig } from '../../setup.js';

describe('engine configuration', () => {
  it('should accept the pinned test configuration', () => {
    expect(validateConfig(testConfig())).toEqual({ valid: true, errors: [] });
  });

  it('should apply overrides', () => {
    expect(createEngineConfig({ ...testConfig(), highBwThreshold: 80 }).highBwThreshold).toBe(80);
  });

  it('should require high above low threshold', () => {
    const { valid, errors } = validateConfig({ ...testConfig(), highBwThreshold: 5, lowBwThreshold: 5 });

    expect(valid).toBe(false);
    expect(errors).toEqual(['highBwThreshold (5) must exceed lowBwThreshold (5)']);
  });

  it('should collect every problem', () => {
    const { errors } = validateConfig({
      ...testConfig(),
      fastDomainName: 'clk',
      slowDomainName: 'clk',
      crossbarCapacity: 0,
      sweepStep: 120,
    });

    expect(errors).toEqual([
      "fast and slow domain names must differ, both are 'clk'",
      'crossbarCapacity must be > 0, got 0',
      'sweepStep must be in (0, 100], got 120',
    ]);
  });

  it('should throw ConfigError from createEngineConfig', () => {
    expect(() => createEngineConfig({ ...testConfig(), defaultFrequencyMhz: -1 })).toThrow(ConfigError);
    expect(() => createEngineConfig({ ...testConfig(), sweepThreshold: 0 })).toThrow(
      'Invalid engine configuration: sweepThreshold must be > 0, got 0'
    );
  });
});
