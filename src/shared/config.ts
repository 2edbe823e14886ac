/**
 * Centralized Configuration
 *
 * All engine knobs loaded from environment variables with sensible defaults.
 * Transform passes never read these constants directly: they receive an
 * EngineConfig value, so experiments stay reproducible.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { ConfigError } from './errors.js';

// Load .env file
loadDotenv();

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

/**
 * Converter insertion / validation
 */
export const AUTO_INSERT_CONVERTERS = envBool('NOC_AUTO_INSERT_CONVERTERS', true);
export const NIU_ENTRY_ONLY = envBool('NOC_NIU_ENTRY_ONLY', true);

/**
 * Generator
 */
export const FAST_DOMAIN_THRESHOLD = parseFloat(process.env.NOC_FAST_DOMAIN_THRESHOLD || '2.0'); // GB/s
export const FAST_DOMAIN_NAME = process.env.NOC_FAST_DOMAIN_NAME || 'fast';
export const SLOW_DOMAIN_NAME = process.env.NOC_SLOW_DOMAIN_NAME || 'slow';
export const DEFAULT_FREQUENCY_MHZ = parseFloat(process.env.NOC_DEFAULT_FREQUENCY_MHZ || '2000');

/**
 * Optimizer
 */
export const HIGH_BW_THRESHOLD = parseFloat(process.env.NOC_HIGH_BW_THRESHOLD || '50'); // GB/s
export const LOW_BW_THRESHOLD = parseFloat(process.env.NOC_LOW_BW_THRESHOLD || '5'); // GB/s
export const CROSSBAR_CAPACITY = parseFloat(process.env.NOC_CROSSBAR_CAPACITY || '500'); // GB/s

/**
 * Sweep
 */
export const SWEEP_STEP = parseFloat(process.env.NOC_SWEEP_STEP || '10');
export const SWEEP_THRESHOLD = parseFloat(process.env.NOC_SWEEP_THRESHOLD || '100.0'); // cycles

/**
 * Logging
 * Use /tmp explicitly (not os.tmpdir()) so every tool finds the same file
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'noc-engine.log');
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const SUPPRESS_TEST_LOGS = NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * Every knob a pipeline run consumes
 */
export interface EngineConfig {
  autoInsertConverters: boolean;
  /** true: Initiators/Targets may only attach through an NIU; false relaxes the rule */
  niuEntryOnly: boolean;
  highBwThreshold: number;
  lowBwThreshold: number;
  fastDomainThreshold: number;
  fastDomainName: string;
  slowDomainName: string;
  defaultFrequencyMhz: number;
  crossbarCapacity: number;
  sweepStep: number;
  sweepThreshold: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  autoInsertConverters: AUTO_INSERT_CONVERTERS,
  niuEntryOnly: NIU_ENTRY_ONLY,
  highBwThreshold: HIGH_BW_THRESHOLD,
  lowBwThreshold: LOW_BW_THRESHOLD,
  fastDomainThreshold: FAST_DOMAIN_THRESHOLD,
  fastDomainName: FAST_DOMAIN_NAME,
  slowDomainName: SLOW_DOMAIN_NAME,
  defaultFrequencyMhz: DEFAULT_FREQUENCY_MHZ,
  crossbarCapacity: CROSSBAR_CAPACITY,
  sweepStep: SWEEP_STEP,
  sweepThreshold: SWEEP_THRESHOLD,
});

/**
 * Check an engine configuration
 */
export function validateConfig(
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!(config.lowBwThreshold > 0)) {
    errors.push(`lowBwThreshold must be > 0, got ${config.lowBwThreshold}`);
  }

  if (!(config.highBwThreshold > config.lowBwThreshold)) {
    errors.push(
      `highBwThreshold (${config.highBwThreshold}) must exceed lowBwThreshold (${config.lowBwThreshold})`
    );
  }

  if (!(config.fastDomainThreshold > 0)) {
    errors.push(`fastDomainThreshold must be > 0, got ${config.fastDomainThreshold}`);
  }

  if (config.fastDomainName === config.slowDomainName) {
    errors.push(`fast and slow domain names must differ, both are '${config.fastDomainName}'`);
  }

  if (!(config.defaultFrequencyMhz > 0)) {
    errors.push(`defaultFrequencyMhz must be > 0, got ${config.defaultFrequencyMhz}`);
  }

  if (!(config.crossbarCapacity > 0)) {
    errors.push(`crossbarCapacity must be > 0, got ${config.crossbarCapacity}`);
  }

  if (!(config.sweepStep > 0) || config.sweepStep > 100) {
    errors.push(`sweepStep must be in (0, 100], got ${config.sweepStep}`);
  }

  if (!(config.sweepThreshold > 0)) {
    errors.push(`sweepThreshold must be > 0, got ${config.sweepThreshold}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Merge overrides onto the defaults and reject invalid combinations
 */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigError(`Invalid engine configuration: ${errors.join('; ')}`);
  }
  return config;
}
