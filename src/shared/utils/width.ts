/**
 * Data-width helpers
 *
 * bandwidth (GB/s) = width (bits) * frequency (MHz) / 8 / 1000
 */

import { ConfigError } from '../errors.js';
import { SUPPORTED_WIDTHS } from '../types/topology.js';

export const MIN_WIDTH = SUPPORTED_WIDTHS[0];
export const MAX_WIDTH = SUPPORTED_WIDTHS[SUPPORTED_WIDTHS.length - 1];

export function isSupportedWidth(width: number): boolean {
  return SUPPORTED_WIDTHS.some((w) => w === width);
}

/**
 * Smallest power of two >= value (1 for value <= 1)
 */
export function ceilPow2(value: number): number {
  let result = 1;
  while (result < value) {
    result *= 2;
  }
  return result;
}

/**
 * Bits per cycle needed to carry `bandwidth` at `frequency`
 */
export function requiredBits(bandwidth: number, frequency: number): number {
  return (bandwidth * 8000) / frequency;
}

/**
 * Derive a supported width for a bandwidth/frequency pair.
 *
 * @param context - Used in error messages (node or flow name)
 * @throws ConfigError for non-positive inputs or more than MAX_WIDTH bits
 */
export function deriveWidth(bandwidth: number, frequency: number, context: string): number {
  if (!(bandwidth > 0)) {
    throw new ConfigError(`${context}: bandwidth must be > 0 GB/s, got ${bandwidth}`);
  }
  if (!(frequency > 0)) {
    throw new ConfigError(`${context}: frequency must be > 0 MHz, got ${frequency}`);
  }

  const bits = ceilPow2(requiredBits(bandwidth, frequency));
  if (bits > MAX_WIDTH) {
    throw new ConfigError(
      `${context}: ${bandwidth} GB/s at ${frequency} MHz needs ${bits} bits (max ${MAX_WIDTH})`
    );
  }
  return Math.max(MIN_WIDTH, bits);
}
