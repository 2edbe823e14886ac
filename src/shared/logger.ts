/**
 * Engine Logger
 *
 * Centralized logging for pipeline stages.
 * Appends timestamped, categorized lines to LOG_PATH.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from './config.js';

/**
 * Log categories
 */
export enum EngineLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  GENERATE = 'GENERATE',
  TRANSFORM = 'TRANSFORM',
  VALIDATE = 'VALIDATE',
  SWEEP = 'SWEEP',
  ERROR = 'ERROR',
}

/**
 * Engine logger utility
 */
export class EngineLogger {
  private static enabled = !SUPPRESS_TEST_LOGS;

  private static log(level: EngineLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [NoC:${level}] ${message}`;

    fs.appendFileSync(LOG_PATH, logMsg + '\n');
  }

  /**
   * Log generated topology
   */
  static topologyGenerated(
    initiators: number,
    targets: number,
    nodes: number,
    edges: number,
    crossbarWidth: number
  ): void {
    this.log(
      EngineLogLevel.GENERATE,
      `crossbar ${initiators}x${targets} (${crossbarWidth}-bit): ${nodes} nodes, ${edges} edges`
    );
  }

  /**
   * Log converter insertion
   */
  static convertersInserted(names: readonly string[]): void {
    if (names.length === 0) return;
    this.log(
      EngineLogLevel.TRANSFORM,
      `auto-inserted ${names.length} converter(s): ${names.join(', ')}`
    );
  }

  /**
   * Log optimizer outcome
   */
  static optimized(dedicated: number, arbiters: number, removedEdges: number, crossbarPorts: number): void {
    this.log(
      EngineLogLevel.TRANSFORM,
      `optimizer: ${dedicated} dedicated router(s), ${arbiters} arbiter(s), ${removedEdges} crossbar edge(s) removed, crossbar ports=${crossbarPorts}`
    );
  }

  /**
   * Log validation result
   */
  static validationResult(stage: string, errorCount: number, warningCount: number): void {
    this.log(
      EngineLogLevel.VALIDATE,
      `${stage}: ${errorCount} errors, ${warningCount} warnings`
    );
  }

  /**
   * Log one sweep probe
   */
  static sweepSample(injectionRate: number, latency: number, step: number): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(
      EngineLogLevel.SWEEP,
      `rate=${injectionRate.toFixed(2)}% latency=${latency.toFixed(2)} step=${step}`
    );
  }

  /**
   * Log sweep end state
   */
  static sweepFinished(state: string, rate: number | null, calls: number): void {
    const rateInfo = rate === null ? 'none' : `${rate.toFixed(2)}%`;
    this.log(EngineLogLevel.SWEEP, `${state}: saturation=${rateInfo} after ${calls} oracle calls`);
  }

  /**
   * Log error
   */
  static error(message: string, error?: Error): void {
    this.log(EngineLogLevel.ERROR, message);
    if (error) {
      this.log(EngineLogLevel.ERROR, `   ${error.name}: ${error.message}`);
    }
  }

  /**
   * Log info message
   */
  static info(message: string): void {
    this.log(EngineLogLevel.INFO, message);
  }

  /**
   * Log debug message
   */
  static debug(message: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(EngineLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}
