/**
 * Validation Module Types
 *
 * Findings are data, never exceptions. errorType reuses the names of the
 * thrown error classes; findingToError() builds the matching error.
 */

import type { TopologyErrorName } from '../shared/errors.js';
import type { NodeId, TrafficFlow } from '../shared/types/topology.js';

/**
 * Rule identifiers, in evaluation order
 */
export type ValidationRuleId =
  | 'niu-entry'
  | 'unconnected-endpoint'
  | 'width-support'
  | 'width-match'
  | 'clock-domain'
  | 'arbiter-fan-in'
  | 'decoder-fan-out'
  | 'router-ports'
  | 'target-bandwidth'
  | 'flow-endpoints'
  | 'flow-latency'
  | 'redundant-converter'
  | 'disconnected-component';

export type FindingSeverity = 'error' | 'warning';

export interface ValidationFinding {
  rule: ValidationRuleId;
  severity: FindingSeverity;
  errorType: TopologyErrorName;
  message: string;
  nodeIds: NodeId[];
  edge?: { src: NodeId; dst: NodeId };
}

export interface ValidateOptions {
  /** Needed for the bandwidth and latency rules */
  flows?: readonly TrafficFlow[];
  /** false relaxes the NIU-entry rule (default true) */
  niuEntryOnly?: boolean;
}

export interface TopologyValidationResult {
  valid: boolean;
  errors: ValidationFinding[];
  warnings: ValidationFinding[];
}

/** Utilization above this ratio is reported as a warning */
export const BANDWIDTH_WARNING_RATIO = 0.9;

/** Relative slack on bandwidth sums, so 1.1 + 2.2 GB/s fits a 3.3 GB/s target */
export const BANDWIDTH_TOLERANCE = 1e-9;
