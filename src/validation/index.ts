/**
 * Topology Validation
 */

export type {
  FindingSeverity,
  TopologyValidationResult,
  ValidateOptions,
  ValidationFinding,
  ValidationRuleId
} from './types.js';

export { BANDWIDTH_TOLERANCE, BANDWIDTH_WARNING_RATIO } from './types.js';

export {
  checkCapacity,
  checkClockDomains,
  checkConnectivity,
  checkEndpointWidths,
  checkFlows,
  checkNiuEntry,
  checkRedundantConverters,
  checkTargetBandwidth,
  checkWidthMatch,
  checkWidthSupport,
  findingToError,
  pathLatency,
  validateTopology
} from './topology-validator.js';
