/**
 * Engine Error Types
 *
 * Transform passes throw these when their preconditions fail.
 * The Validator never throws them: it reports the same names as data
 * (see ValidationFinding.errorType).
 */

/**
 * Names shared by thrown errors and validator findings
 */
export type TopologyErrorName =
  | 'StructuralError'
  | 'ConfigError'
  | 'CapacityError'
  | 'BandwidthError'
  | 'LatencyError';

/**
 * Common base so callers can catch every engine failure at once
 */
export class TopologyError extends Error {
  constructor(
    message: string,
    public readonly nodeIds: readonly number[] = []
  ) {
    super(message);
    this.name = 'TopologyError';
  }
}

/**
 * Malformed references, duplicate ids, multi-edges
 */
export class StructuralError extends TopologyError {
  constructor(message: string, nodeIds: readonly number[] = []) {
    super(message, nodeIds);
    this.name = 'StructuralError';
  }
}

/**
 * Invalid or out-of-range configuration and requirement values
 */
export class ConfigError extends TopologyError {
  constructor(message: string, nodeIds: readonly number[] = []) {
    super(message, nodeIds);
    this.name = 'ConfigError';
  }
}

/**
 * Port, fan-in or fan-out overflow
 */
export class CapacityError extends TopologyError {
  constructor(message: string, nodeIds: readonly number[] = []) {
    super(message, nodeIds);
    this.name = 'CapacityError';
  }
}

/**
 * Target oversubscription
 */
export class BandwidthError extends TopologyError {
  constructor(message: string, nodeIds: readonly number[] = []) {
    super(message, nodeIds);
    this.name = 'BandwidthError';
  }
}

/**
 * Latency requirement violated
 */
export class LatencyError extends TopologyError {
  constructor(message: string, nodeIds: readonly number[] = []) {
    super(message, nodeIds);
    this.name = 'LatencyError';
  }
}

/**
 * Thrown by RoutingTable.require() when no path exists.
 * Absence is never turned into a default port.
 */
export class RouteNotFoundError extends TopologyError {
  constructor(
    public readonly src: number,
    public readonly dst: number
  ) {
    super(`No route from node ${src} to node ${dst}`, [src, dst]);
    this.name = 'RouteNotFoundError';
  }
}

/**
 * Thrown when the latency oracle returns something the sweep cannot use
 */
export class SimulationError extends TopologyError {
  constructor(
    message: string,
    public readonly injectionRate: number
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}
