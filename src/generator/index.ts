/**
 * Topology Generator
 */

export type {
  CrossbarSummary,
  DerivedWidth,
  GeneratedTopology,
  SynthesisReport,
  WidthRole
} from './types.js';

export {
  CROSSBAR_LINK_LATENCY,
  CROSSBAR_NAME,
  INITIATOR_NIU_LATENCY,
  TARGET_NIU_LATENCY_DIVISOR
} from './types.js';

export { assignClockDomain, countNodeKinds, generateTopology } from './topology-generator.js';
