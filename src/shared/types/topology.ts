/**
 * NoC Topology - Type Definitions
 *
 * 8 node kinds as a closed tagged union over `kind`.
 * Adding a kind breaks every exhaustive switch (assertNever) until handled.
 */

export type NodeId = number;

/** Supported data widths in bits */
export const SUPPORTED_WIDTHS = [32, 64, 128, 256, 512, 1024] as const;

export const MAX_ARBITER_INPUTS = 4;
export const MAX_DECODER_OUTPUTS = 4;

export type TrafficPattern = 'bursty' | 'streaming' | 'uniform';
export type ArbiterPolicy = 'priority' | 'round_robin' | 'weighted';
export type RouterRole = 'crossbar' | 'dedicated';

interface NodeCommon {
  readonly id: NodeId;
  readonly name: string;
}

/** Traffic source */
export interface InitiatorNode extends NodeCommon {
  readonly kind: 'Initiator';
  readonly avgThroughput: number; // GB/s
  readonly maxThroughput: number; // GB/s
  readonly latencyRequirement: number; // cycles
  readonly priority: number; // 0 = highest
  readonly trafficPattern: TrafficPattern;
}

/** Memory / peripheral */
export interface TargetNode extends NodeCommon {
  readonly kind: 'Target';
  readonly maxBandwidth: number; // GB/s
  readonly latency: number; // cycles
  readonly size: number; // GB
}

/** Network interface unit */
export interface NiuNode extends NodeCommon {
  readonly kind: 'NIU';
  readonly width: number;
  readonly clockDomain: string;
}

export interface RouterNode extends NodeCommon {
  readonly kind: 'Router';
  readonly width: number;
  readonly clockDomain: string;
  readonly numPorts: number;
  readonly role?: RouterRole;
}

export interface ArbiterNode extends NodeCommon {
  readonly kind: 'Arbiter';
  readonly numInputs: number;
  readonly width: number;
  readonly policy: ArbiterPolicy;
  readonly clockDomain?: string;
  /** Initiator ids, highest grant priority first */
  readonly grantOrder?: readonly NodeId[];
}

export interface DecoderNode extends NodeCommon {
  readonly kind: 'Decoder';
  readonly numOutputs: number;
  readonly width: number;
  readonly clockDomain?: string;
}

export interface ClockConverterNode extends NodeCommon {
  readonly kind: 'ClockConverter';
  readonly width: number;
  readonly srcClockDomain: string;
  readonly dstClockDomain: string;
}

export interface WidthConverterNode extends NodeCommon {
  readonly kind: 'WidthConverter';
  readonly srcWidth: number;
  readonly dstWidth: number;
  readonly clockDomain: string;
}

export type TopologyNode =
  | InitiatorNode
  | TargetNode
  | NiuNode
  | RouterNode
  | ArbiterNode
  | DecoderNode
  | ClockConverterNode
  | WidthConverterNode;

export type NodeKind = TopologyNode['kind'];

export type NodeOfKind<K extends NodeKind> = Extract<TopologyNode, { kind: K }>;

/** Directed link */
export interface TopologyEdge {
  readonly src: NodeId;
  readonly dst: NodeId;
  readonly width: number; // bits actually carried
  readonly latency: number; // cycles
}

export interface ClockDomain {
  readonly name: string;
  readonly frequency: number; // MHz
}

/** Guaranteed-bandwidth requirement between an Initiator and a Target */
export interface TrafficFlow {
  readonly src: NodeId;
  readonly dst: NodeId;
  readonly bandwidth: number; // GB/s
  readonly maxLatency: number; // cycles
  readonly priority: number;
}

export type Direction = 'in' | 'out' | 'both';

/**
 * Exhaustiveness guard for switches over NodeKind
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
