/**
 * Node Ports
 *
 * Width and clock domain seen on each side of a node.
 * Converters are the only kinds whose input and output sides differ:
 * - WidthConverter: srcWidth in, dstWidth out
 * - ClockConverter: srcClockDomain in, dstClockDomain out
 * Initiators and Targets declare neither.
 */

import { assertNever, type TopologyNode } from '../shared/types/topology.js';

export type PortSide = 'in' | 'out';

export function portWidth(node: TopologyNode, side: PortSide): number | undefined {
  switch (node.kind) {
    case 'Initiator':
    case 'Target':
      return undefined;
    case 'NIU':
    case 'Router':
    case 'Arbiter':
    case 'Decoder':
    case 'ClockConverter':
      return node.width;
    case 'WidthConverter':
      return side === 'in' ? node.srcWidth : node.dstWidth;
    default:
      return assertNever(node);
  }
}

export function portDomain(node: TopologyNode, side: PortSide): string | undefined {
  switch (node.kind) {
    case 'Initiator':
    case 'Target':
      return undefined;
    case 'NIU':
    case 'Router':
    case 'Arbiter':
    case 'Decoder':
    case 'WidthConverter':
      return node.clockDomain;
    case 'ClockConverter':
      return side === 'in' ? node.srcClockDomain : node.dstClockDomain;
    default:
      return assertNever(node);
  }
}

/**
 * Every width attribute a node declares
 */
export function declaredWidths(node: TopologyNode): number[] {
  switch (node.kind) {
    case 'Initiator':
    case 'Target':
      return [];
    case 'NIU':
    case 'Router':
    case 'Arbiter':
    case 'Decoder':
    case 'ClockConverter':
      return [node.width];
    case 'WidthConverter':
      return [node.srcWidth, node.dstWidth];
    default:
      return assertNever(node);
  }
}

/**
 * Cycles spent inside the node itself (Target access latency)
 */
export function nodeLatency(node: TopologyNode): number {
  return node.kind === 'Target' ? node.latency : 0;
}

export function isConverter(node: TopologyNode): boolean {
  return node.kind === 'ClockConverter' || node.kind === 'WidthConverter';
}
