/**
 * Converter Inserter
 *
 * Closes clock-domain and width gaps by interposing converter nodes.
 * Clock pass runs first, then the width pass on its result, so a
 * WidthConverter only ever lives in a single domain.
 *
 * Running the pass on its own output inserts nothing and returns the
 * input graph instance.
 */

import { DEFAULT_ENGINE_CONFIG } from '../shared/config.js';
import { EngineLogger } from '../shared/logger.js';
import type { NodeId, TopologyEdge } from '../shared/types/topology.js';
import { checkClockDomains, checkEndpointWidths } from '../validation/topology-validator.js';
import type { ValidationFinding } from '../validation/types.js';
import { portDomain, portWidth } from './node-ports.js';
import type { GraphDraft, TopologyGraph } from './topology-graph.js';

export interface InsertOptions {
  /** false reports mismatches instead of fixing them (default: config) */
  enabled?: boolean;
  /** Domain for a WidthConverter whose neighbours declare none */
  fallbackDomain?: string;
}

export interface InsertedConverter {
  id: NodeId;
  name: string;
  kind: 'ClockConverter' | 'WidthConverter';
  /** Edge the converter was interposed on */
  between: [NodeId, NodeId];
}

export interface InsertionResult {
  graph: TopologyGraph;
  inserted: InsertedConverter[];
  /** Mismatches left in place (only when disabled) */
  errors: ValidationFinding[];
}

/**
 * Split an edge's latency over two hops, each at least one cycle
 */
export function splitLatency(latency: number): [number, number] {
  const first = Math.floor(latency / 2);
  return [Math.max(1, first), Math.max(1, latency - first)];
}

function clockPass(draft: GraphDraft, inserted: InsertedConverter[]): void {
  for (const edge of [...draft.edges]) {
    const u = draft.node(edge.src);
    const v = draft.node(edge.dst);
    if (!u || !v || u.kind === 'ClockConverter' || v.kind === 'ClockConverter') continue;

    const from = portDomain(u, 'out');
    const to = portDomain(v, 'in');
    if (from === undefined || to === undefined || from === to) continue;

    const id = draft.allocateId();
    const name = `${u.name}_${v.name}_CDC`;
    const width = portWidth(u, 'out') ?? edge.width;
    draft.addNode({
      kind: 'ClockConverter',
      id,
      name,
      width,
      srcClockDomain: from,
      dstClockDomain: to,
    });

    const [first, second] = splitLatency(edge.latency);
    draft.replaceEdge(edge.src, edge.dst, [
      { src: u.id, dst: id, width, latency: first },
      { src: id, dst: v.id, width, latency: second },
    ]);
    inserted.push({ id, name, kind: 'ClockConverter', between: [u.id, v.id] });
  }
}

function widthPass(draft: GraphDraft, inserted: InsertedConverter[], fallbackDomain: string): void {
  for (const edge of [...draft.edges]) {
    const a = draft.node(edge.src);
    const b = draft.node(edge.dst);
    if (!a || !b || a.kind === 'WidthConverter' || b.kind === 'WidthConverter') continue;

    const srcWidth = portWidth(a, 'out');
    const dstWidth = portWidth(b, 'in');
    if (srcWidth === undefined || dstWidth === undefined || srcWidth === dstWidth) continue;

    const id = draft.allocateId();
    const name = `${a.name}_${b.name}_WC`;
    draft.addNode({
      kind: 'WidthConverter',
      id,
      name,
      srcWidth,
      dstWidth,
      clockDomain: portDomain(b, 'in') ?? portDomain(a, 'out') ?? fallbackDomain,
    });

    const [first, second] = splitLatency(edge.latency);
    const replacements: TopologyEdge[] = [
      { src: a.id, dst: id, width: srcWidth, latency: first },
      { src: id, dst: b.id, width: dstWidth, latency: second },
    ];
    draft.replaceEdge(edge.src, edge.dst, replacements);
    inserted.push({ id, name, kind: 'WidthConverter', between: [a.id, b.id] });
  }
}

/**
 * Interpose ClockConverters, then WidthConverters, on every mismatched edge.
 * New ids continue after the current maximum id.
 */
export function insertConverters(graph: TopologyGraph, options: InsertOptions = {}): InsertionResult {
  const enabled = options.enabled ?? DEFAULT_ENGINE_CONFIG.autoInsertConverters;

  if (!enabled) {
    return {
      graph,
      inserted: [],
      errors: [...checkClockDomains(graph), ...checkEndpointWidths(graph)],
    };
  }

  const draft = graph.edit();
  const inserted: InsertedConverter[] = [];
  clockPass(draft, inserted);
  widthPass(draft, inserted, options.fallbackDomain ?? DEFAULT_ENGINE_CONFIG.fastDomainName);

  if (inserted.length === 0) {
    return { graph, inserted, errors: [] };
  }

  EngineLogger.convertersInserted(inserted.map((c) => c.name));
  return { graph: draft.build(), inserted, errors: [] };
}
