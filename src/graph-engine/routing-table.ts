/**
 * Routing Table Builder
 *
 * Per-source BFS over sorted out-neighbours. For every reachable (src, dst)
 * the output port is 1 + index of the first hop among src's sorted
 * out-neighbours; port 0 is the self port.
 *
 * Unreachable pairs are absent. lookup() reports a miss as undefined,
 * require() throws RouteNotFoundError.
 */

import { RouteNotFoundError } from '../shared/errors.js';
import type { NodeId } from '../shared/types/topology.js';
import type { TopologyGraph } from './topology-graph.js';

export const SELF_PORT = 0;

export interface RouteEntry {
  src: NodeId;
  dst: NodeId;
  port: number;
}

export class RoutingTable {
  constructor(
    private readonly ports: ReadonlyMap<NodeId, ReadonlyMap<NodeId, number>>,
    private readonly outNeighbors: ReadonlyMap<NodeId, readonly NodeId[]>
  ) {}

  /** Number of (src, dst) entries, self routes included */
  get size(): number {
    let total = 0;
    for (const row of this.ports.values()) total += row.size;
    return total;
  }

  has(src: NodeId, dst: NodeId): boolean {
    return this.lookup(src, dst) !== undefined;
  }

  lookup(src: NodeId, dst: NodeId): number | undefined {
    return this.ports.get(src)?.get(dst);
  }

  /**
   * @throws RouteNotFoundError when dst is unreachable from src
   */
  require(src: NodeId, dst: NodeId): number {
    const port = this.lookup(src, dst);
    if (port === undefined) {
      throw new RouteNotFoundError(src, dst);
    }
    return port;
  }

  /**
   * Neighbour behind the output port chosen for (src, dst)
   */
  nextHop(src: NodeId, dst: NodeId): NodeId | undefined {
    const port = this.lookup(src, dst);
    if (port === undefined) return undefined;
    if (port === SELF_PORT) return src;
    return this.outNeighbors.get(src)?.[port - 1];
  }

  /**
   * Node sequence obtained by following output ports from src to dst
   */
  trace(src: NodeId, dst: NodeId): NodeId[] | undefined {
    if (!this.has(src, dst)) return undefined;
    const path: NodeId[] = [src];
    let current = src;
    while (current !== dst) {
      const next = this.nextHop(current, dst);
      if (next === undefined || path.includes(next)) return undefined;
      path.push(next);
      current = next;
    }
    return path;
  }

  /** All entries ordered by src, then dst */
  entries(): RouteEntry[] {
    const result: RouteEntry[] = [];
    const sources = [...this.ports.keys()].sort((a, b) => a - b);
    for (const src of sources) {
      const row = this.ports.get(src);
      if (!row) continue;
      const targets = [...row.keys()].sort((a, b) => a - b);
      for (const dst of targets) {
        result.push({ src, dst, port: row.get(dst) ?? SELF_PORT });
      }
    }
    return result;
  }
}

export function buildRoutingTable(graph: TopologyGraph): RoutingTable {
  const ports = new Map<NodeId, Map<NodeId, number>>();
  const outNeighbors = new Map<NodeId, readonly NodeId[]>();

  for (const node of graph.nodes) {
    outNeighbors.set(node.id, graph.neighbors(node.id, 'out'));
  }

  for (const source of graph.nodes) {
    const sorted = outNeighbors.get(source.id) ?? [];
    const row = new Map<NodeId, number>([[source.id, SELF_PORT]]);

    // first hop taken to reach each discovered node
    const firstHop = new Map<NodeId, NodeId>();
    const queue: NodeId[] = [];
    sorted.forEach((neighbor, index) => {
      firstHop.set(neighbor, neighbor);
      row.set(neighbor, index + 1);
      queue.push(neighbor);
    });

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      const hop = firstHop.get(current) ?? current;
      for (const next of outNeighbors.get(current) ?? []) {
        if (next === source.id || firstHop.has(next)) continue;
        firstHop.set(next, hop);
        row.set(next, sorted.indexOf(hop) + 1);
        queue.push(next);
      }
    }

    ports.set(source.id, row);
  }

  return new RoutingTable(ports, outNeighbors);
}
