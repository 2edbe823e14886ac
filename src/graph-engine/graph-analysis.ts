/**
 * Graph Analysis
 *
 * Read-only traversal helpers over a TopologyGraph.
 * Every traversal visits neighbours in ascending id order, so results are
 * deterministic and shortest-path ties go to the lowest neighbour id.
 */

import type { Direction, NodeId } from '../shared/types/topology.js';
import { isConverter } from './node-ports.js';
import type { TopologyGraph } from './topology-graph.js';

/**
 * Hop distance from `source` to every node it reaches (source itself = 0)
 */
export function bfsDistances(
  graph: TopologyGraph,
  source: NodeId,
  direction: Direction = 'out'
): Map<NodeId, number> {
  const distances = new Map<NodeId, number>();
  if (!graph.has(source)) return distances;

  distances.set(source, 0);
  const queue: NodeId[] = [source];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    const depth = distances.get(current) ?? 0;
    for (const next of graph.neighbors(current, direction)) {
      if (!distances.has(next)) {
        distances.set(next, depth + 1);
        queue.push(next);
      }
    }
  }
  return distances;
}

/**
 * Shortest directed path as a node id list (inclusive), or undefined.
 *
 * Nodes in `avoid` are never entered (src and dst excepted).
 */
export function shortestPath(
  graph: TopologyGraph,
  src: NodeId,
  dst: NodeId,
  avoid: ReadonlySet<NodeId> = new Set()
): NodeId[] | undefined {
  if (!graph.has(src) || !graph.has(dst)) return undefined;
  if (src === dst) return [src];

  const parent = new Map<NodeId, NodeId>();
  const visited = new Set<NodeId>([src]);
  const queue: NodeId[] = [src];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const next of graph.neighbors(current, 'out')) {
      if (visited.has(next)) continue;
      if (next !== dst && avoid.has(next)) continue;
      visited.add(next);
      parent.set(next, current);
      if (next === dst) {
        return unwind(parent, src, dst);
      }
      queue.push(next);
    }
  }
  return undefined;
}

function unwind(parent: ReadonlyMap<NodeId, NodeId>, src: NodeId, dst: NodeId): NodeId[] {
  const path: NodeId[] = [dst];
  let current = dst;
  while (current !== src) {
    const prev = parent.get(current);
    if (prev === undefined) break;
    path.push(prev);
    current = prev;
  }
  return path.reverse();
}

export function hasPath(graph: TopologyGraph, src: NodeId, dst: NodeId): boolean {
  return shortestPath(graph, src, dst) !== undefined;
}

/**
 * True if dst is reachable from src without passing through `avoid`
 */
export function hasPathAvoiding(
  graph: TopologyGraph,
  src: NodeId,
  dst: NodeId,
  avoid: NodeId
): boolean {
  return shortestPath(graph, src, dst, new Set([avoid])) !== undefined;
}

/**
 * Every ordered pair (src !== dst) joined by a directed path, as "src->dst" keys
 */
export function reachablePairs(graph: TopologyGraph): Set<string> {
  const pairs = new Set<string>();
  for (const node of graph.nodes) {
    for (const target of bfsDistances(graph, node.id).keys()) {
      if (target !== node.id) {
        pairs.add(`${node.id}->${target}`);
      }
    }
  }
  return pairs;
}

/**
 * Components ignoring edge direction; each sorted, ordered by smallest member
 */
export function weaklyConnectedComponents(graph: TopologyGraph): NodeId[][] {
  const seen = new Set<NodeId>();
  const components: NodeId[][] = [];

  for (const node of graph.nodes) {
    if (seen.has(node.id)) continue;
    const members = [...bfsDistances(graph, node.id, 'both').keys()];
    for (const id of members) seen.add(id);
    components.push(members.sort((a, b) => a - b));
  }
  return components;
}

/**
 * Distinct-neighbour count normalised by (n - 1)
 */
export function degreeCentrality(graph: TopologyGraph): Map<NodeId, number> {
  const scale = graph.nodeCount > 1 ? 1 / (graph.nodeCount - 1) : 0;
  const centrality = new Map<NodeId, number>();
  for (const node of graph.nodes) {
    centrality.set(node.id, graph.neighbors(node.id, 'both').length * scale);
  }
  return centrality;
}

/**
 * Converter nodes strictly between `from` and `to` when they are joined by a
 * directed chain made only of ClockConverters/WidthConverters.
 * [] means a direct edge; undefined means no such chain.
 */
export function findConverterChain(
  graph: TopologyGraph,
  from: NodeId,
  to: NodeId
): NodeId[] | undefined {
  if (graph.hasEdge(from, to)) return [];

  const walk = (current: NodeId, chain: NodeId[]): NodeId[] | undefined => {
    for (const next of graph.neighbors(current, 'out')) {
      if (next === to) return chain;
      const node = graph.node(next);
      if (!node || !isConverter(node) || chain.includes(next)) continue;
      const found = walk(next, [...chain, next]);
      if (found) return found;
    }
    return undefined;
  };

  return walk(from, []);
}
