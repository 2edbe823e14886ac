/**
 * Topology Graph
 *
 * Immutable arena of nodes and directed edges addressed by stable integer ids.
 * Transform passes call edit() to get a GraphDraft and build() a new graph;
 * the source graph is never touched.
 *
 * Usage:
 *   const graph = TopologyGraph.create(nodes, edges);
 *   const draft = graph.edit();
 *   draft.addEdge({ src: 1, dst: 2, width: 64, latency: 1 });
 *   const next = draft.build();
 */

import { StructuralError } from '../shared/errors.js';
import type {
  Direction,
  NodeId,
  NodeKind,
  NodeOfKind,
  TopologyEdge,
  TopologyNode,
} from '../shared/types/topology.js';

function edgeKey(src: NodeId, dst: NodeId): string {
  return `${src}->${dst}`;
}

export class TopologyGraph {
  private readonly nodeMap: ReadonlyMap<NodeId, TopologyNode>;
  private readonly sortedNodes: readonly TopologyNode[];
  private readonly edgeList: readonly TopologyEdge[];
  private readonly edgeIndex: ReadonlyMap<string, TopologyEdge>;
  private readonly outEdges: ReadonlyMap<NodeId, readonly TopologyEdge[]>;
  private readonly inEdges: ReadonlyMap<NodeId, readonly TopologyEdge[]>;

  private constructor(nodes: readonly TopologyNode[], edges: readonly TopologyEdge[]) {
    const nodeMap = new Map<NodeId, TopologyNode>();
    for (const node of nodes) {
      if (!Number.isInteger(node.id)) {
        throw new StructuralError(`Node '${node.name}' has non-integer id ${node.id}`);
      }
      if (nodeMap.has(node.id)) {
        throw new StructuralError(`Duplicate node id ${node.id} ('${node.name}')`, [node.id]);
      }
      nodeMap.set(node.id, Object.freeze({ ...node }));
    }

    const edgeIndex = new Map<string, TopologyEdge>();
    const outEdges = new Map<NodeId, TopologyEdge[]>();
    const inEdges = new Map<NodeId, TopologyEdge[]>();
    const edgeList: TopologyEdge[] = [];

    for (const raw of edges) {
      if (!nodeMap.has(raw.src) || !nodeMap.has(raw.dst)) {
        const missing = nodeMap.has(raw.src) ? raw.dst : raw.src;
        throw new StructuralError(
          `Edge ${edgeKey(raw.src, raw.dst)} references unknown node ${missing}`,
          [raw.src, raw.dst]
        );
      }
      if (raw.src === raw.dst) {
        throw new StructuralError(`Self-loop on node ${raw.src}`, [raw.src]);
      }
      const key = edgeKey(raw.src, raw.dst);
      if (edgeIndex.has(key)) {
        throw new StructuralError(`Duplicate edge ${key}`, [raw.src, raw.dst]);
      }

      const edge = Object.freeze({ ...raw });
      edgeIndex.set(key, edge);
      edgeList.push(edge);

      const out = outEdges.get(edge.src) ?? [];
      out.push(edge);
      outEdges.set(edge.src, out);

      const incoming = inEdges.get(edge.dst) ?? [];
      incoming.push(edge);
      inEdges.set(edge.dst, incoming);
    }

    this.nodeMap = nodeMap;
    this.sortedNodes = Object.freeze([...nodeMap.values()].sort((a, b) => a.id - b.id));
    this.edgeList = Object.freeze(edgeList);
    this.edgeIndex = edgeIndex;
    this.outEdges = outEdges;
    this.inEdges = inEdges;
  }

  /**
   * Build a graph from explicit node and edge lists
   *
   * @throws StructuralError on duplicate ids, dangling edges, multi-edges or self-loops
   */
  static create(nodes: readonly TopologyNode[], edges: readonly TopologyEdge[]): TopologyGraph {
    return new TopologyGraph(nodes, edges);
  }

  /** Nodes sorted by id */
  get nodes(): readonly TopologyNode[] {
    return this.sortedNodes;
  }

  /** Edges in insertion order */
  get edges(): readonly TopologyEdge[] {
    return this.edgeList;
  }

  get nodeCount(): number {
    return this.sortedNodes.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  has(id: NodeId): boolean {
    return this.nodeMap.has(id);
  }

  node(id: NodeId): TopologyNode | undefined {
    return this.nodeMap.get(id);
  }

  /**
   * @throws StructuralError when the id is unknown
   */
  requireNode(id: NodeId): TopologyNode {
    const node = this.nodeMap.get(id);
    if (!node) {
      throw new StructuralError(`Node ${id} not found`, [id]);
    }
    return node;
  }

  /**
   * Node with the given id, only if it has the given kind
   */
  nodeOfKind<K extends NodeKind>(id: NodeId, kind: K): NodeOfKind<K> | undefined {
    const node = this.nodeMap.get(id);
    if (node && isKind(node, kind)) {
      return node;
    }
    return undefined;
  }

  edge(src: NodeId, dst: NodeId): TopologyEdge | undefined {
    return this.edgeIndex.get(edgeKey(src, dst));
  }

  hasEdge(src: NodeId, dst: NodeId): boolean {
    return this.edgeIndex.has(edgeKey(src, dst));
  }

  outgoing(id: NodeId): readonly TopologyEdge[] {
    return this.outEdges.get(id) ?? [];
  }

  incoming(id: NodeId): readonly TopologyEdge[] {
    return this.inEdges.get(id) ?? [];
  }

  /**
   * Distinct neighbour ids, ascending
   */
  neighbors(id: NodeId, direction: Direction = 'out'): NodeId[] {
    const ids = new Set<NodeId>();
    if (direction === 'out' || direction === 'both') {
      for (const edge of this.outgoing(id)) ids.add(edge.dst);
    }
    if (direction === 'in' || direction === 'both') {
      for (const edge of this.incoming(id)) ids.add(edge.src);
    }
    return [...ids].sort((a, b) => a - b);
  }

  /**
   * Edge count in the given direction ('both' = in-degree + out-degree)
   */
  degree(id: NodeId, direction: Direction = 'both'): number {
    switch (direction) {
      case 'in':
        return this.incoming(id).length;
      case 'out':
        return this.outgoing(id).length;
      case 'both':
        return this.incoming(id).length + this.outgoing(id).length;
    }
  }

  /**
   * All nodes of a kind, ascending id
   */
  find<K extends NodeKind>(kind: K): NodeOfKind<K>[] {
    return this.sortedNodes.filter((node): node is NodeOfKind<K> => isKind(node, kind));
  }

  /** First id above every existing id */
  nextNodeId(): NodeId {
    const last = this.sortedNodes[this.sortedNodes.length - 1];
    return last ? last.id + 1 : 0;
  }

  /**
   * Mutable copy for a transform pass
   */
  edit(): GraphDraft {
    return new GraphDraft(this.sortedNodes, this.edgeList, this.nextNodeId());
  }
}

export function isKind<K extends NodeKind>(node: TopologyNode, kind: K): node is NodeOfKind<K> {
  return node.kind === kind;
}

/**
 * Working copy of a graph. Only transform passes hold one.
 */
export class GraphDraft {
  private readonly nodeMap: Map<NodeId, TopologyNode>;
  private edgeList: TopologyEdge[];
  private nextId: NodeId;

  constructor(nodes: readonly TopologyNode[], edges: readonly TopologyEdge[], nextId: NodeId) {
    this.nodeMap = new Map(nodes.map((node) => [node.id, node]));
    this.edgeList = [...edges];
    this.nextId = nextId;
  }

  /** Reserve a fresh node id */
  allocateId(): NodeId {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  node(id: NodeId): TopologyNode | undefined {
    return this.nodeMap.get(id);
  }

  get edges(): readonly TopologyEdge[] {
    return this.edgeList;
  }

  addNode(node: TopologyNode): void {
    if (this.nodeMap.has(node.id)) {
      throw new StructuralError(`Duplicate node id ${node.id} ('${node.name}')`, [node.id]);
    }
    this.nodeMap.set(node.id, node);
    this.nextId = Math.max(this.nextId, node.id + 1);
  }

  /** Replace a node's attributes; the id must already exist */
  updateNode(node: TopologyNode): void {
    if (!this.nodeMap.has(node.id)) {
      throw new StructuralError(`Node ${node.id} not found`, [node.id]);
    }
    this.nodeMap.set(node.id, node);
  }

  /** Remove a node together with its incident edges */
  removeNode(id: NodeId): void {
    this.nodeMap.delete(id);
    this.edgeList = this.edgeList.filter((edge) => edge.src !== id && edge.dst !== id);
  }

  addEdge(edge: TopologyEdge): void {
    this.edgeList.push(edge);
  }

  removeEdge(src: NodeId, dst: NodeId): TopologyEdge | undefined {
    const index = this.edgeList.findIndex((edge) => edge.src === src && edge.dst === dst);
    if (index < 0) return undefined;
    const [removed] = this.edgeList.splice(index, 1);
    return removed;
  }

  /**
   * Swap one edge for a sequence of edges at the same list position
   */
  replaceEdge(src: NodeId, dst: NodeId, replacements: readonly TopologyEdge[]): void {
    const index = this.edgeList.findIndex((edge) => edge.src === src && edge.dst === dst);
    if (index < 0) {
      throw new StructuralError(`Edge ${edgeKey(src, dst)} not found`, [src, dst]);
    }
    this.edgeList.splice(index, 1, ...replacements);
  }

  /**
   * Freeze into a new graph (re-runs every structural check)
   */
  build(): TopologyGraph {
    return TopologyGraph.create([...this.nodeMap.values()], this.edgeList);
  }
}
