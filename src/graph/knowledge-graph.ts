/**
 * Knowledge Graph: in-memory arena of typed nodes and labelled edges.
 *
 * Nodes and edges live in arrays addressed through id → index maps;
 * adjacency lists hold edge indices per node index, so neighbor queries
 * come back in edge insertion order. Once frozen the graph is read-only
 * and may be shared by concurrent subject evaluations.
 */

import {
  DanglingEdgeError,
  DuplicateNodeError,
  GraphFrozenError,
  InvalidEdgeWeightError,
  SelfLoopError,
  UnknownNodeTypeError,
  UnknownRelationError,
} from '../core/errors.js';
import {
  DEFAULT_RELATIONS,
  NODE_TYPES,
  type Adjacency,
  type EdgeInput,
  type GraphEdge,
  type GraphNode,
  type KnowledgeGraphConfig,
  type KnowledgeGraphStats,
  type NeighborOptions,
  type NodeInput,
  type NodeType,
} from './types.js';

const DEFAULT_CONFIG: KnowledgeGraphConfig = {
  relations: DEFAULT_RELATIONS,
};

export class KnowledgeGraph {
  private readonly nodes: GraphNode[] = [];
  private readonly edges: GraphEdge[] = [];
  private readonly nodeIndex = new Map<string, number>();
  private readonly outgoing: number[][] = [];
  private readonly incoming: number[][] = [];
  private readonly relationSet: ReadonlySet<string>;
  private frozen = false;

  constructor(config?: Partial<KnowledgeGraphConfig>) {
    const relations = config?.relations ?? DEFAULT_CONFIG.relations;
    this.relationSet = new Set(relations);
  }

  // ── Mutation ────────────────────────────────────────────────────

  addNode(input: NodeInput): GraphNode {
    this.assertMutable('addNode');

    if (this.nodeIndex.has(input.id)) {
      throw new DuplicateNodeError(input.id);
    }
    if (!isNodeType(input.type)) {
      throw new UnknownNodeTypeError(input.id, String(input.type));
    }

    const node: GraphNode = Object.freeze({
      id: input.id,
      type: input.type,
      attributes: Object.freeze({ ...input.attributes }),
    });

    this.nodeIndex.set(node.id, this.nodes.length);
    this.nodes.push(node);
    this.outgoing.push([]);
    this.incoming.push([]);
    return node;
  }

  addEdge(input: EdgeInput): GraphEdge {
    this.assertMutable('addEdge');

    if (input.sourceId === input.targetId) {
      throw new SelfLoopError(input.sourceId);
    }
    const source = this.nodeIndex.get(input.sourceId);
    if (source === undefined) {
      throw new DanglingEdgeError(input.sourceId, input.targetId, input.sourceId);
    }
    const target = this.nodeIndex.get(input.targetId);
    if (target === undefined) {
      throw new DanglingEdgeError(input.sourceId, input.targetId, input.targetId);
    }
    if (!this.relationSet.has(input.relation)) {
      throw new UnknownRelationError(input.relation, `edge ${input.sourceId} -> ${input.targetId}`);
    }

    const weight = input.weight ?? 1.0;
    if (!Number.isFinite(weight)) {
      throw new InvalidEdgeWeightError(input.sourceId, input.targetId, weight);
    }

    const edge: GraphEdge = Object.freeze({
      sourceId: input.sourceId,
      targetId: input.targetId,
      relation: input.relation,
      weight,
    });

    const edgeIdx = this.edges.length;
    this.edges.push(edge);
    this.outgoing[source].push(edgeIdx);
    this.incoming[target].push(edgeIdx);
    return edge;
  }

  /** Make the graph read-only. Idempotent. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  // ── Lookup ──────────────────────────────────────────────────────

  getNode(id: string): GraphNode | undefined {
    const idx = this.nodeIndex.get(id);
    return idx === undefined ? undefined : this.nodes[idx];
  }

  hasNode(id: string): boolean {
    return this.nodeIndex.has(id);
  }

  hasRelation(relation: string): boolean {
    return this.relationSet.has(relation);
  }

  get relations(): string[] {
    return [...this.relationSet];
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  nodesOfType(type: NodeType): GraphNode[] {
    return this.nodes.filter(n => n.type === type);
  }

  // ── Traversal ───────────────────────────────────────────────────

  /**
   * Edges one hop from `nodeId`, paired with the node at the far end,
   * in edge insertion order. With direction 'both' outgoing and incoming
   * edges are interleaved by insertion order.
   */
  adjacent(nodeId: string, options: NeighborOptions = {}): Adjacency[] {
    const idx = this.nodeIndex.get(nodeId);
    if (idx === undefined) return [];

    const direction = options.direction ?? 'out';
    let edgeIdxs: number[];
    if (direction === 'out') {
      edgeIdxs = this.outgoing[idx];
    } else if (direction === 'in') {
      edgeIdxs = this.incoming[idx];
    } else {
      edgeIdxs = mergeSorted(this.outgoing[idx], this.incoming[idx]);
    }

    const results: Adjacency[] = [];
    for (const edgeIdx of edgeIdxs) {
      const edge = this.edges[edgeIdx];
      if (options.relation !== undefined && edge.relation !== options.relation) continue;

      const otherId = edge.sourceId === nodeId ? edge.targetId : edge.sourceId;
      const node = this.getNode(otherId);
      if (node) results.push({ edge, node });
    }
    return results;
  }

  /**
   * Nodes one hop from `nodeId`; each node appears once, at the position
   * of the first edge that reaches it.
   */
  neighbors(nodeId: string, options: NeighborOptions = {}): GraphNode[] {
    const seen = new Set<string>();
    const results: GraphNode[] = [];
    for (const { node } of this.adjacent(nodeId, options)) {
      if (seen.has(node.id)) continue;
      seen.add(node.id);
      results.push(node);
    }
    return results;
  }

  /**
   * Fewest outgoing hops from source to target, or null when the target
   * is not reachable within `maxHops`. Breadth-first with a visited set,
   * so cycles terminate.
   */
  hopsBetween(sourceId: string, targetId: string, maxHops: number): number | null {
    const start = this.nodeIndex.get(sourceId);
    const goal = this.nodeIndex.get(targetId);
    if (start === undefined || goal === undefined || maxHops < 0) return null;
    if (start === goal) return 0;

    const visited = new Set<number>([start]);
    let frontier = [start];

    for (let depth = 1; depth <= maxHops && frontier.length > 0; depth++) {
      const next: number[] = [];
      for (const nodeIdx of frontier) {
        for (const edgeIdx of this.outgoing[nodeIdx]) {
          const neighbor = this.nodeIndex.get(this.edges[edgeIdx].targetId);
          if (neighbor === undefined || visited.has(neighbor)) continue;
          if (neighbor === goal) return depth;
          visited.add(neighbor);
          next.push(neighbor);
        }
      }
      frontier = next;
    }

    return null;
  }

  hasPath(sourceId: string, targetId: string, maxHops: number): boolean {
    return this.hopsBetween(sourceId, targetId, maxHops) !== null;
  }

  // ── Stats ───────────────────────────────────────────────────────

  getStats(): KnowledgeGraphStats {
    const nodeTypes: Record<NodeType, number> = { Subject: 0, Cohort: 0, Topic: 0, ActionTemplate: 0 };
    for (const node of this.nodes) {
      nodeTypes[node.type]++;
    }

    const relations: Record<string, number> = {};
    for (const edge of this.edges) {
      relations[edge.relation] = (relations[edge.relation] ?? 0) + 1;
    }

    return {
      totalNodes: this.nodes.length,
      totalEdges: this.edges.length,
      nodeTypes,
      relations,
      avgOutDegree: this.nodes.length > 0 ? this.edges.length / this.nodes.length : 0,
      frozen: this.frozen,
    };
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new GraphFrozenError(operation);
    }
  }
}

export function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.some(type => type === value);
}

function mergeSorted(a: number[], b: number[]): number[] {
  const merged: number[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    if (j >= b.length || (i < a.length && a[i] < b[j])) {
      merged.push(a[i++]);
    } else {
      merged.push(b[j++]);
    }
  }
  return merged;
}
