/**
 * Knowledge Graph: Type Definitions
 *
 * Typed nodes and directed, weighted, labelled edges describing subjects,
 * the cohorts and topics around them, and the action templates rules point at.
 */

// ── Node Types ──────────────────────────────────────────────────────

export const NODE_TYPES = ['Subject', 'Cohort', 'Topic', 'ActionTemplate'] as const;

export type NodeType = (typeof NODE_TYPES)[number];

export type AttributeValue = string | number | boolean;

export interface GraphNode {
  readonly id: string;
  readonly type: NodeType;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
}

export interface NodeInput {
  id: string;
  type: NodeType;
  attributes?: Record<string, AttributeValue>;
}

// ── Edge Types ──────────────────────────────────────────────────────

export const DEFAULT_RELATIONS = [
  'belongs_to',
  'related_to',
  'triggers',
  'reports_to',
  'has_skill',
  'works_in',
  'has_role',
] as const;

export interface GraphEdge {
  readonly sourceId: string;
  readonly targetId: string;
  readonly relation: string;
  readonly weight: number;
}

export interface EdgeInput {
  sourceId: string;
  targetId: string;
  relation: string;
  weight?: number;
}

// ── Traversal Types ─────────────────────────────────────────────────

export type Direction = 'out' | 'in' | 'both';

export interface NeighborOptions {
  relation?: string;
  direction?: Direction;
}

export interface Adjacency {
  edge: GraphEdge;
  /** The node at the other end of the edge */
  node: GraphNode;
}

// ── Configuration & Stats ───────────────────────────────────────────

export interface KnowledgeGraphConfig {
  /** Relation vocabulary; edges and rules may only use these labels */
  relations: readonly string[];
}

export interface KnowledgeGraphStats {
  totalNodes: number;
  totalEdges: number;
  nodeTypes: Record<NodeType, number>;
  relations: Record<string, number>;
  avgOutDegree: number;
  frozen: boolean;
}
