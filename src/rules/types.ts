/**
 * Rule Types
 *
 * Conditions are plain data: a tagged expression tree over feature
 * predicates and graph predicates, composed with and / or / not.
 */

import type { Direction, NodeType } from '../graph/types.js';

// ═══════════════════════════════════════════════════════════════
// COMPARISONS
// ═══════════════════════════════════════════════════════════════

export type Literal = string | number | boolean;

export const SCALAR_OPS = ['eq', 'ne', 'lt', 'lte', 'gt', 'gte'] as const;

/** Operators that compare against one literal */
export type ScalarOp = (typeof SCALAR_OPS)[number];

/** Operators that need numeric operands on both sides */
export const ORDERING_OPS: ReadonlySet<ScalarOp> = new Set(['lt', 'lte', 'gt', 'gte']);

export type ComparisonOp = ScalarOp | 'in';

export type Comparison =
  | { op: ScalarOp; value: Literal }
  | { op: 'in'; value: readonly Literal[] };

// ═══════════════════════════════════════════════════════════════
// PREDICATES
// ═══════════════════════════════════════════════════════════════

export type FeaturePredicate = { kind: 'feature'; feature: string } & Comparison;

/** Subject has a neighbor of `targetType` over `relation` */
export interface ConnectedPredicate {
  kind: 'connected';
  relation: string;
  targetType: NodeType;
  /** Defaults to 'out' */
  direction?: Direction;
}

/** A path of at most `maxHops` outgoing edges leads from the subject to `targetId` */
export interface PathExistsPredicate {
  kind: 'path_exists';
  targetId: string;
  maxHops: number;
}

export interface NeighborSelector {
  relation: string;
  direction?: Direction;
  targetType?: NodeType;
  /** 'any' (default): one neighbor must match; 'all': every neighbor, and at least one */
  quantifier?: 'any' | 'all';
}

export type NodeRef = 'subject' | NeighborSelector;

export type AttributePredicate = { kind: 'attribute'; node: NodeRef; name: string } & Comparison;

// ═══════════════════════════════════════════════════════════════
// CONDITION TREE
// ═══════════════════════════════════════════════════════════════

export type Condition =
  | FeaturePredicate
  | ConnectedPredicate
  | PathExistsPredicate
  | AttributePredicate
  | { kind: 'and'; conditions: readonly Condition[] }
  | { kind: 'or'; conditions: readonly Condition[] }
  | { kind: 'not'; condition: Condition };

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

export interface RuleConsequence {
  /** Id of an ActionTemplate node */
  actionId: string;
  baseScore: number;
}

export interface Rule {
  id: string;
  /** Higher evaluates first; ties keep declaration order */
  priority: number;
  condition: Condition;
  consequence: RuleConsequence;
  /** Rationale template; `{name}` placeholders are filled from matched values */
  explanation: string;
}
