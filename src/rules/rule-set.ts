/**
 * RuleSet: validated, immutable, priority-ordered rules for one run.
 *
 * Every structural problem surfaces from `load()` as a RuleValidationError
 * naming the rule, so evaluation never meets a malformed condition.
 * Evaluation order is priority descending, then declaration order.
 */

import { RuleValidationError } from '../core/errors.js';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import { isNodeType } from '../graph/knowledge-graph.js';
import {
  ORDERING_OPS,
  SCALAR_OPS,
  type Comparison,
  type Condition,
  type Literal,
  type NodeRef,
  type Rule,
} from './types.js';

export class RuleSet implements Iterable<Rule> {
  private readonly ordered: readonly Rule[];
  private readonly byId: ReadonlyMap<string, Rule>;

  private constructor(ordered: readonly Rule[]) {
    this.ordered = Object.freeze([...ordered]);
    this.byId = new Map(ordered.map(rule => [rule.id, rule]));
  }

  /**
   * Validate rules against the graph they will run over and fix their
   * evaluation order. Inputs are copied; the caller's objects are untouched.
   */
  static load(rules: readonly Rule[], graph: KnowledgeGraph): RuleSet {
    const seen = new Set<string>();

    rules.forEach((rule, index) => {
      const ruleId = typeof rule.id === 'string' && rule.id.length > 0 ? rule.id : `#${index}`;
      if (ruleId !== rule.id) {
        throw new RuleValidationError(ruleId, 'rule id must be a non-empty string');
      }
      if (seen.has(ruleId)) {
        throw new RuleValidationError(ruleId, 'duplicate rule id');
      }
      seen.add(ruleId);
      validateRule(rule, graph);
    });

    const ordered = rules
      .map((rule, index) => ({ rule: deepFreeze(structuredClone(rule)), index }))
      .sort((a, b) => (b.rule.priority - a.rule.priority) || (a.index - b.index))
      .map(entry => entry.rule);

    return new RuleSet(ordered);
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.ordered[Symbol.iterator]();
  }

  get size(): number {
    return this.ordered.length;
  }

  get(id: string): Rule | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Rules in evaluation order */
  toArray(): Rule[] {
    return [...this.ordered];
  }

  ids(): string[] {
    return this.ordered.map(rule => rule.id);
  }
}

// ── Validation ────────────────────────────────────────────────────

function validateRule(rule: Rule, graph: KnowledgeGraph): void {
  const fail: (reason: string) => never = reason => {
    throw new RuleValidationError(rule.id, reason);
  };

  if (!Number.isInteger(rule.priority)) {
    fail(`priority must be an integer, got ${String(rule.priority)}`);
  }
  if (typeof rule.explanation !== 'string') {
    fail('explanation must be a string');
  }

  const consequence: Partial<Rule['consequence']> = rule.consequence ?? {};
  const { actionId, baseScore } = consequence;
  if (typeof baseScore !== 'number' || !Number.isFinite(baseScore) || baseScore < 0) {
    fail(`baseScore must be a finite non-negative number, got ${String(baseScore)}`);
  }
  const action = typeof actionId === 'string' ? graph.getNode(actionId) : undefined;
  if (!action) {
    fail(`consequence references unknown action: ${String(actionId)}`);
  } else if (action.type !== 'ActionTemplate') {
    fail(`consequence ${actionId} is a ${action.type} node, not an ActionTemplate`);
  }

  validateCondition(rule.condition, 'condition', graph, fail);
}

function validateCondition(
  condition: Condition,
  path: string,
  graph: KnowledgeGraph,
  fail: (reason: string) => never,
): void {
  if (typeof condition !== 'object' || condition === null) {
    fail(`${path} must be an object`);
  }

  const kind: string = condition.kind;
  switch (condition.kind) {
    case 'feature':
      if (typeof condition.feature !== 'string' || condition.feature.length === 0) {
        fail(`${path}.feature must be a non-empty string`);
      }
      validateComparison(condition, path, fail);
      return;

    case 'connected':
      validateRelation(condition.relation, `${path}.relation`, graph, fail);
      if (!isNodeType(condition.targetType)) {
        fail(`${path}.targetType is not a node type: ${String(condition.targetType)}`);
      }
      validateDirection(condition.direction, path, fail);
      return;

    case 'path_exists':
      if (!Number.isInteger(condition.maxHops) || condition.maxHops < 0) {
        fail(`${path}.maxHops must be a non-negative integer, got ${String(condition.maxHops)}`);
      }
      if (!graph.hasNode(condition.targetId)) {
        fail(`${path}.targetId references unknown node: ${condition.targetId}`);
      }
      return;

    case 'attribute':
      if (typeof condition.name !== 'string' || condition.name.length === 0) {
        fail(`${path}.name must be a non-empty string`);
      }
      validateNodeRef(condition.node, `${path}.node`, graph, fail);
      validateComparison(condition, path, fail);
      return;

    case 'and':
    case 'or':
      if (!Array.isArray(condition.conditions) || condition.conditions.length === 0) {
        fail(`${path}: '${condition.kind}' needs at least one condition`);
      }
      condition.conditions.forEach((child, i) => {
        validateCondition(child, `${path}.${condition.kind}[${i}]`, graph, fail);
      });
      return;

    case 'not':
      validateCondition(condition.condition, `${path}.not`, graph, fail);
      return;

    default:
      fail(`${path} has unknown kind: ${String(kind)}`);
  }
}

function validateComparison(comparison: Comparison, path: string, fail: (reason: string) => never): void {
  const op: string = comparison.op;

  if (comparison.op === 'in') {
    const values: unknown = comparison.value;
    if (!Array.isArray(values) || values.length === 0) {
      fail(`${path}: 'in' needs a non-empty list of literals`);
    } else if (!values.every(isLiteral)) {
      fail(`${path}: 'in' list may only hold strings, numbers or booleans`);
    }
    return;
  }

  if (!SCALAR_OPS.some(scalar => scalar === op)) {
    fail(`${path} has unknown operator: ${op}`);
  }
  if (!isLiteral(comparison.value)) {
    fail(`${path}: '${op}' needs a string, number or boolean literal`);
  }
  if (ORDERING_OPS.has(comparison.op) && typeof comparison.value !== 'number') {
    fail(`${path}: '${op}' needs a numeric literal, got ${JSON.stringify(comparison.value)}`);
  }
}

function validateNodeRef(
  ref: NodeRef,
  path: string,
  graph: KnowledgeGraph,
  fail: (reason: string) => never,
): void {
  if (ref === 'subject') return;
  if (typeof ref !== 'object' || ref === null) {
    fail(`${path} must be 'subject' or a neighbor selector`);
  }
  validateRelation(ref.relation, `${path}.relation`, graph, fail);
  validateDirection(ref.direction, path, fail);
  if (ref.targetType !== undefined && !isNodeType(ref.targetType)) {
    fail(`${path}.targetType is not a node type: ${String(ref.targetType)}`);
  }
  if (ref.quantifier !== undefined && ref.quantifier !== 'any' && ref.quantifier !== 'all') {
    fail(`${path}.quantifier must be 'any' or 'all'`);
  }
}

function validateRelation(
  relation: string,
  path: string,
  graph: KnowledgeGraph,
  fail: (reason: string) => never,
): void {
  if (!graph.hasRelation(relation)) {
    fail(`${path} uses unknown relation: ${String(relation)}`);
  }
}

function validateDirection(direction: unknown, path: string, fail: (reason: string) => never): void {
  if (direction !== undefined && direction !== 'out' && direction !== 'in' && direction !== 'both') {
    fail(`${path}.direction must be 'out', 'in' or 'both'`);
  }
}

function isLiteral(value: unknown): value is Literal {
  return typeof value === 'string'
    || typeof value === 'boolean'
    || (typeof value === 'number' && Number.isFinite(value));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
