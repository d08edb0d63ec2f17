/**
 * Rule Evaluator: turns one subject's features and graph neighbourhood
 * into scored, explained candidate decisions.
 *
 * Conditions evaluate left to right with short-circuit `and` / `or`.
 * A missing feature raises MissingFeatureError from its predicate. `and`
 * and `not` let it through. A nested `or` still tries its other branches,
 * and rethrows when none matched. The rule treats an escaped error, and
 * each branch of a top-level `or`, as false, so absent data never turns
 * into a match.
 *
 * Bindings for the rationale are collected per branch and kept only when
 * that branch counts toward the match.
 */

import type { Logger } from 'pino';
import { MissingFeatureError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import type { GraphNode } from '../graph/types.js';
import type { FeatureValue, FeatureVector } from '../features/types.js';
import type { RuleSet } from '../rules/rule-set.js';
import { renderTemplate } from '../rules/template.js';
import type {
  AttributePredicate,
  Comparison,
  Condition,
  Literal,
  Rule,
} from '../rules/types.js';
import type { CandidateDecision } from './types.js';

export interface EvaluatorOptions {
  logger?: Logger;
  events?: EventBus;
}

/** Per-subject, per-rule evaluation state */
interface Scope {
  readonly subjectId: string;
  readonly features: FeatureVector;
  readonly rule: Rule;
  readonly bindings: Map<string, Literal>;
}

export class RuleEvaluator {
  private readonly logger: Logger;
  private readonly events?: EventBus;

  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly rules: RuleSet,
    options: EvaluatorOptions = {},
  ) {
    // Rules only ever read the graph from here on.
    graph.freeze();
    this.logger = options.logger ?? getLogger();
    this.events = options.events;
  }

  /**
   * Every candidate whose rule condition holds for the subject, in rule
   * evaluation order.
   */
  evaluate(subjectId: string, features: FeatureVector): CandidateDecision[] {
    const candidates: CandidateDecision[] = [];

    for (const rule of this.rules) {
      const scope: Scope = { subjectId, features, rule, bindings: new Map() };
      const confidence = this.evaluateRule(scope);
      if (confidence === null) continue;

      const score = rule.consequence.baseScore * confidence;
      scope.bindings.set('subject', subjectId);
      scope.bindings.set('rule', rule.id);
      scope.bindings.set('action', rule.consequence.actionId);
      scope.bindings.set('score', score.toFixed(2));
      scope.bindings.set('confidence', confidence.toFixed(2));

      candidates.push(Object.freeze({
        subjectId,
        ruleId: rule.id,
        actionId: rule.consequence.actionId,
        score,
        confidence,
        rationale: renderTemplate(rule.explanation, scope.bindings),
      }));
    }

    this.logger.debug(
      { subjectId, rules: this.rules.size, candidates: candidates.length },
      'Subject evaluated',
    );
    return candidates;
  }

  /**
   * Confidence multiplier when the condition holds, null otherwise.
   * A top-level `or` evaluates every branch and scores the share that matched.
   */
  private evaluateRule(scope: Scope): number | null {
    const { condition } = scope.rule;
    try {
      if (condition.kind === 'or') {
        let matched = 0;
        for (const branch of condition.conditions) {
          if (this.testBranch(branch, scope)) matched++;
        }
        return matched > 0 ? matched / condition.conditions.length : null;
      }
      return this.test(condition, scope) ? 1 : null;
    } catch (err) {
      if (err instanceof MissingFeatureError) {
        this.reportMissing(scope, err);
        return null;
      }
      throw err;
    }
  }

  private testBranch(condition: Condition, scope: Scope): boolean {
    try {
      return this.holdsInScratch(scope, scratch => this.test(condition, scratch));
    } catch (err) {
      if (err instanceof MissingFeatureError) {
        this.reportMissing(scope, err);
        return false;
      }
      throw err;
    }
  }

  private test(condition: Condition, scope: Scope): boolean {
    switch (condition.kind) {
      case 'feature': {
        if (!Object.hasOwn(scope.features, condition.feature)) {
          throw new MissingFeatureError(scope.subjectId, condition.feature);
        }
        const value = scope.features[condition.feature];
        scope.bindings.set(condition.feature, value);
        return compare(value, condition);
      }

      case 'connected': {
        const matches = this.graph
          .neighbors(scope.subjectId, { relation: condition.relation, direction: condition.direction })
          .filter(node => node.type === condition.targetType);
        if (matches.length === 0) return false;
        scope.bindings.set(`connected.${condition.relation}`, matches.map(node => node.id).join(', '));
        return true;
      }

      case 'path_exists': {
        const hops = this.graph.hopsBetween(scope.subjectId, condition.targetId, condition.maxHops);
        if (hops === null) return false;
        scope.bindings.set(`path.${condition.targetId}`, hops);
        return true;
      }

      case 'attribute':
        return this.testAttribute(condition, scope);

      case 'and':
        for (const child of condition.conditions) {
          if (!this.test(child, scope)) return false;
        }
        return true;

      case 'or': {
        const missing: MissingFeatureError[] = [];
        for (const child of condition.conditions) {
          try {
            if (this.holdsInScratch(scope, scratch => this.test(child, scratch))) {
              for (const err of missing) this.reportMissing(scope, err);
              return true;
            }
          } catch (err) {
            if (!(err instanceof MissingFeatureError)) throw err;
            missing.push(err);
          }
        }
        // Unknown, not false: an enclosing `not` must not flip it.
        const [first, ...rest] = missing;
        if (first === undefined) return false;
        for (const err of rest) this.reportMissing(scope, err);
        throw first;
      }

      case 'not':
        return this.holdsInScratch(scope, scratch => !this.test(condition.condition, scratch));
    }
  }

  /** Run `check` against a scratch binding map, merged into `scope` only when it holds */
  private holdsInScratch(scope: Scope, check: (scratch: Scope) => boolean): boolean {
    const scratch: Scope = { ...scope, bindings: new Map<string, Literal>() };
    const holds = check(scratch);
    if (holds) {
      for (const [key, value] of scratch.bindings) scope.bindings.set(key, value);
    }
    return holds;
  }

  private testAttribute(condition: AttributePredicate, scope: Scope): boolean {
    const { node: ref, name } = condition;

    if (ref === 'subject') {
      const subject = this.graph.getNode(scope.subjectId);
      const value = subject ? attributeOf(subject, name) : undefined;
      if (value === undefined) return false;
      scope.bindings.set(`subject.${name}`, value);
      return compare(value, condition);
    }

    const candidates = this.graph
      .neighbors(scope.subjectId, { relation: ref.relation, direction: ref.direction })
      .filter(node => ref.targetType === undefined || node.type === ref.targetType);
    if (candidates.length === 0) return false;

    const key = `${ref.relation}.${name}`;

    if (ref.quantifier === 'all') {
      for (const node of candidates) {
        const value = attributeOf(node, name);
        if (value === undefined || !compare(value, condition)) return false;
      }
      const first = attributeOf(candidates[0], name);
      if (first !== undefined) scope.bindings.set(key, first);
      return true;
    }

    for (const node of candidates) {
      const value = attributeOf(node, name);
      if (value !== undefined && compare(value, condition)) {
        scope.bindings.set(key, value);
        return true;
      }
    }
    return false;
  }

  private reportMissing(scope: Scope, err: MissingFeatureError): void {
    this.logger.debug(
      { subjectId: scope.subjectId, ruleId: scope.rule.id, feature: err.feature },
      'Missing feature; predicate treated as false',
    );
    this.events?.emit('feature:missing', {
      subjectId: scope.subjectId,
      ruleId: scope.rule.id,
      feature: err.feature,
    });
  }
}

function attributeOf(node: GraphNode, name: string): FeatureValue | undefined {
  return Object.hasOwn(node.attributes, name) ? node.attributes[name] : undefined;
}

/** Ordering operators are false unless both sides are numbers */
export function compare(value: FeatureValue, comparison: Comparison): boolean {
  switch (comparison.op) {
    case 'eq':
      return value === comparison.value;
    case 'ne':
      return value !== comparison.value;
    case 'in':
      return comparison.value.includes(value);
    case 'lt':
      return typeof value === 'number' && typeof comparison.value === 'number' && value < comparison.value;
    case 'lte':
      return typeof value === 'number' && typeof comparison.value === 'number' && value <= comparison.value;
    case 'gt':
      return typeof value === 'number' && typeof comparison.value === 'number' && value > comparison.value;
    case 'gte':
      return typeof value === 'number' && typeof comparison.value === 'number' && value >= comparison.value;
  }
}
