import { describe, it, expect, beforeEach } from 'vitest';
import { KnowledgeGraph } from '../../../src/graph/knowledge-graph.js';
import { RuleSet } from '../../../src/rules/rule-set.js';
import type { Condition, Rule } from '../../../src/rules/types.js';
import { RuleValidationError } from '../../../src/core/errors.js';

function makeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    id: 'r1',
    priority: 0,
    condition: { kind: 'feature', feature: 'score', op: 'gte', value: 3 },
    consequence: { actionId: 'notify', baseScore: 0.5 },
    explanation: 'score is {score}',
    ...overrides,
  };
}

describe('RuleSet', () => {
  let graph: KnowledgeGraph;

  beforeEach(() => {
    graph = new KnowledgeGraph();
    graph.addNode({ id: 'u1', type: 'Subject' });
    graph.addNode({ id: 'team', type: 'Cohort' });
    graph.addNode({ id: 'notify', type: 'ActionTemplate' });
    graph.addNode({ id: 'escalate', type: 'ActionTemplate' });
  });

  describe('ordering', () => {
    it('should order by priority descending, then declaration order', () => {
      const rules = RuleSet.load([
        makeRule({ id: 'low', priority: 1 }),
        makeRule({ id: 'high-a', priority: 10 }),
        makeRule({ id: 'mid', priority: 5 }),
        makeRule({ id: 'high-b', priority: 10 }),
      ], graph);

      expect(rules.ids()).toEqual(['high-a', 'high-b', 'mid', 'low']);
      expect([...rules].map(r => r.id)).toEqual(['high-a', 'high-b', 'mid', 'low']);
    });

    it('should produce the same order on every load', () => {
      const input = [
        makeRule({ id: 'b', priority: 2 }),
        makeRule({ id: 'a', priority: 2 }),
        makeRule({ id: 'c', priority: 3 }),
      ];
      expect(RuleSet.load(input, graph).ids()).toEqual(RuleSet.load(input, graph).ids());
    });
  });

  describe('immutability', () => {
    it('should copy and freeze rules, leaving the input untouched', () => {
      const input = makeRule();
      const rules = RuleSet.load([input], graph);
      const loaded = rules.get('r1');

      expect(loaded).toEqual(input);
      expect(loaded).not.toBe(input);
      expect(Object.isFrozen(loaded)).toBe(true);
      expect(Object.isFrozen(loaded?.condition)).toBe(true);
      expect(Object.isFrozen(input)).toBe(false);
    });

    it('should expose lookup helpers', () => {
      const rules = RuleSet.load([makeRule()], graph);
      expect(rules.size).toBe(1);
      expect(rules.has('r1')).toBe(true);
      expect(rules.has('r2')).toBe(false);
      expect(rules.toArray().map(r => r.id)).toEqual(['r1']);
    });
  });

  describe('validation', () => {
    function loadError(rule: Rule): RuleValidationError {
      try {
        RuleSet.load([rule], graph);
      } catch (err) {
        if (err instanceof RuleValidationError) return err;
        throw err;
      }
      throw new Error(`rule ${rule.id} loaded without error`);
    }

    it('should reject duplicate rule ids', () => {
      expect(() => RuleSet.load([makeRule(), makeRule()], graph)).toThrow('Invalid rule r1: duplicate rule id');
    });

    it('should reject an empty rule id by position', () => {
      const err = loadError(makeRule({ id: '' }));
      expect(err.ruleId).toBe('#0');
    });

    it('should reject a non-integer priority', () => {
      expect(loadError(makeRule({ priority: 1.5 })).reason).toBe('priority must be an integer, got 1.5');
    });

    it('should reject a negative base score', () => {
      const err = loadError(makeRule({ consequence: { actionId: 'notify', baseScore: -1 } }));
      expect(err.reason).toBe('baseScore must be a finite non-negative number, got -1');
    });

    it('should reject an action that does not exist', () => {
      const err = loadError(makeRule({ consequence: { actionId: 'missing', baseScore: 1 } }));
      expect(err.reason).toBe('consequence references unknown action: missing');
    });

    it('should reject an action that is not an ActionTemplate', () => {
      const err = loadError(makeRule({ consequence: { actionId: 'team', baseScore: 1 } }));
      expect(err.reason).toBe('consequence team is a Cohort node, not an ActionTemplate');
    });

    it('should reject unknown relations in graph predicates', () => {
      const condition: Condition = { kind: 'connected', relation: 'likes', targetType: 'Cohort' };
      expect(loadError(makeRule({ condition })).reason).toBe('condition.relation uses unknown relation: likes');
    });

    it('should reject unknown relations inside nested conditions', () => {
      const condition: Condition = {
        kind: 'and',
        conditions: [
          { kind: 'feature', feature: 'score', op: 'gt', value: 1 },
          { kind: 'not', condition: { kind: 'connected', relation: 'likes', targetType: 'Cohort' } },
        ],
      };
      expect(loadError(makeRule({ condition })).reason)
        .toBe('condition.and[1].not.relation uses unknown relation: likes');
    });

    it('should reject a path target that is not in the graph', () => {
      const condition: Condition = { kind: 'path_exists', targetId: 'nowhere', maxHops: 2 };
      expect(loadError(makeRule({ condition })).reason)
        .toBe('condition.targetId references unknown node: nowhere');
    });

    it('should reject a negative hop limit', () => {
      const condition: Condition = { kind: 'path_exists', targetId: 'team', maxHops: -1 };
      expect(loadError(makeRule({ condition })).reason)
        .toBe('condition.maxHops must be a non-negative integer, got -1');
    });

    it('should reject empty and/or lists', () => {
      const condition: Condition = { kind: 'or', conditions: [] };
      expect(loadError(makeRule({ condition })).reason).toBe("condition: 'or' needs at least one condition");
    });

    it('should reject ordering operators against non-numeric literals', () => {
      const condition: Condition = { kind: 'feature', feature: 'level', op: 'gt', value: 'senior' };
      expect(loadError(makeRule({ condition })).reason)
        .toBe(`condition: 'gt' needs a numeric literal, got "senior"`);
    });

    it('should reject an empty in-list', () => {
      const condition: Condition = { kind: 'feature', feature: 'level', op: 'in', value: [] };
      expect(loadError(makeRule({ condition })).reason)
        .toBe("condition: 'in' needs a non-empty list of literals");
    });

    it('should validate neighbor selectors of attribute predicates', () => {
      const condition: Condition = {
        kind: 'attribute',
        node: { relation: 'unknown_rel' },
        name: 'open_roles',
        op: 'gt',
        value: 0,
      };
      expect(loadError(makeRule({ condition })).reason)
        .toBe('condition.node.relation uses unknown relation: unknown_rel');
    });

    it('should reject rules built from untyped data with an unknown kind', () => {
      const condition: Condition = JSON.parse('{"kind":"xor","conditions":[]}');
      expect(loadError(makeRule({ condition })).reason).toBe('condition has unknown kind: xor');
    });
  });
});
