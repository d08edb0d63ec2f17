import { z } from 'zod';
import { NODE_TYPES } from '../graph/types.js';
import { SCALAR_OPS, type Condition, type NeighborSelector } from '../rules/types.js';

// ===== Conditions =====

const literal = z.union([z.string(), z.number(), z.boolean()]);
const direction = z.enum(['out', 'in', 'both']);
const nodeType = z.enum(NODE_TYPES);

const scalarComparison = { op: z.enum(SCALAR_OPS), value: literal };
const inComparison = { op: z.literal('in'), value: z.array(literal).min(1) };

const neighborSelectorSchema: z.ZodType<NeighborSelector> = z.object({
  relation: z.string().min(1),
  direction: direction.optional(),
  targetType: nodeType.optional(),
  quantifier: z.enum(['any', 'all']).optional(),
});

const nodeRef = z.union([z.literal('subject'), neighborSelectorSchema]);

export const ConditionSchema: z.ZodType<Condition> = z.lazy(() => z.union([
  z.object({ kind: z.literal('feature'), feature: z.string().min(1), ...scalarComparison }),
  z.object({ kind: z.literal('feature'), feature: z.string().min(1), ...inComparison }),
  z.object({
    kind: z.literal('connected'),
    relation: z.string().min(1),
    targetType: nodeType,
    direction: direction.optional(),
  }),
  z.object({
    kind: z.literal('path_exists'),
    targetId: z.string().min(1),
    maxHops: z.number().int().min(0),
  }),
  z.object({ kind: z.literal('attribute'), node: nodeRef, name: z.string().min(1), ...scalarComparison }),
  z.object({ kind: z.literal('attribute'), node: nodeRef, name: z.string().min(1), ...inComparison }),
  z.object({ kind: z.literal('and'), conditions: z.array(ConditionSchema).min(1) }),
  z.object({ kind: z.literal('or'), conditions: z.array(ConditionSchema).min(1) }),
  z.object({ kind: z.literal('not'), condition: ConditionSchema }),
]));

// ===== Scenario document =====

const attributeValue = z.union([z.string(), z.number(), z.boolean()]);

export const ScenarioSchema = z.object({
  /** Replaces the default relation vocabulary when given */
  relations: z.array(z.string().min(1)).min(1).optional(),
  nodes: z.array(z.object({
    id: z.string().min(1),
    type: nodeType,
    attributes: z.record(attributeValue).optional(),
  })),
  edges: z.array(z.object({
    sourceId: z.string().min(1),
    targetId: z.string().min(1),
    relation: z.string().min(1),
    weight: z.number().optional(),
  })).default([]),
  rules: z.array(z.object({
    id: z.string().min(1),
    priority: z.number().int().default(0),
    condition: ConditionSchema,
    consequence: z.object({
      actionId: z.string().min(1),
      baseScore: z.number().min(0),
    }),
    explanation: z.string().default(''),
  })),
  features: z.record(z.record(attributeValue)).default({}),
  survey: z.array(z.object({
    subjectId: z.string().min(1),
    score: z.number(),
  })).default([]),
  engine: z.object({
    topK: z.number().int().min(0).nullable().optional(),
    minScore: z.number().min(0).optional(),
    mutualExclusions: z.array(z.tuple([z.string().min(1), z.string().min(1)])).optional(),
  }).default({}),
});

export type ScenarioDocument = z.infer<typeof ScenarioSchema>;
