/**
 * Action plan report: joins a DecisionRecord with the ActionTemplate
 * nodes it points at and summarises urgency and resource needs.
 */

import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import type { AttributeValue } from '../graph/types.js';
import type { DecisionRecord } from './types.js';

export const URGENCY_LEVELS = ['immediate', 'critical', 'high', 'medium', 'low'] as const;

export type Urgency = (typeof URGENCY_LEVELS)[number];

export interface PlannedAction {
  actionId: string;
  score: number;
  rationale: string;
  description: string;
  urgency: Urgency;
  timeline: string;
  budgetRequired: boolean;
  requiresApproval: boolean;
}

export interface ActionPlanSummary {
  totalActions: number;
  byUrgency: Record<Urgency, number>;
  budgetItems: number;
  approvalsRequired: number;
}

export interface ActionPlan {
  subjectId: string;
  actions: PlannedAction[];
  summary: ActionPlanSummary;
}

export function buildActionPlan(record: DecisionRecord, graph: KnowledgeGraph): ActionPlan {
  const actions = record.actions.map((action): PlannedAction => {
    const attributes: Readonly<Record<string, AttributeValue>> =
      graph.getNode(action.actionId)?.attributes ?? {};
    return {
      actionId: action.actionId,
      score: action.score,
      rationale: action.rationale,
      description: stringAttr(attributes.description, action.actionId),
      urgency: urgencyOf(attributes.urgency),
      timeline: stringAttr(attributes.timeline, 'unspecified'),
      budgetRequired: attributes.budgetRequired === true,
      requiresApproval: attributes.requiresApproval === true,
    };
  });

  const byUrgency: Record<Urgency, number> = { immediate: 0, critical: 0, high: 0, medium: 0, low: 0 };
  for (const action of actions) {
    byUrgency[action.urgency]++;
  }

  return {
    subjectId: record.subjectId,
    actions,
    summary: {
      totalActions: actions.length,
      byUrgency,
      budgetItems: actions.filter(a => a.budgetRequired).length,
      approvalsRequired: actions.filter(a => a.requiresApproval).length,
    },
  };
}

function urgencyOf(value: AttributeValue | undefined): Urgency {
  return URGENCY_LEVELS.find(level => level === value) ?? 'medium';
}

function stringAttr(value: AttributeValue | undefined, fallback: string): string {
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}
