/**
 * Decision Copilot: ranked, explainable action decisions per subject
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { loadScenario, DecisionEngine, CollectingSink } from 'decision-copilot';
 *
 * const { graph, rules, store, aggregation } = loadScenario('scenarios/workforce.yaml');
 * const engine = new DecisionEngine(graph, rules, { aggregation });
 * const sink = new CollectingSink();
 * const summary = await engine.run(store, sink);
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { createLogger, getLogger, setLogger, type LoggerOptions, type LogLevel } from './core/logger.js';
export {
  DecisionError,
  ConfigError,
  ScenarioError,
  DuplicateNodeError,
  UnknownNodeTypeError,
  DanglingEdgeError,
  SelfLoopError,
  UnknownRelationError,
  GraphFrozenError,
  InvalidEdgeWeightError,
  RuleValidationError,
  InvalidSurveyScoreError,
  MissingFeatureError,
  type ErrorStage,
} from './core/errors.js';
export {
  AppConfigSchema,
  type AppConfig,
  type AppConfigOverrides,
  type EngineEvents,
} from './core/types.js';

// Knowledge graph
export { KnowledgeGraph, isNodeType } from './graph/knowledge-graph.js';
export {
  NODE_TYPES,
  DEFAULT_RELATIONS,
  type NodeType,
  type AttributeValue,
  type GraphNode,
  type NodeInput,
  type GraphEdge,
  type EdgeInput,
  type Direction,
  type NeighborOptions,
  type Adjacency,
  type KnowledgeGraphConfig,
  type KnowledgeGraphStats,
} from './graph/types.js';

// Rules
export { RuleSet } from './rules/rule-set.js';
export { renderTemplate, placeholdersOf, type TemplateBindings } from './rules/template.js';
export {
  SCALAR_OPS,
  type Literal,
  type ScalarOp,
  type ComparisonOp,
  type Comparison,
  type FeaturePredicate,
  type ConnectedPredicate,
  type PathExistsPredicate,
  type AttributePredicate,
  type NeighborSelector,
  type NodeRef,
  type Condition,
  type RuleConsequence,
  type Rule,
} from './rules/types.js';

// Features
export { InMemoryFeatureStore, type FeatureSource } from './features/feature-store.js';
export { deriveSurveyFeatures, engagementLevel, type EngagementLevel } from './features/engagement.js';
export type { FeatureStore, FeatureValue, FeatureVector, SurveyResponse } from './features/types.js';

// Engine
export { RuleEvaluator, compare, type EvaluatorOptions } from './engine/evaluator.js';
export { DecisionAggregator, DEFAULT_AGGREGATOR_CONFIG } from './engine/aggregator.js';
export { DecisionEngine, type DecisionEngineOptions } from './engine/decision-engine.js';
export { BoundedScheduler, SerialWriter } from './engine/scheduler.js';
export {
  buildActionPlan,
  URGENCY_LEVELS,
  type Urgency,
  type PlannedAction,
  type ActionPlan,
  type ActionPlanSummary,
} from './engine/action-plan.js';
export type {
  CandidateDecision,
  DecisionAction,
  DecisionRecord,
  AggregatorConfig,
  RunOptions,
  RunSummary,
} from './engine/types.js';

// Sinks
export { CollectingSink, NdjsonSink, type ActionSink } from './sink/action-sink.js';

// Scenarios
export { loadScenario, buildScenario, type Scenario } from './scenario/loader.js';
export { ScenarioSchema, ConditionSchema, type ScenarioDocument } from './scenario/schema.js';

// CLI
export { createCLI, main } from './cli/index.js';

export { VERSION, NAME } from './version.js';
