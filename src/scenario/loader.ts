/**
 * Scenario loading: a YAML or JSON document describing the graph, the
 * rule set, feature vectors and aggregator settings for one run.
 *
 * Shape problems are reported as ScenarioError with the offending path.
 * Graph and rule construction go through KnowledgeGraph and RuleSet, so
 * their own load-time errors surface unchanged.
 */

import { readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ScenarioError } from '../core/errors.js';
import { KnowledgeGraph } from '../graph/knowledge-graph.js';
import { DEFAULT_RELATIONS } from '../graph/types.js';
import { InMemoryFeatureStore } from '../features/feature-store.js';
import { RuleSet } from '../rules/rule-set.js';
import type { AggregatorConfig } from '../engine/types.js';
import { ScenarioSchema, type ScenarioDocument } from './schema.js';

export interface Scenario {
  /** File the scenario came from, or a caller-supplied label */
  source: string;
  graph: KnowledgeGraph;
  rules: RuleSet;
  store: InMemoryFeatureStore;
  aggregation: Partial<AggregatorConfig>;
}

export function loadScenario(path: string): Scenario {
  const source = resolve(path);
  const extension = extname(source).toLowerCase();

  let text: string;
  try {
    text = readFileSync(source, 'utf-8');
  } catch (err) {
    throw new ScenarioError(`Cannot read scenario ${source}`, source, err instanceof Error ? err : undefined);
  }

  let raw: unknown;
  try {
    if (extension === '.yaml' || extension === '.yml') {
      raw = parseYaml(text);
    } else if (extension === '.json') {
      raw = JSON.parse(text);
    } else {
      throw new ScenarioError(`Unsupported scenario format '${extension || '(none)'}'; use .yaml, .yml or .json`, source);
    }
  } catch (err) {
    if (err instanceof ScenarioError) throw err;
    throw new ScenarioError(`Failed to parse scenario ${source}`, source, err instanceof Error ? err : undefined);
  }

  return buildScenario(raw, source);
}

/** Validate an already-parsed document and build the run inputs */
export function buildScenario(raw: unknown, source = '<inline>'): Scenario {
  const doc = parseScenario(raw, source);

  const graph = new KnowledgeGraph({ relations: doc.relations ?? DEFAULT_RELATIONS });
  for (const node of doc.nodes) {
    graph.addNode(node);
  }
  for (const edge of doc.edges) {
    graph.addEdge(edge);
  }

  const rules = RuleSet.load(doc.rules, graph);
  graph.freeze();

  const store = new InMemoryFeatureStore(new Map(Object.entries(doc.features)));
  store.mergeSurvey(doc.survey);

  const aggregation: Partial<AggregatorConfig> = {};
  if (doc.engine.topK !== undefined) aggregation.topK = doc.engine.topK;
  if (doc.engine.minScore !== undefined) aggregation.minScore = doc.engine.minScore;
  if (doc.engine.mutualExclusions !== undefined) aggregation.mutualExclusions = doc.engine.mutualExclusions;

  return { source, graph, rules, store, aggregation };
}

function parseScenario(raw: unknown, source: string): ScenarioDocument {
  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ScenarioError(`Invalid scenario ${source}: ${issues}`, source, result.error);
  }
  return result.data;
}
