/**
 * Decision Engine: drives one decision run.
 *
 * Freezes the knowledge graph, evaluates subjects with bounded
 * concurrency, and hands each finished DecisionRecord to the sink
 * through a serial writer. A record is written whole or not at all:
 * cancellation discards every subject that has not been written yet.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import type { AppConfig } from '../core/types.js';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import type { FeatureStore, FeatureVector } from '../features/types.js';
import type { RuleSet } from '../rules/rule-set.js';
import type { ActionSink } from '../sink/action-sink.js';
import { DecisionAggregator } from './aggregator.js';
import { RuleEvaluator } from './evaluator.js';
import { BoundedScheduler, SerialWriter } from './scheduler.js';
import type {
  AggregatorConfig,
  CandidateDecision,
  DecisionRecord,
  RunOptions,
  RunSummary,
} from './types.js';

export interface DecisionEngineOptions {
  aggregation?: Partial<AggregatorConfig>;
  /** Subjects evaluated at once; defaults to 4 */
  maxParallel?: number;
  /** Deadline for fetching one subject's features and deciding */
  subjectTimeoutMs?: number;
  logger?: Logger;
  events?: EventBus;
}

const TIMED_OUT = Symbol('timed-out');

export class DecisionEngine {
  readonly events: EventBus;
  private readonly logger: Logger;
  private readonly evaluator: RuleEvaluator;
  private readonly aggregator: DecisionAggregator;
  private readonly maxParallel: number;
  private readonly subjectTimeoutMs?: number;

  constructor(
    readonly graph: KnowledgeGraph,
    readonly rules: RuleSet,
    options: DecisionEngineOptions = {},
  ) {
    this.logger = options.logger ?? getLogger();
    this.events = options.events ?? new EventBus();
    this.maxParallel = options.maxParallel ?? 4;
    this.subjectTimeoutMs = options.subjectTimeoutMs;

    graph.freeze();
    this.evaluator = new RuleEvaluator(graph, rules, { logger: this.logger, events: this.events });
    this.aggregator = new DecisionAggregator(options.aggregation);
  }

  static fromConfig(
    graph: KnowledgeGraph,
    rules: RuleSet,
    config: AppConfig,
    options: Pick<DecisionEngineOptions, 'logger' | 'events'> = {},
  ): DecisionEngine {
    return new DecisionEngine(graph, rules, {
      ...options,
      aggregation: config.engine,
      maxParallel: config.run.maxParallel,
      subjectTimeoutMs: config.run.subjectTimeoutMs,
    });
  }

  /** Raw candidates for one subject, before conflict resolution */
  candidatesFor(subjectId: string, features: FeatureVector): CandidateDecision[] {
    return this.evaluator.evaluate(subjectId, features);
  }

  /** Evaluate and aggregate one subject synchronously */
  evaluateSubject(subjectId: string, features: FeatureVector): DecisionRecord {
    return this.aggregator.aggregate(subjectId, this.evaluator.evaluate(subjectId, features));
  }

  /**
   * Evaluate every subject of the store (or `options.subjectIds`) and
   * write one record per subject to the sink, in completion order.
   * Resolves with `cancelled: true` when `options.signal` aborts; rejects
   * on the first fatal error after in-flight subjects settle.
   */
  async run(store: FeatureStore, sink: ActionSink, options: RunOptions = {}): Promise<RunSummary> {
    const runId = `run-${nanoid(10)}`;
    const startedAt = Date.now();
    const subjectIds = options.subjectIds ?? await store.listSubjects();

    const scheduler = new BoundedScheduler(this.maxParallel);
    const writer = new SerialWriter(sink);
    const halt = new AbortController();

    const summary: RunSummary = {
      runId,
      subjects: subjectIds.length,
      evaluated: 0,
      emitted: 0,
      discarded: 0,
      timedOut: 0,
      cancelled: false,
      durationMs: 0,
    };
    const failures: unknown[] = [];

    const onAbort = (): void => {
      summary.cancelled = true;
      halt.abort();
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.logger.info({ runId, subjects: subjectIds.length, maxParallel: this.maxParallel }, 'Decision run started');
    this.events.emit('run:start', { runId, subjects: subjectIds.length, maxParallel: this.maxParallel });

    const processSubject = async (subjectId: string): Promise<void> => {
      if (halt.signal.aborted) {
        summary.discarded++;
        return;
      }

      const outcome = await this.decide(store, subjectId);
      if (outcome === TIMED_OUT) {
        summary.timedOut++;
        this.logger.warn({ runId, subjectId, timeoutMs: this.subjectTimeoutMs }, 'Subject timed out; record discarded');
        this.events.emit('subject:timeout', { runId, subjectId, timeoutMs: this.subjectTimeoutMs ?? 0 });
        return;
      }

      summary.evaluated++;
      this.events.emit('subject:evaluated', { runId, subjectId, actions: outcome.actions.length });

      if (await writer.write(outcome, halt.signal)) {
        summary.emitted++;
        this.events.emit('record:written', { runId, record: outcome });
      } else {
        summary.discarded++;
      }
    };

    try {
      await scheduler.each(subjectIds, async subjectId => {
        try {
          await processSubject(subjectId);
        } catch (error) {
          summary.discarded++;
          failures.push(error);
          halt.abort();
        }
      });
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      summary.durationMs = Date.now() - startedAt;
    }

    if (failures.length > 0) {
      const [error] = failures;
      this.logger.error({ runId, err: error, failures: failures.length }, 'Decision run failed');
      throw error;
    }

    if (summary.cancelled) {
      this.logger.info({ runId, emitted: summary.emitted, discarded: summary.discarded }, 'Decision run cancelled');
      this.events.emit('run:cancelled', { runId, emitted: summary.emitted, discarded: summary.discarded });
    } else {
      this.logger.info({ runId, emitted: summary.emitted, durationMs: summary.durationMs }, 'Decision run complete');
      this.events.emit('run:complete', { runId, emitted: summary.emitted, durationMs: summary.durationMs });
    }
    return summary;
  }

  private async decide(store: FeatureStore, subjectId: string): Promise<DecisionRecord | typeof TIMED_OUT> {
    const work = this.fetchAndEvaluate(store, subjectId);
    if (this.subjectTimeoutMs === undefined) return work;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof TIMED_OUT>(resolve => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.subjectTimeoutMs);
    });
    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fetchAndEvaluate(store: FeatureStore, subjectId: string): Promise<DecisionRecord> {
    const features = await store.getFeatures(subjectId);
    if (features === undefined) {
      this.logger.warn({ subjectId }, 'No feature vector for subject; evaluating graph predicates only');
    }
    return this.evaluateSubject(subjectId, features ?? {});
  }
}
