/**
 * Decision Aggregator: reduces one subject's candidates to its record.
 *
 * Redundant rules for the same action do not inflate its score: a group
 * scores the maximum of its candidates. Ordering is fully determined by
 * score, then action id, then rule id, so identical input always yields
 * an identical record.
 */

import { ConfigError, DecisionError } from '../core/errors.js';
import type {
  AggregatorConfig,
  CandidateDecision,
  DecisionAction,
  DecisionRecord,
} from './types.js';

export const DEFAULT_AGGREGATOR_CONFIG: AggregatorConfig = {
  topK: null,
  minScore: 0,
  mutualExclusions: [],
};

export class DecisionAggregator {
  private readonly config: AggregatorConfig;
  private readonly exclusions: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(config?: Partial<AggregatorConfig>) {
    this.config = { ...DEFAULT_AGGREGATOR_CONFIG, ...config };

    const { topK, minScore, mutualExclusions } = this.config;
    if (topK !== null && (!Number.isInteger(topK) || topK < 0)) {
      throw new ConfigError(`topK must be a non-negative integer or null, got ${topK}`);
    }
    if (!Number.isFinite(minScore)) {
      throw new ConfigError(`minScore must be a finite number, got ${minScore}`);
    }
    this.exclusions = buildExclusionIndex(mutualExclusions);
  }

  aggregate(subjectId: string, candidates: readonly CandidateDecision[]): DecisionRecord {
    // 1–2. Group by action; the best candidate of each group wins.
    const winners = new Map<string, CandidateDecision>();
    for (const candidate of candidates) {
      if (candidate.subjectId !== subjectId) {
        throw new DecisionError(
          `Candidate from rule ${candidate.ruleId} belongs to ${candidate.subjectId}, not ${subjectId}`,
          'SUBJECT_MISMATCH',
          'aggregate',
        );
      }
      const current = winners.get(candidate.actionId);
      if (!current || beats(candidate, current)) {
        winners.set(candidate.actionId, candidate);
      }
    }

    // 3. Rank groups.
    let ranked = [...winners.values()].sort(
      (a, b) => (b.score - a.score) || compareStrings(a.actionId, b.actionId),
    );

    // 4. Threshold and cutoff.
    ranked = ranked.filter(c => c.score >= this.config.minScore);
    if (this.config.topK !== null) {
      ranked = ranked.slice(0, this.config.topK);
    }

    // 5. Mutual exclusion; the higher-ranked action keeps its place.
    const kept: Array<{ winner: CandidateDecision; notes: string[] }> = [];
    for (const candidate of ranked) {
      const conflicting = this.exclusions.get(candidate.actionId);
      const keeper = conflicting
        ? kept.find(entry => conflicting.has(entry.winner.actionId))
        : undefined;

      if (keeper) {
        keeper.notes.push(
          `[suppressed ${candidate.actionId} (score ${candidate.score.toFixed(2)}): mutually exclusive]`,
        );
        continue;
      }
      kept.push({ winner: candidate, notes: [] });
    }

    const actions: DecisionAction[] = kept.map(({ winner, notes }) => Object.freeze({
      actionId: winner.actionId,
      score: winner.score,
      rationale: notes.length > 0 ? `${winner.rationale} ${notes.join(' ')}` : winner.rationale,
      ruleId: winner.ruleId,
    }));

    return Object.freeze({ subjectId, actions: Object.freeze(actions) });
  }

  getConfig(): AggregatorConfig {
    return { ...this.config };
  }
}

/** Higher score wins; equal scores go to the lexicographically lower rule id */
function beats(challenger: CandidateDecision, current: CandidateDecision): boolean {
  if (challenger.score !== current.score) return challenger.score > current.score;
  return compareStrings(challenger.ruleId, current.ruleId) < 0;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function buildExclusionIndex(
  pairs: AggregatorConfig['mutualExclusions'],
): Map<string, Set<string>> {
  const index = new Map<string, Set<string>>();
  const link = (from: string, to: string): void => {
    const set = index.get(from) ?? new Set<string>();
    set.add(to);
    index.set(from, set);
  };

  for (const [a, b] of pairs) {
    if (a === b) {
      throw new ConfigError(`Mutual exclusion pair must name two different actions, got ${a} twice`);
    }
    link(a, b);
    link(b, a);
  }
  return index;
}
