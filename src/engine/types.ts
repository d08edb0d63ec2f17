/**
 * Decision Types: candidates produced by rules and the records the
 * engine emits after conflict resolution.
 */

export interface CandidateDecision {
  readonly subjectId: string;
  readonly ruleId: string;
  readonly actionId: string;
  readonly score: number;
  /** Multiplier applied to the rule's base score */
  readonly confidence: number;
  readonly rationale: string;
}

export interface DecisionAction {
  readonly actionId: string;
  readonly score: number;
  readonly rationale: string;
  /** Rule whose candidate won for this action */
  readonly ruleId: string;
}

export interface DecisionRecord {
  readonly subjectId: string;
  readonly actions: readonly DecisionAction[];
}

export interface AggregatorConfig {
  /** null keeps every surviving action */
  topK: number | null;
  minScore: number;
  mutualExclusions: ReadonlyArray<readonly [string, string]>;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Evaluate these subjects instead of everything the store lists */
  subjectIds?: readonly string[];
}

export interface RunSummary {
  runId: string;
  subjects: number;
  evaluated: number;
  emitted: number;
  discarded: number;
  timedOut: number;
  cancelled: boolean;
  durationMs: number;
}
