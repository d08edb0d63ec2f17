/**
 * Feature Store contract: per-subject feature vectors supplied to the engine.
 */

export type FeatureValue = number | string | boolean;

/** Read-only during evaluation; the engine never writes to it */
export type FeatureVector = Readonly<Record<string, FeatureValue>>;

export interface FeatureStore {
  /** Subjects to evaluate, in the order they should be scheduled */
  listSubjects(): Promise<readonly string[]>;
  /** undefined when the store has no vector for the subject */
  getFeatures(subjectId: string): Promise<FeatureVector | undefined>;
}

export interface SurveyResponse {
  subjectId: string;
  /** Likert-style score, typically 1–5 */
  score: number;
}
