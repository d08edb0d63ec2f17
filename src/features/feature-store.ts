import type { FeatureStore, FeatureVector, SurveyResponse } from './types.js';
import { deriveSurveyFeatures } from './engagement.js';

export type FeatureSource =
  | Map<string, FeatureVector>
  | Readonly<Record<string, FeatureVector>>;

/**
 * FeatureStore backed by an in-memory map. Subjects are listed in
 * insertion order.
 */
export class InMemoryFeatureStore implements FeatureStore {
  private readonly vectors = new Map<string, FeatureVector>();

  constructor(source: FeatureSource = {}) {
    const entries: Iterable<readonly [string, FeatureVector]> =
      source instanceof Map ? source : Object.entries(source);
    for (const [subjectId, vector] of entries) {
      this.set(subjectId, vector);
    }
  }

  set(subjectId: string, vector: FeatureVector): this {
    this.vectors.set(subjectId, Object.freeze({ ...vector }));
    return this;
  }

  /**
   * Merge survey-derived features into existing vectors. Subjects seen
   * only in the survey are added. Survey keys overwrite existing ones.
   */
  mergeSurvey(responses: readonly SurveyResponse[]): this {
    for (const [subjectId, derived] of deriveSurveyFeatures(responses)) {
      this.set(subjectId, { ...this.vectors.get(subjectId), ...derived });
    }
    return this;
  }

  async listSubjects(): Promise<readonly string[]> {
    return [...this.vectors.keys()];
  }

  async getFeatures(subjectId: string): Promise<FeatureVector | undefined> {
    return this.vectors.get(subjectId);
  }

  get size(): number {
    return this.vectors.size;
  }
}
