/**
 * Survey-derived engagement features.
 */

import { InvalidSurveyScoreError } from '../core/errors.js';
import type { FeatureVector, SurveyResponse } from './types.js';

export type EngagementLevel = 'low' | 'medium' | 'high';

/** Band a survey score: up to 2 is low, up to 3 medium, anything above high */
export function engagementLevel(score: number): EngagementLevel {
  if (score <= 2) return 'low';
  if (score <= 3) return 'medium';
  return 'high';
}

/**
 * Group responses by subject and derive `engagement_score` (mean, two
 * decimals), `response_count` and `engagement`.
 */
export function deriveSurveyFeatures(responses: readonly SurveyResponse[]): Map<string, FeatureVector> {
  const totals = new Map<string, { sum: number; count: number }>();
  for (const { subjectId, score } of responses) {
    if (!Number.isFinite(score)) {
      throw new InvalidSurveyScoreError(subjectId, score);
    }
    const entry = totals.get(subjectId) ?? { sum: 0, count: 0 };
    entry.sum += score;
    entry.count++;
    totals.set(subjectId, entry);
  }

  const features = new Map<string, FeatureVector>();
  for (const [subjectId, { sum, count }] of totals) {
    const mean = Math.round((sum / count) * 100) / 100;
    features.set(subjectId, {
      engagement_score: mean,
      response_count: count,
      engagement: engagementLevel(mean),
    });
  }
  return features;
}
