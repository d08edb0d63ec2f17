import { describe, it, expect } from 'vitest';
import { deriveSurveyFeatures, engagementLevel } from '../../../src/features/engagement.js';
import { InMemoryFeatureStore } from '../../../src/features/feature-store.js';
import { InvalidSurveyScoreError } from '../../../src/core/errors.js';

describe('engagementLevel', () => {
  it('should band scores at 2 and 3', () => {
    expect(engagementLevel(1)).toBe('low');
    expect(engagementLevel(2)).toBe('low');
    expect(engagementLevel(2.5)).toBe('medium');
    expect(engagementLevel(3)).toBe('medium');
    expect(engagementLevel(3.01)).toBe('high');
    expect(engagementLevel(5)).toBe('high');
  });
});

describe('deriveSurveyFeatures', () => {
  it('should average responses per subject', () => {
    const features = deriveSurveyFeatures([
      { subjectId: 'u1', score: 4 },
      { subjectId: 'u2', score: 1 },
      { subjectId: 'u1', score: 5 },
      { subjectId: 'u2', score: 2 },
      { subjectId: 'u2', score: 2 },
    ]);

    expect(features.get('u1')).toEqual({ engagement_score: 4.5, response_count: 2, engagement: 'high' });
    expect(features.get('u2')).toEqual({ engagement_score: 1.67, response_count: 3, engagement: 'low' });
  });

  it('should return an empty map for no responses', () => {
    expect(deriveSurveyFeatures([]).size).toBe(0);
  });

  it('should reject non-finite scores', () => {
    const derive = (): unknown => deriveSurveyFeatures([{ subjectId: 'u1', score: Number.NaN }]);
    expect(derive).toThrow(InvalidSurveyScoreError);
    expect(derive).toThrow('Survey score for u1 must be a finite number, got NaN');
  });
});

describe('InMemoryFeatureStore', () => {
  it('should list subjects in insertion order', async () => {
    const store = new InMemoryFeatureStore({ b: { x: 1 }, a: { x: 2 } });
    expect(await store.listSubjects()).toEqual(['b', 'a']);
    expect(await store.getFeatures('a')).toEqual({ x: 2 });
    expect(await store.getFeatures('z')).toBeUndefined();
  });

  it('should accept a map', async () => {
    const store = new InMemoryFeatureStore(new Map([['u1', { tenure: 3 }]]));
    expect(store.size).toBe(1);
    expect(await store.getFeatures('u1')).toEqual({ tenure: 3 });
  });

  it('should freeze stored vectors', async () => {
    const store = new InMemoryFeatureStore({ u1: { tenure: 3 } });
    expect(Object.isFrozen(await store.getFeatures('u1'))).toBe(true);
  });

  it('should merge survey features into existing vectors and add new subjects', async () => {
    const store = new InMemoryFeatureStore({ u1: { tenure: 3, engagement: 'stale' } });
    store.mergeSurvey([
      { subjectId: 'u1', score: 3 },
      { subjectId: 'u2', score: 2 },
    ]);

    expect(await store.getFeatures('u1')).toEqual({
      tenure: 3,
      engagement: 'medium',
      engagement_score: 3,
      response_count: 1,
    });
    expect(await store.getFeatures('u2')).toEqual({ engagement_score: 2, response_count: 1, engagement: 'low' });
    expect(await store.listSubjects()).toEqual(['u1', 'u2']);
  });
});
