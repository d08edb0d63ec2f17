import { z } from 'zod';
import type { DecisionRecord } from '../engine/types.js';

// ===== Configuration =====

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const AppConfigSchema = z.object({
  engine: z.object({
    /** null keeps every surviving action */
    topK: z.number().int().min(0).nullable().default(null),
    minScore: z.number().min(0).default(0),
    mutualExclusions: z.array(z.tuple([z.string().min(1), z.string().min(1)])).default([]),
  }).default({}),
  run: z.object({
    maxParallel: z.number().int().min(1).max(64).default(4),
    subjectTimeoutMs: z.number().int().positive().optional(),
  }).default({}),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    verbose: z.boolean().default(false),
  }).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Deep-partial input accepted by ConfigManager.load() */
export type AppConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

// ===== Events =====

export interface EngineEvents {
  'run:start': { runId: string; subjects: number; maxParallel: number };
  'subject:evaluated': { runId: string; subjectId: string; actions: number };
  'subject:timeout': { runId: string; subjectId: string; timeoutMs: number };
  'feature:missing': { subjectId: string; ruleId: string; feature: string };
  'run:cancelled': { runId: string; emitted: number; discarded: number };
  'run:complete': { runId: string; emitted: number; durationMs: number };
  'record:written': { runId: string; record: DecisionRecord };
}
