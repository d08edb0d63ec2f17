/**
 * Helpers shared by the CLI commands: option parsers and logger setup.
 */

import { InvalidArgumentError } from 'commander';
import { createLogger, setLogger } from '../core/logger.js';
import type { AppConfig } from '../core/types.js';

export type GlobalOptions = {
  verbose?: boolean;
  dir: string;
};

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseScore(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

/** Install the process-wide logger for a CLI invocation */
export function initLogging(config: AppConfig, verbose?: boolean): void {
  const pretty = verbose ?? config.logging.verbose;
  setLogger(createLogger('decision-copilot', {
    level: pretty && config.logging.level === 'info' ? 'debug' : config.logging.level,
    pretty,
  }));
}

export function formatScore(score: number): string {
  return score.toFixed(2);
}
