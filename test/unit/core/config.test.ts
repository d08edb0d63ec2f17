import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigManager, PROJECT_CONFIG_FILE } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let globalDir: string;
  let projectDir: string;

  beforeEach(() => {
    globalDir = fs.mkdtempSync(path.join(os.tmpdir(), 'decision-global-'));
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'decision-project-'));
  });

  afterEach(() => {
    fs.rmSync(globalDir, { recursive: true, force: true });
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  function manager(env: NodeJS.ProcessEnv = {}): ConfigManager {
    return new ConfigManager(projectDir, { globalDir, env });
  }

  it('should fall back to defaults without any config files', () => {
    expect(manager().load()).toEqual({
      engine: { topK: null, minScore: 0, mutualExclusions: [] },
      run: { maxParallel: 4 },
      logging: { level: 'info', verbose: false },
    });
  });

  it('should layer global, project, env and overrides in that order', () => {
    fs.writeFileSync(path.join(globalDir, 'config.yaml'), 'engine:\n  topK: 5\n  minScore: 0.1\nrun:\n  maxParallel: 2\n');
    fs.writeFileSync(path.join(projectDir, PROJECT_CONFIG_FILE), 'engine:\n  topK: 3\n');

    const config = manager({ DECISION_MIN_SCORE: '0.4' }).load({ run: { maxParallel: 8 } });

    expect(config.engine.topK).toBe(3);
    expect(config.engine.minScore).toBe(0.4);
    expect(config.run.maxParallel).toBe(8);
  });

  it('should read every supported environment variable', () => {
    const config = manager({
      DECISION_TOP_K: 'unbounded',
      DECISION_MAX_PARALLEL: '16',
      DECISION_SUBJECT_TIMEOUT_MS: '250',
      DECISION_LOG_LEVEL: 'debug',
    }).load();

    expect(config.engine.topK).toBeNull();
    expect(config.run).toEqual({ maxParallel: 16, subjectTimeoutMs: 250 });
    expect(config.logging.level).toBe('debug');
  });

  it('should reject non-numeric environment values', () => {
    expect(() => manager({ DECISION_TOP_K: 'lots' }).load())
      .toThrow('Environment variable DECISION_TOP_K must be a number, got "lots"');
  });

  it('should report schema violations with their path', () => {
    fs.writeFileSync(path.join(projectDir, PROJECT_CONFIG_FILE), 'run:\n  maxParallel: 0\n');
    expect(() => manager().load()).toThrow(ConfigError);
    expect(() => manager().load()).toThrow(/^Invalid configuration: run\.maxParallel: /);
  });

  it('should reject malformed YAML', () => {
    fs.writeFileSync(path.join(globalDir, 'config.yaml'), 'engine: [unclosed\n');
    expect(() => manager().load()).toThrow(`Failed to parse global config at ${path.join(globalDir, 'config.yaml')}`);
  });

  it('should reject a config file that is not a mapping', () => {
    fs.writeFileSync(path.join(projectDir, PROJECT_CONFIG_FILE), '- just\n- a list\n');
    expect(() => manager().load()).toThrow(ConfigError);
  });

  it('should cache the loaded config', () => {
    const configManager = manager();
    const loaded = configManager.load({ engine: { topK: 1 } });
    expect(configManager.get()).toBe(loaded);
    expect(configManager.getProjectDir()).toBe(projectDir);
    expect(configManager.getGlobalDir()).toBe(globalDir);
  });
});
