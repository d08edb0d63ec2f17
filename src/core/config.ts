import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema, type AppConfig, type AppConfigOverrides } from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.decision-copilot.yaml';

export class ConfigManager {
  private config: AppConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: { globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.decision-copilot');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: AppConfigOverrides): AppConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = AppConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): AppConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, err instanceof Error ? err : undefined);
    }

    if (parsed === null || parsed === undefined) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Expected a mapping at the top of ${label} config ${path}`);
    }
    return parsed;
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const engine: Record<string, unknown> = isRecord(raw.engine) ? { ...raw.engine } : {};
    const run: Record<string, unknown> = isRecord(raw.run) ? { ...raw.run } : {};
    const logging: Record<string, unknown> = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (this.env.DECISION_TOP_K) {
      engine.topK = this.env.DECISION_TOP_K === 'unbounded'
        ? null
        : this.numberFromEnv('DECISION_TOP_K');
    }
    if (this.env.DECISION_MIN_SCORE) {
      engine.minScore = this.numberFromEnv('DECISION_MIN_SCORE');
    }
    if (this.env.DECISION_MAX_PARALLEL) {
      run.maxParallel = this.numberFromEnv('DECISION_MAX_PARALLEL');
    }
    if (this.env.DECISION_SUBJECT_TIMEOUT_MS) {
      run.subjectTimeoutMs = this.numberFromEnv('DECISION_SUBJECT_TIMEOUT_MS');
    }
    if (this.env.DECISION_LOG_LEVEL) {
      logging.level = this.env.DECISION_LOG_LEVEL;
    }

    return { ...raw, engine, run, logging };
  }

  private numberFromEnv(name: string): number {
    const value = Number(this.env[name]);
    if (!Number.isFinite(value)) {
      throw new ConfigError(`Environment variable ${name} must be a number, got "${this.env[name]}"`);
    }
    return value;
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
