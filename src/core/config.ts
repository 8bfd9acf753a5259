import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { StepwiseConfigSchema, type StepwiseConfig, type StepwiseConfigInput } from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.stepwise.yaml';

export class ConfigManager {
  private config: StepwiseConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: { globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.stepwise');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: StepwiseConfigInput): StepwiseConfig {
    let raw: Record<string, unknown> = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, PROJECT_CONFIG_FILE), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = StepwiseConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  get(): StepwiseConfig {
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

  /**
   * Write a commented default project config if none exists yet.
   * Returns the path of the config file.
   */
  createDefaultConfig(): string {
    if (!existsSync(this.projectDir)) {
      mkdirSync(this.projectDir, { recursive: true });
    }
    const configPath = join(this.projectDir, PROJECT_CONFIG_FILE);
    if (!existsSync(configPath)) {
      const defaultConfig = `# stepwise project configuration
scheduler:
  totalCapacity: 4
  # priority | rate (priority / duration)
  valueFunction: priority
  maxSteps: 10000
  stopWhenStalled: true

logging:
  verbose: false
  level: info
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): Record<string, unknown> {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${label} config at ${path}`,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private applyEnvVars(raw: Record<string, unknown>): Record<string, unknown> {
    const scheduler = isRecord(raw.scheduler) ? { ...raw.scheduler } : {};
    const logging = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (this.env.STEPWISE_CAPACITY) {
      scheduler.totalCapacity = Number(this.env.STEPWISE_CAPACITY);
    }
    if (this.env.STEPWISE_VALUE_FUNCTION) {
      scheduler.valueFunction = this.env.STEPWISE_VALUE_FUNCTION;
    }
    if (this.env.STEPWISE_MAX_STEPS) {
      scheduler.maxSteps = Number(this.env.STEPWISE_MAX_STEPS);
    }
    if (this.env.STEPWISE_LOG_LEVEL) {
      logging.level = this.env.STEPWISE_LOG_LEVEL;
    }

    return { ...raw, scheduler, logging };
  }

  private deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = target[key];
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
