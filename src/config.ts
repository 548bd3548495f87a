/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { logger, LogLevel } from './logger.js';

export interface CorpusConfig {
  path: string;
  pattern: string;
  readConcurrency: number;
  prune: boolean;
}

export interface DatabaseConfig {
  path: string;
}

export interface SearchConfig {
  defaultLimit: number;
  maxLimit: number;
}

export interface ApiConfig {
  port: number;
  host: string;
}

export interface AppConfig {
  corpus: CorpusConfig;
  database: DatabaseConfig;
  search: SearchConfig;
  api: ApiConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  corpus: {
    path: './workflows',
    pattern: '**/*.json',
    readConcurrency: 12,
    prune: true
  },
  database: {
    path: './database/workflows.db'
  },
  search: {
    defaultLimit: 20,
    maxLimit: 100
  },
  api: {
    port: 8000,
    host: '127.0.0.1'
  },
  logLevel: 'info'
};

type RawSection = Record<string, unknown>;

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function stringField(raw: RawSection, key: string, fallback: string): string {
  const value = raw[key];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function numberField(raw: RawSection, key: string, fallback: number): number {
  const value = raw[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

function booleanField(raw: RawSection, key: string, fallback: boolean): boolean {
  const value = raw[key];
  return typeof value === 'boolean' ? value : fallback;
}

function logLevelField(value: unknown, fallback: LogLevel): LogLevel {
  const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
  return levels.find(level => level === value) ?? fallback;
}

/**
 * Merge a parsed config file over the defaults, section by section.
 * Fields of the wrong type keep their default.
 */
export function mergeConfig(defaults: AppConfig, user: unknown): AppConfig {
  const raw = isRecord(user) ? user : {};
  const corpus = section(raw, 'corpus');
  const database = section(raw, 'database');
  const search = section(raw, 'search');
  const api = section(raw, 'api');

  return {
    corpus: {
      path: stringField(corpus, 'path', defaults.corpus.path),
      pattern: stringField(corpus, 'pattern', defaults.corpus.pattern),
      readConcurrency: numberField(corpus, 'readConcurrency', defaults.corpus.readConcurrency),
      prune: booleanField(corpus, 'prune', defaults.corpus.prune)
    },
    database: {
      path: stringField(database, 'path', defaults.database.path)
    },
    search: {
      defaultLimit: numberField(search, 'defaultLimit', defaults.search.defaultLimit),
      maxLimit: numberField(search, 'maxLimit', defaults.search.maxLimit)
    },
    api: {
      port: numberField(api, 'port', defaults.api.port),
      host: stringField(api, 'host', defaults.api.host)
    },
    logLevel: logLevelField(raw.logLevel, defaults.logLevel)
  };
}

/**
 * Environment variables win over the file: WORKFLOWS_DIR, WORKFLOW_DB_PATH, PORT, LOG_LEVEL.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  return mergeConfig(config, {
    corpus: { path: env.WORKFLOWS_DIR },
    database: { path: env.WORKFLOW_DB_PATH },
    api: { port: env.PORT },
    logLevel: env.LOG_LEVEL?.toLowerCase()
  });
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './config.yaml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = applyEnvOverrides(this.loadConfig(), env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      return mergeConfig(DEFAULT_CONFIG, parsed);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Replace the configuration and write it out
   */
  saveConfig(config: AppConfig): void {
    this.config = cloneConfig(config);
    this.isDirty = true;
    this.save();
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();

      writeFileSync(this.configPath, content);
      this.isDirty = false;

      logger.info(
        `Configuration saved to ${this.configPath}`,
        undefined,
        'ConfigManager'
      );
    } catch (error) {
      logger.error(
        `Failed to save config: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
        'ConfigManager'
      );
      throw error;
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults', undefined, 'ConfigManager');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!Number.isInteger(this.config.api.port) || this.config.api.port < 1 || this.config.api.port > 65535) {
      errors.push('Invalid port number (must be 1-65535)');
    }

    if (!Number.isInteger(this.config.corpus.readConcurrency) || this.config.corpus.readConcurrency < 1) {
      errors.push('Corpus read concurrency must be at least 1');
    }

    if (this.config.search.defaultLimit < 1 || this.config.search.maxLimit < 1) {
      errors.push('Search limits must be at least 1');
    }

    if (this.config.search.defaultLimit > this.config.search.maxLimit) {
      errors.push('Search default limit cannot exceed the maximum limit');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance
 */
export function getConfig(path?: string): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager(path);
  }
  return globalConfig;
}
