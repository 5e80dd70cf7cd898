/**
 * Configuration Management
 *
 * Loads and manages application configuration from defaults, a JSON file
 * and environment variables (in increasing precedence). Middleware
 * factories read the process-wide instance through getConfig().
 */

import { readFile } from 'node:fs/promises';
import type { LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  env?: string;
  debug?: boolean;
  logLevel?: LogLevel;
  logFormat?: 'json' | 'pretty';
  port?: number;
  host?: string;
  /** Ordered middleware identifiers, resolved through a MiddlewareCatalog */
  middleware?: string[];
  templates?: {
    path?: string;
    extension?: string;
  };
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  env: 'development',
  debug: false,
  logLevel: 'info',
  logFormat: 'pretty',
  port: 8000,
  host: '0.0.0.0',
  middleware: [],
  templates: {
    path: './templates',
    extension: '.html',
  },
};

const DEFAULT_CONFIG_PATHS = ['./config/app.json', './strata.json'];

// Key under which a shared JSON file (e.g. package.json) may hold settings
const CONFIG_KEY = 'strata';

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(structuredClone(DEFAULT_CONFIG), options);
  }

  /**
   * Get a configuration value by dot path
   */
  get(key: string): unknown {
    return getNestedValue(this.config, key);
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Get a list of strings; non-string entries are dropped
   */
  getStringList(key: string, defaultValue: readonly string[] = []): string[] {
    const value = this.get(key);
    if (!Array.isArray(value)) return [...defaultValue];
    return value.filter((item): item is string => typeof item === 'string');
  }

  /**
   * Set a configuration value by dot path
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Snapshot of all configuration
   */
  all(): Record<string, unknown> {
    return structuredClone(this.config);
  }

  /**
   * Ordered middleware identifiers
   */
  get middleware(): string[] {
    return this.getStringList('middleware');
  }

  /**
   * Verbose diagnostics (e.g. logging omitted middleware)
   */
  get debug(): boolean {
    return this.getBoolean('debug', false);
  }
}

/**
 * Load configuration from a JSON file and environment variables.
 *
 * A missing file is skipped; a file that exists but is not valid JSON is an
 * error.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const fileConfig = await readConfigFile(configPath ? [configPath] : DEFAULT_CONFIG_PATHS);
  const config = new Config(fileConfig);

  for (const [key, value] of Object.entries(configFromEnv(env))) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}

/**
 * Overrides taken from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ConfigOptions> {
  const port = env.PORT ? Number.parseInt(env.PORT, 10) : undefined;

  return {
    port: port !== undefined && Number.isFinite(port) ? port : undefined,
    host: env.HOST,
    env: env.NODE_ENV,
    debug: env.DEBUG === undefined ? undefined : env.DEBUG === 'true',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    middleware: env.STRATA_MIDDLEWARE
      ?.split(',')
      .map((id) => id.trim())
      .filter(Boolean),
  };
}

async function readConfigFile(paths: readonly string[]): Promise<ConfigOptions> {
  for (const path of paths) {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isPlainObject(parsed)) {
      throw new TypeError(`Configuration file ${path} must contain a JSON object`);
    }

    const section = parsed[CONFIG_KEY];
    return isPlainObject(section) ? section : parsed;
  }

  return {};
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = result[key];
    result[key] = isPlainObject(value) && isPlainObject(current) ? mergeConfig(current, value) : value;
  }

  return result;
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;

  for (const key of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }

  return current;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

// Default config instance
let defaultConfig: Config | null = null;

/**
 * Get the process-wide config instance
 */
export function getConfig(): Config {
  if (!defaultConfig) {
    defaultConfig = new Config();
  }
  return defaultConfig;
}

/**
 * Replace the process-wide config instance
 */
export function setConfig(config: Config): void {
  defaultConfig = config;
}
