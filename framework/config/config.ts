/**
 * Configuration Management
 *
 * Defaults, overlaid by a JSON config file, overlaid by environment
 * variables.
 */

import { readFile } from 'node:fs/promises';
import { isLogLevel, type LogFormat, type LogLevel } from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  router?: {
    prefix?: string;
    redirectStatus?: number;
  };
  otel?: {
    enabled?: boolean;
  };
  [key: string]: unknown;
}

export const DEFAULT_CONFIG_PATH = './config/app.json';

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8000,
  host: '0.0.0.0',
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
  router: {
    prefix: '',
    redirectStatus: 301,
  },
  otel: {
    enabled: false,
  },
};

/**
 * Raised for a config file that cannot be read or parsed, and for
 * environment values of the wrong form
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigTree;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a value by dotted path
   */
  get(key: string): unknown;
  get<T>(key: string, defaultValue: T): T;
  get<T>(key: string, defaultValue?: T): unknown {
    return getNestedValue(this.config, key) ?? defaultValue;
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Set a value by dotted path, creating intermediate objects
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return getNestedValue(this.config, key) !== undefined;
  }

  all(): ConfigTree {
    return structuredClone(this.config);
  }
}

function mergeConfig(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = base[key];
    result[key] = isTree(value) ? mergeConfig(isTree(current) ? current : {}, value) : value;
  }

  return result;
}

function getNestedValue(tree: ConfigTree, path: string): unknown {
  let current: unknown = tree;
  for (const part of path.split('.')) {
    if (!isTree(current)) return undefined;
    current = current[part];
  }
  return current;
}

function setNestedValue(tree: ConfigTree, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = tree;

  for (const part of parts) {
    const child = current[part];
    if (isTree(child)) {
      current = child;
    } else {
      const created: ConfigTree = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readConfigFile(path: string): Promise<ConfigTree> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw new ConfigError(`Cannot read config file ${path}`, path, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, path, { cause: error });
  }

  if (!isTree(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`, path);
  }
  return parsed;
}

function envPort(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.PORT;
  if (raw === undefined || raw === '') return undefined;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 0 and 65535, got "${raw}"`, 'PORT');
  }
  return port;
}

function envLogLevel(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.LOG_LEVEL;
  if (raw === undefined || raw === '') return undefined;
  if (!isLogLevel(raw)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${raw}"`, 'LOG_LEVEL');
  }
  return raw;
}

function envLogFormat(env: NodeJS.ProcessEnv): LogFormat | undefined {
  const raw = env.LOG_FORMAT;
  if (raw === undefined || raw === '') return undefined;
  if (raw !== 'json' && raw !== 'pretty') {
    throw new ConfigError(`LOG_FORMAT must be json or pretty, got "${raw}"`, 'LOG_FORMAT');
  }
  return raw;
}

/**
 * Load configuration from a JSON file and the environment. A missing file
 * is the same as an empty one.
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const config = new Config(await readConfigFile(configPath));

  const overrides: Record<string, unknown> = {
    port: envPort(env),
    host: env.HOST,
    env: env.NODE_ENV,
    logLevel: envLogLevel(env),
    logFormat: envLogFormat(env),
    'router.prefix': env.ROUTER_PREFIX,
    'otel.enabled': env.OTEL_ENABLED === undefined ? undefined : env.OTEL_ENABLED === 'true',
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}
