import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { resolve, dirname } from 'path';
import { parse, stringify } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, ConfigDefaults, type RawConfig, type Config } from './schema.js';
import { parseDurationValue } from './duration.js';

const DEFAULT_CONFIG_PATH = '.relaywatch/config.yaml';

export const PORT_ENV = 'RELAYWATCH_PORT';
export const HOST_ENV = 'RELAYWATCH_HOST';

function getDefaultConfigPath(): string {
  return resolve(homedir(), DEFAULT_CONFIG_PATH);
}

function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveEnvVar(value: string): string {
  let envKey: string | undefined;
  if (value.startsWith('env:')) {
    envKey = value.slice(4);
  } else if (value.startsWith('${') && value.endsWith('}')) {
    envKey = value.slice(2, -1);
  } else if (value.startsWith('$')) {
    envKey = value.slice(1);
  }
  if (envKey === undefined) return value;
  const envVal = process.env[envKey];
  return envVal ? envVal : value;
}

function isUnresolvedEnvRef(value: string): boolean {
  return value.startsWith('env:') || value.startsWith('$');
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

function describeIssues(issues: ZodIssue[]): string {
  return issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly filePath?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readDocument(configPath: string): Record<string, unknown> {
  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`, configPath);
  }

  let doc: unknown;
  try {
    doc = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`, configPath);
  }

  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new ConfigError(`Config file must contain a mapping: ${configPath}`, configPath);
  }
  return doc;
}

function durationOr(value: string | number | undefined, fallback: number): number {
  return value === undefined ? fallback : parseDurationValue(value) ?? fallback;
}

function mergeConfig(raw: RawConfig): Config {
  const result = structuredClone(ConfigDefaults);

  if (raw.topics?.root) {
    result.topics.root = raw.topics.root;
  }
  if (raw.registry) {
    const { freshness_threshold, grace_period, dedup_window, history_capacity } = raw.registry;
    result.registry = {
      freshness_threshold: durationOr(freshness_threshold, result.registry.freshness_threshold),
      grace_period: durationOr(grace_period, result.registry.grace_period),
      dedup_window: durationOr(dedup_window, result.registry.dedup_window),
      history_capacity: history_capacity ?? result.registry.history_capacity,
    };
  }
  if (raw.sweeper) {
    result.sweeper.interval = durationOr(raw.sweeper.interval, result.sweeper.interval);
  }
  if (raw.feed) {
    result.feed.coalesce = durationOr(raw.feed.coalesce, result.feed.coalesce);
  }
  if (raw.server) {
    result.server = { ...result.server, ...raw.server };
  }
  if (raw.log) {
    result.log = { ...result.log, ...raw.log };
  }
  return result;
}

function validate(doc: unknown, context: string): RawConfig {
  const resolved = resolveEnvVarsInObject(stripNullValues(doc));
  const validated = ConfigSchema.safeParse(resolved);
  if (!validated.success) {
    throw new ConfigError(`${context}: ${describeIssues(validated.error.issues)}`);
  }
  return validated.data;
}

export interface LoadConfigResult {
  config: Config;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let raw: RawConfig = {};
  if (configFileExists) {
    const doc = readDocument(configPath);
    try {
      raw = validate(doc, 'Invalid config');
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  const result = mergeConfig(raw);

  // An unresolved reference such as "$RELAYWATCH_HOST" falls back like an unset value.
  let hostFromFile = raw.server?.host;
  if (hostFromFile !== undefined && isUnresolvedEnvRef(hostFromFile)) {
    hostFromFile = undefined;
    result.server.host = ConfigDefaults.server.host;
  }

  const envKeysUsed: string[] = [];
  const envHost = process.env[HOST_ENV];
  if (hostFromFile === undefined && envHost) {
    result.server.host = envHost;
    envKeysUsed.push(HOST_ENV);
  }

  const envPort = process.env[PORT_ENV];
  if (raw.server?.port === undefined && envPort) {
    const port = Number(envPort);
    if (!Number.isInteger(port) || port < 0 || port > 65_535) {
      throw new ConfigError(`Invalid ${PORT_ENV}: ${envPort}`);
    }
    result.server.port = port;
    envKeysUsed.push(PORT_ENV);
  }

  return { config: result, configFileExists, envKeysUsed };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return getDefaultConfigPath();
}

function coerceValue(value: string): string | number | boolean {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') return numValue;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/** Set a dot-notation key (e.g. `server.port`) in the config file and validate the result. */
export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'relaywatch config init' first.`, configPath);
  }

  const doc = readDocument(configPath);
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (!lastKey || keys.some(k => k.length === 0)) {
    throw new ConfigError(`Invalid config key: ${key}`, configPath);
  }

  let current = doc;
  for (const segment of keys) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }
  current[lastKey] = coerceValue(value);

  validate(doc, `Invalid config after setting ${key}`);
  writeFileSync(configPath, stringify(doc), 'utf-8');
}

export const CONFIG_TEMPLATE = `# relaywatch configuration
# Durations take milliseconds or a unit: 500ms, 30s, 5m, 1h.
# String values may read the environment: env:NAME, $NAME or \${NAME}.

topics:
  root: claude-code             # <root>/status/<session>, <root>/events/...

registry:
  freshness_threshold: 5m       # silence before a session expires
  grace_period: 1m              # further silence before it is forgotten
  dedup_window: 5s              # repeats of one event inside this window collapse
  history_capacity: 100

sweeper:
  interval: 30s

feed:
  coalesce: 100ms

server:
  host: 127.0.0.1               # or set RELAYWATCH_HOST
  port: 1884                    # or set RELAYWATCH_PORT

log:
  level: info                   # quiet | info | debug
`;

export interface InitConfigResult {
  configPath: string;
  created: boolean;
}

/** Write the commented default config unless one already exists. */
export function initConfig(options: LoadConfigOptions = {}): InitConfigResult {
  const configPath = getConfigPath(options.configPath);
  if (existsSync(configPath)) {
    return { configPath, created: false };
  }
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return { configPath, created: true };
}
