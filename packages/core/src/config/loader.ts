/**
 * Configuration Loader for Tiermind
 *
 * - Config files are validated against the shared zod schemas
 * - Secrets are referenced by environment variable name, never stored
 * - Loading order (later overrides earlier): schema defaults, YAML file,
 *   TIERMIND_* environment variables, programmatic overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from '@tiermind/shared';

// Checked in order when no explicit path is given
const DEFAULT_CONFIG_PATHS = [
  './tiermind.yaml',
  './tiermind.yml',
  './config/tiermind.yaml',
  '~/.tiermind/config.yaml',
];

/**
 * Expand a leading ~ to the home directory and resolve to an absolute path.
 */
export function expandPath(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

function loadConfigFile(path: string): Record<string, unknown> | null {
  const expandedPath = expandPath(path);
  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to load config from ${expandedPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cause: error }
    );
  }

  // An empty file parses to null
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Non-secret settings from TIERMIND_* variables. Only the keys that are set
 * appear in the result, so sibling values from the file survive the merge.
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, Record<string, unknown>> = {};
  const set = (section: string, key: string, value: unknown) => {
    raw[section] = { ...raw[section], [key]: value };
  };

  if (env.TIERMIND_ENV) set('core', 'environment', env.TIERMIND_ENV);
  if (env.TIERMIND_DATA_DIR) set('core', 'dataDir', env.TIERMIND_DATA_DIR);
  if (env.TIERMIND_LOG_LEVEL) set('logging', 'level', env.TIERMIND_LOG_LEVEL);
  if (env.TIERMIND_HOST) set('gateway', 'host', env.TIERMIND_HOST);
  if (env.TIERMIND_PORT) {
    const port = parseInt(env.TIERMIND_PORT, 10);
    if (!isNaN(port)) {
      set('gateway', 'port', port);
    }
  }
  if (env.TIERMIND_MODEL) set('model', 'model', env.TIERMIND_MODEL);
  if (env.TIERMIND_MODEL_BASE_URL) set('model', 'baseUrl', env.TIERMIND_MODEL_BASE_URL);

  return raw;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge; later values win, arrays are replaced rather than merged.
 */
function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
  }
  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Environment to read instead of process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: Record<string, unknown> = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env ?? process.env);

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return {
    ...result.data,
    core: { ...result.data.core, dataDir: expandPath(result.data.core.dataDir) },
  };
}

/**
 * Get a secret value from environment variable
 * This is the only way to access secrets - they are never stored in config objects
 */
export function getSecret(envVarName: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env[envVarName];
}

/**
 * Get a required secret value from environment variable
 * Throws if the secret is not set
 */
export function requireSecret(envVarName: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = getSecret(envVarName, env);
  if (!value) {
    throw new Error(`Required secret not set: ${envVarName}`);
  }
  return value;
}
