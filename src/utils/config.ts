/**
 * Configuration loading for the attribute importer
 *
 * Loads ~/.attribute-import/.env and ./.env, then ~/.attribute-import/config.json,
 * applies environment overrides and validates the result.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';
import { ImportValidationError, errorMessage } from './errors';

const logger = createLogger('config');

// Load .env from the state dir first, then CWD fallback (won't override existing vars)
dotenvConfig({ path: join(homedir(), '.attribute-import', '.env') });
dotenvConfig();

type Env = Record<string, string | undefined>;

export function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: Env = process.env): string {
  const override = env.ATTRIBUTE_IMPORT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.attribute-import');
}

function resolveConfigPath(env: Env): string {
  const override = env.ATTRIBUTE_IMPORT_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'config.json');
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  varDir: z.string().trim().min(1, 'varDir must not be empty'),
  database: z.object({
    path: z.string().trim().min(1, 'database.path must not be empty'),
  }),
  logLevel: z.enum(LOG_LEVELS),
});

export type ImportConfig = z.infer<typeof configSchema>;

function defaultConfig(env: Env): Record<string, unknown> {
  return {
    varDir: './var',
    database: { path: join(resolveStateDir(env), 'catalog.db') },
    logLevel: 'warn',
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVars(item, env);
    }
    return result;
  }
  return value;
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

/** Missing file means defaults; an unreadable or malformed one is fatal */
function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ImportValidationError(`Invalid configuration in '${configPath}': ${errorMessage(err)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ImportValidationError(`Invalid configuration in '${configPath}': the file must contain a JSON object`);
  }
  logger.debug({ configPath }, 'Loaded config file');
  return parsed;
}

function envOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.ATTRIBUTE_IMPORT_VAR_DIR?.trim()) overrides.varDir = env.ATTRIBUTE_IMPORT_VAR_DIR;
  if (env.ATTRIBUTE_IMPORT_DB_PATH?.trim()) overrides.database = { path: env.ATTRIBUTE_IMPORT_DB_PATH };
  if (env.LOG_LEVEL?.trim()) overrides.logLevel = env.LOG_LEVEL.trim();
  return overrides;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: Env;
}

/**
 * Load configuration from defaults, the JSON file and the environment.
 * Directory and file paths come back absolute.
 */
export function loadConfig(options: LoadConfigOptions = {}): ImportConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? resolveConfigPath(env);

  const merged = deepMerge(
    deepMerge(defaultConfig(env), readConfigFile(configPath)),
    envOverrides(env),
  );

  const parsed = configSchema.safeParse(substituteEnvVars(merged, env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ImportValidationError(`Invalid configuration in '${configPath}': ${details}`);
  }

  return {
    ...parsed.data,
    varDir: resolveUserPath(parsed.data.varDir),
    database: { path: resolveUserPath(parsed.data.database.path) },
  };
}
