/**
 * Configuration loading and management
 *
 * Precedence (lowest first): built-in defaults, JSON config file
 * (`pricedrift.json` or $PRICEDRIFT_CONFIG), environment variables,
 * explicit overrides (CLI flags). The merged result is validated with zod.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { isValidIsoDate } from '../catalog/dates';
import { createLogger } from './logger';

const logger = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'pricedrift.json';

const isoDate = z.string().refine(isValidIsoDate, { message: 'Expected a YYYY-MM-DD date' });

export const configSchema = z
  .object({
    region: z.string().trim().min(1).default('madrid'),
    topN: z.number().int().min(1).default(3),
    lookbackDays: z.number().int().min(1).default(7),
    baseline: z
      .object({
        date: isoDate.default('2026-01-04'),
        label: z.string().trim().min(1).default('January 2026'),
      })
      .default({}),
    /** Character budget of the final text; null disables truncation */
    maxChars: z.number().int().min(1).nullable().default(280),
    /** Exit non-zero on a fatal pipeline error instead of skipping the report */
    failOnError: z.boolean().default(false),
    catalog: z
      .object({
        repository: z.string().trim().default(''),
        token: z.string().optional(),
        apiUrl: z.string().url().default('https://api.github.com'),
        timeoutMs: z.number().int().positive().default(30_000),
        maxAttempts: z.number().int().min(1).default(3),
        /** Read zip archives from this directory instead of GitHub releases */
        directory: z.string().optional(),
      })
      .default({}),
    archive: z
      .object({
        filePrefix: z.string().trim().min(1).optional(),
        delimiter: z.string().length(1).default(';'),
      })
      .default({}),
    report: z
      .object({
        locale: z.enum(['en', 'es']).default('en'),
        currency: z.string().default('€'),
        hashtags: z.array(z.string().min(1)).default(['#Prices', '#Inflation']),
        regionLabel: z.string().trim().min(1).optional(),
        storeName: z.string().trim().min(1).optional(),
      })
      .default({}),
    output: z
      .object({
        dir: z.string().default('output'),
        write: z.boolean().default(true),
      })
      .default({}),
  })
  .superRefine((cfg, ctx) => {
    if (!cfg.catalog.directory && !cfg.catalog.repository) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['catalog', 'repository'],
        message: 'Set catalog.repository (owner/name) or catalog.directory',
      });
    }
  });

export type PipelineConfig = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Protects against prototype pollution.
 * `undefined` in `source` never overwrites; `null` does.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

/** `none`/`off` disable the budget; a number sets it. */
export function parseMaxChars(raw: string | undefined): number | null | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  if (['none', 'off', 'unlimited'].includes(raw.trim().toLowerCase())) return null;
  return parseNumber('PRICEDRIFT_MAX_CHARS', raw);
}

function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return raw.split(/[\s,]+/).filter(Boolean);
}

/**
 * Config fragment taken from PRICEDRIFT_* variables (and GITHUB_TOKEN /
 * GITHUB_REPOSITORY as CI runners set them).
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  return {
    region: env.PRICEDRIFT_REGION,
    topN: parseNumber('PRICEDRIFT_TOP_N', env.PRICEDRIFT_TOP_N),
    lookbackDays: parseNumber('PRICEDRIFT_LOOKBACK_DAYS', env.PRICEDRIFT_LOOKBACK_DAYS),
    baseline: {
      date: env.PRICEDRIFT_BASELINE_DATE,
      label: env.PRICEDRIFT_BASELINE_LABEL,
    },
    maxChars: parseMaxChars(env.PRICEDRIFT_MAX_CHARS),
    failOnError: parseBoolean('PRICEDRIFT_FAIL_ON_ERROR', env.PRICEDRIFT_FAIL_ON_ERROR),
    catalog: {
      repository: env.PRICEDRIFT_REPOSITORY ?? env.GITHUB_REPOSITORY,
      token: env.PRICEDRIFT_GITHUB_TOKEN ?? env.GITHUB_TOKEN,
      apiUrl: env.PRICEDRIFT_GITHUB_API_URL,
      timeoutMs: parseNumber('PRICEDRIFT_TIMEOUT_MS', env.PRICEDRIFT_TIMEOUT_MS),
      directory: env.PRICEDRIFT_ARCHIVE_DIR,
    },
    report: {
      locale: env.PRICEDRIFT_LOCALE,
      hashtags: splitList(env.PRICEDRIFT_HASHTAGS),
    },
    output: {
      dir: env.PRICEDRIFT_OUTPUT_DIR,
    },
  };
}

function readConfigFile(path: string, required: boolean): Record<string, unknown> {
  if (!existsSync(path)) {
    if (required) throw new ConfigError(`Config file not found: ${path}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${path}`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  logger.debug({ path }, 'Config file loaded');
  return parsed;
}

export interface LoadConfigOptions {
  /** Explicit config file; an explicit path must exist */
  configPath?: string;
  env?: Env;
  overrides?: Record<string, unknown>;
}

/**
 * Load configuration from file, environment and overrides.
 *
 * @throws ConfigError on an unreadable file or a value that fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.PRICEDRIFT_CONFIG;
  const path = resolve(explicitPath ?? DEFAULT_CONFIG_FILE);

  const fileConfig = substituteEnvVars(readConfigFile(path, explicitPath !== undefined), env);
  const merged = deepMerge(
    deepMerge(isPlainObject(fileConfig) ? fileConfig : {}, configFromEnv(env)),
    options.overrides ?? {},
  );

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }
  return result.data;
}
