import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import type { RelpoolConfig } from '../types/config.js';

export const CONFIG_FILE_NAME = '.relpool.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Zod Schemas ---

const poolingConfigSchema = z.object({
  depthK: z.number().int('depthK must be an integer').positive('depthK must be positive'),
});

const labelingConfigSchema = z.object({
  concurrency: z.number().int('concurrency must be an integer').positive('concurrency must be positive'),
  skipJudged: z.boolean(),
  labeledBy: z.string().min(1, 'labeledBy must not be empty'),
  timeoutMs: z.number().int('timeoutMs must be an integer').nonnegative('timeoutMs must not be negative'),
  titleFields: z.array(z.string().min(1)),
  contentFields: z.array(z.string().min(1)).min(1, 'contentFields must name at least one field'),
});

const judgeConfigSchema = z.object({
  baseUrl: z.string().url('judge.baseUrl must be a URL'),
  model: z.string().min(1, 'Judge model must not be empty'),
  apiKey: z.string().min(1).optional(),
  temperature: z.number().min(0, 'temperature must be between 0 and 2').max(2, 'temperature must be between 0 and 2'),
  maxTokens: z.number().int().positive('maxTokens must be positive'),
  maxContentChars: z.number().int().positive('maxContentChars must be positive'),
});

const metricsConfigSchema = z.object({
  cutoffs: z
    .array(z.number().int('cutoffs must be integers').positive('cutoffs must be positive'))
    .min(1, 'At least one cutoff is required'),
});

const relpoolConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  pooling: poolingConfigSchema,
  labeling: labelingConfigSchema,
  judge: judgeConfigSchema,
  metrics: metricsConfigSchema,
});

// --- Defaults ---

export const DEFAULT_CONFIG: RelpoolConfig = {
  version: '1',
  pooling: {
    depthK: 20,
  },
  labeling: {
    concurrency: 10,
    skipJudged: true,
    labeledBy: 'ai-judge',
    timeoutMs: 120_000,
    titleFields: ['title', 'TITLE'],
    contentFields: ['merged_comment', 'content', 'CONTENT'],
  },
  judge: {
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    temperature: 0.1,
    maxTokens: 200,
    maxContentChars: 2000,
  },
  metrics: {
    cutoffs: [5, 10, 20],
  },
};

// --- Environment variable interpolation ---

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;
const ESCAPED_ENV_VAR_PATTERN = /\\\$\{([^}]+)\}/g;

function interpolateEnvVarsInString(
  value: string,
  env: NodeJS.ProcessEnv,
): string | ConfigError {
  // Temporarily replace escaped \${...} with a placeholder
  const placeholder = '\x00ENV_ESCAPED\x00';
  const withPlaceholders = value.replace(ESCAPED_ENV_VAR_PATTERN, `${placeholder}$1${placeholder}`);

  const missing: string[] = [];
  const resolved = withPlaceholders.replace(ENV_VAR_PATTERN, (match, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      missing.push(varName);
      return match;
    }
    return envValue;
  });

  if (missing.length > 0) {
    return new ConfigError(
      `Missing environment variable(s): ${missing.join(', ')}. Set them before running relpool.`,
    );
  }

  // Restore escaped sequences as literal ${...}
  return resolved.replace(
    new RegExp(`${placeholder.replace(/\x00/g, '\\x00')}(.+?)${placeholder.replace(/\x00/g, '\\x00')}`, 'g'),
    (_match, varName: string) => `\${${varName}}`,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function interpolateEnvVars(
  obj: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown | ConfigError {
  if (typeof obj === 'string') {
    return interpolateEnvVarsInString(obj, env);
  }
  if (Array.isArray(obj)) {
    const result: unknown[] = [];
    for (const item of obj) {
      const interpolated = interpolateEnvVars(item, env);
      if (interpolated instanceof ConfigError) return interpolated;
      result.push(interpolated);
    }
    return result;
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const interpolated = interpolateEnvVars(value, env);
      if (interpolated instanceof ConfigError) return interpolated;
      result[key] = interpolated;
    }
    return result;
  }
  return obj;
}

// --- Helpers ---

function formatZodErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

function section(partial: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = partial[key];
  return isRecord(value) ? value : {};
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  return {
    version: partial['version'] ?? DEFAULT_CONFIG.version,
    pooling: { ...DEFAULT_CONFIG.pooling, ...section(partial, 'pooling') },
    labeling: { ...DEFAULT_CONFIG.labeling, ...section(partial, 'labeling') },
    judge: { ...DEFAULT_CONFIG.judge, ...section(partial, 'judge') },
    metrics: { ...DEFAULT_CONFIG.metrics, ...section(partial, 'metrics') },
  };
}

/**
 * Validate an already-parsed config object: interpolate `${VAR}` references,
 * merge per-section defaults, and check the result against the schema.
 */
export function parseConfig(
  parsed: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<RelpoolConfig, ConfigError> {
  if (!isRecord(parsed)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(parsed, env);
  if (interpolated instanceof ConfigError) {
    return err(interpolated);
  }
  if (!isRecord(interpolated)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const validationResult = relpoolConfigSchema.safeParse(applyDefaults(interpolated));
  if (!validationResult.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validationResult.error)}`));
  }

  return ok(validationResult.data);
}

/**
 * Load `.relpool.yaml` from `rootDir`, or `configPath` when given.
 * A missing default file yields the defaults; a missing explicit file is an error.
 */
export async function loadConfig(
  rootDir: string,
  configPath?: string,
): Promise<Result<RelpoolConfig, ConfigError>> {
  const path = configPath ?? join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    if (configPath === undefined) {
      return ok(DEFAULT_CONFIG);
    }
    return err(new ConfigError(`Config file not found: ${path}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseConfig(parsed);
}
