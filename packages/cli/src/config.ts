import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import {
  conversionOptions,
  schemaConversionOptions,
  truncateTimestampsSchema,
  type ConversionOptions,
  type SchemaConversionOptions,
} from '@rowbridge/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read from. Default: process.env */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/** Expand `${NAME}` and `${NAME:-default}` in every string of a JSON value. */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    conversion: z
      .object({
        truncateTimestamps: truncateTimestampsSchema.optional(),
      })
      .strict()
      .optional(),
    schema: z
      .object({
        inferMaps: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export type ResolvedOptions = {
  conversion: ConversionOptions;
  schema: SchemaConversionOptions;
};

/** Converter options from a config file, defaults filled in */
export function resolveOptions(config: ConfigFile = {}): ResolvedOptions {
  return {
    conversion: conversionOptions(
      config.conversion?.truncateTimestamps
        ? { truncateTimestamps: config.conversion.truncateTimestamps }
        : {}
    ),
    schema: schemaConversionOptions(
      config.schema?.inferMaps !== undefined ? { inferMaps: config.schema.inferMaps } : {}
    ),
  };
}

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/** Validate an already-parsed config document. */
export function parseConfig(json: unknown, options?: EnvExpansionOptions): ConfigFile {
  const expanded = expandEnvVars(json, options);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${reason}`);
  }
  return parseConfig(parsed, options);
}
