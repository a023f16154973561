import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { reconciliationConfigInputSchema } from '@termrecon/recon-core';

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
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
  /** Variables to read from (default: process.env) */
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

/**
 * Replace `${NAME}` and `${NAME:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: unknown } = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

export const reportFormatSchema = z.enum(['csv', 'markdown']);

export const configFileSchema = z
  .object({
    reconciliation: reconciliationConfigInputSchema.optional(),
    output: z
      .object({
        dir: z.string().min(1).optional(),
        formats: z.array(reportFormatSchema).min(1).optional(),
      })
      .strict()
      .optional(),
    bookings: z
      .object({
        recordsPath: z.string().min(1).optional(),
        sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
        delimiter: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
        format: z.enum(['text', 'json']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;
export type ReportFormat = z.infer<typeof reportFormatSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config.json:\n${issues}`;
}

/**
 * Validate an already parsed configuration value
 *
 * @throws ConfigError
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

/**
 * Read, expand and validate a JSON configuration file
 *
 * @throws ConfigError when the file is not valid JSON or fails validation
 */
export async function loadConfig(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // UTF-8 BOM (common on Windows) breaks JSON.parse
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConfig(parsed, options);
}
