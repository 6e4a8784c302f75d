import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import {
  columnOverridesSchema,
  duplicatePolicySchema,
  trackedFieldSchema,
} from '@regwatch/core';

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
  /** Environment to read (default: process.env) */
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
 * Expand `${NAME}` and `${NAME:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v: unknown) => expandEnvVars(v, options));
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

/** Calendar date or ISO datetime, e.g. "2025-10-18" */
const dateSchema = z.coerce.date();

const stateSourceSchema = z
  .object({
    state: z.string().min(1),
    filePath: z.string().min(1),
  })
  .strict();

export const consolidationSchema = z
  .object({
    states: z.array(stateSourceSchema).min(1),
    /** Master table CSV written after consolidation */
    outputPath: z.string().min(1).optional(),
    snapshotDate: dateSchema.optional(),
  })
  .strict();

/** Snapshot path, or a path with the date to use when its rows carry none */
export const snapshotSourceSchema = z.union([
  z.string().min(1),
  z
    .object({
      path: z.string().min(1),
      snapshotDate: dateSchema.optional(),
    })
    .strict(),
]);

export const processingSchema = z
  .object({
    skipUnreadableSnapshots: z.boolean().default(true),
    duplicateIdentifiers: duplicatePolicySchema.default('reject'),
    trackFields: z.array(trackedFieldSchema).min(1).optional(),
    columns: columnOverridesSchema.optional(),
    encoding: z.enum(['utf-8', 'utf8', 'latin1']).optional(),
  })
  .strict();

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const ndjsonStore = z
  .object({
    type: z.literal('ndjson'),
    dir: z.string().min(1).default('./.change-log'),
  })
  .strict();

const memoryStore = z.object({ type: z.literal('memory') }).strict();

const postgresStore = z
  .object({
    type: z.literal('postgresql'),
    connectionString: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    table: z.string().min(1).optional(),
    schema: z.string().min(1).optional(),
    batchSize: z.number().int().min(1).max(10_000).optional(),
  })
  .strict();

export const storeSchema = z.discriminatedUnion('type', [ndjsonStore, memoryStore, postgresStore]);

export type StoreConfig = z.infer<typeof storeSchema>;

export const exportSchema = z
  .object({
    dir: z.string().min(1).default('./exports'),
    formats: z.array(z.enum(['csv', 'json'])).min(1).default(['csv']),
  })
  .strict();

export const loggingSchema = z
  .object({
    format: z.enum(['text', 'json']).optional(),
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    consolidation: consolidationSchema.optional(),
    snapshots: z.array(snapshotSourceSchema).default([]),
    processing: processingSchema.default({}),
    store: storeSchema.default({ type: 'ndjson', dir: './.change-log' }),
    export: exportSchema.optional(),
    logging: loggingSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.store.type === 'postgresql' && !value.store.connectionString && !value.store.host) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'PostgreSQL store requires connectionString or host',
        path: ['store', 'connectionString'],
      });
    }

    const seen = new Set<string>();
    value.consolidation?.states.forEach((entry, i) => {
      const key = entry.state.trim().toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate state: ${entry.state}`,
          path: ['consolidation', 'states', i, 'state'],
        });
      }
      seen.add(key);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

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
 * Validate a parsed config document after env expansion
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(parsed);
}
