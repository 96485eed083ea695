// ──────────────────────────────────────────
// Configuration: validated once, passed explicitly
// ──────────────────────────────────────────

import path from 'path';
import { z } from 'zod';
import iconv from 'iconv-lite';
import { ConfigError } from './errors';

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : Number(v)))
    .pipe(z.number().int().nonnegative());

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? null : v.trim()));

const envSchema = z.object({
  BRONZE_ROOT: z.string().min(1),
  SILVER_ROOT: z.string().min(1),
  ARCHIVE_ROOT: z.string().min(1),
  SILVER_ARCHIVE_ROOT: z.string().min(1).optional(),
  DIM_GEO_PATH: z.string().min(1),
  DIM_CUSTOMER_GEO_PATH: z.string().min(1),
  DIM_PRODUCT_PATH: z.string().min(1),
  SOURCE_ENCODING: z
    .string()
    .default('windows-1252')
    .refine((enc) => iconv.encodingExists(enc), { message: 'unsupported encoding' }),
  BATCH_CONCURRENCY: intFromEnv(1).pipe(z.number().min(1)),
  BATCH_INTERVAL_MS: intFromEnv(0),
  DATABASE_URL: optionalString,
  FACT_TABLE: z.string().min(1).default('fact_sales'),
  PORT: intFromEnv(3000),
  API_KEY: optionalString,
});

export interface PipelinePaths {
  bronzeRoot: string;
  silverRoot: string;
  archiveRoot: string;
  silverArchiveRoot: string;
}

export interface DimensionPaths {
  geo: string;
  customerGeo: string;
  product: string;
}

export interface AppConfig {
  paths: PipelinePaths;
  dimensions: DimensionPaths;
  sourceEncoding: string;
  concurrency: number;
  intervalMs: number;
  databaseUrl: string | null;
  factTable: string;
  port: number;
  apiKey: string | null;
}

/**
 * Builds the application config from an environment map. Relative paths are
 * resolved against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  const resolve = (p: string) => path.resolve(cwd, p);

  return Object.freeze({
    paths: {
      bronzeRoot: resolve(e.BRONZE_ROOT),
      silverRoot: resolve(e.SILVER_ROOT),
      archiveRoot: resolve(e.ARCHIVE_ROOT),
      silverArchiveRoot: resolve(e.SILVER_ARCHIVE_ROOT ?? path.join(e.ARCHIVE_ROOT, '..', 'archive_silver')),
    },
    dimensions: {
      geo: resolve(e.DIM_GEO_PATH),
      customerGeo: resolve(e.DIM_CUSTOMER_GEO_PATH),
      product: resolve(e.DIM_PRODUCT_PATH),
    },
    sourceEncoding: e.SOURCE_ENCODING,
    concurrency: e.BATCH_CONCURRENCY,
    intervalMs: e.BATCH_INTERVAL_MS,
    databaseUrl: e.DATABASE_URL,
    factTable: e.FACT_TABLE,
    port: e.PORT,
    apiKey: e.API_KEY,
  });
}
