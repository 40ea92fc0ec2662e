import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    HOST: z.string().default('0.0.0.0'),
    FRONTEND_ORIGIN: z.string().default('http://localhost:3000'),
    LOG_LEVEL: optionalString,

    CANDIDATE_STORE: z.enum(['pgvector', 'memory']).default('pgvector'),
    DATABASE_URL: optionalString,
    PG_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    PG_POOL_MAX: z.coerce.number().int().positive().default(10),
    SEED_FILE: optionalString,

    OPENAI_API_KEY: optionalString,
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
    EMBEDDING_FALLBACK_BASE_URL: optionalString,
    EMBEDDING_FALLBACK_API_KEY: optionalString,

    SEARCH_OVERFETCH_FACTOR: z.coerce.number().int().min(1).default(3),
    SEARCH_DEFAULT_LIMIT: z.coerce.number().int().positive().default(10),
    SEARCH_MAX_LIMIT: z.coerce.number().int().positive().default(50),
    SEARCH_DEFAULT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.1),
  })
  .superRefine((env, ctx) => {
    if (env.CANDIDATE_STORE === 'pgvector' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when CANDIDATE_STORE=pgvector',
      });
    }
    if (env.SEARCH_DEFAULT_LIMIT > env.SEARCH_MAX_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SEARCH_DEFAULT_LIMIT'],
        message: 'SEARCH_DEFAULT_LIMIT must not exceed SEARCH_MAX_LIMIT',
      });
    }
  });

export type ServerEnv = z.infer<typeof envSchema>;

// Build DATABASE_URL from the libpq-style PG* variables when it is not set directly
function getDatabaseUrl(source: NodeJS.ProcessEnv): string | undefined {
  if (source.DATABASE_URL) {
    return source.DATABASE_URL;
  }

  const { PGHOST: host, PGPORT: port, PGDATABASE: database, PGUSER: user, PGPASSWORD: password } = source;
  if (host && port && database && user && password) {
    return `postgresql://${user}:${encodeURIComponent(password)}@${host}:${port}/${database}`;
  }

  return undefined;
}

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function parseServerEnv(source: NodeJS.ProcessEnv): ServerEnv {
  const result = envSchema.safeParse({ ...source, DATABASE_URL: getDatabaseUrl(source) });
  if (!result.success) {
    throw new Error('Missing/invalid server env: ' + JSON.stringify(result.error.flatten().fieldErrors));
  }
  return result.data;
}

export function loadServerEnv(): ServerEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseServerEnv(process.env);
  return cachedEnv;
}

export function resetServerEnv(): void {
  cachedEnv = null;
}
