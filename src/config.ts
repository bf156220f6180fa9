/**
 * Typed configuration from environment variables (loaded from .env when present).
 * Validated once with zod so a bad value fails at startup rather than mid-sync.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    GOOGLE_CLIENT_ID: optionalString,
    GOOGLE_CLIENT_SECRET: optionalString,
    GOOGLE_REFRESH_TOKEN: optionalString,
    GMAIL_USER_ID: z.string().trim().min(1).default('me'),

    VECTOR_BACKEND: z.enum(['local', 'postgres']).default('local'),
    LOCAL_INDEX_PATH: z.string().trim().min(1).default('var/mailchat.db'),
    INDEXING_POSTGRES_URL: optionalString,

    VOYAGE_API_KEY: optionalString,
    VOYAGE_MODEL: z.string().trim().min(1).default('voyage-3'),
    EMBEDDING_DIMENSION: positiveInt(1024),
    EMBED_BATCH_SIZE: positiveInt(32),

    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-sonnet-4-20250514'),
    ANSWER_MAX_TOKENS: positiveInt(1024),

    CHUNK_SIZE: positiveInt(1200),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),

    RETRIEVAL_K: positiveInt(6),
    MEMORY_MAX_TURNS: positiveInt(10),
    MEMORY_MAX_TOKENS: positiveInt(3000),
    MAX_SESSIONS: positiveInt(1000),

    SYNC_PAGE_SIZE: positiveInt(50),
    SYNC_MAX_MESSAGES: positiveInt(500),
    SYNC_LOCK_TTL_MS: positiveInt(30 * 60 * 1000),

    RETRY_MAX_ATTEMPTS: positiveInt(4),
    RETRY_BASE_DELAY_MS: positiveInt(1000),
    RETRY_MAX_DELAY_MS: positiveInt(15_000),
    PROVIDER_TIMEOUT_MS: positiveInt(30_000),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: 'must be smaller than CHUNK_SIZE',
      });
    }
    if (env.VECTOR_BACKEND === 'postgres' && !env.INDEXING_POSTGRES_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['INDEXING_POSTGRES_URL'],
        message: 'is required when VECTOR_BACKEND=postgres',
      });
    }
  });

export type VectorBackend = 'local' | 'postgres';

export interface AppConfig {
  gmail: {
    clientId?: string;
    clientSecret?: string;
    refreshToken?: string;
    userId: string;
  };
  store: {
    backend: VectorBackend;
    localPath: string;
    postgresUrl?: string;
  };
  embedding: {
    apiKey?: string;
    model: string;
    dimension: number;
    batchSize: number;
  };
  llm: {
    apiKey?: string;
    model: string;
    maxTokens: number;
  };
  chunking: {
    size: number;
    overlap: number;
  };
  retrieval: {
    k: number;
    memoryMaxTurns: number;
    memoryMaxTokens: number;
    maxSessions: number;
  };
  sync: {
    pageSize: number;
    maxMessages: number;
    lockTtlMs: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
  };
}

/**
 * Parse and validate an environment map. Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError('Invalid environment variables', issues);
  }
  const e = parsed.data;
  return {
    gmail: {
      clientId: e.GOOGLE_CLIENT_ID,
      clientSecret: e.GOOGLE_CLIENT_SECRET,
      refreshToken: e.GOOGLE_REFRESH_TOKEN,
      userId: e.GMAIL_USER_ID,
    },
    store: {
      backend: e.VECTOR_BACKEND,
      localPath: e.LOCAL_INDEX_PATH,
      postgresUrl: e.INDEXING_POSTGRES_URL,
    },
    embedding: {
      apiKey: e.VOYAGE_API_KEY,
      model: e.VOYAGE_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      batchSize: e.EMBED_BATCH_SIZE,
    },
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL,
      maxTokens: e.ANSWER_MAX_TOKENS,
    },
    chunking: {
      size: e.CHUNK_SIZE,
      overlap: e.CHUNK_OVERLAP,
    },
    retrieval: {
      k: e.RETRIEVAL_K,
      memoryMaxTurns: e.MEMORY_MAX_TURNS,
      memoryMaxTokens: e.MEMORY_MAX_TOKENS,
      maxSessions: e.MAX_SESSIONS,
    },
    sync: {
      pageSize: e.SYNC_PAGE_SIZE,
      maxMessages: e.SYNC_MAX_MESSAGES,
      lockTtlMs: e.SYNC_LOCK_TTL_MS,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
    },
  };
}

/** Throw when a component that needs a secret is built without it. */
export function requireSetting<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new ConfigError(`${name} is not set`);
  }
  return value;
}
