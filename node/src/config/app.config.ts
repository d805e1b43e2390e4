/** App configuration, read from the environment (dotenv is loaded by the entry points). */
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '@/utils/errors';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  FLIGHTS_FILE: z.string().min(1).default('data/flights.json'),
  POLICY_FILES: z.string().min(1).default('data/visa_rules.md'),
  VECTOR_STORE_PATH: z.string().min(1).default('vector_store/index.json'),
  CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  CHUNK_SLACK: z.coerce.number().int().nonnegative().optional(),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
  MAX_DISPLAYED_FLIGHTS: z.coerce.number().int().positive().default(5),
  EMBEDDING_PROVIDER: z.enum(['hashing', 'openai']).default('hashing'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(256),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_BASE_URL: optionalString.pipe(z.string().url().optional()),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  OPENAI_API_KEY: optionalString,
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  flightsFile: string;
  policyFiles: string[];
  vectorStorePath: string;
  chunking: { width: number; overlap: number; slack?: number };
  retrievalTopK: number;
  maxDisplayedFlights: number;
  embedding: {
    provider: 'hashing' | 'openai';
    model: string;
    dimensions: number;
  };
  llm: {
    model: string;
    baseURL?: string;
    temperature: number;
    maxTokens: number;
  };
  openaiApiKey?: string;
  corsOrigins: string[];
}

/**
 * Parse and validate configuration. Relative file paths resolve against `cwd`.
 * Throws ConfigurationError naming the first offending variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue?.message ?? 'invalid value', issue?.path.join('.'));
  }
  const e = parsed.data;

  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ConfigurationError(
      `must be smaller than CHUNK_SIZE (${e.CHUNK_SIZE}), got ${e.CHUNK_OVERLAP}`,
      'CHUNK_OVERLAP',
    );
  }

  const resolve = (p: string) => path.resolve(cwd, p);

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    flightsFile: resolve(e.FLIGHTS_FILE),
    policyFiles: e.POLICY_FILES.split(',')
      .map((p) => p.trim())
      .filter(Boolean)
      .map(resolve),
    vectorStorePath: resolve(e.VECTOR_STORE_PATH),
    chunking: { width: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP, slack: e.CHUNK_SLACK },
    retrievalTopK: e.RETRIEVAL_TOP_K,
    maxDisplayedFlights: e.MAX_DISPLAYED_FLIGHTS,
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
    },
    llm: {
      model: e.LLM_MODEL,
      baseURL: e.LLM_BASE_URL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    openaiApiKey: e.OPENAI_API_KEY,
    corsOrigins: e.CORS_ORIGIN.split(',')
      .map((o) => o.trim())
      .filter(Boolean),
  };
}
