import 'dotenv/config';
import { z } from 'zod';
import { RRF_DEFAULT_K, SEARCH_FIELDS, SPARSE_DROP_RATIO } from './search/constants';

export const envSchema = z.object({
  PORT: z.coerce.number().default(8001),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MILVUS_URI: z.string().url('MILVUS_URI must be a URL'),
  MILVUS_TOKEN: z.string().min(1, 'MILVUS_TOKEN is required'),
  MILVUS_COLLECTION_NAME: z.string().min(1).default('test_kangyur_tengyur'),
  MILVUS_LEXICAL_FIELD: z.string().min(1).default(SEARCH_FIELDS.lexical),
  MILVUS_DENSE_FIELD: z.string().min(1).default(SEARCH_FIELDS.dense),
  MILVUS_TEXT_FIELD: z.string().min(1).default(SEARCH_FIELDS.text),
  GEMINI_API_KEY: z.string().min(1, 'GEMINI_API_KEY is required'),
  EMBEDDING_ENDPOINT: z
    .string()
    .url('EMBEDDING_ENDPOINT must be a URL')
    .default('https://generativelanguage.googleapis.com/v1beta'),
  EMBEDDING_MODEL: z.string().min(1).default('gemini-embedding-001'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),
  EMBEDDING_TASK_TYPE: z.string().min(1).default('RETRIEVAL_DOCUMENT'),
  RRF_K: z.coerce.number().int().positive().default(RRF_DEFAULT_K),
  SPARSE_DROP_RATIO: z.coerce.number().min(0).max(1).default(SPARSE_DROP_RATIO),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  API_KEY: z.string().optional(),
  RATE_LIMIT_MAX: z.coerce.number().default(100),
  RATE_LIMIT_WINDOW: z.coerce.number().default(60_000),
  CORS_ORIGINS: z.string().optional()
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('❌ Invalid environment configuration', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const corsOrigins =
  parsed.data.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [];

export const config = {
  ...parsed.data,
  corsOrigins
};
