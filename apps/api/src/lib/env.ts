import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  GENERATION_MAX_ATTEMPTS,
  GENERATION_TIMEOUT_MS,
  QUEUE_POLL_INTERVAL_MS,
  QUEUE_VISIBILITY_TIMEOUT_MS,
  WORKER_CONCURRENCY,
} from '@careplan/shared/constants/order.constants.js';

// Load .env from monorepo root
dotenv.config({
  path: path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../../.env'),
});

const envSchema = z
  .object({
    DATABASE_URL: z.string().min(1),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    API_PORT: z.coerce.number().default(3001),
    API_HOST: z.string().default('0.0.0.0'),
    CORS_ORIGIN: z.string().default('http://localhost:3000'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    QUEUE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    QUEUE_VISIBILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(QUEUE_VISIBILITY_TIMEOUT_MS),
    QUEUE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(QUEUE_POLL_INTERVAL_MS),
    WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(WORKER_CONCURRENCY),
    GENERATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(GENERATION_MAX_ATTEMPTS),
    LLM_PROVIDER: z.enum(['openai', 'mock']).default('mock'),
    LLM_BASE_URL: z.string().url().optional(),
    LLM_MODEL: z.string().default('gpt-4o-mini'),
    LLM_API_KEY: z.string().optional(),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(GENERATION_TIMEOUT_MS),
  })
  .refine((env) => env.LLM_PROVIDER !== 'openai' || !!env.LLM_BASE_URL, {
    message: 'LLM_BASE_URL is required when LLM_PROVIDER=openai',
    path: ['LLM_BASE_URL'],
  })
  .refine((env) => env.QUEUE_VISIBILITY_TIMEOUT_MS > env.LLM_TIMEOUT_MS, {
    message: 'QUEUE_VISIBILITY_TIMEOUT_MS must exceed LLM_TIMEOUT_MS',
    path: ['QUEUE_VISIBILITY_TIMEOUT_MS'],
  });

export type Env = z.infer<typeof envSchema>;

let _env: Env | undefined;

export function getEnv(): Env {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      console.error('Invalid environment variables:', result.error.flatten().fieldErrors);
      throw new Error('Invalid environment variables');
    }
    _env = result.data;
  }
  return _env;
}
