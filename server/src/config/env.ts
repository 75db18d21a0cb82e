import 'dotenv/config';
import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: positiveInt(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),
  TRANSLATION_API_URL: z.string().url().default('https://api.deepseek.com/v1'),
  TRANSLATION_API_KEY: z.string().default(''),
  TRANSLATION_MODEL: z.string().min(1).default('deepseek-chat'),
  TRANSLATION_TIMEOUT_MS: positiveInt(180000),
  TARGET_LANGUAGE: z.string().min(1).default('ru'),
  MAX_PARALLEL_REQUESTS: positiveInt(40),
  MAX_SEGMENT_SIZE: positiveInt(4000),
  MAX_CONTEXT_CHARS: z.coerce.number().int().nonnegative().default(1000),
  MAX_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  MAX_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(60000),
  JOB_STALL_TIMEOUT_MS: positiveInt(600000),
  JOB_RETENTION_MS: positiveInt(3600000),
  MAX_UPLOAD_BYTES: positiveInt(50 * 1024 * 1024),
  DEFAULT_PROMPT_PATH: z.string().min(1).default('server/prompts/default_prompt.txt')
});

export type Env = z.infer<typeof schema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  logLevel: Env['LOG_LEVEL'];
  corsOrigins: string[];
  backend: {
    apiUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  targetLanguage: string;
  pipeline: {
    concurrency: number;
    maxSegmentSize: number;
    maxContextChars: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    maxRetryDelayMs: number;
    stallTimeoutMs: number;
    retentionMs: number;
  };
  maxUploadBytes: number;
  defaultPromptPath: string;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = schema.parse(source);
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    corsOrigins: env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    backend: {
      apiUrl: env.TRANSLATION_API_URL.replace(/\/+$/, ''),
      apiKey: env.TRANSLATION_API_KEY,
      model: env.TRANSLATION_MODEL,
      timeoutMs: env.TRANSLATION_TIMEOUT_MS
    },
    targetLanguage: env.TARGET_LANGUAGE,
    pipeline: {
      concurrency: env.MAX_PARALLEL_REQUESTS,
      maxSegmentSize: env.MAX_SEGMENT_SIZE,
      maxContextChars: env.MAX_CONTEXT_CHARS,
      maxAttempts: env.MAX_ATTEMPTS,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxRetryDelayMs: env.MAX_RETRY_DELAY_MS,
      stallTimeoutMs: env.JOB_STALL_TIMEOUT_MS,
      retentionMs: env.JOB_RETENTION_MS
    },
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    defaultPromptPath: env.DEFAULT_PROMPT_PATH
  };
}
