import dotenv from 'dotenv';
import { z } from 'zod';

const numberFromEnv = (fallback: number, min = 0) =>
  z.preprocess(v => (v === undefined || v === '' ? fallback : Number(v)), z.number().finite().min(min));

const optionalString = z.preprocess(v => (v === '' ? undefined : v), z.string().optional());

const EnvSchema = z.object({
  PORT: numberFromEnv(3000).pipe(z.number().int().max(65535)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CALCULATORS_DIR: z.string().default('configs/calculators'),
  SAMPLES_DIR: z.string().default('configs/samples'),
  WORKBOOK_BACKEND: z.enum(['file', 'remote']).default('file'),
  WORKBOOKS_DIR: z.string().default('workbooks'),
  SHEETS_API_BASE_URL: z.string().url().default('https://sheets.googleapis.com'),
  SHEETS_ACCESS_TOKEN: optionalString,
  CACHE_TTL_SECONDS: numberFromEnv(300),
  CALL_TIMEOUT_SECONDS: numberFromEnv(30),
  BACKEND_MAX_RETRIES: numberFromEnv(3).pipe(z.number().int().max(10)),
  BACKEND_RETRY_BASE_MS: numberFromEnv(200),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().default('qwen3:32b'),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-2.5-pro')
});

export type AppConfig = {
  port: number;
  logLevel: string;
  calculatorsDir: string;
  samplesDir: string;
  backend: 'file' | 'remote';
  workbooksDir: string;
  sheetsApiBaseUrl: string;
  sheetsAccessToken: string | null;
  cacheTtlMs: number;
  callTimeoutMs: number;
  backendMaxRetries: number;
  backendRetryBaseMs: number;
  ollamaBaseUrl: string;
  ollamaModel: string;
  geminiApiKey: string | null;
  geminiModel: string;
};

/** Reads `.env` (if any) into `process.env`, then validates it. */
export function loadConfig(): AppConfig {
  dotenv.config();
  return configFromEnv(process.env);
}

export function configFromEnv(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msgs = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration – ${msgs.join('; ')}`);
  }
  const e = parsed.data;
  if (e.WORKBOOK_BACKEND === 'remote' && !e.SHEETS_ACCESS_TOKEN) {
    throw new Error('Invalid configuration – SHEETS_ACCESS_TOKEN is required when WORKBOOK_BACKEND=remote');
  }
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    calculatorsDir: e.CALCULATORS_DIR,
    samplesDir: e.SAMPLES_DIR,
    backend: e.WORKBOOK_BACKEND,
    workbooksDir: e.WORKBOOKS_DIR,
    sheetsApiBaseUrl: e.SHEETS_API_BASE_URL,
    sheetsAccessToken: e.SHEETS_ACCESS_TOKEN ?? null,
    cacheTtlMs: e.CACHE_TTL_SECONDS * 1000,
    callTimeoutMs: e.CALL_TIMEOUT_SECONDS * 1000,
    backendMaxRetries: e.BACKEND_MAX_RETRIES,
    backendRetryBaseMs: e.BACKEND_RETRY_BASE_MS,
    ollamaBaseUrl: e.OLLAMA_BASE_URL,
    ollamaModel: e.OLLAMA_MODEL,
    geminiApiKey: e.GEMINI_API_KEY ?? null,
    geminiModel: e.GEMINI_MODEL
  };
}
