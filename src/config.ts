import { z } from 'zod';

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const EnvSchema = z.object({
  HF_TOKEN: optionalSecret,
  API_KEY: optionalSecret,
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  CLIENT_ORIGIN: z.string().default('*'),
  WORKER_POOL_SIZE: z.coerce.number().int().positive().default(4),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  DATASET_CACHE_CAPACITY: z.coerce.number().int().nonnegative().default(0),
  HF_DATASETS_SERVER_URL: z.string().url().default('https://datasets-server.huggingface.co'),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(50)
});

export interface AppConfig {
  hfToken?: string;
  apiKey?: string;
  port: number;
  clientOrigin: string;
  workerPoolSize: number;
  /** 0 disables the per-call timeout */
  inferenceTimeoutMs: number;
  /** 0 keeps the dataset cache unbounded */
  datasetCacheCapacity: number;
  datasetsServerUrl: string;
  uploadLimitBytes: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    hfToken: vars.HF_TOKEN,
    apiKey: vars.API_KEY,
    port: vars.PORT,
    clientOrigin: vars.CLIENT_ORIGIN,
    workerPoolSize: vars.WORKER_POOL_SIZE,
    inferenceTimeoutMs: vars.INFERENCE_TIMEOUT_MS,
    datasetCacheCapacity: vars.DATASET_CACHE_CAPACITY,
    datasetsServerUrl: vars.HF_DATASETS_SERVER_URL,
    uploadLimitBytes: Math.floor(vars.UPLOAD_LIMIT_MB * 1024 * 1024)
  };
};
