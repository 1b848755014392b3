import { cpus } from 'node:os';

import { z } from 'zod';

import { ValidationError } from '../shared/errors/index.js';

const integerFromEnv = (fallback: number) =>
  z.coerce.number().int().default(fallback);

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  MEME_DEFAULT_FONT_SIZE: z.coerce.number().positive().default(50),
  MEME_DEFAULT_X: z.coerce.number().default(20),
  MEME_DEFAULT_Y: z.coerce.number().default(20),
  MEME_WORKER_POOL_SIZE: integerFromEnv(Math.max(1, Math.floor(cpus().length / 2))).pipe(
    z.number().min(0).max(64),
  ),
  MEME_GIF_QUALITY: integerFromEnv(10).pipe(z.number().min(1).max(30)),
  MEME_GIF_REPEAT: integerFromEnv(0).pipe(z.number().min(-1).max(65_535)),
  MEME_OUTPUT_SUFFIX: z.string().min(1).default('_meme'),
  MEME_TEXT_CACHE_ENTRIES: integerFromEnv(256).pipe(z.number().min(1)),
});

export interface AppConfig {
  readonly logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  readonly defaults: {
    readonly x: number;
    readonly y: number;
    readonly fontSize: number;
  };
  readonly workerPoolSize: number;
  readonly gif: {
    readonly quality: number;
    readonly repeat: number;
  };
  readonly outputSuffix: string;
  readonly textCacheEntries: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      { source: 'environment' },
    );
  }

  const values = parsed.data;

  return {
    logLevel: values.LOG_LEVEL,
    defaults: {
      x: values.MEME_DEFAULT_X,
      y: values.MEME_DEFAULT_Y,
      fontSize: values.MEME_DEFAULT_FONT_SIZE,
    },
    workerPoolSize: values.MEME_WORKER_POOL_SIZE,
    gif: {
      quality: values.MEME_GIF_QUALITY,
      repeat: values.MEME_GIF_REPEAT,
    },
    outputSuffix: values.MEME_OUTPUT_SUFFIX,
    textCacheEntries: values.MEME_TEXT_CACHE_ENTRIES,
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
