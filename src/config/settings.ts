// Environment configuration parsed once into typed settings
import { z } from 'zod';

const optionalNumber = z.preprocess(
  (v) => (v === '' || v === undefined ? undefined : v),
  z.coerce.number().nonnegative().optional(),
);

const listFromEnv = z
  .string()
  .transform((v) => {
    const items = v
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
    return items.length > 0 ? items : ['*'];
  });

const optionalString = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().optional(),
);

export const settingsSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  ALLOWED_ORIGINS: listFromEnv.default('*'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),

  BRAVE_SEARCH_API_KEY: optionalString,
  SERPAPI_API_KEY: optionalString,
  ZENROWS_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,

  LLM_MODEL: z.string().default('gpt-4.1-mini'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_COST_PER_1K_TOKENS: z.coerce.number().nonnegative().default(0),

  REDIS_URL: optionalString,
  MEMORY_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
  CACHE_TTL_QUERY_ENHANCEMENT: z.coerce.number().int().positive().default(3600),
  CACHE_TTL_SEARCH_RESULTS: z.coerce.number().int().positive().default(1800),
  CACHE_TTL_CONTENT: z.coerce.number().int().positive().default(7200),
  CACHE_TTL_FINAL_RESPONSE: z.coerce.number().int().positive().default(14400),

  DAILY_BUDGET_USD: z.coerce.number().nonnegative().default(100),
  MONTHLY_BUDGET_USD: optionalNumber,
  BRAVE_DAILY_BUDGET: optionalNumber,
  BRAVE_MONTHLY_BUDGET: optionalNumber,
  SERPAPI_DAILY_BUDGET: optionalNumber,
  SERPAPI_MONTHLY_BUDGET: z.coerce.number().nonnegative().default(100),
  ZENROWS_DAILY_BUDGET: optionalNumber,
  ZENROWS_MONTHLY_BUDGET: z.coerce.number().nonnegative().default(200),

  ENHANCE_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SYNTHESIS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FETCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(5000),

  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
  BREAKER_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  BREAKER_OPEN_MS: z.coerce.number().int().positive().default(30_000),
  BREAKER_MAX_OPEN_MS: z.coerce.number().int().positive().default(300_000),

  AUDIT_DB_PATH: optionalString,
});

export type Settings = Readonly<z.infer<typeof settingsSchema>>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Parses an environment map; throws ConfigError listing every invalid key. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`),
    );
  }
  return Object.freeze(result.data);
}
