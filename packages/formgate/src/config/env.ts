import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  FORMGATE_PROFILE_PATH: z.string().min(1).default('user_data.json'),
  FORMGATE_CDP_URL: z.string().url().default('http://127.0.0.1:9222'),
  FORMGATE_FORM_URL_PATTERN: z.string().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  FORMGATE_AI_MODEL: z.string().min(1).default('claude-3-5-haiku-20241022'),
  FORMGATE_AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
