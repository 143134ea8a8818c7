import { z } from 'zod';

const baseSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(10000),
  API_PREFIX: z.string().optional(),

  SUPABASE_URL: z.string({ required_error: 'SUPABASE_URL is required' }).url({ message: 'SUPABASE_URL must be a valid URL' }),
  SUPABASE_KEY: z.string({ required_error: 'SUPABASE_KEY is required' }).min(1, 'SUPABASE_KEY is required'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().optional(),
  CHAT_SYSTEM_PROMPT: z.string().optional(),
  MAPBOX_TOKEN: z.string().optional(),

  ZAPIER_WEBHOOK: z.string().url({ message: 'ZAPIER_WEBHOOK must be a valid URL' }).optional(),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  WEBHOOK_SIGNING_SECRET: z.string().optional(),

  STRIPE_SECRET: z.string().optional(),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),

  API_KEY: z.string().min(16, 'API_KEY must be at least 16 characters').optional(),
  ALLOWED_ORIGINS: z.string().optional(),
  RATE_LIMIT_TTL: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.string().optional(),

  SWAGGER_ENABLED: z.enum(['true', 'false']).optional(),
  SENTRY_DSN: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),
});

export type EnvShape = z.infer<typeof baseSchema>;

export function validateEnv(config: Record<string, unknown>): EnvShape {
  // blank values from .env files count as unset
  const cleaned = Object.fromEntries(Object.entries(config).filter(([, value]) => value !== ''));
  const parsed = baseSchema
    .superRefine((env, ctx) => {
      if (env.NODE_ENV === 'production' && !env.API_KEY) {
        ctx.addIssue({ code: 'custom', path: ['API_KEY'], message: 'API_KEY is required in production' });
      }
    })
    .safeParse(cleaned);

  if (!parsed.success) {
    const formatted = parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${formatted}`);
  }

  return parsed.data;
}
