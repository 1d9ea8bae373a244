import { z } from 'zod';

const envSchema = z
  .object({
    ENVIRONMENT: z.enum(['local', 'development', 'production']).default('local'),
    PORT: z.coerce.number().int().positive().default(8787),
    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_KEY: z.string().min(1),
    JWT_SECRET: z.string().min(8),
    REFRESH_TOKEN_SECRET: z.string().min(8),
    ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(15 * 60),
    REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60),
    INVITATION_TTL_DAYS: z.coerce.number().int().positive().default(7),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_FORMAT: z.enum(['console', 'json']).optional(),
  })
  .transform((values) => {
    const logFormat: 'console' | 'json' = values.LOG_FORMAT ?? (values.ENVIRONMENT === 'local' ? 'console' : 'json');
    return { ...values, LOG_FORMAT: logFormat };
  });

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n${issues.join('\n')}`);
  }
  return parsed.data;
}

export const env = loadEnv();
