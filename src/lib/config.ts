import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const logLevelSchema = z.enum(LOG_LEVELS).default('info');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: logLevelSchema,

  // Supabase (required only when the Supabase store is used)
  SUPABASE_URL: z.string().url('SUPABASE_URL must be a valid URL').optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'SUPABASE_SERVICE_ROLE_KEY cannot be empty').optional(),

  // Share of job net that goes to the technician pool
  PAY_TECH_POOL_SHARE: z.coerce
    .number()
    .min(0, 'PAY_TECH_POOL_SHARE must be between 0 and 1')
    .max(1, 'PAY_TECH_POOL_SHARE must be between 0 and 1')
    .default(0.5),
});

export type Env = z.infer<typeof envSchema>;

export interface WorkTrackingConfig {
  environment: Env['NODE_ENV'];
  logLevel: LogLevel;
  supabase: { url: string; serviceRoleKey: string } | null;
  techPoolShare: number;
}

/**
 * Parse and validate environment variables.
 * Throws a single error listing every invalid variable.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): WorkTrackingConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Environment validation failed:\n${issues.join('\n')}`);
  }

  const env = parsed.data;
  if (Boolean(env.SUPABASE_URL) !== Boolean(env.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error(
      'Environment validation failed:\nSUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together'
    );
  }

  return {
    environment: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    supabase:
      env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
        ? { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    techPoolShare: env.PAY_TECH_POOL_SHARE,
  };
}

/**
 * Lenient log level lookup for code that runs before config is loaded.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : 'info';
}
