import { z, ZodError } from 'zod';

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

const optionalUrl = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().url().optional()
);

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Health data API
  HEALTH_API_URL: z.string().url(),
  HEALTH_API_TOKEN: optionalString,
  HEALTH_QUERY_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  HISTORY_WINDOW_DAYS: z.coerce
    .number()
    .int()
    .min(7, { message: 'HISTORY_WINDOW_DAYS must cover at least one week' })
    .default(70),

  // Snapshot cache
  CACHE_DIR: z.string().default('./data/cache'),
  AVERAGE_MAX_AGE_DAYS: z.coerce.number().int().min(1).default(30),

  // Refresh cadence
  REFRESH_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'REFRESH_INTERVAL_MINUTES must be at least 1' })
    .max(59, { message: 'REFRESH_INTERVAL_MINUTES must be at most 59' })
    .default(15),
  REFRESH_WINDOW_START_HOUR: z.coerce.number().int().min(0).max(23).default(6),

  // Notifications
  NOTIFY_WEBHOOK_URL: optionalUrl,

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
