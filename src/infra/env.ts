import { z, ZodError } from 'zod';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Counter configuration and persisted state
  COUNTER_CONFIG_PATH: z.string().min(1).default('./config/counter.json5'),
  SQLITE_DB_PATH: z.string().min(1).default('./data/burnin.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Periodic scan, 0 disables the scheduler
  SCAN_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(0, { message: 'SCAN_INTERVAL_MINUTES must not be negative' })
    .default(60),

  // Directory enumeration on network shares
  SCAN_DIRECTORY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1, { message: 'SCAN_DIRECTORY_TIMEOUT_MS must be at least 1' })
    .default(30000),
  SCAN_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'SCAN_CONCURRENCY must be at least 1' })
    .default(1),

  // Optimistic concurrency
  STALE_VERSION_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1, { message: 'STALE_VERSION_MAX_ATTEMPTS must be at least 1' })
    .default(5),

  // Approval notifications
  NOTIFICATION_WEBHOOK_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables without touching the process
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
