import { z } from 'zod';

/**
 * Boolean flag parsed from "true"/"false" strings.
 * z.coerce.boolean() would turn the string "false" into true.
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((val) => val === 'true' || val === '1');

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Workflows API (specification source)
  API_KEY: z.string().optional(),
  WORKFLOWS_API_BASE_URL: z.string().url().optional(),
  WORKFLOWS_API_TIMEOUT_MS: z.coerce.number().positive().default(10000),
  CACHE_DIR: z.string().default('/tmp/cache'),

  // Executor
  EXECUTOR_MAX_CONCURRENCY: z.coerce.number().int().positive().default(8),
  EXECUTOR_FAILURE_POLICY: z.enum(['fail-fast', 'isolate']).default('fail-fast'),
  PLAN_CACHE_SIZE: z.coerce.number().int().min(0).default(64),

  // Usage telemetry
  TELEMETRY_OPT_OUT: booleanFlag,
  TELEMETRY_API_USAGE_ENDPOINT_URL: z.string().url().optional(),
  TELEMETRY_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(10000),
  TELEMETRY_QUEUE_SIZE: z.coerce.number().int().positive().default(10),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
