import { getEnv, parseEnv, type Env } from './env.js';

export { getEnv, parseEnv, type Env };

export type FailurePolicy = 'fail-fast' | 'isolate';

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    env: 'development' | 'production' | 'test';
  };
  logging: {
    level: string;
  };
  workflowsApi: {
    apiKey?: string;
    baseUrl?: string;
    timeoutMs: number;
    cacheDir: string;
  };
  executor: {
    maxConcurrency: number;
    failurePolicy: FailurePolicy;
    planCacheSize: number;
  };
  telemetry: {
    optOut: boolean;
    apiUsageEndpointUrl?: string;
    flushIntervalMs: number;
    queueSize: number;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      env: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    workflowsApi: {
      apiKey: env.API_KEY,
      baseUrl: env.WORKFLOWS_API_BASE_URL,
      timeoutMs: env.WORKFLOWS_API_TIMEOUT_MS,
      cacheDir: env.CACHE_DIR,
    },
    executor: {
      maxConcurrency: env.EXECUTOR_MAX_CONCURRENCY,
      failurePolicy: env.EXECUTOR_FAILURE_POLICY,
      planCacheSize: env.PLAN_CACHE_SIZE,
    },
    telemetry: {
      optOut: env.TELEMETRY_OPT_OUT,
      apiUsageEndpointUrl: env.TELEMETRY_API_USAGE_ENDPOINT_URL,
      flushIntervalMs: env.TELEMETRY_FLUSH_INTERVAL_MS,
      queueSize: env.TELEMETRY_QUEUE_SIZE,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
