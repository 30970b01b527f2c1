import { describe, it, expect } from 'vitest';
import { envSchema } from './env.js';
import { buildConfig } from './index.js';

describe('envSchema', () => {
  describe('defaults', () => {
    it('should parse an empty environment', () => {
      const result = envSchema.safeParse({});

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.NODE_ENV).toBe('development');
        expect(result.data.LOG_LEVEL).toBe('info');
        expect(result.data.CACHE_DIR).toBe('/tmp/cache');
        expect(result.data.EXECUTOR_MAX_CONCURRENCY).toBe(8);
        expect(result.data.EXECUTOR_FAILURE_POLICY).toBe('fail-fast');
        expect(result.data.PLAN_CACHE_SIZE).toBe(64);
        expect(result.data.TELEMETRY_OPT_OUT).toBe(false);
        expect(result.data.TELEMETRY_FLUSH_INTERVAL_MS).toBe(10000);
        expect(result.data.TELEMETRY_QUEUE_SIZE).toBe(10);
      }
    });
  });

  describe('EXECUTOR configuration', () => {
    it('should coerce EXECUTOR_MAX_CONCURRENCY to number', () => {
      const result = envSchema.safeParse({ EXECUTOR_MAX_CONCURRENCY: '3' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.EXECUTOR_MAX_CONCURRENCY).toBe(3);
      }
    });

    it('should reject zero concurrency', () => {
      const result = envSchema.safeParse({ EXECUTOR_MAX_CONCURRENCY: '0' });
      expect(result.success).toBe(false);
    });

    it('should accept isolate failure policy', () => {
      const result = envSchema.safeParse({ EXECUTOR_FAILURE_POLICY: 'isolate' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.EXECUTOR_FAILURE_POLICY).toBe('isolate');
      }
    });

    it('should reject unknown failure policy', () => {
      const result = envSchema.safeParse({ EXECUTOR_FAILURE_POLICY: 'retry' });
      expect(result.success).toBe(false);
    });
  });

  describe('TELEMETRY configuration', () => {
    it('should parse "false" as false', () => {
      const result = envSchema.safeParse({ TELEMETRY_OPT_OUT: 'false' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.TELEMETRY_OPT_OUT).toBe(false);
      }
    });

    it('should parse "true" and "1" as true', () => {
      for (const value of ['true', '1']) {
        const result = envSchema.safeParse({ TELEMETRY_OPT_OUT: value });
        expect(result.success).toBe(true);
        if (result.success) {
          expect(result.data.TELEMETRY_OPT_OUT).toBe(true);
        }
      }
    });

    it('should reject invalid endpoint URL', () => {
      const result = envSchema.safeParse({ TELEMETRY_API_USAGE_ENDPOINT_URL: 'not a url' });
      expect(result.success).toBe(false);
    });
  });
});

describe('buildConfig', () => {
  it('should map environment to config sections', () => {
    const env = envSchema.parse({
      API_KEY: 'test-key',
      WORKFLOWS_API_BASE_URL: 'http://localhost:9001',
      EXECUTOR_FAILURE_POLICY: 'isolate',
    });

    const config = buildConfig(env);

    expect(config.workflowsApi).toEqual({
      apiKey: 'test-key',
      baseUrl: 'http://localhost:9001',
      timeoutMs: 10000,
      cacheDir: '/tmp/cache',
    });
    expect(config.executor.failurePolicy).toBe('isolate');
    expect(config.telemetry.apiUsageEndpointUrl).toBeUndefined();
  });
});
