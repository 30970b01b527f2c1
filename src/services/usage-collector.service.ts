/**
 * Usage Collector
 *
 * Aggregates per-run usage in memory and ships it to the usage endpoint.
 *
 * Two loops run every flush interval once start() is called:
 * - collector: moves the aggregated usage into a bounded queue
 * - sender: drains the queue, merges payloads and POSTs one batch per API key
 *
 * When the queue is full, queued payloads are merged into one instead of being
 * dropped. Payloads that fail to send are queued again. stop() clears both
 * loops and flushes whatever is left.
 */

import { randomUUID } from 'crypto';
import { getConfig } from '../config/index.js';
import { toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { UsageEvent, UsageReporter } from '../workflows/types.js';

const logger = createChildLogger({ service: 'usage-collector' });

/** Timeout for a single POST to the usage endpoint */
const SEND_TIMEOUT_MS = 5000;

export interface ResourceUsage {
  /** Epoch ms of the first recorded run */
  timestampStart: number;
  /** Epoch ms of the last recorded run */
  timestampStop: number;
  execSessionId: string;
  processedFrames: number;
  fps: number;
  /** Seconds spent processing */
  sourceDuration: number;
  category: string;
  resourceId: string;
  apiKey: string;
}

/** API key -> "category:resourceId" -> usage */
export type ApiKeyUsage = Record<string, Record<string, ResourceUsage>>;

export interface UsageCollectorOptions {
  optOut?: boolean;
  endpointUrl?: string;
  /** Key used when an event carries none */
  apiKey?: string;
  flushIntervalMs?: number;
  queueSize?: number;
  /** Clock, epoch ms */
  now?: () => number;
}

/**
 * Merge two usage records of the same resource. Associative and commutative.
 * @throws Error when the records belong to different resources
 */
export function mergeUsageRecords(a: ResourceUsage, b: ResourceUsage): ResourceUsage {
  if (a.resourceId !== b.resourceId || a.category !== b.category) {
    throw new Error('Cannot merge usage for different resources');
  }
  return {
    ...a,
    timestampStart: Math.min(a.timestampStart, b.timestampStart),
    timestampStop: Math.max(a.timestampStop, b.timestampStop),
    processedFrames: a.processedFrames + b.processedFrames,
    sourceDuration: a.sourceDuration + b.sourceDuration,
    fps: Math.max(a.fps, b.fps),
  };
}

/**
 * Merge payloads keyed by API key and resource into one payload
 */
export function mergeUsagePayloads(payloads: readonly ApiKeyUsage[]): ApiKeyUsage {
  const merged: ApiKeyUsage = {};
  for (const payload of payloads) {
    for (const [apiKey, resources] of Object.entries(payload)) {
      const target = (merged[apiKey] ??= {});
      for (const [key, usage] of Object.entries(resources)) {
        const existing = target[key];
        target[key] = existing ? mergeUsageRecords(existing, usage) : { ...usage };
      }
    }
  }
  return merged;
}

function toWireRecord(usage: ResourceUsage): Record<string, unknown> {
  return {
    timestamp_start: usage.timestampStart,
    timestamp_stop: usage.timestampStop,
    exec_session_id: usage.execSessionId,
    processed_frames: usage.processedFrames,
    fps: usage.fps,
    source_duration: usage.sourceDuration,
    category: usage.category,
    resource_id: usage.resourceId,
    api_key: usage.apiKey,
  };
}

export class UsageCollector implements UsageReporter {
  private readonly enabled: boolean;
  private readonly endpointUrl?: string;
  private readonly apiKey?: string;
  private readonly flushIntervalMs: number;
  private readonly queueSize: number;
  private readonly now: () => number;
  private readonly execSessionId: string;

  private usage: ApiKeyUsage = {};
  private queue: ApiKeyUsage[] = [];
  private collectorTimer?: NodeJS.Timeout;
  private senderTimer?: NodeJS.Timeout;
  private flushing?: Promise<void>;

  constructor(options: UsageCollectorOptions = {}) {
    const config = getConfig();
    const optOut = options.optOut ?? config.telemetry.optOut;
    this.endpointUrl = options.endpointUrl ?? config.telemetry.apiUsageEndpointUrl;
    this.apiKey = options.apiKey ?? config.workflowsApi.apiKey;
    this.flushIntervalMs = options.flushIntervalMs ?? config.telemetry.flushIntervalMs;
    this.queueSize = Math.max(1, options.queueSize ?? config.telemetry.queueSize);
    this.now = options.now ?? Date.now;
    this.enabled = !optOut && this.endpointUrl !== undefined;
    this.execSessionId = `${this.now()}_${randomUUID().slice(0, 4)}`;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get isRunning(): boolean {
    return this.collectorTimer !== undefined;
  }

  get queuedPayloadCount(): number {
    return this.queue.length;
  }

  /**
   * Start the collector and sender loops
   */
  start(): void {
    if (!this.enabled || this.isRunning) {
      return;
    }
    this.collectorTimer = setInterval(() => this.collect(), this.flushIntervalMs);
    this.senderTimer = setInterval(() => {
      this.flush().catch((error) => {
        logger.warn({ error: toError(error).message }, 'Usage flush failed');
      });
    }, this.flushIntervalMs);
    this.collectorTimer.unref();
    this.senderTimer.unref();
    logger.debug({ flushIntervalMs: this.flushIntervalMs }, 'Usage collector started');
  }

  /**
   * Stop both loops and flush everything collected so far
   */
  async stop(): Promise<void> {
    clearInterval(this.collectorTimer);
    clearInterval(this.senderTimer);
    this.collectorTimer = undefined;
    this.senderTimer = undefined;
    // A flush already in flight has taken its snapshot of the queue
    if (this.flushing) {
      await this.flushing;
    }
    this.collect();
    await this.flush();
    logger.debug('Usage collector stopped');
  }

  recordUsage(event: UsageEvent): void {
    if (!this.enabled) {
      return;
    }
    const apiKey = event.apiKey ?? this.apiKey;
    if (!apiKey) {
      logger.debug({ resourceId: event.resourceId }, 'Dropping usage without API key');
      return;
    }

    const stop = this.now();
    const fresh: ResourceUsage = {
      timestampStart: stop - Math.round(event.durationSeconds * 1000),
      timestampStop: stop,
      execSessionId: this.execSessionId,
      processedFrames: event.processedItems,
      fps: Math.round(event.fps * 100) / 100,
      sourceDuration: event.durationSeconds,
      category: event.category,
      resourceId: event.resourceId,
      apiKey,
    };
    const key = `${event.category}:${event.resourceId}`;
    const resources = (this.usage[apiKey] ??= {});
    const existing = resources[key];
    resources[key] = existing ? mergeUsageRecords(existing, fresh) : fresh;
  }

  /**
   * Move aggregated usage into the queue
   */
  collect(): void {
    if (Object.keys(this.usage).length === 0) {
      return;
    }
    const payload = this.usage;
    this.usage = {};
    this.enqueue(payload);
  }

  private enqueue(payload: ApiKeyUsage): void {
    if (this.queue.length < this.queueSize) {
      this.queue.push(payload);
      return;
    }
    logger.debug({ queueSize: this.queueSize }, 'Usage queue full, merging payloads');
    this.queue = [mergeUsagePayloads([...this.queue, payload])];
  }

  /**
   * Drain the queue and send it. Concurrent calls share one flush.
   */
  flush(): Promise<void> {
    if (!this.flushing) {
      this.flushing = this.sendQueued().finally(() => {
        this.flushing = undefined;
      });
    }
    return this.flushing;
  }

  private async sendQueued(): Promise<void> {
    if (this.queue.length === 0 || !this.endpointUrl) {
      return;
    }
    const endpointUrl = this.endpointUrl;
    const merged = mergeUsagePayloads(this.queue);
    this.queue = [];

    const unsent: ApiKeyUsage = {};
    for (const [apiKey, resources] of Object.entries(merged)) {
      const sent = await this.send(endpointUrl, apiKey, Object.values(resources));
      if (!sent) {
        unsent[apiKey] = resources;
      }
    }

    if (Object.keys(unsent).length > 0) {
      logger.debug({ apiKeys: Object.keys(unsent).length }, 'Re-queueing unsent usage');
      this.enqueue(unsent);
    }
  }

  private async send(endpointUrl: string, apiKey: string, records: ResourceUsage[]): Promise<boolean> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), SEND_TIMEOUT_MS);
    try {
      const response = await fetch(endpointUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(records.map(toWireRecord)),
        signal: controller.signal,
      });
      if (!response.ok) {
        logger.debug({ status: response.status }, 'Failed to send usage');
        return false;
      }
      return true;
    } catch (error) {
      logger.debug({ error: toError(error).message }, 'Failed to send usage');
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
