/**
 * Run Timer Utility
 * Tracks execution time for workflow runs and the steps inside them.
 *
 * Steps of one level run concurrently, so timings are keyed by step name
 * rather than tracked as a single "current step".
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'timer' });

/** Default threshold in ms for logging slow steps */
const DEFAULT_SLOW_THRESHOLD_MS = 1000;

export interface StepTiming {
  step: string;
  startedAt: number;
  endedAt: number;
  durationMs: number;
  durationFormatted: string;
  succeeded: boolean;
}

export interface RunSummary {
  runId: string;
  totalDurationMs: number;
  totalDurationFormatted: string;
  steps: StepTiming[];
}

export interface TimerOptions {
  /** Threshold in ms above which a step is logged at info level (default: 1000) */
  slowThresholdMs?: number;
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Run Timer - tracks timing for every step of one run
 */
export class RunTimer {
  private readonly runStart: number;
  private readonly steps = new Map<string, StepTiming>();
  private readonly slowThresholdMs: number;

  constructor(
    private readonly runId: string,
    options: TimerOptions = {}
  ) {
    this.runStart = Date.now();
    this.slowThresholdMs = options.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;
  }

  /**
   * Time a step's execution; the timing is recorded whether it resolves or rejects
   */
  async timeStep<T>(step: string, operation: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    let succeeded = false;
    try {
      const result = await operation();
      succeeded = true;
      return result;
    } finally {
      this.record(step, startedAt, Date.now(), succeeded);
    }
  }

  private record(step: string, startedAt: number, endedAt: number, succeeded: boolean): void {
    const durationMs = endedAt - startedAt;
    const timing: StepTiming = {
      step,
      startedAt,
      endedAt,
      durationMs,
      durationFormatted: formatDuration(durationMs),
      succeeded,
    };
    this.steps.set(step, timing);

    const context = { runId: this.runId, step, durationMs, succeeded };
    if (durationMs > this.slowThresholdMs) {
      logger.info(context, `Slow step ${step}: ${timing.durationFormatted}`);
    } else {
      logger.debug(context, `Step ${step}: ${timing.durationFormatted}`);
    }
  }

  /**
   * Elapsed time since the run started
   */
  elapsedMs(): number {
    return Date.now() - this.runStart;
  }

  /**
   * Get timing for a single step
   */
  getStep(step: string): StepTiming | undefined {
    return this.steps.get(step);
  }

  /**
   * Get summary of all timings, steps ordered by start time
   */
  getSummary(): RunSummary {
    const totalDurationMs = this.elapsedMs();
    const steps = [...this.steps.values()].sort((a, b) => a.startedAt - b.startedAt);

    return {
      runId: this.runId,
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      steps,
    };
  }
}
