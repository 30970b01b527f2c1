/**
 * Step Executor
 *
 * Runs a CompiledPlan level by level. A level is a barrier: level k+1 starts
 * only after every step of level k has settled. Steps of a level, and the
 * per-item invocations of a non-batch step, run concurrently behind one shared
 * ConcurrencyLimiter.
 *
 * Failure policies:
 * - fail-fast: the first failing step aborts the run signal; the run rejects
 *   with StepExecutionError at once, without waiting for the rest of the level,
 *   and produces no outputs
 * - isolate: the failing step and every transitive dependent are reported in
 *   failedSteps; independent branches complete and contribute outputs
 */

import { randomUUID } from 'crypto';
import { getConcurrency } from './concurrency.js';
import { ExecutionContext, unwrapBatchValue, valueAt } from './context.js';
import { RunCancelledError, StepExecutionError } from './errors.js';
import type {
  BatchValue,
  BlockResult,
  CompiledPlan,
  CompiledStep,
  FailurePolicy,
  FieldValue,
  RunOutput,
  RuntimeInputs,
  StepFailure,
  UsageReporter,
  WorkflowRunResult,
} from './types.js';
import { getConfig } from '../config/index.js';
import { toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { ConcurrencyLimiter, isParallelError, parallelMap } from '../utils/parallel.js';
import { RunTimer } from '../utils/timer.js';

const logger = createChildLogger({ service: 'workflow-executor' });

export interface ExecutorOptions {
  /** Concurrent block invocations per run (default: EXECUTOR_MAX_CONCURRENCY) */
  maxConcurrency?: number;
  /** Default: EXECUTOR_FAILURE_POLICY */
  failurePolicy?: FailurePolicy;
  usageReporter?: UsageReporter;
  /** Steps slower than this are logged at info level */
  slowStepThresholdMs?: number;
}

export interface RunOptions {
  runId?: string;
  failurePolicy?: FailurePolicy;
  maxConcurrency?: number;
  /** Cancels the run; in-flight blocks observe it through their run context */
  signal?: AbortSignal;
  /** Key usage is billed to */
  apiKey?: string;
  /** Overrides the plan's resource id in usage reports (e.g. a stored workflow id) */
  resourceId?: string;
}

type StepOutcome =
  | { step: CompiledStep; status: 'succeeded'; outputs: Record<string, BatchValue> }
  | { step: CompiledStep; status: 'failed'; error: Error }
  | { step: CompiledStep; status: 'skipped'; failedProducer: string };

interface RunState {
  context: ExecutionContext;
  limiter: ConcurrencyLimiter;
  timer: RunTimer;
  controller: AbortController;
  policy: FailurePolicy;
  /** First failure observed under fail-fast */
  firstFailure?: StepExecutionError;
}

function resolveField(value: FieldValue, context: ExecutionContext, index: number | undefined): unknown {
  switch (value.type) {
    case 'literal':
      return value.value;
    case 'list':
      return value.items.map((item) => resolveField(item, context, index));
    case 'map':
      return Object.fromEntries(
        Object.entries(value.entries).map(([key, entry]) => [key, resolveField(entry, context, index)])
      );
    case 'selector': {
      const resolved = context.resolve(value);
      return index === undefined ? unwrapBatchValue(resolved) : valueAt(resolved, index);
    }
  }
}

/**
 * Resolve every field of a step. `index` selects one batch item; without it
 * batch values are passed as arrays.
 */
export function resolveStepFields(
  step: CompiledStep,
  context: ExecutionContext,
  index?: number
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(step.manifest.fields).map(([field, value]) => [field, resolveField(value, context, index)])
  );
}

/**
 * Settle with `pending`, or reject with the abort reason as soon as `signal` aborts
 */
async function settleUnlessAborted<T>(pending: Promise<T>, signal: AbortSignal): Promise<T> {
  let rejectAborted: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    rejectAborted = reject;
  });
  const onAbort = (): void => rejectAborted(signal.reason);
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }
  try {
    return await Promise.race([pending, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

function requireOutput(result: BlockResult, output: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(result, output)) {
    throw new Error(`Block did not return declared output '${output}'`);
  }
  return result[output];
}

/**
 * WorkflowExecutor - runs compiled plans against runtime inputs
 */
export class WorkflowExecutor {
  private readonly maxConcurrency: number;
  private readonly failurePolicy: FailurePolicy;
  private readonly usageReporter?: UsageReporter;
  private readonly slowStepThresholdMs?: number;

  constructor(options: ExecutorOptions = {}) {
    this.maxConcurrency = getConcurrency(options.maxConcurrency);
    this.failurePolicy = options.failurePolicy ?? getConfig().executor.failurePolicy;
    this.usageReporter = options.usageReporter;
    this.slowStepThresholdMs = options.slowStepThresholdMs;
  }

  /**
   * Execute a plan
   * @throws RuntimeInputError, StepExecutionError (fail-fast), RunCancelledError
   */
  async run(plan: CompiledPlan, inputs: RuntimeInputs, options: RunOptions = {}): Promise<WorkflowRunResult> {
    const runId = options.runId ?? randomUUID();
    const { signal } = options;
    if (signal?.aborted) {
      throw new RunCancelledError();
    }

    const context = ExecutionContext.bind(plan.inputs, inputs);
    const state: RunState = {
      context,
      limiter: new ConcurrencyLimiter(getConcurrency(options.maxConcurrency ?? this.maxConcurrency)),
      timer: new RunTimer(runId, { slowThresholdMs: this.slowStepThresholdMs }),
      controller: new AbortController(),
      policy: options.failurePolicy ?? this.failurePolicy,
    };
    const forwardAbort = (): void => state.controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    logger.info(
      { runId, planId: plan.id, batchSize: context.batchSize, levels: plan.levels.length, policy: state.policy },
      'Workflow run started'
    );

    const failures = new Map<string, StepFailure>();
    try {
      for (const level of plan.levels) {
        if (signal?.aborted) {
          throw new RunCancelledError();
        }

        let outcomes: StepOutcome[];
        try {
          outcomes = await settleUnlessAborted(
            Promise.all(level.map((step) => this.executeStep(step, state, failures))),
            state.controller.signal
          );
        } catch (reason) {
          // Steps still in flight keep running; their results are dropped
          if (signal?.aborted) {
            throw new RunCancelledError();
          }
          throw state.firstFailure ?? toError(reason);
        }

        if (signal?.aborted) {
          throw new RunCancelledError();
        }
        if (state.firstFailure) {
          throw state.firstFailure;
        }

        // Commit in declaration order once the whole level has settled
        for (const outcome of outcomes) {
          const name = outcome.step.manifest.name;
          if (outcome.status === 'succeeded') {
            context.commitStep(name, outcome.outputs);
          } else if (outcome.status === 'failed') {
            failures.set(name, { stepName: name, message: outcome.error.message, skipped: false });
          } else {
            failures.set(name, {
              stepName: name,
              message: `Skipped because step '${outcome.failedProducer}' failed`,
              skipped: true,
            });
          }
        }
      }

      const outputs = this.collectOutputs(plan, context, failures);
      const summary = state.timer.getSummary();
      const failedSteps = [...failures.values()];

      logger.info(
        { runId, planId: plan.id, durationMs: summary.totalDurationMs, failedSteps: failedSteps.length },
        `Workflow run completed in ${summary.totalDurationFormatted}`
      );

      return {
        runId,
        planId: plan.id,
        outputs,
        batchSize: context.batchSize,
        failedSteps,
        durationMs: summary.totalDurationMs,
        timings: summary.steps,
      };
    } catch (error) {
      if (error instanceof StepExecutionError) {
        logger.warn({ runId, planId: plan.id, step: error.stepName }, error.message);
      } else if (error instanceof RunCancelledError) {
        logger.warn({ runId, planId: plan.id }, 'Workflow run cancelled');
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      state.controller.abort();
      this.reportUsage(plan, context.batchSize, state.timer.elapsedMs(), options);
    }
  }

  private async executeStep(
    step: CompiledStep,
    state: RunState,
    failures: ReadonlyMap<string, StepFailure>
  ): Promise<StepOutcome> {
    const name = step.manifest.name;
    const failedProducer = [...step.producerStepNames].find((producer) => failures.has(producer));
    if (failedProducer !== undefined) {
      return { step, status: 'skipped', failedProducer };
    }

    try {
      const outputs = await state.timer.timeStep(name, () => this.invokeStep(step, state));
      return { step, status: 'succeeded', outputs };
    } catch (error) {
      const cause = toError(error);
      if (state.policy === 'fail-fast' && !state.firstFailure) {
        state.firstFailure = new StepExecutionError(name, cause);
        state.controller.abort(state.firstFailure);
      }
      return { step, status: 'failed', error: cause };
    }
  }

  private async invokeStep(step: CompiledStep, state: RunState): Promise<Record<string, BatchValue>> {
    const { context, limiter, controller } = state;
    const name = step.manifest.name;
    const batchSize = context.batchSize;

    const invoke = (fields: Record<string, unknown>, batchIndex?: number): Promise<BlockResult> =>
      limiter.run(async () => {
        controller.signal.throwIfAborted();
        return step.block.run(fields, { stepName: name, batchIndex, batchSize, signal: controller.signal });
      });

    if (step.manifest.declaresBatchInput) {
      const result = await invoke(resolveStepFields(step, context));
      const outputs: Record<string, BatchValue> = {};
      for (const output of step.outputs) {
        const items = requireOutput(result, output.name);
        if (!Array.isArray(items) || items.length !== batchSize) {
          throw new Error(`Batch output '${output.name}' must be a list of ${batchSize} items`);
        }
        outputs[output.name] = { shape: 'batch', items: Object.freeze([...items]) };
      }
      return outputs;
    }

    const indexes = Array.from({ length: batchSize }, (_, i) => i);
    const { results } = await parallelMap(
      indexes,
      (index) => invoke(resolveStepFields(step, context, index), index),
      { concurrency: batchSize, stopOnError: true }
    );
    const failure = results.find(isParallelError);
    if (failure) {
      throw failure;
    }

    const outputs: Record<string, BatchValue> = {};
    for (const output of step.outputs) {
      const items = results.map((result) => (isParallelError(result) ? undefined : requireOutput(result, output.name)));
      outputs[output.name] = { shape: 'batch', items: Object.freeze(items) };
    }
    return outputs;
  }

  /**
   * Declared outputs; under isolate, outputs reading a failed or skipped step are left out
   */
  private collectOutputs(
    plan: CompiledPlan,
    context: ExecutionContext,
    failures: ReadonlyMap<string, StepFailure>
  ): RunOutput {
    const outputs: RunOutput = {};
    for (const output of plan.outputs) {
      const { selector } = output;
      if (selector.scope === 'step' && failures.has(selector.name)) {
        continue;
      }
      outputs[output.name] = unwrapBatchValue(context.resolve(selector));
    }
    return outputs;
  }

  private reportUsage(plan: CompiledPlan, processedItems: number, durationMs: number, options: RunOptions): void {
    if (!this.usageReporter) {
      return;
    }
    const durationSeconds = durationMs / 1000;
    try {
      this.usageReporter.recordUsage({
        category: 'workflows',
        resourceId: options.resourceId ?? plan.resourceId,
        processedItems,
        fps: durationSeconds > 0 ? processedItems / durationSeconds : 0,
        durationSeconds,
        apiKey: options.apiKey,
      });
    } catch (error) {
      logger.warn({ planId: plan.id, error: toError(error).message }, 'Failed to record usage');
    }
  }
}
