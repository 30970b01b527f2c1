/**
 * Workflow Engine Service
 *
 * Ties together the specification source, the compiler (with its plan cache),
 * the executor and usage reporting.
 */

import { UsageCollector } from './usage-collector.service.js';
import { WorkflowSpecService } from './workflow-spec.service.js';
import { WorkflowExecutor, type ExecutorOptions, type RunOptions } from '../workflows/executor.js';
import { WorkflowCompiler, type CompilerOptions } from '../workflows/planner.js';
import type { CompiledPlan, RuntimeInputs, WorkflowRunResult } from '../workflows/types.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'workflow-engine' });

export interface WorkflowEngineOptions {
  compiler?: CompilerOptions;
  executor?: Omit<ExecutorOptions, 'usageReporter'>;
  specService?: WorkflowSpecService;
  usageCollector?: UsageCollector;
}

export class WorkflowEngine {
  readonly compiler: WorkflowCompiler;
  readonly executor: WorkflowExecutor;
  readonly specService: WorkflowSpecService;
  readonly usageCollector: UsageCollector;

  constructor(options: WorkflowEngineOptions = {}) {
    this.compiler = new WorkflowCompiler(options.compiler);
    this.usageCollector = options.usageCollector ?? new UsageCollector();
    this.executor = new WorkflowExecutor({ ...options.executor, usageReporter: this.usageCollector });
    this.specService = options.specService ?? new WorkflowSpecService();
  }

  /**
   * Start background usage reporting
   */
  start(): void {
    this.usageCollector.start();
  }

  /**
   * Stop usage reporting and flush pending usage
   */
  async stop(): Promise<void> {
    await this.usageCollector.stop();
  }

  compile(specification: unknown): CompiledPlan {
    return this.compiler.compileCached(specification);
  }

  /**
   * Compile (or reuse a cached plan for) a specification and run it
   */
  async run(specification: unknown, inputs: RuntimeInputs, options: RunOptions = {}): Promise<WorkflowRunResult> {
    return this.executor.run(this.compile(specification), inputs, options);
  }

  /**
   * Fetch a stored workflow and run it. Usage is reported under the workflow id.
   */
  async runStored(
    workspaceId: string,
    workflowId: string,
    inputs: RuntimeInputs,
    options: RunOptions = {}
  ): Promise<WorkflowRunResult> {
    const specification = await this.specService.getWorkflowSpecification(workspaceId, workflowId, options.apiKey);
    logger.debug({ workspaceId, workflowId }, 'Running stored workflow');
    return this.run(specification, inputs, { resourceId: workflowId, ...options });
  }
}
