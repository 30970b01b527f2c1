/**
 * Workflows Module
 *
 * Compiles workflow specifications into immutable plans and executes them.
 *
 * Usage:
 *
 * 1. Register blocks (once at startup):
 *    ```ts
 *    import { blockRegistry } from './workflows/index.js';
 *    blockRegistry.register('ObjectDetectionModel', (init) => new DetectionBlock(init));
 *    blockRegistry.freeze();
 *    ```
 *
 * 2. Compile and run:
 *    ```ts
 *    const plan = new WorkflowCompiler().compile(specification);
 *    const result = await new WorkflowExecutor().run(plan, { image: [first, second] });
 *    ```
 */

export * from './types.js';
export * from './errors.js';

export * from './kinds.js';

export { parseSelector, parseFieldValue, collectSelectors, hasSelectorPrefix } from './selectors.js';

export { BlockRegistry, blockRegistry, type RegisterOptions } from './registry.js';

export { validateWorkflowDefinition, workflowDefinitionSchema } from './validator.js';

export { buildDependencyGraph, type DependencyGraph, type DependencyEdge } from './graph.js';

export {
  WorkflowCompiler,
  computeLevels,
  computePlanId,
  computeResourceId,
  type CompilerOptions,
} from './planner.js';

export { ExecutionContext } from './context.js';

export { WorkflowExecutor, type ExecutorOptions, type RunOptions } from './executor.js';

export { getConcurrency, MAX_CONCURRENCY } from './concurrency.js';
