/**
 * Workflow Errors
 *
 * Compile-time errors (selector, reference, kind, cycle, definition) are raised
 * before any block runs. Run-time errors identify the failing step and never
 * carry values from the execution context.
 */

import { AppError, BadRequestError, InternalError, ValidationError } from '../utils/errors.js';

/**
 * Structural problem with a workflow definition
 */
export class WorkflowDefinitionError extends ValidationError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message, issues, 'WORKFLOW_DEFINITION_ERROR');
    this.issues = issues;
  }
}

/**
 * A string uses a reserved selector prefix but is not a valid selector
 */
export class MalformedSelectorError extends ValidationError {
  public readonly field: string;
  public readonly selector: string;

  constructor(field: string, selector: string, reason: string) {
    super(`Field '${field}' holds malformed selector '${selector}': ${reason}`, { field, selector }, 'MALFORMED_SELECTOR');
    this.field = field;
    this.selector = selector;
  }
}

/**
 * A selector points at an input, step or output that is not declared
 */
export class UnknownReferenceError extends ValidationError {
  public readonly selector: string;
  public readonly referencedBy: string;

  constructor(selector: string, referencedBy: string, reason: string) {
    super(`Selector '${selector}' used by '${referencedBy}' cannot be resolved: ${reason}`, { selector, referencedBy }, 'UNKNOWN_REFERENCE');
    this.selector = selector;
    this.referencedBy = referencedBy;
  }
}

export interface SocketKinds {
  /** Socket identifier, e.g. "$steps.detector.predictions" or "crop.predictions" */
  socket: string;
  kinds: readonly string[];
}

/**
 * Producer and consumer kind sets do not intersect
 */
export class KindMismatchError extends ValidationError {
  public readonly producer: SocketKinds;
  public readonly consumer: SocketKinds;

  constructor(producer: SocketKinds, consumer: SocketKinds) {
    super(
      `Kind mismatch: '${producer.socket}' produces [${producer.kinds.join(', ')}] ` +
        `but '${consumer.socket}' accepts [${consumer.kinds.join(', ')}]`,
      { producer, consumer },
      'KIND_MISMATCH'
    );
    this.producer = producer;
    this.consumer = consumer;
  }
}

/**
 * Step dependencies form a cycle
 */
export class CyclicWorkflowError extends ValidationError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Workflow contains a cycle: ${[...cycle, cycle[0]].join(' -> ')}`, { cycle }, 'CYCLIC_WORKFLOW');
    this.cycle = cycle;
  }
}

/**
 * A step references a block type that is not registered
 */
export class UnknownBlockTypeError extends ValidationError {
  public readonly blockType: string;

  constructor(blockType: string) {
    super(`Block type '${blockType}' is not registered`, { blockType }, 'UNKNOWN_BLOCK_TYPE');
    this.blockType = blockType;
  }
}

/**
 * Runtime inputs do not match the workflow's declared inputs
 */
export class RuntimeInputError extends BadRequestError {
  constructor(message: string) {
    super(message, 'RUNTIME_INPUT_ERROR');
  }
}

/**
 * A block failed while executing a step
 */
export class StepExecutionError extends AppError {
  public readonly stepName: string;
  public readonly cause: Error;

  constructor(stepName: string, cause: Error) {
    super(`Step '${stepName}' failed: ${cause.message}`, 500, 'STEP_EXECUTION_ERROR');
    this.stepName = stepName;
    this.cause = cause;
  }
}

/**
 * The executor looked up a value the plan guaranteed to exist. Indicates a defect.
 */
export class UnresolvedValueError extends InternalError {
  public readonly selector: string;

  constructor(selector: string) {
    super(`Value for '${selector}' is not available in the execution context`, 'UNRESOLVED_VALUE');
    this.selector = selector;
  }
}

/**
 * The run was cancelled through its abort signal
 */
export class RunCancelledError extends AppError {
  constructor(message = 'Workflow run cancelled') {
    super(message, 499, 'RUN_CANCELLED');
  }
}
