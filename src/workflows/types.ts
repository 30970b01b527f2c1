/**
 * Workflow Types
 *
 * Core type definitions for workflow compilation and execution.
 *
 * This module exports:
 * - FieldValue: typed AST of a step field (Literal | Selector | List | Map)
 * - WorkflowDefinition: raw specification document shape
 * - WorkflowBlock: capability contract implemented by step blocks
 * - CompiledStep, CompiledPlan: immutable compiler output
 * - BatchValue, RunOutput, WorkflowRunResult: executor values
 */

import type { ZodTypeAny } from 'zod';
import type { FailurePolicy } from '../config/index.js';
import type { StepTiming } from '../utils/timer.js';

export type { FailurePolicy };

// ============================================================================
// Field value AST
// ============================================================================

export type SelectorScope = 'input' | 'step';

/**
 * Reference from a step field (or workflow output) to a workflow input or a step output
 */
export interface Selector {
  readonly type: 'selector';
  readonly scope: SelectorScope;
  /** Input name or step name */
  readonly name: string;
  /** Step output name, or '*' for every output of the step. Absent for inputs. */
  readonly output?: string;
  /** Property read from each resolved value */
  readonly property?: string;
  /** Selector exactly as written */
  readonly raw: string;
}

export interface LiteralValue {
  readonly type: 'literal';
  readonly value: unknown;
}

export interface ListValue {
  readonly type: 'list';
  readonly items: readonly FieldValue[];
}

export interface MapValue {
  readonly type: 'map';
  readonly entries: Readonly<Record<string, FieldValue>>;
}

export type FieldValue = LiteralValue | Selector | ListValue | MapValue;

// ============================================================================
// Raw specification document
// ============================================================================

export type InputType = 'WorkflowImage' | 'WorkflowParameter' | 'InferenceImage' | 'InferenceParameter';

export interface InputDefinition {
  type: InputType;
  name: string;
  /** Kinds of a parameter input; images are always of the image kind */
  kind?: string[];
  default_value?: unknown;
}

export interface StepDefinition {
  type: string;
  name: string;
  /** Every other key is a block field */
  [field: string]: unknown;
}

export interface OutputDefinitionEntry {
  type?: 'JsonField';
  name: string;
  selector: string;
}

export interface WorkflowDefinition {
  version?: string;
  inputs: InputDefinition[];
  steps: StepDefinition[];
  outputs: OutputDefinitionEntry[];
}

// ============================================================================
// Block capability contract
// ============================================================================

export interface BlockFieldDefinition {
  /** Kinds accepted when the field is fed by a selector */
  kinds: string[];
  /** Whether a step must set this field (default: false) */
  required?: boolean;
  /** Optional schema for literal values of this field */
  literal?: ZodTypeAny;
  description?: string;
}

export interface BlockManifestSchema {
  fields: Record<string, BlockFieldDefinition>;
  description?: string;
}

export interface BlockOutputDefinition {
  name: string;
  kinds: string[];
}

export type BlockResult = Record<string, unknown>;

/**
 * Per-invocation information handed to a block
 */
export interface BlockRunContext {
  stepName: string;
  /** Item index for blocks invoked per batch item; undefined for batch blocks */
  batchIndex?: number;
  batchSize: number;
  /** Aborted when the run is cancelled or fails fast */
  signal: AbortSignal;
}

/**
 * WorkflowBlock - contract every step implementation satisfies.
 *
 * A block never retries and never touches the execution context; it receives
 * resolved field values and returns its declared outputs.
 */
export interface WorkflowBlock {
  readonly manifest: BlockManifestSchema;
  declareOutputs(): BlockOutputDefinition[];
  acceptsBatchInput(): boolean;
  run(fields: Record<string, unknown>, context: BlockRunContext): Promise<BlockResult>;
}

/**
 * Parameters shared by every block instantiated for a plan (e.g. API key)
 */
export type BlockInitParameters = Readonly<Record<string, unknown>>;

export type BlockFactory = (init: BlockInitParameters) => WorkflowBlock;

// ============================================================================
// Compiled plan
// ============================================================================

export interface StepManifest {
  readonly type: string;
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldValue>>;
  readonly declaresBatchInput: boolean;
}

export interface CompiledStep {
  readonly manifest: StepManifest;
  readonly block: WorkflowBlock;
  readonly outputs: readonly BlockOutputDefinition[];
  readonly producerStepNames: ReadonlySet<string>;
  readonly levelIndex: number;
  readonly declarationIndex: number;
}

export interface CompiledInput {
  readonly name: string;
  readonly isBatch: boolean;
  readonly kinds: readonly string[];
  readonly hasDefault: boolean;
  readonly defaultValue?: unknown;
}

export interface CompiledOutput {
  readonly name: string;
  readonly selector: Selector;
}

export interface CompiledPlan {
  /** Hash of the source specification */
  readonly id: string;
  readonly inputs: readonly CompiledInput[];
  readonly levels: readonly (readonly CompiledStep[])[];
  readonly outputs: readonly CompiledOutput[];
  readonly steps: ReadonlyMap<string, CompiledStep>;
  /** Short hash of the ordered "type:name" step list, reported with usage */
  readonly resourceId: string;
}

// ============================================================================
// Execution values
// ============================================================================

/**
 * Value stored in the execution context: broadcast to every batch item, or one entry per item
 */
export type BatchValue =
  | { readonly shape: 'scalar'; readonly value: unknown }
  | { readonly shape: 'batch'; readonly items: readonly unknown[] };

export type RunOutput = Record<string, unknown>;

export interface StepFailure {
  stepName: string;
  /** Cause message; for skipped dependents, names the failed producer */
  message: string;
  /** True when the step never ran because a producer failed */
  skipped: boolean;
}

export interface WorkflowRunResult {
  runId: string;
  planId: string;
  outputs: RunOutput;
  batchSize: number;
  failedSteps: StepFailure[];
  durationMs: number;
  /** Per-step timings, ordered by start time */
  timings: StepTiming[];
}

export type RuntimeInputs = Record<string, unknown>;

// ============================================================================
// Usage reporting
// ============================================================================

export interface UsageEvent {
  category: string;
  resourceId: string;
  processedItems: number;
  /** Items per second over the whole run */
  fps: number;
  durationSeconds: number;
  /** Key the usage is billed to; falls back to the reporter's default */
  apiKey?: string;
}

/**
 * Sink for per-run usage. Must not throw back into the run.
 */
export interface UsageReporter {
  recordUsage(event: UsageEvent): void;
}
