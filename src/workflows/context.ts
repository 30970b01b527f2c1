/**
 * Execution Context
 *
 * Per-run registry of batch-shaped values keyed by input name and step output.
 * Only the executor writes to it, and a step's outputs are committed together.
 */

import { RuntimeInputError, UnresolvedValueError } from './errors.js';
import { contextKeyOf } from './selectors.js';
import type { BatchValue, CompiledInput, RuntimeInputs, Selector } from './types.js';

function readProperty(value: unknown, property: string): unknown {
  if (typeof value !== 'object' || value === null) {
    throw new TypeError(`Cannot read property '${property}' of a non-object value`);
  }
  return Object.getOwnPropertyDescriptor(value, property)?.value;
}

function mapBatchValue(value: BatchValue, fn: (item: unknown) => unknown): BatchValue {
  return value.shape === 'batch'
    ? { shape: 'batch', items: Object.freeze(value.items.map(fn)) }
    : { shape: 'scalar', value: fn(value.value) };
}

export class ExecutionContext {
  private readonly inputs = new Map<string, BatchValue>();
  private readonly stepOutputs = new Map<string, ReadonlyMap<string, BatchValue>>();

  private constructor(readonly batchSize: number) {}

  /**
   * Bind runtime inputs into a fresh context
   * @throws RuntimeInputError when an input is missing or batch lengths differ
   */
  static bind(declared: readonly CompiledInput[], runtime: RuntimeInputs): ExecutionContext {
    const bound = new Map<string, BatchValue>();
    let batchSize: number | undefined;
    let batchSource: string | undefined;

    for (const input of declared) {
      let value = runtime[input.name];
      if (value === undefined) {
        if (!input.hasDefault) {
          throw new RuntimeInputError(`Input '${input.name}' is required`);
        }
        value = input.defaultValue;
      }

      if (!input.isBatch) {
        bound.set(input.name, { shape: 'scalar', value });
        continue;
      }

      const items = Array.isArray(value) ? value : [value];
      if (items.length === 0) {
        throw new RuntimeInputError(`Input '${input.name}' must contain at least one item`);
      }
      if (batchSize !== undefined && items.length !== batchSize) {
        throw new RuntimeInputError(
          `Input '${input.name}' has ${items.length} items but '${batchSource}' has ${batchSize}`
        );
      }
      batchSize = items.length;
      batchSource = input.name;
      bound.set(input.name, { shape: 'batch', items: Object.freeze([...items]) });
    }

    const context = new ExecutionContext(batchSize ?? 1);
    for (const [name, value] of bound) {
      context.inputs.set(name, value);
    }
    return context;
  }

  /**
   * Store every output of a step at once
   */
  commitStep(stepName: string, outputs: Readonly<Record<string, BatchValue>>): void {
    if (this.stepOutputs.has(stepName)) {
      throw new Error(`Step '${stepName}' is already committed`);
    }
    this.stepOutputs.set(stepName, new Map(Object.entries(outputs)));
  }

  /**
   * Look up the value a selector points at, applying its property accessor per item
   * @throws UnresolvedValueError when the producer has not been committed
   */
  resolve(selector: Selector): BatchValue {
    const value = this.lookup(selector);
    if (selector.property === undefined) {
      return value;
    }
    const property = selector.property;
    return mapBatchValue(value, (item) => readProperty(item, property));
  }

  private lookup(selector: Selector): BatchValue {
    if (selector.scope === 'input') {
      const value = this.inputs.get(selector.name);
      if (!value) {
        throw new UnresolvedValueError(contextKeyOf(selector));
      }
      return value;
    }

    const outputs = this.stepOutputs.get(selector.name);
    if (!outputs) {
      throw new UnresolvedValueError(contextKeyOf(selector));
    }
    if (selector.output === '*') {
      return this.combineOutputs(outputs);
    }
    const value = selector.output === undefined ? undefined : outputs.get(selector.output);
    if (!value) {
      throw new UnresolvedValueError(contextKeyOf(selector));
    }
    return value;
  }

  /**
   * All outputs of a step as one record per item
   */
  private combineOutputs(outputs: ReadonlyMap<string, BatchValue>): BatchValue {
    const entries = [...outputs.entries()];
    if (entries.every(([, value]) => value.shape === 'scalar')) {
      return {
        shape: 'scalar',
        value: Object.fromEntries(entries.map(([name, value]) => [name, valueAt(value, 0)])),
      };
    }
    const items = Array.from({ length: this.batchSize }, (_, index) =>
      Object.fromEntries(entries.map(([name, value]) => [name, valueAt(value, index)]))
    );
    return { shape: 'batch', items: Object.freeze(items) };
  }
}

/**
 * Value seen by batch item `index`
 */
export function valueAt(value: BatchValue, index: number): unknown {
  return value.shape === 'batch' ? value.items[index] : value.value;
}

/**
 * Plain form of a value: the item list for batches, the value itself for broadcasts
 */
export function unwrapBatchValue(value: BatchValue): unknown {
  return value.shape === 'batch' ? [...value.items] : value.value;
}
