/**
 * Dependency Graph Builder
 *
 * Resolves every selector in step fields and workflow outputs to its producer
 * and builds producer -> consumer edges between steps. Rejects dangling
 * references and cycles.
 */

import { CyclicWorkflowError, UnknownReferenceError } from './errors.js';
import { collectSelectors, parseSelector } from './selectors.js';
import type {
  BlockOutputDefinition,
  CompiledOutput,
  FieldValue,
  InputDefinition,
  OutputDefinitionEntry,
  Selector,
} from './types.js';

export interface GraphStepNode {
  name: string;
  declarationIndex: number;
  fields: Readonly<Record<string, FieldValue>>;
  outputs: readonly BlockOutputDefinition[];
}

/**
 * One selector occurrence inside a step field
 */
export interface DependencyEdge {
  selector: Selector;
  /** Consuming step */
  consumer: string;
  /** Top-level field of the consuming step */
  field: string;
}

export interface DependencyGraph<T extends GraphStepNode = GraphStepNode> {
  /** Steps in declaration order */
  steps: T[];
  edges: DependencyEdge[];
  /** Step name -> names of steps it reads from */
  producers: Map<string, Set<string>>;
  /** Step name -> names of steps reading from it */
  consumers: Map<string, Set<string>>;
  outputs: CompiledOutput[];
}

export interface GraphBuildInput<T extends GraphStepNode> {
  inputs: readonly InputDefinition[];
  steps: readonly T[];
  outputs: readonly OutputDefinitionEntry[];
}

function checkReference(
  selector: Selector,
  referencedBy: string,
  inputNames: ReadonlySet<string>,
  stepsByName: ReadonlyMap<string, GraphStepNode>
): void {
  if (selector.scope === 'input') {
    if (!inputNames.has(selector.name)) {
      throw new UnknownReferenceError(selector.raw, referencedBy, `input '${selector.name}' is not declared`);
    }
    return;
  }

  const producer = stepsByName.get(selector.name);
  if (!producer) {
    throw new UnknownReferenceError(selector.raw, referencedBy, `step '${selector.name}' is not declared`);
  }
  if (selector.output !== '*' && !producer.outputs.some((o) => o.name === selector.output)) {
    throw new UnknownReferenceError(
      selector.raw,
      referencedBy,
      `step '${selector.name}' has no output '${selector.output}'`
    );
  }
}

/**
 * Rotate a cycle so it starts at its lexicographically smallest step,
 * making the report independent of where traversal entered the cycle
 */
export function normalizeCycle(cycle: string[]): string[] {
  if (cycle.length === 0) return cycle;
  let start = 0;
  for (let i = 1; i < cycle.length; i++) {
    if (cycle[i] < cycle[start]) start = i;
  }
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

/**
 * Depth-first search tracking the recursion stack; a back edge is a cycle
 * @throws CyclicWorkflowError
 */
export function detectCycle(steps: readonly GraphStepNode[], consumers: ReadonlyMap<string, ReadonlySet<string>>): void {
  const order = new Map(steps.map((s) => [s.name, s.declarationIndex]));
  const visited = new Set<string>();
  const onStack = new Set<string>();
  const stack: string[] = [];

  const sortedConsumers = (name: string): string[] =>
    [...(consumers.get(name) ?? [])].sort((a, b) => (order.get(a) ?? 0) - (order.get(b) ?? 0));

  const visit = (name: string): void => {
    visited.add(name);
    onStack.add(name);
    stack.push(name);

    for (const next of sortedConsumers(name)) {
      if (onStack.has(next)) {
        const cycle = stack.slice(stack.indexOf(next));
        throw new CyclicWorkflowError(normalizeCycle(cycle));
      }
      if (!visited.has(next)) {
        visit(next);
      }
    }

    stack.pop();
    onStack.delete(name);
  };

  for (const step of steps) {
    if (!visited.has(step.name)) {
      visit(step.name);
    }
  }
}

/**
 * Build the dependency graph
 * @throws UnknownReferenceError, MalformedSelectorError, CyclicWorkflowError
 */
export function buildDependencyGraph<T extends GraphStepNode>(input: GraphBuildInput<T>): DependencyGraph<T> {
  const inputNames = new Set(input.inputs.map((i) => i.name));
  const stepsByName = new Map(input.steps.map((s) => [s.name, s]));
  const steps = [...input.steps].sort((a, b) => a.declarationIndex - b.declarationIndex);

  const edges: DependencyEdge[] = [];
  const producers = new Map<string, Set<string>>();
  const consumers = new Map<string, Set<string>>();
  for (const step of steps) {
    producers.set(step.name, new Set());
    consumers.set(step.name, new Set());
  }

  for (const step of steps) {
    for (const [field, value] of Object.entries(step.fields)) {
      for (const selector of collectSelectors(value)) {
        checkReference(selector, `${step.name}.${field}`, inputNames, stepsByName);
        edges.push({ selector, consumer: step.name, field });
        if (selector.scope === 'step') {
          producers.get(step.name)?.add(selector.name);
          consumers.get(selector.name)?.add(step.name);
        }
      }
    }
  }

  const outputs: CompiledOutput[] = input.outputs.map((output) => {
    const referencedBy = `outputs.${output.name}`;
    const selector = parseSelector(referencedBy, output.selector);
    checkReference(selector, referencedBy, inputNames, stepsByName);
    return Object.freeze({ name: output.name, selector });
  });

  detectCycle(steps, consumers);

  return { steps, edges, producers, consumers, outputs };
}
