/**
 * Execution Planner (Workflow Compiler)
 *
 * raw specification -> validate -> parse selectors -> dependency graph ->
 * levels + kind checks -> frozen CompiledPlan.
 *
 * compile() is pure: the same specification always yields the same level
 * structure and ordering. Plans hold no per-run state and can be shared by
 * concurrent runs.
 */

import { CyclicWorkflowError, WorkflowDefinitionError } from './errors.js';
import { buildDependencyGraph, type DependencyGraph, type GraphStepNode } from './graph.js';
import { assertKindsCompatible, IMAGE_KIND, kindRegistry, WILDCARD_KIND, type KindRegistry } from './kinds.js';
import { blockRegistry, type BlockRegistry } from './registry.js';
import { parseFieldValue } from './selectors.js';
import type {
  BlockInitParameters,
  CompiledInput,
  CompiledPlan,
  CompiledStep,
  FieldValue,
  InputDefinition,
  Selector,
  StepManifest,
  WorkflowBlock,
} from './types.js';
import {
  stepFieldEntries,
  validateBlockDeclarations,
  validateStepFields,
  validateWorkflowDefinition,
} from './validator.js';
import { getConfig } from '../config/index.js';
import { sha256Hex, stableStringify } from '../utils/hash.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'workflow-compiler' });

interface PlannedStep extends GraphStepNode {
  type: string;
  block: WorkflowBlock;
}

export interface CompilerOptions {
  registry?: BlockRegistry;
  kinds?: KindRegistry;
  /** Passed to every block factory */
  initParameters?: BlockInitParameters;
  /** Maximum number of cached plans (default: PLAN_CACHE_SIZE) */
  cacheSize?: number;
}

/**
 * Hash identifying a specification, independent of key order
 */
export function computePlanId(specification: unknown): string {
  return sha256Hex(stableStringify(specification));
}

/**
 * Usage resource id: first five hex chars of sha256 over the ordered step list
 */
export function computeResourceId(stepSignature: readonly string[]): string {
  return sha256Hex(JSON.stringify({ steps: stepSignature }), 5);
}

export function isBatchInput(input: InputDefinition): boolean {
  return input.type === 'WorkflowImage' || input.type === 'InferenceImage';
}

/**
 * Kind-based layering: level 0 holds steps without producers, level k the steps
 * whose producers all sit in levels < k. Declaration order within a level.
 */
export function computeLevels<T extends GraphStepNode>(graph: DependencyGraph<T>): T[][] {
  const placed = new Set<string>();
  let remaining = [...graph.steps];
  const levels: T[][] = [];

  while (remaining.length > 0) {
    const level = remaining.filter((step) =>
      [...(graph.producers.get(step.name) ?? [])].every((producer) => placed.has(producer))
    );
    if (level.length === 0) {
      throw new CyclicWorkflowError(remaining.map((step) => step.name));
    }
    for (const step of level) {
      placed.add(step.name);
    }
    remaining = remaining.filter((step) => !placed.has(step.name));
    levels.push(level);
  }

  return levels;
}

/**
 * WorkflowCompiler - turns specifications into CompiledPlans
 */
export class WorkflowCompiler {
  private readonly registry: BlockRegistry;
  private readonly kinds: KindRegistry;
  private readonly initParameters: BlockInitParameters;
  private readonly cacheSize: number;
  private readonly cache = new Map<string, CompiledPlan>();

  constructor(options: CompilerOptions = {}) {
    this.registry = options.registry ?? blockRegistry;
    this.kinds = options.kinds ?? kindRegistry;
    this.initParameters = Object.freeze({ ...options.initParameters });
    this.cacheSize = options.cacheSize ?? getConfig().executor.planCacheSize;
  }

  /**
   * Compile a specification, reusing a cached plan for an identical one
   */
  compileCached(specification: unknown): CompiledPlan {
    const id = computePlanId(specification);
    const cached = this.cache.get(id);
    if (cached) {
      logger.debug({ planId: id }, 'Using cached plan');
      return cached;
    }

    const plan = this.compile(specification);
    if (this.cacheSize > 0) {
      if (this.cache.size >= this.cacheSize) {
        // Evict the oldest entry
        const oldest = this.cache.keys().next();
        if (!oldest.done) {
          this.cache.delete(oldest.value);
        }
      }
      this.cache.set(id, plan);
    }
    return plan;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cachedPlanCount(): number {
    return this.cache.size;
  }

  /**
   * Compile a specification into an immutable plan
   * @throws WorkflowDefinitionError, UnknownBlockTypeError, MalformedSelectorError,
   *   UnknownReferenceError, CyclicWorkflowError, KindMismatchError
   */
  compile(specification: unknown): CompiledPlan {
    const definition = validateWorkflowDefinition(specification, this.kinds);

    const nodes: PlannedStep[] = [];
    const issues: string[] = [];
    const checkedTypes = new Set<string>();

    definition.steps.forEach((step, declarationIndex) => {
      const block = this.registry.create(step.type, this.initParameters);

      const canonical = this.registry.canonicalType(step.type) ?? step.type;
      if (!checkedTypes.has(canonical)) {
        checkedTypes.add(canonical);
        issues.push(...validateBlockDeclarations(canonical, block, this.kinds));
      }

      const fields: Record<string, FieldValue> = {};
      for (const [field, raw] of stepFieldEntries(step)) {
        fields[field] = parseFieldValue(`${step.name}.${field}`, raw);
      }
      issues.push(...validateStepFields(step.name, step.type, block, fields));

      nodes.push({
        type: step.type,
        block,
        name: step.name,
        declarationIndex,
        fields: Object.freeze(fields),
        outputs: Object.freeze(block.declareOutputs().map((o) => Object.freeze({ ...o, kinds: [...o.kinds] }))),
      });
    });

    if (issues.length > 0) {
      throw new WorkflowDefinitionError(issues[0], issues);
    }

    const graph = buildDependencyGraph({
      inputs: definition.inputs,
      steps: nodes,
      outputs: definition.outputs,
    });
    const plannedLevels = computeLevels(graph);

    const inputs: CompiledInput[] = definition.inputs.map((input) =>
      Object.freeze({
        name: input.name,
        isBatch: isBatchInput(input),
        kinds: Object.freeze(isBatchInput(input) ? [IMAGE_KIND.name] : (input.kind ?? [WILDCARD_KIND.name])),
        hasDefault: input.default_value !== undefined,
        defaultValue: input.default_value,
      })
    );
    const inputKinds = new Map(inputs.map((i) => [i.name, i.kinds]));
    const nodesByName = new Map(nodes.map((n) => [n.name, n]));

    const producedKinds = (selector: Selector): readonly string[] => {
      if (selector.property !== undefined || selector.output === '*') {
        return [WILDCARD_KIND.name];
      }
      if (selector.scope === 'input') {
        return inputKinds.get(selector.name) ?? [WILDCARD_KIND.name];
      }
      const output = nodesByName.get(selector.name)?.outputs.find((o) => o.name === selector.output);
      return output?.kinds ?? [WILDCARD_KIND.name];
    };

    const steps = new Map<string, CompiledStep>();
    const levels: CompiledStep[][] = plannedLevels.map((level, levelIndex) =>
      level.map((node) => {
        const name = node.name;
        for (const edge of graph.edges.filter((e) => e.consumer === name)) {
          const accepted = node.block.manifest.fields[edge.field]?.kinds ?? [WILDCARD_KIND.name];
          assertKindsCompatible(
            { socket: edge.selector.raw, kinds: producedKinds(edge.selector) },
            { socket: `${name}.${edge.field}`, kinds: accepted }
          );
        }

        const manifest: StepManifest = Object.freeze({
          type: node.type,
          name,
          fields: node.fields,
          declaresBatchInput: node.block.acceptsBatchInput(),
        });
        const compiled: CompiledStep = Object.freeze({
          manifest,
          block: node.block,
          outputs: node.outputs,
          producerStepNames: new Set(graph.producers.get(name)),
          levelIndex,
          declarationIndex: node.declarationIndex,
        });
        steps.set(name, compiled);
        return compiled;
      })
    );

    const plan: CompiledPlan = Object.freeze({
      id: computePlanId(specification),
      inputs: Object.freeze(inputs),
      levels: Object.freeze(levels.map((level) => Object.freeze(level))),
      outputs: Object.freeze(graph.outputs),
      steps,
      resourceId: computeResourceId(definition.steps.map((s) => `${s.type}:${s.name}`)),
    });

    logger.info(
      { planId: plan.id, stepCount: steps.size, levelCount: levels.length },
      'Workflow compiled'
    );

    return plan;
  }
}
