/**
 * Workflow Definition Validator
 *
 * Structural checks on the raw specification document, before selectors are
 * resolved: document shape, unique names, known kinds, and step fields against
 * the block manifest.
 */

import { z } from 'zod';
import { WorkflowDefinitionError } from './errors.js';
import type { KindRegistry } from './kinds.js';
import { isStaticValue, literalValueOf } from './selectors.js';
import type { FieldValue, StepDefinition, WorkflowBlock, WorkflowDefinition } from './types.js';

/** Step keys that are not block fields */
export const RESERVED_STEP_KEYS: ReadonlySet<string> = new Set(['type', 'name']);

const inputSchema = z.object({
  type: z.enum(['WorkflowImage', 'WorkflowParameter', 'InferenceImage', 'InferenceParameter']),
  name: z.string().min(1),
  kind: z.array(z.string()).optional(),
  default_value: z.unknown().optional(),
});

const stepSchema = z
  .object({
    type: z.string().min(1),
    name: z.string().min(1),
  })
  .passthrough();

const outputSchema = z.object({
  type: z.literal('JsonField').optional(),
  name: z.string().min(1),
  selector: z.string(),
});

export const workflowDefinitionSchema = z.object({
  version: z.string().optional(),
  inputs: z.array(inputSchema).default([]),
  steps: z.array(stepSchema),
  outputs: z.array(outputSchema),
});

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      duplicates.add(name);
    }
    seen.add(name);
  }
  return [...duplicates];
}

/**
 * Validate the raw document shape and name uniqueness
 * @throws WorkflowDefinitionError listing every issue found
 */
export function validateWorkflowDefinition(raw: unknown, kinds: KindRegistry): WorkflowDefinition {
  const result = workflowDefinitionSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new WorkflowDefinitionError('Workflow definition has invalid shape', issues);
  }

  const definition: WorkflowDefinition = result.data;
  const issues: string[] = [];

  for (const name of findDuplicates(definition.inputs.map((i) => i.name))) {
    issues.push(`Input name '${name}' is declared more than once`);
  }
  for (const name of findDuplicates(definition.steps.map((s) => s.name))) {
    issues.push(`Step name '${name}' is declared more than once`);
  }
  for (const name of findDuplicates(definition.outputs.map((o) => o.name))) {
    issues.push(`Output name '${name}' is declared more than once`);
  }
  for (const input of definition.inputs) {
    const unknown = kinds.unknownNames(input.kind ?? []);
    if (unknown.length > 0) {
      issues.push(`Input '${input.name}' declares unknown kinds [${unknown.join(', ')}]`);
    }
  }

  if (issues.length > 0) {
    throw new WorkflowDefinitionError(issues[0], issues);
  }
  return definition;
}

/**
 * Raw field entries of a step (everything except type and name)
 */
export function stepFieldEntries(step: StepDefinition): Array<[string, unknown]> {
  return Object.entries(step).filter(([key]) => !RESERVED_STEP_KEYS.has(key));
}

/**
 * Validate a block's own declarations against the kind registry
 */
export function validateBlockDeclarations(blockType: string, block: WorkflowBlock, kinds: KindRegistry): string[] {
  const issues: string[] = [];
  for (const [field, definition] of Object.entries(block.manifest.fields)) {
    const unknown = kinds.unknownNames(definition.kinds);
    if (unknown.length > 0) {
      issues.push(`Block type '${blockType}' field '${field}' declares unknown kinds [${unknown.join(', ')}]`);
    }
  }
  for (const output of block.declareOutputs()) {
    const unknown = kinds.unknownNames(output.kinds);
    if (unknown.length > 0) {
      issues.push(`Block type '${blockType}' output '${output.name}' declares unknown kinds [${unknown.join(', ')}]`);
    }
  }
  return issues;
}

/**
 * Validate parsed step fields against the block manifest
 * @returns Issues found; empty when valid
 */
export function validateStepFields(
  stepName: string,
  blockType: string,
  block: WorkflowBlock,
  fields: Readonly<Record<string, FieldValue>>
): string[] {
  const issues: string[] = [];
  const manifest = block.manifest.fields;

  for (const field of Object.keys(fields)) {
    if (!Object.prototype.hasOwnProperty.call(manifest, field)) {
      issues.push(`Step '${stepName}': field '${field}' is not accepted by block type '${blockType}'`);
    }
  }

  for (const [field, definition] of Object.entries(manifest)) {
    const value = fields[field];
    if (value === undefined) {
      if (definition.required) {
        issues.push(`Step '${stepName}': required field '${field}' is missing`);
      }
      continue;
    }
    if (definition.literal && isStaticValue(value)) {
      const parsed = definition.literal.safeParse(literalValueOf(value));
      if (!parsed.success) {
        const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
        issues.push(`Step '${stepName}': field '${field}' has invalid value: ${reason}`);
      }
    }
  }

  return issues;
}
