/**
 * Workflow Definition Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  stepFieldEntries,
  validateBlockDeclarations,
  validateStepFields,
  validateWorkflowDefinition,
} from './validator.js';
import { KindRegistry } from './kinds.js';
import { WorkflowDefinitionError } from './errors.js';
import { parseFieldValue } from './selectors.js';
import type { BlockManifestSchema, FieldValue, WorkflowBlock } from './types.js';

const kinds = new KindRegistry();

function createBlock(manifest: BlockManifestSchema, outputKinds: string[] = ['*']): WorkflowBlock {
  return {
    manifest,
    declareOutputs: () => [{ name: 'out', kinds: outputKinds }],
    acceptsBatchInput: () => false,
    run: async () => ({ out: null }),
  };
}

function parseFields(raw: Record<string, unknown>): Record<string, FieldValue> {
  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [key, parseFieldValue(key, value)]));
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('validateWorkflowDefinition', () => {
  it('should accept a minimal definition and default inputs', () => {
    const definition = validateWorkflowDefinition({ steps: [], outputs: [] }, kinds);

    expect(definition.inputs).toEqual([]);
  });

  it('should keep block fields on steps', () => {
    const definition = validateWorkflowDefinition(
      {
        inputs: [{ type: 'WorkflowImage', name: 'image' }],
        steps: [{ type: 'Detector', name: 'det', image: '$inputs.image', confidence: 0.4 }],
        outputs: [{ type: 'JsonField', name: 'result', selector: '$steps.det.out' }],
      },
      kinds
    );

    expect(stepFieldEntries(definition.steps[0])).toEqual([
      ['image', '$inputs.image'],
      ['confidence', 0.4],
    ]);
  });

  it('should report shape problems with their path', () => {
    const error = catchError(() =>
      validateWorkflowDefinition({ steps: [{ type: 'Detector' }], outputs: [] }, kinds)
    );

    expect(error).toBeInstanceOf(WorkflowDefinitionError);
    if (error instanceof WorkflowDefinitionError) {
      expect(error.message).toBe('Workflow definition has invalid shape');
      expect(error.issues).toEqual(['steps.0.name: Required']);
    }
  });

  it('should reject documents that are not objects', () => {
    expect(() => validateWorkflowDefinition('nope', kinds)).toThrow(WorkflowDefinitionError);
  });

  it('should reject duplicate step names', () => {
    expect(() =>
      validateWorkflowDefinition(
        {
          steps: [
            { type: 'A', name: 'same' },
            { type: 'B', name: 'same' },
          ],
          outputs: [],
        },
        kinds
      )
    ).toThrow("Step name 'same' is declared more than once");
  });

  it('should list every issue found', () => {
    const error = catchError(() =>
      validateWorkflowDefinition(
        {
          inputs: [
            { type: 'WorkflowParameter', name: 'p', kind: ['hologram'] },
            { type: 'WorkflowParameter', name: 'p' },
          ],
          steps: [],
          outputs: [
            { name: 'o', selector: '$inputs.p' },
            { name: 'o', selector: '$inputs.p' },
          ],
        },
        kinds
      )
    );

    expect(error).toBeInstanceOf(WorkflowDefinitionError);
    if (error instanceof WorkflowDefinitionError) {
      expect(error.issues).toEqual([
        "Input name 'p' is declared more than once",
        "Output name 'o' is declared more than once",
        "Input 'p' declares unknown kinds [hologram]",
      ]);
      expect(error.message).toBe("Input name 'p' is declared more than once");
    }
  });
});

describe('validateBlockDeclarations', () => {
  it('should report unknown kinds on fields and outputs', () => {
    const block = createBlock({ fields: { image: { kinds: ['picture'] } } }, ['hologram']);

    expect(validateBlockDeclarations('Detector', block, kinds)).toEqual([
      "Block type 'Detector' field 'image' declares unknown kinds [picture]",
      "Block type 'Detector' output 'out' declares unknown kinds [hologram]",
    ]);
  });
});

describe('validateStepFields', () => {
  const block = createBlock({
    fields: {
      image: { kinds: ['image'], required: true },
      confidence: { kinds: ['float_zero_to_one'], literal: z.number().min(0).max(1) },
    },
  });

  it('should accept valid fields', () => {
    expect(validateStepFields('det', 'Detector', block, parseFields({ image: '$inputs.image', confidence: 0.5 }))).toEqual(
      []
    );
  });

  it('should report unknown and missing fields', () => {
    expect(validateStepFields('det', 'Detector', block, parseFields({ colour: 'red' }))).toEqual([
      "Step 'det': field 'colour' is not accepted by block type 'Detector'",
      "Step 'det': required field 'image' is missing",
    ]);
  });

  it('should not accept inherited object members as fields', () => {
    expect(
      validateStepFields('det', 'Detector', block, parseFields({ image: '$inputs.image', constructor: 1, toString: 'x' }))
    ).toEqual([
      "Step 'det': field 'constructor' is not accepted by block type 'Detector'",
      "Step 'det': field 'toString' is not accepted by block type 'Detector'",
    ]);
  });

  it('should validate literal values against the field schema', () => {
    expect(validateStepFields('det', 'Detector', block, parseFields({ image: '$inputs.image', confidence: 2 }))).toEqual([
      "Step 'det': field 'confidence' has invalid value: Number must be less than or equal to 1",
    ]);
  });

  it('should not validate selector values against the literal schema', () => {
    expect(
      validateStepFields('det', 'Detector', block, parseFields({ image: '$inputs.image', confidence: '$inputs.c' }))
    ).toEqual([]);
  });
});
