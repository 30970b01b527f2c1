/**
 * BlockRegistry Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

// Mock logger before importing modules that use it
vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

import { BlockRegistry } from './registry.js';
import { UnknownBlockTypeError } from './errors.js';
import type { BlockFactory, WorkflowBlock } from './types.js';

// Helper to create mock block factories
function createMockFactory(outputs: string[], batch = false): BlockFactory {
  return (): WorkflowBlock => ({
    manifest: { fields: { image: { kinds: ['image'], required: true } } },
    declareOutputs: () => outputs.map((name) => ({ name, kinds: ['*'] })),
    acceptsBatchInput: () => batch,
    run: async () => Object.fromEntries(outputs.map((name) => [name, null])),
  });
}

describe('BlockRegistry', () => {
  let registry: BlockRegistry;

  beforeEach(() => {
    registry = new BlockRegistry();
  });

  describe('register', () => {
    it('should register a block factory', () => {
      const factory = createMockFactory(['predictions']);
      registry.register('Detector', factory);

      expect(registry.has('Detector')).toBe(true);
      expect(registry.getFactory('Detector')).toBe(factory);
    });

    it('should allow overwriting existing block types', () => {
      const first = createMockFactory(['a']);
      const second = createMockFactory(['b']);

      registry.register('Detector', first);
      registry.register('Detector', second);

      expect(registry.getFactory('Detector')).toBe(second);
    });

    it('should resolve aliases to the canonical type', () => {
      const factory = createMockFactory(['predictions']);
      registry.register('Detector', factory, { aliases: ['LegacyDetector'] });

      expect(registry.has('LegacyDetector')).toBe(true);
      expect(registry.canonicalType('LegacyDetector')).toBe('Detector');
      expect(registry.getFactory('LegacyDetector')).toBe(factory);
      expect(registry.getTypes()).toEqual(['Detector']);
    });
  });

  describe('registerAll', () => {
    it('should register multiple block factories', () => {
      registry.registerAll([
        { type: 'A', factory: createMockFactory(['x']) },
        { type: 'B', factory: createMockFactory(['y']), aliases: ['BB'] },
      ]);

      expect(registry.getTypes()).toEqual(['A', 'B']);
      expect(registry.has('BB')).toBe(true);
    });
  });

  describe('freeze', () => {
    it('should reject registration once frozen', () => {
      registry.freeze();

      expect(registry.isFrozen()).toBe(true);
      expect(() => registry.register('Late', createMockFactory(['x']))).toThrow(
        "Cannot register block type 'Late': registry is frozen"
      );
    });

    it('should unfreeze on clear', () => {
      registry.register('A', createMockFactory(['x']));
      registry.freeze();
      registry.clear();

      expect(registry.isFrozen()).toBe(false);
      expect(registry.getTypes()).toEqual([]);
    });
  });

  describe('create', () => {
    it('should pass init parameters to the factory', () => {
      const factory = vi.fn(createMockFactory(['x']));
      registry.register('A', factory);

      registry.create('A', { api_key: 'test-secret' });

      expect(factory).toHaveBeenCalledWith({ api_key: 'test-secret' });
    });

    it('should throw UnknownBlockTypeError for unregistered types', () => {
      expect(() => registry.create('Missing')).toThrow(UnknownBlockTypeError);
      expect(() => registry.create('Missing')).toThrow("Block type 'Missing' is not registered");
    });
  });

  describe('summary', () => {
    it('should describe every registered block', () => {
      registry.register('Detector', createMockFactory(['predictions']), { aliases: ['Det'] });
      registry.register('Stitcher', createMockFactory(['image'], true));

      expect(registry.summary()).toEqual([
        {
          type: 'Detector',
          aliases: ['Det'],
          batch: false,
          fields: ['image'],
          outputs: [{ name: 'predictions', kinds: ['*'] }],
        },
        {
          type: 'Stitcher',
          aliases: [],
          batch: true,
          fields: ['image'],
          outputs: [{ name: 'image', kinds: ['*'] }],
        },
      ]);
    });
  });
});
