/**
 * Block Registry
 *
 * Central registry mapping block type identifiers to factories.
 * Populated once at startup, then frozen.
 */

import type { BlockFactory, BlockInitParameters, BlockOutputDefinition, WorkflowBlock } from './types.js';
import { UnknownBlockTypeError } from './errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'block-registry' });

export interface RegisterOptions {
  /** Alternative type identifiers resolving to the same factory */
  aliases?: string[];
}

interface RegistryEntry {
  type: string;
  factory: BlockFactory;
  aliases: string[];
}

/**
 * BlockRegistry - Manages block factories
 */
export class BlockRegistry {
  private entries = new Map<string, RegistryEntry>();
  private aliases = new Map<string, string>();
  private frozen = false;

  /**
   * Register a block factory
   * @param type - Block type identifier used in step definitions
   * @throws Error if the registry is frozen
   */
  register(type: string, factory: BlockFactory, options: RegisterOptions = {}): void {
    if (this.frozen) {
      throw new Error(`Cannot register block type '${type}': registry is frozen`);
    }
    if (this.entries.has(type) || this.aliases.has(type)) {
      logger.warn({ blockType: type }, 'Overwriting existing block type');
    }
    const aliases = options.aliases ?? [];
    this.entries.set(type, { type, factory, aliases });
    for (const alias of aliases) {
      this.aliases.set(alias, type);
    }
    logger.debug({ blockType: type, aliases }, 'Block type registered');
  }

  /**
   * Register multiple block factories
   */
  registerAll(blocks: Array<{ type: string; factory: BlockFactory; aliases?: string[] }>): void {
    for (const block of blocks) {
      this.register(block.type, block.factory, { aliases: block.aliases });
    }
  }

  /**
   * Prevent further registration
   */
  freeze(): void {
    this.frozen = true;
    logger.info({ blockTypes: this.getTypes().length }, 'Block registry frozen');
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Check if a block type (or alias) is registered
   */
  has(type: string): boolean {
    return this.entries.has(type) || this.aliases.has(type);
  }

  /**
   * Canonical type identifier for a type or alias
   */
  canonicalType(type: string): string | undefined {
    if (this.entries.has(type)) {
      return type;
    }
    return this.aliases.get(type);
  }

  /**
   * Get the factory for a type or alias
   * @throws UnknownBlockTypeError if not registered
   */
  getFactory(type: string): BlockFactory {
    const canonical = this.canonicalType(type);
    const entry = canonical === undefined ? undefined : this.entries.get(canonical);
    if (!entry) {
      throw new UnknownBlockTypeError(type);
    }
    return entry.factory;
  }

  /**
   * Instantiate a block
   * @throws UnknownBlockTypeError if not registered
   */
  create(type: string, init: BlockInitParameters = {}): WorkflowBlock {
    return this.getFactory(type)(init);
  }

  /**
   * Get all registered canonical type identifiers
   */
  getTypes(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Clear all registered blocks and unfreeze
   */
  clear(): void {
    this.entries.clear();
    this.aliases.clear();
    this.frozen = false;
  }

  /**
   * Get a summary of registered blocks
   */
  summary(init: BlockInitParameters = {}): Array<{
    type: string;
    aliases: string[];
    batch: boolean;
    fields: string[];
    outputs: BlockOutputDefinition[];
  }> {
    return [...this.entries.values()].map((entry) => {
      const block = entry.factory(init);
      return {
        type: entry.type,
        aliases: entry.aliases,
        batch: block.acceptsBatchInput(),
        fields: Object.keys(block.manifest.fields),
        outputs: block.declareOutputs(),
      };
    });
  }
}

/**
 * Global block registry instance
 */
export const blockRegistry = new BlockRegistry();
