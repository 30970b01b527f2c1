/**
 * Kind Registry
 *
 * Kinds are named data-type tags attached to block input fields and outputs.
 * Two sockets are compatible when their kind sets intersect; the wildcard kind
 * is compatible with every set.
 */

import { KindMismatchError } from './errors.js';

export interface Kind {
  readonly name: string;
  readonly description: string;
}

export const WILDCARD_KIND: Kind = Object.freeze({ name: '*', description: 'Equivalent of any element' });
export const IMAGE_KIND: Kind = Object.freeze({ name: 'image', description: 'Image in workflows' });
export const OBJECT_DETECTION_PREDICTION_KIND: Kind = Object.freeze({
  name: 'object_detection_prediction',
  description: 'Object detection predictions for one image',
});
export const INSTANCE_SEGMENTATION_PREDICTION_KIND: Kind = Object.freeze({
  name: 'instance_segmentation_prediction',
  description: 'Instance segmentation predictions for one image',
});
export const KEYPOINT_DETECTION_PREDICTION_KIND: Kind = Object.freeze({
  name: 'keypoint_detection_prediction',
  description: 'Keypoint detection predictions for one image',
});
export const BAR_CODE_DETECTION_KIND: Kind = Object.freeze({
  name: 'bar_code_detection',
  description: 'Bar code or QR code detections for one image',
});
export const CLASSIFICATION_PREDICTION_KIND: Kind = Object.freeze({
  name: 'classification_prediction',
  description: 'Classification result for one image',
});
export const STRING_KIND: Kind = Object.freeze({ name: 'string', description: 'String value' });
export const INTEGER_KIND: Kind = Object.freeze({ name: 'integer', description: 'Integer value' });
export const FLOAT_KIND: Kind = Object.freeze({ name: 'float', description: 'Float value' });
export const FLOAT_ZERO_TO_ONE_KIND: Kind = Object.freeze({
  name: 'float_zero_to_one',
  description: 'Float value in range [0.0, 1.0]',
});
export const BOOLEAN_KIND: Kind = Object.freeze({ name: 'boolean', description: 'Boolean flag' });
export const DICTIONARY_KIND: Kind = Object.freeze({ name: 'dictionary', description: 'Dictionary' });
export const LIST_OF_VALUES_KIND: Kind = Object.freeze({ name: 'list_of_values', description: 'List of values of any type' });

export const BUILTIN_KINDS: readonly Kind[] = Object.freeze([
  WILDCARD_KIND,
  IMAGE_KIND,
  OBJECT_DETECTION_PREDICTION_KIND,
  INSTANCE_SEGMENTATION_PREDICTION_KIND,
  KEYPOINT_DETECTION_PREDICTION_KIND,
  BAR_CODE_DETECTION_KIND,
  CLASSIFICATION_PREDICTION_KIND,
  STRING_KIND,
  INTEGER_KIND,
  FLOAT_KIND,
  FLOAT_ZERO_TO_ONE_KIND,
  BOOLEAN_KIND,
  DICTIONARY_KIND,
  LIST_OF_VALUES_KIND,
]);

/**
 * KindRegistry - catalog of known kinds
 */
export class KindRegistry {
  private kinds = new Map<string, Kind>();

  constructor(kinds: readonly Kind[] = BUILTIN_KINDS) {
    for (const kind of kinds) {
      this.kinds.set(kind.name, kind);
    }
  }

  /**
   * Register a custom kind. Re-registering an identical name is a no-op.
   */
  register(kind: Kind): Kind {
    const existing = this.kinds.get(kind.name);
    if (existing) {
      return existing;
    }
    const frozen = Object.freeze({ ...kind });
    this.kinds.set(frozen.name, frozen);
    return frozen;
  }

  has(name: string): boolean {
    return this.kinds.has(name);
  }

  get(name: string): Kind | undefined {
    return this.kinds.get(name);
  }

  /**
   * Names in the input that are not registered
   */
  unknownNames(names: readonly string[]): string[] {
    return names.filter((name) => !this.kinds.has(name));
  }

  getAll(): Kind[] {
    return Array.from(this.kinds.values());
  }
}

/**
 * Global kind registry instance
 */
export const kindRegistry = new KindRegistry();

/**
 * Whether a kind set contains the wildcard. An empty set is treated as wildcard.
 */
export function isWildcardSet(kinds: readonly string[]): boolean {
  return kinds.length === 0 || kinds.includes(WILDCARD_KIND.name);
}

/**
 * Check that produced kinds intersect with accepted kinds
 */
export function areKindsCompatible(produced: readonly string[], accepted: readonly string[]): boolean {
  if (isWildcardSet(produced) || isWildcardSet(accepted)) {
    return true;
  }
  const acceptedSet = new Set(accepted);
  return produced.some((kind) => acceptedSet.has(kind));
}

/**
 * Throw KindMismatchError when two sockets cannot be connected
 */
export function assertKindsCompatible(
  producer: { socket: string; kinds: readonly string[] },
  consumer: { socket: string; kinds: readonly string[] }
): void {
  if (!areKindsCompatible(producer.kinds, consumer.kinds)) {
    throw new KindMismatchError(producer, consumer);
  }
}
