/**
 * Selector Parser
 *
 * Turns raw step field values into the FieldValue AST. Strings starting with a
 * reserved prefix must be well-formed selectors:
 *
 *   $inputs.<name>[.<property>]
 *   $steps.<step>.<output>[.<property>]
 *   $steps.<step>.*
 */

import { MalformedSelectorError } from './errors.js';
import type { FieldValue, ListValue, LiteralValue, MapValue, Selector } from './types.js';

const INPUTS_PREFIX = '$inputs';
const STEPS_PREFIX = '$steps';

const IDENTIFIER = '[A-Za-z_][A-Za-z0-9_-]*';
const INPUT_SELECTOR = new RegExp(`^\\$inputs\\.(${IDENTIFIER})(?:\\.(${IDENTIFIER}))?$`);
const STEP_SELECTOR = new RegExp(`^\\$steps\\.(${IDENTIFIER})\\.(${IDENTIFIER}|\\*)(?:\\.(${IDENTIFIER}))?$`);

/**
 * Whether a string uses one of the reserved selector prefixes
 */
export function hasSelectorPrefix(value: string): boolean {
  return [INPUTS_PREFIX, STEPS_PREFIX].some(
    (prefix) => value === prefix || value.startsWith(`${prefix}.`)
  );
}

/**
 * Parse a selector string
 * @param field - Field path used in error messages
 * @throws MalformedSelectorError
 */
export function parseSelector(field: string, raw: string): Selector {
  if (raw.startsWith(`${INPUTS_PREFIX}.`) || raw === INPUTS_PREFIX) {
    const match = INPUT_SELECTOR.exec(raw);
    if (!match) {
      throw new MalformedSelectorError(field, raw, 'expected $inputs.<name>[.<property>]');
    }
    const selector: Selector = {
      type: 'selector',
      scope: 'input',
      name: match[1],
      ...(match[2] !== undefined ? { property: match[2] } : {}),
      raw,
    };
    return Object.freeze(selector);
  }

  if (raw.startsWith(`${STEPS_PREFIX}.`) || raw === STEPS_PREFIX) {
    const match = STEP_SELECTOR.exec(raw);
    if (!match) {
      throw new MalformedSelectorError(field, raw, 'expected $steps.<step>.<output>[.<property>]');
    }
    if (match[2] === '*' && match[3] !== undefined) {
      throw new MalformedSelectorError(field, raw, 'a property cannot follow the * output');
    }
    const selector: Selector = {
      type: 'selector',
      scope: 'step',
      name: match[1],
      output: match[2],
      ...(match[3] !== undefined ? { property: match[3] } : {}),
      raw,
    };
    return Object.freeze(selector);
  }

  throw new MalformedSelectorError(field, raw, 'selectors start with $inputs. or $steps.');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Parse a raw field value, recursing into lists and maps
 * @param field - Field path, extended with [i] / .key while recursing
 */
export function parseFieldValue(field: string, raw: unknown): FieldValue {
  if (typeof raw === 'string' && hasSelectorPrefix(raw)) {
    return parseSelector(field, raw);
  }
  if (Array.isArray(raw)) {
    const list: ListValue = {
      type: 'list',
      items: Object.freeze(raw.map((item, i) => parseFieldValue(`${field}[${i}]`, item))),
    };
    return Object.freeze(list);
  }
  if (isPlainObject(raw)) {
    const entries: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(raw)) {
      entries[key] = parseFieldValue(`${field}.${key}`, value);
    }
    const map: MapValue = { type: 'map', entries: Object.freeze(entries) };
    return Object.freeze(map);
  }
  const literal: LiteralValue = { type: 'literal', value: raw };
  return Object.freeze(literal);
}

/**
 * All selectors inside a parsed field, in traversal order
 */
export function collectSelectors(value: FieldValue): Selector[] {
  switch (value.type) {
    case 'selector':
      return [value];
    case 'list':
      return value.items.flatMap(collectSelectors);
    case 'map':
      return Object.values(value.entries).flatMap(collectSelectors);
    case 'literal':
      return [];
  }
}

/**
 * Whether a parsed field contains no selectors
 */
export function isStaticValue(value: FieldValue): boolean {
  return collectSelectors(value).length === 0;
}

/**
 * Convert a fully literal field back to its plain value
 */
export function literalValueOf(value: FieldValue): unknown {
  switch (value.type) {
    case 'literal':
      return value.value;
    case 'list':
      return value.items.map(literalValueOf);
    case 'map':
      return Object.fromEntries(
        Object.entries(value.entries).map(([key, entry]) => [key, literalValueOf(entry)])
      );
    case 'selector':
      return value.raw;
  }
}

/**
 * Context key a selector reads from (property accessor excluded)
 */
export function contextKeyOf(selector: Selector): string {
  return selector.scope === 'input'
    ? `inputs.${selector.name}`
    : `steps.${selector.name}.${selector.output ?? '*'}`;
}
