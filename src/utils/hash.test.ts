import { describe, it, expect } from 'vitest';
import { sha256Hex, stableStringify } from './hash.js';

describe('stableStringify', () => {
  it('should sort object keys at every depth', () => {
    expect(stableStringify({ b: 1, a: { d: 2, c: [{ z: 1, y: 2 }] } })).toBe(
      '{"a":{"c":[{"y":2,"z":1}],"d":2},"b":1}'
    );
  });

  it('should keep array order', () => {
    expect(stableStringify([3, 1, 2])).toBe('[3,1,2]');
  });

  it('should serialize logically equal documents identically', () => {
    expect(stableStringify({ x: 1, y: 'a' })).toBe(stableStringify({ y: 'a', x: 1 }));
  });
});

describe('sha256Hex', () => {
  it('should return the full hex digest', () => {
    expect(sha256Hex('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should truncate when a length is given', () => {
    expect(sha256Hex('abc', 5)).toBe('ba781');
  });
});
