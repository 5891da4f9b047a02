import { describe, it, expect } from 'vitest';
import { isFlattened, unflatten } from '../../../src/utils/flatten.js';

describe('isFlattened', () => {
  it('detects dotted top-level keys', () => {
    expect(isFlattened({ 'a.b': 1 })).toBe(true);
    expect(isFlattened({ a: { 'b.c': 1 } })).toBe(false);
    expect(isFlattened(['a.b'])).toBe(false);
    expect(isFlattened('a.b')).toBe(false);
  });
});

describe('unflatten', () => {
  it('re-nests dotted keys', () => {
    expect(unflatten({ 'a.b': 1, 'a.c.d': 'x', e: true })).toEqual({
      a: { b: 1, c: { d: 'x' } },
      e: true,
    });
  });

  it('turns contiguous index keys back into arrays', () => {
    expect(unflatten({
      'items.0.sku': 'A',
      'items.1.sku': 'B',
      'tags.0': 'x',
      'tags.1': 'y',
    })).toEqual({
      items: [{ sku: 'A' }, { sku: 'B' }],
      tags: ['x', 'y'],
    });
  });

  it('keeps objects whose index keys have gaps', () => {
    expect(unflatten({ 'a.0': 1, 'a.2': 3 })).toEqual({ a: { 0: 1, 2: 3 } });
  });

  it('orders indices numerically', () => {
    const flat: Record<string, number> = {};
    for (let i = 11; i >= 0; i--) {
      flat[`n.${i}`] = i;
    }

    expect(unflatten(flat)).toEqual({ n: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11] });
  });

  it('merges a nested object with dotted siblings', () => {
    expect(unflatten({ 'a.b': 1, a: { c: 2 } })).toEqual({ a: { b: 1, c: 2 } });
  });

  it('returns values without dotted keys unchanged', () => {
    const event = { a: { b: [1, 2] } };

    expect(unflatten(event)).toBe(event);
    expect(unflatten([1, 2])).toEqual([1, 2]);
    expect(unflatten(null)).toBeNull();
  });
});
