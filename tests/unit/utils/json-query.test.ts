import { describe, it, expect } from 'vitest';
import { isTruthy, quoteSegment, searchJson } from '../../../src/utils/json-query.js';

describe('searchJson', () => {
  const data = { a: { b: [1, 2] }, people: [{ name: 'Ana', age: 30 }, { name: 'Bo', age: 20 }] };

  it('evaluates JMESPath expressions', () => {
    expect(searchJson(data, 'a.b[1]')).toBe(2);
    expect(searchJson(data, "people[?age > `25`].name")).toEqual(['Ana']);
  });

  it('returns null when nothing matches', () => {
    expect(searchJson(data, 'a.missing')).toBeNull();
    expect(searchJson(data, 'a.b.c')).toBeNull();
  });

  it('throws on invalid expressions', () => {
    expect(() => searchJson(data, 'a[')).toThrow();
  });
});

describe('quoteSegment', () => {
  it('leaves identifiers bare', () => {
    expect(quoteSegment('idService')).toBe('idService');
    expect(quoteSegment('_id2')).toBe('_id2');
  });

  it('quotes everything else', () => {
    expect(quoteSegment('my-key')).toBe('"my-key"');
    expect(quoteSegment('1st')).toBe('"1st"');
    expect(quoteSegment('say "hi"')).toBe('"say \\"hi\\""');
  });
});

describe('isTruthy', () => {
  it('treats empty containers, empty strings, false and null as false', () => {
    expect(isTruthy('')).toBe(false);
    expect(isTruthy([])).toBe(false);
    expect(isTruthy({})).toBe(false);
    expect(isTruthy(false)).toBe(false);
    expect(isTruthy(null)).toBe(false);
    expect(isTruthy(undefined)).toBe(false);
  });

  it('treats everything else as true', () => {
    expect(isTruthy(0)).toBe(true);
    expect(isTruthy('x')).toBe(true);
    expect(isTruthy([0])).toBe(true);
    expect(isTruthy({ a: null })).toBe(true);
  });
});
