import { describe, expect, it } from 'vitest';
import { fromJSON, toJSON, valueKind, type Value } from '../src/value/index.js';

describe('toJSON', () => {
  it('converts nested maps to objects', () => {
    const doc = new Map<string, Value>([
      ['name', 'knit'],
      ['server', new Map<string, Value>([['ports', [80, 443]]])],
      ['items', [new Map<string, Value>([['id', 1]]), null]],
    ]);

    expect(toJSON(doc)).toEqual({
      name: 'knit',
      server: { ports: [80, 443] },
      items: [{ id: 1 }, null],
    });
  });

  it('writes non-finite numbers as null', () => {
    expect(toJSON(new Map([['n', Number.NaN]]))).toEqual({ n: null });
  });

  it('keeps a __proto__ key as an own property', () => {
    const doc = new Map<string, Value>([
      ['__proto__', new Map<string, Value>([['polluted', 'yes']])],
      ['b', 1],
    ]);

    const json = toJSON(doc);

    expect(Object.keys(json)).toEqual(['__proto__', 'b']);
    expect(Object.getPrototypeOf(json)).toBe(Object.prototype);
    expect(JSON.stringify(json)).toBe('{"__proto__":{"polluted":"yes"},"b":1}');
    expect([...fromJSON(JSON.parse(JSON.stringify(json))).keys()]).toEqual(['__proto__', 'b']);
  });
});

describe('fromJSON', () => {
  it('converts objects to ordered maps', () => {
    const doc = fromJSON({ b: 1, a: { c: [true, 'x'] } });

    expect([...doc.keys()]).toEqual(['b', 'a']);
    expect(doc.get('a')).toEqual(new Map([['c', [true, 'x']]]));
  });

  it('accepts objects without a prototype', () => {
    const data: Record<string, unknown> = Object.create(null);
    data.key = 'value';
    expect(fromJSON(data)).toEqual(new Map([['key', 'value']]));
  });

  it('rejects non-object input', () => {
    expect(() => fromJSON([1, 2])).toThrow('fromJSON requires a plain object at the top level');
    expect(() => fromJSON('text')).toThrow(TypeError);
    expect(() => fromJSON(null)).toThrow(TypeError);
  });

  it('names the path of unsupported values', () => {
    expect(() => fromJSON({ a: { b: [1, undefined] } })).toThrow(
      "Unsupported undefined value at 'a.b[1]'",
    );
    expect(() => fromJSON({ when: new Date(0) })).toThrow("Unsupported object value at 'when'");
    expect(() => fromJSON({ n: Number.POSITIVE_INFINITY })).toThrow(
      "Non-finite number at 'n' cannot be represented",
    );
  });
});

describe('valueKind', () => {
  it.each<[Value, string]>([
    [null, 'null'],
    [true, 'bool'],
    [1.5, 'number'],
    ['s', 'string'],
    [[], 'array'],
    [new Map(), 'map'],
  ])('tags %j', (value, kind) => {
    expect(valueKind(value)).toBe(kind);
  });
});
