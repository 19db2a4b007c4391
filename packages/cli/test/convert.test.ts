import { describe, expect, it } from 'vitest';
import { ConversionError, fromJsonText, printSource, toJsonText } from '../src/commands/convert.js';

describe('printSource', () => {
  it('resolves constants and drops comments', () => {
    expect(printSource('# ports\n@p = 80\nserver = { port = @p }', 'x.knit')).toBe(
      'server = {port = 80}',
    );
  });

  it('prints inline', () => {
    expect(printSource('a = 1\nb = 2', 'x.knit', { inline: true })).toBe('a = 1, b = 2');
  });

  it('prefixes parse errors with the file position', () => {
    expect(() => printSource('a =', 'x.knit')).toThrow(ConversionError);
    expect(() => printSource('a =', 'x.knit')).toThrow(
      'x.knit:1:4: Unexpected end of input in VALUE mode',
    );
  });
});

describe('toJsonText', () => {
  it('prints JSON with the requested indent', () => {
    expect(toJsonText('a = [1, {b = null}]', 'x.knit', { indent: 0 })).toBe('{"a":[1,{"b":null}]}');
    expect(toJsonText('a = 1', 'x.knit')).toBe('{\n  "a": 1\n}');
  });
});

describe('fromJsonText', () => {
  it('prints a JSON object as knit', () => {
    expect(fromJsonText('{"name": "knit", "n": [1, 2], "o": {}}', 'x.json')).toBe(
      'name = "knit"\nn = [1, 2]\no = {}',
    );
  });

  it('rejects JSON that is not an object', () => {
    expect(() => fromJsonText('[1]', 'x.json')).toThrow(
      'x.json: fromJSON requires a plain object at the top level',
    );
  });

  it('rejects invalid JSON', () => {
    expect(() => fromJsonText('{', 'x.json')).toThrow(/^x\.json: invalid JSON \(/);
  });
});
