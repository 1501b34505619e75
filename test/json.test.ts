/**
 * Tests for the JSON Parser
 */

import { LosslessNumber } from 'lossless-json';
import { numberText, parseJson, toJson, toPrettyJson } from '../src/formats/json';

describe('parseJson', () => {
  test('drops a BOM in front of leading whitespace', () => {
    expect(parseJson('\uFEFF  {"status": "ok"}\n')).toEqual({ status: 'ok' });
  });

  test('keeps plain numbers as numbers', () => {
    expect(parseJson('{"n": 2, "x": -0.5}')).toEqual({ n: 2, x: -0.5 });
  });

  test('keeps numbers that would lose their text as source text', () => {
    const value = parseJson('[9007199254740993, 1.0]');

    expect(Array.isArray(value) && value.map((item) => item instanceof LosslessNumber)).toEqual([true, true]);
    expect(toJson(value)).toBe('[9007199254740993,1.0]');
  });

  test('rejects invalid JSON', () => {
    expect(() => parseJson('{"id":1,}')).toThrow('Failed to parse JSON');
    expect(() => parseJson('')).toThrow('Failed to parse JSON');
  });
});

describe('toPrettyJson', () => {
  test('indents with four spaces by default', () => {
    expect(toPrettyJson({ a: [1], b: {} })).toBe('{\n    "a": [\n        1\n    ],\n    "b": {}\n}');
  });
});

describe('numberText', () => {
  test('renders both number forms', () => {
    expect(numberText(3)).toBe('3');
    const big = parseJson('12345678901234567890');
    expect(big instanceof LosslessNumber && numberText(big)).toBe('12345678901234567890');
  });
});
