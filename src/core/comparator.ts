/**
 * Response Comparison Engine
 *
 * Compares a live response with its golden fixture and returns one
 * DifferenceReport per mismatch. Two strategies:
 *
 * - line:       positional comparison of the 4-space pretty-printed texts.
 *               Only the actual-side line is reported, and lines past the end
 *               of the shorter text are never compared.
 * - structural: recursive key/value comparison with path-qualified results.
 */

import {
  CompareOptions,
  DifferenceReport,
  JsonObject,
  JsonValue,
  LineDifference,
  StructuralDifference,
  StructuralDifferenceKind,
} from './types';
import { LosslessNumber } from 'lossless-json';
import { numberText, toPrettyJson } from '../formats/json';

const LINE_INDENT = 4;
const MAX_DEPTH = 10;
const MAX_VALUE_LENGTH = 50;

// ─── Entry Point ────────────────────────────────────────────────────────────

/**
 * Compare an actual response with the expected one.
 */
export function compare(
  actual: JsonValue,
  expected: JsonValue,
  options: CompareOptions = {}
): DifferenceReport[] {
  if (options.mode === 'structural') {
    return compareStructures(actual, expected, options.ignorePaths ?? []);
  }
  return compareLines(actual, expected);
}

// ─── Line Mode ──────────────────────────────────────────────────────────────

export function compareLines(actual: JsonValue, expected: JsonValue): LineDifference[] {
  const actualLines = toPrettyJson(actual, LINE_INDENT).split('\n');
  const expectedLines = toPrettyJson(expected, LINE_INDENT).split('\n');
  const paired = Math.min(actualLines.length, expectedLines.length);

  const differences: LineDifference[] = [];
  for (let i = 0; i < paired; i++) {
    if (actualLines[i] !== expectedLines[i]) {
      differences.push({ kind: 'line', line: i + 1, actual: actualLines[i] });
    }
  }
  return differences;
}

// ─── Structural Mode ────────────────────────────────────────────────────────

export function compareStructures(
  actual: JsonValue,
  expected: JsonValue,
  ignorePaths: string[] = []
): StructuralDifference[] {
  const differences: StructuralDifference[] = [];
  diffValues('', expected, actual, ignorePaths, 0, differences);
  return differences;
}

function diffValues(
  path: string,
  expected: JsonValue,
  actual: JsonValue,
  ignorePaths: string[],
  depth: number,
  out: StructuralDifference[]
): void {
  if (depth > MAX_DEPTH || isIgnored(path, ignorePaths)) return;

  if (isJsonObject(expected) && isJsonObject(actual)) {
    diffObjects(path, expected, actual, ignorePaths, depth, out);
  } else if (Array.isArray(expected) && Array.isArray(actual)) {
    diffArrays(path, expected, actual, out);
  } else if (!deepEqual(expected, actual)) {
    out.push(change('value_changed', path, expected, actual));
  }
}

function diffObjects(
  path: string,
  expected: JsonObject,
  actual: JsonObject,
  ignorePaths: string[],
  depth: number,
  out: StructuralDifference[]
): void {
  for (const key of Object.keys(expected)) {
    const fieldPath = buildPath(path, key);
    if (!Object.prototype.hasOwnProperty.call(actual, key)) {
      out.push(change('value_removed', fieldPath, expected[key], undefined));
    } else {
      diffValues(fieldPath, expected[key], actual[key], ignorePaths, depth + 1, out);
    }
  }

  for (const key of Object.keys(actual)) {
    if (!Object.prototype.hasOwnProperty.call(expected, key)) {
      out.push(change('value_added', buildPath(path, key), undefined, actual[key]));
    }
  }
}

/**
 * Arrays are compared as multisets: element order does not matter.
 */
function diffArrays(
  path: string,
  expected: JsonValue[],
  actual: JsonValue[],
  out: StructuralDifference[]
): void {
  if (expected.length !== actual.length) {
    out.push({
      kind: 'array_length_changed',
      path,
      expected: `length: ${expected.length}`,
      actual: `length: ${actual.length}`,
    });
  }

  const matchedExpected = new Array<boolean>(expected.length).fill(false);
  const matchedActual = new Array<boolean>(actual.length).fill(false);

  expected.forEach((item, i) => {
    const j = actual.findIndex((candidate, k) => !matchedActual[k] && deepEqual(item, candidate));
    if (j !== -1) {
      matchedExpected[i] = true;
      matchedActual[j] = true;
    }
  });

  const elementPath = `${path}[*]`;
  expected.forEach((item, i) => {
    if (!matchedExpected[i]) out.push(change('array_element_removed', elementPath, item, undefined));
  });
  actual.forEach((item, j) => {
    if (!matchedActual[j]) out.push(change('array_element_added', elementPath, undefined, item));
  });
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function change(
  kind: StructuralDifferenceKind,
  path: string,
  expected: JsonValue | undefined,
  actual: JsonValue | undefined
): StructuralDifference {
  const difference: StructuralDifference = { kind, path };
  if (expected !== undefined) difference.expected = formatValue(expected);
  if (actual !== undefined) difference.actual = formatValue(actual);
  return difference;
}

function buildPath(base: string, key: string): string {
  return base ? `${base}/${key}` : key;
}

/**
 * A configured path ignores the node itself and, unless it is '/', every
 * node below it.
 */
export function isIgnored(path: string, ignorePaths: string[]): boolean {
  const current = `/${path}`;
  for (const raw of ignorePaths) {
    if (raw === current) return true;
    if (raw === '/') continue;

    const ignored = raw.endsWith('/') ? raw.slice(0, -1) : raw;
    if (current === ignored || current.startsWith(`${ignored}/`)) return true;
  }
  return false;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) &&
    !(value instanceof LosslessNumber)
  );
}

/**
 * Numbers are equal when their source text is: `1.0` differs from `1`.
 */
export function deepEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;

  if (isNumber(a) && isNumber(b)) {
    return numberText(a) === numberText(b);
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key])
    );
  }

  return false;
}

function isNumber(value: JsonValue): value is number | LosslessNumber {
  return typeof value === 'number' || value instanceof LosslessNumber;
}

/**
 * Render a value compactly for a report line.
 */
export function formatValue(value: JsonValue, maxLength: number = MAX_VALUE_LENGTH): string {
  if (typeof value === 'string') {
    return value.length > maxLength ? `"${value.substring(0, maxLength)}..."` : `"${value}"`;
  }
  if (Array.isArray(value)) return `Array[${value.length}]`;
  if (isJsonObject(value)) return `Object{${Object.keys(value).length} keys}`;

  const text = String(value);
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
}
