/**
 * JSON Parser
 *
 * Parses fixture files and response bodies. Strict: anything that is not
 * valid JSON is rejected. Numbers keep their source text, so `1.0` and `1`
 * or two integers beyond 2^53 never print the same.
 */

import { LosslessNumber, parse, stringify } from 'lossless-json';
import { JsonObject, JsonValue } from '../core/types';

const BOM = '\uFEFF';

/**
 * Parse a JSON string into a JsonValue.
 * A leading BOM is dropped; surrounding whitespace is ignored.
 */
export function parseJson(input: string): JsonValue {
  const cleaned = input.startsWith(BOM) ? input.substring(BOM.length) : input;

  try {
    return toJsonValue(parse(cleaned, undefined, parseNumber));
  } catch (error) {
    throw new Error(
      `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Pretty-print a value the way golden fixtures are written and compared.
 */
export function toPrettyJson(value: JsonValue, indent: number = 4): string {
  return print(value, indent);
}

/**
 * Compact form, used for request bodies.
 */
export function toJson(value: JsonValue): string {
  return print(value, undefined);
}

/**
 * Source text of a number, as it was parsed or as `number` prints it.
 */
export function numberText(value: number | LosslessNumber): string {
  return typeof value === 'number' ? String(value) : value.value;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function parseNumber(text: string): number | LosslessNumber {
  const value = Number(text);
  return String(value) === text ? value : new LosslessNumber(text);
}

function print(value: JsonValue, indent: number | undefined): string {
  const text = stringify(value, undefined, indent);
  if (text === undefined) {
    throw new Error('Value has no JSON representation');
  }
  return text;
}

function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof LosslessNumber
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (typeof value === 'object') {
    const object: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      object[key] = toJsonValue(item);
    }
    return object;
  }
  throw new Error(`Unsupported JSON value: ${String(value)}`);
}
