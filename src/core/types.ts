/**
 * Canonical type definitions for release-sanity-checker.
 * These types are shared by the catalog, the comparison engine and the reporter.
 */

import type { LosslessNumber } from 'lossless-json';

// ─── JSON Values ────────────────────────────────────────────────────────────

/**
 * A number whose source text does not survive a round trip through `number`
 * (`1.0`, `1e3`, integers beyond 2^53) is kept as a LosslessNumber.
 */
export type JsonPrimitive = string | number | boolean | null | LosslessNumber;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ─── Environments & Catalog ─────────────────────────────────────────────────

export const ENVIRONMENTS = ['svil', 'test', 'prod'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface MicroserviceEntry {
  /** Section name of the microservice in the configuration file */
  name: string;

  /** Base URL the endpoint paths are appended to */
  baseUrl: string;
}

/**
 * Outcome of resolving the endpoint list of one microservice.
 * A failure is a value, never an exception: the run skips the entry and goes on.
 */
export type EndpointResolution =
  | { ok: true; endpoints: string[]; ignorePaths: string[] }
  | { ok: false; reason: string };

// ─── Fixtures ───────────────────────────────────────────────────────────────

export interface FixturePair {
  /** Request body sent to the endpoint */
  request: JsonValue;

  /** Golden response the live one is compared with */
  expected: JsonValue;
}

export interface FixtureLoader {
  /** Load the request and expected-response fixtures for an endpoint path */
  load(endpoint: string): Promise<FixturePair>;

  /** Load only the request fixture, for endpoints without a golden response yet */
  loadRequest(endpoint: string): Promise<JsonValue>;

  /** Overwrite the expected-response fixture for an endpoint path */
  saveExpected(endpoint: string, response: JsonValue): Promise<void>;
}

// ─── Transport ──────────────────────────────────────────────────────────────

export interface Transport {
  /** POST a JSON body and return the parsed JSON response */
  send(url: string, body: JsonValue): Promise<JsonValue>;
}

// ─── Comparison ─────────────────────────────────────────────────────────────

export type CompareMode = 'line' | 'structural';

export type StructuralDifferenceKind =
  | 'value_changed'
  | 'value_added'
  | 'value_removed'
  | 'array_length_changed'
  | 'array_element_added'
  | 'array_element_removed';

export interface LineDifference {
  kind: 'line';

  /** 1-based line number in the serialized text */
  line: number;

  /** The actual-side line, as serialized */
  actual: string;
}

export interface StructuralDifference {
  kind: StructuralDifferenceKind;

  /** Slash-separated path to the node ('' for the root) */
  path: string;

  /** Rendered expected value (absent for additions) */
  expected?: string;

  /** Rendered actual value (absent for removals) */
  actual?: string;
}

export type DifferenceReport = LineDifference | StructuralDifference;

export interface CompareOptions {
  /** Comparison strategy (default: 'line') */
  mode?: CompareMode;

  /** Paths excluded from structural comparison, e.g. '/meta/timestamp' */
  ignorePaths?: string[];
}

// ─── Run Results ────────────────────────────────────────────────────────────

export interface EndpointTarget {
  microservice: string;
  endpoint: string;

  /** Base URL and endpoint path, concatenated as-is */
  url: string;
}

export interface EndpointResult extends EndpointTarget {
  differences: DifferenceReport[];
}

export interface SkippedMicroservice {
  microservice: string;
  reason: string;
}

export interface RunSummary {
  checked: number;
  changed: number;
  unchanged: number;
  skipped: number;
  differences: number;
}

export type RunResult =
  | { status: 'aborted'; reason: 'invalid_environment'; input: string }
  | {
      status: 'completed';
      environment: Environment;
      mode: CompareMode;
      results: EndpointResult[];
      skipped: SkippedMicroservice[];
      summary: RunSummary;
    };

export type CompletedRun = Extract<RunResult, { status: 'completed' }>;

export type RecordResult =
  | { status: 'aborted'; reason: 'invalid_environment'; input: string }
  | {
      status: 'completed';
      environment: Environment;
      recorded: EndpointTarget[];
      skipped: SkippedMicroservice[];
    };

// ─── Report Format ──────────────────────────────────────────────────────────

export type ReportFormat = 'console' | 'json' | 'markdown';
