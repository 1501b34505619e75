/**
 * release-sanity-checker
 *
 * Replay recorded requests against a release and compare the live
 * responses with golden fixtures.
 *
 * @example
 * ```typescript
 * import { SanityChecker, loadConfig, formatDifference } from 'release-sanity-checker';
 *
 * const checker = new SanityChecker({
 *   config: loadConfig('config.ini'),
 *   fixtures: './fixtures',
 *   mode: 'structural',
 *   onDifference: (difference) => console.log(formatDifference(difference)),
 * });
 *
 * const run = await checker.run('test');
 * ```
 */

// ─── Main API ───────────────────────────────────────────────────────────────
export { SanityChecker, SanityCheckerOptions } from './checker';

// ─── Core Types ─────────────────────────────────────────────────────────────
export {
  JsonValue,
  JsonObject,
  Environment,
  ENVIRONMENTS,
  MicroserviceEntry,
  EndpointResolution,
  FixturePair,
  FixtureLoader,
  Transport,
  CompareMode,
  CompareOptions,
  DifferenceReport,
  LineDifference,
  StructuralDifference,
  EndpointTarget,
  EndpointResult,
  RunResult,
  RecordResult,
  RunSummary,
  ReportFormat,
} from './core/types';
export { FatalRunError, ConfigError, FixtureError, TransportError } from './core/errors';

// ─── Core Engines (for advanced usage) ──────────────────────────────────────
export { compare, compareLines, compareStructures } from './core/comparator';
export { formatDifference, formatRun } from './core/reporter';

// ─── Configuration ──────────────────────────────────────────────────────────
export { loadConfig, parseConfig, SanityConfig } from './config/config-loader';
export { createCatalog, EndpointCatalog } from './config/catalog';
export { parseEnvironment } from './config/environment';

// ─── Fixtures & Transport ───────────────────────────────────────────────────
export { FileFixtureStore } from './store/fixture-store';
export { HttpTransport, HttpTransportOptions } from './transport/http-transport';
export { createLogger, Logger } from './logger';
