/**
 * SanityChecker — Main API
 *
 * Drives one run for one environment: every microservice of the environment,
 * every endpoint of each microservice, one request at a time.
 *
 * - check:  send each request fixture and compare the live response with
 *           the golden one
 * - record: send each request fixture and store the live response as the
 *           new golden one
 */

import { EndpointCatalog, createCatalog } from './config/catalog';
import { SanityConfig, loadConfig } from './config/config-loader';
import { parseEnvironment } from './config/environment';
import { compare } from './core/comparator';
import {
  CompareMode,
  DifferenceReport,
  EndpointResult,
  EndpointTarget,
  Environment,
  FixtureLoader,
  MicroserviceEntry,
  RecordResult,
  RunResult,
  RunSummary,
  SkippedMicroservice,
  Transport,
} from './core/types';
import { Logger, logger as defaultLogger } from './logger';
import { FileFixtureStore } from './store/fixture-store';
import { HttpTransport } from './transport/http-transport';

export interface SanityCheckerOptions {
  /**
   * Parsed configuration, or the path of the INI file. A path is read once,
   * after the environment has been validated.
   */
  config: string | SanityConfig;

  /** Fixture root directory or a custom FixtureLoader (default: '.') */
  fixtures?: string | FixtureLoader;

  /** Transport for live requests (default: HttpTransport) */
  transport?: Transport;

  /** Comparison strategy (default: 'line') */
  mode?: CompareMode;

  logger?: Logger;

  /** Called for every difference as soon as it is found */
  onDifference?: (difference: DifferenceReport, target: EndpointTarget) => void;
}

type EndpointVisitor = (target: EndpointTarget, ignorePaths: string[]) => Promise<void>;

// ─── SanityChecker Class ────────────────────────────────────────────────────

export class SanityChecker {
  private readonly config: string | SanityConfig;
  private loadedCatalog?: EndpointCatalog;
  private readonly fixtures: FixtureLoader;
  private readonly transport: Transport;
  private readonly mode: CompareMode;
  private readonly logger: Logger;
  private readonly onDifference?: SanityCheckerOptions['onDifference'];

  constructor(options: SanityCheckerOptions) {
    this.config = options.config;

    if (typeof options.fixtures === 'string' || options.fixtures === undefined) {
      this.fixtures = new FileFixtureStore(options.fixtures ?? '.');
    } else {
      this.fixtures = options.fixtures;
    }

    this.logger = options.logger ?? defaultLogger;
    this.transport = options.transport ?? new HttpTransport({ logger: this.logger });
    this.mode = options.mode ?? 'line';
    this.onDifference = options.onDifference;
  }

  /**
   * Check every endpoint of an environment against its golden response.
   *
   * An unknown environment aborts before anything is read or sent,
   * the configuration file included.
   * Fixture and transport failures are thrown and end the run.
   */
  async run(environmentInput: string): Promise<RunResult> {
    const environment = parseEnvironment(environmentInput);
    if (!environment) {
      return { status: 'aborted', reason: 'invalid_environment', input: environmentInput };
    }

    const results: EndpointResult[] = [];
    const skipped = await this.forEachEndpoint(environment, async (target, ignorePaths) => {
      results.push(await this.checkEndpoint(target, ignorePaths));
    });

    return {
      status: 'completed',
      environment,
      mode: this.mode,
      results,
      skipped,
      summary: summarize(results, skipped),
    };
  }

  /**
   * Store the live response of every endpoint as its golden response.
   */
  async record(environmentInput: string): Promise<RecordResult> {
    const environment = parseEnvironment(environmentInput);
    if (!environment) {
      return { status: 'aborted', reason: 'invalid_environment', input: environmentInput };
    }

    const recorded: EndpointTarget[] = [];
    const skipped = await this.forEachEndpoint(environment, async (target) => {
      const request = await this.fixtures.loadRequest(target.endpoint);
      const actual = await this.transport.send(target.url, request);
      await this.fixtures.saveExpected(target.endpoint, actual);
      this.logger.info(`Recorded response of ${target.url}`);
      recorded.push(target);
    });

    return { status: 'completed', environment, recorded, skipped };
  }

  /**
   * Compare one endpoint. Fixtures are loaded fresh on every call.
   */
  async checkEndpoint(target: EndpointTarget, ignorePaths: string[] = []): Promise<EndpointResult> {
    const { request, expected } = await this.fixtures.load(target.endpoint);
    const actual = await this.transport.send(target.url, request);
    const differences = compare(actual, expected, { mode: this.mode, ignorePaths });

    for (const difference of differences) {
      this.onDifference?.(difference, target);
    }
    this.logger.debug(`${target.url}: ${differences.length} differences`);

    return { ...target, differences };
  }

  /**
   * List the endpoints an environment would check, without sending anything.
   */
  plan(environment: Environment): { targets: EndpointTarget[]; skipped: SkippedMicroservice[] } {
    const { endpoints, skipped } = this.resolve(environment);
    return { targets: endpoints.map((e) => e.target), skipped };
  }

  private get catalog(): EndpointCatalog {
    if (!this.loadedCatalog) {
      const config = typeof this.config === 'string' ? loadConfig(this.config) : this.config;
      this.loadedCatalog = createCatalog(config);
    }
    return this.loadedCatalog;
  }

  private resolve(environment: Environment): {
    endpoints: Array<{ target: EndpointTarget; ignorePaths: string[] }>;
    skipped: SkippedMicroservice[];
  } {
    const endpoints: Array<{ target: EndpointTarget; ignorePaths: string[] }> = [];
    const skipped: SkippedMicroservice[] = [];

    for (const entry of this.catalog.microservicesFor(environment)) {
      const resolution = this.catalog.resolveEndpoints(entry.name);
      if (!resolution.ok) {
        skipped.push({ microservice: entry.name, reason: resolution.reason });
        continue;
      }
      for (const endpoint of resolution.endpoints) {
        endpoints.push({ target: toTarget(entry, endpoint), ignorePaths: resolution.ignorePaths });
      }
    }

    return { endpoints, skipped };
  }

  private async forEachEndpoint(
    environment: Environment,
    visit: EndpointVisitor
  ): Promise<SkippedMicroservice[]> {
    const { endpoints, skipped } = this.resolve(environment);
    for (const skip of skipped) {
      this.logger.warn(`Skipping microservice ${skip.microservice}: ${skip.reason}`);
    }

    for (const { target, ignorePaths } of endpoints) {
      await visit(target, ignorePaths);
    }

    return skipped;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function toTarget(entry: MicroserviceEntry, endpoint: string): EndpointTarget {
  return { microservice: entry.name, endpoint, url: entry.baseUrl + endpoint };
}

function summarize(results: EndpointResult[], skipped: SkippedMicroservice[]): RunSummary {
  const changed = results.filter((r) => r.differences.length > 0).length;
  return {
    checked: results.length,
    changed,
    unchanged: results.length - changed,
    skipped: skipped.length,
    differences: results.reduce((total, r) => total + r.differences.length, 0),
  };
}
