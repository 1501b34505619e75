#!/usr/bin/env node

/**
 * release-sanity-checker CLI
 *
 * Commands:
 *   check      - Compare live responses with golden fixtures (default)
 *   record     - Store live responses as the new golden fixtures
 *   endpoints  - List the endpoints an environment would check
 */

import { Command, InvalidArgumentError } from 'commander';
import { SanityChecker } from './checker';
import { parseEnvironment } from './config/environment';
import { errorMessage } from './core/errors';
import { formatDifference, formatRun } from './core/reporter';
import { CompareMode, ReportFormat } from './core/types';
import { promptEnvironment } from './prompt';
import { HttpTransport } from './transport/http-transport';

interface CommonOptions {
  env?: string;
  config: string;
  root: string;
  timeout: number;
}

interface CheckOptions extends CommonOptions {
  mode: CompareMode;
  format: ReportFormat;
  failOnDiff?: boolean;
}

const program = new Command();

program
  .name('release-sanity-checker')
  .description('Compare live microservice responses with recorded golden responses.')
  .version('1.0.0');

// ─── Option Parsers ─────────────────────────────────────────────────────────

function parseMode(value: string): CompareMode {
  switch (value) {
    case 'line':
    case 'structural':
      return value;
    default:
      throw new InvalidArgumentError('Allowed modes: line, structural.');
  }
}

function parseFormat(value: string): ReportFormat {
  switch (value) {
    case 'console':
    case 'json':
    case 'markdown':
      return value;
    default:
      throw new InvalidArgumentError('Allowed formats: console, json, markdown.');
  }
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError('Timeout must be a whole number of milliseconds.');
  }
  return ms;
}

function fail(error: unknown): never {
  console.error(`❌ Error: ${errorMessage(error)}`);
  process.exit(1);
}

// ─── check Command ──────────────────────────────────────────────────────────

program
  .command('check', { isDefault: true })
  .description('Send every request fixture and compare the responses with the golden ones')
  .option('-e, --env <env>', 'Environment to check (prompted when omitted)')
  .option('-c, --config <file>', 'Configuration file', 'config.ini')
  .option('-r, --root <dir>', 'Directory holding requests/ and responses/', '.')
  .option('-t, --timeout <ms>', 'Request timeout in ms, 0 for none', parseTimeout, 0)
  .option('-m, --mode <mode>', 'Comparison mode: line, structural', parseMode, 'line')
  .option('-f, --format <format>', 'Report format: console, json, markdown', parseFormat, 'console')
  .option('--fail-on-diff', 'Exit with code 1 when differences are found')
  .action(async (opts: CheckOptions) => {
    try {
      const environment = opts.env ?? (await promptEnvironment());

      // the configuration is read only once the environment is valid
      const checker = new SanityChecker({
        config: opts.config,
        fixtures: opts.root,
        transport: new HttpTransport({ timeoutMs: opts.timeout }),
        mode: opts.mode,
        onDifference:
          opts.format === 'console' ? (difference) => console.log(formatDifference(difference)) : undefined,
      });

      const run = await checker.run(environment);
      if (run.status === 'aborted') return;

      console.log(formatRun(run, opts.format));

      if (opts.failOnDiff && run.summary.differences > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── record Command ─────────────────────────────────────────────────────────

program
  .command('record')
  .description('Send every request fixture and store the responses as the golden ones')
  .option('-e, --env <env>', 'Environment to record (prompted when omitted)')
  .option('-c, --config <file>', 'Configuration file', 'config.ini')
  .option('-r, --root <dir>', 'Directory holding requests/ and responses/', '.')
  .option('-t, --timeout <ms>', 'Request timeout in ms, 0 for none', parseTimeout, 0)
  .action(async (opts: CommonOptions) => {
    try {
      const environment = opts.env ?? (await promptEnvironment());

      const checker = new SanityChecker({
        config: opts.config,
        fixtures: opts.root,
        transport: new HttpTransport({ timeoutMs: opts.timeout }),
      });
      const result = await checker.record(environment);
      if (result.status === 'aborted') return;

      console.log(`✅ Recorded ${result.recorded.length} responses on ${result.environment}`);
      for (const skip of result.skipped) {
        console.log(`   Skipped ${skip.microservice}: ${skip.reason}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── endpoints Command ──────────────────────────────────────────────────────

program
  .command('endpoints')
  .description('List the endpoints an environment would check')
  .requiredOption('-e, --env <env>', 'Environment to list')
  .option('-c, --config <file>', 'Configuration file', 'config.ini')
  .action((opts: { env: string; config: string }) => {
    const environment = parseEnvironment(opts.env);
    if (!environment) {
      fail(new Error(`Unknown environment "${opts.env}"`));
    }

    try {
      const { targets, skipped } = new SanityChecker({ config: opts.config }).plan(environment);

      if (targets.length === 0 && skipped.length === 0) {
        console.log(`📭 No microservices configured for ${environment}.`);
        return;
      }

      console.log(`📋 Endpoints on ${environment} (${targets.length}):\n`);
      for (const target of targets) {
        console.log(`  • ${target.microservice}  POST ${target.url}`);
      }
      for (const skip of skipped) {
        console.log(`  ⏭  ${skip.microservice}: ${skip.reason}`);
      }
    } catch (error) {
      fail(error);
    }
  });

// ─── Run ────────────────────────────────────────────────────────────────────

program.parseAsync().catch(fail);
