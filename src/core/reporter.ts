/**
 * Report Generator
 *
 * Console lines for single differences (printed as they are found) and
 * whole-run reports in console, JSON and Markdown formats.
 */

import chalk from 'chalk';
import {
  CompletedRun,
  DifferenceReport,
  ReportFormat,
  StructuralDifferenceKind,
} from './types';

export const DIFFERENCE_MARKER = 'Found difference: ';

const KIND_LABEL: Record<StructuralDifferenceKind, string> = {
  value_changed: 'Changed value',
  value_added: 'Added value',
  value_removed: 'Removed value',
  array_length_changed: 'Array length changed',
  array_element_added: 'Array element added',
  array_element_removed: 'Array element removed',
};

// ─── Single Difference ──────────────────────────────────────────────────────

/**
 * Format one difference for the console. Line differences carry the
 * actual-side text only.
 */
export function formatDifference(difference: DifferenceReport): string {
  if (difference.kind === 'line') {
    return `${chalk.yellow(DIFFERENCE_MARKER)}${difference.actual}`;
  }

  const lines = [
    `${chalk.yellow(DIFFERENCE_MARKER)}${KIND_LABEL[difference.kind]} at '${chalk.bold(displayPath(difference.path))}'`,
  ];
  if (difference.expected !== undefined) lines.push(`    - ${chalk.green(difference.expected)}`);
  if (difference.actual !== undefined) lines.push(`    + ${chalk.red(difference.actual)}`);
  return lines.join('\n');
}

function displayPath(path: string): string {
  return path === '' ? '/' : path;
}

function describeDifference(difference: DifferenceReport): string {
  if (difference.kind === 'line') {
    return `line ${difference.line}: \`${difference.actual.trim()}\``;
  }
  const values = [
    difference.expected !== undefined ? `expected \`${difference.expected}\`` : '',
    difference.actual !== undefined ? `actual \`${difference.actual}\`` : '',
  ]
    .filter(Boolean)
    .join(', ');
  return `${KIND_LABEL[difference.kind]} at \`${displayPath(difference.path)}\`${values ? ` (${values})` : ''}`;
}

// ─── Format Run ─────────────────────────────────────────────────────────────

/**
 * Format a completed run in the specified format.
 */
export function formatRun(run: CompletedRun, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return formatJson(run);
    case 'markdown':
      return formatMarkdown(run);
    case 'console':
    default:
      return formatConsole(run);
  }
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(run: CompletedRun): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);
  const { checked, changed, unchanged, skipped, differences } = run.summary;

  lines.push('');
  lines.push(chalk.gray(bar));
  for (const skip of run.skipped) {
    lines.push(chalk.gray(`  ⏭  Skipped ${skip.microservice}: ${skip.reason}`));
  }
  for (const result of run.results.filter((r) => r.differences.length > 0)) {
    lines.push(chalk.red(`  ❌ ${result.url} (${result.differences.length} differences)`));
  }
  if (checked > 0 && changed === 0) {
    lines.push(chalk.green('  ✅ No differences detected'));
  }
  lines.push(chalk.gray(bar));
  lines.push(
    `Checked ${checked} endpoints on ${run.environment}: ` +
      `${chalk.red(`${changed} changed`)} | ${chalk.green(`${unchanged} unchanged`)} | ` +
      `${skipped} skipped | ${differences} differences`
  );

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(run: CompletedRun): string {
  return JSON.stringify(run, null, 2);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function formatMarkdown(run: CompletedRun): string {
  const lines: string[] = [];

  lines.push(`# Release Sanity Check: ${run.environment}`);
  lines.push('');
  lines.push(`**Mode:** ${run.mode}`);
  lines.push(
    `**Summary:** ${run.summary.changed} changed | ${run.summary.unchanged} unchanged | ${run.summary.skipped} skipped`
  );
  lines.push('');

  const changed = run.results.filter((r) => r.differences.length > 0);
  if (changed.length === 0) {
    lines.push('✅ **No differences detected**');
  }

  for (const result of changed) {
    lines.push(`## ${result.microservice} \`${result.endpoint}\``);
    lines.push('');
    lines.push(`POST ${result.url}`);
    lines.push('');
    for (const difference of result.differences) {
      lines.push(`- ${describeDifference(difference)}`);
    }
    lines.push('');
  }

  if (run.skipped.length > 0) {
    lines.push('## Skipped');
    lines.push('');
    for (const skip of run.skipped) {
      lines.push(`- **${skip.microservice}**: ${skip.reason}`);
    }
  }

  return lines.join('\n').trimEnd();
}

