/**
 * Configuration Loader
 *
 * Reads the INI configuration into an immutable SanityConfig:
 *
 *   [urls-<environment>]      microservice name → base URL
 *   [<microservice>]          endpoints = /a, /b   (ignore_paths = /x optional)
 *
 * A value may continue on indented lines below its key, and a dotted
 * section name such as [orders.api] names one microservice.
 *
 * Only the environment sections are validated here. Microservice sections
 * are validated lazily by the catalog, so one bad entry never fails the load.
 */

import * as fs from 'fs';
import { parse } from 'ini';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../core/errors';
import { MicroserviceEntry } from '../core/types';

const ENV_SECTION_PREFIX = 'urls-';

const SectionSchema = z.record(z.string(), z.unknown());

const EnvironmentSectionSchema = z.record(
  z.string(),
  z.string({ invalid_type_error: 'base URL must be a string' }).min(1, 'base URL is empty')
);

export interface SanityConfig {
  /** Microservices per environment name, in file order */
  readonly environments: Readonly<Record<string, readonly MicroserviceEntry[]>>;

  /** Raw key/value pairs of every other section */
  readonly sections: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
}

/**
 * Parse configuration text. Keys outside any section are ignored.
 */
export function parseConfig(text: string): SanityConfig {
  const environments: Record<string, readonly MicroserviceEntry[]> = {};
  const sections: Record<string, Readonly<Record<string, unknown>>> = {};

  for (const [name, section] of flattenSections(parse(joinContinuationLines(text)))) {
    if (name.startsWith(ENV_SECTION_PREFIX)) {
      const urls = EnvironmentSectionSchema.safeParse(section);
      if (!urls.success) {
        const issue = urls.error.issues[0];
        throw new ConfigError(
          `Invalid section [${name}]: "${issue.path.join('.')}" ${issue.message}`
        );
      }

      environments[name.substring(ENV_SECTION_PREFIX.length)] = Object.freeze(
        Object.entries(urls.data).map(([microservice, baseUrl]) =>
          Object.freeze({ name: microservice, baseUrl })
        )
      );
    } else {
      sections[name] = Object.freeze({ ...section });
    }
  }

  return Object.freeze({
    environments: Object.freeze(environments),
    sections: Object.freeze(sections),
  });
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Fold lines indented deeper than the key above them into its value:
 *
 *   endpoints = /list,
 *       /detail          →   endpoints = /list, /detail
 */
export function joinContinuationLines(text: string): string {
  const lines: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    const previous = lines.length - 1;
    if (
      trimmed !== '' &&
      !/^[;#]/.test(trimmed) &&
      previous >= 0 &&
      isKeyLine(lines[previous]) &&
      indentOf(line) > indentOf(lines[previous])
    ) {
      lines[previous] = `${lines[previous]} ${trimmed}`;
    } else {
      lines.push(line);
    }
  }
  return lines.join('\n');
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function isKeyLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.includes('=') && !/^[;#[]/.test(trimmed);
}

/**
 * The ini parser nests [a.b] under [a]; give every section back its full name.
 * Sections come out parent first.
 */
function flattenSections(parsed: Record<string, unknown>): Array<[string, Record<string, unknown>]> {
  const flat: Array<[string, Record<string, unknown>]> = [];

  const visit = (name: string, section: Record<string, unknown>): void => {
    const own: Record<string, unknown> = {};
    const children: Array<[string, Record<string, unknown>]> = [];

    for (const [key, value] of Object.entries(section)) {
      const child = SectionSchema.safeParse(value);
      if (child.success) {
        children.push([`${name}.${key}`, child.data]);
      } else {
        own[key] = value;
      }
    }

    // a parent that only exists because of its dotted children is no section
    if (Object.keys(own).length > 0 || children.length === 0) flat.push([name, own]);
    for (const [childName, child] of children) visit(childName, child);
  };

  for (const [name, value] of Object.entries(parsed)) {
    const section = SectionSchema.safeParse(value);
    if (section.success) visit(name, section.data);
  }
  return flat;
}

/**
 * Read and parse a configuration file.
 */
export function loadConfig(filePath: string): SanityConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseConfig(text);
}
