/**
 * Endpoint Catalog
 *
 * Read-only view over a SanityConfig: which microservices an environment
 * has, and which endpoints each of them declares.
 */

import { z } from 'zod';
import { SanityConfig } from './config-loader';
import { EndpointResolution, Environment, MicroserviceEntry } from '../core/types';

const MicroserviceSectionSchema = z.object({
  endpoints: z.string({
    required_error: 'missing "endpoints" key',
    invalid_type_error: '"endpoints" must be a comma-separated list',
  }),
  ignore_paths: z
    .string({ invalid_type_error: '"ignore_paths" must be a comma-separated list' })
    .optional(),
});

export interface EndpointCatalog {
  microservicesFor(environment: Environment): readonly MicroserviceEntry[];
  resolveEndpoints(microservice: string): EndpointResolution;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function createCatalog(config: SanityConfig): EndpointCatalog {
  return {
    microservicesFor(environment) {
      return config.environments[environment] ?? [];
    },

    resolveEndpoints(microservice) {
      if (!Object.prototype.hasOwnProperty.call(config.sections, microservice)) {
        return { ok: false, reason: `no [${microservice}] section` };
      }
      const section = config.sections[microservice];

      const parsed = MicroserviceSectionSchema.safeParse(section);
      if (!parsed.success) {
        return { ok: false, reason: parsed.error.issues[0].message };
      }

      const endpoints = splitList(parsed.data.endpoints);
      if (endpoints.length === 0) {
        return { ok: false, reason: 'no endpoints declared' };
      }

      return {
        ok: true,
        endpoints,
        ignorePaths: parsed.data.ignore_paths ? splitList(parsed.data.ignore_paths) : [],
      };
    },
  };
}
