import { ENVIRONMENTS, Environment } from '../core/types';

/**
 * Normalize operator input to a known environment, or null when it is not one.
 */
export function parseEnvironment(input: string): Environment | null {
  const normalized = input.trim().toLowerCase();
  return ENVIRONMENTS.find((env) => env === normalized) ?? null;
}

