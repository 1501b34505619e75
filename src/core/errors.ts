/**
 * Error types for release-sanity-checker.
 *
 * Every error thrown out of a run is fatal and ends it. Per-microservice
 * resolution failures are not errors: see EndpointResolution.
 */

export class FatalRunError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalRunError';

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends FatalRunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class FixtureError extends FatalRunError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FixtureError';
    this.filePath = filePath;
  }
}

export class TransportError extends FatalRunError {
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.url = url;
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
