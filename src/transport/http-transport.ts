/**
 * HTTP Transport
 *
 * POSTs a JSON body and returns the parsed JSON response. No retries.
 * Any failure is a TransportError and ends the run.
 */

import axios, { AxiosInstance } from 'axios';
import { TransportError, errorMessage } from '../core/errors';
import { JsonValue, Transport } from '../core/types';
import { parseJson, toJson } from '../formats/json';
import { Logger, logger as defaultLogger } from '../logger';

export interface HttpTransportOptions {
  /** Request timeout in ms; 0 (the default) waits indefinitely */
  timeoutMs?: number;

  /** Preconfigured axios instance, e.g. with a custom adapter */
  client?: AxiosInstance;

  logger?: Logger;
}

export class HttpTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions = {}) {
    this.client = options.client ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 0;
    this.logger = options.logger ?? defaultLogger;
  }

  async send(url: string, body: JsonValue): Promise<JsonValue> {
    this.logger.info(`Sending request to ${url}`);

    let status: number;
    let text: string;
    try {
      const response = await this.client.post<string>(url, toJson(body), {
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        timeout: this.timeoutMs,
        responseType: 'text',
        // the body is parsed below, strictly
        transformResponse: [(data: string) => data],
        validateStatus: () => true,
      });
      status = response.status;
      text = response.data;
    } catch (error) {
      throw new TransportError(`Request to ${url} failed: ${errorMessage(error)}`, url, undefined, {
        cause: error,
      });
    }

    if (status < 200 || status >= 300) {
      throw new TransportError(`Request to ${url} returned HTTP ${status}`, url, status);
    }

    try {
      return parseJson(text);
    } catch (error) {
      throw new TransportError(
        `Response from ${url} is not JSON: ${errorMessage(error)}`,
        url,
        status,
        { cause: error }
      );
    }
  }
}
