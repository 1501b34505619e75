/**
 * File-based Fixture Store
 *
 * Request bodies and golden responses live side by side under one root,
 * addressed by the endpoint path:
 *
 *   <root>/
 *     requests<endpoint>.json    → body POSTed to the endpoint
 *     responses<endpoint>.json   → expected response
 *
 * e.g. endpoint '/orders/list' → requests/orders/list.json
 */

import * as fs from 'fs';
import * as path from 'path';
import { FixtureError, errorMessage } from '../core/errors';
import { FixtureLoader, FixturePair, JsonValue } from '../core/types';
import { parseJson, toPrettyJson } from '../formats/json';

export const REQUESTS_PREFIX = 'requests';
export const RESPONSES_PREFIX = 'responses';
export const FIXTURE_EXTENSION = '.json';

export class FileFixtureStore implements FixtureLoader {
  private readonly rootDir: string;

  constructor(rootDir: string = '.') {
    this.rootDir = path.resolve(rootDir);
  }

  /**
   * Path of the request fixture. Plain concatenation: no slash is added
   * between the prefix and the endpoint.
   */
  requestPath(endpoint: string): string {
    return path.join(this.rootDir, REQUESTS_PREFIX + endpoint + FIXTURE_EXTENSION);
  }

  responsePath(endpoint: string): string {
    return path.join(this.rootDir, RESPONSES_PREFIX + endpoint + FIXTURE_EXTENSION);
  }

  async load(endpoint: string): Promise<FixturePair> {
    const request = await this.loadRequest(endpoint);
    const expected = await this.readFixture(this.responsePath(endpoint));
    return { request, expected };
  }

  async loadRequest(endpoint: string): Promise<JsonValue> {
    return this.readFixture(this.requestPath(endpoint));
  }

  /**
   * Write a golden response, creating directories as needed.
   */
  async saveExpected(endpoint: string, response: JsonValue): Promise<void> {
    const filePath = this.responsePath(endpoint);
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, `${toPrettyJson(response)}\n`, 'utf-8');
    } catch (error) {
      throw new FixtureError(`Cannot write fixture ${filePath}: ${errorMessage(error)}`, filePath, {
        cause: error,
      });
    }
  }

  private async readFixture(filePath: string): Promise<JsonValue> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new FixtureError(`Cannot read fixture ${filePath}: ${errorMessage(error)}`, filePath, {
        cause: error,
      });
    }

    try {
      return parseJson(content);
    } catch (error) {
      throw new FixtureError(`Invalid fixture ${filePath}: ${errorMessage(error)}`, filePath, {
        cause: error,
      });
    }
  }
}
