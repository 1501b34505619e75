/**
 * Tests for the File Fixture Store
 */

import * as fs from 'fs';
import * as path from 'path';
import { FixtureError } from '../src/core/errors';
import { FileFixtureStore } from '../src/store/fixture-store';

const TEST_ROOT = path.join(__dirname, '.test-fixtures');

function writeFixture(relative: string, content: string): void {
  const filePath = path.join(TEST_ROOT, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
}

beforeEach(() => {
  if (fs.existsSync(TEST_ROOT)) {
    fs.rmSync(TEST_ROOT, { recursive: true, force: true });
  }
});

afterAll(() => {
  if (fs.existsSync(TEST_ROOT)) {
    fs.rmSync(TEST_ROOT, { recursive: true, force: true });
  }
});

describe('FileFixtureStore', () => {
  test('derives paths by concatenating prefix, endpoint and extension', () => {
    const store = new FileFixtureStore(TEST_ROOT);
    expect(store.requestPath('/orders/list')).toBe(path.join(TEST_ROOT, 'requests/orders/list.json'));
    expect(store.responsePath('/orders/list')).toBe(path.join(TEST_ROOT, 'responses/orders/list.json'));
    expect(store.requestPath('list')).toBe(path.join(TEST_ROOT, 'requestslist.json'));
  });

  test('loads the request and the expected response', async () => {
    writeFixture('requests/list.json', '{"id":1}');
    writeFixture('responses/list.json', '\uFEFF{"status":"ok"}\n');

    const store = new FileFixtureStore(TEST_ROOT);
    await expect(store.load('/list')).resolves.toEqual({
      request: { id: 1 },
      expected: { status: 'ok' },
    });
  });

  test('loads a request without an expected response', async () => {
    writeFixture('requests/list.json', '{"id":1}');

    const store = new FileFixtureStore(TEST_ROOT);
    await expect(store.loadRequest('/list')).resolves.toEqual({ id: 1 });
  });

  test('fails on a missing fixture', async () => {
    writeFixture('requests/list.json', '{"id":1}');

    const store = new FileFixtureStore(TEST_ROOT);
    const error = await store.load('/list').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FixtureError);
    expect(error).toHaveProperty('filePath', path.join(TEST_ROOT, 'responses/list.json'));
  });

  test('fails on invalid JSON', async () => {
    writeFixture('requests/list.json', '{"id":');
    writeFixture('responses/list.json', '{}');

    const store = new FileFixtureStore(TEST_ROOT);
    await expect(store.load('/list')).rejects.toThrow(
      `Invalid fixture ${path.join(TEST_ROOT, 'requests/list.json')}`
    );
  });

  test('rejects trailing commas', async () => {
    writeFixture('requests/list.json', '{"id":1,}');
    writeFixture('responses/list.json', '{}');

    const store = new FileFixtureStore(TEST_ROOT);
    await expect(store.load('/list')).rejects.toBeInstanceOf(FixtureError);
  });

  test('writes golden responses with four-space indentation', async () => {
    const store = new FileFixtureStore(TEST_ROOT);
    await store.saveExpected('/orders/new', { status: 'ok', items: [1] });

    const written = fs.readFileSync(path.join(TEST_ROOT, 'responses/orders/new.json'), 'utf-8');
    expect(written).toBe('{\n    "status": "ok",\n    "items": [\n        1\n    ]\n}\n');
  });
});
