/**
 * Tests for configuration loading and the endpoint catalog
 */

import * as path from 'path';
import { createCatalog, splitList } from '../src/config/catalog';
import { joinContinuationLines, loadConfig, parseConfig } from '../src/config/config-loader';
import { parseEnvironment } from '../src/config/environment';
import { ConfigError } from '../src/core/errors';

const CONFIG = `
[urls-test]
orders = http://svc/
billing = http://billing/
ghost = http://ghost/

[urls-prod]
orders = https://orders.example.com

[orders]
endpoints = /list, /detail ,
ignore_paths = /meta/timestamp

[billing]
owner = payments
`;

describe('parseEnvironment', () => {
  test('accepts known environments case-insensitively', () => {
    expect(parseEnvironment('test')).toBe('test');
    expect(parseEnvironment(' PROD ')).toBe('prod');
    expect(parseEnvironment('Svil')).toBe('svil');
  });

  test('rejects anything else', () => {
    expect(parseEnvironment('staging')).toBeNull();
    expect(parseEnvironment('')).toBeNull();
  });
});

describe('parseConfig', () => {
  test('reads microservices per environment in file order', () => {
    const config = parseConfig(CONFIG);
    expect(config.environments.test).toEqual([
      { name: 'orders', baseUrl: 'http://svc/' },
      { name: 'billing', baseUrl: 'http://billing/' },
      { name: 'ghost', baseUrl: 'http://ghost/' },
    ]);
    expect(config.environments.prod).toEqual([
      { name: 'orders', baseUrl: 'https://orders.example.com' },
    ]);
  });

  test('returns a frozen value', () => {
    const config = parseConfig(CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.environments)).toBe(true);
    expect(Object.isFrozen(config.sections.orders)).toBe(true);
  });

  test('rejects an environment entry without a URL', () => {
    expect(() => parseConfig('[urls-test]\norders =\n')).toThrow(ConfigError);
    expect(() => parseConfig('[urls-test]\norders =\n')).toThrow(
      'Invalid section [urls-test]: "orders" base URL is empty'
    );
  });

  test('rejects an environment entry that is not a string', () => {
    expect(() => parseConfig('[urls-test]\norders\n')).toThrow(
      'Invalid section [urls-test]: "orders" base URL must be a string'
    );
  });
});

describe('INI dialect', () => {
  test('keeps dotted section names', () => {
    const catalog = createCatalog(
      parseConfig('[urls-test]\norders.api = http://svc/\n\n[orders.api]\nendpoints = /list\n')
    );
    expect(catalog.microservicesFor('test')).toEqual([{ name: 'orders.api', baseUrl: 'http://svc/' }]);
    expect(catalog.resolveEndpoints('orders.api')).toEqual({ ok: true, endpoints: ['/list'], ignorePaths: [] });
  });

  test('keeps a parent section next to its dotted child', () => {
    const config = parseConfig('[orders]\nendpoints = /a\n\n[orders.api]\nendpoints = /b\n');
    expect(Object.keys(config.sections)).toEqual(['orders', 'orders.api']);
    expect(config.sections.orders).toEqual({ endpoints: '/a' });
    expect(config.sections['orders.api']).toEqual({ endpoints: '/b' });
  });

  test('continues a value on indented lines', () => {
    const catalog = createCatalog(
      parseConfig('[urls-test]\norders = http://svc/\n\n[orders]\nendpoints = /list,\n    /detail\n')
    );
    expect(catalog.resolveEndpoints('orders')).toEqual({
      ok: true,
      endpoints: ['/list', '/detail'],
      ignorePaths: [],
    });
  });

  test('joins only lines indented deeper than their key', () => {
    expect(joinContinuationLines('[a]\nk = 1,\n  2\n  ; note\nj = 3')).toBe('[a]\nk = 1, 2\n  ; note\nj = 3');
    expect(joinContinuationLines('[a]\n  k = 1\n  j = 2')).toBe('[a]\n  k = 1\n  j = 2');
    expect(joinContinuationLines('[a]\n  k = 1')).toBe('[a]\n  k = 1');
  });
});

describe('loadConfig', () => {
  test('wraps read failures in a ConfigError', () => {
    const missing = path.join(__dirname, 'does-not-exist.ini');
    expect(() => loadConfig(missing)).toThrow(ConfigError);
    expect(() => loadConfig(missing)).toThrow(`Cannot read configuration ${missing}`);
  });
});

describe('EndpointCatalog', () => {
  const catalog = createCatalog(parseConfig(CONFIG));

  test('lists microservices of an environment', () => {
    expect(catalog.microservicesFor('test').map((m) => m.name)).toEqual(['orders', 'billing', 'ghost']);
  });

  test('returns no microservices for an environment without a section', () => {
    expect(catalog.microservicesFor('svil')).toEqual([]);
  });

  test('resolves trimmed endpoints and ignore paths', () => {
    expect(catalog.resolveEndpoints('orders')).toEqual({
      ok: true,
      endpoints: ['/list', '/detail'],
      ignorePaths: ['/meta/timestamp'],
    });
  });

  test('fails without an endpoints key', () => {
    expect(catalog.resolveEndpoints('billing')).toEqual({
      ok: false,
      reason: 'missing "endpoints" key',
    });
  });

  test('fails without a section', () => {
    expect(catalog.resolveEndpoints('ghost')).toEqual({ ok: false, reason: 'no [ghost] section' });
  });

  test('fails on an empty endpoint list', () => {
    const empty = createCatalog(parseConfig('[urls-test]\na = http://a/\n\n[a]\nendpoints = ,\n'));
    expect(empty.resolveEndpoints('a')).toEqual({ ok: false, reason: 'no endpoints declared' });
  });

  test('fails on a malformed endpoints value', () => {
    const malformed = createCatalog(
      parseConfig('[urls-test]\na = http://a/\n\n[a]\nendpoints[] = /x\n')
    );
    expect(malformed.resolveEndpoints('a')).toEqual({
      ok: false,
      reason: '"endpoints" must be a comma-separated list',
    });
  });
});

describe('splitList', () => {
  test('trims items and drops empty ones', () => {
    expect(splitList(' /a ,, /b,')).toEqual(['/a', '/b']);
  });
});
