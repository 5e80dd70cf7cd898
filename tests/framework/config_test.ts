/**
 * Config Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { Config, configFromEnv, getConfig, loadConfig, setConfig } from '../../framework/config/config.ts';

test('Config - provides defaults', () => {
  const config = new Config();

  expect(config.get('env')).toBe('development');
  expect(config.get('port')).toBe(8000);
  expect(config.get('templates.extension')).toBe('.html');
  expect(config.middleware).toEqual([]);
  expect(config.debug).toBe(false);
});

test('Config - deep-merges options over defaults', () => {
  const config = new Config({ templates: { path: './views' }, debug: true });

  expect(config.get('templates.path')).toBe('./views');
  expect(config.get('templates.extension')).toBe('.html');
  expect(config.debug).toBe(true);
});

test('Config - typed getters fall back on missing or mistyped values', () => {
  const config = new Config();
  config.set('port', 'eighty');
  config.set('middleware', ['session', 42, 'csrf']);

  expect(config.getNumber('port', 3000)).toBe(3000);
  expect(config.getString('host', 'localhost')).toBe('0.0.0.0');
  expect(config.getBoolean('missing', true)).toBe(true);
  expect(config.getStringList('middleware')).toEqual(['session', 'csrf']);
  expect(config.getStringList('missing', ['a'])).toEqual(['a']);
});

test('Config - sets nested values by dot path', () => {
  const config = new Config();

  config.set('features.gzip.level', 6);

  expect(config.get('features.gzip.level')).toBe(6);
  expect(config.has('features.gzip')).toBe(true);
  expect(config.has('features.brotli')).toBe(false);
});

test('Config - all() returns a copy', () => {
  const config = new Config();
  const snapshot = config.all();

  snapshot.port = 1;

  expect(config.get('port')).toBe(8000);
});

test('configFromEnv - reads supported variables', () => {
  expect(
    configFromEnv({
      PORT: '9090',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      DEBUG: 'true',
      LOG_LEVEL: 'warn',
      STRATA_MIDDLEWARE: 'session, csrf,,auth',
    })
  ).toEqual({
    port: 9090,
    host: '127.0.0.1',
    env: 'production',
    debug: true,
    logLevel: 'warn',
    middleware: ['session', 'csrf', 'auth'],
  });
});

test('configFromEnv - ignores invalid values', () => {
  const overrides = configFromEnv({ PORT: 'abc', LOG_LEVEL: 'verbose' });

  expect(overrides.port).toBeUndefined();
  expect(overrides.logLevel).toBeUndefined();
  expect(overrides.debug).toBeUndefined();
});

test('getConfig - returns the instance set by setConfig', () => {
  const previous = getConfig();
  const config = new Config({ env: 'test' });

  setConfig(config);
  try {
    expect(getConfig()).toBe(config);
  } finally {
    setConfig(previous);
  }
});

describe('loadConfig', () => {
  let directory = '';

  beforeAll(async () => {
    directory = await mkdtemp(join(tmpdir(), 'strata-config-'));
    await writeFile(join(directory, 'app.json'), JSON.stringify({ port: 4000, middleware: ['session'] }));
    await writeFile(join(directory, 'package.json'), JSON.stringify({ name: 'site', strata: { debug: true } }));
    await writeFile(join(directory, 'broken.json'), '{ "port": ');
    await writeFile(join(directory, 'list.json'), '[1, 2]');
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test('reads a JSON file', async () => {
    const config = await loadConfig(join(directory, 'app.json'), {});

    expect(config.get('port')).toBe(4000);
    expect(config.middleware).toEqual(['session']);
    expect(config.get('host')).toBe('0.0.0.0');
  });

  test('uses the strata section when present', async () => {
    const config = await loadConfig(join(directory, 'package.json'), {});

    expect(config.debug).toBe(true);
    expect(config.get('name')).toBeUndefined();
  });

  test('environment variables override the file', async () => {
    const config = await loadConfig(join(directory, 'app.json'), { PORT: '5000', STRATA_MIDDLEWARE: 'gzip' });

    expect(config.get('port')).toBe(5000);
    expect(config.middleware).toEqual(['gzip']);
  });

  test('a missing file leaves the defaults', async () => {
    const config = await loadConfig(join(directory, 'absent.json'), {});

    expect(config.get('port')).toBe(8000);
  });

  test('invalid JSON is an error', async () => {
    await expect(loadConfig(join(directory, 'broken.json'), {})).rejects.toThrow(SyntaxError);
  });

  test('a non-object document is an error', async () => {
    await expect(loadConfig(join(directory, 'list.json'), {})).rejects.toThrow('must contain a JSON object');
  });
});
