import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BumpError } from '../../src/bumpers/BumpErrors.js';
import { BUMP_CONFIG_FILE, BumpConfigStore } from '../../src/config/BumpConfig.js';
import { afterEach, beforeEach, expect, test } from '../test.deps.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'reqbump-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test('BumpConfigStore.Load - Defaults when no config file exists', async () => {
  const config = await new BumpConfigStore(dir, {}).Load();

  expect(config).toEqual({
    targets: ['requirements.txt', 'pinned.txt'],
    indexUrl: 'https://pypi.org/pypi',
    timeout: 10000,
    changelog: false,
    allowDowngrade: false,
  });
});

test('BumpConfigStore.Load - Merges the config file over defaults', async () => {
  await writeFile(join(dir, BUMP_CONFIG_FILE), JSON.stringify({ changelog: true, targets: ['reqs/base.txt'] }));

  const config = await new BumpConfigStore(dir, {}).Load();

  expect(config.changelog).toBe(true);
  expect(config.targets).toEqual(['reqs/base.txt']);
  expect(config.timeout).toBe(10000);
});

test('BumpConfigStore.Load - Environment overrides the config file', async () => {
  await writeFile(join(dir, BUMP_CONFIG_FILE), JSON.stringify({ timeout: 5000 }));

  const config = await new BumpConfigStore(dir, {
    REQBUMP_INDEX_URL: 'https://mirror.example.com/pypi',
    REQBUMP_TIMEOUT: '2500',
  }).Load();

  expect(config.indexUrl).toBe('https://mirror.example.com/pypi');
  expect(config.timeout).toBe(2500);
});

test('BumpConfigStore.Load - Invalid values are rejected', async () => {
  await writeFile(join(dir, BUMP_CONFIG_FILE), JSON.stringify({ timeout: 'soon' }));

  const loading = new BumpConfigStore(dir, {}).Load();

  await expect(loading).rejects.toBeInstanceOf(BumpError);
  await expect(loading).rejects.toThrow(/timeout/);
});

test('BumpConfigStore.Load - Invalid JSON is rejected', async () => {
  await writeFile(join(dir, BUMP_CONFIG_FILE), '{ targets: ');

  await expect(new BumpConfigStore(dir, {}).Load()).rejects.toThrow(`Invalid JSON in ${join(dir, BUMP_CONFIG_FILE)}`);
});
