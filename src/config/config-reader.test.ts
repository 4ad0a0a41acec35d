import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseConfig, loadConfig } from './config-reader.js';
import { DEFAULT_RESOLVER_CONFIG } from './types.js';
import { ConfigError } from '../resolver/errors.js';

describe('DEFAULT_RESOLVER_CONFIG', () => {
  it('carries the documented thresholds', () => {
    expect(DEFAULT_RESOLVER_CONFIG).toEqual({
      mlThreshold: 0.6,
      templateThreshold: 0.9,
      fuzzyThreshold: 0.75,
      similarityThreshold: 60,
      similarityLimit: 5,
      strongSimilarity: 85,
      diagnosisMinRelevance: 2,
      classifier: 'bayes',
    });
  });
});

describe('parseConfig', () => {
  it('applies defaults to missing fields', () => {
    const config = parseConfig('{"mlThreshold": 0.7, "osFamily": "windows"}');
    expect(config?.mlThreshold).toBe(0.7);
    expect(config?.osFamily).toBe('windows');
    expect(config?.fuzzyThreshold).toBe(0.75);
  });

  it('returns null for empty, non-JSON and non-object content', () => {
    expect(parseConfig('')).toBeNull();
    expect(parseConfig('   ')).toBeNull();
    expect(parseConfig('{not json')).toBeNull();
    expect(parseConfig('[1, 2]')).toBeNull();
    expect(parseConfig('null')).toBeNull();
  });

  it('returns null for out-of-range values', () => {
    expect(parseConfig('{"mlThreshold": 2}')).toBeNull();
    expect(parseConfig('{"classifier": "svm"}')).toBeNull();
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nlcmd-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    expect(await loadConfig(join(dir, 'absent.json'))).toEqual(DEFAULT_RESOLVER_CONFIG);
  });

  it('reads a valid file', async () => {
    const path = join(dir, 'nlcmd.config.json');
    await writeFile(path, JSON.stringify({ classifier: 'none', logDir: 'logs' }), 'utf-8');
    const config = await loadConfig(path);
    expect(config.classifier).toBe('none');
    expect(config.logDir).toBe('logs');
  });

  it('throws ConfigError for invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{', 'utf-8');
    await expect(loadConfig(path)).rejects.toThrow(ConfigError);
  });

  it('names the offending field', async () => {
    const path = join(dir, 'invalid.json');
    await writeFile(path, JSON.stringify({ fuzzyThreshold: -1 }), 'utf-8');
    await expect(loadConfig(path)).rejects.toMatchObject({
      name: 'ConfigError',
      field: 'fuzzyThreshold',
    });
  });
});
