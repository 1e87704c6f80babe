import { writeFileSync, mkdtempSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import {
  getBuiltinDefaults,
  getChunkSize,
  getGlobalConfigPath,
  getLimits,
  loadConfigFile,
  mergeConfigs,
  parseSize,
  resolveConfig,
  writeConfigFile,
} from '../src/config.js';

function tmpDir(): string {
  return mkdtempSync(join(tmpdir(), 'squash-config-test-'));
}

let originalSquashHome: string | undefined;

// Point SQUASH_HOME at a temp directory for all tests
beforeEach(() => {
  originalSquashHome = process.env.SQUASH_HOME;
  process.env.SQUASH_HOME = tmpDir();
});

afterEach(() => {
  if (originalSquashHome === undefined) {
    delete process.env.SQUASH_HOME;
  } else {
    process.env.SQUASH_HOME = originalSquashHome;
  }
});

describe('config', () => {
  it('returns built-in defaults', () => {
    expect(getBuiltinDefaults()).toEqual({ level: 'balanced', progress: false, limits: {} });
  });

  it('loads a valid config file', async () => {
    const dir = tmpDir();
    const configPath = join(dir, '.squash.yml');
    writeFileSync(
      configPath,
      `algorithm: LZ4
level: fast
chunk_size: 128kb
limits:
  max_ratio: 50
  max_output_size: 2gb
`,
    );

    const config = await loadConfigFile(configPath);
    expect(config).toEqual({
      algorithm: 'lz4',
      level: 'fast',
      chunk_size: '128kb',
      limits: { max_ratio: 50, max_output_size: '2gb' },
    });
  });

  it('handles empty config file', async () => {
    const dir = tmpDir();
    const configPath = join(dir, '.squash.yml');
    writeFileSync(configPath, '');

    expect(await loadConfigFile(configPath)).toEqual({});
  });

  it('rejects non-object YAML', async () => {
    const dir = tmpDir();
    const configPath = join(dir, '.squash.yml');
    writeFileSync(configPath, '"just a string"');

    await expect(loadConfigFile(configPath)).rejects.toThrow('not an object');
  });

  it('rejects malformed YAML', async () => {
    const dir = tmpDir();
    const configPath = join(dir, '.squash.yml');
    writeFileSync(configPath, 'level: [fast\n');

    await expect(loadConfigFile(configPath)).rejects.toThrow('Malformed YAML');
  });

  it('rejects unknown values', async () => {
    const dir = tmpDir();
    const configPath = join(dir, '.squash.yml');

    writeFileSync(configPath, 'algorithm: zstd\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow(
      'expected one of lz4, lzfse, lzma, zlib',
    );

    writeFileSync(configPath, 'level: turbo\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow('expected one of fast, balanced, best');

    writeFileSync(configPath, 'limits:\n  max_ratio: -1\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow('expected a positive number');
  });

  it('merges configs with shallow override', () => {
    const merged = mergeConfigs(
      { level: 'balanced', limits: { max_ratio: 10, max_output_size: '1gb' } },
      { level: 'best', limits: { max_ratio: 20 } },
    );
    expect(merged).toEqual({ level: 'best', limits: { max_ratio: 20 } });
  });

  it('layers the working directory over the global file', async () => {
    const home = process.env.SQUASH_HOME ?? '';
    writeFileSync(join(home, '.squash.yml'), 'algorithm: lzma\nprogress: true\n');
    const project = tmpDir();
    writeFileSync(join(project, '.squash.yml'), 'algorithm: zlib\n');

    const config = await resolveConfig(project);
    expect(config.algorithm).toBe('zlib');
    expect(config.progress).toBe(true);
    expect(config.level).toBe('balanced');
  });

  it('resolves the global path from SQUASH_HOME', () => {
    expect(getGlobalConfigPath()).toBe(join(process.env.SQUASH_HOME ?? '', '.squash.yml'));
  });

  it('writes YAML', async () => {
    const path = join(tmpDir(), 'nested', '.squash.yml');
    await writeConfigFile(path, { level: 'fast', limits: { max_ratio: 5 } });
    expect(readFileSync(path, 'utf-8')).toBe('level: fast\nlimits:\n  max_ratio: 5\n');
  });
});

describe('parseSize', () => {
  it('parses sizes with and without units', () => {
    expect(parseSize('64')).toBe(64);
    expect(parseSize('64kb')).toBe(65536);
    expect(parseSize('1.5MB')).toBe(1572864);
    expect(parseSize('2 gb')).toBe(2 * 1024 * 1024 * 1024);
    expect(parseSize(4096)).toBe(4096);
  });

  it('rejects malformed sizes', () => {
    expect(() => parseSize('lots')).toThrow('Invalid size format: lots');
    expect(() => parseSize('-5kb')).toThrow('Invalid size format');
  });
});

describe('derived settings', () => {
  it('takes the chunk size from the level unless set', () => {
    expect(getChunkSize({ level: 'fast' })).toBe(256 * 1024);
    expect(getChunkSize({ level: 'best' })).toBe(64 * 1024);
    expect(getChunkSize({})).toBe(64 * 1024);
    expect(getChunkSize({ level: 'fast', chunk_size: '4kb' })).toBe(4096);
  });

  it('rejects chunk sizes out of range', () => {
    expect(() => getChunkSize({ chunk_size: 0 })).toThrow('Invalid chunk_size: 0');
    expect(() => getChunkSize({ chunk_size: '65mb' })).toThrow('Invalid chunk_size: 65mb');
  });

  it('converts limits to bytes', () => {
    expect(getLimits({})).toEqual({});
    expect(getLimits({ limits: { max_ratio: 8, max_output_size: '1kb' } })).toEqual({
      maxRatio: 8,
      maxOutputBytes: 1024,
    });
  });
});
