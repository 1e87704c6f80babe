import { beforeAll, describe, expect, it } from 'vitest';

import {
  c,
  formatDetail,
  formatError,
  formatJson,
  formatJsonError,
  formatRatio,
  formatSize,
  formatTransfer,
  initColors,
} from '../src/format.js';
import { CodecError, OutputExistsError } from '../src/types.js';

beforeAll(() => {
  initColors('never');
});

describe('color map', () => {
  it('carries only the roles the CLI prints with', () => {
    expect(Object.keys(c).sort()).toEqual(['command', 'error', 'hint', 'info', 'muted', 'success']);
  });

  it('leaves text plain when colors are off', () => {
    expect(c.error('Error:')).toBe('Error:');
    expect(c.muted(42)).toBe('42');
  });
});

describe('formatSize', () => {
  it('picks a unit and precision', () => {
    expect(formatSize(500)).toBe('500 B');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(10 * 1024)).toBe('10 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MB');
    expect(formatSize(12 * 1024 * 1024 * 1024)).toBe('12 GB');
  });
});

describe('formatRatio', () => {
  it('shows compressed size as a share of the original', () => {
    expect(formatRatio(1000, 314)).toBe('31.4%');
    expect(formatRatio(0, 20)).toBe('n/a');
  });
});

describe('formatTransfer', () => {
  it('summarizes a transfer', () => {
    expect(formatTransfer('Compressed', 'a.txt', 'a.txt.lz4', 2048, 512)).toBe(
      'Compressed a.txt -> a.txt.lz4 (2.0 KB -> 512 B)',
    );
    expect(formatDetail('ratio', '25.0%')).toBe('  ratio:      25.0%');
  });
});

describe('JSON output', () => {
  it('wraps data with a schema version', () => {
    expect(JSON.parse(formatJson({ bytes_in: 3 }))).toEqual({ schema_version: '0.1', bytes_in: 3 });
  });

  it('formats categorized errors', () => {
    expect(JSON.parse(formatJsonError(new OutputExistsError('a.txt.lz4')))).toEqual({
      schema_version: '0.1',
      error: 'Output file already exists: a.txt.lz4',
      type: 'conflict',
      suggestions: ['Use -f to overwrite, or -o to choose another name.'],
    });
    expect(JSON.parse(formatJsonError(new Error('boom')))).toEqual({
      schema_version: '0.1',
      error: 'boom',
      type: 'unknown',
    });
  });
});

describe('formatError', () => {
  it('adds suggestions as hint lines', () => {
    expect(formatError(new OutputExistsError('out.bin'))).toBe(
      'Error: Output file already exists: out.bin\n\n  Use -f to overwrite, or -o to choose another name.',
    );
  });

  it('prints plain errors on one line', () => {
    const err = new CodecError('Decompression failed (zlib): invalid block type', 'zlib', 'decompress', 64, 0);
    expect(formatError(err)).toBe('Error: Decompression failed (zlib): invalid block type');
  });
});
