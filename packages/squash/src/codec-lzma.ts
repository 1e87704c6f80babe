/**
 * lzma backend: maximum ratio, xz container via liblzma.
 */

import lzma from 'lzma-native';
import type { Preset } from 'lzma-native';

import { ChunkedBackend } from './codec-output.js';
import { TransformSession } from './codec-transform.js';
import type { CodecSession } from './codec-types.js';
import { DEFAULT_LEVEL, levelPreset } from './levels.js';
import type { CompressionLevel, Direction } from './types.js';

/**
 * liblzma streams push every block they decode without waiting for reads,
 * so compressed input goes in small slices to cap one write's expansion.
 */
const DECODE_WRITE_SIZE = 256;

export class LzmaBackend extends ChunkedBackend {
  readonly name = 'lzma';
  readonly description = 'Best ratio, slowest (xz container)';
  private readonly preset: Preset;

  constructor(options: { level?: CompressionLevel | undefined } = {}) {
    super();
    this.preset = levelPreset(options.level ?? DEFAULT_LEVEL).xzPreset;
  }

  expansionFactor(direction: Direction): number {
    return direction === 'compress' ? 2 : 8;
  }

  beginStream(direction: Direction, chunkSize: number): CodecSession {
    const engine =
      direction === 'compress'
        ? lzma.createCompressor({ preset: this.preset })
        : lzma.createDecompressor();
    return new TransformSession(engine, this.name, direction, this.windowSize(direction, chunkSize), {
      writeSize: direction === 'decompress' ? DECODE_WRITE_SIZE : undefined,
    });
  }
}
