/**
 * lzfse backend: the balanced slot.
 *
 * Encoded with Brotli at a mid quality. Files keep the `.lzfse` suffix and
 * round-trip through squash, but are not readable by Apple's lzfse tools.
 */

import { constants, createBrotliCompress, createBrotliDecompress } from 'node:zlib';

import { ChunkedBackend } from './codec-output.js';
import { TransformSession } from './codec-transform.js';
import type { CodecSession } from './codec-types.js';
import { DEFAULT_LEVEL, levelPreset } from './levels.js';
import type { CompressionLevel, Direction } from './types.js';

/** 4 MiB window */
const BROTLI_WINDOW_BITS = 22;

export class LzfseBackend extends ChunkedBackend {
  readonly name = 'lzfse';
  readonly description = 'Balanced speed and ratio (default)';
  private readonly quality: number;

  constructor(options: { level?: CompressionLevel | undefined } = {}) {
    super();
    this.quality = levelPreset(options.level ?? DEFAULT_LEVEL).brotliQuality;
  }

  expansionFactor(direction: Direction): number {
    return direction === 'compress' ? 2 : 4;
  }

  beginStream(direction: Direction, chunkSize: number): CodecSession {
    const engine =
      direction === 'compress'
        ? createBrotliCompress({
            params: {
              [constants.BROTLI_PARAM_MODE]: constants.BROTLI_MODE_GENERIC,
              [constants.BROTLI_PARAM_QUALITY]: this.quality,
              [constants.BROTLI_PARAM_LGWIN]: BROTLI_WINDOW_BITS,
            },
          })
        : createBrotliDecompress();
    return new TransformSession(engine, this.name, direction, this.windowSize(direction, chunkSize));
  }
}
