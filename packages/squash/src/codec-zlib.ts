/**
 * zlib backend: raw DEFLATE (RFC 1951), readable by any zlib-based tool
 * that accepts headerless streams.
 */

import { createDeflateRaw, createInflateRaw } from 'node:zlib';

import { ChunkedBackend } from './codec-output.js';
import { TransformSession } from './codec-transform.js';
import type { CodecSession } from './codec-types.js';
import { DEFAULT_LEVEL, levelPreset } from './levels.js';
import type { CompressionLevel, Direction } from './types.js';

export class ZlibBackend extends ChunkedBackend {
  readonly name = 'zlib';
  readonly description = 'DEFLATE; compatible with other zlib tools';
  private readonly level: number;

  constructor(options: { level?: CompressionLevel | undefined } = {}) {
    super();
    this.level = levelPreset(options.level ?? DEFAULT_LEVEL).zlibLevel;
  }

  expansionFactor(direction: Direction): number {
    return direction === 'compress' ? 2 : 4;
  }

  beginStream(direction: Direction, chunkSize: number): CodecSession {
    const engine =
      direction === 'compress' ? createDeflateRaw({ level: this.level }) : createInflateRaw();
    return new TransformSession(engine, this.name, direction, this.windowSize(direction, chunkSize));
  }
}
