/**
 * Compression level presets: a recommended algorithm, a chunk size, and
 * per-engine tuning values.
 */

import type { Preset } from 'lzma-native';

import type { AlgorithmName, CompressionLevel } from './types.js';

export const COMPRESSION_LEVELS: readonly CompressionLevel[] = ['fast', 'balanced', 'best'];

export const DEFAULT_LEVEL: CompressionLevel = 'balanced';

interface LevelPreset {
  algorithm: AlgorithmName;
  chunkSize: number;
  description: string;
  /** zlib level 0-9 */
  zlibLevel: number;
  /** Brotli quality 0-11 */
  brotliQuality: number;
  /** xz preset 0-9 */
  xzPreset: Preset;
}

const PRESETS: Record<CompressionLevel, LevelPreset> = {
  fast: {
    algorithm: 'lz4',
    chunkSize: 256 * 1024,
    description: 'Fastest compression, lower ratio',
    zlibLevel: 1,
    brotliQuality: 2,
    xzPreset: 1,
  },
  balanced: {
    algorithm: 'lzfse',
    chunkSize: 64 * 1024,
    description: 'Balanced speed and ratio',
    zlibLevel: 6,
    brotliQuality: 5,
    xzPreset: 6,
  },
  best: {
    algorithm: 'lzma',
    chunkSize: 64 * 1024,
    description: 'Best ratio, slower',
    zlibLevel: 9,
    brotliQuality: 9,
    xzPreset: 9,
  },
};

export function levelPreset(level: CompressionLevel): LevelPreset {
  return PRESETS[level];
}

export function isCompressionLevel(value: unknown): value is CompressionLevel {
  return value === 'fast' || value === 'balanced' || value === 'best';
}
