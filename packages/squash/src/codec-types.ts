/**
 * Codec backend contract.
 *
 * A backend wraps one compression engine behind a resumable, chunked
 * session. The driving loop is the only caller of `processChunk`.
 */

import type { AlgorithmName, Direction } from './types.js';

/** Bytes read from the source per iteration unless the caller overrides it. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * - `continue`: input fully consumed and nothing buffered; feed the next chunk.
 * - `need-output-space`: output window filled first; call again with the
 *   unconsumed remainder before reading more input.
 * - `done`: final input seen and everything flushed.
 */
export type ChunkStatus = 'continue' | 'need-output-space' | 'done';

export interface ChunkResult {
  status: ChunkStatus;
  /** Bytes taken from the front of the input. */
  consumed: number;
  /** View into the session's output window, valid until the next call. */
  output: Uint8Array;
}

/** Per-invocation codec state. Never shared between streams. */
export interface CodecSession {
  readonly algorithm: AlgorithmName;
  readonly direction: Direction;
  readonly bytesIn: number;
  readonly bytesOut: number;
  readonly finished: boolean;
  /** Rejects with a CodecError on corrupt input or engine failure. */
  processChunk(input: Uint8Array, isFinal: boolean): Promise<ChunkResult>;
  /** Release engine resources. Safe to call more than once. */
  destroy(): void;
}

export interface CodecBackend {
  readonly name: AlgorithmName;
  readonly description: string;
  /** Output window size as a multiple of the input chunk size. */
  expansionFactor(direction: Direction): number;
  compressBuffer(input: Uint8Array): Promise<Uint8Array>;
  decompressBuffer(input: Uint8Array): Promise<Uint8Array>;
  beginStream(direction: Direction, chunkSize: number): CodecSession;
}
