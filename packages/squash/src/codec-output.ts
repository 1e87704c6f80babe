/**
 * Output buffering shared by all codec sessions.
 */

import type { ChunkResult, CodecBackend, CodecSession } from './codec-types.js';
import { DEFAULT_CHUNK_SIZE } from './codec-types.js';
import type { AlgorithmName, Direction } from './types.js';

/**
 * Fixed-capacity output window in front of a queue of produced bytes.
 *
 * Sessions stop producing once the window is full, so the queue holds at
 * most `capacity` bytes plus one engine block. Each `processChunk` call
 * hands back at most `capacity` bytes, copied into one buffer allocated up
 * front.
 */
export class OutputWindow {
  private readonly window: Uint8Array;
  private readonly queue: Uint8Array[] = [];
  private queued = 0;

  constructor(readonly capacity: number) {
    this.window = new Uint8Array(capacity);
  }

  /** Bytes produced but not yet handed out. */
  get pending(): number {
    return this.queued;
  }

  get full(): boolean {
    return this.queued >= this.capacity;
  }

  /** Queue bytes the caller no longer mutates. */
  push(bytes: Uint8Array): void {
    if (bytes.length > 0) {
      this.queue.push(bytes);
      this.queued += bytes.length;
    }
  }

  /** Move up to `capacity` queued bytes into the window and return that view. */
  drain(): Uint8Array {
    let filled = 0;
    while (filled < this.capacity) {
      const head = this.queue[0];
      if (head === undefined) {
        break;
      }
      const take = Math.min(head.length, this.capacity - filled);
      this.window.set(head.subarray(0, take), filled);
      filled += take;
      if (take === head.length) {
        this.queue.shift();
      } else {
        this.queue[0] = head.subarray(take);
      }
    }
    this.queued -= filled;
    return this.window.subarray(0, filled);
  }

  /**
   * Drain and classify the call. Final input that has not been flushed yet
   * also asks for another call.
   */
  result(consumed: number, inputLength: number, finished: boolean, isFinal: boolean): ChunkResult {
    const output = this.drain();
    if (consumed < inputLength || this.queued > 0 || (isFinal && !finished)) {
      return { status: 'need-output-space', consumed, output };
    }
    return { status: finished ? 'done' : 'continue', consumed, output };
  }

  clear(): void {
    this.queue.length = 0;
    this.queued = 0;
  }
}

/** Run a whole in-memory buffer through a session. Small payloads only. */
export async function runSessionInMemory(
  session: CodecSession,
  input: Uint8Array,
  chunkSize: number,
): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  let offset = 0;
  try {
    for (;;) {
      const end = Math.min(offset + chunkSize, input.length);
      let residual = input.subarray(offset, end);
      offset = end;
      const isFinal = offset === input.length;

      let result = await session.processChunk(residual, isFinal);
      parts.push(result.output.slice());
      residual = residual.subarray(result.consumed);
      while (result.status === 'need-output-space') {
        result = await session.processChunk(residual, isFinal);
        parts.push(result.output.slice());
        residual = residual.subarray(result.consumed);
      }

      if (result.status === 'done') {
        break;
      }
      if (isFinal) {
        throw new Error(`${session.algorithm} session did not finish after final input`);
      }
    }
  } finally {
    session.destroy();
  }
  return Buffer.concat(parts);
}

/** Backend base: the buffer helpers are the streaming session run in memory. */
export abstract class ChunkedBackend implements CodecBackend {
  abstract readonly name: AlgorithmName;
  abstract readonly description: string;

  abstract expansionFactor(direction: Direction): number;

  abstract beginStream(direction: Direction, chunkSize: number): CodecSession;

  compressBuffer(input: Uint8Array): Promise<Uint8Array> {
    return runSessionInMemory(
      this.beginStream('compress', DEFAULT_CHUNK_SIZE),
      input,
      DEFAULT_CHUNK_SIZE,
    );
  }

  decompressBuffer(input: Uint8Array): Promise<Uint8Array> {
    return runSessionInMemory(
      this.beginStream('decompress', DEFAULT_CHUNK_SIZE),
      input,
      DEFAULT_CHUNK_SIZE,
    );
  }

  /** Output window size for a chunk size in the given direction. */
  protected windowSize(direction: Direction, chunkSize: number): number {
    return Math.max(1, chunkSize * this.expansionFactor(direction));
  }
}
