/**
 * Chunked session over a Node transform stream.
 *
 * zlib, Brotli and xz engines are exposed as Duplex streams. The engine is
 * kept in paused mode and read only while the output window has room, so
 * its own backpressure stops it from inflating further ahead than one
 * readable buffer. Each call waits for the engine to make progress and
 * never leaves a write pending past the engine's end of stream.
 *
 * A write stays in flight across calls until the engine accepts it. Until
 * then the caller keeps passing the same residual input, and its leading
 * bytes are the ones already handed to the engine.
 */

import type { Duplex } from 'node:stream';

import { OutputWindow } from './codec-output.js';
import type { ChunkResult, CodecSession } from './codec-types.js';
import type { AlgorithmName, Direction } from './types.js';
import { CodecError, errorMessage } from './types.js';

export interface TransformSessionOptions {
  /**
   * Largest slice of input handed to the engine in one write. Engines that
   * ignore readable backpressure need a small slice to cap what a single
   * write can expand to.
   */
  writeSize?: number | undefined;
}

interface PendingWrite {
  length: number;
  settled: boolean;
}

export class TransformSession implements CodecSession {
  private readonly output: OutputWindow;
  private readonly writeSize: number;
  private pendingWrite: PendingWrite | undefined;
  private failure: Error | undefined;
  private waiter: (() => void) | undefined;
  private ending = false;
  /** The engine emitted 'end': everything it will ever produce has been read. */
  private drained = false;
  private closed = false;
  private ended = false;
  private endChecked = false;
  private destroyed = false;
  private inCount = 0;
  private outCount = 0;

  constructor(
    private readonly engine: Duplex,
    readonly algorithm: AlgorithmName,
    readonly direction: Direction,
    capacity: number,
    options: TransformSessionOptions = {},
  ) {
    this.output = new OutputWindow(capacity);
    this.writeSize = options.writeSize ?? Number.POSITIVE_INFINITY;
    engine.on('readable', this.notify);
    engine.on('end', () => {
      this.drained = true;
      this.notify();
    });
    engine.on('close', () => {
      this.closed = true;
      this.notify();
    });
    engine.on('error', (err: Error) => {
      this.failure ??= err;
      this.notify();
    });
  }

  get bytesIn(): number {
    return this.inCount;
  }

  get bytesOut(): number {
    return this.outCount;
  }

  get finished(): boolean {
    return this.ended && this.output.pending === 0;
  }

  /** Output held by the session: the window queue plus the engine's readable buffer. */
  get buffered(): number {
    return this.output.pending + this.engine.readableLength;
  }

  async processChunk(input: Uint8Array, isFinal: boolean): Promise<ChunkResult> {
    this.throwIfFailed();
    if (this.destroyed) {
      throw this.codecError('session already destroyed', undefined);
    }

    let consumed = 0;
    try {
      for (;;) {
        this.pull();
        this.throwIfFailed();

        if (this.pendingWrite?.settled === true) {
          consumed += this.pendingWrite.length;
          this.inCount += this.pendingWrite.length;
          this.pendingWrite = undefined;
          if (this.engineHeldInput()) {
            throw this.codecError('unexpected data after end of stream', undefined);
          }
        }

        if (this.drained) {
          if (this.pendingWrite !== undefined && !this.endChecked) {
            // Give a write that carried the last bytes of the stream one turn to settle.
            this.endChecked = true;
            await new Promise<void>((resolve) => setImmediate(resolve));
            continue;
          }
          if (this.pendingWrite !== undefined || consumed < input.length || this.engineHeldInput()) {
            throw this.codecError('unexpected data after end of stream', undefined);
          }
          this.ended = true;
          break;
        }
        if (this.closed) {
          throw this.codecError('engine closed before the end of the stream', undefined);
        }
        if (this.output.full) {
          break;
        }

        if (this.pendingWrite === undefined) {
          if (consumed < input.length && !this.ending) {
            this.startWrite(input.subarray(consumed, consumed + this.writeSize));
            continue;
          }
          if (isFinal && !this.ending) {
            this.ending = true;
            this.engine.end();
            continue;
          }
          if (!this.ending) {
            break;
          }
        }

        // The engine is working. Hand out what is ready rather than wait.
        if (this.output.pending > 0) {
          break;
        }
        await this.nextEvent();
      }
    } catch (err) {
      if (err instanceof CodecError) {
        throw err;
      }
      throw this.codecError(errorMessage(err), err);
    }

    const result = this.output.result(consumed, input.length, this.ended && isFinal, isFinal);
    this.outCount += result.output.length;
    return result;
  }

  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;
    this.output.clear();
    this.engine.destroy();
  }

  private readonly notify = (): void => {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  };

  private nextEvent(): Promise<void> {
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Move engine output into the window, never past its capacity. */
  private pull(): void {
    while (!this.output.full) {
      const available = this.engine.readableLength;
      if (available === 0) {
        // Re-arms 'readable' and lets a finished engine emit 'end'.
        this.engine.read();
        return;
      }
      const room = this.output.capacity - this.output.pending;
      const chunk: unknown = this.engine.read(
        Math.min(available, room, this.engine.readableHighWaterMark),
      );
      if (!(chunk instanceof Uint8Array)) {
        return;
      }
      this.output.push(chunk);
    }
  }

  private startWrite(bytes: Uint8Array): void {
    const pending: PendingWrite = { length: bytes.length, settled: false };
    this.pendingWrite = pending;
    // The engine may hold on to the chunk after the write settles.
    this.engine.write(Buffer.from(bytes), (err) => {
      if (err) {
        this.failure ??= err;
      } else {
        pending.settled = true;
      }
      this.notify();
    });
  }

  /**
   * zlib and Brotli engines count the input they actually took. Less than
   * was written means the stream ended inside an earlier write.
   */
  private engineHeldInput(): boolean {
    const engine = this.engine;
    return (
      'bytesWritten' in engine &&
      typeof engine.bytesWritten === 'number' &&
      engine.bytesWritten < this.inCount
    );
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.codecError(errorMessage(this.failure), this.failure);
    }
  }

  private codecError(detail: string, cause: unknown): CodecError {
    const verb = this.direction === 'compress' ? 'Compression' : 'Decompression';
    return new CodecError(
      `${verb} failed (${this.algorithm}): ${detail}`,
      this.algorithm,
      this.direction,
      this.inCount,
      this.outCount,
      cause,
    );
  }
}
