/**
 * The streaming driving loop.
 *
 * Opens a source and a sink, pumps fixed-size chunks through one codec
 * session until the codec reports completion, and closes both channels on
 * every exit path. Every read, codec call and write is awaited before the
 * next begins. Never logs; observers see each chunk before it is written.
 */

import type { ChunkStatus, CodecBackend, CodecSession } from './codec-types.js';
import { DEFAULT_CHUNK_SIZE } from './codec-types.js';
import type {
  EndpointIO,
  ReadableChannel,
  SinkEndpoint,
  SourceEndpoint,
  WritableChannel,
} from './endpoint.js';
import { openSink, openSource, processEndpointIO } from './endpoint.js';
import type { AlgorithmName, Direction } from './types.js';
import {
  CodecError,
  SquashError,
  TransportError,
  ValidationError,
  errorCode,
  errorMessage,
} from './types.js';

export { DEFAULT_CHUNK_SIZE };

export type LoopState = 'idle' | 'opened' | 'looping' | 'draining' | 'closed' | 'errored';

/** Calls in a row that may neither consume input nor produce output. */
const STALL_LIMIT = 3;

export interface ChunkProgress {
  algorithm: AlgorithmName;
  direction: Direction;
  /** Bytes read from the source so far. */
  bytesIn: number;
  /** Bytes written so far, including `output`. */
  bytesOut: number;
  /** Output of this codec call, not yet written. */
  output: Uint8Array;
  isFinal: boolean;
}

export interface RunSummary {
  algorithm: AlgorithmName;
  direction: Direction;
  bytesIn: number;
  bytesOut: number;
  chunksRead: number;
  codecCalls: number;
}

/** Per-chunk hook. Throwing from `onChunk` aborts the run. */
export interface ChunkObserver {
  onChunk(progress: ChunkProgress): void;
  onComplete?(summary: RunSummary): void;
}

export interface RunOptions {
  chunkSize?: number | undefined;
  io?: EndpointIO | undefined;
  observers?: readonly ChunkObserver[] | undefined;
  /** Append to an existing sink file instead of truncating it. */
  append?: boolean | undefined;
}

export class StreamLoop {
  private current: LoopState = 'idle';
  private readonly chunkSize: number;
  private readonly io: EndpointIO;
  private readonly observers: readonly ChunkObserver[];
  private readonly append: boolean;
  /** Close failures that happened while another error was already propagating. */
  readonly suppressedErrors: unknown[] = [];

  constructor(
    private readonly backend: CodecBackend,
    private readonly direction: Direction,
    options: RunOptions = {},
  ) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    this.chunkSize = chunkSize;
    this.io = options.io ?? processEndpointIO();
    this.observers = options.observers ?? [];
    this.append = options.append ?? false;
  }

  get state(): LoopState {
    return this.current;
  }

  async run(source: SourceEndpoint, sink: SinkEndpoint): Promise<RunSummary> {
    if (this.current !== 'idle') {
      throw new Error(`StreamLoop already used (state: ${this.current})`);
    }

    let reader: ReadableChannel | undefined;
    let writer: WritableChannel | undefined;
    let session: CodecSession | undefined;
    let channelsClosed = false;

    try {
      reader = await openSource(source, this.io);
      writer = await openSink(sink, this.io, { append: this.append });
      session = this.backend.beginStream(this.direction, this.chunkSize);
      this.current = 'opened';

      const summary = await this.pump(reader, writer, session);

      session.destroy();
      session = undefined;
      channelsClosed = true;
      await closeChannels(reader, writer);
      this.current = 'closed';

      for (const observer of this.observers) {
        observer.onComplete?.(summary);
      }
      return summary;
    } catch (err) {
      this.current = 'errored';
      session?.destroy();
      if (!channelsClosed) {
        channelsClosed = true;
        try {
          await closeChannels(reader, writer);
        } catch (closeErr) {
          // The original failure is the one reported.
          this.suppressedErrors.push(closeErr);
        }
      }
      throw err;
    }
  }

  private async pump(
    reader: ReadableChannel,
    writer: WritableChannel,
    session: CodecSession,
  ): Promise<RunSummary> {
    const buffer = new Uint8Array(this.chunkSize);
    let residual = buffer.subarray(0, 0);
    let isFinal = false;
    let bytesIn = 0;
    let bytesOut = 0;
    let chunksRead = 0;
    let codecCalls = 0;
    let stalled = 0;
    let lastStatus: ChunkStatus = 'continue';

    this.current = 'looping';

    for (;;) {
      // Buffered codec output is drained before any new source data is read.
      if (lastStatus !== 'need-output-space' && residual.length === 0 && !isFinal) {
        const count = await readChunk(reader, buffer);
        if (count === 0) {
          isFinal = true;
          this.current = 'draining';
        } else {
          chunksRead++;
          bytesIn += count;
        }
        residual = buffer.subarray(0, count);
      }

      const result = await session.processChunk(residual, isFinal);
      codecCalls++;
      lastStatus = result.status;
      residual = residual.subarray(result.consumed);

      const idle = result.consumed === 0 && result.output.length === 0;
      if (result.status !== 'done' && idle && (isFinal || residual.length > 0)) {
        stalled++;
        if (stalled >= STALL_LIMIT) {
          throw new CodecError(
            `${session.algorithm} codec made no progress`,
            session.algorithm,
            this.direction,
            bytesIn,
            bytesOut,
          );
        }
      } else {
        stalled = 0;
      }

      const progress: ChunkProgress = {
        algorithm: session.algorithm,
        direction: this.direction,
        bytesIn,
        bytesOut: bytesOut + result.output.length,
        output: result.output,
        isFinal,
      };
      for (const observer of this.observers) {
        observer.onChunk(progress);
      }

      if (result.output.length > 0) {
        await writeChunk(writer, result.output);
        bytesOut += result.output.length;
      }

      if (result.status === 'done') {
        break;
      }
    }

    return {
      algorithm: session.algorithm,
      direction: this.direction,
      bytesIn,
      bytesOut,
      chunksRead,
      codecCalls,
    };
  }
}

/** Compress or decompress `source` into `sink` with one backend. */
export function run(
  source: SourceEndpoint,
  sink: SinkEndpoint,
  backend: CodecBackend,
  direction: Direction,
  options: RunOptions = {},
): Promise<RunSummary> {
  return new StreamLoop(backend, direction, options).run(source, sink);
}

async function readChunk(reader: ReadableChannel, into: Uint8Array): Promise<number> {
  try {
    return await reader.read(into);
  } catch (err) {
    if (err instanceof SquashError) {
      throw err;
    }
    throw new TransportError(
      `Cannot read ${reader.label}: ${errorMessage(err)}`,
      reader.label,
      'read',
      errorCode(err),
      err,
    );
  }
}

async function writeChunk(writer: WritableChannel, bytes: Uint8Array): Promise<void> {
  try {
    await writer.write(bytes);
  } catch (err) {
    if (err instanceof SquashError) {
      throw err;
    }
    throw new TransportError(
      `Cannot write ${writer.label}: ${errorMessage(err)}`,
      writer.label,
      'write',
      errorCode(err),
      err,
    );
  }
}

/** Close source then sink. Both are attempted; the first failure is thrown. */
async function closeChannels(
  reader: ReadableChannel | undefined,
  writer: WritableChannel | undefined,
): Promise<void> {
  let failure: unknown;
  for (const channel of [reader, writer]) {
    if (channel === undefined) {
      continue;
    }
    try {
      await channel.close();
    } catch (err) {
      failure ??= err instanceof SquashError
        ? err
        : new TransportError(
            `Cannot close ${channel.label}: ${errorMessage(err)}`,
            channel.label,
            'close',
            errorCode(err),
            err,
          );
    }
  }
  if (failure !== undefined) {
    throw failure;
  }
}
