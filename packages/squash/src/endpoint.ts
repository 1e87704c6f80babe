/**
 * Endpoints: where bytes come from and where they go.
 *
 * An endpoint is either a named file or one of the process's inherited
 * standard streams. Opening one yields a channel with a uniform
 * read/write/close surface, so the driving loop never branches on kind.
 */

import { existsSync } from 'node:fs';
import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';

import { EndpointError, TransportError, ValidationError, errorCode, errorMessage } from './types.js';

export type SourceEndpoint =
  | { readonly role: 'source'; readonly kind: 'file'; readonly path: string }
  | { readonly role: 'source'; readonly kind: 'stdin' };

export type SinkEndpoint =
  | { readonly role: 'sink'; readonly kind: 'file'; readonly path: string }
  | { readonly role: 'sink'; readonly kind: 'stdout' };

export type Endpoint = SourceEndpoint | SinkEndpoint;

/** Byte source opened from a SourceEndpoint. */
export interface ReadableChannel {
  readonly label: string;
  /** Fill up to `into.length` bytes. Resolves with the count; 0 means exhausted. */
  read(into: Uint8Array): Promise<number>;
  close(): Promise<void>;
}

/** Byte sink opened from a SinkEndpoint. */
export interface WritableChannel {
  readonly label: string;
  /** Resolves once the bytes are handed off; the caller may then reuse the buffer. */
  write(bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** Filesystem collaborator. Substituted in tests. */
export interface FileSystem {
  openReadable(path: string): Promise<ReadableChannel>;
  openWritable(path: string, append: boolean): Promise<WritableChannel>;
  exists(path: string): boolean;
}

/** The process's inherited standard streams. */
export interface StandardStreams {
  stdin: Readable;
  stdout: Writable;
}

/** Everything needed to open an endpoint. */
export interface EndpointIO {
  fs: FileSystem;
  streams: StandardStreams;
}

export function fileSource(path: string): SourceEndpoint {
  if (path.length === 0) {
    throw new ValidationError('Input path cannot be empty');
  }
  return Object.freeze({ role: 'source', kind: 'file', path });
}

export function standardInput(): SourceEndpoint {
  return Object.freeze({ role: 'source', kind: 'stdin' });
}

export function fileSink(path: string): SinkEndpoint {
  if (path.length === 0) {
    throw new ValidationError('Output path cannot be empty');
  }
  return Object.freeze({ role: 'sink', kind: 'file', path });
}

export function standardOutput(): SinkEndpoint {
  return Object.freeze({ role: 'sink', kind: 'stdout' });
}

/** Human-readable label: the file path, or `<stdin>` / `<stdout>`. */
export function describeEndpoint(endpoint: Endpoint): string {
  switch (endpoint.kind) {
    case 'file':
      return endpoint.path;
    case 'stdin':
      return '<stdin>';
    case 'stdout':
      return '<stdout>';
    default:
      return assertNever(endpoint);
  }
}

export async function openSource(endpoint: SourceEndpoint, io: EndpointIO): Promise<ReadableChannel> {
  switch (endpoint.kind) {
    case 'file':
      return io.fs.openReadable(endpoint.path);
    case 'stdin':
      return new StreamReader(io.streams.stdin, '<stdin>');
    default:
      return assertNever(endpoint);
  }
}

export async function openSink(
  endpoint: SinkEndpoint,
  io: EndpointIO,
  options: { append?: boolean } = {},
): Promise<WritableChannel> {
  switch (endpoint.kind) {
    case 'file':
      return io.fs.openWritable(endpoint.path, options.append ?? false);
    case 'stdout':
      return new StreamWriter(io.streams.stdout, '<stdout>');
    default:
      return assertNever(endpoint);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unexpected endpoint: ${JSON.stringify(value)}`);
}

// --- File channels ---

class FileReader implements ReadableChannel {
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    readonly label: string,
  ) {}

  async read(into: Uint8Array): Promise<number> {
    try {
      const { bytesRead } = await this.handle.read(into, 0, into.length, null);
      return bytesRead;
    } catch (err) {
      throw new TransportError(
        `Cannot read ${this.label}: ${errorMessage(err)}`,
        this.label,
        'read',
        errorCode(err),
        err,
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.handle.close();
    } catch (err) {
      throw new TransportError(
        `Cannot close ${this.label}: ${errorMessage(err)}`,
        this.label,
        'close',
        errorCode(err),
        err,
      );
    }
  }
}

class FileWriter implements WritableChannel {
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    readonly label: string,
  ) {}

  async write(bytes: Uint8Array): Promise<void> {
    let offset = 0;
    try {
      while (offset < bytes.length) {
        const { bytesWritten } = await this.handle.write(bytes, offset, bytes.length - offset);
        offset += bytesWritten;
      }
    } catch (err) {
      throw new TransportError(
        `Cannot write ${this.label}: ${errorMessage(err)}`,
        this.label,
        'write',
        errorCode(err),
        err,
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.handle.close();
    } catch (err) {
      throw new TransportError(
        `Cannot close ${this.label}: ${errorMessage(err)}`,
        this.label,
        'close',
        errorCode(err),
        err,
      );
    }
  }
}

/** Default FileSystem over node:fs/promises file handles. */
export const nodeFileSystem: FileSystem = {
  async openReadable(path: string): Promise<ReadableChannel> {
    try {
      return new FileReader(await open(path, 'r'), path);
    } catch (err) {
      throw new EndpointError(`Cannot open ${path}: ${errorMessage(err)}`, path, errorCode(err), err);
    }
  },

  async openWritable(path: string, append: boolean): Promise<WritableChannel> {
    try {
      return new FileWriter(await open(path, append ? 'a' : 'w'), path);
    } catch (err) {
      throw new EndpointError(
        `Cannot open ${path} for writing: ${errorMessage(err)}`,
        path,
        errorCode(err),
        err,
      );
    }
  },

  exists(path: string): boolean {
    return existsSync(path);
  },
};

// --- Standard stream channels ---

/**
 * Pull-style reader over a Readable. Keeps the remainder of the last
 * delivered chunk so every read is capped at the caller's buffer size.
 */
export class StreamReader implements ReadableChannel {
  private readonly iterator: AsyncIterator<unknown>;
  private carry: Uint8Array = new Uint8Array(0);
  private exhausted = false;
  private closed = false;

  constructor(
    private readonly stream: Readable,
    readonly label: string,
  ) {
    this.iterator = stream[Symbol.asyncIterator]();
  }

  async read(into: Uint8Array): Promise<number> {
    while (this.carry.length === 0) {
      if (this.exhausted) {
        return 0;
      }
      let next: IteratorResult<unknown>;
      try {
        next = await this.iterator.next();
      } catch (err) {
        throw new TransportError(
          `Cannot read ${this.label}: ${errorMessage(err)}`,
          this.label,
          'read',
          errorCode(err),
          err,
        );
      }
      if (next.done === true) {
        this.exhausted = true;
        return 0;
      }
      this.carry = toBytes(next.value);
    }
    const count = Math.min(into.length, this.carry.length);
    into.set(this.carry.subarray(0, count));
    this.carry = this.carry.subarray(count);
    return count;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.carry = new Uint8Array(0);
    if (!this.exhausted && this.iterator.return) {
      // Stops the iterator; the stream is left destroyed.
      await this.iterator.return();
    }
    this.stream.pause();
  }
}

/**
 * Writer over an inherited Writable. Each write waits for its callback;
 * the stream itself is never ended.
 */
export class StreamWriter implements WritableChannel {
  private failure: Error | undefined;

  constructor(
    private readonly stream: Writable,
    readonly label: string,
  ) {
    // EPIPE can surface after the write callback; record it for the next call.
    stream.on('error', (err: Error) => {
      this.failure ??= err;
    });
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.wrap(this.failure));
    }
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        this.failure = err;
        reject(this.wrap(err));
      };
      this.stream.once('error', onError);
      this.stream.write(bytes, (err) => {
        this.stream.off('error', onError);
        if (err) {
          this.failure = err;
          reject(this.wrap(err));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    if (this.failure) {
      throw this.wrap(this.failure);
    }
  }

  private wrap(err: Error): TransportError {
    const code = errorCode(err);
    const message =
      code === 'EPIPE'
        ? `Cannot write ${this.label}: downstream pipe closed`
        : `Cannot write ${this.label}: ${err.message}`;
    return new TransportError(message, this.label, 'write', code, err);
  }
}

function toBytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === 'string') {
    return Buffer.from(value);
  }
  throw new TypeError(`Unexpected chunk type from stream: ${typeof value}`);
}

/** Terminal state of the inherited streams. */
export interface TerminalState {
  stdinIsPipe: boolean;
  stdoutIsPipe: boolean;
}

/** Detect pipe vs terminal for the current process. */
export function detectTerminalState(): TerminalState {
  return {
    stdinIsPipe: !process.stdin.isTTY,
    stdoutIsPipe: !process.stdout.isTTY,
  };
}

/** Default I/O bundle for the running process. */
export function processEndpointIO(): EndpointIO {
  return {
    fs: nodeFileSystem,
    streams: { stdin: process.stdin, stdout: process.stdout },
  };
}
