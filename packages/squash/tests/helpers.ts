/**
 * In-process stand-ins for the driving loop's collaborators.
 */

import { PassThrough } from 'node:stream';

import { OutputWindow } from '../src/codec-output.js';
import type { ChunkResult, CodecBackend, CodecSession } from '../src/codec-types.js';
import type { EndpointIO, FileSystem, ReadableChannel, WritableChannel } from '../src/endpoint.js';
import type { AlgorithmName, Direction } from '../src/types.js';
import { EndpointError } from '../src/types.js';

/** Deterministic, compressible text of the given size. */
export function sampleText(size: number): Buffer {
  const words = ['alpha', 'bravo', 'charlie', 'delta', 'echo', 'foxtrot', 'golf', 'hotel'];
  let seed = 7;
  let text = '';
  while (text.length < size) {
    seed = (seed * 1103515245 + 12345) % 2147483648;
    text += `${words[seed % words.length] ?? 'x'} `;
  }
  return Buffer.from(text.slice(0, size));
}

/** Deterministic bytes with no useful redundancy. */
export function noiseBytes(size: number): Buffer {
  const out = Buffer.alloc(size);
  let seed = 42;
  for (let i = 0; i < size; i++) {
    seed = (seed * 1664525 + 1013904223) % 4294967296;
    out[i] = seed >>> 24;
  }
  return out;
}

class MemoryReader implements ReadableChannel {
  private offset = 0;

  constructor(
    private readonly data: Uint8Array,
    readonly label: string,
    private readonly fs: MemoryFileSystem,
  ) {}

  async read(into: Uint8Array): Promise<number> {
    this.fs.events.push(`read:${this.label}`);
    this.fs.readSizes.push(into.length);
    const count = Math.min(into.length, this.data.length - this.offset);
    into.set(this.data.subarray(this.offset, this.offset + count));
    this.offset += count;
    return count;
  }

  async close(): Promise<void> {
    this.fs.events.push(`close:${this.label}`);
  }
}

class MemoryWriter implements WritableChannel {
  private readonly parts: Buffer[] = [];

  constructor(
    readonly label: string,
    private readonly fs: MemoryFileSystem,
  ) {}

  async write(bytes: Uint8Array): Promise<void> {
    if (this.fs.writeError) {
      throw this.fs.writeError;
    }
    this.fs.writeSizes.push(bytes.length);
    this.parts.push(Buffer.from(bytes));
  }

  async close(): Promise<void> {
    this.fs.events.push(`close:${this.label}`);
    this.fs.files.set(this.label, Buffer.concat(this.parts));
    if (this.fs.closeError) {
      throw this.fs.closeError;
    }
  }
}

/** Map-backed FileSystem that records reads, writes and closes. */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, Buffer>();
  readonly events: string[] = [];
  readonly readSizes: number[] = [];
  readonly writeSizes: number[] = [];
  openWritableError: Error | undefined;
  writeError: Error | undefined;
  closeError: Error | undefined;

  async openReadable(path: string): Promise<ReadableChannel> {
    const data = this.files.get(path);
    if (data === undefined) {
      throw new EndpointError(`Cannot open ${path}: not found`, path, 'ENOENT');
    }
    return new MemoryReader(data, path, this);
  }

  async openWritable(path: string): Promise<WritableChannel> {
    if (this.openWritableError) {
      throw this.openWritableError;
    }
    return new MemoryWriter(path, this);
  }

  exists(path: string): boolean {
    return this.files.has(path);
  }

  read(path: string): Buffer {
    const data = this.files.get(path);
    if (data === undefined) {
      throw new Error(`no such memory file: ${path}`);
    }
    return data;
  }
}

export function memoryIO(fs: MemoryFileSystem): EndpointIO {
  return { fs, streams: { stdin: new PassThrough(), stdout: new PassThrough() } };
}

export interface RecordedCall {
  length: number;
  isFinal: boolean;
}

/**
 * Identity codec whose output window is `factor` times the chunk size, so
 * small factors force the need-output-space path.
 */
export class CopyBackend implements CodecBackend {
  readonly name: AlgorithmName = 'zlib';
  readonly description = 'identity';
  readonly calls: RecordedCall[] = [];
  failOnCall: number | undefined;

  constructor(private readonly factor = 1) {}

  expansionFactor(): number {
    return this.factor;
  }

  compressBuffer(input: Uint8Array): Promise<Uint8Array> {
    return Promise.resolve(input.slice());
  }

  decompressBuffer(input: Uint8Array): Promise<Uint8Array> {
    return Promise.resolve(input.slice());
  }

  beginStream(direction: Direction, chunkSize: number): CodecSession {
    return new CopySession(this, direction, Math.max(1, Math.floor(chunkSize * this.factor)));
  }
}

class CopySession implements CodecSession {
  readonly algorithm: AlgorithmName = 'zlib';
  private readonly window: OutputWindow;
  private ended = false;
  bytesIn = 0;
  bytesOut = 0;

  constructor(
    private readonly backend: CopyBackend,
    readonly direction: Direction,
    capacity: number,
  ) {
    this.window = new OutputWindow(capacity);
  }

  get finished(): boolean {
    return this.ended && this.window.pending === 0;
  }

  async processChunk(input: Uint8Array, isFinal: boolean): Promise<ChunkResult> {
    this.backend.calls.push({ length: input.length, isFinal });
    if (this.backend.failOnCall === this.backend.calls.length) {
      throw new Error('copy failed');
    }
    const space = Math.max(0, this.window.capacity - this.window.pending);
    const consumed = Math.min(input.length, space);
    this.window.push(input.slice(0, consumed));
    if (isFinal && consumed === input.length) {
      this.ended = true;
    }
    this.bytesIn += consumed;
    const result = this.window.result(consumed, input.length, this.ended, isFinal);
    this.bytesOut += result.output.length;
    return result;
  }

  destroy(): void {
    this.window.clear();
  }
}
