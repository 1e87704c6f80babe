/**
 * lz4 backend: fast, small window.
 *
 * lz4-napi compresses whole blocks, so the stream is cut into 64 KiB blocks
 * with a small frame around each one:
 *
 *   compressed block  "SQ4C" u32le decodedSize u32le encodedSize u32le crc32 payload
 *   stored block      "SQ4R" u32le size u32le crc32 raw-bytes
 *   end of stream     "SQ4E"
 *
 * The CRC-32 covers the decoded bytes of the block.
 *
 * A block is stored raw when compression does not shrink it. Headers may
 * straddle chunk boundaries; the decoder carries partial headers and
 * payloads between calls.
 */

import lz4 from 'lz4-napi';

import { ChunkedBackend, OutputWindow } from './codec-output.js';
import type { ChunkResult, CodecSession } from './codec-types.js';
import { crc32 } from './crc32.js';
import type { Direction } from './types.js';
import { CodecError, errorMessage } from './types.js';

/** Uncompressed bytes per block. Part of the frame format. */
export const LZ4_BLOCK_SIZE = 64 * 1024;

const MAGIC_COMPRESSED = 0x53513443; // "SQ4C"
const MAGIC_RAW = 0x53513452; // "SQ4R"
const MAGIC_END = 0x53513445; // "SQ4E"

const MAGIC_BYTES = 4;
const RAW_HEADER_BYTES = 12;
const COMPRESSED_HEADER_BYTES = 16;

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function endMarker(): Uint8Array {
  const marker = new Uint8Array(MAGIC_BYTES);
  new DataView(marker.buffer).setUint32(0, MAGIC_END, false);
  return marker;
}

class Lz4FrameEncoder implements CodecSession {
  readonly algorithm = 'lz4';
  readonly direction = 'compress';
  private readonly output: OutputWindow;
  private readonly block = new Uint8Array(LZ4_BLOCK_SIZE);
  private fill = 0;
  private ended = false;
  private inCount = 0;
  private outCount = 0;

  constructor(capacity: number) {
    this.output = new OutputWindow(capacity);
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

  async processChunk(input: Uint8Array, isFinal: boolean): Promise<ChunkResult> {
    let consumed = 0;
    try {
      while (consumed < input.length && !this.output.full) {
        const take = Math.min(LZ4_BLOCK_SIZE - this.fill, input.length - consumed);
        this.block.set(input.subarray(consumed, consumed + take), this.fill);
        this.fill += take;
        consumed += take;
        if (this.fill === LZ4_BLOCK_SIZE) {
          this.emitBlock();
        }
      }
      if (isFinal && consumed === input.length && !this.ended) {
        if (this.fill > 0) {
          this.emitBlock();
        }
        this.output.push(endMarker());
        this.ended = true;
      }
    } catch (err) {
      throw new CodecError(
        `Compression failed (lz4): ${errorMessage(err)}`,
        'lz4',
        'compress',
        this.inCount + consumed,
        this.outCount,
        err,
      );
    }

    this.inCount += consumed;
    const result = this.output.result(consumed, input.length, this.ended, isFinal);
    this.outCount += result.output.length;
    return result;
  }

  destroy(): void {
    this.output.clear();
    this.fill = 0;
  }

  private emitBlock(): void {
    const raw = this.block.subarray(0, this.fill);
    const packed = lz4.compressSync(toBuffer(raw));

    if (packed.length < raw.length) {
      const header = new Uint8Array(COMPRESSED_HEADER_BYTES);
      const view = new DataView(header.buffer);
      view.setUint32(0, MAGIC_COMPRESSED, false);
      view.setUint32(4, raw.length, true);
      view.setUint32(8, packed.length, true);
      view.setUint32(12, crc32(raw), true);
      this.output.push(header);
      this.output.push(packed);
    } else {
      const header = new Uint8Array(RAW_HEADER_BYTES);
      const view = new DataView(header.buffer);
      view.setUint32(0, MAGIC_RAW, false);
      view.setUint32(4, raw.length, true);
      view.setUint32(8, crc32(raw), true);
      this.output.push(header);
      this.output.push(raw.slice());
    }
    this.fill = 0;
  }
}

type DecoderState = 'header' | 'payload' | 'end';

class Lz4FrameDecoder implements CodecSession {
  readonly algorithm = 'lz4';
  readonly direction = 'decompress';
  private readonly output: OutputWindow;
  private readonly header = new Uint8Array(COMPRESSED_HEADER_BYTES);
  private readonly headerView = new DataView(this.header.buffer);
  private readonly payload = new Uint8Array(LZ4_BLOCK_SIZE);
  private state: DecoderState = 'header';
  private headerFill = 0;
  private headerNeed = MAGIC_BYTES;
  private payloadFill = 0;
  private payloadNeed = 0;
  private decodedSize = 0;
  private checksum = 0;
  private blockIsRaw = false;
  private done = false;
  private inCount = 0;
  private outCount = 0;

  constructor(capacity: number) {
    this.output = new OutputWindow(capacity);
  }

  get bytesIn(): number {
    return this.inCount;
  }

  get bytesOut(): number {
    return this.outCount;
  }

  get finished(): boolean {
    return this.done && this.output.pending === 0;
  }

  async processChunk(input: Uint8Array, isFinal: boolean): Promise<ChunkResult> {
    let consumed = 0;
    try {
      while (consumed < input.length && !this.output.full) {
        if (this.state === 'end') {
          throw new Error('unexpected data after end of stream');
        }
        if (this.state === 'header') {
          const take = Math.min(this.headerNeed - this.headerFill, input.length - consumed);
          this.header.set(input.subarray(consumed, consumed + take), this.headerFill);
          this.headerFill += take;
          consumed += take;
          if (this.headerFill === this.headerNeed) {
            this.parseHeader();
          }
        } else {
          const take = Math.min(this.payloadNeed - this.payloadFill, input.length - consumed);
          this.payload.set(input.subarray(consumed, consumed + take), this.payloadFill);
          this.payloadFill += take;
          consumed += take;
          if (this.payloadFill === this.payloadNeed) {
            this.decodeBlock();
          }
        }
      }
      if (isFinal && consumed === input.length && this.state !== 'end') {
        throw new Error('truncated stream (missing end marker)');
      }
    } catch (err) {
      throw new CodecError(
        `Decompression failed (lz4): ${errorMessage(err)}`,
        'lz4',
        'decompress',
        this.inCount + consumed,
        this.outCount,
        err,
      );
    }

    this.inCount += consumed;
    this.done = this.state === 'end' && isFinal && consumed === input.length;
    const result = this.output.result(consumed, input.length, this.done, isFinal);
    this.outCount += result.output.length;
    return result;
  }

  destroy(): void {
    this.output.clear();
  }

  private parseHeader(): void {
    const magic = this.headerView.getUint32(0, false);

    if (this.headerFill === MAGIC_BYTES) {
      switch (magic) {
        case MAGIC_END:
          this.state = 'end';
          return;
        case MAGIC_RAW:
          this.headerNeed = RAW_HEADER_BYTES;
          return;
        case MAGIC_COMPRESSED:
          this.headerNeed = COMPRESSED_HEADER_BYTES;
          return;
        default:
          throw new Error(`bad block magic 0x${magic.toString(16).padStart(8, '0')}`);
      }
    }

    const decodedSize = this.headerView.getUint32(4, true);
    if (decodedSize === 0 || decodedSize > LZ4_BLOCK_SIZE) {
      throw new Error(`block size ${decodedSize} outside 1..${LZ4_BLOCK_SIZE}`);
    }
    this.decodedSize = decodedSize;
    this.blockIsRaw = magic === MAGIC_RAW;

    if (this.blockIsRaw) {
      this.payloadNeed = decodedSize;
      this.checksum = this.headerView.getUint32(8, true);
    } else {
      this.checksum = this.headerView.getUint32(12, true);
      const encodedSize = this.headerView.getUint32(8, true);
      if (encodedSize === 0 || encodedSize > decodedSize) {
        throw new Error(`encoded size ${encodedSize} invalid for a ${decodedSize}-byte block`);
      }
      this.payloadNeed = encodedSize;
    }
    this.payloadFill = 0;
    this.state = 'payload';
  }

  private decodeBlock(): void {
    const payload = this.payload.subarray(0, this.payloadNeed);
    const decoded = this.blockIsRaw ? payload.slice() : lz4.uncompressSync(toBuffer(payload));
    if (decoded.length !== this.decodedSize) {
      throw new Error(`block decoded to ${decoded.length} bytes, header says ${this.decodedSize}`);
    }
    if (crc32(decoded) !== this.checksum) {
      throw new Error('block checksum mismatch');
    }
    this.output.push(decoded);
    this.state = 'header';
    this.headerFill = 0;
    this.headerNeed = MAGIC_BYTES;
  }
}

export class Lz4Backend extends ChunkedBackend {
  readonly name = 'lz4';
  readonly description = 'Fastest; lower ratio, small window';

  expansionFactor(direction: Direction): number {
    return direction === 'compress' ? 2 : 4;
  }

  beginStream(direction: Direction, chunkSize: number): CodecSession {
    const capacity = this.windowSize(direction, chunkSize);
    return direction === 'compress'
      ? new Lz4FrameEncoder(capacity)
      : new Lz4FrameDecoder(capacity);
  }
}
