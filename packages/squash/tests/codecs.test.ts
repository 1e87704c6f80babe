import { describe, expect, it } from 'vitest';

import { LZ4_BLOCK_SIZE, Lz4Backend } from '../src/codec-lz4.js';
import { LzfseBackend } from '../src/codec-lzfse.js';
import { LzmaBackend } from '../src/codec-lzma.js';
import { OutputWindow, runSessionInMemory } from '../src/codec-output.js';
import { TransformSession } from '../src/codec-transform.js';
import type { ChunkResult, CodecBackend } from '../src/codec-types.js';
import { ZlibBackend } from '../src/codec-zlib.js';
import { crc32 } from '../src/crc32.js';
import { CodecError } from '../src/types.js';
import { noiseBytes, sampleText } from './helpers.js';

const backends: CodecBackend[] = [
  new Lz4Backend(),
  new LzfseBackend(),
  new LzmaBackend(),
  new ZlibBackend(),
];

function frameHeader(magic: string, ...sizes: number[]): Buffer {
  const header = Buffer.alloc(4 + sizes.length * 4);
  header.write(magic, 0, 'latin1');
  sizes.forEach((size, i) => header.writeUInt32LE(size, 4 + i * 4));
  return header;
}

const cases = backends.map((b): [string, CodecBackend] => [b.name, b]);

describe.each(cases)('%s backend', (_name, backend) => {
  it('round-trips empty input', async () => {
    const packed = await backend.compressBuffer(new Uint8Array(0));
    const restored = await backend.decompressBuffer(packed);
    expect(restored.length).toBe(0);
  });

  it('round-trips small text', async () => {
    const original = Buffer.from('Hello, world! '.repeat(100));
    const packed = await backend.compressBuffer(original);
    expect(packed.length).toBeLessThan(original.length);
    const restored = await backend.decompressBuffer(packed);
    expect(Buffer.from(restored).equals(original)).toBe(true);
  });

  it('round-trips input spanning many chunks', async () => {
    const original = sampleText(300 * 1024);
    const restored = await backend.decompressBuffer(await backend.compressBuffer(original));
    expect(Buffer.from(restored).equals(original)).toBe(true);
  });

  it('round-trips incompressible bytes', async () => {
    const original = noiseBytes(100 * 1024);
    const restored = await backend.decompressBuffer(await backend.compressBuffer(original));
    expect(Buffer.from(restored).equals(original)).toBe(true);
  });

  it('round-trips through a small output window', async () => {
    const original = sampleText(20 * 1024);
    const packed = await runSessionInMemory(backend.beginStream('compress', 16), original, 16);
    const restored = await runSessionInMemory(backend.beginStream('decompress', 16), packed, 16);
    expect(Buffer.from(restored).equals(original)).toBe(true);
  });
});

describe.each(cases)('%s stream boundaries', (_name, backend) => {
  it('rejects a truncated stream', async () => {
    const packed = await backend.compressBuffer(sampleText(200 * 1024));
    await expect(
      backend.decompressBuffer(packed.subarray(0, Math.floor(packed.length / 2))),
    ).rejects.toMatchObject({
      name: 'CodecError',
      algorithm: backend.name,
      direction: 'decompress',
    });
  });

  it('rejects data after the end of the stream', async () => {
    const packed = await backend.compressBuffer(Buffer.from('complete stream\n'));
    await expect(
      backend.decompressBuffer(Buffer.concat([packed, Buffer.from('xyz')])),
    ).rejects.toMatchObject({
      name: 'CodecError',
      algorithm: backend.name,
      direction: 'decompress',
    });
  });

  it('rejects random bytes', async () => {
    await expect(backend.decompressBuffer(noiseBytes(4096))).rejects.toBeInstanceOf(CodecError);
  });
});

const trailingCases: [string, CodecBackend][] = [
  ['zlib', new ZlibBackend()],
  ['lzfse', new LzfseBackend()],
  ['lz4', new Lz4Backend()],
];

describe('trailing data', () => {
  it.each(trailingCases)('names the problem for %s', async (name, backend) => {
    const packed = await backend.compressBuffer(Buffer.from('complete stream\n'));
    await expect(
      backend.decompressBuffer(Buffer.concat([packed, Buffer.from('xyz')])),
    ).rejects.toThrow(`Decompression failed (${name}): unexpected data after end of stream`);
  });

  it('rejects data arriving in a later chunk', async () => {
    const zlib = new ZlibBackend();
    const packed = await zlib.compressBuffer(Buffer.from('complete stream\n'));
    const session = zlib.beginStream('decompress', 1024);

    const parts: Buffer[] = [];
    let residual: Uint8Array = packed;
    let result: ChunkResult;
    do {
      result = await session.processChunk(residual, false);
      residual = residual.subarray(result.consumed);
      parts.push(Buffer.from(result.output));
    } while (result.status === 'need-output-space');
    expect(result.status).toBe('continue');
    expect(Buffer.concat(parts).toString()).toBe('complete stream\n');

    await expect(session.processChunk(Buffer.from('xyz'), false)).rejects.toThrow(
      'unexpected data after end of stream',
    );
    session.destroy();
  });
});

const backpressuredCases: [string, CodecBackend][] = [
  ['zlib', new ZlibBackend()],
  ['lzfse', new LzfseBackend()],
];

describe.each(backpressuredCases)('%s decoder buffering', (_name, backend) => {
  it('holds a bounded amount of output however far the input expands', async () => {
    const size = 16 * 1024 * 1024;
    const packed = await backend.compressBuffer(Buffer.alloc(size));
    const chunkSize = 1024;
    const session = backend.beginStream('decompress', chunkSize);
    if (!(session instanceof TransformSession)) {
      throw new Error('expected a stream-backed session');
    }

    let offset = 0;
    let produced = 0;
    let peak = 0;
    let calls = 0;
    try {
      for (;;) {
        const end = Math.min(offset + chunkSize, packed.length);
        let residual = packed.subarray(offset, end);
        offset = end;
        const isFinal = offset === packed.length;
        let result: ChunkResult;
        do {
          result = await session.processChunk(residual, isFinal);
          calls++;
          residual = residual.subarray(result.consumed);
          produced += result.output.length;
          peak = Math.max(peak, session.buffered);
          expect(result.output.length).toBeLessThanOrEqual(chunkSize * 4);
          expect(result.output.every((byte) => byte === 0)).toBe(true);
        } while (result.status === 'need-output-space');
        if (result.status === 'done') {
          break;
        }
      }
    } finally {
      session.destroy();
    }

    expect(produced).toBe(size);
    expect(calls).toBeGreaterThanOrEqual(size / (chunkSize * 4));
    expect(peak).toBeLessThan(256 * 1024);
  });
});

describe('corrupt input', () => {
  it('rejects a reserved deflate block type', async () => {
    await expect(new ZlibBackend().decompressBuffer(Buffer.alloc(64, 0xff))).rejects.toThrow(
      /^Decompression failed \(zlib\): /,
    );
  });

  it('rejects data without the xz magic', async () => {
    await expect(
      new LzmaBackend().decompressBuffer(Buffer.from('this is plain text, not an xz stream')),
    ).rejects.toBeInstanceOf(CodecError);
  });
});

describe('lz4 framing', () => {
  const lz4 = new Lz4Backend();

  it('stores incompressible blocks raw', async () => {
    const packed = Buffer.from(await lz4.compressBuffer(noiseBytes(1000)));
    expect(packed.subarray(0, 4).toString('latin1')).toBe('SQ4R');
    expect(packed.readUInt32LE(4)).toBe(1000);
    expect(packed.readUInt32LE(8)).toBe(crc32(noiseBytes(1000)));
    expect(packed.length).toBe(12 + 1000 + 4);
    expect(packed.subarray(-4).toString('latin1')).toBe('SQ4E');
  });

  it('compresses redundant blocks', async () => {
    const packed = Buffer.from(await lz4.compressBuffer(Buffer.alloc(1000, 0x61)));
    expect(packed.subarray(0, 4).toString('latin1')).toBe('SQ4C');
    expect(packed.readUInt32LE(4)).toBe(1000);
    expect(packed.readUInt32LE(8)).toBe(packed.length - 16 - 4);
    expect(packed.readUInt32LE(12)).toBe(crc32(Buffer.alloc(1000, 0x61)));
  });

  it('splits long input into fixed-size blocks', async () => {
    const original = Buffer.alloc(LZ4_BLOCK_SIZE * 2 + 10, 0x62);
    const packed = Buffer.from(await lz4.compressBuffer(original));
    const blocks: string[] = [];
    let offset = 0;
    while (offset < packed.length) {
      const magic = packed.subarray(offset, offset + 4).toString('latin1');
      const size = magic === 'SQ4E' ? 0 : packed.readUInt32LE(offset + 4);
      blocks.push(magic === 'SQ4E' ? magic : `${magic}:${size}`);
      if (magic === 'SQ4C') {
        offset += 16 + packed.readUInt32LE(offset + 8);
      } else if (magic === 'SQ4R') {
        offset += 12 + size;
      } else {
        offset += 4;
      }
    }
    // The 10-byte tail does not shrink, so it is stored.
    expect(blocks).toEqual([
      `SQ4C:${LZ4_BLOCK_SIZE}`,
      `SQ4C:${LZ4_BLOCK_SIZE}`,
      'SQ4R:10',
      'SQ4E',
    ]);
  });

  it('decodes a hand-built stored frame', async () => {
    const frame = Buffer.concat([
      frameHeader('SQ4R', 5, crc32(Buffer.from('hello'))),
      Buffer.from('hello'),
      Buffer.from('SQ4E'),
    ]);
    expect(Buffer.from(await lz4.decompressBuffer(frame)).toString()).toBe('hello');
  });

  it('rejects a corrupted stored block', async () => {
    const frame = Buffer.concat([
      frameHeader('SQ4R', 5, crc32(Buffer.from('hello'))),
      Buffer.from('jello'),
      Buffer.from('SQ4E'),
    ]);
    await expect(lz4.decompressBuffer(frame)).rejects.toThrow(
      'Decompression failed (lz4): block checksum mismatch',
    );
  });

  it('rejects a flipped byte in encoded output', async () => {
    const packed = Buffer.from(await lz4.compressBuffer(noiseBytes(1000)));
    packed.writeUInt8(packed.readUInt8(512) ^ 0x01, 512);
    await expect(lz4.decompressBuffer(packed)).rejects.toThrow('block checksum mismatch');
  });

  it('rejects a bad block magic', async () => {
    await expect(lz4.decompressBuffer(Buffer.from('XXXXjunk'))).rejects.toThrow(
      'Decompression failed (lz4): bad block magic 0x58585858',
    );
  });

  it('rejects a missing end marker', async () => {
    const frame = Buffer.concat([
      frameHeader('SQ4R', 5, crc32(Buffer.from('hello'))),
      Buffer.from('hello'),
    ]);
    await expect(lz4.decompressBuffer(frame)).rejects.toThrow(
      'Decompression failed (lz4): truncated stream (missing end marker)',
    );
  });

  it('rejects data after the end marker', async () => {
    const packed = Buffer.from(await lz4.compressBuffer(Buffer.from('abc')));
    await expect(lz4.decompressBuffer(Buffer.concat([packed, Buffer.from('x')]))).rejects.toThrow(
      'unexpected data after end of stream',
    );
  });

  it('rejects out-of-range block sizes', async () => {
    await expect(lz4.decompressBuffer(frameHeader('SQ4R', 0, 0))).rejects.toThrow(
      `block size 0 outside 1..${LZ4_BLOCK_SIZE}`,
    );
    await expect(lz4.decompressBuffer(frameHeader('SQ4R', LZ4_BLOCK_SIZE + 1, 0))).rejects.toThrow(
      `block size ${LZ4_BLOCK_SIZE + 1} outside 1..${LZ4_BLOCK_SIZE}`,
    );
    await expect(lz4.decompressBuffer(frameHeader('SQ4C', 10, 20, 0))).rejects.toThrow(
      'encoded size 20 invalid for a 10-byte block',
    );
  });
});

describe('OutputWindow', () => {
  it('hands out at most its capacity per call', () => {
    const window = new OutputWindow(4);
    window.push(Buffer.from('abcdef'));
    expect(window.full).toBe(true);

    const first = window.result(0, 0, false, false);
    expect(first.status).toBe('need-output-space');
    expect(Buffer.from(first.output).toString()).toBe('abcd');

    const second = window.result(0, 0, false, false);
    expect(second.status).toBe('continue');
    expect(Buffer.from(second.output).toString()).toBe('ef');
  });

  it('asks for another call until final input is flushed', () => {
    const window = new OutputWindow(4);
    expect(window.result(0, 0, false, true).status).toBe('need-output-space');
    expect(window.result(0, 0, true, true).status).toBe('done');
  });

  it('reports unconsumed input', () => {
    const window = new OutputWindow(4);
    const result = window.result(2, 5, false, false);
    expect(result).toMatchObject({ status: 'need-output-space', consumed: 2 });
  });
});
