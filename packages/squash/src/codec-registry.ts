/**
 * Name-to-backend lookup. Names are matched case-insensitively; the last
 * registration of a name wins.
 */

import { Lz4Backend } from './codec-lz4.js';
import { LzfseBackend } from './codec-lzfse.js';
import { LzmaBackend } from './codec-lzma.js';
import type { CodecBackend } from './codec-types.js';
import { ZlibBackend } from './codec-zlib.js';
import type { CompressionLevel } from './types.js';

export class CodecRegistry {
  private readonly backends = new Map<string, CodecBackend>();

  register(backend: CodecBackend): void {
    this.backends.set(backend.name.toLowerCase(), backend);
  }

  lookup(name: string): CodecBackend | undefined {
    return this.backends.get(name.trim().toLowerCase());
  }

  isRegistered(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Registered names, sorted. */
  supportedNames(): string[] {
    return [...this.backends.keys()].sort();
  }
}

/** Fresh registry holding all four built-in backends. */
export function createDefaultRegistry(
  options: { level?: CompressionLevel | undefined } = {},
): CodecRegistry {
  const registry = new CodecRegistry();
  registry.register(new Lz4Backend());
  registry.register(new LzfseBackend(options));
  registry.register(new LzmaBackend(options));
  registry.register(new ZlibBackend(options));
  return registry;
}
