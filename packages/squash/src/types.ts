/**
 * Shared type definitions and the error hierarchy for squash.
 *
 * No runtime logic beyond the error classes.
 */

/** Compression algorithm identifiers. Always lowercase internally. */
export type AlgorithmName = 'lz4' | 'lzfse' | 'lzma' | 'zlib';

/** Fixed suffix table used for naming and inference. */
export const ALGORITHM_NAMES: readonly AlgorithmName[] = ['lz4', 'lzfse', 'lzma', 'zlib'];

export type Direction = 'compress' | 'decompress';

/** Tuning preset applied when a backend is constructed. */
export type CompressionLevel = 'fast' | 'balanced' | 'best';

/** Global CLI options shared across all commands. */
export interface GlobalOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

export type ErrorCategory =
  | 'validation'
  | 'resolution'
  | 'endpoint'
  | 'transport'
  | 'codec'
  | 'limit'
  | 'conflict'
  | 'unknown';

/** Structured CLI error with category and optional troubleshooting. */
export class SquashError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly exitCode = 1,
    public readonly suggestions?: string[],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SquashError';
  }
}

/** Validation error for malformed input. */
export class ValidationError extends SquashError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'validation', 1, suggestions);
    this.name = 'ValidationError';
  }
}

/** The algorithm or destination could not be determined. Raised before any I/O. */
export class ResolutionError extends SquashError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'resolution', 1, suggestions);
    this.name = 'ResolutionError';
  }
}

/** A file or stream could not be opened. */
export class EndpointError extends SquashError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly code: string | undefined,
    cause?: unknown,
  ) {
    super(message, 'endpoint', 1, undefined, { cause });
    this.name = 'EndpointError';
  }
}

export type TransportOperation = 'read' | 'write' | 'close';

/** Read, write, or close failed after the endpoint was opened. */
export class TransportError extends SquashError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly operation: TransportOperation,
    public readonly code: string | undefined,
    cause?: unknown,
  ) {
    super(message, 'transport', 1, undefined, { cause });
    this.name = 'TransportError';
  }
}

/** Codec initialization, encode, or decode failure. */
export class CodecError extends SquashError {
  constructor(
    message: string,
    public readonly algorithm: AlgorithmName,
    public readonly direction: Direction,
    public readonly bytesIn: number,
    public readonly bytesOut: number,
    cause?: unknown,
  ) {
    super(message, 'codec', 1, undefined, { cause });
    this.name = 'CodecError';
  }
}

/** A configured resource limit was crossed mid-stream. */
export class LimitExceededError extends SquashError {
  constructor(
    message: string,
    public readonly limit: 'max_ratio' | 'max_output_size',
    public readonly actual: number,
  ) {
    super(message, 'limit', 1, ['Raise or remove the limit in .squash.yml if the input is trusted.']);
    this.name = 'LimitExceededError';
  }
}

/** The output file exists and overwriting was not requested. */
export class OutputExistsError extends SquashError {
  constructor(public readonly path: string) {
    super(`Output file already exists: ${path}`, 'conflict', 1, [
      'Use -f to overwrite, or -o to choose another name.',
    ]);
    this.name = 'OutputExistsError';
  }
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Extract a Node system error code (ENOENT, EPIPE, ...) when present. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
