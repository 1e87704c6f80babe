/**
 * squash -- Streaming file compression over pluggable codecs.
 *
 * Library exports for programmatic usage.
 */

export type {
  AlgorithmName,
  CompressionLevel,
  Direction,
  ErrorCategory,
  GlobalOptions,
  TransportOperation,
} from './types.js';

export {
  ALGORITHM_NAMES,
  CodecError,
  EndpointError,
  LimitExceededError,
  OutputExistsError,
  ResolutionError,
  SquashError,
  TransportError,
  ValidationError,
} from './types.js';

export type { ChunkResult, ChunkStatus, CodecBackend, CodecSession } from './codec-types.js';
export { DEFAULT_CHUNK_SIZE } from './codec-types.js';
export { ChunkedBackend, OutputWindow } from './codec-output.js';
export { CodecRegistry, createDefaultRegistry } from './codec-registry.js';
export { Lz4Backend } from './codec-lz4.js';
export { LzfseBackend } from './codec-lzfse.js';
export { LzmaBackend } from './codec-lzma.js';
export { ZlibBackend } from './codec-zlib.js';

export type {
  Endpoint,
  EndpointIO,
  FileSystem,
  ReadableChannel,
  SinkEndpoint,
  SourceEndpoint,
  WritableChannel,
} from './endpoint.js';
export {
  describeEndpoint,
  fileSink,
  fileSource,
  standardInput,
  standardOutput,
} from './endpoint.js';

export type {
  ChunkObserver,
  ChunkProgress,
  LoopState,
  RunOptions,
  RunSummary,
} from './stream-loop.js';
export { StreamLoop, run } from './stream-loop.js';

export type { ResolveRequest, ResolvedOutputPlan } from './resolve.js';
export { inferAlgorithm, resolvePlan } from './resolve.js';

export type { CommandOptions, CommandOutcome } from './commands.js';
export { compressCommand, decompressCommand } from './commands.js';

export type { SquashConfig } from './config.js';
export { getBuiltinDefaults, loadConfigFile, mergeConfigs, parseSize, resolveConfig } from './config.js';
export { createLimitGuard } from './limits.js';
export { COMPRESSION_LEVELS, levelPreset } from './levels.js';
export { formatSize, formatJson, formatJsonError } from './format.js';
