/**
 * Output path and algorithm resolution.
 *
 * Turns the user's (input, algorithm?, output?, direction) into a concrete
 * sink and algorithm before any byte is read. Pure given its environment.
 */

import { basename, extname } from 'node:path';

import type { CodecRegistry } from './codec-registry.js';
import type { SinkEndpoint, SourceEndpoint } from './endpoint.js';
import { describeEndpoint, fileSink, standardOutput } from './endpoint.js';
import type { AlgorithmName, Direction } from './types.js';
import { ALGORITHM_NAMES, ResolutionError } from './types.js';

/** Suffix appended when the natural decompressed name is already taken. */
export const COLLISION_SUFFIX = '.out';

export interface ResolveRequest {
  input: SourceEndpoint;
  algorithm?: string | undefined;
  output?: SinkEndpoint | undefined;
  direction: Direction;
}

export interface ResolveEnvironment {
  exists(path: string): boolean;
  /** True when stdout is a pipe or redirect rather than an interactive terminal. */
  stdoutIsPipe: boolean;
}

export interface ResolvedOutputPlan {
  readonly sink: SinkEndpoint;
  readonly algorithm: AlgorithmName;
}

/**
 * Infer an algorithm from a file name's final extension, case-insensitive.
 * Returns undefined for no extension, dot-files, or unknown suffixes.
 */
export function inferAlgorithm(path: string): AlgorithmName | undefined {
  const ext = extname(basename(path)).slice(1).toLowerCase();
  return ALGORITHM_NAMES.find((name) => name === ext);
}

/** `<input>.<algorithm>` */
export function defaultCompressedName(path: string, algorithm: AlgorithmName): string {
  return `${path}.${algorithm}`;
}

/**
 * Strip a trailing `.<algorithm>` when present. When the result already
 * exists on disk (always the case without the suffix), append `.out`.
 */
export function defaultDecompressedName(
  path: string,
  algorithm: AlgorithmName,
  exists: (path: string) => boolean,
): string {
  const ext = extname(basename(path));
  const stripped = ext.slice(1).toLowerCase() === algorithm ? path.slice(0, -ext.length) : path;
  return exists(stripped) ? `${stripped}${COLLISION_SUFFIX}` : stripped;
}

export function resolvePlan(
  request: ResolveRequest,
  env: ResolveEnvironment,
  registry: CodecRegistry,
): ResolvedOutputPlan {
  const { input, output, direction } = request;

  if (input.kind === 'stdin' && output === undefined && !env.stdoutIsPipe) {
    throw new ResolutionError(
      'Cannot write to a terminal: reading from stdin requires an output destination',
      ['Pipe the output (| or >), or pass -o <file>.'],
    );
  }

  const algorithm =
    direction === 'compress'
      ? requireAlgorithm(request.algorithm, registry)
      : resolveDecompressAlgorithm(request, registry);

  return Object.freeze({
    sink: output ?? defaultSink(input, algorithm, direction, env),
    algorithm,
  });
}

function defaultSink(
  input: SourceEndpoint,
  algorithm: AlgorithmName,
  direction: Direction,
  env: ResolveEnvironment,
): SinkEndpoint {
  if (input.kind === 'stdin') {
    return standardOutput();
  }
  return fileSink(
    direction === 'compress'
      ? defaultCompressedName(input.path, algorithm)
      : defaultDecompressedName(input.path, algorithm, (p) => env.exists(p)),
  );
}

function requireAlgorithm(name: string | undefined, registry: CodecRegistry): AlgorithmName {
  if (name === undefined || name.trim().length === 0) {
    throw new ResolutionError('Compression requires an algorithm', [
      `Specify one with -m <algorithm>. Supported: ${registry.supportedNames().join(', ')}`,
    ]);
  }
  return lookupAlgorithm(name, registry);
}

function resolveDecompressAlgorithm(
  request: ResolveRequest,
  registry: CodecRegistry,
): AlgorithmName {
  if (request.algorithm !== undefined && request.algorithm.trim().length > 0) {
    return lookupAlgorithm(request.algorithm, registry);
  }

  const suffixes = ALGORITHM_NAMES.map((name) => `.${name}`).join(', ');
  const hint = 'Please specify the algorithm explicitly using: -m <algorithm>';

  if (request.input.kind === 'stdin') {
    throw new ResolutionError(
      'Cannot infer compression algorithm when reading from stdin',
      [hint],
    );
  }

  const inferred = inferAlgorithm(request.input.path);
  if (inferred === undefined || !registry.isRegistered(inferred)) {
    throw new ResolutionError(
      `Cannot infer compression algorithm for file: ${describeEndpoint(request.input)}`,
      [`Supported extensions: ${suffixes}`, hint],
    );
  }
  return inferred;
}

function lookupAlgorithm(name: string, registry: CodecRegistry): AlgorithmName {
  const backend = registry.lookup(name);
  if (backend === undefined) {
    throw new ResolutionError(
      `Unknown algorithm '${name}'. Supported: ${registry.supportedNames().join(', ')}`,
    );
  }
  return backend.name;
}
