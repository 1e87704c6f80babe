/**
 * Compress and decompress commands.
 *
 * Everything around the driving loop: input checks, output resolution,
 * overwrite protection, temp-file-then-rename for file outputs, progress
 * and limit observers. Returns an outcome for the CLI to report.
 */

import { constants } from 'node:fs';
import { access, rename, stat } from 'node:fs/promises';
import { dirname } from 'node:path';

import { createDefaultRegistry } from './codec-registry.js';
import type { SquashConfig } from './config.js';
import { getChunkSize, getLimits } from './config.js';
import type { EndpointIO, SinkEndpoint, SourceEndpoint, TerminalState } from './endpoint.js';
import {
  describeEndpoint,
  fileSink,
  fileSource,
  standardInput,
  standardOutput,
} from './endpoint.js';
import { ensureDir, fileSize, removeFile, tempSiblingPath } from './fs-utils.js';
import { DEFAULT_LEVEL, levelPreset } from './levels.js';
import { createLimitGuard } from './limits.js';
import type { ProgressStream } from './progress.js';
import { createProgressReporter, progressObserver } from './progress.js';
import { resolvePlan } from './resolve.js';
import type { ChunkObserver } from './stream-loop.js';
import { run } from './stream-loop.js';
import type { AlgorithmName, CompressionLevel, Direction } from './types.js';
import {
  EndpointError,
  OutputExistsError,
  ResolutionError,
  ValidationError,
  errorCode,
  errorMessage,
} from './types.js';
import { validateInputPath, validateOutputPath } from './validation.js';

/** Path argument meaning stdin (input) or stdout (output). */
export const STDIO_PATH = '-';

export interface CommandOptions {
  /** File path; undefined or "-" reads stdin. */
  input?: string | undefined;
  /** File path; "-" writes stdout; undefined lets the resolver choose. */
  output?: string | undefined;
  algorithm?: string | undefined;
  force?: boolean | undefined;
  /** Explicit level flag (--fast / --best). */
  level?: CompressionLevel | undefined;
  chunkSize?: number | undefined;
  progress?: boolean | undefined;
}

export interface CommandDeps {
  io: EndpointIO;
  terminal: TerminalState;
  config: SquashConfig;
  progressStream: ProgressStream;
}

export interface CommandOutcome {
  direction: Direction;
  algorithm: AlgorithmName;
  source: string;
  sink: string;
  bytesIn: number;
  bytesOut: number;
  /** Compressed size divided by original size. */
  ratio: number;
  elapsedMs: number;
}

export function compressCommand(options: CommandOptions, deps: CommandDeps): Promise<CommandOutcome> {
  return execute('compress', options, deps);
}

export function decompressCommand(
  options: CommandOptions,
  deps: CommandDeps,
): Promise<CommandOutcome> {
  return execute('decompress', options, deps);
}

async function execute(
  direction: Direction,
  options: CommandOptions,
  deps: CommandDeps,
): Promise<CommandOutcome> {
  const started = Date.now();
  const level = options.level ?? deps.config.level ?? DEFAULT_LEVEL;
  const registry = createDefaultRegistry({ level });

  const source = await openInput(options.input, deps.terminal);
  const inputPath = source.kind === 'file' ? source.path : undefined;
  const requestedSink = toSink(options.output, inputPath);

  const plan = resolvePlan(
    {
      input: source,
      algorithm: pickAlgorithm(direction, options, deps.config),
      output: requestedSink,
      direction,
    },
    { exists: (path) => deps.io.fs.exists(path), stdoutIsPipe: deps.terminal.stdoutIsPipe },
    registry,
  );

  const backend = registry.lookup(plan.algorithm);
  if (backend === undefined) {
    throw new ResolutionError(`Unknown algorithm '${plan.algorithm}'`);
  }

  if (plan.sink.kind === 'file') {
    validateOutputPath(plan.sink.path, inputPath);
    if (!options.force && deps.io.fs.exists(plan.sink.path)) {
      throw new OutputExistsError(plan.sink.path);
    }
    await ensureDir(dirname(plan.sink.path));
  }

  const chunkSize = options.chunkSize ?? getChunkSize({ ...deps.config, level });
  const observers: ChunkObserver[] = [];
  const guard = createLimitGuard(getLimits(deps.config));
  if (guard) {
    observers.push(guard);
  }
  const reporter = createProgressReporter({
    enabled: options.progress ?? deps.config.progress ?? false,
    sink: plan.sink,
    stream: deps.progressStream,
  });
  reporter.setDescription(direction === 'compress' ? 'Compressing' : 'Decompressing');
  observers.push(progressObserver(reporter, inputPath ? await fileSize(inputPath) : 0));

  const runOptions = { chunkSize, io: deps.io, observers };
  const sink = plan.sink;
  const summary =
    sink.kind === 'file'
      ? await writeViaTempFile(sink.path, (tmpPath) =>
          run(source, fileSink(tmpPath), backend, direction, runOptions),
        )
      : await run(source, sink, backend, direction, runOptions);

  const original = direction === 'compress' ? summary.bytesIn : summary.bytesOut;
  const compressed = direction === 'compress' ? summary.bytesOut : summary.bytesIn;

  return {
    direction,
    algorithm: plan.algorithm,
    source: describeEndpoint(source),
    sink: describeEndpoint(plan.sink),
    bytesIn: summary.bytesIn,
    bytesOut: summary.bytesOut,
    ratio: original === 0 ? 0 : compressed / original,
    elapsedMs: Date.now() - started,
  };
}

/** Compression algorithm precedence: -m, then config, then an explicit level flag. */
function pickAlgorithm(
  direction: Direction,
  options: CommandOptions,
  config: SquashConfig,
): string | undefined {
  if (options.algorithm !== undefined) {
    return options.algorithm;
  }
  if (direction === 'decompress') {
    return undefined;
  }
  return config.algorithm ?? (options.level ? levelPreset(options.level).algorithm : undefined);
}

async function openInput(input: string | undefined, terminal: TerminalState): Promise<SourceEndpoint> {
  if (input === undefined || input === STDIO_PATH) {
    if (input === undefined && !terminal.stdinIsPipe) {
      throw new ValidationError('No input file given and stdin is a terminal', [
        'Pass a file path, or pipe data in (use - to read stdin explicitly).',
      ]);
    }
    return standardInput();
  }

  validateInputPath(input);

  let isFile: boolean;
  try {
    isFile = (await stat(input)).isFile();
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      throw new ValidationError(`Input file not found: ${input}`);
    }
    throw new EndpointError(`Cannot access ${input}: ${errorMessage(err)}`, input, errorCode(err), err);
  }
  if (!isFile) {
    throw new ValidationError(`Input is not a regular file: ${input}`);
  }

  try {
    await access(input, constants.R_OK);
  } catch (err) {
    throw new EndpointError(`Input file is not readable: ${input}`, input, errorCode(err), err);
  }

  return fileSource(input);
}

function toSink(output: string | undefined, inputPath: string | undefined): SinkEndpoint | undefined {
  if (output === undefined) {
    return undefined;
  }
  if (output === STDIO_PATH) {
    return standardOutput();
  }
  validateOutputPath(output, inputPath);
  return fileSink(output);
}

/**
 * Write to a temporary sibling, then rename over the target. The temporary
 * file is removed when the write fails, so no partial output is left behind.
 */
async function writeViaTempFile<T>(target: string, write: (tmpPath: string) => Promise<T>): Promise<T> {
  const tmpPath = tempSiblingPath(target);
  try {
    const result = await write(tmpPath);
    await rename(tmpPath, target);
    return result;
  } catch (err) {
    try {
      await removeFile(tmpPath);
    } catch {
      // Ignore cleanup failure
    }
    throw err;
  }
}
