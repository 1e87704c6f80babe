/**
 * Configuration loading and merging.
 *
 * Loads .squash.yml files: built-in defaults <- ~/.squash.yml <- ./.squash.yml
 * in the working directory. Shallow merge semantics.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';

import { writeFile } from 'atomically';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { DEFAULT_CHUNK_SIZE } from './codec-types.js';
import { ensureDir } from './fs-utils.js';
import { COMPRESSION_LEVELS, DEFAULT_LEVEL, isCompressionLevel, levelPreset } from './levels.js';
import type { AlgorithmName, CompressionLevel } from './types.js';
import { ALGORITHM_NAMES, ValidationError, errorMessage } from './types.js';

const CONFIG_FILENAME = '.squash.yml';

/** Largest accepted chunk size. */
const MAX_CHUNK_SIZE = 64 * 1024 * 1024;

export interface LimitsConfig {
  /** Abort when output/input exceeds this factor */
  max_ratio?: number | undefined;
  /** Abort when output exceeds this size (e.g. "2gb" or bytes) */
  max_output_size?: string | number | undefined;
}

/** Full squash configuration, merged from .squash.yml files. */
export interface SquashConfig {
  /** Compression algorithm used when -m is not given */
  algorithm?: AlgorithmName | undefined;
  /** Tuning preset: fast, balanced, or best */
  level?: CompressionLevel | undefined;
  /** Bytes read per iteration (e.g. "64kb" or bytes); defaults to the level's */
  chunk_size?: string | number | undefined;
  /** Show a progress line on stderr */
  progress?: boolean | undefined;
  limits?: LimitsConfig | undefined;
}

/** Hardcoded built-in defaults. */
export function getBuiltinDefaults(): SquashConfig {
  return {
    level: DEFAULT_LEVEL,
    progress: false,
    limits: {},
  };
}

/** Parse a single .squash.yml file. */
export async function loadConfigFile(filePath: string): Promise<SquashConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(`Cannot read config file: ${filePath}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ValidationError(`Malformed YAML in config file: ${filePath}: ${errorMessage(err)}`, [
      'Check that the .squash.yml file contains valid YAML.',
    ]);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`Invalid config file (not an object): ${filePath}`);
  }

  return validateConfig(parsed, filePath);
}

/** Shallow merge: override replaces entire keys. */
export function mergeConfigs(base: SquashConfig, override: SquashConfig): SquashConfig {
  const result: SquashConfig = { ...base };
  if (override.algorithm !== undefined) {
    result.algorithm = override.algorithm;
  }
  if (override.level !== undefined) {
    result.level = override.level;
  }
  if (override.chunk_size !== undefined) {
    result.chunk_size = override.chunk_size;
  }
  if (override.progress !== undefined) {
    result.progress = override.progress;
  }
  if (override.limits !== undefined) {
    result.limits = override.limits;
  }
  return result;
}

/** Resolution order: built-in defaults <- ~/.squash.yml <- <cwd>/.squash.yml */
export async function resolveConfig(cwd: string = process.cwd()): Promise<SquashConfig> {
  let config = getBuiltinDefaults();

  const globalConfig = getGlobalConfigPath();
  if (existsSync(globalConfig)) {
    config = mergeConfigs(config, await loadConfigFile(globalConfig));
  }

  const projectConfig = getConfigPath(cwd);
  if (resolve(projectConfig) !== resolve(globalConfig) && existsSync(projectConfig)) {
    config = mergeConfigs(config, await loadConfigFile(projectConfig));
  }

  return config;
}

/** Write a .squash.yml config file. */
export async function writeConfigFile(
  filePath: string,
  config: Record<string, unknown>,
): Promise<void> {
  await ensureDir(dirname(filePath));
  const content = stringifyYaml(config, { lineWidth: 0 });
  await writeFile(filePath, content);
}

/** Get the config file path for a directory. */
export function getConfigPath(dir: string): string {
  return join(dir, CONFIG_FILENAME);
}

/**
 * Get the global config file path (~/.squash.yml).
 * Respects SQUASH_HOME environment variable for testing.
 */
export function getGlobalConfigPath(): string {
  const home = process.env.SQUASH_HOME ?? homedir();
  return join(home, CONFIG_FILENAME);
}

/** Bytes per kilobyte (base-2) */
const BYTES_PER_KB = 1024;
const BYTES_PER_MB = BYTES_PER_KB * 1024;
const BYTES_PER_GB = BYTES_PER_MB * 1024;
const BYTES_PER_TB = BYTES_PER_GB * 1024;

const SIZE_MULTIPLIERS: Record<string, number> = {
  b: 1,
  kb: BYTES_PER_KB,
  mb: BYTES_PER_MB,
  gb: BYTES_PER_GB,
  tb: BYTES_PER_TB,
};

/** Parse a human-readable size string (e.g. "64kb", "1mb") to bytes. */
export function parseSize(size: string | number): number {
  if (typeof size === 'number') {
    return size;
  }

  const match = /^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb|tb)?$/i.exec(size.trim());
  const amount = match?.[1];
  if (match === null || amount === undefined) {
    throw new ValidationError(`Invalid size format: ${size} (expected e.g. "64kb", "1mb")`);
  }

  const unit = (match[2] ?? 'b').toLowerCase();
  return Math.floor(parseFloat(amount) * (SIZE_MULTIPLIERS[unit] ?? 1));
}

/** Effective chunk size: explicit setting, else the level's preset. */
export function getChunkSize(config: SquashConfig): number {
  if (config.chunk_size === undefined) {
    return config.level ? levelPreset(config.level).chunkSize : DEFAULT_CHUNK_SIZE;
  }
  const bytes = parseSize(config.chunk_size);
  if (!Number.isSafeInteger(bytes) || bytes < 1 || bytes > MAX_CHUNK_SIZE) {
    throw new ValidationError(
      `Invalid chunk_size: ${config.chunk_size} (expected 1 byte to 64mb)`,
    );
  }
  return bytes;
}

/** Effective limits in bytes, with unset limits left undefined. */
export function getLimits(config: SquashConfig): { maxRatio?: number; maxOutputBytes?: number } {
  const limits = config.limits ?? {};
  return {
    ...(limits.max_ratio !== undefined ? { maxRatio: limits.max_ratio } : {}),
    ...(limits.max_output_size !== undefined
      ? { maxOutputBytes: parseSize(limits.max_output_size) }
      : {}),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSize(value: unknown): value is string | number {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0;
  }
  if (typeof value !== 'string') {
    return false;
  }
  try {
    parseSize(value);
    return true;
  } catch {
    return false;
  }
}

/** Check the shape and values of a parsed config object. */
export function validateConfig(parsed: Record<string, unknown>, filePath: string): SquashConfig {
  const config: SquashConfig = {};

  const { algorithm, level, chunk_size, progress, limits } = parsed;

  if (algorithm !== undefined) {
    const name = typeof algorithm === 'string' ? algorithm.toLowerCase() : undefined;
    const known = ALGORITHM_NAMES.find((a) => a === name);
    if (known === undefined) {
      throw new ValidationError(
        `Invalid "algorithm" in ${filePath}: expected one of ${ALGORITHM_NAMES.join(', ')}`,
      );
    }
    config.algorithm = known;
  }

  if (level !== undefined) {
    if (!isCompressionLevel(level)) {
      throw new ValidationError(
        `Invalid "level" in ${filePath}: expected one of ${COMPRESSION_LEVELS.join(', ')}`,
      );
    }
    config.level = level;
  }

  if (chunk_size !== undefined) {
    if (!isSize(chunk_size)) {
      throw new ValidationError(`Invalid "chunk_size" in ${filePath}: expected a size like "64kb"`);
    }
    config.chunk_size = chunk_size;
  }

  if (progress !== undefined) {
    if (typeof progress !== 'boolean') {
      throw new ValidationError(`Invalid "progress" in ${filePath}: expected true or false`);
    }
    config.progress = progress;
  }

  if (limits !== undefined) {
    if (!isRecord(limits)) {
      throw new ValidationError(`Invalid "limits" in ${filePath}: expected an object`);
    }
    config.limits = validateLimits(limits, filePath);
  }

  return config;
}

function validateLimits(limits: Record<string, unknown>, filePath: string): LimitsConfig {
  const result: LimitsConfig = {};
  const { max_ratio, max_output_size } = limits;

  if (max_ratio !== undefined) {
    if (typeof max_ratio !== 'number' || !(max_ratio > 0)) {
      throw new ValidationError(
        `Invalid "limits.max_ratio" in ${filePath}: expected a positive number`,
      );
    }
    result.max_ratio = max_ratio;
  }

  if (max_output_size !== undefined) {
    if (!isSize(max_output_size)) {
      throw new ValidationError(
        `Invalid "limits.max_output_size" in ${filePath}: expected a size like "2gb"`,
      );
    }
    result.max_output_size = max_output_size;
  }

  return result;
}
