/**
 * Path and algorithm checks run before resolution and I/O.
 */

import { resolve } from 'node:path';

import { ValidationError } from './types.js';

export function validateInputPath(path: string): void {
  if (path.length === 0) {
    throw new ValidationError('Input path cannot be empty');
  }
  if (path.includes('\0')) {
    throw new ValidationError('Input path contains a null byte');
  }
}

/** Output must be a usable path and must not name the input file. */
export function validateOutputPath(path: string, inputPath?: string): void {
  if (path.length === 0) {
    throw new ValidationError('Output path cannot be empty');
  }
  if (path.includes('\0')) {
    throw new ValidationError('Output path contains a null byte');
  }
  if (inputPath !== undefined && resolve(path) === resolve(inputPath)) {
    throw new ValidationError(`Input and output are the same file: ${path}`, [
      'Choose a different output path with -o.',
    ]);
  }
}
