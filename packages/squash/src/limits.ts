/**
 * Optional resource limits, enforced as a chunk observer.
 *
 * Nothing is limited unless configured. With `maxRatio`, a run whose
 * output outgrows its input by more than that factor is aborted; with
 * `maxOutputBytes`, output beyond that size is.
 */

import { formatSize } from './format.js';
import type { ChunkObserver, ChunkProgress } from './stream-loop.js';
import { LimitExceededError } from './types.js';

export interface LimitOptions {
  maxRatio?: number | undefined;
  maxOutputBytes?: number | undefined;
}

/** Returns undefined when no limit is set. */
export function createLimitGuard(limits: LimitOptions): ChunkObserver | undefined {
  const { maxRatio, maxOutputBytes } = limits;
  if (maxRatio === undefined && maxOutputBytes === undefined) {
    return undefined;
  }
  return {
    onChunk(progress: ChunkProgress): void {
      if (maxOutputBytes !== undefined && progress.bytesOut > maxOutputBytes) {
        throw new LimitExceededError(
          `Output exceeds limit of ${formatSize(maxOutputBytes)}`,
          'max_output_size',
          progress.bytesOut,
        );
      }
      if (maxRatio !== undefined && progress.bytesIn > 0) {
        const ratio = progress.bytesOut / progress.bytesIn;
        if (ratio > maxRatio) {
          throw new LimitExceededError(
            `Output/input ratio ${ratio.toFixed(1)} exceeds limit of ${maxRatio}`,
            'max_ratio',
            ratio,
          );
        }
      }
    },
  };
}
