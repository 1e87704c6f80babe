/**
 * Progress display on stderr.
 */

import type { SinkEndpoint } from './endpoint.js';
import { c, formatSize } from './format.js';
import type { ChunkObserver, ChunkProgress } from './stream-loop.js';

/** Minimum interval between redraws. */
const REDRAW_INTERVAL_MS = 100;

export interface ProgressReporter {
  setDescription(description: string): void;
  /** `totalBytes` of 0 means unknown (e.g. stdin). */
  update(bytesProcessed: number, totalBytes: number): void;
  complete(): void;
}

/** Minimal stream surface the reporter writes to. */
export interface ProgressStream {
  write(text: string): unknown;
  isTTY?: boolean | undefined;
}

export class SilentProgressReporter implements ProgressReporter {
  setDescription(): void {
    // silent
  }

  update(): void {
    // silent
  }

  complete(): void {
    // silent
  }
}

/** Redraws one status line in place, at most every 100 ms. */
export class TerminalProgressReporter implements ProgressReporter {
  private description = 'Processing';
  private lastDraw = Number.NEGATIVE_INFINITY;
  private lastLine = '';
  private processed = 0;
  private total = 0;

  constructor(
    private readonly stream: ProgressStream,
    private readonly now: () => number = Date.now,
  ) {}

  setDescription(description: string): void {
    this.description = description;
  }

  update(bytesProcessed: number, totalBytes: number): void {
    this.processed = bytesProcessed;
    this.total = totalBytes;
    const time = this.now();
    if (time - this.lastDraw < REDRAW_INTERVAL_MS) {
      return;
    }
    this.lastDraw = time;
    this.draw();
  }

  complete(): void {
    this.draw();
    this.stream.write('\n');
  }

  /** Render the status line for the given counts. */
  formatLine(bytesProcessed: number, totalBytes: number): string {
    if (totalBytes > 0) {
      const percent = Math.min(100, Math.floor((bytesProcessed / totalBytes) * 100));
      return `${this.description}: ${percent}% (${formatSize(bytesProcessed)} / ${formatSize(totalBytes)})`;
    }
    return `${this.description}: ${formatSize(bytesProcessed)}`;
  }

  private draw(): void {
    const line = this.formatLine(this.processed, this.total);
    // Pad over any longer previous line.
    const padding = ' '.repeat(Math.max(0, this.lastLine.length - line.length));
    this.stream.write(`\r${c.info(line)}${padding}`);
    this.lastLine = line;
  }
}

/**
 * Pick a reporter: silent when disabled, when data goes to stdout, or when
 * stderr is not a terminal.
 */
export function createProgressReporter(options: {
  enabled: boolean;
  sink: SinkEndpoint;
  stream: ProgressStream;
}): ProgressReporter {
  if (!options.enabled || options.sink.kind === 'stdout' || options.stream.isTTY !== true) {
    return new SilentProgressReporter();
  }
  return new TerminalProgressReporter(options.stream);
}

/** Feed reporter updates from the driving loop. Progress counts input bytes. */
export function progressObserver(reporter: ProgressReporter, totalBytes: number): ChunkObserver {
  return {
    onChunk(progress: ChunkProgress): void {
      reporter.update(progress.bytesIn, totalBytes);
    },
    onComplete(): void {
      reporter.complete();
    },
  };
}
