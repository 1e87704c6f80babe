import { beforeAll, describe, expect, it } from 'vitest';

import { fileSink, standardOutput } from '../src/endpoint.js';
import { initColors } from '../src/format.js';
import {
  SilentProgressReporter,
  TerminalProgressReporter,
  createProgressReporter,
  progressObserver,
} from '../src/progress.js';

beforeAll(() => {
  initColors('never');
});

function recordingStream(isTTY = true): { writes: string[]; write(text: string): boolean; isTTY: boolean } {
  const writes: string[] = [];
  return {
    writes,
    write(text: string) {
      writes.push(text);
      return true;
    },
    isTTY,
  };
}

describe('TerminalProgressReporter', () => {
  it('formats known and unknown totals', () => {
    const reporter = new TerminalProgressReporter(recordingStream());
    reporter.setDescription('Compressing');
    expect(reporter.formatLine(512, 2048)).toBe('Compressing: 25% (512 B / 2.0 KB)');
    expect(reporter.formatLine(1536, 0)).toBe('Compressing: 1.5 KB');
  });

  it('redraws at most every 100 ms', () => {
    const stream = recordingStream();
    const times = [0, 50, 150];
    const reporter = new TerminalProgressReporter(stream, () => times.shift() ?? 1000);
    reporter.setDescription('Decompressing');

    reporter.update(1, 10);
    reporter.update(5, 10);
    reporter.update(10, 10);
    reporter.complete();

    expect(stream.writes).toEqual([
      '\rDecompressing: 10% (1 B / 10 B)',
      '\rDecompressing: 100% (10 B / 10 B)',
      '\rDecompressing: 100% (10 B / 10 B)',
      '\n',
    ]);
  });

  it('pads over a longer previous line', () => {
    const stream = recordingStream();
    const reporter = new TerminalProgressReporter(stream);
    reporter.update(2048, 0);
    reporter.setDescription('Done');
    reporter.complete();
    expect(stream.writes[0]).toBe('\rProcessing: 2.0 KB');
    expect(stream.writes[1]).toBe(`\rDone: 2.0 KB${' '.repeat(6)}`);
  });
});

describe('createProgressReporter', () => {
  it('is silent unless enabled on a terminal with a file sink', () => {
    const tty = recordingStream(true);
    expect(
      createProgressReporter({ enabled: false, sink: fileSink('out'), stream: tty }),
    ).toBeInstanceOf(SilentProgressReporter);
    expect(
      createProgressReporter({ enabled: true, sink: standardOutput(), stream: tty }),
    ).toBeInstanceOf(SilentProgressReporter);
    expect(
      createProgressReporter({ enabled: true, sink: fileSink('out'), stream: recordingStream(false) }),
    ).toBeInstanceOf(SilentProgressReporter);
    expect(
      createProgressReporter({ enabled: true, sink: fileSink('out'), stream: tty }),
    ).toBeInstanceOf(TerminalProgressReporter);
  });

  it('feeds input byte counts from the loop', () => {
    const stream = recordingStream();
    const reporter = new TerminalProgressReporter(stream);
    const observer = progressObserver(reporter, 100);
    observer.onChunk({
      algorithm: 'lz4',
      direction: 'compress',
      bytesIn: 40,
      bytesOut: 12,
      output: new Uint8Array(12),
      isFinal: false,
    });
    expect(stream.writes).toEqual(['\rProcessing: 40% (40 B / 100 B)']);
  });
});
