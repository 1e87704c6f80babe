/**
 * Output formatting for CLI display.
 *
 * Human-readable sizes and ratios, JSON envelopes, structured error
 * formatting, and semantic coloring via picocolors.
 *
 * Colors are automatically disabled when output is piped (non-TTY),
 * when NO_COLOR is set, or via the --color never flag.
 */

import colors, { createColors } from 'picocolors';

import { SquashError } from './types.js';

/** JSON schema version for squash output */
const SCHEMA_VERSION = '0.1';

/** Threshold for showing one decimal place in size formatting */
const SIZE_DECIMAL_THRESHOLD = 10;

// --- Semantic color map ---

type ColorFn = (s: string | number) => string;

/** Semantic color wrappers for CLI output. */
export const c: {
  success: ColorFn;
  error: ColorFn;
  info: ColorFn;
  command: ColorFn;
  hint: ColorFn;
  muted: ColorFn;
} = {
  success: colors.green,
  error: colors.red,
  info: colors.cyan,
  command: colors.bold,
  hint: colors.dim,
  muted: colors.gray,
};

/**
 * Re-initialize the semantic color map with explicit color mode.
 * Call this after parsing the --color flag, before any output.
 */
export function initColors(mode: 'always' | 'never' | 'auto'): void {
  if (mode === 'auto') {
    return; // Use picocolors default detection
  }
  const pc = createColors(mode === 'always');
  c.success = pc.green;
  c.error = pc.red;
  c.info = pc.cyan;
  c.command = pc.bold;
  c.hint = pc.dim;
  c.muted = pc.gray;
}

/** Format bytes as human-readable size (B, KB, MB, GB). */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    const kb = bytes / 1024;
    return kb >= SIZE_DECIMAL_THRESHOLD ? `${Math.round(kb)} KB` : `${kb.toFixed(1)} KB`;
  }
  if (bytes < 1024 * 1024 * 1024) {
    const mb = bytes / (1024 * 1024);
    return mb >= SIZE_DECIMAL_THRESHOLD ? `${Math.round(mb)} MB` : `${mb.toFixed(1)} MB`;
  }
  const gb = bytes / (1024 * 1024 * 1024);
  return gb >= SIZE_DECIMAL_THRESHOLD ? `${Math.round(gb)} GB` : `${gb.toFixed(1)} GB`;
}

/** Compressed size as a percentage of the original, e.g. "31.4%". */
export function formatRatio(originalBytes: number, compressedBytes: number): string {
  if (originalBytes === 0) {
    return 'n/a';
  }
  return `${((compressedBytes / originalBytes) * 100).toFixed(1)}%`;
}

/** One-line summary of a finished transfer. */
export function formatTransfer(
  action: 'Compressed' | 'Decompressed',
  from: string,
  to: string,
  bytesIn: number,
  bytesOut: number,
): string {
  return `${c.success(action)} ${from} -> ${to} ${c.muted(`(${formatSize(bytesIn)} -> ${formatSize(bytesOut)})`)}`;
}

/** Wrap data in a JSON envelope with schema_version. */
export function formatJson(data: unknown): string {
  const envelope = {
    schema_version: SCHEMA_VERSION,
    ...(typeof data === 'object' && data !== null ? data : { data }),
  };
  return JSON.stringify(envelope, null, 2);
}

/** Format a simple message as JSON. */
export function formatJsonMessage(
  message: string,
  level: 'info' | 'debug' | 'warning' = 'info',
): string {
  return formatJson({ message, level });
}

/** Format an error as JSON. */
export function formatJsonError(error: Error): string {
  if (error instanceof SquashError) {
    return formatJson({
      error: error.message,
      type: error.category,
      ...(error.suggestions ? { suggestions: error.suggestions } : {}),
    });
  }
  return formatJson({ error: error.message, type: 'unknown' });
}

/** Format an error with its suggestions as dimmed hint lines. */
export function formatError(error: Error): string {
  const lines: string[] = [c.error(`Error: ${error.message}`)];

  if (error instanceof SquashError && error.suggestions) {
    lines.push('');
    for (const suggestion of error.suggestions) {
      lines.push(c.hint(`  ${suggestion}`));
    }
  }

  return lines.join('\n');
}

/** Format a verbose detail line. */
export function formatDetail(label: string, value: string): string {
  return `  ${c.muted(`${label}:`.padEnd(12))}${value}`;
}
