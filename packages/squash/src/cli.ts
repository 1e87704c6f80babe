#!/usr/bin/env node

/**
 * CLI entry point for squash.
 *
 * Commander.js-based CLI with compress/decompress commands, global flags,
 * and dual-mode output (human-readable + JSON).
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import type { Help } from 'commander';
import { Command, Option } from 'commander';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { createDefaultRegistry } from './codec-registry.js';
import type { CommandOptions, CommandOutcome } from './commands.js';
import { compressCommand, decompressCommand } from './commands.js';
import {
  getConfigPath,
  getGlobalConfigPath,
  isRecord,
  parseSize,
  resolveConfig,
  validateConfig,
  writeConfigFile,
} from './config.js';
import { detectTerminalState, processEndpointIO } from './endpoint.js';
import {
  c,
  formatDetail,
  formatError,
  formatJson,
  formatJsonError,
  formatJsonMessage,
  formatRatio,
  formatTransfer,
  initColors,
} from './format.js';
import type { CompressionLevel, Direction, GlobalOptions } from './types.js';
import { SquashError, ValidationError } from './types.js';

function createProgram(): Command {
  const program = new Command();

  program
    .name('squash')
    .description('Compress and decompress files and pipes.')
    .version(getVersion(), '--version', 'Show version number')
    .helpOption('-h, --help', 'Display help for command')
    .addOption(new Option('--json', 'Structured JSON output').preset(true))
    .addOption(new Option('--quiet', 'Suppress all output except errors').preset(true))
    .addOption(new Option('--verbose', 'Report what was done').preset(true))
    .addOption(
      new Option('--color <mode>', 'Color output')
        .choices(['auto', 'always', 'never'])
        .default('auto'),
    )
    .hook('preAction', (thisCommand) => {
      const mode: unknown = thisCommand.opts().color;
      initColors(mode === 'always' || mode === 'never' ? mode : 'auto');
    })
    .configureHelp({
      helpWidth: 80,
      showGlobalOptions: false,
      formatHelp: (cmd: Command, helper: Help) => {
        const termWidth = 27;
        const lines: string[] = [];

        lines.push(`Usage: ${helper.commandUsage(cmd)}`);
        lines.push('');

        const desc = helper.commandDescription(cmd);
        if (desc) {
          lines.push(desc);
          lines.push('');
        }

        const args = helper.visibleArguments(cmd);
        if (args.length > 0) {
          lines.push('Arguments:');
          for (const arg of args) {
            lines.push(`  ${arg.name()}`.padEnd(termWidth) + arg.description);
          }
          lines.push('');
        }

        const opts = helper.visibleOptions(cmd);
        if (opts.length > 0) {
          lines.push('Options:');
          for (const opt of opts) {
            lines.push(`  ${opt.flags}`.padEnd(termWidth) + opt.description);
          }
          lines.push('');
        }

        const cmds = helper.visibleCommands(cmd);
        if (cmds.length > 0) {
          lines.push('Commands:');
          for (const sub of cmds) {
            const name = sub.name();
            const alias = sub.alias();
            const label = alias ? `${name}|${alias}` : name;
            const desc = name === 'help' ? 'Display help for command' : sub.description();
            lines.push(`  ${label}`.padEnd(termWidth) + desc);
          }
          lines.push('');
        }

        if (cmd.name() === 'squash') {
          lines.push('Examples:');
          lines.push('  squash c -m lzfse notes.txt        # writes notes.txt.lzfse');
          lines.push('  squash x notes.txt.lzfse           # algorithm from the suffix');
          lines.push('  cat log | squash c -m lz4 > log.lz4');
          lines.push('');
        }

        return lines.join('\n');
      },
    });

  program
    .command('compress')
    .alias('c')
    .description('Compress a file or stdin')
    .argument('[input]', 'Input file (default or "-": stdin)')
    .option('-m, --method <algorithm>', 'Algorithm: lz4, lzfse, lzma, zlib')
    .option('-o, --output <path>', 'Output file ("-" for stdout)')
    .option('-f, --force', 'Overwrite an existing output file')
    .addOption(new Option('--fast', 'Fast preset (lz4 unless -m is given)').conflicts('best'))
    .addOption(new Option('--best', 'Best-ratio preset (lzma unless -m is given)'))
    .option('--chunk-size <size>', 'Bytes per read, e.g. 64kb')
    .option('--progress', 'Show progress on stderr')
    .option('--no-progress', 'Hide progress')
    .action(wrapAction(handleCompress));

  program
    .command('decompress')
    .alias('x')
    .description('Decompress a file or stdin')
    .argument('[input]', 'Input file (default or "-": stdin)')
    .option('-m, --method <algorithm>', 'Algorithm (inferred from the file suffix if omitted)')
    .option('-o, --output <path>', 'Output file ("-" for stdout)')
    .option('-f, --force', 'Overwrite an existing output file')
    .option('--chunk-size <size>', 'Bytes per read, e.g. 64kb')
    .option('--progress', 'Show progress on stderr')
    .option('--no-progress', 'Hide progress')
    .action(wrapAction(handleDecompress));

  program
    .command('algorithms')
    .description('List supported algorithms')
    .action(wrapAction(handleAlgorithms));

  program
    .command('config')
    .description('Show, get, or set .squash.yml values')
    .argument('[key]', 'Config key (dot-separated, e.g. limits.max_ratio)')
    .argument('[value]', 'Value to set')
    .option('--global', 'Use ~/.squash.yml instead of ./.squash.yml')
    .action(wrapAction(handleConfig));

  return program;
}

function getVersion(): string {
  return '0.1.0';
}

/** Global options live on the root program. */
function getGlobalOpts(cmd: Command): GlobalOptions {
  let root = cmd;
  while (root.parent) {
    root = root.parent;
  }
  const opts = root.opts();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
  };
}

/**
 * Wrap a command action with error handling and JSON output.
 */
function wrapAction<A extends unknown[]>(
  handler: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    const cmd = args.find((a): a is Command => a instanceof Command);
    const globalOpts = cmd ? getGlobalOpts(cmd) : { json: false, quiet: false, verbose: false };
    try {
      if (globalOpts.quiet && globalOpts.verbose) {
        throw new ValidationError('--quiet and --verbose cannot be used together.');
      }
      await handler(...args);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error(globalOpts.json ? formatJsonError(error) : formatError(error));
      process.exitCode = err instanceof SquashError ? err.exitCode : 1;
    }
  };
}

// --- Option helpers ---

function optString(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key];
  return typeof value === 'string' ? value : undefined;
}

function optBoolean(opts: Record<string, unknown>, key: string): boolean | undefined {
  const value = opts[key];
  return typeof value === 'boolean' ? value : undefined;
}

function parseChunkSizeOption(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const bytes = parseSize(value);
  if (!Number.isSafeInteger(bytes) || bytes < 1) {
    throw new ValidationError(`Invalid --chunk-size: ${value}`);
  }
  return bytes;
}

// --- Command Handlers ---

async function handleCompress(
  input: string | undefined,
  opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  const level: CompressionLevel | undefined =
    opts.fast === true ? 'fast' : opts.best === true ? 'best' : undefined;
  await handleTransfer('compress', input, { ...readTransferOptions(opts), level }, cmd);
}

async function handleDecompress(
  input: string | undefined,
  opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  await handleTransfer('decompress', input, readTransferOptions(opts), cmd);
}

function readTransferOptions(opts: Record<string, unknown>): CommandOptions {
  return {
    output: optString(opts, 'output'),
    algorithm: optString(opts, 'method'),
    force: optBoolean(opts, 'force'),
    chunkSize: parseChunkSizeOption(optString(opts, 'chunkSize')),
    progress: optBoolean(opts, 'progress'),
  };
}

async function handleTransfer(
  direction: Direction,
  input: string | undefined,
  options: CommandOptions,
  cmd: Command,
): Promise<void> {
  const globalOpts = getGlobalOpts(cmd);
  const deps = {
    io: processEndpointIO(),
    terminal: detectTerminalState(),
    config: await resolveConfig(),
    progressStream: process.stderr,
  };
  const commandOptions: CommandOptions = {
    ...options,
    input,
    progress: globalOpts.quiet ? false : options.progress,
  };

  const outcome =
    direction === 'compress'
      ? await compressCommand(commandOptions, deps)
      : await decompressCommand(commandOptions, deps);

  reportOutcome(outcome, globalOpts);
}

/** Success is silent unless --verbose or --json. Never mixes with data on stdout. */
function reportOutcome(outcome: CommandOutcome, globalOpts: GlobalOptions): void {
  if (globalOpts.quiet || (!globalOpts.json && !globalOpts.verbose)) {
    return;
  }
  const print = outcome.sink === '<stdout>' ? console.error : console.log;

  if (globalOpts.json) {
    print(
      formatJson({
        direction: outcome.direction,
        algorithm: outcome.algorithm,
        source: outcome.source,
        sink: outcome.sink,
        bytes_in: outcome.bytesIn,
        bytes_out: outcome.bytesOut,
        ratio: Number(outcome.ratio.toFixed(4)),
        elapsed_ms: outcome.elapsedMs,
      }),
    );
    return;
  }

  const action = outcome.direction === 'compress' ? 'Compressed' : 'Decompressed';
  print(formatTransfer(action, outcome.source, outcome.sink, outcome.bytesIn, outcome.bytesOut));
  const original = outcome.direction === 'compress' ? outcome.bytesIn : outcome.bytesOut;
  const compressed = outcome.direction === 'compress' ? outcome.bytesOut : outcome.bytesIn;
  print(formatDetail('algorithm', outcome.algorithm));
  print(formatDetail('ratio', formatRatio(original, compressed)));
  print(formatDetail('elapsed', `${outcome.elapsedMs} ms`));
}

async function handleAlgorithms(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globalOpts = getGlobalOpts(cmd);
  const config = await resolveConfig();
  const registry = createDefaultRegistry({ level: config.level });

  const rows = registry.supportedNames().flatMap((name) => {
    const backend = registry.lookup(name);
    return backend ? [{ name: backend.name, suffix: `.${backend.name}`, description: backend.description }] : [];
  });

  if (globalOpts.json) {
    console.log(formatJson({ algorithms: rows }));
    return;
  }
  for (const row of rows) {
    console.log(`  ${c.command(row.name.padEnd(7))}${row.suffix.padEnd(8)}${row.description}`);
  }
}

async function handleConfig(
  key: string | undefined,
  value: string | undefined,
  opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  const globalOpts = getGlobalOpts(cmd);
  const configPath = opts.global === true ? getGlobalConfigPath() : getConfigPath(process.cwd());

  if (!key) {
    // Show the effective config
    const config = await resolveConfig();
    if (globalOpts.json) {
      console.log(formatJson({ config }));
    } else {
      console.log(stringifyYaml(config, { lineWidth: 0 }).trimEnd());
    }
    return;
  }

  if (value === undefined) {
    const config = await resolveConfig();
    const val = getNestedValue(config, key);
    if (globalOpts.json) {
      console.log(formatJson({ key, value: val ?? null }));
    } else if (val === undefined) {
      console.log('(not set)');
    } else if (typeof val === 'object' && val !== null) {
      console.log(stringifyYaml(val).trimEnd());
    } else {
      console.log(String(val));
    }
    return;
  }

  let existing: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    const parsed: unknown = parseYaml(await readFile(configPath, 'utf-8'));
    if (isRecord(parsed)) {
      existing = parsed;
    }
  }
  setNestedValue(existing, key, value);
  validateConfig(existing, configPath);
  await writeConfigFile(configPath, existing);

  if (!globalOpts.quiet) {
    if (globalOpts.json) {
      console.log(formatJsonMessage(`Set ${key} = ${value}`));
    } else {
      console.log(`Set ${key} = ${value} ${c.muted(`(${configPath})`)}`);
    }
  }
}

function getNestedValue(obj: object, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function coerceConfigValue(value: string): string | number | boolean {
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  const num = Number(value);
  if (!Number.isNaN(num) && value.trim().length > 0) {
    return num;
  }
  return value;
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: string): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined || last.length === 0) {
    throw new ValidationError(`Invalid config key: ${path}`);
  }
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = coerceConfigValue(value);
}

// --- Main ---

export async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof SquashError) {
    console.error(formatError(err));
    process.exitCode = err.exitCode;
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
});
