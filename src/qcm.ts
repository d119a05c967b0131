#!/usr/bin/env node

/**
 * `quarto-cell-md` - local CLI for converting rendered Quarto markdown.
 *
 * This CLI shares the conversion API with the stdio server so behavior stays
 * in sync.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync } from 'node:fs';

import { checkFile, convertFile } from './cells/api.js';
import { convertMarkdown } from './cells/document.js';
import { toDiagnostic, TransformError } from './cells/errors.js';
import { convertNav, navEntrySchema } from './cells/nav.js';
import { checkMarkdown } from './cells/validate.js';
import type { QuartoCellConfig } from './config.js';
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, parseLogLevel, VERSION } from './config.js';
import { setLogLevel } from './logger.js';

export interface QcmIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Read all of stdin. */
  readStdin: () => string;
}

const defaultIo: QcmIo = {
  stdout: process.stdout,
  stderr: process.stderr,
  readStdin: () => readFileSync(0, 'utf8'),
};

function helpText(defaultRoot: string): string {
  return [
    'quarto-cell-md — convert `quarto render --to=markdown` output to admonition markdown',
    '',
    'Usage:',
    '  quarto-cell-md [--root <dir>] [--log-level <level>] <cmd>',
    '',
    'Commands:',
    '  quarto-cell-md convert <path> [--out <path>] [--dry-run] [--if-match <etag>]',
    '  quarto-cell-md convert --stdin',
    '  quarto-cell-md check <path>',
    '  quarto-cell-md check --stdin',
    '  quarto-cell-md nav',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --log-level=${DEFAULT_LOG_LEVEL} (or $${LOG_LEVEL_ENV})`,
    '  convert writes <path> with a .md extension unless --out is given.',
    '  convert --stdin prints converted markdown; nav reads JSON navigation from stdin.',
    '  check exits with 1 when the document cannot be converted.',
    '  Output: JSON to stdout; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: QcmIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

function writeJson(io: QcmIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

/**
 * Parse global CLI options (`--root`, `--log-level`).
 */
function takeCliConfig(argv: string[], defaultRoot: string): QuartoCellConfig {
  let rootDir = defaultRoot;
  const rootArg = takeOption(argv, '--root');
  if (rootArg) rootDir = resolvePath(defaultRoot, rootArg);

  const levelArg = takeOption(argv, '--log-level');
  const envLevel = process.env[LOG_LEVEL_ENV];
  let logLevel = DEFAULT_LOG_LEVEL;
  if (levelArg) logLevel = parseLogLevel(levelArg, '--log-level');
  else if (envLevel) logLevel = parseLogLevel(envLevel, LOG_LEVEL_ENV);

  return { rootDir, logLevel };
}

async function handleConvertCommand(
  config: QuartoCellConfig,
  argv: string[],
  io: QcmIo
): Promise<number> {
  if (takeFlag(argv, '--stdin')) {
    assertNoUnknownFlags(argv);
    if (argv.length > 0) throw new Error('convert --stdin takes no <path>');
    io.stdout.write(convertMarkdown(io.readStdin()).markdown);
    return 0;
  }

  const path = argv.shift();
  const outPath = takeOption(argv, '--out');
  const dryRun = takeFlag(argv, '--dry-run');
  const ifMatch = takeOption(argv, '--if-match');
  assertNoUnknownFlags(argv);
  if (!path) throw new Error('Missing <path>');

  const result = await convertFile(config, { path, outPath, dryRun, ifMatch });
  writeJson(io, {
    path: result.path,
    outPath: result.outPath,
    etag: result.etag,
    written: result.written,
    stats: result.stats,
  });
  return 0;
}

async function handleCheckCommand(
  config: QuartoCellConfig,
  argv: string[],
  io: QcmIo
): Promise<number> {
  const fromStdin = takeFlag(argv, '--stdin');
  const path = fromStdin ? undefined : argv.shift();
  assertNoUnknownFlags(argv);
  if (!fromStdin && !path) throw new Error('Missing <path>');

  const { errors, warnings } = path
    ? await checkFile(config, { path })
    : checkMarkdown(io.readStdin());
  writeJson(io, { errors, warnings });
  return errors.length > 0 ? 1 : 0;
}

function handleNavCommand(argv: string[], io: QcmIo): number {
  assertNoUnknownFlags(argv);
  const raw: unknown = JSON.parse(io.readStdin());
  const parsed = navEntrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid navigation JSON: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  writeJson(io, convertNav(parsed.data));
  return 0;
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`.
 */
export async function runQcmCli(args: string[], io: QcmIo = defaultIo): Promise<number> {
  const argv = [...args];
  const defaultRoot = process.cwd();

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    if (takeFlag(argv, '--version')) {
      io.stdout.write(`quarto-cell-md ${VERSION}\n`);
      return 0;
    }

    const config = takeCliConfig(argv, defaultRoot);
    setLogLevel(config.logLevel);

    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    if (cmd === 'convert') return await handleConvertCommand(config, argv, io);
    if (cmd === 'check') return await handleCheckCommand(config, argv, io);
    if (cmd === 'nav') return handleNavCommand(argv, io);

    throw new Error(`Unknown command: ${cmd}`);
  } catch (error) {
    if (error instanceof TransformError) {
      io.stderr.write(`${JSON.stringify({ error: toDiagnostic(error) }, null, 2)}\n`);
      return 1;
    }
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, defaultRoot);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runQcmCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
