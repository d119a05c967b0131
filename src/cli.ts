#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * - Parse CLI flags into a `QuartoCellConfig`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { runStdioServer } from './server.js';
import { loadConfigFromArgs, VERSION } from './config.js';

function printHelp(): void {
  process.stdout.write(
    [
      'quarto-cell-md-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  quarto-cell-md-mcp [--root <dir>] [--log-level <level>]',
      '',
      'Options:',
      '  --root       Root directory for file.* tools (default: cwd)',
      '  --log-level  silent|error|warn|info|debug (default: warn); logs go to stderr',
      '  --help       Show help',
      '  --version    Show version',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`quarto-cell-md-mcp ${VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
}

await main();
