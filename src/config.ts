import { resolve } from 'node:path';
import * as z from 'zod';
import type { LogLevel } from './logger.js';
import { LOG_LEVELS } from './logger.js';

export const VERSION = '0.1.0';

export const LOG_LEVEL_ENV = 'QUARTO_CELL_MD_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const logLevelSchema = z.enum(LOG_LEVELS);

/**
 * Runtime configuration for converting rendered documents.
 *
 * `rootDir` is treated as a trust boundary: document paths must resolve within it.
 */
export interface QuartoCellConfig {
  rootDir: string;
  logLevel: LogLevel;
}

/**
 * Validate a log level from a flag or the environment.
 */
export function parseLogLevel(value: string, source: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(
      `Invalid ${source}: ${JSON.stringify(value)} (expected one of ${LOG_LEVELS.join(', ')})`
    );
  }
  return parsed.data;
}

/**
 * Parse CLI args into a `QuartoCellConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--log-level <level>`: logger threshold (defaults to `$QUARTO_CELL_MD_LOG_LEVEL`, then `warn`).
 */
export function loadConfigFromArgs(
  argv: string[],
  cwd: string,
  env: NodeJS.ProcessEnv = process.env
): QuartoCellConfig {
  const args = [...argv];

  let rootDir = cwd;
  const envLevel = env[LOG_LEVEL_ENV];
  let logLevel = envLevel ? parseLogLevel(envLevel, LOG_LEVEL_ENV) : DEFAULT_LOG_LEVEL;

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--log-level') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --log-level');
      logLevel = parseLogLevel(value, '--log-level');
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return { rootDir, logLevel };
}
