/**
 * Logger wrapper for consistent, prefixed logging.
 *
 * Everything goes to stderr: stdout carries JSON results and the MCP stdio
 * transport.
 */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const PREFIX = '[quarto-cell-md]';

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

export function createLogger(scope: string): Logger {
  const tag = `${PREFIX} ${scope}:`;
  return {
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error(tag, ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.error(tag, ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled('info')) console.error(tag, ...args);
    },
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.error(tag, ...args);
    },
  };
}
