import type { TransformStats } from './model.js';
import { transformLines } from './transform.js';

/**
 * Text-level wrapper around the line transformer.
 */
export interface SplitDocument {
  lines: string[];
  trailingNewline: boolean;
}

export interface ConvertMarkdownResult {
  markdown: string;
  stats: TransformStats;
  /** 0-based input lines whose colon fence was narrowed to `:::`. */
  normalizedLines: number[];
}

/**
 * Split text into lines, accepting `\n` and `\r\n`.
 *
 * A final newline does not produce an extra empty line; it is remembered so
 * `joinDocument` can restore it.
 */
export function splitDocument(text: string): SplitDocument {
  const lines = text.split(/\r?\n/);
  const trailingNewline = text.endsWith('\n');
  if (trailingNewline && lines[lines.length - 1] === '') lines.pop();
  return { lines, trailingNewline };
}

export function joinDocument(lines: readonly string[], trailingNewline: boolean): string {
  const body = lines.join('\n');
  return trailingNewline ? `${body}\n` : body;
}

/**
 * Convert a rendered Quarto markdown document.
 *
 * Throws `TransformError` on malformed input.
 */
export function convertMarkdown(text: string): ConvertMarkdownResult {
  const { lines, trailingNewline } = splitDocument(text);
  const result = transformLines(lines);
  return {
    markdown: joinDocument(result.lines, trailingNewline),
    stats: result.stats,
    normalizedLines: result.normalizedLines,
  };
}
