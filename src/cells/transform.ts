import { isQuartoColonOpening } from './classify.js';
import {
  COLON_FENCE_MARKER,
  LOOSE_COLON_FENCE_RE,
  NORMALIZED_COLON_FENCE,
} from './constants.js';
import { LineTable } from './cursor.js';
import { TransformError } from './errors.js';
import type { ResolvedBlock, TransformStats } from './model.js';
import { emptyStats } from './model.js';
import type { RenderScope } from './render.js';
import { renderBlock, tryStartBlock } from './render.js';
import { createLogger } from '../logger.js';

const log = createLogger('transform');

export interface TransformResult {
  lines: string[];
  stats: TransformStats;
  /** 0-based input lines whose colon fence was rewritten to three colons. */
  normalizedLines: number[];
}

/**
 * Rewrite a look-alike colon fence (mkdocstrings `::: module.path`, a bare
 * closing fence) to exactly three colons, keeping the text after the colons.
 *
 * Quarto cell syntax and every other line come back unchanged.
 */
export function normalizeColonFence(line: string): string {
  const match = line.match(LOOSE_COLON_FENCE_RE);
  if (!match) return line;
  if (isQuartoColonOpening(line)) return line;
  return `${NORMALIZED_COLON_FENCE}${match[2] ?? ''}`;
}

/**
 * Convert rendered Quarto markdown lines into admonition-flavoured markdown.
 *
 * Walks the document top to bottom. A line that opens a block is rendered
 * together with everything up to its closing fence; any other line is passed
 * through, after colon-fence normalization. Fails with a `TransformError`
 * rather than returning partial output.
 */
export function transformLines(input: readonly string[]): TransformResult {
  const table = new LineTable(input);
  const stats = emptyStats();
  const opened: ResolvedBlock[] = [];
  const normalizedLines: number[] = [];
  const out: string[] = [];

  const scope: RenderScope = { table, stats, enclosing: [] };
  const limit = table.end();

  let cursor = table.start();
  while (!cursor.isPastEnd(table)) {
    const block = tryStartBlock(scope, cursor, limit);
    if (block) {
      out.push(...renderBlock(scope, block));
      opened.push(block);
      cursor = block.end.close.advanceLine(1);
      continue;
    }

    const line = table.lineAt(cursor);
    const normalized = normalizeColonFence(line);
    if (normalized !== line) {
      log.debug(`line ${cursor.line}: normalized ${JSON.stringify(line)} -> ${JSON.stringify(normalized)}`);
      normalizedLines.push(cursor.line);
      stats.normalizedFences += 1;
    }
    out.push(normalized);
    cursor = cursor.advanceLine(1);
  }

  assertNoUnprocessedSyntax(out);
  log.debug(`converted ${opened.length} top-level block(s)`);
  return { lines: out, stats, normalizedLines };
}

/**
 * Core entry point: input lines in, converted lines out.
 */
export function transform(input: readonly string[]): string[] {
  return transformLines(input).lines;
}

/**
 * Fail if Quarto block syntax survived conversion.
 *
 * Other `:::` lines (mkdocstrings directives, closing fences) are allowed.
 */
export function assertNoUnprocessedSyntax(out: readonly string[]): void {
  const escaped = out
    .map((line, index) => ({ line, index }))
    .filter(({ line }) => line.startsWith(COLON_FENCE_MARKER) && isQuartoColonOpening(line));
  const first = escaped[0];
  if (first === undefined) return;

  throw new TransformError(
    'UNPROCESSED_SYNTAX',
    `Unprocessed Quarto cell syntax found: ${JSON.stringify(escaped.map(({ line }) => line))}`,
    undefined,
    { context: escaped.map(({ line, index }) => `${index}: ${line}`) }
  );
}
