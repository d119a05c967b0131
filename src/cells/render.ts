import { tryOpenBlock } from './classify.js';
import {
  COLON_FENCE_MARKER,
  ERROR_CONTEXT_LINES,
  INDENT_UNIT,
  MARKDOWN_DIV_OPEN,
  MAX_NESTING_DEPTH,
  OUTPUT_ADMONITIONS,
} from './constants.js';
import type { Cursor, LineTable } from './cursor.js';
import { TransformError } from './errors.js';
import { findBlockEnd } from './match.js';
import type { OpenBlock, ResolvedBlock, TransformStats } from './model.js';
import { describeKind, resolveSpan } from './model.js';

/**
 * Block renderer.
 *
 * Each block kind is re-emitted in the admonition dialect:
 * - cells lose their fences and keep only their (rendered) interior
 * - code blocks become plain ```` ```lang ```` fences
 * - cell output elements become collapsible admonitions with an indented body
 *
 * Interiors are scanned for nested blocks, which are rendered recursively and
 * spliced in place. Nothing is shared between sibling scans: each call gets
 * its own view of the enclosing blocks.
 */
export interface RenderScope {
  table: LineTable;
  stats: TransformStats;
  /** Blocks enclosing the current scan, outermost first. */
  enclosing: readonly ResolvedBlock[];
}

/**
 * Open the block at `cursor` and resolve its end within `limit`.
 *
 * Returns `undefined` when the line opens no block.
 */
export function tryStartBlock(
  scope: RenderScope,
  cursor: Cursor,
  limit: Cursor
): ResolvedBlock | undefined {
  const opened: OpenBlock | undefined = tryOpenBlock(scope.table, cursor);
  if (!opened) return undefined;

  if (scope.enclosing.length >= MAX_NESTING_DEPTH) {
    throw new TransformError(
      'NESTING_TOO_DEEP',
      `Blocks nested deeper than ${MAX_NESTING_DEPTH} levels at line ${cursor.line + 1}`,
      cursor.line,
      { kind: opened.kind, delimiter: opened.delimiter }
    );
  }

  return resolveSpan(opened, findBlockEnd(scope.table, opened, limit));
}

/**
 * Render `[from, to)` with nested blocks substituted, plain text verbatim.
 */
export function renderRange(scope: RenderScope, from: Cursor, to: Cursor): string[] {
  const out: string[] = [];
  let plainStart = from;
  let cursor = from;

  while (cursor.isBefore(to)) {
    const block = tryStartBlock(scope, cursor, to);
    if (!block) {
      cursor = cursor.advanceLine(1);
      continue;
    }

    out.push(...scope.table.between(plainStart, block.start));
    out.push(...renderBlock(scope, block));
    cursor = block.end.close.advanceLine(1);
    plainStart = cursor;
  }

  out.push(...scope.table.between(plainStart, to));
  return out;
}

/**
 * Produce the replacement lines for a resolved block.
 *
 * Throws `ESCAPED_FENCE` if any produced line still starts with `:::`.
 */
export function renderBlock(scope: RenderScope, block: ResolvedBlock): string[] {
  const inner: RenderScope = { ...scope, enclosing: [...scope.enclosing, block] };
  const interiorStart = block.start.advanceLine(1);
  const interiorEnd = block.end.close;

  let out: string[];
  switch (block.kind) {
    case 'cell':
      scope.stats.cells += 1;
      out = renderRange(inner, interiorStart, interiorEnd);
      break;
    case 'codeBlock':
      scope.stats.codeBlocks += 1;
      out = [
        `${block.delimiter}${block.attributes[0] ?? ''}`,
        ...renderRange(inner, interiorStart, interiorEnd),
        block.delimiter,
      ];
      break;
    case 'cellElement':
    case 'cellElementAlternate':
      scope.stats.outputs += 1;
      out = renderOutputElement(inner, block);
      break;
    case 'html':
      throw new TransformError(
        'UNSUPPORTED_BLOCK_KIND',
        `Rendering ${describeKind(block.kind)} blocks is not supported (line ${block.start.line + 1})`,
        block.start.line,
        { kind: block.kind }
      );
  }

  assertNoEscapedFence(block, out);
  return out;
}

/**
 * Look up the admonition header for a cell output element.
 */
export function admonitionHeader(block: ResolvedBlock): string {
  for (const attribute of block.attributes) {
    const header = OUTPUT_ADMONITIONS.get(attribute);
    if (header !== undefined) return header;
  }
  throw new TransformError(
    'UNMAPPABLE_OUTPUT_ATTRIBUTES',
    `Could not map attributes ${JSON.stringify(block.attributes)} to an admonition type (line ${
      block.start.line + 1
    })`,
    block.start.line,
    { kind: block.kind, delimiter: block.delimiter, attributes: block.attributes }
  );
}

function renderOutputElement(scope: RenderScope, block: ResolvedBlock): string[] {
  const header = admonitionHeader(block);
  const interiorStart = block.start.advanceLine(1);
  const interiorEnd = block.end.close;

  const raw = scope.table.between(interiorStart, interiorEnd);
  const body = isWrappedInDiv(raw)
    ? markHtmlBody(raw)
    : renderRange(scope, interiorStart, interiorEnd);

  return [header, '', ...body.map((line) => `${INDENT_UNIT}${line}`), ''];
}

/**
 * True if the first non-blank line opens a `<div>` and the last non-blank line
 * closes it (pandas tables, widgets and other raw HTML output).
 */
export function isWrappedInDiv(lines: readonly string[]): boolean {
  const nonBlank = lines.filter((line) => line.trim().length > 0);
  const first = nonBlank[0];
  const last = nonBlank[nonBlank.length - 1];
  if (first === undefined || last === undefined) return false;
  return first.trimStart().startsWith('<div>') && last.trimEnd().endsWith('</div>');
}

/**
 * Keep raw HTML as-is, except that a `<div>` followed by a `style` line is
 * flagged so its interior is still treated as markdown.
 */
function markHtmlBody(lines: readonly string[]): string[] {
  const out = [...lines];
  const openIndex = out.findIndex((line) => line.trim().length > 0);
  const open = out[openIndex];
  const next = out[openIndex + 1];
  if (open !== undefined && next !== undefined && next.includes('style')) {
    out[openIndex] = open.replace('<div>', MARKDOWN_DIV_OPEN);
  }
  return out;
}

function assertNoEscapedFence(block: ResolvedBlock, out: readonly string[]): void {
  const bad: number[] = [];
  out.forEach((line, index) => {
    if (line.startsWith(COLON_FENCE_MARKER)) bad.push(index);
  });
  if (bad.length === 0) return;

  const context = out
    .map((line, index) => ({ line, index }))
    .filter(({ index }) => bad.some((badIndex) => Math.abs(index - badIndex) <= ERROR_CONTEXT_LINES))
    .map(({ line, index }) => `${index}: ${line}`);

  throw new TransformError(
    'ESCAPED_FENCE',
    `Rendered ${describeKind(block.kind)} from line ${block.start.line + 1} still contains a ${COLON_FENCE_MARKER} fence`,
    block.start.line,
    { kind: block.kind, delimiter: block.delimiter, attributes: block.attributes, context }
  );
}
