import type { Cursor, LineTable } from './cursor.js';
import { TransformError } from './errors.js';
import type { OpenBlock } from './model.js';
import { describeKind } from './model.js';

/**
 * True if `line` closes a block fenced with `delimiter`.
 *
 * The line must be the exact delimiter (same character, same width), with at
 * most one trailing whitespace character.
 */
export function isClosingFence(line: string, delimiter: string): boolean {
  if (line === delimiter) return true;
  if (line.length !== delimiter.length + 1) return false;
  return line.startsWith(delimiter) && /\s/.test(line.charAt(delimiter.length));
}

/**
 * Find the closing fence line of `span`.
 *
 * Scans forward from the line after the opening fence, stopping before
 * `limit` (the enclosing block's closing fence, or the end of the document).
 * Returns a cursor at column 0 of the closing line.
 */
export function findBlockEnd(table: LineTable, span: OpenBlock, limit: Cursor): Cursor {
  switch (span.kind) {
    case 'cell':
    case 'cellElement':
    case 'cellElementAlternate':
    case 'codeBlock':
      return findDelimitedEnd(table, span, limit);
    case 'html':
      throw new TransformError(
        'UNSUPPORTED_BLOCK_KIND',
        `Cannot find the end of a ${describeKind(span.kind)} block (line ${span.start.line + 1})`,
        span.start.line,
        { kind: span.kind }
      );
  }
}

function findDelimitedEnd(table: LineTable, span: OpenBlock, limit: Cursor): Cursor {
  let cursor = span.start.advanceLine(1);
  while (cursor.isBefore(limit) && !cursor.isPastEnd(table)) {
    if (isClosingFence(table.lineAt(cursor), span.delimiter)) return cursor;
    cursor = cursor.advanceLine(1);
  }

  throw new TransformError(
    'UNTERMINATED_BLOCK',
    `Unterminated ${describeKind(span.kind)} opened with ${JSON.stringify(span.delimiter)} at line ${
      span.start.line + 1
    }`,
    span.start.line,
    { kind: span.kind, delimiter: span.delimiter, attributes: span.attributes }
  );
}
